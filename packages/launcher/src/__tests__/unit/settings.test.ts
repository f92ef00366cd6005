import { describe, it, expect } from 'vitest';
import { LauncherError } from '@nanobot-launcher/core';
import { resolveLauncherSettings, DEFAULT_LAUNCHER_SETTINGS } from '../../settings.js';

describe('resolveLauncherSettings', () => {
  it('returns the fixed gateway invocation by default', () => {
    expect(resolveLauncherSettings({})).toEqual({
      credentialVar: 'GROQ_API_KEY',
      configVar: 'NANOBOT_CONFIG',
      providerId: 'groq',
      command: 'python3',
      args: ['-m', 'nanobot', 'gateway'],
      logLevel: 'warn',
    });
  });

  it('splits a command override on whitespace', () => {
    const settings = resolveLauncherSettings({ NANOBOT_LAUNCHER_COMMAND: '  /opt/venv/bin/python  -m nanobot gateway ' });

    expect(settings.command).toBe('/opt/venv/bin/python');
    expect(settings.args).toEqual(['-m', 'nanobot', 'gateway']);
  });

  it('ignores a blank command override', () => {
    const settings = resolveLauncherSettings({ NANOBOT_LAUNCHER_COMMAND: '   ' });

    expect(settings.command).toBe('python3');
    expect(settings.args).toEqual(['-m', 'nanobot', 'gateway']);
  });

  it('reads the log level case-insensitively', () => {
    expect(resolveLauncherSettings({ NANOBOT_LAUNCHER_LOG_LEVEL: 'DEBUG' }).logLevel).toBe('debug');
    expect(resolveLauncherSettings({ NANOBOT_LAUNCHER_LOG_LEVEL: '' }).logLevel).toBe('warn');
  });

  it('rejects an unknown log level', () => {
    expect(() => resolveLauncherSettings({ NANOBOT_LAUNCHER_LOG_LEVEL: 'verbose' })).toThrow(LauncherError);
  });

  it('does not share the default args array', () => {
    const settings = resolveLauncherSettings({});
    settings.args.push('--extra');

    expect(DEFAULT_LAUNCHER_SETTINGS.args).toEqual(['-m', 'nanobot', 'gateway']);
  });
});
