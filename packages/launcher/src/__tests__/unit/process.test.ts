import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter } from 'events';
import type { SpawnOptions } from 'child_process';
import { createLogger } from '@nanobot-launcher/core';
import {
  launchGateway,
  exitCodeFor,
  spawnError,
  type GatewayProcess,
  type SpawnFunction,
} from '../../process.js';
import { DEFAULT_LAUNCHER_SETTINGS } from '../../settings.js';

class FakeGateway extends EventEmitter implements GatewayProcess {
  readonly pid = 4242;
  readonly signals: Array<NodeJS.Signals | number | undefined> = [];

  kill(signal?: NodeJS.Signals | number): boolean {
    this.signals.push(signal);
    return true;
  }
}

interface SpawnCall {
  command: string;
  args: readonly string[];
  options: SpawnOptions;
}

function createFakeSpawn() {
  const calls: SpawnCall[] = [];
  const child = new FakeGateway();
  const spawn: SpawnFunction = (command, args, options) => {
    calls.push({ command, args, options });
    return child;
  };
  return { spawn, calls, child };
}

const quietLogger = createLogger({ level: 'silent' });

describe('launchGateway', () => {
  let signalSource: EventEmitter;

  beforeEach(() => {
    signalSource = new EventEmitter();
  });

  it('spawns the fixed invocation with inherited stdio and the prepared env', async () => {
    const { spawn, calls, child } = createFakeSpawn();

    const pending = launchGateway({
      env: { GROQ_API_KEY: 'gsk-test-key', PORT: '8080' },
      spawn,
      signalSource,
      logger: quietLogger,
    });
    child.emit('exit', 0, null);
    const result = await pending;

    expect(calls).toHaveLength(1);
    expect(calls[0].command).toBe('python3');
    expect(calls[0].args).toEqual(['-m', 'nanobot', 'gateway']);
    expect(calls[0].options.stdio).toBe('inherit');
    expect(calls[0].options.env).toEqual({
      GROQ_API_KEY: 'gsk-test-key',
      PORT: '8080',
      NANOBOT_CONFIG: '{"providers":{"groq":{"api_key":"gsk-test-key"}}}',
    });
    expect(result.exitCode).toBe(0);
    expect(result.prepared.reason).toBe('synthesized');
  });

  it('always hands off to the gateway whichever branch was taken', async () => {
    const envs = [
      {},
      { GROQ_API_KEY: 'gsk-test-key' },
      { NANOBOT_CONFIG: '{"providers":{}}' },
      { GROQ_API_KEY: 'gsk-test-key', NANOBOT_CONFIG: '{"providers":{}}' },
    ];

    for (const env of envs) {
      const { spawn, calls, child } = createFakeSpawn();
      const pending = launchGateway({ env, spawn, signalSource, logger: quietLogger });
      child.emit('exit', 0, null);
      await pending;

      expect(calls.map((call) => call.command)).toEqual(['python3']);
    }
  });

  it('propagates a non-zero exit code without retrying', async () => {
    const { spawn, calls, child } = createFakeSpawn();

    const pending = launchGateway({ env: {}, spawn, signalSource, logger: quietLogger });
    child.emit('exit', 3, null);
    const result = await pending;

    expect(result.exitCode).toBe(3);
    expect(exitCodeFor(result)).toBe(3);
    expect(calls).toHaveLength(1);
  });

  it('relays termination signals to the gateway', async () => {
    const { spawn, child } = createFakeSpawn();

    const pending = launchGateway({ env: {}, spawn, signalSource, logger: quietLogger });
    signalSource.emit('SIGTERM');
    signalSource.emit('SIGINT');
    child.emit('exit', null, 'SIGTERM');
    const result = await pending;

    expect(child.signals).toEqual(['SIGTERM', 'SIGINT']);
    expect(result.signal).toBe('SIGTERM');
    expect(exitCodeFor(result)).toBe(143);
  });

  it('stops relaying once the gateway has exited', async () => {
    const { spawn, child } = createFakeSpawn();

    const pending = launchGateway({ env: {}, spawn, signalSource, logger: quietLogger });
    child.emit('exit', 0, null);
    await pending;

    expect(signalSource.listenerCount('SIGINT')).toBe(0);
    expect(signalSource.listenerCount('SIGTERM')).toBe(0);
    expect(signalSource.listenerCount('SIGHUP')).toBe(0);
  });

  it('reports a missing executable like the shell does', async () => {
    const { spawn, child } = createFakeSpawn();
    const lines: string[] = [];
    const logger = createLogger({ level: 'error', write: (line) => lines.push(line) });

    const pending = launchGateway({ env: {}, spawn, signalSource, logger });
    child.emit('error', Object.assign(new Error('spawn python3 ENOENT'), { code: 'ENOENT' }));
    child.emit('exit', -2, null);
    const result = await pending;

    expect(result.exitCode).toBe(127);
    expect(result.error?.code).toBe('COMMAND_NOT_FOUND');
    expect(exitCodeFor(result)).toBe(127);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('python3: command not found');
  });

  it('handles a spawn function that throws', async () => {
    const spawn = vi.fn<SpawnFunction>(() => {
      throw Object.assign(new Error('spawn EACCES'), { code: 'EACCES' });
    });

    const result = await launchGateway({ env: {}, spawn, signalSource, logger: quietLogger });

    expect(spawn).toHaveBeenCalledTimes(1);
    expect(result.exitCode).toBe(126);
    expect(result.error?.code).toBe('COMMAND_NOT_EXECUTABLE');
  });

  it('uses the command override from the environment', async () => {
    const { spawn, calls, child } = createFakeSpawn();

    const pending = launchGateway({
      env: { NANOBOT_LAUNCHER_COMMAND: 'nanobot gateway --verbose' },
      spawn,
      signalSource,
      logger: quietLogger,
    });
    child.emit('exit', 0, null);
    await pending;

    expect(calls[0].command).toBe('nanobot');
    expect(calls[0].args).toEqual(['gateway', '--verbose']);
  });

  it('uses explicit settings when given', async () => {
    const { spawn, calls, child } = createFakeSpawn();

    const pending = launchGateway({
      env: {},
      settings: { ...DEFAULT_LAUNCHER_SETTINGS, command: '/usr/local/bin/python3' },
      spawn,
      signalSource,
      logger: quietLogger,
    });
    child.emit('exit', 0, null);
    await pending;

    expect(calls[0].command).toBe('/usr/local/bin/python3');
  });
});

describe('exitCodeFor', () => {
  it('returns the exit code when present', () => {
    expect(exitCodeFor({ exitCode: 0, signal: null })).toBe(0);
    expect(exitCodeFor({ exitCode: 2, signal: null })).toBe(2);
  });

  it('maps signals to 128 + signal number', () => {
    expect(exitCodeFor({ exitCode: null, signal: 'SIGINT' })).toBe(130);
    expect(exitCodeFor({ exitCode: null, signal: 'SIGKILL' })).toBe(137);
  });

  it('falls back to 1 without code or signal', () => {
    expect(exitCodeFor({ exitCode: null, signal: null })).toBe(1);
  });
});

describe('spawnError', () => {
  it('maps system error codes', () => {
    const enoent = Object.assign(new Error('x'), { code: 'ENOENT' });
    const eacces = Object.assign(new Error('x'), { code: 'EACCES' });

    expect(spawnError('python3', enoent).code).toBe('COMMAND_NOT_FOUND');
    expect(spawnError('python3', eacces).code).toBe('COMMAND_NOT_EXECUTABLE');
    expect(spawnError('python3', new Error('other')).code).toBe('SPAWN_FAILED');
    expect(spawnError('python3', enoent).cause).toBe(enoent);
  });
});
