import { describe, it, expect } from 'vitest';
import {
  LauncherError,
  Errors,
  isLauncherError,
  toLauncherError,
  ERROR_EXIT_CODES,
} from '../../errors.js';

describe('LauncherError', () => {
  it('creates error with code and message', () => {
    const error = new LauncherError('INVALID_CONFIG', 'Invalid config format');
    expect(error.code).toBe('INVALID_CONFIG');
    expect(error.message).toBe('Invalid config format');
    expect(error.name).toBe('LauncherError');
  });

  it('sets exit code from error code', () => {
    expect(new LauncherError('COMMAND_NOT_FOUND', 'missing').exitCode).toBe(127);
    expect(new LauncherError('COMMAND_NOT_EXECUTABLE', 'denied').exitCode).toBe(126);
  });

  it('accepts optional properties', () => {
    const cause = new Error('Original error');
    const error = new LauncherError('INTERNAL_ERROR', 'Something went wrong', {
      details: { key: 'value' },
      cause,
    });

    expect(error.details).toEqual({ key: 'value' });
    expect(error.cause).toBe(cause);
  });

  it('serializes to JSON correctly', () => {
    const error = new LauncherError('INVALID_SKILL', 'Bad skill', {
      details: { location: 'skills/browser/SKILL.md' },
    });

    expect(error.toJSON()).toEqual({
      code: 'INVALID_SKILL',
      message: 'Bad skill',
      exitCode: 65,
      details: { location: 'skills/browser/SKILL.md' },
    });
  });

  it('is an instance of Error', () => {
    const error = new LauncherError('INTERNAL_ERROR', 'Test');
    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(LauncherError);
  });
});

describe('ERROR_EXIT_CODES', () => {
  it('maps every code to a non-zero exit code', () => {
    for (const code of Object.values(ERROR_EXIT_CODES)) {
      expect(code).toBeGreaterThan(0);
      expect(code).toBeLessThan(128);
    }
  });
});

describe('Errors factory', () => {
  it('creates commandNotFound error in shell style', () => {
    const error = Errors.commandNotFound('python3');
    expect(error.code).toBe('COMMAND_NOT_FOUND');
    expect(error.message).toBe('python3: command not found');
    expect(error.details).toEqual({ command: 'python3' });
  });

  it('creates configParseFailed error with cause', () => {
    const cause = new SyntaxError('Unexpected token');
    const error = Errors.configParseFailed('NANOBOT_CONFIG', cause);
    expect(error.code).toBe('CONFIG_PARSE_FAILED');
    expect(error.message).toBe('Failed to parse config from NANOBOT_CONFIG');
    expect(error.cause).toBe(cause);
  });

  it('creates readOnlyProvider error', () => {
    const error = Errors.readOnlyProvider('environment');
    expect(error.code).toBe('READ_ONLY_PROVIDER');
    expect(error.message).toBe('Credential provider is read-only: environment');
  });

  it('creates skill errors', () => {
    expect(Errors.skillNotFound('browser').message).toBe('Skill not found: browser');
    expect(Errors.duplicateSkill('browser').code).toBe('DUPLICATE_SKILL');
    expect(Errors.invalidSkill('a/SKILL.md', 'name: Required').message).toBe(
      'Invalid skill manifest at a/SKILL.md: name: Required'
    );
  });
});

describe('isLauncherError', () => {
  it('returns true for LauncherError', () => {
    expect(isLauncherError(new LauncherError('INTERNAL_ERROR', 'Test'))).toBe(true);
  });

  it('returns false for regular Error and non-errors', () => {
    expect(isLauncherError(new Error('Test'))).toBe(false);
    expect(isLauncherError('error')).toBe(false);
    expect(isLauncherError(null)).toBe(false);
  });
});

describe('toLauncherError', () => {
  it('returns LauncherError unchanged', () => {
    const original = new LauncherError('SPAWN_FAILED', 'Test');
    expect(toLauncherError(original)).toBe(original);
  });

  it('wraps regular Error', () => {
    const original = new Error('Regular error');
    const converted = toLauncherError(original);
    expect(converted.code).toBe('INTERNAL_ERROR');
    expect(converted.message).toBe('Regular error');
    expect(converted.cause).toBe(original);
  });

  it('converts non-Error values', () => {
    const converted = toLauncherError('string error');
    expect(converted.code).toBe('INTERNAL_ERROR');
    expect(converted.message).toBe('string error');
  });
});
