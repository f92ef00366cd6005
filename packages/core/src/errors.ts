/**
 * Error codes and custom error classes for the launcher
 */

/**
 * All error codes used across the launcher packages
 */
export type ErrorCode =
  // Configuration errors
  | 'INVALID_CONFIG'
  | 'CONFIG_PARSE_FAILED'
  | 'CONFIG_EXISTS'
  | 'INVALID_SETTINGS'

  // Credential errors
  | 'READ_ONLY_PROVIDER'

  // Skill manifest errors
  | 'INVALID_SKILL'
  | 'SKILL_NOT_FOUND'
  | 'DUPLICATE_SKILL'

  // Process hand-off errors
  | 'COMMAND_NOT_FOUND'
  | 'COMMAND_NOT_EXECUTABLE'
  | 'SPAWN_FAILED'

  // System errors
  | 'STORAGE_ERROR'
  | 'INTERNAL_ERROR';

/**
 * Error code to process exit code mapping.
 *
 * Spawn failures follow the shell's conventions (127 not found, 126 not executable).
 */
export const ERROR_EXIT_CODES: Record<ErrorCode, number> = {
  INVALID_CONFIG: 78,
  CONFIG_PARSE_FAILED: 78,
  CONFIG_EXISTS: 73,
  INVALID_SETTINGS: 64,

  READ_ONLY_PROVIDER: 1,

  INVALID_SKILL: 65,
  SKILL_NOT_FOUND: 1,
  DUPLICATE_SKILL: 65,

  COMMAND_NOT_FOUND: 127,
  COMMAND_NOT_EXECUTABLE: 126,
  SPAWN_FAILED: 1,

  STORAGE_ERROR: 74,
  INTERNAL_ERROR: 1,
};

/**
 * Custom error class for launcher errors
 */
export class LauncherError extends Error {
  /** Error code */
  readonly code: ErrorCode;

  /** Exit code the CLI should terminate with */
  readonly exitCode: number;

  /** Additional error details */
  readonly details?: Record<string, unknown>;

  /** Original error that caused this error */
  declare readonly cause?: Error;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      details?: Record<string, unknown>;
      cause?: Error;
    }
  ) {
    super(message);
    this.name = 'LauncherError';
    this.code = code;
    this.exitCode = ERROR_EXIT_CODES[code];
    this.details = options?.details;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LauncherError);
    }
  }

  toJSON(): {
    code: ErrorCode;
    message: string;
    exitCode: number;
    details?: Record<string, unknown>;
  } {
    return {
      code: this.code,
      message: this.message,
      exitCode: this.exitCode,
      details: this.details,
    };
  }
}

/**
 * Error factory functions for common error types
 */
export const Errors = {
  invalidConfig: (message: string, details?: Record<string, unknown>) =>
    new LauncherError('INVALID_CONFIG', message, { details }),

  configParseFailed: (source: string, cause?: Error) =>
    new LauncherError('CONFIG_PARSE_FAILED', `Failed to parse config from ${source}`, {
      details: { source },
      cause,
    }),

  configExists: (path: string) =>
    new LauncherError('CONFIG_EXISTS', `Config already exists: ${path}`, {
      details: { path },
    }),

  invalidSettings: (message: string, details?: Record<string, unknown>) =>
    new LauncherError('INVALID_SETTINGS', message, { details }),

  readOnlyProvider: (providerName: string) =>
    new LauncherError('READ_ONLY_PROVIDER', `Credential provider is read-only: ${providerName}`, {
      details: { provider: providerName },
    }),

  invalidSkill: (location: string, message: string) =>
    new LauncherError('INVALID_SKILL', `Invalid skill manifest at ${location}: ${message}`, {
      details: { location },
    }),

  skillNotFound: (name: string) =>
    new LauncherError('SKILL_NOT_FOUND', `Skill not found: ${name}`, {
      details: { name },
    }),

  duplicateSkill: (name: string) =>
    new LauncherError('DUPLICATE_SKILL', `Skill already registered: ${name}`, {
      details: { name },
    }),

  commandNotFound: (command: string, cause?: Error) =>
    new LauncherError('COMMAND_NOT_FOUND', `${command}: command not found`, {
      details: { command },
      cause,
    }),

  commandNotExecutable: (command: string, cause?: Error) =>
    new LauncherError('COMMAND_NOT_EXECUTABLE', `${command}: permission denied`, {
      details: { command },
      cause,
    }),

  spawnFailed: (command: string, cause?: Error) =>
    new LauncherError('SPAWN_FAILED', `Failed to start ${command}`, {
      details: { command },
      cause,
    }),

  storageError: (message: string, cause?: Error) =>
    new LauncherError('STORAGE_ERROR', message, { cause }),
};

/**
 * Type guard to check if an error is a LauncherError
 */
export function isLauncherError(error: unknown): error is LauncherError {
  return error instanceof LauncherError;
}

/**
 * Convert any error to a LauncherError
 */
export function toLauncherError(error: unknown): LauncherError {
  if (error instanceof LauncherError) {
    return error;
  }

  if (error instanceof Error) {
    return new LauncherError('INTERNAL_ERROR', error.message, {
      cause: error,
    });
  }

  return new LauncherError('INTERNAL_ERROR', String(error));
}
