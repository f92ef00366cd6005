/**
 * Error handling utilities
 */

import { isLauncherError } from '../errors.js';

/**
 * Format an error for logging or display
 * @param error - The error to format
 * @returns A formatted error string
 */
export function formatError(error: unknown): string {
  if (isLauncherError(error)) {
    return `[${error.code}] ${error.message}`;
  }

  if (error instanceof Error) {
    return `[${error.name}] ${error.message}`;
  }

  if (typeof error === 'string') {
    return error;
  }

  return String(error);
}

/**
 * Format an error with full details for debugging
 * @param error - The error to format
 * @returns A detailed error object
 */
export function formatErrorDetails(error: unknown): {
  message: string;
  code?: string;
  stack?: string;
  details?: Record<string, unknown>;
  cause?: string;
} {
  if (isLauncherError(error)) {
    return {
      message: error.message,
      code: error.code,
      stack: error.stack,
      details: error.details,
      cause: error.cause?.message,
    };
  }

  if (error instanceof Error) {
    return {
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: String(error),
  };
}

/**
 * Exit code a CLI should use for an error
 */
export function exitCodeForError(error: unknown): number {
  return isLauncherError(error) ? error.exitCode : 1;
}

/**
 * Read the `code` of a Node.js system error (ENOENT, EACCES, ...)
 */
export function getSystemErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
