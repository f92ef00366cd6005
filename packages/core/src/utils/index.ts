/**
 * Utility exports for @nanobot-launcher/core
 */

// Schema validation utilities
export {
  validateSchema,
  formatValidationErrors,
  z,
} from './schema.js';
export type { ValidationResult, ValidationError } from './schema.js';

// Error utilities
export {
  formatError,
  formatErrorDetails,
  exitCodeForError,
  getSystemErrorCode,
} from './error-helpers.js';

// Key-case utilities
export {
  camelToSnake,
  snakeToCamel,
  convertKeys,
  convertToCamel,
  isPlainObject,
} from './keys.js';

// Redaction
export { maskSecret, redactSecrets, SECRET_FIELDS } from './redact.js';
