/**
 * Schema validation utilities using Zod
 */

import { z, ZodError, type ZodType, type ZodTypeDef } from 'zod';

/**
 * Result of schema validation
 */
export interface ValidationResult<T> {
  /** Whether validation passed */
  success: boolean;
  /** Validated data (if success) */
  data?: T;
  /** Validation errors (if failure) */
  errors?: ValidationError[];
}

/**
 * Individual validation error
 */
export interface ValidationError {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Error message */
  message: string;
  /** Error code */
  code: string;
}

/**
 * Validate data against a Zod schema
 * @param schema - The Zod schema to validate against
 * @param data - The data to validate
 * @returns Validation result with data or errors
 */
export function validateSchema<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  try {
    const validData = schema.parse(data);
    return {
      success: true,
      data: validData,
    };
  } catch (error) {
    if (error instanceof ZodError) {
      return {
        success: false,
        errors: error.errors.map((e) => ({
          path: e.path,
          message: e.message,
          code: e.code,
        })),
      };
    }
    throw error;
  }
}

/**
 * Render validation errors as `path: message` lines
 */
export function formatValidationErrors(errors: ValidationError[]): string[] {
  return errors.map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message));
}

// Re-export Zod for convenience
export { z };
