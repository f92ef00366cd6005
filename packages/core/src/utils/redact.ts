/**
 * Secret masking for anything printed to a terminal
 */

const MASK = '***';
const VISIBLE_PREFIX = 4;
const MIN_PARTIAL_LENGTH = 9;

/** Field names whose values are always masked */
export const SECRET_FIELDS: readonly string[] = ['apiKey', 'api_key', 'token', 'password', 'secret'];

/**
 * Mask a secret, keeping a short prefix for identification when it is long enough
 */
export function maskSecret(value: string): string {
  if (value.length < MIN_PARTIAL_LENGTH) {
    return MASK;
  }
  return `${value.slice(0, VISIBLE_PREFIX)}…`;
}

/**
 * Deep-copy a value, masking every non-empty string under a secret field name
 */
export function redactSecrets<T>(data: T): T {
  return redactValue(data) as T;
}

function redactValue(value: unknown, key?: string): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item));
  }
  if (typeof value === 'object' && value !== null) {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      result[k] = redactValue(v, k);
    }
    return result;
  }
  if (typeof value === 'string' && key !== undefined && SECRET_FIELDS.includes(key) && value.length > 0) {
    return maskSecret(value);
  }
  return value;
}
