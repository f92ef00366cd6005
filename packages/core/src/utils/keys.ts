/**
 * Key-case conversion for config payloads.
 *
 * Gateway config files are written in camelCase; the bootstrap payload and
 * hand-written configs may use snake_case. Both are accepted on input.
 */

export function camelToSnake(name: string): string {
  let result = '';
  for (let i = 0; i < name.length; i++) {
    const char = name[i];
    if (char !== char.toLowerCase() && i > 0) {
      result += '_';
    }
    result += char.toLowerCase();
  }
  return result;
}

export function snakeToCamel(name: string): string {
  const [first, ...rest] = name.split('_');
  return first + rest.map((part) => (part ? part[0].toUpperCase() + part.slice(1).toLowerCase() : '')).join('');
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mapKeysDeep(data: unknown, convert: (key: string) => string): unknown {
  if (Array.isArray(data)) {
    return data.map((item) => mapKeysDeep(item, convert));
  }
  if (isPlainObject(data)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      result[convert(key)] = mapKeysDeep(value, convert);
    }
    return result;
  }
  return data;
}

/**
 * Recursively convert camelCase keys to snake_case
 */
export function convertKeys(data: unknown): unknown {
  return mapKeysDeep(data, camelToSnake);
}

/**
 * Recursively convert snake_case keys to camelCase
 */
export function convertToCamel(data: unknown): unknown {
  return mapKeysDeep(data, snakeToCamel);
}
