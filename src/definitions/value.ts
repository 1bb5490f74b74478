/**
 * Conversions between parsed documents and the config value tree
 */

import type { JsonObject, JsonValue } from '../api/types.js';
import {
  DefinitionError,
  type ConfigMapping,
  type ConfigValue,
} from './types.js';

export function scalar(value: string | number | boolean | null): ConfigValue {
  return { kind: 'scalar', value };
}

export function mapping(entries: Iterable<[string, ConfigValue]> = []): ConfigMapping {
  return { kind: 'mapping', entries: new Map(entries) };
}

export function sequence(items: ConfigValue[]): ConfigValue {
  return { kind: 'sequence', items };
}

/**
 * Convert a parsed YAML/JSON value into a config value tree.
 *
 * @param path - Location used in error messages, e.g. `services.web.ports[0]`
 * @throws DefinitionError (UNSUPPORTED_VALUE) for values JSON cannot carry
 */
export function toConfigValue(input: unknown, path = ''): ConfigValue {
  if (input === null) {
    return scalar(null);
  }

  if (typeof input === 'string' || typeof input === 'boolean') {
    return scalar(input);
  }

  if (typeof input === 'number') {
    if (!Number.isFinite(input)) {
      throw unsupported(path, String(input));
    }
    return scalar(input);
  }

  if (typeof input !== 'object') {
    throw unsupported(path, typeof input);
  }

  if (Array.isArray(input)) {
    return sequence(input.map((item, index) => toConfigValue(item, `${path}[${index}]`)));
  }

  if (input instanceof Date || input instanceof Map || input instanceof Set) {
    throw unsupported(path, input.constructor.name);
  }

  return mapping(
    Object.entries(input).map(([key, value]): [string, ConfigValue] => [
      key,
      toConfigValue(value, path ? `${path}.${key}` : key),
    ])
  );
}

/**
 * Convert a parsed document that must be a top-level mapping
 *
 * @throws DefinitionError (NOT_A_MAPPING) when the document is not an object
 */
export function toConfigMapping(input: unknown, what = 'document'): ConfigMapping {
  const value = toConfigValue(input);
  if (value.kind !== 'mapping') {
    throw new DefinitionError(`${what} must contain a top-level object/mapping`, 'NOT_A_MAPPING', {
      found: describeKind(value),
    });
  }
  return value;
}

/**
 * Convert a config value back to plain JSON for request payloads
 */
export function toPlain(value: ConfigValue): JsonValue {
  switch (value.kind) {
    case 'scalar':
      return value.value;
    case 'sequence':
      return value.items.map(toPlain);
    case 'mapping':
      return toPlainObject(value);
  }
}

export function toPlainObject(value: ConfigMapping): JsonObject {
  const result: JsonObject = {};
  for (const [key, entry] of value.entries) {
    // plain assignment would treat "__proto__" as the prototype
    Object.defineProperty(result, key, {
      value: toPlain(entry),
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return result;
}

/**
 * Full structural equality; mapping key order is ignored, sequence order is not
 */
export function configEquals(a: ConfigValue, b: ConfigValue): boolean {
  if (a.kind === 'scalar' && b.kind === 'scalar') {
    return a.value === b.value;
  }
  if (a.kind === 'sequence' && b.kind === 'sequence') {
    return a.items.length === b.items.length && a.items.every((item, i) => configEquals(item, b.items[i]));
  }
  if (a.kind === 'mapping' && b.kind === 'mapping') {
    if (a.entries.size !== b.entries.size) return false;
    for (const [key, value] of a.entries) {
      const other = b.entries.get(key);
      if (other === undefined || !configEquals(value, other)) return false;
    }
    return true;
  }
  return false;
}

export function describeKind(value: ConfigValue): string {
  if (value.kind !== 'scalar') return value.kind;
  return value.value === null ? 'null' : typeof value.value;
}

/**
 * Short single-line rendering for reports
 */
export function formatConfigValue(value: ConfigValue | undefined, maxLength = 60): string {
  if (value === undefined) return '(unset)';
  const text = JSON.stringify(toPlain(value));
  return text.length > maxLength ? `${text.slice(0, maxLength - 3)}...` : text;
}

function unsupported(path: string, found: string): DefinitionError {
  return new DefinitionError(
    `Unsupported value at ${path || 'document root'}: ${found}`,
    'UNSUPPORTED_VALUE',
    { path, found }
  );
}
