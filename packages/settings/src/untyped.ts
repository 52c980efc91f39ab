import { inspect } from 'node:util';

import { parse, YAMLParseError } from 'yaml';

import { ValidationError } from './errors';

/** Mapping node of a deserialized document, keyed in document order. */
export type UntypedMapping = ReadonlyMap<unknown, unknown>;

const isPlainObject = (value: unknown): value is Record<string, unknown> => {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
};

export const formatValue = (value: unknown): string =>
  inspect(value, { breakLength: Infinity, depth: 4 });

export const asMapping = (value: unknown): UntypedMapping | null => {
  if (value instanceof Map) {
    return value;
  }
  if (isPlainObject(value)) {
    return new Map(Object.entries(value));
  }
  return null;
};

export const requireMapping = (value: unknown, what: string): UntypedMapping => {
  const mapping = asMapping(value);
  if (!mapping) {
    throw new ValidationError(`invalid ${what}: ${formatValue(value)}`);
  }
  return mapping;
};

/**
 * Reads a scalar field as text. Numbers are accepted because hand-written
 * documents often leave values such as `epoch: 0` unquoted.
 */
export const readText = (mapping: UntypedMapping, key: string): string | undefined => {
  const value = mapping.get(key);
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  throw new ValidationError(`'${key}' must be a string: ${formatValue(value)}`);
};

export const parseYamlDocument = (text: string, origin: string): unknown => {
  try {
    return parse(text, { mapAsMap: true });
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new ValidationError(`invalid YAML in ${origin}: ${error.message}`);
    }
    throw error;
  }
};
