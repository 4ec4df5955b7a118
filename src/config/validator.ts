/**
 * Configuration Validator for hostctl
 *
 * Checks runtime values against schema descriptors by recursive descent.
 * Failures throw InvalidFieldValueError naming the field (qualified with
 * "item", "key" or "value" for nested failures), the expected type, and
 * the offending value with its runtime type. Validation is pure: values
 * are only read, never coerced.
 */

import { InvalidFieldValueError } from '../types.js';

import {
  describeType,
  type PrimitiveKind,
  type RecordSchema,
  type TypeDescriptor,
} from './schema.js';

const PRIMITIVE_NAMES: Record<PrimitiveKind, string> = {
  string: 'a string',
  integer: 'an integer',
  float: 'a float',
  boolean: 'a boolean',
};

/**
 * Runtime type name used in error messages.
 */
export function typeName(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  if (value instanceof Map) {
    return 'map';
  }
  return typeof value;
}

/**
 * Validate a single value against a descriptor.
 *
 * @param value - Value to check
 * @param type - Declared type
 * @param label - Field label used in error messages
 * @throws InvalidFieldValueError if the value does not match
 */
export function validateValue(value: unknown, type: TypeDescriptor, label = ''): void {
  switch (type.kind) {
    case 'primitive':
      if (!isPrimitive(value, type.type)) {
        throw mismatch(label, PRIMITIVE_NAMES[type.type], value);
      }
      return;

    case 'optional':
      if (value === null || value === undefined) {
        return;
      }
      validateValue(value, type.inner, label);
      return;

    case 'list':
      if (!Array.isArray(value)) {
        throw mismatch(label, 'a list', value);
      }
      for (const item of value) {
        validateValue(item, type.item, qualify(label, 'item'));
      }
      return;

    case 'map': {
      const entries = mapEntries(value);
      if (!entries) {
        throw mismatch(label, 'a mapping', value);
      }
      for (const [key, entryValue] of entries) {
        validateValue(key, type.key, qualify(label, 'key'));
        validateValue(entryValue, type.value, qualify(label, 'value'));
      }
      return;
    }

    case 'literal':
      if (typeof value !== 'string') {
        throw mismatch(label, PRIMITIVE_NAMES.string, value);
      }
      if (!type.allowed.includes(value)) {
        throw new InvalidFieldValueError({
          field: label,
          expected: describeType(type),
          actual: value,
          actualType: typeName(value),
          allowed: type.allowed,
        });
      }
      return;

    case 'union':
      if (!type.members.some((member) => matchesType(value, member))) {
        throw mismatch(label, `one of ${describeType(type)}`, value);
      }
      return;

    default: {
      const _exhaustive: never = type;
      throw new Error(`Unhandled type descriptor: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/**
 * Check a value against a descriptor without throwing.
 * Only validation failures map to `false`; anything else propagates.
 */
export function matchesType(value: unknown, type: TypeDescriptor): boolean {
  try {
    validateValue(value, type);
    return true;
  } catch (error) {
    if (error instanceof InvalidFieldValueError) {
      return false;
    }
    throw error;
  }
}

/**
 * Validate every schema field of a record, in declaration order.
 * The first failing field aborts the check.
 *
 * @throws InvalidFieldValueError for the first invalid field
 */
export function validateRecord(
  schema: RecordSchema,
  values: Readonly<Record<string, unknown>>
): void {
  for (const [field, type] of Object.entries(schema)) {
    validateValue(values[field], type, field);
  }
}

function isPrimitive(value: unknown, kind: PrimitiveKind): boolean {
  switch (kind) {
    case 'string':
      return typeof value === 'string';
    case 'integer':
      return Number.isInteger(value);
    case 'float':
      return typeof value === 'number';
    case 'boolean':
      return typeof value === 'boolean';
  }
}

function qualify(label: string, context: 'item' | 'key' | 'value'): string {
  return label ? `${label} ${context}` : '';
}

function mapEntries(value: unknown): Array<[unknown, unknown]> | undefined {
  if (value instanceof Map) {
    return [...value.entries()];
  }
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto === Object.prototype || proto === null) {
      return Object.entries(value);
    }
  }
  return undefined;
}

function mismatch(label: string, expected: string, value: unknown): InvalidFieldValueError {
  return new InvalidFieldValueError({
    field: label,
    expected,
    actual: value,
    actualType: typeName(value),
  });
}
