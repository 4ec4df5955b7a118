/**
 * JSON Schema Export for hostctl Configuration
 *
 * Translates schema descriptors to draft-07 JSON Schema, for editor
 * validation of cloud.yml and for the document shape check in the loader.
 */

import type { PrimitiveKind, RecordSchema, TypeDescriptor } from './schema.js';

/**
 * Subset of JSON Schema produced by the translation.
 */
export type JsonSchema = {
  $schema?: string;
  type?: 'string' | 'integer' | 'number' | 'boolean' | 'array' | 'object' | 'null';
  enum?: string[];
  items?: JsonSchema;
  anyOf?: JsonSchema[];
  properties?: Record<string, JsonSchema>;
  propertyNames?: JsonSchema;
  additionalProperties?: JsonSchema | boolean;
};

const DRAFT_07 = 'http://json-schema.org/draft-07/schema#';

const PRIMITIVE_TYPES: Record<PrimitiveKind, NonNullable<JsonSchema['type']>> = {
  string: 'string',
  integer: 'integer',
  float: 'number',
  boolean: 'boolean',
};

/**
 * Translate a single descriptor.
 */
export function toJsonSchema(type: TypeDescriptor): JsonSchema {
  switch (type.kind) {
    case 'primitive':
      return { type: PRIMITIVE_TYPES[type.type] };

    case 'optional':
      return { anyOf: [toJsonSchema(type.inner), { type: 'null' }] };

    case 'list':
      return { type: 'array', items: toJsonSchema(type.item) };

    case 'map': {
      const schema: JsonSchema = {
        type: 'object',
        additionalProperties: toJsonSchema(type.value),
      };
      // Object keys are always strings; only literal keys narrow further
      if (type.key.kind === 'literal') {
        schema.propertyNames = { enum: [...type.key.allowed] };
      }
      return schema;
    }

    case 'literal':
      return { type: 'string', enum: [...type.allowed] };

    case 'union':
      return { anyOf: type.members.map((member) => toJsonSchema(member)) };

    default: {
      const _exhaustive: never = type;
      return _exhaustive;
    }
  }
}

/**
 * Translate a whole record schema. Unknown properties are rejected.
 */
export function recordToJsonSchema(schema: RecordSchema): JsonSchema {
  return {
    $schema: DRAFT_07,
    type: 'object',
    additionalProperties: false,
    properties: Object.fromEntries(
      Object.entries(schema).map(([field, type]) => [field, toJsonSchema(type)])
    ),
  };
}

/**
 * Schema that checks only the outer shape of a document: an object
 * whose keys are all declared fields. Field values are left to the
 * descriptor validator.
 */
export function documentShapeSchema(schema: RecordSchema): JsonSchema {
  return {
    type: 'object',
    additionalProperties: false,
    properties: Object.fromEntries(Object.keys(schema).map((field) => [field, {}])),
  };
}
