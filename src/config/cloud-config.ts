/**
 * Cloud Configuration Record
 *
 * The validated in-memory form of cloud.yml. Records are validated once
 * at construction and frozen; derived copies go through the same
 * construction path, so overrides are held to the same schema.
 */

import { access, constants } from 'fs/promises';

import { ConfigError, REGION_OPTIONS, VM_TYPES } from '../types.js';

import { t, type InferRecord } from './schema.js';
import { validateRecord } from './validator.js';

/**
 * Declared type of every cloud.yml field, in declaration order.
 */
export const CLOUD_CONFIG_SCHEMA = {
  name: t.optional(t.string()),
  description: t.optional(t.string()),
  vmtype: t.optional(t.literal(VM_TYPES)),
  regions: t.optional(t.map(t.literal(REGION_OPTIONS), t.integer())),
  hostname: t.optional(t.string()),
  envfile: t.string(),
  project: t.optional(t.string()),
  packages: t.list(t.string()),
} as const;

export type CloudConfigValues = InferRecord<typeof CLOUD_CONFIG_SCHEMA>;

export type CloudConfigField = keyof CloudConfigValues;

/**
 * Raw field values as supplied by a caller or a parsed document.
 * `undefined` means "not provided"; types are checked at construction.
 */
export type CloudConfigInput = { readonly [K in CloudConfigField]?: unknown };

function defaultValues(): CloudConfigValues {
  return {
    name: null,
    description: null,
    vmtype: null,
    regions: null,
    hostname: null,
    envfile: '.env',
    project: null,
    packages: [],
  };
}

/**
 * Validated cloud.yml configuration.
 *
 * @example
 * ```typescript
 * const config = CloudConfig.create({ vmtype: 'c1m1', regions: { iad: 2 } });
 * const scaled = config.withOverrides({ vmtype: 'c2m2' });
 * ```
 */
export class CloudConfig {
  private constructor(
    private readonly values: Readonly<CloudConfigValues>,
    /** Backing file, or null for records not tied to a file */
    readonly sourcePath: string | null
  ) {}

  /**
   * Build a record from raw values, filling defaults for missing fields.
   *
   * @param input - Field values; `undefined` entries take the default
   * @param sourcePath - Backing file path, if any
   * @throws ConfigError for fields the schema does not declare
   * @throws InvalidFieldValueError for the first field that does not match its type
   */
  static create(input: CloudConfigInput = {}, sourcePath: string | null = null): CloudConfig {
    const merged: Record<string, unknown> = { ...defaultValues() };

    for (const [field, value] of Object.entries(input)) {
      if (!Object.hasOwn(CLOUD_CONFIG_SCHEMA, field)) {
        throw new ConfigError(`Unknown field "${field}"`);
      }
      if (value !== undefined) {
        merged[field] = value;
      }
    }

    validateRecord(CLOUD_CONFIG_SCHEMA, merged);

    const values = Object.fromEntries(
      Object.entries(merged).map(([field, value]) => [field, toPlainData(value)])
    );

    return new CloudConfig(deepFreeze(values as CloudConfigValues), sourcePath);
  }

  /**
   * Create a derived copy with some fields replaced.
   * `undefined` leaves a field as is; `null` clears an optional field.
   *
   * @throws InvalidFieldValueError if the result violates the schema
   */
  withOverrides(overrides: CloudConfigInput): CloudConfig {
    return CloudConfig.create({ ...this.values, ...definedEntries(overrides) }, this.sourcePath);
  }

  /**
   * Get a single field value.
   */
  get<K extends CloudConfigField>(field: K): Readonly<CloudConfigValues>[K] {
    return this.values[field];
  }

  /**
   * Check whether the backing file exists.
   */
  async exists(): Promise<boolean> {
    if (this.sourcePath === null) {
      return false;
    }
    try {
      await access(this.sourcePath, constants.F_OK);
      return true;
    } catch {
      return false;
    }
  }

  toJSON(): Readonly<CloudConfigValues> {
    return this.values;
  }
}

function definedEntries(input: CloudConfigInput): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}

/**
 * Copy a validated value into plain data owned by the record.
 * Mappings given as `Map` become plain objects, matching the inferred types.
 */
function toPlainData(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => toPlainData(item));
  }
  if (value instanceof Map) {
    return Object.fromEntries(
      [...value.entries()].map(([key, entry]) => [String(key), toPlainData(entry)])
    );
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [key, toPlainData(entry)])
    );
  }
  return value;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}
