/**
 * hostctl Type Definitions
 *
 * Shared types for the hosting configuration: the literal sets accepted
 * by cloud.yml, scaling payloads, and the error hierarchy.
 */

// ============================================================================
// Hosting Types
// ============================================================================

/**
 * Regions a deployment can be placed in.
 */
export const REGION_OPTIONS = [
  'ams',
  'arn',
  'atl',
  'bog',
  'bom',
  'bos',
  'cdg',
  'den',
  'dfw',
  'ewr',
  'eze',
  'fra',
  'gdl',
  'gig',
  'gru',
  'hkg',
  'iad',
  'jnb',
  'lax',
  'lhr',
  'mad',
  'mia',
  'nrt',
  'ord',
  'otp',
  'phx',
  'qro',
  'scl',
  'sea',
  'sin',
  'sjc',
  'syd',
  'waw',
  'yul',
  'yyz',
] as const;

export type RegionOption = (typeof REGION_OPTIONS)[number];

/**
 * Virtual machine sizes, named c<cpus>m<memory in GB>.
 */
export const VM_TYPES = [
  'c1m.5',
  'c1m1',
  'c1m2',
  'c2m.5',
  'c2m1',
  'c2m2',
  'c2m4',
  'c4m1',
  'c4m2',
  'c4m4',
  'c4m8',
] as const;

export type VmType = (typeof VM_TYPES)[number];

/**
 * Region placement: region code to number of machines.
 */
export type RegionCounts = Partial<Record<RegionOption, number>>;

/**
 * How an app is scaled: by machine size or by region placement.
 */
export type ScaleType = 'size' | 'region';

export const SCALE_TYPES: readonly ScaleType[] = ['size', 'region'];

/**
 * Scaling payload resolved from cloud.yml and CLI overrides.
 */
export type ScaleRequest =
  | { type: 'size'; vmType: VmType }
  | { type: 'region'; regions: RegionCounts };

// ============================================================================
// Error Types
// ============================================================================

/**
 * Base error class for hostctl errors.
 */
export class HostctlError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, cause?: Error) {
    super(message, { cause });
    this.name = 'HostctlError';
    this.code = code;
  }
}

/**
 * Error thrown when a configuration file cannot be loaded or is malformed.
 */
export class ConfigError extends HostctlError {
  constructor(message: string, cause?: Error, code = 'CONFIG_ERROR') {
    super(message, code, cause);
    this.name = 'ConfigError';
  }
}

/**
 * Details carried by an InvalidFieldValueError.
 */
export interface InvalidFieldValueDetails {
  /** Field label, possibly qualified ("regions key"); empty when unlabeled */
  field: string;
  /** Human-readable expected type, e.g. "an integer" */
  expected: string;
  /** The offending value */
  actual: unknown;
  /** Runtime type name of the offending value */
  actualType: string;
  /** Allowed set, for literal membership failures */
  allowed?: readonly string[];
}

/**
 * Error thrown when a configuration field does not match its declared type.
 */
export class InvalidFieldValueError extends ConfigError {
  public readonly field: string;
  public readonly expected: string;
  public readonly actual: unknown;
  public readonly actualType: string;
  public readonly allowed: readonly string[] | undefined;

  constructor(details: InvalidFieldValueDetails) {
    super(formatInvalidFieldMessage(details), undefined, 'INVALID_FIELD_VALUE');
    this.name = 'InvalidFieldValueError';
    this.field = details.field;
    this.expected = details.expected;
    this.actual = details.actual;
    this.actualType = details.actualType;
    this.allowed = details.allowed;
  }
}

/**
 * Error thrown when scale parameters are missing or malformed.
 */
export class ScaleParamError extends HostctlError {
  constructor(message: string) {
    super(message, 'SCALE_PARAM_ERROR');
    this.name = 'ScaleParamError';
  }
}

/**
 * Error thrown when the scale type is unknown or ambiguous.
 */
export class ScaleTypeError extends HostctlError {
  constructor(message: string) {
    super(message, 'SCALE_TYPE_ERROR');
    this.name = 'ScaleTypeError';
  }
}

/**
 * Error thrown for malformed command lines.
 */
export class UsageError extends HostctlError {
  constructor(message: string) {
    super(message, 'USAGE_ERROR');
    this.name = 'UsageError';
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Render a value the way it appears in error messages.
 * Strings are shown bare, everything else as JSON where possible.
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value === undefined) {
    return 'undefined';
  }
  if (value instanceof Map) {
    return JSON.stringify(Object.fromEntries(value));
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

function formatInvalidFieldMessage(details: InvalidFieldValueDetails): string {
  const subject = details.field ? `Invalid value for ${details.field}.` : 'Invalid value.';

  if (details.allowed) {
    return `${subject} Expected one of [${details.allowed.join(', ')}], got ${formatValue(details.actual)}.`;
  }

  return `${subject} Expected ${details.expected}, got ${formatValue(details.actual)} of type ${details.actualType}.`;
}
