/**
 * Scale Parameters
 *
 * Turns `hostctl scale` arguments and cloud.yml into a scale request.
 * CLI values are applied to the configuration as overrides, so they are
 * validated by the same schema as the file.
 */

import type { CloudConfig } from '../config/cloud-config.js';
import { SCALE_TYPES, ScaleParamError, ScaleTypeError, type ScaleRequest, type ScaleType } from '../types.js';

/**
 * Raw scale arguments from the command line.
 */
export interface ScaleCliInput {
  vmType?: string | undefined;
  /** Region arguments: `iad` or `iad=3` */
  regions?: readonly string[] | undefined;
  scaleType?: string | undefined;
}

/**
 * Parsed scale arguments. Values are not checked against the schema yet.
 */
export interface ScaleCliArgs {
  vmType: string | undefined;
  regions: Record<string, number> | undefined;
  scaleType: string | undefined;
  /** True when a VM type or at least one region was given */
  isValid: boolean;
}

/**
 * Parse raw scale arguments.
 *
 * @throws ScaleParamError for a region count that is not a positive integer
 */
export function parseScaleCliArgs(input: ScaleCliInput): ScaleCliArgs {
  const regions: Record<string, number> = {};

  for (const arg of input.regions ?? []) {
    const [region = '', count] = arg.split('=', 2);
    if (!region) {
      throw new ScaleParamError(`Invalid region argument "${arg}"`);
    }
    regions[region] = count === undefined ? 1 : parseCount(region, count);
  }

  const hasRegions = Object.keys(regions).length > 0;

  return {
    vmType: input.vmType,
    regions: hasRegions ? regions : undefined,
    scaleType: input.scaleType,
    isValid: input.vmType !== undefined || hasRegions,
  };
}

function parseCount(region: string, raw: string): number {
  const count = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(count) || count < 1) {
    throw new ScaleParamError(`Invalid machine count "${raw}" for region ${region}`);
  }
  return count;
}

function isScaleType(value: string): value is ScaleType {
  return SCALE_TYPES.some((type) => type === value);
}

/**
 * Scale arguments that steer type resolution. `ScaleCliArgs` satisfies this.
 */
export interface ScaleTypeHints {
  vmType?: string | undefined;
  regions?: Readonly<Record<string, number>> | undefined;
  scaleType?: string | undefined;
}

/**
 * Resolve the scale request from a configuration.
 *
 * The type is the explicit `--scale-type` when given. Otherwise it follows
 * the CLI arguments: `--vm-type` alone scales by size, regions alone scale
 * by region. Without CLI scale arguments it follows the configuration the
 * same way.
 *
 * @param config - Configuration with CLI overrides already applied
 * @param hints - Parsed CLI scale arguments, if any
 * @throws ScaleTypeError if the type is unknown or cannot be inferred
 * @throws ScaleParamError if the parameter for the type is missing
 */
export function resolveScaleRequest(config: CloudConfig, hints: ScaleTypeHints = {}): ScaleRequest {
  const vmType = config.get('vmtype');
  const regions = config.get('regions');
  const hasRegions = regions !== null && Object.keys(regions).length > 0;

  const cliHasRegions = hints.regions !== undefined && Object.keys(hints.regions).length > 0;
  const type =
    parseScaleType(hints.scaleType) ??
    inferScaleType(hints.vmType !== undefined, cliHasRegions) ??
    inferScaleType(vmType !== null, hasRegions);

  if (type === undefined) {
    throw new ScaleParamError('Nothing to scale: set a VM type or at least one region');
  }

  if (type === 'size') {
    if (vmType === null) {
      throw new ScaleParamError('Scale type "size" requires a VM type (--vm-type or vmtype in cloud.yml)');
    }
    return { type, vmType };
  }

  if (regions === null || !hasRegions) {
    throw new ScaleParamError('Scale type "region" requires regions (--regions or regions in cloud.yml)');
  }
  return { type, regions: { ...regions } };
}

function parseScaleType(requested: string | undefined): ScaleType | undefined {
  if (requested === undefined) {
    return undefined;
  }
  if (!isScaleType(requested)) {
    throw new ScaleTypeError(
      `Invalid scale type "${requested}". Expected one of: ${SCALE_TYPES.join(', ')}`
    );
  }
  return requested;
}

function inferScaleType(hasVmType: boolean, hasRegions: boolean): ScaleType | undefined {
  if (hasVmType && hasRegions) {
    throw new ScaleTypeError(
      'Both a VM type and regions are set; specify --scale-type size or --scale-type region'
    );
  }
  if (hasVmType) {
    return 'size';
  }
  return hasRegions ? 'region' : undefined;
}
