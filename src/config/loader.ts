/**
 * Configuration Loader for hostctl
 *
 * Reads cloud.yml from an explicit path, checks the document shape,
 * interpolates environment variables and builds a validated CloudConfig.
 */

import { readFile } from 'fs/promises';

import { parse as parseYAML } from 'yaml';

import { logger as rootLogger, type Logger } from '../observability/logger.js';
import { ConfigError } from '../types.js';

import { CLOUD_CONFIG_SCHEMA, CloudConfig, type CloudConfigInput } from './cloud-config.js';
import { DocumentValidator } from './document.js';

/**
 * Options for loading a configuration file.
 */
export interface LoadOptions {
  /** Environment used for ${VAR} interpolation (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Keep ${VAR} placeholders for unset variables instead of failing (default: false) */
  allowMissingEnv?: boolean;
  /** Logger for load diagnostics */
  logger?: Logger;
}

const documentValidator = new DocumentValidator<CloudConfigInput>(CLOUD_CONFIG_SCHEMA);

/**
 * Load and validate a cloud.yml file.
 *
 * @param path - Path to the file
 * @param options - Load options
 * @returns Validated configuration backed by `path`
 * @throws ConfigError if the file is missing, unparsable or malformed
 * @throws InvalidFieldValueError if a field does not match its type
 */
export async function loadCloudConfig(path: string, options: LoadOptions = {}): Promise<CloudConfig> {
  const log = (options.logger ?? rootLogger).child({ path });

  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new ConfigError(`Config file not found at ${path}.`, error);
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = parseYAML(content);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse ${path}: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error : undefined
    );
  }

  // An empty file is an empty configuration
  const document = documentValidator.validate(parsed ?? {}, path);
  const interpolated = interpolateEnv(document, options);

  log.debug('Loaded config file', { fields: Object.keys(interpolated) });

  return CloudConfig.create(interpolated, path);
}

/**
 * Load a cloud.yml file, or fall back to defaults when it does not exist.
 * The default record still carries `path`, so `exists()` reports false
 * until the file is created. Other errors propagate.
 */
export async function loadCloudConfigOrDefault(
  path: string,
  options: LoadOptions = {}
): Promise<CloudConfig> {
  try {
    return await loadCloudConfig(path, options);
  } catch (error) {
    if (error instanceof ConfigError && isErrnoException(error.cause) && error.cause.code === 'ENOENT') {
      (options.logger ?? rootLogger).debug('No config file, using defaults', { path });
      return CloudConfig.create({}, path);
    }
    throw error;
  }
}

/**
 * Replace ${VAR_NAME} patterns in string values, recursively.
 *
 * @throws ConfigError if a variable is unset and missing variables are not allowed
 */
export function interpolateEnv<T>(value: T, options?: LoadOptions): T;
export function interpolateEnv(value: unknown, options: LoadOptions = {}): unknown {
  const env = options.env ?? process.env;

  if (typeof value === 'string') {
    return value.replace(/\$\{([^}]+)\}/g, (match, name: string) => {
      const resolved = env[name];

      if (resolved === undefined) {
        if (options.allowMissingEnv) {
          (options.logger ?? rootLogger).warn('Environment variable is not set, keeping placeholder', {
            variable: name,
          });
          return match;
        }
        throw new ConfigError(`Environment variable ${name} is not set`);
      }

      return resolved;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item) => interpolateEnv(item, options));
  }

  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [key, interpolateEnv(entry, options)])
    );
  }

  return value;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
