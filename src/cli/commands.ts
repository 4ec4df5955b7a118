/**
 * Command Implementations
 *
 * Each command returns a process exit code. Expected failures
 * (configuration, validation, scaling and usage errors) are reported on
 * stderr and map to exit code 1; anything else propagates.
 */

import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';

import color from 'picocolors';
import { stringify as stringifyYAML } from 'yaml';

import { CLOUD_CONFIG_SCHEMA, CloudConfig } from '../config/cloud-config.js';
import {
  CLOUD_CONFIG_FILENAME,
  CLOUD_CONFIG_HEADER,
  CLOUD_CONFIG_TEMPLATE,
  resolveConfigPath,
} from '../config/defaults.js';
import { recordToJsonSchema } from '../config/json-schema.js';
import { loadCloudConfig, loadCloudConfigOrDefault, type LoadOptions } from '../config/loader.js';
import { logger as rootLogger, type Logger } from '../observability/logger.js';
import { parseScaleCliArgs, resolveScaleRequest } from '../scale/params.js';
import { HostctlError, type RegionCounts } from '../types.js';

import type { CLIOptions } from './args.js';

export const VERSION = '0.1.0';

export const HELP_TEXT = `
hostctl - validate and apply cloud.yml deployment configuration

Usage:
  hostctl <command> [options]

Commands:
  init          Create a starter ${CLOUD_CONFIG_FILENAME}
  validate      Validate ${CLOUD_CONFIG_FILENAME}
  show          Print the effective configuration
  scale [app]   Resolve a scale request from ${CLOUD_CONFIG_FILENAME} and flags
  schema        Print the JSON Schema for ${CLOUD_CONFIG_FILENAME}
  version       Show version
  help          Show this help message

Options:
  --config, -c     Path to ${CLOUD_CONFIG_FILENAME} (default: ./${CLOUD_CONFIG_FILENAME})
  --verbose, -v    Enable verbose output
  --loglevel       Log level (trace, debug, info, warn, error, fatal, silent)
  --help, -h       Show help

Scale options:
  --app-name       App name, when no app id is given
  --vm-type        VM type to scale to, e.g. c2m2
  --regions, -r    Region to place machines in, as code or code=count (repeatable)
  --scale-type     size or region; required when both --vm-type and --regions are given

Examples:
  hostctl init
  hostctl validate -c deploy/cloud.yml
  hostctl scale my-app-id --vm-type c2m2
  hostctl scale --app-name shop --regions iad=2 -r sea
`.trim();

/**
 * Environment a command runs in.
 */
export interface CommandContext {
  /** Directory cloud.yml is resolved against */
  cwd: string;
  /** Environment for ${VAR} interpolation */
  env: NodeJS.ProcessEnv;
  logger: Logger;
}

function defaultContext(): CommandContext {
  return { cwd: process.cwd(), env: process.env, logger: rootLogger };
}

function loadOptions(context: CommandContext): LoadOptions {
  return { env: context.env, allowMissingEnv: true, logger: context.logger };
}

// ============================================================================
// Commands
// ============================================================================

/**
 * Write a starter cloud.yml.
 */
function cmdInit(options: CLIOptions, context: CommandContext): number {
  const configPath = resolveConfigPath(options.configPath, context.cwd);

  if (existsSync(configPath)) {
    console.error(`Configuration file already exists: ${configPath}`);
    console.error('Use --config to specify a different path, or delete the existing file.');
    return 1;
  }

  // The template must itself be a valid configuration
  CloudConfig.create(CLOUD_CONFIG_TEMPLATE, configPath);

  const configDir = dirname(configPath);
  if (!existsSync(configDir)) {
    if (options.verbose) {
      console.error(`Creating directory: ${configDir}`);
    }
    mkdirSync(configDir, { recursive: true });
  }

  writeFileSync(configPath, CLOUD_CONFIG_HEADER + stringifyYAML(CLOUD_CONFIG_TEMPLATE), 'utf-8');

  console.log(`Configuration file created: ${configPath}`);
  console.log('');
  console.log('Next steps:');
  console.log('  1. Set the app name, VM type and regions');
  console.log('  2. Run "hostctl validate" to check your configuration');
  return 0;
}

/**
 * Validate cloud.yml and print a summary.
 */
async function cmdValidate(options: CLIOptions, context: CommandContext): Promise<number> {
  const configPath = resolveConfigPath(options.configPath, context.cwd);

  console.log(`Validating ${configPath}...`);
  console.log('');

  const config = await loadCloudConfig(configPath, loadOptions(context));

  console.log('Configuration summary:');
  console.log(`  Name:      ${config.get('name') ?? '(unset)'}`);
  console.log(`  VM type:   ${config.get('vmtype') ?? '(unset)'}`);
  console.log(`  Regions:   ${formatRegions(config.get('regions'))}`);
  console.log(`  Env file:  ${config.get('envfile')}`);
  console.log(`  Packages:  ${config.get('packages').length}`);

  if (options.verbose) {
    console.log(`  Hostname:  ${config.get('hostname') ?? '(unset)'}`);
    console.log(`  Project:   ${config.get('project') ?? '(unset)'}`);
  }

  console.log('');
  console.log(color.green('Configuration is valid.'));
  return 0;
}

/**
 * Print the effective configuration as YAML.
 */
async function cmdShow(options: CLIOptions, context: CommandContext): Promise<number> {
  const configPath = resolveConfigPath(options.configPath, context.cwd);
  const config = await loadCloudConfigOrDefault(configPath, loadOptions(context));
  const source = (await config.exists()) ? configPath : 'defaults (no config file found)';

  console.log(`# Source: ${source}`);
  console.log(stringifyYAML(config.toJSON()).trimEnd());
  return 0;
}

/**
 * Resolve a scale request from cloud.yml and CLI overrides.
 */
async function cmdScale(options: CLIOptions, context: CommandContext): Promise<number> {
  const configPath = resolveConfigPath(options.configPath, context.cwd);
  const cliArgs = parseScaleCliArgs({
    vmType: options.vmType,
    regions: options.regions,
    scaleType: options.scaleType,
  });

  const config = (await loadCloudConfigOrDefault(configPath, loadOptions(context))).withOverrides({
    vmtype: cliArgs.vmType,
    regions: cliArgs.regions,
  });
  const fileExists = await config.exists();

  if (!fileExists && !cliArgs.isValid) {
    console.error(
      color.red(`Error: specify either --vm-type or --regions or add them to the ${CLOUD_CONFIG_FILENAME} file`)
    );
    return 1;
  }

  if (fileExists && cliArgs.isValid) {
    console.warn(color.yellow(`Warning: CLI arguments will override the values in the ${CLOUD_CONFIG_FILENAME} file.`));
  }

  const request = resolveScaleRequest(config, cliArgs);

  if (!options.appId && !options.appName) {
    console.error(color.red('Error: No valid app_id or app_name provided.'));
    return 1;
  }

  const app = options.appId ? { id: options.appId } : { name: options.appName };
  context.logger.debug('Resolved scale request', { command: 'scale', type: request.type });

  console.log(JSON.stringify({ app, ...request }, null, 2));
  return 0;
}

/**
 * Print the JSON Schema for cloud.yml.
 */
function cmdSchema(): number {
  console.log(JSON.stringify(recordToJsonSchema(CLOUD_CONFIG_SCHEMA), null, 2));
  return 0;
}

function formatRegions(regions: RegionCounts | null): string {
  if (regions === null) {
    return '(unset)';
  }
  const entries = Object.entries(regions);
  return entries.length === 0 ? '(none)' : entries.map(([region, count]) => `${region}=${count}`).join(', ');
}

// ============================================================================
// Dispatch
// ============================================================================

/**
 * Run the CLI with the given options.
 *
 * @param options - Parsed CLI options
 * @param context - Working directory, environment and logger
 * @returns Process exit code
 */
export async function runCLI(
  options: CLIOptions,
  context: CommandContext = defaultContext()
): Promise<number> {
  if (options.logLevel) {
    context.logger.level = options.logLevel;
  } else if (options.verbose) {
    context.logger.level = 'debug';
  }

  try {
    switch (options.command) {
      case 'init':
        return cmdInit(options, context);
      case 'validate':
        return await cmdValidate(options, context);
      case 'show':
        return await cmdShow(options, context);
      case 'scale':
        return await cmdScale(options, context);
      case 'schema':
        return cmdSchema();
      case 'version':
        console.log(`hostctl ${VERSION}`);
        return 0;
      case 'help':
        console.log(HELP_TEXT);
        return 0;
      default: {
        // Type guard for exhaustiveness check
        const _exhaustive: never = options.command;
        console.error(`Unknown command: ${String(_exhaustive)}`);
        return 1;
      }
    }
  } catch (error) {
    if (error instanceof HostctlError) {
      console.error(color.red(`Error: ${error.message}`));
      return 1;
    }
    throw error;
  }
}
