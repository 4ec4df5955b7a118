/**
 * Argument Parsing
 *
 * Turns process.argv into CLIOptions. Malformed command lines raise
 * UsageError; the entry point maps that to an exit code.
 */

import { isLogLevel, LOG_LEVELS, type LogLevel } from '../observability/logger.js';
import { UsageError } from '../types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Supported CLI commands.
 */
export type Command = 'init' | 'validate' | 'show' | 'scale' | 'schema' | 'version' | 'help';

const COMMANDS: readonly Command[] = ['init', 'validate', 'show', 'scale', 'schema', 'version', 'help'];

/**
 * Parsed CLI options.
 */
export interface CLIOptions {
  /** The command to execute */
  command: Command;
  /** Path to cloud.yml (--config, -c) */
  configPath?: string;
  /** Enable verbose output (--verbose, -v) */
  verbose: boolean;
  /** Show help (--help, -h) */
  help: boolean;
  /** Log level (--loglevel) */
  logLevel?: LogLevel;
  /** App id (positional, for 'scale') */
  appId?: string;
  /** App name (--app-name, for 'scale') */
  appName?: string;
  /** VM type override (--vm-type) */
  vmType?: string;
  /** Region overrides (--regions, --region, -r), repeatable */
  regions: string[];
  /** Scale type (--scale-type) */
  scaleType?: string;
}

// ============================================================================
// Argument Parsing
// ============================================================================

/**
 * Parse command line arguments into CLIOptions.
 *
 * @param argv - Array of command line arguments (process.argv.slice(2))
 * @returns Parsed CLI options
 * @throws UsageError for unknown commands or options, or options missing a value
 */
export function parseArgs(argv: readonly string[]): CLIOptions {
  const options: CLIOptions = {
    command: 'help',
    verbose: false,
    help: false,
    regions: [],
  };
  let commandSeen = false;

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i] ?? '';

    if (arg === '--help' || arg === '-h') {
      options.help = true;
      i++;
      continue;
    }

    if (arg === '--verbose' || arg === '-v') {
      options.verbose = true;
      i++;
      continue;
    }

    if (arg === '--config' || arg === '-c') {
      options.configPath = requireValue(argv, i, 'a path');
      i += 2;
      continue;
    }

    if (arg === '--loglevel') {
      const level = requireValue(argv, i, 'a level');
      if (!isLogLevel(level)) {
        throw new UsageError(`--loglevel must be one of: ${LOG_LEVELS.join(', ')}`);
      }
      options.logLevel = level;
      i += 2;
      continue;
    }

    if (arg === '--app-name') {
      options.appName = requireValue(argv, i, 'a name');
      i += 2;
      continue;
    }

    if (arg === '--vm-type') {
      options.vmType = requireValue(argv, i, 'a VM type');
      i += 2;
      continue;
    }

    if (arg === '--regions' || arg === '--region' || arg === '-r') {
      options.regions.push(requireValue(argv, i, 'a region'));
      i += 2;
      continue;
    }

    if (arg === '--scale-type') {
      options.scaleType = requireValue(argv, i, 'a scale type');
      i += 2;
      continue;
    }

    // Handle combined short flags (e.g., -vh)
    if (arg.startsWith('-') && !arg.startsWith('--') && arg.length > 2) {
      for (const flag of arg.slice(1)) {
        if (flag === 'h') options.help = true;
        else if (flag === 'v') options.verbose = true;
        else throw new UsageError(`Unknown flag: -${flag}`);
      }
      i++;
      continue;
    }

    if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option: ${arg}`);
    }

    if (!commandSeen) {
      const command = arg.toLowerCase();
      if (!isValidCommand(command)) {
        throw new UsageError(`Unknown command: ${arg}`);
      }
      options.command = command;
      commandSeen = true;
    } else if (options.command === 'scale' && options.appId === undefined) {
      options.appId = arg;
    } else {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }

    i++;
  }

  // If help flag is set, override command to help
  if (options.help) {
    options.command = 'help';
  }

  return options;
}

function requireValue(argv: readonly string[], index: number, what: string): string {
  const value = argv[index + 1];
  if (value === undefined || value.startsWith('-')) {
    throw new UsageError(`${argv[index] ?? 'option'} requires ${what}`);
  }
  return value;
}

/**
 * Check if a string is a valid command.
 */
function isValidCommand(cmd: string): cmd is Command {
  return COMMANDS.some((command) => command === cmd);
}
