#!/usr/bin/env node
/**
 * hostctl CLI
 *
 * Command-line entry point: parses arguments, runs the command and
 * maps the outcome to the process exit code.
 */

import color from 'picocolors';

import { parseArgs } from './cli/args.js';
import { runCLI } from './cli/commands.js';
import { logger } from './observability/logger.js';
import { UsageError } from './types.js';

/**
 * Main entry point for the CLI.
 * Parses arguments and executes the appropriate command.
 */
export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  try {
    return await runCLI(parseArgs(argv));
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(color.red(`Error: ${error.message}`));
      console.error('Run "hostctl --help" for usage information.');
      return 1;
    }
    throw error;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Unhandled error', error instanceof Error ? { error } : {});
    console.error(`Error: ${message}`);
    process.exitCode = 1;
  }
);
