/**
 * Default Configuration for hostctl
 *
 * File naming, path resolution and the starter cloud.yml written by
 * `hostctl init`. Paths are always resolved at call time and handed to
 * the loader explicitly.
 */

import { isAbsolute, join, resolve } from 'path';

/**
 * File name looked up in the working directory when no path is given.
 */
export const CLOUD_CONFIG_FILENAME = 'cloud.yml';

/**
 * Resolve the cloud.yml path for a command.
 *
 * @param explicitPath - Path from --config, if given
 * @param cwd - Directory to resolve against
 * @returns Absolute path to the config file
 */
export function resolveConfigPath(explicitPath?: string, cwd: string = process.cwd()): string {
  if (explicitPath) {
    return isAbsolute(explicitPath) ? explicitPath : resolve(cwd, explicitPath);
  }
  return join(cwd, CLOUD_CONFIG_FILENAME);
}

/**
 * Starter cloud.yml. Every field is present so users can see what is
 * available; null leaves a field unset.
 */
export const CLOUD_CONFIG_TEMPLATE = {
  name: null,
  description: null,
  vmtype: 'c1m1',
  regions: {
    sjc: 1,
  },
  hostname: null,
  envfile: '.env',
  project: null,
  packages: [],
};

export const CLOUD_CONFIG_HEADER = `# hostctl cloud configuration
# Generated by: hostctl init
#
# vmtype:   machine size, e.g. c1m1 (1 CPU, 1 GB) or c2m4 (2 CPUs, 4 GB)
# regions:  region code to number of machines, e.g. { iad: 2, sea: 1 }
# Strings may reference environment variables with \${VAR_NAME}.

`;
