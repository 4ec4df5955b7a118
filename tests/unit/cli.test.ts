/**
 * Unit tests for the hostctl CLI
 *
 * Tests argument parsing and command execution against a temporary
 * working directory, capturing console output.
 */

import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';

import { parseArgs } from '../../src/cli/args.js';
import { runCLI, VERSION, type CommandContext } from '../../src/cli/commands.js';
import { Logger } from '../../src/observability/logger.js';
import { UsageError } from '../../src/types.js';

describe('parseArgs()', () => {
  it('should default to help', () => {
    expect(parseArgs([])).toEqual({
      command: 'help',
      verbose: false,
      help: false,
      regions: [],
    });
  });

  it('should parse a command with a config path', () => {
    const options = parseArgs(['validate', '-c', 'deploy/cloud.yml']);

    expect(options.command).toBe('validate');
    expect(options.configPath).toBe('deploy/cloud.yml');
  });

  it('should parse scale arguments', () => {
    const options = parseArgs([
      'scale',
      'app-1',
      '--vm-type',
      'c2m2',
      '-r',
      'iad=2',
      '--region',
      'sea',
      '--scale-type',
      'region',
    ]);

    expect(options).toMatchObject({
      command: 'scale',
      appId: 'app-1',
      vmType: 'c2m2',
      regions: ['iad=2', 'sea'],
      scaleType: 'region',
    });
  });

  it('should accept --regions as the long form of -r', () => {
    expect(parseArgs(['scale', '--regions', 'iad=2', '--region', 'sea']).regions).toEqual([
      'iad=2',
      'sea',
    ]);
  });

  it('should parse combined short flags and let help win', () => {
    expect(parseArgs(['validate', '-vh'])).toMatchObject({
      command: 'help',
      verbose: true,
      help: true,
    });
  });

  it('should accept known log levels only', () => {
    expect(parseArgs(['show', '--loglevel', 'debug']).logLevel).toBe('debug');
    expect(() => parseArgs(['show', '--loglevel', 'loud'])).toThrow(UsageError);
  });

  it('should reject malformed command lines', () => {
    expect(() => parseArgs(['deploy'])).toThrow('Unknown command: deploy');
    expect(() => parseArgs(['-x'])).toThrow('Unknown option: -x');
    expect(() => parseArgs(['-vx'])).toThrow('Unknown flag: -x');
    expect(() => parseArgs(['validate', '--config'])).toThrow('--config requires a path');
    expect(() => parseArgs(['validate', 'extra'])).toThrow('Unexpected argument: extra');
  });
});

describe('runCLI()', () => {
  let dir: string;
  let context: CommandContext;
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;
  let warn: MockInstance<typeof console.warn>;

  const run = (argv: string[]): Promise<number> => runCLI(parseArgs(argv), context);

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'hostctl-cli-'));
    context = { cwd: dir, env: {}, logger: new Logger({ level: 'silent' }) };
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    error = vi.spyOn(console, 'error').mockImplementation(() => {});
    warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  describe('init', () => {
    it('should write a starter file that validates', async () => {
      await expect(run(['init'])).resolves.toBe(0);

      const content = await readFile(join(dir, 'cloud.yml'), 'utf-8');
      expect(content).toContain('vmtype: c1m1\n');
      expect(log).toHaveBeenCalledWith(`Configuration file created: ${join(dir, 'cloud.yml')}`);

      await expect(run(['validate'])).resolves.toBe(0);
      expect(log).toHaveBeenCalledWith('  VM type:   c1m1');
      expect(log).toHaveBeenCalledWith('  Regions:   sjc=1');
      expect(log).toHaveBeenCalledWith('Configuration is valid.');
    });

    it('should refuse to overwrite an existing file', async () => {
      await writeFile(join(dir, 'cloud.yml'), 'name: shop\n', 'utf-8');

      await expect(run(['init'])).resolves.toBe(1);
      expect(error).toHaveBeenCalledWith(
        `Configuration file already exists: ${join(dir, 'cloud.yml')}`
      );
    });
  });

  describe('validate', () => {
    it('should fail when the file is missing', async () => {
      await expect(run(['validate'])).resolves.toBe(1);
      expect(error).toHaveBeenCalledWith(
        `Error: Config file not found at ${join(dir, 'cloud.yml')}.`
      );
    });

    it('should report the invalid field', async () => {
      await writeFile(join(dir, 'cloud.yml'), 'vmtype: huge\n', 'utf-8');

      await expect(run(['validate'])).resolves.toBe(1);
      expect(error).toHaveBeenCalledWith(
        'Error: Invalid value for vmtype. Expected one of [c1m.5, c1m1, c1m2, c2m.5, c2m1, c2m2, c2m4, c4m1, c4m2, c4m4, c4m8], got huge.'
      );
    });

    it('should resolve --config against the working directory', async () => {
      await writeFile(join(dir, 'prod.yml'), 'name: shop\n', 'utf-8');

      await expect(run(['validate', '--config', 'prod.yml'])).resolves.toBe(0);
      expect(log).toHaveBeenCalledWith(`Validating ${join(dir, 'prod.yml')}...`);
      expect(log).toHaveBeenCalledWith('  Name:      shop');
    });
  });

  describe('show', () => {
    it('should print defaults when there is no file', async () => {
      await expect(run(['show'])).resolves.toBe(0);
      expect(log).toHaveBeenCalledWith('# Source: defaults (no config file found)');
    });

    it('should print the file contents as YAML', async () => {
      await writeFile(join(dir, 'cloud.yml'), 'name: shop\n', 'utf-8');

      await expect(run(['show'])).resolves.toBe(0);
      expect(log).toHaveBeenCalledWith(`# Source: ${join(dir, 'cloud.yml')}`);
      expect(log).toHaveBeenCalledWith(
        [
          'name: shop',
          'description: null',
          'vmtype: null',
          'regions: null',
          'hostname: null',
          'envfile: .env',
          'project: null',
          'packages: []',
        ].join('\n')
      );
    });
  });

  describe('scale', () => {
    it('should fail without a file or scale arguments', async () => {
      await expect(run(['scale', 'app-1'])).resolves.toBe(1);
      expect(error).toHaveBeenCalledWith(
        'Error: specify either --vm-type or --regions or add them to the cloud.yml file'
      );
    });

    it('should fail without an app id or name', async () => {
      await expect(run(['scale', '-r', 'iad=2'])).resolves.toBe(1);
      expect(error).toHaveBeenCalledWith('Error: No valid app_id or app_name provided.');
    });

    it('should print the request resolved from CLI arguments', async () => {
      await expect(run(['scale', '--app-name', 'shop', '-r', 'iad=2'])).resolves.toBe(0);
      expect(log).toHaveBeenCalledWith(
        JSON.stringify({ app: { name: 'shop' }, type: 'region', regions: { iad: 2 } }, null, 2)
      );
      expect(warn).not.toHaveBeenCalled();
    });

    it('should warn when CLI arguments override the file', async () => {
      await writeFile(join(dir, 'cloud.yml'), 'vmtype: c1m1\n', 'utf-8');

      await expect(run(['scale', 'app-1', '--vm-type', 'c2m2'])).resolves.toBe(0);
      expect(warn).toHaveBeenCalledWith(
        'Warning: CLI arguments will override the values in the cloud.yml file.'
      );
      expect(log).toHaveBeenCalledWith(
        JSON.stringify({ app: { id: 'app-1' }, type: 'size', vmType: 'c2m2' }, null, 2)
      );
    });

    it('should scale the starter file by the CLI argument given', async () => {
      await expect(run(['init'])).resolves.toBe(0);

      await expect(run(['scale', 'app-1', '--vm-type', 'c2m2'])).resolves.toBe(0);
      expect(log).toHaveBeenCalledWith(
        JSON.stringify({ app: { id: 'app-1' }, type: 'size', vmType: 'c2m2' }, null, 2)
      );

      await expect(run(['scale', 'app-1', '--regions', 'iad=3'])).resolves.toBe(0);
      expect(log).toHaveBeenCalledWith(
        JSON.stringify({ app: { id: 'app-1' }, type: 'region', regions: { iad: 3 } }, null, 2)
      );
      expect(error).not.toHaveBeenCalled();
    });

    it('should ask for a scale type when both are set and none is given', async () => {
      await expect(run(['init'])).resolves.toBe(0);

      await expect(run(['scale', 'app-1'])).resolves.toBe(1);
      await expect(run(['scale', 'app-1', '--vm-type', 'c2m2', '-r', 'iad=3'])).resolves.toBe(1);
      expect(error).toHaveBeenCalledTimes(2);
      expect(error).toHaveBeenLastCalledWith(
        'Error: Both a VM type and regions are set; specify --scale-type size or --scale-type region'
      );

      await expect(
        run(['scale', 'app-1', '--vm-type', 'c2m2', '-r', 'iad=3', '--scale-type', 'region'])
      ).resolves.toBe(0);
      expect(log).toHaveBeenCalledWith(
        JSON.stringify({ app: { id: 'app-1' }, type: 'region', regions: { iad: 3 } }, null, 2)
      );
    });

    it('should validate CLI overrides against the schema', async () => {
      await expect(run(['scale', 'app-1', '-r', 'xyz'])).resolves.toBe(1);
      expect(error).toHaveBeenCalledWith(
        expect.stringMatching(/^Error: Invalid value for regions key\. Expected one of \[.*\], got xyz\.$/)
      );
    });
  });

  it('should print the JSON Schema', async () => {
    await expect(run(['schema'])).resolves.toBe(0);

    const printed: unknown = JSON.parse(String(log.mock.calls[0]?.[0]));
    expect(printed).toMatchObject({
      type: 'object',
      additionalProperties: false,
      properties: { envfile: { type: 'string' } },
    });
  });

  it('should apply --verbose and --loglevel to the logger', async () => {
    await expect(run(['version', '--verbose'])).resolves.toBe(0);
    expect(context.logger.level).toBe('debug');

    await expect(run(['version', '--loglevel', 'warn'])).resolves.toBe(0);
    expect(context.logger.level).toBe('warn');
  });

  it('should print the version', async () => {
    await expect(run(['version'])).resolves.toBe(0);
    expect(log).toHaveBeenCalledWith(`hostctl ${VERSION}`);
  });
});
