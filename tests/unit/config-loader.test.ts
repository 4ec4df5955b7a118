/**
 * Unit tests for the cloud.yml loader
 *
 * Tests loading from an explicit path including:
 * - Valid files, empty files and missing files
 * - Document shape errors (unknown keys, non-mapping documents)
 * - Field validation errors from record construction
 * - Environment variable interpolation
 * - Falling back to defaults
 */

import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  interpolateEnv,
  loadCloudConfig,
  loadCloudConfigOrDefault,
} from '../../src/config/loader.js';
import { Logger } from '../../src/observability/logger.js';
import { ConfigError, InvalidFieldValueError } from '../../src/types.js';

const logger = new Logger({ level: 'silent' });

describe('loadCloudConfig()', () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'hostctl-loader-'));
    path = join(dir, 'cloud.yml');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load a valid file', async () => {
    await writeFile(
      path,
      ['name: shop', 'vmtype: c2m1', 'regions:', '  iad: 2', '  sea: 1', 'packages:', '  - ffmpeg', ''].join('\n'),
      'utf-8'
    );

    const config = await loadCloudConfig(path, { logger });

    expect(config.get('name')).toBe('shop');
    expect(config.get('vmtype')).toBe('c2m1');
    expect(config.get('regions')).toEqual({ iad: 2, sea: 1 });
    expect(config.get('packages')).toEqual(['ffmpeg']);
    expect(config.get('envfile')).toBe('.env');
    expect(config.sourcePath).toBe(path);
    await expect(config.exists()).resolves.toBe(true);
  });

  it('should treat explicit nulls as absent values', async () => {
    await writeFile(path, 'name: ~\nvmtype: null\n', 'utf-8');

    const config = await loadCloudConfig(path, { logger });

    expect(config.get('name')).toBeNull();
    expect(config.get('vmtype')).toBeNull();
  });

  it('should treat an empty file as an empty configuration', async () => {
    await writeFile(path, '', 'utf-8');

    const config = await loadCloudConfig(path, { logger });

    expect(config.get('envfile')).toBe('.env');
    expect(config.get('packages')).toEqual([]);
  });

  it('should fail when the file does not exist', async () => {
    await expect(loadCloudConfig(path, { logger })).rejects.toThrow(ConfigError);
    await expect(loadCloudConfig(path, { logger })).rejects.toThrow(
      `Config file not found at ${path}.`
    );
  });

  it('should reject unknown keys', async () => {
    await writeFile(path, 'name: shop\nreplicas: 3\n', 'utf-8');

    await expect(loadCloudConfig(path, { logger })).rejects.toThrow(
      `Invalid ${path}:\n  - root: unexpected property "replicas"`
    );
  });

  it('should reject documents that are not mappings', async () => {
    await writeFile(path, '- shop\n- blog\n', 'utf-8');

    await expect(loadCloudConfig(path, { logger })).rejects.toThrow(
      `Invalid ${path}:\n  - root: expected object, got array`
    );
  });

  it('should reject unparsable YAML', async () => {
    await writeFile(path, 'name: [unclosed\n', 'utf-8');

    await expect(loadCloudConfig(path, { logger })).rejects.toThrow(`Failed to parse ${path}:`);
  });

  it('should surface field validation errors', async () => {
    await writeFile(path, 'vmtype: huge\n', 'utf-8');

    await expect(loadCloudConfig(path, { logger })).rejects.toThrow(InvalidFieldValueError);
    await expect(loadCloudConfig(path, { logger })).rejects.toThrow(/^Invalid value for vmtype\./);
  });

  it('should interpolate environment variables', async () => {
    await writeFile(path, 'hostname: ${APP_HOST}\nproject: proj-${TEAM}\n', 'utf-8');

    const config = await loadCloudConfig(path, {
      logger,
      env: { APP_HOST: 'shop.example.com', TEAM: 'web' },
    });

    expect(config.get('hostname')).toBe('shop.example.com');
    expect(config.get('project')).toBe('proj-web');
  });

  it('should fail on unset variables unless allowed', async () => {
    await writeFile(path, 'hostname: ${APP_HOST}\n', 'utf-8');

    await expect(loadCloudConfig(path, { logger, env: {} })).rejects.toThrow(
      'Environment variable APP_HOST is not set'
    );

    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => {});
    try {
      const config = await loadCloudConfig(path, { logger, env: {}, allowMissingEnv: true });
      expect(config.get('hostname')).toBe('${APP_HOST}');
      expect(warn).toHaveBeenCalledWith('Environment variable is not set, keeping placeholder', {
        variable: 'APP_HOST',
      });
    } finally {
      warn.mockRestore();
    }
  });
});

describe('loadCloudConfigOrDefault()', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'hostctl-loader-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should return defaults backed by the path when the file is missing', async () => {
    const path = join(dir, 'cloud.yml');

    const config = await loadCloudConfigOrDefault(path, { logger });

    expect(config.get('vmtype')).toBeNull();
    expect(config.sourcePath).toBe(path);
    await expect(config.exists()).resolves.toBe(false);
  });

  it('should propagate errors other than a missing file', async () => {
    const path = join(dir, 'cloud.yml');
    await writeFile(path, 'packages: ffmpeg\n', 'utf-8');

    await expect(loadCloudConfigOrDefault(path, { logger })).rejects.toThrow(
      'Invalid value for packages. Expected a list, got ffmpeg of type string.'
    );
  });
});

describe('interpolateEnv()', () => {
  it('should interpolate nested strings and leave other values alone', () => {
    const result = interpolateEnv(
      { list: ['${A}', 1], nested: { flag: true, text: 'x-${A}' } },
      { env: { A: 'a' } }
    );

    expect(result).toEqual({ list: ['a', 1], nested: { flag: true, text: 'x-a' } });
  });
});
