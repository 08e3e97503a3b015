import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError } from '../errors/custom-errors';
import { defaults } from './config-defaults';
import { CONFIG_PATH_ENV, loadConfig, resolveConfig } from './config-loader';

describe('Config loader', () => {
  const originalEnv = process.env;
  let dir: string;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env[CONFIG_PATH_ENV];
    dir = mkdtempSync(join(tmpdir(), 'tagesschau-config-'));
  });

  afterEach(() => {
    process.env = originalEnv;
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: string): string {
    const path = join(dir, 'config.yaml');
    writeFileSync(path, content);
    return path;
  }

  it('should merge file values over the defaults', async () => {
    const path = writeConfig(
      ['cache:', `  dir: ${join(dir, 'cache')}`, '  sizeThreshold: 2048', 'player:', '  command: mpv'].join('\n'),
    );

    const config = await loadConfig(path);

    expect(config.cache).toEqual({
      dir: join(dir, 'cache'),
      prefix: 'tagesschau',
      tempDir: undefined,
      sizeThreshold: 2048,
    });
    expect(config.player).toEqual({ command: 'mpv', args: [] });
    expect(config.remote).toEqual(defaults.remote);
  });

  it('should resolve environment variables', async () => {
    process.env.NEWS_DIR = join(dir, 'from-env');
    const path = writeConfig('cache:\n  dir: ${NEWS_DIR}\n');

    const config = await loadConfig(path);
    expect(config.cache.dir).toBe(join(dir, 'from-env'));
  });

  it('should read the path from the environment when none is given', async () => {
    process.env[CONFIG_PATH_ENV] = writeConfig('notifications:\n  consoleMinLevel: debug\n');

    const config = await loadConfig();
    expect(config.notifications.consoleMinLevel).toBe('debug');
  });

  it('should treat an empty file as an empty configuration', async () => {
    const config = await loadConfig(writeConfig(''));
    expect(config).toEqual(resolveConfig());
  });

  it('should fail when an explicit path does not exist', async () => {
    await expect(loadConfig(join(dir, 'missing.yaml'))).rejects.toThrow(ConfigError);
  });

  it('should fail on invalid YAML', async () => {
    await expect(loadConfig(writeConfig('cache: [unclosed'))).rejects.toThrow('Failed to parse YAML');
  });

  it('should fail on an unset environment variable', async () => {
    delete process.env.UNSET_NEWS_DIR;
    await expect(loadConfig(writeConfig('cache:\n  dir: ${UNSET_NEWS_DIR}\n'))).rejects.toThrow(
      'Environment variable "UNSET_NEWS_DIR" is not set',
    );
  });

  it('should fail on schema violations', async () => {
    await expect(loadConfig(writeConfig('remote:\n  requestTimeout: -5\n'))).rejects.toThrow(
      /Invalid configuration in .*"remote\.requestTimeout"/,
    );
  });

  describe('resolveConfig', () => {
    it('should expand the home directory in cache paths', () => {
      const config = resolveConfig({ cache: { dir: '/srv/news', tempDir: '/srv/news/tmp' } });
      expect(config.cache.dir).toBe('/srv/news');
      expect(config.cache.tempDir).toBe('/srv/news/tmp');
    });

    it('should not mutate the defaults', () => {
      resolveConfig({ cache: { prefix: 'other' } });
      expect(defaults.cache.prefix).toBe('tagesschau');
    });
  });
});
