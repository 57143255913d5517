/**
 * Configuration Loading Tests
 *
 * Precedence: CLI flag > environment > config file > defaults.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig, DEFAULT_CONFIG } from '../../../cli/lib/config.js';
import { EXIT_CODES, exitCodeForError } from '../../../cli/lib/exit-codes.js';
import { ConfigError } from '../../../core/errors.js';

const ENV_KEYS = [
  'ADDRESS_GEOCODER_CONFIG',
  'ADDRESS_GEOCODER_PROVIDER',
  'ADDRESS_GEOCODER_BASE_URL',
  'ADDRESS_GEOCODER_TOKEN',
  'ADDRESS_GEOCODER_USER_AGENT',
  'ADDRESS_GEOCODER_TIMEOUT_MS',
  'ADDRESS_GEOCODER_CONCURRENCY',
  'ADDRESS_GEOCODER_MAX_RETRIES',
  'ADDRESS_GEOCODER_RETRY_DELAY_MS',
  'LOG_LEVEL',
];

describe('loadConfig', () => {
  let dir: string;
  const savedEnv = new Map<string, string | undefined>();

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'address-geocoder-config-'));
    for (const key of ENV_KEYS) {
      savedEnv.set(key, process.env[key]);
      delete process.env[key];
    }
  });

  afterEach(async () => {
    for (const [key, value] of savedEnv) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    await rm(dir, { recursive: true, force: true });
  });

  it('should fall back to defaults without a config file', async () => {
    const config = await loadConfig({ cwd: dir });

    expect(config.configPath).toBeNull();
    expect(config.provider).toEqual({
      name: 'arcgis',
      baseUrl: undefined,
      token: undefined,
      userAgent: undefined,
      timeoutMs: DEFAULT_CONFIG.provider.timeoutMs,
    });
    expect(config.resolution).toEqual({
      concurrency: undefined,
      maxRetries: 10,
      retryDelayMs: 0,
    });
    expect(config.logLevel).toBe('info');
  });

  it('should read a YAML rc file found in a parent directory', async () => {
    await writeFile(
      join(dir, '.address-geocoderrc.yaml'),
      [
        'version: 1',
        'provider:',
        '  name: nominatim',
        '  base_url: https://nominatim.example.test',
        '  user_agent: geocoder-tests/0.1',
        '  timeout_ms: 2500',
        'resolution:',
        '  concurrency: 2',
        '  max_retries: 4',
        '  retry_delay_ms: 250',
        'log_level: warn',
        '',
      ].join('\n')
    );
    const nested = join(dir, 'data', 'input');
    await mkdir(nested, { recursive: true });

    const config = await loadConfig({ cwd: nested });

    expect(config.configPath).toBe(join(dir, '.address-geocoderrc.yaml'));
    expect(config.provider).toEqual({
      name: 'nominatim',
      baseUrl: 'https://nominatim.example.test',
      token: undefined,
      userAgent: 'geocoder-tests/0.1',
      timeoutMs: 2500,
    });
    expect(config.resolution).toEqual({ concurrency: 2, maxRetries: 4, retryDelayMs: 250 });
    expect(config.logLevel).toBe('warn');
  });

  it('should read a JSON config from an explicit path', async () => {
    const path = join(dir, 'geocoder.json');
    await writeFile(path, JSON.stringify({ provider: { name: 'arcgis', token: 'test-token' } }));

    const config = await loadConfig({ configPath: path });

    expect(config.configPath).toBe(path);
    expect(config.provider.token).toBe('test-token');
  });

  it('should let environment variables override the file', async () => {
    await writeFile(
      join(dir, '.address-geocoderrc'),
      'provider:\n  name: nominatim\nresolution:\n  max_retries: 4\n'
    );
    process.env.ADDRESS_GEOCODER_PROVIDER = 'arcgis';
    process.env.ADDRESS_GEOCODER_MAX_RETRIES = '6';
    process.env.ADDRESS_GEOCODER_CONCURRENCY = '3';

    const config = await loadConfig({ cwd: dir });

    expect(config.provider.name).toBe('arcgis');
    expect(config.resolution.maxRetries).toBe(6);
    expect(config.resolution.concurrency).toBe(3);
  });

  it('should let CLI overrides win over environment and file', async () => {
    await writeFile(join(dir, '.address-geocoderrc'), 'resolution:\n  max_retries: 4\n');
    process.env.ADDRESS_GEOCODER_MAX_RETRIES = '6';

    const config = await loadConfig({
      cwd: dir,
      overrides: { maxRetries: 2, provider: 'nominatim', verbose: true },
    });

    expect(config.resolution.maxRetries).toBe(2);
    expect(config.provider.name).toBe('nominatim');
    expect(config.logLevel).toBe('debug');
  });

  it('should reject a non-numeric environment value', async () => {
    process.env.ADDRESS_GEOCODER_MAX_RETRIES = 'lots';

    await expect(loadConfig({ cwd: dir })).rejects.toThrow(
      'Invalid environment variable ADDRESS_GEOCODER_MAX_RETRIES'
    );
  });

  it('should reject a negative retry ceiling from the environment as a config error', async () => {
    process.env.ADDRESS_GEOCODER_MAX_RETRIES = '-1';

    const error = await loadConfig({ cwd: dir }).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(ConfigError);
    expect(exitCodeForError(error)).toBe(EXIT_CODES.CONFIG_ERROR);
  });

  it('should reject a zero timeout from the environment', async () => {
    process.env.ADDRESS_GEOCODER_TIMEOUT_MS = '0';

    await expect(loadConfig({ cwd: dir })).rejects.toThrow(
      'Invalid environment variable ADDRESS_GEOCODER_TIMEOUT_MS'
    );
  });

  it('should reject a fractional concurrency from the environment', async () => {
    process.env.ADDRESS_GEOCODER_CONCURRENCY = '2.9';

    await expect(loadConfig({ cwd: dir })).rejects.toThrow(
      'Invalid environment variable ADDRESS_GEOCODER_CONCURRENCY'
    );
  });

  it('should reject a malformed base URL from the environment', async () => {
    process.env.ADDRESS_GEOCODER_BASE_URL = 'not a url';

    await expect(loadConfig({ cwd: dir })).rejects.toThrow(ConfigError);
  });

  it('should reject an unknown provider in the environment', async () => {
    process.env.ADDRESS_GEOCODER_PROVIDER = 'google';

    await expect(loadConfig({ cwd: dir })).rejects.toThrow(
      'Invalid environment variable ADDRESS_GEOCODER_PROVIDER'
    );
  });

  it('should reject a config file that fails validation', async () => {
    await writeFile(join(dir, '.address-geocoderrc'), 'resolution:\n  max_retries: -1\n');

    await expect(loadConfig({ cwd: dir })).rejects.toThrow(ConfigError);
  });

  it('should reject unknown keys in the config file', async () => {
    await writeFile(join(dir, '.address-geocoderrc'), 'retries: 3\n');

    await expect(loadConfig({ cwd: dir })).rejects.toThrow(ConfigError);
  });

  it('should reject a missing explicit config path', async () => {
    await expect(loadConfig({ configPath: join(dir, 'missing.yaml') })).rejects.toThrow(
      'Config file not found'
    );
  });
});
