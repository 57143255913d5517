/**
 * Address Geocoder Configuration Management
 *
 * Loads configuration from .address-geocoderrc (YAML or JSON) with
 * environment variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (ADDRESS_GEOCODER_*)
 * 3. Config file (.address-geocoderrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../../core/errors.js';
import {
  DEFAULT_MAX_RETRIES,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RETRY_DELAY_MS,
} from '../../core/constants.js';
import { isLogLevel, type LogLevel } from '../../core/utils/logger.js';
import {
  PROVIDER_NAMES,
  type ProviderConfig,
  type ProviderName,
} from '../../providers/index.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface ResolutionConfig {
  /** Worker count per round; unset means host parallelism */
  readonly concurrency?: number;
  readonly maxRetries: number;
  readonly retryDelayMs: number;
}

export interface GeocoderConfig {
  readonly provider: ProviderConfig;
  readonly resolution: ResolutionConfig;
  readonly logLevel: LogLevel;
  /** Resolved config file path, if one was loaded */
  readonly configPath: string | null;
}

/**
 * Config file structure (YAML/JSON)
 */
const ConfigFileSchema = z
  .object({
    version: z.number().int().optional(),
    provider: z
      .object({
        name: z.enum(PROVIDER_NAMES).optional(),
        base_url: z.string().url().optional(),
        token: z.string().optional(),
        user_agent: z.string().optional(),
        timeout_ms: z.number().int().positive().optional(),
      })
      .optional(),
    resolution: z
      .object({
        concurrency: z.number().int().positive().optional(),
        max_retries: z.number().int().nonnegative().optional(),
        retry_delay_ms: z.number().int().nonnegative().optional(),
      })
      .optional(),
    log_level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<GeocoderConfig, 'configPath'> = {
  provider: {
    name: 'arcgis',
    timeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
  },
  resolution: {
    maxRetries: DEFAULT_MAX_RETRIES,
    retryDelayMs: DEFAULT_RETRY_DELAY_MS,
  },
  logLevel: 'info',
};

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = [
  '.address-geocoderrc',
  '.address-geocoderrc.yaml',
  '.address-geocoderrc.yml',
  '.address-geocoderrc.json',
];

/**
 * Find config file in the start directory or its parents
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }

    const parent = resolve(dir, '..');
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse and validate config file content
 */
function parseConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    const content = readFileSync(filePath, 'utf-8');
    // YAML is a superset of JSON, so one parser covers both
    raw = parseYaml(content) ?? {};
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ConfigError(
      `Invalid config file ${filePath}: ${where}${issue?.message ?? 'invalid content'}`,
      filePath
    );
  }

  return parsed.data;
}

/**
 * Get environment variable with prefix
 */
function getEnvVar(name: string): string | undefined {
  const value = process.env[`ADDRESS_GEOCODER_${name}`];
  return value === '' ? undefined : value;
}

/**
 * Get numeric environment variable; NaN is left for the schema to reject
 */
function getEnvNumber(name: string): number | undefined {
  const value = getEnvVar(name);
  return value === undefined ? undefined : Number(value);
}

/**
 * Environment variable behind each config file field
 */
const ENV_VARIABLES: Readonly<Record<string, string>> = {
  'provider.name': 'ADDRESS_GEOCODER_PROVIDER',
  'provider.base_url': 'ADDRESS_GEOCODER_BASE_URL',
  'provider.token': 'ADDRESS_GEOCODER_TOKEN',
  'provider.user_agent': 'ADDRESS_GEOCODER_USER_AGENT',
  'provider.timeout_ms': 'ADDRESS_GEOCODER_TIMEOUT_MS',
  'resolution.concurrency': 'ADDRESS_GEOCODER_CONCURRENCY',
  'resolution.max_retries': 'ADDRESS_GEOCODER_MAX_RETRIES',
  'resolution.retry_delay_ms': 'ADDRESS_GEOCODER_RETRY_DELAY_MS',
};

/**
 * Read ADDRESS_GEOCODER_* variables into the config file shape and
 * validate them with the same schema
 */
function readEnvConfig(): ConfigFile {
  const raw = {
    provider: {
      name: getEnvVar('PROVIDER'),
      base_url: getEnvVar('BASE_URL'),
      token: getEnvVar('TOKEN'),
      user_agent: getEnvVar('USER_AGENT'),
      timeout_ms: getEnvNumber('TIMEOUT_MS'),
    },
    resolution: {
      concurrency: getEnvNumber('CONCURRENCY'),
      max_retries: getEnvNumber('MAX_RETRIES'),
      retry_delay_ms: getEnvNumber('RETRY_DELAY_MS'),
    },
  };

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    const variable = issue ? ENV_VARIABLES[issue.path.join('.')] : undefined;
    throw new ConfigError(
      `Invalid environment variable ${variable ?? 'ADDRESS_GEOCODER_*'}: ${issue?.message ?? 'invalid value'}`
    );
  }

  return parsed.data;
}

function getEnvLogLevel(): LogLevel | undefined {
  const value = process.env.LOG_LEVEL?.toLowerCase();
  return value !== undefined && isLogLevel(value) ? value : undefined;
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory to start the config file search from (default: cwd) */
  cwd?: string;
  /** CLI flag overrides */
  overrides?: {
    provider?: ProviderName;
    concurrency?: number;
    maxRetries?: number;
    verbose?: boolean;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigError when a config file is missing, unreadable or invalid,
 *   or an ADDRESS_GEOCODER_* variable fails validation
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<GeocoderConfig> {
  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  if (options.configPath) {
    configPath = resolve(options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`, configPath);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    const envConfigPath = getEnvVar('CONFIG');
    if (envConfigPath) {
      configPath = resolve(envConfigPath);
      if (!existsSync(configPath)) {
        throw new ConfigError(`Config file not found: ${configPath}`, configPath);
      }
      fileConfig = parseConfigFile(configPath);
    } else {
      configPath = findConfigFile(options.cwd ?? process.cwd());
      if (configPath) {
        fileConfig = parseConfigFile(configPath);
      }
    }
  }

  const envConfig = readEnvConfig();
  const overrides = options.overrides ?? {};

  const provider: ProviderConfig = {
    name:
      overrides.provider ??
      envConfig.provider?.name ??
      fileConfig.provider?.name ??
      DEFAULT_CONFIG.provider.name,
    baseUrl: envConfig.provider?.base_url ?? fileConfig.provider?.base_url,
    token: envConfig.provider?.token ?? fileConfig.provider?.token,
    userAgent: envConfig.provider?.user_agent ?? fileConfig.provider?.user_agent,
    timeoutMs:
      envConfig.provider?.timeout_ms ??
      fileConfig.provider?.timeout_ms ??
      DEFAULT_CONFIG.provider.timeoutMs,
  };

  const resolution: ResolutionConfig = {
    concurrency:
      overrides.concurrency ??
      envConfig.resolution?.concurrency ??
      fileConfig.resolution?.concurrency,
    maxRetries:
      overrides.maxRetries ??
      envConfig.resolution?.max_retries ??
      fileConfig.resolution?.max_retries ??
      DEFAULT_CONFIG.resolution.maxRetries,
    retryDelayMs:
      envConfig.resolution?.retry_delay_ms ??
      fileConfig.resolution?.retry_delay_ms ??
      DEFAULT_CONFIG.resolution.retryDelayMs,
  };

  const logLevel: LogLevel = overrides.verbose
    ? 'debug'
    : getEnvLogLevel() ?? fileConfig.log_level ?? DEFAULT_CONFIG.logLevel;

  return { provider, resolution, logLevel, configPath };
}
