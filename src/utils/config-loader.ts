import fs from 'fs/promises';
import path from 'path';
import yaml from 'yaml';
import {
  Config,
  DispatcherConfig,
  FilterOptions,
  MonitorConfig,
} from '../types';
import { ConfigValidator, isRecord, ValidationResult } from './config-validator';
import { ConfigError, errorMessage } from './errors';

export type ConfigFormat = 'json' | 'yaml';

export type ConfigPatch = Partial<
  Omit<Config, 'filter' | 'monitor' | 'dispatcher'>
> & {
  filter?: Partial<FilterOptions>;
  monitor?: Partial<MonitorConfig>;
  dispatcher?: Partial<DispatcherConfig>;
};

export interface LoadedConfig {
  config: Config;
  validation: ValidationResult;
  path: string;
}

export const DEFAULT_CONFIG: Readonly<Config> = Object.freeze({
  logPaths: [],
  targetLanguage: 'zh-CN',
  engine: 'passthrough',
  autoTranslate: true,
  autoDetect: true,
  noTranslateNames: false,
  filter: {
    enabled: true,
    keepSystem: false,
    keepRewards: false,
    showAll: false,
  },
  monitor: {
    pollIntervalMs: 500,
    dedupeCapacity: 100,
    maxRetries: 10,
    retryBaseMs: 250,
    retryMaxMs: 5000,
    fromBeginning: false,
    followNewFiles: false,
  },
  dispatcher: {
    queueCapacity: 5,
    debounceMs: 1000,
    cacheSize: 1000,
    stopTimeoutMs: 1000,
  },
  logLevel: 'info',
  logFormat: 'text',
});

export function createDefaultConfig(): Config {
  return mergeConfig(DEFAULT_CONFIG, {});
}

/**
 * Apply a typed patch. Nested sections are merged key by key; arrays are
 * replaced.
 */
export function mergeConfig(base: Readonly<Config>, patch: ConfigPatch): Config {
  return {
    ...base,
    ...patch,
    logPaths: [...(patch.logPaths ?? base.logPaths)],
    filter: { ...base.filter, ...patch.filter },
    monitor: { ...base.monitor, ...patch.monitor },
    dispatcher: { ...base.dispatcher, ...patch.dispatcher },
  };
}

/**
 * Recursive merge of parsed file content over a base object. Plain objects
 * merge, everything else replaces.
 */
export function deepMerge(base: object, override: unknown): unknown {
  if (!isRecord(override)) {
    return override === undefined ? { ...base } : override;
  }

  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = merged[key];
    merged[key] =
      isRecord(current) && isRecord(value) ? deepMerge(current, value) : value;
  }
  return merged;
}

export function detectConfigFormat(filePath: string): ConfigFormat {
  const ext = path.extname(filePath).toLowerCase();

  switch (ext) {
    case '.json':
      return 'json';
    case '.yaml':
    case '.yml':
      return 'yaml';
    default:
      throw new ConfigError(
        'CONFIG_PARSE_FAILED',
        `Unsupported config file extension: ${ext || '(none)'}`
      );
  }
}

export function parseConfigContent(content: string, format: ConfigFormat): unknown {
  try {
    // Remove BOM if present
    const clean = content.replace(/^\uFEFF/, '');
    if (!clean.trim()) {
      return {};
    }
    return format === 'json' ? JSON.parse(clean) : yaml.parse(clean);
  } catch (error) {
    throw new ConfigError(
      'CONFIG_PARSE_FAILED',
      `Invalid ${format.toUpperCase()}: ${errorMessage(error)}`
    );
  }
}

/**
 * Read a JSON or YAML config file, fill in defaults and validate the result.
 */
export async function loadConfig(
  filePath: string,
  validator: ConfigValidator = new ConfigValidator()
): Promise<LoadedConfig> {
  const resolved = path.resolve(filePath);
  const format = detectConfigFormat(resolved);

  let content: string;
  try {
    content = await fs.readFile(resolved, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      'CONFIG_READ_FAILED',
      `Cannot read config file ${resolved}: ${errorMessage(error)}`
    );
  }

  const parsed = parseConfigContent(content, format);
  if (!isRecord(parsed)) {
    throw new ConfigError(
      'CONFIG_PARSE_FAILED',
      `Config file ${resolved} must contain an object`
    );
  }

  const merged = deepMerge(createDefaultConfig(), parsed);
  const validation = validator.validateConfig(merged);
  if (!validator.isConfig(merged)) {
    throw new ConfigError(
      'CONFIG_INVALID',
      `Invalid configuration in ${resolved}`,
      validation.errors.map(error => `${error.path}: ${error.message}`)
    );
  }

  return { config: merged, validation, path: resolved };
}
