/**
 * Configuration management module
 * Handles loading, merging, and validating configuration from multiple sources
 */

import { cosmiconfig } from 'cosmiconfig';
import { parse as parseYaml } from 'yaml';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { homedir } from 'node:os';
import { ConfigSchema, MAX_WORKERS, type Config } from './schema.js';
import {
  CONFIG_FILE_NAMES,
  DEFAULT_CONFIG,
  GLOBAL_CONFIG_DIR,
  CONFIG_FILE_NAME,
  ENV_VARS,
  MODULE_NAME,
} from './defaults.js';

// Re-export schema types
export * from './schema.js';
export * from './defaults.js';
export * from './resolve.js';

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Configuration loader using cosmiconfig
 */
const explorer = cosmiconfig(MODULE_NAME, {
  searchPlaces: CONFIG_FILE_NAMES,
  loaders: {
    '.yaml': (_filepath: string, content: string) => parseYaml(content),
    '.yml': (_filepath: string, content: string) => parseYaml(content),
    noExt: (_filepath: string, content: string) => parseYaml(content),
  },
});

export interface LoadConfigOptions {
  /** Directory to start the project config search from */
  cwd?: string;
  /** Environment to read overrides from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Override for ~/.session-salvage/config.yaml */
  globalConfigPath?: string;
}

export function getGlobalConfigPath(): string {
  return path.join(homedir(), GLOBAL_CONFIG_DIR, CONFIG_FILE_NAME);
}

/**
 * Load global configuration from ~/.session-salvage/config.yaml
 */
async function loadGlobalConfig(globalConfigPath = getGlobalConfigPath()): Promise<ConfigRecord> {
  let content: string;
  try {
    content = await fs.readFile(globalConfigPath, 'utf-8');
  } catch {
    // Global config doesn't exist
    return {};
  }
  const parsed: unknown = parseYaml(content);
  return isRecord(parsed) ? parsed : {};
}

/**
 * Load project-specific configuration
 */
async function loadProjectConfig(cwd?: string): Promise<ConfigRecord> {
  const result = await explorer.search(cwd);
  cachedConfigPath = result?.filepath ?? null;
  if (result && !result.isEmpty && isRecord(result.config)) {
    return result.config;
  }
  return {};
}

/**
 * Parse a worker count from a string ("auto" or an integer from 1 to MAX_WORKERS)
 *
 * @returns The worker count, or undefined when the value is not valid
 */
export function parseWorkerCount(value: string): Config['recovery']['workers'] | undefined {
  const trimmed = value.trim().toLowerCase();
  if (trimmed === 'auto') return 'auto';
  if (!/^\d+$/.test(trimmed)) return undefined;
  const parsed = parseInt(trimmed, 10);
  return parsed >= 1 && parsed <= MAX_WORKERS ? parsed : undefined;
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigRecord {
  const recovery: ConfigRecord = {};
  const output: ConfigRecord = {};

  const keywords = env[ENV_VARS.KEYWORDS];
  if (keywords) {
    recovery.keywords = keywords
      .split(',')
      .map((k) => k.trim())
      .filter((k) => k.length > 0);
  }

  const workers = env[ENV_VARS.WORKERS];
  if (workers) {
    const parsed = parseWorkerCount(workers);
    if (parsed !== undefined) {
      recovery.workers = parsed;
    }
  }

  const verifyHeaders = env[ENV_VARS.VERIFY_HEADERS];
  if (verifyHeaders === 'true' || verifyHeaders === '1') {
    recovery.verify_headers = true;
  }

  // Verbose/log level
  if (env[ENV_VARS.LOG_LEVEL] === 'debug') {
    output.verbose = true;
  }

  const config: ConfigRecord = {};
  if (Object.keys(recovery).length > 0) config.recovery = recovery;
  if (Object.keys(output).length > 0) config.output = output;
  return config;
}

/**
 * Deep merge configuration objects. Arrays and scalars from `source` replace
 * those in `target`; nested objects are merged.
 */
export function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Load and merge configuration from all sources
 * Priority: env vars > project config > global config > defaults
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const globalConfig = await loadGlobalConfig(options.globalConfigPath);
  const projectConfig = await loadProjectConfig(options.cwd);
  const envConfig = loadEnvConfig(options.env);

  // Merge in priority order
  let merged = deepMerge(DEFAULT_CONFIG, globalConfig);
  merged = deepMerge(merged, projectConfig);
  merged = deepMerge(merged, envConfig);

  // Validate final config
  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    console.warn('Configuration validation warnings:', result.error.format());
    // Return defaults if validation fails
    return DEFAULT_CONFIG;
  }

  return result.data;
}

/**
 * Cached config path from last search
 */
let cachedConfigPath: string | null = null;

/**
 * Get the path to the currently loaded config file (or null if using defaults)
 */
export function getConfigPath(): string | null {
  return cachedConfigPath;
}

/**
 * Get a specific config value by dot-separated path
 */
export function getConfigValue(config: Config, keyPath: string): unknown {
  let current: unknown = config;

  for (const key of keyPath.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }

  return current;
}
