/**
 * Default configuration values
 */

import type { Config } from './schema.js';

/**
 * Default configuration object
 */
export const DEFAULT_CONFIG: Config = {
  recovery: {
    keywords: [],
    workers: 'auto',
    verify_headers: false,
    header_bytes: 256,
    exclude_output_root: true,
  },
  output: {
    format: 'text',
    verbose: false,
  },
};

/**
 * Module name used for config file discovery
 */
export const MODULE_NAME = 'session-salvage';

/**
 * Configuration file names to search for
 */
export const CONFIG_FILE_NAMES = [
  'session-salvage.config.yaml',
  'session-salvage.config.yml',
  '.salvagerc.yaml',
  '.salvagerc.yml',
  '.salvagerc',
  '.session-salvage/config.yaml',
  '.session-salvage/config.yml',
];

/**
 * Global config directory path
 */
export const GLOBAL_CONFIG_DIR = '.session-salvage';

/**
 * Config file name in the global config directory
 */
export const CONFIG_FILE_NAME = 'config.yaml';

/**
 * Environment variable names
 */
export const ENV_VARS = {
  KEYWORDS: 'SALVAGE_KEYWORDS',
  WORKERS: 'SALVAGE_WORKERS',
  VERIFY_HEADERS: 'SALVAGE_VERIFY_HEADERS',
  LOG_LEVEL: 'SALVAGE_LOG_LEVEL',
} as const;
