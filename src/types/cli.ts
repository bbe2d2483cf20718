/**
 * CLI-related type definitions
 * Defines command options and exit codes
 */

import type { WorkerCount } from '../config/schema.js';

/**
 * Options for the `recover` command
 */
export interface RecoverCommandOptions {
  keywords?: string[];
  workers?: WorkerCount;
  /** False when --no-parallel is given */
  parallel: boolean;
  verifyHeaders?: boolean;
  dryRun?: boolean;
  json?: boolean;
  logFile?: string;
  verbose?: boolean;
}

/**
 * Options for the `inspect` command
 */
export interface InspectCommandOptions {
  keywords?: string[];
  json?: boolean;
}

/**
 * Exit codes
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  ERROR: 1,
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
