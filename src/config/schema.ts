/**
 * Configuration schema definitions using Zod
 */

import { z } from 'zod';

export const MAX_WORKERS = 512;

/**
 * Worker count: a positive integer, or "auto" for the machine's available parallelism
 */
export const WorkerCountSchema = z.union([z.number().int().min(1).max(MAX_WORKERS), z.literal('auto')]);

/**
 * Scan and classification settings schema
 */
export const RecoverySettingsSchema = z.object({
  keywords: z.array(z.string()).default([]),
  workers: WorkerCountSchema.default('auto'),
  verify_headers: z.boolean().default(false),
  header_bytes: z.number().int().min(16).max(4096).default(256),
  exclude_output_root: z.boolean().default(true),
});

/**
 * Output settings schema
 */
export const OutputSettingsSchema = z.object({
  format: z.enum(['text', 'json']).default('text'),
  verbose: z.boolean().default(false),
  log_file: z.string().min(1).optional(),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  recovery: RecoverySettingsSchema.default({
    keywords: [],
    workers: 'auto',
    verify_headers: false,
    header_bytes: 256,
    exclude_output_root: true,
  }),
  output: OutputSettingsSchema.default({
    format: 'text',
    verbose: false,
  }),
});

/**
 * Configuration type inferred from schema
 */
export type Config = z.infer<typeof ConfigSchema>;
export type WorkerCount = z.infer<typeof WorkerCountSchema>;
export type RecoverySettings = z.infer<typeof RecoverySettingsSchema>;
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;
