/**
 * Run store configuration module
 *
 * Centralizes all configuration reading from environment variables
 * with validation and defaults.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { DEFAULT_ARTIFACT_COMPRESS_ABOVE } from '../types/artifact.js';
import { DEFAULT_RETENTION_POLICY } from '../types/lifecycle.js';
import { DEFAULT_TRANSCRIPT_COMPRESS_ABOVE } from '../types/run.js';

const log = createLogger('config');

/**
 * Environment boolean (case-insensitive true/false, 1/0, yes/no, on/off).
 */
const envBoolean = z
  .string()
  .trim()
  .toLowerCase()
  .transform((value, ctx) => {
    if (['true', '1', 'yes', 'on'].includes(value)) return true;
    if (['false', '0', 'no', 'off'].includes(value)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid boolean: ${value}` });
    return z.NEVER;
  });

/**
 * Retention configuration schema
 */
const retentionConfigSchema = z.object({
  /** Days after which a finished run is deleted */
  retentionDays: z.coerce.number().int().min(0).default(DEFAULT_RETENTION_POLICY.retentionDays),
  /** Days after which a finished run is archived */
  archiveAfterDays: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_RETENTION_POLICY.archiveAfterDays),
  /** Days an archive is kept */
  archiveRetentionDays: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_RETENTION_POLICY.archiveRetentionDays),
  keepFailed: envBoolean.default(String(DEFAULT_RETENTION_POLICY.keepFailed)),
  keepMinRuns: z.coerce.number().int().min(0).default(DEFAULT_RETENTION_POLICY.keepMinRuns),
});

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Paths
  baseDir: z.string().min(1).default('.runkeep'),

  // Compression thresholds (bytes)
  artifactCompressAbove: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_ARTIFACT_COMPRESS_ABOVE),
  transcriptCompressAbove: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_TRANSCRIPT_COMPRESS_ABOVE),

  retention: retentionConfigSchema,
});

export type RunStoreConfig = z.infer<typeof configSchema>;

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RunStoreConfig {
  const raw = {
    baseDir: env['RUNKEEP_BASE_DIR'],
    artifactCompressAbove: env['RUNKEEP_ARTIFACT_COMPRESS_ABOVE'],
    transcriptCompressAbove: env['RUNKEEP_TRANSCRIPT_COMPRESS_ABOVE'],
    retention: {
      retentionDays: env['RUNKEEP_RETENTION_DAYS'],
      archiveAfterDays: env['RUNKEEP_ARCHIVE_AFTER_DAYS'],
      archiveRetentionDays: env['RUNKEEP_ARCHIVE_RETENTION_DAYS'],
      keepFailed: env['RUNKEEP_KEEP_FAILED'],
      keepMinRuns: env['RUNKEEP_KEEP_MIN_RUNS'],
    },
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.errors }, 'Invalid configuration');
    throw new Error(`Configuration validation failed: ${result.error.message}`);
  }

  log.debug(
    {
      baseDir: result.data.baseDir,
      retentionDays: result.data.retention.retentionDays,
      archiveAfterDays: result.data.retention.archiveAfterDays,
    },
    'Configuration loaded'
  );

  return result.data;
}

/**
 * Singleton configuration instance
 */
let configInstance: RunStoreConfig | null = null;

/**
 * Get the configuration singleton
 */
export function getConfig(): RunStoreConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
