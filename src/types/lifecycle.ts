import { z } from 'zod';

/**
 * Retention policy evaluated by every cleanup pass.
 */
export const retentionPolicySchema = z.object({
  /** Days after which a finished run is deleted */
  retentionDays: z.number().int().nonnegative(),
  /** Days after which a finished run is archived */
  archiveAfterDays: z.number().int().nonnegative(),
  /** Days an archive is kept in cold storage */
  archiveRetentionDays: z.number().int().nonnegative(),
  /** Never archive or delete failed runs */
  keepFailed: z.boolean(),
  /** Minimum number of runs that survive a pass regardless of age */
  keepMinRuns: z.number().int().nonnegative(),
});

export type RetentionPolicy = z.infer<typeof retentionPolicySchema>;

export const DEFAULT_RETENTION_POLICY: RetentionPolicy = {
  retentionDays: 30,
  archiveAfterDays: 7,
  archiveRetentionDays: 90,
  keepFailed: true,
  keepMinRuns: 100,
};

/**
 * Disposition of a single run in a cleanup pass.
 */
export const RunDisposition = {
  KEEP: 'keep',
  ARCHIVE: 'archive',
  DELETE: 'delete',
} as const;

export type RunDisposition = (typeof RunDisposition)[keyof typeof RunDisposition];

/**
 * Outcome of a cleanup pass. Per-run failures are reported in `errors`;
 * the run that failed appears in none of the id lists.
 */
export interface CleanupResult {
  archived: string[];
  deleted: string[];
  kept: string[];
  errors: string[];
  /**
   * Bytes reclaimed. Exact for deletions; archival counts half the run's
   * size as an estimate of the compression saving.
   */
  spaceSaved: number;
  /** Actual total size of the archives written in this pass (0 on dry runs) */
  archiveBytesWritten: number;
}

export interface DiskUsage {
  runCount: number;
  archiveCount: number;
  activeSize: number;
  archiveSize: number;
  /** Always activeSize + archiveSize */
  totalSize: number;
}

export interface LifecycleManagerOptions {
  baseDir: string;
  policy?: Partial<RetentionPolicy>;
  /** Clock override, used by tests */
  now?: () => Date;
}
