import { RunStatus } from '../types/run.js';
import { RunDisposition, type RetentionPolicy } from '../types/lifecycle.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * A run as seen by a cleanup pass.
 */
export interface RetentionCandidate {
  runId: string;
  status: RunStatus;
  endedAt: Date;
  /** Size of the run directory in bytes */
  size: number;
}

export type RetentionReason = 'running' | 'failed' | 'min-runs' | 'expired' | 'aged' | 'recent';

export interface RetentionDecision {
  disposition: RunDisposition;
  reason: RetentionReason;
}

export interface RetentionThresholds {
  /** Runs ended at or before this instant are deleted */
  deleteBefore: Date;
  /** Runs ended at or before this instant are archived */
  archiveBefore: Date;
}

export function computeThresholds(policy: RetentionPolicy, now: Date): RetentionThresholds {
  return {
    deleteBefore: new Date(now.getTime() - policy.retentionDays * DAY_MS),
    archiveBefore: new Date(now.getTime() - policy.archiveAfterDays * DAY_MS),
  };
}

/**
 * Oldest first, by end time. Ties keep scan order.
 */
export function sortOldestFirst<T extends { endedAt: Date }>(runs: T[]): T[] {
  return [...runs].sort((a, b) => a.endedAt.getTime() - b.endedAt.getTime());
}

/**
 * Classify one run.
 *
 * `remainingAfterThis` is the number of runs that would survive the pass if
 * this one were removed: the total scanned, minus the runs already removed
 * earlier in the pass, minus one. Running and kept-failed runs are decided
 * before that count is consulted.
 */
export function classifyRun(
  run: RetentionCandidate,
  policy: RetentionPolicy,
  thresholds: RetentionThresholds,
  remainingAfterThis: number
): RetentionDecision {
  if (policy.keepFailed && run.status === RunStatus.FAILED) {
    return { disposition: RunDisposition.KEEP, reason: 'failed' };
  }
  if (run.status === RunStatus.RUNNING) {
    return { disposition: RunDisposition.KEEP, reason: 'running' };
  }
  if (remainingAfterThis < policy.keepMinRuns) {
    return { disposition: RunDisposition.KEEP, reason: 'min-runs' };
  }

  const endedAt = run.endedAt.getTime();
  if (endedAt <= thresholds.deleteBefore.getTime()) {
    return { disposition: RunDisposition.DELETE, reason: 'expired' };
  }
  if (endedAt <= thresholds.archiveBefore.getTime()) {
    return { disposition: RunDisposition.ARCHIVE, reason: 'aged' };
  }
  return { disposition: RunDisposition.KEEP, reason: 'recent' };
}

/**
 * Estimated bytes reclaimed by a disposition. Archival is counted as half
 * the run's size, since the compression ratio is not known until written.
 */
export function estimateSpaceSaved(disposition: RunDisposition, size: number): number {
  switch (disposition) {
    case RunDisposition.DELETE:
      return size;
    case RunDisposition.ARCHIVE:
      return Math.floor(size / 2);
    case RunDisposition.KEEP:
      return 0;
  }
}
