import { describe, it, expect } from 'vitest';
import {
  classifyRun,
  computeThresholds,
  estimateSpaceSaved,
  sortOldestFirst,
  type RetentionCandidate,
} from '../src/lifecycle/retention.js';
import { DEFAULT_RETENTION_POLICY, type RetentionPolicy } from '../src/types/lifecycle.js';
import type { RunStatus } from '../src/types/run.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const NOW = new Date('2025-03-10T12:00:00.000Z');

const policy: RetentionPolicy = { ...DEFAULT_RETENTION_POLICY, keepMinRuns: 0 };
const thresholds = computeThresholds(policy, NOW);

function candidate(daysAgo: number, status: RunStatus = 'completed'): RetentionCandidate {
  return {
    runId: `run-${daysAgo}`,
    status,
    endedAt: new Date(NOW.getTime() - daysAgo * DAY_MS),
    size: 1000,
  };
}

describe('computeThresholds', () => {
  it('should subtract whole days from now', () => {
    expect(thresholds.deleteBefore.toISOString()).toBe('2025-02-08T12:00:00.000Z');
    expect(thresholds.archiveBefore.toISOString()).toBe('2025-03-03T12:00:00.000Z');
  });
});

describe('classifyRun', () => {
  it.each([
    [0.5, 'keep', 'recent'],
    [6.9, 'keep', 'recent'],
    [7, 'archive', 'aged'],
    [29, 'archive', 'aged'],
    [30, 'delete', 'expired'],
    [400, 'delete', 'expired'],
  ])('should classify a run ended %d days ago as %s', (daysAgo, disposition, reason) => {
    expect(classifyRun(candidate(daysAgo), policy, thresholds, 10)).toEqual({
      disposition,
      reason,
    });
  });

  it('should keep running runs regardless of age', () => {
    expect(classifyRun(candidate(400, 'running'), policy, thresholds, 10).reason).toBe('running');
  });

  it('should keep failed runs only when configured to', () => {
    expect(classifyRun(candidate(400, 'failed'), policy, thresholds, 10)).toEqual({
      disposition: 'keep',
      reason: 'failed',
    });

    const relaxed = { ...policy, keepFailed: false };
    expect(classifyRun(candidate(400, 'failed'), relaxed, thresholds, 10).disposition).toBe(
      'delete'
    );
  });

  it('should keep runs needed to satisfy the minimum', () => {
    const strict = { ...policy, keepMinRuns: 3 };
    expect(classifyRun(candidate(400), strict, thresholds, 2)).toEqual({
      disposition: 'keep',
      reason: 'min-runs',
    });
    expect(classifyRun(candidate(400), strict, thresholds, 3).disposition).toBe('delete');
  });

  it('should apply the failed rule before the minimum', () => {
    const strict = { ...policy, keepMinRuns: 5 };
    expect(classifyRun(candidate(400, 'failed'), strict, thresholds, 0).reason).toBe('failed');
  });
});

describe('sortOldestFirst', () => {
  it('should order by end time without mutating the input', () => {
    const runs = [candidate(1), candidate(20), candidate(5)];
    expect(sortOldestFirst(runs).map((r) => r.runId)).toEqual(['run-20', 'run-5', 'run-1']);
    expect(runs.map((r) => r.runId)).toEqual(['run-1', 'run-20', 'run-5']);
  });
});

describe('estimateSpaceSaved', () => {
  it('should count deletions fully and archives at half', () => {
    expect(estimateSpaceSaved('delete', 1001)).toBe(1001);
    expect(estimateSpaceSaved('archive', 1001)).toBe(500);
    expect(estimateSpaceSaved('keep', 1001)).toBe(0);
  });
});
