import { describe, it, expect } from 'vitest';
import {
  findingsByFile,
  findingsBySeverity,
  hasCriticalFindings,
  hasErrors,
  successRate,
  reviewResultSchema,
  type ReviewResult,
  type TestOutput,
} from '../src/types/reports.js';

const review: ReviewResult = {
  approved: false,
  summary: 'Needs work',
  findings: [
    { file: 'a.ts', severity: 'warning', category: 'style', message: 'Long line' },
    { file: 'b.ts', severity: 'error', category: 'logic', message: 'Wrong branch' },
    { file: 'a.ts', severity: 'info', category: 'style', message: 'Consider renaming' },
  ],
};

describe('review helpers', () => {
  it('should detect errors and critical findings', () => {
    expect(hasErrors(review)).toBe(true);
    expect(hasCriticalFindings(review)).toBe(false);

    const critical: ReviewResult = {
      ...review,
      findings: [{ file: 'c.ts', severity: 'critical', category: 'security', message: 'Injection' }],
    };
    expect(hasCriticalFindings(critical)).toBe(true);
    expect(hasErrors(critical)).toBe(true);
  });

  it('should treat a review without findings as clean', () => {
    const clean: ReviewResult = { approved: true, summary: 'LGTM' };
    expect(hasErrors(clean)).toBe(false);
    expect(findingsByFile(clean)).toEqual({});
  });

  it('should group findings by file and severity', () => {
    const byFile = findingsByFile(review);
    expect(Object.keys(byFile).sort()).toEqual(['a.ts', 'b.ts']);
    expect(byFile['a.ts']?.map((f) => f.message)).toEqual(['Long line', 'Consider renaming']);

    const bySeverity = findingsBySeverity(review);
    expect(bySeverity['error']).toHaveLength(1);
    expect(bySeverity['warning']).toHaveLength(1);
    expect(bySeverity['info']).toHaveLength(1);
  });

  it('should reject a review missing its summary', () => {
    expect(reviewResultSchema.safeParse({ approved: true }).success).toBe(false);
  });
});

describe('successRate', () => {
  const base: TestOutput = {
    passed: false,
    totalTests: 8,
    passedTests: 6,
    failedTests: 2,
    skippedTests: 0,
    duration: '3s',
  };

  it('should compute the passing percentage', () => {
    expect(successRate(base)).toBe(75);
  });

  it('should return 0 when no tests ran', () => {
    expect(successRate({ ...base, totalTests: 0, passedTests: 0, failedTests: 0 })).toBe(0);
  });
});
