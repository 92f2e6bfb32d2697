/**
 * Structured payloads stored by the typed artifact wrappers
 * (review.json, test-output.json, lint-output.json).
 */

import { z } from 'zod';

// Finding Severity
export const FindingSeverity = {
  CRITICAL: 'critical',
  ERROR: 'error',
  WARNING: 'warning',
  INFO: 'info',
} as const;

export type FindingSeverity = (typeof FindingSeverity)[keyof typeof FindingSeverity];

// Finding Category
export const FindingCategory = {
  SECURITY: 'security',
  PERFORMANCE: 'performance',
  STYLE: 'style',
  LOGIC: 'logic',
  TEST: 'test',
} as const;

export type FindingCategory = (typeof FindingCategory)[keyof typeof FindingCategory];

// Review Verdict
export const ReviewVerdict = {
  APPROVE: 'APPROVE',
  REQUEST_CHANGES: 'REQUEST_CHANGES',
  NEEDS_DISCUSSION: 'NEEDS_DISCUSSION',
} as const;

export type ReviewVerdict = (typeof ReviewVerdict)[keyof typeof ReviewVerdict];

export const reviewFindingSchema = z.object({
  file: z.string(),
  line: z.number().int().optional(),
  endLine: z.number().int().optional(),
  severity: z.string(),
  category: z.string(),
  message: z.string(),
  suggestion: z.string().optional(),
  code: z.string().optional(),
});

export type ReviewFinding = z.infer<typeof reviewFindingSchema>;

export const reviewMetricsSchema = z.object({
  linesReviewed: z.number().int().nonnegative(),
  filesReviewed: z.number().int().nonnegative(),
  tokensUsed: z.number().int().nonnegative(),
  durationSeconds: z.number().nonnegative().optional(),
});

export const reviewResultSchema = z.object({
  approved: z.boolean(),
  verdict: z.string().optional(),
  summary: z.string(),
  findings: z.array(reviewFindingSchema).optional(),
  metrics: reviewMetricsSchema.optional(),
});

export type ReviewResult = z.infer<typeof reviewResultSchema>;

export const testFailureSchema = z.object({
  name: z.string(),
  package: z.string().optional(),
  message: z.string(),
  file: z.string().optional(),
  line: z.number().int().optional(),
  output: z.string().optional(),
  expected: z.string().optional(),
  actual: z.string().optional(),
});

export const testCoverageSchema = z.object({
  percentage: z.number(),
  lines: z.number().int().nonnegative(),
  covered: z.number().int().nonnegative(),
  byPackage: z.record(z.number()).optional(),
});

export const testOutputSchema = z.object({
  passed: z.boolean(),
  totalTests: z.number().int().nonnegative(),
  passedTests: z.number().int().nonnegative(),
  failedTests: z.number().int().nonnegative(),
  skippedTests: z.number().int().nonnegative(),
  duration: z.string(),
  failures: z.array(testFailureSchema).optional(),
  coverage: testCoverageSchema.optional(),
});

export type TestOutput = z.infer<typeof testOutputSchema>;

export const lintIssueSchema = z.object({
  file: z.string(),
  line: z.number().int(),
  column: z.number().int().optional(),
  rule: z.string(),
  severity: z.string(),
  message: z.string(),
  fixable: z.boolean().optional(),
});

export const lintSummarySchema = z.object({
  totalIssues: z.number().int().nonnegative(),
  errors: z.number().int().nonnegative(),
  warnings: z.number().int().nonnegative(),
  fixableCount: z.number().int().nonnegative(),
  filesChecked: z.number().int().nonnegative(),
});

export const lintOutputSchema = z.object({
  passed: z.boolean(),
  tool: z.string(),
  issues: z.array(lintIssueSchema).optional(),
  summary: lintSummarySchema,
});

export type LintOutput = z.infer<typeof lintOutputSchema>;

export function hasCriticalFindings(review: ReviewResult): boolean {
  return (review.findings ?? []).some((f) => f.severity === FindingSeverity.CRITICAL);
}

/**
 * True if any finding is an error or worse.
 */
export function hasErrors(review: ReviewResult): boolean {
  return (review.findings ?? []).some(
    (f) => f.severity === FindingSeverity.CRITICAL || f.severity === FindingSeverity.ERROR
  );
}

export function findingsByFile(review: ReviewResult): Record<string, ReviewFinding[]> {
  return groupFindings(review, (f) => f.file);
}

export function findingsBySeverity(review: ReviewResult): Record<string, ReviewFinding[]> {
  return groupFindings(review, (f) => f.severity);
}

/**
 * Percentage of tests that passed (0 when no tests ran).
 */
export function successRate(output: TestOutput): number {
  if (output.totalTests === 0) {
    return 0;
  }
  return (output.passedTests / output.totalTests) * 100;
}

function groupFindings(
  review: ReviewResult,
  key: (finding: ReviewFinding) => string
): Record<string, ReviewFinding[]> {
  const groups: Record<string, ReviewFinding[]> = {};
  for (const finding of review.findings ?? []) {
    const k = key(finding);
    const bucket = groups[k] ?? [];
    bucket.push(finding);
    groups[k] = bucket;
  }
  return groups;
}
