import { z, type ZodError, type ZodTypeAny } from 'zod';
import { runStatusSchema } from '../types/run.js';

/**
 * Validation result type.
 */
export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  errors?: ValidationError[];
}

/**
 * Individual validation error.
 */
export interface ValidationError {
  path: string;
  message: string;
  code: string;
}

/**
 * Convert Zod errors to our ValidationError format.
 */
function formatZodErrors(error: ZodError): ValidationError[] {
  return error.errors.map((e) => ({
    path: e.path.join('.'),
    message: e.message,
    code: e.code,
  }));
}

/**
 * Generic validation function for Zod schemas.
 */
export function validate<S extends ZodTypeAny>(
  schema: S,
  data: unknown
): ValidationResult<z.output<S>> {
  const result = schema.safeParse(data);

  if (result.success) {
    return {
      success: true,
      data: result.data,
    };
  }

  return {
    success: false,
    errors: formatZodErrors(result.error),
  };
}

/**
 * A date option: anything Date can parse (e.g. 2026-01-31 or an ISO timestamp).
 */
const dateOptionSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), 'Invalid date')
  .transform((value) => new Date(value));

/**
 * Schema for `runs list` options.
 */
export const runsListOptionsSchema = z.object({
  flow: z.string().min(1).optional(),
  status: runStatusSchema.optional(),
  since: dateOptionSchema.optional(),
  until: dateOptionSchema.optional(),
  limit: z.coerce.number().int().positive().max(10000).default(50),
  json: z.boolean().default(false),
});

export type RunsListOptions = z.infer<typeof runsListOptionsSchema>;

/**
 * Schema for `runs stats` options.
 */
export const runsStatsOptionsSchema = z.object({
  flow: z.string().min(1).optional(),
  status: runStatusSchema.optional(),
  json: z.boolean().default(false),
});

export type RunsStatsOptions = z.infer<typeof runsStatsOptionsSchema>;

/**
 * Schema for `search` options.
 */
export const searchOptionsSchema = z.object({
  caseSensitive: z.boolean().default(false),
  max: z.coerce.number().int().nonnegative().default(0),
  json: z.boolean().default(false),
});

export type SearchCommandOptions = z.infer<typeof searchOptionsSchema>;

/**
 * Schema for `cleanup` options.
 */
export const cleanupOptionsSchema = z.object({
  dryRun: z.boolean().default(false),
  archives: z.boolean().default(false),
  json: z.boolean().default(false),
});

export type CleanupCommandOptions = z.infer<typeof cleanupOptionsSchema>;

/**
 * Validate a run ID argument.
 */
export const runIdSchema = z
  .string()
  .trim()
  .min(1, 'Run ID is required')
  .refine((id) => !id.includes('/') && !id.includes('\\') && id !== '.' && id !== '..', {
    message: 'Run ID must not contain path separators',
  });

export function validateRunId(id: unknown): ValidationResult<string> {
  return validate(runIdSchema, id);
}
