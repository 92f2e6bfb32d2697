import { z } from 'zod';

// Run Status
export const RunStatus = {
  RUNNING: 'running',
  COMPLETED: 'completed',
  FAILED: 'failed',
  CANCELED: 'canceled',
} as const;

export type RunStatus = (typeof RunStatus)[keyof typeof RunStatus];

export const TERMINAL_RUN_STATUSES: readonly RunStatus[] = [
  RunStatus.COMPLETED,
  RunStatus.FAILED,
  RunStatus.CANCELED,
];

export const runStatusSchema = z.enum(['running', 'completed', 'failed', 'canceled']);

// Turn Role
export const TurnRole = {
  SYSTEM: 'system',
  USER: 'user',
  ASSISTANT: 'assistant',
  TOOL_RESULT: 'tool_result',
} as const;

export type TurnRole = (typeof TurnRole)[keyof typeof TurnRole];

export const turnRoleSchema = z.enum(['system', 'user', 'assistant', 'tool_result']);

/**
 * A tool invocation attached to an assistant turn.
 */
export const toolCallSchema = z.object({
  id: z.string().optional(),
  name: z.string(),
  input: z.record(z.unknown()).default({}),
  output: z.string().optional(),
  error: z.string().optional(),
});

export type ToolCall = z.infer<typeof toolCallSchema>;

/**
 * One step of a conversation. `id` is the 1-based sequence number within the run.
 */
export const turnSchema = z.object({
  id: z.number().int().positive(),
  role: turnRoleSchema,
  content: z.string(),
  tokensIn: z.number().int().nonnegative().optional(),
  tokensOut: z.number().int().nonnegative().optional(),
  timestamp: z.string(),
  toolCalls: z.array(toolCallSchema).optional(),
  durationMs: z.number().nonnegative().optional(),
});

export type Turn = z.infer<typeof turnSchema>;

/**
 * Turn as supplied by callers of recordTurn. The store assigns `id` and
 * stamps `timestamp` when absent.
 */
export const turnInputSchema = turnSchema
  .omit({ id: true, timestamp: true })
  .extend({ timestamp: z.string().optional() });

export type TurnInput = z.infer<typeof turnInputSchema>;

/**
 * The per-run metadata record persisted as metadata.json.
 * Unknown fields are preserved so records written by newer versions survive a rewrite.
 */
export const runMetadataSchema = z
  .object({
    runId: z.string(),
    flowId: z.string(),
    nodeId: z.string().optional(),
    input: z.record(z.unknown()).optional(),
    status: runStatusSchema,
    startedAt: z.string(),
    endedAt: z.string().optional(),
    totalTokensIn: z.number().int().nonnegative().default(0),
    totalTokensOut: z.number().int().nonnegative().default(0),
    totalCost: z.number().nonnegative().default(0),
    turnCount: z.number().int().nonnegative().default(0),
    error: z.string().optional(),
  })
  .passthrough();

export type RunMetadata = z.infer<typeof runMetadataSchema>;

/**
 * Full conversation record persisted as transcript.json (or transcript.json.gz).
 */
export const transcriptSchema = z.object({
  runId: z.string(),
  metadata: runMetadataSchema,
  turns: z.array(turnSchema),
});

export type Transcript = z.infer<typeof transcriptSchema>;

export const DEFAULT_TRANSCRIPT_COMPRESS_ABOVE = 100 * 1024;

/**
 * Input for starting a new run.
 */
export interface StartRunOptions {
  flowId: string;
  nodeId?: string;
  input?: Record<string, unknown>;
}

/**
 * Filters for listing persisted runs. Time bounds apply to `startedAt`.
 */
export interface ListFilter {
  flowId?: string;
  status?: RunStatus;
  after?: Date;
  before?: Date;
  /** Maximum number of results (0 or undefined = unlimited) */
  limit?: number;
}

/**
 * Aggregated statistics over a set of runs.
 */
export interface RunStatistics {
  totalRuns: number;
  completedRuns: number;
  failedRuns: number;
  canceledRuns: number;
  activeRuns: number;
  totalTokensIn: number;
  totalTokensOut: number;
  totalCost: number;
  avgTokensIn: number;
  avgTokensOut: number;
  avgCost: number;
}
