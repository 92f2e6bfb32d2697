import {
  RunStatus,
  TurnRole,
  type RunMetadata,
  type StartRunOptions,
  type ToolCall,
  type Transcript,
  type Turn,
  type TurnInput,
} from '../types/run.js';

export function createTranscript(runId: string, options: StartRunOptions, now: Date): Transcript {
  const metadata: RunMetadata = {
    runId,
    flowId: options.flowId,
    status: RunStatus.RUNNING,
    startedAt: now.toISOString(),
    totalTokensIn: 0,
    totalTokensOut: 0,
    totalCost: 0,
    turnCount: 0,
  };
  if (options.nodeId !== undefined) {
    metadata.nodeId = options.nodeId;
  }
  if (options.input !== undefined) {
    metadata.input = structuredClone(options.input);
  }
  return { runId, metadata, turns: [] };
}

/**
 * Append a turn, assigning the next sequence id.
 *
 * Token attribution follows the role: user and system turns count toward
 * tokens in, assistant turns toward tokens out, tool results toward neither.
 */
export function appendTurn(transcript: Transcript, input: TurnInput, now: Date): Turn {
  const turn: Turn = {
    ...structuredClone(input),
    id: transcript.turns.length + 1,
    timestamp: input.timestamp ?? now.toISOString(),
  };

  const { metadata } = transcript;
  switch (turn.role) {
    case TurnRole.USER:
    case TurnRole.SYSTEM:
      metadata.totalTokensIn += turn.tokensIn ?? 0;
      break;
    case TurnRole.ASSISTANT:
      metadata.totalTokensOut += turn.tokensOut ?? 0;
      break;
    case TurnRole.TOOL_RESULT:
      break;
  }

  transcript.turns.push(turn);
  metadata.turnCount = transcript.turns.length;
  return turn;
}

/**
 * Most recent turn, if it is an assistant turn; tool calls only attach there.
 */
export function lastAssistantTurn(transcript: Transcript): Turn | undefined {
  const last = transcript.turns[transcript.turns.length - 1];
  return last?.role === TurnRole.ASSISTANT ? last : undefined;
}

export function appendToolCall(turn: Turn, call: ToolCall): void {
  turn.toolCalls = [...(turn.toolCalls ?? []), structuredClone(call)];
}

/**
 * Seal the record with a terminal status.
 */
export function finishTranscript(
  transcript: Transcript,
  status: RunStatus,
  now: Date,
  error?: string
): void {
  transcript.metadata.status = status;
  transcript.metadata.endedAt = now.toISOString();
  if (error !== undefined) {
    transcript.metadata.error = error;
  }
}

/**
 * Run duration in milliseconds; measured to `now` while the run has no end time.
 */
export function getDurationMs(metadata: RunMetadata, now: Date = new Date()): number {
  const started = new Date(metadata.startedAt).getTime();
  const ended = metadata.endedAt !== undefined ? new Date(metadata.endedAt).getTime() : now.getTime();
  return Math.max(0, ended - started);
}

export function turnsByRole(transcript: Transcript, role: TurnRole): Turn[] {
  return transcript.turns.filter((turn) => turn.role === role);
}
