import { TurnRole, type RunMetadata, type RunStatistics, type Transcript, type Turn } from '../types/run.js';
import { getDurationMs } from './transcript.js';

const RULE = '='.repeat(60);
const THIN_RULE = '-'.repeat(60);

/**
 * Whole-second duration such as `45s`, `1m30s` or `2h0m5s`.
 */
export function formatRunDuration(ms: number): string {
  const total = Math.round(ms / 1000);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const seconds = total % 60;

  if (hours > 0) return `${hours}h${minutes}m${seconds}s`;
  if (minutes > 0) return `${minutes}m${seconds}s`;
  return `${seconds}s`;
}

// UTC, `YYYY-MM-DD HH:MM:SS`
function formatTimestamp(iso: string): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) return iso;
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

function formatCost(cost: number): string {
  return `$${cost.toFixed(2)}`;
}

function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  if (max <= 3) return text.slice(0, max);
  return `${text.slice(0, max - 3)}...`;
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

function renderHeader(transcript: Transcript, now: Date): string[] {
  const { metadata } = transcript;
  const lines = [
    RULE,
    `Run: ${transcript.runId}`,
    `Flow: ${metadata.flowId} | Status: ${metadata.status}`,
    `Started: ${formatTimestamp(metadata.startedAt)} | Duration: ${formatRunDuration(getDurationMs(metadata, now))}`,
    `Tokens: ${metadata.totalTokensIn} in / ${metadata.totalTokensOut} out | Cost: ${formatCost(metadata.totalCost)}`,
  ];
  if (metadata.error) {
    lines.push(`Error: ${metadata.error}`);
  }
  lines.push(RULE);
  return lines;
}

function renderTurn(turn: Turn): string[] {
  let header = `[${turn.id}] ${turn.role.toUpperCase()} (${formatTimestamp(turn.timestamp).slice(11)})`;
  if (turn.tokensIn) header += ` [${turn.tokensIn} tokens in]`;
  if (turn.tokensOut) header += ` [${turn.tokensOut} tokens out]`;
  if (turn.durationMs) header += ` [${turn.durationMs}ms]`;

  const lines = ['', header, THIN_RULE, turn.content];

  for (const call of turn.toolCalls ?? []) {
    lines.push('', `  Tool: ${call.name}`);
    if (Object.keys(call.input).length > 0) {
      lines.push(`     Input: ${JSON.stringify(call.input)}`);
    }
    if (call.output) {
      lines.push(`     Output: ${truncate(call.output, 203)}`);
    }
    if (call.error) {
      lines.push(`     Error: ${call.error}`);
    }
  }
  return lines;
}

/**
 * Header plus a one-line preview of every turn.
 */
export function renderSummary(transcript: Transcript, now: Date = new Date()): string {
  const lines = renderHeader(transcript, now);
  lines.push('', 'Turn Summary:');
  for (const turn of transcript.turns) {
    const preview = truncate(turn.content, 103).replace(/\n/g, ' ');
    lines.push(`  [${turn.id}] ${turn.role}: ${preview}`);
  }
  return lines.join('\n') + '\n';
}

export function renderFull(transcript: Transcript, now: Date = new Date()): string {
  const lines = renderHeader(transcript, now);
  for (const turn of transcript.turns) {
    lines.push(...renderTurn(turn));
  }
  return lines.join('\n') + '\n';
}

/**
 * Like renderFull, but only the assistant's turns.
 */
export function renderAssistantOnly(transcript: Transcript, now: Date = new Date()): string {
  const lines = renderHeader(transcript, now);
  for (const turn of transcript.turns) {
    if (turn.role === TurnRole.ASSISTANT) {
      lines.push(...renderTurn(turn));
    }
  }
  return lines.join('\n') + '\n';
}

function compareTurn(index: number, a: Turn | undefined, b: Turn | undefined): string {
  const label = `  Turn ${index + 1}:`;
  if (!a && b) return `${label} [missing] vs ${b.role} (${b.content.length} chars)`;
  if (a && !b) return `${label} ${a.role} (${a.content.length} chars) vs [missing]`;
  if (!a || !b) return `${label} [missing] vs [missing]`;
  if (a.role !== b.role) return `${label} ${a.role} vs ${b.role} (different roles)`;
  if (a.content === b.content) return `${label} ${a.role} - identical (${a.content.length} chars)`;
  return `${label} ${a.role} - different (${a.content.length} vs ${b.content.length} chars)`;
}

/**
 * Side-by-side comparison of two runs: totals first, then each turn
 * position matched by index.
 */
export function renderDiff(a: Transcript, b: Transcript, now: Date = new Date()): string {
  const ma = a.metadata;
  const mb = b.metadata;
  const lines = [
    'Comparing transcripts:',
    `  A: ${a.runId} (${ma.status})`,
    `  B: ${b.runId} (${mb.status})`,
    '',
    'Metadata Comparison:',
    `  Turns:      ${a.turns.length} vs ${b.turns.length}`,
    `  Tokens In:  ${ma.totalTokensIn} vs ${mb.totalTokensIn}`,
    `  Tokens Out: ${ma.totalTokensOut} vs ${mb.totalTokensOut}`,
    `  Cost:       ${formatCost(ma.totalCost)} vs ${formatCost(mb.totalCost)}`,
    `  Duration:   ${formatRunDuration(getDurationMs(ma, now))} vs ${formatRunDuration(getDurationMs(mb, now))}`,
    '',
    'Turn Comparison:',
  ];

  const count = Math.max(a.turns.length, b.turns.length);
  for (let i = 0; i < count; i++) {
    lines.push(compareTurn(i, a.turns[i], b.turns[i]));
  }
  return lines.join('\n') + '\n';
}

export function renderMarkdown(transcript: Transcript, now: Date = new Date()): string {
  const { metadata } = transcript;
  const out: string[] = [
    `# Transcript: ${transcript.runId}`,
    '',
    '## Metadata',
    '',
    '| Field | Value |',
    '|-------|-------|',
    `| Flow | ${metadata.flowId} |`,
    `| Status | ${metadata.status} |`,
    `| Started | ${metadata.startedAt} |`,
  ];
  if (metadata.endedAt) {
    out.push(`| Ended | ${metadata.endedAt} |`);
  }
  out.push(
    `| Duration | ${formatRunDuration(getDurationMs(metadata, now))} |`,
    `| Tokens In | ${metadata.totalTokensIn} |`,
    `| Tokens Out | ${metadata.totalTokensOut} |`,
    `| Cost | ${formatCost(metadata.totalCost)} |`
  );
  if (metadata.error) {
    out.push(`| Error | ${metadata.error} |`);
  }
  out.push('', '## Conversation', '');

  for (const turn of transcript.turns) {
    out.push(`### ${capitalize(turn.role)} (Turn ${turn.id})`, '');
    if (turn.tokensIn) out.push(`*${turn.tokensIn} tokens in*`, '');
    if (turn.tokensOut) out.push(`*${turn.tokensOut} tokens out*`, '');
    out.push(turn.content, '');

    for (const call of turn.toolCalls ?? []) {
      out.push(`#### Tool Call: \`${call.name}\``, '');
      out.push('**Input:**', '```json', JSON.stringify(call.input, null, 2), '```', '');
      if (call.output) {
        out.push('**Output:**', '```', call.output, '```', '');
      }
      if (call.error) {
        out.push(`**Error:** ${call.error}`, '');
      }
    }
  }

  return out.join('\n');
}

/**
 * Fixed-width table of runs.
 */
export function renderRunList(runs: RunMetadata[]): string {
  if (runs.length === 0) {
    return 'No runs found.\n';
  }

  const row = (cells: [string, string, string, string, string, string]): string =>
    `${cells[0].padEnd(40)} ${cells[1].padEnd(12)} ${cells[2].padEnd(20)} ${cells[3].padStart(8)} ${cells[4].padStart(8)} ${cells[5].padStart(8)}`;

  const lines = [row(['RUN ID', 'STATUS', 'STARTED', 'TOKENS', 'COST', 'TURNS']), '-'.repeat(100)];
  for (const run of runs) {
    lines.push(
      row([
        truncate(run.runId, 40),
        run.status,
        formatTimestamp(run.startedAt).slice(0, 16),
        `${run.totalTokensIn}/${run.totalTokensOut}`,
        formatCost(run.totalCost),
        String(run.turnCount),
      ])
    );
  }
  lines.push('', `Total: ${runs.length} runs`);
  return lines.join('\n') + '\n';
}

export function renderStatistics(stats: RunStatistics): string {
  return [
    'Run Statistics:',
    '-'.repeat(40),
    `Total Runs:      ${stats.totalRuns}`,
    `  Completed:     ${stats.completedRuns}`,
    `  Failed:        ${stats.failedRuns}`,
    `  Canceled:      ${stats.canceledRuns}`,
    `  Active:        ${stats.activeRuns}`,
    '',
    `Total Tokens:    ${stats.totalTokensIn} in / ${stats.totalTokensOut} out`,
    `Avg Tokens/Run:  ${stats.avgTokensIn} in / ${stats.avgTokensOut} out`,
    '',
    `Total Cost:      ${formatCost(stats.totalCost)}`,
    `Avg Cost/Run:    ${formatCost(stats.avgCost)}`,
    '',
  ].join('\n');
}
