import type { CleanupResult, DiskUsage } from '../types/lifecycle.js';
import type { SearchResult } from '../types/search.js';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  // Foreground colors
  red: '\x1b[31m',
  green: '\x1b[32m',
  cyan: '\x1b[36m',
} as const;

/**
 * Check if colors should be enabled.
 */
function useColors(): boolean {
  // Respect NO_COLOR environment variable
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  // Respect FORCE_COLOR environment variable
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  // Default: use colors if stdout is a TTY
  return process.stdout.isTTY ?? false;
}

function colorize(text: string, color: keyof typeof colors): string {
  if (!useColors()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

export function bold(text: string): string {
  return colorize(text, 'bold');
}

export function dim(text: string): string {
  return colorize(text, 'dim');
}

export function red(text: string): string {
  return colorize(text, 'red');
}

export function green(text: string): string {
  return colorize(text, 'green');
}

export function cyan(text: string): string {
  return colorize(text, 'cyan');
}

/**
 * Format a byte count (e.g. "1.5 MB").
 */
export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} B` : `${value.toFixed(1)} ${units[unit]}`;
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength - 3)}...`;
}

/**
 * Summary of a cleanup pass. Per-run errors are listed after the counts.
 */
export function formatCleanupResult(
  result: CleanupResult,
  dryRun: boolean,
  title = 'Cleanup'
): string {
  const lines: string[] = [];

  lines.push(bold(dryRun ? `${title} (dry run)` : title));
  lines.push('');
  lines.push(`${bold('Archived:')}     ${result.archived.length}`);
  lines.push(`${bold('Deleted:')}      ${result.deleted.length}`);
  lines.push(`${bold('Kept:')}         ${result.kept.length}`);
  lines.push(`${bold('Space saved:')}  ${formatBytes(result.spaceSaved)} ${dim('(estimated)')}`);
  if (!dryRun && result.archived.length > 0) {
    lines.push(`${bold('Archives:')}     ${formatBytes(result.archiveBytesWritten)} written`);
  }

  for (const [label, ids] of [
    ['Archived', result.archived],
    ['Deleted', result.deleted],
  ] as const) {
    if (ids.length > 0) {
      lines.push('');
      lines.push(bold(`${label} runs:`));
      for (const id of ids) {
        lines.push(`  ${id}`);
      }
    }
  }

  if (result.errors.length > 0) {
    lines.push('');
    lines.push(bold(red('Errors:')));
    for (const error of result.errors) {
      lines.push(`  ${red('•')} ${error}`);
    }
  }

  return lines.join('\n');
}

export function formatDiskUsage(usage: DiskUsage): string {
  return [
    bold('Disk Usage'),
    '',
    `${bold('Runs:')}      ${usage.runCount} (${formatBytes(usage.activeSize)})`,
    `${bold('Archives:')}  ${usage.archiveCount} (${formatBytes(usage.archiveSize)})`,
    `${bold('Total:')}     ${formatBytes(usage.totalSize)}`,
  ].join('\n');
}

export function formatSearchResults(results: SearchResult[]): string {
  if (results.length === 0) {
    return dim('No matches found.');
  }

  const lines = results.map((r) => {
    const location = r.line !== undefined ? `${cyan(r.runId)}:${r.line}` : cyan(r.runId);
    return r.text !== undefined ? `${location}: ${truncate(r.text, 120)}` : location;
  });
  lines.push('');
  lines.push(dim(`${results.length} match${results.length === 1 ? '' : 'es'}`));
  return lines.join('\n');
}

export function formatSuccess(message: string): string {
  return `${green('✓')} ${message}`;
}

export function formatError(message: string): string {
  return `${red('✗')} ${red(message)}`;
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Print to stdout.
 */
export function print(text: string): void {
  // eslint-disable-next-line no-console -- CLI output function
  console.log(text);
}

/**
 * Print error to stderr.
 */
export function printError(text: string): void {
  // eslint-disable-next-line no-console -- CLI error output function
  console.error(text);
}

/**
 * Format validation errors.
 */
export function formatValidationErrors(
  errors: Array<{ path: string; message: string }>
): string {
  const lines = errors.map((e) => {
    const path = e.path ? `${bold(e.path)}: ` : '';
    return `  ${red('•')} ${path}${e.message}`;
  });

  return [formatError('Validation failed:'), ...lines].join('\n');
}
