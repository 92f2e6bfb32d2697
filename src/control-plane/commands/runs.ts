import { Command } from 'commander';
import { openRunStore } from '../context.js';
import {
  runsListOptionsSchema,
  runsStatsOptionsSchema,
  validateRunId,
} from '../validators.js';
import {
  print,
  printError,
  formatError,
  formatJson,
  formatValidationErrors,
} from '../formatter.js';
import {
  renderAssistantOnly,
  renderDiff,
  renderFull,
  renderMarkdown,
  renderRunList,
  renderStatistics,
  renderSummary,
} from '../../transcript/view.js';
import { isNotFound } from '../../errors.js';
import { RunStatus, type ListFilter, type Transcript } from '../../types/index.js';

/**
 * Create the runs command with list, show, diff and stats subcommands.
 */
export function createRunsCommand(): Command {
  const command = new Command('runs').description('Inspect persisted runs');

  command
    .command('list')
    .description('List runs, newest first')
    .option('--flow <flowId>', 'Only runs of this flow')
    .option('--status <status>', `Only runs with this status (${Object.values(RunStatus).join(', ')})`)
    .option('--since <date>', 'Only runs started at or after this date')
    .option('--until <date>', 'Only runs started at or before this date')
    .option('-l, --limit <n>', 'Maximum number of runs', '50')
    .option('-j, --json', 'Output result as JSON', false)
    .action(async (options: Record<string, unknown>, cmd: Command) => {
      await runAction(() => executeList(options, cmd));
    });

  command
    .command('show')
    .description('Show a run transcript')
    .argument('<run-id>', 'Run ID')
    .option('-f, --full', 'Show every turn in full', false)
    .option('-a, --assistant', 'Show only assistant turns, in full', false)
    .option('-m, --markdown', 'Export as Markdown', false)
    .option('-j, --json', 'Output the raw transcript as JSON', false)
    .action(async (runId: string, options: ShowOptions, cmd: Command) => {
      await runAction(() => executeShow(runId, options, cmd));
    });

  command
    .command('diff')
    .description('Compare two runs turn by turn')
    .argument('<run-a>', 'First run ID')
    .argument('<run-b>', 'Second run ID')
    .action(async (runA: string, runB: string, _options: unknown, cmd: Command) => {
      await runAction(() => executeDiff(runA, runB, cmd));
    });

  command
    .command('stats')
    .description('Aggregate token and cost statistics')
    .option('--flow <flowId>', 'Only runs of this flow')
    .option('--status <status>', 'Only runs with this status')
    .option('-j, --json', 'Output result as JSON', false)
    .action(async (options: Record<string, unknown>, cmd: Command) => {
      await runAction(() => executeStats(options, cmd));
    });

  return command;
}

interface ShowOptions {
  full?: boolean;
  assistant?: boolean;
  markdown?: boolean;
  json?: boolean;
}

async function runAction(fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (error) {
    printError(formatError(error instanceof Error ? error.message : String(error)));
    process.exitCode = 1;
  }
}

async function executeList(rawOptions: Record<string, unknown>, cmd: Command): Promise<void> {
  const parsed = runsListOptionsSchema.safeParse(rawOptions);
  if (!parsed.success) {
    printError(
      formatValidationErrors(
        parsed.error.errors.map((e) => ({ path: e.path.join('.'), message: e.message }))
      )
    );
    process.exitCode = 1;
    return;
  }

  const options = parsed.data;
  const filter: ListFilter = { limit: options.limit };
  if (options.flow) filter.flowId = options.flow;
  if (options.status) filter.status = options.status;
  if (options.since) filter.after = options.since;
  if (options.until) filter.before = options.until;

  const runs = await openRunStore(cmd).transcripts.list(filter);
  print(options.json ? formatJson(runs) : renderRunList(runs).trimEnd());
}

/**
 * Load a transcript, printing an error and setting the exit code when the
 * id is empty or the run does not exist.
 */
async function loadTranscript(runId: string, cmd: Command): Promise<Transcript | null> {
  const idResult = validateRunId(runId);
  if (!idResult.success || idResult.data === undefined) {
    printError(formatError('Run ID is required'));
    process.exitCode = 1;
    return null;
  }

  try {
    return await openRunStore(cmd).transcripts.load(idResult.data);
  } catch (error) {
    if (isNotFound(error)) {
      printError(formatError(`Run not found: ${idResult.data}`));
      process.exitCode = 1;
      return null;
    }
    throw error;
  }
}

async function executeShow(runId: string, options: ShowOptions, cmd: Command): Promise<void> {
  const transcript = await loadTranscript(runId, cmd);
  if (!transcript) return;

  if (options.json) {
    print(formatJson(transcript));
  } else if (options.markdown) {
    print(renderMarkdown(transcript));
  } else if (options.assistant) {
    print(renderAssistantOnly(transcript).trimEnd());
  } else if (options.full) {
    print(renderFull(transcript).trimEnd());
  } else {
    print(renderSummary(transcript).trimEnd());
  }
}

async function executeDiff(runA: string, runB: string, cmd: Command): Promise<void> {
  const a = await loadTranscript(runA, cmd);
  if (!a) return;
  const b = await loadTranscript(runB, cmd);
  if (!b) return;

  print(renderDiff(a, b).trimEnd());
}

async function executeStats(rawOptions: Record<string, unknown>, cmd: Command): Promise<void> {
  const parsed = runsStatsOptionsSchema.safeParse(rawOptions);
  if (!parsed.success) {
    printError(
      formatValidationErrors(
        parsed.error.errors.map((e) => ({ path: e.path.join('.'), message: e.message }))
      )
    );
    process.exitCode = 1;
    return;
  }

  const filter: ListFilter = {};
  if (parsed.data.flow) filter.flowId = parsed.data.flow;
  if (parsed.data.status) filter.status = parsed.data.status;

  const stats = await openRunStore(cmd).transcripts.stats(filter);
  print(parsed.data.json ? formatJson(stats) : renderStatistics(stats).trimEnd());
}
