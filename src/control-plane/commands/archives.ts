import { Command } from 'commander';
import { openRunStore } from '../context.js';
import { validateRunId } from '../validators.js';
import {
  print,
  printError,
  bold,
  dim,
  formatBytes,
  formatError,
  formatJson,
  formatSuccess,
} from '../formatter.js';

/**
 * Create the archives command.
 */
export function createArchivesCommand(): Command {
  const command = new Command('archives').description('Manage archived runs');

  command
    .command('list')
    .description('List archived run IDs')
    .option('-j, --json', 'Output result as JSON', false)
    .action(async (options: { json?: boolean }, cmd: Command) => {
      await runAction(async () => {
        const ids = await openRunStore(cmd).lifecycle.listArchives();
        if (options.json) {
          print(formatJson(ids));
        } else if (ids.length === 0) {
          print(dim('No archives found.'));
        } else {
          print(ids.join('\n'));
        }
      });
    });

  command
    .command('restore')
    .description('Restore an archived run into the runs directory')
    .argument('<run-id>', 'Run ID')
    .action(async (runId: string, _options: unknown, cmd: Command) => {
      await runAction(async () => {
        const id = requireRunId(runId);
        await openRunStore(cmd).lifecycle.restoreArchive(id);
        print(formatSuccess(`Restored ${bold(id)}`));
      });
    });

  command
    .command('delete')
    .description('Delete an archived run')
    .argument('<run-id>', 'Run ID')
    .action(async (runId: string, _options: unknown, cmd: Command) => {
      await runAction(async () => {
        const id = requireRunId(runId);
        await openRunStore(cmd).lifecycle.deleteArchive(id);
        print(formatSuccess(`Deleted archive ${bold(id)}`));
      });
    });

  command
    .command('size')
    .description('Show the size of an archived run')
    .argument('<run-id>', 'Run ID')
    .option('-j, --json', 'Output result as JSON', false)
    .action(async (runId: string, options: { json?: boolean }, cmd: Command) => {
      await runAction(async () => {
        const id = requireRunId(runId);
        const size = await openRunStore(cmd).lifecycle.getArchiveSize(id);
        print(options.json ? formatJson({ runId: id, size }) : `${id}: ${formatBytes(size)}`);
      });
    });

  return command;
}

function requireRunId(runId: string): string {
  const result = validateRunId(runId);
  if (!result.success || result.data === undefined) {
    const message = result.errors?.map((e) => e.message).join('; ') ?? 'Invalid run ID';
    throw new Error(message);
  }
  return result.data;
}

async function runAction(fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (error) {
    printError(formatError(error instanceof Error ? error.message : String(error)));
    process.exitCode = 1;
  }
}
