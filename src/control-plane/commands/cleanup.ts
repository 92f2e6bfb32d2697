import { Command } from 'commander';
import { openRunStore } from '../context.js';
import { cleanupOptionsSchema } from '../validators.js';
import {
  print,
  printError,
  formatCleanupResult,
  formatError,
  formatJson,
  formatValidationErrors,
} from '../formatter.js';

/**
 * Create the cleanup command.
 */
export function createCleanupCommand(): Command {
  const command = new Command('cleanup')
    .description('Apply the retention policy: archive aged runs and delete expired ones')
    .option('-n, --dry-run', 'Classify runs without changing anything', false)
    .option('-a, --archives', 'Also delete archives past their retention period', false)
    .option('-j, --json', 'Output result as JSON', false)
    .action(async (options: Record<string, unknown>, cmd: Command) => {
      try {
        await executeCleanup(options, cmd);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

async function executeCleanup(rawOptions: Record<string, unknown>, cmd: Command): Promise<void> {
  const parsed = cleanupOptionsSchema.safeParse(rawOptions);
  if (!parsed.success) {
    printError(
      formatValidationErrors(
        parsed.error.errors.map((e) => ({ path: e.path.join('.'), message: e.message }))
      )
    );
    process.exitCode = 1;
    return;
  }

  const { dryRun, archives, json } = parsed.data;
  const { lifecycle } = openRunStore(cmd);

  const runs = await lifecycle.cleanup(dryRun);
  const archiveResult = archives ? await lifecycle.cleanupArchives(dryRun) : null;

  if (json) {
    print(formatJson(archiveResult ? { runs, archives: archiveResult } : { runs }));
  } else {
    print(formatCleanupResult(runs, dryRun));
    if (archiveResult) {
      print('');
      print(formatCleanupResult(archiveResult, dryRun, 'Archive cleanup'));
    }
  }

  // Partial failures are reported in the result, not thrown
  const errorCount = runs.errors.length + (archiveResult?.errors.length ?? 0);
  if (errorCount > 0) {
    process.exitCode = 1;
  }
}
