import { Command } from 'commander';
import { openRunStore } from '../context.js';
import { print, printError, formatDiskUsage, formatError, formatJson } from '../formatter.js';

/**
 * Create the usage command.
 */
export function createUsageCommand(): Command {
  return new Command('usage')
    .description('Show disk usage of active runs and archives')
    .option('-j, --json', 'Output result as JSON', false)
    .action(async (options: { json?: boolean }, cmd: Command) => {
      try {
        const usage = await openRunStore(cmd).lifecycle.diskUsage();
        print(options.json ? formatJson(usage) : formatDiskUsage(usage));
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });
}
