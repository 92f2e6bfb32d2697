import { Command } from 'commander';
import { openRunStore } from '../context.js';
import { searchOptionsSchema } from '../validators.js';
import {
  print,
  printError,
  formatError,
  formatJson,
  formatSearchResults,
  formatValidationErrors,
} from '../formatter.js';

/**
 * Create the search command.
 */
export function createSearchCommand(): Command {
  const command = new Command('search')
    .description('Search the content of persisted transcripts')
    .argument('<query>', 'Pattern to search for')
    .option('-c, --case-sensitive', 'Match case', false)
    .option('-m, --max <n>', 'Maximum number of matches (0 = unlimited)', '0')
    .option('-j, --json', 'Output result as JSON', false)
    .action(async (query: string, options: Record<string, unknown>, cmd: Command) => {
      try {
        await executeSearch(query, options, cmd);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

async function executeSearch(
  query: string,
  rawOptions: Record<string, unknown>,
  cmd: Command
): Promise<void> {
  if (query.trim().length === 0) {
    printError(formatError('Search query is required'));
    process.exitCode = 1;
    return;
  }

  const parsed = searchOptionsSchema.safeParse(rawOptions);
  if (!parsed.success) {
    printError(
      formatValidationErrors(
        parsed.error.errors.map((e) => ({ path: e.path.join('.'), message: e.message }))
      )
    );
    process.exitCode = 1;
    return;
  }

  const results = await openRunStore(cmd).transcripts.search(query, {
    caseSensitive: parsed.data.caseSensitive,
    maxResults: parsed.data.max,
  });

  print(parsed.data.json ? formatJson(results) : formatSearchResults(results));
}
