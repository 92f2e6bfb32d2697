import { Command } from 'commander';
import { createRunsCommand } from './commands/runs.js';
import { createSearchCommand } from './commands/search.js';
import { createCleanupCommand } from './commands/cleanup.js';
import { createArchivesCommand } from './commands/archives.js';
import { createUsageCommand } from './commands/usage.js';

const VERSION = '0.1.0';

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('runkeep')
    .description('Run artifact, transcript and retention store')
    .version(VERSION, '-v, --version', 'Output the current version')
    .option('-d, --base-dir <dir>', 'Store base directory (default: $RUNKEEP_BASE_DIR or .runkeep)');

  // Add commands
  program.addCommand(createRunsCommand());
  program.addCommand(createSearchCommand());
  program.addCommand(createCleanupCommand());
  program.addCommand(createArchivesCommand());
  program.addCommand(createUsageCommand());

  // Error handling
  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws an error on --help and --version
    // We don't want to treat these as errors
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' ||
        error.code === 'commander.version' ||
        error.code === 'commander.help')
    ) {
      return;
    }

    // Re-throw other errors
    throw error;
  }
}

export { createRunsCommand } from './commands/runs.js';
export { createSearchCommand } from './commands/search.js';
export { createCleanupCommand } from './commands/cleanup.js';
export { createArchivesCommand } from './commands/archives.js';
export { createUsageCommand } from './commands/usage.js';
