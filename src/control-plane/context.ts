import type { Command } from 'commander';
import { z } from 'zod';
import { getConfig } from '../config/index.js';
import { createRunStore, type RunStore } from '../run-store.js';

const globalOptionsSchema = z.object({
  baseDir: z.string().min(1).optional(),
});

/**
 * Open the run store for a command, honouring the global `--base-dir`
 * option over RUNKEEP_BASE_DIR.
 */
export function openRunStore(command: Command): RunStore {
  const { baseDir } = globalOptionsSchema.parse(command.optsWithGlobals());
  const config = getConfig();
  return createRunStore(baseDir ? { ...config, baseDir } : config);
}
