import { ArtifactManager } from './artifacts/manager.js';
import { LifecycleManager } from './lifecycle/manager.js';
import { TranscriptStore, type RunEndedHook } from './transcript/store.js';
import type { CommandRunner } from './transcript/search.js';
import type { RunStoreConfig } from './config/index.js';

export interface RunStore {
  readonly baseDir: string;
  readonly artifacts: ArtifactManager;
  readonly transcripts: TranscriptStore;
  readonly lifecycle: LifecycleManager;
}

export interface RunStoreHooks {
  onRunEnded?: RunEndedHook;
  searchRunner?: CommandRunner;
  now?: () => Date;
}

/**
 * Wire the three components against one base directory.
 */
export function createRunStore(config: RunStoreConfig, hooks: RunStoreHooks = {}): RunStore {
  const { baseDir } = config;

  return {
    baseDir,
    artifacts: new ArtifactManager({
      baseDir,
      compressAbove: config.artifactCompressAbove,
    }),
    transcripts: new TranscriptStore({
      baseDir,
      compressAbove: config.transcriptCompressAbove,
      ...hooks,
    }),
    lifecycle: new LifecycleManager({
      baseDir,
      policy: config.retention,
      ...(hooks.now ? { now: hooks.now } : {}),
    }),
  };
}
