import { readdir, rm } from 'node:fs/promises';
import {
  DEFAULT_TRANSCRIPT_COMPRESS_ABOVE,
  RunStatus,
  TERMINAL_RUN_STATUSES,
  toolCallSchema,
  transcriptSchema,
  turnInputSchema,
  type ListFilter,
  type RunMetadata,
  type RunStatistics,
  type StartRunOptions,
  type ToolCall,
  type Transcript,
  type Turn,
  type TurnInput,
} from '../types/run.js';
import type { SearchOptions, SearchResult } from '../types/search.js';
import {
  AlreadyExistsError,
  InvalidStateError,
  NotFoundError,
  RunNotStartedError,
  StoreIOError,
  errorMessage,
  hasErrorCode,
} from '../errors.js';
import { ensureDir, getRunDir, getRunsDir, getTranscriptPath } from '../artifacts/paths.js';
import { readMaybeCompressed, writeMaybeCompressed } from '../artifacts/json.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { pathExists } from '../utils/fs.js';
import { createLogger } from '../utils/logger.js';
import { readMetadata, writeMetadata } from './metadata.js';
import {
  appendToolCall,
  appendTurn,
  createTranscript,
  finishTranscript,
  lastAssistantTurn,
} from './transcript.js';
import { TranscriptSearcher, type CommandRunner } from './search.js';

const log = createLogger('transcript-store');

/**
 * Called with the final metadata after a run has been persisted.
 */
export type RunEndedHook = (metadata: RunMetadata) => void | Promise<void>;

export interface TranscriptStoreOptions {
  baseDir: string;
  /** Serialized transcripts larger than this many bytes are gzip-compressed (default: 100 KiB) */
  compressAbove?: number;
  onRunEnded?: RunEndedHook;
  /** Command runner for content search; spawns rg/grep by default */
  searchRunner?: CommandRunner;
  /** Clock override, used by tests */
  now?: () => Date;
}

/**
 * Token bounds for findByTokenRange. A bound of 0 or undefined is open.
 */
export interface TokenRange {
  minIn?: number;
  maxIn?: number;
  minOut?: number;
  maxOut?: number;
}

/**
 * Tracks one conversation per active run in memory and persists it to
 * `runs/<runId>/` when the run ends.
 *
 * Every mutation of a run is serialized on a per-run lock, so a turn
 * racing with endRun either lands before the transcript is written or is
 * rejected with RunNotStartedError.
 */
export class TranscriptStore {
  private readonly baseDir: string;
  private readonly compressAbove: number;
  private readonly onRunEnded: RunEndedHook | undefined;
  private readonly now: () => Date;
  private readonly searcher: TranscriptSearcher;

  private readonly active = new Map<string, Transcript>();
  private readonly locks = new KeyedMutex();

  constructor(options: TranscriptStoreOptions) {
    this.baseDir = options.baseDir;
    this.compressAbove = options.compressAbove ?? DEFAULT_TRANSCRIPT_COMPRESS_ABOVE;
    this.onRunEnded = options.onRunEnded;
    this.now = options.now ?? (() => new Date());
    this.searcher = new TranscriptSearcher({
      baseDir: options.baseDir,
      ...(options.searchRunner ? { runner: options.searchRunner } : {}),
    });
  }

  async startRun(runId: string, options: StartRunOptions): Promise<RunMetadata> {
    return this.locks.runExclusive(runId, async () => {
      const runDir = getRunDir(this.baseDir, runId);
      if (this.active.has(runId) || (await pathExists(runDir))) {
        throw new AlreadyExistsError('run', runId);
      }

      const transcript = createTranscript(runId, options, this.now());
      try {
        await ensureDir(runDir);
        await writeMetadata(this.baseDir, transcript.metadata);
      } catch (error) {
        throw new StoreIOError(`start run ${runId}`, error);
      }

      this.active.set(runId, transcript);
      log.info({ runId, flowId: options.flowId }, 'Run started');
      return structuredClone(transcript.metadata);
    });
  }

  /**
   * Append a turn to an active run. Returns the stored turn with its
   * assigned id and timestamp. Malformed input (such as a negative or
   * fractional token count) is rejected with a ZodError and leaves the run
   * unchanged.
   */
  async recordTurn(runId: string, input: TurnInput): Promise<Turn> {
    const parsed = turnInputSchema.parse(input);
    return this.locks.runExclusive(runId, () => {
      const transcript = this.getActive(runId);
      const turn = appendTurn(transcript, parsed, this.now());
      log.debug({ runId, turnId: turn.id, role: turn.role }, 'Turn recorded');
      return structuredClone(turn);
    });
  }

  /**
   * Attach a tool call to the run's most recent turn, which must be an
   * assistant turn.
   */
  async recordToolCall(runId: string, call: ToolCall): Promise<void> {
    const parsed = toolCallSchema.parse(call);
    await this.locks.runExclusive(runId, () => {
      const transcript = this.getActive(runId);
      const turn = lastAssistantTurn(transcript);
      if (!turn) {
        throw new InvalidStateError(runId, 'no assistant turn to attach a tool call to');
      }
      appendToolCall(turn, parsed);
      log.debug({ runId, turnId: turn.id, tool: parsed.name }, 'Tool call recorded');
    });
  }

  async addCost(runId: string, amount: number): Promise<void> {
    if (!Number.isFinite(amount) || amount < 0) {
      throw new RangeError(`Cost must be a non-negative number, got ${amount}`);
    }
    await this.locks.runExclusive(runId, () => {
      this.getActive(runId).metadata.totalCost += amount;
    });
  }

  /**
   * Seal an active run with a terminal status and persist it. The run stays
   * active if persistence fails.
   */
  async endRun(runId: string, status: RunStatus, error?: string): Promise<RunMetadata> {
    if (!TERMINAL_RUN_STATUSES.includes(status)) {
      throw new InvalidStateError(runId, `cannot end a run with status ${status}`);
    }

    const metadata = await this.locks.runExclusive(runId, async () => {
      const sealed = structuredClone(this.getActive(runId));
      finishTranscript(sealed, status, this.now(), error);

      try {
        const data = Buffer.from(JSON.stringify(sealed, null, 2), 'utf-8');
        const compressed = await writeMaybeCompressed(
          getTranscriptPath(this.baseDir, runId),
          data,
          this.compressAbove
        );
        await writeMetadata(this.baseDir, sealed.metadata);
        log.info(
          { runId, status, turns: sealed.turns.length, size: data.length, compressed },
          'Run ended'
        );
      } catch (cause) {
        throw new StoreIOError(`end run ${runId}`, cause);
      }

      this.active.delete(runId);
      return sealed.metadata;
    });

    await this.notifyRunEnded(metadata);
    return structuredClone(metadata);
  }

  async endRunWithError(runId: string, error: unknown): Promise<RunMetadata> {
    return this.endRun(runId, RunStatus.FAILED, errorMessage(error));
  }

  /**
   * Full transcript. Active runs return an independent snapshot of the
   * in-memory record; ended runs are read from disk.
   */
  async load(runId: string): Promise<Transcript> {
    const live = this.active.get(runId);
    if (live) {
      return structuredClone(live);
    }

    const data = await readMaybeCompressed(getTranscriptPath(this.baseDir, runId));
    if (data === null) {
      throw new NotFoundError('transcript', runId);
    }
    return transcriptSchema.parse(JSON.parse(data.toString('utf-8')));
  }

  async loadMetadata(runId: string): Promise<RunMetadata> {
    const live = this.active.get(runId);
    if (live) {
      return structuredClone(live.metadata);
    }
    return readMetadata(this.baseDir, runId);
  }

  /**
   * Metadata of every run on disk matching the filter, newest first.
   * Runs whose metadata cannot be read are skipped.
   */
  async list(filter: ListFilter = {}): Promise<RunMetadata[]> {
    const runsDir = getRunsDir(this.baseDir);

    let entries;
    try {
      entries = await readdir(runsDir, { withFileTypes: true });
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return [];
      }
      throw error;
    }

    const results: RunMetadata[] = [];
    for (const entry of entries) {
      if (!entry.isDirectory() || entry.name.startsWith('.')) continue;

      let metadata: RunMetadata;
      try {
        metadata = await this.loadMetadata(entry.name);
      } catch (error) {
        log.warn({ runId: entry.name, error }, 'Skipping run with unreadable metadata');
        continue;
      }

      if (matchesFilter(metadata, filter)) {
        results.push(metadata);
      }
    }

    results.sort((a, b) => Date.parse(b.startedAt) - Date.parse(a.startedAt));

    if (filter.limit !== undefined && filter.limit > 0) {
      return results.slice(0, filter.limit);
    }
    return results;
  }

  /**
   * Forget an active run (if any) and remove its directory. Throws
   * NotFoundError when the run is neither active nor on disk.
   */
  async delete(runId: string): Promise<void> {
    await this.locks.runExclusive(runId, async () => {
      const runDir = getRunDir(this.baseDir, runId);
      const wasActive = this.active.delete(runId);
      if (!wasActive && !(await pathExists(runDir))) {
        throw new NotFoundError('run', runId);
      }
      await rm(runDir, { recursive: true, force: true });
      log.info({ runId }, 'Run deleted');
    });
  }

  listActive(): string[] {
    return [...this.active.keys()].sort();
  }

  isActive(runId: string): boolean {
    return this.active.has(runId);
  }

  async stats(filter: ListFilter = {}): Promise<RunStatistics> {
    return computeStatistics(await this.list(filter));
  }

  async findByTokenRange(range: TokenRange): Promise<RunMetadata[]> {
    const runs = await this.list();
    return runs.filter((run) => withinTokenRange(run, range));
  }

  async search(query: string, options?: SearchOptions): Promise<SearchResult[]> {
    return this.searcher.search(query, options);
  }

  private getActive(runId: string): Transcript {
    const transcript = this.active.get(runId);
    if (!transcript) {
      throw new RunNotStartedError(runId);
    }
    return transcript;
  }

  private async notifyRunEnded(metadata: RunMetadata): Promise<void> {
    if (!this.onRunEnded) return;
    try {
      await this.onRunEnded(structuredClone(metadata));
    } catch (error) {
      log.warn({ runId: metadata.runId, error }, 'Run ended hook failed');
    }
  }
}

function matchesFilter(metadata: RunMetadata, filter: ListFilter): boolean {
  if (filter.flowId !== undefined && metadata.flowId !== filter.flowId) return false;
  if (filter.status !== undefined && metadata.status !== filter.status) return false;

  const startedAt = Date.parse(metadata.startedAt);
  if (filter.after !== undefined && startedAt < filter.after.getTime()) return false;
  if (filter.before !== undefined && startedAt > filter.before.getTime()) return false;

  return true;
}

function withinTokenRange(run: RunMetadata, range: TokenRange): boolean {
  const { minIn = 0, maxIn = 0, minOut = 0, maxOut = 0 } = range;
  if (minIn > 0 && run.totalTokensIn < minIn) return false;
  if (maxIn > 0 && run.totalTokensIn > maxIn) return false;
  if (minOut > 0 && run.totalTokensOut < minOut) return false;
  if (maxOut > 0 && run.totalTokensOut > maxOut) return false;
  return true;
}

export function computeStatistics(runs: RunMetadata[]): RunStatistics {
  const stats: RunStatistics = {
    totalRuns: 0,
    completedRuns: 0,
    failedRuns: 0,
    canceledRuns: 0,
    activeRuns: 0,
    totalTokensIn: 0,
    totalTokensOut: 0,
    totalCost: 0,
    avgTokensIn: 0,
    avgTokensOut: 0,
    avgCost: 0,
  };

  for (const run of runs) {
    stats.totalRuns++;
    stats.totalTokensIn += run.totalTokensIn;
    stats.totalTokensOut += run.totalTokensOut;
    stats.totalCost += run.totalCost;

    switch (run.status) {
      case RunStatus.COMPLETED:
        stats.completedRuns++;
        break;
      case RunStatus.FAILED:
        stats.failedRuns++;
        break;
      case RunStatus.CANCELED:
        stats.canceledRuns++;
        break;
      case RunStatus.RUNNING:
        stats.activeRuns++;
        break;
    }
  }

  if (stats.totalRuns > 0) {
    stats.avgTokensIn = Math.trunc(stats.totalTokensIn / stats.totalRuns);
    stats.avgTokensOut = Math.trunc(stats.totalTokensOut / stats.totalRuns);
    stats.avgCost = stats.totalCost / stats.totalRuns;
  }

  return stats;
}
