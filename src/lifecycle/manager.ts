import { mkdir, readdir, rename, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { Dirent } from 'node:fs';
import {
  DEFAULT_RETENTION_POLICY,
  RunDisposition,
  retentionPolicySchema,
  type CleanupResult,
  type DiskUsage,
  type LifecycleManagerOptions,
  type RetentionPolicy,
} from '../types/lifecycle.js';
import {
  AlreadyExistsError,
  InvalidArchiveError,
  NotFoundError,
  errorMessage,
  hasErrorCode,
} from '../errors.js';
import {
  ARCHIVE_SUFFIX,
  getArchivePath,
  getArchiveRoot,
  getRunDir,
  getRunsDir,
} from '../artifacts/paths.js';
import { getEndTime, readRetentionFields } from '../transcript/metadata.js';
import { createTempDir, removeTempDir } from '../utils/temp.js';
import { getDirSize, pathExists } from '../utils/fs.js';
import { createLogger } from '../utils/logger.js';
import { createArchive, extractArchive } from './archive.js';
import {
  classifyRun,
  computeThresholds,
  estimateSpaceSaved,
  sortOldestFirst,
  type RetentionCandidate,
} from './retention.js';

const log = createLogger('lifecycle');

const DAY_MS = 24 * 60 * 60 * 1000;

function emptyResult(): CleanupResult {
  return {
    archived: [],
    deleted: [],
    kept: [],
    errors: [],
    spaceSaved: 0,
    archiveBytesWritten: 0,
  };
}

interface ArchiveFile {
  runId: string;
  path: string;
}

/**
 * Applies the retention policy to run directories and manages the archive
 * tree. Holds no in-process state; passes against the same base directory
 * must be serialized by the caller.
 */
export class LifecycleManager {
  private readonly baseDir: string;
  private readonly policy: RetentionPolicy;
  private readonly now: () => Date;

  constructor(options: LifecycleManagerOptions) {
    this.baseDir = options.baseDir;
    this.policy = retentionPolicySchema.parse({ ...DEFAULT_RETENTION_POLICY, ...options.policy });
    this.now = options.now ?? (() => new Date());
  }

  getPolicy(): RetentionPolicy {
    return { ...this.policy };
  }

  /**
   * One retention pass over every run directory. Per-run failures are
   * collected in `errors` and leave that run untouched.
   */
  async cleanup(dryRun = false): Promise<CleanupResult> {
    const result = emptyResult();
    const runsDir = getRunsDir(this.baseDir);

    const entries = await readDirOrEmpty(runsDir);
    const candidates: RetentionCandidate[] = [];

    for (const entry of entries) {
      if (!entry.isDirectory() || entry.name.startsWith('.')) continue;
      const runId = entry.name;

      try {
        const fields = await readRetentionFields(this.baseDir, runId);
        const size = await getDirSize(join(runsDir, runId));
        candidates.push({ runId, status: fields.status, endedAt: getEndTime(fields), size });
      } catch (error) {
        result.errors.push(`load ${runId}: ${errorMessage(error)}`);
        log.warn({ runId, error }, 'Failed to load run metadata');
      }
    }

    const now = this.now();
    const thresholds = computeThresholds(this.policy, now);
    const runs = sortOldestFirst(candidates);
    let removed = 0;

    for (const run of runs) {
      const decision = classifyRun(run, this.policy, thresholds, runs.length - removed - 1);

      switch (decision.disposition) {
        case RunDisposition.KEEP:
          result.kept.push(run.runId);
          continue;

        case RunDisposition.DELETE:
          if (!dryRun) {
            try {
              await rm(getRunDir(this.baseDir, run.runId), { recursive: true });
            } catch (error) {
              result.errors.push(`delete ${run.runId}: ${errorMessage(error)}`);
              log.warn({ runId: run.runId, error }, 'Failed to delete run');
              continue;
            }
          }
          result.deleted.push(run.runId);
          break;

        case RunDisposition.ARCHIVE:
          if (!dryRun) {
            try {
              result.archiveBytesWritten += await this.archiveRun(run.runId);
            } catch (error) {
              result.errors.push(`archive ${run.runId}: ${errorMessage(error)}`);
              log.warn({ runId: run.runId, error }, 'Failed to archive run');
              continue;
            }
          }
          result.archived.push(run.runId);
          break;
      }

      result.spaceSaved += estimateSpaceSaved(decision.disposition, run.size);
      removed++;
      log.debug({ runId: run.runId, ...decision, dryRun }, 'Run retention applied');
    }

    log.info(
      {
        dryRun,
        archived: result.archived.length,
        deleted: result.deleted.length,
        kept: result.kept.length,
        errors: result.errors.length,
        spaceSaved: result.spaceSaved,
      },
      'Cleanup pass complete'
    );

    return result;
  }

  /**
   * Replace a run directory with `archive/<YYYY-MM>/<runId>.tar.gz`.
   * The directory is removed only after the archive is fully written.
   * Returns the archive size.
   */
  async archiveRun(runId: string): Promise<number> {
    const runDir = getRunDir(this.baseDir, runId);
    if (!(await pathExists(runDir))) {
      throw new NotFoundError('run', runId);
    }

    const archivePath = getArchivePath(this.baseDir, runId, this.now());
    const size = await createArchive(runDir, runId, archivePath);
    await rm(runDir, { recursive: true, force: true });

    log.info({ runId, archivePath, size }, 'Run archived');
    return size;
  }

  /**
   * Extract an archived run back into `runs/<runId>`. Extraction happens in
   * a temporary directory that is renamed into place on success; the
   * archive is then removed.
   */
  async restoreArchive(runId: string): Promise<void> {
    const archivePath = await this.findArchive(runId);
    if (!archivePath) {
      throw new NotFoundError('archive', runId);
    }

    const runDir = getRunDir(this.baseDir, runId);
    if (await pathExists(runDir)) {
      throw new AlreadyExistsError('run', runId);
    }

    const tmpDir = await createTempDir(this.baseDir, 'restore');
    try {
      const files = await extractArchive(archivePath, tmpDir);
      const extracted = join(tmpDir, runId);
      if (!(await pathExists(extracted))) {
        throw new InvalidArchiveError(archivePath, `no ${runId}/ root directory`);
      }

      await mkdir(getRunsDir(this.baseDir), { recursive: true });
      await rename(extracted, runDir);
      await rm(archivePath, { force: true });
      log.info({ runId, archivePath, files }, 'Archive restored');
    } finally {
      await removeTempDir(this.baseDir, tmpDir);
    }
  }

  /**
   * Run ids of every archive in the tree, sorted.
   */
  async listArchives(): Promise<string[]> {
    const archives = await this.scanArchives();
    return archives.map((a) => a.runId).sort();
  }

  async deleteArchive(runId: string): Promise<void> {
    const archivePath = await this.findArchive(runId);
    if (!archivePath) {
      throw new NotFoundError('archive', runId);
    }
    await rm(archivePath);
    log.info({ runId, archivePath }, 'Archive deleted');
  }

  async getArchiveSize(runId: string): Promise<number> {
    const archivePath = await this.findArchive(runId);
    if (!archivePath) {
      throw new NotFoundError('archive', runId);
    }
    return (await stat(archivePath)).size;
  }

  /**
   * Delete archives whose file modification time is older than the
   * archive retention period.
   */
  async cleanupArchives(dryRun = false): Promise<CleanupResult> {
    const result = emptyResult();
    const threshold = this.now().getTime() - this.policy.archiveRetentionDays * DAY_MS;

    for (const archive of await this.scanArchives()) {
      try {
        const stats = await stat(archive.path);
        if (stats.mtimeMs > threshold) {
          result.kept.push(archive.runId);
          continue;
        }
        if (!dryRun) {
          await rm(archive.path);
        }
        result.deleted.push(archive.runId);
        result.spaceSaved += stats.size;
      } catch (error) {
        result.errors.push(`delete archive ${archive.runId}: ${errorMessage(error)}`);
        log.warn({ runId: archive.runId, error }, 'Failed to clean up archive');
      }
    }

    log.info(
      { dryRun, deleted: result.deleted.length, kept: result.kept.length, errors: result.errors.length },
      'Archive cleanup pass complete'
    );
    return result;
  }

  async diskUsage(): Promise<DiskUsage> {
    const runsDir = getRunsDir(this.baseDir);
    let runCount = 0;
    let activeSize = 0;

    for (const entry of await readDirOrEmpty(runsDir)) {
      if (!entry.isDirectory() || entry.name.startsWith('.')) continue;
      runCount++;
      activeSize += await getDirSize(join(runsDir, entry.name));
    }

    let archiveCount = 0;
    let archiveSize = 0;
    for (const archive of await this.scanArchives()) {
      archiveCount++;
      archiveSize += (await stat(archive.path)).size;
    }

    return {
      runCount,
      archiveCount,
      activeSize,
      archiveSize,
      totalSize: activeSize + archiveSize,
    };
  }

  /**
   * Expected month-bucket path first, then a scan of the whole tree.
   */
  private async findArchive(runId: string): Promise<string | null> {
    const expected = getArchivePath(this.baseDir, runId, this.now());
    if (await pathExists(expected)) {
      return expected;
    }
    const found = (await this.scanArchives()).find((a) => a.runId === runId);
    return found?.path ?? null;
  }

  private async scanArchives(): Promise<ArchiveFile[]> {
    const archives: ArchiveFile[] = [];

    const walk = async (dir: string): Promise<void> => {
      for (const entry of await readDirOrEmpty(dir)) {
        const path = join(dir, entry.name);
        if (entry.isDirectory()) {
          await walk(path);
        } else if (entry.isFile() && entry.name.endsWith(ARCHIVE_SUFFIX)) {
          archives.push({ runId: entry.name.slice(0, -ARCHIVE_SUFFIX.length), path });
        }
      }
    };

    await walk(getArchiveRoot(this.baseDir));
    return archives;
  }
}

async function readDirOrEmpty(dir: string): Promise<Dirent[]> {
  try {
    return await readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return [];
    }
    throw error;
  }
}
