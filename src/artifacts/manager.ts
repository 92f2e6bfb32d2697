import { readFile, rm, stat, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import type { ZodTypeAny, output } from 'zod';
import {
  StandardArtifact,
  DEFAULT_ARTIFACT_COMPRESS_ABOVE,
  type ArtifactInfo,
  type ArtifactManagerOptions,
} from '../types/artifact.js';
import {
  reviewResultSchema,
  testOutputSchema,
  lintOutputSchema,
  type ReviewResult,
  type TestOutput,
  type LintOutput,
} from '../types/reports.js';
import { InvalidNameError, NotFoundError, StoreIOError, hasErrorCode } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { listFilesRecursive } from '../utils/fs.js';
import { ensureDir, getArtifactsDir, getFilesDir, getRunDir, GZIP_SUFFIX } from './paths.js';
import { readMaybeCompressed, writeMaybeCompressed } from './json.js';
import { inferArtifactType } from './artifact-types.js';

const log = createLogger('artifacts');

/**
 * Per-run named blob storage.
 *
 * Artifacts live under `runs/<runId>/artifacts/`. Content larger than the
 * compression threshold is stored gzip-compressed as `<name>.gz`; loads are
 * transparent to the storage form.
 */
export class ArtifactManager {
  private readonly baseDir: string;
  private readonly compressAbove: number;

  constructor(options: ArtifactManagerOptions) {
    this.baseDir = options.baseDir;
    this.compressAbove = options.compressAbove ?? DEFAULT_ARTIFACT_COMPRESS_ABOVE;
  }

  /**
   * Create the run directory and its artifact sub-directory. Idempotent.
   */
  async ensureRunDir(runId: string): Promise<void> {
    await ensureDir(getArtifactsDir(this.baseDir, runId));
  }

  getRunDir(runId: string): string {
    return getRunDir(this.baseDir, runId);
  }

  async saveArtifact(runId: string, name: string, data: Buffer | string): Promise<void> {
    const path = this.artifactPath(runId, name);
    const bytes = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;

    try {
      const compressed = await writeMaybeCompressed(path, bytes, this.compressAbove);
      log.debug({ runId, name, size: bytes.length, compressed }, 'Saved artifact');
    } catch (error) {
      throw new StoreIOError(`save artifact ${runId}/${name}`, error);
    }
  }

  async loadArtifact(runId: string, name: string): Promise<Buffer> {
    const data = await readMaybeCompressed(this.artifactPath(runId, name));
    if (data === null) {
      throw new NotFoundError('artifact', `${runId}/${name}`);
    }
    return data;
  }

  /**
   * All artifacts of a run, sorted by name. Returns [] if the run has none.
   */
  async listArtifacts(runId: string): Promise<ArtifactInfo[]> {
    const dir = getArtifactsDir(this.baseDir, runId);
    const paths = await listFilesRecursive(dir);

    const infos: ArtifactInfo[] = [];
    for (const path of paths) {
      const compressed = path.endsWith(GZIP_SUFFIX);
      const name = compressed ? path.slice(0, -GZIP_SUFFIX.length) : path;
      const stats = await stat(join(dir, path));
      infos.push({
        name,
        size: stats.size,
        compressed,
        modifiedAt: stats.mtime,
        type: inferArtifactType(name),
      });
    }

    return infos.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  async hasArtifact(runId: string, name: string): Promise<boolean> {
    const info = await this.statArtifact(runId, name);
    return info !== null;
  }

  /**
   * Remove both storage forms of an artifact.
   * Throws NotFoundError if neither exists.
   */
  async deleteArtifact(runId: string, name: string): Promise<void> {
    const path = this.artifactPath(runId, name);
    if (!(await this.hasArtifact(runId, name))) {
      throw new NotFoundError('artifact', `${runId}/${name}`);
    }
    await rm(path + GZIP_SUFFIX, { force: true });
    await rm(path, { force: true });
    log.debug({ runId, name }, 'Deleted artifact');
  }

  async getArtifactInfo(runId: string, name: string): Promise<ArtifactInfo> {
    const info = await this.statArtifact(runId, name);
    if (!info) {
      throw new NotFoundError('artifact', `${runId}/${name}`);
    }
    return info;
  }

  // Files: uncompressed, with relative path structure preserved

  async saveFile(runId: string, relativePath: string, data: Buffer | string): Promise<void> {
    const path = resolveWithin(getFilesDir(this.baseDir, runId), relativePath);
    try {
      await ensureDir(dirname(path));
      await writeFile(path, data);
    } catch (error) {
      throw new StoreIOError(`save file ${runId}/${relativePath}`, error);
    }
    log.debug({ runId, path: relativePath }, 'Saved file');
  }

  async loadFile(runId: string, relativePath: string): Promise<Buffer> {
    const path = resolveWithin(getFilesDir(this.baseDir, runId), relativePath);
    try {
      return await readFile(path);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        throw new NotFoundError('file', `${runId}/${relativePath}`);
      }
      throw error;
    }
  }

  async listFiles(runId: string): Promise<string[]> {
    return listFilesRecursive(getFilesDir(this.baseDir, runId));
  }

  // Typed wrappers

  async saveSpec(runId: string, markdown: string): Promise<void> {
    await this.saveArtifact(runId, StandardArtifact.SPEC, markdown);
  }

  async loadSpec(runId: string): Promise<string> {
    return (await this.loadArtifact(runId, StandardArtifact.SPEC)).toString('utf-8');
  }

  async saveDiff(runId: string, diff: string): Promise<void> {
    await this.saveArtifact(runId, StandardArtifact.IMPLEMENTATION, diff);
  }

  async loadDiff(runId: string): Promise<string> {
    return (await this.loadArtifact(runId, StandardArtifact.IMPLEMENTATION)).toString('utf-8');
  }

  async saveReview(runId: string, review: ReviewResult): Promise<void> {
    await this.saveJSON(runId, StandardArtifact.REVIEW, review);
  }

  async loadReview(runId: string): Promise<ReviewResult> {
    return this.loadJSON(runId, StandardArtifact.REVIEW, reviewResultSchema);
  }

  async saveTestOutput(runId: string, output: TestOutput): Promise<void> {
    await this.saveJSON(runId, StandardArtifact.TEST_OUTPUT, output);
  }

  async loadTestOutput(runId: string): Promise<TestOutput> {
    return this.loadJSON(runId, StandardArtifact.TEST_OUTPUT, testOutputSchema);
  }

  async saveLintOutput(runId: string, output: LintOutput): Promise<void> {
    await this.saveJSON(runId, StandardArtifact.LINT_OUTPUT, output);
  }

  async loadLintOutput(runId: string): Promise<LintOutput> {
    return this.loadJSON(runId, StandardArtifact.LINT_OUTPUT, lintOutputSchema);
  }

  async saveJSON(runId: string, name: string, value: unknown): Promise<void> {
    await this.saveArtifact(runId, name, JSON.stringify(value, null, 2));
  }

  /**
   * Load and parse a JSON artifact. With a schema the parsed value is
   * validated (throws ZodError on mismatch); without one it is returned as unknown.
   */
  async loadJSON(runId: string, name: string): Promise<unknown>;
  async loadJSON<S extends ZodTypeAny>(runId: string, name: string, schema: S): Promise<output<S>>;
  async loadJSON(runId: string, name: string, schema?: ZodTypeAny): Promise<unknown> {
    const raw = await this.loadArtifact(runId, name);
    const parsed: unknown = JSON.parse(raw.toString('utf-8'));
    return schema ? schema.parse(parsed) : parsed;
  }

  private artifactPath(runId: string, name: string): string {
    return resolveWithin(getArtifactsDir(this.baseDir, runId), name);
  }

  private async statArtifact(runId: string, name: string): Promise<ArtifactInfo | null> {
    const path = this.artifactPath(runId, name);

    for (const [candidate, compressed] of [
      [path + GZIP_SUFFIX, true],
      [path, false],
    ] as const) {
      try {
        const stats = await stat(candidate);
        return {
          name,
          size: stats.size,
          compressed,
          modifiedAt: stats.mtime,
          type: inferArtifactType(name),
        };
      } catch (error) {
        if (!hasErrorCode(error, 'ENOENT')) {
          throw error;
        }
      }
    }

    return null;
  }
}

/**
 * Resolve a caller-supplied relative name beneath `root`, rejecting names
 * that are empty, absolute, or escape the root.
 */
function resolveWithin(root: string, name: string): string {
  if (name.length === 0 || isAbsolute(name)) {
    throw new InvalidNameError(name);
  }
  const target = resolve(root, name);
  const rel = relative(resolve(root), target);
  if (rel === '' || rel === '..' || rel.startsWith('..' + sep) || isAbsolute(rel)) {
    throw new InvalidNameError(name);
  }
  return target;
}
