import { join } from 'node:path';
import { mkdir } from 'node:fs/promises';

/**
 * On-disk layout, rooted at a configurable base directory:
 *
 *   <base>/runs/<runId>/metadata.json
 *   <base>/runs/<runId>/transcript.json[.gz]
 *   <base>/runs/<runId>/artifacts/<name>[.gz]
 *   <base>/runs/<runId>/files/<relative-path>
 *   <base>/archive/<YYYY-MM>/<runId>.tar.gz
 *   <base>/tmp/
 */

export const METADATA_FILE = 'metadata.json';
export const TRANSCRIPT_FILE = 'transcript.json';
export const GZIP_SUFFIX = '.gz';
export const ARCHIVE_SUFFIX = '.tar.gz';

export function getRunsDir(baseDir: string): string {
  return join(baseDir, 'runs');
}

export function getArchiveRoot(baseDir: string): string {
  return join(baseDir, 'archive');
}

export function getTmpDir(baseDir: string): string {
  return join(baseDir, 'tmp');
}

// Run paths
export function getRunDir(baseDir: string, runId: string): string {
  return join(getRunsDir(baseDir), runId);
}

export function getRunMetadataPath(baseDir: string, runId: string): string {
  return join(getRunDir(baseDir, runId), METADATA_FILE);
}

export function getTranscriptPath(baseDir: string, runId: string): string {
  return join(getRunDir(baseDir, runId), TRANSCRIPT_FILE);
}

export function getArtifactsDir(baseDir: string, runId: string): string {
  return join(getRunDir(baseDir, runId), 'artifacts');
}

export function getFilesDir(baseDir: string, runId: string): string {
  return join(getRunDir(baseDir, runId), 'files');
}

// Archive paths

/**
 * Month bucket for a run's archive: the `YYYY-MM` prefix of the run id,
 * or the current month when the id is too short to carry a date.
 */
export function getArchiveMonth(runId: string, now: Date = new Date()): string {
  if (runId.length >= 7) {
    return runId.slice(0, 7);
  }
  const month = String(now.getUTCMonth() + 1).padStart(2, '0');
  return `${now.getUTCFullYear()}-${month}`;
}

export function getArchivePath(baseDir: string, runId: string, now?: Date): string {
  return join(getArchiveRoot(baseDir), getArchiveMonth(runId, now), `${runId}${ARCHIVE_SUFFIX}`);
}

export async function ensureDir(path: string): Promise<void> {
  await mkdir(path, { recursive: true });
}
