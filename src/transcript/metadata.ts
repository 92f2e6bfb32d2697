import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { runMetadataSchema, runStatusSchema, type RunMetadata } from '../types/run.js';
import { getRunMetadataPath } from '../artifacts/paths.js';
import { writeJson } from '../artifacts/json.js';
import { NotFoundError, hasErrorCode } from '../errors.js';

/**
 * The fields retention decisions depend on. Everything else in the record
 * is ignored, so metadata written by other tools still classifies.
 */
export const retentionFieldsSchema = z
  .object({
    status: runStatusSchema,
    startedAt: z.string().optional(),
    endedAt: z.string().optional(),
  })
  .passthrough();

export type RetentionFields = z.infer<typeof retentionFieldsSchema>;

async function readMetadataFile(baseDir: string, runId: string): Promise<unknown> {
  try {
    const content = await readFile(getRunMetadataPath(baseDir, runId), 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      throw new NotFoundError('run', runId);
    }
    throw error;
  }
}

/**
 * Read and validate a run's metadata.json.
 * Throws NotFoundError when the file is absent and ZodError when it is malformed.
 */
export async function readMetadata(baseDir: string, runId: string): Promise<RunMetadata> {
  return runMetadataSchema.parse(await readMetadataFile(baseDir, runId));
}

export async function readRetentionFields(
  baseDir: string,
  runId: string
): Promise<RetentionFields> {
  return retentionFieldsSchema.parse(await readMetadataFile(baseDir, runId));
}

export async function writeMetadata(baseDir: string, metadata: RunMetadata): Promise<void> {
  await writeJson(getRunMetadataPath(baseDir, metadata.runId), metadata);
}

/**
 * Point in time a run's age is measured from: `endedAt`, else `startedAt`
 * for records that never got an end time, else the epoch.
 */
export function getEndTime(fields: RetentionFields): Date {
  for (const value of [fields.endedAt, fields.startedAt]) {
    if (value !== undefined) {
      const time = new Date(value);
      if (!Number.isNaN(time.getTime())) {
        return time;
      }
    }
  }
  return new Date(0);
}
