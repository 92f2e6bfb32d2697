import { readFile, writeFile, rm } from 'node:fs/promises';
import { dirname } from 'node:path';
import { promisify } from 'node:util';
import { gzip, gunzip } from 'node:zlib';
import { ensureDir, GZIP_SUFFIX } from './paths.js';
import { hasErrorCode } from '../errors.js';

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

export async function writeJson<T>(path: string, data: T): Promise<void> {
  await ensureDir(dirname(path));
  const content = JSON.stringify(data, null, 2);
  await writeFile(path, content, 'utf-8');
}

/**
 * Write `data` at `path`, or gzip-compressed at `path.gz` when it is larger
 * than `compressAbove` bytes. The sibling in the other form is removed so at
 * most one physical file exists per logical name.
 *
 * Returns true when the compressed form was written.
 */
export async function writeMaybeCompressed(
  path: string,
  data: Buffer,
  compressAbove: number
): Promise<boolean> {
  await ensureDir(dirname(path));
  const gzPath = path + GZIP_SUFFIX;

  if (data.length > compressAbove) {
    await writeFile(gzPath, await gzipAsync(data));
    await rm(path, { force: true });
    return true;
  }

  await writeFile(path, data);
  await rm(gzPath, { force: true });
  return false;
}

/**
 * Read the content stored at `path`, preferring the compressed `path.gz`
 * form. Returns null when neither form exists.
 */
export async function readMaybeCompressed(path: string): Promise<Buffer | null> {
  try {
    const compressed = await readFile(path + GZIP_SUFFIX);
    return await gunzipAsync(compressed);
  } catch (error) {
    if (!hasErrorCode(error, 'ENOENT')) {
      throw error;
    }
  }

  try {
    return await readFile(path);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return null;
    }
    throw error;
  }
}
