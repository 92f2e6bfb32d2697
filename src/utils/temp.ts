import { mkdir, rm } from 'node:fs/promises';
import { join, resolve, sep } from 'node:path';
import { nanoid } from 'nanoid';
import { getTmpDir } from '../artifacts/paths.js';
import { createLogger } from './logger.js';

const log = createLogger('temp');

export async function createTempDir(baseDir: string, prefix: string): Promise<string> {
  const tmpRoot = getTmpDir(baseDir);
  await mkdir(tmpRoot, { recursive: true });

  const dirPath = join(tmpRoot, `${prefix}-${nanoid(8)}`);
  await mkdir(dirPath, { recursive: true });

  log.debug({ dirPath }, 'Created temp directory');
  return dirPath;
}

export async function removeTempDir(baseDir: string, path: string): Promise<void> {
  const tmpRoot = resolve(getTmpDir(baseDir));

  // Only ever remove directories under <base>/tmp
  if (!resolve(path).startsWith(tmpRoot + sep)) {
    throw new Error(`Refusing to remove directory outside tmp: ${path}`);
  }

  try {
    await rm(path, { recursive: true, force: true });
    log.debug({ path }, 'Removed temp directory');
  } catch (error) {
    log.warn({ path, error }, 'Failed to remove temp directory');
  }
}
