import { access, readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import fg from 'fast-glob';
import { hasErrorCode } from '../errors.js';

/**
 * Total size in bytes of every regular file under `path`. A missing path has size 0.
 */
export async function getDirSize(path: string): Promise<number> {
  let size = 0;

  let entries;
  try {
    entries = await readdir(path, { withFileTypes: true });
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return 0;
    }
    throw error;
  }

  for (const entry of entries) {
    const entryPath = join(path, entry.name);

    if (entry.isDirectory()) {
      size += await getDirSize(entryPath);
    } else if (entry.isFile()) {
      const stats = await stat(entryPath);
      size += stats.size;
    }
  }

  return size;
}

/**
 * Relative (forward-slash) paths of every regular file under `root`, sorted.
 * Returns [] when `root` does not exist.
 */
export async function listFilesRecursive(root: string): Promise<string[]> {
  if (!(await pathExists(root))) {
    return [];
  }
  const files = await fg('**/*', {
    cwd: root,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
  });
  return files.sort();
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return false;
    }
    throw error;
  }
}
