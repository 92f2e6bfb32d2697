import { createReadStream, createWriteStream } from 'node:fs';
import { chmod, lstat, mkdir, rename, rm, stat, utimes } from 'node:fs/promises';
import { dirname, join, posix, resolve, sep } from 'node:path';
import type { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { createGunzip, createGzip } from 'node:zlib';
import fg from 'fast-glob';
import { extract, pack, type Headers } from 'tar-stream';
import { InvalidArchiveError, RunStoreError, getErrorCode } from '../errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('archive');

export const PARTIAL_SUFFIX = '.partial';

type Packer = ReturnType<typeof pack>;

interface PendingEntry {
  header: Headers;
  /** Absolute path of a regular file whose contents follow the header */
  source?: string;
}

/**
 * Headers for `sourceDir` and everything below it, parents before children.
 * File contents are not read here; they are streamed while packing.
 */
async function collectEntries(sourceDir: string, rootName: string): Promise<PendingEntry[]> {
  const rootStats = await stat(sourceDir);
  const entries: PendingEntry[] = [
    {
      header: {
        name: rootName,
        type: 'directory',
        mode: rootStats.mode & 0o7777,
        mtime: rootStats.mtime,
      },
    },
  ];

  const found = await fg('**', {
    cwd: sourceDir,
    dot: true,
    onlyFiles: false,
    stats: true,
    followSymbolicLinks: false,
  });
  found.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

  for (const entry of found) {
    const path = join(sourceDir, entry.path);
    const name = posix.join(rootName, entry.path);
    const stats = entry.stats ?? (await lstat(path));

    if (stats.isDirectory()) {
      entries.push({
        header: { name, type: 'directory', mode: stats.mode & 0o7777, mtime: stats.mtime },
      });
    } else if (stats.isFile()) {
      entries.push({
        header: {
          name,
          type: 'file',
          size: stats.size,
          mode: stats.mode & 0o7777,
          mtime: stats.mtime,
        },
        source: path,
      });
    } else {
      log.warn({ path }, 'Skipping non-regular file');
    }
  }

  return entries;
}

function packEntry(packer: Packer, entry: PendingEntry): Promise<void> {
  return new Promise((resolve, reject) => {
    const sink = packer.entry(entry.header, (error) => (error ? reject(error) : resolve()));
    if (entry.source !== undefined) {
      const source = createReadStream(entry.source);
      source.on('error', (error) => {
        sink.destroy(error);
        reject(error);
      });
      source.pipe(sink);
    }
  });
}

async function packEntries(packer: Packer, entries: PendingEntry[]): Promise<void> {
  try {
    for (const entry of entries) {
      await packEntry(packer, entry);
    }
    packer.finalize();
  } catch (error) {
    packer.destroy(error instanceof Error ? error : new Error(String(error)));
    throw error;
  }
}

/**
 * Write `sourceDir` as a gzip-compressed tar at `archivePath`, every entry
 * prefixed by `<rootName>/`. Files are streamed one at a time.
 *
 * The stream goes to `<archivePath>.partial` and is renamed into place once
 * complete, so a failed write never leaves a readable archive behind.
 * Returns the size of the written archive.
 */
export async function createArchive(
  sourceDir: string,
  rootName: string,
  archivePath: string
): Promise<number> {
  const entries = await collectEntries(sourceDir, rootName);
  const partialPath = archivePath + PARTIAL_SUFFIX;

  await mkdir(dirname(archivePath), { recursive: true });

  const packer = pack();
  const results = await Promise.allSettled([
    packEntries(packer, entries),
    pipeline(packer, createGzip(), createWriteStream(partialPath)),
  ]);
  const failure = results.find(
    (result): result is PromiseRejectedResult => result.status === 'rejected'
  );

  try {
    if (failure) {
      throw failure.reason;
    }
    await rename(partialPath, archivePath);
  } catch (error) {
    await rm(partialPath, { force: true });
    throw error;
  }

  const { size } = await stat(archivePath);
  log.debug({ archivePath, entries: entries.length, size }, 'Archive written');
  return size;
}

function isWithin(root: string, target: string): boolean {
  return target === root || target.startsWith(root + sep);
}

function isCorruptStreamError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (getErrorCode(error)?.startsWith('Z_')) return true;
  return /tar|unexpected end/i.test(error.message);
}

/**
 * Extract a gzip-compressed tar into `destDir`.
 *
 * Every entry must resolve inside `destDir`; the first one that does not
 * aborts extraction with InvalidArchiveError. Regular files get their
 * recorded permission bits and modification time. Other entry types
 * (links, devices) are skipped. Returns the number of files written.
 */
export async function extractArchive(archivePath: string, destDir: string): Promise<number> {
  const root = resolve(destDir);
  let files = 0;

  async function writeEntry(header: Headers, stream: Readable): Promise<void> {
    const target = resolve(root, header.name);
    if (!isWithin(root, target)) {
      stream.resume();
      throw new InvalidArchiveError(archivePath, 'entry escapes destination', header.name);
    }

    switch (header.type ?? 'file') {
      case 'directory':
        stream.resume();
        await mkdir(target, { recursive: true });
        return;
      case 'file': {
        const mode = (header.mode ?? 0o644) & 0o7777;
        await mkdir(dirname(target), { recursive: true });
        await pipeline(stream, createWriteStream(target, { mode }));
        await chmod(target, mode);
        if (header.mtime) {
          await utimes(target, header.mtime, header.mtime);
        }
        files++;
        return;
      }
      default:
        stream.resume();
        log.warn({ archivePath, entry: header.name, type: header.type }, 'Skipping unsupported entry');
    }
  }

  const extractor = extract();
  extractor.on('entry', (header, stream, next) => {
    writeEntry(header, stream).then(
      () => next(),
      (error: unknown) => next(error instanceof Error ? error : new Error(String(error)))
    );
  });

  try {
    await pipeline(createReadStream(archivePath), createGunzip(), extractor);
  } catch (error) {
    if (error instanceof RunStoreError) throw error;
    if (isCorruptStreamError(error)) {
      throw new InvalidArchiveError(
        archivePath,
        error instanceof Error ? error.message : String(error)
      );
    }
    throw error;
  }

  return files;
}
