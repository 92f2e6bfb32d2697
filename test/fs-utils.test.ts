/**
 * Filesystem Helper Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, symlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { getDirSize, listFilesRecursive, pathExists } from '../src/utils/fs.js';
import { createTempBase, removeTempBase } from './helpers/temp-base.js';

describe('fs helpers', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempBase();
  });

  afterEach(async () => {
    await removeTempBase(root);
  });

  describe('listFilesRecursive', () => {
    it('should list nested and hidden files in sorted order', async () => {
      await mkdir(join(root, 'src', 'lib'), { recursive: true });
      await mkdir(join(root, 'empty'));
      await writeFile(join(root, 'src', 'lib', 'b.ts'), 'b');
      await writeFile(join(root, 'src', 'a.ts'), 'a');
      await writeFile(join(root, '.env'), 'X=1');
      await writeFile(join(root, 'README.md'), '#');

      expect(await listFilesRecursive(root)).toEqual([
        '.env',
        'README.md',
        'src/a.ts',
        'src/lib/b.ts',
      ]);
    });

    it('should not follow or list symbolic links', async () => {
      await mkdir(join(root, 'real'));
      await writeFile(join(root, 'real', 'file.txt'), 'x');
      await symlink(join(root, 'real'), join(root, 'linked-dir'));
      await symlink(join(root, 'real', 'file.txt'), join(root, 'linked-file.txt'));

      expect(await listFilesRecursive(root)).toEqual(['real/file.txt']);
    });

    it('should return an empty list for a missing root', async () => {
      expect(await listFilesRecursive(join(root, 'missing'))).toEqual([]);
    });
  });

  describe('getDirSize', () => {
    it('should sum regular file sizes', async () => {
      await mkdir(join(root, 'nested'));
      await writeFile(join(root, 'one.txt'), '12345');
      await writeFile(join(root, 'nested', 'two.txt'), '123');

      expect(await getDirSize(root)).toBe(8);
      expect(await getDirSize(join(root, 'missing'))).toBe(0);
    });
  });

  it('should report whether a path exists', async () => {
    expect(await pathExists(root)).toBe(true);
    expect(await pathExists(join(root, 'missing'))).toBe(false);
  });
});
