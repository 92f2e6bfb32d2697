/**
 * Artifact Manager Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { access, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { randomBytes } from 'node:crypto';
import { ArtifactManager } from '../src/artifacts/manager.js';
import { getArtifactsDir, getFilesDir } from '../src/artifacts/paths.js';
import { ArtifactType } from '../src/types/artifact.js';
import { InvalidNameError, NotFoundError } from '../src/errors.js';
import type { ReviewResult, TestOutput, LintOutput } from '../src/types/reports.js';
import { createTempBase, removeTempBase } from './helpers/temp-base.js';

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

describe('ArtifactManager', () => {
  const runId = '2026-03-01-build-abc12345';
  let baseDir: string;
  let manager: ArtifactManager;

  beforeEach(async () => {
    baseDir = await createTempBase();
    manager = new ArtifactManager({ baseDir });
  });

  afterEach(async () => {
    await removeTempBase(baseDir);
  });

  describe('ensureRunDir', () => {
    it('should create the artifacts directory and be idempotent', async () => {
      await manager.ensureRunDir(runId);
      await manager.ensureRunDir(runId);

      const stats = await stat(getArtifactsDir(baseDir, runId));
      expect(stats.isDirectory()).toBe(true);
    });
  });

  describe('save and load', () => {
    it('should store small payloads verbatim', async () => {
      const content = Buffer.alloc(800, 'a');
      await manager.saveArtifact(runId, 'spec.md', content);

      const dir = getArtifactsDir(baseDir, runId);
      expect(await exists(join(dir, 'spec.md'))).toBe(true);
      expect(await exists(join(dir, 'spec.md.gz'))).toBe(false);
      expect(await manager.loadArtifact(runId, 'spec.md')).toEqual(content);
    });

    it('should compress payloads above the threshold', async () => {
      const content = Buffer.alloc(20 * 1024, 'x');
      await manager.saveArtifact(runId, 'big.log', content);

      const dir = getArtifactsDir(baseDir, runId);
      expect(await exists(join(dir, 'big.log.gz'))).toBe(true);
      expect(await exists(join(dir, 'big.log'))).toBe(false);

      const gzStats = await stat(join(dir, 'big.log.gz'));
      expect(gzStats.size).toBeLessThan(content.length);
      expect(await manager.loadArtifact(runId, 'big.log')).toEqual(content);
    });

    it('should round-trip incompressible binary data', async () => {
      const content = randomBytes(16 * 1024);
      await manager.saveArtifact(runId, 'blob.bin', content);

      expect(await manager.loadArtifact(runId, 'blob.bin')).toEqual(content);
    });

    it('should treat exactly the threshold size as uncompressed', async () => {
      const small = new ArtifactManager({ baseDir, compressAbove: 10 });
      await small.saveArtifact(runId, 'edge.txt', Buffer.alloc(10, 'e'));

      const info = await small.getArtifactInfo(runId, 'edge.txt');
      expect(info.compressed).toBe(false);
    });

    it('should keep at most one physical form per name', async () => {
      const dir = getArtifactsDir(baseDir, runId);

      await manager.saveArtifact(runId, 'out.txt', Buffer.alloc(20 * 1024, 'y'));
      expect(await exists(join(dir, 'out.txt.gz'))).toBe(true);

      await manager.saveArtifact(runId, 'out.txt', 'short');
      expect(await exists(join(dir, 'out.txt'))).toBe(true);
      expect(await exists(join(dir, 'out.txt.gz'))).toBe(false);

      await manager.saveArtifact(runId, 'out.txt', Buffer.alloc(30 * 1024, 'z'));
      expect(await exists(join(dir, 'out.txt.gz'))).toBe(true);
      expect(await exists(join(dir, 'out.txt'))).toBe(false);

      expect(await manager.loadArtifact(runId, 'out.txt')).toEqual(Buffer.alloc(30 * 1024, 'z'));
    });

    it('should accept string content', async () => {
      await manager.saveArtifact(runId, 'notes.txt', 'hello world');

      const data = await manager.loadArtifact(runId, 'notes.txt');
      expect(data.toString('utf-8')).toBe('hello world');
    });

    it('should support names with sub-directories', async () => {
      await manager.saveArtifact(runId, 'reports/coverage.json', '{}');

      expect(await exists(join(getArtifactsDir(baseDir, runId), 'reports', 'coverage.json'))).toBe(
        true
      );
      expect((await manager.loadArtifact(runId, 'reports/coverage.json')).toString()).toBe('{}');
    });

    it('should throw NotFoundError for a missing artifact', async () => {
      await expect(manager.loadArtifact(runId, 'missing.md')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should reject names that escape the artifacts directory', async () => {
      await expect(manager.saveArtifact(runId, '../metadata.json', 'x')).rejects.toBeInstanceOf(
        InvalidNameError
      );
      await expect(manager.loadArtifact(runId, 'a/../../x')).rejects.toBeInstanceOf(
        InvalidNameError
      );
      await expect(manager.saveArtifact(runId, '', 'x')).rejects.toBeInstanceOf(InvalidNameError);
    });
  });

  describe('listing and metadata', () => {
    it('should list artifacts sorted by name with the suffix stripped', async () => {
      await manager.saveArtifact(runId, 'review.json', '{}');
      await manager.saveArtifact(runId, 'big.log', Buffer.alloc(20 * 1024, 'x'));
      await manager.saveArtifact(runId, 'spec.md', '# Spec');

      const list = await manager.listArtifacts(runId);

      expect(list.map((a) => a.name)).toEqual(['big.log', 'review.json', 'spec.md']);
      expect(list.map((a) => a.type)).toEqual([
        ArtifactType.TEXT,
        ArtifactType.JSON,
        ArtifactType.SPECIFICATION,
      ]);
      expect(list[0]?.compressed).toBe(true);
      expect(list[2]?.size).toBe(6);
    });

    it('should return an empty list for an unknown run', async () => {
      expect(await manager.listArtifacts('no-such-run')).toEqual([]);
    });

    it('should report existence and info in either form', async () => {
      await manager.saveArtifact(runId, 'big.log', Buffer.alloc(20 * 1024, 'x'));

      expect(await manager.hasArtifact(runId, 'big.log')).toBe(true);
      expect(await manager.hasArtifact(runId, 'other.log')).toBe(false);

      const info = await manager.getArtifactInfo(runId, 'big.log');
      expect(info.name).toBe('big.log');
      expect(info.compressed).toBe(true);
      expect(info.type).toBe(ArtifactType.TEXT);
      expect(info.modifiedAt).toBeInstanceOf(Date);
    });

    it('should delete both storage forms', async () => {
      await manager.saveArtifact(runId, 'big.log', Buffer.alloc(20 * 1024, 'x'));
      await manager.deleteArtifact(runId, 'big.log');

      expect(await manager.hasArtifact(runId, 'big.log')).toBe(false);
      await expect(manager.deleteArtifact(runId, 'big.log')).rejects.toBeInstanceOf(NotFoundError);
      await expect(manager.getArtifactInfo(runId, 'big.log')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('files', () => {
    it('should save and load files with relative paths', async () => {
      await manager.saveFile(runId, 'src/main.ts', 'export {};\n');
      await manager.saveFile(runId, 'README.md', '# Readme\n');

      expect(await exists(join(getFilesDir(baseDir, runId), 'src', 'main.ts'))).toBe(true);
      expect((await manager.loadFile(runId, 'src/main.ts')).toString()).toBe('export {};\n');
      expect(await manager.listFiles(runId)).toEqual(['README.md', 'src/main.ts']);
    });

    it('should never compress files', async () => {
      const content = Buffer.alloc(20 * 1024, 'f');
      await manager.saveFile(runId, 'large.txt', content);

      expect(await exists(join(getFilesDir(baseDir, runId), 'large.txt'))).toBe(true);
      expect(await manager.loadFile(runId, 'large.txt')).toEqual(content);
    });

    it('should throw NotFoundError for a missing file', async () => {
      await expect(manager.loadFile(runId, 'nope.ts')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should return an empty file list for an unknown run', async () => {
      expect(await manager.listFiles(runId)).toEqual([]);
    });
  });

  describe('typed wrappers', () => {
    it('should round-trip spec and diff text', async () => {
      await manager.saveSpec(runId, '# Feature\n\nDetails');
      await manager.saveDiff(runId, '--- a/x\n+++ b/x\n');

      expect(await manager.loadSpec(runId)).toBe('# Feature\n\nDetails');
      expect(await manager.loadDiff(runId)).toBe('--- a/x\n+++ b/x\n');
      expect((await manager.listArtifacts(runId)).map((a) => a.name)).toEqual([
        'implementation.diff',
        'spec.md',
      ]);
    });

    it('should round-trip a review', async () => {
      const review: ReviewResult = {
        approved: false,
        verdict: 'REQUEST_CHANGES',
        summary: 'One issue found',
        findings: [
          {
            file: 'src/app.ts',
            line: 12,
            severity: 'error',
            category: 'logic',
            message: 'Off by one',
          },
        ],
      };

      await manager.saveReview(runId, review);
      expect(await manager.loadReview(runId)).toEqual(review);
    });

    it('should round-trip test and lint output', async () => {
      const testOutput: TestOutput = {
        passed: true,
        totalTests: 4,
        passedTests: 4,
        failedTests: 0,
        skippedTests: 0,
        duration: '1.2s',
      };
      const lintOutput: LintOutput = {
        passed: true,
        tool: 'eslint',
        summary: { totalIssues: 0, errors: 0, warnings: 0, fixableCount: 0, filesChecked: 3 },
      };

      await manager.saveTestOutput(runId, testOutput);
      await manager.saveLintOutput(runId, lintOutput);

      expect(await manager.loadTestOutput(runId)).toEqual(testOutput);
      expect(await manager.loadLintOutput(runId)).toEqual(lintOutput);
    });

    it('should reject a stored payload that does not match the schema', async () => {
      await manager.saveJSON(runId, 'review.json', { approved: 'yes' });

      await expect(manager.loadReview(runId)).rejects.toThrow();
    });

    it('should load generic JSON without a schema', async () => {
      await manager.saveJSON(runId, 'data.json', { count: 3, tags: ['a'] });

      expect(await manager.loadJSON(runId, 'data.json')).toEqual({ count: 3, tags: ['a'] });
    });
  });
});
