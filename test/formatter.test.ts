import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  formatBytes,
  formatCleanupResult,
  formatDiskUsage,
  formatSearchResults,
} from '../src/control-plane/formatter.js';

describe('formatter', () => {
  beforeEach(() => {
    vi.stubEnv('NO_COLOR', '1');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it.each([
    [0, '0 B'],
    [512, '512 B'],
    [1536, '1.5 KB'],
    [5 * 1024 * 1024, '5.0 MB'],
  ])('should format %d bytes as %s', (bytes, expected) => {
    expect(formatBytes(bytes)).toBe(expected);
  });

  it('should summarise a cleanup pass with its errors', () => {
    const output = formatCleanupResult(
      {
        archived: ['r2'],
        deleted: ['r1'],
        kept: ['r3', 'r4'],
        errors: ['load r5: run not found: r5'],
        spaceSaved: 2048,
        archiveBytesWritten: 300,
      },
      false
    );

    expect(output.split('\n')).toEqual([
      'Cleanup',
      '',
      'Archived:     1',
      'Deleted:      1',
      'Kept:         2',
      'Space saved:  2.0 KB (estimated)',
      'Archives:     300 B written',
      '',
      'Archived runs:',
      '  r2',
      '',
      'Deleted runs:',
      '  r1',
      '',
      'Errors:',
      '  • load r5: run not found: r5',
    ]);
  });

  it('should mark dry runs', () => {
    const output = formatCleanupResult(
      { archived: [], deleted: [], kept: [], errors: [], spaceSaved: 0, archiveBytesWritten: 0 },
      true,
      'Archive cleanup'
    );
    expect(output.split('\n')[0]).toBe('Archive cleanup (dry run)');
  });

  it('should format disk usage', () => {
    expect(
      formatDiskUsage({
        runCount: 2,
        archiveCount: 1,
        activeSize: 2048,
        archiveSize: 1024,
        totalSize: 3072,
      })
    ).toBe(['Disk Usage', '', 'Runs:      2 (2.0 KB)', 'Archives:  1 (1.0 KB)', 'Total:     3.0 KB'].join('\n'));
  });

  it('should list search matches', () => {
    expect(formatSearchResults([])).toBe('No matches found.');
    expect(
      formatSearchResults([
        { runId: 'r1', line: 4, text: 'deploy' },
        { runId: 'r2' },
      ])
    ).toBe(['r1:4: deploy', 'r2', '', '2 matches'].join('\n'));
  });
});
