/**
 * CLI Tests
 *
 * Commands run in-process against a temporary base directory; console
 * output is captured.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { createProgram, runCli } from '../src/control-plane/cli.js';
import { resetConfig } from '../src/config/index.js';
import { TranscriptStore } from '../src/transcript/store.js';
import { createTempBase, removeTempBase } from './helpers/temp-base.js';

describe('createProgram', () => {
  it('should register every command', () => {
    const program = createProgram();
    expect(program.name()).toBe('runkeep');
    expect(program.commands.map((c) => c.name())).toEqual([
      'runs',
      'search',
      'cleanup',
      'archives',
      'usage',
    ]);

    const runs = program.commands.find((c) => c.name() === 'runs');
    expect(runs?.commands.map((c) => c.name())).toEqual(['list', 'show', 'diff', 'stats']);

    const archives = program.commands.find((c) => c.name() === 'archives');
    expect(archives?.commands.map((c) => c.name())).toEqual(['list', 'restore', 'delete', 'size']);
  });
});

describe('runCli', () => {
  let baseDir: string;
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;

  beforeEach(async () => {
    baseDir = await createTempBase();
    resetConfig();
    log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    resetConfig();
    await removeTempBase(baseDir);
  });

  function cli(...args: string[]): Promise<void> {
    return runCli(['node', 'runkeep', '--base-dir', baseDir, ...args]);
  }

  function lastJson(): unknown {
    const call = log.mock.calls.at(-1);
    return JSON.parse(String(call?.[0]));
  }

  it('should list runs as JSON', async () => {
    const store = new TranscriptStore({ baseDir });
    await store.startRun('r1', { flowId: 'build' });
    await store.recordTurn('r1', { role: 'user', content: 'hello', tokensIn: 12 });
    await store.endRun('r1', 'completed');

    await cli('runs', 'list', '--json');

    expect(lastJson()).toMatchObject([
      { runId: 'r1', flowId: 'build', status: 'completed', totalTokensIn: 12, turnCount: 1 },
    ]);
    expect(process.exitCode).toBeUndefined();
  });

  it('should report an unknown run', async () => {
    await cli('runs', 'show', 'ghost');

    expect(process.exitCode).toBe(1);
    expect(String(error.mock.calls[0]?.[0])).toContain('Run not found: ghost');
  });

  async function seedComparableRuns(): Promise<void> {
    const clock = new Date('2025-03-10T12:00:00.000Z');
    const store = new TranscriptStore({ baseDir, now: () => clock });
    await store.startRun('a', { flowId: 'build' });
    await store.recordTurn('a', { role: 'user', content: 'hello', tokensIn: 10 });
    await store.recordTurn('a', { role: 'assistant', content: 'hi there', tokensOut: 5 });
    await store.endRun('a', 'completed');
    await store.startRun('b', { flowId: 'build' });
    await store.recordTurn('b', { role: 'user', content: 'hello', tokensIn: 12 });
    await store.recordTurn('b', { role: 'assistant', content: 'hi', tokensOut: 3 });
    await store.recordTurn('b', { role: 'user', content: 'again' });
    await store.endRun('b', 'completed');
  }

  it('should compare two runs', async () => {
    await seedComparableRuns();

    await cli('runs', 'diff', 'a', 'b');

    expect(process.exitCode).toBeUndefined();
    expect(String(log.mock.calls.at(-1)?.[0]).split('\n')).toEqual([
      'Comparing transcripts:',
      '  A: a (completed)',
      '  B: b (completed)',
      '',
      'Metadata Comparison:',
      '  Turns:      2 vs 3',
      '  Tokens In:  10 vs 12',
      '  Tokens Out: 5 vs 3',
      '  Cost:       $0.00 vs $0.00',
      '  Duration:   0s vs 0s',
      '',
      'Turn Comparison:',
      '  Turn 1: user - identical (5 chars)',
      '  Turn 2: assistant - different (8 vs 2 chars)',
      '  Turn 3: [missing] vs user (5 chars)',
    ]);
  });

  it('should report an unknown run when comparing', async () => {
    await seedComparableRuns();

    await cli('runs', 'diff', 'a', 'ghost');

    expect(process.exitCode).toBe(1);
    expect(String(error.mock.calls[0]?.[0])).toContain('Run not found: ghost');
    expect(log).not.toHaveBeenCalled();
  });

  it('should show only assistant turns', async () => {
    await seedComparableRuns();

    await cli('runs', 'show', 'a', '--assistant');

    const lines = String(log.mock.calls.at(-1)?.[0]).split('\n');
    expect(lines.slice(-3)).toEqual([
      '[2] ASSISTANT (12:00:00) [5 tokens out]',
      '-'.repeat(60),
      'hi there',
    ]);
    expect(lines.filter((line) => line.startsWith('['))).toEqual([
      '[2] ASSISTANT (12:00:00) [5 tokens out]',
    ]);
  });

  it('should reject an invalid status filter', async () => {
    await cli('runs', 'list', '--status', 'paused');

    expect(process.exitCode).toBe(1);
    expect(log).not.toHaveBeenCalled();
  });

  it('should report disk usage of an empty store', async () => {
    await cli('usage', '--json');

    expect(lastJson()).toEqual({
      runCount: 0,
      archiveCount: 0,
      activeSize: 0,
      archiveSize: 0,
      totalSize: 0,
    });
  });

  it('should list no archives as an empty JSON array', async () => {
    await cli('archives', 'list', '--json');
    expect(lastJson()).toEqual([]);
  });

  it('should not treat --help as an error', async () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    await expect(runCli(['node', 'runkeep', '--help'])).resolves.toBeUndefined();
    expect(write).toHaveBeenCalled();
  });
});
