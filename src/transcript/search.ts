import { spawn } from 'node:child_process';
import { isAbsolute, relative, sep } from 'node:path';
import { z } from 'zod';
import type { SearchOptions, SearchResult } from '../types/search.js';
import { getRunsDir, TRANSCRIPT_FILE, GZIP_SUFFIX } from '../artifacts/paths.js';
import { pathExists } from '../utils/fs.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('transcript-search');

/**
 * Result of running an external command to completion.
 */
export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs a command without a shell. Rejects if the command cannot be started
 * (e.g. ENOENT when it is not installed).
 */
export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

export const spawnCommand: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    const child = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    child.stdout.on('data', (chunk: Buffer) => {
      stdoutChunks.push(chunk);
    });

    child.stderr.on('data', (chunk: Buffer) => {
      stderrChunks.push(chunk);
    });

    child.on('close', (code) => {
      resolve({
        exitCode: code ?? 1,
        stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
        stderr: Buffer.concat(stderrChunks).toString('utf-8'),
      });
    });

    child.on('error', reject);
  });

/**
 * A line-search tool able to scan the runs tree for transcript matches.
 */
export interface SearchBackend {
  readonly name: string;
  search(runsDir: string, query: string, options: SearchOptions): Promise<SearchResult[]>;
}

/**
 * Both tools exit 1 when nothing matched.
 */
const NO_MATCHES_EXIT_CODE = 1;

async function runSearch(
  runner: CommandRunner,
  command: string,
  args: string[]
): Promise<string | null> {
  const result = await runner(command, args);
  if (result.exitCode === NO_MATCHES_EXIT_CODE) {
    return null;
  }
  if (result.exitCode !== 0) {
    throw new Error(`${command} exited with code ${result.exitCode}: ${result.stderr.trim()}`);
  }
  return result.stdout;
}

/**
 * Run id of a transcript path: the first path segment below the runs directory.
 */
export function extractRunId(runsDir: string, path: string): string | null {
  const rel = relative(runsDir, path);
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
    return null;
  }
  const [runId] = rel.split(sep);
  return runId ?? null;
}

function capResults(results: SearchResult[], maxResults: number | undefined): SearchResult[] {
  return maxResults !== undefined && maxResults > 0 ? results.slice(0, maxResults) : results;
}

const ripgrepMatchSchema = z.object({
  type: z.literal('match'),
  data: z.object({
    path: z.object({ text: z.string() }),
    lines: z.object({ text: z.string() }),
    line_number: z.number().int().nullable().optional(),
  }),
});

/**
 * Parse `rg --json` output. Only `match` messages produce results; anything
 * else (begin/end/summary, malformed lines) is skipped.
 */
export function parseRipgrepOutput(runsDir: string, output: string): SearchResult[] {
  const results: SearchResult[] = [];

  for (const line of output.split('\n')) {
    if (line.trim() === '') continue;

    let message: unknown;
    try {
      message = JSON.parse(line);
    } catch (error) {
      log.debug({ error }, 'Skipping malformed ripgrep output');
      continue;
    }

    const parsed = ripgrepMatchSchema.safeParse(message);
    if (!parsed.success) continue;

    const { data } = parsed.data;
    const runId = extractRunId(runsDir, data.path.text);
    if (!runId) continue;

    const result: SearchResult = { runId, text: data.lines.text.trim() };
    if (typeof data.line_number === 'number') {
      result.line = data.line_number;
    }
    results.push(result);
  }

  return results;
}

const GREP_LINE_PATTERN = /^(.*?transcript\.json):(\d+):(.*)$/;

/**
 * Parse `grep -r -n -H` output (`<path>:<line>:<text>`).
 */
export function parseGrepOutput(runsDir: string, output: string): SearchResult[] {
  const results: SearchResult[] = [];

  for (const line of output.split('\n')) {
    const match = GREP_LINE_PATTERN.exec(line);
    if (!match) continue;

    const [, path = '', lineNumber = '', text = ''] = match;
    const runId = extractRunId(runsDir, path);
    if (!runId) continue;

    results.push({ runId, line: parseInt(lineNumber, 10), text: text.trim() });
  }

  return results;
}

/**
 * ripgrep backend. Searches compressed transcripts too.
 */
export class RipgrepBackend implements SearchBackend {
  readonly name = 'rg';

  constructor(private readonly runner: CommandRunner) {}

  async search(runsDir: string, query: string, options: SearchOptions): Promise<SearchResult[]> {
    const args = [
      '--json',
      '--search-zip',
      '-g',
      TRANSCRIPT_FILE,
      '-g',
      TRANSCRIPT_FILE + GZIP_SUFFIX,
    ];
    if (!options.caseSensitive) {
      args.push('-i');
    }
    if (options.maxResults !== undefined && options.maxResults > 0) {
      args.push('-m', String(options.maxResults));
    }
    args.push('-e', query, runsDir);

    const stdout = await runSearch(this.runner, this.name, args);
    if (stdout === null) {
      return [];
    }
    return capResults(parseRipgrepOutput(runsDir, stdout), options.maxResults);
  }
}

/**
 * grep fallback. Only uncompressed transcripts are searched.
 */
export class GrepBackend implements SearchBackend {
  readonly name = 'grep';

  constructor(private readonly runner: CommandRunner) {}

  async search(runsDir: string, query: string, options: SearchOptions): Promise<SearchResult[]> {
    const args = ['-r', '-n', '-H', `--include=${TRANSCRIPT_FILE}`];
    if (!options.caseSensitive) {
      args.push('-i');
    }
    args.push('-e', query, runsDir);

    const stdout = await runSearch(this.runner, this.name, args);
    if (stdout === null) {
      return [];
    }
    return capResults(parseGrepOutput(runsDir, stdout), options.maxResults);
  }
}

export interface TranscriptSearcherOptions {
  baseDir: string;
  runner?: CommandRunner;
}

/**
 * Content search over persisted transcripts. Prefers ripgrep and falls back
 * to grep; availability is checked once, on first search.
 */
export class TranscriptSearcher {
  private readonly baseDir: string;
  private readonly runner: CommandRunner;
  private backend: Promise<SearchBackend> | null = null;

  constructor(options: TranscriptSearcherOptions) {
    this.baseDir = options.baseDir;
    this.runner = options.runner ?? spawnCommand;
  }

  async search(query: string, options: SearchOptions = {}): Promise<SearchResult[]> {
    const runsDir = getRunsDir(this.baseDir);
    if (!(await pathExists(runsDir))) {
      log.debug({ runsDir }, 'No runs directory, nothing to search');
      return [];
    }

    const backend = await this.getBackend();
    const results = await backend.search(runsDir, query, options);
    log.debug({ backend: backend.name, query, matches: results.length }, 'Searched transcripts');
    return results;
  }

  getBackend(): Promise<SearchBackend> {
    if (!this.backend) {
      this.backend = this.selectBackend();
    }
    return this.backend;
  }

  private async selectBackend(): Promise<SearchBackend> {
    try {
      const version = await this.runner('rg', ['--version']);
      if (version.exitCode === 0) {
        return new RipgrepBackend(this.runner);
      }
    } catch (error) {
      log.debug({ error }, 'ripgrep unavailable, falling back to grep');
    }
    return new GrepBackend(this.runner);
  }
}
