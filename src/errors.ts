/**
 * Error types for the run store.
 */

export type StoreErrorCode =
  | 'NOT_FOUND' // run, artifact, file or archive absent
  | 'ALREADY_EXISTS' // duplicate start, or restore target collision
  | 'NOT_STARTED' // run is not in the active-run table
  | 'INVALID_STATE' // operation not valid for the run's current state
  | 'IO_ERROR' // filesystem or compression failure
  | 'INVALID_ARCHIVE' // path traversal or corrupt tar/gzip stream
  | 'INVALID_NAME'; // artifact or file name escapes its directory

export type StoreResource = 'run' | 'artifact' | 'file' | 'archive' | 'transcript';

/**
 * Base class for every error raised by the store. Enables typed handling via `error.code`.
 */
export class RunStoreError extends Error {
  readonly name: string = 'RunStoreError';
  readonly code: StoreErrorCode;

  constructor(code: StoreErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends RunStoreError {
  readonly name = 'NotFoundError';
  readonly resource: StoreResource;
  readonly id: string;

  constructor(resource: StoreResource, id: string) {
    super('NOT_FOUND', `${resource} not found: ${id}`);
    this.resource = resource;
    this.id = id;
  }
}

export class AlreadyExistsError extends RunStoreError {
  readonly name = 'AlreadyExistsError';
  readonly resource: StoreResource;
  readonly id: string;

  constructor(resource: StoreResource, id: string) {
    super('ALREADY_EXISTS', `${resource} already exists: ${id}`);
    this.resource = resource;
    this.id = id;
  }
}

export class RunNotStartedError extends RunStoreError {
  readonly name = 'RunNotStartedError';
  readonly runId: string;

  constructor(runId: string) {
    super('NOT_STARTED', `run not started: ${runId}`);
    this.runId = runId;
  }
}

export class InvalidStateError extends RunStoreError {
  readonly name = 'InvalidStateError';
  readonly runId: string;

  constructor(runId: string, reason: string) {
    super('INVALID_STATE', `invalid state for run ${runId}: ${reason}`);
    this.runId = runId;
  }
}

export class StoreIOError extends RunStoreError {
  readonly name = 'StoreIOError';
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super('IO_ERROR', `${operation}: ${errorMessage(cause)}`, { cause });
    this.operation = operation;
  }
}

export class InvalidArchiveError extends RunStoreError {
  readonly name = 'InvalidArchiveError';
  readonly archivePath: string;
  readonly entry: string | null;

  constructor(archivePath: string, reason: string, entry: string | null = null) {
    const where = entry !== null ? ` (entry ${entry})` : '';
    super('INVALID_ARCHIVE', `invalid archive ${archivePath}${where}: ${reason}`);
    this.archivePath = archivePath;
    this.entry = entry;
  }
}

export class InvalidNameError extends RunStoreError {
  readonly name = 'InvalidNameError';
  readonly entryName: string;

  constructor(entryName: string) {
    super('INVALID_NAME', `invalid name: ${JSON.stringify(entryName)}`);
    this.entryName = entryName;
  }
}

export function isNotFound(error: unknown): error is NotFoundError {
  return error instanceof RunStoreError && error.code === 'NOT_FOUND';
}

export function isAlreadyExists(error: unknown): error is AlreadyExistsError {
  return error instanceof RunStoreError && error.code === 'ALREADY_EXISTS';
}

export function isNotStarted(error: unknown): error is RunNotStartedError {
  return error instanceof RunStoreError && error.code === 'NOT_STARTED';
}

/**
 * True for a Node.js system error with the given errno code (e.g. ENOENT).
 */
/**
 * The string `code` of a Node.js system or zlib error, if any.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return getErrorCode(error) === code;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
