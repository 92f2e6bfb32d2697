// Artifact Type (advisory, inferred from the file extension)
export const ArtifactType = {
  SPECIFICATION: 'specification',
  DIFF: 'diff',
  JSON: 'json',
  TEXT: 'text',
  CODE: 'code',
  BINARY: 'binary',
  UNKNOWN: 'unknown',
} as const;

export type ArtifactType = (typeof ArtifactType)[keyof typeof ArtifactType];

// Standard artifact names
export const StandardArtifact = {
  SPEC: 'spec.md',
  IMPLEMENTATION: 'implementation.diff',
  REVIEW: 'review.json',
  TEST_OUTPUT: 'test-output.json',
  LINT_OUTPUT: 'lint-output.json',
} as const;

export type StandardArtifact = (typeof StandardArtifact)[keyof typeof StandardArtifact];

/**
 * Metadata about a stored artifact.
 */
export interface ArtifactInfo {
  /** Logical name, without the compression suffix */
  name: string;
  /** Size on disk in bytes (compressed size when stored as .gz) */
  size: number;
  compressed: boolean;
  modifiedAt: Date;
  type: ArtifactType;
}

export interface ArtifactManagerOptions {
  /** Root of the store; run directories live under `<baseDir>/runs` */
  baseDir: string;
  /** Artifacts larger than this many bytes are gzip-compressed (default: 10 KiB) */
  compressAbove?: number;
}

export const DEFAULT_ARTIFACT_COMPRESS_ABOVE = 10 * 1024;
