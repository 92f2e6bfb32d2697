/**
 * A single content match in a persisted transcript.
 */
export interface SearchResult {
  runId: string;
  /** 1-based line number, when the backend reports one */
  line?: number;
  /** Matched line text, trimmed */
  text?: string;
}

export interface SearchOptions {
  caseSensitive?: boolean;
  /** Maximum matches (0 or undefined = unlimited) */
  maxResults?: number;
}
