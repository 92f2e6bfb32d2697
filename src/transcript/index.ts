export { TranscriptStore, computeStatistics } from './store.js';
export type { TranscriptStoreOptions, RunEndedHook, TokenRange } from './store.js';
export {
  TranscriptSearcher,
  RipgrepBackend,
  GrepBackend,
  spawnCommand,
  parseRipgrepOutput,
  parseGrepOutput,
  extractRunId,
} from './search.js';
export type { SearchBackend, CommandRunner, CommandResult, TranscriptSearcherOptions } from './search.js';
export { createRunId } from './run-id.js';
export { getDurationMs, turnsByRole } from './transcript.js';
export {
  renderSummary,
  renderFull,
  renderMarkdown,
  renderAssistantOnly,
  renderDiff,
  renderRunList,
  renderStatistics,
  formatRunDuration,
} from './view.js';
