export { LifecycleManager } from './manager.js';
export { createArchive, extractArchive } from './archive.js';
export {
  classifyRun,
  computeThresholds,
  estimateSpaceSaved,
  sortOldestFirst,
} from './retention.js';
export type {
  RetentionCandidate,
  RetentionDecision,
  RetentionReason,
  RetentionThresholds,
} from './retention.js';
