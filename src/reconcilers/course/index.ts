/**
 * Course reconciliation
 */

export type { ReconcilerDeps, RunOutcome, RunState, SyncCounters } from './types.js';
export { Reconciler } from './engine.js';
export { SyncRunner, type SyncRunResult, type SyncRunnerOptions } from './runner.js';
export { OperationLog, RunContext } from './context.js';
export { reconcileSection, reconcilePage } from './sections.js';
export {
  reconcileBook,
  resolveChapterKeys,
  type PreparedChapter,
  type ResolvedChapterKey,
} from './books.js';
export { sweepRemoved, sweepCandidates, isSectionPath } from './sweep.js';
export {
  FAILED_SUMMARY,
  buildSummary,
  emptyCounters,
  hasChanges,
  upToDateSummary,
} from './summary.js';
