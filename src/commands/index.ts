/**
 * Command exports
 */

export { syncCommand, manualTrigger, type SyncOptions, type SyncCommandData } from './sync.js';
export { syncAllCommand, selectCourses, type SyncAllOptions } from './sync-all.js';
export { statusCommand, type StatusOptions, type CourseStatus } from './status.js';
export {
  historyCommand,
  formatHistoryLine,
  parseLimit,
  DEFAULT_HISTORY_LIMIT,
  type HistoryOptions,
} from './history.js';
export { treeCommand, summarizeTree, type TreeOptions, type TreeSummary } from './tree.js';
export { openRuntime, STATE_FILES, type SyncRuntime, type RuntimeOptions } from './runtime.js';
