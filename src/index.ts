/**
 * course-sync library entry point
 */

export * from './errors.js';
export * from './types.js';
export * as api from './api/index.js';
export * from './config/index.js';
export * from './platform/index.js';
export * from './state/index.js';
export * as reconcilers from './reconcilers/index.js';
export * from './webhook/index.js';
export {
  syncCommand,
  syncAllCommand,
  statusCommand,
  historyCommand,
  treeCommand,
  openRuntime,
  type SyncRuntime,
} from './commands/index.js';
