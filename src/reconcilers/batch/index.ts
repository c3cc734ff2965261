/**
 * Batch sync over many course scopes
 *
 * @module reconcilers/batch
 */

export {
  executeBatchSync,
  generateBatchId,
  getFailedScopes,
  getOneLinerSummary,
  type BatchProgress,
  type BatchProgressCallback,
  type BatchScopeResult,
  type BatchSyncOptions,
  type BatchSyncResult,
  type BatchSyncStats,
} from './batch-sync.js';
export {
  formatDuration,
  formatHumanReport,
  formatJsonReport,
  generateReport,
  type FormattedReport,
  type ReportFormat,
  type ReportOptions,
} from './report.js';
