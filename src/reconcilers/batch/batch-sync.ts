/**
 * Batch Sync Execution
 *
 * Runs syncs for many course scopes with:
 * - Sequential execution, one scope at a time
 * - Failure isolation (a failing scope never aborts the batch)
 * - Progress tracking
 * - Aggregated result reporting
 *
 * This module backs the `sync-all` command and the scheduled run.
 *
 * @module reconcilers/batch/batch-sync
 */

import { errorCode, errorMessage } from '../../errors.js';
import type { SyncStatus } from '../../state/types.js';
import type { SyncRunner } from '../course/runner.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Result for one scope in a batch
 */
export interface BatchScopeResult {
  scope: string;
  /** `failed` also covers runs that threw before producing an outcome */
  status: SyncStatus;
  summary: string;
  snapshotIdentity: string | null;
  /** History record id; absent when the run could not be recorded */
  historyId?: number;
  /** Error code and message of a failed run */
  error?: string;
  durationMs: number;
}

/**
 * Aggregated statistics for a batch
 */
export interface BatchSyncStats {
  total: number;
  /** Runs that applied a new snapshot */
  synced: number;
  upToDate: number;
  failed: number;
  totalDurationMs: number;
}

export interface BatchProgress {
  currentScope: string;
  /** 1-based */
  current: number;
  total: number;
  percentage: number;
  elapsedMs: number;
}

export type BatchProgressCallback = (progress: BatchProgress) => void;

export interface BatchSyncOptions {
  /** Recorded on every history entry (default: `batch`) */
  triggeredBy?: string;
  onProgress?: BatchProgressCallback;
  /** Called as each scope finishes */
  onScopeComplete?: (result: BatchScopeResult) => void;
}

export interface BatchSyncResult {
  /** Unique batch ID */
  batchId: string;
  startedAt: string;
  completedAt: string;
  /** True when no scope failed */
  success: boolean;
  results: BatchScopeResult[];
  stats: BatchSyncStats;
  errors: string[];
}

// =============================================================================
// Batch Execution
// =============================================================================

/**
 * Generate a unique batch ID
 */
export function generateBatchId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 8);
  return `batch-${timestamp}-${random}`;
}

function updateStats(stats: BatchSyncStats, result: BatchScopeResult): void {
  switch (result.status) {
    case 'success':
      stats.synced++;
      break;
    case 'uptodate':
      stats.upToDate++;
      break;
    case 'failed':
      stats.failed++;
      break;
  }
}

/**
 * Sync every scope in order
 */
export async function executeBatchSync(
  runner: SyncRunner,
  scopes: string[],
  options: BatchSyncOptions = {}
): Promise<BatchSyncResult> {
  const batchId = generateBatchId();
  const startedAt = new Date().toISOString();
  const startTime = Date.now();
  const triggeredBy = options.triggeredBy ?? 'batch';

  const results: BatchScopeResult[] = [];
  const errors: string[] = [];
  const stats: BatchSyncStats = {
    total: scopes.length,
    synced: 0,
    upToDate: 0,
    failed: 0,
    totalDurationMs: 0,
  };

  for (let i = 0; i < scopes.length; i++) {
    const scope = scopes[i];
    const scopeStart = Date.now();

    options.onProgress?.({
      currentScope: scope,
      current: i + 1,
      total: scopes.length,
      percentage: Math.round(((i + 1) / scopes.length) * 100),
      elapsedMs: scopeStart - startTime,
    });

    let result: BatchScopeResult;
    try {
      const outcome = await runner.run(scope, triggeredBy);
      result = {
        scope,
        status: outcome.status,
        summary: outcome.summary,
        snapshotIdentity: outcome.snapshotIdentity,
        historyId: outcome.historyId,
        error: outcome.error ? `${outcome.error.code}: ${outcome.error.message}` : undefined,
        durationMs: Date.now() - scopeStart,
      };
    } catch (err) {
      result = {
        scope,
        status: 'failed',
        summary: 'Sync could not be run.',
        snapshotIdentity: null,
        error: `${errorCode(err)}: ${errorMessage(err)}`,
        durationMs: Date.now() - scopeStart,
      };
    }

    results.push(result);
    updateStats(stats, result);
    options.onScopeComplete?.(result);

    if (result.status === 'failed') {
      errors.push(`${scope}: ${result.error ?? result.summary}`);
    }
  }

  const completedAt = new Date().toISOString();
  stats.totalDurationMs = Date.now() - startTime;

  return {
    batchId,
    startedAt,
    completedAt,
    success: stats.failed === 0,
    results,
    stats,
    errors,
  };
}

// =============================================================================
// Utility Functions
// =============================================================================

export function getFailedScopes(result: BatchSyncResult): string[] {
  return result.results.filter((r) => r.status === 'failed').map((r) => r.scope);
}

/**
 * One-line summary, e.g. `Done: 2 synced, 1 up to date, 0 failed.`
 */
export function getOneLinerSummary(result: BatchSyncResult): string {
  const { synced, upToDate, failed } = result.stats;
  return `Done: ${synced} synced, ${upToDate} up to date, ${failed} failed.`;
}
