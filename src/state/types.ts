/**
 * Persisted sync state: path mappings, per-scope snapshot identity and run
 * history
 */

// =============================================================================
// Mapping Store
// =============================================================================

/**
 * Link between a repository path and the platform entity built from it
 */
export interface MappingRecord {
  /** Course scope id */
  scope: string;
  repoPath: string;
  entityId: string | null;
  parentEntityId: string | null;
  /** Hash of the content last written for this path */
  contentHash: string | null;
  /** Chapters only: key the chapter is filed under on the platform */
  importKey: string | null;
  /** ISO timestamp */
  createdAt: string;
  /** ISO timestamp */
  modifiedAt: string;
}

/**
 * Fields an upsert may set. Absent or null fields keep their stored value.
 */
export interface MappingFields {
  entityId?: string | null;
  parentEntityId?: string | null;
  contentHash?: string | null;
  importKey?: string | null;
}

export interface MappingStore {
  lookup(scope: string, repoPath: string): Promise<MappingRecord | null>;
  upsert(scope: string, repoPath: string, fields: MappingFields): Promise<MappingRecord>;
  /** All records of a scope, ordered by path */
  list(scope: string): Promise<MappingRecord[]>;
}

// =============================================================================
// Scope State
// =============================================================================

export interface ScopeState {
  scope: string;
  /** Snapshot identity of the last completed run */
  lastSnapshot: string | null;
  /** ISO timestamp of the last completed run */
  lastRunAt: string | null;
}

export interface ScopeStateStore {
  get(scope: string): Promise<ScopeState>;
  recordSnapshot(scope: string, snapshot: string, at: string): Promise<void>;
}

// =============================================================================
// History
// =============================================================================

export type SyncStatus = 'uptodate' | 'success' | 'failed';

/**
 * One step of a run
 */
export interface OperationLogEntry {
  /** e.g. `page_create`, `chapter_reorder`, `error` */
  kind: string;
  path: string;
  detail: string;
  /** ISO timestamp */
  timestamp: string;
}

export interface SyncHistoryRecord {
  id: number;
  scope: string;
  /** User or trigger that started the run */
  triggeredBy: string;
  snapshotIdentity: string | null;
  status: SyncStatus;
  summary: string;
  operations: OperationLogEntry[];
  /** ISO timestamp */
  createdAt: string;
}

export type NewSyncHistoryRecord = Omit<SyncHistoryRecord, 'id'>;

export interface SyncHistoryStore {
  append(record: NewSyncHistoryRecord): Promise<SyncHistoryRecord>;
  /** Newest first */
  list(scope: string, limit?: number): Promise<SyncHistoryRecord[]>;
}

/**
 * Source of the current time
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
