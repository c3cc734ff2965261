/**
 * Types for course reconciliation runs
 */

import type { RepositoryClient } from '../../api/types.js';
import type { ApiLogger } from '../../api/logger.js';
import type { ContentBuilder } from '../../platform/types.js';
import type {
  Clock,
  MappingStore,
  OperationLogEntry,
  ScopeStateStore,
  SyncStatus,
} from '../../state/types.js';
import type { MetadataReader } from '../frontmatter/metadata.js';
import type { TreeLayout } from '../tree/types.js';

/**
 * Terminal state of a run
 */
export type RunState = 'up_to_date' | 'completed' | 'failed';

/**
 * Per-run change counters
 */
export interface SyncCounters {
  sectionsCreated: number;
  sectionsUpdated: number;
  sectionsHidden: number;
  activitiesCreated: number;
  activitiesUpdated: number;
  activitiesRestored: number;
  activitiesHidden: number;
  chaptersCreated: number;
  chaptersUpdated: number;
  chaptersReordered: number;
  chaptersHidden: number;
  assetsUploaded: number;
}

/**
 * Result of one reconciliation run
 */
export interface RunOutcome {
  scope: string;
  state: RunState;
  /** Persisted form of `state` */
  status: SyncStatus;
  /** Null when the snapshot could not be resolved */
  snapshotIdentity: string | null;
  summary: string;
  counters: SyncCounters;
  operations: OperationLogEntry[];
  /** Internal detail of a failed run */
  error?: {
    code: string;
    message: string;
  };
}

/**
 * Collaborators of the reconciler
 */
export interface ReconcilerDeps {
  repository: RepositoryClient;
  builder: ContentBuilder;
  mappings: MappingStore;
  scopes: ScopeStateStore;
  metadata: MetadataReader;
  layout?: TreeLayout;
  logger?: ApiLogger;
  clock?: Clock;
}
