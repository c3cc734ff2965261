/**
 * Persisted state exports
 */

export type {
  MappingRecord,
  MappingFields,
  MappingStore,
  ScopeState,
  ScopeStateStore,
  SyncStatus,
  OperationLogEntry,
  SyncHistoryRecord,
  NewSyncHistoryRecord,
  SyncHistoryStore,
  Clock,
} from './types.js';

export { systemClock } from './types.js';
export { JsonFile, type Decoder } from './json-file.js';
export { MemoryMappingStore, JsonMappingStore, mergeMapping } from './mappings.js';
export { MemoryScopeStateStore, JsonScopeStateStore } from './scopes.js';
export { MemorySyncHistoryStore, JsonSyncHistoryStore } from './history.js';
