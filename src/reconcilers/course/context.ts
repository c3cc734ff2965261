/**
 * Shared state of a single reconciliation run
 */

import type { RepositoryClient } from '../../api/types.js';
import type { ApiLogger } from '../../api/logger.js';
import type { ContentBuilder } from '../../platform/types.js';
import type { Clock, MappingStore, OperationLogEntry } from '../../state/types.js';
import type { MetadataMap } from '../frontmatter/types.js';
import type { MetadataReader } from '../frontmatter/metadata.js';
import type { TreeLayout } from '../tree/types.js';
import type { SyncCounters } from './types.js';

/**
 * Ordered record of what a run did
 */
export class OperationLog {
  private readonly entries: OperationLogEntry[] = [];

  constructor(private readonly clock: Clock) {}

  record(kind: string, path: string, detail = ''): void {
    this.entries.push({ kind, path, detail, timestamp: this.clock().toISOString() });
  }

  list(): OperationLogEntry[] {
    return [...this.entries];
  }
}

export class RunContext {
  /** Repository paths seen in this run */
  readonly touchedPaths = new Set<string>();
  /** Entities linked from any path seen in this run */
  readonly touchedEntities = new Set<string>();

  constructor(
    readonly scope: string,
    readonly repository: RepositoryClient,
    readonly builder: ContentBuilder,
    readonly mappings: MappingStore,
    readonly metadata: MetadataReader,
    readonly layout: TreeLayout,
    readonly counters: SyncCounters,
    readonly operations: OperationLog,
    readonly logger: ApiLogger
  ) {}

  touch(path: string, entityId?: string | null): void {
    this.touchedPaths.add(path);
    if (entityId) {
      this.touchedEntities.add(entityId);
    }
  }

  async fetchText(path: string): Promise<string> {
    const bytes = await this.repository.getFileContents(this.scope, path);
    return Buffer.from(bytes).toString('utf-8');
  }

  /**
   * Parse a metadata file, recording a fallback warning when one occurs
   */
  async readMetadata(path: string): Promise<{ data: MetadataMap; text: string }> {
    const text = await this.fetchText(path);
    const { data, warning } = this.metadata.read(path, text);
    if (warning) {
      this.logger.warn('Metadata parsed with fallback strategy', {
        path: warning.path,
        strategy: warning.strategy,
        reason: warning.reason,
      });
      this.operations.record('parse_fallback', path, warning.reason);
    }
    return { data, text };
  }
}
