/**
 * Course reconciler
 *
 * One run brings a course scope in line with a repository snapshot:
 *
 * 1. Resolve the snapshot identity; stop early when it was already applied
 * 2. Fetch and classify the tree
 * 3. Upload assets and apply root metadata
 * 4. Sections in order, each with its pages and books
 * 5. Hide entities whose paths disappeared
 * 6. Record the snapshot and summarize
 *
 * Work is strictly sequential. Writes committed before a failure stay
 * committed; the next run converges from there.
 *
 * @module reconcilers/course/engine
 */

import { logger as defaultLogger, type ApiLogger } from '../../api/logger.js';
import type { RepositoryClient } from '../../api/types.js';
import { EmptySnapshotError, errorCode, errorMessage } from '../../errors.js';
import type { ContentBuilder } from '../../platform/types.js';
import { systemClock, type Clock, type MappingStore, type ScopeStateStore } from '../../state/types.js';
import { shortIdentity } from '../../utils/hash.js';
import type { MetadataReader } from '../frontmatter/metadata.js';
import { isEmptyMetadata, toCourseMetadata } from '../frontmatter/fields.js';
import { classifyTree } from '../tree/classify.js';
import { DEFAULT_LAYOUT, type StructuredTree, type TreeLayout } from '../tree/types.js';
import { OperationLog, RunContext } from './context.js';
import { reconcileSection } from './sections.js';
import { FAILED_SUMMARY, buildSummary, emptyCounters, upToDateSummary } from './summary.js';
import { sweepRemoved } from './sweep.js';
import type { ReconcilerDeps, RunOutcome, SyncCounters } from './types.js';

export class Reconciler {
  private readonly repository: RepositoryClient;
  private readonly builder: ContentBuilder;
  private readonly mappings: MappingStore;
  private readonly scopes: ScopeStateStore;
  private readonly metadata: MetadataReader;
  private readonly layout: TreeLayout;
  private readonly logger: ApiLogger;
  private readonly clock: Clock;

  constructor(deps: ReconcilerDeps) {
    this.repository = deps.repository;
    this.builder = deps.builder;
    this.mappings = deps.mappings;
    this.scopes = deps.scopes;
    this.metadata = deps.metadata;
    this.layout = deps.layout ?? DEFAULT_LAYOUT;
    this.logger = (deps.logger ?? defaultLogger).child({ component: 'reconciler' });
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Reconcile one scope against its current snapshot
   *
   * Never throws: failures come back as a `failed` outcome.
   */
  async run(scope: string): Promise<RunOutcome> {
    const log = this.logger.child({ scope });
    const operations = new OperationLog(this.clock);
    const counters = emptyCounters();
    let snapshotIdentity: string | null = null;

    try {
      snapshotIdentity = await this.repository.getSnapshotIdentity(scope);
      const state = await this.scopes.get(scope);

      if (state.lastSnapshot === snapshotIdentity) {
        log.info('Already up to date', { snapshot: shortIdentity(snapshotIdentity) });
        return {
          scope,
          state: 'up_to_date',
          status: 'uptodate',
          snapshotIdentity,
          summary: upToDateSummary(snapshotIdentity),
          counters,
          operations: operations.list(),
        };
      }

      log.info('Sync started', { snapshot: shortIdentity(snapshotIdentity) });

      const entries = await this.repository.listTree(scope);
      if (entries.length === 0) {
        throw new EmptySnapshotError(snapshotIdentity);
      }
      const tree = classifyTree(entries, this.layout);

      const ctx = new RunContext(
        scope,
        this.repository,
        this.builder,
        this.mappings,
        this.metadata,
        this.layout,
        counters,
        operations,
        log
      );

      await this.applyTree(ctx, tree);
      await sweepRemoved(ctx);

      await this.scopes.recordSnapshot(scope, snapshotIdentity, this.clock().toISOString());
      const summary = buildSummary(counters);
      log.info('Sync completed', { snapshot: shortIdentity(snapshotIdentity), summary });

      return {
        scope,
        state: 'completed',
        status: 'success',
        snapshotIdentity,
        summary,
        counters,
        operations: operations.list(),
      };
    } catch (error) {
      return this.failed(scope, snapshotIdentity, counters, operations, log, error);
    }
  }

  private async applyTree(ctx: RunContext, tree: StructuredTree): Promise<void> {
    const { scope, operations, counters } = ctx;

    if (tree.assets.length > 0) {
      const result = await this.builder.processAssets(scope, tree.assets);
      for (const path of tree.assets) ctx.touch(path);
      counters.assetsUploaded += result.uploaded;
      operations.record('assets', 'assets/', `${result.uploaded} uploaded, ${result.skipped} unchanged`);
    }

    if (tree.rootMetadataPath) {
      ctx.touch(tree.rootMetadataPath);
      const { data } = await ctx.readMetadata(tree.rootMetadataPath);
      const metadata = toCourseMetadata(data);
      if (!isEmptyMetadata(metadata) && (await this.builder.updateRootMetadata(scope, metadata))) {
        operations.record('course_update', tree.rootMetadataPath, metadata.fullname ?? '');
      }
    }

    let position = 0;
    for (const section of tree.sections.values()) {
      position++;
      await reconcileSection(ctx, section, position);
    }
  }

  private failed(
    scope: string,
    snapshotIdentity: string | null,
    counters: SyncCounters,
    operations: OperationLog,
    log: ApiLogger,
    error: unknown
  ): RunOutcome {
    const code = errorCode(error);
    const message = errorMessage(error);

    log.error('Sync failed', error instanceof Error ? error : undefined, {
      snapshot: snapshotIdentity ? shortIdentity(snapshotIdentity) : null,
      code,
    });
    operations.record('error', '', `${code}: ${message}`);

    return {
      scope,
      state: 'failed',
      status: 'failed',
      snapshotIdentity,
      summary: FAILED_SUMMARY,
      counters,
      operations: operations.list(),
      error: { code, message },
    };
  }
}
