/**
 * Sync runner
 *
 * Entry point for every trigger (CLI, batch, webhook). Runs for the same
 * scope are queued behind each other in this process; different scopes run
 * independently. Every run writes exactly one history record.
 *
 * @module reconcilers/course/runner
 */

import { logger as defaultLogger, type ApiLogger } from '../../api/logger.js';
import { systemClock, type Clock, type SyncHistoryStore } from '../../state/types.js';
import type { Reconciler } from './engine.js';
import type { RunOutcome } from './types.js';

/**
 * Outcome of a run together with its history record id
 */
export interface SyncRunResult extends RunOutcome {
  historyId: number;
  triggeredBy: string;
}

export interface SyncRunnerOptions {
  logger?: ApiLogger;
  clock?: Clock;
}

export class SyncRunner {
  private readonly tails = new Map<string, Promise<void>>();
  private readonly logger: ApiLogger;
  private readonly clock: Clock;

  constructor(
    private readonly reconciler: Reconciler,
    private readonly history: SyncHistoryStore,
    options: SyncRunnerOptions = {}
  ) {
    this.logger = (options.logger ?? defaultLogger).child({ component: 'runner' });
    this.clock = options.clock ?? systemClock;
  }

  /**
   * True while a run for `scope` is queued or in progress
   */
  isBusy(scope: string): boolean {
    return this.tails.has(scope);
  }

  /**
   * Run a sync for `scope` once every earlier run for it has finished
   *
   * @param triggeredBy - User name, or `webhook` / `batch`
   */
  async run(scope: string, triggeredBy: string): Promise<SyncRunResult> {
    const previous = this.tails.get(scope);
    if (previous) {
      this.logger.debug('Sync queued behind running sync', { scope, triggeredBy });
    }

    const current = (previous ?? Promise.resolve()).then(() => this.execute(scope, triggeredBy));
    const tail = current.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(scope, tail);

    try {
      return await current;
    } finally {
      if (this.tails.get(scope) === tail) {
        this.tails.delete(scope);
      }
    }
  }

  private async execute(scope: string, triggeredBy: string): Promise<SyncRunResult> {
    const outcome = await this.reconciler.run(scope);
    const record = await this.history.append({
      scope,
      triggeredBy,
      snapshotIdentity: outcome.snapshotIdentity,
      status: outcome.status,
      summary: outcome.summary,
      operations: outcome.operations,
      createdAt: this.clock().toISOString(),
    });

    this.logger.debug('Sync recorded', { scope, historyId: record.id, status: outcome.status });
    return { ...outcome, historyId: record.id, triggeredBy };
  }
}
