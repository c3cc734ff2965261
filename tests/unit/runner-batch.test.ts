/**
 * Unit Tests: Sync Runner and Batch Sync
 */

import { describe, it, expect, vi } from 'vitest';
import { TransportError } from '../../src/errors.js';
import { SyncRunner, type SyncRunResult } from '../../src/reconcilers/course/runner.js';
import {
  executeBatchSync,
  generateBatchId,
  getFailedScopes,
  getOneLinerSummary,
  type BatchProgress,
  type BatchSyncResult,
} from '../../src/reconcilers/batch/batch-sync.js';
import { formatDuration, generateReport } from '../../src/reconcilers/batch/report.js';
import { FIXED_TIME, createHarness } from './fixtures/repository.js';

const FILES = {
  'sections/01-a/01-page.html': '<p>Page</p>',
};

/**
 * Runner that cannot start any run
 */
class BrokenRunner extends SyncRunner {
  override async run(_scope: string, _triggeredBy: string): Promise<SyncRunResult> {
    throw new Error('queue closed');
  }
}

// =============================================================================
// SyncRunner
// =============================================================================

describe('SyncRunner', () => {
  it('records one history entry per run', async () => {
    const { runner, history } = createHarness(FILES);
    const result = await runner.run('intro', 'alice');

    expect(result.historyId).toBe(1);
    expect(result.triggeredBy).toBe('alice');
    expect(await history.list('intro')).toEqual([
      {
        id: 1,
        scope: 'intro',
        triggeredBy: 'alice',
        snapshotIdentity: 'c0ffee0000000001',
        status: 'success',
        summary: '1 section created, 1 activity created.',
        operations: result.operations,
        createdAt: FIXED_TIME,
      },
    ]);
  });

  it('queues runs for the same scope', async () => {
    const { runner, history } = createHarness(FILES);

    const first = runner.run('intro', 'alice');
    const second = runner.run('intro', 'bob');
    expect(runner.isBusy('intro')).toBe(true);

    const [a, b] = await Promise.all([first, second]);
    expect(a.status).toBe('success');
    expect(b.status).toBe('uptodate');
    expect(runner.isBusy('intro')).toBe(false);
    expect((await history.list('intro')).map((r) => [r.id, r.triggeredBy])).toEqual([
      [2, 'bob'],
      [1, 'alice'],
    ]);
  });

  it('runs different scopes independently', async () => {
    const { runner, platform } = createHarness(FILES);

    const [intro, other] = await Promise.all([
      runner.run('intro', 'webhook'),
      runner.run('other', 'webhook'),
    ]);

    expect(intro.status).toBe('success');
    expect(other.status).toBe('success');
    expect(platform.getCourse('intro')?.activities).toHaveLength(1);
    expect(platform.getCourse('other')?.activities).toHaveLength(1);
  });

  it('records failed runs and keeps serving the scope', async () => {
    const { runner, repository, history } = createHarness(FILES);
    repository.failure = new TransportError('GitHub API error (502): bad gateway');

    const failed = await runner.run('intro', 'cli');
    expect(failed.status).toBe('failed');

    repository.failure = null;
    const recovered = await runner.run('intro', 'cli');
    expect(recovered.status).toBe('success');
    expect((await history.list('intro', 1))[0].status).toBe('success');
  });
});

// =============================================================================
// Batch Sync
// =============================================================================

describe('executeBatchSync', () => {
  it('syncs every scope and counts the outcomes', async () => {
    const { runner } = createHarness(FILES);
    await runner.run('intro', 'cli');

    const result = await executeBatchSync(runner, ['intro', 'other']);

    expect(result.success).toBe(true);
    expect(result.results.map((r) => [r.scope, r.status])).toEqual([
      ['intro', 'uptodate'],
      ['other', 'success'],
    ]);
    expect(result.stats).toMatchObject({ total: 2, synced: 1, upToDate: 1, failed: 0 });
    expect(getOneLinerSummary(result)).toBe('Done: 1 synced, 1 up to date, 0 failed.');
  });

  it('records the batch trigger on history entries', async () => {
    const { runner, history } = createHarness(FILES);
    await executeBatchSync(runner, ['intro']);

    expect((await history.list('intro'))[0].triggeredBy).toBe('batch');
  });

  it('continues after a failed scope', async () => {
    const { runner, repository } = createHarness(FILES);
    repository.failure = new TransportError('boom');

    const result = await executeBatchSync(runner, ['intro', 'other']);

    expect(result.success).toBe(false);
    expect(result.results).toHaveLength(2);
    expect(result.errors).toEqual(['intro: TRANSPORT_ERROR: boom', 'other: TRANSPORT_ERROR: boom']);
    expect(getFailedScopes(result)).toEqual(['intro', 'other']);
  });

  it('turns a runner exception into a failed result', async () => {
    const { reconciler, history } = createHarness(FILES);
    const result = await executeBatchSync(new BrokenRunner(reconciler, history), ['intro']);

    expect(result.results[0]).toMatchObject({
      scope: 'intro',
      status: 'failed',
      summary: 'Sync could not be run.',
      snapshotIdentity: null,
      error: 'UNEXPECTED: queue closed',
    });
  });

  it('reports progress and completion per scope', async () => {
    const { runner } = createHarness(FILES);
    const progress: BatchProgress[] = [];
    const onScopeComplete = vi.fn();

    await executeBatchSync(runner, ['intro', 'other'], {
      onProgress: (p) => progress.push(p),
      onScopeComplete,
    });

    expect(progress.map((p) => [p.currentScope, p.current, p.total, p.percentage])).toEqual([
      ['intro', 1, 2, 50],
      ['other', 2, 2, 100],
    ]);
    expect(onScopeComplete).toHaveBeenCalledTimes(2);
  });

  it('generates unique batch ids', () => {
    expect(generateBatchId()).toMatch(/^batch-[a-z0-9]+-[a-z0-9]+$/);
    expect(generateBatchId()).not.toBe(generateBatchId());
  });
});

// =============================================================================
// Reports
// =============================================================================

describe('batch reports', () => {
  it('formats durations', () => {
    expect(formatDuration(500)).toBe('500ms');
    expect(formatDuration(1500)).toBe('1.5s');
    expect(formatDuration(125000)).toBe('2m 5s');
  });

  it('suggests exit code 2 when every scope failed', async () => {
    const { runner, repository } = createHarness(FILES);
    repository.failure = new TransportError('boom');
    const result = await executeBatchSync(runner, ['intro']);

    const report = generateReport(result, { format: 'human' });
    expect(report.suggestedExitCode).toBe(2);
    expect(report.summary).toBe('Done: 0 synced, 0 up to date, 1 failed.');
    expect(report.output).toContain('Course Sync Report');
    expect(report.output).toContain('Error: TRANSPORT_ERROR: boom');
  });

  it('suggests exit code 1 on partial failure', () => {
    const result: BatchSyncResult = {
      batchId: 'batch-test',
      startedAt: FIXED_TIME,
      completedAt: FIXED_TIME,
      success: false,
      results: [
        { scope: 'intro', status: 'success', summary: '1 activity updated.', snapshotIdentity: 'abc', durationMs: 5 },
        { scope: 'other', status: 'failed', summary: 'Sync failed.', snapshotIdentity: null, error: 'X: y', durationMs: 5 },
      ],
      stats: { total: 2, synced: 1, upToDate: 0, failed: 1, totalDurationMs: 10 },
      errors: ['other: X: y'],
    };

    const report = generateReport(result, { format: 'human', failuresOnly: true });
    expect(report.suggestedExitCode).toBe(1);
    expect(report.output).toContain('other');
    expect(report.output).not.toContain('1 activity updated.');
  });

  it('emits the result as JSON', async () => {
    const { runner } = createHarness(FILES);
    const result = await executeBatchSync(runner, ['intro']);
    const report = generateReport(result, { format: 'json' });

    expect(JSON.parse(report.output)).toEqual(JSON.parse(JSON.stringify(result)));
  });
});
