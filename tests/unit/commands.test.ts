/**
 * Unit Tests: CLI Commands
 *
 * Commands run against JSON state in a temporary directory and a GitHub
 * API answered in process.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { validateConfig } from '../../src/config/loader.js';
import type { SyncConfig } from '../../src/config/types.js';
import { openRuntime, type SyncRuntime } from '../../src/commands/runtime.js';
import { syncCommand } from '../../src/commands/sync.js';
import { selectCourses, syncAllCommand } from '../../src/commands/sync-all.js';
import { statusCommand } from '../../src/commands/status.js';
import { formatHistoryLine, historyCommand, parseLimit } from '../../src/commands/history.js';
import { treeCommand } from '../../src/commands/tree.js';
import type { CommandContext } from '../../src/types.js';
import type { SyncHistoryRecord } from '../../src/state/types.js';
import { FIXED_TIME, createCapturingLogger } from './fixtures/repository.js';

const REPO_PREFIX = '/repos/example/intro-101';

/**
 * GitHub API for one repository at a fixed commit
 */
function createGitHubApi(files: Record<string, string>, sha = 'abc1234def') {
  const state = { sha, files, offline: false };

  const json = (body: unknown, status = 200) => new Response(JSON.stringify(body), { status });

  const impl: typeof fetch = async (input) => {
    const url = new URL(String(input));
    if (state.offline || !url.pathname.startsWith(REPO_PREFIX)) {
      return json({ message: 'Not Found' }, 404);
    }
    const rest = url.pathname.slice(REPO_PREFIX.length);

    if (rest === '/commits/main') {
      return json({ sha: state.sha });
    }
    if (rest === '/git/trees/main') {
      const directories = new Set<string>();
      const tree: Array<Record<string, unknown>> = [];
      for (const [path, text] of Object.entries(state.files)) {
        const segments = path.split('/');
        for (let i = 1; i < segments.length; i++) {
          directories.add(segments.slice(0, i).join('/'));
        }
        tree.push({ path, type: 'blob', sha: 'b', size: text.length });
      }
      for (const path of directories) {
        tree.push({ path, type: 'tree', sha: 't' });
      }
      return json({ sha: state.sha, tree, truncated: false });
    }
    if (rest.startsWith('/contents/')) {
      const path = decodeURIComponent(rest.slice('/contents/'.length));
      const text = state.files[path];
      if (text === undefined) {
        return json({ message: 'Not Found' }, 404);
      }
      return json({ path, content: Buffer.from(text).toString('base64'), encoding: 'base64' });
    }
    return json({ message: 'Not Found' }, 404);
  };

  return { impl, state };
}

const FILES = { 'sections/01-a/01-page.html': '<p>Page</p>' };

describe('commands', () => {
  let dir: string;
  let config: SyncConfig;
  let ctx: CommandContext;
  let api: ReturnType<typeof createGitHubApi>;

  const open = (): Promise<SyncRuntime> =>
    openRuntime(config, { logger: createCapturingLogger().logger, env: {}, fetch: api.impl });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'course-sync-cli-'));
    config = validateConfig(
      {
        stateDir: dir,
        courses: [
          { id: 'intro', repo: 'https://github.com/example/intro-101', autoSync: true },
          { id: 'draft', repo: 'https://github.com/example/intro-101' },
        ],
      },
      join(dir, 'course-sync.yaml')
    );
    ctx = { options: { json: true, verbose: false, user: 'alice' }, outputFormat: 'json', config };
    api = createGitHubApi({ ...FILES });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  // ===========================================================================
  // sync
  // ===========================================================================

  describe('syncCommand', () => {
    it('syncs a course and records the user', async () => {
      const runtime = await open();
      const result = await syncCommand(ctx, runtime, { course: 'intro' });

      expect(result).toMatchObject({
        success: true,
        message: '1 section created, 1 activity created.',
        data: { scope: 'intro', status: 'success', snapshotIdentity: 'abc1234def', historyId: 1 },
      });
      expect((await runtime.history.list('intro'))[0].triggeredBy).toBe('alice');
    });

    it('reports an unchanged commit as up to date', async () => {
      const runtime = await open();
      await syncCommand(ctx, runtime, { course: 'intro' });
      const result = await syncCommand(ctx, runtime, { course: 'intro' });

      expect(result.message).toBe('Already up to date (commit abc1234).');
      expect(result.data?.status).toBe('uptodate');
    });

    it('rejects unknown courses', async () => {
      const runtime = await open();
      expect(await syncCommand(ctx, runtime, { course: 'nope' })).toEqual({
        success: false,
        message: 'Unknown course: nope',
        errors: ['CONFIG_UNKNOWN_COURSE'],
      });
    });

    it('reports the error code of a failed run', async () => {
      const runtime = await open();
      api.state.offline = true;
      const result = await syncCommand(ctx, runtime, { course: 'intro' });

      expect(result).toMatchObject({
        success: false,
        message: 'Sync failed. Check the sync history for details.',
        errors: ['Error code: NOT_FOUND'],
        data: { status: 'failed', errorCode: 'NOT_FOUND', snapshotIdentity: null },
      });
    });

    it('keeps state across runtimes', async () => {
      await syncCommand(ctx, await open(), { course: 'intro' });

      const reopened = await open();
      expect(reopened.platform.getCourse('intro')?.activities.map((a) => a.name)).toEqual(['Page']);
      expect((await syncCommand(ctx, reopened, { course: 'intro' })).data?.status).toBe('uptodate');
    });
  });

  // ===========================================================================
  // sync-all
  // ===========================================================================

  describe('syncAllCommand', () => {
    it('syncs only auto-sync courses when asked', async () => {
      const runtime = await open();
      const result = await syncAllCommand(ctx, runtime, { autoOnly: true });

      expect(result.success).toBe(true);
      expect(result.message).toBe('Done: 1 synced, 0 up to date, 0 failed.');
      expect(result.data?.results.map((r) => r.scope)).toEqual(['intro']);
      expect((await runtime.history.list('intro'))[0].triggeredBy).toBe('alice');
    });

    it('reports failures per course', async () => {
      const runtime = await open();
      api.state.offline = true;
      const result = await syncAllCommand(ctx, runtime, {});

      expect(result.success).toBe(false);
      expect(result.errors).toEqual([
        'intro: NOT_FOUND: GitHub API error (404): Not Found',
        'draft: NOT_FOUND: GitHub API error (404): Not Found',
      ]);
    });

    it('rejects unknown course ids before syncing', async () => {
      const runtime = await open();
      const result = await syncAllCommand(ctx, runtime, { courses: ['intro', 'nope'] });

      expect(result).toEqual({ success: false, message: 'Unknown course: nope', errors: ['CONFIG_UNKNOWN_COURSE'] });
      expect(await runtime.history.list('intro')).toEqual([]);
    });
  });

  describe('selectCourses', () => {
    it('filters by id and auto-sync flag in config order', () => {
      expect(selectCourses(config.courses, {}).map((c) => c.id)).toEqual(['intro', 'draft']);
      expect(selectCourses(config.courses, { courses: ['draft', 'intro'] }).map((c) => c.id)).toEqual([
        'intro',
        'draft',
      ]);
      expect(selectCourses(config.courses, { courses: ['draft'], autoOnly: true })).toEqual([]);
    });
  });

  // ===========================================================================
  // status, history, tree
  // ===========================================================================

  describe('statusCommand', () => {
    it('summarizes every configured course', async () => {
      const runtime = await open();
      await syncCommand(ctx, runtime, { course: 'intro' });
      const result = await statusCommand(ctx, runtime);

      expect(result.message).toBe('2 course(s) configured');
      expect(result.data).toEqual([
        {
          id: 'intro',
          repo: 'https://github.com/example/intro-101',
          branch: 'main',
          autoSync: true,
          lastSnapshot: 'abc1234def',
          lastRunAt: expect.any(String),
          mappedPaths: 2,
          lastStatus: 'success',
          lastSummary: '1 section created, 1 activity created.',
        },
        {
          id: 'draft',
          repo: 'https://github.com/example/intro-101',
          branch: 'main',
          autoSync: false,
          lastSnapshot: null,
          lastRunAt: null,
          mappedPaths: 0,
          lastStatus: null,
          lastSummary: null,
        },
      ]);
    });

    it('limits output to one course', async () => {
      const runtime = await open();
      const result = await statusCommand(ctx, runtime, { course: 'draft' });

      expect(result.data?.map((s) => s.id)).toEqual(['draft']);
    });
  });

  describe('historyCommand', () => {
    it('lists the newest runs up to the limit', async () => {
      const runtime = await open();
      await syncCommand(ctx, runtime, { course: 'intro' });
      await syncCommand(ctx, runtime, { course: 'intro' });

      const result = await historyCommand(ctx, runtime, { course: 'intro', limit: 1 });
      expect(result.message).toBe('1 run(s) for intro');
      expect(result.data?.map((r) => [r.id, r.status])).toEqual([[2, 'uptodate']]);
    });
  });

  describe('treeCommand', () => {
    it('shows how the repository classifies', async () => {
      const runtime = await open();
      const result = await treeCommand(ctx, runtime, { course: 'intro' });

      expect(result).toEqual({
        success: true,
        message: '1 section(s), 0 asset(s)',
        data: {
          rootMetadataPath: null,
          sections: [
            {
              position: 1,
              name: '01-a',
              path: 'sections/01-a',
              metadataPath: null,
              pages: ['sections/01-a/01-page.html'],
              books: [],
            },
          ],
          assets: [],
        },
      });
    });
  });
});

describe('parseLimit', () => {
  it('accepts positive integers only', () => {
    expect(parseLimit('5')).toBe(5);
    expect(parseLimit(' 12 ')).toBe(12);
    for (const value of ['abc', '0', '-3', '2.5', '']) {
      expect(() => parseLimit(value)).toThrow('Must be a positive integer.');
    }
  });
});

describe('formatHistoryLine', () => {
  const record: SyncHistoryRecord = {
    id: 3,
    scope: 'intro',
    triggeredBy: 'cli',
    snapshotIdentity: 'abc1234def',
    status: 'success',
    summary: '1 activity created.',
    operations: [],
    createdAt: FIXED_TIME,
  };

  it('shows id, time, status, commit, summary and trigger', () => {
    const level = chalk.level;
    chalk.level = 0;
    try {
      const time = new Date(FIXED_TIME).toLocaleString();
      expect(formatHistoryLine(record)).toBe(`#3  ${time}  success   abc1234  1 activity created.  (cli)`);
      expect(formatHistoryLine({ ...record, snapshotIdentity: null, status: 'failed' })).toBe(
        `#3  ${time}  failed    -------  1 activity created.  (cli)`
      );
    } finally {
      chalk.level = level;
    }
  });
});
