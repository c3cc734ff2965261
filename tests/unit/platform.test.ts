/**
 * Unit Tests: Course Platform
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { MemoryCoursePlatform } from '../../src/platform/memory.js';
import { JsonCoursePlatform, decodePlatformDocument } from '../../src/platform/json.js';
import { assetKey, assetUrlFor, rewriteAssetUrls } from '../../src/platform/assets.js';
import { FakeRepository, createCapturingLogger, fixedClock } from './fixtures/repository.js';

const SCOPE = 'intro';

function createPlatform(files: Record<string, string> = {}) {
  const repository = new FakeRepository(files);
  const { logger, lines } = createCapturingLogger();
  const platform = new MemoryCoursePlatform({ repository, clock: fixedClock, logger });
  return { platform, repository, lines };
}

function chapter(importKey: string, position: number, isSubchapter = false) {
  return { importKey, title: importKey, body: `<p>${importKey}</p>`, position, isSubchapter };
}

// =============================================================================
// Assets
// =============================================================================

describe('asset URLs', () => {
  it('builds the served base URL for a scope', () => {
    expect(assetUrlFor('/course-assets/', 'my course')).toBe('/course-assets/my%20course');
  });

  it('rewrites src and href references at any depth', () => {
    const body = '<img src="../../assets/a.png"><a href=\'assets/doc.pdf\'>doc</a><img SRC="../assets/b.png">';
    expect(rewriteAssetUrls(body, '/files/intro')).toBe(
      '<img src="/files/intro/a.png"><a href=\'/files/intro/doc.pdf\'>doc</a><img SRC="/files/intro/b.png">'
    );
  });

  it('leaves other URLs alone', () => {
    const body = '<img src="https://example.com/assets/x.png">';
    expect(rewriteAssetUrls(body, '/files/intro')).toBe(body);
  });

  it('keys assets relative to the assets directory', () => {
    expect(assetKey('assets/img/logo.png')).toBe('img/logo.png');
  });
});

// =============================================================================
// Sections and Activities
// =============================================================================

describe('MemoryCoursePlatform sections', () => {
  it('creates, keeps and updates a section by position', async () => {
    const { platform } = createPlatform();

    expect(await platform.ensureSection(SCOPE, 1, { title: 'A' })).toEqual({
      sectionId: 'section-1',
      outcome: 'created',
    });
    expect((await platform.ensureSection(SCOPE, 1, { title: 'A' })).outcome).toBe('unchanged');
    expect((await platform.ensureSection(SCOPE, 1, { title: 'A', visible: false })).outcome).toBe('updated');
    expect(await platform.getVisibility('section-1')).toBe(false);
  });

  it('titles untitled sections by position', async () => {
    const { platform } = createPlatform();
    await platform.ensureSection(SCOPE, 3, {});

    expect(platform.getCourse(SCOPE)?.sections[0].title).toBe('Section 3');
  });

  it('applies only the root metadata fields that are set', async () => {
    const { platform } = createPlatform();

    expect(await platform.updateRootMetadata(SCOPE, { fullname: 'Intro' })).toBe(true);
    expect(await platform.updateRootMetadata(SCOPE, { fullname: 'Intro' })).toBe(false);
    expect(platform.getCourse(SCOPE)).toMatchObject({ fullname: 'Intro', shortname: SCOPE, format: 'topics' });
  });
});

describe('MemoryCoursePlatform activities', () => {
  it('requires a section at the given position', async () => {
    const { platform } = createPlatform();

    await expect(
      platform.createTypedActivity(SCOPE, 1, 'P', '', { type: 'page' }, 'sections/a/p.html')
    ).rejects.toMatchObject({ code: 'SECTION_MISSING' });
  });

  it('requires a url for url activities', async () => {
    const { platform } = createPlatform();
    await platform.ensureSection(SCOPE, 1, {});

    await expect(
      platform.createTypedActivity(SCOPE, 1, 'Link', '', { type: 'url' }, 'sections/a/link.html')
    ).rejects.toThrow("Cannot create url activity from sections/a/link.html: URL activity requires 'url' in front matter");
  });

  it('stores typed fields and front matter visibility', async () => {
    const { platform } = createPlatform();
    await platform.ensureSection(SCOPE, 1, {});
    const id = await platform.createTypedActivity(
      SCOPE,
      1,
      'Link',
      '<p>See</p>',
      { type: 'url', url: 'https://example.com', visible: false },
      'sections/a/link.html'
    );

    expect(id).toBe('activity-2');
    expect(platform.getCourse(SCOPE)?.activities[0]).toMatchObject({
      type: 'url',
      url: 'https://example.com',
      visible: false,
      modifiedAt: '2026-01-01T00:00:00.000Z',
    });
  });

  it('ignores a type change on update and logs it', async () => {
    const { platform, lines } = createPlatform();
    await platform.ensureSection(SCOPE, 1, {});
    const id = await platform.createTypedActivity(SCOPE, 1, 'P', 'old', { type: 'page' }, 'p.html');

    await platform.updateActivity(id, 'P2', 'new', { type: 'label' }, 'p.html');

    expect(platform.getCourse(SCOPE)?.activities[0]).toMatchObject({ type: 'page', name: 'P2', body: 'new' });
    expect(lines.some((line) => line.includes('Activity type change ignored'))).toBe(true);
  });

  it('reports unknown entities', async () => {
    const { platform } = createPlatform();

    expect(await platform.getVisibility('activity-99')).toBeNull();
    await expect(platform.setVisible('activity-99', true)).rejects.toMatchObject({ code: 'ENTITY_MISSING' });
    await expect(
      platform.updateActivity('activity-99', 'x', 'x', { type: 'page' }, 'x.html')
    ).rejects.toMatchObject({ code: 'ENTITY_MISSING' });
    await expect(platform.moveToSection(SCOPE, 'activity-99', 1)).rejects.toMatchObject({
      code: 'SECTION_MISSING',
    });
  });

  it('names the repository file when an update is missing typed fields', async () => {
    const { platform } = createPlatform();
    await platform.ensureSection(SCOPE, 1, {});
    const id = await platform.createTypedActivity(
      SCOPE,
      1,
      'Link',
      '',
      { type: 'url', url: 'https://example.com' },
      'sections/a/link.html'
    );

    await expect(platform.updateActivity(id, 'Link', '', { type: 'url' }, 'sections/a/link.html')).rejects.toThrow(
      "Cannot create url activity from sections/a/link.html: URL activity requires 'url' in front matter"
    );
  });

  it('moves activities and books to another section', async () => {
    const { platform } = createPlatform();
    await platform.ensureSection(SCOPE, 1, {});
    await platform.ensureSection(SCOPE, 2, {});
    const activityId = await platform.createTypedActivity(SCOPE, 1, 'P', '', { type: 'page' }, 'p.html');
    const { bookId } = await platform.createBook(SCOPE, 1, 'Book', [chapter('a', 1)], {});

    await platform.moveToSection(SCOPE, activityId, 2);
    await platform.moveToSection(SCOPE, bookId, 2);

    const course = platform.getCourse(SCOPE);
    expect(course?.activities.map((a) => a.sectionId)).toEqual(['section-2']);
    expect(course?.books.map((b) => b.sectionId)).toEqual(['section-2']);
    await expect(platform.moveToSection(SCOPE, 'section-1', 2)).rejects.toMatchObject({ code: 'ENTITY_MISSING' });
  });
});

// =============================================================================
// Books
// =============================================================================

describe('MemoryCoursePlatform books', () => {
  it('rejects duplicate chapter keys before creating anything', async () => {
    const { platform } = createPlatform();
    await platform.ensureSection(SCOPE, 1, {});

    await expect(
      platform.createBook(SCOPE, 1, 'Book', [chapter('a', 1), chapter('a', 2)], {})
    ).rejects.toMatchObject({ code: 'DUPLICATE_CHAPTER' });
    expect(platform.getCourse(SCOPE)?.books).toEqual([]);
  });

  it('creates a book with metadata defaults', async () => {
    const { platform } = createPlatform();
    await platform.ensureSection(SCOPE, 1, {});
    const created = await platform.createBook(SCOPE, 1, 'Book', [chapter('a', 1, true), chapter('b', 2, true)], {});

    expect(created.bookId).toBe('book-2');
    expect([...created.chapters.entries()]).toEqual([
      ['a', { chapterId: 'chapter-3', position: 1 }],
      ['b', { chapterId: 'chapter-4', position: 2 }],
    ]);
    expect(platform.getCourse(SCOPE)?.books[0]).toMatchObject({ title: 'Book', intro: '', numbering: 'numbers' });
    expect((await platform.listChapters('book-2')).map((c) => c.isSubchapter)).toEqual([false, true]);
  });

  it('upserts, hides and un-hides chapters by key', async () => {
    const { platform } = createPlatform();
    await platform.ensureSection(SCOPE, 1, {});
    const { bookId } = await platform.createBook(SCOPE, 1, 'Book', [chapter('a', 1)], {});

    expect(await platform.upsertChapter(bookId, chapter('b', 2))).toBe('created');
    expect(await platform.hideChapter(bookId, 'b')).toBe(true);
    expect(await platform.hideChapter(bookId, 'missing')).toBe(false);
    expect((await platform.listChapters(bookId)).map((c) => c.hidden)).toEqual([false, true]);

    expect(await platform.upsertChapter(bookId, chapter('b', 1, true))).toBe('updated');
    const states = await platform.listChapters(bookId);
    expect(states.find((c) => c.importKey === 'b')).toMatchObject({ position: 1, hidden: false, isSubchapter: false });
  });
});

// =============================================================================
// Assets
// =============================================================================

describe('MemoryCoursePlatform assets', () => {
  it('uploads new or changed assets and skips the rest', async () => {
    const { platform, repository } = createPlatform({ 'assets/a.png': 'A', 'assets/b.png': 'B' });

    expect(await platform.processAssets(SCOPE, ['assets/a.png', 'assets/b.png'])).toEqual({ uploaded: 2, skipped: 0 });
    expect(await platform.processAssets(SCOPE, ['assets/a.png', 'assets/b.png'])).toEqual({ uploaded: 0, skipped: 2 });

    repository.files.set('assets/b.png', 'B2');
    expect(await platform.processAssets(SCOPE, ['assets/a.png', 'assets/b.png'])).toEqual({ uploaded: 1, skipped: 1 });
    expect(platform.getCourse(SCOPE)?.assets['b.png'].size).toBe(2);
  });
});

// =============================================================================
// JSON Persistence
// =============================================================================

describe('JsonCoursePlatform', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'course-sync-platform-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('persists courses and continues entity ids after reopen', async () => {
    const path = join(dir, 'platform.json');
    const repository = new FakeRepository({});
    const options = { repository, clock: fixedClock, logger: createCapturingLogger().logger };

    const platform = await JsonCoursePlatform.open(path, options);
    await platform.ensureSection(SCOPE, 1, { title: 'A' });
    await platform.createTypedActivity(
      SCOPE,
      1,
      'Quiz',
      '<p>?</p>',
      { type: 'multichoice', answers: [{ text: 'Yes', correct: true, feedback: 'Good' }] },
      'q.html'
    );
    const before = platform.getCourse(SCOPE);

    const reopened = await JsonCoursePlatform.open(path, options);
    expect(reopened.getCourse(SCOPE)).toEqual(before);
    expect((await reopened.ensureSection(SCOPE, 2, {})).sectionId).toBe('section-3');
  });

  it('rejects an unknown book numbering', () => {
    const raw = {
      courses: {
        intro: {
          fullname: 'I',
          shortname: 'I',
          summary: '',
          format: 'topics',
          books: [{ id: 'book-1', sectionId: 's', title: 'B', intro: '', numbering: 'roman', visible: true }],
        },
      },
    };

    expect(() => decodePlatformDocument(raw, 'platform.json')).toThrow(
      'Invalid state file platform.json: courses.intro.books[0].numbering must be one of none, numbers, bullets, indented'
    );
  });
});
