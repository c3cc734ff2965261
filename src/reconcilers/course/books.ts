/**
 * Book and chapter reconciliation
 *
 * A new book is created in one builder call together with all of its
 * chapters. For an existing book every chapter is matched to the key it is
 * filed under on the platform: the key stored on its own mapping record, or,
 * for a path seen for the first time, the key of a chapter that vanished
 * from the same book with identical content (a rename). Positions always
 * come from the current filename order.
 *
 * @module reconcilers/course/books
 */

import { contentHash } from '../../utils/hash.js';
import type { BookMetadata, ChapterInput, ChapterState } from '../../platform/types.js';
import type { MappingRecord } from '../../state/types.js';
import { parseFrontMatter } from '../frontmatter/parse.js';
import { toBookMetadata, toChapterFrontMatter } from '../frontmatter/fields.js';
import { deriveDisplayName, isChapterPath } from '../tree/classify.js';
import type { BookNode } from '../tree/types.js';
import type { RunContext } from './context.js';

// =============================================================================
// Types
// =============================================================================

/**
 * A chapter file read and prepared for comparison
 */
export interface PreparedChapter {
  path: string;
  title: string;
  body: string;
  hash: string;
  isSubchapter: boolean;
  /** 1-based */
  position: number;
}

/**
 * Platform key for a current chapter and the hash last written under it
 */
export interface ResolvedChapterKey {
  importKey: string;
  previousHash: string | null;
  /** Path of the vanished chapter whose key was taken over */
  renamedFrom?: string;
}

// =============================================================================
// Preparation
// =============================================================================

async function prepareChapters(ctx: RunContext, book: BookNode): Promise<PreparedChapter[]> {
  const chapters: PreparedChapter[] = [];
  let position = 0;

  for (const [filename, path] of book.chapters) {
    position++;
    const { frontMatter, body } = parseFrontMatter(await ctx.fetchText(path));
    const fields = toChapterFrontMatter(frontMatter);
    const prepared = await ctx.builder.prepareContent(ctx.scope, body);
    chapters.push({
      path,
      title: fields.title ?? deriveDisplayName(filename),
      body: prepared,
      hash: contentHash(prepared),
      isSubchapter: position > 1 && fields.subchapter === true,
      position,
    });
  }

  return chapters;
}

function toInput(chapter: PreparedChapter, importKey: string): ChapterInput {
  return {
    importKey,
    title: chapter.title,
    body: chapter.body,
    isSubchapter: chapter.isSubchapter,
    position: chapter.position,
  };
}

// =============================================================================
// Key Resolution
// =============================================================================

/**
 * Match current chapters to platform keys
 *
 * @param records - Mapping record per current chapter path, when one exists
 * @param vanished - Records of this book's chapters whose paths are gone
 */
export function resolveChapterKeys(
  chapters: PreparedChapter[],
  records: Map<string, MappingRecord>,
  vanished: MappingRecord[]
): Map<string, ResolvedChapterKey> {
  const resolved = new Map<string, ResolvedChapterKey>();
  const claimed = new Set<string>();

  for (const chapter of chapters) {
    const record = records.get(chapter.path);
    if (!record) continue;
    const importKey = record.importKey ?? record.repoPath;
    if (claimed.has(importKey)) continue;
    resolved.set(chapter.path, { importKey, previousHash: record.contentHash });
    claimed.add(importKey);
  }

  for (const chapter of chapters) {
    if (resolved.has(chapter.path)) continue;

    const predecessor = vanished.find(
      (record) =>
        record.contentHash === chapter.hash && !claimed.has(record.importKey ?? record.repoPath)
    );
    if (predecessor) {
      const importKey = predecessor.importKey ?? predecessor.repoPath;
      resolved.set(chapter.path, {
        importKey,
        previousHash: predecessor.contentHash,
        renamedFrom: predecessor.repoPath,
      });
      claimed.add(importKey);
      continue;
    }

    const importKey = claimed.has(chapter.path)
      ? `${chapter.path}#${chapter.position}`
      : chapter.path;
    resolved.set(chapter.path, { importKey, previousHash: null });
    claimed.add(importKey);
  }

  return resolved;
}

// =============================================================================
// Book Reconciliation
// =============================================================================

/**
 * Create or update one book and its chapters
 */
export async function reconcileBook(
  ctx: RunContext,
  sectionPosition: number,
  sectionId: string,
  book: BookNode
): Promise<void> {
  const { scope, builder, mappings, operations, counters } = ctx;

  let metadata: BookMetadata = {};
  let metadataHash: string | null = null;
  if (book.metadataPath) {
    const { data, text } = await ctx.readMetadata(book.metadataPath);
    metadata = toBookMetadata(data);
    metadataHash = contentHash(text);
  }

  const name = deriveDisplayName(book.name);
  const title = metadata.title ?? name;
  const chapters = await prepareChapters(ctx, book);

  const record = await mappings.lookup(scope, book.path);
  let bookId = record?.entityId ?? null;
  const visibility = bookId ? await builder.getVisibility(bookId) : null;
  if (visibility === null) {
    bookId = null;
  }

  // ---------------------------------------------------------------------------
  // New book
  // ---------------------------------------------------------------------------

  if (bookId === null) {
    ctx.touch(book.path);
    if (book.metadataPath) ctx.touch(book.metadataPath);
    for (const chapter of chapters) ctx.touch(chapter.path);

    if (chapters.length === 0) {
      operations.record('book_skip', book.path, 'no chapters');
      return;
    }

    const created = await builder.createBook(
      scope,
      sectionPosition,
      name,
      chapters.map((chapter) => toInput(chapter, chapter.path)),
      metadata
    );

    for (const chapter of chapters) {
      await mappings.upsert(scope, chapter.path, {
        entityId: created.bookId,
        parentEntityId: sectionId,
        contentHash: chapter.hash,
        importKey: chapter.path,
      });
    }
    await mappings.upsert(scope, book.path, { entityId: created.bookId, parentEntityId: sectionId });
    if (book.metadataPath) {
      await mappings.upsert(scope, book.metadataPath, {
        entityId: created.bookId,
        parentEntityId: sectionId,
        contentHash: metadataHash,
      });
    }

    ctx.touch(book.path, created.bookId);
    counters.activitiesCreated++;
    counters.chaptersCreated += created.chapters.size;
    operations.record('book_create', book.path, `${title} (${created.chapters.size} chapters)`);
    return;
  }

  // ---------------------------------------------------------------------------
  // Existing book
  // ---------------------------------------------------------------------------

  ctx.touch(book.path, bookId);

  if (record?.parentEntityId !== sectionId) {
    await builder.moveToSection(scope, bookId, sectionPosition);
    await mappings.upsert(scope, book.path, { parentEntityId: sectionId });
    counters.activitiesUpdated++;
    operations.record('activity_move', book.path, `to section ${sectionPosition}`);
  }

  if (visibility === false) {
    await builder.setVisible(bookId, true);
    counters.activitiesRestored++;
    operations.record('activity_restore', book.path, title);
  }

  if (book.metadataPath) {
    ctx.touch(book.metadataPath, bookId);
    const metadataRecord = await mappings.lookup(scope, book.metadataPath);
    if (metadataRecord?.contentHash !== metadataHash) {
      await builder.updateBookMetadata(bookId, name, metadata);
      await mappings.upsert(scope, book.metadataPath, {
        entityId: bookId,
        parentEntityId: sectionId,
        contentHash: metadataHash,
      });
      counters.activitiesUpdated++;
      operations.record('book_update', book.metadataPath, title);
    }
  }

  await reconcileChapters(ctx, bookId, sectionId, book, chapters);
}

async function reconcileChapters(
  ctx: RunContext,
  bookId: string,
  sectionId: string,
  book: BookNode,
  chapters: PreparedChapter[]
): Promise<void> {
  const { scope, builder, mappings, operations, counters } = ctx;

  const records = new Map<string, MappingRecord>();
  for (const chapter of chapters) {
    const record = await mappings.lookup(scope, chapter.path);
    if (record && record.entityId === bookId) {
      records.set(chapter.path, record);
    }
  }

  const currentPaths = new Set(chapters.map((chapter) => chapter.path));
  const vanished = (await mappings.list(scope)).filter(
    (record) =>
      record.entityId === bookId &&
      record.contentHash !== null &&
      record.repoPath.startsWith(`${book.path}/`) &&
      isChapterPath(record.repoPath, ctx.layout) &&
      !currentPaths.has(record.repoPath)
  );

  const keys = resolveChapterKeys(chapters, records, vanished);
  const existing = new Map<string, ChapterState>(
    (await builder.listChapters(bookId)).map((state) => [state.importKey, state])
  );

  for (const chapter of chapters) {
    const resolved = keys.get(chapter.path);
    if (!resolved) continue;
    const { importKey, previousHash, renamedFrom } = resolved;
    const state = existing.get(importKey);
    const input = toInput(chapter, importKey);

    ctx.touch(chapter.path);
    if (renamedFrom) {
      operations.record('chapter_rename', chapter.path, `from ${renamedFrom}`);
    }

    if (!state) {
      await builder.upsertChapter(bookId, input);
      counters.chaptersCreated++;
      operations.record('chapter_create', chapter.path, chapter.title);
    } else if (previousHash !== chapter.hash) {
      await builder.upsertChapter(bookId, input);
      counters.chaptersUpdated++;
      operations.record('chapter_update', chapter.path, chapter.title);
    } else if (state.title !== chapter.title || state.isSubchapter !== chapter.isSubchapter) {
      await builder.upsertChapter(bookId, input);
      counters.chaptersUpdated++;
      operations.record('chapter_update', chapter.path, chapter.title);
    } else if (state.position !== chapter.position || state.hidden) {
      await builder.upsertChapter(bookId, input);
      counters.chaptersReordered++;
      operations.record('chapter_reorder', chapter.path, `position ${state.position} -> ${chapter.position}`);
    } else {
      operations.record('chapter_skip', chapter.path, 'unchanged');
    }

    await mappings.upsert(scope, chapter.path, {
      entityId: bookId,
      parentEntityId: sectionId,
      contentHash: chapter.hash,
      importKey,
    });
  }

  const currentKeys = new Set([...keys.values()].map((resolved) => resolved.importKey));
  for (const state of existing.values()) {
    if (currentKeys.has(state.importKey) || state.hidden) continue;
    if (await builder.hideChapter(bookId, state.importKey)) {
      counters.chaptersHidden++;
      operations.record('chapter_hide', state.importKey, state.title);
    }
  }
}
