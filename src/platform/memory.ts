/**
 * In-process course platform
 *
 * Implements ContentBuilder over a plain document of courses, sections,
 * activities, books and assets. JsonCoursePlatform persists the same
 * document to disk.
 *
 * @module platform/memory
 */

import type { RepositoryClient } from '../api/types.js';
import { logger as defaultLogger, type ApiLogger } from '../api/logger.js';
import { SyncError, UnsupportedActivityError } from '../errors.js';
import { systemClock, type Clock } from '../state/types.js';
import { contentHash } from '../utils/hash.js';
import { assetKey, assetUrlFor, rewriteAssetUrls } from './assets.js';
import {
  emptyCourse,
  emptyPlatformDocument,
  type ActivityRecord,
  type BookRecord,
  type ChapterRecord,
  type CourseRecord,
  type PlatformDocument,
  type SectionRecord,
} from './model.js';
import type {
  ActivityFrontMatter,
  AssetResult,
  BookMetadata,
  ChapterInput,
  ChapterState,
  ChapterWriteOutcome,
  ContentBuilder,
  CourseMetadata,
  CreatedBook,
  EnsureSectionResult,
  SectionMetadata,
} from './types.js';

export const DEFAULT_ASSET_BASE_URL = '/course-assets';

/**
 * Activity types the platform can construct
 */
export const SUPPORTED_ACTIVITY_TYPES = ['page', 'label', 'url', 'multichoice', 'truefalse'] as const;

export interface CoursePlatformOptions {
  /** Source of asset bytes */
  repository: RepositoryClient;
  /** Where assets are served from (default: /course-assets) */
  assetBaseUrl?: string;
  clock?: Clock;
  logger?: ApiLogger;
}

type LocatedEntity =
  | { kind: 'section'; record: SectionRecord }
  | { kind: 'activity'; record: ActivityRecord }
  | { kind: 'book'; record: BookRecord }
  | { kind: 'chapter'; record: ChapterRecord; book: BookRecord };

/**
 * Fields stored for a typed activity, checked against its type
 */
function activityFields(
  frontMatter: ActivityFrontMatter,
  repoPath: string
): Pick<ActivityRecord, 'type' | 'url' | 'answers' | 'correct'> {
  const { type } = frontMatter;
  switch (type) {
    case 'page':
    case 'label':
      return { type };
    case 'url':
      if (!frontMatter.url) {
        throw new UnsupportedActivityError(type, repoPath, "URL activity requires 'url' in front matter");
      }
      return { type, url: frontMatter.url };
    case 'multichoice': {
      const answers = frontMatter.answers ?? [];
      if (!answers.some((answer) => answer.correct)) {
        throw new UnsupportedActivityError(
          type,
          repoPath,
          "multichoice activity requires 'answers' with at least one marked correct"
        );
      }
      return { type, answers };
    }
    case 'truefalse':
      if (frontMatter.correct === undefined) {
        throw new UnsupportedActivityError(type, repoPath, "truefalse activity requires 'correct' in front matter");
      }
      return { type, correct: frontMatter.correct };
    default:
      throw new UnsupportedActivityError(type, repoPath);
  }
}

function toChapterState(chapter: ChapterRecord): ChapterState {
  return {
    chapterId: chapter.id,
    importKey: chapter.importKey,
    title: chapter.title,
    position: chapter.position,
    isSubchapter: chapter.isSubchapter,
    hidden: chapter.hidden,
  };
}

export class MemoryCoursePlatform implements ContentBuilder {
  protected document: PlatformDocument;
  private readonly repository: RepositoryClient;
  private readonly assetBaseUrl: string;
  private readonly clock: Clock;
  private readonly log: ApiLogger;

  constructor(options: CoursePlatformOptions, document: PlatformDocument = emptyPlatformDocument()) {
    this.document = document;
    this.repository = options.repository;
    this.assetBaseUrl = options.assetBaseUrl ?? DEFAULT_ASSET_BASE_URL;
    this.clock = options.clock ?? systemClock;
    this.log = (options.logger ?? defaultLogger).child({ component: 'platform' });
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  /**
   * Copy of a course as currently stored
   */
  getCourse(scope: string): CourseRecord | null {
    const course = this.document.courses[scope];
    return course ? structuredClone(course) : null;
  }

  async getVisibility(entityId: string): Promise<boolean | null> {
    const entity = this.locate(entityId);
    if (!entity) return null;
    return entity.kind === 'chapter' ? !entity.record.hidden : entity.record.visible;
  }

  async listChapters(bookId: string): Promise<ChapterState[]> {
    return [...this.requireBook(bookId).chapters]
      .sort((a, b) => a.position - b.position)
      .map(toChapterState);
  }

  async prepareContent(scope: string, body: string): Promise<string> {
    return rewriteAssetUrls(body, assetUrlFor(this.assetBaseUrl, scope));
  }

  // ---------------------------------------------------------------------------
  // Course and Sections
  // ---------------------------------------------------------------------------

  async updateRootMetadata(scope: string, metadata: CourseMetadata): Promise<boolean> {
    const course = this.course(scope);
    let changed = false;
    for (const key of ['fullname', 'shortname', 'summary', 'format'] as const) {
      const value = metadata[key];
      if (value !== undefined && course[key] !== value) {
        course[key] = value;
        changed = true;
      }
    }
    if (changed) {
      await this.persist();
    }
    return changed;
  }

  async ensureSection(
    scope: string,
    position: number,
    metadata: SectionMetadata
  ): Promise<EnsureSectionResult> {
    const course = this.course(scope);
    const title = metadata.title ?? `Section ${position}`;
    const summary = metadata.summary ?? '';
    const visible = metadata.visible ?? true;

    const existing = course.sections.find((section) => section.position === position);
    if (!existing) {
      const section: SectionRecord = { id: this.nextId('section'), position, title, summary, visible };
      course.sections.push(section);
      course.sections.sort((a, b) => a.position - b.position);
      await this.persist();
      return { sectionId: section.id, outcome: 'created' };
    }

    if (existing.title === title && existing.summary === summary && existing.visible === visible) {
      return { sectionId: existing.id, outcome: 'unchanged' };
    }
    existing.title = title;
    existing.summary = summary;
    existing.visible = visible;
    await this.persist();
    return { sectionId: existing.id, outcome: 'updated' };
  }

  // ---------------------------------------------------------------------------
  // Activities
  // ---------------------------------------------------------------------------

  async createTypedActivity(
    scope: string,
    sectionPosition: number,
    name: string,
    body: string,
    frontMatter: ActivityFrontMatter,
    repoPath: string
  ): Promise<string> {
    const fields = activityFields(frontMatter, repoPath);
    const section = this.requireSection(scope, sectionPosition);

    const activity: ActivityRecord = {
      id: this.nextId('activity'),
      sectionId: section.id,
      name,
      body,
      visible: frontMatter.visible ?? true,
      modifiedAt: this.clock().toISOString(),
      ...fields,
    };
    this.course(scope).activities.push(activity);
    await this.persist();
    return activity.id;
  }

  async updateActivity(
    entityId: string,
    name: string,
    body: string,
    frontMatter: ActivityFrontMatter,
    repoPath: string
  ): Promise<void> {
    const entity = this.locate(entityId);
    if (!entity || entity.kind !== 'activity') {
      throw new SyncError(`Activity not found: ${entityId}`, 'ENTITY_MISSING');
    }
    const activity = entity.record;
    const fields = frontMatter.type === activity.type ? activityFields(frontMatter, repoPath) : null;
    activity.name = name;
    activity.body = body;
    if (fields) {
      Object.assign(activity, fields);
    } else {
      this.log.warn('Activity type change ignored', {
        entityId,
        from: activity.type,
        to: frontMatter.type,
      });
    }
    activity.modifiedAt = this.clock().toISOString();
    await this.persist();
  }

  async moveToSection(scope: string, entityId: string, sectionPosition: number): Promise<void> {
    const section = this.requireSection(scope, sectionPosition);
    const entity = this.locate(entityId);
    if (!entity || (entity.kind !== 'activity' && entity.kind !== 'book')) {
      throw new SyncError(`Activity not found: ${entityId}`, 'ENTITY_MISSING');
    }
    if (entity.record.sectionId === section.id) {
      return;
    }
    entity.record.sectionId = section.id;
    await this.persist();
  }

  // ---------------------------------------------------------------------------
  // Books
  // ---------------------------------------------------------------------------

  async createBook(
    scope: string,
    sectionPosition: number,
    name: string,
    chapters: ChapterInput[],
    metadata: BookMetadata
  ): Promise<CreatedBook> {
    const section = this.requireSection(scope, sectionPosition);
    const keys = new Set(chapters.map((chapter) => chapter.importKey));
    if (keys.size !== chapters.length) {
      throw new SyncError(`Duplicate chapter keys in book ${name}`, 'DUPLICATE_CHAPTER');
    }

    // Everything is assembled before the single insert below
    const book: BookRecord = {
      id: this.nextId('book'),
      sectionId: section.id,
      title: metadata.title ?? name,
      intro: metadata.intro ?? '',
      numbering: metadata.numbering ?? 'numbers',
      visible: true,
      chapters: chapters.map((chapter, index) => ({
        id: this.nextId('chapter'),
        importKey: chapter.importKey,
        title: chapter.title,
        body: chapter.body,
        position: chapter.position,
        isSubchapter: index === 0 ? false : chapter.isSubchapter,
        hidden: false,
      })),
    };

    this.course(scope).books.push(book);
    await this.persist();

    return {
      bookId: book.id,
      chapters: new Map(
        book.chapters.map((chapter) => [
          chapter.importKey,
          { chapterId: chapter.id, position: chapter.position },
        ])
      ),
    };
  }

  async updateBookMetadata(bookId: string, name: string, metadata: BookMetadata): Promise<void> {
    const book = this.requireBook(bookId);
    book.title = metadata.title ?? name;
    book.intro = metadata.intro ?? '';
    book.numbering = metadata.numbering ?? 'numbers';
    await this.persist();
  }

  async upsertChapter(bookId: string, input: ChapterInput): Promise<ChapterWriteOutcome> {
    const book = this.requireBook(bookId);
    const existing = book.chapters.find((chapter) => chapter.importKey === input.importKey);

    if (existing) {
      existing.title = input.title;
      existing.body = input.body;
      existing.position = input.position;
      existing.isSubchapter = input.position === 1 ? false : input.isSubchapter;
      existing.hidden = false;
      await this.persist();
      return 'updated';
    }

    book.chapters.push({
      id: this.nextId('chapter'),
      importKey: input.importKey,
      title: input.title,
      body: input.body,
      position: input.position,
      isSubchapter: input.position === 1 ? false : input.isSubchapter,
      hidden: false,
    });
    await this.persist();
    return 'created';
  }

  async hideChapter(bookId: string, importKey: string): Promise<boolean> {
    const chapter = this.requireBook(bookId).chapters.find((c) => c.importKey === importKey);
    if (!chapter) {
      return false;
    }
    chapter.hidden = true;
    await this.persist();
    return true;
  }

  // ---------------------------------------------------------------------------
  // Visibility
  // ---------------------------------------------------------------------------

  async setVisible(entityId: string, visible: boolean): Promise<void> {
    const entity = this.locate(entityId);
    if (!entity) {
      throw new SyncError(`Entity not found: ${entityId}`, 'ENTITY_MISSING');
    }
    if (entity.kind === 'chapter') {
      entity.record.hidden = !visible;
    } else {
      entity.record.visible = visible;
    }
    await this.persist();
  }

  // ---------------------------------------------------------------------------
  // Assets
  // ---------------------------------------------------------------------------

  async processAssets(scope: string, assetPaths: string[]): Promise<AssetResult> {
    const course = this.course(scope);
    const result: AssetResult = { uploaded: 0, skipped: 0 };

    for (const path of assetPaths) {
      const bytes = await this.repository.getFileContents(scope, path);
      const hash = contentHash(bytes);
      const key = assetKey(path);

      if (course.assets[key]?.hash === hash) {
        result.skipped++;
        continue;
      }
      course.assets[key] = { hash, size: bytes.byteLength, uploadedAt: this.clock().toISOString() };
      result.uploaded++;
      this.log.debug('Asset uploaded', { scope, path, size: bytes.byteLength });
    }

    if (result.uploaded > 0) {
      await this.persist();
    }
    return result;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  /** Called after every mutation */
  protected async persist(): Promise<void> {}

  private course(scope: string): CourseRecord {
    let course = this.document.courses[scope];
    if (!course) {
      course = emptyCourse(scope);
      this.document.courses[scope] = course;
    }
    return course;
  }

  private nextId(kind: string): string {
    const id = `${kind}-${this.document.nextId}`;
    this.document.nextId++;
    return id;
  }

  private requireSection(scope: string, position: number): SectionRecord {
    const section = this.course(scope).sections.find((s) => s.position === position);
    if (!section) {
      throw new SyncError(`No section at position ${position} in ${scope}`, 'SECTION_MISSING');
    }
    return section;
  }

  private requireBook(bookId: string): BookRecord {
    const entity = this.locate(bookId);
    if (!entity || entity.kind !== 'book') {
      throw new SyncError(`Book not found: ${bookId}`, 'ENTITY_MISSING');
    }
    return entity.record;
  }

  private locate(entityId: string): LocatedEntity | null {
    for (const course of Object.values(this.document.courses)) {
      const section = course.sections.find((s) => s.id === entityId);
      if (section) return { kind: 'section', record: section };

      const activity = course.activities.find((a) => a.id === entityId);
      if (activity) return { kind: 'activity', record: activity };

      for (const book of course.books) {
        if (book.id === entityId) return { kind: 'book', record: book };
        const chapter = book.chapters.find((c) => c.id === entityId);
        if (chapter) return { kind: 'chapter', record: chapter, book };
      }
    }
    return null;
  }
}
