/**
 * Content model and the operations the reconciler drives on a course
 * platform
 */

// =============================================================================
// Typed Metadata
// =============================================================================

/**
 * Root metadata (course.yaml)
 */
export interface CourseMetadata {
  fullname?: string;
  shortname?: string;
  summary?: string;
  /** Course format, e.g. `topics` or `weeks` */
  format?: string;
}

/**
 * Section metadata (section.yaml)
 */
export interface SectionMetadata {
  title?: string;
  summary?: string;
  visible?: boolean;
}

export type BookNumbering = 'none' | 'numbers' | 'bullets' | 'indented';

/**
 * Book metadata (book.yaml)
 */
export interface BookMetadata {
  title?: string;
  intro?: string;
  numbering?: BookNumbering;
}

/**
 * One answer of a multiple-choice activity
 */
export interface AnswerSpec {
  text: string;
  correct: boolean;
  feedback?: string;
}

/**
 * Page front matter after field extraction
 */
export interface ActivityFrontMatter {
  /** Activity type; `page` when absent */
  type: string;
  /** Overrides the name derived from the filename */
  name?: string;
  visible?: boolean;
  /** Target of a `url` activity */
  url?: string;
  /** Answers of a `multichoice` activity */
  answers?: AnswerSpec[];
  /** Correct answer of a `truefalse` activity */
  correct?: boolean;
}

/**
 * Chapter front matter after field extraction
 */
export interface ChapterFrontMatter {
  title?: string;
  subchapter?: boolean;
}

// =============================================================================
// Builder Inputs and Outputs
// =============================================================================

export type SectionOutcome = 'created' | 'updated' | 'unchanged';

export interface EnsureSectionResult {
  sectionId: string;
  outcome: SectionOutcome;
}

/**
 * A chapter handed to createBook
 */
export interface ChapterInput {
  /** Stable key the chapter is filed under (its first source path) */
  importKey: string;
  title: string;
  body: string;
  isSubchapter: boolean;
  /** 1-based */
  position: number;
}

export interface CreatedChapter {
  chapterId: string;
  position: number;
}

export interface CreatedBook {
  bookId: string;
  /** importKey to created chapter */
  chapters: Map<string, CreatedChapter>;
}

/**
 * Platform-side view of an existing chapter
 */
export interface ChapterState {
  chapterId: string;
  importKey: string;
  title: string;
  position: number;
  isSubchapter: boolean;
  hidden: boolean;
}

export type ChapterWriteOutcome = 'created' | 'updated';

export interface AssetResult {
  uploaded: number;
  skipped: number;
}

// =============================================================================
// Content Builder
// =============================================================================

/**
 * Operations the reconciler performs on the course platform
 *
 * Entity ids are unique across kinds. `createBook` persists the book and all
 * of its chapters together or not at all.
 */
export interface ContentBuilder {
  /** Apply non-empty root metadata; true when something changed */
  updateRootMetadata(scope: string, metadata: CourseMetadata): Promise<boolean>;

  /** Create the section at `position` if absent, then apply metadata */
  ensureSection(
    scope: string,
    position: number,
    metadata: SectionMetadata
  ): Promise<EnsureSectionResult>;

  /** Rewrite repository asset references in a body to served URLs */
  prepareContent(scope: string, body: string): Promise<string>;

  /** @throws UnsupportedActivityError for unknown types or missing fields */
  createTypedActivity(
    scope: string,
    sectionPosition: number,
    name: string,
    body: string,
    frontMatter: ActivityFrontMatter,
    repoPath: string
  ): Promise<string>;

  updateActivity(
    entityId: string,
    name: string,
    body: string,
    frontMatter: ActivityFrontMatter,
    repoPath: string
  ): Promise<void>;

  /** Re-parent an activity or book under the section at `sectionPosition` */
  moveToSection(scope: string, entityId: string, sectionPosition: number): Promise<void>;

  createBook(
    scope: string,
    sectionPosition: number,
    name: string,
    chapters: ChapterInput[],
    metadata: BookMetadata
  ): Promise<CreatedBook>;

  updateBookMetadata(bookId: string, name: string, metadata: BookMetadata): Promise<void>;

  listChapters(bookId: string): Promise<ChapterState[]>;

  /** Create or update the chapter filed under `importKey`; always un-hides it */
  upsertChapter(bookId: string, chapter: ChapterInput): Promise<ChapterWriteOutcome>;

  /** @returns false when no chapter is filed under `importKey` */
  hideChapter(bookId: string, importKey: string): Promise<boolean>;

  /** @returns null when the entity no longer exists */
  getVisibility(entityId: string): Promise<boolean | null>;

  setVisible(entityId: string, visible: boolean): Promise<void>;

  /** Upload changed assets; unchanged content is skipped */
  processAssets(scope: string, assetPaths: string[]): Promise<AssetResult>;
}
