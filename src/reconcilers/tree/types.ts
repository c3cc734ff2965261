/**
 * Types for repository tree classification
 */

// =============================================================================
// Input
// =============================================================================

export type TreeEntryKind = 'blob' | 'tree';

/**
 * One entry of a flat snapshot listing
 */
export interface TreeEntry {
  /** `/`-separated path relative to the repository root */
  path: string;
  kind: TreeEntryKind;
  /** Byte size; 0 for trees */
  size: number;
}

/**
 * File and directory names the classifier recognizes
 */
export interface TreeLayout {
  /** Root metadata file at the repository root */
  rootMetadataFile: string;
  /** Metadata file inside a section directory */
  sectionMetadataFile: string;
  /** Metadata file inside a book directory */
  bookMetadataFile: string;
  /** When set, only pages and chapters with one of these extensions count */
  pageExtensions?: string[];
}

export const DEFAULT_LAYOUT: TreeLayout = {
  rootMetadataFile: 'course.yaml',
  sectionMetadataFile: 'section.yaml',
  bookMetadataFile: 'book.yaml',
};

// =============================================================================
// Output
// =============================================================================

/**
 * A directory under a section holding ordered chapters
 */
export interface BookNode {
  /** Directory name */
  name: string;
  /** `sections/<section>/<book>` */
  path: string;
  metadataPath?: string;
  /** Chapter filename to repository path, ordinal order */
  chapters: Map<string, string>;
}

/**
 * A directory under `sections/`
 */
export interface SectionNode {
  /** Directory name */
  name: string;
  /** `sections/<section>` */
  path: string;
  metadataPath?: string;
  /** Page filename to repository path, ordinal order */
  pages: Map<string, string>;
  /** Book directory name to book, ordinal order */
  books: Map<string, BookNode>;
}

/**
 * Classified snapshot
 */
export interface StructuredTree {
  rootMetadataPath?: string;
  /** Section directory name to section, ordinal order */
  sections: Map<string, SectionNode>;
  /** Asset paths, ordinal order */
  assets: string[];
}
