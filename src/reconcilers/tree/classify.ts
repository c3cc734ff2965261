/**
 * Snapshot tree classification
 *
 * Turns a flat path listing into the course structure:
 *
 * ```
 * course.yaml                         root metadata
 * assets/**                           assets
 * sections/<A>/section.yaml           section metadata
 * sections/<A>/<B>                    page (blob)
 * sections/<A>/<B>/book.yaml          book metadata
 * sections/<A>/<B>/<C>                chapter (blob, <B> is a tree)
 * ```
 *
 * Anything else is ignored. Directories are indexed before files are
 * matched, so the result does not depend on listing order.
 *
 * @module reconcilers/tree/classify
 */

import {
  DEFAULT_LAYOUT,
  type BookNode,
  type SectionNode,
  type StructuredTree,
  type TreeEntry,
  type TreeLayout,
} from './types.js';

export const SECTIONS_DIR = 'sections';
export const ASSETS_PREFIX = 'assets/';

// =============================================================================
// Helpers
// =============================================================================

/**
 * Ordinal (UTF-16 code unit) comparison, independent of locale
 */
export function compareOrdinal(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function sortedMap<V>(map: Map<string, V>): Map<string, V> {
  return new Map([...map.entries()].sort(([a], [b]) => compareOrdinal(a, b)));
}

function acceptsPage(filename: string, layout: TreeLayout): boolean {
  if (!layout.pageExtensions || layout.pageExtensions.length === 0) {
    return true;
  }
  return layout.pageExtensions.some((ext) => filename.endsWith(ext));
}

/**
 * Human-readable name from a file or directory name
 *
 * @example
 * deriveDisplayName('01-welcome.html') // 'Welcome'
 * deriveDisplayName('02-interactive_lesson.html') // 'Interactive Lesson'
 */
export function deriveDisplayName(filename: string): string {
  const dot = filename.lastIndexOf('.');
  const stem = dot > 0 ? filename.substring(0, dot) : filename;
  return stem
    .replace(/^\d+-/, '')
    .replace(/[-_]/g, ' ')
    .trim()
    .replace(/(^|\s)(\S)/g, (_match, space: string, first: string) => space + first.toUpperCase());
}

/**
 * True for paths the asset step owns
 */
export function isAssetPath(path: string): boolean {
  return path.startsWith(ASSETS_PREFIX) && path.length > ASSETS_PREFIX.length;
}

/**
 * True for `sections/<A>/<B>/<C>` chapter paths (book metadata excluded)
 */
export function isChapterPath(path: string, layout: TreeLayout = DEFAULT_LAYOUT): boolean {
  const segments = path.split('/');
  return (
    segments.length === 4 &&
    segments[0] === SECTIONS_DIR &&
    segments.every((segment) => segment.length > 0) &&
    segments[3] !== layout.bookMetadataFile
  );
}

// =============================================================================
// Classification
// =============================================================================

/**
 * Classify a flat snapshot listing
 */
export function classifyTree(
  entries: readonly TreeEntry[],
  layout: TreeLayout = DEFAULT_LAYOUT
): StructuredTree {
  const directories = new Set(
    entries.filter((entry) => entry.kind === 'tree').map((entry) => entry.path)
  );
  const sections = new Map<string, SectionNode>();
  const assets: string[] = [];
  let rootMetadataPath: string | undefined;

  const ensureSection = (name: string): SectionNode => {
    let section = sections.get(name);
    if (!section) {
      section = {
        name,
        path: `${SECTIONS_DIR}/${name}`,
        pages: new Map(),
        books: new Map(),
      };
      sections.set(name, section);
    }
    return section;
  };

  const ensureBook = (section: SectionNode, name: string): BookNode => {
    let book = section.books.get(name);
    if (!book) {
      book = { name, path: `${section.path}/${name}`, chapters: new Map() };
      section.books.set(name, book);
    }
    return book;
  };

  for (const entry of entries) {
    const { path, kind } = entry;

    if (kind === 'blob' && path === layout.rootMetadataFile) {
      rootMetadataPath = path;
      continue;
    }

    if (kind === 'blob' && isAssetPath(path)) {
      assets.push(path);
      continue;
    }

    const segments = path.split('/');
    if (segments[0] !== SECTIONS_DIR || segments.some((segment) => segment.length === 0)) {
      continue;
    }
    const [, sectionName, second, third] = segments;

    if (kind === 'tree') {
      if (segments.length === 2) {
        ensureSection(sectionName);
      } else if (segments.length === 3) {
        ensureBook(ensureSection(sectionName), second);
      }
      continue;
    }

    if (segments.length === 4 && directories.has(`${SECTIONS_DIR}/${sectionName}/${second}`)) {
      const book = ensureBook(ensureSection(sectionName), second);
      if (third === layout.bookMetadataFile) {
        book.metadataPath = path;
      } else if (acceptsPage(third, layout)) {
        book.chapters.set(third, path);
      }
      continue;
    }

    if (segments.length === 3) {
      const section = ensureSection(sectionName);
      if (second === layout.sectionMetadataFile) {
        section.metadataPath = path;
      } else if (acceptsPage(second, layout)) {
        section.pages.set(second, path);
      }
    }
  }

  const ordered = new Map<string, SectionNode>();
  for (const [name, section] of sortedMap(sections)) {
    const books = new Map<string, BookNode>();
    for (const [bookName, book] of sortedMap(section.books)) {
      books.set(bookName, { ...book, chapters: sortedMap(book.chapters) });
    }
    ordered.set(name, { ...section, pages: sortedMap(section.pages), books });
  }

  return {
    rootMetadataPath,
    sections: ordered,
    assets: [...assets].sort(compareOrdinal),
  };
}

/**
 * Every path the tree accounts for, in classification order
 */
export function listClassifiedPaths(tree: StructuredTree): string[] {
  const paths: string[] = [];
  if (tree.rootMetadataPath) paths.push(tree.rootMetadataPath);
  for (const section of tree.sections.values()) {
    paths.push(section.path);
    if (section.metadataPath) paths.push(section.metadataPath);
    paths.push(...section.pages.values());
    for (const book of section.books.values()) {
      paths.push(book.path);
      if (book.metadataPath) paths.push(book.metadataPath);
      paths.push(...book.chapters.values());
    }
  }
  paths.push(...tree.assets);
  return paths;
}
