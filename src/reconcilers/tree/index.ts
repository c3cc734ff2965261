/**
 * Tree classifier exports
 */

export type {
  TreeEntryKind,
  TreeEntry,
  TreeLayout,
  BookNode,
  SectionNode,
  StructuredTree,
} from './types.js';

export { DEFAULT_LAYOUT } from './types.js';

export {
  classifyTree,
  compareOrdinal,
  deriveDisplayName,
  isAssetPath,
  isChapterPath,
  listClassifiedPaths,
  SECTIONS_DIR,
  ASSETS_PREFIX,
} from './classify.js';
