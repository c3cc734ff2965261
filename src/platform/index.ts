/**
 * Course platform exports
 */

export type {
  CourseMetadata,
  SectionMetadata,
  BookNumbering,
  BookMetadata,
  AnswerSpec,
  ActivityFrontMatter,
  ChapterFrontMatter,
  SectionOutcome,
  EnsureSectionResult,
  ChapterInput,
  CreatedChapter,
  CreatedBook,
  ChapterState,
  ChapterWriteOutcome,
  AssetResult,
  ContentBuilder,
} from './types.js';

export type {
  SectionRecord,
  ActivityRecord,
  ChapterRecord,
  BookRecord,
  AssetRecord,
  CourseRecord,
  PlatformDocument,
} from './model.js';

export {
  MemoryCoursePlatform,
  DEFAULT_ASSET_BASE_URL,
  SUPPORTED_ACTIVITY_TYPES,
  type CoursePlatformOptions,
} from './memory.js';
export { JsonCoursePlatform, decodePlatformDocument } from './json.js';
export { rewriteAssetUrls, assetUrlFor, assetKey } from './assets.js';
