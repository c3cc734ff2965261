/**
 * Front matter and metadata parsing exports
 */

export type {
  FrontMatterScalar,
  FrontMatterItem,
  FrontMatterValue,
  FrontMatter,
  ParsedDocument,
  MetadataMap,
  MetadataParseResult,
  MetadataParser,
  MetadataStrategy,
} from './types.js';

export {
  parseScalar,
  splitFrontMatter,
  parseFlatBlock,
  parseFrontMatter,
  parseNestedBlock,
  parseNestedFrontMatter,
  type ScalarOptions,
} from './parse.js';

export {
  yamlMetadataParser,
  simpleMetadataParser,
  MetadataReader,
  createMetadataReader,
  type MetadataReadResult,
} from './metadata.js';

export {
  toCourseMetadata,
  toSectionMetadata,
  toBookMetadata,
  toActivityFrontMatter,
  toChapterFrontMatter,
  isEmptyMetadata,
} from './fields.js';
