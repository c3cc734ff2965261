/**
 * Types for front matter and metadata parsing
 */

export type FrontMatterScalar = string | number | boolean;

/**
 * A list item: a bare scalar or a flat map of scalars
 */
export type FrontMatterItem = FrontMatterScalar | { [key: string]: FrontMatterScalar };

export type FrontMatterValue = FrontMatterScalar | FrontMatterItem[];

export type FrontMatter = { [key: string]: FrontMatterValue };

/**
 * A page or chapter file split into metadata and body
 */
export interface ParsedDocument {
  frontMatter: FrontMatter;
  /** Text after the closing delimiter, or the whole input */
  body: string;
}

/**
 * Parsed metadata file contents before typed field extraction
 */
export type MetadataMap = Record<string, unknown>;

export type MetadataParseResult =
  | { ok: true; data: MetadataMap }
  | { ok: false; reason: string };

/**
 * One way of reading a metadata file
 */
export interface MetadataParser {
  /** Strategy name reported in fallback warnings */
  readonly name: string;
  parse(text: string): MetadataParseResult;
}

export type MetadataStrategy = 'yaml' | 'simple';
