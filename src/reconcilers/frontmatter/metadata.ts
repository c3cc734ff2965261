/**
 * Metadata file parsing (course.yaml, section.yaml, book.yaml)
 *
 * Two strategies implement MetadataParser: the `yaml` package, and the flat
 * key/value subset shared with front matter. MetadataReader runs the
 * configured primary and, when it reports a problem, reads the file again
 * with the flat strategy and emits a ParseFallbackWarning.
 *
 * @module reconcilers/frontmatter/metadata
 */

import { parseDocument } from 'yaml';
import type { ParseFallbackWarning } from '../../errors.js';
import { parseFlatBlock } from './parse.js';
import type {
  MetadataMap,
  MetadataParseResult,
  MetadataParser,
  MetadataStrategy,
} from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// =============================================================================
// Strategies
// =============================================================================

/**
 * Full YAML via the `yaml` package. Syntax errors come back as values.
 */
export const yamlMetadataParser: MetadataParser = {
  name: 'yaml',
  parse(text: string): MetadataParseResult {
    const doc = parseDocument(text);
    if (doc.errors.length > 0) {
      return { ok: false, reason: doc.errors[0].message };
    }
    const data: unknown = doc.toJS();
    if (data === null || data === undefined) {
      return { ok: true, data: {} };
    }
    if (!isRecord(data)) {
      return { ok: false, reason: 'top-level value is not a mapping' };
    }
    return { ok: true, data };
  },
};

/**
 * `key: value` lines only; document markers are skipped. Never fails.
 */
export const simpleMetadataParser: MetadataParser = {
  name: 'simple',
  parse(text: string): MetadataParseResult {
    const body = text
      .split(/\r?\n/)
      .filter((line) => {
        const trimmed = line.trim();
        return trimmed !== '---' && trimmed !== '...';
      })
      .join('\n');
    return { ok: true, data: parseFlatBlock(body) };
  },
};

// =============================================================================
// Reader
// =============================================================================

/**
 * Result of reading one metadata file
 */
export interface MetadataReadResult {
  data: MetadataMap;
  /** Set when the fallback strategy produced `data` */
  warning?: ParseFallbackWarning;
}

/**
 * Reads metadata files with a primary strategy and a flat fallback
 */
export class MetadataReader {
  constructor(
    private readonly primary: MetadataParser,
    private readonly fallback: MetadataParser = simpleMetadataParser
  ) {}

  get strategy(): string {
    return this.primary.name;
  }

  read(path: string, text: string): MetadataReadResult {
    const primary = this.primary.parse(text);
    if (primary.ok) {
      return { data: primary.data };
    }

    const fallback = this.fallback.parse(text);
    return {
      data: fallback.ok ? fallback.data : {},
      warning: {
        kind: 'parse_fallback',
        path,
        strategy: this.primary.name,
        reason: primary.reason,
      },
    };
  }
}

/**
 * Reader for a configured strategy name
 */
export function createMetadataReader(strategy: MetadataStrategy = 'yaml'): MetadataReader {
  return new MetadataReader(strategy === 'yaml' ? yamlMetadataParser : simpleMetadataParser);
}
