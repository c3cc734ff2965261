/**
 * Front matter parsing for page and chapter files
 *
 * A file may open with a block delimited by `---` lines:
 *
 * ```
 * ---
 * type: multichoice
 * name: "Quick check"
 * answers:
 *   - text: Paris
 *     correct: true
 *   - text: Lyon
 * ---
 * <p>What is the capital of France?</p>
 * ```
 *
 * Two variants read the block. The flat variant understands `key: value`
 * lines only. The nested variant also understands one level of lists whose
 * items are scalars or flat maps. Neither ever throws: lines outside the
 * subset are skipped.
 *
 * @module reconcilers/frontmatter/parse
 */

import type {
  FrontMatter,
  FrontMatterItem,
  FrontMatterScalar,
  ParsedDocument,
} from './types.js';

const FRONT_MATTER_PATTERN = /^---[ \t]*\r?\n([\s\S]*?)\r?\n---[ \t]*\r?\n/;
const KEY_VALUE_PATTERN = /^([A-Za-z_][A-Za-z0-9_]*)\s*:\s*(.*)$/;
const LIST_ITEM_PATTERN = /^\s*-\s+(.+)$/;
const INTEGER_PATTERN = /^\d+$/;

// =============================================================================
// Scalars
// =============================================================================

export interface ScalarOptions {
  /** Convert all-digit values to numbers */
  integers?: boolean;
}

/**
 * Interpret a raw value: matching quotes are stripped (the result stays a
 * string), `true`/`false` become booleans, and with `integers` all-digit
 * values become numbers.
 */
export function parseScalar(raw: string, options: ScalarOptions = {}): FrontMatterScalar {
  const value = raw.trim();
  if (value.length >= 2) {
    const first = value[0];
    const last = value[value.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      return value.substring(1, value.length - 1);
    }
  }
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (options.integers && INTEGER_PATTERN.test(value)) {
    const parsed = Number(value);
    if (Number.isSafeInteger(parsed)) {
      return parsed;
    }
  }
  return value;
}

function isSafeKey(key: string): boolean {
  return key !== '__proto__';
}

function lines(block: string): string[] {
  return block.split(/\r?\n/);
}

function isSkippable(trimmed: string): boolean {
  return trimmed.length === 0 || trimmed.startsWith('#');
}

// =============================================================================
// Splitting
// =============================================================================

/**
 * Split a document into its raw front matter block and body
 *
 * @returns `null` block when the document has no complete front matter
 */
export function splitFrontMatter(text: string): { block: string | null; body: string } {
  const match = FRONT_MATTER_PATTERN.exec(text);
  if (!match) {
    return { block: null, body: text };
  }
  return { block: match[1], body: text.substring(match[0].length) };
}

// =============================================================================
// Flat Variant
// =============================================================================

/**
 * Parse `key: value` lines. Used for chapters and as the metadata fallback.
 */
export function parseFlatBlock(block: string): FrontMatter {
  const result: FrontMatter = {};
  for (const line of lines(block)) {
    const trimmed = line.trim();
    if (isSkippable(trimmed)) continue;

    const match = KEY_VALUE_PATTERN.exec(trimmed);
    if (match && isSafeKey(match[1])) {
      result[match[1]] = parseScalar(match[2]);
    }
  }
  return result;
}

/**
 * Split and parse with the flat variant
 */
export function parseFrontMatter(text: string): ParsedDocument {
  const { block, body } = splitFrontMatter(text);
  return {
    frontMatter: block === null ? {} : parseFlatBlock(block),
    body,
  };
}

// =============================================================================
// Nested Variant
// =============================================================================

/**
 * Parse `key: value` lines plus one level of lists.
 *
 * A top-level key with an empty value opens a list. Inside it, `- key: value`
 * starts a map item, `- value` a scalar item, and further indented
 * `key: value` lines add fields to the current map item. The next top-level
 * key closes the list.
 */
export function parseNestedBlock(block: string): FrontMatter {
  const result: FrontMatter = {};
  let list: FrontMatterItem[] | null = null;
  let pending: FrontMatterItem | null = null;

  const flush = (): void => {
    if (list !== null && pending !== null) {
      list.push(pending);
    }
    pending = null;
  };

  for (const line of lines(block)) {
    const trimmed = line.trim();
    if (isSkippable(trimmed)) continue;

    const item = LIST_ITEM_PATTERN.exec(line);
    if (item) {
      if (list === null) continue;
      flush();
      const inner = item[1].trim();
      const pair = KEY_VALUE_PATTERN.exec(inner);
      pending =
        pair && isSafeKey(pair[1])
          ? { [pair[1]]: parseScalar(pair[2], { integers: true }) }
          : parseScalar(inner, { integers: true });
      continue;
    }

    const pair = KEY_VALUE_PATTERN.exec(trimmed);
    if (!pair || !isSafeKey(pair[1])) continue;
    const [, key, rawValue] = pair;

    if (list !== null && /^\s/.test(line)) {
      const current: FrontMatterItem | null = pending;
      if (current !== null && typeof current === 'object') {
        current[key] = parseScalar(rawValue, { integers: true });
      }
      continue;
    }

    flush();
    if (rawValue.length === 0) {
      list = [];
      result[key] = list;
    } else {
      list = null;
      result[key] = parseScalar(rawValue, { integers: true });
    }
  }

  flush();
  return result;
}

/**
 * Split and parse with the nested variant
 */
export function parseNestedFrontMatter(text: string): ParsedDocument {
  const { block, body } = splitFrontMatter(text);
  return {
    frontMatter: block === null ? {} : parseNestedBlock(block),
    body,
  };
}
