/**
 * Unit Tests: Front Matter and Metadata Parsing
 */

import { describe, it, expect } from 'vitest';
import {
  parseScalar,
  parseFrontMatter,
  parseNestedBlock,
  parseNestedFrontMatter,
  splitFrontMatter,
} from '../../src/reconcilers/frontmatter/parse.js';
import {
  createMetadataReader,
  MetadataReader,
  simpleMetadataParser,
  yamlMetadataParser,
} from '../../src/reconcilers/frontmatter/metadata.js';
import {
  isEmptyMetadata,
  toActivityFrontMatter,
  toBookMetadata,
  toChapterFrontMatter,
  toCourseMetadata,
  toSectionMetadata,
} from '../../src/reconcilers/frontmatter/fields.js';

// =============================================================================
// Scalars
// =============================================================================

describe('parseScalar', () => {
  it('strips matching quotes and keeps a string', () => {
    expect(parseScalar('"42"')).toBe('42');
    expect(parseScalar("'hello world'")).toBe('hello world');
  });

  it('reads booleans', () => {
    expect(parseScalar('true')).toBe(true);
    expect(parseScalar(' false ')).toBe(false);
  });

  it('only converts digits when asked', () => {
    expect(parseScalar('42')).toBe('42');
    expect(parseScalar('42', { integers: true })).toBe(42);
  });

  it('leaves unmatched quotes alone', () => {
    expect(parseScalar('"open')).toBe('"open');
  });
});

// =============================================================================
// Flat Variant
// =============================================================================

describe('parseFrontMatter', () => {
  it('splits front matter from the body', () => {
    const doc = parseFrontMatter('---\ntitle: Hello\nsubchapter: true\n---\n<p>Body</p>');
    expect(doc.frontMatter).toEqual({ title: 'Hello', subchapter: true });
    expect(doc.body).toBe('<p>Body</p>');
  });

  it('returns the whole text when there is no front matter', () => {
    const doc = parseFrontMatter('<p>Only body</p>');
    expect(doc.frontMatter).toEqual({});
    expect(doc.body).toBe('<p>Only body</p>');
  });

  it('treats an unclosed block as body', () => {
    const text = '---\ntitle: x\n<p>never closed</p>';
    expect(splitFrontMatter(text)).toEqual({ block: null, body: text });
  });

  it('requires a newline after the closing delimiter', () => {
    const text = '---\ntype: label\n---';
    expect(parseFrontMatter(text)).toEqual({ frontMatter: {}, body: text });
    expect(parseFrontMatter('---\ntype: label\n--- \n')).toEqual({ frontMatter: { type: 'label' }, body: '' });
  });

  it('skips comments, malformed lines and prototype keys', () => {
    const doc = parseFrontMatter('---\n# note\nnot a pair\n__proto__: bad\nname: ok\n---\n');
    expect(doc.frontMatter).toEqual({ name: 'ok' });
    expect(doc.body).toBe('');
  });

  it('handles CRLF line endings', () => {
    const doc = parseFrontMatter('---\r\ntitle: Win\r\n---\r\nbody');
    expect(doc.frontMatter).toEqual({ title: 'Win' });
    expect(doc.body).toBe('body');
  });
});

// =============================================================================
// Nested Variant
// =============================================================================

describe('parseNestedBlock', () => {
  const block = [
    'type: multichoice',
    'name: "Quick check"',
    'answers:',
    '  - text: Paris',
    '    correct: true',
    '    feedback: Right',
    '  - text: Lyon',
    '  - 7',
    'correct: false',
  ].join('\n');

  it('reads lists of maps and scalars', () => {
    expect(parseNestedBlock(block)).toEqual({
      type: 'multichoice',
      name: 'Quick check',
      answers: [{ text: 'Paris', correct: true, feedback: 'Right' }, { text: 'Lyon' }, 7],
      correct: false,
    });
  });

  it('ignores list items outside a list', () => {
    expect(parseNestedBlock('- stray\ntitle: x')).toEqual({ title: 'x' });
  });

  it('feeds activity field extraction', () => {
    const { frontMatter, body } = parseNestedFrontMatter(`---\n${block}\n---\n<p>Capital?</p>`);
    expect(body).toBe('<p>Capital?</p>');
    expect(toActivityFrontMatter(frontMatter)).toEqual({
      type: 'multichoice',
      name: 'Quick check',
      answers: [
        { text: 'Paris', correct: true, feedback: 'Right' },
        { text: 'Lyon', correct: false },
        { text: '7', correct: false },
      ],
      correct: false,
    });
  });
});

// =============================================================================
// Field Extraction
// =============================================================================

describe('field extraction', () => {
  it('defaults the activity type to page', () => {
    expect(toActivityFrontMatter({}).type).toBe('page');
  });

  it('reads chapter title and subchapter flag', () => {
    expect(toChapterFrontMatter({ title: 'Setup', subchapter: true })).toEqual({
      title: 'Setup',
      subchapter: true,
    });
  });

  it('stringifies numbers and drops empty strings', () => {
    expect(toCourseMetadata({ fullname: 101, shortname: '' })).toEqual({ fullname: '101' });
  });

  it('reads numeric visibility flags', () => {
    expect(toSectionMetadata({ visible: 0 }).visible).toBe(false);
  });

  it('accepts known book numberings only', () => {
    expect(toBookMetadata({ numbering: 'bullets' }).numbering).toBe('bullets');
    expect(toBookMetadata({ numbering: 'roman' }).numbering).toBeUndefined();
  });

  it('detects empty metadata', () => {
    expect(isEmptyMetadata(toCourseMetadata({ unrelated: 'x' }))).toBe(true);
    expect(isEmptyMetadata(toCourseMetadata({ format: 'topics' }))).toBe(false);
  });
});

// =============================================================================
// Metadata Strategies
// =============================================================================

describe('metadata parsers', () => {
  it('parses YAML mappings', () => {
    expect(yamlMetadataParser.parse('fullname: Intro\nshortname: I101\n')).toEqual({
      ok: true,
      data: { fullname: 'Intro', shortname: 'I101' },
    });
  });

  it('treats an empty YAML document as empty metadata', () => {
    expect(yamlMetadataParser.parse('')).toEqual({ ok: true, data: {} });
  });

  it('rejects a YAML list', () => {
    expect(yamlMetadataParser.parse('- a\n- b\n')).toEqual({
      ok: false,
      reason: 'top-level value is not a mapping',
    });
  });

  it('reads simple metadata between document markers', () => {
    expect(simpleMetadataParser.parse('---\ntitle: Intro\nvisible: false\n...\n')).toEqual({
      ok: true,
      data: { title: 'Intro', visible: false },
    });
  });
});

describe('MetadataReader', () => {
  it('returns primary results without a warning', () => {
    const result = createMetadataReader('yaml').read('course.yaml', 'fullname: Intro');
    expect(result).toEqual({ data: { fullname: 'Intro' } });
  });

  it('falls back to the flat strategy and reports it', () => {
    const reader = new MetadataReader(yamlMetadataParser);
    const result = reader.read('sections/a/section.yaml', 'title: "unterminated');
    expect(result.data).toEqual({ title: '"unterminated' });
    expect(result.warning?.kind).toBe('parse_fallback');
    expect(result.warning?.path).toBe('sections/a/section.yaml');
    expect(result.warning?.strategy).toBe('yaml');
  });

  it('names its strategy', () => {
    expect(createMetadataReader('simple').strategy).toBe('simple');
    expect(createMetadataReader().strategy).toBe('yaml');
  });
});
