/**
 * Typed field extraction from parsed metadata and front matter
 *
 * Unknown keys are dropped and values of the wrong shape read as absent.
 */

import type {
  ActivityFrontMatter,
  AnswerSpec,
  BookMetadata,
  BookNumbering,
  ChapterFrontMatter,
  CourseMetadata,
  SectionMetadata,
} from '../../platform/types.js';
import type { FrontMatter, MetadataMap } from './types.js';

const NUMBERINGS: readonly BookNumbering[] = ['none', 'numbers', 'bullets', 'indented'];

export function stringField(map: Record<string, unknown>, key: string): string | undefined {
  const value = map[key];
  if (typeof value === 'string') {
    return value.length > 0 ? value : undefined;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return undefined;
}

export function booleanField(map: Record<string, unknown>, key: string): boolean | undefined {
  const value = map[key];
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberingField(map: MetadataMap): BookNumbering | undefined {
  const value = map.numbering;
  return NUMBERINGS.find((numbering) => numbering === value);
}

// =============================================================================
// Metadata Files
// =============================================================================

export function toCourseMetadata(map: MetadataMap): CourseMetadata {
  return {
    fullname: stringField(map, 'fullname'),
    shortname: stringField(map, 'shortname'),
    summary: stringField(map, 'summary'),
    format: stringField(map, 'format'),
  };
}

export function toSectionMetadata(map: MetadataMap): SectionMetadata {
  return {
    title: stringField(map, 'title'),
    summary: stringField(map, 'summary'),
    visible: booleanField(map, 'visible'),
  };
}

export function toBookMetadata(map: MetadataMap): BookMetadata {
  return {
    title: stringField(map, 'title'),
    intro: stringField(map, 'intro'),
    numbering: numberingField(map),
  };
}

/**
 * True when no field is set
 */
export function isEmptyMetadata(metadata: object): boolean {
  return Object.values(metadata).every((value) => value === undefined);
}

// =============================================================================
// Front Matter
// =============================================================================

function toAnswers(value: unknown): AnswerSpec[] | undefined {
  if (!Array.isArray(value)) return undefined;

  const answers: AnswerSpec[] = [];
  for (const item of value) {
    if (isRecord(item)) {
      const text = stringField(item, 'text');
      if (text === undefined) continue;
      answers.push({
        text,
        correct: booleanField(item, 'correct') ?? false,
        feedback: stringField(item, 'feedback'),
      });
    } else if (typeof item === 'string' || typeof item === 'number') {
      answers.push({ text: String(item), correct: false });
    }
  }
  return answers;
}

export function toActivityFrontMatter(frontMatter: FrontMatter): ActivityFrontMatter {
  return {
    type: stringField(frontMatter, 'type') ?? 'page',
    name: stringField(frontMatter, 'name'),
    visible: booleanField(frontMatter, 'visible'),
    url: stringField(frontMatter, 'url'),
    answers: toAnswers(frontMatter.answers),
    correct: booleanField(frontMatter, 'correct'),
  };
}

export function toChapterFrontMatter(frontMatter: FrontMatter): ChapterFrontMatter {
  return {
    title: stringField(frontMatter, 'title'),
    subchapter: booleanField(frontMatter, 'subchapter'),
  };
}
