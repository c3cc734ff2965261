/**
 * Course platform persisted to a JSON file
 */

import { StateFileError } from '../errors.js';
import {
  JsonFile,
  expectArray,
  expectNumber,
  expectRecord,
  expectString,
} from '../state/json-file.js';
import { MemoryCoursePlatform, type CoursePlatformOptions } from './memory.js';
import {
  emptyPlatformDocument,
  type ActivityRecord,
  type AssetRecord,
  type BookRecord,
  type ChapterRecord,
  type CourseRecord,
  type PlatformDocument,
  type SectionRecord,
} from './model.js';
import type { AnswerSpec, BookNumbering } from './types.js';

const NUMBERINGS: readonly BookNumbering[] = ['none', 'numbers', 'bullets', 'indented'];

// =============================================================================
// Decoding
// =============================================================================

class Reader {
  constructor(private readonly filePath: string) {}

  record(value: unknown, where: string): Record<string, unknown> {
    return expectRecord(value, where, this.filePath);
  }

  array(value: unknown, where: string): unknown[] {
    return expectArray(value ?? [], where, this.filePath);
  }

  string(value: unknown, where: string): string {
    return expectString(value, where, this.filePath);
  }

  optionalString(value: unknown, where: string): string | undefined {
    return value === undefined ? undefined : this.string(value, where);
  }

  number(value: unknown, where: string): number {
    return expectNumber(value, where, this.filePath);
  }

  boolean(value: unknown, where: string): boolean {
    if (typeof value !== 'boolean') {
      throw new StateFileError(this.filePath, `${where} must be a boolean`);
    }
    return value;
  }

  numbering(value: unknown, where: string): BookNumbering {
    const numbering = NUMBERINGS.find((candidate) => candidate === value);
    if (!numbering) {
      throw new StateFileError(this.filePath, `${where} must be one of ${NUMBERINGS.join(', ')}`);
    }
    return numbering;
  }
}

function decodeSection(r: Reader, raw: unknown, where: string): SectionRecord {
  const s = r.record(raw, where);
  return {
    id: r.string(s.id, `${where}.id`),
    position: r.number(s.position, `${where}.position`),
    title: r.string(s.title, `${where}.title`),
    summary: r.string(s.summary, `${where}.summary`),
    visible: r.boolean(s.visible, `${where}.visible`),
  };
}

function decodeAnswer(r: Reader, raw: unknown, where: string): AnswerSpec {
  const a = r.record(raw, where);
  return {
    text: r.string(a.text, `${where}.text`),
    correct: r.boolean(a.correct, `${where}.correct`),
    feedback: r.optionalString(a.feedback, `${where}.feedback`),
  };
}

function decodeActivity(r: Reader, raw: unknown, where: string): ActivityRecord {
  const a = r.record(raw, where);
  return {
    id: r.string(a.id, `${where}.id`),
    sectionId: r.string(a.sectionId, `${where}.sectionId`),
    type: r.string(a.type, `${where}.type`),
    name: r.string(a.name, `${where}.name`),
    body: r.string(a.body, `${where}.body`),
    visible: r.boolean(a.visible, `${where}.visible`),
    url: r.optionalString(a.url, `${where}.url`),
    answers:
      a.answers === undefined
        ? undefined
        : r.array(a.answers, `${where}.answers`).map((item, i) => decodeAnswer(r, item, `${where}.answers[${i}]`)),
    correct: a.correct === undefined ? undefined : r.boolean(a.correct, `${where}.correct`),
    modifiedAt: r.string(a.modifiedAt, `${where}.modifiedAt`),
  };
}

function decodeChapter(r: Reader, raw: unknown, where: string): ChapterRecord {
  const c = r.record(raw, where);
  return {
    id: r.string(c.id, `${where}.id`),
    importKey: r.string(c.importKey, `${where}.importKey`),
    title: r.string(c.title, `${where}.title`),
    body: r.string(c.body, `${where}.body`),
    position: r.number(c.position, `${where}.position`),
    isSubchapter: r.boolean(c.isSubchapter, `${where}.isSubchapter`),
    hidden: r.boolean(c.hidden, `${where}.hidden`),
  };
}

function decodeBook(r: Reader, raw: unknown, where: string): BookRecord {
  const b = r.record(raw, where);
  return {
    id: r.string(b.id, `${where}.id`),
    sectionId: r.string(b.sectionId, `${where}.sectionId`),
    title: r.string(b.title, `${where}.title`),
    intro: r.string(b.intro, `${where}.intro`),
    numbering: r.numbering(b.numbering, `${where}.numbering`),
    visible: r.boolean(b.visible, `${where}.visible`),
    chapters: r.array(b.chapters, `${where}.chapters`).map((item, i) => decodeChapter(r, item, `${where}.chapters[${i}]`)),
  };
}

function decodeCourse(r: Reader, scope: string, raw: unknown): CourseRecord {
  const where = `courses.${scope}`;
  const c = r.record(raw, where);
  const assets: Record<string, AssetRecord> = {};
  for (const [key, value] of Object.entries(r.record(c.assets ?? {}, `${where}.assets`))) {
    const a = r.record(value, `${where}.assets.${key}`);
    assets[key] = {
      hash: r.string(a.hash, `${where}.assets.${key}.hash`),
      size: r.number(a.size, `${where}.assets.${key}.size`),
      uploadedAt: r.string(a.uploadedAt, `${where}.assets.${key}.uploadedAt`),
    };
  }

  return {
    scope,
    fullname: r.string(c.fullname, `${where}.fullname`),
    shortname: r.string(c.shortname, `${where}.shortname`),
    summary: r.string(c.summary, `${where}.summary`),
    format: r.string(c.format, `${where}.format`),
    sections: r.array(c.sections, `${where}.sections`).map((item, i) => decodeSection(r, item, `${where}.sections[${i}]`)),
    activities: r.array(c.activities, `${where}.activities`).map((item, i) => decodeActivity(r, item, `${where}.activities[${i}]`)),
    books: r.array(c.books, `${where}.books`).map((item, i) => decodeBook(r, item, `${where}.books[${i}]`)),
    assets,
  };
}

export function decodePlatformDocument(raw: unknown, filePath: string): PlatformDocument {
  const r = new Reader(filePath);
  const root = r.record(raw, 'document');
  const courses: Record<string, CourseRecord> = {};
  for (const [scope, value] of Object.entries(r.record(root.courses ?? {}, 'courses'))) {
    courses[scope] = decodeCourse(r, scope, value);
  }
  return {
    version: 1,
    nextId: root.nextId === undefined ? 1 : r.number(root.nextId, 'nextId'),
    courses,
  };
}

// =============================================================================
// Store
// =============================================================================

export class JsonCoursePlatform extends MemoryCoursePlatform {
  private constructor(
    private readonly file: JsonFile<PlatformDocument>,
    options: CoursePlatformOptions,
    document: PlatformDocument
  ) {
    super(options, document);
  }

  static async open(filePath: string, options: CoursePlatformOptions): Promise<JsonCoursePlatform> {
    const file = new JsonFile(filePath, decodePlatformDocument, emptyPlatformDocument);
    return new JsonCoursePlatform(file, options, await file.read());
  }

  protected override async persist(): Promise<void> {
    await this.file.write(this.document);
  }
}
