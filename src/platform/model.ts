/**
 * Stored shape of courses on the in-process platform
 */

import type { AnswerSpec, BookNumbering } from './types.js';

export interface SectionRecord {
  id: string;
  /** 1-based */
  position: number;
  title: string;
  summary: string;
  visible: boolean;
}

export interface ActivityRecord {
  id: string;
  sectionId: string;
  type: string;
  name: string;
  body: string;
  visible: boolean;
  url?: string;
  answers?: AnswerSpec[];
  correct?: boolean;
  /** ISO timestamp */
  modifiedAt: string;
}

export interface ChapterRecord {
  id: string;
  importKey: string;
  title: string;
  body: string;
  position: number;
  isSubchapter: boolean;
  hidden: boolean;
}

export interface BookRecord {
  id: string;
  sectionId: string;
  title: string;
  intro: string;
  numbering: BookNumbering;
  visible: boolean;
  chapters: ChapterRecord[];
}

export interface AssetRecord {
  hash: string;
  size: number;
  /** ISO timestamp */
  uploadedAt: string;
}

export interface CourseRecord {
  scope: string;
  fullname: string;
  shortname: string;
  summary: string;
  format: string;
  sections: SectionRecord[];
  activities: ActivityRecord[];
  books: BookRecord[];
  /** Keyed by path relative to `assets/` */
  assets: Record<string, AssetRecord>;
}

export interface PlatformDocument {
  version: 1;
  /** Next numeric suffix for entity ids */
  nextId: number;
  courses: Record<string, CourseRecord>;
}

export function emptyPlatformDocument(): PlatformDocument {
  return { version: 1, nextId: 1, courses: {} };
}

export function emptyCourse(scope: string): CourseRecord {
  return {
    scope,
    fullname: scope,
    shortname: scope,
    summary: '',
    format: 'topics',
    sections: [],
    activities: [],
    books: [],
    assets: {},
  };
}
