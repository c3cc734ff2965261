/**
 * Human-readable run summaries
 */

import { shortIdentity } from '../../utils/hash.js';
import type { SyncCounters } from './types.js';

export const FAILED_SUMMARY = 'Sync failed. Check the sync history for details.';

export function emptyCounters(): SyncCounters {
  return {
    sectionsCreated: 0,
    sectionsUpdated: 0,
    sectionsHidden: 0,
    activitiesCreated: 0,
    activitiesUpdated: 0,
    activitiesRestored: 0,
    activitiesHidden: 0,
    chaptersCreated: 0,
    chaptersUpdated: 0,
    chaptersReordered: 0,
    chaptersHidden: 0,
    assetsUploaded: 0,
  };
}

function plural(count: number, singular: string, pluralForm: string): string {
  return `${count} ${count === 1 ? singular : pluralForm}`;
}

const SUMMARY_PARTS: Array<[keyof SyncCounters, (n: number) => string]> = [
  ['sectionsCreated', (n) => `${plural(n, 'section', 'sections')} created`],
  ['sectionsUpdated', (n) => `${plural(n, 'section', 'sections')} updated`],
  ['sectionsHidden', (n) => `${plural(n, 'section', 'sections')} hidden (removed from repo)`],
  ['activitiesCreated', (n) => `${plural(n, 'activity', 'activities')} created`],
  ['activitiesUpdated', (n) => `${plural(n, 'activity', 'activities')} updated`],
  ['activitiesRestored', (n) => `${plural(n, 'activity', 'activities')} restored`],
  ['activitiesHidden', (n) => `${plural(n, 'activity', 'activities')} hidden (removed from repo)`],
  ['chaptersCreated', (n) => `${plural(n, 'chapter', 'chapters')} created`],
  ['chaptersUpdated', (n) => `${plural(n, 'chapter', 'chapters')} updated`],
  ['chaptersReordered', (n) => `${plural(n, 'chapter', 'chapters')} reordered`],
  ['chaptersHidden', (n) => `${plural(n, 'chapter', 'chapters')} hidden (removed from repo)`],
  ['assetsUploaded', (n) => `${plural(n, 'asset', 'assets')} uploaded`],
];

/**
 * Non-zero counters joined into one sentence
 *
 * @example
 * buildSummary({ ...emptyCounters(), sectionsCreated: 2, activitiesCreated: 1 })
 * // '2 sections created, 1 activity created.'
 */
export function buildSummary(counters: SyncCounters): string {
  const parts = SUMMARY_PARTS.filter(([key]) => counters[key] > 0).map(([key, format]) =>
    format(counters[key])
  );
  return parts.length === 0 ? 'No changes needed.' : `${parts.join(', ')}.`;
}

export function upToDateSummary(snapshotIdentity: string): string {
  return `Already up to date (commit ${shortIdentity(snapshotIdentity)}).`;
}

/**
 * True when a run changed anything
 */
export function hasChanges(counters: SyncCounters): boolean {
  return Object.values(counters).some((value) => value > 0);
}
