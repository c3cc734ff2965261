import { describe, it, expect } from 'vitest';
import { buildSummary, emptyCounters, hasChanges, upToDateSummary } from '../../src/reconcilers/course/summary.js';

describe('run summaries', () => {
  it('reports no changes', () => {
    expect(buildSummary(emptyCounters())).toBe('No changes needed.');
    expect(hasChanges(emptyCounters())).toBe(false);
  });

  it('joins non-zero counters in a fixed order with plurals', () => {
    const counters = {
      ...emptyCounters(),
      assetsUploaded: 1,
      chaptersHidden: 2,
      activitiesRestored: 1,
      sectionsHidden: 1,
      sectionsCreated: 3,
    };

    expect(buildSummary(counters)).toBe(
      '3 sections created, 1 section hidden (removed from repo), 1 activity restored, ' +
        '2 chapters hidden (removed from repo), 1 asset uploaded.'
    );
    expect(hasChanges(counters)).toBe(true);
  });

  it('names the short commit when up to date', () => {
    expect(upToDateSummary('0123456789abcdef')).toBe('Already up to date (commit 0123456).');
  });
});
