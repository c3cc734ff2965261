/**
 * Removal sweep
 *
 * Hides entities whose repository paths were not seen in this run. Mapping
 * records are kept so a path that reappears finds its entity again.
 *
 * @module reconcilers/course/sweep
 */

import { errorCode, errorMessage } from '../../errors.js';
import type { MappingRecord } from '../../state/types.js';
import { isAssetPath, isChapterPath, SECTIONS_DIR } from '../tree/classify.js';
import type { RunContext } from './context.js';

/**
 * True for a section directory record (`sections/<name>`)
 */
export function isSectionPath(path: string): boolean {
  const segments = path.split('/');
  return segments.length === 2 && segments[0] === SECTIONS_DIR;
}

/**
 * Records the sweep should consider hiding
 */
export function sweepCandidates(ctx: RunContext, records: MappingRecord[]): MappingRecord[] {
  return records.filter(
    (record) =>
      record.entityId !== null &&
      !ctx.touchedPaths.has(record.repoPath) &&
      !isAssetPath(record.repoPath) &&
      !isChapterPath(record.repoPath, ctx.layout) &&
      !ctx.touchedEntities.has(record.entityId)
  );
}

export async function sweepRemoved(ctx: RunContext): Promise<void> {
  const { scope, builder, operations, counters, logger } = ctx;
  const candidates = sweepCandidates(ctx, await ctx.mappings.list(scope));

  for (const record of candidates) {
    const entityId = record.entityId;
    if (entityId === null) continue;

    try {
      const visible = await builder.getVisibility(entityId);
      if (visible !== true) continue;

      await builder.setVisible(entityId, false);
      if (isSectionPath(record.repoPath)) {
        counters.sectionsHidden++;
        operations.record('section_hide', record.repoPath, 'removed from repository');
      } else {
        counters.activitiesHidden++;
        operations.record('activity_hide', record.repoPath, 'removed from repository');
      }
    } catch (error) {
      logger.warn('Failed to hide removed entity', {
        path: record.repoPath,
        entityId,
        code: errorCode(error),
        error: errorMessage(error),
      });
      operations.record('hide_error', record.repoPath, errorMessage(error));
    }
  }
}
