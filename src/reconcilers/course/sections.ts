/**
 * Section and page reconciliation
 *
 * @module reconcilers/course/sections
 */

import { contentHash } from '../../utils/hash.js';
import { parseNestedFrontMatter } from '../frontmatter/parse.js';
import { toActivityFrontMatter, toSectionMetadata } from '../frontmatter/fields.js';
import { deriveDisplayName } from '../tree/classify.js';
import type { SectionNode } from '../tree/types.js';
import type { SectionMetadata } from '../../platform/types.js';
import { reconcileBook } from './books.js';
import type { RunContext } from './context.js';

/**
 * Ensure the section at `position`, then its pages and books in order
 */
export async function reconcileSection(
  ctx: RunContext,
  section: SectionNode,
  position: number
): Promise<void> {
  let metadata: SectionMetadata = {};
  if (section.metadataPath) {
    const { data } = await ctx.readMetadata(section.metadataPath);
    metadata = toSectionMetadata(data);
    ctx.touch(section.metadataPath);
  }

  const title = metadata.title ?? deriveDisplayName(section.name);
  const { sectionId, outcome } = await ctx.builder.ensureSection(ctx.scope, position, {
    ...metadata,
    title,
  });

  if (outcome === 'created') {
    ctx.counters.sectionsCreated++;
    ctx.operations.record('section_create', section.path, title);
  } else if (outcome === 'updated') {
    ctx.counters.sectionsUpdated++;
    ctx.operations.record('section_update', section.path, title);
  }

  await ctx.mappings.upsert(ctx.scope, section.path, { entityId: sectionId });
  ctx.touch(section.path, sectionId);

  for (const [filename, path] of section.pages) {
    await reconcilePage(ctx, position, sectionId, filename, path);
  }

  for (const book of section.books.values()) {
    await reconcileBook(ctx, position, sectionId, book);
  }
}

/**
 * Create, update or skip one page by comparing its content hash
 */
export async function reconcilePage(
  ctx: RunContext,
  sectionPosition: number,
  sectionId: string,
  filename: string,
  path: string
): Promise<void> {
  const { scope, builder, mappings, operations, counters } = ctx;

  const { frontMatter, body } = parseNestedFrontMatter(await ctx.fetchText(path));
  const activity = toActivityFrontMatter(frontMatter);
  const name = activity.name ?? deriveDisplayName(filename);
  const prepared = await builder.prepareContent(scope, body);
  const hash = contentHash(prepared);

  const record = await mappings.lookup(scope, path);
  const existingId = record?.entityId ?? null;
  const visibility = existingId ? await builder.getVisibility(existingId) : null;

  if (record === null || existingId === null || visibility === null) {
    const entityId = await builder.createTypedActivity(
      scope,
      sectionPosition,
      name,
      prepared,
      activity,
      path
    );
    await mappings.upsert(scope, path, {
      entityId,
      parentEntityId: sectionId,
      contentHash: hash,
    });
    ctx.touch(path, entityId);
    counters.activitiesCreated++;
    operations.record(`${activity.type}_create`, path, name);
    return;
  }

  const entityId = existingId;
  ctx.touch(path, entityId);

  // The section at this position may be a different entity after a rename
  const moved = record.parentEntityId !== sectionId;
  if (moved) {
    await builder.moveToSection(scope, entityId, sectionPosition);
  }

  if (record.contentHash !== hash) {
    await builder.updateActivity(entityId, name, prepared, activity, path);
    counters.activitiesUpdated++;
    operations.record(`${activity.type}_update`, path, name);
  } else if (moved) {
    counters.activitiesUpdated++;
    operations.record('activity_move', path, `to section ${sectionPosition}`);
  } else {
    operations.record('page_skip', path, 'unchanged');
  }

  if (moved || record.contentHash !== hash) {
    await mappings.upsert(scope, path, { parentEntityId: sectionId, contentHash: hash });
  }

  const wanted = activity.visible ?? true;
  if (visibility !== wanted) {
    await builder.setVisible(entityId, wanted);
    if (wanted) {
      counters.activitiesRestored++;
      operations.record('activity_restore', path, name);
    } else {
      operations.record('activity_hide', path, 'visible: false in front matter');
    }
  }
}
