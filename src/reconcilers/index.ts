/**
 * Reconcilers module - brings course platform state in line with a
 * repository snapshot
 *
 * @module reconcilers
 */

export * as tree from './tree/index.js';
export * as frontmatter from './frontmatter/index.js';
export * as course from './course/index.js';
export * as batch from './batch/index.js';
