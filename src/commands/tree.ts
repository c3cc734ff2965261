/**
 * tree command - Fetch a course repository and show how it classifies
 */

import chalk from 'chalk';
import type { CommandContext, CommandResult } from '../types.js';
import { findCourse } from '../config/loader.js';
import { isSyncError } from '../errors.js';
import { classifyTree, deriveDisplayName } from '../reconcilers/tree/classify.js';
import type { StructuredTree } from '../reconcilers/tree/types.js';
import { header, error as printError } from '../utils/output.js';
import type { SyncRuntime } from './runtime.js';

export interface TreeOptions {
  course: string;
}

/**
 * Plain-object form of a classified tree (Maps become ordered arrays)
 */
export interface TreeSummary {
  rootMetadataPath: string | null;
  sections: Array<{
    position: number;
    name: string;
    path: string;
    metadataPath: string | null;
    pages: string[];
    books: Array<{ name: string; path: string; metadataPath: string | null; chapters: string[] }>;
  }>;
  assets: string[];
}

export function summarizeTree(tree: StructuredTree): TreeSummary {
  return {
    rootMetadataPath: tree.rootMetadataPath ?? null,
    sections: [...tree.sections.values()].map((section, index) => ({
      position: index + 1,
      name: section.name,
      path: section.path,
      metadataPath: section.metadataPath ?? null,
      pages: [...section.pages.values()],
      books: [...section.books.values()].map((book) => ({
        name: book.name,
        path: book.path,
        metadataPath: book.metadataPath ?? null,
        chapters: [...book.chapters.values()],
      })),
    })),
    assets: tree.assets,
  };
}

function printTree(summary: TreeSummary): void {
  if (summary.rootMetadataPath) {
    console.log(chalk.gray(`metadata: ${summary.rootMetadataPath}`));
  }
  for (const section of summary.sections) {
    console.log(chalk.bold(`${section.position}. ${deriveDisplayName(section.name)}`), chalk.gray(section.path));
    for (const page of section.pages) {
      console.log(`   ${chalk.cyan('•')} ${page}`);
    }
    for (const book of section.books) {
      console.log(`   ${chalk.magenta('▸')} ${book.path} ${chalk.gray(`(${book.chapters.length} chapters)`)}`);
      for (const chapter of book.chapters) {
        console.log(`       ${chalk.gray('-')} ${chapter}`);
      }
    }
  }
  console.log(chalk.gray(`\n${summary.assets.length} asset(s)`));
}

/**
 * Execute the tree command
 */
export async function treeCommand(
  ctx: CommandContext,
  runtime: SyncRuntime,
  options: TreeOptions
): Promise<CommandResult<TreeSummary>> {
  const { outputFormat } = ctx;

  let courseId: string;
  try {
    courseId = findCourse(ctx.config, options.course).id;
  } catch (err) {
    if (!isSyncError(err)) throw err;
    if (outputFormat === 'human') {
      printError(err.toUserMessage());
    }
    return { success: false, message: err.message, errors: [err.code] };
  }

  const entries = await runtime.repository.listTree(courseId);
  const summary = summarizeTree(classifyTree(entries, ctx.config.layout));

  if (outputFormat === 'human') {
    header(`Repository Tree: ${courseId}`);
    printTree(summary);
  }

  return {
    success: true,
    message: `${summary.sections.length} section(s), ${summary.assets.length} asset(s)`,
    data: summary,
  };
}
