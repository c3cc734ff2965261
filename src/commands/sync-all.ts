/**
 * sync-all command - Sync every configured course in one batch
 *
 * Courses run one after another; a failing course is reported and the
 * batch moves on.
 */

import type { CommandContext, CommandResult } from '../types.js';
import { findCourse } from '../config/loader.js';
import type { CourseConfig } from '../config/types.js';
import { isSyncError } from '../errors.js';
import {
  executeBatchSync,
  getOneLinerSummary,
  type BatchSyncResult,
} from '../reconcilers/batch/batch-sync.js';
import { generateReport } from '../reconcilers/batch/report.js';
import { info, verbose, warn, error as printError } from '../utils/output.js';
import type { SyncRuntime } from './runtime.js';

export interface SyncAllOptions {
  /** Only courses with autoSync enabled */
  autoOnly?: boolean;
  /** Restrict the batch to these course ids */
  courses?: string[];
}

/**
 * Courses a batch should cover, in config order
 */
export function selectCourses(all: CourseConfig[], options: SyncAllOptions): CourseConfig[] {
  let selected = all;
  if (options.courses && options.courses.length > 0) {
    const wanted = new Set(options.courses);
    selected = selected.filter((course) => wanted.has(course.id));
  }
  if (options.autoOnly) {
    selected = selected.filter((course) => course.autoSync);
  }
  return selected;
}

/**
 * Execute the sync-all command
 */
export async function syncAllCommand(
  ctx: CommandContext,
  runtime: SyncRuntime,
  options: SyncAllOptions = {}
): Promise<CommandResult<BatchSyncResult>> {
  const { options: globalOpts, outputFormat } = ctx;

  try {
    for (const id of options.courses ?? []) {
      findCourse(ctx.config, id);
    }
  } catch (err) {
    if (!isSyncError(err)) throw err;
    if (outputFormat === 'human') {
      printError(err.toUserMessage());
    }
    return { success: false, message: err.message, errors: [err.code] };
  }

  const courses = selectCourses(ctx.config.courses, options);
  if (outputFormat === 'human') {
    if (courses.length === 0) {
      warn('No courses match the selection');
    } else {
      info(`Syncing ${courses.length} course(s)...`);
    }
  }

  const result = await executeBatchSync(
    runtime.runner,
    courses.map((course) => course.id),
    {
      triggeredBy: globalOpts.user ?? 'batch',
      onProgress: (progress) =>
        verbose(`[${progress.current}/${progress.total}] ${progress.currentScope}`, globalOpts.verbose),
    }
  );

  const report = generateReport(result, { format: outputFormat, includeTiming: globalOpts.verbose });
  if (outputFormat === 'human') {
    console.log(report.output);
  }

  return {
    success: result.success,
    message: getOneLinerSummary(result),
    data: result,
    errors: result.errors.length > 0 ? result.errors : undefined,
  };
}
