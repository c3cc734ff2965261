/**
 * status command - Show the sync state of configured courses
 */

import type { CommandContext, CommandResult } from '../types.js';
import { findCourse } from '../config/loader.js';
import { isSyncError } from '../errors.js';
import type { SyncStatus } from '../state/types.js';
import { shortIdentity } from '../utils/hash.js';
import { formatTimestamp, header, printStatus, error as printError } from '../utils/output.js';
import type { SyncRuntime } from './runtime.js';

export interface StatusOptions {
  /** Limit to one course */
  course?: string;
}

export interface CourseStatus {
  id: string;
  repo: string;
  branch: string;
  autoSync: boolean;
  lastSnapshot: string | null;
  lastRunAt: string | null;
  mappedPaths: number;
  lastStatus: SyncStatus | null;
  lastSummary: string | null;
}

/**
 * Execute the status command
 */
export async function statusCommand(
  ctx: CommandContext,
  runtime: SyncRuntime,
  options: StatusOptions = {}
): Promise<CommandResult<CourseStatus[]>> {
  const { outputFormat } = ctx;

  let courses = ctx.config.courses;
  if (options.course) {
    try {
      courses = [findCourse(ctx.config, options.course)];
    } catch (err) {
      if (!isSyncError(err)) throw err;
      if (outputFormat === 'human') {
        printError(err.toUserMessage());
      }
      return { success: false, message: err.message, errors: [err.code] };
    }
  }

  const statuses: CourseStatus[] = [];
  for (const course of courses) {
    const state = await runtime.scopes.get(course.id);
    const mappings = await runtime.mappings.list(course.id);
    const [last] = await runtime.history.list(course.id, 1);
    statuses.push({
      id: course.id,
      repo: course.repo,
      branch: course.branch,
      autoSync: course.autoSync,
      lastSnapshot: state.lastSnapshot,
      lastRunAt: state.lastRunAt,
      mappedPaths: mappings.length,
      lastStatus: last?.status ?? null,
      lastSummary: last?.summary ?? null,
    });
  }

  if (outputFormat === 'human') {
    header('Course Status');
    for (const status of statuses) {
      printStatus(status.id, {
        repo: `${status.repo} (${status.branch})`,
        autoSync: status.autoSync ? 'yes' : 'no',
        lastSnapshot: status.lastSnapshot ? shortIdentity(status.lastSnapshot) : null,
        lastRun: formatTimestamp(status.lastRunAt),
        mappedPaths: status.mappedPaths,
        lastStatus: status.lastStatus,
        lastSummary: status.lastSummary,
      });
    }
  }

  return {
    success: true,
    message: `${statuses.length} course(s) configured`,
    data: statuses,
  };
}
