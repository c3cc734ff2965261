/**
 * sync command - Run one sync for a configured course
 */

import type { CommandContext, CommandResult } from '../types.js';
import { findCourse } from '../config/loader.js';
import { isSyncError } from '../errors.js';
import type { SyncCounters } from '../reconcilers/course/types.js';
import type { SyncStatus } from '../state/types.js';
import { header, info, success, verbose, error as printError } from '../utils/output.js';
import type { SyncRuntime } from './runtime.js';

export interface SyncOptions {
  /** Course id from the config file */
  course: string;
}

export interface SyncCommandData {
  scope: string;
  status: SyncStatus;
  snapshotIdentity: string | null;
  summary: string;
  historyId: number;
  counters: SyncCounters;
  /** Set on failed runs */
  errorCode?: string;
}

/**
 * Trigger name recorded for manual runs
 */
export function manualTrigger(ctx: CommandContext): string {
  return ctx.options.user ?? 'cli';
}

/**
 * Execute the sync command
 */
export async function syncCommand(
  ctx: CommandContext,
  runtime: SyncRuntime,
  options: SyncOptions
): Promise<CommandResult<SyncCommandData>> {
  const { options: globalOpts, outputFormat } = ctx;

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

  if (outputFormat === 'human') {
    header(`Sync ${courseId}`);
  }
  verbose(`Triggered by: ${manualTrigger(ctx)}`, globalOpts.verbose);

  const outcome = await runtime.runner.run(courseId, manualTrigger(ctx));

  for (const operation of outcome.operations) {
    verbose(`${operation.kind} ${operation.path} ${operation.detail}`.trim(), globalOpts.verbose);
  }

  const data: SyncCommandData = {
    scope: courseId,
    status: outcome.status,
    snapshotIdentity: outcome.snapshotIdentity,
    summary: outcome.summary,
    historyId: outcome.historyId,
    counters: outcome.counters,
    errorCode: outcome.error?.code,
  };

  if (outcome.status === 'failed') {
    const code = outcome.error?.code ?? 'UNEXPECTED';
    if (outputFormat === 'human') {
      printError(outcome.summary);
      printError(`Error code: ${code}`);
    }
    return { success: false, message: outcome.summary, data, errors: [`Error code: ${code}`] };
  }

  if (outputFormat === 'human') {
    if (outcome.status === 'uptodate') {
      info(outcome.summary);
    } else {
      success(outcome.summary);
    }
  }
  return { success: true, message: outcome.summary, data };
}
