/**
 * history command - List recent sync runs of a course, newest first
 */

import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import type { CommandContext, CommandResult } from '../types.js';
import { findCourse } from '../config/loader.js';
import { isSyncError } from '../errors.js';
import type { SyncHistoryRecord, SyncStatus } from '../state/types.js';
import { shortIdentity } from '../utils/hash.js';
import { formatTimestamp, header, info, error as printError } from '../utils/output.js';
import type { SyncRuntime } from './runtime.js';

export const DEFAULT_HISTORY_LIMIT = 10;

export interface HistoryOptions {
  course: string;
  limit?: number;
}

/**
 * Parse `--limit`; anything but a positive integer is rejected
 */
export function parseLimit(value: string): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function statusColor(status: SyncStatus): (text: string) => string {
  switch (status) {
    case 'success':
      return chalk.green;
    case 'uptodate':
      return chalk.cyan;
    case 'failed':
      return chalk.red;
  }
}

/**
 * One display line per record
 */
export function formatHistoryLine(record: SyncHistoryRecord): string {
  const snapshot = record.snapshotIdentity ? shortIdentity(record.snapshotIdentity) : '-------';
  return [
    chalk.gray(`#${record.id}`),
    formatTimestamp(record.createdAt),
    statusColor(record.status)(record.status.padEnd(8)),
    snapshot,
    record.summary,
    chalk.gray(`(${record.triggeredBy})`),
  ].join('  ');
}

/**
 * Execute the history command
 */
export async function historyCommand(
  ctx: CommandContext,
  runtime: SyncRuntime,
  options: HistoryOptions
): Promise<CommandResult<SyncHistoryRecord[]>> {
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

  const records = await runtime.history.list(courseId, options.limit ?? DEFAULT_HISTORY_LIMIT);

  if (outputFormat === 'human') {
    header(`Sync History: ${courseId}`);
    if (records.length === 0) {
      info('No syncs recorded yet');
    }
    for (const record of records) {
      console.log(formatHistoryLine(record));
      if (globalOpts.verbose) {
        for (const operation of record.operations) {
          console.log(chalk.gray(`      ${operation.kind} ${operation.path} ${operation.detail}`.trimEnd()));
        }
      }
    }
  }

  return {
    success: true,
    message: `${records.length} run(s) for ${courseId}`,
    data: records,
  };
}
