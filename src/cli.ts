#!/usr/bin/env node
/**
 * course-sync CLI - Keep learning platform courses in step with GitHub
 *
 * Commands:
 * - sync: Reconcile one course with its repository
 * - sync-all: Reconcile every configured course in one batch
 * - status: Show last snapshot and run of each course
 * - history: List recent runs of a course
 * - tree: Show how a course repository is classified
 */

import { Command, Option } from 'commander';
import type { GlobalOptions, CommandContext, CommandResult } from './types.js';
import {
  syncCommand,
  syncAllCommand,
  statusCommand,
  historyCommand,
  treeCommand,
  openRuntime,
  parseLimit,
  type SyncRuntime,
} from './commands/index.js';
import { loadConfig, resolveConfigPath } from './config/loader.js';
import { CONFIG_PATH_ENV } from './config/types.js';
import { logger } from './api/logger.js';
import { isSyncError } from './errors.js';
import { printResult, error, verbose as verboseLog } from './utils/output.js';

const VERSION = '0.1.0';

/**
 * Load the configuration and build the command context
 */
async function createContext(options: GlobalOptions): Promise<CommandContext> {
  if (options.verbose) {
    logger.setConfig({ level: 'debug' });
  }

  const configPath = resolveConfigPath(options.config, process.env, process.cwd());
  verboseLog(`Using config: ${configPath}`, options.verbose);

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    config: await loadConfig(configPath),
  };
}

/**
 * Shared action body: context, runtime, command, exit code
 */
async function execute<T>(
  label: string,
  run: (ctx: CommandContext, runtime: SyncRuntime) => Promise<CommandResult<T>>
): Promise<never> {
  const globalOpts = program.opts<GlobalOptions>();

  try {
    const ctx = await createContext(globalOpts);
    const runtime = await openRuntime(ctx.config, { logger });
    const result = await run(ctx, runtime);
    if (ctx.outputFormat === 'json') {
      printResult(result, ctx.outputFormat);
    }
    process.exit(result.success ? 0 : 1);
  } catch (err) {
    if (isSyncError(err)) {
      error(`${label} failed: ${err.toUserMessage()}`);
    } else {
      error(`${label} failed: ${err instanceof Error ? err.message : String(err)}`);
    }
    process.exit(1);
  }
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('course-sync')
  .description('Reconcile learning platform courses with GitHub repositories')
  .version(VERSION)
  .addOption(
    new Option('--config <path>', 'Path to course-sync.yaml')
      .env(CONFIG_PATH_ENV)
  )
  .addOption(
    new Option('--json', 'Output JSON for CI/automation')
      .default(false)
  )
  .addOption(
    new Option('--user <name>', 'Name recorded as the trigger of the run')
  )
  .addOption(
    new Option('-v, --verbose', 'Enable verbose logging')
      .default(false)
  );

/**
 * sync command - Reconcile one course
 */
program
  .command('sync')
  .description('Sync one course from its repository')
  .requiredOption('--course <id>', 'Course id from the config file')
  .action(async (cmdOpts: { course: string }) => {
    await execute('Sync', (ctx, runtime) => syncCommand(ctx, runtime, { course: cmdOpts.course }));
  });

/**
 * sync-all command - Reconcile every configured course
 */
program
  .command('sync-all')
  .description('Sync every configured course, one after another')
  .option('--auto-only', 'Only courses with autoSync enabled', false)
  .option('--course <id...>', 'Restrict the batch to these courses')
  .action(async (cmdOpts: { autoOnly: boolean; course?: string[] }) => {
    await execute('Batch sync', (ctx, runtime) =>
      syncAllCommand(ctx, runtime, { autoOnly: cmdOpts.autoOnly, courses: cmdOpts.course })
    );
  });

/**
 * status command - Show course sync state
 */
program
  .command('status')
  .description('Show last snapshot and run of each course')
  .option('--course <id>', 'Limit to one course')
  .action(async (cmdOpts: { course?: string }) => {
    await execute('Status', (ctx, runtime) => statusCommand(ctx, runtime, { course: cmdOpts.course }));
  });

/**
 * history command - List recent runs
 */
program
  .command('history')
  .description('List recent sync runs of a course, newest first')
  .requiredOption('--course <id>', 'Course id from the config file')
  .option('--limit <n>', 'Number of runs to show', parseLimit)
  .action(async (cmdOpts: { course: string; limit?: number }) => {
    await execute('History', (ctx, runtime) =>
      historyCommand(ctx, runtime, { course: cmdOpts.course, limit: cmdOpts.limit })
    );
  });

/**
 * tree command - Show the classified repository structure
 */
program
  .command('tree')
  .description('Fetch a course repository and show its classified structure')
  .requiredOption('--course <id>', 'Course id from the config file')
  .action(async (cmdOpts: { course: string }) => {
    await execute('Tree', (ctx, runtime) => treeCommand(ctx, runtime, { course: cmdOpts.course }));
  });

await program.parseAsync();
