/**
 * Wiring of the sync collaborators for CLI commands
 *
 * State lives in JSON files under the configured state directory:
 * mappings.json, scopes.json, history.json and platform.json.
 */

import { join } from 'node:path';
import { GitHubClient } from '../api/github.js';
import { logger as defaultLogger, type ApiLogger } from '../api/logger.js';
import { findCourse, toRepoTarget } from '../config/loader.js';
import type { SyncConfig } from '../config/types.js';
import { JsonCoursePlatform } from '../platform/json.js';
import { createMetadataReader } from '../reconcilers/frontmatter/metadata.js';
import { Reconciler } from '../reconcilers/course/engine.js';
import { SyncRunner } from '../reconcilers/course/runner.js';
import { JsonSyncHistoryStore } from '../state/history.js';
import { JsonMappingStore } from '../state/mappings.js';
import { JsonScopeStateStore } from '../state/scopes.js';

export const STATE_FILES = {
  mappings: 'mappings.json',
  scopes: 'scopes.json',
  history: 'history.json',
  platform: 'platform.json',
} as const;

export interface SyncRuntime {
  config: SyncConfig;
  repository: GitHubClient;
  platform: JsonCoursePlatform;
  mappings: JsonMappingStore;
  scopes: JsonScopeStateStore;
  history: JsonSyncHistoryStore;
  reconciler: Reconciler;
  runner: SyncRunner;
}

export interface RuntimeOptions {
  logger?: ApiLogger;
  env?: Record<string, string | undefined>;
  /** Replaces the global fetch for repository requests */
  fetch?: typeof fetch;
}

/**
 * Open every store and build the runner for a loaded configuration
 */
export async function openRuntime(
  config: SyncConfig,
  options: RuntimeOptions = {}
): Promise<SyncRuntime> {
  const logger = options.logger ?? defaultLogger;
  const env = options.env ?? process.env;

  const repository = new GitHubClient(
    {
      baseUrl: config.github.baseUrl,
      fetch: options.fetch,
      resolveTarget: (scope) => toRepoTarget(config, findCourse(config, scope), env),
    },
    logger
  );

  const [platform, mappings, scopes, history] = await Promise.all([
    JsonCoursePlatform.open(join(config.stateDir, STATE_FILES.platform), {
      repository,
      assetBaseUrl: config.assets.baseUrl,
      logger,
    }),
    JsonMappingStore.open(join(config.stateDir, STATE_FILES.mappings)),
    JsonScopeStateStore.open(join(config.stateDir, STATE_FILES.scopes)),
    JsonSyncHistoryStore.open(join(config.stateDir, STATE_FILES.history)),
  ]);

  const reconciler = new Reconciler({
    repository,
    builder: platform,
    mappings,
    scopes,
    metadata: createMetadataReader(config.metadata.strategy),
    layout: config.layout,
    logger,
  });

  return {
    config,
    repository,
    platform,
    mappings,
    scopes,
    history,
    reconciler,
    runner: new SyncRunner(reconciler, history, { logger }),
  };
}
