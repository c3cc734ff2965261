/**
 * Configuration types for course-sync.yaml
 */

import type { MetadataStrategy } from '../reconcilers/frontmatter/types.js';
import type { TreeLayout } from '../reconcilers/tree/types.js';

/** Current supported config file version */
export const SUPPORTED_CONFIG_VERSION = 1;

export const DEFAULT_CONFIG_FILE = 'course-sync.yaml';
export const CONFIG_PATH_ENV = 'COURSE_SYNC_CONFIG';

/**
 * One course bound to a repository branch
 */
export interface CourseConfig {
  /** Course scope id; unique within the file */
  id: string;
  /** https://github.com/<owner>/<repo> */
  repo: string;
  branch: string;
  /** Included in `sync-all --auto-only` and the scheduled run */
  autoSync: boolean;
  /** Environment variable holding this course's token */
  tokenEnv?: string;
  /** Recorded as the trigger of webhook and batch runs */
  owner?: string;
}

export interface GitHubSettings {
  baseUrl: string;
  /** Environment variable holding the default token */
  tokenEnv: string;
}

export interface WebhookSettings {
  /** Environment variable holding the shared secret */
  secretEnv: string;
}

/**
 * Validated configuration
 */
export interface SyncConfig {
  version: number;
  /** Absolute path of the file this was loaded from */
  configPath: string;
  /** Absolute directory for state files */
  stateDir: string;
  github: GitHubSettings;
  webhook: WebhookSettings;
  layout: TreeLayout;
  metadata: {
    strategy: MetadataStrategy;
  };
  assets: {
    baseUrl: string;
  };
  courses: CourseConfig[];
}
