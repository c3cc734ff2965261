/**
 * Configuration module exports
 */

export {
  loadConfig,
  validateConfig,
  resolveConfigPath,
  findCourse,
  resolveToken,
  resolveWebhookSecret,
  toRepoTarget,
  isConfigError,
  DEFAULT_STATE_DIR,
  DEFAULT_TOKEN_ENV,
  DEFAULT_WEBHOOK_SECRET_ENV,
} from './loader.js';

export {
  SUPPORTED_CONFIG_VERSION,
  DEFAULT_CONFIG_FILE,
  CONFIG_PATH_ENV,
  type CourseConfig,
  type GitHubSettings,
  type WebhookSettings,
  type SyncConfig,
} from './types.js';
