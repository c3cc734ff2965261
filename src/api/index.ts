/**
 * Repository host API module
 *
 * Provides:
 * - GitHubClient implementing RepositoryClient
 * - Retry logic with exponential backoff
 * - JSON logging with secret redaction
 */

// Main client
export {
  GitHubClient,
  parseRepoUrl,
  normalizeRepoUrl,
  DEFAULT_GITHUB_API_URL,
} from './github.js';

// Retry utilities
export {
  withRetry,
  calculateDelay,
  isRetryableError,
  parseRetryAfter,
  sleep,
  DEFAULT_RETRY_CONFIG,
} from './retry.js';

export type { RetryOptions } from './retry.js';

// Logger utilities
export {
  logger,
  ApiLogger,
  redactString,
  redactPatterns,
  redactValue,
  redactContext,
  redactHeaders,
  isLogLevel,
} from './logger.js';

export type { LogLevel, LogEntry, LogSink, LoggerConfig } from './logger.js';

// Types
export type {
  RetryConfig,
  RetryResult,
  RepoCoordinates,
  RepoTarget,
  GitHubClientConfig,
  GitHubCommitResponse,
  GitHubTreeItem,
  GitHubTreeResponse,
  GitHubContentResponse,
  RateLimitInfo,
  RepositoryClient,
} from './types.js';
