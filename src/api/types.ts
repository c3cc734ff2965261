/**
 * Types for the GitHub REST client
 *
 * Only the fields the sync reads are modeled.
 */

import type { TreeEntry } from '../reconcilers/tree/types.js';

// =============================================================================
// Retry Types
// =============================================================================

/**
 * Retry behavior for a single request
 */
export interface RetryConfig {
  /** Retries after the first attempt */
  maxRetries?: number;
  /** Base delay for exponential backoff (ms) */
  baseDelayMs?: number;
  /** Upper bound for any single delay (ms) */
  maxDelayMs?: number;
  /** Random jitter as a fraction of the delay */
  jitterFactor?: number;
  /** HTTP statuses worth another attempt */
  retryableStatuses?: number[];
}

/**
 * Outcome of a retried operation
 */
export type RetryResult<T> =
  | { success: true; data: T; attempts: number; totalTimeMs: number }
  | { success: false; error: Error; attempts: number; totalTimeMs: number };

// =============================================================================
// Repository Targets
// =============================================================================

/**
 * Owner and name parsed from a repository URL
 */
export interface RepoCoordinates {
  owner: string;
  repo: string;
}

/**
 * Everything needed to read one course's repository
 */
export interface RepoTarget extends RepoCoordinates {
  branch: string;
  /** Personal access token; public repositories need none */
  token?: string;
}

/**
 * GitHub client configuration
 */
export interface GitHubClientConfig {
  /** Maps a course scope to its repository */
  resolveTarget: (scope: string) => RepoTarget;
  /** API root (default: https://api.github.com) */
  baseUrl?: string;
  /** Request timeout in ms (default: 30000) */
  timeout?: number;
  /** Per-request retry settings */
  retry?: RetryConfig;
  /** Replaces the global fetch */
  fetch?: typeof fetch;
  /** User-Agent header value */
  userAgent?: string;
}

// =============================================================================
// Response Shapes
// =============================================================================

/**
 * GET /repos/{owner}/{repo}/commits/{ref}
 */
export interface GitHubCommitResponse {
  sha: string;
}

/**
 * One entry of a recursive tree listing
 */
export interface GitHubTreeItem {
  path: string;
  mode?: string;
  type: 'blob' | 'tree' | 'commit';
  sha: string;
  size?: number;
}

/**
 * GET /repos/{owner}/{repo}/git/trees/{ref}?recursive=1
 */
export interface GitHubTreeResponse {
  sha: string;
  tree: GitHubTreeItem[];
  truncated?: boolean;
}

/**
 * GET /repos/{owner}/{repo}/contents/{path}?ref={ref}
 */
export interface GitHubContentResponse {
  path: string;
  content?: string;
  encoding?: string;
  size?: number;
}

/**
 * Rate limit headers from the last response
 */
export interface RateLimitInfo {
  remaining: number | null;
  /** Epoch seconds */
  reset: number | null;
}

// =============================================================================
// Repository Client
// =============================================================================

/**
 * Read access to a course repository snapshot
 *
 * Every method fails with TransportError when the host cannot be reached or
 * rejects the request.
 */
export interface RepositoryClient {
  /** Opaque token for the current head of the scope's branch */
  getSnapshotIdentity(scope: string): Promise<string>;
  /** Recursive listing of the snapshot */
  listTree(scope: string): Promise<TreeEntry[]>;
  getFileContents(scope: string, path: string): Promise<Uint8Array>;
}
