/**
 * GitHub API Client
 *
 * Reads course repository snapshots through the GitHub REST API with:
 * - Retry with exponential backoff
 * - Rate limit tracking (X-RateLimit-* headers)
 * - Logging with secret redaction
 * - One repository target per course scope
 */

import { ConfigError, TransportError, type TransportErrorCode } from '../errors.js';
import type { TreeEntry } from '../reconcilers/tree/types.js';
import { logger as defaultLogger, type ApiLogger } from './logger.js';
import { DEFAULT_RETRY_CONFIG, parseRetryAfter, withRetry, type RetryOptions } from './retry.js';
import type {
  GitHubClientConfig,
  GitHubContentResponse,
  GitHubTreeItem,
  GitHubTreeResponse,
  RateLimitInfo,
  RepoCoordinates,
  RepoTarget,
  RepositoryClient,
} from './types.js';

export const DEFAULT_GITHUB_API_URL = 'https://api.github.com';
const DEFAULT_USER_AGENT = 'course-sync/1.0';

// =============================================================================
// Repository URLs
// =============================================================================

/**
 * Owner and repository name from a github.com URL
 *
 * @example
 * parseRepoUrl('https://github.com/example/intro-101.git')
 * // { owner: 'example', repo: 'intro-101' }
 *
 * @throws ConfigError for anything that is not an https github.com repository URL
 */
export function parseRepoUrl(url: string): RepoCoordinates {
  const trimmed = url.trim().replace(/\/+$/, '').replace(/\.git$/, '');
  const match = /^https:\/\/github\.com\/([^/]+)\/([^/]+)$/.exec(trimmed);
  if (!match) {
    throw new ConfigError(
      `Invalid repository URL: ${url}`,
      'CONFIG_INVALID',
      [],
      'Use the form https://github.com/<owner>/<repo>'
    );
  }
  return { owner: match[1], repo: match[2] };
}

/**
 * Canonical form used to match webhook payloads against configured courses
 */
export function normalizeRepoUrl(url: string): string {
  return url.trim().replace(/\/+$/, '').replace(/\.git$/, '').toLowerCase();
}

// =============================================================================
// Response Decoding
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function malformed(what: string): TransportError {
  return new TransportError(`Unexpected GitHub response: ${what}`);
}

function decodeCommit(body: unknown): string {
  if (!isRecord(body) || typeof body.sha !== 'string' || body.sha.length === 0) {
    throw malformed('commit without sha');
  }
  return body.sha;
}

function decodeTreeItem(raw: unknown): GitHubTreeItem | null {
  if (!isRecord(raw) || typeof raw.path !== 'string' || typeof raw.sha !== 'string') {
    return null;
  }
  const type = raw.type;
  if (type !== 'blob' && type !== 'tree' && type !== 'commit') {
    return null;
  }
  return {
    path: raw.path,
    type,
    sha: raw.sha,
    mode: typeof raw.mode === 'string' ? raw.mode : undefined,
    size: typeof raw.size === 'number' ? raw.size : undefined,
  };
}

function decodeTree(body: unknown): GitHubTreeResponse {
  if (!isRecord(body) || !Array.isArray(body.tree)) {
    throw malformed('tree listing without entries');
  }
  const tree: GitHubTreeItem[] = [];
  for (const raw of body.tree) {
    const item = decodeTreeItem(raw);
    if (item) tree.push(item);
  }
  return {
    sha: typeof body.sha === 'string' ? body.sha : '',
    tree,
    truncated: body.truncated === true,
  };
}

function decodeContent(body: unknown, path: string): GitHubContentResponse {
  if (!isRecord(body)) {
    throw malformed(`contents of ${path}`);
  }
  return {
    path: typeof body.path === 'string' ? body.path : path,
    content: typeof body.content === 'string' ? body.content : undefined,
    encoding: typeof body.encoding === 'string' ? body.encoding : undefined,
    size: typeof body.size === 'number' ? body.size : undefined,
  };
}

function encodePath(path: string): string {
  return path.split('/').map(encodeURIComponent).join('/');
}

function headerNumber(headers: Headers, name: string): number | null {
  const value = headers.get(name);
  if (value === null) return null;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? null : parsed;
}

// =============================================================================
// Client
// =============================================================================

export class GitHubClient implements RepositoryClient {
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly fetchImpl: typeof fetch;
  private readonly userAgent: string;
  private readonly retry: RetryOptions;
  private readonly log: ApiLogger;
  private rateLimit: RateLimitInfo = { remaining: null, reset: null };

  constructor(
    private readonly config: GitHubClientConfig,
    logger: ApiLogger = defaultLogger
  ) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_GITHUB_API_URL).replace(/\/+$/, '');
    this.timeout = config.timeout ?? 30000;
    this.fetchImpl = config.fetch ?? fetch;
    this.userAgent = config.userAgent ?? DEFAULT_USER_AGENT;
    this.log = logger.child({ component: 'github' });
    this.retry = {
      maxRetries: config.retry?.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries,
      baseDelayMs: config.retry?.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
      maxDelayMs: config.retry?.maxDelayMs,
      jitterFactor: config.retry?.jitterFactor,
      retryableStatuses: config.retry?.retryableStatuses,
      logger: this.log,
    };
  }

  /**
   * Rate limit headers seen on the most recent response
   */
  getRateLimitStatus(): RateLimitInfo {
    return { ...this.rateLimit };
  }

  async getSnapshotIdentity(scope: string): Promise<string> {
    const target = this.config.resolveTarget(scope);
    const body = await this.request(target, `/commits/${encodeURIComponent(target.branch)}`);
    return decodeCommit(body);
  }

  async listTree(scope: string): Promise<TreeEntry[]> {
    const target = this.config.resolveTarget(scope);
    const body = await this.request(target, `/git/trees/${encodeURIComponent(target.branch)}`, {
      recursive: '1',
    });
    const tree = decodeTree(body);
    if (tree.truncated) {
      // The removal sweep needs the complete listing
      throw new TransportError(`Repository tree truncated by GitHub for ${scope}`, 'TRANSPORT_ERROR', {
        suggestion: 'Reduce the number of files in the repository',
      });
    }

    const entries: TreeEntry[] = [];
    for (const item of tree.tree) {
      if (item.type === 'commit') continue;
      entries.push({ path: item.path, kind: item.type, size: item.size ?? 0 });
    }
    return entries;
  }

  async getFileContents(scope: string, path: string): Promise<Uint8Array> {
    const target = this.config.resolveTarget(scope);
    const body = await this.request(target, `/contents/${encodePath(path)}`, {
      ref: target.branch,
    });
    const content = decodeContent(body, path);

    if (content.content === undefined || content.content === '') {
      if ((content.size ?? 0) > 0) {
        throw new TransportError(`File too large for Contents API: ${path}`);
      }
      return new Uint8Array(0);
    }
    if (content.encoding !== undefined && content.encoding !== 'base64') {
      throw malformed(`unsupported encoding ${content.encoding} for ${path}`);
    }
    return new Uint8Array(Buffer.from(content.content, 'base64'));
  }

  // ---------------------------------------------------------------------------
  // Transport
  // ---------------------------------------------------------------------------

  private async request(
    target: RepoTarget,
    suffix: string,
    params: Record<string, string> = {}
  ): Promise<unknown> {
    const url = new URL(
      `${this.baseUrl}/repos/${encodeURIComponent(target.owner)}/${encodeURIComponent(target.repo)}${suffix}`
    );
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    const headers: Record<string, string> = {
      Accept: 'application/vnd.github.v3+json',
      'User-Agent': this.userAgent,
    };
    if (target.token) {
      headers['Authorization'] = `token ${target.token}`;
    }

    this.log.request('GET', url.toString(), headers);

    const makeRequest = async (): Promise<unknown> => {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), this.timeout);

      try {
        const startTime = Date.now();
        const response = await this.fetchImpl(url.toString(), {
          method: 'GET',
          headers,
          signal: controller.signal,
        });
        this.log.response(response.status, url.toString(), Date.now() - startTime);
        this.trackRateLimit(response.headers);

        if (!response.ok) {
          throw await this.toError(response);
        }
        return await response.json();
      } finally {
        clearTimeout(timeoutId);
      }
    };

    const result = await withRetry(makeRequest, this.retry);
    if (!result.success) {
      if (result.error instanceof TransportError) {
        throw result.error;
      }
      throw new TransportError(`GitHub request failed: ${result.error.message}`);
    }
    return result.data;
  }

  private trackRateLimit(headers: Headers): void {
    const remaining = headerNumber(headers, 'X-RateLimit-Remaining');
    const reset = headerNumber(headers, 'X-RateLimit-Reset');
    if (remaining !== null) this.rateLimit.remaining = remaining;
    if (reset !== null) this.rateLimit.reset = reset;
  }

  private async toError(response: Response): Promise<TransportError> {
    let detail = `HTTP ${response.status}`;
    try {
      const text = await response.text();
      if (text) {
        try {
          const parsed: unknown = JSON.parse(text);
          if (isRecord(parsed) && typeof parsed.message === 'string') {
            detail = parsed.message;
          }
        } catch {
          detail = text.substring(0, 200);
        }
      }
    } catch (readError) {
      this.log.debug('Could not read error body', {
        status: response.status,
        error: readError instanceof Error ? readError.message : String(readError),
      });
    }

    const status = response.status;
    const retryAfter = parseRetryAfter(response.headers.get('Retry-After'));
    let code: TransportErrorCode = 'TRANSPORT_ERROR';
    let suggestion: string | undefined;

    if (status === 401) {
      code = 'AUTH_FAILED';
      suggestion = 'Check the access token configured for this course';
    } else if (status === 403 && headerNumber(response.headers, 'X-RateLimit-Remaining') === 0) {
      code = 'RATE_LIMITED';
      const reset = headerNumber(response.headers, 'X-RateLimit-Reset');
      if (reset !== null) {
        detail = `GitHub API rate limit exceeded. Resets at ${new Date(reset * 1000).toISOString()}`;
      }
    } else if (status === 429) {
      code = 'RATE_LIMITED';
    } else if (status === 404) {
      code = 'NOT_FOUND';
      suggestion = 'Check the repository URL, branch and token permissions';
    }

    return new TransportError(`GitHub API error (${status}): ${detail}`, code, {
      status,
      retryAfter,
      suggestion,
    });
  }
}
