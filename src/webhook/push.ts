/**
 * Push webhook handling
 *
 * Turns a GitHub delivery into syncs for every configured course bound to
 * the pushed repository and branch. The response never says whether a
 * repository is configured, and never carries failure details; those go to
 * the logger and the sync history.
 *
 * @module webhook/push
 */

import { normalizeRepoUrl } from '../api/github.js';
import { logger as defaultLogger, type ApiLogger } from '../api/logger.js';
import type { CourseConfig } from '../config/types.js';
import { errorCode, errorMessage } from '../errors.js';
import type { SyncRunner } from '../reconcilers/course/runner.js';
import { verifySignature } from './verify.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Transport-neutral view of an incoming delivery
 */
export interface WebhookRequest {
  method: string;
  /** Raw body exactly as received */
  body: string;
  /** X-Hub-Signature-256 */
  signature?: string;
  /** X-GitHub-Event */
  event?: string;
}

export interface WebhookResponseBody {
  status: 'ok' | 'ignored' | 'error';
  message?: string;
  /** Courses whose run completed (any non-thrown outcome) */
  synced?: number;
}

export interface WebhookResponse {
  statusCode: number;
  body: WebhookResponseBody;
}

export interface WebhookDeps {
  /** Shared secret; null when the webhook is not configured */
  secret: string | null;
  courses: CourseConfig[];
  runner: Pick<SyncRunner, 'run'>;
  logger?: ApiLogger;
}

/**
 * Fields read from a push payload
 */
export interface PushTarget {
  repoUrl: string;
  /** Empty when the payload carries no branch ref */
  branch: string;
}

// =============================================================================
// Payload
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Repository URL and branch of a push payload
 */
export function readPushTarget(payload: unknown): PushTarget {
  if (!isRecord(payload)) {
    return { repoUrl: '', branch: '' };
  }
  const repository = isRecord(payload.repository) ? payload.repository : {};
  const repoUrl = typeof repository.html_url === 'string' ? repository.html_url : '';
  const ref = typeof payload.ref === 'string' ? payload.ref : '';
  return { repoUrl, branch: ref.replace(/^refs\/heads\//, '') };
}

/**
 * Courses bound to the pushed repository (and branch, when one is given)
 */
export function matchCourses(courses: CourseConfig[], target: PushTarget): CourseConfig[] {
  const url = normalizeRepoUrl(target.repoUrl);
  return courses.filter(
    (course) =>
      normalizeRepoUrl(course.repo) === url && (target.branch === '' || course.branch === target.branch)
  );
}

function reply(statusCode: number, body: WebhookResponseBody): WebhookResponse {
  return { statusCode, body };
}

// =============================================================================
// Handler
// =============================================================================

export async function handlePushWebhook(
  request: WebhookRequest,
  deps: WebhookDeps
): Promise<WebhookResponse> {
  const log = (deps.logger ?? defaultLogger).child({ component: 'webhook' });

  if (request.method.toUpperCase() !== 'POST') {
    return reply(405, { status: 'error', message: 'Method not allowed' });
  }
  if (!deps.secret) {
    return reply(403, { status: 'error', message: 'Webhook not configured' });
  }
  if (request.body === '') {
    return reply(400, { status: 'error', message: 'Empty payload' });
  }
  if (!request.signature) {
    return reply(403, { status: 'error', message: 'Missing signature' });
  }
  if (!verifySignature(request.body, request.signature, deps.secret)) {
    log.warn('Webhook signature mismatch');
    return reply(403, { status: 'error', message: 'Invalid signature' });
  }

  let payload: unknown;
  try {
    payload = JSON.parse(request.body);
  } catch {
    return reply(400, { status: 'error', message: 'Invalid JSON' });
  }

  const event = request.event ?? '';
  if (event === 'ping') {
    return reply(200, { status: 'ok' });
  }
  if (event !== 'push') {
    return reply(200, { status: 'ignored' });
  }

  const target = readPushTarget(payload);
  if (target.repoUrl === '') {
    return reply(400, { status: 'error', message: 'Invalid payload' });
  }

  const matched = matchCourses(deps.courses, target);
  if (matched.length === 0) {
    log.debug('Push for unconfigured repository', { branch: target.branch });
    return reply(200, { status: 'ok' });
  }

  let synced = 0;
  for (const course of matched) {
    try {
      const outcome = await deps.runner.run(course.id, course.owner ?? 'webhook');
      log.info('Webhook sync finished', { scope: course.id, status: outcome.status });
      synced++;
    } catch (err) {
      log.error('Webhook sync failed', err instanceof Error ? err : undefined, {
        scope: course.id,
        code: errorCode(err),
        error: errorMessage(err),
      });
    }
  }

  return reply(200, { status: 'ok', synced });
}
