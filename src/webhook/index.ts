/**
 * Inbound GitHub webhook handling
 */

export { signPayload, verifySignature, SIGNATURE_PREFIX } from './verify.js';
export {
  handlePushWebhook,
  readPushTarget,
  matchCourses,
  type PushTarget,
  type WebhookDeps,
  type WebhookRequest,
  type WebhookResponse,
  type WebhookResponseBody,
} from './push.js';
