/**
 * GitHub webhook signature verification (X-Hub-Signature-256)
 */

import { createHmac, timingSafeEqual } from 'node:crypto';

export const SIGNATURE_PREFIX = 'sha256=';

/**
 * `sha256=<hex hmac>` of a payload
 */
export function signPayload(payload: string, secret: string): string {
  return SIGNATURE_PREFIX + createHmac('sha256', secret).update(payload, 'utf8').digest('hex');
}

/**
 * Constant-time comparison of a received signature with the expected one
 */
export function verifySignature(payload: string, signature: string, secret: string): boolean {
  const expected = Buffer.from(signPayload(payload, secret), 'utf8');
  const received = Buffer.from(signature, 'utf8');
  if (expected.length !== received.length) {
    return false;
  }
  return timingSafeEqual(expected, received);
}
