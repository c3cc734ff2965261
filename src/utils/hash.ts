/**
 * Content fingerprints used for change detection
 */

import { createHash } from 'node:crypto';

/**
 * SHA-1 hex digest of a string (UTF-8) or raw bytes
 */
export function contentHash(content: string | Uint8Array): string {
  return createHash('sha1').update(content).digest('hex');
}

/**
 * First seven characters of a snapshot identity
 */
export function shortIdentity(identity: string): string {
  return identity.substring(0, 7);
}
