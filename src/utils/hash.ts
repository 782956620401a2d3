/**
 * SHA-256 helpers
 *
 * @module utils/hash
 */

import crypto from 'crypto';

/**
 * Raw SHA-256 digest of a UTF-8 string (32 bytes)
 */
export function sha256Digest(content: string): Buffer {
  return crypto.createHash('sha256').update(content, 'utf8').digest();
}
