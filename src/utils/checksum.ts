/**
 * SHA-256 digests used to fingerprint plans.
 */
import { createHash } from 'node:crypto';

/**
 * First 16 hex characters of the SHA-256 of `content`.
 */
export function computeChecksum(content: string): string {
  return createHash('sha256').update(content).digest('hex').slice(0, 16);
}
