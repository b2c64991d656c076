/**
 * Hash Utilities
 *
 * Short SHA256 digests used to derive resource names.
 */

import { createHash } from 'node:crypto';

/** Hex characters kept from a digest */
export const SHORT_HASH_LENGTH = 8;

/**
 * First eight hex characters of the SHA256 of `content`.
 */
export function shortHash(content: string): string {
  return createHash('sha256').update(content).digest('hex').slice(0, SHORT_HASH_LENGTH);
}
