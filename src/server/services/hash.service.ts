/**
 * Hash Service - content addressing and seed derivation
 *
 * - Content hash: SHA-256 of the raw bytes of a configuration source. Equal
 *   bytes always give equal hashes, so the hash is the cache key.
 * - Attempt seed: HMAC-SHA256(batchSeed, attemptKey). A batch replayed with
 *   the same seed gives every attempt the same random source.
 */

import crypto from 'crypto';

const HASH_ALGORITHM = 'sha256';
const DIGEST_ENCODING = 'hex';

export class HashService {
  /**
   * SHA-256 hex digest (64 characters) of the given content.
   *
   * @example
   * ```typescript
   * hashService.hashContent('{"intent":"peace"}'); // '6c0f...'
   * ```
   */
  hashContent(content: Buffer | string): string {
    return crypto
      .createHash(HASH_ALGORITHM)
      .update(content)
      .digest(DIGEST_ENCODING);
  }

  /**
   * Derives a per-attempt seed from a batch seed and an attempt key.
   *
   * @throws {Error} If batchSeed or attemptKey is empty
   */
  deriveSeed(batchSeed: string, attemptKey: string): string {
    if (!batchSeed) {
      throw new Error('batchSeed must be a non-empty string');
    }
    if (!attemptKey) {
      throw new Error('attemptKey must be a non-empty string');
    }

    return crypto
      .createHmac(HASH_ALGORITHM, batchSeed)
      .update(attemptKey)
      .digest(DIGEST_ENCODING);
  }
}
