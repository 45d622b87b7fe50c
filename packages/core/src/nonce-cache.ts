/**
 * UMA Protocol: nonce cache for replay protection.
 */

import { InvalidNonceError } from "./types/errors.js";

/**
 * Records nonces used in signatures so each is accepted at most once.
 *
 * Implementations must make `checkAndSaveNonce` atomic: two calls with the
 * same nonce never both succeed. Production deployments should persist the
 * cache; {@link InMemoryNonceCache} is lost on restart.
 */
export interface NonceCache {
  /**
   * Save `nonce` unless it was used before or `timestamp` (unix seconds) is
   * below the oldest valid timestamp.
   * @throws {InvalidNonceError}
   */
  checkAndSaveNonce(nonce: string, timestamp: number): void;

  /** Drop every nonce older than `timestamp` and refuse any timestamp below it from now on. */
  purgeNoncesOlderThan(timestamp: number): void;
}

export class InMemoryNonceCache implements NonceCache {
  private readonly cache = new Map<string, number>();
  private oldestValidTimestamp: number;

  constructor(oldestValidTimestamp: number) {
    this.oldestValidTimestamp = oldestValidTimestamp;
  }

  checkAndSaveNonce(nonce: string, timestamp: number): void {
    if (timestamp < this.oldestValidTimestamp) {
      throw new InvalidNonceError("TIMESTAMP_TOO_OLD", nonce, timestamp);
    }
    if (this.cache.has(nonce)) {
      throw new InvalidNonceError("NONCE_ALREADY_USED", nonce, timestamp);
    }
    this.cache.set(nonce, timestamp);
  }

  purgeNoncesOlderThan(timestamp: number): void {
    for (const [nonce, savedAt] of this.cache) {
      if (savedAt < timestamp) this.cache.delete(nonce);
    }
    // The floor only moves forward.
    this.oldestValidTimestamp = Math.max(this.oldestValidTimestamp, timestamp);
  }

  /** Number of nonces currently held. */
  get size(): number {
    return this.cache.size;
  }
}
