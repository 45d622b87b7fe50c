/**
 * UMA reference VASP: NonceCache persisted in SQLite.
 */

import { InvalidNonceError, type NonceCache } from "@umaproto/core";
import type { Database } from "./schema.js";

/**
 * Survives restarts, unlike the in-memory cache. The floor is stored with the
 * nonces; `initialFloor` only applies to a fresh database.
 */
export class SqliteNonceCache implements NonceCache {
  constructor(
    private db: Database,
    initialFloor: number,
  ) {
    if (db.getNonceFloor() === undefined) db.setNonceFloor(initialFloor);
  }

  checkAndSaveNonce(nonce: string, timestamp: number): void {
    this.db.transaction(() => {
      const floor = this.db.getNonceFloor() ?? 0;
      if (timestamp < floor) {
        throw new InvalidNonceError("TIMESTAMP_TOO_OLD", nonce, timestamp);
      }
      if (!this.db.insertNonce(nonce, timestamp)) {
        throw new InvalidNonceError("NONCE_ALREADY_USED", nonce, timestamp);
      }
    });
  }

  purgeNoncesOlderThan(timestamp: number): void {
    this.db.transaction(() => {
      this.db.deleteNoncesOlderThan(timestamp);
      const floor = this.db.getNonceFloor() ?? timestamp;
      this.db.setNonceFloor(Math.max(floor, timestamp));
    });
  }

  get size(): number {
    return this.db.getNonceCount();
  }
}
