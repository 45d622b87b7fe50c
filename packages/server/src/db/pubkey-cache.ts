/**
 * UMA reference VASP: PublicKeyCache persisted in SQLite.
 */

import {
  PubKeyResponse,
  unixNow,
  type InMemoryPublicKeyCacheOptions,
  type PublicKeyCache,
} from "@umaproto/core";
import type { Database } from "./schema.js";

export class SqlitePublicKeyCache implements PublicKeyCache {
  private readonly now: () => number;
  private readonly allowNonExpiringEntries: boolean;

  constructor(
    private db: Database,
    options: InMemoryPublicKeyCacheOptions = {},
  ) {
    this.now = options.now ?? unixNow;
    this.allowNonExpiringEntries = options.allowNonExpiringEntries ?? false;
  }

  getPublicKeysForVasp(vaspDomain: string): PubKeyResponse | undefined {
    const row = this.db.getPublicKeys(vaspDomain);
    if (row === undefined) return undefined;
    if (row.expiration_timestamp !== null && row.expiration_timestamp <= this.now()) {
      this.db.deletePublicKeys(vaspDomain);
      return undefined;
    }
    return PubKeyResponse.fromJson(row.response);
  }

  addPublicKeysForVasp(vaspDomain: string, response: PubKeyResponse): void {
    const expiration = response.expirationTimestamp;
    if (expiration === undefined ? !this.allowNonExpiringEntries : expiration <= this.now()) return;
    this.db.upsertPublicKeys({
      vasp_domain: vaspDomain,
      response: JSON.stringify(response.toJSON()),
      expiration_timestamp: expiration ?? null,
    });
  }

  removePublicKeysForVasp(vaspDomain: string): void {
    this.db.deletePublicKeys(vaspDomain);
  }

  clear(): void {
    this.db.clearPublicKeys();
  }
}
