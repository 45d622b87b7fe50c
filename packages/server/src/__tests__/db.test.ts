/**
 * UMA reference VASP: database and persistent cache tests.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { randomUUID } from "node:crypto";
import { mkdirSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { InvalidNonceError, PubKeyResponse, generateKeyPair } from "@umaproto/core";
import { Database } from "../db/schema.js";
import { SqliteNonceCache } from "../db/nonce-cache.js";
import { SqlitePublicKeyCache } from "../db/pubkey-cache.js";

// ---------------------------------------------------------------------------
// Test setup
// ---------------------------------------------------------------------------

let db: Database;
let testDir: string;

beforeEach(() => {
  testDir = join(tmpdir(), `uma-db-test-${randomUUID()}`);
  mkdirSync(testDir, { recursive: true });
  db = new Database(join(testDir, "test.db"));
});

afterEach(() => {
  db.close();
  rmSync(testDir, { recursive: true, force: true });
});

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected an error");
}

// ---------------------------------------------------------------------------
// Database
// ---------------------------------------------------------------------------

describe("Database", () => {
  it("inserts a nonce once", () => {
    expect(db.insertNonce("n1", 100)).toBe(true);
    expect(db.insertNonce("n1", 200)).toBe(false);
    expect(db.getNonceCount()).toBe(1);
  });

  it("deletes nonces strictly older than a timestamp", () => {
    db.insertNonce("old", 99);
    db.insertNonce("edge", 100);
    db.insertNonce("new", 101);

    expect(db.deleteNoncesOlderThan(100)).toBe(1);
    expect(db.insertNonce("old", 99)).toBe(true);
    expect(db.insertNonce("edge", 100)).toBe(false);
  });

  it("stores a single nonce floor row", () => {
    expect(db.getNonceFloor()).toBeUndefined();
    db.setNonceFloor(10);
    db.setNonceFloor(20);
    expect(db.getNonceFloor()).toBe(20);
  });

  it("upserts public keys by domain", () => {
    db.upsertPublicKeys({ vasp_domain: "a.example", response: "{}", expiration_timestamp: 5 });
    db.upsertPublicKeys({ vasp_domain: "a.example", response: '{"x":1}', expiration_timestamp: null });

    const row = db.getPublicKeys("a.example");
    expect(row?.response).toBe('{"x":1}');
    expect(row?.expiration_timestamp).toBeNull();
    expect(db.deletePublicKeys("a.example")).toBe(true);
    expect(db.getPublicKeys("a.example")).toBeUndefined();
  });

  it("records payments and callbacks", () => {
    db.insertPayment({
      id: "p1",
      receiver: "$bob@vasp2.example",
      payer_identifier: "$alice@vasp1.example",
      sender_vasp_domain: "vasp1.example",
      amount: 100,
      amount_unit: "USD",
      receiving_currency_code: "USD",
      encoded_invoice: "lnbcrt1",
      uma_layout: "v1",
    });
    db.insertUtxoCallback({
      id: "c1",
      vasp_domain: "vasp1.example",
      transaction_status: null,
      utxos: "[]",
    });

    expect(db.getPaymentCount()).toBe(1);
    const payments = db.listPaymentsForReceiver("$bob@vasp2.example");
    expect(payments).toHaveLength(1);
    expect(payments[0].amount_unit).toBe("USD");
    expect(db.listUtxoCallbacks("vasp1.example")[0].transaction_status).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// SqliteNonceCache
// ---------------------------------------------------------------------------

describe("SqliteNonceCache", () => {
  it("accepts a nonce once", () => {
    const cache = new SqliteNonceCache(db, 1000);
    cache.checkAndSaveNonce("abc", 1500);

    expect(captureError(() => cache.checkAndSaveNonce("abc", 1600))).toMatchObject({
      reason: "NONCE_ALREADY_USED",
      code: "INVALID_NONCE",
    });
  });

  it("refuses timestamps below the floor", () => {
    const cache = new SqliteNonceCache(db, 1000);

    const err = captureError(() => cache.checkAndSaveNonce("abc", 999));
    expect(err).toBeInstanceOf(InvalidNonceError);
    expect(err).toMatchObject({ reason: "TIMESTAMP_TOO_OLD", code: "INVALID_TIMESTAMP" });
    expect(db.getNonceCount()).toBe(0);
  });

  it("raises the floor on purge and never lowers it", () => {
    const cache = new SqliteNonceCache(db, 1000);
    cache.checkAndSaveNonce("a", 1100);
    cache.checkAndSaveNonce("b", 1300);

    cache.purgeNoncesOlderThan(1200);
    expect(cache.size).toBe(1);
    expect(db.getNonceFloor()).toBe(1200);

    cache.purgeNoncesOlderThan(1100);
    expect(db.getNonceFloor()).toBe(1200);
    expect(captureError(() => cache.checkAndSaveNonce("c", 1150))).toMatchObject({ reason: "TIMESTAMP_TOO_OLD" });
  });

  it("keeps the stored floor across instances", () => {
    new SqliteNonceCache(db, 1000).purgeNoncesOlderThan(5000);
    const reopened = new SqliteNonceCache(db, 10);

    expect(db.getNonceFloor()).toBe(5000);
    expect(captureError(() => reopened.checkAndSaveNonce("x", 4000))).toMatchObject({ reason: "TIMESTAMP_TOO_OLD" });
  });
});

// ---------------------------------------------------------------------------
// SqlitePublicKeyCache
// ---------------------------------------------------------------------------

describe("SqlitePublicKeyCache", () => {
  const NOW = 1700000000;
  const keys = generateKeyPair();

  it("round-trips keys until they expire", () => {
    let now = NOW;
    const cache = new SqlitePublicKeyCache(db, { now: () => now });
    cache.addPublicKeysForVasp("vasp1.example", PubKeyResponse.fromKeys(keys.publicKey, keys.publicKey, NOW + 60));

    const cached = cache.getPublicKeysForVasp("vasp1.example");
    expect(cached?.getSigningPubKey()).toEqual(keys.publicKey);
    expect(cached?.expirationTimestamp).toBe(NOW + 60);

    now = NOW + 60;
    expect(cache.getPublicKeysForVasp("vasp1.example")).toBeUndefined();
    expect(db.getPublicKeys("vasp1.example")).toBeUndefined();
  });

  it("drops already-expired and non-expiring entries by default", () => {
    const cache = new SqlitePublicKeyCache(db, { now: () => NOW });
    cache.addPublicKeysForVasp("old.example", PubKeyResponse.fromKeys(keys.publicKey, keys.publicKey, NOW));
    cache.addPublicKeysForVasp("forever.example", PubKeyResponse.fromKeys(keys.publicKey, keys.publicKey));

    expect(cache.getPublicKeysForVasp("old.example")).toBeUndefined();
    expect(cache.getPublicKeysForVasp("forever.example")).toBeUndefined();
  });

  it("keeps non-expiring entries when allowed", () => {
    const cache = new SqlitePublicKeyCache(db, { now: () => NOW, allowNonExpiringEntries: true });
    cache.addPublicKeysForVasp("forever.example", PubKeyResponse.fromKeys(keys.publicKey, keys.publicKey));

    expect(cache.getPublicKeysForVasp("forever.example")?.expirationTimestamp).toBeUndefined();
  });

  it("removes and clears entries", () => {
    const cache = new SqlitePublicKeyCache(db, { now: () => NOW });
    const response = PubKeyResponse.fromKeys(keys.publicKey, keys.publicKey, NOW + 60);
    cache.addPublicKeysForVasp("a.example", response);
    cache.addPublicKeysForVasp("b.example", response);

    cache.removePublicKeysForVasp("a.example");
    expect(cache.getPublicKeysForVasp("a.example")).toBeUndefined();
    expect(cache.getPublicKeysForVasp("b.example")).toBeDefined();

    cache.clear();
    expect(cache.getPublicKeysForVasp("b.example")).toBeUndefined();
  });
});
