import { describe, it, expect } from "vitest";
import { generateKeyPair, toHex } from "../crypto/keys.js";
import { InMemoryPublicKeyCache, PubKeyResponse } from "../pubkey-cache.js";
import { UmaErrorCode } from "../types/errors.js";
import { captureError } from "./helpers.js";

// ---------------------------------------------------------------------------
// PubKeyResponse
// ---------------------------------------------------------------------------
describe("PubKeyResponse", () => {
  const signing = generateKeyPair();
  const encryption = generateKeyPair();

  it("round-trips raw keys through JSON", () => {
    const response = PubKeyResponse.fromKeys(signing.publicKey, encryption.publicKey, 2000);
    const json = JSON.parse(JSON.stringify(response));
    expect(json).toEqual({
      signingPubKey: toHex(signing.publicKey),
      encryptionPubKey: toHex(encryption.publicKey),
      expirationTimestamp: 2000,
    });

    const decoded = PubKeyResponse.fromJson(JSON.stringify(json));
    expect(decoded.getSigningPubKey()).toEqual(signing.publicKey);
    expect(decoded.getEncryptionPubKey()).toEqual(encryption.publicKey);
    expect(decoded.expirationTimestamp).toBe(2000);
  });

  it("prefers the certificate over the raw key", () => {
    const fromCert = new Uint8Array([4, 1, 2, 3]);
    const response = new PubKeyResponse(
      { signingCertificate: "PEM", signingPubKey: signing.publicKey },
      (pem) => (pem === "PEM" ? fromCert : new Uint8Array()),
    );
    expect(response.getSigningPubKey()).toEqual(fromCert);
  });

  it("surfaces certificate parse failures as CERT_CHAIN_INVALID", () => {
    const response = PubKeyResponse.fromCertificates("not a certificate", "not a certificate");
    expect(captureError(() => response.getSigningPubKey())).toMatchObject({
      code: UmaErrorCode.CERT_CHAIN_INVALID,
    });
  });

  it("throws INVALID_PUBKEY_FORMAT when no key is present", () => {
    const response = new PubKeyResponse({ signingPubKey: signing.publicKey });
    expect(captureError(() => response.getEncryptionPubKey())).toMatchObject({
      code: UmaErrorCode.INVALID_PUBKEY_FORMAT,
    });
  });

  it("rejects malformed bodies as INVALID_PUBKEY_FORMAT", () => {
    for (const body of ["{", '{"signingPubKey": 5}', '{"signingPubKey": "xyz"}']) {
      expect(captureError(() => PubKeyResponse.fromJson(body))).toMatchObject({
        code: UmaErrorCode.INVALID_PUBKEY_FORMAT,
      });
    }
  });
});

// ---------------------------------------------------------------------------
// InMemoryPublicKeyCache
// ---------------------------------------------------------------------------
describe("InMemoryPublicKeyCache", () => {
  const kp = generateKeyPair();
  const keysExpiringAt = (exp?: number) => PubKeyResponse.fromKeys(kp.publicKey, kp.publicKey, exp);

  it("returns a live entry", () => {
    const cache = new InMemoryPublicKeyCache({ now: () => 100 });
    const response = keysExpiringAt(200);
    cache.addPublicKeysForVasp("vasp.example", response);
    expect(cache.getPublicKeysForVasp("vasp.example")).toBe(response);
    expect(cache.getPublicKeysForVasp("other.example")).toBeUndefined();
  });

  it("evicts an entry once it expires", () => {
    let now = 100;
    const cache = new InMemoryPublicKeyCache({ now: () => now });
    cache.addPublicKeysForVasp("vasp.example", keysExpiringAt(200));
    now = 200;
    expect(cache.getPublicKeysForVasp("vasp.example")).toBeUndefined();
    now = 100;
    expect(cache.getPublicKeysForVasp("vasp.example")).toBeUndefined();
  });

  it("drops entries that are already expired", () => {
    const cache = new InMemoryPublicKeyCache({ now: () => 300 });
    cache.addPublicKeysForVasp("vasp.example", keysExpiringAt(300));
    expect(cache.getPublicKeysForVasp("vasp.example")).toBeUndefined();
  });

  it("stores non-expiring entries only when allowed", () => {
    const strict = new InMemoryPublicKeyCache({ now: () => 0 });
    strict.addPublicKeysForVasp("vasp.example", keysExpiringAt());
    expect(strict.getPublicKeysForVasp("vasp.example")).toBeUndefined();

    const lenient = new InMemoryPublicKeyCache({ now: () => 0, allowNonExpiringEntries: true });
    lenient.addPublicKeysForVasp("vasp.example", keysExpiringAt());
    expect(lenient.getPublicKeysForVasp("vasp.example")).toBeDefined();
  });

  it("removes and clears", () => {
    const cache = new InMemoryPublicKeyCache({ now: () => 0 });
    cache.addPublicKeysForVasp("a.example", keysExpiringAt(10));
    cache.addPublicKeysForVasp("b.example", keysExpiringAt(10));
    cache.removePublicKeysForVasp("a.example");
    expect(cache.getPublicKeysForVasp("a.example")).toBeUndefined();
    expect(cache.getPublicKeysForVasp("b.example")).toBeDefined();
    cache.clear();
    expect(cache.getPublicKeysForVasp("b.example")).toBeUndefined();
  });
});
