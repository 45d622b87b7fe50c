import { describe, it, expect } from "vitest";
import { hexToBytes, bytesToHex, utf8ToBytes } from "@noble/hashes/utils";
import { generateKeyPair, publicKeyFromPrivateKey, fromHex } from "../crypto/keys.js";
import {
  signPayload,
  verifySignature,
  verifyBackingSignatures,
  pipeJoinedPayload,
} from "../crypto/signing.js";
import { encryptTravelRuleInfo, decryptTravelRuleInfo } from "../crypto/encryption.js";
import { UmaError, UmaErrorCode } from "../types/errors.js";
import { captureError } from "./helpers.js";

// ---------------------------------------------------------------------------
// Key generation
// ---------------------------------------------------------------------------
describe("Key Generation", () => {
  it("generates a secp256k1 key pair with an uncompressed public key", () => {
    const kp = generateKeyPair();
    expect(kp.privateKey.length).toBe(32);
    expect(kp.publicKey.length).toBe(65);
    expect(kp.publicKey[0]).toBe(0x04);
  });

  it("derives the same public key from the private key", () => {
    const kp = generateKeyPair();
    expect(publicKeyFromPrivateKey(kp.privateKey)).toEqual(kp.publicKey);
  });

  it("rejects malformed hex", () => {
    expect(() => fromHex("abc")).toThrow(UmaError);
    expect(() => fromHex("zz")).toThrow(UmaError);
  });
});

// ---------------------------------------------------------------------------
// Sign / verify
// ---------------------------------------------------------------------------
describe("Sign and verify", () => {
  const kp = generateKeyPair();
  const payload = utf8ToBytes("$bob@vasp2.com|1234567890|1700000000");

  it("verifies a signature it produced", () => {
    const sig = signPayload(payload, kp.privateKey);
    expect(verifySignature(payload, sig, kp.publicKey)).toBe(true);
  });

  it("fails when any single payload byte changes", () => {
    const sig = signPayload(payload, kp.privateKey);
    for (let i = 0; i < payload.length; i++) {
      const mutated = payload.slice();
      mutated[i] ^= 0x01;
      expect(verifySignature(mutated, sig, kp.publicKey)).toBe(false);
    }
  });

  it("fails when any single signature byte changes", () => {
    const sig = hexToBytes(signPayload(payload, kp.privateKey));
    for (let i = 0; i < sig.length; i++) {
      const mutated = sig.slice();
      mutated[i] ^= 0x01;
      expect(verifySignature(payload, bytesToHex(mutated), kp.publicKey)).toBe(false);
    }
  });

  it("fails against another key", () => {
    const other = generateKeyPair();
    const sig = signPayload(payload, kp.privateKey);
    expect(verifySignature(payload, sig, other.publicKey)).toBe(false);
  });

  it("returns false instead of throwing on garbage input", () => {
    expect(verifySignature(payload, "not-hex", kp.publicKey)).toBe(false);
    expect(verifySignature(payload, "", kp.publicKey)).toBe(false);
    expect(verifySignature(payload, "3006020101020101", new Uint8Array(3))).toBe(false);
  });

  it("throws INVALID_INPUT when signing with an invalid private key", () => {
    const err = captureError(() => signPayload(payload, new Uint8Array(32)));
    expect(err).toBeInstanceOf(UmaError);
    expect(err).toMatchObject({ code: UmaErrorCode.INVALID_INPUT });
  });
});

// ---------------------------------------------------------------------------
// Canonical payloads
// ---------------------------------------------------------------------------
describe("pipeJoinedPayload", () => {
  it("joins with pipes as written", () => {
    expect(new TextDecoder().decode(pipeJoinedPayload(["$Bob@VASP.com", "n1", 17]))).toBe("$Bob@VASP.com|n1|17");
  });

  it("lower-cases the whole string when asked", () => {
    expect(new TextDecoder().decode(pipeJoinedPayload(["$Bob@VASP.com", "N1", 17], { lowercase: true }))).toBe(
      "$bob@vasp.com|n1|17",
    );
  });
});

// ---------------------------------------------------------------------------
// Backing signature chains
// ---------------------------------------------------------------------------
describe("verifyBackingSignatures", () => {
  const payload = utf8ToBytes("n|1");
  const backerA = generateKeyPair();
  const backerB = generateKeyPair();
  const keys: Record<string, Uint8Array> = {
    "a.example": backerA.publicKey,
    "b.example": backerB.publicKey,
  };
  const resolve = async (domain: string) => keys[domain];

  it("accepts an absent or empty chain", async () => {
    expect(await verifyBackingSignatures(payload, undefined, resolve)).toBe(true);
    expect(await verifyBackingSignatures(payload, [], resolve)).toBe(true);
  });

  it("accepts a chain where every entry verifies", async () => {
    const chain = [
      { domain: "a.example", signature: signPayload(payload, backerA.privateKey) },
      { domain: "b.example", signature: signPayload(payload, backerB.privateKey) },
    ];
    expect(await verifyBackingSignatures(payload, chain, resolve)).toBe(true);
  });

  it("rejects the chain when one entry fails", async () => {
    const chain = [
      { domain: "a.example", signature: signPayload(payload, backerA.privateKey) },
      { domain: "b.example", signature: signPayload(payload, backerA.privateKey) },
    ];
    expect(await verifyBackingSignatures(payload, chain, resolve)).toBe(false);
  });

  it("propagates key lookup failures", async () => {
    const chain = [{ domain: "a.example", signature: "00" }];
    const failing = async (): Promise<Uint8Array> => {
      throw new Error("lookup failed");
    };
    await expect(verifyBackingSignatures(payload, chain, failing)).rejects.toThrow("lookup failed");
  });
});

// ---------------------------------------------------------------------------
// Travel rule encryption
// ---------------------------------------------------------------------------
describe("Travel rule encryption", () => {
  const receiver = generateKeyPair();

  it("round-trips plaintext through ECIES", () => {
    const ciphertext = encryptTravelRuleInfo('{"name":"Alice"}', receiver.publicKey);
    expect(ciphertext).toMatch(/^[0-9a-f]+$/);
    expect(decryptTravelRuleInfo(ciphertext, receiver.privateKey)).toBe('{"name":"Alice"}');
  });

  it("cannot be decrypted with another key", () => {
    const ciphertext = encryptTravelRuleInfo("secret", receiver.publicKey);
    expect(() => decryptTravelRuleInfo(ciphertext, generateKeyPair().privateKey)).toThrow(UmaError);
  });

  it("rejects a malformed recipient key", () => {
    expect(() => encryptTravelRuleInfo("x", new Uint8Array([1, 2, 3]))).toThrow(UmaError);
  });
});
