import { bench, describe } from "vitest";
import {
  decryptTravelRuleInfo,
  encryptTravelRuleInfo,
  generateKeyPair,
  pipeJoinedPayload,
  signPayload,
  verifySignature,
} from "@umaproto/core";

// ---------------------------------------------------------------------------
// Key Generation
// ---------------------------------------------------------------------------
describe("Key Generation", () => {
  bench("secp256k1 key pair generation", () => {
    generateKeyPair();
  });
});

// ---------------------------------------------------------------------------
// Compliance Signatures
// ---------------------------------------------------------------------------
describe("Compliance Signatures", () => {
  const kp = generateKeyPair();
  const payload = pipeJoinedPayload(["$alice@vasp1.example", "12345678901234567890", 1700000000], {
    lowercase: true,
  });
  const signature = signPayload(payload, kp.privateKey);

  bench("Sign payload", () => {
    signPayload(payload, kp.privateKey);
  });

  bench("Verify payload", () => {
    verifySignature(payload, signature, kp.publicKey);
  });

  bench("Sign + Verify roundtrip", () => {
    verifySignature(payload, signPayload(payload, kp.privateKey), kp.publicKey);
  });
});

// ---------------------------------------------------------------------------
// Travel Rule Encryption
// ---------------------------------------------------------------------------
describe("Travel Rule Encryption", () => {
  const kp = generateKeyPair();
  const info = JSON.stringify({ originator: { name: "Alice", account: "acct-1" } });
  const ciphertext = encryptTravelRuleInfo(info, kp.publicKey);

  bench("Encrypt travel rule info", () => {
    encryptTravelRuleInfo(info, kp.publicKey);
  });

  bench("Decrypt travel rule info", () => {
    decryptTravelRuleInfo(ciphertext, kp.privateKey);
  });
});
