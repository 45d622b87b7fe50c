/**
 * UMA Protocol: secp256k1 key pairs and hex helpers.
 */

import { secp256k1 } from "@noble/curves/secp256k1";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { UmaError, UmaErrorCode } from "../types/errors.js";

/** A raw secp256k1 key pair. Public keys are 65-byte uncompressed points. */
export interface KeyPair {
  publicKey: Uint8Array;
  privateKey: Uint8Array;
}

/**
 * Generate a secp256k1 key pair. Used by tests and tooling; the protocol
 * itself never creates or stores long-term keys.
 */
export function generateKeyPair(): KeyPair {
  const privateKey = secp256k1.utils.randomPrivateKey();
  const publicKey = secp256k1.getPublicKey(privateKey, false);
  return { publicKey, privateKey };
}

/** Uncompressed public key for a private key. */
export function publicKeyFromPrivateKey(privateKey: Uint8Array): Uint8Array {
  try {
    return secp256k1.getPublicKey(privateKey, false);
  } catch (err) {
    throw new UmaError(UmaErrorCode.INVALID_INPUT, "Invalid secp256k1 private key", undefined, {
      cause: err,
    });
  }
}

export function toHex(bytes: Uint8Array): string {
  return bytesToHex(bytes);
}

/** Decode a hex string, rejecting odd lengths and non-hex characters. */
export function fromHex(hex: string): Uint8Array {
  try {
    return hexToBytes(hex);
  } catch (err) {
    throw new UmaError(UmaErrorCode.INVALID_INPUT, "Invalid hex string", undefined, { cause: err });
  }
}
