/**
 * UMA Protocol: ECDSA signing and verification over canonical payloads.
 *
 * Signatures are secp256k1 ECDSA over SHA-256(payload), DER-encoded and
 * transported as lowercase hex.
 */

import { secp256k1 } from "@noble/curves/secp256k1";
import { sha256 } from "@noble/hashes/sha256";
import { hexToBytes, utf8ToBytes } from "@noble/hashes/utils";
import { UmaError, UmaErrorCode } from "../types/errors.js";
import type { BackingSignature } from "../protocol/backing-signature.js";

/**
 * Sign a canonical payload.
 * @returns the DER signature as hex.
 * @throws {UmaError} INVALID_INPUT if the private key is not a valid scalar.
 */
export function signPayload(payload: Uint8Array, privateKey: Uint8Array): string {
  try {
    return secp256k1.sign(sha256(payload), privateKey).toDERHex();
  } catch (err) {
    throw new UmaError(UmaErrorCode.INVALID_INPUT, "Unable to sign payload with the given private key", undefined, {
      cause: err,
    });
  }
}

/**
 * Verify a hex DER signature. Malformed signatures and keys verify as false.
 */
export function verifySignature(
  payload: Uint8Array,
  signature: string,
  publicKey: Uint8Array,
): boolean {
  try {
    return secp256k1.verify(hexToBytes(signature), sha256(payload), publicKey);
  } catch {
    return false;
  }
}

/** UTF-8 bytes of `parts` joined with "|", optionally lower-cased first. */
export function pipeJoinedPayload(
  parts: ReadonlyArray<string | number>,
  options: { lowercase?: boolean } = {},
): Uint8Array {
  const joined = parts.join("|");
  return utf8ToBytes(options.lowercase ? joined.toLowerCase() : joined);
}

/** Resolves a backing VASP's signing key from its domain. */
export type SigningKeyResolver = (domain: string) => Promise<Uint8Array>;

/**
 * Verify every backing signature against the same canonical payload as the
 * primary signature. One failure fails the chain; key lookup errors propagate.
 */
export async function verifyBackingSignatures(
  payload: Uint8Array,
  backingSignatures: readonly BackingSignature[] | undefined,
  resolveSigningKey: SigningKeyResolver,
): Promise<boolean> {
  for (const backing of backingSignatures ?? []) {
    const publicKey = await resolveSigningKey(backing.domain);
    if (!verifySignature(payload, backing.signature, publicKey)) {
      return false;
    }
  }
  return true;
}
