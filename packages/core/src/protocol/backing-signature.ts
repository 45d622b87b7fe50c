/**
 * UMA Protocol: backing signatures.
 *
 * A backing signature is an attestation by another VASP over the same
 * canonical payload as the message's primary signature. The verifier fetches
 * the backing VASP's keys from `domain`.
 */

import { z } from "zod";
import { UmaError, UmaErrorCode } from "../types/errors.js";

export interface BackingSignature {
  /** Domain of the VASP that produced the signature. */
  domain: string;
  /** Hex DER signature over the message's signable payload. */
  signature: string;
}

export const backingSignatureSchema = z.object({
  domain: z.string(),
  signature: z.string(),
});

/** Copy of `existing` with one more signature at the end. */
export function withBackingSignature(
  existing: readonly BackingSignature[] | undefined,
  added: BackingSignature,
): BackingSignature[] {
  return [...(existing ?? []), added];
}

/**
 * Query-string form: comma-joined, URL-component-encoded `domain:signature`
 * pairs.
 */
export function encodeBackingSignaturesParam(signatures: readonly BackingSignature[]): string {
  return signatures.map((s) => encodeURIComponent(`${s.domain}:${s.signature}`)).join(",");
}

/**
 * Inverse of {@link encodeBackingSignaturesParam}. Pairs split on the last
 * colon, so a domain with a port survives.
 */
export function decodeBackingSignaturesParam(serialized: string): BackingSignature[] {
  return serialized.split(",").map((pair) => {
    let decoded: string;
    try {
      decoded = decodeURIComponent(pair);
    } catch (err) {
      throw new UmaError(UmaErrorCode.PARSE_LNURLP_REQUEST_ERROR, "Invalid backing signature encoding", undefined, {
        cause: err,
      });
    }
    const lastColon = decoded.lastIndexOf(":");
    if (lastColon === -1) {
      throw new UmaError(UmaErrorCode.PARSE_LNURLP_REQUEST_ERROR, "Invalid backing signature format");
    }
    return {
      domain: decoded.substring(0, lastColon),
      signature: decoded.substring(lastColon + 1),
    };
  });
}
