/**
 * UMA Protocol: the Lnurlp request, the first message of a payment.
 *
 * The sending VASP fetches
 * `{scheme}://{domain}/.well-known/lnurlp/{user}?vaspDomain=&nonce=&...`.
 * A plain LNURL client sends the same URL without the UMA parameters, so the
 * decoded {@link LnurlpRequest} has every UMA field optional;
 * {@link asUmaLnurlpRequest} narrows it.
 */

import { pipeJoinedPayload, signPayload } from "../crypto/signing.js";
import { UmaError, UmaErrorCode, UnsupportedVersionError, missingUmaFieldsError } from "../types/errors.js";
import { Err, Ok, type Result } from "../types/result.js";
import { schemeForDomain } from "../utils/urls.js";
import { DEFAULT_VERSION_CONFIG, isVersionSupported, supportedMajorVersions, type VersionConfig } from "../version.js";
import {
  decodeBackingSignaturesParam,
  encodeBackingSignaturesParam,
  withBackingSignature,
  type BackingSignature,
} from "./backing-signature.js";

export interface LnurlpRequest {
  /** `user@domain[:port]` of the receiver. */
  receiverAddress: string;
  nonce?: string;
  /** Hex DER signature over `receiverAddress|nonce|timestamp`. */
  signature?: string;
  isSubjectToTravelRule?: boolean;
  /** Sender's domain; its keys are fetched from here. */
  vaspDomain?: string;
  /** Unix seconds. */
  timestamp?: number;
  /** Version the sender prefers. */
  umaVersion?: string;
  backingSignatures?: BackingSignature[];
}

export interface UmaLnurlpRequest {
  receiverAddress: string;
  nonce: string;
  signature: string;
  isSubjectToTravelRule: boolean;
  vaspDomain: string;
  timestamp: number;
  umaVersion: string;
  backingSignatures?: BackingSignature[];
}

const USERNAME = /^[A-Za-z0-9._$+-]+$/;

/**
 * Narrow to the strict form.
 * @throws {UmaError} MISSING_REQUIRED_UMA_PARAMETERS naming every absent field.
 */
export function asUmaLnurlpRequest(request: LnurlpRequest): UmaLnurlpRequest {
  const { nonce, signature, vaspDomain, timestamp, umaVersion } = request;
  if (
    nonce === undefined ||
    signature === undefined ||
    vaspDomain === undefined ||
    timestamp === undefined ||
    umaVersion === undefined
  ) {
    const missing = Object.entries({ nonce, signature, vaspDomain, timestamp, umaVersion })
      .filter(([, v]) => v === undefined)
      .map(([k]) => k);
    throw missingUmaFieldsError("lnurlp request", missing);
  }
  return {
    receiverAddress: request.receiverAddress,
    nonce,
    signature,
    isSubjectToTravelRule: request.isSubjectToTravelRule ?? false,
    vaspDomain,
    timestamp,
    umaVersion,
    backingSignatures: request.backingSignatures,
  };
}

export function tryAsUmaLnurlpRequest(request: LnurlpRequest): Result<UmaLnurlpRequest, UmaError> {
  try {
    return Ok(asUmaLnurlpRequest(request));
  } catch (err) {
    if (err instanceof UmaError) return Err(err);
    throw err;
  }
}

export function toLnurlpRequest(request: UmaLnurlpRequest): LnurlpRequest {
  return { ...request };
}

/**
 * Encode as the GET URL sent to the receiving VASP.
 * @throws {UmaError} INVALID_INPUT if the receiver address is not `user@domain`.
 */
export function encodeLnurlpRequestUrl(request: LnurlpRequest): string {
  const parts = request.receiverAddress.split("@");
  if (parts.length !== 2 || parts[0] === "" || parts[1] === "") {
    throw new UmaError(UmaErrorCode.INVALID_INPUT, `Invalid receiverAddress: ${request.receiverAddress}`);
  }
  const [user, domain] = parts;
  // The domain is part of the signed address, so it goes out exactly as written.
  const base = `${schemeForDomain(domain)}://${domain}/.well-known/lnurlp/${user}`;
  const params = new URLSearchParams();
  if (request.vaspDomain !== undefined) params.set("vaspDomain", request.vaspDomain);
  if (request.nonce !== undefined) params.set("nonce", request.nonce);
  if (request.signature !== undefined) params.set("signature", request.signature);
  if (request.umaVersion !== undefined) params.set("umaVersion", request.umaVersion);
  if (request.timestamp !== undefined) params.set("timestamp", String(request.timestamp));
  if (request.isSubjectToTravelRule !== undefined) {
    params.set("isSubjectToTravelRule", String(request.isSubjectToTravelRule));
  }
  if (request.backingSignatures !== undefined) {
    params.set("backingSignatures", encodeBackingSignaturesParam(request.backingSignatures));
  }
  const query = params.toString();
  return query === "" ? base : `${base}?${query}`;
}

const AUTHORITY = /^[A-Za-z][A-Za-z0-9+.-]*:\/\/([^/?#]*)/;
const DIGITS = /^\d+$/;

function parseError(message: string): UmaError {
  return new UmaError(UmaErrorCode.PARSE_LNURLP_REQUEST_ERROR, message);
}

/**
 * Decode a Lnurlp request URL.
 * @throws {UmaError} PARSE_LNURLP_REQUEST_ERROR for a malformed URL.
 * @throws {UnsupportedVersionError} if `umaVersion` is present but unsupported.
 */
export function decodeLnurlpRequestUrl(
  rawUrl: string,
  versions: VersionConfig = DEFAULT_VERSION_CONFIG,
): LnurlpRequest {
  let url: URL;
  try {
    url = new URL(rawUrl);
  } catch {
    throw parseError(`Invalid URL: ${rawUrl}`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw parseError(`Invalid URL schema: ${rawUrl}`);
  }
  const segments = url.pathname.split("/");
  if (segments.length !== 4 || segments[1] !== ".well-known" || segments[2] !== "lnurlp") {
    throw parseError(`Invalid uma request path: ${rawUrl}`);
  }
  const username = segments[3];
  if (!USERNAME.test(username)) {
    throw parseError("Invalid username. Only alphanumeric characters and ._$+- are allowed.");
  }
  // `URL` lower-cases the host; the signature covers the host as the sender wrote it.
  const authority = AUTHORITY.exec(rawUrl)?.[1] ?? url.host;
  const host = authority.slice(authority.lastIndexOf("@") + 1);

  const params = url.searchParams;
  const timestampParam = params.get("timestamp");
  let timestamp: number | undefined;
  if (timestampParam !== null) {
    timestamp = DIGITS.test(timestampParam) ? Number(timestampParam) : NaN;
    if (!Number.isSafeInteger(timestamp)) throw parseError(`Invalid timestamp: ${timestampParam}`);
  }
  const travelRuleParam = params.get("isSubjectToTravelRule");
  const backingParam = params.get("backingSignatures");
  const umaVersion = params.get("umaVersion") ?? undefined;

  if (umaVersion !== undefined && !isVersionSupported(umaVersion, versions)) {
    throw new UnsupportedVersionError(umaVersion, supportedMajorVersions(versions));
  }

  return {
    receiverAddress: `${username}@${host}`,
    vaspDomain: params.get("vaspDomain") ?? undefined,
    nonce: params.get("nonce") ?? undefined,
    signature: params.get("signature") ?? undefined,
    isSubjectToTravelRule: travelRuleParam === null ? undefined : travelRuleParam.toLowerCase() === "true",
    timestamp,
    umaVersion,
    backingSignatures: backingParam === null ? undefined : decodeBackingSignaturesParam(backingParam),
  };
}

/** `receiverAddress|nonce|timestamp`, not lower-cased. */
export function lnurlpRequestSignablePayload(
  request: Pick<UmaLnurlpRequest, "receiverAddress" | "nonce" | "timestamp">,
): Uint8Array {
  return pipeJoinedPayload([request.receiverAddress, request.nonce, request.timestamp]);
}

/** New request with `signature` set from `privateKey`. */
export function signLnurlpRequest(request: UmaLnurlpRequest, privateKey: Uint8Array): UmaLnurlpRequest {
  return { ...request, signature: signPayload(lnurlpRequestSignablePayload(request), privateKey) };
}

export function appendLnurlpRequestBackingSignature(
  request: UmaLnurlpRequest,
  privateKey: Uint8Array,
  domain: string,
): UmaLnurlpRequest {
  const signature = signPayload(lnurlpRequestSignablePayload(request), privateKey);
  return {
    ...request,
    backingSignatures: withBackingSignature(request.backingSignatures, { domain, signature }),
  };
}
