/**
 * UMA Protocol: the receiver's answer to a Lnurlp request.
 */

import { z } from "zod";
import { pipeJoinedPayload, signPayload } from "../crypto/signing.js";
import { UmaError, UmaErrorCode, missingUmaFieldsError } from "../types/errors.js";
import { Err, Ok, type Result } from "../types/result.js";
import { backingSignatureSchema, withBackingSignature, type BackingSignature } from "./backing-signature.js";
import { counterpartyDataOptionsSchema, type CounterpartyDataOptions } from "./counterparty-data.js";
import { currencyFromJson, currencyToJson, type Currency } from "./currency.js";
import { orUndefined, parseJsonText, parseWithSchema } from "./json.js";
import { parseKycStatus, type KycStatus } from "./kyc-status.js";

/** The `compliance` object of a Lnurlp response. */
export interface LnurlComplianceResponse {
  kycStatus: KycStatus;
  isSubjectToTravelRule: boolean;
  receiverIdentifier: string;
  signature: string;
  signatureNonce: string;
  signatureTimestamp: number;
}

export interface LnurlpResponse {
  /** URL for the pay request. */
  callback: string;
  /** Millisatoshis. */
  minSendable: number;
  maxSendable: number;
  /** LUD-06 metadata, hashed into the invoice. */
  metadata: string;
  currencies?: Currency[];
  /** Wire name: `payerData`. */
  requiredPayerData?: CounterpartyDataOptions;
  compliance?: LnurlComplianceResponse;
  umaVersion?: string;
  /** Wire name: `commentAllowed`. */
  commentCharsAllowed?: number;
  nostrPubkey?: string;
  allowsNostr?: boolean;
  backingSignatures?: BackingSignature[];
}

export interface UmaLnurlpResponse extends LnurlpResponse {
  currencies: Currency[];
  requiredPayerData: CounterpartyDataOptions;
  compliance: LnurlComplianceResponse;
  umaVersion: string;
}

const complianceSchema = z.object({
  kycStatus: z.string(),
  isSubjectToTravelRule: z.boolean(),
  receiverIdentifier: z.string(),
  signature: z.string(),
  signatureNonce: z.string(),
  signatureTimestamp: z.number().int(),
});

const lnurlpResponseSchema = z.object({
  callback: z.string(),
  minSendable: z.number().int(),
  maxSendable: z.number().int(),
  metadata: z.string(),
  currencies: z.array(z.unknown()).nullish(),
  payerData: counterpartyDataOptionsSchema.nullish(),
  compliance: complianceSchema.nullish(),
  umaVersion: z.string().nullish(),
  commentAllowed: z.number().int().nullish(),
  nostrPubkey: z.string().nullish(),
  allowsNostr: z.boolean().nullish(),
  backingSignatures: z.array(backingSignatureSchema).nullish(),
});

export function isUmaLnurlpResponse(response: LnurlpResponse): response is UmaLnurlpResponse {
  return (
    response.currencies !== undefined &&
    response.requiredPayerData !== undefined &&
    response.compliance !== undefined &&
    response.umaVersion !== undefined
  );
}

/**
 * Narrow to the strict form.
 * @throws {UmaError} MISSING_REQUIRED_UMA_PARAMETERS naming every absent field.
 */
export function asUmaLnurlpResponse(response: LnurlpResponse): UmaLnurlpResponse {
  if (isUmaLnurlpResponse(response)) return response;
  const missing: string[] = [];
  if (response.currencies === undefined) missing.push("currencies");
  if (response.requiredPayerData === undefined) missing.push("payerData");
  if (response.compliance === undefined) missing.push("compliance");
  if (response.umaVersion === undefined) missing.push("umaVersion");
  throw missingUmaFieldsError("lnurlp response", missing);
}

export function tryAsUmaLnurlpResponse(response: LnurlpResponse): Result<UmaLnurlpResponse, UmaError> {
  try {
    return Ok(asUmaLnurlpResponse(response));
  } catch (err) {
    if (err instanceof UmaError) return Err(err);
    throw err;
  }
}

export function toLnurlpResponse(response: UmaLnurlpResponse): LnurlpResponse {
  return { ...response };
}

export function lnurlpResponseToJson(response: LnurlpResponse): Record<string, unknown> {
  return {
    callback: response.callback,
    minSendable: response.minSendable,
    maxSendable: response.maxSendable,
    metadata: response.metadata,
    currencies: response.currencies?.map(currencyToJson),
    payerData: response.requiredPayerData,
    compliance: response.compliance,
    umaVersion: response.umaVersion,
    commentAllowed: response.commentCharsAllowed,
    nostrPubkey: response.nostrPubkey,
    allowsNostr: response.allowsNostr,
    tag: "payRequest",
    backingSignatures: response.backingSignatures,
  };
}

/** Decode from JSON text or an already-parsed body. */
export function parseLnurlpResponse(input: unknown): LnurlpResponse {
  const code = UmaErrorCode.PARSE_LNURLP_RESPONSE_ERROR;
  const value = typeof input === "string" ? parseJsonText(input, code, "lnurlp response") : input;
  const raw = parseWithSchema(lnurlpResponseSchema, value, code, "lnurlp response");
  return {
    callback: raw.callback,
    minSendable: raw.minSendable,
    maxSendable: raw.maxSendable,
    metadata: raw.metadata,
    currencies: raw.currencies?.map((c) => currencyFromJson(c, code)),
    requiredPayerData: orUndefined(raw.payerData),
    compliance:
      raw.compliance == null ? undefined : { ...raw.compliance, kycStatus: parseKycStatus(raw.compliance.kycStatus) },
    umaVersion: orUndefined(raw.umaVersion),
    commentCharsAllowed: orUndefined(raw.commentAllowed),
    nostrPubkey: orUndefined(raw.nostrPubkey),
    allowsNostr: orUndefined(raw.allowsNostr),
    backingSignatures: orUndefined(raw.backingSignatures),
  };
}

/** `receiverIdentifier|nonce|timestamp`, lower-cased. */
export function lnurlComplianceSignablePayload(
  compliance: Pick<LnurlComplianceResponse, "receiverIdentifier" | "signatureNonce" | "signatureTimestamp">,
): Uint8Array {
  return pipeJoinedPayload(
    [compliance.receiverIdentifier, compliance.signatureNonce, compliance.signatureTimestamp],
    { lowercase: true },
  );
}

/** New compliance object with `signature` set from `privateKey`. */
export function signLnurlComplianceResponse(
  compliance: LnurlComplianceResponse,
  privateKey: Uint8Array,
): LnurlComplianceResponse {
  return { ...compliance, signature: signPayload(lnurlComplianceSignablePayload(compliance), privateKey) };
}

export function appendLnurlpResponseBackingSignature(
  response: UmaLnurlpResponse,
  privateKey: Uint8Array,
  domain: string,
): UmaLnurlpResponse {
  const signature = signPayload(lnurlComplianceSignablePayload(response.compliance), privateKey);
  return {
    ...response,
    backingSignatures: withBackingSignature(response.backingSignatures, { domain, signature }),
  };
}
