/**
 * UMA Protocol: UTXO callback exchanged between VASPs after a payment.
 */

import { z } from "zod";
import { pipeJoinedPayload, signPayload } from "../crypto/signing.js";
import { UmaError, UmaErrorCode, missingUmaFieldsError } from "../types/errors.js";
import { Err, Ok, type Result } from "../types/result.js";
import { backingSignatureSchema, withBackingSignature, type BackingSignature } from "./backing-signature.js";
import { orUndefined, parseJsonText, parseWithSchema } from "./json.js";

export interface UtxoWithAmount {
  utxo: string;
  amountMsats: number;
}

export type TransactionStatus = "COMPLETED" | "FAILED";

export interface PostTransactionCallback {
  utxos: UtxoWithAmount[];
  /** Sender of the callback; its keys verify the signature. */
  vaspDomain?: string;
  signature?: string;
  signatureNonce?: string;
  signatureTimestamp?: number;
  /** Not covered by the signature. */
  transactionStatus?: TransactionStatus;
  backingSignatures?: BackingSignature[];
}

export interface UmaPostTransactionCallback extends PostTransactionCallback {
  vaspDomain: string;
  signature: string;
  signatureNonce: string;
  signatureTimestamp: number;
}

const callbackSchema = z.object({
  utxos: z.array(z.object({ utxo: z.string(), amountMsats: z.number().int() })),
  vaspDomain: z.string().nullish(),
  signature: z.string().nullish(),
  signatureNonce: z.string().nullish(),
  signatureTimestamp: z.number().int().nullish(),
  transactionStatus: z.enum(["COMPLETED", "FAILED"]).nullish(),
  backingSignatures: z.array(backingSignatureSchema).nullish(),
});

export function isUmaPostTransactionCallback(
  callback: PostTransactionCallback,
): callback is UmaPostTransactionCallback {
  return (
    callback.vaspDomain !== undefined &&
    callback.signature !== undefined &&
    callback.signatureNonce !== undefined &&
    callback.signatureTimestamp !== undefined
  );
}

/**
 * Narrow to the strict form.
 * @throws {UmaError} MISSING_REQUIRED_UMA_PARAMETERS naming every absent field.
 */
export function asUmaPostTransactionCallback(callback: PostTransactionCallback): UmaPostTransactionCallback {
  if (isUmaPostTransactionCallback(callback)) return callback;
  const missing = (["vaspDomain", "signature", "signatureNonce", "signatureTimestamp"] as const).filter(
    (key) => callback[key] === undefined,
  );
  throw missingUmaFieldsError("post-transaction callback", [...missing]);
}

export function tryAsUmaPostTransactionCallback(
  callback: PostTransactionCallback,
): Result<UmaPostTransactionCallback, UmaError> {
  try {
    return Ok(asUmaPostTransactionCallback(callback));
  } catch (err) {
    if (err instanceof UmaError) return Err(err);
    throw err;
  }
}

export function toPostTransactionCallback(callback: UmaPostTransactionCallback): PostTransactionCallback {
  return { ...callback };
}

export function postTransactionCallbackToJson(callback: PostTransactionCallback): Record<string, unknown> {
  return {
    utxos: callback.utxos,
    vaspDomain: callback.vaspDomain,
    signature: callback.signature,
    signatureNonce: callback.signatureNonce,
    signatureTimestamp: callback.signatureTimestamp,
    transactionStatus: callback.transactionStatus,
    backingSignatures: callback.backingSignatures,
  };
}

export function parsePostTransactionCallback(input: unknown): PostTransactionCallback {
  const code = UmaErrorCode.PARSE_UTXO_CALLBACK_ERROR;
  const value = typeof input === "string" ? parseJsonText(input, code, "post-transaction callback") : input;
  const raw = parseWithSchema(callbackSchema, value, code, "post-transaction callback");
  return {
    utxos: raw.utxos,
    vaspDomain: orUndefined(raw.vaspDomain),
    signature: orUndefined(raw.signature),
    signatureNonce: orUndefined(raw.signatureNonce),
    signatureTimestamp: orUndefined(raw.signatureTimestamp),
    transactionStatus: orUndefined(raw.transactionStatus),
    backingSignatures: orUndefined(raw.backingSignatures),
  };
}

/** `nonce|timestamp`. */
export function postTransactionCallbackSignablePayload(
  callback: Pick<UmaPostTransactionCallback, "signatureNonce" | "signatureTimestamp">,
): Uint8Array {
  return pipeJoinedPayload([callback.signatureNonce, callback.signatureTimestamp]);
}

export function signPostTransactionCallback(
  callback: UmaPostTransactionCallback,
  privateKey: Uint8Array,
): UmaPostTransactionCallback {
  return { ...callback, signature: signPayload(postTransactionCallbackSignablePayload(callback), privateKey) };
}

export function appendPostTransactionCallbackBackingSignature(
  callback: UmaPostTransactionCallback,
  privateKey: Uint8Array,
  domain: string,
): UmaPostTransactionCallback {
  const signature = signPayload(postTransactionCallbackSignablePayload(callback), privateKey);
  return {
    ...callback,
    backingSignatures: withBackingSignature(callback.backingSignatures, { domain, signature }),
  };
}
