/**
 * UMA Protocol: the receiver's response to a pay request, carrying the
 * encoded Lightning invoice.
 *
 * V0 responses carry a top-level `compliance` object and `paymentInfo`;
 * V1 responses carry `converted` and signed payee data. A top-level
 * `compliance` key selects the V0 decoder.
 */

import { z } from "zod";
import { pipeJoinedPayload, signPayload } from "../crypto/signing.js";
import { UmaError, UmaErrorCode, missingUmaFieldsError } from "../types/errors.js";
import { Err, Ok, type Result } from "../types/result.js";
import { withBackingSignature } from "./backing-signature.js";
import { orUndefined, parseJsonText, parseWithSchema } from "./json.js";
import { isUmaPayeeData, payeeDataFromJson, payeeDataToJson, type PayeeData, type UmaPayeeData } from "./payee-data.js";

export interface RouteHop {
  pubkey: string;
  channel: string;
  fee: number;
  msatoshi: number;
}

export interface Route {
  pubkey: string;
  path: RouteHop[];
}

/**
 * Final currency terms of the payment. The invoice amount is
 * `amount * multiplier + fee` millisatoshis.
 */
export interface PaymentInfo {
  /** Smallest unit of `currencyCode` the receiver gets. */
  amount?: number;
  currencyCode: string;
  decimals: number;
  /** Millisatoshis per smallest unit of `currencyCode`. */
  multiplier: number;
  /** Receiver's fee in millisatoshis. */
  fee: number;
}

/** V0 receiver compliance; unsigned. */
export interface PayReqResponseComplianceV0 {
  utxos: string[];
  nodePubKey?: string;
  utxoCallback: string;
}

export interface PayReqResponseV1 {
  layout: "v1";
  /** BOLT-11 invoice. Wire name: `pr`. */
  encodedInvoice: string;
  converted?: PaymentInfo;
  payeeData?: PayeeData;
  routes: Route[];
  /** LUD-11; UMA receivers send false. */
  disposable?: boolean;
  /** LUD-09. */
  successAction?: Record<string, string>;
}

export interface PayReqResponseV0 {
  layout: "v0";
  encodedInvoice: string;
  compliance: PayReqResponseComplianceV0;
  paymentInfo: PaymentInfo;
  routes: Route[];
}

export type PayReqResponse = PayReqResponseV0 | PayReqResponseV1;

export interface UmaPayReqResponseV1 extends PayReqResponseV1 {
  converted: PaymentInfo;
  payeeData: UmaPayeeData;
}

export type UmaPayReqResponse = PayReqResponseV0 | UmaPayReqResponseV1;

const routeSchema = z.object({
  pubkey: z.string(),
  path: z.array(
    z.object({
      pubkey: z.string(),
      channel: z.string(),
      fee: z.number().int(),
      msatoshi: z.number().int(),
    }),
  ),
});

const paymentInfoShape = {
  amount: z.number().int().nullish(),
  currencyCode: z.string(),
  decimals: z.number().int(),
  multiplier: z.number(),
};

const convertedSchema = z.object({ ...paymentInfoShape, fee: z.number().int() });

/** V0 senders may still use the legacy `exchangeFeesMillisatoshi` name. */
const legacyPaymentInfoSchema = z
  .object({
    ...paymentInfoShape,
    fee: z.number().int().optional(),
    exchangeFeesMillisatoshi: z.number().int().optional(),
  })
  .transform(({ exchangeFeesMillisatoshi, fee, ...rest }, ctx) => {
    const resolved = fee ?? exchangeFeesMillisatoshi;
    if (resolved === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "fee is required", path: ["fee"] });
      return z.NEVER;
    }
    return { ...rest, fee: resolved };
  });

const payReqResponseV1Schema = z.object({
  pr: z.string(),
  converted: convertedSchema.nullish(),
  payeeData: z.unknown(),
  routes: z.array(routeSchema).nullish(),
  disposable: z.boolean().nullish(),
  successAction: z.record(z.string()).nullish(),
});

const payReqResponseV0Schema = z.object({
  pr: z.string(),
  compliance: z.object({
    utxos: z.array(z.string()).nullish(),
    nodePubKey: z.string().nullish(),
    utxoCallback: z.string().nullish(),
  }),
  paymentInfo: legacyPaymentInfoSchema,
  routes: z.array(routeSchema).nullish(),
});

function paymentInfoFromRaw(raw: {
  amount?: number | null;
  currencyCode: string;
  decimals: number;
  multiplier: number;
  fee: number;
}): PaymentInfo {
  return {
    amount: orUndefined(raw.amount),
    currencyCode: raw.currencyCode,
    decimals: raw.decimals,
    multiplier: raw.multiplier,
    fee: raw.fee,
  };
}

export function isUmaPayReqResponse(response: PayReqResponse): response is UmaPayReqResponse {
  return response.layout === "v0" || (response.converted !== undefined && isUmaPayeeData(response.payeeData));
}

/**
 * Narrow to the strict form.
 * @throws {UmaError} MISSING_REQUIRED_UMA_PARAMETERS naming every absent field.
 */
export function asUmaPayReqResponse(response: PayReqResponse): UmaPayReqResponse {
  if (isUmaPayReqResponse(response)) return response;
  const missing: string[] = [];
  if (response.converted === undefined) missing.push("converted");
  if (response.payeeData === undefined) {
    missing.push("payeeData");
  } else {
    if (response.payeeData.identifier === undefined) missing.push("payeeData.identifier");
    if (response.payeeData.compliance === undefined) missing.push("payeeData.compliance");
  }
  throw missingUmaFieldsError("pay response", missing);
}

export function tryAsUmaPayReqResponse(response: PayReqResponse): Result<UmaPayReqResponse, UmaError> {
  try {
    return Ok(asUmaPayReqResponse(response));
  } catch (err) {
    if (err instanceof UmaError) return Err(err);
    throw err;
  }
}

export function toPayReqResponse(response: UmaPayReqResponse): PayReqResponse {
  return response;
}

export function payReqResponseToJson(response: PayReqResponse): Record<string, unknown> {
  if (response.layout === "v0") {
    const { currencyCode, decimals, multiplier, fee } = response.paymentInfo;
    return {
      pr: response.encodedInvoice,
      compliance: response.compliance,
      paymentInfo: { currencyCode, decimals, multiplier, fee },
      routes: response.routes,
    };
  }
  return {
    pr: response.encodedInvoice,
    converted: response.converted,
    payeeData: response.payeeData === undefined ? undefined : payeeDataToJson(response.payeeData),
    routes: response.routes,
    disposable: response.disposable,
    successAction: response.successAction,
  };
}

export function payReqResponseToJsonString(response: PayReqResponse): string {
  return JSON.stringify(payReqResponseToJson(response));
}

/** Decode from JSON text or an already-parsed body. */
export function parsePayReqResponse(input: unknown): PayReqResponse {
  const code = UmaErrorCode.PARSE_PAYREQ_RESPONSE_ERROR;
  const value = typeof input === "string" ? parseJsonText(input, code, "pay response") : input;
  if (typeof value === "object" && value !== null && "compliance" in value) {
    const raw = parseWithSchema(payReqResponseV0Schema, value, code, "pay response");
    return {
      layout: "v0",
      encodedInvoice: raw.pr,
      compliance: {
        utxos: raw.compliance.utxos ?? [],
        nodePubKey: orUndefined(raw.compliance.nodePubKey),
        utxoCallback: raw.compliance.utxoCallback ?? "",
      },
      paymentInfo: paymentInfoFromRaw(raw.paymentInfo),
      routes: raw.routes ?? [],
    };
  }
  const raw = parseWithSchema(payReqResponseV1Schema, value, code, "pay response");
  return {
    layout: "v1",
    encodedInvoice: raw.pr,
    converted: raw.converted == null ? undefined : paymentInfoFromRaw(raw.converted),
    payeeData: raw.payeeData == null ? undefined : payeeDataFromJson(raw.payeeData),
    routes: raw.routes ?? [],
    disposable: orUndefined(raw.disposable),
    successAction: orUndefined(raw.successAction),
  };
}

/** `payerIdentifier|payeeIdentifier|nonce|timestamp`, lower-cased. */
export function payReqResponseSignablePayload(response: UmaPayReqResponseV1, payerIdentifier: string): Uint8Array {
  const { identifier, compliance } = response.payeeData;
  return pipeJoinedPayload([payerIdentifier, identifier, compliance.signatureNonce, compliance.signatureTimestamp], {
    lowercase: true,
  });
}

/** New response whose payee compliance signature is set from `privateKey`. */
export function signPayReqResponse(
  response: UmaPayReqResponseV1,
  payerIdentifier: string,
  privateKey: Uint8Array,
): UmaPayReqResponseV1 {
  const signature = signPayload(payReqResponseSignablePayload(response, payerIdentifier), privateKey);
  return {
    ...response,
    payeeData: { ...response.payeeData, compliance: { ...response.payeeData.compliance, signature } },
  };
}

export function appendPayReqResponseBackingSignature(
  response: UmaPayReqResponseV1,
  payerIdentifier: string,
  privateKey: Uint8Array,
  domain: string,
): UmaPayReqResponseV1 {
  const signature = signPayload(payReqResponseSignablePayload(response, payerIdentifier), privateKey);
  const compliance = response.payeeData.compliance;
  return {
    ...response,
    payeeData: {
      ...response.payeeData,
      compliance: {
        ...compliance,
        backingSignatures: withBackingSignature(compliance.backingSignatures, { domain, signature }),
      },
    },
  };
}
