/**
 * UMA Protocol: the pay request the sender posts to the receiver's callback.
 *
 * V1 packs amount and sending currency into one string (`"100.USD"`) and
 * carries open payer data; V0 sends the receiving currency as a flat
 * `currency` key with a numeric amount. Decoders pick the layout by the
 * presence of `currency`.
 */

import { z } from "zod";
import { pipeJoinedPayload, signPayload } from "../crypto/signing.js";
import { UmaError, UmaErrorCode, missingUmaFieldsError } from "../types/errors.js";
import { Err, Ok, type Result } from "../types/result.js";
import { withBackingSignature } from "./backing-signature.js";
import { counterpartyDataOptionsSchema, type CounterpartyDataOptions } from "./counterparty-data.js";
import { orUndefined, parseJsonText, parseWithSchema } from "./json.js";
import {
  compliancePayerDataFromJson,
  compliancePayerDataToJson,
  isUmaPayerData,
  payerDataFromJson,
  payerDataToJson,
  type CompliancePayerData,
  type PayerData,
  type PayerDataV0,
  type UmaPayerData,
} from "./payer-data.js";
import { settlementInfoSchema, type SettlementInfo } from "./settlement.js";

export interface PayRequestV1 {
  layout: "v1";
  /**
   * Smallest unit of `sendingCurrencyCode`, or of the settlement asset
   * (millisatoshis on Lightning) when that is absent.
   */
  amount: number;
  sendingCurrencyCode?: string;
  /** Wire name: `convert`. */
  receivingCurrencyCode?: string;
  payerData?: PayerData;
  /** Wire name: `payeeData`. */
  requestedPayeeData?: CounterpartyDataOptions;
  comment?: string;
  invoiceUUID?: string;
  /** Wire name: `settlement`. */
  settlement?: SettlementInfo;
}

export interface PayRequestV0 {
  layout: "v0";
  /** Receiving currency. Wire name: `currency`. */
  currencyCode: string;
  amount: number;
  payerData: PayerDataV0;
}

export type PayRequest = PayRequestV0 | PayRequestV1;

export interface UmaPayRequestV1 extends PayRequestV1 {
  payerData: UmaPayerData;
}

/** A pay request carrying a payer identifier and signed compliance data. */
export type UmaPayRequest = PayRequestV0 | UmaPayRequestV1;

/** Parsed `amount` field. */
export interface AmountWithCurrency {
  amount: number;
  sendingCurrencyCode?: string;
}

export function formatAmountString(amount: number, sendingCurrencyCode?: string): string {
  return sendingCurrencyCode === undefined ? String(amount) : `${amount}.${sendingCurrencyCode}`;
}

/**
 * Split `"<amount>[.<code>]"` on the first dot.
 * @throws {UmaError} PARSE_PAYREQ_REQUEST_ERROR for a non-integer amount or an empty code.
 */
export function parseAmountString(raw: string): AmountWithCurrency {
  const dot = raw.indexOf(".");
  const amountPart = dot === -1 ? raw : raw.substring(0, dot);
  const code = dot === -1 ? undefined : raw.substring(dot + 1);
  if (!/^\d+$/.test(amountPart) || !Number.isSafeInteger(Number(amountPart))) {
    throw new UmaError(UmaErrorCode.PARSE_PAYREQ_REQUEST_ERROR, `Invalid amount: ${raw}`);
  }
  if (code === "") {
    throw new UmaError(UmaErrorCode.PARSE_PAYREQ_REQUEST_ERROR, `Invalid amount currency: ${raw}`);
  }
  return code === undefined ? { amount: Number(amountPart) } : { amount: Number(amountPart), sendingCurrencyCode: code };
}

export function receivingCurrencyCodeOf(request: PayRequest): string | undefined {
  return request.layout === "v0" ? request.currencyCode : request.receivingCurrencyCode;
}

export function sendingCurrencyCodeOf(request: PayRequest): string | undefined {
  return request.layout === "v0" ? undefined : request.sendingCurrencyCode;
}

export function isUmaPayRequest(request: PayRequest): request is UmaPayRequest {
  return request.layout === "v0" || isUmaPayerData(request.payerData);
}

/**
 * Narrow to the strict form.
 * @throws {UmaError} MISSING_REQUIRED_UMA_PARAMETERS naming every absent field.
 */
export function asUmaPayRequest(request: PayRequest): UmaPayRequest {
  if (isUmaPayRequest(request)) return request;
  const missing: string[] = [];
  if (request.payerData === undefined) {
    missing.push("payerData");
  } else {
    if (request.payerData.identifier === undefined) missing.push("payerData.identifier");
    if (request.payerData.compliance === undefined) missing.push("payerData.compliance");
  }
  throw missingUmaFieldsError("pay request", missing);
}

export function tryAsUmaPayRequest(request: PayRequest): Result<UmaPayRequest, UmaError> {
  try {
    return Ok(asUmaPayRequest(request));
  } catch (err) {
    if (err instanceof UmaError) return Err(err);
    throw err;
  }
}

export function toPayRequest(request: UmaPayRequest): PayRequest {
  return request;
}

function payerDataV0ToJson(data: PayerDataV0): Record<string, unknown> {
  return {
    identifier: data.identifier,
    name: data.name,
    email: data.email,
    compliance: compliancePayerDataToJson(data.compliance),
  };
}

const payerDataV0Schema = z.object({
  identifier: z.string(),
  name: z.string().nullish(),
  email: z.string().nullish(),
  compliance: z.unknown().refine((v) => v != null, { message: "Required" }),
});

function payerDataV0FromJson(value: unknown): PayerDataV0 {
  const raw = parseWithSchema(payerDataV0Schema, value, UmaErrorCode.PARSE_PAYREQ_REQUEST_ERROR, "payer data");
  return {
    identifier: raw.identifier,
    name: orUndefined(raw.name),
    email: orUndefined(raw.email),
    compliance: compliancePayerDataFromJson(raw.compliance),
  };
}

export function payRequestToJson(request: PayRequest): Record<string, unknown> {
  if (request.layout === "v0") {
    return {
      currency: request.currencyCode,
      amount: request.amount,
      payerData: payerDataV0ToJson(request.payerData),
    };
  }
  return {
    convert: request.receivingCurrencyCode,
    amount: formatAmountString(request.amount, request.sendingCurrencyCode),
    payerData: request.payerData === undefined ? undefined : payerDataToJson(request.payerData),
    payeeData: request.requestedPayeeData,
    comment: request.comment,
    invoiceUUID: request.invoiceUUID,
    settlement: request.settlement,
  };
}

export function payRequestToJsonString(request: PayRequest): string {
  return JSON.stringify(payRequestToJson(request));
}

const payRequestV0Schema = z.object({
  currency: z.string(),
  amount: z.number().int().nonnegative(),
  payerData: z.unknown(),
});

const payRequestV1Schema = z.object({
  convert: z.string().nullish(),
  amount: z.string(),
  payerData: z.unknown(),
  payeeData: counterpartyDataOptionsSchema.nullish(),
  comment: z.string().nullish(),
  invoiceUUID: z.string().nullish(),
  settlement: settlementInfoSchema.nullish(),
});

/** Decode from JSON text or an already-parsed body. */
export function parsePayRequest(input: unknown): PayRequest {
  const code = UmaErrorCode.PARSE_PAYREQ_REQUEST_ERROR;
  const value = typeof input === "string" ? parseJsonText(input, code, "pay request") : input;
  if (typeof value === "object" && value !== null && "currency" in value) {
    const raw = parseWithSchema(payRequestV0Schema, value, code, "pay request");
    return {
      layout: "v0",
      currencyCode: raw.currency,
      amount: raw.amount,
      payerData: payerDataV0FromJson(raw.payerData),
    };
  }
  const raw = parseWithSchema(payRequestV1Schema, value, code, "pay request");
  return {
    layout: "v1",
    ...parseAmountString(raw.amount),
    receivingCurrencyCode: orUndefined(raw.convert),
    payerData: raw.payerData == null ? undefined : payerDataFromJson(raw.payerData),
    requestedPayeeData: orUndefined(raw.payeeData),
    comment: orUndefined(raw.comment),
    invoiceUUID: orUndefined(raw.invoiceUUID),
    settlement: orUndefined(raw.settlement),
  };
}

/** GET form of a pay request: JSON-valued fields are JSON strings. */
export function payRequestToQueryParams(request: PayRequest): Record<string, string> {
  if (request.layout === "v0") {
    return {
      amount: String(request.amount),
      convert: request.currencyCode,
      payerData: JSON.stringify(payerDataV0ToJson(request.payerData)),
    };
  }
  const params: Record<string, string> = {
    amount: formatAmountString(request.amount, request.sendingCurrencyCode),
  };
  if (request.receivingCurrencyCode !== undefined) params.convert = request.receivingCurrencyCode;
  if (request.payerData !== undefined) params.payerData = JSON.stringify(payerDataToJson(request.payerData));
  if (request.requestedPayeeData !== undefined) params.payeeData = JSON.stringify(request.requestedPayeeData);
  if (request.comment !== undefined) params.comment = request.comment;
  if (request.invoiceUUID !== undefined) params.invoiceUUID = request.invoiceUUID;
  if (request.settlement !== undefined) params.settlement = JSON.stringify(request.settlement);
  return params;
}

/** Decode the GET form. Query parameters always decode to the V1 layout. */
export function payRequestFromQueryParams(params: URLSearchParams): PayRequest {
  const code = UmaErrorCode.PARSE_PAYREQ_REQUEST_ERROR;
  const amount = params.get("amount");
  if (amount === null) throw missingUmaFieldsError("pay request", ["amount"]);
  const payerData = params.get("payerData");
  const payeeData = params.get("payeeData");
  const settlement = params.get("settlement");
  return {
    layout: "v1",
    ...parseAmountString(amount),
    receivingCurrencyCode: params.get("convert") ?? undefined,
    payerData: payerData === null ? undefined : payerDataFromJson(parseJsonText(payerData, code, "payerData")),
    requestedPayeeData:
      payeeData === null
        ? undefined
        : parseWithSchema(counterpartyDataOptionsSchema, parseJsonText(payeeData, code, "payeeData"), code, "payeeData"),
    comment: params.get("comment") ?? undefined,
    invoiceUUID: params.get("invoiceUUID") ?? undefined,
    settlement:
      settlement === null
        ? undefined
        : parseWithSchema(settlementInfoSchema, parseJsonText(settlement, code, "settlement"), code, "settlement"),
  };
}

/**
 * `payerIdentifier|nonce|timestamp` from the compliance data. Lower-cased for
 * V1; V0 signs it as written.
 */
export function payRequestSignablePayload(request: UmaPayRequest): Uint8Array {
  const { identifier, compliance } = request.payerData;
  return pipeJoinedPayload([identifier, compliance.signatureNonce, compliance.signatureTimestamp], {
    lowercase: request.layout === "v1",
  });
}

function withCompliance(request: UmaPayRequest, compliance: CompliancePayerData): UmaPayRequest {
  if (request.layout === "v0") {
    return { ...request, payerData: { ...request.payerData, compliance } };
  }
  return { ...request, payerData: { ...request.payerData, compliance } };
}

/** New request whose compliance signature is set from `privateKey`. */
export function signPayRequest(request: UmaPayRequest, privateKey: Uint8Array): UmaPayRequest {
  const signature = signPayload(payRequestSignablePayload(request), privateKey);
  return withCompliance(request, { ...request.payerData.compliance, signature });
}

export function appendPayRequestBackingSignature(
  request: UmaPayRequest,
  privateKey: Uint8Array,
  domain: string,
): UmaPayRequest {
  const signature = signPayload(payRequestSignablePayload(request), privateKey);
  const compliance = request.payerData.compliance;
  return withCompliance(request, {
    ...compliance,
    backingSignatures: withBackingSignature(compliance.backingSignatures, { domain, signature }),
  });
}
