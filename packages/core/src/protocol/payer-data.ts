/**
 * UMA Protocol: data the sender attaches to a pay request.
 */

import { z } from "zod";
import { UmaErrorCode } from "../types/errors.js";
import { backingSignatureSchema, type BackingSignature } from "./backing-signature.js";
import {
  decodeCounterpartyData,
  encodeCounterpartyData,
  type CounterpartyData,
} from "./counterparty-data.js";
import { orUndefined, parseWithSchema } from "./json.js";
import { parseKycStatus, type KycStatus } from "./kyc-status.js";

/** Standardized travel-rule payload format. Wire form: "type@version" or "type". */
export interface TravelRuleFormat {
  /** e.g. "IVMS". */
  type: string;
  version?: string;
}

export function encodeTravelRuleFormat(format: TravelRuleFormat): string {
  return format.version === undefined ? format.type : `${format.type}@${format.version}`;
}

export function decodeTravelRuleFormat(raw: string): TravelRuleFormat {
  const at = raw.indexOf("@");
  if (at === -1) return { type: raw };
  return { type: raw.substring(0, at), version: raw.substring(at + 1) };
}

/** Sender-side compliance data, signed over the pay request's payload. */
export interface CompliancePayerData {
  /** UTXOs of the sender's channels that may fund the payment. */
  utxos: string[];
  nodePubKey?: string;
  kycStatus: KycStatus;
  /** Hex ECIES ciphertext for the receiver's encryption key. */
  encryptedTravelRuleInfo?: string;
  travelRuleFormat?: TravelRuleFormat;
  /** Where the receiver posts its UTXOs once the payment completes. */
  utxoCallback: string;
  signature: string;
  signatureNonce: string;
  /** Unix seconds. */
  signatureTimestamp: number;
  backingSignatures?: BackingSignature[];
}

const compliancePayerDataSchema = z.object({
  utxos: z.array(z.string()).nullish(),
  nodePubKey: z.string().nullish(),
  kycStatus: z.string(),
  encryptedTravelRuleInfo: z.string().nullish(),
  travelRuleFormat: z.string().nullish(),
  utxoCallback: z.string().nullish(),
  signature: z.string(),
  signatureNonce: z.string(),
  signatureTimestamp: z.number().int(),
  backingSignatures: z.array(backingSignatureSchema).nullish(),
});

export function compliancePayerDataToJson(compliance: CompliancePayerData): Record<string, unknown> {
  return {
    utxos: compliance.utxos,
    nodePubKey: compliance.nodePubKey,
    kycStatus: compliance.kycStatus,
    encryptedTravelRuleInfo: compliance.encryptedTravelRuleInfo,
    travelRuleFormat:
      compliance.travelRuleFormat === undefined ? undefined : encodeTravelRuleFormat(compliance.travelRuleFormat),
    utxoCallback: compliance.utxoCallback,
    signature: compliance.signature,
    signatureNonce: compliance.signatureNonce,
    signatureTimestamp: compliance.signatureTimestamp,
    backingSignatures: compliance.backingSignatures,
  };
}

/** Missing `utxos` and `utxoCallback` default to empty; some senders omit them. */
export function compliancePayerDataFromJson(value: unknown): CompliancePayerData {
  const raw = parseWithSchema(
    compliancePayerDataSchema,
    value,
    UmaErrorCode.PARSE_PAYREQ_REQUEST_ERROR,
    "payer compliance data",
  );
  return {
    utxos: raw.utxos ?? [],
    nodePubKey: orUndefined(raw.nodePubKey),
    kycStatus: parseKycStatus(raw.kycStatus),
    encryptedTravelRuleInfo: orUndefined(raw.encryptedTravelRuleInfo),
    travelRuleFormat: raw.travelRuleFormat == null ? undefined : decodeTravelRuleFormat(raw.travelRuleFormat),
    utxoCallback: raw.utxoCallback ?? "",
    signature: raw.signature,
    signatureNonce: raw.signatureNonce,
    signatureTimestamp: raw.signatureTimestamp,
    backingSignatures: orUndefined(raw.backingSignatures),
  };
}

/** V1 payer data: an open map with typed `identifier` and `compliance`. */
export type PayerData = CounterpartyData<CompliancePayerData>;

/** Payer data whose UMA fields are present. */
export type UmaPayerData = PayerData & { identifier: string; compliance: CompliancePayerData };

/** V0 payer data: a fixed struct. */
export interface PayerDataV0 {
  identifier: string;
  name?: string;
  email?: string;
  compliance: CompliancePayerData;
}

export function payerDataToJson(data: PayerData): Record<string, unknown> {
  return encodeCounterpartyData(data, compliancePayerDataToJson);
}

export function payerDataFromJson(value: unknown): PayerData {
  return decodeCounterpartyData(
    value,
    compliancePayerDataFromJson,
    UmaErrorCode.PARSE_PAYREQ_REQUEST_ERROR,
    "payer data",
  );
}

export function isUmaPayerData(data: PayerData | undefined): data is UmaPayerData {
  return data !== undefined && data.identifier !== undefined && data.compliance !== undefined;
}
