/**
 * UMA Protocol: data the receiver attaches to a pay response.
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

/** Receiver-side compliance data, signed over the pay response's payload. */
export interface CompliancePayeeData {
  /** UTXOs of channels the receiver will likely receive over. */
  utxos: string[];
  nodePubKey?: string;
  /** Where the sender posts its UTXOs once the payment completes. */
  utxoCallback: string;
  signature: string;
  signatureNonce: string;
  signatureTimestamp: number;
  backingSignatures?: BackingSignature[];
}

const compliancePayeeDataSchema = z.object({
  utxos: z.array(z.string()).nullish(),
  nodePubKey: z.string().nullish(),
  utxoCallback: z.string().nullish(),
  signature: z.string(),
  signatureNonce: z.string(),
  signatureTimestamp: z.number().int(),
  backingSignatures: z.array(backingSignatureSchema).nullish(),
});

export function compliancePayeeDataToJson(compliance: CompliancePayeeData): Record<string, unknown> {
  return {
    utxos: compliance.utxos,
    nodePubKey: compliance.nodePubKey,
    utxoCallback: compliance.utxoCallback,
    signature: compliance.signature,
    signatureNonce: compliance.signatureNonce,
    signatureTimestamp: compliance.signatureTimestamp,
    backingSignatures: compliance.backingSignatures,
  };
}

export function compliancePayeeDataFromJson(value: unknown): CompliancePayeeData {
  const raw = parseWithSchema(
    compliancePayeeDataSchema,
    value,
    UmaErrorCode.PARSE_PAYREQ_RESPONSE_ERROR,
    "payee compliance data",
  );
  return {
    utxos: raw.utxos ?? [],
    nodePubKey: orUndefined(raw.nodePubKey),
    utxoCallback: raw.utxoCallback ?? "",
    signature: raw.signature,
    signatureNonce: raw.signatureNonce,
    signatureTimestamp: raw.signatureTimestamp,
    backingSignatures: orUndefined(raw.backingSignatures),
  };
}

export type PayeeData = CounterpartyData<CompliancePayeeData>;

export type UmaPayeeData = PayeeData & { identifier: string; compliance: CompliancePayeeData };

export function payeeDataToJson(data: PayeeData): Record<string, unknown> {
  return encodeCounterpartyData(data, compliancePayeeDataToJson);
}

export function payeeDataFromJson(value: unknown): PayeeData {
  return decodeCounterpartyData(
    value,
    compliancePayeeDataFromJson,
    UmaErrorCode.PARSE_PAYREQ_RESPONSE_ERROR,
    "payee data",
  );
}

export function isUmaPayeeData(data: PayeeData | undefined): data is UmaPayeeData {
  return data !== undefined && data.identifier !== undefined && data.compliance !== undefined;
}
