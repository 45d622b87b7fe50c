/**
 * UMA Protocol: portable invoices.
 *
 * An invoice is TLV-encoded and carried as a bech32 string with the `uma`
 * prefix. The signature (tag 100) covers the TLV of every other field.
 */

import { bech32 } from "bech32";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { signPayload, verifySignature } from "../crypto/signing.js";
import {
  decodeCounterpartyDataOptions,
  encodeCounterpartyDataOptions,
  type CounterpartyDataOptions,
} from "../protocol/counterparty-data.js";
import { parseKycStatus, type KycStatus } from "../protocol/kyc-status.js";
import { InvoiceDecodeError } from "../types/errors.js";
import { decodeBoolean, decodeNumber, decodeString, readTlvRecords, TlvWriter } from "./tlv.js";

export const UMA_BECH32_PREFIX = "uma";

const BECH32_LENGTH_LIMIT = Number.MAX_SAFE_INTEGER;

export interface InvoiceCurrency {
  readonly code: string;
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
}

export interface Invoice {
  /** `$user@domain` of the receiver. */
  readonly receiverUma: string;
  readonly invoiceUUID: string;
  /** Smallest unit of `receivingCurrency`. */
  readonly amount: number;
  readonly receivingCurrency: InvoiceCurrency;
  /** Unix seconds. */
  readonly expiration: number;
  readonly isSubjectToTravelRule: boolean;
  readonly requiredPayerData?: CounterpartyDataOptions;
  readonly umaVersion: string;
  readonly commentCharsAllowed?: number;
  readonly senderUma?: string;
  /** Maximum number of payments against this invoice. */
  readonly invoiceLimit?: number;
  readonly kycStatus?: KycStatus;
  /** Where the payer sends the pay request. */
  readonly callback: string;
  /** DER signature bytes. */
  readonly signature?: Uint8Array;
}

const Tag = {
  RECEIVER_UMA: 0,
  INVOICE_UUID: 1,
  AMOUNT: 2,
  RECEIVING_CURRENCY: 3,
  EXPIRATION: 4,
  IS_SUBJECT_TO_TRAVEL_RULE: 5,
  REQUIRED_PAYER_DATA: 6,
  UMA_VERSION: 7,
  COMMENT_CHARS_ALLOWED: 8,
  SENDER_UMA: 9,
  INVOICE_LIMIT: 10,
  KYC_STATUS: 11,
  CALLBACK: 12,
  SIGNATURE: 100,
} as const;

const CurrencyTag = { CODE: 0, NAME: 1, SYMBOL: 2, DECIMALS: 3 } as const;

const REQUIRED_FIELDS = [
  "receiverUma",
  "invoiceUUID",
  "amount",
  "receivingCurrency",
  "expiration",
  "isSubjectToTravelRule",
  "umaVersion",
  "callback",
] as const;

type InvoiceFields = { -readonly [K in keyof Invoice]: Invoice[K] };

/** Collects fields in any order and validates presence once, in {@link build}. */
export class InvoiceBuilder {
  private readonly fields: Partial<InvoiceFields> = {};

  set<K extends keyof InvoiceFields>(key: K, value: InvoiceFields[K]): this {
    this.fields[key] = value;
    return this;
  }

  /** @throws {InvoiceDecodeError} kind "missing-fields" naming every absent required field. */
  build(): Invoice {
    const f = this.fields;
    const {
      receiverUma,
      invoiceUUID,
      amount,
      receivingCurrency,
      expiration,
      isSubjectToTravelRule,
      umaVersion,
      callback,
    } = f;
    if (
      receiverUma === undefined ||
      invoiceUUID === undefined ||
      amount === undefined ||
      receivingCurrency === undefined ||
      expiration === undefined ||
      isSubjectToTravelRule === undefined ||
      umaVersion === undefined ||
      callback === undefined
    ) {
      const missing = REQUIRED_FIELDS.filter((name) => f[name] === undefined);
      throw new InvoiceDecodeError("missing-fields", `Malformed invoice, missing: ${missing.join(", ")}`, [
        ...missing,
      ]);
    }
    return {
      receiverUma,
      invoiceUUID,
      amount,
      receivingCurrency,
      expiration,
      isSubjectToTravelRule,
      requiredPayerData: f.requiredPayerData,
      umaVersion,
      commentCharsAllowed: f.commentCharsAllowed,
      senderUma: f.senderUma,
      invoiceLimit: f.invoiceLimit,
      kycStatus: f.kycStatus,
      callback,
      signature: f.signature,
    };
  }
}

function currencyToTlv(currency: InvoiceCurrency): Uint8Array {
  return new TlvWriter()
    .putString(CurrencyTag.CODE, currency.code)
    .putString(CurrencyTag.NAME, currency.name)
    .putString(CurrencyTag.SYMBOL, currency.symbol)
    .putNumber(CurrencyTag.DECIMALS, currency.decimals)
    .toBytes();
}

function currencyFromTlv(bytes: Uint8Array): InvoiceCurrency {
  let code: string | undefined;
  let name: string | undefined;
  let symbol: string | undefined;
  let decimals: number | undefined;
  for (const { tag, value } of readTlvRecords(bytes)) {
    switch (tag) {
      case CurrencyTag.CODE:
        code = decodeString(value, "receivingCurrency.code");
        break;
      case CurrencyTag.NAME:
        name = decodeString(value, "receivingCurrency.name");
        break;
      case CurrencyTag.SYMBOL:
        symbol = decodeString(value, "receivingCurrency.symbol");
        break;
      case CurrencyTag.DECIMALS:
        decimals = decodeNumber(value, "receivingCurrency.decimals");
        break;
    }
  }
  if (code === undefined || name === undefined || symbol === undefined || decimals === undefined) {
    const missing = Object.entries({ code, name, symbol, decimals })
      .filter(([, v]) => v === undefined)
      .map(([k]) => `receivingCurrency.${k}`);
    throw new InvoiceDecodeError("missing-fields", `Malformed invoice currency, missing: ${missing.join(", ")}`, missing);
  }
  return { code, name, symbol, decimals };
}

function writeUnsignedFields(invoice: Invoice): TlvWriter {
  return new TlvWriter()
    .putString(Tag.RECEIVER_UMA, invoice.receiverUma)
    .putString(Tag.INVOICE_UUID, invoice.invoiceUUID)
    .putNumber(Tag.AMOUNT, invoice.amount)
    .putBytes(Tag.RECEIVING_CURRENCY, currencyToTlv(invoice.receivingCurrency))
    .putNumber(Tag.EXPIRATION, invoice.expiration)
    .putBoolean(Tag.IS_SUBJECT_TO_TRAVEL_RULE, invoice.isSubjectToTravelRule)
    .putString(
      Tag.REQUIRED_PAYER_DATA,
      invoice.requiredPayerData === undefined ? undefined : encodeCounterpartyDataOptions(invoice.requiredPayerData),
    )
    .putString(Tag.UMA_VERSION, invoice.umaVersion)
    .putNumber(Tag.COMMENT_CHARS_ALLOWED, invoice.commentCharsAllowed)
    .putString(Tag.SENDER_UMA, invoice.senderUma)
    .putNumber(Tag.INVOICE_LIMIT, invoice.invoiceLimit)
    .putString(Tag.KYC_STATUS, invoice.kycStatus)
    .putString(Tag.CALLBACK, invoice.callback);
}

export function invoiceToTlv(invoice: Invoice): Uint8Array {
  return writeUnsignedFields(invoice).putBytes(Tag.SIGNATURE, invoice.signature).toBytes();
}

/**
 * Decode TLV bytes. Records may come in any order; unknown tags are skipped.
 * @throws {InvoiceDecodeError} kind "structure" or "missing-fields".
 */
export function invoiceFromTlv(bytes: Uint8Array): Invoice {
  const builder = new InvoiceBuilder();
  for (const { tag, value } of readTlvRecords(bytes)) {
    switch (tag) {
      case Tag.RECEIVER_UMA:
        builder.set("receiverUma", decodeString(value, "receiverUma"));
        break;
      case Tag.INVOICE_UUID:
        builder.set("invoiceUUID", decodeString(value, "invoiceUUID"));
        break;
      case Tag.AMOUNT:
        builder.set("amount", decodeNumber(value, "amount"));
        break;
      case Tag.RECEIVING_CURRENCY:
        builder.set("receivingCurrency", currencyFromTlv(value));
        break;
      case Tag.EXPIRATION:
        builder.set("expiration", decodeNumber(value, "expiration"));
        break;
      case Tag.IS_SUBJECT_TO_TRAVEL_RULE:
        builder.set("isSubjectToTravelRule", decodeBoolean(value, "isSubjectToTravelRule"));
        break;
      case Tag.REQUIRED_PAYER_DATA:
        builder.set("requiredPayerData", decodeCounterpartyDataOptions(decodeString(value, "requiredPayerData")));
        break;
      case Tag.UMA_VERSION:
        builder.set("umaVersion", decodeString(value, "umaVersion"));
        break;
      case Tag.COMMENT_CHARS_ALLOWED:
        builder.set("commentCharsAllowed", decodeNumber(value, "commentCharsAllowed"));
        break;
      case Tag.SENDER_UMA:
        builder.set("senderUma", decodeString(value, "senderUma"));
        break;
      case Tag.INVOICE_LIMIT:
        builder.set("invoiceLimit", decodeNumber(value, "invoiceLimit"));
        break;
      case Tag.KYC_STATUS:
        builder.set("kycStatus", parseKycStatus(decodeString(value, "kycStatus")));
        break;
      case Tag.CALLBACK:
        builder.set("callback", decodeString(value, "callback"));
        break;
      case Tag.SIGNATURE:
        builder.set("signature", value.slice());
        break;
    }
  }
  return builder.build();
}

/** Portable text form: bech32 with the `uma` prefix. */
export function invoiceToBech32(invoice: Invoice): string {
  return bech32.encode(UMA_BECH32_PREFIX, bech32.toWords(invoiceToTlv(invoice)), BECH32_LENGTH_LIMIT);
}

/**
 * Decode the portable text form.
 * @throws {InvoiceDecodeError} kind "checksum" on a transcription error,
 *   "encoding" for a string that is not bech32 with the `uma` prefix, and
 *   "structure" or "missing-fields" for bad TLV content.
 */
export function invoiceFromBech32(token: string): Invoice {
  let prefix: string;
  let words: number[];
  try {
    ({ prefix, words } = bech32.decode(token, BECH32_LENGTH_LIMIT));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    // A character outside the bech32 alphabet in the data part of an `uma1` token is a typo too.
    const mistyped =
      message.startsWith("Invalid checksum") ||
      (message.startsWith("Unknown character") && token.toLowerCase().startsWith(`${UMA_BECH32_PREFIX}1`));
    throw new InvoiceDecodeError(mistyped ? "checksum" : "encoding", `Invalid invoice token: ${message}`);
  }
  if (prefix !== UMA_BECH32_PREFIX) {
    throw new InvoiceDecodeError("encoding", `Invalid invoice prefix: ${prefix}`);
  }
  let bytes: Uint8Array;
  try {
    bytes = Uint8Array.from(bech32.fromWords(words));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new InvoiceDecodeError("encoding", `Invalid invoice token padding: ${message}`);
  }
  return invoiceFromTlv(bytes);
}

/** New invoice whose signature covers every other field. */
export function signInvoice(invoice: Invoice, privateKey: Uint8Array): Invoice {
  const signature = signPayload(writeUnsignedFields(invoice).toBytes(), privateKey);
  return { ...invoice, signature: hexToBytes(signature) };
}

/** False when unsigned or when the signature does not match `publicKey`. */
export function verifyInvoiceSignature(invoice: Invoice, publicKey: Uint8Array): boolean {
  if (invoice.signature === undefined) return false;
  return verifySignature(writeUnsignedFields(invoice).toBytes(), bytesToHex(invoice.signature), publicKey);
}
