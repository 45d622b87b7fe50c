/**
 * UMA Protocol: tag-length-value records.
 *
 * Each record is `[tag: 1 byte][length: 1 byte][value]`, concatenated with
 * no padding or terminator. Numbers are unsigned big-endian in the smallest
 * of 1, 2, 4 or 8 bytes that holds them.
 */

import { utf8ToBytes } from "@noble/hashes/utils";
import { InvoiceDecodeError, UmaError, UmaErrorCode } from "../types/errors.js";

const MAX_VALUE_LENGTH = 0xff;
const NUMBER_WIDTHS = [1, 2, 4, 8] as const;

export interface TlvRecord {
  tag: number;
  value: Uint8Array;
}

function widthFor(value: number): number {
  if (value <= 0xff) return 1;
  if (value <= 0xffff) return 2;
  if (value <= 0xffffffff) return 4;
  return 8;
}

export function encodeNumber(value: number): Uint8Array {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new UmaError(UmaErrorCode.INVALID_INPUT, `TLV numbers must be non-negative integers, got ${value}`);
  }
  const width = widthFor(value);
  const bytes = new Uint8Array(width);
  const view = new DataView(bytes.buffer);
  switch (width) {
    case 1:
      view.setUint8(0, value);
      break;
    case 2:
      view.setUint16(0, value);
      break;
    case 4:
      view.setUint32(0, value);
      break;
    default:
      view.setBigUint64(0, BigInt(value));
  }
  return bytes;
}

/** Decode a number at whatever width the record was written with. */
export function decodeNumber(value: Uint8Array, field: string): number {
  const view = new DataView(value.buffer, value.byteOffset, value.byteLength);
  switch (value.length) {
    case 1:
      return view.getUint8(0);
    case 2:
      return view.getUint16(0);
    case 4:
      return view.getUint32(0);
    case 8: {
      const big = view.getBigUint64(0);
      if (big > BigInt(Number.MAX_SAFE_INTEGER)) {
        throw new InvoiceDecodeError("structure", `${field} does not fit a safe integer`);
      }
      return Number(big);
    }
    default:
      throw new InvoiceDecodeError(
        "structure",
        `${field} has width ${value.length}; expected one of ${NUMBER_WIDTHS.join(", ")}`,
      );
  }
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

export function decodeString(value: Uint8Array, field: string): string {
  try {
    return utf8.decode(value);
  } catch {
    throw new InvoiceDecodeError("structure", `${field} is not valid UTF-8`);
  }
}

export function decodeBoolean(value: Uint8Array, field: string): boolean {
  if (value.length !== 1) {
    throw new InvoiceDecodeError("structure", `${field} must be a single byte`);
  }
  return value[0] === 1;
}

/** Accumulates records; absent (undefined) values are skipped. */
export class TlvWriter {
  private readonly records: Uint8Array[] = [];

  putBytes(tag: number, value: Uint8Array | undefined): this {
    if (value === undefined) return this;
    if (value.length > MAX_VALUE_LENGTH) {
      throw new UmaError(
        UmaErrorCode.INVALID_INPUT,
        `TLV value for tag ${tag} is ${value.length} bytes; the limit is ${MAX_VALUE_LENGTH}`,
      );
    }
    const record = new Uint8Array(2 + value.length);
    record[0] = tag;
    record[1] = value.length;
    record.set(value, 2);
    this.records.push(record);
    return this;
  }

  putString(tag: number, value: string | undefined): this {
    return this.putBytes(tag, value === undefined ? undefined : utf8ToBytes(value));
  }

  putNumber(tag: number, value: number | undefined): this {
    return this.putBytes(tag, value === undefined ? undefined : encodeNumber(value));
  }

  putBoolean(tag: number, value: boolean | undefined): this {
    return this.putBytes(tag, value === undefined ? undefined : Uint8Array.of(value ? 1 : 0));
  }

  toBytes(): Uint8Array {
    const out = new Uint8Array(this.records.reduce((sum, r) => sum + r.length, 0));
    let offset = 0;
    for (const record of this.records) {
      out.set(record, offset);
      offset += record.length;
    }
    return out;
  }
}

/**
 * Split a byte string into records, in stream order.
 * @throws {InvoiceDecodeError} kind "structure" when a record runs past the end.
 */
export function readTlvRecords(bytes: Uint8Array): TlvRecord[] {
  const records: TlvRecord[] = [];
  let offset = 0;
  while (offset < bytes.length) {
    if (offset + 2 > bytes.length) {
      throw new InvoiceDecodeError("structure", `Truncated TLV header at offset ${offset}`);
    }
    const tag = bytes[offset];
    const length = bytes[offset + 1];
    const start = offset + 2;
    if (start + length > bytes.length) {
      throw new InvoiceDecodeError("structure", `TLV record ${tag} at offset ${offset} runs past the end`);
    }
    records.push({ tag, value: bytes.subarray(start, start + length) });
    offset = start + length;
  }
  return records;
}
