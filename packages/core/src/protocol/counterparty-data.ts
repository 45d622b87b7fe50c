/**
 * UMA Protocol: payer/payee data maps and the options that request them.
 *
 * On the wire, payer and payee data are open JSON objects. The model keeps
 * the reserved keys as typed fields and every other key in `extra`, so a
 * decode followed by an encode loses nothing.
 */

import { z } from "zod";
import { UmaError, type UmaErrorCode } from "../types/errors.js";

export const CounterpartyDataKeys = {
  IDENTIFIER: "identifier",
  NAME: "name",
  EMAIL: "email",
  COMPLIANCE: "compliance",
} as const;

export interface CounterpartyDataOption {
  mandatory: boolean;
}

/** Fields one side asks the other to send, keyed by field name. */
export type CounterpartyDataOptions = Record<string, CounterpartyDataOption>;

export const counterpartyDataOptionsSchema = z.record(z.object({ mandatory: z.boolean() }));

export function createCounterpartyDataOptions(fields: Record<string, boolean>): CounterpartyDataOptions {
  const options: CounterpartyDataOptions = {};
  for (const [key, mandatory] of Object.entries(fields)) {
    options[key] = { mandatory };
  }
  return options;
}

/** Compact invoice form: `key:1` or `key:0`, sorted by key, comma-joined. */
export function encodeCounterpartyDataOptions(options: CounterpartyDataOptions): string {
  return Object.keys(options)
    .sort()
    .map((key) => `${key}:${options[key].mandatory ? 1 : 0}`)
    .join(",");
}

/** Inverse of {@link encodeCounterpartyDataOptions}; entries without exactly one colon are skipped. */
export function decodeCounterpartyDataOptions(encoded: string): CounterpartyDataOptions {
  const options: CounterpartyDataOptions = {};
  for (const entry of encoded.split(",")) {
    const parts = entry.split(":");
    if (parts.length === 2 && parts[0] !== "") {
      options[parts[0]] = { mandatory: parts[1] === "1" };
    }
  }
  return options;
}

/** Payer or payee data with typed reserved keys. */
export interface CounterpartyData<C> {
  identifier?: string;
  name?: string;
  email?: string;
  compliance?: C;
  /** Every non-reserved key, carried through unchanged. */
  extra?: Record<string, unknown>;
}

const RESERVED_KEYS = new Set<string>(Object.values(CounterpartyDataKeys));

export function encodeCounterpartyData<C>(
  data: CounterpartyData<C>,
  encodeCompliance: (compliance: C) => Record<string, unknown>,
): Record<string, unknown> {
  const out: Record<string, unknown> = { ...data.extra };
  if (data.identifier !== undefined) out.identifier = data.identifier;
  if (data.name !== undefined) out.name = data.name;
  if (data.email !== undefined) out.email = data.email;
  if (data.compliance !== undefined) out.compliance = encodeCompliance(data.compliance);
  return out;
}

const reservedStringsSchema = z.object({
  identifier: z.string().nullish(),
  name: z.string().nullish(),
  email: z.string().nullish(),
});

export function decodeCounterpartyData<C>(
  value: unknown,
  decodeCompliance: (raw: unknown) => C,
  code: UmaErrorCode,
  entity: string,
): CounterpartyData<C> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new UmaError(code, `${entity} must be a JSON object`);
  }
  const reserved = reservedStringsSchema.safeParse(value);
  if (!reserved.success) {
    throw new UmaError(code, `Invalid ${entity}: identifier, name and email must be strings`);
  }

  const data: CounterpartyData<C> = {};
  if (reserved.data.identifier != null) data.identifier = reserved.data.identifier;
  if (reserved.data.name != null) data.name = reserved.data.name;
  if (reserved.data.email != null) data.email = reserved.data.email;

  const extra: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (key === CounterpartyDataKeys.COMPLIANCE) {
      if (entry != null) data.compliance = decodeCompliance(entry);
    } else if (!RESERVED_KEYS.has(key)) {
      extra[key] = entry;
    }
  }
  if (Object.keys(extra).length > 0) data.extra = extra;
  return data;
}
