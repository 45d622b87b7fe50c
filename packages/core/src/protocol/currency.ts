/**
 * UMA Protocol: currencies a receiver accepts.
 *
 * The two layouts differ only in how send limits are carried: V0 has flat
 * `minSendable`/`maxSendable`, V1 nests them under `convertible`. The
 * presence of `minSendable` selects the V0 decoder.
 */

import { z } from "zod";
import type { UmaErrorCode } from "../types/errors.js";
import { parseWithSchema } from "./json.js";

interface CurrencyFields {
  /** ISO-style code, e.g. "USD". */
  code: string;
  name: string;
  symbol: string;
  /** Estimated millisatoshis per smallest unit (e.g. per cent). Wire name: `multiplier`. */
  millisatoshiPerUnit: number;
  /** Digits after the decimal point for display; 2 for USD, 8 for BTC. */
  decimals: number;
}

export interface CurrencyConvertible {
  /** Smallest unit of the currency. */
  min: number;
  max: number;
}

export interface CurrencyV1 extends CurrencyFields {
  layout: "v1";
  convertible: CurrencyConvertible;
}

export interface CurrencyV0 extends CurrencyFields {
  layout: "v0";
  minSendable: number;
  maxSendable: number;
}

export type Currency = CurrencyV0 | CurrencyV1;

const baseShape = {
  code: z.string(),
  name: z.string(),
  symbol: z.string(),
  multiplier: z.number(),
  decimals: z.number().int(),
};

const currencyV0Schema = z.object({
  ...baseShape,
  minSendable: z.number().int(),
  maxSendable: z.number().int(),
});

const currencyV1Schema = z.object({
  ...baseShape,
  convertible: z.object({ min: z.number().int(), max: z.number().int() }),
});

export function currencyToJson(currency: Currency): Record<string, unknown> {
  const base = {
    code: currency.code,
    name: currency.name,
    symbol: currency.symbol,
    multiplier: currency.millisatoshiPerUnit,
  };
  if (currency.layout === "v0") {
    return {
      ...base,
      minSendable: currency.minSendable,
      maxSendable: currency.maxSendable,
      decimals: currency.decimals,
    };
  }
  return {
    ...base,
    convertible: { min: currency.convertible.min, max: currency.convertible.max },
    decimals: currency.decimals,
  };
}

export function currencyFromJson(value: unknown, code: UmaErrorCode): Currency {
  const isV0 = typeof value === "object" && value !== null && "minSendable" in value;
  if (isV0) {
    const raw = parseWithSchema(currencyV0Schema, value, code, "currency");
    return {
      layout: "v0",
      code: raw.code,
      name: raw.name,
      symbol: raw.symbol,
      millisatoshiPerUnit: raw.multiplier,
      minSendable: raw.minSendable,
      maxSendable: raw.maxSendable,
      decimals: raw.decimals,
    };
  }
  const raw = parseWithSchema(currencyV1Schema, value, code, "currency");
  return {
    layout: "v1",
    code: raw.code,
    name: raw.name,
    symbol: raw.symbol,
    millisatoshiPerUnit: raw.multiplier,
    convertible: raw.convertible,
    decimals: raw.decimals,
  };
}

/** Re-lay a currency out for the peer's major version. */
export function currencyForMajorVersion(currency: Currency, major: number): Currency {
  const { code, name, symbol, millisatoshiPerUnit, decimals } = currency;
  if (major >= 1) {
    if (currency.layout === "v1") return currency;
    return {
      layout: "v1",
      code,
      name,
      symbol,
      millisatoshiPerUnit,
      decimals,
      convertible: { min: currency.minSendable, max: currency.maxSendable },
    };
  }
  if (currency.layout === "v0") return currency;
  return {
    layout: "v0",
    code,
    name,
    symbol,
    millisatoshiPerUnit,
    decimals,
    minSendable: currency.convertible.min,
    maxSendable: currency.convertible.max,
  };
}
