/**
 * UMA Protocol: zod-backed decoding of wire JSON.
 */

import { z } from "zod";
import { UmaError, UmaErrorCode, missingUmaFieldsError } from "../types/errors.js";

/** Parse JSON text, reporting syntax errors under `code`. */
export function parseJsonText(text: string, code: UmaErrorCode, entity: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new UmaError(code, `Invalid JSON for ${entity}`, undefined, { cause: err });
  }
}

/**
 * Validate `value` against `schema`. When every issue is an absent field the
 * failure is MISSING_REQUIRED_UMA_PARAMETERS naming those fields; any other
 * issue is reported under `code`.
 */
export function parseWithSchema<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  code: UmaErrorCode,
  entity: string,
): z.output<S> {
  const result = schema.safeParse(value);
  if (result.success) return result.data;

  const issues = result.error.issues;
  const missing = issues
    .filter((issue) => issue.code === "invalid_type" && issue.received === "undefined")
    .map((issue) => issue.path.join("."));
  if (missing.length > 0 && missing.length === issues.length) {
    throw missingUmaFieldsError(entity, missing);
  }
  const summary = issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
  throw new UmaError(code, `Invalid ${entity}: ${summary}`, { issues: summary });
}

/** `null` on the wire means absent. */
export function orUndefined<T>(value: T | null | undefined): T | undefined {
  return value ?? undefined;
}
