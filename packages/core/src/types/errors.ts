/**
 * UMA Protocol: error codes and typed error classes.
 *
 * Every failure surfaced by the core is a {@link UmaError} carrying a
 * machine-readable code, the HTTP status that code maps to, and structured
 * details, so a caller can render the protocol error body without parsing
 * the message.
 */

/** All UMA protocol error codes. */
export enum UmaErrorCode {
  // Counterparty keys
  COUNTERPARTY_PUBKEY_FETCH_ERROR = "COUNTERPARTY_PUBKEY_FETCH_ERROR",
  INVALID_PUBKEY_FORMAT = "INVALID_PUBKEY_FORMAT",
  CERT_CHAIN_INVALID = "CERT_CHAIN_INVALID",

  // Authentication
  INVALID_SIGNATURE = "INVALID_SIGNATURE",
  INVALID_TIMESTAMP = "INVALID_TIMESTAMP",
  INVALID_NONCE = "INVALID_NONCE",

  // Request parsing
  NON_UMA_LNURL_NOT_SUPPORTED = "NON_UMA_LNURL_NOT_SUPPORTED",
  MISSING_REQUIRED_UMA_PARAMETERS = "MISSING_REQUIRED_UMA_PARAMETERS",
  PARSE_LNURLP_REQUEST_ERROR = "PARSE_LNURLP_REQUEST_ERROR",
  PARSE_LNURLP_RESPONSE_ERROR = "PARSE_LNURLP_RESPONSE_ERROR",
  PARSE_PAYREQ_REQUEST_ERROR = "PARSE_PAYREQ_REQUEST_ERROR",
  PARSE_PAYREQ_RESPONSE_ERROR = "PARSE_PAYREQ_RESPONSE_ERROR",
  PARSE_UTXO_CALLBACK_ERROR = "PARSE_UTXO_CALLBACK_ERROR",

  // Versioning
  UNSUPPORTED_UMA_VERSION = "UNSUPPORTED_UMA_VERSION",
  NO_COMPATIBLE_UMA_VERSION = "NO_COMPATIBLE_UMA_VERSION",

  // Payment
  USER_NOT_FOUND = "USER_NOT_FOUND",
  AMOUNT_OUT_OF_RANGE = "AMOUNT_OUT_OF_RANGE",
  INVALID_CURRENCY = "INVALID_CURRENCY",
  MISSING_MANDATORY_PAYER_DATA = "MISSING_MANDATORY_PAYER_DATA",

  // Invoice
  INVALID_INVOICE = "INVALID_INVOICE",
  INVOICE_EXPIRED = "INVOICE_EXPIRED",

  // General
  INVALID_INPUT = "INVALID_INPUT",
  INVALID_REQUEST_FORMAT = "INVALID_REQUEST_FORMAT",
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

/** HTTP status code mapping for error codes. */
const ERROR_HTTP_STATUS: Record<UmaErrorCode, number> = {
  [UmaErrorCode.COUNTERPARTY_PUBKEY_FETCH_ERROR]: 424,
  [UmaErrorCode.INVALID_PUBKEY_FORMAT]: 400,
  [UmaErrorCode.CERT_CHAIN_INVALID]: 400,
  [UmaErrorCode.INVALID_SIGNATURE]: 401,
  [UmaErrorCode.INVALID_TIMESTAMP]: 400,
  [UmaErrorCode.INVALID_NONCE]: 400,
  [UmaErrorCode.NON_UMA_LNURL_NOT_SUPPORTED]: 403,
  [UmaErrorCode.MISSING_REQUIRED_UMA_PARAMETERS]: 400,
  [UmaErrorCode.PARSE_LNURLP_REQUEST_ERROR]: 400,
  [UmaErrorCode.PARSE_LNURLP_RESPONSE_ERROR]: 400,
  [UmaErrorCode.PARSE_PAYREQ_REQUEST_ERROR]: 400,
  [UmaErrorCode.PARSE_PAYREQ_RESPONSE_ERROR]: 400,
  [UmaErrorCode.PARSE_UTXO_CALLBACK_ERROR]: 400,
  [UmaErrorCode.UNSUPPORTED_UMA_VERSION]: 412,
  [UmaErrorCode.NO_COMPATIBLE_UMA_VERSION]: 424,
  [UmaErrorCode.USER_NOT_FOUND]: 404,
  [UmaErrorCode.AMOUNT_OUT_OF_RANGE]: 400,
  [UmaErrorCode.INVALID_CURRENCY]: 400,
  [UmaErrorCode.MISSING_MANDATORY_PAYER_DATA]: 400,
  [UmaErrorCode.INVALID_INVOICE]: 400,
  [UmaErrorCode.INVOICE_EXPIRED]: 400,
  [UmaErrorCode.INVALID_INPUT]: 400,
  [UmaErrorCode.INVALID_REQUEST_FORMAT]: 400,
  [UmaErrorCode.INTERNAL_ERROR]: 500,
};

/** Wire shape of every UMA error response body. */
export interface UmaErrorBody {
  status: "ERROR";
  reason: string;
  code: UmaErrorCode;
  [key: string]: unknown;
}

/** Typed error for UMA protocol operations. */
export class UmaError extends Error {
  /** Machine-readable error code. */
  public readonly code: UmaErrorCode;
  /** HTTP status code for API responses. */
  public readonly httpStatus: number;
  /** Additional error context. */
  public readonly details?: Record<string, unknown>;

  constructor(
    code: UmaErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "UmaError";
    this.code = code;
    this.httpStatus = ERROR_HTTP_STATUS[code];
    this.details = details;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** Extra top-level fields merged into the error body. */
  additionalParams(): Record<string, unknown> {
    return {};
  }

  /** The `{status, reason, code, ...}` body sent to the counterparty. */
  toJSON(): UmaErrorBody {
    return {
      status: "ERROR",
      reason: this.message,
      code: this.code,
      ...this.additionalParams(),
    };
  }
}

/**
 * Raised when the counterparty asks for a protocol version whose major this
 * implementation does not support.
 */
export class UnsupportedVersionError extends UmaError {
  public readonly unsupportedVersion: string;
  public readonly supportedMajorVersions: number[];

  constructor(unsupportedVersion: string, supportedMajorVersions: Iterable<number>) {
    const majors = [...supportedMajorVersions].sort((a, b) => a - b);
    super(
      UmaErrorCode.UNSUPPORTED_UMA_VERSION,
      `Unsupported version: ${unsupportedVersion}.`,
      { unsupportedVersion, supportedMajorVersions: majors },
    );
    this.name = "UnsupportedVersionError";
    this.unsupportedVersion = unsupportedVersion;
    this.supportedMajorVersions = majors;
  }

  override additionalParams(): Record<string, unknown> {
    return {
      supportedMajorVersions: this.supportedMajorVersions,
      unsupportedVersion: this.unsupportedVersion,
    };
  }
}

/** Why a nonce was refused by a {@link NonceCache}. */
export type InvalidNonceReason = "TIMESTAMP_TOO_OLD" | "NONCE_ALREADY_USED";

/** Replay violation: the nonce was seen before or its timestamp is below the floor. */
export class InvalidNonceError extends UmaError {
  public readonly reason: InvalidNonceReason;

  constructor(reason: InvalidNonceReason, nonce: string, timestamp: number) {
    super(
      reason === "TIMESTAMP_TOO_OLD" ? UmaErrorCode.INVALID_TIMESTAMP : UmaErrorCode.INVALID_NONCE,
      reason === "TIMESTAMP_TOO_OLD" ? "Timestamp too old" : "Nonce already used",
      { reason, nonce, timestamp },
    );
    this.name = "InvalidNonceError";
    this.reason = reason;
  }
}

/** The stage at which decoding a portable invoice failed. */
export type InvoiceDecodeErrorKind = "checksum" | "encoding" | "structure" | "missing-fields";

/** Failure to turn a bech32 token or TLV bytes back into an invoice. */
export class InvoiceDecodeError extends UmaError {
  public readonly kind: InvoiceDecodeErrorKind;
  public readonly missingFields: string[];

  constructor(kind: InvoiceDecodeErrorKind, message: string, missingFields: string[] = []) {
    super(UmaErrorCode.INVALID_INVOICE, message, { kind, missingFields });
    this.name = "InvoiceDecodeError";
    this.kind = kind;
    this.missingFields = missingFields;
  }
}

/** Build the MISSING_REQUIRED_UMA_PARAMETERS error listing every absent field. */
export function missingUmaFieldsError(entity: string, missingFields: string[]): UmaError {
  return new UmaError(
    UmaErrorCode.MISSING_REQUIRED_UMA_PARAMETERS,
    `Missing required UMA fields on ${entity}: ${missingFields.join(", ")}`,
    { missingFields },
  );
}
