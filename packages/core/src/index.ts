/**
 * UMA Protocol: core message layer.
 *
 * Public API surface for @umaproto/core.
 */

// Errors and results
export {
  UmaError,
  UmaErrorCode,
  UnsupportedVersionError,
  InvalidNonceError,
  InvoiceDecodeError,
  missingUmaFieldsError,
  type UmaErrorBody,
  type InvalidNonceReason,
  type InvoiceDecodeErrorKind,
} from "./types/errors.js";
export { Ok, Err, type Result } from "./types/result.js";

// Versions
export {
  MAJOR_VERSION,
  MINOR_VERSION,
  UMA_VERSION_STRING,
  BACK_COMPAT_VERSIONS,
  DEFAULT_VERSION_CONFIG,
  parseVersion,
  parseVersionOrThrow,
  versionToString,
  compareVersions,
  supportedMajorVersions,
  isVersionSupported,
  assertVersionSupported,
  selectHighestSupportedVersion,
  selectResponseVersion,
  majorVersionOf,
  usesV1Layout,
  type Version,
  type VersionConfig,
} from "./version.js";

// Caches
export { InMemoryNonceCache, type NonceCache } from "./nonce-cache.js";
export {
  PubKeyResponse,
  InMemoryPublicKeyCache,
  unixNow,
  type PubKeyResponseJson,
  type PublicKeyCache,
  type InMemoryPublicKeyCacheOptions,
} from "./pubkey-cache.js";

// Crypto
export { generateKeyPair, publicKeyFromPrivateKey, toHex, fromHex, type KeyPair } from "./crypto/keys.js";
export {
  signPayload,
  verifySignature,
  verifyBackingSignatures,
  pipeJoinedPayload,
  type SigningKeyResolver,
} from "./crypto/signing.js";
export { encryptTravelRuleInfo, decryptTravelRuleInfo } from "./crypto/encryption.js";
export { nodeCertificateKeyExtractor, type CertificateKeyExtractor } from "./crypto/certificates.js";

// Protocol messages
export * from "./protocol/backing-signature.js";
export * from "./protocol/counterparty-data.js";
export * from "./protocol/currency.js";
export * from "./protocol/kyc-status.js";
export * from "./protocol/settlement.js";
export * from "./protocol/payer-data.js";
export * from "./protocol/payee-data.js";
export * from "./protocol/lnurlp-request.js";
export * from "./protocol/lnurlp-response.js";
export * from "./protocol/pay-request.js";
export * from "./protocol/pay-response.js";
export * from "./protocol/post-transaction-callback.js";
export { isDomainLocalhost, schemeForDomain } from "./utils/urls.js";

// Invoices
export {
  InvoiceBuilder,
  UMA_BECH32_PREFIX,
  invoiceToTlv,
  invoiceFromTlv,
  invoiceToBech32,
  invoiceFromBech32,
  signInvoice,
  verifyInvoiceSignature,
  type Invoice,
  type InvoiceCurrency,
} from "./invoice/invoice.js";
