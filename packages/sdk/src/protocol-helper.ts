/**
 * UMA SDK: protocol helper.
 *
 * UmaProtocolHelper is the main entry point for a VASP taking part in UMA
 * payments. It fetches and caches counterparty keys, builds and signs each
 * protocol message, and verifies what the counterparty sends back, checking
 * nonces before any signature.
 */

import { randomBytes } from "node:crypto";
import { v7 as uuidv7 } from "uuid";
import {
  type BackingSignature,
  type CounterpartyDataOptions,
  type Currency,
  type Invoice,
  type InvoiceCurrency,
  type KycStatus,
  type LnurlpRequest,
  type LnurlpResponse,
  type NonceCache,
  type PayeeData,
  type PayReqResponse,
  type PayRequest,
  type PublicKeyCache,
  type SettlementInfo,
  type TransactionStatus,
  type TravelRuleFormat,
  type UmaLnurlpRequest,
  type UmaLnurlpResponse,
  type UmaPayReqResponse,
  type UmaPayReqResponseV1,
  type UmaPayRequest,
  type UmaPostTransactionCallback,
  type UtxoWithAmount,
  type VersionConfig,
  DEFAULT_VERSION_CONFIG,
  InMemoryPublicKeyCache,
  InvalidNonceError,
  PubKeyResponse,
  UmaError,
  UmaErrorCode,
  UnsupportedVersionError,
  currencyForMajorVersion,
  decodeLnurlpRequestUrl,
  encodeLnurlpRequestUrl,
  encryptTravelRuleInfo,
  isUmaPayRequest,
  lnurlComplianceSignablePayload,
  lnurlpRequestSignablePayload,
  majorVersionOf,
  parseLnurlpResponse,
  parsePayReqResponse,
  parsePayRequest,
  payReqResponseSignablePayload,
  payRequestSignablePayload,
  payRequestToJson,
  postTransactionCallbackSignablePayload,
  receivingCurrencyCodeOf,
  schemeForDomain,
  sendingCurrencyCodeOf,
  signInvoice,
  signLnurlComplianceResponse,
  signLnurlpRequest,
  signPayReqResponse,
  signPayRequest,
  signPostTransactionCallback,
  selectResponseVersion,
  tryAsUmaLnurlpRequest,
  unixNow,
  verifyBackingSignatures,
  verifyInvoiceSignature,
  verifySignature,
} from "@umaproto/core";
import type { UmaInvoiceCreator } from "./invoice-creator.js";
import { createDefaultLogger, type UmaLogger } from "./logger.js";
import { FetchUmaRequester, type UmaRequester } from "./requester.js";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface UmaProtocolHelperOptions {
  publicKeyCache?: PublicKeyCache;
  requester?: UmaRequester;
  logger?: UmaLogger;
  versions?: VersionConfig;
  /** Unix seconds; defaults to the wall clock. */
  now?: () => number;
}

export interface SignedLnurlpRequestParams {
  signingPrivateKey: Uint8Array;
  /** e.g. "$bob@vasp2.com". */
  receiverAddress: string;
  /** Where the receiver fetches this VASP's keys. */
  senderVaspDomain: string;
  isSubjectToTravelRule: boolean;
  /** Override only when the receiver cannot speak the current version. */
  umaVersion?: string;
  backingSignatures?: BackingSignature[];
}

export interface LnurlpResponseParams {
  query: UmaLnurlpRequest;
  privateKey: Uint8Array;
  requiresTravelRuleInfo: boolean;
  callback: string;
  encodedMetadata: string;
  minSendableSats: number;
  maxSendableSats: number;
  payerDataOptions: CounterpartyDataOptions;
  currencyOptions: Currency[];
  receiverKycStatus: KycStatus;
  commentCharsAllowed?: number;
  nostrPubkey?: string;
}

export interface PayRequestParams {
  receiverEncryptionPubKey: Uint8Array;
  sendingVaspPrivateKey: Uint8Array;
  receivingCurrencyCode: string;
  /** Smallest unit of the receiving currency, or millisatoshis when `isAmountInReceivingCurrency` is false. */
  amount: number;
  isAmountInReceivingCurrency: boolean;
  payerIdentifier: string;
  payerKycStatus: KycStatus;
  utxoCallback: string;
  travelRuleInfo?: string;
  travelRuleFormat?: TravelRuleFormat;
  payerNodePubKey?: string;
  payerUtxos?: string[];
  payerName?: string;
  payerEmail?: string;
  requestedPayeeData?: CounterpartyDataOptions;
  comment?: string;
  /** Version from the receiver's Lnurlp response; selects the V0 or V1 layout. */
  receiverUmaVersion?: string;
  invoiceUUID?: string;
  settlement?: SettlementInfo;
}

export interface PayReqResponseParams {
  request: PayRequest;
  invoiceCreator: UmaInvoiceCreator;
  metadata: string;
  /** Currency the receiver is paid in; must match the request's. */
  receivingCurrencyCode: string;
  receivingCurrencyDecimals: number;
  /** Millisatoshis per smallest unit of the receiving currency. */
  conversionRate: number;
  receiverFeesMillisats: number;
  receiverChannelUtxos: string[];
  receiverNodePubKey?: string;
  utxoCallback: string;
  payeeIdentifier: string;
  signingPrivateKey: Uint8Array;
  /** Extra payee fields the sender asked for. */
  payeeData?: PayeeData;
  disposable?: boolean;
  successAction?: Record<string, string>;
}

export interface PostTransactionCallbackParams {
  utxos: UtxoWithAmount[];
  vaspDomain: string;
  signingPrivateKey: Uint8Array;
  transactionStatus?: TransactionStatus;
}

export interface UmaInvoiceParams {
  receiverUma: string;
  invoiceUUID?: string;
  amount: number;
  receivingCurrency: InvoiceCurrency;
  expiration: number;
  isSubjectToTravelRule: boolean;
  requiredPayerData?: CounterpartyDataOptions;
  commentCharsAllowed?: number;
  senderUma?: string;
  invoiceLimit?: number;
  kycStatus?: KycStatus;
  callback: string;
  signingPrivateKey: Uint8Array;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Random unsigned 64-bit integer as a decimal string. */
function generateNonce(): string {
  return randomBytes(8).readBigUInt64BE().toString();
}

// ---------------------------------------------------------------------------
// UmaProtocolHelper
// ---------------------------------------------------------------------------

export class UmaProtocolHelper {
  private readonly _publicKeyCache: PublicKeyCache;
  private readonly _requester: UmaRequester;
  private readonly _logger: UmaLogger;
  private readonly _versions: VersionConfig;
  private readonly _now: () => number;

  constructor(options: UmaProtocolHelperOptions = {}) {
    this._publicKeyCache = options.publicKeyCache ?? new InMemoryPublicKeyCache();
    this._requester = options.requester ?? new FetchUmaRequester();
    this._logger = options.logger ?? createDefaultLogger();
    this._versions = options.versions ?? DEFAULT_VERSION_CONFIG;
    this._now = options.now ?? unixNow;
  }

  // -----------------------------------------------------------------------
  // Counterparty keys
  // -----------------------------------------------------------------------

  /**
   * Keys of `vaspDomain`, from the cache while they are unexpired, otherwise
   * from its `/.well-known/lnurlpubkey`. Fetch errors propagate unchanged.
   */
  async fetchPublicKeysForVasp(vaspDomain: string): Promise<PubKeyResponse> {
    const cached = this._publicKeyCache.getPublicKeysForVasp(vaspDomain);
    if (cached !== undefined) {
      this._logger.debug({ vaspDomain }, "Public key cache hit");
      return cached;
    }

    const url = `${schemeForDomain(vaspDomain)}://${vaspDomain}/.well-known/lnurlpubkey`;
    this._logger.debug({ vaspDomain, url }, "Fetching public keys");
    const body = await this._requester.makeGetRequest(url);
    const response = PubKeyResponse.fromJson(body);
    this._publicKeyCache.addPublicKeysForVasp(vaspDomain, response);
    return response;
  }

  // -----------------------------------------------------------------------
  // Lnurlp request
  // -----------------------------------------------------------------------

  /** Signed Lnurlp request URL for the receiving VASP. */
  getSignedLnurlpRequestUrl(params: SignedLnurlpRequestParams): string {
    const unsigned: UmaLnurlpRequest = {
      receiverAddress: params.receiverAddress,
      nonce: generateNonce(),
      signature: "",
      isSubjectToTravelRule: params.isSubjectToTravelRule,
      vaspDomain: params.senderVaspDomain,
      timestamp: this._now(),
      umaVersion: params.umaVersion ?? this._versions.current,
      backingSignatures: params.backingSignatures,
    };
    return encodeLnurlpRequestUrl(signLnurlpRequest(unsigned, params.signingPrivateKey));
  }

  /**
   * True when `url` carries every UMA parameter. A request for an unsupported
   * version still counts, so the caller can answer with the supported majors.
   */
  isUmaLnurlpQuery(url: string): boolean {
    try {
      return tryAsUmaLnurlpRequest(this.parseLnurlpRequest(url)).ok;
    } catch (err) {
      if (err instanceof UnsupportedVersionError) return true;
      if (err instanceof UmaError) return false;
      throw err;
    }
  }

  /**
   * @throws {UmaError} PARSE_LNURLP_REQUEST_ERROR for a malformed URL.
   * @throws {UnsupportedVersionError}
   */
  parseLnurlpRequest(url: string): LnurlpRequest {
    return decodeLnurlpRequestUrl(url, this._versions);
  }

  /**
   * Check the nonce, then the sender's signature.
   * @throws {InvalidNonceError} on replay, before any signature check.
   */
  verifyUmaLnurlpQuerySignature(query: UmaLnurlpRequest, keys: PubKeyResponse, nonceCache: NonceCache): boolean {
    this.checkNonce(nonceCache, query.nonce, query.timestamp);
    return this.verifyOrWarn(
      lnurlpRequestSignablePayload(query),
      query.signature,
      keys.getSigningPubKey(),
      "lnurlp request",
    );
  }

  verifyLnurlpRequestBackingSignatures(query: UmaLnurlpRequest): Promise<boolean> {
    return this.verifyBacking(lnurlpRequestSignablePayload(query), query.backingSignatures, "lnurlp request");
  }

  // -----------------------------------------------------------------------
  // Lnurlp response
  // -----------------------------------------------------------------------

  /**
   * The receiver's signed answer to `query`, in the version negotiated from
   * the one the sender asked for.
   */
  getLnurlpResponse(params: LnurlpResponseParams): UmaLnurlpResponse {
    const umaVersion = selectResponseVersion(params.query.umaVersion, this._versions);
    const major = majorVersionOf(umaVersion);
    const compliance = signLnurlComplianceResponse(
      {
        kycStatus: params.receiverKycStatus,
        isSubjectToTravelRule: params.requiresTravelRuleInfo,
        receiverIdentifier: params.query.receiverAddress,
        signature: "",
        signatureNonce: generateNonce(),
        signatureTimestamp: this._now(),
      },
      params.privateKey,
    );
    return {
      callback: params.callback,
      minSendable: params.minSendableSats * 1000,
      maxSendable: params.maxSendableSats * 1000,
      metadata: params.encodedMetadata,
      currencies: params.currencyOptions.map((currency) => currencyForMajorVersion(currency, major)),
      requiredPayerData: params.payerDataOptions,
      compliance,
      umaVersion,
      commentCharsAllowed: params.commentCharsAllowed,
      nostrPubkey: params.nostrPubkey,
      allowsNostr: params.nostrPubkey === undefined ? undefined : true,
    };
  }

  parseAsLnurlpResponse(input: unknown): LnurlpResponse {
    return parseLnurlpResponse(input);
  }

  /** @throws {InvalidNonceError} on replay, before any signature check. */
  verifyLnurlpResponseSignature(response: UmaLnurlpResponse, keys: PubKeyResponse, nonceCache: NonceCache): boolean {
    const { compliance } = response;
    this.checkNonce(nonceCache, compliance.signatureNonce, compliance.signatureTimestamp);
    return this.verifyOrWarn(
      lnurlComplianceSignablePayload(compliance),
      compliance.signature,
      keys.getSigningPubKey(),
      "lnurlp response",
    );
  }

  verifyLnurlpResponseBackingSignatures(response: UmaLnurlpResponse): Promise<boolean> {
    return this.verifyBacking(
      lnurlComplianceSignablePayload(response.compliance),
      response.backingSignatures,
      "lnurlp response",
    );
  }

  // -----------------------------------------------------------------------
  // Pay request
  // -----------------------------------------------------------------------

  /**
   * Signed pay request in the layout of the receiver's major version.
   * Travel-rule info is encrypted to `receiverEncryptionPubKey`.
   */
  getPayRequest(params: PayRequestParams): UmaPayRequest {
    const compliance = {
      utxos: params.payerUtxos ?? [],
      nodePubKey: params.payerNodePubKey,
      kycStatus: params.payerKycStatus,
      encryptedTravelRuleInfo:
        params.travelRuleInfo === undefined
          ? undefined
          : encryptTravelRuleInfo(params.travelRuleInfo, params.receiverEncryptionPubKey),
      travelRuleFormat: params.travelRuleFormat,
      utxoCallback: params.utxoCallback,
      signature: "",
      signatureNonce: generateNonce(),
      signatureTimestamp: this._now(),
    };

    const major = majorVersionOf(params.receiverUmaVersion ?? this._versions.current);
    const unsigned: UmaPayRequest =
      major >= 1
        ? {
            layout: "v1",
            amount: params.amount,
            sendingCurrencyCode: params.isAmountInReceivingCurrency ? params.receivingCurrencyCode : undefined,
            receivingCurrencyCode: params.receivingCurrencyCode,
            payerData: {
              identifier: params.payerIdentifier,
              name: params.payerName,
              email: params.payerEmail,
              compliance,
            },
            requestedPayeeData: params.requestedPayeeData,
            comment: params.comment,
            invoiceUUID: params.invoiceUUID,
            settlement: params.settlement,
          }
        : {
            layout: "v0",
            currencyCode: params.receivingCurrencyCode,
            amount: params.amount,
            payerData: {
              identifier: params.payerIdentifier,
              name: params.payerName,
              email: params.payerEmail,
              compliance,
            },
          };
    return signPayRequest(unsigned, params.sendingVaspPrivateKey);
  }

  /** @throws {UmaError} PARSE_PAYREQ_REQUEST_ERROR or MISSING_REQUIRED_UMA_PARAMETERS. */
  parseAsPayRequest(input: unknown): PayRequest {
    return parsePayRequest(input);
  }

  /** @throws {InvalidNonceError} on replay, before any signature check. */
  verifyPayReqSignature(request: UmaPayRequest, keys: PubKeyResponse, nonceCache: NonceCache): boolean {
    const { compliance } = request.payerData;
    this.checkNonce(nonceCache, compliance.signatureNonce, compliance.signatureTimestamp);
    return this.verifyOrWarn(
      payRequestSignablePayload(request),
      compliance.signature,
      keys.getSigningPubKey(),
      "pay request",
    );
  }

  verifyPayReqBackingSignatures(request: UmaPayRequest): Promise<boolean> {
    return this.verifyBacking(
      payRequestSignablePayload(request),
      request.payerData.compliance.backingSignatures,
      "pay request",
    );
  }

  // -----------------------------------------------------------------------
  // Pay response
  // -----------------------------------------------------------------------

  /**
   * Create the invoice for `request` and wrap it in a pay response of the
   * request's layout. The invoice is for `amount * conversionRate + fee`
   * millisatoshis, rounded to a whole millisatoshi, when the amount is in the receiving currency, and for the
   * amount itself when it is in millisatoshis.
   * @throws {UmaError} INVALID_CURRENCY when the request names another currency.
   */
  async getPayReqResponse(params: PayReqResponseParams): Promise<PayReqResponse> {
    const { request } = params;
    const requested = receivingCurrencyCodeOf(request);
    if (requested !== undefined && requested !== params.receivingCurrencyCode) {
      throw new UmaError(
        UmaErrorCode.INVALID_CURRENCY,
        `Currency mismatch: request asks for ${requested}, receiver pays ${params.receivingCurrencyCode}`,
      );
    }
    const sending = sendingCurrencyCodeOf(request);
    if (sending !== undefined && sending !== params.receivingCurrencyCode) {
      throw new UmaError(UmaErrorCode.INVALID_CURRENCY, `Unsupported sending currency: ${sending}`);
    }

    const amountInReceivingCurrency = request.layout === "v0" || sending !== undefined;
    const amountMsats = amountInReceivingCurrency
      ? Math.round(request.amount * params.conversionRate) + params.receiverFeesMillisats
      : request.amount;
    const receivingAmount = amountInReceivingCurrency
      ? request.amount
      : Math.round((request.amount - params.receiverFeesMillisats) / params.conversionRate);
    if (amountMsats <= 0 || receivingAmount < 0) {
      throw new UmaError(UmaErrorCode.AMOUNT_OUT_OF_RANGE, `Invalid amount: ${request.amount}`);
    }

    const payerDataJson = payRequestToJson(request).payerData;
    const encodedPayerData = payerDataJson === undefined ? "" : JSON.stringify(payerDataJson);
    const encodedInvoice = await params.invoiceCreator.createUmaInvoice(
      amountMsats,
      `${params.metadata}${encodedPayerData}`,
      params.payeeIdentifier,
    );
    this._logger.debug({ amountMsats, layout: request.layout }, "Created invoice for pay request");

    const terms = {
      currencyCode: params.receivingCurrencyCode,
      decimals: params.receivingCurrencyDecimals,
      multiplier: params.conversionRate,
      fee: params.receiverFeesMillisats,
    };
    const paymentInfo = { amount: receivingAmount, ...terms };

    if (request.layout === "v0") {
      return {
        layout: "v0",
        encodedInvoice,
        compliance: {
          utxos: params.receiverChannelUtxos,
          nodePubKey: params.receiverNodePubKey,
          utxoCallback: params.utxoCallback,
        },
        paymentInfo: terms,
        routes: [],
      };
    }

    if (!isUmaPayRequest(request)) {
      return {
        layout: "v1",
        encodedInvoice,
        converted: requested === undefined ? undefined : paymentInfo,
        routes: [],
        disposable: params.disposable,
        successAction: params.successAction,
      };
    }

    const unsigned: UmaPayReqResponseV1 = {
      layout: "v1",
      encodedInvoice,
      converted: paymentInfo,
      payeeData: {
        ...params.payeeData,
        identifier: params.payeeIdentifier,
        compliance: {
          utxos: params.receiverChannelUtxos,
          nodePubKey: params.receiverNodePubKey,
          utxoCallback: params.utxoCallback,
          signature: "",
          signatureNonce: generateNonce(),
          signatureTimestamp: this._now(),
        },
      },
      routes: [],
      disposable: params.disposable,
      successAction: params.successAction,
    };
    return signPayReqResponse(unsigned, request.payerData.identifier, params.signingPrivateKey);
  }

  parseAsPayReqResponse(input: unknown): PayReqResponse {
    return parsePayReqResponse(input);
  }

  /**
   * @throws {UmaError} INVALID_INPUT for a V0 response, which carries no signature.
   * @throws {InvalidNonceError} on replay, before any signature check.
   */
  verifyPayReqResponseSignature(
    response: UmaPayReqResponse,
    keys: PubKeyResponse,
    payerIdentifier: string,
    nonceCache: NonceCache,
  ): boolean {
    if (response.layout === "v0") {
      throw new UmaError(UmaErrorCode.INVALID_INPUT, "V0 pay responses are not signed");
    }
    const { compliance } = response.payeeData;
    this.checkNonce(nonceCache, compliance.signatureNonce, compliance.signatureTimestamp);
    return this.verifyOrWarn(
      payReqResponseSignablePayload(response, payerIdentifier),
      compliance.signature,
      keys.getSigningPubKey(),
      "pay response",
    );
  }

  verifyPayReqResponseBackingSignatures(response: UmaPayReqResponseV1, payerIdentifier: string): Promise<boolean> {
    return this.verifyBacking(
      payReqResponseSignablePayload(response, payerIdentifier),
      response.payeeData.compliance.backingSignatures,
      "pay response",
    );
  }

  // -----------------------------------------------------------------------
  // Post-transaction callback
  // -----------------------------------------------------------------------

  getPostTransactionCallback(params: PostTransactionCallbackParams): UmaPostTransactionCallback {
    return signPostTransactionCallback(
      {
        utxos: params.utxos,
        vaspDomain: params.vaspDomain,
        signature: "",
        signatureNonce: generateNonce(),
        signatureTimestamp: this._now(),
        transactionStatus: params.transactionStatus,
      },
      params.signingPrivateKey,
    );
  }

  /** @throws {InvalidNonceError} on replay, before any signature check. */
  verifyPostTransactionCallbackSignature(
    callback: UmaPostTransactionCallback,
    keys: PubKeyResponse,
    nonceCache: NonceCache,
  ): boolean {
    this.checkNonce(nonceCache, callback.signatureNonce, callback.signatureTimestamp);
    return this.verifyOrWarn(
      postTransactionCallbackSignablePayload(callback),
      callback.signature,
      keys.getSigningPubKey(),
      "post-transaction callback",
    );
  }

  verifyPostTransactionCallbackBackingSignatures(callback: UmaPostTransactionCallback): Promise<boolean> {
    return this.verifyBacking(
      postTransactionCallbackSignablePayload(callback),
      callback.backingSignatures,
      "post-transaction callback",
    );
  }

  // -----------------------------------------------------------------------
  // Invoices
  // -----------------------------------------------------------------------

  /** Signed invoice in this helper's current version. */
  createUmaInvoice(params: UmaInvoiceParams): Invoice {
    const unsigned: Invoice = {
      receiverUma: params.receiverUma,
      invoiceUUID: params.invoiceUUID ?? uuidv7(),
      amount: params.amount,
      receivingCurrency: params.receivingCurrency,
      expiration: params.expiration,
      isSubjectToTravelRule: params.isSubjectToTravelRule,
      requiredPayerData: params.requiredPayerData,
      umaVersion: this._versions.current,
      commentCharsAllowed: params.commentCharsAllowed,
      senderUma: params.senderUma,
      invoiceLimit: params.invoiceLimit,
      kycStatus: params.kycStatus,
      callback: params.callback,
    };
    return signInvoice(unsigned, params.signingPrivateKey);
  }

  verifyUmaInvoice(invoice: Invoice, keys: PubKeyResponse): boolean {
    const valid = verifyInvoiceSignature(invoice, keys.getSigningPubKey());
    if (!valid) this._logger.warn({ invoiceUUID: invoice.invoiceUUID }, "Invoice signature did not verify");
    return valid;
  }

  // -----------------------------------------------------------------------
  // Addresses
  // -----------------------------------------------------------------------

  /**
   * "$bob@vasp2.com" -> "vasp2.com".
   * @throws {UmaError} INVALID_INPUT without an "@".
   */
  getVaspDomainFromUmaAddress(identifier: string): string {
    const at = identifier.indexOf("@");
    if (at === -1 || at === identifier.length - 1) {
      throw new UmaError(
        UmaErrorCode.INVALID_INPUT,
        `Invalid identifier: ${identifier}. Must be of format $user@domain.com`,
      );
    }
    return identifier.substring(at + 1);
  }

  // -----------------------------------------------------------------------
  // Private helpers
  // -----------------------------------------------------------------------

  private checkNonce(nonceCache: NonceCache, nonce: string, timestamp: number): void {
    try {
      nonceCache.checkAndSaveNonce(nonce, timestamp);
    } catch (err) {
      if (err instanceof InvalidNonceError) {
        this._logger.warn({ nonce, timestamp, reason: err.reason }, "Rejected nonce");
      }
      throw err;
    }
  }

  private verifyOrWarn(payload: Uint8Array, signature: string, publicKey: Uint8Array, entity: string): boolean {
    const valid = verifySignature(payload, signature, publicKey);
    if (!valid) this._logger.warn({ entity }, "Signature did not verify");
    return valid;
  }

  private async verifyBacking(
    payload: Uint8Array,
    backingSignatures: readonly BackingSignature[] | undefined,
    entity: string,
  ): Promise<boolean> {
    const valid = await verifyBackingSignatures(payload, backingSignatures, async (domain) =>
      (await this.fetchPublicKeysForVasp(domain)).getSigningPubKey(),
    );
    if (!valid) this._logger.warn({ entity }, "Backing signature did not verify");
    return valid;
  }
}
