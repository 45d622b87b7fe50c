/**
 * UMA reference VASP: Receiving VASP service.
 *
 * Answers the receiving side of a payment: key discovery, Lnurlp requests,
 * pay requests and post-transaction callbacks. Every inbound signed message
 * goes through the nonce cache before its signature is checked.
 */

import { randomUUID } from "node:crypto";
import type { FastifyBaseLogger } from "fastify";
import {
  type CurrencyV1,
  type NonceCache,
  type PayRequest,
  type PubKeyResponseJson,
  PubKeyResponse,
  UmaError,
  UmaErrorCode,
  asUmaPostTransactionCallback,
  createCounterpartyDataOptions,
  decryptTravelRuleInfo,
  isUmaPayRequest,
  lnurlpResponseToJson,
  parsePostTransactionCallback,
  payReqResponseToJson,
  receivingCurrencyCodeOf,
  schemeForDomain,
  sendingCurrencyCodeOf,
  tryAsUmaLnurlpRequest,
} from "@umaproto/core";
import type { UmaInvoiceCreator, UmaProtocolHelper } from "@umaproto/sdk";
import type { Database } from "../db/schema.js";

export interface ReceivedPayment {
  id: string;
  payerIdentifier: string | null;
  senderVaspDomain: string | null;
  amount: number;
  /** Receiving currency code, or "MSAT" */
  amountUnit: string;
  receivingCurrencyCode: string;
  encodedInvoice: string;
  umaLayout: string;
  createdAt: string;
}

export interface ReceivedUtxoCallback {
  id: string;
  vaspDomain: string;
  transactionStatus: string | null;
  utxos: unknown;
  receivedAt: string;
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface VaspKeys {
  signingPrivateKey: Uint8Array;
  signingPublicKey: Uint8Array;
  encryptionPrivateKey: Uint8Array;
  encryptionPublicKey: Uint8Array;
}

export interface ReceiverSettings {
  vaspDomain: string;
  /** Usernames, with or without the leading "$" */
  users: string[];
  pubKeyTtlSeconds: number;
  usdMsatsPerCent: number;
  receiverFeesMsats: number;
  minSendableSats: number;
  maxSendableSats: number;
}

export interface ReceiverDeps {
  db: Database;
  helper: UmaProtocolHelper;
  nonceCache: NonceCache;
  invoiceCreator: UmaInvoiceCreator;
  keys: VaspKeys;
  settings: ReceiverSettings;
  log: FastifyBaseLogger;
  /** Unix seconds */
  now: () => number;
}

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

export class ReceivingVaspService {
  private readonly users: Set<string>;
  private readonly currencies: CurrencyV1[];

  constructor(private deps: ReceiverDeps) {
    this.users = new Set(deps.settings.users.map(normalizeUser));
    const { settings } = deps;
    this.currencies = [
      {
        layout: "v1",
        code: "USD",
        name: "US Dollar",
        symbol: "$",
        millisatoshiPerUnit: settings.usdMsatsPerCent,
        decimals: 2,
        convertible: {
          min: Math.ceil((settings.minSendableSats * 1000) / settings.usdMsatsPerCent),
          max: Math.floor((settings.maxSendableSats * 1000) / settings.usdMsatsPerCent),
        },
      },
      {
        layout: "v1",
        code: "SAT",
        name: "Satoshis",
        symbol: "",
        millisatoshiPerUnit: 1000,
        decimals: 0,
        convertible: { min: settings.minSendableSats, max: settings.maxSendableSats },
      },
    ];
  }

  /** Body of `/.well-known/lnurlpubkey`. */
  getPubKeyResponse(): PubKeyResponseJson {
    const { keys, settings, now } = this.deps;
    return PubKeyResponse.fromKeys(
      keys.signingPublicKey,
      keys.encryptionPublicKey,
      now() + settings.pubKeyTtlSeconds,
    ).toJSON();
  }

  /**
   * Answer a Lnurlp request. A request without the UMA parameters gets a plain
   * LNURL-pay response.
   * @throws {UmaError} USER_NOT_FOUND, INVALID_SIGNATURE, or any parse,
   *   version or nonce failure.
   */
  async handleLnurlp(url: string): Promise<Record<string, unknown>> {
    const { helper, settings, keys, log } = this.deps;
    const request = helper.parseLnurlpRequest(url);
    const user = this.requireUser(request.receiverAddress.split("@")[0]);

    const base = {
      callback: this.payRequestCallback(user),
      metadata: this.metadataFor(user),
    };

    const uma = tryAsUmaLnurlpRequest(request);
    if (!uma.ok) {
      log.debug({ receiver: request.receiverAddress }, "Plain LNURL request");
      return lnurlpResponseToJson({
        ...base,
        minSendable: settings.minSendableSats * 1000,
        maxSendable: settings.maxSendableSats * 1000,
      });
    }

    const query = uma.value;
    const senderKeys = await this.fetchCounterpartyKeys(query.vaspDomain);
    if (!helper.verifyUmaLnurlpQuerySignature(query, senderKeys, this.deps.nonceCache)) {
      throw new UmaError(UmaErrorCode.INVALID_SIGNATURE, "Invalid lnurlp request signature");
    }
    if (query.backingSignatures !== undefined && !(await helper.verifyLnurlpRequestBackingSignatures(query))) {
      throw new UmaError(UmaErrorCode.INVALID_SIGNATURE, "Invalid backing signature on lnurlp request");
    }

    const response = helper.getLnurlpResponse({
      query,
      callback: base.callback,
      privateKey: keys.signingPrivateKey,
      requiresTravelRuleInfo: true,
      encodedMetadata: base.metadata,
      minSendableSats: settings.minSendableSats,
      maxSendableSats: settings.maxSendableSats,
      payerDataOptions: createCounterpartyDataOptions({
        identifier: true,
        compliance: true,
        name: false,
        email: false,
      }),
      currencyOptions: this.currencies,
      receiverKycStatus: "VERIFIED",
    });
    log.info({ sender: query.vaspDomain, umaVersion: response.umaVersion }, "Answered lnurlp request");
    return lnurlpResponseToJson(response);
  }

  /**
   * Verify a pay request for `username` and answer with an invoice.
   * @throws {UmaError} USER_NOT_FOUND, INVALID_CURRENCY, AMOUNT_OUT_OF_RANGE,
   *   INVALID_SIGNATURE, or any nonce failure.
   */
  async handlePayRequest(username: string, request: PayRequest): Promise<Record<string, unknown>> {
    const { helper, keys, settings, log } = this.deps;
    const user = this.requireUser(username);

    const currencyCode = receivingCurrencyCodeOf(request) ?? "SAT";
    const currency = this.currencies.find((c) => c.code === currencyCode);
    if (currency === undefined) {
      throw new UmaError(UmaErrorCode.INVALID_CURRENCY, `Unsupported currency: ${currencyCode}`);
    }
    this.checkAmount(request, currency);

    let senderVaspDomain: string | undefined;
    if (isUmaPayRequest(request)) {
      const { payerData } = request;
      senderVaspDomain = helper.getVaspDomainFromUmaAddress(payerData.identifier);
      const senderKeys = await this.fetchCounterpartyKeys(senderVaspDomain);
      if (!helper.verifyPayReqSignature(request, senderKeys, this.deps.nonceCache)) {
        throw new UmaError(UmaErrorCode.INVALID_SIGNATURE, "Invalid pay request signature");
      }
      if (
        payerData.compliance.backingSignatures !== undefined &&
        !(await helper.verifyPayReqBackingSignatures(request))
      ) {
        throw new UmaError(UmaErrorCode.INVALID_SIGNATURE, "Invalid backing signature on pay request");
      }
      const encrypted = payerData.compliance.encryptedTravelRuleInfo;
      if (encrypted !== undefined) {
        const travelRuleInfo = decryptTravelRuleInfo(encrypted, keys.encryptionPrivateKey);
        log.info({ sender: senderVaspDomain, length: travelRuleInfo.length }, "Received travel rule info");
      }
    }

    const payeeIdentifier = `${user}@${settings.vaspDomain}`;
    const response = await helper.getPayReqResponse({
      request,
      invoiceCreator: this.deps.invoiceCreator,
      metadata: this.metadataFor(user),
      receivingCurrencyCode: currency.code,
      receivingCurrencyDecimals: currency.decimals,
      conversionRate: currency.millisatoshiPerUnit,
      receiverFeesMillisats: settings.receiverFeesMsats,
      receiverChannelUtxos: [],
      utxoCallback: this.utxoCallbackUrl(),
      payeeIdentifier,
      signingPrivateKey: keys.signingPrivateKey,
    });

    this.deps.db.insertPayment({
      id: randomUUID(),
      receiver: payeeIdentifier,
      payer_identifier: request.payerData?.identifier ?? null,
      sender_vasp_domain: senderVaspDomain ?? null,
      amount: request.amount,
      amount_unit: amountInReceivingCurrency(request) ? currency.code : "MSAT",
      receiving_currency_code: currency.code,
      encoded_invoice: response.encodedInvoice,
      uma_layout: request.layout,
    });
    log.info({ receiver: payeeIdentifier, sender: senderVaspDomain }, "Answered pay request");

    return payReqResponseToJson(response);
  }

  /**
   * Verify and record a post-transaction callback.
   * @throws {UmaError} PARSE_UTXO_CALLBACK_ERROR, MISSING_REQUIRED_UMA_PARAMETERS,
   *   INVALID_SIGNATURE, or any nonce failure.
   */
  async handleUtxoCallback(body: unknown): Promise<{ status: "OK" }> {
    const { helper, db, log } = this.deps;
    const callback = asUmaPostTransactionCallback(parsePostTransactionCallback(body));
    const senderKeys = await this.fetchCounterpartyKeys(callback.vaspDomain);
    if (!helper.verifyPostTransactionCallbackSignature(callback, senderKeys, this.deps.nonceCache)) {
      throw new UmaError(UmaErrorCode.INVALID_SIGNATURE, "Invalid post-transaction callback signature");
    }
    if (
      callback.backingSignatures !== undefined &&
      !(await helper.verifyPostTransactionCallbackBackingSignatures(callback))
    ) {
      throw new UmaError(UmaErrorCode.INVALID_SIGNATURE, "Invalid backing signature on callback");
    }

    db.insertUtxoCallback({
      id: randomUUID(),
      vasp_domain: callback.vaspDomain,
      transaction_status: callback.transactionStatus ?? null,
      utxos: JSON.stringify(callback.utxos),
    });
    log.info({ sender: callback.vaspDomain, utxos: callback.utxos.length }, "Recorded post-transaction callback");
    return { status: "OK" };
  }

  // -----------------------------------------------------------------------
  // History
  // -----------------------------------------------------------------------

  /** @throws {UmaError} USER_NOT_FOUND */
  listPayments(username: string): ReceivedPayment[] {
    const receiver = `${this.requireUser(username)}@${this.deps.settings.vaspDomain}`;
    return this.deps.db.listPaymentsForReceiver(receiver).map((row) => ({
      id: row.id,
      payerIdentifier: row.payer_identifier,
      senderVaspDomain: row.sender_vasp_domain,
      amount: row.amount,
      amountUnit: row.amount_unit,
      receivingCurrencyCode: row.receiving_currency_code,
      encodedInvoice: row.encoded_invoice,
      umaLayout: row.uma_layout,
      createdAt: row.created_at,
    }));
  }

  listUtxoCallbacks(vaspDomain: string): ReceivedUtxoCallback[] {
    return this.deps.db.listUtxoCallbacks(vaspDomain).map((row) => {
      const utxos: unknown = JSON.parse(row.utxos);
      return {
        id: row.id,
        vaspDomain: row.vasp_domain,
        transactionStatus: row.transaction_status,
        utxos,
        receivedAt: row.received_at,
      };
    });
  }

  // -----------------------------------------------------------------------
  // Helpers
  // -----------------------------------------------------------------------

  private requireUser(username: string): string {
    const user = normalizeUser(username);
    if (!this.users.has(user)) {
      throw new UmaError(UmaErrorCode.USER_NOT_FOUND, `User not found: ${username}`);
    }
    return `$${user}`;
  }

  private checkAmount(request: PayRequest, currency: CurrencyV1): void {
    const { settings } = this.deps;
    const [min, max] = amountInReceivingCurrency(request)
      ? [currency.convertible.min, currency.convertible.max]
      : [settings.minSendableSats * 1000, settings.maxSendableSats * 1000];
    if (request.amount < min || request.amount > max) {
      throw new UmaError(
        UmaErrorCode.AMOUNT_OUT_OF_RANGE,
        `Amount ${request.amount} is outside [${min}, ${max}]`,
        { min, max },
      );
    }
  }

  /** Key fetch failures surface as COUNTERPARTY_PUBKEY_FETCH_ERROR. */
  private async fetchCounterpartyKeys(vaspDomain: string): Promise<PubKeyResponse> {
    try {
      return await this.deps.helper.fetchPublicKeysForVasp(vaspDomain);
    } catch (err) {
      if (err instanceof UmaError) throw err;
      throw new UmaError(
        UmaErrorCode.COUNTERPARTY_PUBKEY_FETCH_ERROR,
        `Unable to fetch public keys for ${vaspDomain}`,
        { vaspDomain },
        { cause: err },
      );
    }
  }

  private metadataFor(user: string): string {
    const { vaspDomain } = this.deps.settings;
    return JSON.stringify([
      ["text/plain", `Pay to ${vaspDomain} user ${user}`],
      ["text/identifier", `${user}@${vaspDomain}`],
    ]);
  }

  private payRequestCallback(user: string): string {
    const { vaspDomain } = this.deps.settings;
    return `${schemeForDomain(vaspDomain)}://${vaspDomain}/api/uma/payreq/${encodeURIComponent(user)}`;
  }

  private utxoCallbackUrl(): string {
    const { vaspDomain } = this.deps.settings;
    return `${schemeForDomain(vaspDomain)}://${vaspDomain}/api/uma/utxocallback`;
  }
}

function normalizeUser(username: string): string {
  return (username.startsWith("$") ? username.slice(1) : username).toLowerCase();
}

function amountInReceivingCurrency(request: PayRequest): boolean {
  return request.layout === "v0" || sendingCurrencyCodeOf(request) !== undefined;
}
