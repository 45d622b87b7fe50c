import { describe, it, expect } from "vitest";
import { generateKeyPair } from "../crypto/keys.js";
import { verifyBackingSignatures, verifySignature } from "../crypto/signing.js";
import {
  decodeBackingSignaturesParam,
  encodeBackingSignaturesParam,
} from "../protocol/backing-signature.js";
import {
  createCounterpartyDataOptions,
  decodeCounterpartyDataOptions,
  encodeCounterpartyDataOptions,
} from "../protocol/counterparty-data.js";
import {
  currencyForMajorVersion,
  currencyFromJson,
  type CurrencyV0,
  type CurrencyV1,
} from "../protocol/currency.js";
import { parseKycStatus } from "../protocol/kyc-status.js";
import {
  appendLnurlpRequestBackingSignature,
  asUmaLnurlpRequest,
  decodeLnurlpRequestUrl,
  encodeLnurlpRequestUrl,
  lnurlpRequestSignablePayload,
  signLnurlpRequest,
  tryAsUmaLnurlpRequest,
  type UmaLnurlpRequest,
} from "../protocol/lnurlp-request.js";
import {
  asUmaLnurlpResponse,
  lnurlComplianceSignablePayload,
  lnurlpResponseToJson,
  parseLnurlpResponse,
  signLnurlComplianceResponse,
  type UmaLnurlpResponse,
} from "../protocol/lnurlp-response.js";
import type { CompliancePayerData } from "../protocol/payer-data.js";
import {
  asUmaPayRequest,
  parseAmountString,
  parsePayRequest,
  payRequestFromQueryParams,
  payRequestSignablePayload,
  payRequestToJsonString,
  payRequestToQueryParams,
  receivingCurrencyCodeOf,
  signPayRequest,
  type PayRequestV0,
  type UmaPayRequestV1,
} from "../protocol/pay-request.js";
import {
  appendPayReqResponseBackingSignature,
  asUmaPayReqResponse,
  parsePayReqResponse,
  payReqResponseSignablePayload,
  payReqResponseToJsonString,
  signPayReqResponse,
  type PayReqResponseV0,
  type UmaPayReqResponseV1,
} from "../protocol/pay-response.js";
import {
  asUmaPostTransactionCallback,
  parsePostTransactionCallback,
  postTransactionCallbackSignablePayload,
  postTransactionCallbackToJson,
  signPostTransactionCallback,
  type UmaPostTransactionCallback,
} from "../protocol/post-transaction-callback.js";
import { UmaErrorCode, UnsupportedVersionError } from "../types/errors.js";
import { captureError } from "./helpers.js";

const sender = generateKeyPair();
const receiver = generateKeyPair();
const backer = generateKeyPair();
const text = (bytes: Uint8Array) => new TextDecoder().decode(bytes);

// ---------------------------------------------------------------------------
// Lnurlp request
// ---------------------------------------------------------------------------
describe("Lnurlp request", () => {
  const unsigned: UmaLnurlpRequest = {
    receiverAddress: "$bob@vasp2.example",
    nonce: "12345",
    signature: "",
    isSubjectToTravelRule: true,
    vaspDomain: "vasp1.example",
    timestamp: 1700000000,
    umaVersion: "1.0",
  };

  it("round-trips through the URL with backing signatures", () => {
    const signed = appendLnurlpRequestBackingSignature(
      signLnurlpRequest(unsigned, sender.privateKey),
      backer.privateKey,
      "backer.example:8443",
    );
    const url = encodeLnurlpRequestUrl(signed);
    expect(url.startsWith("https://vasp2.example/.well-known/lnurlp/$bob?")).toBe(true);

    const decoded = asUmaLnurlpRequest(decodeLnurlpRequestUrl(url));
    expect(decoded).toEqual(signed);
    expect(decoded.backingSignatures?.[0].domain).toBe("backer.example:8443");
    expect(verifySignature(lnurlpRequestSignablePayload(decoded), decoded.signature, sender.publicKey)).toBe(true);
  });

  it("signs the address as written", () => {
    expect(text(lnurlpRequestSignablePayload({ ...unsigned, receiverAddress: "$Bob@VASP2.example" }))).toBe(
      "$Bob@VASP2.example|12345|1700000000",
    );
  });

  it("keeps a mixed-case receiver domain as signed", () => {
    const signed = signLnurlpRequest({ ...unsigned, receiverAddress: "$bob@Vasp2.Example" }, sender.privateKey);
    const url = encodeLnurlpRequestUrl(signed);
    expect(url.startsWith("https://Vasp2.Example/.well-known/lnurlp/$bob?")).toBe(true);

    const decoded = asUmaLnurlpRequest(decodeLnurlpRequestUrl(url));
    expect(decoded.receiverAddress).toBe("$bob@Vasp2.Example");
    expect(verifySignature(lnurlpRequestSignablePayload(decoded), decoded.signature, sender.publicKey)).toBe(true);
  });

  it("uses http for local domains and keeps the port", () => {
    const url = encodeLnurlpRequestUrl({ receiverAddress: "bob@localhost:8080" });
    expect(url).toBe("http://localhost:8080/.well-known/lnurlp/bob");
    expect(decodeLnurlpRequestUrl(url).receiverAddress).toBe("bob@localhost:8080");
  });

  it("decodes a plain LNURL request and reports the missing UMA fields", () => {
    const plain = decodeLnurlpRequestUrl("https://vasp2.example/.well-known/lnurlp/bob");
    expect(plain.receiverAddress).toBe("bob@vasp2.example");
    const result = tryAsUmaLnurlpRequest(plain);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(UmaErrorCode.MISSING_REQUIRED_UMA_PARAMETERS);
      expect(result.error.details).toEqual({
        missingFields: ["nonce", "signature", "vaspDomain", "timestamp", "umaVersion"],
      });
    }
  });

  it.each([
    "ftp://vasp2.example/.well-known/lnurlp/bob",
    "https://vasp2.example/.well-known/other/bob",
    "https://vasp2.example/.well-known/lnurlp/bob/extra",
    "https://vasp2.example/.well-known/lnurlp/bo%20b",
    "https://vasp2.example/.well-known/lnurlp/bob?timestamp=soon",
    "https://vasp2.example/.well-known/lnurlp/bob?timestamp=",
    "https://vasp2.example/.well-known/lnurlp/bob?timestamp=-5",
    "not a url",
  ])("rejects %s", (url) => {
    expect(captureError(() => decodeLnurlpRequestUrl(url))).toMatchObject({
      code: UmaErrorCode.PARSE_LNURLP_REQUEST_ERROR,
    });
  });

  it("rejects an unsupported version", () => {
    const err = captureError(() =>
      decodeLnurlpRequestUrl("https://vasp2.example/.well-known/lnurlp/bob?umaVersion=2.0"),
    );
    expect(err).toBeInstanceOf(UnsupportedVersionError);
    expect(err).toMatchObject({ unsupportedVersion: "2.0", supportedMajorVersions: [0, 1] });
  });

  it("rejects an invalid receiver address on encode", () => {
    expect(captureError(() => encodeLnurlpRequestUrl({ receiverAddress: "bob" }))).toMatchObject({
      code: UmaErrorCode.INVALID_INPUT,
    });
  });
});

describe("Backing signature query parameter", () => {
  it("splits each pair on its last colon", () => {
    const encoded = encodeBackingSignaturesParam([
      { domain: "a.example:8080", signature: "abcd" },
      { domain: "b.example", signature: "ef01" },
    ]);
    expect(encoded).toBe("a.example%3A8080%3Aabcd,b.example%3Aef01");
    expect(decodeBackingSignaturesParam(encoded)).toEqual([
      { domain: "a.example:8080", signature: "abcd" },
      { domain: "b.example", signature: "ef01" },
    ]);
  });

  it("rejects a pair without a colon", () => {
    expect(captureError(() => decodeBackingSignaturesParam("nocolon"))).toMatchObject({
      code: UmaErrorCode.PARSE_LNURLP_REQUEST_ERROR,
    });
  });
});

// ---------------------------------------------------------------------------
// Lnurlp response and currencies
// ---------------------------------------------------------------------------
describe("Lnurlp response", () => {
  const usd: CurrencyV1 = {
    layout: "v1",
    code: "USD",
    name: "US Dollar",
    symbol: "$",
    millisatoshiPerUnit: 34150,
    decimals: 2,
    convertible: { min: 1, max: 1000000 },
  };

  const response: UmaLnurlpResponse = {
    callback: "https://vasp2.example/api/uma/payreq/bob",
    minSendable: 1000,
    maxSendable: 10000000000,
    metadata: '[["text/plain","Pay to bob"]]',
    currencies: [usd],
    requiredPayerData: createCounterpartyDataOptions({ identifier: true, name: false, compliance: true }),
    compliance: signLnurlComplianceResponse(
      {
        kycStatus: "VERIFIED",
        isSubjectToTravelRule: true,
        receiverIdentifier: "$Bob@VASP2.example",
        signature: "",
        signatureNonce: "999",
        signatureTimestamp: 1700000000,
      },
      receiver.privateKey,
    ),
    umaVersion: "1.0",
    commentCharsAllowed: 140,
  };

  it("round-trips through JSON", () => {
    const json = lnurlpResponseToJson(response);
    expect(json.tag).toBe("payRequest");
    expect(json.commentAllowed).toBe(140);
    const decoded = asUmaLnurlpResponse(parseLnurlpResponse(JSON.stringify(json)));
    expect(decoded).toEqual(response);
  });

  it("round-trips V0 currencies through JSON", () => {
    const usdV0: CurrencyV0 = {
      layout: "v0",
      code: "USD",
      name: "US Dollar",
      symbol: "$",
      millisatoshiPerUnit: 34150,
      minSendable: 1,
      maxSendable: 1000000,
      decimals: 2,
    };
    const v0Response: UmaLnurlpResponse = { ...response, currencies: [usdV0], umaVersion: "0.3" };

    const json = lnurlpResponseToJson(v0Response);
    expect(json.currencies).toEqual([
      { code: "USD", name: "US Dollar", symbol: "$", multiplier: 34150, minSendable: 1, maxSendable: 1000000, decimals: 2 },
    ]);
    expect(asUmaLnurlpResponse(parseLnurlpResponse(JSON.stringify(json)))).toEqual(v0Response);
  });

  it("signs the lower-cased receiver identifier", () => {
    expect(text(lnurlComplianceSignablePayload(response.compliance))).toBe("$bob@vasp2.example|999|1700000000");
    expect(
      verifySignature(
        lnurlComplianceSignablePayload(response.compliance),
        response.compliance.signature,
        receiver.publicKey,
      ),
    ).toBe(true);
  });

  it("lists every missing UMA field", () => {
    const plain = parseLnurlpResponse({
      callback: "https://vasp2.example/cb",
      minSendable: 1,
      maxSendable: 2,
      metadata: "[]",
    });
    expect(captureError(() => asUmaLnurlpResponse(plain))).toMatchObject({
      code: UmaErrorCode.MISSING_REQUIRED_UMA_PARAMETERS,
      details: { missingFields: ["currencies", "payerData", "compliance", "umaVersion"] },
    });
  });

  it("reports absent required keys as missing parameters", () => {
    expect(captureError(() => parseLnurlpResponse("{}"))).toMatchObject({
      code: UmaErrorCode.MISSING_REQUIRED_UMA_PARAMETERS,
    });
    expect(captureError(() => parseLnurlpResponse("{"))).toMatchObject({
      code: UmaErrorCode.PARSE_LNURLP_RESPONSE_ERROR,
    });
  });

  it("decodes a V0 currency by its minSendable key", () => {
    const currency = currencyFromJson(
      { code: "USD", name: "US Dollar", symbol: "$", multiplier: 34150, minSendable: 1, maxSendable: 500, decimals: 2 },
      UmaErrorCode.PARSE_LNURLP_RESPONSE_ERROR,
    );
    expect(currency).toEqual({
      layout: "v0",
      code: "USD",
      name: "US Dollar",
      symbol: "$",
      millisatoshiPerUnit: 34150,
      minSendable: 1,
      maxSendable: 500,
      decimals: 2,
    });
    expect(currencyForMajorVersion(currency, 1)).toEqual({
      layout: "v1",
      code: "USD",
      name: "US Dollar",
      symbol: "$",
      millisatoshiPerUnit: 34150,
      decimals: 2,
      convertible: { min: 1, max: 500 },
    });
  });

  it("maps unknown KYC statuses to UNKNOWN", () => {
    expect(parseKycStatus("VERIFIED")).toBe("VERIFIED");
    expect(parseKycStatus("SOMETHING_NEW")).toBe("UNKNOWN");
  });
});

describe("Counterparty data options", () => {
  it("encodes sorted key:flag pairs", () => {
    const options = createCounterpartyDataOptions({ name: false, identifier: true, compliance: true });
    const encoded = encodeCounterpartyDataOptions(options);
    expect(encoded).toBe("compliance:1,identifier:1,name:0");
    expect(decodeCounterpartyDataOptions(encoded)).toEqual(options);
  });
});

// ---------------------------------------------------------------------------
// Pay request
// ---------------------------------------------------------------------------
const payerCompliance: CompliancePayerData = {
  utxos: ["utxo1"],
  nodePubKey: "02abc",
  kycStatus: "VERIFIED",
  encryptedTravelRuleInfo: "deadbeef",
  travelRuleFormat: { type: "IVMS", version: "101.2023" },
  utxoCallback: "https://vasp1.example/api/uma/utxoCallback?txid=1",
  signature: "",
  signatureNonce: "Nonce1",
  signatureTimestamp: 1700000000,
};

describe("Pay request", () => {
  const v1: UmaPayRequestV1 = {
    layout: "v1",
    amount: 100,
    sendingCurrencyCode: "USD",
    receivingCurrencyCode: "EUR",
    payerData: {
      identifier: "$Alice@VASP1.example",
      name: "Alice",
      compliance: payerCompliance,
      extra: { loyaltyId: "L-1" },
    },
    requestedPayeeData: createCounterpartyDataOptions({ identifier: true }),
    comment: "thanks",
    settlement: { layer: "ln", assetIdentifier: "BTC" },
  };

  it("round-trips the V1 layout through JSON", () => {
    const json = JSON.parse(payRequestToJsonString(v1));
    expect(json.amount).toBe("100.USD");
    expect(json.convert).toBe("EUR");
    expect(json.payerData.loyaltyId).toBe("L-1");
    expect(json.payerData.compliance.travelRuleFormat).toBe("IVMS@101.2023");
    expect(parsePayRequest(json)).toEqual(v1);
  });

  it("round-trips the V1 layout through query parameters", () => {
    const params = new URLSearchParams(payRequestToQueryParams(v1));
    expect(payRequestFromQueryParams(params)).toEqual(v1);
  });

  it("decodes a currency key as the V0 layout", () => {
    const v0: PayRequestV0 = {
      layout: "v0",
      currencyCode: "USD",
      amount: 1000,
      payerData: { identifier: "$alice@vasp1.example", compliance: payerCompliance },
    };
    const decoded = parsePayRequest(payRequestToJsonString(v0));
    expect(decoded).toEqual(v0);
    expect(receivingCurrencyCodeOf(decoded)).toBe("USD");
  });

  it("parses the amount string", () => {
    expect(parseAmountString("100.USD")).toEqual({ amount: 100, sendingCurrencyCode: "USD" });
    expect(parseAmountString("100")).toEqual({ amount: 100 });
    for (const bad of ["abc", "100.", "-5", "1e3.USD"]) {
      expect(captureError(() => parseAmountString(bad))).toMatchObject({
        code: UmaErrorCode.PARSE_PAYREQ_REQUEST_ERROR,
      });
    }
  });

  it("lower-cases the V1 payload but not the V0 payload", () => {
    expect(text(payRequestSignablePayload(v1))).toBe("$alice@vasp1.example|nonce1|1700000000");
    const v0: PayRequestV0 = {
      layout: "v0",
      currencyCode: "USD",
      amount: 1,
      payerData: { identifier: "$Alice@VASP1.example", compliance: payerCompliance },
    };
    expect(text(payRequestSignablePayload(v0))).toBe("$Alice@VASP1.example|Nonce1|1700000000");
  });

  it("signs the compliance data", () => {
    const signed = signPayRequest(v1, sender.privateKey);
    expect(
      verifySignature(payRequestSignablePayload(signed), signed.payerData.compliance.signature, sender.publicKey),
    ).toBe(true);
  });

  it("names the missing payer fields", () => {
    expect(captureError(() => asUmaPayRequest({ layout: "v1", amount: 1, payerData: { name: "x" } }))).toMatchObject({
      code: UmaErrorCode.MISSING_REQUIRED_UMA_PARAMETERS,
      details: { missingFields: ["payerData.identifier", "payerData.compliance"] },
    });
  });
});

// ---------------------------------------------------------------------------
// Pay response
// ---------------------------------------------------------------------------
describe("Pay response", () => {
  const payerIdentifier = "$alice@vasp1.example";
  const v1: UmaPayReqResponseV1 = {
    layout: "v1",
    encodedInvoice: "lnbc1000n1test",
    converted: { amount: 100, currencyCode: "USD", decimals: 2, multiplier: 34150, fee: 2000 },
    payeeData: {
      identifier: "$bob@vasp2.example",
      compliance: {
        utxos: ["utxo2"],
        nodePubKey: "03def",
        utxoCallback: "https://vasp2.example/api/uma/utxoCallback?txid=1",
        signature: "",
        signatureNonce: "N2",
        signatureTimestamp: 1700000001,
      },
    },
    routes: [],
    disposable: false,
  };

  it("round-trips the V1 layout", () => {
    const signed = signPayReqResponse(v1, payerIdentifier, receiver.privateKey);
    const decoded = asUmaPayReqResponse(parsePayReqResponse(payReqResponseToJsonString(signed)));
    expect(decoded).toEqual(signed);
  });

  it("signs payer, payee, nonce and timestamp lower-cased", () => {
    expect(text(payReqResponseSignablePayload(v1, "$Alice@VASP1.example"))).toBe(
      "$alice@vasp1.example|$bob@vasp2.example|n2|1700000001",
    );
  });

  it("verifies backing signatures over the primary payload", async () => {
    const signed = appendPayReqResponseBackingSignature(
      signPayReqResponse(v1, payerIdentifier, receiver.privateKey),
      payerIdentifier,
      backer.privateKey,
      "backer.example",
    );
    const payload = payReqResponseSignablePayload(signed, payerIdentifier);
    const chain = signed.payeeData.compliance.backingSignatures;
    expect(chain).toHaveLength(1);
    expect(await verifyBackingSignatures(payload, chain, async () => backer.publicKey)).toBe(true);
    expect(await verifyBackingSignatures(payload, chain, async () => sender.publicKey)).toBe(false);
  });

  it("round-trips the V0 layout", () => {
    const v0: PayReqResponseV0 = {
      layout: "v0",
      encodedInvoice: "lnbc1000n1test",
      compliance: {
        utxos: ["utxo2"],
        nodePubKey: "03def",
        utxoCallback: "https://vasp2.example/api/uma/utxoCallback?txid=1",
      },
      paymentInfo: { currencyCode: "USD", decimals: 2, multiplier: 34150, fee: 2000 },
      routes: [],
    };

    const json = JSON.parse(payReqResponseToJsonString(v0));
    expect(json.paymentInfo).toEqual({ currencyCode: "USD", decimals: 2, multiplier: 34150, fee: 2000 });
    expect(parsePayReqResponse(payReqResponseToJsonString(v0))).toEqual(v0);
  });

  it("decodes a top-level compliance key as the V0 layout", () => {
    const decoded = parsePayReqResponse({
      pr: "lnbc1",
      compliance: { utxos: ["u"], utxoCallback: "https://vasp2.example/cb" },
      paymentInfo: { currencyCode: "USD", decimals: 2, multiplier: 34150, exchangeFeesMillisatoshi: 7 },
      routes: [],
    });
    expect(decoded).toEqual({
      layout: "v0",
      encodedInvoice: "lnbc1",
      compliance: { utxos: ["u"], utxoCallback: "https://vasp2.example/cb" },
      paymentInfo: { currencyCode: "USD", decimals: 2, multiplier: 34150, fee: 7 },
      routes: [],
    });
  });

  it("rejects a V0 payment info without a fee", () => {
    expect(
      captureError(() =>
        parsePayReqResponse({
          pr: "lnbc1",
          compliance: {},
          paymentInfo: { currencyCode: "USD", decimals: 2, multiplier: 1 },
        }),
      ),
    ).toMatchObject({ code: UmaErrorCode.PARSE_PAYREQ_RESPONSE_ERROR });
  });

  it("names the missing V1 fields", () => {
    const plain = parsePayReqResponse({ pr: "lnbc1", routes: [] });
    expect(captureError(() => asUmaPayReqResponse(plain))).toMatchObject({
      code: UmaErrorCode.MISSING_REQUIRED_UMA_PARAMETERS,
      details: { missingFields: ["converted", "payeeData"] },
    });
  });
});

// ---------------------------------------------------------------------------
// Post-transaction callback
// ---------------------------------------------------------------------------
describe("Post-transaction callback", () => {
  const callback: UmaPostTransactionCallback = {
    utxos: [{ utxo: "abc:0", amountMsats: 1000 }],
    vaspDomain: "vasp2.example",
    signature: "",
    signatureNonce: "N3",
    signatureTimestamp: 1700000002,
    transactionStatus: "COMPLETED",
  };

  it("round-trips and verifies", () => {
    const signed = signPostTransactionCallback(callback, receiver.privateKey);
    const decoded = asUmaPostTransactionCallback(
      parsePostTransactionCallback(JSON.stringify(postTransactionCallbackToJson(signed))),
    );
    expect(decoded).toEqual(signed);
    expect(text(postTransactionCallbackSignablePayload(decoded))).toBe("N3|1700000002");
    expect(
      verifySignature(postTransactionCallbackSignablePayload(decoded), decoded.signature, receiver.publicKey),
    ).toBe(true);
  });

  it("accepts an unsigned callback in its loose form", () => {
    const loose = parsePostTransactionCallback({ utxos: [] });
    expect(captureError(() => asUmaPostTransactionCallback(loose))).toMatchObject({
      code: UmaErrorCode.MISSING_REQUIRED_UMA_PARAMETERS,
      details: { missingFields: ["vaspDomain", "signature", "signatureNonce", "signatureTimestamp"] },
    });
  });

  it("rejects a malformed body", () => {
    expect(captureError(() => parsePostTransactionCallback({ utxos: "x" }))).toMatchObject({
      code: UmaErrorCode.PARSE_UTXO_CALLBACK_ERROR,
    });
  });
});
