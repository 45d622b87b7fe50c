import { bench, describe } from "vitest";
import {
  generateKeyPair,
  invoiceFromBech32,
  invoiceToBech32,
  signInvoice,
  verifyInvoiceSignature,
  type Invoice,
} from "@umaproto/core";

// ---------------------------------------------------------------------------
// Invoice Codec
// ---------------------------------------------------------------------------
describe("Invoice Codec", () => {
  const kp = generateKeyPair();
  const unsigned: Invoice = {
    receiverUma: "$bob@vasp2.example",
    invoiceUUID: "019c0000-0000-7000-8000-000000000001",
    amount: 1000,
    receivingCurrency: { code: "USD", name: "US Dollar", symbol: "$", decimals: 2 },
    expiration: 1700003600,
    isSubjectToTravelRule: true,
    requiredPayerData: { identifier: { mandatory: true }, compliance: { mandatory: true } },
    umaVersion: "1.0",
    commentCharsAllowed: 120,
    kycStatus: "VERIFIED",
    callback: "https://vasp2.example/api/uma/payreq/$bob",
  };
  const signed = signInvoice(unsigned, kp.privateKey);
  const token = invoiceToBech32(signed);

  bench("Sign invoice", () => {
    signInvoice(unsigned, kp.privateKey);
  });

  bench("Verify invoice", () => {
    verifyInvoiceSignature(signed, kp.publicKey);
  });

  bench("Encode to bech32", () => {
    invoiceToBech32(signed);
  });

  bench("Decode from bech32", () => {
    invoiceFromBech32(token);
  });
});
