/**
 * UMA reference VASP: invoice creator tests.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { createHash } from "node:crypto";
import { HttpInvoiceCreator, MockInvoiceCreator } from "../services/invoice-creator.js";

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("HttpInvoiceCreator", () => {
  it("posts the amount and metadata and returns the encoded invoice", async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      new Response(JSON.stringify({ encodedInvoice: "lnbc1test" }), { status: 200 }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const creator = new HttpInvoiceCreator("http://invoices.internal/create");
    const invoice = await creator.createUmaInvoice(5000, "meta", "$bob@vasp2.example");

    expect(invoice).toBe("lnbc1test");
    expect(fetchMock).toHaveBeenCalledWith("http://invoices.internal/create", {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: '{"amountMsats":5000,"metadata":"meta","receiverIdentifier":"$bob@vasp2.example"}',
    });
  });

  it("throws on a non-2xx response", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue(new Response("nope", { status: 503, statusText: "Service Unavailable" })),
    );

    const creator = new HttpInvoiceCreator("http://invoices.internal/create");
    await expect(creator.createUmaInvoice(5000, "meta")).rejects.toThrow(
      "Invoice service at http://invoices.internal/create failed: HTTP 503 Service Unavailable",
    );
  });

  it("throws when the body carries no invoice", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response("{}", { status: 200 })));

    const creator = new HttpInvoiceCreator("http://invoices.internal/create");
    await expect(creator.createUmaInvoice(5000, "meta")).rejects.toThrow(
      "Invoice service at http://invoices.internal/create returned no encodedInvoice",
    );
  });
});

describe("MockInvoiceCreator", () => {
  it("derives the same placeholder invoice for the same amount and metadata", async () => {
    const creator = new MockInvoiceCreator();
    const hash = createHash("sha256").update("meta").digest("hex").slice(0, 16);

    expect(await creator.createUmaInvoice(1234, "meta", "$bob@vasp2.example")).toBe(`lnbcrt1234mock${hash}`);
    expect(await creator.createUmaInvoice(1234, "meta")).toBe(`lnbcrt1234mock${hash}`);
  });
});
