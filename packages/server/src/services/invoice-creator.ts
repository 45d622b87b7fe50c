/**
 * UMA reference VASP: Lightning invoice creation.
 *
 * HttpInvoiceCreator posts to the VASP's invoice service. MockInvoiceCreator
 * returns placeholder invoices and is used whenever no service is configured.
 */

import { createHash } from "node:crypto";
import { z } from "zod";
import type { UmaInvoiceCreator } from "@umaproto/sdk";

const invoiceServiceResponseSchema = z.object({
  encodedInvoice: z.string().min(1),
});

export class HttpInvoiceCreator implements UmaInvoiceCreator {
  constructor(private serviceUrl: string) {}

  async createUmaInvoice(
    amountMsats: number,
    metadata: string,
    receiverIdentifier?: string,
  ): Promise<string> {
    const response = await fetch(this.serviceUrl, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ amountMsats, metadata, receiverIdentifier }),
    });
    if (!response.ok) {
      throw new Error(
        `Invoice service at ${this.serviceUrl} failed: HTTP ${response.status} ${response.statusText}`,
      );
    }
    const parsed = invoiceServiceResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Invoice service at ${this.serviceUrl} returned no encodedInvoice`);
    }
    return parsed.data.encodedInvoice;
  }
}

export class MockInvoiceCreator implements UmaInvoiceCreator {
  /**
   * Fake invoice of the form `lnbcrt<amount>mock<hash>`, where hash is the
   * first 16 hex chars of sha256(metadata).
   */
  async createUmaInvoice(
    amountMsats: number,
    metadata: string,
    _receiverIdentifier?: string,
  ): Promise<string> {
    const hash = createHash("sha256").update(metadata).digest("hex").slice(0, 16);
    return `lnbcrt${amountMsats}mock${hash}`;
  }
}
