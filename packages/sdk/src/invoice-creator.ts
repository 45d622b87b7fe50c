/**
 * Creates the Lightning invoice a receiving VASP returns in its pay response.
 * Implemented by the VASP against its own node or payment provider.
 */
export interface UmaInvoiceCreator {
  /**
   * @param amountMsats - invoice amount in millisatoshis.
   * @param metadata - hashed into the invoice's description-hash field.
   * @param receiverIdentifier - the receiving user, when known.
   * @returns the encoded (BOLT-11) invoice.
   */
  createUmaInvoice(amountMsats: number, metadata: string, receiverIdentifier?: string): Promise<string>;
}
