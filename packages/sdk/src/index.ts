/**
 * UMA SDK: protocol helper for sending and receiving VASPs.
 */

export {
  UmaProtocolHelper,
  type UmaProtocolHelperOptions,
  type SignedLnurlpRequestParams,
  type LnurlpResponseParams,
  type PayRequestParams,
  type PayReqResponseParams,
  type PostTransactionCallbackParams,
  type UmaInvoiceParams,
} from "./protocol-helper.js";
export { FetchUmaRequester, type UmaRequester } from "./requester.js";
export type { UmaInvoiceCreator } from "./invoice-creator.js";
export { createDefaultLogger, type UmaLogger } from "./logger.js";
