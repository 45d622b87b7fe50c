/**
 * UMA Protocol: settlement layer selection.
 */

import { z } from "zod";

/**
 * The sender's chosen settlement method on a pay request. Absent means
 * Lightning with BTC.
 */
export interface SettlementInfo {
  /** Layer identifier, e.g. "ln" or "spark". */
  layer: string;
  /** Asset on that layer, e.g. "BTC". */
  assetIdentifier: string;
}

export const settlementInfoSchema = z.object({
  layer: z.string(),
  assetIdentifier: z.string(),
});
