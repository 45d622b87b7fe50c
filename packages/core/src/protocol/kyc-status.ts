/**
 * UMA Protocol: KYC status of a counterparty's user.
 */

export const KYC_STATUSES = ["UNKNOWN", "NOT_VERIFIED", "PENDING", "VERIFIED"] as const;

export type KycStatus = (typeof KYC_STATUSES)[number];

function isKycStatus(raw: string): raw is KycStatus {
  return KYC_STATUSES.some((status) => status === raw);
}

/** Values from newer peers that this side does not know map to UNKNOWN. */
export function parseKycStatus(raw: string): KycStatus {
  return isKycStatus(raw) ? raw : "UNKNOWN";
}
