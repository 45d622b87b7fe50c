/**
 * UMA Protocol: public-key extraction from PEM X.509 certificates.
 */

import { X509Certificate } from "node:crypto";
import { UmaError, UmaErrorCode } from "../types/errors.js";

/** Turns a PEM certificate (or chain, leaf first) into raw public-key bytes. */
export type CertificateKeyExtractor = (pem: string) => Uint8Array;

const UNCOMPRESSED_POINT_LENGTH = 65;

/**
 * Default extractor backed by Node's X.509 parser. The leaf certificate must
 * carry an EC key; its SPKI DER ends with the uncompressed point.
 */
export const nodeCertificateKeyExtractor: CertificateKeyExtractor = (pem) => {
  let cert: X509Certificate;
  try {
    cert = new X509Certificate(pem);
  } catch (err) {
    throw new UmaError(UmaErrorCode.CERT_CHAIN_INVALID, "Unable to parse X.509 certificate", undefined, {
      cause: err,
    });
  }

  const key = cert.publicKey;
  if (key.asymmetricKeyType !== "ec") {
    throw new UmaError(
      UmaErrorCode.INVALID_PUBKEY_FORMAT,
      `Certificate key type ${key.asymmetricKeyType ?? "unknown"} is not EC`,
    );
  }
  const spki = key.export({ type: "spki", format: "der" });
  const point = new Uint8Array(spki.subarray(spki.length - UNCOMPRESSED_POINT_LENGTH));
  if (point[0] !== 0x04) {
    throw new UmaError(UmaErrorCode.INVALID_PUBKEY_FORMAT, "Certificate key is not an uncompressed EC point");
  }
  return point;
};
