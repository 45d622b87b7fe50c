/**
 * UMA Protocol: ECIES encryption of travel-rule payloads.
 */

import { decrypt, encrypt } from "eciesjs";
import { bytesToHex, hexToBytes, utf8ToBytes } from "@noble/hashes/utils";
import { UmaError, UmaErrorCode } from "../types/errors.js";

/**
 * Encrypt free-text travel-rule information for the receiving VASP.
 * @param recipientPublicKey - the receiver's secp256k1 encryption key.
 * @returns hex ciphertext.
 */
export function encryptTravelRuleInfo(plaintext: string, recipientPublicKey: Uint8Array): string {
  try {
    return bytesToHex(encrypt(recipientPublicKey, utf8ToBytes(plaintext)));
  } catch (err) {
    throw new UmaError(UmaErrorCode.INVALID_PUBKEY_FORMAT, "Unable to encrypt with the given public key", undefined, {
      cause: err,
    });
  }
}

export function decryptTravelRuleInfo(ciphertextHex: string, privateKey: Uint8Array): string {
  try {
    const plaintext = decrypt(privateKey, hexToBytes(ciphertextHex));
    return new TextDecoder().decode(plaintext);
  } catch (err) {
    throw new UmaError(UmaErrorCode.INVALID_INPUT, "Unable to decrypt travel rule info", undefined, {
      cause: err,
    });
  }
}
