/**
 * UMA Protocol: counterparty public keys and their cache.
 */

import { z } from "zod";
import { nodeCertificateKeyExtractor, type CertificateKeyExtractor } from "./crypto/certificates.js";
import { fromHex, toHex } from "./crypto/keys.js";
import { parseJsonText, parseWithSchema } from "./protocol/json.js";
import { UmaError, UmaErrorCode } from "./types/errors.js";

/** JSON body served at `/.well-known/lnurlpubkey`. */
export interface PubKeyResponseJson {
  signingCertificate?: string;
  encryptionCertificate?: string;
  signingPubKey?: string;
  encryptionPubKey?: string;
  expirationTimestamp?: number;
}

const pubKeyResponseSchema = z.object({
  signingCertificate: z.string().nullish(),
  encryptionCertificate: z.string().nullish(),
  signingPubKey: z.string().nullish(),
  encryptionPubKey: z.string().nullish(),
  expirationTimestamp: z.number().int().nullish(),
});

/**
 * A VASP's signing and encryption keys. Each key is given either raw or as a
 * PEM certificate; when a certificate is present it wins.
 */
export class PubKeyResponse {
  readonly signingCertificate?: string;
  readonly encryptionCertificate?: string;
  readonly signingPubKey?: Uint8Array;
  readonly encryptionPubKey?: Uint8Array;
  /** Unix seconds after which the keys must be refetched; undefined means no expiry. */
  readonly expirationTimestamp?: number;

  constructor(
    fields: Omit<PubKeyResponseJson, "signingPubKey" | "encryptionPubKey"> & {
      signingPubKey?: Uint8Array;
      encryptionPubKey?: Uint8Array;
    },
    private readonly extractKey: CertificateKeyExtractor = nodeCertificateKeyExtractor,
  ) {
    this.signingCertificate = fields.signingCertificate;
    this.encryptionCertificate = fields.encryptionCertificate;
    this.signingPubKey = fields.signingPubKey;
    this.encryptionPubKey = fields.encryptionPubKey;
    this.expirationTimestamp = fields.expirationTimestamp;
  }

  static fromKeys(
    signingPubKey: Uint8Array,
    encryptionPubKey: Uint8Array,
    expirationTimestamp?: number,
  ): PubKeyResponse {
    return new PubKeyResponse({ signingPubKey, encryptionPubKey, expirationTimestamp });
  }

  static fromCertificates(
    signingCertificate: string,
    encryptionCertificate: string,
    expirationTimestamp?: number,
    extractKey: CertificateKeyExtractor = nodeCertificateKeyExtractor,
  ): PubKeyResponse {
    return new PubKeyResponse({ signingCertificate, encryptionCertificate, expirationTimestamp }, extractKey);
  }

  /**
   * Decode a `/.well-known/lnurlpubkey` body.
   * @throws {UmaError} INVALID_PUBKEY_FORMAT for malformed JSON or hex.
   */
  static fromJson(input: unknown, extractKey: CertificateKeyExtractor = nodeCertificateKeyExtractor): PubKeyResponse {
    const code = UmaErrorCode.INVALID_PUBKEY_FORMAT;
    const value = typeof input === "string" ? parseJsonText(input, code, "public key response") : input;
    const raw = parseWithSchema(pubKeyResponseSchema, value, code, "public key response");
    try {
      return new PubKeyResponse(
        {
          signingCertificate: raw.signingCertificate ?? undefined,
          encryptionCertificate: raw.encryptionCertificate ?? undefined,
          signingPubKey: raw.signingPubKey == null ? undefined : fromHex(raw.signingPubKey),
          encryptionPubKey: raw.encryptionPubKey == null ? undefined : fromHex(raw.encryptionPubKey),
          expirationTimestamp: raw.expirationTimestamp ?? undefined,
        },
        extractKey,
      );
    } catch (err) {
      throw new UmaError(code, "Public keys must be hex encoded", undefined, { cause: err });
    }
  }

  toJSON(): PubKeyResponseJson {
    return {
      signingCertificate: this.signingCertificate,
      encryptionCertificate: this.encryptionCertificate,
      signingPubKey: this.signingPubKey === undefined ? undefined : toHex(this.signingPubKey),
      encryptionPubKey: this.encryptionPubKey === undefined ? undefined : toHex(this.encryptionPubKey),
      expirationTimestamp: this.expirationTimestamp,
    };
  }

  /** @throws {UmaError} INVALID_PUBKEY_FORMAT when neither a certificate nor a raw key is present. */
  getSigningPubKey(): Uint8Array {
    return this.effectiveKey(this.signingCertificate, this.signingPubKey, "signing");
  }

  /** @throws {UmaError} INVALID_PUBKEY_FORMAT when neither a certificate nor a raw key is present. */
  getEncryptionPubKey(): Uint8Array {
    return this.effectiveKey(this.encryptionCertificate, this.encryptionPubKey, "encryption");
  }

  private effectiveKey(certificate: string | undefined, raw: Uint8Array | undefined, use: string): Uint8Array {
    if (certificate !== undefined) return this.extractKey(certificate);
    if (raw !== undefined) return raw;
    throw new UmaError(UmaErrorCode.INVALID_PUBKEY_FORMAT, `No ${use} public key`);
  }
}

/**
 * Per-domain cache of {@link PubKeyResponse}s.
 *
 * Each method runs to completion without awaiting, so a get never observes a
 * half-applied put. Implementations backed by external storage must give the
 * same guarantee.
 */
export interface PublicKeyCache {
  /** Cached keys, or undefined when absent or expired (expired entries are evicted). */
  getPublicKeysForVasp(vaspDomain: string): PubKeyResponse | undefined;
  /** Store keys. Entries already expired are silently dropped. */
  addPublicKeysForVasp(vaspDomain: string, response: PubKeyResponse): void;
  removePublicKeysForVasp(vaspDomain: string): void;
  clear(): void;
}

export interface InMemoryPublicKeyCacheOptions {
  /** Unix seconds; defaults to the wall clock. */
  now?: () => number;
  /** Cache responses without `expirationTimestamp` forever instead of skipping them. */
  allowNonExpiringEntries?: boolean;
}

export const unixNow = (): number => Math.floor(Date.now() / 1000);

export class InMemoryPublicKeyCache implements PublicKeyCache {
  private readonly cache = new Map<string, PubKeyResponse>();
  private readonly now: () => number;
  private readonly allowNonExpiringEntries: boolean;

  constructor(options: InMemoryPublicKeyCacheOptions = {}) {
    this.now = options.now ?? unixNow;
    this.allowNonExpiringEntries = options.allowNonExpiringEntries ?? false;
  }

  getPublicKeysForVasp(vaspDomain: string): PubKeyResponse | undefined {
    const entry = this.cache.get(vaspDomain);
    if (entry === undefined) return undefined;
    if (entry.expirationTimestamp !== undefined && entry.expirationTimestamp <= this.now()) {
      this.cache.delete(vaspDomain);
      return undefined;
    }
    return entry;
  }

  addPublicKeysForVasp(vaspDomain: string, response: PubKeyResponse): void {
    if (response.expirationTimestamp === undefined) {
      if (this.allowNonExpiringEntries) this.cache.set(vaspDomain, response);
      return;
    }
    if (response.expirationTimestamp <= this.now()) return;
    this.cache.set(vaspDomain, response);
  }

  removePublicKeysForVasp(vaspDomain: string): void {
    this.cache.delete(vaspDomain);
  }

  clear(): void {
    this.cache.clear();
  }
}
