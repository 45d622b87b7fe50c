/**
 * UMA reference VASP: Server configuration.
 *
 * Loads environment variables with defaults for local development. Keys are
 * hex-encoded secp256k1 keys; when they are left empty outside production the
 * app generates an ephemeral pair at startup.
 */

export interface ServerConfig {
  /** HTTP port (default 3000) */
  port: number;
  /** "development" | "production" | "test" */
  nodeEnv: string;
  /** Pino log level */
  logLevel: string;

  /** SQLite database file path */
  databaseUrl: string;

  /** Public domain of this VASP, e.g. "vasp2.example" or "localhost:3000" */
  vaspDomain: string;

  /** Hex secp256k1 private key used to sign outgoing messages */
  signingPrivKey: string;
  /** Hex uncompressed public key matching `signingPrivKey` */
  signingPubKey: string;
  /** Hex secp256k1 private key senders encrypt travel-rule info to */
  encryptionPrivKey: string;
  encryptionPubKey: string;

  /** Lifetime announced in `/.well-known/lnurlpubkey` */
  pubKeyTtlSeconds: number;
  /** Nonces older than this are purged and refused */
  nonceMaxAgeSeconds: number;

  /** Endpoint that mints Lightning invoices; empty means the mock creator */
  invoiceServiceUrl: string;
  /** Usernames that can receive payments */
  receiverUsers: string[];

  /** Millisatoshis per cent for the USD currency offered to senders */
  usdMsatsPerCent: number;
  /** Fee charged by this VASP, in millisatoshis */
  receiverFeesMsats: number;
  minSendableSats: number;
  maxSendableSats: number;

  /** Max requests per minute per IP */
  rateLimitRead: number;
}

function envInt(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw === "") return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function envStr(key: string, fallback: string): string {
  const raw = process.env[key];
  return raw !== undefined && raw !== "" ? raw : fallback;
}

function envList(key: string, fallback: string[]): string[] {
  const raw = process.env[key];
  if (raw === undefined || raw === "") return fallback;
  return raw
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry !== "");
}

export const config: ServerConfig = {
  port: envInt("PORT", 3000),
  nodeEnv: envStr("NODE_ENV", "development"),
  logLevel: envStr("LOG_LEVEL", "info"),

  databaseUrl: envStr("DATABASE_URL", "./data/uma-vasp.db"),

  vaspDomain: envStr("VASP_DOMAIN", "localhost:3000"),

  signingPrivKey: envStr("UMA_SIGNING_PRIVKEY", ""),
  signingPubKey: envStr("UMA_SIGNING_PUBKEY", ""),
  encryptionPrivKey: envStr("UMA_ENCRYPTION_PRIVKEY", ""),
  encryptionPubKey: envStr("UMA_ENCRYPTION_PUBKEY", ""),

  pubKeyTtlSeconds: envInt("PUBKEY_TTL_SECONDS", 7 * 24 * 3600),
  nonceMaxAgeSeconds: envInt("NONCE_MAX_AGE_SECONDS", 3600),

  invoiceServiceUrl: envStr("INVOICE_SERVICE_URL", ""),
  receiverUsers: envList("RECEIVER_USERS", ["$bob"]),

  usdMsatsPerCent: envInt("USD_MSATS_PER_CENT", 34_150),
  receiverFeesMsats: envInt("RECEIVER_FEES_MSATS", 2_000),
  minSendableSats: envInt("MIN_SENDABLE_SATS", 1),
  maxSendableSats: envInt("MAX_SENDABLE_SATS", 10_000_000),

  rateLimitRead: envInt("RATE_LIMIT_READ", 100),
};
