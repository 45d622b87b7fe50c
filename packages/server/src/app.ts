/**
 * UMA reference VASP: Fastify application setup.
 *
 * Exports `buildApp()` for testing and `start()` for production.
 */

import "dotenv/config";

import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import rateLimit from "@fastify/rate-limit";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";

import {
  UmaError,
  UmaErrorCode,
  fromHex,
  generateKeyPair,
  publicKeyFromPrivateKey,
  unixNow,
} from "@umaproto/core";
import { UmaProtocolHelper, type UmaInvoiceCreator, type UmaRequester } from "@umaproto/sdk";

import { config, type ServerConfig } from "./config.js";
import { Database } from "./db/schema.js";
import { SqliteNonceCache } from "./db/nonce-cache.js";
import { SqlitePublicKeyCache } from "./db/pubkey-cache.js";
import { HttpInvoiceCreator, MockInvoiceCreator } from "./services/invoice-creator.js";
import { ReceivingVaspService, type VaspKeys } from "./services/receiver.js";

import wellKnownRoutes from "./routes/well-known.js";
import paymentRoutes from "./routes/payments.js";

// ---------------------------------------------------------------------------
// Fastify type augmentation: decorate instance with services
// ---------------------------------------------------------------------------

declare module "fastify" {
  interface FastifyInstance {
    db: Database;
    nonceCache: SqliteNonceCache;
    receiver: ReceivingVaspService;
    vaspDomain: string;
    startedAt: number;
  }
}

export interface BuildAppOverrides {
  databaseUrl: string;
  skipRateLimit: boolean;
  config: Partial<ServerConfig>;
  requester: UmaRequester;
  invoiceCreator: UmaInvoiceCreator;
  /** Unix seconds */
  now: () => number;
}

// ---------------------------------------------------------------------------
// Keys
// ---------------------------------------------------------------------------

/**
 * Hex keys from the configuration. Missing public keys are derived from the
 * private ones; missing private keys are only tolerated outside production,
 * where an ephemeral pair is generated.
 */
function loadKeys(cfg: ServerConfig, app: FastifyInstance): VaspKeys {
  const pair = (priv: string, pub: string, use: string): [Uint8Array, Uint8Array] => {
    if (priv === "") {
      if (cfg.nodeEnv === "production") {
        throw new Error(`Missing ${use} private key in production`);
      }
      app.log.warn(`No ${use} key configured: generating an ephemeral key pair`);
      const generated = generateKeyPair();
      return [generated.privateKey, generated.publicKey];
    }
    const privateKey = fromHex(priv);
    return [privateKey, pub === "" ? publicKeyFromPrivateKey(privateKey) : fromHex(pub)];
  };

  const [signingPrivateKey, signingPublicKey] = pair(cfg.signingPrivKey, cfg.signingPubKey, "signing");
  const [encryptionPrivateKey, encryptionPublicKey] = pair(
    cfg.encryptionPrivKey,
    cfg.encryptionPubKey,
    "encryption",
  );
  return { signingPrivateKey, signingPublicKey, encryptionPrivateKey, encryptionPublicKey };
}

// ---------------------------------------------------------------------------
// Build application
// ---------------------------------------------------------------------------

export async function buildApp(
  overrides?: Partial<BuildAppOverrides>,
): Promise<FastifyInstance> {
  const cfg: ServerConfig = { ...config, ...overrides?.config };
  const now = overrides?.now ?? unixNow;

  const app = Fastify({
    logger: {
      level: cfg.logLevel,
      ...(cfg.nodeEnv === "development"
        ? { transport: { target: "pino-pretty" } }
        : {}),
    },
  });

  // -----------------------------------------------------------------------
  // Plugins
  // -----------------------------------------------------------------------

  await app.register(cors, {
    origin: true,
    methods: ["GET", "POST", "OPTIONS"],
  });

  if (!overrides?.skipRateLimit) {
    await app.register(rateLimit, {
      global: true,
      max: cfg.rateLimitRead,
      timeWindow: "1 minute",
    });
  }

  // -----------------------------------------------------------------------
  // Database
  // -----------------------------------------------------------------------

  const dbPath = overrides?.databaseUrl ?? cfg.databaseUrl;
  mkdirSync(dirname(dbPath), { recursive: true });

  const db = new Database(dbPath);

  // -----------------------------------------------------------------------
  // Services
  // -----------------------------------------------------------------------

  const nonceCache = new SqliteNonceCache(db, now() - cfg.nonceMaxAgeSeconds);
  const helper = new UmaProtocolHelper({
    publicKeyCache: new SqlitePublicKeyCache(db, { now }),
    requester: overrides?.requester,
    logger: app.log.child({ module: "uma-sdk" }),
    now,
  });

  let invoiceCreator: UmaInvoiceCreator;
  if (overrides?.invoiceCreator) {
    invoiceCreator = overrides.invoiceCreator;
  } else if (cfg.invoiceServiceUrl !== "") {
    invoiceCreator = new HttpInvoiceCreator(cfg.invoiceServiceUrl);
  } else {
    invoiceCreator = new MockInvoiceCreator();
    if (cfg.nodeEnv === "production") {
      app.log.warn(
        "WARNING: Running in production with MockInvoiceCreator: invoices are placeholders. " +
        "Set INVOICE_SERVICE_URL to mint real invoices.",
      );
    }
  }

  const receiver = new ReceivingVaspService({
    db,
    helper,
    nonceCache,
    invoiceCreator,
    keys: loadKeys(cfg, app),
    settings: {
      vaspDomain: cfg.vaspDomain,
      users: cfg.receiverUsers,
      pubKeyTtlSeconds: cfg.pubKeyTtlSeconds,
      usdMsatsPerCent: cfg.usdMsatsPerCent,
      receiverFeesMsats: cfg.receiverFeesMsats,
      minSendableSats: cfg.minSendableSats,
      maxSendableSats: cfg.maxSendableSats,
    },
    log: app.log,
    now,
  });

  // -----------------------------------------------------------------------
  // Decorate Fastify instance
  // -----------------------------------------------------------------------

  app.decorate("db", db);
  app.decorate("nonceCache", nonceCache);
  app.decorate("receiver", receiver);
  app.decorate("vaspDomain", cfg.vaspDomain);
  app.decorate("startedAt", Date.now());

  // -----------------------------------------------------------------------
  // Routes
  // -----------------------------------------------------------------------

  await app.register(wellKnownRoutes);
  await app.register(paymentRoutes);

  // -----------------------------------------------------------------------
  // Global error handler: every failure answers with the UMA error body
  // -----------------------------------------------------------------------

  app.setErrorHandler((error: Error & { statusCode?: number }, _request, reply) => {
    if (error instanceof UmaError) {
      if (error.httpStatus >= 500) app.log.error(error);
      return reply.status(error.httpStatus).send(error.toJSON());
    }

    const statusCode = error.statusCode ?? 500;

    // Rate limit errors from @fastify/rate-limit
    if (statusCode === 429) {
      return reply.status(429).send({
        status: "ERROR",
        reason: "Rate limit exceeded",
        code: "RATE_LIMIT_EXCEEDED",
        retryAfter: error.message,
      });
    }

    // Malformed bodies and other client errors raised by Fastify itself
    if (statusCode >= 400 && statusCode < 500) {
      return reply
        .status(statusCode)
        .send(new UmaError(UmaErrorCode.INVALID_REQUEST_FORMAT, error.message).toJSON());
    }

    app.log.error(error);

    const internal = new UmaError(
      UmaErrorCode.INTERNAL_ERROR,
      cfg.nodeEnv === "production" ? "Internal server error" : error.message,
    );
    return reply.status(500).send(internal.toJSON());
  });

  // -----------------------------------------------------------------------
  // Graceful shutdown: clean up resources on Fastify close
  // -----------------------------------------------------------------------

  app.addHook("onClose", async () => {
    db.close();
  });

  return app;
}

// ---------------------------------------------------------------------------
// Production start
// ---------------------------------------------------------------------------

export async function start(): Promise<void> {
  const app = await buildApp();

  // Purge old nonces and raise the replay floor (every hour)
  const nonceCleanupInterval = setInterval(() => {
    try {
      app.nonceCache.purgeNoncesOlderThan(unixNow() - config.nonceMaxAgeSeconds);
    } catch (err) {
      app.log.error(err, "Error purging old nonces");
    }
  }, 3_600_000);

  app.addHook("onClose", () => {
    clearInterval(nonceCleanupInterval);
  });

  // Graceful shutdown on signals
  const shutdown = async () => {
    app.log.info("Shutting down...");
    await app.close();
    process.exit(0);
  };
  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());

  try {
    await app.listen({ port: config.port, host: "0.0.0.0" });
    app.log.info(
      `UMA VASP ${config.vaspDomain} listening on port ${config.port} (${config.nodeEnv})`,
    );
  } catch (err) {
    app.log.fatal(err);
    process.exit(1);
  }
}

// If this module is the entry point, start the server
const isMain =
  process.argv[1] &&
  (process.argv[1].endsWith("/app.js") ||
    process.argv[1].endsWith("/app.ts") ||
    process.argv[1].endsWith("\\app.js") ||
    process.argv[1].endsWith("\\app.ts"));

if (isMain) {
  void start();
}
