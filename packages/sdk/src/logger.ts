import { pino, type BaseLogger } from "pino";

/** The log methods the SDK calls. A pino or Fastify logger satisfies it. */
export type UmaLogger = Pick<BaseLogger, "debug" | "info" | "warn" | "error">;

/** Logger used when the caller does not pass one. Level from `UMA_LOG_LEVEL`, default "warn". */
export function createDefaultLogger(): UmaLogger {
  return pino({ name: "uma-sdk", level: process.env.UMA_LOG_LEVEL ?? "warn" });
}
