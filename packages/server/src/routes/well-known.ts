/**
 * UMA reference VASP: Well-known and health routes.
 *
 * GET /.well-known/lnurlpubkey     This VASP's signing and encryption keys
 * GET /.well-known/lnurlp/:user    Lnurlp request (UMA or plain LNURL)
 * GET /health                      Health check
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { UMA_VERSION_STRING } from "@umaproto/core";

export default async function wellKnownRoutes(
  fastify: FastifyInstance,
): Promise<void> {
  // ---------- GET /.well-known/lnurlpubkey: Public keys ----------

  fastify.get(
    "/.well-known/lnurlpubkey",
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply
        .header("cache-control", "public, max-age=300")
        .send(fastify.receiver.getPubKeyResponse());
    },
  );

  // ---------- GET /.well-known/lnurlp/:user: Lnurlp request ----------

  fastify.get(
    "/.well-known/lnurlp/:user",
    async (request: FastifyRequest<{ Params: { user: string } }>, reply: FastifyReply) => {
      // receiverAddress comes from the Host header.
      const url = `${request.protocol}://${request.hostname}${request.url}`;
      return reply.send(await fastify.receiver.handleLnurlp(url));
    },
  );

  // ---------- GET /health: Health check ----------

  fastify.get(
    "/health",
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const uptimeSeconds = Math.floor((Date.now() - fastify.startedAt) / 1000);

      return reply.send({
        status: "ok",
        uma_version: UMA_VERSION_STRING,
        vasp_domain: fastify.vaspDomain,
        payments_count: fastify.db.getPaymentCount(),
        nonces_count: fastify.db.getNonceCount(),
        uptime_seconds: uptimeSeconds,
      });
    },
  );
}
