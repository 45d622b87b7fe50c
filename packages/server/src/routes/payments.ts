/**
 * UMA reference VASP: Payment routes.
 *
 * GET  /api/uma/payreq/:user    Pay request as query parameters
 * POST /api/uma/payreq/:user    Pay request as a JSON body
 * POST /api/uma/utxocallback    Post-transaction callback from the sender
 * GET  /api/uma/payments/:user   Payments received by a user
 * GET  /api/uma/utxocallbacks/:domain  Callbacks recorded from a sending VASP
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { parsePayRequest, payRequestFromQueryParams } from "@umaproto/core";

export default async function paymentRoutes(
  fastify: FastifyInstance,
): Promise<void> {
  // ---------- GET /api/uma/payreq/:user: Pay request (query) ----------

  fastify.get(
    "/api/uma/payreq/:user",
    async (request: FastifyRequest<{ Params: { user: string } }>, reply: FastifyReply) => {
      const { searchParams } = new URL(request.url, "http://localhost");
      const payRequest = payRequestFromQueryParams(searchParams);
      return reply.send(await fastify.receiver.handlePayRequest(request.params.user, payRequest));
    },
  );

  // ---------- POST /api/uma/payreq/:user: Pay request (JSON) ----------

  fastify.post(
    "/api/uma/payreq/:user",
    async (request: FastifyRequest<{ Params: { user: string } }>, reply: FastifyReply) => {
      const payRequest = parsePayRequest(request.body);
      return reply.send(await fastify.receiver.handlePayRequest(request.params.user, payRequest));
    },
  );

  // ---------- POST /api/uma/utxocallback: Post-transaction callback ----------

  fastify.post(
    "/api/uma/utxocallback",
    async (request: FastifyRequest, reply: FastifyReply) => {
      return reply.send(await fastify.receiver.handleUtxoCallback(request.body));
    },
  );

  // ---------- GET /api/uma/payments/:user: Received payments ----------

  fastify.get(
    "/api/uma/payments/:user",
    async (request: FastifyRequest<{ Params: { user: string } }>, reply: FastifyReply) => {
      return reply.send({ payments: fastify.receiver.listPayments(request.params.user) });
    },
  );

  // ---------- GET /api/uma/utxocallbacks/:domain: Recorded callbacks ----------

  fastify.get(
    "/api/uma/utxocallbacks/:domain",
    async (request: FastifyRequest<{ Params: { domain: string } }>, reply: FastifyReply) => {
      return reply.send({ callbacks: fastify.receiver.listUtxoCallbacks(request.params.domain) });
    },
  );
}
