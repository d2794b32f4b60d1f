/**
 * Shared Fastify hook shape for the gatekeeper stages
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

/**
 * A stage either returns the reply it sent (ending the request) or nothing
 */
export type GateHook = (
  request: FastifyRequest,
  reply: FastifyReply
) => Promise<FastifyReply | undefined>;
