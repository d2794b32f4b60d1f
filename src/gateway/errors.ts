/**
 * Error responses and error types shared by the gatekeeper stages
 */

import type { FastifyReply } from 'fastify';

/**
 * Error response format
 */
export interface ErrorResponse {
  error: string;
}

/** Single message for every authentication failure */
export const UNAUTHORIZED_MESSAGE = 'invalid or missing credentials';
export const FORBIDDEN_MESSAGE = 'insufficient permissions';
export const RATE_LIMITED_MESSAGE = 'rate limit exceeded';

/**
 * Raised while building configuration
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Terminate a request with a JSON error body
 */
export function sendError(
  reply: FastifyReply,
  status: number,
  message: string
): FastifyReply {
  const body: ErrorResponse = { error: message };
  return reply.code(status).type('application/json; charset=utf-8').send(body);
}
