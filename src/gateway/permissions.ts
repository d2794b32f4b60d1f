/**
 * Role checks (default deny)
 *
 * Runs after authentication. A request without a bound role, or with an
 * empty role, is never a member of any allow-list.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import { FORBIDDEN_MESSAGE, sendError } from './errors.js';
import type { Logger } from './logger.js';
import type { GateHook } from './types.js';

/**
 * Check a bound role against an allow-list
 */
export function hasRole(
  allowed: ReadonlySet<string>,
  role: string | undefined
): boolean {
  if (role === undefined || role === '') {
    return false;
  }
  return allowed.has(role);
}

/**
 * Create a route-level preHandler that admits only the given roles
 *
 * @example
 * app.delete('/gateways/:id', { preHandler: requireRole(['admin'], log) }, handler)
 */
export function requireRole(
  roles: readonly string[],
  logger?: Logger
): GateHook {
  const allowed: ReadonlySet<string> = new Set(roles);

  return async (
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<FastifyReply | undefined> => {
    if (hasRole(allowed, request.auth?.role)) {
      return undefined;
    }

    logger?.info({
      event: 'role_denied',
      request_id: request.id,
      decision: 'deny',
      subject: request.auth?.subject,
      role: request.auth?.role,
      url: request.url,
    });
    return sendError(reply, 403, FORBIDDEN_MESSAGE);
  };
}
