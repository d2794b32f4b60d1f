/**
 * Authentication middleware for Fastify
 *
 * Behavior:
 * - skip_paths (e.g., /health) → pass through unmodified
 * - otherwise → require "Bearer <token>" or "ApiKey <key>"
 * - every failure → 401 with one generic message
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import { AuthConfig, Identity, authenticate, isSkipPath } from './auth.js';
import { UNAUTHORIZED_MESSAGE, sendError } from './errors.js';
import type { Logger } from './logger.js';
import type { GateHook } from './types.js';

/**
 * Identity bound to a single in-flight request
 */
export type AuthInfo = Identity;

declare module 'fastify' {
  interface FastifyRequest {
    auth?: AuthInfo;
  }
}

/**
 * Request path without the query string
 */
export function requestPath(request: FastifyRequest): string {
  const query = request.url.indexOf('?');
  return query === -1 ? request.url : request.url.slice(0, query);
}

/**
 * Create authentication middleware
 * @param config Auth configuration
 * @param logger Receives allow/deny events at debug level
 */
export function createAuthMiddleware(
  config: AuthConfig,
  logger: Logger
): GateHook {
  return async (
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<FastifyReply | undefined> => {
    if (isSkipPath(config, requestPath(request))) {
      return undefined;
    }

    const result = authenticate(request.headers.authorization, config);

    if (!result.ok) {
      // Note: NEVER log the credential itself
      logger.debug({
        event: 'auth_denied',
        request_id: request.id,
        decision: 'deny',
        deny_reason: result.reason,
        auth_method: result.method,
        remote_addr: request.ip,
        url: request.url,
      });
      return sendError(reply, 401, UNAUTHORIZED_MESSAGE);
    }

    request.auth = result.identity;

    logger.debug({
      event: 'auth_granted',
      request_id: request.id,
      decision: 'allow',
      subject: result.identity.subject,
      role: result.identity.role,
      auth_method: result.identity.method,
      url: request.url,
    });
    return undefined;
  };
}

/**
 * Actor name for audit fields: the bound subject, or "system"
 */
export function actorFromRequest(request: FastifyRequest): string {
  return request.auth?.subject || 'system';
}
