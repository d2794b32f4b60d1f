/**
 * Fastify HTTP server for the control-plane gatekeeper
 *
 * Stage order on every request (onRequest hooks):
 *   request id → security headers / CORS → body size → authentication → rate limit
 * Role checks run per route as preHandlers (see requireRole).
 */

import Fastify, { FastifyError, FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { isAuthEnabled } from './auth.js';
import { actorFromRequest, createAuthMiddleware } from './authMiddleware.js';
import { GatewayConfig, GatewayConfigOverrides, createGatewayConfig } from './config.js';
import { sendError } from './errors.js';
import { createLogger, Logger } from './logger.js';
import {
  RateLimitKeyFn,
  RateLimiter,
  createRateLimitMiddleware,
  remoteAddressKey,
} from './rateLimit.js';
import { REQUEST_ID_HEADER, resolveRequestId } from './requestId.js';
import {
  createBodySizeMiddleware,
  createSecurityMiddleware,
  parseBodyLimit,
} from './security.js';

export const SERVICE_NAME = 'portcullis';

/** Prefix for authenticated business routes */
export const API_PREFIX = '/api/v1';

export interface GatewayServer {
  /** Fastify instance */
  server: FastifyInstance;
  /** Limiter owned by this server */
  rateLimiter: RateLimiter;
  /** Effective configuration */
  config: GatewayConfig;
  /** Start the server */
  start(): Promise<string>;
  /** Stop the server and the limiter's sweep */
  stop(): Promise<void>;
  /** Get server address */
  address(): string | null;
}

/**
 * Options for creating gateway server
 */
export interface GatewayServerOptions {
  /** Configuration (a built GatewayConfig or overrides merged over defaults) */
  config?: GatewayConfigOverrides;
  /** Custom logger */
  logger?: Logger;
  /** Rate limit key (default: client address) */
  rateLimitKey?: RateLimitKeyFn;
  /** Clock for the rate limiter in epoch milliseconds */
  now?: () => number;
  /** Business routes, mounted under /api/v1 */
  routes?: (app: FastifyInstance) => void | Promise<void>;
}

/**
 * Create and configure the gateway server
 */
export function createGatewayServer(options: GatewayServerOptions = {}): GatewayServer {
  const log = options.logger ?? createLogger(console.log, options.config?.log_level ?? 'info');
  const fullConfig = createGatewayConfig(options.config ?? {}, log);
  const bodyLimit = parseBodyLimit(fullConfig.limits.max_body_size);

  const server = Fastify({
    genReqId: (req) => resolveRequestId(req.headers[REQUEST_ID_HEADER]),
    requestIdHeader: false,
    bodyLimit,
    trustProxy: fullConfig.trust_proxy,
    logger: false, // We use our own logger
  });

  const rateLimiter = new RateLimiter(fullConfig.rate_limit, {
    now: options.now,
    logger: log,
  });

  // Echo the request id on every response
  server.addHook('onRequest', async (request: FastifyRequest, reply: FastifyReply) => {
    reply.header(REQUEST_ID_HEADER, request.id);
  });

  server.addHook(
    'onRequest',
    createSecurityMiddleware(fullConfig.security_headers, fullConfig.cors)
  );
  server.addHook('onRequest', createBodySizeMiddleware(bodyLimit));

  if (isAuthEnabled(fullConfig.auth)) {
    server.addHook('onRequest', createAuthMiddleware(fullConfig.auth, log));
  } else {
    log.warn({
      event: 'auth_disabled',
      reason: 'no JWT secret or API keys configured',
    });
  }

  server.addHook(
    'onRequest',
    createRateLimitMiddleware(rateLimiter, log, options.rateLimitKey ?? remoteAddressKey)
  );

  // Log all requests
  server.addHook('onResponse', async (request: FastifyRequest, reply: FastifyReply) => {
    log.info({
      event: 'http_request',
      request_id: request.id,
      subject: request.auth?.subject,
      auth_method: request.auth?.method,
      method: request.method,
      url: request.url,
      status: reply.statusCode,
      latency_ms: Math.round(reply.elapsedTime),
    });
  });

  server.addHook('onClose', async () => {
    rateLimiter.stop();
  });

  server.setErrorHandler((error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    const status = error.statusCode ?? 500;

    if (status === 413) {
      return sendError(reply, 413, `request body too large (max ${bodyLimit} bytes)`);
    }
    if (status >= 400 && status < 500) {
      return sendError(reply, status, 'invalid request body');
    }

    log.error({
      event: 'request_error',
      request_id: request.id,
      url: request.url,
      error: error.message,
    });
    return sendError(reply, 500, 'internal server error');
  });

  server.setNotFoundHandler((_request: FastifyRequest, reply: FastifyReply) => {
    return sendError(reply, 404, 'not found');
  });

  // Health check endpoint (skip path by default)
  server.get('/health', async () => {
    return {
      status: 'ok',
      service: SERVICE_NAME,
    };
  });

  void server.register(
    async (api) => {
      api.get('/whoami', async (request: FastifyRequest) => {
        return {
          subject: actorFromRequest(request),
          role: request.auth?.role ?? '',
          method: request.auth?.method ?? null,
        };
      });

      if (options.routes) {
        await options.routes(api);
      }
    },
    { prefix: API_PREFIX }
  );

  // Graceful shutdown handlers
  let isShuttingDown = false;
  let stopped = false;

  const close = async (): Promise<void> => {
    if (stopped) return;
    stopped = true;
    await server.close();
    log.info({ event: 'server_stopped' });
  };

  const shutdown = async (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    log.info({ event: 'server_shutdown', signal });

    try {
      await close();
      process.exit(0);
    } catch (error) {
      log.error({
        event: 'server_shutdown_error',
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    }
  };

  // Store cleanup functions for later removal
  const signalHandlers = new Map<NodeJS.Signals, () => void>();

  const removeSignalHandlers = () => {
    for (const [signal, handler] of signalHandlers) {
      process.removeListener(signal, handler);
    }
    signalHandlers.clear();
  };

  return {
    server,
    rateLimiter,
    config: fullConfig,

    async start(): Promise<string> {
      // Clear existing signal handlers to prevent memory leak on multiple start() calls
      removeSignalHandlers();

      for (const signal of ['SIGINT', 'SIGTERM'] as const) {
        const handler = () => {
          void shutdown(signal);
        };
        signalHandlers.set(signal, handler);
        process.on(signal, handler);
      }

      await server.listen({
        port: fullConfig.port,
        host: fullConfig.host,
      });

      const addr = this.address();
      log.info({
        event: 'server_started',
        host: fullConfig.host,
        port: fullConfig.port,
        address: addr,
        auth_enabled: isAuthEnabled(fullConfig.auth),
      });

      return addr ?? `http://${fullConfig.host}:${fullConfig.port}`;
    },

    async stop(): Promise<void> {
      removeSignalHandlers();
      await close();
    },

    address(): string | null {
      const addresses = server.addresses();
      if (addresses.length === 0) return null;
      const addr = addresses[0];
      return `http://${addr.address}:${addr.port}`;
    },
  };
}
