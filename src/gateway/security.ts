/**
 * Response hardening: fixed security headers, CORS and the body-size guard
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import { ConfigError, sendError } from './errors.js';
import type { Logger } from './logger.js';
import type { GateHook } from './types.js';

/**
 * Security header configuration
 */
export interface SecurityHeadersConfig {
  content_security_policy: string;
  frame_options: string;
  /** Strict-Transport-Security max-age; 0 disables the header */
  hsts_max_age_seconds: number;
}

export const DEFAULT_SECURITY_HEADERS_CONFIG: SecurityHeadersConfig = {
  content_security_policy: "default-src 'none'",
  frame_options: 'DENY',
  hsts_max_age_seconds: 63_072_000, // 2 years
};

/**
 * CORS configuration
 */
export interface CorsConfig {
  /** Allowed origins; ["*"] allows any, [] disables CORS */
  allowed_origins: readonly string[];
  allowed_methods: readonly string[];
  allowed_headers: readonly string[];
  exposed_headers: readonly string[];
  allow_credentials: boolean;
  max_age_seconds: number;
}

export const DEFAULT_CORS_CONFIG: CorsConfig = {
  allowed_origins: [],
  allowed_methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
  allowed_headers: ['Accept', 'Authorization', 'Content-Type', 'X-Request-ID'],
  exposed_headers: [
    'X-Request-ID',
    'X-RateLimit-Limit',
    'X-RateLimit-Remaining',
    'X-RateLimit-Reset',
    'Retry-After',
  ],
  allow_credentials: false,
  max_age_seconds: 86_400,
};

export const WILDCARD_ORIGIN = '*';

/**
 * Create CORS configuration.
 *
 * A wildcard origin always forces allow_credentials off.
 */
export function createCorsConfig(
  overrides: Partial<CorsConfig> = {},
  logger?: Logger
): CorsConfig {
  const config: CorsConfig = {
    ...DEFAULT_CORS_CONFIG,
    ...overrides,
  };

  if (config.allowed_methods.length === 0) {
    config.allowed_methods = DEFAULT_CORS_CONFIG.allowed_methods;
  }
  if (config.allowed_headers.length === 0) {
    config.allowed_headers = DEFAULT_CORS_CONFIG.allowed_headers;
  }
  if (config.max_age_seconds <= 0) {
    config.max_age_seconds = DEFAULT_CORS_CONFIG.max_age_seconds;
  }

  if (config.allowed_origins.includes(WILDCARD_ORIGIN) && config.allow_credentials) {
    config.allow_credentials = false;
    logger?.warn({
      event: 'cors_credentials_disabled',
      reason: 'wildcard origin cannot be combined with credentials',
    });
  }

  return config;
}

export function createSecurityHeadersConfig(
  overrides: Partial<SecurityHeadersConfig> = {}
): SecurityHeadersConfig {
  const config = { ...DEFAULT_SECURITY_HEADERS_CONFIG, ...overrides };
  if (!config.content_security_policy) {
    config.content_security_policy = DEFAULT_SECURITY_HEADERS_CONFIG.content_security_policy;
  }
  if (!config.frame_options) {
    config.frame_options = DEFAULT_SECURITY_HEADERS_CONFIG.frame_options;
  }
  if (config.hsts_max_age_seconds < 0) {
    throw new ConfigError('hsts_max_age_seconds must not be negative');
  }
  return config;
}

/**
 * Build the fixed header set sent on every response
 */
export function buildSecurityHeaders(config: SecurityHeadersConfig): Record<string, string> {
  const headers: Record<string, string> = {
    'X-Content-Type-Options': 'nosniff',
    'X-Frame-Options': config.frame_options,
    'X-XSS-Protection': '0',
    'Content-Security-Policy': config.content_security_policy,
    'Referrer-Policy': 'strict-origin-when-cross-origin',
    'Permissions-Policy': 'geolocation=(), camera=(), microphone=()',
    'Cache-Control': 'no-store',
  };
  if (config.hsts_max_age_seconds > 0) {
    headers['Strict-Transport-Security'] = `max-age=${config.hsts_max_age_seconds}; includeSubDomains`;
  }
  return headers;
}

/**
 * Create the hardening middleware: security headers, then CORS.
 *
 * Requests without an Origin, or from an origin not on the list, get no CORS
 * headers and continue. Allowed preflights (OPTIONS) end here with 204.
 */
export function createSecurityMiddleware(
  headersConfig: SecurityHeadersConfig,
  corsConfig: CorsConfig
): GateHook {
  const securityHeaders = buildSecurityHeaders(headersConfig);

  const wildcard = corsConfig.allowed_origins.includes(WILDCARD_ORIGIN);
  const origins: ReadonlySet<string> = new Set(corsConfig.allowed_origins);
  // Re-checked here so a hand-built config cannot emit "*" with credentials
  const allowCredentials = corsConfig.allow_credentials && !wildcard;
  const methods = corsConfig.allowed_methods.join(', ');
  const allowedHeaders = corsConfig.allowed_headers.join(', ');
  const exposed = corsConfig.exposed_headers.join(', ');
  const maxAge = String(corsConfig.max_age_seconds);

  return async (
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<FastifyReply | undefined> => {
    reply.headers(securityHeaders);

    const origin = request.headers.origin;
    if (!origin) {
      return undefined;
    }
    if (!wildcard && !origins.has(origin)) {
      return undefined;
    }

    if (wildcard) {
      reply.header('Access-Control-Allow-Origin', WILDCARD_ORIGIN);
    } else {
      reply.header('Access-Control-Allow-Origin', origin);
      reply.header('Vary', 'Origin');
    }
    if (allowCredentials) {
      reply.header('Access-Control-Allow-Credentials', 'true');
    }
    if (exposed) {
      reply.header('Access-Control-Expose-Headers', exposed);
    }

    if (request.method === 'OPTIONS') {
      reply.header('Access-Control-Allow-Methods', methods);
      reply.header('Access-Control-Allow-Headers', allowedHeaders);
      reply.header('Access-Control-Max-Age', maxAge);
      return reply.code(204).send();
    }

    return undefined;
  };
}

/** Maximum body limit: 100MB */
export const MAX_BODY_LIMIT = 100 * 1024 * 1024;

/**
 * Parse body limit string to bytes
 * @param limit e.g., "1mb", "512kb", "1024"
 * @throws ConfigError when the value cannot be parsed
 */
export function parseBodyLimit(limit: string): number {
  const match = limit.trim().match(/^(\d+)(kb|mb|gb)?$/i);
  if (!match) {
    throw new ConfigError(`Invalid body size: ${limit}. Use e.g. "1024", "512kb" or "1mb".`);
  }

  const value = parseInt(match[1], 10);
  const unit = (match[2] || '').toLowerCase();

  let bytes: number;
  switch (unit) {
    case 'kb':
      bytes = value * 1024;
      break;
    case 'mb':
      bytes = value * 1024 * 1024;
      break;
    case 'gb':
      bytes = value * 1024 * 1024 * 1024;
      break;
    default:
      bytes = value;
  }

  return Math.min(bytes, MAX_BODY_LIMIT);
}

/**
 * Reject requests whose declared Content-Length exceeds the limit
 */
export function createBodySizeMiddleware(maxBytes: number): GateHook {
  const message = `request body too large (max ${maxBytes} bytes)`;

  return async (
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<FastifyReply | undefined> => {
    const declared = request.headers['content-length'];
    if (declared === undefined) {
      return undefined;
    }
    const length = Number(declared);
    if (Number.isFinite(length) && length > maxBytes) {
      return sendError(reply, 413, message);
    }
    return undefined;
  };
}
