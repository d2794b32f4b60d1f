/**
 * Gateway configuration
 *
 * Every object built here is frozen: requests only ever read configuration.
 */

import { AuthConfig, DEFAULT_AUTH_CONFIG, createAuthConfig } from './auth.js';
import { parseApiKeyEntries } from './credentials.js';
import { ConfigError } from './errors.js';
import { LogLevel, Logger, isLogLevel } from './logger.js';
import {
  DEFAULT_RATE_LIMIT_CONFIG,
  RateLimitConfig,
  createRateLimitConfig,
} from './rateLimit.js';
import {
  CorsConfig,
  DEFAULT_CORS_CONFIG,
  DEFAULT_SECURITY_HEADERS_CONFIG,
  SecurityHeadersConfig,
  createCorsConfig,
  createSecurityHeadersConfig,
  parseBodyLimit,
} from './security.js';

export interface GatewayLimits {
  /** Maximum request body size, e.g. "1mb" */
  max_body_size: string;
}

export interface GatewayConfig {
  /** Server host */
  host: string;
  /** Server port */
  port: number;
  /** Minimum log level */
  log_level: LogLevel;
  /** Honour X-Forwarded-For when deriving the client address */
  trust_proxy: boolean;
  limits: GatewayLimits;
  auth: AuthConfig;
  rate_limit: RateLimitConfig;
  cors: CorsConfig;
  security_headers: SecurityHeadersConfig;
}

/**
 * Overrides accepted by createGatewayConfig; nested sections merge over defaults
 */
export interface GatewayConfigOverrides {
  host?: string;
  port?: number;
  log_level?: LogLevel;
  trust_proxy?: boolean;
  limits?: Partial<GatewayLimits>;
  auth?: Partial<AuthConfig>;
  rate_limit?: Partial<RateLimitConfig>;
  cors?: Partial<CorsConfig>;
  security_headers?: Partial<SecurityHeadersConfig>;
}

/** Default gateway limits */
export const DEFAULT_LIMITS: GatewayLimits = {
  max_body_size: '1mb',
};

/** Default gateway configuration */
export const DEFAULT_CONFIG: GatewayConfig = {
  host: '127.0.0.1',
  port: 8085,
  log_level: 'info',
  trust_proxy: false,
  limits: DEFAULT_LIMITS,
  auth: DEFAULT_AUTH_CONFIG,
  rate_limit: DEFAULT_RATE_LIMIT_CONFIG,
  cors: DEFAULT_CORS_CONFIG,
  security_headers: DEFAULT_SECURITY_HEADERS_CONFIG,
};

/**
 * Validate port number
 * Port 0 is allowed (OS assigns available ephemeral port)
 */
function validatePort(port: number): void {
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`Invalid port: ${port}. Must be between 0 and 65535.`);
  }
}

/**
 * Validate host string
 */
function validateHost(host: string): void {
  if (!host || host.trim() === '') {
    throw new ConfigError('Invalid host: host cannot be empty.');
  }
  // Basic format check: reject obviously invalid characters
  if (/[\s<>{}|\\^`]/.test(host)) {
    throw new ConfigError(`Invalid host: ${host}. Contains invalid characters.`);
  }
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Create gateway configuration with overrides
 * @param logger Receives configuration warnings (e.g. CORS normalization)
 */
export function createGatewayConfig(
  overrides: GatewayConfigOverrides = {},
  logger?: Logger
): GatewayConfig {
  if (overrides.port !== undefined) {
    validatePort(overrides.port);
  }
  if (overrides.host !== undefined) {
    validateHost(overrides.host);
  }

  const limits: GatewayLimits = {
    ...DEFAULT_LIMITS,
    ...overrides.limits,
  };
  // Fail at startup rather than on the first request
  parseBodyLimit(limits.max_body_size);

  const config: GatewayConfig = {
    host: overrides.host ?? DEFAULT_CONFIG.host,
    port: overrides.port ?? DEFAULT_CONFIG.port,
    log_level: overrides.log_level ?? DEFAULT_CONFIG.log_level,
    trust_proxy: overrides.trust_proxy ?? DEFAULT_CONFIG.trust_proxy,
    limits,
    auth: createAuthConfig({
      jwt_secret: overrides.auth?.jwt_secret ?? DEFAULT_AUTH_CONFIG.jwt_secret,
      jwt_issuer: overrides.auth?.jwt_issuer ?? DEFAULT_AUTH_CONFIG.jwt_issuer,
      api_keys: [...(overrides.auth?.api_keys ?? DEFAULT_AUTH_CONFIG.api_keys)],
      skip_paths: [...(overrides.auth?.skip_paths ?? DEFAULT_AUTH_CONFIG.skip_paths)],
    }),
    rate_limit: createRateLimitConfig(overrides.rate_limit),
    cors: createCorsConfig(overrides.cors, logger),
    security_headers: createSecurityHeadersConfig(overrides.security_headers),
  };

  return deepFreeze(config);
}

/**
 * Split a comma-separated list, dropping blanks
 */
export function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

function readInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

function readBool(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new ConfigError(`${name} must be a boolean, got "${raw}"`);
}

/**
 * Read PORTCULLIS_* environment variables into configuration overrides
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): GatewayConfigOverrides {
  const overrides: GatewayConfigOverrides = {};

  if (env.PORTCULLIS_HOST) overrides.host = env.PORTCULLIS_HOST;
  const port = readInt(env, 'PORTCULLIS_PORT');
  if (port !== undefined) overrides.port = port;

  const logLevel = env.PORTCULLIS_LOG_LEVEL;
  if (logLevel) {
    if (!isLogLevel(logLevel)) {
      throw new ConfigError(`PORTCULLIS_LOG_LEVEL must be one of debug, info, warn, error`);
    }
    overrides.log_level = logLevel;
  }

  const trustProxy = readBool(env, 'PORTCULLIS_TRUST_PROXY');
  if (trustProxy !== undefined) overrides.trust_proxy = trustProxy;

  const auth: Partial<AuthConfig> = {};
  if (env.PORTCULLIS_JWT_SECRET !== undefined) auth.jwt_secret = env.PORTCULLIS_JWT_SECRET;
  if (env.PORTCULLIS_JWT_ISSUER !== undefined) auth.jwt_issuer = env.PORTCULLIS_JWT_ISSUER;
  if (env.PORTCULLIS_API_KEYS) auth.api_keys = parseApiKeyEntries(splitList(env.PORTCULLIS_API_KEYS));
  if (env.PORTCULLIS_SKIP_PATHS !== undefined) auth.skip_paths = splitList(env.PORTCULLIS_SKIP_PATHS);
  overrides.auth = auth;

  const rateLimit: Partial<RateLimitConfig> = {};
  const limit = readInt(env, 'PORTCULLIS_RATE_LIMIT');
  if (limit !== undefined) rateLimit.requests_per_window = limit;
  const windowMs = readInt(env, 'PORTCULLIS_RATE_WINDOW_MS');
  if (windowMs !== undefined) rateLimit.window_ms = windowMs;
  const maxEntries = readInt(env, 'PORTCULLIS_RATE_MAX_ENTRIES');
  if (maxEntries !== undefined) rateLimit.max_entries = maxEntries;
  const cleanupMs = readInt(env, 'PORTCULLIS_RATE_CLEANUP_MS');
  if (cleanupMs !== undefined) rateLimit.cleanup_interval_ms = cleanupMs;
  overrides.rate_limit = rateLimit;

  const cors: Partial<CorsConfig> = {};
  if (env.PORTCULLIS_CORS_ORIGINS) cors.allowed_origins = splitList(env.PORTCULLIS_CORS_ORIGINS);
  const credentials = readBool(env, 'PORTCULLIS_CORS_CREDENTIALS');
  if (credentials !== undefined) cors.allow_credentials = credentials;
  overrides.cors = cors;

  if (env.PORTCULLIS_MAX_BODY_SIZE) {
    overrides.limits = { max_body_size: env.PORTCULLIS_MAX_BODY_SIZE };
  }

  return overrides;
}

/**
 * Build gateway configuration from the environment
 */
export function loadGatewayConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  logger?: Logger
): GatewayConfig {
  return createGatewayConfig(readEnvOverrides(env), logger);
}
