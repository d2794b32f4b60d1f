/**
 * Authentication configuration and credential checking
 *
 * Two schemes share the Authorization header:
 *   Bearer <token>  - HS256 token checked against jwt_secret
 *   ApiKey <key>    - static key checked against api_keys
 */

import { ApiKeyEntry, matchApiKey } from './credentials.js';
import { validateToken } from './token.js';

export type AuthMethod = 'jwt' | 'api_key';

/**
 * Authentication configuration
 */
export interface AuthConfig {
  /** HMAC secret for bearer tokens; empty disables the scheme */
  jwt_secret: string;
  /** Expected "iss" claim; empty skips the check */
  jwt_issuer: string;
  /** Static keys; empty disables the scheme */
  api_keys: readonly ApiKeyEntry[];
  /** Exact paths that bypass authentication */
  skip_paths: readonly string[];
}

/** Default auth configuration (nothing configured) */
export const DEFAULT_AUTH_CONFIG: AuthConfig = {
  jwt_secret: '',
  jwt_issuer: '',
  api_keys: [],
  skip_paths: ['/health'],
};

/**
 * Identity resolved from a credential
 */
export interface Identity {
  subject: string;
  role: string;
  method: AuthMethod;
}

/**
 * Why a credential was refused. Only ever logged, never sent to the client.
 */
export type AuthDenyReason =
  | 'missing_header'
  | 'malformed_header'
  | 'unsupported_scheme'
  | 'jwt_not_configured'
  | 'api_key_not_configured'
  | 'invalid_api_key'
  | `invalid_token:${string}`;

export type AuthResult =
  | { ok: true; identity: Identity }
  | { ok: false; reason: AuthDenyReason; method?: AuthMethod };

/**
 * Whether any scheme is configured
 */
export function isAuthEnabled(config: AuthConfig): boolean {
  return config.jwt_secret !== '' || config.api_keys.length > 0;
}

/**
 * Whether a request path bypasses authentication
 */
export function isSkipPath(config: AuthConfig, path: string): boolean {
  return config.skip_paths.includes(path);
}

/**
 * Resolve an identity from an Authorization header value
 * @param header Raw header value (undefined when absent)
 * @param now Current time in epoch seconds, for token checks
 */
export function authenticate(
  header: string | undefined,
  config: AuthConfig,
  now?: number
): AuthResult {
  if (!header) {
    return { ok: false, reason: 'missing_header' };
  }

  const space = header.indexOf(' ');
  if (space === -1) {
    return { ok: false, reason: 'malformed_header' };
  }
  const scheme = header.slice(0, space).toLowerCase();
  const credential = header.slice(space + 1);

  switch (scheme) {
    case 'bearer': {
      if (config.jwt_secret === '') {
        return { ok: false, reason: 'jwt_not_configured', method: 'jwt' };
      }
      const result = validateToken(credential, {
        secret: config.jwt_secret,
        issuer: config.jwt_issuer,
        now,
      });
      if (!result.ok) {
        return { ok: false, reason: `invalid_token:${result.reason}`, method: 'jwt' };
      }
      return {
        ok: true,
        identity: { subject: result.claims.sub, role: result.claims.role, method: 'jwt' },
      };
    }

    case 'apikey': {
      if (config.api_keys.length === 0) {
        return { ok: false, reason: 'api_key_not_configured', method: 'api_key' };
      }
      const entry = matchApiKey(credential, config.api_keys);
      if (!entry) {
        return { ok: false, reason: 'invalid_api_key', method: 'api_key' };
      }
      return {
        ok: true,
        identity: { subject: entry.subject, role: entry.role, method: 'api_key' },
      };
    }

    default:
      return { ok: false, reason: 'unsupported_scheme' };
  }
}

/**
 * Create auth configuration with defaults
 */
export function createAuthConfig(
  overrides: Partial<AuthConfig> = {}
): AuthConfig {
  return {
    jwt_secret: overrides.jwt_secret ?? DEFAULT_AUTH_CONFIG.jwt_secret,
    jwt_issuer: overrides.jwt_issuer ?? DEFAULT_AUTH_CONFIG.jwt_issuer,
    api_keys: overrides.api_keys ?? DEFAULT_AUTH_CONFIG.api_keys,
    skip_paths: overrides.skip_paths ?? DEFAULT_AUTH_CONFIG.skip_paths,
  };
}
