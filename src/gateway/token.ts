/**
 * Compact HS256 bearer tokens: validation and issuing
 *
 * Validation steps run in a fixed order and stop at the first failure:
 * structure, header, algorithm, signature, claims, exp, nbf, iss, sub.
 */

import { createHmac, timingSafeEqual } from 'crypto';

/** The only MAC scheme accepted */
export const TOKEN_ALGORITHM = 'HS256';

/**
 * Identity claims carried by a token
 */
export interface IdentityClaims {
  /** Subject (user or service id), never empty on a valid token */
  sub: string;
  /** Role, empty string means "no role" */
  role: string;
  /** Issued-at, epoch seconds (0 = unset) */
  iat: number;
  /** Expires-at, epoch seconds (0 = unset) */
  exp: number;
  /** Not-before, epoch seconds (0 = unset) */
  nbf: number;
  iss: string;
  jti?: string;
}

export type TokenFailureReason =
  | 'malformed'
  | 'unsupported_algorithm'
  | 'bad_signature'
  | 'expired'
  | 'not_yet_valid'
  | 'issuer_mismatch'
  | 'missing_subject';

export type TokenValidationResult =
  | { ok: true; claims: IdentityClaims }
  | { ok: false; reason: TokenFailureReason; detail: string };

export interface ValidateTokenOptions {
  /** Shared HMAC secret */
  secret: string;
  /** Expected issuer; empty skips the check */
  issuer?: string;
  /** Current time in epoch seconds */
  now?: number;
}

export interface IssueTokenOptions {
  secret: string;
  subject: string;
  role?: string;
  issuer?: string;
  /** Lifetime in seconds */
  ttlSeconds: number;
  /** Current time in epoch seconds */
  now?: number;
  jti?: string;
}

const SEGMENT_PATTERN = /^[A-Za-z0-9_-]*$/;

function fail(reason: TokenFailureReason, detail: string): TokenValidationResult {
  return { ok: false, reason, detail };
}

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

function encodeSegment(value: unknown): string {
  return Buffer.from(JSON.stringify(value), 'utf8').toString('base64url');
}

function decodeSegment(segment: string): unknown {
  return JSON.parse(Buffer.from(segment, 'base64url').toString('utf8'));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sign(signingInput: string, secret: string): Buffer {
  return createHmac('sha256', secret).update(signingInput).digest();
}

/**
 * Read a numeric claim; absent means 0
 */
function numericClaim(payload: Record<string, unknown>, name: string): number | null {
  const value = payload[name];
  if (value === undefined || value === null) return 0;
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function stringClaim(payload: Record<string, unknown>, name: string): string | null {
  const value = payload[name];
  if (value === undefined || value === null) return '';
  return typeof value === 'string' ? value : null;
}

function parseClaims(payload: unknown): IdentityClaims | null {
  if (!isRecord(payload)) return null;

  const sub = stringClaim(payload, 'sub');
  const role = stringClaim(payload, 'role');
  const iss = stringClaim(payload, 'iss');
  const iat = numericClaim(payload, 'iat');
  const exp = numericClaim(payload, 'exp');
  const nbf = numericClaim(payload, 'nbf');
  if (sub === null || role === null || iss === null || iat === null || exp === null || nbf === null) {
    return null;
  }

  const claims: IdentityClaims = { sub, role, iat, exp, nbf, iss };
  const jti = payload.jti;
  if (typeof jti === 'string' && jti !== '') {
    claims.jti = jti;
  } else if (jti !== undefined && jti !== null && jti !== '') {
    return null;
  }
  return claims;
}

/**
 * Parse and verify a compact HS256 token
 */
export function validateToken(
  token: string,
  options: ValidateTokenOptions
): TokenValidationResult {
  const segments = token.split('.');
  if (segments.length !== 3) {
    return fail('malformed', `expected 3 segments, got ${segments.length}`);
  }
  const [headerSegment, payloadSegment, signatureSegment] = segments;
  if (!segments.every((s) => SEGMENT_PATTERN.test(s))) {
    return fail('malformed', 'segment is not base64url');
  }

  let header: unknown;
  try {
    header = decodeSegment(headerSegment);
  } catch {
    return fail('malformed', 'header is not JSON');
  }
  if (!isRecord(header)) {
    return fail('malformed', 'header is not an object');
  }

  const alg = header.alg;
  // "none" is refused on its own, before any signature work
  if (typeof alg === 'string' && alg.toLowerCase() === 'none') {
    return fail('unsupported_algorithm', 'algorithm "none" is not permitted');
  }
  if (alg !== TOKEN_ALGORITHM) {
    return fail('unsupported_algorithm', `unsupported algorithm: ${String(alg)}`);
  }

  if (options.secret === '') {
    return fail('bad_signature', 'no signing secret configured');
  }

  const expected = sign(`${headerSegment}.${payloadSegment}`, options.secret);
  const supplied = Buffer.from(signatureSegment, 'base64url');
  if (supplied.length !== expected.length || !timingSafeEqual(supplied, expected)) {
    return fail('bad_signature', 'signature mismatch');
  }

  let payload: unknown;
  try {
    payload = decodeSegment(payloadSegment);
  } catch {
    return fail('malformed', 'claims are not JSON');
  }
  const claims = parseClaims(payload);
  if (!claims) {
    return fail('malformed', 'claims have unexpected types');
  }

  const now = options.now ?? nowSeconds();

  if (claims.exp > 0 && now > claims.exp) {
    return fail('expired', `expired at ${claims.exp}, now ${now}`);
  }
  if (claims.nbf > 0 && now < claims.nbf) {
    return fail('not_yet_valid', `not valid before ${claims.nbf}, now ${now}`);
  }
  if (options.issuer && claims.iss !== options.issuer) {
    return fail('issuer_mismatch', `issuer ${JSON.stringify(claims.iss)} does not match`);
  }
  if (claims.sub === '') {
    return fail('missing_subject', 'sub claim is empty');
  }

  return { ok: true, claims };
}

/**
 * Create a signed HS256 token for service-to-service calls and tooling
 */
export function issueToken(options: IssueTokenOptions): string {
  const now = options.now ?? nowSeconds();
  const claims: IdentityClaims = {
    sub: options.subject,
    role: options.role ?? '',
    iat: now,
    exp: now + options.ttlSeconds,
    nbf: now,
    iss: options.issuer ?? '',
  };
  if (options.jti) {
    claims.jti = options.jti;
  }

  const signingInput = `${encodeSegment({ alg: TOKEN_ALGORITHM, typ: 'JWT' })}.${encodeSegment(claims)}`;
  const signature = sign(signingInput, options.secret).toString('base64url');
  return `${signingInput}.${signature}`;
}
