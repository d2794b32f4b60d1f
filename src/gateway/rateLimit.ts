/**
 * Per-key sliding window rate limiting
 *
 * Design:
 * - One table per limiter instance: key → { count, windowStart }
 * - check() reads, decides and writes without yielding to the event loop, so
 *   two requests for the same key can never both see the same count
 * - The table is capped at max_entries; unseen keys are refused once full
 * - A periodic sweep drops entries older than twice the window; stop() ends it
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import { RATE_LIMITED_MESSAGE, sendError } from './errors.js';
import type { Logger } from './logger.js';
import type { GateHook } from './types.js';

/**
 * Rate limit configuration
 */
export interface RateLimitConfig {
  /** Requests admitted per key per window */
  requests_per_window: number;
  /** Window width in milliseconds */
  window_ms: number;
  /** Maximum number of tracked keys */
  max_entries: number;
  /** Sweep interval in milliseconds */
  cleanup_interval_ms: number;
}

/** Default rate limit (100 requests/minute per key) */
export const DEFAULT_RATE_LIMIT_CONFIG: RateLimitConfig = {
  requests_per_window: 100,
  window_ms: 60_000,
  max_entries: 100_000,
  cleanup_interval_ms: 5 * 60_000,
};

/** Retry hint sent when the table is full */
export const TABLE_FULL_RETRY_AFTER_SECONDS = 60;

/**
 * Create rate limit configuration; non-positive values fall back to defaults
 */
export function createRateLimitConfig(
  overrides: Partial<RateLimitConfig> = {}
): RateLimitConfig {
  const pick = (name: keyof RateLimitConfig): number => {
    const value = overrides[name];
    return value !== undefined && Number.isFinite(value) && value > 0
      ? Math.floor(value)
      : DEFAULT_RATE_LIMIT_CONFIG[name];
  };

  return {
    requests_per_window: pick('requests_per_window'),
    window_ms: pick('window_ms'),
    max_entries: pick('max_entries'),
    cleanup_interval_ms: pick('cleanup_interval_ms'),
  };
}

interface RateLimitEntry {
  count: number;
  windowStart: number;
}

export type RateLimitDenyReason = 'window_exceeded' | 'table_full';

/**
 * Outcome of one check, with the values for the X-RateLimit-* headers
 */
export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Seconds until the key's window resets */
  resetSeconds: number;
  /** Set only when refused */
  retryAfterSeconds?: number;
  denyReason?: RateLimitDenyReason;
}

export interface RateLimiterOptions {
  /** Clock in epoch milliseconds (default: Date.now) */
  now?: () => number;
  logger?: Logger;
}

export class RateLimiter {
  private readonly entries = new Map<string, RateLimitEntry>();
  private readonly config: RateLimitConfig;
  private readonly now: () => number;
  private readonly logger?: Logger;
  private sweepTimer: ReturnType<typeof setInterval> | null;

  constructor(config: Partial<RateLimitConfig> = {}, options: RateLimiterOptions = {}) {
    this.config = createRateLimitConfig(config);
    this.now = options.now ?? Date.now;
    this.logger = options.logger;

    this.sweepTimer = setInterval(() => {
      this.sweep();
    }, this.config.cleanup_interval_ms);

    // Don't prevent process exit
    this.sweepTimer.unref();
  }

  /**
   * Number of tracked keys
   */
  get size(): number {
    return this.entries.size;
  }

  /**
   * Whether the sweep is still scheduled
   */
  get running(): boolean {
    return this.sweepTimer !== null;
  }

  /**
   * Count one attempt for a key and decide whether it is admitted
   */
  check(key: string): RateLimitDecision {
    const { requests_per_window: limit, window_ms: windowMs, max_entries: maxEntries } = this.config;
    const now = this.now();
    const windowSeconds = Math.ceil(windowMs / 1000);

    const entry = this.entries.get(key);

    if (!entry || now - entry.windowStart > windowMs) {
      if (!entry && this.entries.size >= maxEntries) {
        return {
          allowed: false,
          limit,
          remaining: 0,
          resetSeconds: windowSeconds,
          retryAfterSeconds: TABLE_FULL_RETRY_AFTER_SECONDS,
          denyReason: 'table_full',
        };
      }

      this.entries.set(key, { count: 1, windowStart: now });
      return {
        allowed: true,
        limit,
        remaining: Math.max(0, limit - 1),
        resetSeconds: windowSeconds,
      };
    }

    entry.count++;
    const elapsed = now - entry.windowStart;
    const left = Math.max(0, windowMs - elapsed);
    const remaining = Math.max(0, limit - entry.count);
    const resetSeconds = Math.ceil(left / 1000);

    if (entry.count > limit) {
      return {
        allowed: false,
        limit,
        remaining,
        resetSeconds,
        retryAfterSeconds: Math.floor(left / 1000) + 1,
        denyReason: 'window_exceeded',
      };
    }

    return { allowed: true, limit, remaining, resetSeconds };
  }

  /**
   * Drop entries whose window started more than two windows ago
   * @returns Number of removed entries
   */
  sweep(): number {
    const staleBefore = this.now() - this.config.window_ms * 2;
    let removed = 0;

    for (const [key, entry] of this.entries) {
      if (entry.windowStart < staleBefore) {
        this.entries.delete(key);
        removed++;
      }
    }

    if (removed > 0) {
      this.logger?.debug({
        event: 'rate_limit_sweep',
        removed,
        remaining_entries: this.entries.size,
      });
    }
    return removed;
  }

  /**
   * Stop the periodic sweep. Safe to call more than once.
   */
  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }
}

/**
 * Derive the rate limit key from a request
 */
export type RateLimitKeyFn = (request: FastifyRequest) => string;

/** Default key: client address */
export const remoteAddressKey: RateLimitKeyFn = (request) => request.ip;

/**
 * Write X-RateLimit-* (and Retry-After when refused) onto a reply
 */
export function applyRateLimitHeaders(reply: FastifyReply, decision: RateLimitDecision): void {
  reply.header('X-RateLimit-Limit', String(decision.limit));
  reply.header('X-RateLimit-Remaining', String(decision.remaining));
  reply.header('X-RateLimit-Reset', String(decision.resetSeconds));
  if (decision.retryAfterSeconds !== undefined) {
    reply.header('Retry-After', String(decision.retryAfterSeconds));
  }
}

/**
 * Create rate limit middleware backed by a limiter
 */
export function createRateLimitMiddleware(
  limiter: RateLimiter,
  logger: Logger,
  keyFn: RateLimitKeyFn = remoteAddressKey
): GateHook {
  return async (
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<FastifyReply | undefined> => {
    const key = keyFn(request);
    const decision = limiter.check(key);

    applyRateLimitHeaders(reply, decision);

    if (decision.allowed) {
      return undefined;
    }

    logger.info({
      event: 'rate_limited',
      request_id: request.id,
      decision: 'deny',
      deny_reason: decision.denyReason,
      subject: request.auth?.subject,
      remote_addr: request.ip,
      retry_after: decision.retryAfterSeconds,
    });
    return sendError(reply, 429, RATE_LIMITED_MESSAGE);
  };
}
