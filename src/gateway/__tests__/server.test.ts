/**
 * Gateway server tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createGatewayServer, GatewayServer } from '../server.js';
import { generateRequestId, resolveRequestId } from '../requestId.js';
import { createLogger, Logger, LogEntry, silentLogger } from '../logger.js';
import { actorFromRequest } from '../authMiddleware.js';

const NOW = 5_000_000;

describe('Request IDs', () => {
  it('should generate 26-character ULIDs', () => {
    expect(generateRequestId()).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
  });

  it('should reuse a well-formed inbound id', () => {
    expect(resolveRequestId('req-123')).toBe('req-123');
    expect(resolveRequestId(['req-1', 'req-2'])).toBe('req-1');
  });

  it('should replace ids with spaces, control characters or excess length', () => {
    expect(resolveRequestId('has space')).toHaveLength(26);
    expect(resolveRequestId('bad\nid')).toHaveLength(26);
    expect(resolveRequestId('x'.repeat(129))).toHaveLength(26);
    expect(resolveRequestId(undefined)).toHaveLength(26);
  });
});

describe('Gateway Server', () => {
  let gateway: GatewayServer;
  let logs: LogEntry[];
  let logger: Logger;

  beforeEach(() => {
    logs = [];
    logger = createLogger((line) => {
      const entry: LogEntry = JSON.parse(line);
      logs.push(entry);
    });
  });

  afterEach(async () => {
    await gateway.stop();
  });

  describe('request id header', () => {
    beforeEach(() => {
      gateway = createGatewayServer({ logger });
    });

    it('should echo the inbound request id', async () => {
      const response = await gateway.server.inject({
        method: 'GET',
        url: '/health',
        headers: { 'x-request-id': 'req-123' },
      });

      expect(response.headers['x-request-id']).toBe('req-123');
      expect(logs.find((l) => l.event === 'http_request')?.request_id).toBe('req-123');
    });

    it('should generate a request id when none is sent', async () => {
      const response = await gateway.server.inject({ method: 'GET', url: '/health' });
      expect(response.headers['x-request-id']).toHaveLength(26);
    });
  });

  describe('rate limiting', () => {
    it('should set limit headers on every response and refuse past the limit', async () => {
      gateway = createGatewayServer({
        config: { rate_limit: { requests_per_window: 3, window_ms: 60_000 } },
        logger,
        now: () => NOW,
      });

      const remaining: Array<string | string[] | number | undefined> = [];
      for (let i = 0; i < 3; i++) {
        const response = await gateway.server.inject({ method: 'GET', url: '/health' });
        expect(response.statusCode).toBe(200);
        expect(response.headers['x-ratelimit-limit']).toBe('3');
        remaining.push(response.headers['x-ratelimit-remaining']);
      }
      expect(remaining).toEqual(['2', '1', '0']);

      const rejected = await gateway.server.inject({ method: 'GET', url: '/health' });
      expect(rejected.statusCode).toBe(429);
      expect(rejected.json()).toEqual({ error: 'rate limit exceeded' });
      expect(rejected.headers['retry-after']).toBe('61');
      expect(rejected.headers['x-ratelimit-remaining']).toBe('0');
      expect(rejected.headers['x-ratelimit-reset']).toBe('60');
      expect(rejected.headers['x-content-type-options']).toBe('nosniff');

      expect(logs.find((l) => l.event === 'rate_limited')).toMatchObject({
        deny_reason: 'window_exceeded',
        retry_after: 61,
      });
    });

    it('should admit exactly 100 of 1000 concurrent requests from one client', async () => {
      gateway = createGatewayServer({
        config: { rate_limit: { requests_per_window: 100 } },
        logger: silentLogger,
      });

      const responses = await Promise.all(
        Array.from({ length: 1000 }, () => gateway.server.inject({ method: 'GET', url: '/health' }))
      );

      expect(responses.filter((r) => r.statusCode === 200)).toHaveLength(100);
      expect(responses.filter((r) => r.statusCode === 429)).toHaveLength(900);
    });

    it('should refuse new clients once the table is full', async () => {
      gateway = createGatewayServer({
        config: { rate_limit: { max_entries: 1 } },
        logger,
      });

      const first = await gateway.server.inject({ method: 'GET', url: '/health', remoteAddress: '10.0.0.1' });
      const stranger = await gateway.server.inject({ method: 'GET', url: '/health', remoteAddress: '10.0.0.2' });
      const again = await gateway.server.inject({ method: 'GET', url: '/health', remoteAddress: '10.0.0.1' });

      expect(first.statusCode).toBe(200);
      expect(stranger.statusCode).toBe(429);
      expect(stranger.headers['retry-after']).toBe('60');
      expect(again.statusCode).toBe(200);
      expect(logs.find((l) => l.event === 'rate_limited')?.deny_reason).toBe('table_full');
    });

    it('should key on a custom function', async () => {
      gateway = createGatewayServer({
        config: { rate_limit: { requests_per_window: 1 } },
        logger: silentLogger,
        rateLimitKey: (request) => String(request.headers['x-tenant'] ?? 'anonymous'),
      });

      const a = await gateway.server.inject({ method: 'GET', url: '/health', headers: { 'x-tenant': 'a' } });
      const b = await gateway.server.inject({ method: 'GET', url: '/health', headers: { 'x-tenant': 'b' } });
      const a2 = await gateway.server.inject({ method: 'GET', url: '/health', headers: { 'x-tenant': 'a' } });

      expect([a.statusCode, b.statusCode, a2.statusCode]).toEqual([200, 200, 429]);
    });

    it('should not count requests refused by authentication', async () => {
      gateway = createGatewayServer({
        config: {
          auth: { api_keys: [{ key: 'test-key', subject: 'ci', role: 'admin' }] },
          rate_limit: { requests_per_window: 1 },
        },
        logger: silentLogger,
      });

      const denied = await gateway.server.inject({ method: 'GET', url: '/api/v1/whoami' });
      const admitted = await gateway.server.inject({
        method: 'GET',
        url: '/api/v1/whoami',
        headers: { authorization: 'ApiKey test-key' },
      });

      expect(denied.statusCode).toBe(401);
      expect(denied.headers['x-ratelimit-limit']).toBeUndefined();
      expect(admitted.statusCode).toBe(200);
    });
  });

  describe('business routes', () => {
    it('should mount routes under /api/v1 with the audit actor available', async () => {
      gateway = createGatewayServer({
        config: { auth: { api_keys: [{ key: 'test-key', subject: 'ci-bot', role: 'admin' }] } },
        logger: silentLogger,
        routes: (api) => {
          api.post('/upstreams', async (request, reply) => {
            return reply.code(201).send({ created_by: actorFromRequest(request) });
          });
        },
      });

      const response = await gateway.server.inject({
        method: 'POST',
        url: '/api/v1/upstreams',
        headers: { authorization: 'ApiKey test-key' },
        payload: { name: 'billing' },
      });

      expect(response.statusCode).toBe(201);
      expect(response.json()).toEqual({ created_by: 'ci-bot' });
    });

    it('should render malformed JSON bodies as 400', async () => {
      gateway = createGatewayServer({
        logger: silentLogger,
        routes: (api) => {
          api.post('/upstreams', async () => ({ ok: true }));
        },
      });

      const response = await gateway.server.inject({
        method: 'POST',
        url: '/api/v1/upstreams',
        headers: { 'content-type': 'application/json' },
        payload: '{"name":',
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ error: 'invalid request body' });
    });

    it('should hide handler errors behind a generic 500', async () => {
      gateway = createGatewayServer({
        logger,
        routes: (api) => {
          api.get('/threats', async () => {
            throw new Error('database unavailable');
          });
        },
      });

      const response = await gateway.server.inject({ method: 'GET', url: '/api/v1/threats' });

      expect(response.statusCode).toBe(500);
      expect(response.json()).toEqual({ error: 'internal server error' });
      expect(logs.find((l) => l.event === 'request_error')?.error).toBe('database unavailable');
    });
  });

  describe('lifecycle', () => {
    it('should stop the rate limiter sweep on stop()', async () => {
      gateway = createGatewayServer({ logger });
      await gateway.server.ready();
      expect(gateway.rateLimiter.running).toBe(true);

      await gateway.stop();

      expect(gateway.rateLimiter.running).toBe(false);
      expect(logs.filter((l) => l.event === 'server_stopped')).toHaveLength(1);
    });

    it('should stop only once when stop() is called twice', async () => {
      gateway = createGatewayServer({ logger });
      await gateway.server.ready();

      await gateway.stop();
      await gateway.stop();

      expect(logs.filter((l) => l.event === 'server_stopped')).toHaveLength(1);
    });

    it('should expose the frozen effective configuration', async () => {
      gateway = createGatewayServer({ config: { port: 9090 }, logger });
      await gateway.server.ready();

      expect(gateway.config.port).toBe(9090);
      expect(Object.isFrozen(gateway.config.rate_limit)).toBe(true);
    });
  });
});
