/**
 * Unit tests for the HTTP Client Module
 * Rate limiting, circuit breaking, backoff and the retrying client
 */

import { describe, test, expect } from '@jest/globals';
import {
  CircuitBreaker,
  RateLimiter,
  RetryingHttpClient,
  computeBackoffDelay,
  type RetryingHttpClientOptions,
} from '../../src/http-client/index.js';
import {
  createFakeAdapter,
  createFakeClock,
  createMockLogger,
  createMockMetrics,
  createSequenceAdapter,
  type FakeAdapter,
  type FakeClock,
} from '../helpers.js';

function createClient(
  adapter: FakeAdapter,
  clock: FakeClock,
  overrides: Partial<RetryingHttpClientOptions> = {}
): RetryingHttpClient {
  return new RetryingHttpClient({
    apiKey: 'test-key',
    baseUrl: 'https://crawler.test/v2',
    maxRetries: 3,
    baseDelayMs: 1000,
    maxDelayMs: 60000,
    clock,
    random: () => 0.5,
    logger: createMockLogger(),
    adapter,
    ...overrides,
  });
}

describe('HTTP Client Module', () => {
  describe('RateLimiter', () => {
    test('should admit up to the limit without waiting', async () => {
      const clock = createFakeClock();
      const limiter = new RateLimiter({ maxRequests: 3, clock });

      await limiter.acquire();
      await limiter.acquire();
      await limiter.acquire();

      expect(clock.sleeps).toEqual([]);
      expect(limiter.pending()).toBe(3);
    });

    test('should block the extra request until the oldest ages out of the window', async () => {
      const clock = createFakeClock();
      const limiter = new RateLimiter({ maxRequests: 3, windowMs: 60000, clock });

      await limiter.acquire();
      await limiter.acquire();
      await limiter.acquire();
      clock.advance(10000);
      await limiter.acquire();

      expect(clock.sleeps).toEqual([50000]);
      expect(clock.now()).toBe(60000);
      expect(limiter.pending()).toBe(1);
    });

    test('should serialize concurrent callers', async () => {
      const clock = createFakeClock();
      const limiter = new RateLimiter({ maxRequests: 2, clock });

      await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()]);

      expect(clock.sleeps).toEqual([60000]);
      expect(limiter.pending()).toBe(1);
    });

    test('should admit everything when disabled', async () => {
      const clock = createFakeClock();
      const limiter = new RateLimiter({ maxRequests: 1, enabled: false, clock });

      for (let i = 0; i < 5; i++) {
        await limiter.acquire();
      }

      expect(clock.sleeps).toEqual([]);
      expect(limiter.pending()).toBe(0);
    });
  });

  describe('CircuitBreaker', () => {
    test('should open after exactly five consecutive failures', () => {
      const breaker = new CircuitBreaker({ clock: createFakeClock(), logger: createMockLogger() });

      for (let i = 0; i < 4; i++) {
        breaker.recordFailure();
      }
      expect(breaker.isOpen()).toBe(false);

      breaker.recordFailure();
      expect(breaker.isOpen()).toBe(true);
    });

    test('should reset the streak on success', () => {
      const breaker = new CircuitBreaker({ clock: createFakeClock(), logger: createMockLogger() });

      for (let i = 0; i < 4; i++) {
        breaker.recordFailure();
      }
      breaker.recordSuccess();
      for (let i = 0; i < 4; i++) {
        breaker.recordFailure();
      }

      expect(breaker.isOpen()).toBe(false);
      expect(breaker.snapshot()).toEqual({ consecutiveFailures: 4, isOpen: false, openedAt: null });
    });

    test('should close after the cool-down and reopen on the next failure', () => {
      const clock = createFakeClock(1000);
      const breaker = new CircuitBreaker({ cooldownMs: 60000, clock, logger: createMockLogger() });

      for (let i = 0; i < 5; i++) {
        breaker.recordFailure();
      }
      expect(breaker.snapshot()).toEqual({ consecutiveFailures: 5, isOpen: true, openedAt: 1000 });

      clock.advance(59999);
      expect(breaker.isOpen()).toBe(true);

      clock.advance(1);
      expect(breaker.isOpen()).toBe(false);
      expect(breaker.snapshot().consecutiveFailures).toBe(5);

      breaker.recordFailure();
      expect(breaker.isOpen()).toBe(true);
    });
  });

  describe('computeBackoffDelay()', () => {
    test('should double per attempt without jitter at the midpoint', () => {
      const mid = () => 0.5;
      expect(computeBackoffDelay(0, 1000, 60000, mid)).toBe(1000);
      expect(computeBackoffDelay(1, 1000, 60000, mid)).toBe(2000);
      expect(computeBackoffDelay(3, 1000, 60000, mid)).toBe(8000);
    });

    test('should cap at the maximum delay', () => {
      expect(computeBackoffDelay(10, 1000, 60000, () => 0.5)).toBe(60000);
    });

    test('should apply at most 25% jitter either way', () => {
      expect(computeBackoffDelay(2, 1000, 60000, () => 0)).toBe(3000);
      expect(computeBackoffDelay(2, 1000, 60000, () => 0.75)).toBe(4500);
    });

    test('should stay within [0, capped * 1.25] for any random value', () => {
      for (let attempt = 0; attempt <= 8; attempt++) {
        for (const r of [0, 0.1, 0.5, 0.9, 0.999999]) {
          const delay = computeBackoffDelay(attempt, 500, 30000, () => r);
          const capped = Math.min(500 * 2 ** attempt, 30000);
          expect(delay).toBeGreaterThanOrEqual(0);
          expect(delay).toBeLessThanOrEqual(capped * 1.25);
        }
      }
    });
  });

  describe('RetryingHttpClient', () => {
    test('should return data on success and send the bearer token', async () => {
      const clock = createFakeClock();
      const adapter = createFakeAdapter(() => ({ status: 200, data: { success: true, id: 'job-1' } }));
      const client = createClient(adapter, clock);

      const result = await client.request('POST', '/crawl', { url: 'https://acme.com/' });

      expect(result).toEqual({ ok: true, status: 200, data: { success: true, id: 'job-1' }, attempts: 1 });
      expect(adapter.requests).toEqual([
        {
          method: 'POST',
          url: '/crawl',
          body: { url: 'https://acme.com/' },
          authorization: 'Bearer test-key',
        },
      ]);
    });

    test('should omit the authorization header without an API key', async () => {
      const adapter = createFakeAdapter(() => ({ status: 200, data: {} }));
      const client = createClient(adapter, createFakeClock(), { apiKey: null });

      await client.request('GET', '/crawl/abc');

      expect(client.hasApiKey).toBe(false);
      expect(adapter.requests[0]?.authorization).toBeNull();
    });

    test('should retry server errors with exponential backoff', async () => {
      const clock = createFakeClock();
      const adapter = createSequenceAdapter([{ status: 503 }, { status: 502 }, { status: 200, data: 'ok' }]);
      const client = createClient(adapter, clock);

      const result = await client.request('GET', '/crawl/abc');

      expect(result).toEqual({ ok: true, status: 200, data: 'ok', attempts: 3 });
      expect(clock.sleeps).toEqual([1000, 2000]);
      expect(client.circuitState().consecutiveFailures).toBe(0);
    });

    test('should give up after maxRetries and report the last failure once to the breaker', async () => {
      const clock = createFakeClock();
      const adapter = createSequenceAdapter([{ status: 429 }]);
      const client = createClient(adapter, clock, { maxRetries: 2 });

      const result = await client.request('POST', '/scrape', { url: 'https://acme.com/' });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.attempts).toBe(3);
        expect(result.error).toEqual({
          code: 'rate_limited',
          status: 429,
          reason: 'http_429',
          message: 'Rate limit exceeded. The API is temporarily throttling requests.',
        });
      }
      expect(adapter.requests).toHaveLength(3);
      expect(clock.sleeps).toEqual([1000, 2000]);
      expect(client.circuitState().consecutiveFailures).toBe(1);
    });

    test('should not retry client errors', async () => {
      const clock = createFakeClock();
      const adapter = createSequenceAdapter([{ status: 402 }]);
      const client = createClient(adapter, clock);

      const result = await client.request('POST', '/scrape', {});

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.attempts).toBe(1);
        expect(result.error.code).toBe('http_error');
        expect(result.error.reason).toBe('http_402');
        expect(result.error.status).toBe(402);
      }
      expect(clock.sleeps).toEqual([]);
    });

    test('should classify timeouts', async () => {
      const adapter = createFakeAdapter(() => ({ fail: 'timeout' }));
      const client = createClient(adapter, createFakeClock(), { maxRetries: 1 });

      const result = await client.request('GET', '/crawl/abc');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toEqual({
          code: 'request_timeout',
          reason: 'request_timeout',
          message: 'Request timeout after multiple retries. The service may be overloaded.',
        });
        expect(result.attempts).toBe(2);
      }
    });

    test('should classify connection failures as network errors', async () => {
      const adapter = createFakeAdapter(() => ({ fail: 'network' }));
      const client = createClient(adapter, createFakeClock(), { maxRetries: 0 });

      const result = await client.request('GET', '/crawl/abc');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('network_error');
        expect(result.error.reason).toBe('http_error');
        expect(result.error.message).toBe('connect ECONNREFUSED');
      }
    });

    test('should rethrow unexpected exceptions', async () => {
      const adapter = createFakeAdapter(() => {
        throw new Error('boom');
      });
      const client = createClient(adapter, createFakeClock());

      await expect(client.request('GET', '/crawl/abc')).rejects.toThrow('boom');
    });

    test('should fail fast once the circuit is open', async () => {
      const clock = createFakeClock();
      const adapter = createSequenceAdapter([{ status: 500 }]);
      const client = createClient(adapter, clock, { maxRetries: 0 });

      for (let i = 0; i < 5; i++) {
        await client.request('POST', '/scrape', {});
      }
      const sixth = await client.request('POST', '/scrape', {});

      expect(adapter.requests).toHaveLength(5);
      expect(sixth).toEqual({
        ok: false,
        attempts: 0,
        error: {
          code: 'circuit_open',
          reason: 'circuit_breaker_open',
          message:
            'Circuit breaker activated due to repeated API failures. Requests are paused to let the service recover.',
        },
      });
    });

    test('should send again after the cool-down', async () => {
      const clock = createFakeClock();
      const adapter = createSequenceAdapter([
        { status: 500 },
        { status: 500 },
        { status: 500 },
        { status: 500 },
        { status: 500 },
        { status: 200, data: 'recovered' },
      ]);
      const client = createClient(adapter, clock, { maxRetries: 0 });

      for (let i = 0; i < 5; i++) {
        await client.request('GET', '/crawl/abc');
      }
      clock.advance(60000);
      const result = await client.request('GET', '/crawl/abc');

      expect(result.ok).toBe(true);
      expect(adapter.requests).toHaveLength(6);
      expect(client.circuitState()).toEqual({ consecutiveFailures: 0, isOpen: false, openedAt: null });
    });

    test('should rate limit calls when an API key is set', async () => {
      const clock = createFakeClock();
      const adapter = createFakeAdapter(() => ({ status: 200, data: {} }));
      const client = createClient(adapter, clock, { requestsPerMinute: 2 });

      await client.request('GET', '/a');
      await client.request('GET', '/b');
      await client.request('GET', '/c');

      expect(clock.sleeps).toEqual([60000]);
    });

    test('should not rate limit without an API key', async () => {
      const clock = createFakeClock();
      const adapter = createFakeAdapter(() => ({ status: 200, data: {} }));
      const client = createClient(adapter, clock, { apiKey: null, requestsPerMinute: 1 });

      await client.request('GET', '/a');
      await client.request('GET', '/b');
      await client.request('GET', '/c');

      expect(clock.sleeps).toEqual([]);
    });

    test('should record retry and success metrics', async () => {
      const metrics = createMockMetrics();
      const adapter = createSequenceAdapter([{ status: 500 }, { status: 200, data: {} }]);
      const client = createClient(adapter, createFakeClock(), { metrics });

      await client.request('GET', '/crawl/abc');

      expect(metrics.names('increment')).toEqual(['http.retry', 'http.success']);
      expect(metrics.names('timing')).toEqual(['http.duration', 'http.duration']);
    });
  });
});
