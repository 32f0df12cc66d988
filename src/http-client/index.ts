/**
 * HTTP Client Module
 *
 * Resilient JSON client for the crawl backend:
 * - Sliding-window rate limiting (RateLimiter)
 * - Failure-streak circuit breaking (CircuitBreaker)
 * - Bounded retries with exponential backoff and jitter
 *
 * Every call resolves to an HttpResult; expected failures (HTTP errors,
 * timeouts, open circuit) never throw.
 *
 * Usage:
 * ```typescript
 * const client = new RetryingHttpClient({ apiKey, baseUrl: 'https://api.firecrawl.dev/v2' });
 * const result = await client.request('POST', '/scrape', { url });
 * if (result.ok) { ... }
 * ```
 */

import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from 'axios';
import type { ErrorCode } from '../errors/index.js';
import { formatErrorMessage, httpReason } from '../errors/index.js';
import { createLogger, noopMetrics } from '../logger/index.js';
import type { Clock, Logger, Metrics } from '../types/index.js';

// ============================================================================
// Clock
// ============================================================================

/**
 * Wall-clock time source backed by Date.now and setTimeout
 */
export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

// ============================================================================
// Rate Limiter
// ============================================================================

export interface RateLimiterOptions {
  /** Requests allowed in one window */
  maxRequests: number;
  /** Window length in milliseconds (default: 60000) */
  windowMs?: number;
  /** Disabled limiters admit every call immediately */
  enabled?: boolean;
  clock?: Clock;
}

/**
 * Rolling-window rate limiter.
 *
 * Callers are admitted one at a time through a promise chain, so the
 * check-and-record step is atomic for every caller sharing the instance.
 */
export class RateLimiter {
  private readonly timestamps: number[] = [];
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly enabled: boolean;
  private readonly clock: Clock;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions) {
    this.maxRequests = options.maxRequests;
    this.windowMs = options.windowMs ?? 60000;
    this.enabled = options.enabled ?? true;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Wait until one more request fits in the window, then record it
   */
  acquire(): Promise<void> {
    if (!this.enabled) {
      return Promise.resolve();
    }
    const admission = this.tail.then(() => this.admit());
    this.tail = admission.then(
      () => undefined,
      () => undefined
    );
    return admission;
  }

  /**
   * Number of requests recorded in the current window
   */
  pending(): number {
    this.evict(this.clock.now());
    return this.timestamps.length;
  }

  private async admit(): Promise<void> {
    for (;;) {
      const now = this.clock.now();
      this.evict(now);
      const oldest = this.timestamps[0];
      if (oldest === undefined || this.timestamps.length < this.maxRequests) {
        this.timestamps.push(now);
        return;
      }
      await this.clock.sleep(oldest + this.windowMs - now);
    }
  }

  private evict(now: number): void {
    while (this.timestamps.length > 0) {
      const oldest = this.timestamps[0];
      if (oldest === undefined || now - oldest < this.windowMs) {
        return;
      }
      this.timestamps.shift();
    }
  }
}

// ============================================================================
// Circuit Breaker
// ============================================================================

export interface CircuitBreakerState {
  consecutiveFailures: number;
  isOpen: boolean;
  openedAt: number | null;
}

export interface CircuitBreakerOptions {
  /** Consecutive failures that open the circuit (default: 5) */
  failureThreshold?: number;
  /** Time the circuit stays open before letting calls through (default: 60000) */
  cooldownMs?: number;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Circuit breaker with time-based recovery.
 *
 * Once the cool-down has passed the circuit closes without resetting the
 * failure streak, so a single failing probe reopens it.
 */
export class CircuitBreaker {
  private consecutiveFailures = 0;
  private open = false;
  private openedAt: number | null = null;
  private readonly failureThreshold: number;
  private readonly cooldownMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: CircuitBreakerOptions = {}) {
    this.failureThreshold = options.failureThreshold ?? 5;
    this.cooldownMs = options.cooldownMs ?? 60000;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('circuit-breaker');
  }

  isOpen(): boolean {
    if (!this.open) {
      return false;
    }
    if (this.openedAt !== null && this.clock.now() - this.openedAt >= this.cooldownMs) {
      this.open = false;
      this.openedAt = null;
      this.logger.info('Circuit breaker cool-down elapsed, allowing requests', {
        consecutiveFailures: this.consecutiveFailures,
      });
      return false;
    }
    return true;
  }

  recordSuccess(): void {
    this.consecutiveFailures = 0;
    this.open = false;
    this.openedAt = null;
  }

  recordFailure(): void {
    this.consecutiveFailures += 1;
    if (!this.open && this.consecutiveFailures >= this.failureThreshold) {
      this.open = true;
      this.openedAt = this.clock.now();
      this.logger.warn('Circuit breaker opened', {
        consecutiveFailures: this.consecutiveFailures,
        cooldownMs: this.cooldownMs,
      });
    }
  }

  snapshot(): CircuitBreakerState {
    return {
      consecutiveFailures: this.consecutiveFailures,
      isOpen: this.open,
      openedAt: this.openedAt,
    };
  }
}

// ============================================================================
// Backoff
// ============================================================================

/** Multiplicative jitter applied to every backoff delay (±25%) */
export const JITTER_RATIO = 0.25;

/**
 * Delay before retry `attempt` (0-based): min(base * 2^attempt, max) with ±25% jitter
 *
 * @param random - Uniform source in [0, 1)
 */
export function computeBackoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  random: () => number = Math.random
): number {
  const capped = Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
  const jitter = (random() * 2 - 1) * JITTER_RATIO;
  return Math.max(0, capped * (1 + jitter));
}

// ============================================================================
// Retrying Client
// ============================================================================

export type HttpMethod = 'GET' | 'POST';

export interface HttpFailure {
  code: ErrorCode;
  /** HTTP status when the backend answered */
  status?: number;
  /** Message-table key: http_<status>, circuit_breaker_open, request_timeout, http_error */
  reason: string;
  message: string;
}

export type HttpResult<T = unknown> =
  | { ok: true; status: number; data: T; attempts: number }
  | { ok: false; error: HttpFailure; attempts: number };

export interface RetryingHttpClientOptions {
  apiKey: string | null;
  baseUrl: string;
  /** Per-request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  /** Retries after the first attempt (default: 3) */
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  requestsPerMinute?: number;
  clock?: Clock;
  random?: () => number;
  logger?: Logger;
  metrics?: Metrics;
  /** Transport override; tests pass an in-process adapter */
  adapter?: AxiosAdapter;
  rateLimiter?: RateLimiter;
  circuitBreaker?: CircuitBreaker;
}

const DEFAULT_HEADERS = {
  'Content-Type': 'application/json',
  Accept: 'application/json',
  'User-Agent': 'lead-intel-pipeline/1.0 (+axios)',
};

type Outcome =
  | { kind: 'success'; status: number; data: unknown }
  | { kind: 'retryable'; failure: HttpFailure }
  | { kind: 'terminal'; failure: HttpFailure };

/**
 * JSON API client wrapping every call in rate limiting, circuit breaking and
 * bounded retries. One instance owns one limiter and one breaker.
 */
export class RetryingHttpClient {
  readonly hasApiKey: boolean;
  private readonly http: AxiosInstance;
  private readonly limiter: RateLimiter;
  private readonly breaker: CircuitBreaker;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly clock: Clock;
  private readonly random: () => number;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(options: RetryingHttpClientOptions) {
    this.hasApiKey = Boolean(options.apiKey);
    this.maxRetries = options.maxRetries ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 1000;
    this.maxDelayMs = options.maxDelayMs ?? 60000;
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? createLogger('http-client');
    this.metrics = options.metrics ?? noopMetrics;

    this.limiter =
      options.rateLimiter ??
      new RateLimiter({
        maxRequests: options.requestsPerMinute ?? 30,
        enabled: this.hasApiKey,
        clock: this.clock,
      });
    this.breaker =
      options.circuitBreaker ?? new CircuitBreaker({ clock: this.clock, logger: this.logger });

    const headers: Record<string, string> = { ...DEFAULT_HEADERS };
    if (options.apiKey) {
      headers['Authorization'] = `Bearer ${options.apiKey}`;
    }

    this.http = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs ?? 30000,
      headers,
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  circuitState(): CircuitBreakerState {
    return this.breaker.snapshot();
  }

  /**
   * Send one JSON request with retries
   *
   * Exceptions other than transport errors (timeouts, connection failures)
   * are rethrown.
   */
  async request(method: HttpMethod, path: string, body?: unknown): Promise<HttpResult> {
    let lastFailure: HttpFailure | null = null;
    let attempts = 0;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      if (this.breaker.isOpen()) {
        this.metrics.increment('http.circuit_open', { path });
        this.logger.warn('Circuit open, failing request without sending', { method, path });
        return { ok: false, error: failure('circuit_open', 'circuit_breaker_open'), attempts };
      }

      await this.limiter.acquire();
      attempts += 1;

      const startTime = this.clock.now();
      const outcome = await this.send(method, path, body);
      this.metrics.timing('http.duration', this.clock.now() - startTime, { method, path });

      if (outcome.kind === 'success') {
        this.breaker.recordSuccess();
        this.metrics.increment('http.success', { method, path });
        return { ok: true, status: outcome.status, data: outcome.data, attempts };
      }

      if (outcome.kind === 'terminal') {
        this.breaker.recordFailure();
        this.metrics.increment('http.failure', { method, path, reason: outcome.failure.reason });
        this.logger.warn('Request failed with terminal error', {
          method,
          path,
          reason: outcome.failure.reason,
        });
        return { ok: false, error: outcome.failure, attempts };
      }

      lastFailure = outcome.failure;
      if (attempt < this.maxRetries) {
        const delayMs = computeBackoffDelay(attempt, this.baseDelayMs, this.maxDelayMs, this.random);
        this.metrics.increment('http.retry', { method, path, reason: outcome.failure.reason });
        this.logger.warn(`Request attempt ${attempt + 1} failed, retrying`, {
          method,
          path,
          reason: outcome.failure.reason,
          delayMs: Math.round(delayMs),
        });
        await this.clock.sleep(delayMs);
      }
    }

    this.breaker.recordFailure();
    const exhausted = lastFailure ?? failure('http_error', 'http_error');
    this.metrics.increment('http.failure', { method, path, reason: exhausted.reason });
    this.logger.error('Request failed after all retries', {
      method,
      path,
      attempts,
      reason: exhausted.reason,
    });
    return { ok: false, error: exhausted, attempts };
  }

  private async send(method: HttpMethod, path: string, body: unknown): Promise<Outcome> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.request<unknown>({ method, url: path, data: body });
    } catch (error) {
      if (!axios.isAxiosError(error)) {
        throw error;
      }
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return { kind: 'retryable', failure: failure('request_timeout', 'request_timeout') };
      }
      return {
        kind: 'retryable',
        failure: { ...failure('network_error', 'http_error'), message: error.message },
      };
    }

    return classifyStatus(response.status, response.data);
  }
}

function classifyStatus(status: number, data: unknown): Outcome {
  if (status >= 200 && status < 300) {
    return { kind: 'success', status, data };
  }
  const reason = httpReason(status);
  if (status === 429) {
    return { kind: 'retryable', failure: { ...failure('rate_limited', reason), status } };
  }
  if (status >= 500) {
    return { kind: 'retryable', failure: { ...failure('http_error', reason), status } };
  }
  return { kind: 'terminal', failure: { ...failure('http_error', reason), status } };
}

function failure(code: ErrorCode, reason: string): HttpFailure {
  return { code, reason, message: formatErrorMessage(reason, false) };
}
