/**
 * Crawl Jobs Module
 *
 * Drives the backend's asynchronous crawl protocol: submit a job, then poll
 * its status until it completes, fails, or the wall-clock deadline passes.
 *
 * Usage:
 * ```typescript
 * const poller = new CrawlJobPoller(client, { pollIntervalMs: 2000, maxWaitMs: 300000 });
 * const outcome = await poller.crawl({ url: 'https://acme.com/', limit: 50 });
 * ```
 */

import { z } from 'zod';
import { formatErrorMessage, type ErrorCode } from '../errors/index.js';
import type { HttpFailure, RetryingHttpClient } from '../http-client/index.js';
import { systemClock } from '../http-client/index.js';
import { createLogger, noopMetrics } from '../logger/index.js';
import type { Clock, Logger, Metrics } from '../types/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

export type CrawlRequest = Readonly<{
  url: string;
  limit: number;
}>;

export type CrawlJobStatus = 'queued' | 'processing' | 'completed' | 'failed';

export interface CrawlJob {
  id: string;
  status: CrawlJobStatus;
  startedAt: number;
  lastPolledAt: number | null;
}

/**
 * One page from a completed crawl, with inline content when the backend sent any
 */
export interface CrawlPage {
  url: string;
  content: string | null;
}

export type CrawlOutcome =
  | { ok: true; job: CrawlJob; pages: CrawlPage[] }
  | { ok: false; error: HttpFailure; job: CrawlJob | null };

export interface CrawlJobPollerOptions {
  /** Delay between status checks (default: 2000) */
  pollIntervalMs?: number;
  /** Deadline measured from job submission (default: 300000) */
  maxWaitMs?: number;
  clock?: Clock;
  logger?: Logger;
  metrics?: Metrics;
}

// ============================================================================
// Backend Response Shapes
// ============================================================================

const SubmitResponseSchema = z.object({
  success: z.boolean().optional(),
  id: z.string().optional(),
  error: z.string().optional(),
});

const CrawlItemSchema = z.object({
  url: z.string().optional(),
  markdown: z.string().optional(),
  html: z.string().optional(),
  rawHtml: z.string().optional(),
  content: z.string().optional(),
  metadata: z
    .object({
      sourceURL: z.string().optional(),
      url: z.string().optional(),
    })
    .optional(),
});

const StatusResponseSchema = z.object({
  success: z.boolean().optional(),
  status: z.string().optional(),
  completed: z.number().optional(),
  total: z.number().optional(),
  data: z.array(z.unknown()).optional(),
  error: z.string().optional(),
});

type StatusResponse = z.infer<typeof StatusResponseSchema>;

/**
 * Status of a job as seen by one poll; `unknown` covers values the backend
 * may add later and keeps polling.
 */
export type PolledStatus = CrawlJobStatus | 'unknown';

/**
 * Map a backend status string onto the job status union
 */
export function mapBackendStatus(raw: string | undefined): PolledStatus {
  switch (raw?.toLowerCase()) {
    case 'completed':
      return 'completed';
    case 'failed':
    case 'cancelled':
      return 'failed';
    case 'scraping':
    case 'processing':
      return 'processing';
    case 'queued':
    case 'pending':
      return 'queued';
    default:
      return 'unknown';
  }
}

/**
 * Extract pages from a completed crawl's `data` array.
 * The URL comes from metadata.sourceURL, metadata.url, then url; items
 * without one are dropped.
 */
export function parseCrawlPages(data: unknown[]): CrawlPage[] {
  const pages: CrawlPage[] = [];
  for (const raw of data) {
    const parsed = CrawlItemSchema.safeParse(raw);
    if (!parsed.success) {
      continue;
    }
    const item = parsed.data;
    const url = item.metadata?.sourceURL || item.metadata?.url || item.url;
    if (!url) {
      continue;
    }
    const content = item.markdown || item.html || item.rawHtml || item.content || null;
    pages.push({ url, content });
  }
  return pages;
}

function crawlFailure(code: ErrorCode, detail?: string): HttpFailure {
  const message = formatErrorMessage(code, false);
  return { code, reason: code, message: detail ? `${message} (${detail})` : message };
}

// ============================================================================
// Poller
// ============================================================================

export class CrawlJobPoller {
  private readonly pollIntervalMs: number;
  private readonly maxWaitMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(
    private readonly client: RetryingHttpClient,
    options: CrawlJobPollerOptions = {}
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? 2000;
    this.maxWaitMs = options.maxWaitMs ?? 300000;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('crawl-jobs');
    this.metrics = options.metrics ?? noopMetrics;
  }

  /**
   * Whether the backend can be used at all (an API key is configured)
   */
  get canCrawl(): boolean {
    return this.client.hasApiKey;
  }

  /**
   * Submit a crawl and wait for its pages
   */
  async crawl(request: CrawlRequest): Promise<CrawlOutcome> {
    this.logger.info('Submitting crawl job', { url: request.url, limit: request.limit });

    const submitted = await this.client.request('POST', '/crawl', {
      url: request.url,
      limit: request.limit,
      allowExternalLinks: false,
      allowSubdomains: false,
      sitemap: 'include',
      scrapeOptions: {
        formats: ['markdown'],
        onlyMainContent: true,
      },
    });

    if (!submitted.ok) {
      this.metrics.increment('crawl.submit_failed', { reason: submitted.error.reason });
      return { ok: false, error: submitted.error, job: null };
    }

    const body = SubmitResponseSchema.safeParse(submitted.data);
    if (!body.success || body.data.success === false) {
      const detail = body.success ? body.data.error : 'unexpected response shape';
      this.logger.error('Crawl backend rejected job', { url: request.url, detail });
      return { ok: false, error: crawlFailure('api_failure', detail), job: null };
    }
    if (!body.data.id) {
      this.logger.error('Crawl backend returned no job id', { url: request.url });
      return { ok: false, error: crawlFailure('no_job_id'), job: null };
    }

    const job: CrawlJob = {
      id: body.data.id,
      status: 'queued',
      startedAt: this.clock.now(),
      lastPolledAt: null,
    };
    this.metrics.increment('crawl.submitted');
    return this.poll(job);
  }

  private async poll(job: CrawlJob): Promise<CrawlOutcome> {
    const deadline = job.startedAt + this.maxWaitMs;

    for (;;) {
      const response = await this.client.request('GET', `/crawl/${encodeURIComponent(job.id)}`);
      job.lastPolledAt = this.clock.now();

      if (!response.ok) {
        this.logger.warn('Crawl status check failed, will poll again', {
          jobId: job.id,
          reason: response.error.reason,
        });
      } else {
        const parsed = StatusResponseSchema.safeParse(response.data);
        const body: StatusResponse = parsed.success ? parsed.data : {};
        const status = mapBackendStatus(body.status);

        switch (status) {
          case 'completed': {
            job.status = 'completed';
            const pages = parseCrawlPages(body.data ?? []);
            this.metrics.timing('crawl.duration', this.clock.now() - job.startedAt);
            this.logger.info('Crawl job completed', { jobId: job.id, pages: pages.length });
            return { ok: true, job, pages };
          }
          case 'failed':
            job.status = 'failed';
            this.logger.error('Crawl job failed', { jobId: job.id, status: body.status, error: body.error });
            return { ok: false, error: crawlFailure('crawl_failed', body.error), job };
          case 'queued':
          case 'processing':
            job.status = status;
            break;
          case 'unknown':
            this.logger.debug('Unrecognized crawl status, continuing to poll', {
              jobId: job.id,
              status: body.status,
            });
            break;
          default: {
            const unreachable: never = status;
            return unreachable;
          }
        }

        if (body.completed !== undefined) {
          this.metrics.gauge('crawl.progress', body.completed, { job_id: job.id });
        }
      }

      const now = this.clock.now();
      if (now >= deadline) {
        this.logger.error('Crawl job timed out', { jobId: job.id, maxWaitMs: this.maxWaitMs });
        return { ok: false, error: crawlFailure('crawl_timeout'), job };
      }
      await this.clock.sleep(Math.min(this.pollIntervalMs, deadline - now));
    }
  }
}
