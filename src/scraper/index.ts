/**
 * Scraper Module
 *
 * Third pipeline phase: fetch and normalize page content for the filtered URLs.
 *
 * Features:
 * - Backend scraping through the shared RetryingHttpClient
 * - Bounded concurrency with a fixed delay before each request
 * - Reuse of page content the crawl already returned inline
 * - Direct-fetch fallback with HTML→markdown conversion when no API key is
 *   configured, or when the backend rejects every URL for lack of credits
 *
 * Usage:
 * ```typescript
 * const scraper = new ContentScraper(client, { maxConcurrent: 3 });
 * const results = await scraper.scrapeUrls(['https://acme.com/about']);
 * ```
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { load } from 'cheerio';
import { z } from 'zod';
import { DEFAULT_SIMPLE_DOMAINS } from '../config/index.js';
import { formatErrorMessage, httpReason } from '../errors/index.js';
import type { HttpFailure, RetryingHttpClient } from '../http-client/index.js';
import { systemClock } from '../http-client/index.js';
import { createLogger, noopMetrics } from '../logger/index.js';
import { registrableDomain } from '../normalizer/index.js';
import type { Clock, Logger, Metrics } from '../types/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

export type ScrapeStatus = 'success' | 'skipped' | 'rate_limited' | 'timeout' | 'error';

/**
 * How content was obtained:
 * - firecrawl: backend /scrape call
 * - crawl_inline: content returned with the crawl job
 * - direct_fetch: plain GET because no API key is configured
 * - fallback_scraping: plain GET after the backend ran out of credits
 */
export type ScrapeMethod = 'firecrawl' | 'crawl_inline' | 'direct_fetch' | 'fallback_scraping';

export type ContentFormat = 'markdown' | 'html' | 'text';

export interface ScrapeResult {
  url: string;
  status: ScrapeStatus;
  content: string;
  reason?: string;
  human_readable_error?: string;
  method?: ScrapeMethod;
  content_length?: number;
  format?: ContentFormat;
}

export interface ContentScraperOptions {
  /** Concurrent in-flight scrapes (default: 3) */
  maxConcurrent?: number;
  /** Delay before each request (default: 500) */
  requestDelayMs?: number;
  /** Timeout for direct fetches (default: 15000) */
  fallbackTimeoutMs?: number;
  /** Domains always eligible for the credits-exhausted fallback */
  simpleDomains?: readonly string[];
  format?: ContentFormat;
  /** Fetch pages directly when no API key is configured (default: true) */
  fallbackWhenNoApiKey?: boolean;
  /** Transport for direct fetches; tests pass an in-process adapter */
  fallbackAdapter?: AxiosAdapter;
  clock?: Clock;
  logger?: Logger;
  metrics?: Metrics;
}

export interface ScrapeBatchOptions {
  /** Content already known for some URLs (e.g. from the crawl), keyed by URL */
  prefetched?: ReadonlyMap<string, string>;
}

// ============================================================================
// Backend Response Shape
// ============================================================================

const ScrapeResponseSchema = z.object({
  success: z.boolean().optional(),
  data: z
    .union([
      z.string(),
      z.object({
        markdown: z.string().optional(),
        content: z.string().optional(),
        text: z.string().optional(),
        html: z.string().optional(),
      }),
    ])
    .optional(),
  content: z.string().optional(),
  markdown: z.string().optional(),
  error: z.string().optional(),
});

function extractContent(body: z.infer<typeof ScrapeResponseSchema>): string {
  if (typeof body.data === 'string') {
    return body.data;
  }
  if (body.data) {
    return body.data.markdown || body.data.content || body.data.text || body.data.html || '';
  }
  return body.content || body.markdown || '';
}

// ============================================================================
// Content Cleanup
// ============================================================================

/**
 * Remove control characters (keeping newlines and tabs), collapse runs of
 * spaces and tabs, and trim
 */
export function cleanText(text: string): string {
  return text
    .replace(/[\x00-\x08\x0b-\x1f\x7f-\x9f]/g, '')
    .replace(/[ \t]+/g, ' ')
    .trim();
}

/**
 * Tidy markdown: collapse blank lines and repeated rules, unwrap empty links,
 * drop empty headers and bullets
 */
export function cleanMarkdown(content: string): string {
  const cleaned = content
    .replace(/\n{3,}/g, '\n\n')
    .replace(/ {2,}/g, ' ')
    .replace(/\[([^\]]+)\]\(\)/g, '$1')
    .replace(/^#{1,6}[ \t]*$/gm, '')
    .replace(/(-{3,}\n){2,}/g, '---\n')
    .replace(/^[*-][ \t]*$/gm, '')
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n');
  return cleaned.replace(/\n{3,}/g, '\n\n').trim();
}

function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Convert an HTML document to simple markdown
 *
 * Scripts, styles and noscript blocks are dropped; headings, paragraphs,
 * line breaks, links and list items are mapped; entities are decoded.
 */
export function htmlToMarkdown(html: string): string {
  const $ = load(html);

  $('script, style, noscript').remove();
  $('br').replaceWith('\n');

  $('a').each((_, element) => {
    const link = $(element);
    const text = link.text().trim();
    const href = link.attr('href');
    link.replaceWith(escapeHtml(href && text ? `[${text}](${href})` : text));
  });

  $('li').each((_, element) => {
    const item = $(element);
    item.replaceWith(escapeHtml(`\n- ${item.text().trim()}`));
  });

  $('h1, h2, h3, h4, h5, h6').each((_, element) => {
    const heading = $(element);
    const level = Number(element.tagName.slice(1));
    heading.replaceWith(escapeHtml(`\n\n${'#'.repeat(level)} ${heading.text().trim()}\n\n`));
  });

  $('p').each((_, element) => {
    const paragraph = $(element);
    paragraph.replaceWith(escapeHtml(`${paragraph.text()}\n\n`));
  });

  const text = $('body').text();
  return text
    .split('\n')
    .map((line) => line.replace(/[ \t]+/g, ' ').trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Post-process successful content for its format
 */
export function postProcessContent(content: string, format: ContentFormat): string {
  if (format !== 'markdown') {
    return content.replace(/\s+/g, ' ').replace(/[\x00-\x1f\x7f-\x9f]/g, '').trim();
  }
  return cleanMarkdown(cleanText(content));
}

// ============================================================================
// Summary
// ============================================================================

export interface ScrapeSummary {
  total: number;
  success: number;
  failed: number;
  success_rate: number;
  empty_content: number;
  short_content: number;
  average_content_length: number;
  issues: string[];
}

/**
 * Success rate and content-quality counts for a batch of results
 */
export function summarizeScrapeResults(results: ScrapeResult[]): ScrapeSummary {
  const successes = results.filter((result) => result.status === 'success');
  const issues: string[] = [];
  let emptyContent = 0;
  let shortContent = 0;
  let totalLength = 0;

  for (const result of successes) {
    const length = result.content.length;
    totalLength += length;
    if (length === 0) {
      emptyContent++;
      issues.push(`Empty content: ${result.url}`);
    } else if (length < 100) {
      shortContent++;
      issues.push(`Very short content (${length} chars): ${result.url}`);
    }
  }

  return {
    total: results.length,
    success: successes.length,
    failed: results.length - successes.length,
    success_rate: results.length > 0 ? Math.round((successes.length / results.length) * 1000) / 10 : 0,
    empty_content: emptyContent,
    short_content: shortContent,
    average_content_length: successes.length > 0 ? Math.round(totalLength / successes.length) : 0,
    issues,
  };
}

// ============================================================================
// Scraper
// ============================================================================

const EXCLUDED_TAGS = ['script', 'style', 'nav', 'footer', 'header'];

const FALLBACK_HEADERS = {
  'User-Agent': 'Mozilla/5.0 (compatible; lead-intel-pipeline/1.0)',
  Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
};

function failedResult(url: string, status: ScrapeStatus, reason: string, method?: ScrapeMethod): ScrapeResult {
  return {
    url,
    status,
    content: '',
    reason,
    human_readable_error: formatErrorMessage(reason),
    ...(method ? { method } : {}),
  };
}

function statusForFailure(error: HttpFailure): ScrapeStatus {
  switch (error.code) {
    case 'rate_limited':
      return 'rate_limited';
    case 'request_timeout':
      return 'timeout';
    default:
      return 'error';
  }
}

/**
 * True when every backend scrape failed on exhausted credits. Once enough 402s
 * open the shared circuit breaker the rest of the batch fails with
 * `circuit_breaker_open`, which counts as the same outage.
 */
function creditsExhausted(results: ScrapeResult[]): boolean {
  const scraped = results.filter((result) => result.method !== 'crawl_inline');
  return (
    scraped.some((result) => result.reason === httpReason(402)) &&
    scraped.every((result) => result.reason === httpReason(402) || result.reason === 'circuit_breaker_open')
  );
}

export class ContentScraper {
  private readonly maxConcurrent: number;
  private readonly requestDelayMs: number;
  private readonly simpleDomains: readonly string[];
  private readonly format: ContentFormat;
  private readonly fallbackWhenNoApiKey: boolean;
  private readonly direct: AxiosInstance;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(
    private readonly client: RetryingHttpClient,
    options: ContentScraperOptions = {}
  ) {
    this.maxConcurrent = Math.max(1, options.maxConcurrent ?? 3);
    this.requestDelayMs = options.requestDelayMs ?? 500;
    this.simpleDomains = options.simpleDomains ?? DEFAULT_SIMPLE_DOMAINS;
    this.format = options.format ?? 'markdown';
    this.fallbackWhenNoApiKey = options.fallbackWhenNoApiKey ?? true;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('scraper');
    this.metrics = options.metrics ?? noopMetrics;

    this.direct = axios.create({
      timeout: options.fallbackTimeoutMs ?? 15000,
      headers: FALLBACK_HEADERS,
      responseType: 'text',
      maxRedirects: 5,
      validateStatus: () => true,
      ...(options.fallbackAdapter ? { adapter: options.fallbackAdapter } : {}),
    });
  }

  /**
   * Scrape one URL through the backend
   */
  async scrapeUrl(url: string): Promise<ScrapeResult> {
    const response = await this.client.request('POST', '/scrape', {
      url,
      formats: [this.format],
      onlyMainContent: true,
      excludeTags: EXCLUDED_TAGS,
      waitFor: 2000,
      timeout: 15000,
    });

    if (!response.ok) {
      this.logger.warn('Scrape failed', { url, reason: response.error.reason });
      return failedResult(url, statusForFailure(response.error), response.error.reason);
    }

    const parsed = ScrapeResponseSchema.safeParse(response.data);
    if (!parsed.success || parsed.data.success === false) {
      this.logger.warn('Scrape backend reported failure', { url });
      return failedResult(url, 'error', 'api_failure');
    }

    return this.successResult(url, extractContent(parsed.data), 'firecrawl');
  }

  /**
   * Scrape a batch of URLs; results are in input order
   */
  async scrapeUrls(urls: string[], options: ScrapeBatchOptions = {}): Promise<ScrapeResult[]> {
    if (urls.length === 0) {
      return [];
    }

    const startTime = this.clock.now();
    const prefetched = options.prefetched ?? new Map<string, string>();
    const useBackend = this.client.hasApiKey;

    if (!useBackend && !this.fallbackWhenNoApiKey) {
      this.logger.warn('No API key configured, skipping scrape', { urls: urls.length });
      return urls.map((url) => failedResult(url, 'skipped', 'no_api_key'));
    }

    this.logger.info('Starting content scraping', {
      urls: urls.length,
      format: this.format,
      mode: useBackend ? 'backend' : 'direct_fetch',
    });

    let results = await this.runPool(urls, async (url) => {
      const inline = prefetched.get(url);
      if (inline !== undefined) {
        return this.successResult(url, inline, 'crawl_inline');
      }
      await this.clock.sleep(this.requestDelayMs);
      return useBackend ? this.scrapeUrl(url) : this.fetchDirect(url, 'direct_fetch');
    });

    if (useBackend && creditsExhausted(results)) {
      results = await this.backfillExhaustedCredits(results);
    }

    const summary = summarizeScrapeResults(results);
    this.metrics.timing('scraper.duration', this.clock.now() - startTime);
    this.metrics.gauge('scraper.success', summary.success);
    this.metrics.gauge('scraper.failed', summary.failed);
    this.logger.info('Scraping complete', {
      success: summary.success,
      failed: summary.failed,
      successRate: summary.success_rate,
    });

    return results;
  }

  /**
   * Simple URLs (allowlisted domain, or at most one path segment) qualify for
   * the credits-exhausted fallback
   */
  isSimpleUrl(url: string): boolean {
    const domain = registrableDomain(url);
    if (domain !== null && this.simpleDomains.includes(domain)) {
      return true;
    }
    try {
      const segments = new URL(url).pathname.split('/').filter((segment) => segment.length > 0);
      return segments.length <= 1;
    } catch {
      return false;
    }
  }

  /**
   * Fetch a page without the backend and convert it to markdown
   */
  async fetchDirect(url: string, method: ScrapeMethod): Promise<ScrapeResult> {
    let status: number;
    let body: unknown;
    try {
      const response = await this.direct.get<unknown>(url);
      status = response.status;
      body = response.data;
    } catch (error) {
      if (!axios.isAxiosError(error)) {
        throw error;
      }
      const timedOut = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
      this.logger.warn('Direct fetch failed', { url, error: error.message });
      return timedOut
        ? failedResult(url, 'timeout', 'request_timeout', method)
        : failedResult(url, 'error', 'http_error', method);
    }

    if (status < 200 || status >= 300) {
      this.logger.warn('Direct fetch returned error status', { url, status });
      return failedResult(url, 'error', httpReason(status), method);
    }

    const html = typeof body === 'string' ? body : '';
    const result = this.successResult(url, htmlToMarkdown(html), method);
    if (result.content.length === 0) {
      return failedResult(url, 'error', 'scrape_error', method);
    }
    return result;
  }

  private async backfillExhaustedCredits(results: ScrapeResult[]): Promise<ScrapeResult[]> {
    const simple = results.filter((result) => result.status !== 'success' && this.isSimpleUrl(result.url));
    if (simple.length === 0) {
      this.logger.warn('All scrapes failed with exhausted credits and no URL qualifies for fallback');
      return results;
    }

    this.logger.warn('All scrapes failed with exhausted credits, fetching simple URLs directly', {
      candidates: simple.length,
    });
    this.metrics.increment('scraper.fallback', { reason: 'http_402' });

    const fallbacks = new Map<string, ScrapeResult>();
    const fetched = await this.runPool(
      simple.map((result) => result.url),
      (url) => this.fetchDirect(url, 'fallback_scraping')
    );
    for (const result of fetched) {
      if (result.status === 'success') {
        fallbacks.set(result.url, result);
      }
    }

    return results.map((result) => fallbacks.get(result.url) ?? result);
  }

  private successResult(url: string, raw: string, method: ScrapeMethod): ScrapeResult {
    const content = postProcessContent(raw, this.format);
    return {
      url,
      status: 'success',
      content,
      method,
      content_length: content.length,
      format: this.format,
    };
  }

  private async runPool(urls: string[], task: (url: string) => Promise<ScrapeResult>): Promise<ScrapeResult[]> {
    const results: ScrapeResult[] = [];
    let nextIndex = 0;

    const spawnWorker = async (): Promise<void> => {
      while (nextIndex < urls.length) {
        const index = nextIndex++;
        const url = urls[index];
        if (url === undefined) {
          break;
        }
        results[index] = await task(url);
      }
    };

    const workers: Promise<void>[] = [];
    for (let i = 0; i < Math.min(this.maxConcurrent, urls.length); i++) {
      workers.push(spawnWorker());
    }
    await Promise.all(workers);
    return results;
  }
}
