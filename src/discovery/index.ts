/**
 * Discovery Module
 *
 * First pipeline phase: produce candidate URLs for a company website.
 * Uses the crawl backend when an API key is configured, otherwise a static
 * catalog of common business-site paths joined to the site's origin.
 *
 * Usage:
 * const discoverer = new UrlDiscoverer(poller, { maxUrls: 50 });
 * const result = await discoverer.discover('https://acme.com');
 */

import type { CrawlJobPoller } from '../crawl-jobs/index.js';
import { formatErrorMessage, type ErrorCode } from '../errors/index.js';
import { createLogger, noopMetrics } from '../logger/index.js';
import { dedupeKey, isSameDomain, normalizeUrl, registrableDomain } from '../normalizer/index.js';
import type { Logger, Metrics } from '../types/index.js';
import DEFAULT_FALLBACK_PATHS from './fallback-paths.json';

export { DEFAULT_FALLBACK_PATHS };

// ============================================================================
// Type Definitions
// ============================================================================

export type DiscoveryMethod = 'crawl' | 'fallback_patterns';

export interface DiscoverySuccess {
  status: 'success';
  method: DiscoveryMethod;
  urls: string[];
  total_found: number;
  domain: string | null;
  /** Page content the crawl returned inline, keyed by normalized URL */
  pageContent: Map<string, string>;
  note?: string;
}

export interface DiscoveryFailure {
  status: 'failed';
  code: ErrorCode;
  reason: string;
  human_readable_error: string;
  urls: string[];
}

export type DiscoveryResult = DiscoverySuccess | DiscoveryFailure;

export interface UrlDiscovererOptions {
  /** Upper bound on discovered URLs (default: 50) */
  maxUrls?: number;
  /** Path catalog for fallback discovery */
  fallbackPaths?: readonly string[];
  logger?: Logger;
  metrics?: Metrics;
}

const FALLBACK_NOTE = 'URLs generated from common patterns - not all may exist';

// ============================================================================
// Fallback Discovery
// ============================================================================

/**
 * Join a path catalog to the origin of `websiteUrl`, dropping duplicates.
 * Performs no network I/O.
 */
export function discoverFallbackUrls(
  websiteUrl: string,
  paths: readonly string[] = DEFAULT_FALLBACK_PATHS
): string[] {
  const normalized = normalizeUrl(websiteUrl);
  if (!normalized) {
    return [];
  }
  const origin = new URL(normalized).origin;

  const urls: string[] = [];
  for (const path of paths) {
    const url = new URL(path, origin).toString();
    if (!urls.includes(url)) {
      urls.push(url);
    }
  }
  return urls;
}

/**
 * Common sitemap locations for a site
 */
export function sitemapHints(websiteUrl: string): string[] {
  const normalized = normalizeUrl(websiteUrl);
  if (!normalized) {
    return [];
  }
  const origin = new URL(normalized).origin;
  return ['/sitemap.xml', '/sitemap_index.xml', '/sitemap', '/robots.txt'].map((path) =>
    new URL(path, origin).toString()
  );
}

const DISCOVERY_KEYWORDS = [
  'about', 'team', 'leadership', 'executive',
  'service', 'solution', 'product', 'offering',
  'case', 'study', 'portfolio', 'work', 'project',
  'client', 'customer', 'testimonial', 'review',
  'mission', 'vision', 'value', 'culture',
  'investor', 'relation', 'financial',
  'blog', 'insight', 'resource', 'whitepaper',
];

/**
 * Quick check whether a URL path looks worth crawling
 */
export function isValuableDiscoveryUrl(url: string): boolean {
  let path: string;
  try {
    path = new URL(url).pathname.toLowerCase();
  } catch {
    return false;
  }
  if (DISCOVERY_KEYWORDS.some((keyword) => path.includes(keyword))) {
    return true;
  }
  return /\/20\d{2}\//.test(path);
}

// ============================================================================
// Discoverer
// ============================================================================

export class UrlDiscoverer {
  private readonly maxUrls: number;
  private readonly fallbackPaths: readonly string[];
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(
    private readonly poller: CrawlJobPoller,
    options: UrlDiscovererOptions = {}
  ) {
    this.maxUrls = options.maxUrls ?? 50;
    this.fallbackPaths = options.fallbackPaths ?? DEFAULT_FALLBACK_PATHS;
    this.logger = options.logger ?? createLogger('discovery');
    this.metrics = options.metrics ?? noopMetrics;
  }

  /**
   * Discover same-site URLs for a website
   *
   * @param limit - Maximum URLs to return (default and cap: maxUrls)
   */
  async discover(websiteUrl: string, limit?: number): Promise<DiscoveryResult> {
    const normalized = normalizeUrl(websiteUrl);
    if (!normalized) {
      return discoveryFailure('invalid_url', 'invalid_url');
    }

    if (!this.poller.canCrawl) {
      this.logger.info('No crawl API key, using fallback discovery', { url: normalized });
      return this.discoverFallback(normalized);
    }

    const effectiveLimit = Math.max(1, Math.min(limit ?? this.maxUrls, this.maxUrls));
    this.logger.info('Starting URL discovery', { url: normalized, limit: effectiveLimit });

    const outcome = await this.poller.crawl({ url: normalized, limit: effectiveLimit });
    if (!outcome.ok) {
      this.metrics.increment('discovery.failed', { reason: outcome.error.reason });
      this.logger.warn('URL discovery failed', {
        url: normalized,
        code: outcome.error.code,
        reason: outcome.error.reason,
      });
      return discoveryFailure(outcome.error.code, outcome.error.reason);
    }

    const seen = new Set<string>();
    const urls: string[] = [];
    const pageContent = new Map<string, string>();

    for (const page of outcome.pages) {
      const url = normalizeUrl(page.url);
      if (!url || !isSameDomain(url, normalized)) {
        continue;
      }
      const key = dedupeKey(url);
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      urls.push(url);
      if (page.content) {
        pageContent.set(url, page.content);
      }
    }

    const kept = urls.slice(0, effectiveLimit);
    for (const url of urls.slice(effectiveLimit)) {
      pageContent.delete(url);
    }

    this.metrics.gauge('discovery.urls', kept.length);
    this.logger.info('URL discovery completed', {
      url: normalized,
      discovered: kept.length,
      totalFound: urls.length,
      inlineContent: pageContent.size,
    });

    return {
      status: 'success',
      method: 'crawl',
      urls: kept,
      total_found: urls.length,
      domain: registrableDomain(normalized),
      pageContent,
    };
  }

  /**
   * Candidate URLs from the path catalog; the scraper validates them by fetching
   */
  discoverFallback(websiteUrl: string): DiscoveryResult {
    const normalized = normalizeUrl(websiteUrl);
    if (!normalized) {
      return discoveryFailure('invalid_url', 'invalid_url');
    }
    const urls = discoverFallbackUrls(normalized, this.fallbackPaths);
    this.metrics.increment('discovery.fallback');
    this.logger.info('Generated fallback URLs', { url: normalized, count: urls.length });
    return {
      status: 'success',
      method: 'fallback_patterns',
      urls,
      total_found: urls.length,
      domain: registrableDomain(normalized),
      pageContent: new Map(),
      note: FALLBACK_NOTE,
    };
  }
}

/**
 * Failed discovery result with the operator message for `reason`
 */
export function discoveryFailure(code: ErrorCode, reason: string): DiscoveryFailure {
  return {
    status: 'failed',
    code,
    reason,
    human_readable_error: formatErrorMessage(reason),
    urls: [],
  };
}
