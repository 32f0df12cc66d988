/**
 * Pipeline Module
 *
 * Sequences discovery → filtering → scraping for one company website and
 * assembles the WebsiteAnalysis record. Single-URL failures never abort the
 * run; a failed discovery falls back to the input URL alone.
 *
 * Usage:
 * ```typescript
 * const pipeline = createPipeline(loadConfig());
 * const analysis = await pipeline.analyzeWebsite('https://acme.com');
 * ```
 */

import type { AxiosAdapter } from 'axios';
import type { AppConfig } from '../config/index.js';
import { CrawlJobPoller } from '../crawl-jobs/index.js';
import type { DiscoveryMethod, DiscoveryResult } from '../discovery/index.js';
import { UrlDiscoverer, discoveryFailure } from '../discovery/index.js';
import { RetryingHttpClient, systemClock } from '../http-client/index.js';
import { createLogger, errorMessage, noopMetrics } from '../logger/index.js';
import { normalizeUrl } from '../normalizer/index.js';
import { ContentScraper, type ScrapeResult } from '../scraper/index.js';
import type { Clock, Logger, Metrics } from '../types/index.js';
import { filterUrls, type ScoringOptions } from '../url-filter/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

export interface AnalysisStatistics {
  total_discovered: number;
  total_filtered: number;
  total_scraped: number;
  scrape_failures: number;
}

/**
 * Result record for one website; assembled once and not modified afterwards
 */
export interface WebsiteAnalysis {
  discovered_urls: string[];
  filtered_urls: string[];
  filter_reasons: Record<string, string[]>;
  scraped_content: ScrapeResult[];
  statistics: AnalysisStatistics;
  filtered_out_samples: string[];
  discovery_status?: 'success' | 'failed';
  discovery_method?: DiscoveryMethod;
  discovery_reason?: string;
  discovery_note?: string;
  error?: string;
}

export interface PipelineDeps {
  discoverer: UrlDiscoverer;
  scraper: ContentScraper;
  filter?: ScoringOptions & { limit?: number };
  clock?: Clock;
  logger?: Logger;
  metrics?: Metrics;
}

function emptyStatistics(): AnalysisStatistics {
  return { total_discovered: 0, total_filtered: 0, total_scraped: 0, scrape_failures: 0 };
}

// ============================================================================
// Analysis
// ============================================================================

/**
 * Run the three-phase website analysis
 */
export async function analyzeWebsite(websiteUrl: string, deps: PipelineDeps): Promise<WebsiteAnalysis> {
  const clock = deps.clock ?? systemClock;
  const logger = deps.logger ?? createLogger('pipeline');
  const metrics = deps.metrics ?? noopMetrics;
  const startTime = clock.now();

  const normalized = normalizeUrl(websiteUrl);
  if (!normalized) {
    logger.error('Invalid website URL provided', { url: websiteUrl });
    return {
      discovered_urls: [],
      filtered_urls: [],
      filter_reasons: {},
      scraped_content: [],
      statistics: emptyStatistics(),
      filtered_out_samples: [],
      error: 'Invalid URL',
    };
  }

  let discoveredUrls: string[] = [];
  let filteredUrls: string[] = [];
  let filterReasons: Record<string, string[]> = {};
  let filteredOutSamples: string[] = [];
  let scraped: ScrapeResult[] = [];
  const discoveryInfo: Pick<
    WebsiteAnalysis,
    'discovery_status' | 'discovery_method' | 'discovery_reason' | 'discovery_note'
  > = {};
  let failure: string | undefined;

  try {
    logger.info('Phase 1: discovering URLs', { url: normalized });
    let discovery: DiscoveryResult;
    try {
      discovery = await deps.discoverer.discover(normalized);
    } catch (error) {
      logger.error('URL discovery threw', { url: normalized, error: errorMessage(error) });
      discovery = discoveryFailure('discovery_error', 'discovery_error');
    }
    let pageContent = new Map<string, string>();

    if (discovery.status === 'failed') {
      logger.warn('URL discovery failed, continuing with the input URL', {
        url: normalized,
        reason: discovery.reason,
      });
      discoveredUrls = [normalized];
      discoveryInfo.discovery_status = 'failed';
      discoveryInfo.discovery_reason = discovery.reason;
    } else {
      discoveredUrls = discovery.urls;
      pageContent = discovery.pageContent;
      discoveryInfo.discovery_status = 'success';
      discoveryInfo.discovery_method = discovery.method;
      if (discovery.note) {
        discoveryInfo.discovery_note = discovery.note;
      }
    }
    metrics.gauge('pipeline.discovered', discoveredUrls.length);

    logger.info('Phase 2: filtering URLs', { count: discoveredUrls.length });
    const filtered = filterUrls(discoveredUrls, normalized, { ...deps.filter, logger });
    filteredUrls = filtered.urls;
    filterReasons = filtered.reasons;
    filteredOutSamples = filtered.filtered_out_samples;
    metrics.gauge('pipeline.filtered', filteredUrls.length);

    logger.info('Phase 3: scraping URLs', { count: filteredUrls.length });
    scraped = await deps.scraper.scrapeUrls(filteredUrls, { prefetched: pageContent });
  } catch (error) {
    failure = errorMessage(error);
    logger.error('Website analysis failed', { url: normalized, error: failure });
  }

  const statistics: AnalysisStatistics = {
    total_discovered: discoveredUrls.length,
    total_filtered: filteredUrls.length,
    total_scraped: scraped.filter((result) => result.status === 'success').length,
    scrape_failures: scraped.filter((result) => result.status !== 'success').length,
  };
  metrics.gauge('pipeline.scraped', statistics.total_scraped);
  metrics.timing('pipeline.duration', clock.now() - startTime);
  logger.info('Website analysis complete', { url: normalized, ...statistics });

  return {
    discovered_urls: discoveredUrls,
    filtered_urls: filteredUrls,
    filter_reasons: filterReasons,
    scraped_content: scraped,
    statistics,
    filtered_out_samples: filteredOutSamples,
    ...discoveryInfo,
    ...(failure !== undefined ? { error: failure } : {}),
  };
}

// ============================================================================
// Wiring
// ============================================================================

export interface PipelineOverrides {
  clock?: Clock;
  random?: () => number;
  logger?: Logger;
  metrics?: Metrics;
  /** Transport for backend calls */
  adapter?: AxiosAdapter;
  /** Transport for direct page fetches */
  fallbackAdapter?: AxiosAdapter;
}

export interface Pipeline {
  readonly client: RetryingHttpClient;
  readonly discoverer: UrlDiscoverer;
  readonly scraper: ContentScraper;
  analyzeWebsite(websiteUrl: string): Promise<WebsiteAnalysis>;
}

/**
 * Build a client, poller, discoverer and scraper from configuration.
 * The returned pipeline owns one rate limiter and one circuit breaker.
 */
export function createPipeline(config: AppConfig, overrides: PipelineOverrides = {}): Pipeline {
  const clock = overrides.clock ?? systemClock;
  const logger = overrides.logger ?? createLogger('pipeline', config.logLevel);
  const metrics = overrides.metrics ?? noopMetrics;

  const client = new RetryingHttpClient({
    apiKey: config.firecrawl.apiKey,
    baseUrl: config.firecrawl.apiUrl,
    timeoutMs: config.firecrawl.timeoutMs,
    maxRetries: config.firecrawl.maxRetries,
    baseDelayMs: config.firecrawl.baseDelayMs,
    maxDelayMs: config.firecrawl.maxDelayMs,
    requestsPerMinute: config.firecrawl.requestsPerMinute,
    clock,
    logger,
    metrics,
    ...(overrides.random ? { random: overrides.random } : {}),
    ...(overrides.adapter ? { adapter: overrides.adapter } : {}),
  });

  const poller = new CrawlJobPoller(client, {
    pollIntervalMs: config.firecrawl.pollIntervalMs,
    maxWaitMs: config.firecrawl.maxWaitMs,
    clock,
    logger,
    metrics,
  });

  const discoverer = new UrlDiscoverer(poller, {
    maxUrls: config.firecrawl.maxUrls,
    logger,
    metrics,
  });

  const scraper = new ContentScraper(client, {
    maxConcurrent: config.scrape.maxConcurrent,
    requestDelayMs: config.scrape.requestDelayMs,
    fallbackTimeoutMs: config.scrape.fallbackTimeoutMs,
    simpleDomains: config.scrape.simpleDomains,
    clock,
    logger,
    metrics,
    ...(overrides.fallbackAdapter ? { fallbackAdapter: overrides.fallbackAdapter } : {}),
  });

  const deps: PipelineDeps = {
    discoverer,
    scraper,
    filter: {
      limit: config.filter.urlLimit,
      valuablePaths: config.filter.valuablePaths,
      excludedPaths: config.filter.excludedPaths,
    },
    clock,
    logger,
    metrics,
  };

  return {
    client,
    discoverer,
    scraper,
    analyzeWebsite: (websiteUrl) => analyzeWebsite(websiteUrl, deps),
  };
}
