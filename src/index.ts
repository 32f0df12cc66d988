/**
 * Lead Intel - Main Entry Point
 *
 * This module exports the public interfaces and implementations of the lead
 * enrichment pipeline.
 *
 * Architecture:
 * - A webhook hands a validated lead to the registration workflow
 * - The workflow runs each phase as a replayable step
 * - Website analysis: discovery → filtering → scraping, all through one
 *   rate-limited, circuit-broken HTTP client
 * - Results are stored once per request under a deterministic filename
 */

// Core Types
export type * from './types/index.js';

// Config Module - Environment parsing
export {
  loadConfig,
  ConfigError,
  DEFAULT_VALUABLE_PATHS,
  DEFAULT_EXCLUDED_PATHS,
  DEFAULT_SIMPLE_DOMAINS,
  type AppConfig,
} from './config/index.js';

// Logger Module
export { createLogger, noopMetrics, errorMessage, type LogLevel } from './logger/index.js';

// Errors Module - Failure reasons and user-facing messages
export {
  PipelineError,
  getErrorInfo,
  getActionGuidance,
  formatErrorMessage,
  httpReason,
  categorizeErrors,
  getSeverityLevel,
  createErrorSummary,
  type ErrorCode,
  type ErrorCategory,
  type ErrorAction,
  type ErrorInfo,
  type ErrorSummary,
  type Severity,
} from './errors/index.js';

// HTTP Client Module - Rate limiting, circuit breaking, retries
export {
  RateLimiter,
  CircuitBreaker,
  RetryingHttpClient,
  computeBackoffDelay,
  systemClock,
  JITTER_RATIO,
  type RateLimiterOptions,
  type CircuitBreakerOptions,
  type CircuitBreakerState,
  type RetryingHttpClientOptions,
  type HttpMethod,
  type HttpFailure,
  type HttpResult,
} from './http-client/index.js';

// Crawl Jobs Module
export {
  CrawlJobPoller,
  mapBackendStatus,
  parseCrawlPages,
  type CrawlRequest,
  type CrawlJob,
  type CrawlJobStatus,
  type CrawlPage,
  type CrawlOutcome,
  type CrawlJobPollerOptions,
} from './crawl-jobs/index.js';

// Normalizer Module - URL and lead validation
export {
  normalizeLead,
  normalizeUrl,
  extractDomain,
  registrableDomain,
  isSameDomain,
  dedupeKey,
  trimString,
} from './normalizer/index.js';

// Discovery Module
export {
  UrlDiscoverer,
  discoveryFailure,
  discoverFallbackUrls,
  sitemapHints,
  isValuableDiscoveryUrl,
  DEFAULT_FALLBACK_PATHS,
  type DiscoveryResult,
  type DiscoverySuccess,
  type DiscoveryFailure,
  type DiscoveryMethod,
  type UrlDiscovererOptions,
} from './discovery/index.js';

// URL Filter Module
export {
  scoreUrl,
  filterUrls,
  categorizeUrl,
  deduplicateSimilarUrls,
  type ScoredUrl,
  type ScoringOptions,
  type FilterOptions,
  type FilterResult,
  type UrlCategory,
} from './url-filter/index.js';

// Scraper Module
export {
  ContentScraper,
  cleanText,
  cleanMarkdown,
  htmlToMarkdown,
  postProcessContent,
  summarizeScrapeResults,
  type ScrapeResult,
  type ScrapeStatus,
  type ScrapeMethod,
  type ScrapeSummary,
  type ContentFormat,
  type ContentScraperOptions,
  type ScrapeBatchOptions,
} from './scraper/index.js';

// Pipeline Module
export {
  analyzeWebsite,
  createPipeline,
  type Pipeline,
  type PipelineDeps,
  type PipelineOverrides,
  type WebsiteAnalysis,
  type AnalysisStatistics,
} from './pipeline/index.js';

// Storage Module - Result persistence
export {
  S3StorageAdapter,
  MemoryStorageAdapter,
  createStorageAdapter,
  saveLeadResult,
  type S3Config,
  type OutputStorageConfig,
  type SaveResult,
} from './storage/index.js';

// Run Manager Module - Workflow steps and retries
export {
  generateRequestId,
  generateOutputFilename,
  sanitizeNameForFilename,
  LocalStepRunner,
  runWithRetries,
  analyzeLinkedIn,
  executeRegistrationWorkflow,
  OUTPUT_FORMAT_VERSION,
  type StepRunner,
  type RetryOptions,
  type RegistrationRecord,
  type RegistrationDeps,
  type LinkedInAnalysis,
  type WorkflowError,
  type OutputMetadata,
} from './run-manager/index.js';

// Webhook Module
export { validateWebhookSignature, parseSignatureHeader, computeSignature } from './webhook/index.js';

// Intake Module - Webhook entry point wired from config
export {
  createRegistrationService,
  type RegistrationService,
  type RegistrationResponse,
  type RegistrationOverrides,
  type RejectionCode,
} from './intake/index.js';
