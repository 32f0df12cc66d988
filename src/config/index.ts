/**
 * Config Module
 *
 * Parses environment variables into a typed, frozen AppConfig.
 *
 * Usage:
 * const config = loadConfig();
 * const pipeline = createPipeline(config);
 */

import { z } from 'zod';
import type { LogLevel } from '../logger/index.js';

export const DEFAULT_VALUABLE_PATHS = [
  'about',
  'our-approach',
  'team',
  'leadership',
  'services',
  'solutions',
  'case-studies',
  'customers',
  'blog',
  'investors',
  'culture',
  'portfolio',
  'clients',
  'work',
  'projects',
];

export const DEFAULT_EXCLUDED_PATHS = [
  'privacy',
  'terms',
  'cookie',
  'careers',
  'contact',
  'login',
  'signup',
  'register',
  'press-kit',
  'media-kit',
  'legal',
  'disclaimer',
  'accessibility',
  'sitemap',
];

export const DEFAULT_SIMPLE_DOMAINS = ['example.com', 'example.org', 'example.net', 'httpbin.org', 'test.com'];

/**
 * Application configuration
 */
export interface AppConfig {
  logLevel: LogLevel;
  firecrawl: {
    apiKey: string | null;
    apiUrl: string;
    timeoutMs: number;
    maxRetries: number;
    baseDelayMs: number;
    maxDelayMs: number;
    requestsPerMinute: number;
    pollIntervalMs: number;
    maxWaitMs: number;
    maxUrls: number;
  };
  filter: {
    urlLimit: number;
    valuablePaths: string[];
    excludedPaths: string[];
  };
  scrape: {
    maxConcurrent: number;
    requestDelayMs: number;
    fallbackTimeoutMs: number;
    simpleDomains: string[];
  };
  output: {
    bucket: string | null;
    prefix: string;
    region: string;
    endpoint: string | null;
    includePersonName: boolean;
  };
  webhookSigningKey: string | null;
  workflowMaxAttempts: number;
}

/**
 * Raised when one or more environment variables fail validation
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

// ============================================================================
// Schema
// ============================================================================

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
  });

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const csvList = (fallback: string[]) =>
  z
    .string()
    .optional()
    .transform((value) => {
      if (value === undefined || value.trim() === '') {
        return [...fallback];
      }
      return value
        .split(',')
        .map((item) => item.trim().toLowerCase())
        .filter((item) => item.length > 0);
    });

const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .optional()
    .transform((value) => (value === undefined ? fallback : ['true', '1', 'yes'].includes(value)));

const EnvSchema = z.object({
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  FIRECRAWL_API_KEY: optionalString,
  FIRECRAWL_API_URL: z.string().url().default('https://api.firecrawl.dev/v2'),
  FIRECRAWL_TIMEOUT_MS: positiveInt(30000),
  FIRECRAWL_MAX_RETRIES: nonNegativeInt(3),
  FIRECRAWL_BASE_DELAY_MS: nonNegativeInt(1000),
  FIRECRAWL_MAX_DELAY_MS: nonNegativeInt(60000),
  FIRECRAWL_REQUESTS_PER_MINUTE: positiveInt(30),
  FIRECRAWL_CRAWL_POLL_INTERVAL_MS: positiveInt(2000),
  FIRECRAWL_CRAWL_MAX_WAIT_MS: positiveInt(300000),
  FIRECRAWL_MAX_URLS: positiveInt(50),
  BI_URL_LIMIT: positiveInt(7),
  BI_VALUABLE_PATHS: csvList(DEFAULT_VALUABLE_PATHS),
  BI_EXCLUDED_PATHS: csvList(DEFAULT_EXCLUDED_PATHS),
  SCRAPE_MAX_CONCURRENT: positiveInt(3),
  SCRAPE_REQUEST_DELAY_MS: nonNegativeInt(500),
  SCRAPE_FALLBACK_TIMEOUT_MS: positiveInt(15000),
  SCRAPE_SIMPLE_DOMAINS: csvList(DEFAULT_SIMPLE_DOMAINS),
  OUTPUT_BUCKET: optionalString,
  OUTPUT_PREFIX: z.string().default('outputs'),
  AWS_REGION: z.string().default('us-east-1'),
  S3_ENDPOINT: optionalString,
  OUTPUT_INCLUDE_PERSON_NAME: booleanFlag(true),
  WEBHOOK_SIGNING_KEY: optionalString,
  WORKFLOW_MAX_ATTEMPTS: positiveInt(3),
});

/**
 * Load configuration from environment variables
 *
 * Empty strings are treated as unset so that `FOO=` falls back to the default.
 *
 * @throws ConfigError listing every invalid key
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      cleaned[key] = value;
    }
  }

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`));
  }
  const vars = parsed.data;

  const config: AppConfig = {
    logLevel: vars.LOG_LEVEL,
    firecrawl: {
      apiKey: vars.FIRECRAWL_API_KEY,
      apiUrl: vars.FIRECRAWL_API_URL.replace(/\/+$/, ''),
      timeoutMs: vars.FIRECRAWL_TIMEOUT_MS,
      maxRetries: vars.FIRECRAWL_MAX_RETRIES,
      baseDelayMs: vars.FIRECRAWL_BASE_DELAY_MS,
      maxDelayMs: vars.FIRECRAWL_MAX_DELAY_MS,
      requestsPerMinute: vars.FIRECRAWL_REQUESTS_PER_MINUTE,
      pollIntervalMs: vars.FIRECRAWL_CRAWL_POLL_INTERVAL_MS,
      maxWaitMs: vars.FIRECRAWL_CRAWL_MAX_WAIT_MS,
      maxUrls: vars.FIRECRAWL_MAX_URLS,
    },
    filter: {
      urlLimit: vars.BI_URL_LIMIT,
      valuablePaths: vars.BI_VALUABLE_PATHS,
      excludedPaths: vars.BI_EXCLUDED_PATHS,
    },
    scrape: {
      maxConcurrent: vars.SCRAPE_MAX_CONCURRENT,
      requestDelayMs: vars.SCRAPE_REQUEST_DELAY_MS,
      fallbackTimeoutMs: vars.SCRAPE_FALLBACK_TIMEOUT_MS,
      simpleDomains: vars.SCRAPE_SIMPLE_DOMAINS,
    },
    output: {
      bucket: vars.OUTPUT_BUCKET,
      prefix: vars.OUTPUT_PREFIX.replace(/^\/+|\/+$/g, ''),
      region: vars.AWS_REGION,
      endpoint: vars.S3_ENDPOINT,
      includePersonName: vars.OUTPUT_INCLUDE_PERSON_NAME,
    },
    webhookSigningKey: vars.WEBHOOK_SIGNING_KEY,
    workflowMaxAttempts: vars.WORKFLOW_MAX_ATTEMPTS,
  };

  return deepFreeze(config);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
