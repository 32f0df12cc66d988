/**
 * URL Filter Module
 *
 * Second pipeline phase: rank discovered URLs by how much they reveal about
 * the company and keep the best K. Scoring is a pure function of the URL,
 * the base URL and the keyword lists.
 *
 * Usage:
 * const result = filterUrls(discovered, 'https://acme.com', { limit: 7 });
 */

import { DEFAULT_EXCLUDED_PATHS, DEFAULT_VALUABLE_PATHS } from '../config/index.js';
import { createLogger } from '../logger/index.js';
import { isSameDomain } from '../normalizer/index.js';
import type { Logger } from '../types/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

export interface ScoredUrl {
  url: string;
  score: number;
  reasons: string[];
}

export interface ScoringOptions {
  /** Keywords worth +10 (first match only) */
  valuablePaths?: readonly string[];
  /** Keywords worth -10 each */
  excludedPaths?: readonly string[];
}

export interface FilterOptions extends ScoringOptions {
  /** Maximum URLs to keep (default: 7) */
  limit?: number;
  logger?: Logger;
}

export interface FilterResult {
  urls: string[];
  reasons: Record<string, string[]>;
  scores: Record<string, number>;
  stats: {
    input: number;
    output: number;
    filtered_out: number;
  };
  /** Up to five positively scored URLs cut by the limit */
  filtered_out_samples: string[];
}

type Rule = readonly [pattern: RegExp, points: number, reason: string];

// Only the first matching rule applies
const HIGH_VALUE_RULES: readonly Rule[] = [
  [/\/about[-_]?us/, 15, 'about_us_page'],
  [/\/our[-_]?team/, 15, 'team_page'],
  [/\/leadership/, 15, 'leadership_page'],
  [/\/case[-_]?stud/, 12, 'case_studies'],
  [/\/portfolio/, 12, 'portfolio'],
  [/\/services?/, 10, 'services'],
  [/\/solutions?/, 10, 'solutions'],
  [/\/products?/, 10, 'products'],
  [/\/customers?/, 10, 'customers'],
  [/\/clients?/, 10, 'clients'],
  [/\/testimonials?/, 8, 'testimonials'],
  [/\/mission/, 8, 'mission'],
  [/\/values?/, 8, 'values'],
  [/\/culture/, 8, 'culture'],
  [/\/blog\//, 5, 'blog_post'],
  [/\/insights?\//, 5, 'insights'],
  [/\/20\d{2}\//, 3, 'dated_content'],
];

// Every matching rule applies
const LOW_VALUE_PATH_RULES: readonly Rule[] = [
  [/\/tag\//, -5, 'tag_page'],
  [/\/category\//, -5, 'category_page'],
  [/\/page\/\d+/, -5, 'pagination'],
  [/\/search/, -10, 'search_page'],
  [/\/login/, -10, 'login_page'],
  [/\/signup/, -10, 'signup_page'],
  [/\/register/, -10, 'register_page'],
  [/\/cart/, -10, 'cart_page'],
  [/\/checkout/, -10, 'checkout_page'],
  [/\.pdf$/, -3, 'pdf_file'],
  [/\.(jpg|jpeg|png|gif|svg)$/, -10, 'image_file'],
  [/\.(css|js)$/, -20, 'asset_file'],
  [/\/wp-/, -5, 'wordpress_internal'],
  [/\/feed/, -10, 'feed_url'],
  [/\/rss/, -10, 'rss_url'],
];

// Matched against path, query and fragment
const LOW_VALUE_SUFFIX_RULES: readonly Rule[] = [
  [/#/, -5, 'has_fragment'],
  [/\?/, -2, 'has_query_params'],
];

const HOMEPAGE_PATHS = new Set(['/', '/index', '/index.html', '/home']);

// ============================================================================
// Scoring
// ============================================================================

/**
 * Score a URL by its likely business-intelligence value
 *
 * A URL on a different registrable domain than `baseUrl` scores -100 with
 * no other rules applied.
 */
export function scoreUrl(url: string, baseUrl?: string, options: ScoringOptions = {}): ScoredUrl {
  const valuablePaths = options.valuablePaths ?? DEFAULT_VALUABLE_PATHS;
  const excludedPaths = options.excludedPaths ?? DEFAULT_EXCLUDED_PATHS;

  let parsed: URL;
  try {
    parsed = new URL(url.toLowerCase());
  } catch {
    return { url, score: -100, reasons: ['invalid_url'] };
  }

  if (baseUrl !== undefined && !isSameDomain(url, baseUrl)) {
    return { url, score: -100, reasons: ['different_domain'] };
  }

  const path = parsed.pathname;
  const pathWithSuffix = `${path}${parsed.search}${parsed.hash}`;
  let score = 0;
  const reasons: string[] = [];

  const valuable = valuablePaths.find((keyword) => path.includes(keyword));
  if (valuable !== undefined) {
    score += 10;
    reasons.push(`contains_${valuable}`);
  }

  for (const excluded of excludedPaths) {
    if (path.includes(excluded)) {
      score -= 10;
      reasons.push(`excluded_${excluded}`);
    }
  }

  const highValue = HIGH_VALUE_RULES.find(([pattern]) => pattern.test(path));
  if (highValue !== undefined) {
    score += highValue[1];
    reasons.push(highValue[2]);
  }

  for (const [pattern, points, reason] of LOW_VALUE_PATH_RULES) {
    if (pattern.test(path)) {
      score += points;
      reasons.push(reason);
    }
  }
  for (const [pattern, points, reason] of LOW_VALUE_SUFFIX_RULES) {
    if (pattern.test(pathWithSuffix)) {
      score += points;
      reasons.push(reason);
    }
  }

  const depth = path.split('/').length - 1;
  if (depth > 4) {
    score -= 2;
    reasons.push('deep_url');
  } else if (depth <= 2) {
    score += 2;
    reasons.push('shallow_url');
  }

  if (url.length > 150) {
    score -= 3;
    reasons.push('very_long_url');
  } else if (url.length < 50) {
    score += 1;
    reasons.push('short_url');
  }

  if (HOMEPAGE_PATHS.has(path)) {
    score += 5;
    reasons.push('homepage');
  }

  return { url, score, reasons };
}

// ============================================================================
// Filtering
// ============================================================================

/**
 * Keep the top `limit` URLs with a strictly positive score
 *
 * Ties keep their input order.
 */
export function filterUrls(urls: string[], baseUrl: string | undefined, options: FilterOptions = {}): FilterResult {
  const limit = options.limit ?? 7;
  const logger = options.logger ?? createLogger('url-filter');

  if (urls.length === 0) {
    return {
      urls: [],
      reasons: {},
      scores: {},
      stats: { input: 0, output: 0, filtered_out: 0 },
      filtered_out_samples: [],
    };
  }

  const ranked = urls
    .map((url) => scoreUrl(url, baseUrl, options))
    .sort((a, b) => b.score - a.score);

  const kept = ranked.slice(0, limit).filter((scored) => scored.score > 0);
  const samples = ranked
    .slice(limit)
    .filter((scored) => scored.score > 0)
    .slice(0, 5)
    .map((scored) => scored.url);

  const reasons: Record<string, string[]> = {};
  const scores: Record<string, number> = {};
  for (const scored of kept) {
    reasons[scored.url] = scored.reasons;
    scores[scored.url] = scored.score;
  }

  logger.info('Filtered URLs', { input: urls.length, output: kept.length, limit });
  for (const [index, scored] of kept.entries()) {
    logger.debug(`[${index + 1}] score ${scored.score}`, { url: scored.url });
  }

  return {
    urls: kept.map((scored) => scored.url),
    reasons,
    scores,
    stats: {
      input: urls.length,
      output: kept.length,
      filtered_out: urls.length - kept.length,
    },
    filtered_out_samples: samples,
  };
}

// ============================================================================
// Helpers
// ============================================================================

export type UrlCategory =
  | 'company_info'
  | 'team'
  | 'offerings'
  | 'evidence'
  | 'content'
  | 'contact'
  | 'careers'
  | 'legal'
  | 'technical'
  | 'other';

const CATEGORY_KEYWORDS: ReadonlyArray<readonly [UrlCategory, readonly string[]]> = [
  ['company_info', ['about', 'mission', 'vision', 'values', 'culture', 'history']],
  ['team', ['team', 'leadership', 'executive', 'founder', 'board', 'advisor']],
  ['offerings', ['service', 'solution', 'product', 'offering', 'feature']],
  ['evidence', ['case', 'study', 'portfolio', 'work', 'project', 'client', 'customer']],
  ['content', ['blog', 'article', 'post', 'news', 'insight', 'resource']],
  ['contact', ['contact', 'location', 'office']],
  ['careers', ['career', 'job', 'hiring', 'recruit']],
  ['legal', ['privacy', 'terms', 'legal', 'cookie', 'gdpr']],
  ['technical', ['api', 'docs', 'documentation', 'developer']],
];

/**
 * Coarse category of a URL by the first keyword its path contains
 */
export function categorizeUrl(url: string): UrlCategory {
  let path: string;
  try {
    path = new URL(url.toLowerCase()).pathname;
  } catch {
    return 'other';
  }
  for (const [category, keywords] of CATEGORY_KEYWORDS) {
    if (keywords.some((keyword) => path.includes(keyword))) {
      return category;
    }
  }
  return 'other';
}

/**
 * Drop near-duplicates that differ only by case, scheme, trailing slash,
 * query or fragment. The first occurrence wins.
 */
export function deduplicateSimilarUrls(urls: string[]): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];
  for (const url of urls) {
    const key = url
      .toLowerCase()
      .replace(/^https:\/\//, 'http://')
      .replace(/[?#].*$/, '')
      .replace(/\/+$/, '');
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(url);
    }
  }
  return unique;
}
