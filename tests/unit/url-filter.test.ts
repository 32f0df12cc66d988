/**
 * Unit tests for the URL Filter Module
 * Scoring rules and top-K selection
 */

import { describe, test, expect } from '@jest/globals';
import { categorizeUrl, deduplicateSimilarUrls, filterUrls, scoreUrl } from '../../src/url-filter/index.js';
import { createMockLogger } from '../helpers.js';

const BASE = 'https://acme.com';

describe('URL Filter Module', () => {
  describe('scoreUrl()', () => {
    test('should score an about-us page highly', () => {
      expect(scoreUrl('https://acme.com/about-us', BASE)).toEqual({
        url: 'https://acme.com/about-us',
        score: 28,
        reasons: ['contains_about', 'about_us_page', 'shallow_url', 'short_url'],
      });
    });

    test('should give the homepage a bonus', () => {
      expect(scoreUrl('https://acme.com/', BASE)).toEqual({
        url: 'https://acme.com/',
        score: 8,
        reasons: ['shallow_url', 'short_url', 'homepage'],
      });
    });

    test('should penalize login pages twice', () => {
      expect(scoreUrl('https://acme.com/login', BASE)).toEqual({
        url: 'https://acme.com/login',
        score: -17,
        reasons: ['excluded_login', 'login_page', 'shallow_url', 'short_url'],
      });
    });

    test('should reject other domains outright', () => {
      expect(scoreUrl('https://other.com/about', BASE)).toEqual({
        url: 'https://other.com/about',
        score: -100,
        reasons: ['different_domain'],
      });
    });

    test('should treat www as the same site', () => {
      expect(scoreUrl('https://www.acme.com/', BASE).score).toBe(8);
    });

    test('should reject unparsable URLs', () => {
      expect(scoreUrl('not a url', BASE)).toEqual({ url: 'not a url', score: -100, reasons: ['invalid_url'] });
    });

    test('should apply query and fragment penalties', () => {
      expect(scoreUrl('https://acme.com/blog/2023/05/launch?ref=x#top', BASE)).toEqual({
        url: 'https://acme.com/blog/2023/05/launch?ref=x#top',
        score: 9,
        reasons: ['contains_blog', 'blog_post', 'has_fragment', 'has_query_params', 'short_url'],
      });
    });

    test('should penalize deep paths', () => {
      expect(scoreUrl('https://acme.com/a/b/c/d/e', BASE)).toEqual({
        url: 'https://acme.com/a/b/c/d/e',
        score: -1,
        reasons: ['deep_url', 'short_url'],
      });
    });

    test('should honor custom keyword lists', () => {
      const options = { valuablePaths: ['pricing'], excludedPaths: ['about'] };

      expect(scoreUrl('https://acme.com/pricing', BASE, options)).toEqual({
        url: 'https://acme.com/pricing',
        score: 13,
        reasons: ['contains_pricing', 'shallow_url', 'short_url'],
      });
      expect(scoreUrl('https://acme.com/about', BASE, options).reasons).toContain('excluded_about');
    });

    test('should be deterministic', () => {
      const url = 'https://acme.com/case-studies/big-win';
      expect(scoreUrl(url, BASE)).toEqual(scoreUrl(url, BASE));
    });
  });

  describe('filterUrls()', () => {
    test('should rank about-us first, keep the homepage and drop login', () => {
      const result = filterUrls(
        ['https://acme.com/about-us', 'https://acme.com/login', 'https://acme.com/'],
        BASE,
        { logger: createMockLogger() }
      );

      expect(result.urls).toEqual(['https://acme.com/about-us', 'https://acme.com/']);
      expect(result.reasons['https://acme.com/about-us']).toContain('about_us_page');
      expect(result.reasons['https://acme.com/']).toContain('homepage');
      expect(result.scores).toEqual({ 'https://acme.com/about-us': 28, 'https://acme.com/': 8 });
      expect(result.stats).toEqual({ input: 3, output: 2, filtered_out: 1 });
      expect(result.filtered_out_samples).toEqual([]);
    });

    test('should keep at most the limit and sample positive URLs that were cut', () => {
      const urls = [
        '/about',
        '/team',
        '/services',
        '/solutions',
        '/blog',
        '/portfolio',
        '/clients',
        '/work',
        '/login',
      ].map((path) => `https://acme.com${path}`);

      const result = filterUrls(urls, BASE, { limit: 3, logger: createMockLogger() });

      expect(result.urls).toEqual([
        'https://acme.com/portfolio',
        'https://acme.com/services',
        'https://acme.com/solutions',
      ]);
      expect(result.filtered_out_samples).toEqual([
        'https://acme.com/clients',
        'https://acme.com/about',
        'https://acme.com/team',
        'https://acme.com/blog',
        'https://acme.com/work',
      ]);
      expect(result.stats).toEqual({ input: 9, output: 3, filtered_out: 6 });
    });

    test('should never return a non-positive score', () => {
      const result = filterUrls(['https://other.com/', 'https://acme.com/login'], BASE, {
        logger: createMockLogger(),
      });

      expect(result.urls).toEqual([]);
      expect(result.stats).toEqual({ input: 2, output: 0, filtered_out: 2 });
    });

    test('should handle empty input', () => {
      expect(filterUrls([], BASE)).toEqual({
        urls: [],
        reasons: {},
        scores: {},
        stats: { input: 0, output: 0, filtered_out: 0 },
        filtered_out_samples: [],
      });
    });
  });

  describe('categorizeUrl()', () => {
    test('should pick the first matching category', () => {
      expect(categorizeUrl('https://acme.com/about')).toBe('company_info');
      expect(categorizeUrl('https://acme.com/our-team')).toBe('team');
      expect(categorizeUrl('https://acme.com/case-studies')).toBe('evidence');
      expect(categorizeUrl('https://acme.com/privacy-policy')).toBe('legal');
    });

    test('should fall back to other', () => {
      expect(categorizeUrl('https://acme.com/xyz')).toBe('other');
      expect(categorizeUrl('bad')).toBe('other');
    });
  });

  describe('deduplicateSimilarUrls()', () => {
    test('should ignore case, scheme, trailing slash, query and fragment', () => {
      expect(
        deduplicateSimilarUrls([
          'https://Acme.com/About/',
          'http://acme.com/about?x=1',
          'https://acme.com/team#a',
          'https://acme.com/team',
        ])
      ).toEqual(['https://Acme.com/About/', 'https://acme.com/team#a']);
    });
  });
});
