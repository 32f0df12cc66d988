/**
 * Unit tests for the Normalizer Module
 * URL canonicalization, domain matching and lead validation
 */

import { describe, test, expect } from '@jest/globals';
import {
  dedupeKey,
  extractDomain,
  isSameDomain,
  normalizeLead,
  normalizeUrl,
  registrableDomain,
  trimString,
} from '../../src/normalizer/index.js';

describe('Normalizer Module', () => {
  describe('trimString()', () => {
    test('should trim and turn blank strings into null', () => {
      expect(trimString('  Acme  ')).toBe('Acme');
      expect(trimString('   ')).toBeNull();
      expect(trimString(null)).toBeNull();
      expect(trimString(undefined)).toBeNull();
    });
  });

  describe('normalizeUrl()', () => {
    test('should add https:// when no scheme is given', () => {
      expect(normalizeUrl('acme.com')).toBe('https://acme.com/');
      expect(normalizeUrl('  www.acme.com/about  ')).toBe('https://www.acme.com/about');
    });

    test('should keep an explicit http scheme and lower-case the host', () => {
      expect(normalizeUrl('HTTP://Acme.com/About')).toBe('http://acme.com/About');
    });

    test('should be idempotent', () => {
      const once = normalizeUrl('acme.com/our team?x=1');
      expect(once).toBe('https://acme.com/our%20team?x=1');
      expect(normalizeUrl(once)).toBe(once);
    });

    test('should reject dangerous schemes', () => {
      expect(normalizeUrl('javascript:alert(1)')).toBeNull();
      expect(normalizeUrl('data:text/html,hi')).toBeNull();
      expect(normalizeUrl('file:///etc/passwd')).toBeNull();
      expect(normalizeUrl('FTP://acme.com')).toBeNull();
    });

    test('should reject empty and unparsable input', () => {
      expect(normalizeUrl('')).toBeNull();
      expect(normalizeUrl('   ')).toBeNull();
      expect(normalizeUrl(null)).toBeNull();
      expect(normalizeUrl('http://')).toBeNull();
    });
  });

  describe('domains', () => {
    test('should extract a lower-cased host name', () => {
      expect(extractDomain('https://WWW.Acme.com/about')).toBe('www.acme.com');
      expect(extractDomain('not a url')).toBeNull();
    });

    test('should ignore a www. prefix when comparing sites', () => {
      expect(registrableDomain('https://www.acme.com/')).toBe('acme.com');
      expect(isSameDomain('https://www.acme.com/team', 'http://acme.com')).toBe(true);
    });

    test('should treat other subdomains and hosts as different sites', () => {
      expect(isSameDomain('https://blog.acme.com/', 'https://acme.com/')).toBe(false);
      expect(isSameDomain('https://other.com/', 'https://acme.com/')).toBe(false);
      expect(isSameDomain('not a url', 'not a url')).toBe(false);
    });
  });

  describe('dedupeKey()', () => {
    test('should drop the fragment and trailing slashes', () => {
      expect(dedupeKey('https://acme.com/about/#team')).toBe('https://acme.com/about');
      expect(dedupeKey('https://acme.com/about')).toBe('https://acme.com/about');
      expect(dedupeKey('https://acme.com/')).toBe('https://acme.com');
    });

    test('should keep the query string', () => {
      expect(dedupeKey('https://acme.com/?page=2')).toBe('https://acme.com/?page=2');
    });

    test('should fall back to string handling for unparsable input', () => {
      expect(dedupeKey(' not a url/#x ')).toBe('not a url');
    });
  });

  describe('normalizeLead()', () => {
    test('should accept a valid lead and trim its fields', () => {
      const result = normalizeLead({
        first_name: '  Ada ',
        last_name: 'Lovelace',
        company_website: ' https://acme.com ',
      });

      expect(result.success).toBe(true);
      expect(result.data).toEqual({
        first_name: 'Ada',
        last_name: 'Lovelace',
        company_website: 'https://acme.com',
        linkedin: null,
      });
      expect(result.metadata.module).toBe('normalizer');
    });

    test('should accept a lead with only a LinkedIn profile', () => {
      const result = normalizeLead({
        first_name: 'Ada',
        last_name: 'Lovelace',
        linkedin: 'https://linkedin.com/in/ada',
      });

      expect(result.success).toBe(true);
      expect(result.data?.company_website).toBeNull();
    });

    test('should reject missing and blank names', () => {
      const result = normalizeLead({ last_name: '   ', company_website: 'acme.com' });

      expect(result.success).toBe(false);
      expect(result.error?.code).toBe('VALIDATION_ERROR');
      expect(result.error?.details).toEqual([
        'first_name: first_name is required',
        'last_name: last_name cannot be empty or just whitespace',
      ]);
    });

    test('should reject names longer than 100 characters', () => {
      const result = normalizeLead({ first_name: 'A'.repeat(101), last_name: 'B', linkedin: 'x' });

      expect(result.error?.details).toEqual(['first_name: first_name must be at most 100 characters']);
    });

    test('should reject sources longer than 500 characters', () => {
      const result = normalizeLead({ first_name: 'Ada', last_name: 'B', company_website: 'a'.repeat(501) });

      expect(result.error?.details).toEqual(['company_website: must be at most 500 characters']);
    });

    test('should require at least one source after trimming', () => {
      const result = normalizeLead({ first_name: 'Ada', last_name: 'Lovelace', company_website: '  ', linkedin: null });

      expect(result.success).toBe(false);
      expect(result.error?.code).toBe('SOURCE_REQUIRED');
      expect(result.error?.details).toEqual({ company_website: null, linkedin: null });
    });

    test('should reject non-object input', () => {
      expect(normalizeLead(null).error?.code).toBe('VALIDATION_ERROR');
    });
  });
});
