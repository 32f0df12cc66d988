/**
 * Normalizer Module
 *
 * Responsibilities:
 * - Canonicalize URLs and reject unsafe schemes before they enter the pipeline
 * - Decide "same site" by registrable domain (ignoring a www. prefix)
 * - Validate inbound lead registrations
 *
 * Usage:
 * const url = normalizeUrl('acme.com'); // 'https://acme.com/'
 * const lead = normalizeLead(requestBody);
 */

import { z } from 'zod';
import type { LeadSubmission, ModuleResult } from '../types/index.js';

const DANGEROUS_SCHEME = /^(javascript|data|file|ftp):/i;
const HTTP_SCHEME = /^https?:\/\//i;

/**
 * Trim whitespace from string value; empty strings become null
 */
export function trimString(value: string | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

// ============================================================================
// URLs
// ============================================================================

/**
 * Normalize a URL to an absolute http(s) URL
 *
 * Adds https:// when no scheme is given and serializes through WHATWG URL,
 * so the result is stable: normalizeUrl(normalizeUrl(u)) === normalizeUrl(u).
 *
 * @returns Normalized URL, or null for empty, unparsable or non-http(s) input
 */
export function normalizeUrl(input: string | null | undefined): string | null {
  const trimmed = trimString(input);
  if (!trimmed || DANGEROUS_SCHEME.test(trimmed)) {
    return null;
  }

  const candidate = HTTP_SCHEME.test(trimmed) ? trimmed : `https://${trimmed}`;

  let parsed: URL;
  try {
    parsed = new URL(candidate);
  } catch {
    return null;
  }

  if (!parsed.hostname || (parsed.protocol !== 'http:' && parsed.protocol !== 'https:')) {
    return null;
  }
  return parsed.toString();
}

/**
 * Lower-cased host name of a URL, or null when it cannot be parsed
 */
export function extractDomain(url: string): string | null {
  try {
    const hostname = new URL(url).hostname.toLowerCase();
    return hostname || null;
  } catch {
    return null;
  }
}

/**
 * Host name without a leading www., used to decide whether two URLs are the same site
 */
export function registrableDomain(url: string): string | null {
  const hostname = extractDomain(url);
  return hostname ? hostname.replace(/^www\./, '') : null;
}

export function isSameDomain(a: string, b: string): boolean {
  const domainA = registrableDomain(a);
  return domainA !== null && domainA === registrableDomain(b);
}

/**
 * Key used to detect duplicate URLs: fragment and trailing slashes removed
 */
export function dedupeKey(url: string): string {
  try {
    const parsed = new URL(url);
    parsed.hash = '';
    return parsed.toString().replace(/\/+$/, '');
  } catch {
    return url.trim().replace(/#.*$/, '').replace(/\/+$/, '');
  }
}

// ============================================================================
// Lead Intake
// ============================================================================

const nameField = (label: string) =>
  z
    .string({ required_error: `${label} is required` })
    .trim()
    .min(1, `${label} cannot be empty or just whitespace`)
    .max(100, `${label} must be at most 100 characters`);

const sourceField = z
  .string()
  .max(500, 'must be at most 500 characters')
  .nullable()
  .optional()
  .transform((value) => trimString(value));

const LeadSchema = z.object({
  first_name: nameField('first_name'),
  last_name: nameField('last_name'),
  company_website: sourceField,
  linkedin: sourceField,
});

/**
 * Validate a lead registration payload
 *
 * Names are trimmed and required; at least one of company_website or
 * linkedin must be present after trimming.
 */
export function normalizeLead(rawInput: unknown): ModuleResult<LeadSubmission> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  const parseResult = LeadSchema.safeParse(rawInput);
  if (!parseResult.success) {
    return {
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Input validation failed',
        details: parseResult.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
      },
      metadata: {
        module: 'normalizer',
        timestamp,
        duration: Date.now() - startTime,
      },
    };
  }

  const lead: LeadSubmission = {
    first_name: parseResult.data.first_name,
    last_name: parseResult.data.last_name,
    company_website: parseResult.data.company_website,
    linkedin: parseResult.data.linkedin,
  };

  if (!lead.company_website && !lead.linkedin) {
    return {
      success: false,
      error: {
        code: 'SOURCE_REQUIRED',
        message: "At least one of 'company_website' or 'linkedin' must be provided",
        details: { company_website: lead.company_website, linkedin: lead.linkedin },
      },
      metadata: {
        module: 'normalizer',
        timestamp,
        duration: Date.now() - startTime,
      },
    };
  }

  return {
    success: true,
    data: lead,
    metadata: {
      module: 'normalizer',
      timestamp,
      duration: Date.now() - startTime,
    },
  };
}
