/**
 * Run Manager Module
 *
 * Responsibilities:
 * - Assign request IDs and output filenames
 * - Run workflow steps through a StepRunner so replays skip completed steps
 * - Retry whole workflows on unhandled failure
 * - Execute the registration workflow: LinkedIn placeholder, website
 *   analysis, result persistence
 *
 * Output filename:
 * analysis_YYYYMMDD_HHMMSS_[FirstL_]<id8>.json
 *
 * The timestamp comes from the event, not the wall clock, so every replay of
 * the same event writes the same artifact.
 */

import { randomUUID } from 'crypto';
import { systemClock } from '../http-client/index.js';
import { PipelineError } from '../errors/index.js';
import { createLogger, errorMessage } from '../logger/index.js';
import type { WebsiteAnalysis } from '../pipeline/index.js';
import { saveLeadResult } from '../storage/index.js';
import type { Clock, LeadEvent, LeadSubmission, Logger, RequestId, StorageAdapter } from '../types/index.js';

export const OUTPUT_FORMAT_VERSION = '1.0.0';

// ============================================================================
// Identifiers
// ============================================================================

export function generateRequestId(): RequestId {
  return randomUUID();
}

/**
 * Letters of `name` only, each word capitalized, truncated to `maxLength`
 */
export function sanitizeNameForFilename(name: string | null | undefined, maxLength = 15): string {
  if (!name) {
    return '';
  }
  const words = name.trim().match(/[a-zA-Z]+/g) ?? [];
  return words
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join('')
    .slice(0, maxLength);
}

function formatFilenameTimestamp(timestamp: string | Date): string {
  const date = typeof timestamp === 'string' ? new Date(timestamp) : timestamp;
  if (Number.isNaN(date.getTime())) {
    throw new PipelineError('invalid_timestamp', `Invalid event timestamp: ${String(timestamp)}`);
  }
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}`;
}

/**
 * Build the artifact name for one request
 *
 * @example
 * generateOutputFilename('3f2a9c1e-...', '2024-03-05T14:07:09Z', 'Ada', 'Lovelace')
 * // 'analysis_20240305_140709_AdaL_3f2a9c1e.json'
 */
export function generateOutputFilename(
  requestId: RequestId,
  timestamp: string | Date,
  firstName?: string | null,
  lastName?: string | null,
  includePersonName = true
): string {
  const stamp = formatFilenameTimestamp(timestamp);
  const safeId = requestId.replace(/[^a-zA-Z0-9\-_]/g, '').slice(0, 8);

  let personPart = '';
  if (includePersonName) {
    const first = sanitizeNameForFilename(firstName, 10);
    if (first) {
      personPart = `${first}${sanitizeNameForFilename(lastName, 1)}_`;
    }
  }

  return `analysis_${stamp}_${personPart}${safeId}.json`;
}

// ============================================================================
// Step Execution
// ============================================================================

/**
 * Durable step boundary. A step that completed in an earlier attempt returns
 * its recorded result instead of running again.
 */
export interface StepRunner {
  run<T>(stepName: string, fn: () => Promise<T>): Promise<T>;
}

/**
 * In-process StepRunner. Step results are recorded as JSON, the way a
 * durable workflow engine would persist them, and replayed from that form.
 */
export class LocalStepRunner implements StepRunner {
  private completed = new Map<string, string>();
  private logger: Logger;

  constructor(logger: Logger = createLogger('run-manager')) {
    this.logger = logger;
  }

  async run<T>(stepName: string, fn: () => Promise<T>): Promise<T> {
    const recorded = this.completed.get(stepName);
    if (recorded !== undefined) {
      this.logger.debug('Replaying completed step', { step: stepName });
      const replayed: { value: T } = JSON.parse(recorded);
      return replayed.value;
    }

    this.logger.debug('Running step', { step: stepName });
    const value = await fn();
    this.completed.set(stepName, JSON.stringify({ value }));
    return value;
  }

  hasCompleted(stepName: string): boolean {
    return this.completed.has(stepName);
  }

  completedSteps(): string[] {
    return Array.from(this.completed.keys());
  }
}

export interface RetryOptions {
  /** Total attempts including the first (default: 3) */
  maxAttempts?: number;
  /** Pause between attempts (default: 0) */
  delayMs?: number;
  step?: StepRunner;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Invoke `workflow` until it resolves or attempts run out, sharing one
 * StepRunner across attempts. The last error is rethrown.
 */
export async function runWithRetries<T>(
  workflow: (step: StepRunner) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? 3);
  const delayMs = options.delayMs ?? 0;
  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? createLogger('run-manager');
  const step = options.step ?? new LocalStepRunner(logger);

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await workflow(step);
    } catch (error) {
      lastError = error;
      logger.warn('Workflow attempt failed', {
        attempt,
        maxAttempts,
        error: errorMessage(error),
      });
      if (attempt < maxAttempts && delayMs > 0) {
        await clock.sleep(delayMs);
      }
    }
  }
  throw lastError;
}

// ============================================================================
// Registration Workflow
// ============================================================================

export interface LinkedInAnalysis {
  status: 'not_implemented';
  url?: string;
}

export interface WorkflowError {
  message: string;
  type: string;
  timestamp: string;
}

export interface OutputMetadata {
  filename: string;
  saved_at: string;
  version: string;
}

/**
 * Persisted record for one lead
 */
export interface RegistrationRecord {
  request_id: RequestId;
  timestamp: string;
  input_data: LeadSubmission;
  linkedin_analysis: LinkedInAnalysis;
  website_analysis: WebsiteAnalysis;
  error?: WorkflowError;
  _metadata?: OutputMetadata;
}

export interface RegistrationDeps {
  analyzeWebsite: (websiteUrl: string) => Promise<WebsiteAnalysis>;
  storage: StorageAdapter;
  /** Include FirstL_ in the output filename (default: true) */
  includePersonName?: boolean;
  clock?: Clock;
  logger?: Logger;
}

function emptyWebsiteAnalysis(): WebsiteAnalysis {
  return {
    discovered_urls: [],
    filtered_urls: [],
    filter_reasons: {},
    scraped_content: [],
    statistics: { total_discovered: 0, total_filtered: 0, total_scraped: 0, scrape_failures: 0 },
    filtered_out_samples: [],
  };
}

/**
 * Profile analysis is not available yet; the URL is echoed back.
 */
export async function analyzeLinkedIn(linkedinUrl: string): Promise<LinkedInAnalysis> {
  return { status: 'not_implemented', url: linkedinUrl };
}

/**
 * Analyze one lead and persist the record
 *
 * On failure the partial record is saved with an `error` block and the error
 * is rethrown so the caller can retry.
 */
export async function executeRegistrationWorkflow(
  event: LeadEvent,
  step: StepRunner,
  deps: RegistrationDeps
): Promise<RegistrationRecord> {
  const clock = deps.clock ?? systemClock;
  const logger = deps.logger ?? createLogger('run-manager');
  const isoNow = (): string => new Date(clock.now()).toISOString();

  const filename = generateOutputFilename(
    event.request_id,
    event.timestamp,
    event.first_name,
    event.last_name,
    deps.includePersonName ?? true
  );

  const record: RegistrationRecord = {
    request_id: event.request_id,
    timestamp: event.timestamp,
    input_data: {
      first_name: event.first_name,
      last_name: event.last_name,
      company_website: event.company_website,
      linkedin: event.linkedin,
    },
    linkedin_analysis: { status: 'not_implemented' },
    website_analysis: emptyWebsiteAnalysis(),
  };

  const persist = async (): Promise<void> => {
    record._metadata = { filename, saved_at: isoNow(), version: OUTPUT_FORMAT_VERSION };
    await saveLeadResult(deps.storage, record, filename, logger);
  };

  logger.info('Starting registration workflow', { requestId: event.request_id });

  try {
    const linkedin = event.linkedin;
    if (linkedin) {
      record.linkedin_analysis = await step.run('analyze-linkedin', () => analyzeLinkedIn(linkedin));
    }

    const website = event.company_website;
    if (website) {
      record.website_analysis = await step.run('analyze-website', () => deps.analyzeWebsite(website));
    }

    await step.run('save-results', async () => {
      await persist();
      return filename;
    });

    logger.info('Registration workflow complete', { requestId: event.request_id, filename });
    return record;
  } catch (error) {
    logger.error('Registration workflow failed', {
      requestId: event.request_id,
      error: errorMessage(error),
    });

    record.error = {
      message: errorMessage(error),
      type: error instanceof Error ? error.name : typeof error,
      timestamp: isoNow(),
    };

    try {
      await persist();
    } catch (saveError) {
      logger.error('Failed to save partial result', {
        requestId: event.request_id,
        error: errorMessage(saveError),
      });
    }

    throw error;
  }
}
