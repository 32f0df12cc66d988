/**
 * Intake Module
 *
 * Entry point for one registration webhook: verify the signature, validate
 * the lead, then run the registration workflow with retries and store the
 * record. Everything is built from AppConfig.
 *
 * Usage:
 * ```typescript
 * const service = createRegistrationService(loadConfig());
 * const response = await service.handle(rawBody, headers['x-signature']);
 * ```
 */

import type { AppConfig } from '../config/index.js';
import { systemClock } from '../http-client/index.js';
import { createLogger, errorMessage } from '../logger/index.js';
import { normalizeLead } from '../normalizer/index.js';
import { createPipeline, type PipelineOverrides, type WebsiteAnalysis } from '../pipeline/index.js';
import {
  executeRegistrationWorkflow,
  generateRequestId,
  runWithRetries,
  type RegistrationRecord,
} from '../run-manager/index.js';
import { createStorageAdapter } from '../storage/index.js';
import type { Clock, LeadEvent, Logger, RequestId, StorageAdapter } from '../types/index.js';
import { validateWebhookSignature } from '../webhook/index.js';

export type RejectionCode = 'INVALID_SIGNATURE' | 'INVALID_JSON' | 'VALIDATION_ERROR' | 'SOURCE_REQUIRED';

export type RegistrationResponse =
  | { status: 'completed'; request_id: RequestId; record: RegistrationRecord }
  | { status: 'failed'; request_id: RequestId; message: string }
  | { status: 'rejected'; code: RejectionCode; message: string; details?: unknown };

export interface RegistrationOverrides {
  storage?: StorageAdapter;
  /** Replaces the configured website pipeline */
  analyzeWebsite?: (websiteUrl: string) => Promise<WebsiteAnalysis>;
  pipeline?: PipelineOverrides;
  generateId?: () => RequestId;
  clock?: Clock;
  logger?: Logger;
}

export interface RegistrationService {
  readonly storage: StorageAdapter;
  handle(rawBody: string, signatureHeader?: string | null): Promise<RegistrationResponse>;
}

function isRejectionCode(code: string): code is 'VALIDATION_ERROR' | 'SOURCE_REQUIRED' {
  return code === 'VALIDATION_ERROR' || code === 'SOURCE_REQUIRED';
}

export function createRegistrationService(
  config: AppConfig,
  overrides: RegistrationOverrides = {}
): RegistrationService {
  const clock = overrides.clock ?? systemClock;
  const logger = overrides.logger ?? createLogger('intake', config.logLevel);
  const generateId = overrides.generateId ?? generateRequestId;
  const storage = overrides.storage ?? createStorageAdapter(config.output);
  const analyzeWebsite =
    overrides.analyzeWebsite ??
    createPipeline(config, { clock, logger, ...overrides.pipeline }).analyzeWebsite;

  const handle = async (rawBody: string, signatureHeader?: string | null): Promise<RegistrationResponse> => {
    if (!validateWebhookSignature(rawBody, signatureHeader, config.webhookSigningKey, logger)) {
      return { status: 'rejected', code: 'INVALID_SIGNATURE', message: 'Webhook signature verification failed' };
    }

    let body: unknown;
    try {
      body = JSON.parse(rawBody);
    } catch (error) {
      logger.warn('Registration body is not valid JSON', { error: errorMessage(error) });
      return { status: 'rejected', code: 'INVALID_JSON', message: 'Request body must be valid JSON' };
    }

    const lead = normalizeLead(body);
    if (!lead.success || !lead.data) {
      const code = lead.error?.code ?? 'VALIDATION_ERROR';
      return {
        status: 'rejected',
        code: isRejectionCode(code) ? code : 'VALIDATION_ERROR',
        message: lead.error?.message ?? 'Input validation failed',
        details: lead.error?.details,
      };
    }

    const event: LeadEvent = {
      ...lead.data,
      request_id: generateId(),
      timestamp: new Date(clock.now()).toISOString(),
    };
    logger.info('Registration accepted', { requestId: event.request_id });

    try {
      const record = await runWithRetries(
        (step) =>
          executeRegistrationWorkflow(event, step, {
            analyzeWebsite,
            storage,
            includePersonName: config.output.includePersonName,
            clock,
            logger,
          }),
        { maxAttempts: config.workflowMaxAttempts, clock, logger }
      );
      return { status: 'completed', request_id: event.request_id, record };
    } catch (error) {
      logger.error('Registration failed after all attempts', {
        requestId: event.request_id,
        attempts: config.workflowMaxAttempts,
        error: errorMessage(error),
      });
      return { status: 'failed', request_id: event.request_id, message: errorMessage(error) };
    }
  };

  return { storage, handle };
}
