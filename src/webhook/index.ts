/**
 * Webhook Module
 *
 * Verifies signatures on inbound workflow webhooks.
 *
 * Header format: `t=<timestamp>&s=<hex hmac-sha256>` (the `t=` part is optional)
 */

import { createHmac, timingSafeEqual } from 'crypto';
import { createLogger } from '../logger/index.js';
import type { Logger } from '../types/index.js';

/**
 * Extract the `s=` value from a signature header
 */
export function parseSignatureHeader(header: string): string | null {
  for (const part of header.split('&')) {
    const [key, ...rest] = part.trim().split('=');
    if (key === 's' && rest.length > 0) {
      const value = rest.join('=');
      return value.length > 0 ? value : null;
    }
  }
  return null;
}

export function computeSignature(payload: string | Buffer, signingKey: string): string {
  return createHmac('sha256', signingKey).update(payload).digest('hex');
}

/**
 * Check an inbound webhook signature
 *
 * Without a signing key every request is accepted (development mode).
 */
export function validateWebhookSignature(
  payload: string | Buffer,
  signature: string | null | undefined,
  signingKey?: string | null,
  logger: Logger = createLogger('webhook')
): boolean {
  if (!signingKey) {
    logger.warn('No webhook signing key configured, accepting unsigned request');
    return true;
  }

  if (!signature) {
    logger.warn('Missing webhook signature');
    return false;
  }

  const provided = parseSignatureHeader(signature);
  if (!provided) {
    logger.warn('Malformed webhook signature header');
    return false;
  }

  const expected = Buffer.from(computeSignature(payload, signingKey), 'utf-8');
  const actual = Buffer.from(provided, 'utf-8');
  if (expected.length !== actual.length) {
    return false;
  }
  return timingSafeEqual(expected, actual);
}
