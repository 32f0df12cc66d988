/**
 * Core type definitions for the lead intel pipeline
 *
 * This module exports the shared types used across modules. Types that belong
 * to a single stage (scoring, scraping, crawl jobs) live with that stage.
 */

/**
 * Unique identifier for a lead analysis request (UUID v4)
 */
export type RequestId = string;

// ============================================================================
// Observability
// ============================================================================

/**
 * Logger interface for observability
 */
export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Metrics interface for observability
 */
export interface Metrics {
  increment(metric: string, tags?: Record<string, string>): void;
  gauge(metric: string, value: number, tags?: Record<string, string>): void;
  timing(metric: string, value: number, tags?: Record<string, string>): void;
}

/**
 * Time source used by every cooperative wait in the pipeline.
 * Injected so tests can run rate limiting, backoff and polling without real delays.
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

// ============================================================================
// Lead Input
// ============================================================================

/**
 * Validated registration payload for one lead
 */
export interface LeadSubmission {
  first_name: string;
  last_name: string;
  company_website: string | null;
  linkedin: string | null;
}

/**
 * Workflow event data: a lead plus the identifiers assigned on intake
 */
export interface LeadEvent extends LeadSubmission {
  request_id: RequestId;
  timestamp: string;
}

// ============================================================================
// Storage
// ============================================================================

/**
 * Artifact metadata for storage tracking
 */
export interface ArtifactMetadata {
  name: string;
  createdAt: string;
  contentType: string;
  size?: number;
  checksum?: string;
}

/**
 * Storage adapter interface for write-once result persistence
 */
export interface StorageAdapter {
  save(name: string, content: string | Buffer, metadata?: Record<string, unknown>): Promise<ArtifactMetadata>;
  load(name: string): Promise<{ content: string | Buffer; metadata: ArtifactMetadata }>;
  exists(name: string): Promise<boolean>;
  list(prefix?: string): Promise<ArtifactMetadata[]>;
  delete(name: string): Promise<void>;
}

// ============================================================================
// Module Results
// ============================================================================

/**
 * Module result wrapper shared by intake-facing operations
 */
export interface ModuleResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: unknown;
  };
  metadata: {
    module: string;
    timestamp: string;
    duration?: number;
  };
}
