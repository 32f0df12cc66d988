/**
 * Storage Module
 *
 * Responsibilities:
 * - Define StorageAdapter interface
 * - Implement S3StorageAdapter using AWS SDK v3
 * - Implement MemoryStorageAdapter for testing
 * - Write-once persistence of lead analysis records
 *
 * Storage paths:
 * - {prefix}/analysis_YYYYMMDD_HHMMSS_[FirstL_]<id8>.json
 *
 * Usage:
 * const storage = createStorageAdapter(config.output);
 * await saveLeadResult(storage, record, filename);
 */

import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  DeleteObjectCommand,
  ListObjectsV2Command,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';
import { createHash } from 'crypto';
import { createLogger } from '../logger/index.js';
import type { StorageAdapter, ArtifactMetadata, Logger } from '../types/index.js';

export type { StorageAdapter, ArtifactMetadata };

/**
 * S3 configuration for storage adapter
 */
export interface S3Config {
  /** S3 bucket name */
  bucket: string;
  /** AWS region (defaults to us-east-1) */
  region?: string;
  /** Key prefix for all objects (defaults to 'outputs') */
  prefix?: string;
  /** Custom S3 endpoint for local development or alternative S3-compatible services */
  endpoint?: string;
  /** AWS credentials (optional if using IAM roles or environment variables) */
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
  };
  /** Force path style for S3-compatible services like MinIO */
  forcePathStyle?: boolean;
}

/**
 * Calculate MD5 checksum for content
 */
function calculateChecksum(content: string | Buffer): string {
  const buffer = typeof content === 'string' ? Buffer.from(content, 'utf-8') : content;
  return createHash('md5').update(buffer).digest('hex');
}

function getContentSize(content: string | Buffer): number {
  return typeof content === 'string' ? Buffer.byteLength(content, 'utf-8') : content.length;
}

function contentTypeOf(metadata?: Record<string, unknown>): string {
  const value = metadata?.['contentType'];
  return typeof value === 'string' ? value : 'application/json';
}

/**
 * S3 implementation of StorageAdapter using AWS SDK v3
 */
export class S3StorageAdapter implements StorageAdapter {
  private client: S3Client;
  private bucket: string;
  private prefix: string;

  constructor(config: S3Config, client?: S3Client) {
    this.bucket = config.bucket;
    this.prefix = config.prefix ?? 'outputs';

    const clientConfig: S3ClientConfig = {
      region: config.region ?? 'us-east-1',
    };

    if (config.endpoint) {
      clientConfig.endpoint = config.endpoint;
      clientConfig.forcePathStyle = true;
    }

    if (config.credentials) {
      clientConfig.credentials = config.credentials;
    }

    if (config.forcePathStyle) {
      clientConfig.forcePathStyle = true;
    }

    this.client = client ?? new S3Client(clientConfig);
  }

  /**
   * S3 object key for an artifact name
   */
  getKey(name: string): string {
    return this.prefix ? `${this.prefix}/${name}` : name;
  }

  private nameFromKey(key: string): string {
    return this.prefix && key.startsWith(`${this.prefix}/`) ? key.slice(this.prefix.length + 1) : key;
  }

  async save(name: string, content: string | Buffer, metadata?: Record<string, unknown>): Promise<ArtifactMetadata> {
    const now = new Date().toISOString();
    const checksum = calculateChecksum(content);
    const size = getContentSize(content);
    const contentType = contentTypeOf(metadata);

    const s3Metadata: Record<string, string> = {
      'created-at': now,
      checksum,
    };

    if (metadata) {
      for (const [k, v] of Object.entries(metadata)) {
        if (k !== 'contentType' && typeof v === 'string') {
          s3Metadata[k] = v;
        }
      }
    }

    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: this.getKey(name),
        Body: content,
        ContentType: contentType,
        Metadata: s3Metadata,
      })
    );

    return { name, createdAt: now, contentType, size, checksum };
  }

  /**
   * @throws Error if artifact not found
   */
  async load(name: string): Promise<{ content: string | Buffer; metadata: ArtifactMetadata }> {
    const response = await this.client.send(
      new GetObjectCommand({
        Bucket: this.bucket,
        Key: this.getKey(name),
      })
    );

    if (!response.Body) {
      throw new Error(`Artifact not found: ${name}`);
    }

    const content = await response.Body.transformToString();

    const metadata: ArtifactMetadata = {
      name,
      createdAt: response.Metadata?.['created-at'] ?? new Date().toISOString(),
      contentType: response.ContentType ?? 'application/json',
    };

    if (response.ContentLength !== undefined) {
      metadata.size = response.ContentLength;
    }

    if (response.Metadata?.['checksum']) {
      metadata.checksum = response.Metadata['checksum'];
    }

    return { content, metadata };
  }

  async exists(name: string): Promise<boolean> {
    try {
      await this.client.send(
        new HeadObjectCommand({
          Bucket: this.bucket,
          Key: this.getKey(name),
        })
      );
      return true;
    } catch (error: unknown) {
      if (
        error instanceof Error &&
        (error.name === 'NotFound' ||
          error.name === 'NoSuchKey' ||
          error.message.includes('404') ||
          error.message.includes('Not Found'))
      ) {
        return false;
      }
      throw error;
    }
  }

  async list(prefix = ''): Promise<ArtifactMetadata[]> {
    const response = await this.client.send(
      new ListObjectsV2Command({
        Bucket: this.bucket,
        Prefix: this.getKey(prefix),
      })
    );

    return (response.Contents ?? []).map((obj) => {
      const metadata: ArtifactMetadata = {
        name: this.nameFromKey(obj.Key ?? ''),
        createdAt: obj.LastModified?.toISOString() ?? new Date().toISOString(),
        contentType: 'application/json',
      };
      if (obj.Size !== undefined) {
        metadata.size = obj.Size;
      }
      return metadata;
    });
  }

  async delete(name: string): Promise<void> {
    await this.client.send(
      new DeleteObjectCommand({
        Bucket: this.bucket,
        Key: this.getKey(name),
      })
    );
  }
}

/**
 * In-memory storage adapter for testing and development
 */
export class MemoryStorageAdapter implements StorageAdapter {
  private store: Map<string, { content: string | Buffer; metadata: ArtifactMetadata }> = new Map();

  async save(name: string, content: string | Buffer, metadata?: Record<string, unknown>): Promise<ArtifactMetadata> {
    const artifactMetadata: ArtifactMetadata = {
      name,
      createdAt: new Date().toISOString(),
      contentType: contentTypeOf(metadata),
      size: getContentSize(content),
      checksum: calculateChecksum(content),
    };

    this.store.set(name, { content, metadata: artifactMetadata });

    return artifactMetadata;
  }

  /**
   * @throws Error if artifact not found
   */
  async load(name: string): Promise<{ content: string | Buffer; metadata: ArtifactMetadata }> {
    const item = this.store.get(name);

    if (!item) {
      throw new Error(`Artifact not found: ${name}`);
    }

    return item;
  }

  async exists(name: string): Promise<boolean> {
    return this.store.has(name);
  }

  async list(prefix = ''): Promise<ArtifactMetadata[]> {
    const artifacts: ArtifactMetadata[] = [];
    for (const [key, value] of this.store.entries()) {
      if (key.startsWith(prefix)) {
        artifacts.push(value.metadata);
      }
    }
    return artifacts;
  }

  async delete(name: string): Promise<void> {
    this.store.delete(name);
  }

  /**
   * Clear all stored artifacts (useful for test cleanup)
   */
  clear(): void {
    this.store.clear();
  }

  size(): number {
    return this.store.size;
  }

  keys(): string[] {
    return Array.from(this.store.keys());
  }
}

export interface OutputStorageConfig {
  bucket: string | null;
  prefix: string;
  region: string;
  endpoint: string | null;
}

/**
 * S3 adapter when a bucket is configured, in-memory otherwise
 */
export function createStorageAdapter(config: OutputStorageConfig): StorageAdapter {
  if (!config.bucket) {
    return new MemoryStorageAdapter();
  }
  return new S3StorageAdapter({
    bucket: config.bucket,
    prefix: config.prefix,
    region: config.region,
    ...(config.endpoint ? { endpoint: config.endpoint } : {}),
  });
}

// ============================================================================
// Result Persistence
// ============================================================================

export interface SaveResult {
  metadata: ArtifactMetadata;
  /** False when a complete result with the same name already existed */
  written: boolean;
}

/**
 * True when stored content is a JSON object carrying a top-level `error` block
 */
function isFailureRecord(content: string | Buffer): boolean {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content.toString());
  } catch {
    return false;
  }
  return typeof parsed === 'object' && parsed !== null && 'error' in parsed;
}

/**
 * Persist a JSON-serializable record under `name`, at most once
 *
 * An existing complete result is left untouched and its metadata returned.
 * A stored failure record (one with an `error` block) is replaced, so a retry
 * that succeeds supersedes the partial result of the attempt before it.
 */
export async function saveLeadResult(
  storage: StorageAdapter,
  record: unknown,
  name: string,
  logger: Logger = createLogger('storage')
): Promise<SaveResult> {
  if (await storage.exists(name)) {
    const existing = await storage.load(name);
    if (!isFailureRecord(existing.content)) {
      logger.info('Result already stored, skipping write', { name });
      return { metadata: existing.metadata, written: false };
    }
    logger.info('Replacing stored failure record', { name });
  }

  const metadata = await storage.save(name, JSON.stringify(record, null, 2), {
    contentType: 'application/json',
  });
  logger.info('Saved result', { name, size: metadata.size });
  return { metadata, written: true };
}
