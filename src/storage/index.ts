/**
 * Storage Module
 *
 * Plain key-value record store for company profiles and generated documents.
 *
 * Responsibilities:
 * - Define RecordStore interface
 * - Implement S3RecordStore using AWS SDK v3
 * - Implement MemoryRecordStore for tests and development
 * - Validate every record read back against its schema
 *
 * Object layout (S3):
 * - {prefix}/documents/{id}.json
 * - {prefix}/companies/{id}.json
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
import { z } from 'zod';
import { ConfigurationFailure } from '../errors/index.js';
import {
  DOCUMENT_TYPES,
  type CompanyProfileRecord,
  type GeneratedDocumentRecord,
} from '../types/index.js';

// ============================================================================
// Records
// ============================================================================

export interface CollectionRecords {
  documents: GeneratedDocumentRecord;
  companies: CompanyProfileRecord;
}

export type RecordCollection = keyof CollectionRecords;

const nullableText = z.string().nullable();

const generatedDocumentRecordSchema = z.object({
  id: z.number().int().positive(),
  doc_type: z.enum(DOCUMENT_TYPES),
  title: z.string(),
  content: z.string(),
  model_used: z.string(),
  generation_time: z.number().nonnegative(),
  company_id: z.number().int().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

const companyProfileRecordSchema = z.object({
  id: z.number().int().positive(),
  name: z.string(),
  industry: nullableText,
  size: nullableText,
  location: nullableText,
  website: nullableText,
  description: nullableText,
  values: nullableText,
  logo_url: nullableText,
  created_at: z.string(),
  updated_at: z.string(),
});

const RECORD_SCHEMAS: { [C in RecordCollection]: z.ZodType<CollectionRecords[C]> } = {
  documents: generatedDocumentRecordSchema,
  companies: companyProfileRecordSchema,
};

/**
 * Parse and validate a stored record body
 */
export function decodeRecord<C extends RecordCollection>(collection: C, body: string): CollectionRecords[C] {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new ConfigurationFailure(`Corrupt ${collection} record: invalid JSON`, {
      code: 'CORRUPT_RECORD',
      cause: error,
    });
  }

  const parsed = RECORD_SCHEMAS[collection].safeParse(json);
  if (!parsed.success) {
    const fields = parsed.error.errors.map((e) => e.path.join('.')).join(', ');
    throw new ConfigurationFailure(`Corrupt ${collection} record: invalid fields ${fields}`, {
      code: 'CORRUPT_RECORD',
    });
  }
  return parsed.data;
}

/**
 * Calculate MD5 checksum for a record body
 */
function calculateChecksum(content: string): string {
  return createHash('md5').update(Buffer.from(content, 'utf-8')).digest('hex');
}

// ============================================================================
// Interface
// ============================================================================

export interface RecordStore {
  save<C extends RecordCollection>(collection: C, record: CollectionRecords[C]): Promise<void>;
  /** `null` when no record has that id */
  load<C extends RecordCollection>(collection: C, id: number): Promise<CollectionRecords[C] | null>;
  exists(collection: RecordCollection, id: number): Promise<boolean>;
  /** All records, ascending id */
  list<C extends RecordCollection>(collection: C): Promise<CollectionRecords[C][]>;
  /** `false` when nothing was deleted */
  delete(collection: RecordCollection, id: number): Promise<boolean>;
  /** Identifier for the next new record */
  nextId(collection: RecordCollection): Promise<number>;
}

// ============================================================================
// S3 Store
// ============================================================================

/**
 * S3 configuration for the record store
 */
export interface S3Config {
  /** S3 bucket name */
  bucket: string;
  /** AWS region (defaults to us-east-1) */
  region?: string;
  /** Key prefix for all objects (defaults to 'records') */
  prefix?: string;
  /** Custom S3 endpoint for S3-compatible services */
  endpoint?: string;
  /** AWS credentials (optional if using IAM roles or environment variables) */
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
  };
  /** Force path style for S3-compatible services like MinIO */
  forcePathStyle?: boolean;
  /** Preconfigured client */
  client?: S3Client;
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === 'NotFound' ||
      error.name === 'NoSuchKey' ||
      error.message.includes('404') ||
      error.message.includes('Not Found'))
  );
}

/**
 * S3 implementation of RecordStore using AWS SDK v3. Ids are allocated as
 * max existing id + 1, so concurrent writers need an external sequence.
 */
export class S3RecordStore implements RecordStore {
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly prefix: string;

  constructor(config: S3Config) {
    this.bucket = config.bucket;
    this.prefix = config.prefix ?? 'records';

    if (config.client) {
      this.client = config.client;
      return;
    }

    const clientConfig: S3ClientConfig = {
      region: config.region ?? 'us-east-1',
    };
    if (config.endpoint) {
      clientConfig.endpoint = config.endpoint;
    }
    if (config.credentials) {
      clientConfig.credentials = config.credentials;
    }
    if (config.forcePathStyle) {
      clientConfig.forcePathStyle = true;
    }

    this.client = new S3Client(clientConfig);
  }

  getKey(collection: RecordCollection, id: number): string {
    return `${this.prefix}/${collection}/${id}.json`;
  }

  async save<C extends RecordCollection>(collection: C, record: CollectionRecords[C]): Promise<void> {
    const body = JSON.stringify(record);
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: this.getKey(collection, record.id),
        Body: body,
        ContentType: 'application/json',
        Metadata: {
          collection,
          'updated-at': record.updated_at,
          checksum: calculateChecksum(body),
        },
      })
    );
  }

  async load<C extends RecordCollection>(collection: C, id: number): Promise<CollectionRecords[C] | null> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: this.getKey(collection, id) })
      );
      if (!response.Body) {
        return null;
      }
      return decodeRecord(collection, await response.Body.transformToString());
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async exists(collection: RecordCollection, id: number): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: this.getKey(collection, id) }));
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  async list<C extends RecordCollection>(collection: C): Promise<CollectionRecords[C][]> {
    const ids = await this.listIds(collection);
    const records: CollectionRecords[C][] = [];
    for (const id of ids) {
      const record = await this.load(collection, id);
      if (record) {
        records.push(record);
      }
    }
    return records;
  }

  async delete(collection: RecordCollection, id: number): Promise<boolean> {
    if (!(await this.exists(collection, id))) {
      return false;
    }
    await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: this.getKey(collection, id) }));
    return true;
  }

  async nextId(collection: RecordCollection): Promise<number> {
    const ids = await this.listIds(collection);
    return ids.length === 0 ? 1 : Math.max(...ids) + 1;
  }

  private async listIds(collection: RecordCollection): Promise<number[]> {
    const prefix = `${this.prefix}/${collection}/`;
    const ids: number[] = [];
    let continuationToken: string | undefined;

    do {
      const response = await this.client.send(
        new ListObjectsV2Command({ Bucket: this.bucket, Prefix: prefix, ContinuationToken: continuationToken })
      );
      for (const object of response.Contents ?? []) {
        const match = /\/(\d+)\.json$/.exec(object.Key ?? '');
        if (match?.[1]) {
          ids.push(Number.parseInt(match[1], 10));
        }
      }
      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);

    return ids.sort((a, b) => a - b);
  }
}

// ============================================================================
// Memory Store
// ============================================================================

/**
 * In-memory record store. Records are kept as JSON so callers never share
 * object references with the store.
 */
export class MemoryRecordStore implements RecordStore {
  private readonly store = new Map<string, string>();
  private readonly sequences = new Map<RecordCollection, number>();

  private getKey(collection: RecordCollection, id: number): string {
    return `${collection}/${id}`;
  }

  async save<C extends RecordCollection>(collection: C, record: CollectionRecords[C]): Promise<void> {
    this.store.set(this.getKey(collection, record.id), JSON.stringify(record));
    this.sequences.set(collection, Math.max(this.sequences.get(collection) ?? 0, record.id));
  }

  async load<C extends RecordCollection>(collection: C, id: number): Promise<CollectionRecords[C] | null> {
    const body = this.store.get(this.getKey(collection, id));
    return body === undefined ? null : decodeRecord(collection, body);
  }

  async exists(collection: RecordCollection, id: number): Promise<boolean> {
    return this.store.has(this.getKey(collection, id));
  }

  async list<C extends RecordCollection>(collection: C): Promise<CollectionRecords[C][]> {
    const prefix = `${collection}/`;
    const records: CollectionRecords[C][] = [];
    for (const [key, body] of this.store.entries()) {
      if (key.startsWith(prefix)) {
        records.push(decodeRecord(collection, body));
      }
    }
    return records.sort((a, b) => a.id - b.id);
  }

  async delete(collection: RecordCollection, id: number): Promise<boolean> {
    return this.store.delete(this.getKey(collection, id));
  }

  /** Ids are never reused, even after deletes */
  async nextId(collection: RecordCollection): Promise<number> {
    const next = (this.sequences.get(collection) ?? 0) + 1;
    this.sequences.set(collection, next);
    return next;
  }

  /**
   * Clear all stored records (useful for test cleanup)
   */
  clear(): void {
    this.store.clear();
    this.sequences.clear();
  }

  size(): number {
    return this.store.size;
  }
}

// ============================================================================
// Factory
// ============================================================================

export type StoreSettings =
  | { driver: 'memory' }
  | ({ driver: 's3' } & S3Config);

export function createRecordStore(settings: StoreSettings): RecordStore {
  if (settings.driver === 's3') {
    return new S3RecordStore(settings);
  }
  return new MemoryRecordStore();
}
