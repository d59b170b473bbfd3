/**
 * Unit tests for the Storage Module
 * Tests MemoryRecordStore functionality and record decoding
 */

import { describe, test, expect, beforeEach } from '@jest/globals';
import { ConfigurationFailure } from '../../src/errors/index.js';
import {
  MemoryRecordStore,
  S3RecordStore,
  createRecordStore,
  decodeRecord,
} from '../../src/storage/index.js';
import type { CompanyProfileRecord, GeneratedDocumentRecord } from '../../src/types/index.js';

const TIMESTAMP = '2025-02-10T09:00:00.000Z';

function documentRecord(id: number, overrides: Partial<GeneratedDocumentRecord> = {}): GeneratedDocumentRecord {
  return {
    id,
    doc_type: 'offer_letter',
    title: `Offer Letter ${id}`,
    content: '# Offer',
    model_used: 'test-local-model',
    generation_time: 1.5,
    company_id: null,
    created_at: TIMESTAMP,
    updated_at: TIMESTAMP,
    ...overrides,
  };
}

function companyRecord(id: number): CompanyProfileRecord {
  return {
    id,
    name: 'Acme Test Co',
    industry: null,
    size: null,
    location: 'Denver, CO',
    website: null,
    description: null,
    values: null,
    logo_url: null,
    created_at: TIMESTAMP,
    updated_at: TIMESTAMP,
  };
}

describe('Storage Module', () => {
  let store: MemoryRecordStore;

  beforeEach(() => {
    store = new MemoryRecordStore();
  });

  describe('MemoryRecordStore', () => {
    test('should save and load a record by collection and id', async () => {
      await store.save('documents', documentRecord(1));

      await expect(store.load('documents', 1)).resolves.toEqual(documentRecord(1));
      await expect(store.load('companies', 1)).resolves.toBeNull();
    });

    test('should return copies rather than shared references', async () => {
      const record = documentRecord(1);
      await store.save('documents', record);
      record.title = 'Mutated';

      const loaded = await store.load('documents', 1);

      expect(loaded?.title).toBe('Offer Letter 1');
    });

    test('should report existence', async () => {
      await store.save('companies', companyRecord(3));

      await expect(store.exists('companies', 3)).resolves.toBe(true);
      await expect(store.exists('companies', 4)).resolves.toBe(false);
    });

    test('should list one collection in ascending id order', async () => {
      await store.save('documents', documentRecord(2));
      await store.save('documents', documentRecord(1));
      await store.save('companies', companyRecord(1));

      const documents = await store.list('documents');

      expect(documents.map((doc) => doc.id)).toEqual([1, 2]);
    });

    test('should delete records and report whether anything was removed', async () => {
      await store.save('documents', documentRecord(1));

      await expect(store.delete('documents', 1)).resolves.toBe(true);
      await expect(store.delete('documents', 1)).resolves.toBe(false);
      expect(store.size()).toBe(0);
    });

    test('should allocate ids per collection without reuse', async () => {
      await expect(store.nextId('documents')).resolves.toBe(1);
      await expect(store.nextId('documents')).resolves.toBe(2);
      await expect(store.nextId('companies')).resolves.toBe(1);

      await store.save('documents', documentRecord(7));
      await expect(store.nextId('documents')).resolves.toBe(8);

      await store.delete('documents', 7);
      await expect(store.nextId('documents')).resolves.toBe(9);
    });

    test('should clear everything', async () => {
      await store.save('documents', documentRecord(1));
      await store.nextId('documents');

      store.clear();

      expect(store.size()).toBe(0);
      await expect(store.nextId('documents')).resolves.toBe(1);
    });
  });

  describe('decodeRecord()', () => {
    test('should reject invalid JSON', () => {
      expect(() => decodeRecord('documents', '{not json')).toThrow('Corrupt documents record: invalid JSON');
    });

    test('should name the invalid fields', () => {
      const body = JSON.stringify({ ...documentRecord(1), doc_type: 'memo' });

      expect(() => decodeRecord('documents', body)).toThrow('Corrupt documents record: invalid fields doc_type');
    });

    test('should raise a configuration failure', () => {
      expect(() => decodeRecord('companies', '{}')).toThrow(ConfigurationFailure);
    });
  });

  describe('createRecordStore()', () => {
    test('should build a memory store by default', () => {
      expect(createRecordStore({ driver: 'memory' })).toBeInstanceOf(MemoryRecordStore);
    });

    test('should build an S3 store with the configured key layout', () => {
      const s3 = createRecordStore({ driver: 's3', bucket: 'test-bucket', prefix: 'hr', region: 'us-east-1' });

      expect(s3).toBeInstanceOf(S3RecordStore);
      if (s3 instanceof S3RecordStore) {
        expect(s3.getKey('documents', 42)).toBe('hr/documents/42.json');
      }
    });
  });
});
