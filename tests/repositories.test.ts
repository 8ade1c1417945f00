/**
 * Repository Unit Tests
 * Tests the document repository and the postgres driver using a mocked pool
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { QueryResult } from 'pg';

// Use vi.hoisted to create mocks that can be referenced in vi.mock factory
const { mockQuery, mockConnect, mockClosePool } = vi.hoisted(() => ({
  mockQuery: vi.fn(),
  mockConnect: vi.fn(),
  mockClosePool: vi.fn(),
}));

// Mock the database pool
vi.mock('../src/db/connection.js', () => ({
  pool: {
    query: mockQuery,
    connect: mockConnect,
  },
  closePool: mockClosePool,
  testConnection: vi.fn(),
  query: mockQuery,
}));

// Import after mocking
import * as documentRepository from '../src/db/repositories/document-repository.js';
import type { DocumentRow } from '../src/db/repositories/document-repository.js';
import { PostgresKeyValueStore } from '../src/services/storage/postgres-store.js';

function result(rows: DocumentRow[]): QueryResult<DocumentRow> {
  return { rows, rowCount: rows.length, command: 'SELECT', oid: 0, fields: [] };
}

describe('DocumentRepository', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('findByKey', () => {
    it('should return the stored value', async () => {
      const value = { emotionalWins: 1, logicalWins: 0, totalDebates: 1 };
      mockQuery.mockResolvedValueOnce(result([{ key: 'statistics', value, updated_at: new Date('2024-05-01T10:00:00Z') }]));

      await expect(documentRepository.findByKey('statistics')).resolves.toEqual(value);
      expect(mockQuery).toHaveBeenCalledWith(
        'SELECT key, value, updated_at FROM document_store WHERE key = $1',
        ['statistics']
      );
    });

    it('should return undefined when no row exists', async () => {
      mockQuery.mockResolvedValueOnce(result([]));

      await expect(documentRepository.findByKey('debates')).resolves.toBeUndefined();
    });

    it('should wrap database errors', async () => {
      mockQuery.mockRejectedValueOnce(new Error('connection refused'));

      await expect(documentRepository.findByKey('debates')).rejects.toThrow(
        'Failed to read document debates: connection refused'
      );
    });
  });

  describe('upsert', () => {
    it('should insert or update the serialized document', async () => {
      mockQuery.mockResolvedValueOnce(result([]));
      const value = { cases: {}, debates: {} };

      await documentRepository.upsert('debates', value);

      const [sql, params] = mockQuery.mock.calls[0] ?? [];
      expect(sql).toContain('INSERT INTO document_store (key, value, updated_at)');
      expect(sql).toContain('ON CONFLICT (key)');
      expect(sql).toContain('DO UPDATE SET value = EXCLUDED.value, updated_at = NOW()');
      expect(params).toEqual(['debates', '{"cases":{},"debates":{}}']);
    });

    it('should wrap database errors', async () => {
      mockQuery.mockRejectedValueOnce(new Error('disk full'));

      await expect(documentRepository.upsert('statistics', {})).rejects.toThrow(
        'Failed to write document statistics: disk full'
      );
    });
  });
});

describe('PostgresKeyValueStore', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should read and write through the repository', async () => {
    const kv = new PostgresKeyValueStore();
    mockQuery.mockResolvedValueOnce(result([]));
    mockQuery.mockResolvedValueOnce(
      result([{ key: 'statistics', value: { totalDebates: 2 }, updated_at: new Date('2024-05-01T10:00:00Z') }])
    );

    await kv.set('statistics', { totalDebates: 2 });
    await expect(kv.get('statistics')).resolves.toEqual({ totalDebates: 2 });
    expect(kv.driver).toBe('postgres');
    expect(mockQuery).toHaveBeenCalledTimes(2);
  });

  it('should close the pool', async () => {
    mockClosePool.mockResolvedValueOnce(undefined);

    await new PostgresKeyValueStore().close();

    expect(mockClosePool).toHaveBeenCalledTimes(1);
  });
});
