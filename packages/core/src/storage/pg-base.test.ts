import { describe, it, expect, vi, beforeEach } from 'vitest';
import type pg from 'pg';

const mockQuery = vi.fn();
const mockConnect = vi.fn();

vi.mock('./pg-pool.js', () => ({
  getPool: () => ({
    query: (...args: unknown[]) => mockQuery(...args),
    connect: () => mockConnect(),
  }),
}));

import { PgBaseStorage } from './pg-base.js';

interface Row {
  id: string;
}

// Exposes the protected helpers
class TestStorage extends PgBaseStorage {
  one(text: string, values?: unknown[]) {
    return this.queryOne<Row>(text, values);
  }
  many(text: string, values?: unknown[]) {
    return this.queryMany<Row>(text, values);
  }
  exec(text: string, values?: unknown[]) {
    return this.execute(text, values);
  }
  tx<T>(fn: (client: pg.PoolClient) => Promise<T>) {
    return this.withTransaction(fn);
  }
}

describe('PgBaseStorage', () => {
  let storage: TestStorage;
  let client: { query: ReturnType<typeof vi.fn>; release: ReturnType<typeof vi.fn> };

  beforeEach(() => {
    mockQuery.mockReset().mockResolvedValue({ rows: [], rowCount: 0 });
    client = {
      query: vi.fn().mockResolvedValue({ rows: [], rowCount: 0 }),
      release: vi.fn(),
    };
    mockConnect.mockReset().mockResolvedValue(client);
    storage = new TestStorage();
  });

  describe('queryOne', () => {
    it('returns the first row', async () => {
      mockQuery.mockResolvedValueOnce({ rows: [{ id: 'a' }, { id: 'b' }], rowCount: 2 });
      await expect(storage.one('SELECT * FROM t WHERE id = $1', ['a'])).resolves.toEqual({ id: 'a' });
      expect(mockQuery).toHaveBeenCalledWith('SELECT * FROM t WHERE id = $1', ['a']);
    });

    it('returns null when there are no rows', async () => {
      await expect(storage.one('SELECT 1')).resolves.toBeNull();
    });
  });

  describe('queryMany', () => {
    it('returns all rows', async () => {
      mockQuery.mockResolvedValueOnce({ rows: [{ id: 'a' }, { id: 'b' }], rowCount: 2 });
      await expect(storage.many('SELECT * FROM t')).resolves.toEqual([{ id: 'a' }, { id: 'b' }]);
    });
  });

  describe('execute', () => {
    it('returns rowCount', async () => {
      mockQuery.mockResolvedValueOnce({ rows: [], rowCount: 3 });
      await expect(storage.exec('DELETE FROM t')).resolves.toBe(3);
    });

    it('returns 0 when rowCount is null', async () => {
      mockQuery.mockResolvedValueOnce({ rows: [], rowCount: null });
      await expect(storage.exec('DELETE FROM t')).resolves.toBe(0);
    });
  });

  describe('withTransaction', () => {
    it('commits and releases the client', async () => {
      const result = await storage.tx(async () => 'done');
      expect(result).toBe('done');
      expect(client.query.mock.calls.map((call) => call[0])).toEqual(['BEGIN', 'COMMIT']);
      expect(client.release).toHaveBeenCalledOnce();
    });

    it('rolls back and rethrows', async () => {
      await expect(
        storage.tx(async () => {
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');
      expect(client.query.mock.calls.map((call) => call[0])).toEqual(['BEGIN', 'ROLLBACK']);
      expect(client.release).toHaveBeenCalledOnce();
    });
  });
});
