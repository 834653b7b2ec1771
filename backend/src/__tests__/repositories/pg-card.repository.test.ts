import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Pool } from 'pg';
import { PgCardRepository } from '@/repositories/pg-card.repository';
import { buildCard, createMockClient, createMockPool, createMockQueryResult } from '../utils/test-helpers';

vi.mock('@/utils/logger', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  serializeError: (error: unknown) => ({ message: String(error) }),
}));

describe('PgCardRepository', () => {
  let pool: ReturnType<typeof createMockPool>;
  let repository: PgCardRepository;

  beforeEach(() => {
    pool = createMockPool();
    repository = new PgCardRepository(pool as unknown as Pool);
  });

  describe('findById', () => {
    it('returns the row when found', async () => {
      const card = buildCard();
      pool.query.mockResolvedValueOnce(createMockQueryResult([card]));

      expect(await repository.findById(1)).toEqual(card);
      expect(pool.query).toHaveBeenCalledWith(expect.stringContaining('WHERE id = $1'), [1]);
    });

    it('returns null when missing', async () => {
      pool.query.mockResolvedValueOnce(createMockQueryResult([]));

      expect(await repository.findById(99)).toBeNull();
    });
  });

  describe('insertIfAbsent', () => {
    const data = { vietnamese: 'ngày mai', english: 'tomorrow', category: 'time', difficulty_level: 1 };

    it('reports an inserted row', async () => {
      const card = buildCard();
      pool.query.mockResolvedValueOnce(createMockQueryResult([card]));

      expect(await repository.insertIfAbsent(data)).toEqual({ card, inserted: true });
      expect(pool.query).toHaveBeenCalledWith(
        expect.stringContaining('ON CONFLICT (vietnamese, english) DO NOTHING'),
        ['ngày mai', 'tomorrow', 'time', 1]
      );
    });

    it('falls back to the existing row on conflict', async () => {
      const existing = buildCard({ id: 7, success_count: 3 });
      pool.query
        .mockResolvedValueOnce(createMockQueryResult([]))
        .mockResolvedValueOnce(createMockQueryResult([existing]));

      expect(await repository.insertIfAbsent(data)).toEqual({ card: existing, inserted: false });
      expect(pool.query).toHaveBeenLastCalledWith(
        expect.stringContaining('WHERE vietnamese = $1 AND english = $2'),
        ['ngày mai', 'tomorrow']
      );
    });

    it('throws when the conflicting row has vanished', async () => {
      pool.query
        .mockResolvedValueOnce(createMockQueryResult([]))
        .mockResolvedValueOnce(createMockQueryResult([]));

      await expect(repository.insertIfAbsent(data)).rejects.toThrow('Card insert conflicted but no existing row was found');
    });
  });

  it('passes category, skip and limit to list', async () => {
    pool.query.mockResolvedValueOnce(createMockQueryResult([]));

    await repository.list({ category: 'time', skip: 10, limit: 5 });

    expect(pool.query).toHaveBeenCalledWith(expect.stringContaining('ORDER BY id'), ['time', 10, 5]);
  });

  it('passes null for an absent category filter', async () => {
    pool.query.mockResolvedValueOnce(createMockQueryResult([]));

    await repository.pickRandom();

    expect(pool.query).toHaveBeenCalledWith(expect.stringContaining('ORDER BY random()'), [null]);
  });

  it('increments the matching counter on review', async () => {
    const reviewedAt = new Date('2026-03-02T08:00:00.000Z');
    pool.query.mockResolvedValue(createMockQueryResult([]));

    await repository.recordReview(4, { outcome: 'success', markMastered: true, reviewedAt });
    await repository.recordReview(4, { outcome: 'failure', markMastered: false, reviewedAt });

    expect(pool.query).toHaveBeenNthCalledWith(1, expect.stringContaining('UPDATE cards'), [4, 1, 0, true, reviewedAt]);
    expect(pool.query).toHaveBeenNthCalledWith(2, expect.stringContaining('UPDATE cards'), [4, 0, 1, false, reviewedAt]);
  });

  it('returns affected row counts for bulk updates', async () => {
    pool.query
      .mockResolvedValueOnce(createMockQueryResult([], 12))
      .mockResolvedValueOnce(createMockQueryResult([], 3));

    expect(await repository.deleteAll()).toBe(12);
    expect(await repository.resetMastery('time')).toBe(3);
    expect(pool.query).toHaveBeenLastCalledWith(expect.stringContaining('SET mastered = FALSE'), ['time']);
  });

  it('maps category rows to names', async () => {
    pool.query.mockResolvedValueOnce(createMockQueryResult([{ category: 'family' }, { category: 'time' }]));

    expect(await repository.listCategories()).toEqual(['family', 'time']);
  });

  describe('transaction', () => {
    it('commits and releases the client', async () => {
      const client = createMockClient();
      client.query.mockResolvedValue(createMockQueryResult([], 2));
      pool.connect.mockResolvedValueOnce(client);

      const removed = await repository.transaction((tx) => tx.deleteAll());

      expect(removed).toBe(2);
      expect(client.query.mock.calls.map((call) => call[0])).toEqual(['BEGIN', 'DELETE FROM cards', 'COMMIT']);
      expect(pool.query).not.toHaveBeenCalled();
      expect(client.release).toHaveBeenCalledOnce();
    });

    it('rolls back and rethrows on failure', async () => {
      const client = createMockClient();
      client.query.mockResolvedValue(createMockQueryResult([]));
      pool.connect.mockResolvedValueOnce(client);

      await expect(
        repository.transaction(async () => {
          throw new Error('row failed');
        })
      ).rejects.toThrow('row failed');

      expect(client.query.mock.calls.map((call) => call[0])).toEqual(['BEGIN', 'ROLLBACK']);
      expect(client.release).toHaveBeenCalledOnce();
    });
  });

  it('pings through SELECT NOW()', async () => {
    pool.query.mockResolvedValueOnce(createMockQueryResult([{ now: new Date() }]));
    expect(await repository.ping()).toBe(true);

    pool.query.mockRejectedValueOnce(new Error('connection refused'));
    expect(await repository.ping()).toBe(false);
  });
});
