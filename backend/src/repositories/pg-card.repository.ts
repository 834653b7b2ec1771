import type { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import type {
  Card,
  CardListFilter,
  CategoryAggregate,
  NewCard,
  ReviewRecord,
} from '@/types/database';
import type { CardRepository, InsertResult } from './card.repository';
import { testConnection } from '@/config/database';

const CARD_COLUMNS =
  'id, vietnamese, english, category, difficulty_level, success_count, fail_count, mastered, last_reviewed, created_at';

export class PgCardRepository implements CardRepository {
  /**
   * @param client set while running inside `transaction`; queries then go
   * through that client instead of the pool
   */
  constructor(
    private readonly pool: Pool,
    private readonly client: PoolClient | null = null
  ) {}

  private query<R extends QueryResultRow>(text: string, values: unknown[] = []): Promise<QueryResult<R>> {
    return this.client ? this.client.query<R>(text, values) : this.pool.query<R>(text, values);
  }

  async findById(id: number): Promise<Card | null> {
    const result = await this.query<Card>(
      `SELECT ${CARD_COLUMNS} FROM cards WHERE id = $1`,
      [id]
    );
    return result.rows[0] || null;
  }

  async findByPair(vietnamese: string, english: string): Promise<Card | null> {
    const result = await this.query<Card>(
      `SELECT ${CARD_COLUMNS} FROM cards WHERE vietnamese = $1 AND english = $2`,
      [vietnamese, english]
    );
    return result.rows[0] || null;
  }

  async insertIfAbsent(data: NewCard): Promise<InsertResult> {
    const result = await this.query<Card>(
      `INSERT INTO cards (vietnamese, english, category, difficulty_level)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (vietnamese, english) DO NOTHING
       RETURNING ${CARD_COLUMNS}`,
      [data.vietnamese, data.english, data.category, data.difficulty_level]
    );
    const created = result.rows[0];
    if (created) {
      return { card: created, inserted: true };
    }
    const existing = await this.findByPair(data.vietnamese, data.english);
    if (!existing) {
      throw new Error('Card insert conflicted but no existing row was found');
    }
    return { card: existing, inserted: false };
  }

  async list(filter: CardListFilter): Promise<Card[]> {
    const result = await this.query<Card>(
      `SELECT ${CARD_COLUMNS} FROM cards
       WHERE ($1::text IS NULL OR category = $1)
       ORDER BY id
       OFFSET $2 LIMIT $3`,
      [filter.category ?? null, filter.skip, filter.limit]
    );
    return result.rows;
  }

  async pickRandom(category?: string): Promise<Card | null> {
    const result = await this.query<Card>(
      `SELECT ${CARD_COLUMNS} FROM cards
       WHERE ($1::text IS NULL OR category = $1)
       ORDER BY random()
       LIMIT 1`,
      [category ?? null]
    );
    return result.rows[0] || null;
  }

  async recordReview(id: number, record: ReviewRecord): Promise<Card | null> {
    const success = record.outcome === 'success' ? 1 : 0;
    const result = await this.query<Card>(
      `UPDATE cards
       SET success_count = success_count + $2,
           fail_count = fail_count + $3,
           mastered = mastered OR $4,
           last_reviewed = $5
       WHERE id = $1
       RETURNING ${CARD_COLUMNS}`,
      [id, success, 1 - success, record.markMastered, record.reviewedAt]
    );
    return result.rows[0] || null;
  }

  async deleteAll(): Promise<number> {
    const result = await this.query('DELETE FROM cards');
    return result.rowCount ?? 0;
  }

  async resetMastery(category?: string): Promise<number> {
    const result = await this.query(
      `UPDATE cards SET mastered = FALSE
       WHERE mastered AND ($1::text IS NULL OR category = $1)`,
      [category ?? null]
    );
    return result.rowCount ?? 0;
  }

  async listCategories(): Promise<string[]> {
    const result = await this.query<{ category: string }>(
      'SELECT DISTINCT category FROM cards WHERE category IS NOT NULL ORDER BY category'
    );
    return result.rows.map((row) => row.category);
  }

  async aggregateByCategory(): Promise<CategoryAggregate[]> {
    const result = await this.query<CategoryAggregate>(
      `SELECT category,
              COUNT(*)::int AS total_cards,
              COUNT(*) FILTER (WHERE mastered)::int AS mastered_cards,
              COALESCE(SUM(success_count), 0)::int AS total_success,
              COALESCE(SUM(fail_count), 0)::int AS total_fail
       FROM cards
       GROUP BY category
       ORDER BY category NULLS LAST`
    );
    return result.rows;
  }

  async transaction<T>(work: (repository: CardRepository) => Promise<T>): Promise<T> {
    if (this.client) {
      return work(this);
    }
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await work(new PgCardRepository(this.pool, client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  ping(): Promise<boolean> {
    return testConnection(this.pool);
  }
}
