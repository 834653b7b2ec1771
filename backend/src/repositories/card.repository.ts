import type {
  Card,
  CardListFilter,
  CategoryAggregate,
  NewCard,
  ReviewRecord,
} from '@/types/database';

export interface InsertResult {
  card: Card;
  /** false when a card with the same (vietnamese, english) pair already existed */
  inserted: boolean;
}

/**
 * Persistence for the cards table. Implementations: PgCardRepository (PostgreSQL)
 * and MemoryCardRepository (in process).
 */
export interface CardRepository {
  findById(id: number): Promise<Card | null>;
  findByPair(vietnamese: string, english: string): Promise<Card | null>;
  /** Insert unless the (vietnamese, english) pair exists; never overwrites. */
  insertIfAbsent(data: NewCard): Promise<InsertResult>;
  /** Ordered by id. */
  list(filter: CardListFilter): Promise<Card[]>;
  /** Uniformly random card, optionally restricted to one category. */
  pickRandom(category?: string): Promise<Card | null>;
  recordReview(id: number, record: ReviewRecord): Promise<Card | null>;
  deleteAll(): Promise<number>;
  /** Clears the mastered flag; returns how many cards had it set. */
  resetMastery(category?: string): Promise<number>;
  listCategories(): Promise<string[]>;
  aggregateByCategory(): Promise<CategoryAggregate[]>;
  /**
   * Run `work` atomically. The repository handed to `work` must be used for
   * every read and write inside the unit.
   */
  transaction<T>(work: (repository: CardRepository) => Promise<T>): Promise<T>;
  ping(): Promise<boolean>;
}
