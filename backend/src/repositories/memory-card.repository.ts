import type {
  Card,
  CardListFilter,
  CategoryAggregate,
  NewCard,
  ReviewRecord,
} from '@/types/database';
import type { CardRepository, InsertResult } from './card.repository';

function cloneCard(card: Card): Card {
  return {
    ...card,
    last_reviewed: card.last_reviewed ? new Date(card.last_reviewed) : null,
    created_at: new Date(card.created_at),
  };
}

/**
 * Locale-aware, so "đồ uống" sorts between "animals" and "family".
 * PostgreSQL orders by the database collation, which can differ.
 */
function compareCategories(a: string, b: string): number {
  return a.localeCompare(b);
}

/**
 * In-process card store for local use without PostgreSQL (DATABASE_DRIVER=memory)
 * and for tests. Contents are lost when the process exits.
 */
export class MemoryCardRepository implements CardRepository {
  private cards = new Map<number, Card>();
  private nextId = 1;

  constructor(
    private readonly random: () => number = Math.random,
    private readonly now: () => Date = () => new Date()
  ) {}

  async findById(id: number): Promise<Card | null> {
    const card = this.cards.get(id);
    return card ? cloneCard(card) : null;
  }

  async findByPair(vietnamese: string, english: string): Promise<Card | null> {
    for (const card of this.cards.values()) {
      if (card.vietnamese === vietnamese && card.english === english) {
        return cloneCard(card);
      }
    }
    return null;
  }

  async insertIfAbsent(data: NewCard): Promise<InsertResult> {
    const existing = await this.findByPair(data.vietnamese, data.english);
    if (existing) {
      return { card: existing, inserted: false };
    }
    const card: Card = {
      id: this.nextId++,
      vietnamese: data.vietnamese,
      english: data.english,
      category: data.category,
      difficulty_level: data.difficulty_level,
      success_count: 0,
      fail_count: 0,
      mastered: false,
      last_reviewed: null,
      created_at: this.now(),
    };
    this.cards.set(card.id, card);
    return { card: cloneCard(card), inserted: true };
  }

  async list(filter: CardListFilter): Promise<Card[]> {
    return this.matching(filter.category)
      .slice(filter.skip, filter.skip + filter.limit)
      .map(cloneCard);
  }

  async pickRandom(category?: string): Promise<Card | null> {
    const candidates = this.matching(category);
    if (candidates.length === 0) {
      return null;
    }
    const index = Math.min(Math.floor(this.random() * candidates.length), candidates.length - 1);
    return cloneCard(candidates[index]);
  }

  async recordReview(id: number, record: ReviewRecord): Promise<Card | null> {
    const card = this.cards.get(id);
    if (!card) {
      return null;
    }
    if (record.outcome === 'success') {
      card.success_count += 1;
    } else {
      card.fail_count += 1;
    }
    card.mastered = card.mastered || record.markMastered;
    card.last_reviewed = new Date(record.reviewedAt);
    return cloneCard(card);
  }

  async deleteAll(): Promise<number> {
    const count = this.cards.size;
    this.cards.clear();
    return count;
  }

  async resetMastery(category?: string): Promise<number> {
    let count = 0;
    for (const card of this.matching(category)) {
      if (card.mastered) {
        card.mastered = false;
        count += 1;
      }
    }
    return count;
  }

  async listCategories(): Promise<string[]> {
    const categories = new Set<string>();
    for (const card of this.cards.values()) {
      if (card.category !== null) {
        categories.add(card.category);
      }
    }
    return [...categories].sort(compareCategories);
  }

  async aggregateByCategory(): Promise<CategoryAggregate[]> {
    const groups = new Map<string | null, CategoryAggregate>();
    for (const card of this.matching()) {
      const group = groups.get(card.category) ?? {
        category: card.category,
        total_cards: 0,
        mastered_cards: 0,
        total_success: 0,
        total_fail: 0,
      };
      group.total_cards += 1;
      group.mastered_cards += card.mastered ? 1 : 0;
      group.total_success += card.success_count;
      group.total_fail += card.fail_count;
      groups.set(card.category, group);
    }
    // Named categories first, then null, as with NULLS LAST in SQL.
    return [...groups.values()].sort((a, b) => {
      if (a.category === b.category) return 0;
      if (a.category === null) return 1;
      if (b.category === null) return -1;
      return compareCategories(a.category, b.category);
    });
  }

  async transaction<T>(work: (repository: CardRepository) => Promise<T>): Promise<T> {
    const snapshot = new Map([...this.cards].map(([id, card]) => [id, cloneCard(card)]));
    try {
      return await work(this);
    } catch (error) {
      // The id counter is not rolled back, so ids handed out inside a failed unit stay unused.
      this.cards = snapshot;
      throw error;
    }
  }

  async ping(): Promise<boolean> {
    return true;
  }

  /** Live cards in id order, optionally restricted to one category. */
  private matching(category?: string): Card[] {
    return [...this.cards.values()]
      .filter((card) => category === undefined || card.category === category)
      .sort((a, b) => a.id - b.id);
  }
}
