import type { CardRepository } from '@/repositories/card.repository';
import type { Card, CategoryAggregate } from '@/types/database';
import { CARD_DEFAULTS } from '@/constants/validation.constants';
import { logger } from '@/utils/logger';

export interface AddCardInput {
  vietnamese: string;
  english: string;
  category?: string | null;
  difficulty_level?: number;
}

export interface ListCardsOptions {
  category?: string;
  skip?: number;
  limit?: number;
}

export interface CategoryStats extends CategoryAggregate {
  total_attempts: number;
  accuracy: number;
}

export interface Stats {
  total_cards: number;
  mastered_cards: number;
  total_success: number;
  total_fail: number;
  total_attempts: number;
  /** successes / attempts, 0 when nothing has been attempted */
  accuracy: number;
  per_category: CategoryStats[];
}

/** Card text is stored trimmed and NFC-composed so equal pairs compare equal. */
export function canonicalText(text: string): string {
  return text.normalize('NFC').trim();
}

export function accuracyOf(success: number, fail: number): number {
  const attempts = success + fail;
  return attempts > 0 ? success / attempts : 0;
}

export class CardService {
  constructor(private readonly cards: CardRepository) {}

  /**
   * Add a card unless the (vietnamese, english) pair already exists,
   * in which case the stored card is returned unchanged.
   */
  async addCard(data: AddCardInput): Promise<{ card: Card; created: boolean }> {
    const category = data.category ? canonicalText(data.category) : '';
    const { card, inserted } = await this.cards.insertIfAbsent({
      vietnamese: canonicalText(data.vietnamese),
      english: canonicalText(data.english),
      category: category || null,
      difficulty_level: data.difficulty_level ?? CARD_DEFAULTS.DIFFICULTY_LEVEL,
    });
    if (inserted) {
      logger.info('Card created', { cardId: card.id, english: card.english, vietnamese: card.vietnamese });
    }
    return { card, created: inserted };
  }

  async listCards(options: ListCardsOptions = {}): Promise<Card[]> {
    return this.cards.list({
      category: options.category,
      skip: options.skip ?? 0,
      limit: options.limit ?? CARD_DEFAULTS.LIST_LIMIT,
    });
  }

  /** Irreversible; there is no confirmation step at this layer. */
  async deleteAllCards(): Promise<number> {
    const count = await this.cards.deleteAll();
    logger.warn('Deleted all cards', { count });
    return count;
  }

  async resetMastery(category?: string): Promise<number> {
    const count = await this.cards.resetMastery(category);
    logger.info('Mastery reset', { category: category ?? null, count });
    return count;
  }

  listCategories(): Promise<string[]> {
    return this.cards.listCategories();
  }

  async getStats(): Promise<Stats> {
    const groups = await this.cards.aggregateByCategory();
    const perCategory = groups.map((group) => ({
      ...group,
      total_attempts: group.total_success + group.total_fail,
      accuracy: accuracyOf(group.total_success, group.total_fail),
    }));

    const totals = perCategory.reduce(
      (acc, group) => ({
        total_cards: acc.total_cards + group.total_cards,
        mastered_cards: acc.mastered_cards + group.mastered_cards,
        total_success: acc.total_success + group.total_success,
        total_fail: acc.total_fail + group.total_fail,
      }),
      { total_cards: 0, mastered_cards: 0, total_success: 0, total_fail: 0 }
    );

    return {
      ...totals,
      total_attempts: totals.total_success + totals.total_fail,
      accuracy: accuracyOf(totals.total_success, totals.total_fail),
      per_category: perCategory,
    };
  }
}
