/**
 * Card store type definitions matching db/schema.sql
 */

import type { QUIZ_DIRECTIONS, HINT_LEVELS } from '@/constants/validation.constants';

/** eng_to_viet: English prompt, Vietnamese answer. viet_to_eng: the reverse. */
export type QuizDirection = (typeof QUIZ_DIRECTIONS)[number];

export type HintLevel = (typeof HINT_LEVELS)[number];

export interface Card {
  id: number;
  vietnamese: string;
  english: string;
  category: string | null;
  difficulty_level: number;
  success_count: number;
  fail_count: number;
  mastered: boolean;
  last_reviewed: Date | null;
  created_at: Date;
}

export interface NewCard {
  vietnamese: string;
  english: string;
  category: string | null;
  difficulty_level: number;
}

export interface CardListFilter {
  category?: string;
  skip: number;
  limit: number;
}

/**
 * Outcome of one quiz attempt. The counter that matches `outcome` is incremented
 * and last_reviewed is set; `markMastered` only ever sets the flag, never clears it.
 */
export interface ReviewRecord {
  outcome: 'success' | 'failure';
  markMastered: boolean;
  reviewedAt: Date;
}

/** Counters summed over the cards of one category (null = uncategorised). */
export interface CategoryAggregate {
  category: string | null;
  total_cards: number;
  mastered_cards: number;
  total_success: number;
  total_fail: number;
}
