import type { CardRepository } from '@/repositories/card.repository';
import type { Card, HintLevel, QuizDirection } from '@/types/database';
import { NotFoundError, ValidationError } from '@/utils/errors';
import {
  type AnswerField,
  type DiffSegment,
  answerFieldFor,
  diffAnswer,
  formatDiff,
  matchAnswer,
  promptFieldFor,
} from './answer.utils';
import { generateHint, isHintLevel } from './hint.utils';

/** Card as shown during a quiz: the answer side is left out. */
export interface QuizCard {
  id: number;
  prompt: string;
  mode: QuizDirection;
  category: string | null;
  difficulty_level: number;
}

export interface CheckAnswerInput {
  cardId: number;
  userInput: string;
  direction: QuizDirection;
  /** Record an incorrect answer as a failure (correct answers are always recorded). */
  record?: boolean;
  /** Set the mastered flag when the answer is correct. */
  markMastered?: boolean;
}

export interface CheckAnswerResult {
  correct: boolean;
  expected: string;
  matchedField: AnswerField | null;
  userInput: string;
  diff: DiffSegment[];
  diffText: string;
  recorded: boolean;
  mastered: boolean;
}

export interface GiveUpResult {
  expected: string;
  vietnamese: string;
  english: string;
}

export interface HintResult {
  hint: string;
  hintLevel: HintLevel;
}

export class QuizService {
  constructor(
    private readonly cards: CardRepository,
    private readonly now: () => Date = () => new Date()
  ) {}

  async getRandomCard(options: { mode?: QuizDirection; category?: string } = {}): Promise<QuizCard> {
    const mode = options.mode ?? 'eng_to_viet';
    const card = await this.cards.pickRandom(options.category);
    if (!card) {
      throw new NotFoundError(options.category ? `Card in category "${options.category}"` : 'Card');
    }
    return {
      id: card.id,
      prompt: card[promptFieldFor(mode)],
      mode,
      category: card.category,
      difficulty_level: card.difficulty_level,
    };
  }

  async checkAnswer(input: CheckAnswerInput): Promise<CheckAnswerResult> {
    const card = await this.requireCard(input.cardId);
    const matchedField = matchAnswer(card, input.userInput, input.direction);
    const correct = matchedField !== null;
    const expected = card[matchedField ?? answerFieldFor(input.direction)];
    const diff = correct ? [] : diffAnswer(expected, input.userInput);

    let mastered = card.mastered;
    const recorded = correct || input.record === true;
    if (recorded) {
      const updated = await this.cards.recordReview(card.id, {
        outcome: correct ? 'success' : 'failure',
        markMastered: correct && input.markMastered === true,
        reviewedAt: this.now(),
      });
      if (!updated) {
        throw new NotFoundError('Card');
      }
      mastered = updated.mastered;
    }

    return {
      correct,
      expected,
      matchedField,
      userInput: input.userInput,
      diff,
      diffText: formatDiff(diff),
      recorded,
      mastered,
    };
  }

  /**
   * Reveal the answer. Always counts as a failure, whatever was recorded before.
   */
  async giveUp(cardId: number, direction: QuizDirection = 'eng_to_viet'): Promise<GiveUpResult> {
    const updated = await this.cards.recordReview(cardId, {
      outcome: 'failure',
      markMastered: false,
      reviewedAt: this.now(),
    });
    if (!updated) {
      throw new NotFoundError('Card');
    }
    return {
      expected: updated[answerFieldFor(direction)],
      vietnamese: updated.vietnamese,
      english: updated.english,
    };
  }

  /** Informational only: no counters change, even at level 3. */
  async getHint(cardId: number, level: number, direction: QuizDirection): Promise<HintResult> {
    if (!isHintLevel(level)) {
      throw new ValidationError('Hint level must be 1, 2, or 3', [
        { path: 'level', message: `Received ${level}` },
      ]);
    }
    const card = await this.requireCard(cardId);
    return {
      hint: generateHint(card[answerFieldFor(direction)], level),
      hintLevel: level,
    };
  }

  private async requireCard(cardId: number): Promise<Card> {
    const card = await this.cards.findById(cardId);
    if (!card) {
      throw new NotFoundError('Card');
    }
    return card;
  }
}
