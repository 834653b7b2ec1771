/**
 * Answer comparison for quiz checks.
 *
 * Comparison is case- and surrounding-whitespace-insensitive but keeps every
 * diacritic and tone mark: "ma" and "má" are different answers.
 */

import { diffChars } from 'diff';
import type { Card, QuizDirection } from '@/types/database';

export type AnswerField = 'vietnamese' | 'english';

export interface DiffSegment {
  /** equal: typed correctly; missing: expected but not typed; extra: typed but not expected */
  type: 'equal' | 'missing' | 'extra';
  value: string;
}

/**
 * Canonical form used for comparison: NFC composition, trimmed, lower-cased.
 * NFC is applied again after lower-casing so the result is stable under reapplication.
 */
export function normalizeAnswer(text: string): string {
  return text.normalize('NFC').trim().toLowerCase().normalize('NFC');
}

/** Field holding the answer for a direction. */
export function answerFieldFor(direction: QuizDirection): AnswerField {
  return direction === 'eng_to_viet' ? 'vietnamese' : 'english';
}

/** Field shown as the prompt for a direction. */
export function promptFieldFor(direction: QuizDirection): AnswerField {
  return direction === 'eng_to_viet' ? 'english' : 'vietnamese';
}

/**
 * Which card field the input matches, trying the direction's answer first.
 * Either language is accepted so an answer typed in the reverse language still counts.
 */
export function matchAnswer(
  card: Pick<Card, AnswerField>,
  userInput: string,
  direction: QuizDirection
): AnswerField | null {
  const normalizedInput = normalizeAnswer(userInput);
  const primary = answerFieldFor(direction);
  const secondary = promptFieldFor(direction);
  if (normalizeAnswer(card[primary]) === normalizedInput) return primary;
  if (normalizeAnswer(card[secondary]) === normalizedInput) return secondary;
  return null;
}

/**
 * Character-level diff of the normalized input against the normalized expected answer.
 * Empty when both normalize to the same string.
 */
export function diffAnswer(expected: string, userInput: string): DiffSegment[] {
  const normalizedExpected = normalizeAnswer(expected);
  const normalizedInput = normalizeAnswer(userInput);
  if (normalizedExpected === normalizedInput) {
    return [];
  }
  return diffChars(normalizedExpected, normalizedInput).map((change): DiffSegment => ({
    type: change.removed ? 'missing' : change.added ? 'extra' : 'equal',
    value: change.value,
  }));
}

/** Renders segments as `equal[-missing-]{+extra+}`. */
export function formatDiff(segments: DiffSegment[]): string {
  return segments
    .map((segment) => {
      if (segment.type === 'missing') return `[-${segment.value}-]`;
      if (segment.type === 'extra') return `{+${segment.value}+}`;
      return segment.value;
    })
    .join('');
}
