import type { HintLevel } from '@/types/database';
import { HINT_LEVELS } from '@/constants/validation.constants';

export function isHintLevel(level: number): level is HintLevel {
  return HINT_LEVELS.some((candidate) => candidate === level);
}

/**
 * Progressive hint for an answer.
 * 1: one underscore per character, per word ("ngày mai" -> "____ ___").
 * 2: first character of each word kept ("n___ m__").
 * 3: the answer itself.
 *
 * Lengths count code points of the NFC form, so a precomposed "à" is one character.
 */
export function generateHint(answer: string, level: HintLevel): string {
  const composed = answer.normalize('NFC');
  if (level === 3) {
    return composed;
  }

  const words = composed.trim().split(/\s+/).filter(Boolean);
  return words
    .map((word) => {
      const chars = Array.from(word);
      if (level === 1) {
        return '_'.repeat(chars.length);
      }
      return chars[0] + '_'.repeat(chars.length - 1);
    })
    .join(' ');
}
