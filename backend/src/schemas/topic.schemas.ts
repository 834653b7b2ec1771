/**
 * Vocabulary topic validation schemas
 */

import { z } from 'zod';
import { VALIDATION_LIMITS, CARD_DEFAULTS } from '@/constants/validation.constants';

/** A bare *.csv name inside the vocabulary directory; no path segments. */
export const TopicFilenameSchema = z
  .string()
  .trim()
  .min(1, 'Filename is required')
  .max(VALIDATION_LIMITS.TOPIC_FILENAME_MAX)
  .regex(/^[^/\\]+\.csv$/i, 'Filename must be a .csv file name without directories');

export const LoadTopicSchema = z.object({
  filename: TopicFilenameSchema,
  clearExisting: z.boolean().optional().default(false),
});

export type LoadTopicInput = z.infer<typeof LoadTopicSchema>;

export const REQUIRED_VOCAB_COLUMNS = ['vietnamese', 'english'] as const;

/**
 * One CSV row. Absent columns arrive as empty strings.
 */
export const VocabRowSchema = z.object({
  vietnamese: z
    .string()
    .trim()
    .min(1, 'vietnamese is required')
    .max(VALIDATION_LIMITS.CARD_TEXT_MAX, `vietnamese must be at most ${VALIDATION_LIMITS.CARD_TEXT_MAX} characters`),
  english: z
    .string()
    .trim()
    .min(1, 'english is required')
    .max(VALIDATION_LIMITS.CARD_TEXT_MAX, `english must be at most ${VALIDATION_LIMITS.CARD_TEXT_MAX} characters`),
  category: z
    .string()
    .trim()
    .max(VALIDATION_LIMITS.CATEGORY_MAX, `category must be at most ${VALIDATION_LIMITS.CATEGORY_MAX} characters`),
  difficulty_level: z
    .string()
    .trim()
    .transform((value) => value || String(CARD_DEFAULTS.DIFFICULTY_LEVEL))
    .pipe(z.string().regex(/^\d+$/, 'difficulty_level must be a whole number'))
    .transform(Number)
    .pipe(
      z.number().int().min(1, 'difficulty_level must be at least 1')
        .max(VALIDATION_LIMITS.DIFFICULTY_MAX, `difficulty_level must be at most ${VALIDATION_LIMITS.DIFFICULTY_MAX}`)
    ),
});

export type VocabRow = z.output<typeof VocabRowSchema>;
