/**
 * Card Validation Schemas
 */

import { z } from 'zod';
import { QUIZ_DIRECTIONS, VALIDATION_LIMITS } from '../constants/validation.constants';

const QuizDirectionSchema = z.enum(QUIZ_DIRECTIONS, {
  message: `Direction must be one of: ${QUIZ_DIRECTIONS.join(', ')}`,
});

export const CreateCardSchema = z.object({
  vietnamese: z.string()
    .trim()
    .min(1, 'Vietnamese text is required')
    .max(VALIDATION_LIMITS.CARD_TEXT_MAX, `Vietnamese text must be less than ${VALIDATION_LIMITS.CARD_TEXT_MAX} characters`),
  english: z.string()
    .trim()
    .min(1, 'English text is required')
    .max(VALIDATION_LIMITS.CARD_TEXT_MAX, `English text must be less than ${VALIDATION_LIMITS.CARD_TEXT_MAX} characters`),
  category: z.string()
    .trim()
    .max(VALIDATION_LIMITS.CATEGORY_MAX, `Category must be less than ${VALIDATION_LIMITS.CATEGORY_MAX} characters`)
    .optional()
    .nullable(),
  difficulty_level: z.number().int().min(1).max(VALIDATION_LIMITS.DIFFICULTY_MAX).optional(),
});

/** `?category=` with nothing after it means no filter. */
const CategoryFilterSchema = z.string()
  .trim()
  .max(VALIDATION_LIMITS.CATEGORY_MAX)
  .transform((value) => value || undefined)
  .optional();

export const ListCardsQuerySchema = z.object({
  category: CategoryFilterSchema,
  skip: z.string().regex(/^\d+$/).transform(Number).pipe(
    z.number().int().min(0)
  ).optional(),
  limit: z.string().regex(/^\d+$/).transform(Number).pipe(
    z.number().int()
      .min(VALIDATION_LIMITS.QUERY_LIMIT_MIN)
      .max(VALIDATION_LIMITS.QUERY_LIMIT_MAX)
  ).optional(),
});

export const RandomCardQuerySchema = z.object({
  mode: QuizDirectionSchema.optional(),
  category: CategoryFilterSchema,
});

export const CardIdParamSchema = z.object({
  id: z.string().regex(/^\d+$/, 'Invalid card ID format').transform(Number),
});

export const CheckAnswerSchema = z.object({
  userInput: z.string()
    .max(VALIDATION_LIMITS.ANSWER_INPUT_MAX, `Answer must be less than ${VALIDATION_LIMITS.ANSWER_INPUT_MAX} characters`),
  direction: QuizDirectionSchema,
  record: z.boolean().optional().default(false),
  markMastered: z.boolean().optional().default(false),
});

export const GiveUpSchema = z.object({
  direction: QuizDirectionSchema.optional(),
});

/** Level range is checked by the quiz service so the error reads the same everywhere. */
export const HintSchema = z.object({
  level: z.number().int('Hint level must be a whole number'),
  direction: QuizDirectionSchema,
});

export const ResetMasterySchema = z.object({
  category: z.string().trim().min(1).max(VALIDATION_LIMITS.CATEGORY_MAX).optional(),
});

export type CreateCardInput = z.infer<typeof CreateCardSchema>;
export type CheckAnswerBody = z.infer<typeof CheckAnswerSchema>;
export type GiveUpBody = z.infer<typeof GiveUpSchema>;
export type HintBody = z.infer<typeof HintSchema>;
export type ResetMasteryBody = z.infer<typeof ResetMasterySchema>;
