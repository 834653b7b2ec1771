/**
 * Validation limits for card text, CSV rows and list queries.
 */
export const VALIDATION_LIMITS = {
  /** Vietnamese/English text maximum length */
  CARD_TEXT_MAX: 500,
  /** Category label maximum length */
  CATEGORY_MAX: 100,
  /** Highest accepted difficulty level */
  DIFFICULTY_MAX: 10,
  /** Answer input maximum length */
  ANSWER_INPUT_MAX: 500,
  /** Query limit maximum */
  QUERY_LIMIT_MAX: 500,
  /** Query limit minimum */
  QUERY_LIMIT_MIN: 1,
  /** Topic filename maximum length */
  TOPIC_FILENAME_MAX: 255,
  /** Password maximum length */
  PASSWORD_MAX_LENGTH: 256,
} as const;

export const CARD_DEFAULTS = {
  DIFFICULTY_LEVEL: 1,
  LIST_LIMIT: 100,
} as const;

export const QUIZ_DIRECTIONS = ['eng_to_viet', 'viet_to_eng'] as const;

export const HINT_LEVELS = [1, 2, 3] as const;
