/**
 * Auth Validation Schemas
 */

import { z } from 'zod';
import { VALIDATION_LIMITS } from '@/constants/validation.constants';

export const LoginSchema = z.object({
  password: z
    .string()
    .min(1, 'Password is required')
    .max(VALIDATION_LIMITS.PASSWORD_MAX_LENGTH, `Password must be at most ${VALIDATION_LIMITS.PASSWORD_MAX_LENGTH} characters`),
});

export type LoginInput = z.infer<typeof LoginSchema>;
