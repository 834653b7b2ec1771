/**
 * Environment Configuration
 *
 * Loads env in order: root .env (shared) then backend/.env (backend-specific).
 * No forced overrides are used so container/runtime env stays highest priority.
 *
 * Precedence (highest -> lowest):
 * 1) Runtime env (shell exports, CI env)
 * 2) backend/.env
 * 3) root .env
 *
 * The parsed config is returned as a value and handed to the app factory;
 * nothing here runs on import.
 */

import path from 'path';
import { z } from 'zod';
import dotenv from 'dotenv';

const backendRoot = path.resolve(__dirname, '..', '..');
const repoRoot = path.resolve(backendRoot, '..');

const numeric = z.string().regex(/^\d+$/).transform(Number);
const optionalText = z.string().optional().transform((s) => (s && s.trim()) || undefined);

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  HOST: z.string().min(1).default('127.0.0.1'),
  PORT: numeric.default(() => 8000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Card store
  DATABASE_DRIVER: z.enum(['postgres', 'memory']).default('postgres'),
  POSTGRES_HOST: z.string().min(1).default('localhost'),
  POSTGRES_PORT: numeric.default(() => 5432),
  POSTGRES_DB: z.string().min(1).default('vietnamese_flashcards'),
  POSTGRES_USER: z.string().min(1).default('postgres'),
  POSTGRES_PASSWORD: optionalText,

  // Vocabulary topic files (*.csv)
  VOCAB_DIR: z.string().min(1).default(() => path.join(repoRoot, 'vocab')).transform((dir) => path.resolve(dir)),

  // Password protection: enabled only when APP_PASSWORD is set
  APP_PASSWORD: optionalText,
  SESSION_STORE: z.enum(['memory', 'database']).default('memory'),
  SESSION_TTL_HOURS: numeric.pipe(z.number().int().min(1).max(24 * 365)).default(() => 24 * 7),

  // CORS
  CORS_ORIGIN: z.string().url().or(z.string().regex(/^http:\/\/(localhost|127\.0\.0\.1):\d+$/)).default('http://localhost:8000'),
  CORS_ORIGINS: z.string().optional(), // Comma-separated list

  // Security
  RATE_LIMIT_WINDOW_MS: numeric.default(() => 900000), // 15 minutes
  RATE_LIMIT_MAX: numeric.default(() => 1000), // a quiz session is a few requests per card
  AUTH_RATE_LIMIT_WINDOW_MS: numeric.default(() => 900000),
  AUTH_RATE_LIMIT_MAX: numeric.default(() => 10),

  // Request limits
  MAX_REQUEST_SIZE: z.string().default('1mb'),
});

export type AppConfig = Readonly<z.infer<typeof EnvSchema>>;

/**
 * Validate a raw environment map. Throws z.ZodError on invalid input.
 */
export function parseEnv(source: NodeJS.ProcessEnv): AppConfig {
  return Object.freeze(EnvSchema.parse(source));
}

/**
 * Load .env files, then validate process.env. Exits the process on invalid configuration.
 */
export function loadConfig(): AppConfig {
  dotenv.config({ path: path.join(repoRoot, '.env') });
  dotenv.config({ path: path.join(backendRoot, '.env') });

  try {
    return parseEnv(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('❌ Invalid environment configuration:');
      error.issues.forEach((issue) => {
        const issuePath = issue.path.join('.');
        console.error(`  - ${issuePath}: ${issue.message}`);
      });
      console.error('\nPlease check your .env file and ensure all required variables are set.');
      process.exit(1);
    }
    throw error;
  }
}

/** CORS allowed origins (from CORS_ORIGINS or [CORS_ORIGIN]). */
export function getAllowedOrigins(config: Pick<AppConfig, 'CORS_ORIGIN' | 'CORS_ORIGINS'>): string[] {
  if (config.CORS_ORIGINS) {
    return config.CORS_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean);
  }
  return [config.CORS_ORIGIN];
}
