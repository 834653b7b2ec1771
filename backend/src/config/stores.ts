import type { Pool } from 'pg';
import type { AppConfig } from './env';
import { createPool, ensureSchema, testConnection } from './database';
import type { CardRepository } from '@/repositories/card.repository';
import { MemoryCardRepository } from '@/repositories/memory-card.repository';
import { PgCardRepository } from '@/repositories/pg-card.repository';
import { MemorySessionStore, PgSessionStore, type SessionStore } from '@/services/session-store.service';
import { logger } from '@/utils/logger';

export interface Stores {
  cards: CardRepository;
  sessions: SessionStore;
  close(): Promise<void>;
}

/**
 * Card repository and session store chosen by DATABASE_DRIVER / SESSION_STORE.
 * With postgres the schema is applied before anything is returned.
 */
export async function openStores(config: AppConfig): Promise<Stores> {
  if (config.DATABASE_DRIVER === 'memory') {
    if (config.SESSION_STORE === 'database') {
      logger.warn('SESSION_STORE=database needs DATABASE_DRIVER=postgres; keeping sessions in memory');
    }
    logger.warn('Using the in-memory card store; cards are lost on exit');
    return {
      cards: new MemoryCardRepository(),
      sessions: new MemorySessionStore(),
      close: async () => undefined,
    };
  }

  const pool: Pool = createPool(config);
  if (!(await testConnection(pool))) {
    await pool.end();
    throw new Error(`Cannot reach PostgreSQL at ${config.POSTGRES_HOST}:${config.POSTGRES_PORT}`);
  }
  await ensureSchema(pool);

  return {
    cards: new PgCardRepository(pool),
    sessions: config.SESSION_STORE === 'database' ? new PgSessionStore(pool) : new MemorySessionStore(),
    close: () => pool.end(),
  };
}
