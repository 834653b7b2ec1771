import fs from 'fs/promises';
import path from 'path';
import { Pool, PoolConfig } from 'pg';
import type { AppConfig } from './env';
import { DATABASE_POOL } from '@/constants/database.constants';
import { logger, serializeError } from '@/utils/logger';

const SCHEMA_FILE = path.resolve(__dirname, '..', '..', 'db', 'schema.sql');

export function createPool(config: AppConfig): Pool {
  const dbConfig: PoolConfig = {
    host: config.POSTGRES_HOST,
    port: config.POSTGRES_PORT,
    database: config.POSTGRES_DB,
    user: config.POSTGRES_USER,
    password: config.POSTGRES_PASSWORD,
    max: DATABASE_POOL.MAX_CLIENTS,
    idleTimeoutMillis: DATABASE_POOL.IDLE_TIMEOUT_MS,
    connectionTimeoutMillis: DATABASE_POOL.CONNECTION_TIMEOUT_MS,
    query_timeout: DATABASE_POOL.QUERY_TIMEOUT_MS,
    statement_timeout: DATABASE_POOL.STATEMENT_TIMEOUT_MS,
  };

  const pool = new Pool(dbConfig);

  pool.on('connect', () => {
    logger.debug('Database client connected', {
      host: config.POSTGRES_HOST,
      port: config.POSTGRES_PORT,
      database: config.POSTGRES_DB,
    });
  });

  pool.on('error', (err) => {
    logger.error('Database pool error', { error: serializeError(err) });
  });

  return pool;
}

export async function testConnection(pool: Pool): Promise<boolean> {
  try {
    const result = await pool.query<{ now: Date }>('SELECT NOW() AS now');
    logger.debug('Database connection test successful', { now: result.rows[0]?.now });
    return true;
  } catch (error) {
    logger.error('Database connection test failed', { error: serializeError(error) });
    return false;
  }
}

/**
 * Apply db/schema.sql. Statements are idempotent, so this runs on every startup.
 */
export async function ensureSchema(pool: Pool, schemaFile = SCHEMA_FILE): Promise<void> {
  const sql = await fs.readFile(schemaFile, 'utf8');
  await pool.query(sql);
  logger.info('Database schema ready', { schemaFile });
}
