/**
 * PostgreSQL pool settings. A single local user never needs many clients.
 */
export const DATABASE_POOL = {
  MAX_CLIENTS: 5,
  IDLE_TIMEOUT_MS: 30000,
  CONNECTION_TIMEOUT_MS: 5000,
  QUERY_TIMEOUT_MS: 10000,
  STATEMENT_TIMEOUT_MS: 10000,
} as const;
