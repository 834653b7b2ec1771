/**
 * Login sessions. MemorySessionStore loses sessions on restart; PgSessionStore
 * keeps them in the sessions table. Both store only a SHA-256 hash of the token.
 */

import crypto from 'crypto';
import type { Pool } from 'pg';

export interface Session {
  token: string;
  expiresAt: Date;
}

export interface SessionStore {
  create(ttlMs: number): Promise<Session>;
  /** true when the token names a live, unexpired session */
  validate(token: string): Promise<boolean>;
  expire(token: string): Promise<void>;
  /** Drop expired sessions; returns how many were removed. */
  purgeExpired(): Promise<number>;
}

export function generateSessionToken(): string {
  return crypto.randomBytes(32).toString('base64url');
}

export function hashSessionToken(token: string): string {
  return crypto.createHash('sha256').update(token).digest('hex');
}

export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, Date>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async create(ttlMs: number): Promise<Session> {
    const token = generateSessionToken();
    const expiresAt = new Date(this.now().getTime() + ttlMs);
    this.sessions.set(hashSessionToken(token), expiresAt);
    return { token, expiresAt };
  }

  async validate(token: string): Promise<boolean> {
    const key = hashSessionToken(token);
    const expiresAt = this.sessions.get(key);
    if (!expiresAt) {
      return false;
    }
    if (expiresAt.getTime() <= this.now().getTime()) {
      this.sessions.delete(key);
      return false;
    }
    return true;
  }

  async expire(token: string): Promise<void> {
    this.sessions.delete(hashSessionToken(token));
  }

  async purgeExpired(): Promise<number> {
    const now = this.now().getTime();
    let removed = 0;
    for (const [key, expiresAt] of this.sessions) {
      if (expiresAt.getTime() <= now) {
        this.sessions.delete(key);
        removed += 1;
      }
    }
    return removed;
  }
}

export class PgSessionStore implements SessionStore {
  constructor(
    private readonly pool: Pool,
    private readonly now: () => Date = () => new Date()
  ) {}

  async create(ttlMs: number): Promise<Session> {
    const token = generateSessionToken();
    const expiresAt = new Date(this.now().getTime() + ttlMs);
    await this.pool.query(
      'INSERT INTO sessions (token_hash, expires_at) VALUES ($1, $2)',
      [hashSessionToken(token), expiresAt]
    );
    return { token, expiresAt };
  }

  async validate(token: string): Promise<boolean> {
    const result = await this.pool.query(
      'SELECT 1 FROM sessions WHERE token_hash = $1 AND expires_at > $2',
      [hashSessionToken(token), this.now()]
    );
    return result.rows.length > 0;
  }

  async expire(token: string): Promise<void> {
    await this.pool.query('DELETE FROM sessions WHERE token_hash = $1', [hashSessionToken(token)]);
  }

  async purgeExpired(): Promise<number> {
    const result = await this.pool.query('DELETE FROM sessions WHERE expires_at <= $1', [this.now()]);
    return result.rowCount ?? 0;
  }
}
