import crypto from 'crypto';
import type { Session, SessionStore } from './session-store.service';
import { logger, serializeError } from '@/utils/logger';

export interface AuthOptions {
  /** Unset disables password protection entirely. */
  password?: string;
  sessionTtlMs: number;
}

function digest(value: string): Buffer {
  return crypto.createHash('sha256').update(value, 'utf8').digest();
}

/**
 * Single shared password guarding the whole app, with cookie sessions.
 */
export class AuthService {
  constructor(
    private readonly sessions: SessionStore,
    private readonly options: AuthOptions
  ) {}

  get enabled(): boolean {
    return Boolean(this.options.password);
  }

  get sessionTtlMs(): number {
    return this.options.sessionTtlMs;
  }

  /** Constant-time comparison; always true when auth is disabled. */
  verifyPassword(candidate: string): boolean {
    if (!this.options.password) {
      return true;
    }
    return crypto.timingSafeEqual(digest(candidate), digest(this.options.password));
  }

  /**
   * Start a session for a correct password. Returns null for a wrong one.
   */
  async login(password: string): Promise<Session | null> {
    if (!this.verifyPassword(password)) {
      return null;
    }
    void this.sessions.purgeExpired().catch((error: unknown) => {
      logger.warn('Expired session cleanup failed', { error: serializeError(error) });
    });
    return this.sessions.create(this.options.sessionTtlMs);
  }

  async isAuthenticated(token: string | undefined): Promise<boolean> {
    if (!this.enabled) {
      return true;
    }
    if (!token) {
      return false;
    }
    return this.sessions.validate(token);
  }

  async logout(token: string | undefined): Promise<void> {
    if (token) {
      await this.sessions.expire(token);
    }
  }
}
