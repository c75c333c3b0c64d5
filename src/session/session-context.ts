/**
 * State owned by one user session: identity, request gate, answer cache and
 * inactivity tracking. Created with the session and dropped with it; nothing
 * here is process-global.
 */

import { createHash, randomBytes } from 'node:crypto';
import { RateLimiter } from './rate-limiter.js';
import { TtlCache } from './ttl-cache.js';
import type { AppConfig } from '../config/app-config.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('session');

/**
 * Opaque 16-hex-character session identifier.
 */
export function generateSessionId(now: Date = new Date()): string {
  const unique = `${now.toISOString()}_${randomBytes(8).toString('hex')}`;
  return createHash('sha256').update(unique).digest('hex').slice(0, 16);
}

export interface SessionContextOptions {
  sessionId?: string;
  now?: () => number;
}

export class SessionContext {
  readonly sessionId: string;
  readonly rateLimiter: RateLimiter;
  readonly answerCache: TtlCache<string>;

  private readonly timeoutMs: number;
  private readonly now: () => number;
  private lastActivity: number;

  constructor(
    config: Pick<AppConfig, 'rateLimitRequests' | 'rateLimitWindowMs' | 'cacheTtlMs' | 'sessionTimeoutMs'>,
    options: SessionContextOptions = {},
  ) {
    this.now = options.now ?? Date.now;
    this.sessionId = options.sessionId ?? generateSessionId(new Date(this.now()));
    this.rateLimiter = new RateLimiter({
      maxRequests: config.rateLimitRequests,
      windowMs: config.rateLimitWindowMs,
      now: this.now,
    });
    this.answerCache = new TtlCache<string>({ ttlMs: config.cacheTtlMs, now: this.now });
    this.timeoutMs = config.sessionTimeoutMs;
    this.lastActivity = this.now();
  }

  /**
   * Mark activity. Returns true when the session had been idle longer than
   * the timeout; idle state (cache, rate window) is then reset.
   */
  touch(): boolean {
    const now = this.now();
    const expired = now - this.lastActivity > this.timeoutMs;
    this.lastActivity = now;

    if (expired) {
      log.info('Session timed out, resetting session state', { sessionId: this.sessionId });
      this.answerCache.clear();
      this.rateLimiter.reset(this.sessionId);
    }
    return expired;
  }

  /**
   * Release session-held state.
   */
  dispose(): void {
    this.answerCache.clear();
    this.rateLimiter.reset();
  }
}
