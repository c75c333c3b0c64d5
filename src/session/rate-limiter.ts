/**
 * Per-session sliding-window request gate.
 *
 * Denial is a normal outcome reported as `false`; the limiter never throws.
 */

import { createLogger } from '../utils/logger.js';

const log = createLogger('rate-limiter');

export interface RateLimiterOptions {
  /** Requests allowed per window. Default: 10 */
  maxRequests?: number;
  /** Window length in ms. Default: 60000 */
  windowMs?: number;
  /** Clock, injectable for tests. Default: Date.now */
  now?: () => number;
}

export class RateLimiter {
  private readonly windows = new Map<string, number[]>();
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly now: () => number;

  constructor(options: RateLimiterOptions = {}) {
    this.maxRequests = options.maxRequests ?? 10;
    this.windowMs = options.windowMs ?? 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Record a request for the session if it fits in the window.
   */
  allow(sessionId: string): boolean {
    const now = this.now();
    const window = this.prune(sessionId, now);

    if (window.length >= this.maxRequests) {
      log.warn('Rate limit exceeded', { sessionId });
      return false;
    }

    window.push(now);
    return true;
  }

  /**
   * Requests still available in the current window.
   */
  remaining(sessionId: string): number {
    return Math.max(0, this.maxRequests - this.prune(sessionId, this.now()).length);
  }

  /**
   * Forget one session's window, or every window.
   */
  reset(sessionId?: string): void {
    if (sessionId === undefined) {
      this.windows.clear();
    } else {
      this.windows.delete(sessionId);
    }
  }

  private prune(sessionId: string, now: number): number[] {
    const recent = (this.windows.get(sessionId) ?? []).filter((ts) => now - ts < this.windowMs);
    this.windows.set(sessionId, recent);
    return recent;
  }
}
