/**
 * Telegram Bot Security
 *
 * Whitelist enforcement, rate limiting and lockout of repeat offenders.
 *
 * @module telegram/security
 */

import type { Context, NextFunction } from 'grammy';
import type { WhitelistStore } from '../core/whitelist.js';

// ============================================================================
// Configuration
// ============================================================================

export interface SecurityOptions {
  rateLimitWindowMs: number;
  rateLimitMaxRequests: number;
  /** Denied attempts before lockout */
  lockoutThreshold: number;
  lockoutDurationMs: number;
}

export const DEFAULT_SECURITY_OPTIONS: SecurityOptions = {
  rateLimitWindowMs: 60 * 1000,
  rateLimitMaxRequests: 30,
  lockoutThreshold: 5,
  lockoutDurationMs: 15 * 60 * 1000,
};

interface RateLimitEntry {
  count: number;
  windowStart: number;
}

interface LockoutEntry {
  failedAttempts: number;
  lastFailedAt: number;
  lockedUntil: number | null;
}

// ============================================================================
// Access Guard
// ============================================================================

/**
 * Per-process access bookkeeping. Kept separate from the middleware so the
 * rules can be exercised without a grammy context.
 *
 * Denied attempts count towards a lockout only while they are less than one
 * lockout duration apart. Entries past their window are dropped on a sweep
 * that runs at most once per rate limit window.
 */
export class AccessGuard {
  private readonly rateLimits = new Map<number, RateLimitEntry>();
  private readonly lockouts = new Map<number, LockoutEntry>();
  private lastSweep = 0;

  constructor(private readonly options: SecurityOptions = DEFAULT_SECURITY_OPTIONS) {}

  isRateLimited(telegramId: number): boolean {
    const now = Date.now();
    this.sweep(now);
    const entry = this.rateLimits.get(telegramId);

    if (!entry || now - entry.windowStart > this.options.rateLimitWindowMs) {
      this.rateLimits.set(telegramId, { count: 1, windowStart: now });
      return false;
    }

    if (entry.count >= this.options.rateLimitMaxRequests) {
      return true;
    }

    entry.count++;
    return false;
  }

  isLockedOut(telegramId: number): boolean {
    const entry = this.lockouts.get(telegramId);
    if (!entry) return false;

    if (entry.lockedUntil !== null && Date.now() > entry.lockedUntil) {
      this.lockouts.delete(telegramId);
      return false;
    }

    return entry.lockedUntil !== null;
  }

  /**
   * Record a denied attempt. Returns attempts left before lockout.
   */
  recordDenied(telegramId: number): number {
    const now = Date.now();
    this.sweep(now);

    const previous = this.lockouts.get(telegramId);
    const entry =
      previous && !this.isStale(previous, now)
        ? previous
        : { failedAttempts: 0, lastFailedAt: now, lockedUntil: null };
    entry.failedAttempts++;
    entry.lastFailedAt = now;

    if (entry.failedAttempts >= this.options.lockoutThreshold) {
      entry.lockedUntil = now + this.options.lockoutDurationMs;
    }

    this.lockouts.set(telegramId, entry);
    return Math.max(0, this.options.lockoutThreshold - entry.failedAttempts);
  }

  clearDenied(telegramId: number): void {
    this.lockouts.delete(telegramId);
  }

  private isStale(entry: LockoutEntry, now: number): boolean {
    if (entry.lockedUntil !== null) {
      return now > entry.lockedUntil;
    }
    return now - entry.lastFailedAt > this.options.lockoutDurationMs;
  }

  private sweep(now: number): void {
    if (now - this.lastSweep < this.options.rateLimitWindowMs) {
      return;
    }
    this.lastSweep = now;

    for (const [telegramId, entry] of this.rateLimits) {
      if (now - entry.windowStart > this.options.rateLimitWindowMs) {
        this.rateLimits.delete(telegramId);
      }
    }

    for (const [telegramId, entry] of this.lockouts) {
      if (this.isStale(entry, now)) {
        this.lockouts.delete(telegramId);
      }
    }
  }
}

// ============================================================================
// Middleware
// ============================================================================

/**
 * Answer a rejected update in whatever form the update allows
 */
async function reject(ctx: Context, message: string): Promise<void> {
  if (ctx.inlineQuery) {
    await ctx.answerInlineQuery([], { cache_time: 0, is_personal: true });
    return;
  }

  if (ctx.message) {
    await ctx.reply(message);
  }
}

/**
 * Whitelist middleware
 *
 * Checks run in order: lockout, rate limit, whitelist. An update goes through
 * only when its sender passes all three.
 */
export function whitelistMiddleware(
  whitelist: WhitelistStore,
  guard: AccessGuard = new AccessGuard()
) {
  return async (ctx: Context, next: NextFunction): Promise<void> => {
    const telegramId = ctx.from?.id;

    // No user info - can't authorize
    if (!telegramId) {
      return;
    }

    if (guard.isLockedOut(telegramId)) {
      return;
    }

    if (guard.isRateLimited(telegramId)) {
      await reject(ctx, '⏱ Rate limit exceeded. Please wait a moment before trying again.');
      return;
    }

    if (!whitelist.isAllowed(telegramId)) {
      const remaining = guard.recordDenied(telegramId);
      console.warn(`Denied update from user ${telegramId} (not whitelisted, ${remaining} attempts left)`);
      await reject(
        ctx,
        `❌ Unauthorized.\n\nYour Telegram ID is ${telegramId}. Ask the bot owner to add it to the whitelist.`
      );
      return;
    }

    guard.clearDenied(telegramId);
    await next();
  };
}
