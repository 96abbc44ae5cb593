/**
 * Local hourly ceilings for outgoing actions, independent of what the
 * platforms report. Guards against a decision service that keeps proposing
 * the same kind of action.
 */

import type { ExecutableKind, Platform, RateLimitStatus } from '../types/index.js';
import { SlidingWindow } from '../core/sliding-window.js';

const HOUR_MS = 3_600_000;

export interface ActionLimitsConfig {
  /** Max executions per kind per hour */
  perKind: Partial<Record<ExecutableKind, number>>;
  /** Max executions per platform per hour, all kinds together */
  perPlatform: Partial<Record<Platform, number>>;
}

export const DEFAULT_ACTION_LIMITS: ActionLimitsConfig = {
  perKind: {
    send_message: 100,
    reply: 100,
    post: 50,
    react: 200,
    upload_media: 30,
  },
  perPlatform: {
    matrix: 50,
    farcaster: 30,
  },
};

export type LimitCheck = { allowed: true } | { allowed: false; reason: string; retryAt: number };

export class ActionRateLimiter {
  private readonly byKind = new Map<ExecutableKind, SlidingWindow>();
  private readonly byPlatform = new Map<Platform, SlidingWindow>();

  constructor(private readonly config: ActionLimitsConfig = DEFAULT_ACTION_LIMITS) {}

  check(kind: ExecutableKind, platform: Platform | undefined, now: number): LimitCheck {
    const kindLimit = this.config.perKind[kind];
    if (kindLimit !== undefined) {
      const window = this.window(this.byKind, kind);
      if (window.count(now) >= kindLimit) {
        return {
          allowed: false,
          reason: `${kind} limit of ${String(kindLimit)}/hour reached`,
          retryAt: window.nextExpiry(now) ?? now,
        };
      }
    }

    if (platform !== undefined) {
      const platformLimit = this.config.perPlatform[platform];
      if (platformLimit !== undefined) {
        const window = this.window(this.byPlatform, platform);
        if (window.count(now) >= platformLimit) {
          return {
            allowed: false,
            reason: `${platform} limit of ${String(platformLimit)}/hour reached`,
            retryAt: window.nextExpiry(now) ?? now,
          };
        }
      }
    }

    return { allowed: true };
  }

  record(kind: ExecutableKind, platform: Platform | undefined, now: number): void {
    this.window(this.byKind, kind).record(now);
    if (platform !== undefined) {
      this.window(this.byPlatform, platform).record(now);
    }
  }

  private window<K>(map: Map<K, SlidingWindow>, key: K): SlidingWindow {
    let window = map.get(key);
    if (!window) {
      window = new SlidingWindow(HOUR_MS);
      map.set(key, window);
    }
    return window;
  }
}

export interface QuotaPolicy {
  /** Entries older than this are stale */
  staleAfterMs: number;
  /** A stale entry at or below this many remaining calls is presumed exhausted */
  lowQuotaThreshold: number;
}

export type QuotaCheck = { ok: true } | { ok: false; reason: string; retryAfterMs: number };

/**
 * Decide from a platform-reported status whether another call may be made.
 *
 * Past `resetAt` the quota is presumed replenished. Before it, zero remaining
 * blocks, and so does a stale reading at or below `lowQuotaThreshold`.
 */
export function checkQuota(
  status: RateLimitStatus | undefined,
  now: number,
  policy: QuotaPolicy
): QuotaCheck {
  if (!status || now >= status.resetAt) {
    return { ok: true };
  }
  if (status.remaining <= 0) {
    return { ok: false, reason: 'quota exhausted', retryAfterMs: status.resetAt - now };
  }
  const stale = now - status.observedAt > policy.staleAfterMs;
  if (stale && status.remaining <= policy.lowQuotaThreshold) {
    return {
      ok: false,
      reason: `stale quota reading (${String(status.remaining)} left) presumed exhausted`,
      retryAfterMs: status.resetAt - now,
    };
  }
  return { ok: true };
}
