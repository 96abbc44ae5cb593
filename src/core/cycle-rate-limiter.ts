import type { Logger } from '../types/index.js';
import { SlidingWindow } from './sliding-window.js';

const HOUR_MS = 3_600_000;
const MAX_INTERVAL_MULTIPLIER = 3;
const MULTIPLIER_GROWTH = 1.2;
const MULTIPLIER_DECAY = 0.95;

export interface BurstConfig {
  enabled: boolean;
  /** Window in which bursts are counted */
  windowMs: number;
  /** Cycle starts inside the window that count as a burst */
  maxCycles: number;
  /** Cooldown after a burst = minCycleIntervalMs * cooldownMultiplier */
  cooldownMultiplier: number;
}

export interface CycleRateLimiterConfig {
  minCycleIntervalMs: number;
  maxCyclesPerHour: number;
  burst: BurstConfig;
}

export type CycleDenialReason = 'min_interval' | 'hourly_limit' | 'burst_cooldown';

export type CycleGate =
  | { allowed: true }
  | { allowed: false; reason: CycleDenialReason; retryAt: number };

export interface CycleBudgetStatus {
  used: number;
  limit: number;
  inCooldown: boolean;
  intervalMultiplier: number;
  effectiveMinIntervalMs: number;
  lastCycleStartAt: number | null;
}

/**
 * Decides whether a new decision cycle may start.
 *
 * Three gates, checked in order: a minimum spacing between cycle starts
 * (stretched by an adaptive multiplier after bursts), a burst cooldown, and a
 * rolling one-hour ceiling shared by change-driven and scheduled cycles.
 */
export class CycleRateLimiter {
  private readonly hourly = new SlidingWindow(HOUR_MS);
  private readonly burstWindow: SlidingWindow;
  private lastCycleStartAt: number | null = null;
  private cooldownUntil = 0;
  private intervalMultiplier = 1;
  private readonly logger: Logger | undefined;

  constructor(
    private readonly config: CycleRateLimiterConfig,
    logger?: Logger
  ) {
    this.burstWindow = new SlidingWindow(config.burst.windowMs);
    this.logger = logger?.child({ component: 'cycle-rate-limiter' });
  }

  check(now: number): CycleGate {
    if (this.lastCycleStartAt !== null) {
      const nextAllowed = this.lastCycleStartAt + this.effectiveMinInterval();
      if (now < nextAllowed) {
        return { allowed: false, reason: 'min_interval', retryAt: nextAllowed };
      }
    }

    if (now < this.cooldownUntil) {
      return { allowed: false, reason: 'burst_cooldown', retryAt: this.cooldownUntil };
    }

    if (this.hourly.count(now) >= this.config.maxCyclesPerHour) {
      return {
        allowed: false,
        reason: 'hourly_limit',
        retryAt: this.hourly.nextExpiry(now) ?? now,
      };
    }

    return { allowed: true };
  }

  /**
   * Count a cycle start against every budget.
   */
  recordCycleStart(now: number): void {
    this.lastCycleStartAt = now;
    this.hourly.record(now);

    if (!this.config.burst.enabled) return;

    this.burstWindow.record(now);
    const inWindow = this.burstWindow.count(now);
    if (inWindow >= this.config.burst.maxCycles) {
      const cooldownMs = this.config.minCycleIntervalMs * this.config.burst.cooldownMultiplier;
      this.cooldownUntil = now + cooldownMs;
      this.intervalMultiplier = Math.min(
        MAX_INTERVAL_MULTIPLIER,
        this.intervalMultiplier * MULTIPLIER_GROWTH
      );
      this.logger?.warn(
        { cyclesInWindow: inWindow, cooldownMs, intervalMultiplier: this.intervalMultiplier },
        'Cycle burst detected, cooling down'
      );
    } else {
      this.intervalMultiplier = Math.max(1, this.intervalMultiplier * MULTIPLIER_DECAY);
    }
  }

  getStatus(now: number): CycleBudgetStatus {
    return {
      used: this.hourly.count(now),
      limit: this.config.maxCyclesPerHour,
      inCooldown: now < this.cooldownUntil,
      intervalMultiplier: this.intervalMultiplier,
      effectiveMinIntervalMs: this.effectiveMinInterval(),
      lastCycleStartAt: this.lastCycleStartAt,
    };
  }

  private effectiveMinInterval(): number {
    return this.config.minCycleIntervalMs * this.intervalMultiplier;
  }
}
