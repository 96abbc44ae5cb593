import type { Logger } from '../types/index.js';
import { CircuitOpenError } from './errors.js';
import { systemClock, type Clock } from './timeout.js';

/**
 * Circuit breaker states.
 */
export enum CircuitState {
  /** Calls go through */
  CLOSED = 'CLOSED',
  /** Calls are rejected without reaching the dependency */
  OPEN = 'OPEN',
  /** One trial call is allowed to probe recovery */
  HALF_OPEN = 'HALF_OPEN',
}

export interface CircuitBreakerConfig {
  /** Failures inside `windowMs` that open the circuit */
  failureThreshold: number;
  /** Sliding window for counting failures */
  windowMs: number;
  /** Time the circuit stays open before a trial call */
  resetTimeoutMs: number;
  name?: string | undefined;
  logger?: Logger | undefined;
  clock?: Clock | undefined;
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 3,
  windowMs: 300_000,
  resetTimeoutMs: 600_000,
};

/**
 * Circuit breaker for calls to an unreliable dependency.
 *
 * CLOSED -> OPEN: `failureThreshold` failures within `windowMs`
 * OPEN -> HALF_OPEN: after `resetTimeoutMs`
 * HALF_OPEN -> CLOSED: trial call succeeds
 * HALF_OPEN -> OPEN: trial call fails
 */
export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failureTimes: number[] = [];
  private openedAt: number | null = null;
  private readonly config: CircuitBreakerConfig;
  private readonly clock: Clock;
  readonly name: string;

  constructor(config: Partial<CircuitBreakerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.clock = this.config.clock ?? systemClock;
    this.name = this.config.name ?? 'unnamed';
  }

  /**
   * Current state, moving OPEN to HALF_OPEN once the reset timeout passed.
   */
  getState(): CircuitState {
    if (
      this.state === CircuitState.OPEN &&
      this.openedAt !== null &&
      this.clock() - this.openedAt >= this.config.resetTimeoutMs
    ) {
      this.state = CircuitState.HALF_OPEN;
      this.log('info', 'Transitioning to HALF_OPEN');
    }
    return this.state;
  }

  /**
   * Whether a call may go through now.
   */
  canExecute(): boolean {
    return this.getState() !== CircuitState.OPEN;
  }

  /**
   * Run `operation` through the breaker. Rejects with CircuitOpenError while open.
   */
  async execute<T>(operation: () => Promise<T>): Promise<T> {
    if (!this.canExecute()) {
      this.log('warn', 'Request rejected - circuit is open');
      throw new CircuitOpenError(this.name);
    }

    try {
      const result = await operation();
      this.recordSuccess();
      return result;
    } catch (error) {
      this.recordFailure();
      throw error;
    }
  }

  recordSuccess(): void {
    if (this.state === CircuitState.HALF_OPEN) {
      this.log('info', 'Trial call succeeded, closing circuit');
    }
    this.state = CircuitState.CLOSED;
    this.failureTimes = [];
    this.openedAt = null;
  }

  recordFailure(): void {
    const now = this.clock();
    this.failureTimes = this.failureTimes.filter((t) => now - t < this.config.windowMs);
    this.failureTimes.push(now);

    if (this.getState() === CircuitState.HALF_OPEN) {
      this.open(now);
      this.log('warn', 'Trial call failed, reopening circuit');
    } else if (
      this.state === CircuitState.CLOSED &&
      this.failureTimes.length >= this.config.failureThreshold
    ) {
      this.open(now);
      this.log('warn', `Opening circuit after ${String(this.failureTimes.length)} failures`);
    }
  }

  getStats(): { state: CircuitState; recentFailures: number; openedAt: number | null } {
    return {
      state: this.getState(),
      recentFailures: this.failureTimes.length,
      openedAt: this.openedAt,
    };
  }

  private open(now: number): void {
    this.state = CircuitState.OPEN;
    this.openedAt = now;
  }

  private log(level: 'info' | 'warn', message: string): void {
    this.config.logger?.[level]({ circuit: this.name, state: this.state }, message);
  }
}

/**
 * One circuit breaker per key, created on first use with shared settings.
 * The executor keys by action kind and target.
 */
export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly config: Omit<CircuitBreakerConfig, 'name'>;

  constructor(config: Partial<Omit<CircuitBreakerConfig, 'name'>> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get(key: string): CircuitBreaker {
    let breaker = this.breakers.get(key);
    if (!breaker) {
      breaker = new CircuitBreaker({ ...this.config, name: key });
      this.breakers.set(key, breaker);
    }
    return breaker;
  }

  /**
   * Keys whose circuit is currently not CLOSED.
   */
  getOpenCircuits(): string[] {
    return [...this.breakers.values()]
      .filter((b) => b.getState() !== CircuitState.CLOSED)
      .map((b) => b.name);
  }
}
