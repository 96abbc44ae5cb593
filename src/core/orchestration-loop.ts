/**
 * OrchestrationLoop - the heartbeat that turns observations into decisions.
 *
 * Each tick:
 * 1. Drain the observation queue into world state (bounded)
 * 2. Skip while a cycle is in flight
 * 3. Respect the cycle rate limiter (min spacing, burst cooldown, hourly budget)
 * 4. Snapshot and start a cycle if the world changed or a scheduled
 *    observation is due
 *
 * A cycle (gateway call, detector advance, execution) runs in the background
 * so ticks keep draining observers while it is in flight. At most one cycle
 * runs at a time; nothing in here throws out of a tick.
 */

import { randomUUID } from 'node:crypto';
import type { CycleOutcomeKind, Logger, Metrics, WorldStateSnapshot } from '../types/index.js';
import type { WorldState } from '../world/world-state.js';
import type { ObservationQueue } from '../world/observation-queue.js';
import type { ChangeDetector } from '../world/change-detector.js';
import type { DecisionGateway, GatewayDecision } from '../decision/decision-gateway.js';
import type { ActionExecutor } from '../actions/executor.js';
import type { WorldStateStore } from '../storage/world-state-store.js';
import { fingerprint } from '../world/fingerprint.js';
import { GatewayError, describeError, errorMessage } from './errors.js';
import type { CycleRateLimiter } from './cycle-rate-limiter.js';
import type { SystemStatusTracker } from './system-status.js';
import { systemClock, type Clock } from './timeout.js';
import { createCycleTrace, withTraceContext } from './trace-context.js';

export interface OrchestrationLoopConfig {
  tickIntervalMs: number;
  /** Start a cycle at least this often even without changes */
  scheduledObservationIntervalMs: number;
  /** Observations applied per tick; the rest wait for the next tick */
  maxEventsPerTick: number;
  /** Outcomes kept for inspection */
  outcomeHistory: number;
}

const DEFAULT_CONFIG: OrchestrationLoopConfig = {
  tickIntervalMs: 2_000,
  scheduledObservationIntervalMs: 60_000,
  maxEventsPerTick: 500,
  outcomeHistory: 50,
};

export interface OrchestrationLoopDeps {
  worldState: WorldState;
  queue: ObservationQueue;
  detector: ChangeDetector;
  gateway: DecisionGateway;
  executor: ActionExecutor;
  cycleLimiter: CycleRateLimiter;
  status: SystemStatusTracker;
  logger: Logger;
  metrics?: Metrics | undefined;
  store?: WorldStateStore | undefined;
  clock?: Clock | undefined;
  idGenerator?: (() => string) | undefined;
}

export type LoopState = 'idle' | 'cycle_running' | 'stopped';

export type CycleTrigger = 'change' | 'scheduled';

export type TickOutcome =
  | { kind: 'skipped_busy' }
  | { kind: 'skipped_min_interval'; retryAt: number }
  | { kind: 'deferred_rate_limit'; reason: 'hourly_limit' | 'burst_cooldown'; retryAt: number }
  | { kind: 'skipped_no_change' }
  | { kind: 'cycle_started'; cycleId: string; cycleSeq: number; trigger: CycleTrigger }
  | { kind: 'stopped' };

export interface CycleReport {
  cycleId: string;
  cycleSeq: number;
  trigger: CycleTrigger;
  outcome: Extract<CycleOutcomeKind, 'aborted_gateway_error' | 'triggered_zero_actions' | 'triggered_actions'>;
  /** Action records produced */
  actionCount: number;
  startedAt: number;
  finishedAt: number;
  error?: string | undefined;
}

export interface OutcomeEntry {
  outcome: CycleOutcomeKind;
  at: number;
  cycleId?: string | undefined;
  actionCount?: number | undefined;
}

export interface LoopStats {
  state: LoopState;
  ticks: number;
  cyclesStarted: number;
  cyclesInFlight: number;
  /** Highest number of cycles ever in flight together */
  peakInFlight: number;
  outcomes: Record<CycleOutcomeKind, number>;
  recentOutcomes: OutcomeEntry[];
  queueSize: number;
  droppedObservations: number;
}

function emptyOutcomeCounts(): Record<CycleOutcomeKind, number> {
  return {
    skipped_busy: 0,
    skipped_min_interval: 0,
    deferred_rate_limit: 0,
    skipped_no_change: 0,
    aborted_gateway_error: 0,
    triggered_zero_actions: 0,
    triggered_actions: 0,
  };
}

export class OrchestrationLoop {
  private readonly config: OrchestrationLoopConfig;
  private readonly deps: OrchestrationLoopDeps;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly nextId: () => string;

  private state: LoopState = 'idle';
  private running = false;
  private tickTimeout: ReturnType<typeof setTimeout> | null = null;
  private readonly abortController = new AbortController();

  private pendingCycle: Promise<CycleReport | null> | null = null;
  private inFlight = 0;
  private peakInFlight = 0;
  private cycleSeq: number;
  private lastCycleStartAt: number | null = null;
  private scheduleAnchor: number | null = null;
  private deferring = false;

  private ticks = 0;
  private cyclesStarted = 0;
  private readonly outcomeCounts = emptyOutcomeCounts();
  private recentOutcomes: OutcomeEntry[] = [];

  constructor(deps: OrchestrationLoopDeps, config: Partial<OrchestrationLoopConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'orchestration-loop' });
    this.clock = deps.clock ?? systemClock;
    this.nextId = deps.idGenerator ?? randomUUID;
    this.cycleSeq = deps.detector.getReference().cycleSeq;
  }

  /**
   * Start ticking. The first tick runs after one interval.
   */
  start(): void {
    if (this.running) {
      this.logger.warn('Orchestration loop already running');
      return;
    }
    if (this.state === 'stopped') {
      this.logger.warn('Orchestration loop was stopped and cannot be restarted');
      return;
    }

    this.running = true;
    this.scheduleAnchor ??= this.clock();
    this.logger.info({ tickIntervalMs: this.config.tickIntervalMs }, 'Orchestration loop started');
    this.scheduleTick(this.config.tickIntervalMs);
  }

  /**
   * Stop ticking, cancel the in-flight cycle's remaining actions and wait
   * for it to finish.
   */
  async stop(): Promise<void> {
    if (this.state === 'stopped') return;

    this.running = false;
    this.state = 'stopped';
    if (this.tickTimeout) {
      clearTimeout(this.tickTimeout);
      this.tickTimeout = null;
    }

    this.abortController.abort();
    if (this.pendingCycle) {
      this.logger.info('Waiting for in-flight cycle to finish');
      await this.pendingCycle;
    }

    this.logger.info({ ticks: this.ticks, cyclesStarted: this.cyclesStarted }, 'Orchestration loop stopped');
  }

  /**
   * Run a tick now instead of waiting for the timer. Observers call this for
   * events that should not wait a full interval.
   */
  wake(): void {
    if (!this.running) return;
    this.scheduleTick(0);
    this.logger.debug('Orchestration loop woken up');
  }

  getState(): LoopState {
    return this.state;
  }

  /**
   * Resolve once no cycle is in flight.
   */
  async waitForIdle(): Promise<void> {
    while (this.pendingCycle) {
      await this.pendingCycle;
    }
  }

  tick(): TickOutcome {
    if (this.state === 'stopped') return { kind: 'stopped' };

    const now = this.clock();
    this.ticks++;
    this.scheduleAnchor ??= now;
    this.deps.metrics?.counter('loop_ticks_total');

    const drained = this.deps.queue.drainInto(this.deps.worldState, this.config.maxEventsPerTick);
    if (drained.applied > 0 || drained.rejected > 0) {
      this.logger.debug({ ...drained }, 'Observations applied');
    }

    if (this.pendingCycle) {
      this.recordOutcome('skipped_busy', now);
      return { kind: 'skipped_busy' };
    }

    const gate = this.deps.cycleLimiter.check(now);
    if (!gate.allowed) {
      if (gate.reason === 'min_interval') {
        this.recordOutcome('skipped_min_interval', now);
        return { kind: 'skipped_min_interval', retryAt: gate.retryAt };
      }

      this.deps.status.recordBudget(this.deps.cycleLimiter.getStatus(now));
      if (!this.deferring) {
        this.deferring = true;
        this.logger.warn(
          { reason: gate.reason, retryInMs: gate.retryAt - now },
          'Cycle budget exhausted, deferring decision cycles'
        );
      }
      this.recordOutcome('deferred_rate_limit', now);
      return { kind: 'deferred_rate_limit', reason: gate.reason, retryAt: gate.retryAt };
    }

    const snapshot = this.deps.worldState.snapshot();
    const fp = fingerprint(snapshot);
    const changed = this.deps.detector.hasChangedFingerprint(fp);
    const anchor = this.lastCycleStartAt ?? this.scheduleAnchor;
    const scheduledDue = now - anchor >= this.config.scheduledObservationIntervalMs;

    if (!changed && !scheduledDue) {
      this.recordOutcome('skipped_no_change', now);
      return { kind: 'skipped_no_change' };
    }

    const trigger: CycleTrigger = changed ? 'change' : 'scheduled';
    return this.startCycle(snapshot, fp, trigger, now);
  }

  getStats(): LoopStats {
    return {
      state: this.state,
      ticks: this.ticks,
      cyclesStarted: this.cyclesStarted,
      cyclesInFlight: this.inFlight,
      peakInFlight: this.peakInFlight,
      outcomes: { ...this.outcomeCounts },
      recentOutcomes: [...this.recentOutcomes],
      queueSize: this.deps.queue.size(),
      droppedObservations: this.deps.queue.getDroppedCount(),
    };
  }

  private startCycle(
    snapshot: WorldStateSnapshot,
    fp: string,
    trigger: CycleTrigger,
    now: number
  ): TickOutcome {
    const cycleSeq = ++this.cycleSeq;
    const cycleId = this.nextId();

    this.deps.cycleLimiter.recordCycleStart(now);
    this.deps.status.recordBudget(this.deps.cycleLimiter.getStatus(now));
    this.lastCycleStartAt = now;
    this.deferring = false;
    this.cyclesStarted++;
    this.state = 'cycle_running';

    this.inFlight++;
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);

    this.logger.info({ cycleId, cycleSeq, trigger, fingerprint: fp.slice(0, 12) }, 'Decision cycle started');

    const promise = withTraceContext(createCycleTrace(cycleId), () =>
      this.runCycle(snapshot, fp, cycleId, cycleSeq, trigger, now)
    )
      .catch((error: unknown) => {
        this.logger.error({ error: describeError(error), cycleId }, 'Decision cycle failed unexpectedly');
        return null;
      })
      .finally(() => {
        this.inFlight--;
        this.pendingCycle = null;
        if (this.state === 'cycle_running') this.state = 'idle';
      });

    this.pendingCycle = promise;
    return { kind: 'cycle_started', cycleId, cycleSeq, trigger };
  }

  private async runCycle(
    snapshot: WorldStateSnapshot,
    fp: string,
    cycleId: string,
    cycleSeq: number,
    trigger: CycleTrigger,
    startedAt: number
  ): Promise<CycleReport> {
    let decision: GatewayDecision;
    try {
      decision = await this.deps.gateway.decide(snapshot);
    } catch (error) {
      const reason = error instanceof GatewayError ? error.reason : 'transport';
      const message = errorMessage(error);
      this.deps.status.recordGatewayFailure(this.clock(), reason, message);
      this.logger.warn({ cycleId, reason, error: message }, 'Decision cycle aborted by gateway error');
      return this.finishCycle({
        cycleId,
        cycleSeq,
        trigger,
        outcome: 'aborted_gateway_error',
        actionCount: 0,
        startedAt,
        finishedAt: this.clock(),
        error: message,
      });
    }

    this.deps.status.recordGatewaySuccess();
    this.deps.detector.advance(fp, cycleSeq);

    const report = await this.deps.executor.execute(decision.actions, {
      cycleId,
      signal: this.abortController.signal,
    });

    const failed = report.records.filter((r) => r.outcome.status === 'failed').length;
    if (report.records.length > 0) {
      this.logger.info(
        {
          cycleId,
          executed: report.records.length,
          failed,
          cancelled: report.cancelled,
          notExecuted: report.notExecuted,
        },
        'Actions executed'
      );
    }

    return this.finishCycle({
      cycleId,
      cycleSeq,
      trigger,
      outcome: report.records.length > 0 ? 'triggered_actions' : 'triggered_zero_actions',
      actionCount: report.records.length,
      startedAt,
      finishedAt: this.clock(),
    });
  }

  private async finishCycle(report: CycleReport): Promise<CycleReport> {
    this.recordOutcome(report.outcome, report.finishedAt, report.cycleId, report.actionCount);
    this.deps.status.recordCycle(report.cycleId, report.outcome, report.finishedAt);
    this.deps.metrics?.histogram('cycle_duration_ms', report.finishedAt - report.startedAt);

    if (this.deps.store) {
      try {
        await this.deps.store.onCycleCompleted();
      } catch (error) {
        this.logger.error({ error: describeError(error) }, 'Failed to persist world state');
      }
    }
    return report;
  }

  private recordOutcome(outcome: CycleOutcomeKind, at: number, cycleId?: string, actionCount?: number): void {
    this.outcomeCounts[outcome]++;
    this.recentOutcomes.push({ outcome, at, cycleId, actionCount });
    if (this.recentOutcomes.length > this.config.outcomeHistory) {
      this.recentOutcomes = this.recentOutcomes.slice(-this.config.outcomeHistory);
    }
    this.deps.metrics?.counter('cycle_outcomes_total', { outcome });
  }

  private scheduleTick(delayMs: number): void {
    if (!this.running) return;

    if (this.tickTimeout) {
      clearTimeout(this.tickTimeout);
    }
    this.tickTimeout = setTimeout(() => {
      this.tickTimeout = null;
      try {
        this.tick();
      } catch (error) {
        this.logger.error({ error: describeError(error), tick: this.ticks }, 'Tick failed');
      }
      this.scheduleTick(this.config.tickIntervalMs);
    }, delayMs);
  }
}

export function createOrchestrationLoop(
  deps: OrchestrationLoopDeps,
  config: Partial<OrchestrationLoopConfig> = {}
): OrchestrationLoop {
  return new OrchestrationLoop(deps, config);
}
