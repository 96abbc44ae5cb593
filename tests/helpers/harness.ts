/**
 * Fully wired orchestrator core with in-process stand-ins for the decision
 * service and the platforms. Ticks are driven by hand against a fake clock.
 */

import { WorldState, type RetentionConfig } from '../../src/world/world-state.js';
import { ObservationQueue } from '../../src/world/observation-queue.js';
import { ChangeDetector } from '../../src/world/change-detector.js';
import { DecisionGateway, type DecisionGatewayConfig } from '../../src/decision/decision-gateway.js';
import { ActionExecutor } from '../../src/actions/executor.js';
import { CycleRateLimiter, type CycleRateLimiterConfig } from '../../src/core/cycle-rate-limiter.js';
import { SystemStatusTracker } from '../../src/core/system-status.js';
import { InMemoryMetrics } from '../../src/core/metrics.js';
import { OrchestrationLoop, type OrchestrationLoopConfig } from '../../src/core/orchestration-loop.js';
import type { WorldStateStore } from '../../src/storage/world-state-store.js';
import {
  FakePlatformBackend,
  ScriptedDecisionBackend,
  createFakeClock,
  createInstantSleep,
  createMockLogger,
  type FakeClock,
  type MockLogger,
} from './factories.js';

export interface HarnessOptions {
  steps?: unknown[];
  limiter?: Partial<CycleRateLimiterConfig>;
  gateway?: Partial<DecisionGatewayConfig>;
  loop?: Partial<OrchestrationLoopConfig>;
  retention?: Partial<RetentionConfig>;
  detector?: ChangeDetector;
  store?: WorldStateStore;
}

export interface Harness {
  clock: FakeClock;
  logger: MockLogger;
  metrics: InMemoryMetrics;
  world: WorldState;
  queue: ObservationQueue;
  detector: ChangeDetector;
  decisions: ScriptedDecisionBackend;
  matrix: FakePlatformBackend;
  farcaster: FakePlatformBackend;
  limiter: CycleRateLimiter;
  status: SystemStatusTracker;
  loop: OrchestrationLoop;
}

export function createHarness(options: HarnessOptions = {}): Harness {
  const clock = createFakeClock();
  const logger = createMockLogger();
  const metrics = new InMemoryMetrics();
  const world = new WorldState(options.retention ?? {}, { clock: clock.clock, logger });
  const queue = new ObservationQueue(100, logger, metrics, clock.clock);
  const detector = options.detector ?? new ChangeDetector(logger);
  const decisions = new ScriptedDecisionBackend(options.steps ?? [{ actions: [] }]);
  const matrix = new FakePlatformBackend('matrix');
  const farcaster = new FakePlatformBackend('farcaster');

  const gateway = new DecisionGateway(
    { backend: decisions, logger, metrics, clock: clock.clock },
    { timeoutMs: 1_000, ...options.gateway }
  );
  let recordId = 0;
  const executor = new ActionExecutor({
    worldState: world,
    backends: { platforms: { matrix, farcaster }, media: {} },
    logger,
    metrics,
    clock: clock.clock,
    sleep: createInstantSleep(),
    idGenerator: () => `record-${String(++recordId)}`,
  });
  const limiter = new CycleRateLimiter(
    {
      minCycleIntervalMs: 10_000,
      maxCyclesPerHour: 100,
      burst: { enabled: false, windowMs: 300_000, maxCycles: 20, cooldownMultiplier: 1.5 },
      ...options.limiter,
    },
    logger
  );
  const status = new SystemStatusTracker(world, logger, metrics);

  let cycleId = 0;
  const loop = new OrchestrationLoop(
    {
      worldState: world,
      queue,
      detector,
      gateway,
      executor,
      cycleLimiter: limiter,
      status,
      logger,
      metrics,
      store: options.store,
      clock: clock.clock,
      idGenerator: () => `cycle-${String(++cycleId)}`,
    },
    { scheduledObservationIntervalMs: 600_000, ...options.loop }
  );

  return { clock, logger, metrics, world, queue, detector, decisions, matrix, farcaster, limiter, status, loop };
}
