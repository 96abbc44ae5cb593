/**
 * System status tracker.
 *
 * Keeps the health section of world state current so the decision service
 * can see that the orchestrator itself is struggling:
 * - healthy: last gateway call succeeded
 * - degraded: `degradedAfter` consecutive gateway failures
 * - impaired: `impairedAfter` consecutive gateway failures
 *
 * Health changes are logged once per transition.
 */

import type {
  CycleOutcomeKind,
  GatewayFailureReason,
  HealthLevel,
  Logger,
  Metrics,
} from '../types/index.js';
import type { WorldState } from '../world/world-state.js';
import type { CycleBudgetStatus } from './cycle-rate-limiter.js';

export interface SystemStatusConfig {
  degradedAfter: number;
  impairedAfter: number;
}

const DEFAULT_CONFIG: SystemStatusConfig = {
  degradedAfter: 1,
  impairedAfter: 3,
};

const HEALTH_GAUGE: Record<HealthLevel, number> = {
  healthy: 0,
  degraded: 1,
  impaired: 2,
};

export class SystemStatusTracker {
  private readonly config: SystemStatusConfig;
  private readonly logger: Logger;

  constructor(
    private readonly world: WorldState,
    logger: Logger,
    private readonly metrics?: Metrics,
    config: Partial<SystemStatusConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = logger.child({ component: 'system-status' });
  }

  recordGatewaySuccess(): void {
    this.world.updateSystemStatus({ consecutiveGatewayFailures: 0 });
    this.setHealth(0);
  }

  recordGatewayFailure(at: number, reason: GatewayFailureReason, message: string): void {
    const failures = this.world.getSystemStatus().consecutiveGatewayFailures + 1;
    this.world.updateSystemStatus({
      consecutiveGatewayFailures: failures,
      lastGatewayFailure: { at, reason, message },
    });
    this.setHealth(failures);
  }

  recordCycle(cycleId: string, outcome: CycleOutcomeKind, at: number): void {
    this.world.updateSystemStatus({ lastCycle: { cycleId, outcome, at } });
  }

  recordBudget(budget: CycleBudgetStatus): void {
    this.world.updateSystemStatus({
      cycleBudget: { used: budget.used, limit: budget.limit, inCooldown: budget.inCooldown },
    });
    this.metrics?.gauge('cycle_budget_used', budget.used);
  }

  getHealth(): HealthLevel {
    return this.world.getSystemStatus().health;
  }

  private setHealth(consecutiveFailures: number): void {
    const next: HealthLevel =
      consecutiveFailures >= this.config.impairedAfter
        ? 'impaired'
        : consecutiveFailures >= this.config.degradedAfter
          ? 'degraded'
          : 'healthy';

    const previous = this.world.getSystemStatus().health;
    if (next === previous) return;

    this.world.updateSystemStatus({ health: next });
    this.metrics?.gauge('system_health', HEALTH_GAUGE[next]);
    if (next === 'healthy') {
      this.logger.info({ previous }, 'System health recovered');
    } else {
      this.logger.warn({ previous, health: next, consecutiveFailures }, 'System health changed');
    }
  }
}

export function createSystemStatusTracker(
  world: WorldState,
  logger: Logger,
  metrics?: Metrics,
  config: Partial<SystemStatusConfig> = {}
): SystemStatusTracker {
  return new SystemStatusTracker(world, logger, metrics, config);
}
