/**
 * DecisionGateway - the boundary between the orchestration core and the
 * decision service.
 *
 * Contract with the rest of the core:
 * - transport errors, timeouts and unparseable output raise GatewayError
 *   (the cycle aborts and is retried on the next eligible tick)
 * - entries that do not validate are dropped and logged
 * - empty output means zero actions
 * - more than `maxActionsPerCycle` valid entries are ordered by priority
 *   (stable, so unprioritized output keeps its order) and truncated
 */

import type { Logger, Metrics, ProposedAction, WorldStateSnapshot } from '../types/index.js';
import type { DecisionBackend } from '../ports/decision.js';
import { GatewayError, TimeoutError, errorMessage } from '../core/errors.js';
import { systemClock, withTimeout, type Clock } from '../core/timeout.js';
import { parseProposedAction } from './action-schema.js';
import { parseDecisionEnvelope } from './response-parser.js';
import { serializeSnapshot } from './snapshot-serializer.js';

export interface DecisionGatewayConfig {
  timeoutMs: number;
  maxActionsPerCycle: number;
  messageDepth: number;
  actionHistoryDepth: number;
  /** Rate limits older than this are marked stale in the payload */
  staleAfterMs: number;
}

export const DEFAULT_GATEWAY_CONFIG: DecisionGatewayConfig = {
  timeoutMs: 60_000,
  maxActionsPerCycle: 3,
  messageDepth: 10,
  actionHistoryDepth: 20,
  staleAfterMs: 300_000,
};

export interface GatewayDecision {
  /** Validated actions, at most `maxActionsPerCycle` */
  actions: ProposedAction[];
  /** Entries dropped because they failed validation */
  dropped: number;
  /** Valid entries cut by truncation */
  truncated: number;
  reasoning?: string | undefined;
  durationMs: number;
}

export interface DecisionGatewayDeps {
  backend: DecisionBackend;
  logger: Logger;
  metrics?: Metrics | undefined;
  clock?: Clock | undefined;
}

export class DecisionGateway {
  private readonly config: DecisionGatewayConfig;
  private readonly backend: DecisionBackend;
  private readonly logger: Logger;
  private readonly metrics: Metrics | undefined;
  private readonly clock: Clock;

  constructor(deps: DecisionGatewayDeps, config: Partial<DecisionGatewayConfig> = {}) {
    this.config = { ...DEFAULT_GATEWAY_CONFIG, ...config };
    this.backend = deps.backend;
    this.logger = deps.logger.child({ component: 'decision-gateway' });
    this.metrics = deps.metrics;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Ask the decision service what to do about `snapshot`.
   * @throws GatewayError
   */
  async decide(snapshot: WorldStateSnapshot): Promise<GatewayDecision> {
    const payload = serializeSnapshot(snapshot, {
      maxActions: this.config.maxActionsPerCycle,
      messageDepth: this.config.messageDepth,
      actionHistoryDepth: this.config.actionHistoryDepth,
      staleAfterMs: this.config.staleAfterMs,
    });

    const startedAt = this.clock();
    let raw: unknown;
    try {
      raw = await withTimeout(
        (signal) => this.backend.decide(payload, signal),
        this.config.timeoutMs
      );
    } catch (error) {
      const reason = error instanceof TimeoutError ? 'timeout' : 'transport';
      this.metrics?.counter('gateway_failures_total', { reason });
      throw new GatewayError(
        reason,
        `Decision backend ${this.backend.name} failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }
    const durationMs = this.clock() - startedAt;
    this.metrics?.histogram('gateway_duration_ms', durationMs);

    const envelope = parseDecisionEnvelope(raw);
    if (!envelope.ok) {
      this.metrics?.counter('gateway_failures_total', { reason: 'malformed' });
      throw new GatewayError('malformed', `Malformed decision response: ${envelope.reason}`);
    }

    const valid: ProposedAction[] = [];
    let dropped = 0;
    envelope.entries.forEach((entry, index) => {
      const parsed = parseProposedAction(entry);
      if (parsed.ok) {
        valid.push(parsed.action);
      } else {
        dropped++;
        this.logger.warn({ index, issues: parsed.issues }, 'Dropping non-conforming action');
      }
    });

    const ordered = [...valid].sort((a, b) => (b.priority ?? 0) - (a.priority ?? 0));
    const actions = ordered.slice(0, this.config.maxActionsPerCycle);
    const truncated = ordered.length - actions.length;
    if (truncated > 0) {
      this.logger.warn(
        {
          proposed: ordered.length,
          max: this.config.maxActionsPerCycle,
          cut: ordered.slice(actions.length).map((a) => a.kind),
        },
        'Decision returned too many actions, truncating'
      );
    }

    if (dropped > 0) this.metrics?.counter('gateway_actions_dropped_total', {}, dropped);
    this.logger.info(
      {
        durationMs,
        actions: actions.map((a) => a.kind),
        dropped,
        truncated,
      },
      actions.length === 0 ? 'Decision: nothing to do' : 'Decision received'
    );

    return { actions, dropped, truncated, reasoning: envelope.reasoning, durationMs };
  }
}

export function createDecisionGateway(
  deps: DecisionGatewayDeps,
  config: Partial<DecisionGatewayConfig> = {}
): DecisionGateway {
  return new DecisionGateway(deps, config);
}
