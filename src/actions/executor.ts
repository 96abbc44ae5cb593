/**
 * ActionExecutor - turns proposed actions into platform effects.
 *
 * Per action, in order: cancellation check, validation, duplicate guard,
 * back-end lookup, platform quota, local hourly limits, circuit breaker, then
 * the back-end call under a timeout with bounded retries for transient
 * failures. Every non-wait action yields exactly one ActionRecord, appended to
 * world state as soon as it is known; no action error escapes `execute()`.
 */

import { randomUUID } from 'node:crypto';
import type {
  ActionErrorKind,
  ActionRecord,
  ExecutableAction,
  Logger,
  Metrics,
  Platform,
  ProposedAction,
} from '../types/index.js';
import type { BackendResult, BackendRegistry } from '../ports/backend.js';
import type { WorldState } from '../world/world-state.js';
import {
  ActionError,
  InvalidInputError,
  PermanentActionError,
  RateLimitedError,
  TimeoutError,
  TransientActionError,
  describeError,
  errorMessage,
} from '../core/errors.js';
import { retryWithBackoff, type RetryPolicy } from '../core/retry.js';
import { systemClock, withTimeout, type Clock, type SleepFn } from '../core/timeout.js';
import { CircuitBreakerRegistry } from '../core/circuit-breaker.js';
import { withChildSpan } from '../core/trace-context.js';
import { ActionRateLimiter, checkQuota } from './action-rate-limiter.js';
import {
  DEFAULT_CONTENT_LIMITS,
  assertNotDuplicate,
  contentDigest,
  recordedText,
  validateAction,
  type ContentLimits,
} from './validation.js';

export interface ActionExecutorConfig extends RetryPolicy {
  /** Deadline for a single back-end call */
  actionTimeoutMs: number;
  staleAfterMs: number;
  lowQuotaThreshold: number;
  contentLimits: ContentLimits;
}

export const DEFAULT_EXECUTOR_CONFIG: ActionExecutorConfig = {
  maxRetries: 2,
  baseDelayMs: 1000,
  maxDelayMs: 8000,
  actionTimeoutMs: 30_000,
  staleAfterMs: 300_000,
  lowQuotaThreshold: 1,
  contentLimits: DEFAULT_CONTENT_LIMITS,
};

export interface ActionExecutorDeps {
  worldState: WorldState;
  backends: BackendRegistry;
  logger: Logger;
  metrics?: Metrics | undefined;
  actionLimiter?: ActionRateLimiter | undefined;
  circuits?: CircuitBreakerRegistry | undefined;
  clock?: Clock | undefined;
  sleep?: SleepFn | undefined;
  idGenerator?: (() => string) | undefined;
}

export interface ExecutionContext {
  cycleId: string;
  /** Checked before each action; never interrupts a call in progress */
  signal?: AbortSignal | undefined;
}

export interface ExecutionReport {
  records: ActionRecord[];
  cancelled: boolean;
  /** Non-wait actions skipped because the cycle was cancelled */
  notExecuted: number;
}

type Invoker = (signal: AbortSignal) => Promise<BackendResult>;

const CONTENT_PREVIEW_LIMIT = 200;

/**
 * Rate-limit key base for an action: the platform, or the media service.
 */
function quotaBase(action: ExecutableAction, platform: Platform | undefined): string {
  return action.kind === 'upload_media' ? action.service : (platform ?? 'unknown');
}


export class ActionExecutor {
  private readonly config: ActionExecutorConfig;
  private readonly world: WorldState;
  private readonly backends: BackendRegistry;
  private readonly logger: Logger;
  private readonly metrics: Metrics | undefined;
  private readonly limiter: ActionRateLimiter;
  private readonly circuits: CircuitBreakerRegistry;
  private readonly clock: Clock;
  private readonly sleep: SleepFn | undefined;
  private readonly nextId: () => string;

  constructor(deps: ActionExecutorDeps, config: Partial<ActionExecutorConfig> = {}) {
    this.config = { ...DEFAULT_EXECUTOR_CONFIG, ...config };
    this.world = deps.worldState;
    this.backends = deps.backends;
    this.logger = deps.logger.child({ component: 'action-executor' });
    this.metrics = deps.metrics;
    this.limiter = deps.actionLimiter ?? new ActionRateLimiter();
    this.clock = deps.clock ?? systemClock;
    this.circuits = deps.circuits ?? new CircuitBreakerRegistry({ clock: this.clock, logger: this.logger });
    this.sleep = deps.sleep;
    this.nextId = deps.idGenerator ?? randomUUID;
  }

  async execute(actions: readonly ProposedAction[], ctx: ExecutionContext): Promise<ExecutionReport> {
    const records: ActionRecord[] = [];

    for (let i = 0; i < actions.length; i++) {
      const action = actions[i];
      if (!action) continue;

      if (ctx.signal?.aborted) {
        const notExecuted = actions.slice(i).filter((a) => a.kind !== 'wait').length;
        this.logger.info({ notExecuted }, 'Cycle cancelled, remaining actions dropped');
        return { records, cancelled: true, notExecuted };
      }

      if (action.kind === 'wait') {
        this.logger.debug({ rationale: action.rationale }, 'Wait action, nothing to execute');
        continue;
      }

      const record = await withChildSpan(() => this.executeOne(action, ctx.cycleId));
      this.world.recordActionResult(record);
      records.push(record);

      this.metrics?.counter('actions_total', { kind: record.kind, status: record.outcome.status });
      if (record.outcome.status === 'failed') {
        this.world.updateSystemStatus({
          lastActionFailure: {
            at: record.timestamp,
            kind: record.kind,
            errorKind: record.outcome.errorKind,
            message: record.outcome.message,
          },
        });
      }
    }

    return { records, cancelled: false, notExecuted: 0 };
  }

  private async executeOne(action: ExecutableAction, cycleId: string): Promise<ActionRecord> {
    let platform: Platform | undefined = action.kind === 'post' ? action.platform : undefined;
    let attempts = 0;
    const finish = (outcome: ActionRecord['outcome']): ActionRecord => ({
      id: this.nextId(),
      cycleId,
      kind: action.kind,
      platform,
      channelId: 'channelId' in action ? action.channelId : undefined,
      messageId: 'messageId' in action ? action.messageId : undefined,
      content: recordedText(action).slice(0, CONTENT_PREVIEW_LIMIT),
      contentHash: contentDigest(recordedText(action)),
      rationale: action.rationale,
      timestamp: this.clock(),
      attempts,
      outcome,
    });

    try {
      platform = validateAction(action, this.world, this.config.contentLimits);
      assertNotDuplicate(action, platform, this.world.getActionHistory());

      const invoke = this.resolveInvoker(action, platform);
      const base = quotaBase(action, platform);
      this.assertQuota(base, action.kind);

      const now = this.clock();
      const local = this.limiter.check(action.kind, platform, now);
      if (!local.allowed) {
        throw new RateLimitedError(local.reason, local.retryAt - now);
      }

      const circuitKey = `${action.kind}:${'channelId' in action && action.channelId ? action.channelId : base}`;
      const circuit = this.circuits.get(circuitKey);
      if (!circuit.canExecute()) {
        throw new ActionError('circuit_open', `circuit ${circuitKey} is open`);
      }

      this.limiter.record(action.kind, platform, now);
      const result = await retryWithBackoff(
        async (attempt) => {
          attempts = attempt;
          return this.callBackend(invoke, base);
        },
        {
          maxRetries: this.config.maxRetries,
          baseDelayMs: this.config.baseDelayMs,
          maxDelayMs: this.config.maxDelayMs,
          sleep: this.sleep,
          shouldRetry: (error) => error instanceof TransientActionError,
          onRetry: ({ attempt, delayMs, error }) => {
            this.logger.warn(
              { kind: action.kind, attempt, delayMs, error: errorMessage(error) },
              'Transient action failure, retrying'
            );
          },
        }
      );

      if (!result.ok) {
        const error = result.error;
        if (error instanceof TransientActionError || error instanceof PermanentActionError) {
          circuit.recordFailure();
        }
        throw error;
      }

      circuit.recordSuccess();
      this.logger.info(
        { kind: action.kind, platform, referenceId: result.value, attempts },
        'Action executed'
      );
      return finish({ status: 'success', referenceId: result.value });
    } catch (error) {
      const errorKind: ActionErrorKind = error instanceof ActionError ? error.kind : 'permanent';
      const message = errorMessage(error);
      if (error instanceof ActionError) {
        const retryAfterMs = error instanceof RateLimitedError ? error.retryAfterMs : undefined;
        this.logger.warn({ kind: action.kind, platform, errorKind, message, attempts, retryAfterMs }, 'Action failed');
      } else {
        this.logger.error({ kind: action.kind, error: describeError(error) }, 'Unexpected executor error');
      }
      return finish({ status: 'failed', errorKind, message });
    }
  }

  /**
   * One back-end call under the action timeout. Failure results and thrown
   * errors become typed ActionErrors; thrown errors count as transient.
   */
  private async callBackend(invoke: Invoker, base: string): Promise<string> {
    let result: BackendResult;
    try {
      result = await withTimeout(invoke, this.config.actionTimeoutMs);
    } catch (error) {
      const detail = error instanceof TimeoutError ? error.message : errorMessage(error);
      throw new TransientActionError(detail, { cause: error });
    }

    if (result.rateLimit) {
      const { endpoint, ...status } = result.rateLimit;
      this.world.updateRateLimit(endpoint ? `${base}:${endpoint}` : base, status);
    }

    if (result.ok) return result.referenceId;

    switch (result.error) {
      case 'rate_limited':
        throw new RateLimitedError(result.message, result.retryAfterMs);
      case 'transient':
        throw new TransientActionError(result.message);
      case 'permanent':
        throw new PermanentActionError(result.message);
      case 'invalid_input':
        throw new InvalidInputError(result.message);
    }
  }

  private assertQuota(base: string, kind: ExecutableAction['kind']): void {
    const now = this.clock();
    for (const key of [base, `${base}:${kind}`]) {
      const check = checkQuota(this.world.getRateLimit(key), now, {
        staleAfterMs: this.config.staleAfterMs,
        lowQuotaThreshold: this.config.lowQuotaThreshold,
      });
      if (!check.ok) {
        throw new RateLimitedError(`${key}: ${check.reason}`, check.retryAfterMs);
      }
    }
  }

  /**
   * Bind the action to its back-end method.
   * @throws PermanentActionError when nothing can perform it
   */
  private resolveInvoker(action: ExecutableAction, platform: Platform | undefined): Invoker {
    if (action.kind === 'upload_media') {
      const media = this.backends.media[action.service];
      if (!media) throw new PermanentActionError(`no ${action.service} upload back-end configured`);
      return (signal) => media.upload({ url: action.url, contentType: action.contentType }, signal);
    }

    const backend = platform ? this.backends.platforms[platform] : undefined;
    if (!backend) {
      throw new PermanentActionError(`no back-end configured for ${platform ?? 'unknown platform'}`);
    }

    const unsupported = (): never => {
      throw new PermanentActionError(`${backend.name} does not support ${action.kind}`);
    };

    switch (action.kind) {
      case 'send_message': {
        const send = backend.sendMessage?.bind(backend) ?? unsupported();
        return (signal) => send({ channelId: action.channelId, content: action.content }, signal);
      }
      case 'reply': {
        const reply = backend.reply?.bind(backend) ?? unsupported();
        return (signal) =>
          reply({ channelId: action.channelId, messageId: action.messageId, content: action.content }, signal);
      }
      case 'post': {
        const post = backend.post?.bind(backend) ?? unsupported();
        return (signal) => post({ content: action.content, channelId: action.channelId }, signal);
      }
      case 'react': {
        const react = backend.react?.bind(backend) ?? unsupported();
        return (signal) =>
          react({ channelId: action.channelId, messageId: action.messageId, reaction: action.reaction }, signal);
      }
    }
  }
}

export function createActionExecutor(
  deps: ActionExecutorDeps,
  config: Partial<ActionExecutorConfig> = {}
): ActionExecutor {
  return new ActionExecutor(deps, config);
}
