/**
 * Orchestrator Error Types
 *
 * Typed error classes with a machine-readable code, so callers can decide
 * between retrying, recording and aborting without string matching.
 */

import type { ActionErrorKind, GatewayFailureReason } from '../types/index.js';

/**
 * Error codes for classification.
 */
export type OrchestratorErrorCode =
  | 'GATEWAY_FAILED'
  | 'ACTION_FAILED'
  | 'WORLD_STATE_INVALID'
  | 'CONFIG_INVALID'
  | 'TIMEOUT'
  | 'CIRCUIT_OPEN';

/**
 * Base error class.
 */
export class OrchestratorError extends Error {
  constructor(
    message: string,
    public readonly code: OrchestratorErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'OrchestratorError';
  }
}

/**
 * The decision call failed or returned something unusable.
 * Aborts the current cycle only; the same change is retried on the next eligible tick.
 */
export class GatewayError extends OrchestratorError {
  constructor(
    public readonly reason: GatewayFailureReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'GATEWAY_FAILED', options);
    this.name = 'GatewayError';
  }
}

/**
 * Base for failures of a single action attempt. Contained by the executor.
 */
export class ActionError extends OrchestratorError {
  constructor(
    public readonly kind: ActionErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'ACTION_FAILED', options);
    this.name = 'ActionError';
  }
}

/**
 * Quota exhausted. Recorded, not retried within the same cycle.
 */
export class RateLimitedError extends ActionError {
  constructor(
    message: string,
    public readonly retryAfterMs?: number
  ) {
    super('rate_limited', message);
    this.name = 'RateLimitedError';
  }
}

/**
 * Network or timeout failure. Retried up to the configured bound.
 */
export class TransientActionError extends ActionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('transient', message, options);
    this.name = 'TransientActionError';
  }
}

/**
 * The back-end refused the action for good. Never retried.
 */
export class PermanentActionError extends ActionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('permanent', message, options);
    this.name = 'PermanentActionError';
  }
}

/**
 * The back-end rejected the request payload.
 */
export class InvalidInputError extends ActionError {
  constructor(message: string) {
    super('invalid_input', message);
    this.name = 'InvalidInputError';
  }
}

/**
 * The proposed action is malformed or targets something that does not exist.
 * Never sent to a back-end.
 */
export class ValidationError extends ActionError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super('validation', message);
    this.name = 'ValidationError';
  }
}

/**
 * Rejected write to world state (empty channel id, platform mismatch).
 */
export class WorldStateError extends OrchestratorError {
  constructor(message: string) {
    super(message, 'WORLD_STATE_INVALID');
    this.name = 'WorldStateError';
  }
}

/**
 * Configuration could not be loaded or failed validation. Fatal at startup.
 */
export class ConfigError extends OrchestratorError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, 'CONFIG_INVALID', options);
    this.name = 'ConfigError';
  }
}

/**
 * An operation exceeded its time budget.
 */
export class TimeoutError extends OrchestratorError {
  constructor(public readonly timeoutMs: number) {
    super(`Operation timed out after ${String(timeoutMs)}ms`, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}

/**
 * A circuit breaker is rejecting calls.
 */
export class CircuitOpenError extends OrchestratorError {
  constructor(public readonly circuit: string) {
    super(`Circuit breaker "${circuit}" is open`, 'CIRCUIT_OPEN');
    this.name = 'CircuitOpenError';
  }
}

/**
 * Serialize an unknown thrown value for structured logging.
 */
export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof OrchestratorError) {
    return { name: error.name, code: error.code, message: error.message, stack: error.stack };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { raw: String(error), type: typeof error };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
