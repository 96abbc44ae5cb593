/**
 * Trace Context
 *
 * AsyncLocalStorage-based context so every log line written while a decision
 * cycle runs carries that cycle's id, including lines from the gateway, the
 * executor and back-ends it awaits.
 *
 * - A decision cycle is a trace root: traceId = cycleId.
 * - Each executed action opens a child span under the cycle.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface TraceContext {
  /** Root trace id (the cycle id) */
  traceId: string;
  /** Tick that started the cycle */
  correlationId?: string;
  /** Span of the enclosing operation */
  parentId?: string;
  /** Span of the current operation */
  spanId?: string;
}

const storage = new AsyncLocalStorage<TraceContext>();

/**
 * Run `fn` with the given context; async work started inside inherits it.
 */
export function withTraceContext<T>(context: TraceContext, fn: () => T): T {
  return storage.run(context, fn);
}

/**
 * Current context, or undefined outside any `withTraceContext`.
 */
export function getTraceContext(): TraceContext | undefined {
  return storage.getStore();
}

/**
 * Span id, prefixed by the parent's when one is given.
 */
export function generateChildSpan(parent?: string): string {
  const shortId = randomUUID().slice(0, 8);
  return parent ? `${parent}_${shortId}` : `root_${shortId}`;
}

/**
 * Root context for a decision cycle.
 */
export function createCycleTrace(cycleId: string, tickId?: string): TraceContext {
  const ctx: TraceContext = { traceId: cycleId, spanId: generateChildSpan() };
  if (tickId !== undefined) {
    ctx.correlationId = tickId;
  }
  return ctx;
}

/**
 * Run `fn` in a child span of the current context. Without a current
 * context, `fn` runs as-is.
 */
export function withChildSpan<T>(fn: () => T): T {
  const parent = getTraceContext();
  if (!parent) return fn();

  const child: TraceContext = {
    traceId: parent.traceId,
    spanId: generateChildSpan(parent.spanId),
  };
  if (parent.correlationId !== undefined) child.correlationId = parent.correlationId;
  if (parent.spanId !== undefined) child.parentId = parent.spanId;
  return storage.run(child, fn);
}
