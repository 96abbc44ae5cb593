/**
 * Observer port.
 *
 * Observers (Matrix sync loops, Farcaster pollers) are independent producers.
 * They only push into an ObservationSink and never read world state back.
 */

import type { ObservedMessage } from '../types/index.js';

/**
 * Rate-limit reading as reported by a platform. `observedAt` defaults to the
 * receiver's clock.
 */
export interface RateLimitInput {
  remaining: number;
  limit?: number | undefined;
  resetAt: number;
  observedAt?: number | undefined;
}

/**
 * Push-only write surface handed to observers.
 */
export interface ObservationSink {
  /** Returns false when the observation was not accepted */
  recordMessage(channelId: string, message: ObservedMessage): boolean;
  /** Key is `<platform>` or `<platform>:<endpoint>` */
  updateRateLimit(key: string, status: RateLimitInput): boolean;
}

export interface Observer {
  readonly name: string;
  start(sink: ObservationSink, options: { wake: () => void }): Promise<void>;
  stop(): Promise<void>;
}
