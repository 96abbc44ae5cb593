/**
 * Bounded queue between observers and world state.
 *
 * Observers push at their own cadence; the orchestration loop drains the
 * queue into world state at the start of each tick. When full, new
 * observations are refused (and counted) rather than blocking the observer.
 */

import type { Logger, Metrics, ObservedMessage } from '../types/index.js';
import type { ObservationSink, RateLimitInput } from '../ports/observer.js';
import { WorldStateError, describeError } from '../core/errors.js';
import { systemClock, type Clock } from '../core/timeout.js';

export type Observation =
  | { type: 'message'; channelId: string; message: ObservedMessage }
  | { type: 'rate_limit'; key: string; status: RateLimitInput };

export interface DrainResult {
  applied: number;
  duplicates: number;
  rejected: number;
  remaining: number;
}

export class ObservationQueue implements ObservationSink {
  private items: Observation[] = [];
  private dropped = 0;
  private readonly logger: Logger | undefined;

  constructor(
    private readonly capacity: number,
    logger?: Logger,
    private readonly metrics?: Metrics,
    private readonly clock: Clock = systemClock
  ) {
    this.logger = logger?.child({ component: 'observation-queue' });
  }

  recordMessage(channelId: string, message: ObservedMessage): boolean {
    return this.push({ type: 'message', channelId, message });
  }

  /**
   * Queue a quota reading, stamped with its arrival time unless the observer
   * supplied one.
   */
  updateRateLimit(key: string, status: RateLimitInput): boolean {
    return this.push({ type: 'rate_limit', key, status: { ...status, observedAt: status.observedAt ?? this.clock() } });
  }

  push(observation: Observation): boolean {
    if (this.items.length >= this.capacity) {
      this.dropped++;
      this.metrics?.counter('observations_dropped_total', { type: observation.type });
      if (this.dropped === 1 || this.dropped % 100 === 0) {
        this.logger?.warn({ capacity: this.capacity, dropped: this.dropped }, 'Observation queue full, dropping');
      }
      return false;
    }
    this.items.push(observation);
    return true;
  }

  /**
   * Apply up to `max` queued observations to `sink`, oldest first.
   * Observations the sink rejects are logged and discarded.
   */
  drainInto(sink: ObservationSink, max = Infinity): DrainResult {
    const batch = this.items.slice(0, max);
    this.items = this.items.slice(batch.length);

    const result: DrainResult = { applied: 0, duplicates: 0, rejected: 0, remaining: 0 };
    for (const item of batch) {
      try {
        const accepted =
          item.type === 'message'
            ? sink.recordMessage(item.channelId, item.message)
            : sink.updateRateLimit(item.key, item.status);
        if (accepted) result.applied++;
        else result.duplicates++;
      } catch (error) {
        result.rejected++;
        if (error instanceof WorldStateError) {
          this.logger?.warn({ error: error.message, type: item.type }, 'Observation rejected');
        } else {
          this.logger?.error({ error: describeError(error), type: item.type }, 'Failed to apply observation');
        }
      }
    }

    result.remaining = this.items.length;
    this.metrics?.gauge('observation_queue_depth', this.items.length);
    return result;
  }

  size(): number {
    return this.items.length;
  }

  getDroppedCount(): number {
    return this.dropped;
  }
}

export function createObservationQueue(
  capacity: number,
  logger?: Logger,
  metrics?: Metrics,
  clock?: Clock
): ObservationQueue {
  return new ObservationQueue(capacity, logger, metrics, clock);
}
