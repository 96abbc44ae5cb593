/**
 * WorldState - the single owned, mutable model of what is happening across
 * platforms.
 *
 * Every mutator and `snapshot()` is synchronous and performs no I/O. On the
 * Node event loop a synchronous method runs to completion before any other
 * callback, so each call is its own critical section: observers, the
 * executor and the loop can never interleave inside an update or observe a
 * half-written snapshot.
 */

import type {
  ActionRecord,
  Channel,
  Logger,
  ObservedMessage,
  RateLimitStatus,
  SystemStatus,
  WorldStateSnapshot,
} from '../types/index.js';
import type { ObservationSink, RateLimitInput } from '../ports/observer.js';
import { WorldStateError } from '../core/errors.js';
import { systemClock, type Clock } from '../core/timeout.js';

export interface RetentionConfig {
  /** Messages kept per channel (oldest evicted first) */
  messagesPerChannel: number;
  /** Action records kept (oldest evicted first) */
  actionHistory: number;
  /** Message ids remembered per channel for dedupe, including evicted messages */
  seenIdsPerChannel: number;
}

export const DEFAULT_RETENTION: RetentionConfig = {
  messagesPerChannel: 50,
  actionHistory: 100,
  seenIdsPerChannel: 1000,
};

export interface WorldStateDeps {
  clock?: Clock | undefined;
  logger?: Logger | undefined;
}

export function createInitialSystemStatus(cycleLimit = 0): SystemStatus {
  return {
    health: 'healthy',
    consecutiveGatewayFailures: 0,
    cycleBudget: { used: 0, limit: cycleLimit, inCooldown: false },
  };
}

/**
 * Recursively freeze a freshly built value.
 */
function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

export class WorldState implements ObservationSink {
  private readonly channels = new Map<string, Channel>();
  /** Message ids currently retained, per channel */
  private readonly messageIds = new Map<string, Set<string>>();
  /** Message ids ever accepted, per channel, in insertion order (FIFO-bounded) */
  private readonly seenIds = new Map<string, Set<string>>();
  private actionHistory: ActionRecord[] = [];
  private readonly rateLimits = new Map<string, RateLimitStatus>();
  private systemStatus: SystemStatus = createInitialSystemStatus();
  private readonly retention: RetentionConfig;
  private readonly clock: Clock;
  private readonly logger: Logger | undefined;

  private messagesRecorded = 0;
  private duplicatesIgnored = 0;
  private messagesEvicted = 0;
  private actionsEvicted = 0;

  constructor(retention: Partial<RetentionConfig> = {}, deps: WorldStateDeps = {}) {
    this.retention = { ...DEFAULT_RETENTION, ...retention };
    this.retention.seenIdsPerChannel = Math.max(this.retention.seenIdsPerChannel, this.retention.messagesPerChannel);
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger?.child({ component: 'world-state' });
  }

  /**
   * Append a message to its channel, creating the channel on first sight.
   *
   * @returns false when a message with the same id was already accepted,
   * including one since evicted
   * @throws WorldStateError on an empty channel id or a platform mismatch
   */
  recordMessage(channelId: string, message: ObservedMessage): boolean {
    if (channelId.trim() === '') {
      throw new WorldStateError('Channel id must not be empty');
    }

    let channel = this.channels.get(channelId);
    let ids = this.messageIds.get(channelId);
    let seen = this.seenIds.get(channelId);
    if (!channel || !ids || !seen) {
      channel = { id: channelId, platform: message.platform, messages: [], lastActivityAt: 0 };
      ids = new Set();
      seen = new Set();
      this.channels.set(channelId, channel);
      this.messageIds.set(channelId, ids);
      this.seenIds.set(channelId, seen);
      this.logger?.debug({ channelId, platform: message.platform }, 'Channel created');
    } else if (channel.platform !== message.platform) {
      throw new WorldStateError(
        `Channel ${channelId} belongs to ${channel.platform}, got a ${message.platform} message`
      );
    }

    if (seen.has(message.id)) {
      this.duplicatesIgnored++;
      return false;
    }

    channel.messages.push({ ...message, channelId });
    ids.add(message.id);
    seen.add(message.id);
    while (seen.size > this.retention.seenIdsPerChannel) {
      const oldest = seen.values().next();
      if (oldest.done) break;
      seen.delete(oldest.value);
    }
    channel.lastActivityAt = Math.max(channel.lastActivityAt, message.timestamp);
    this.messagesRecorded++;

    while (channel.messages.length > this.retention.messagesPerChannel) {
      const evicted = channel.messages.shift();
      if (evicted) ids.delete(evicted.id);
      this.messagesEvicted++;
    }
    return true;
  }

  /**
   * Append an action outcome, evicting the oldest records beyond the cap.
   */
  recordActionResult(record: ActionRecord): void {
    this.actionHistory.push(record);
    const overflow = this.actionHistory.length - this.retention.actionHistory;
    if (overflow > 0) {
      this.actionHistory = this.actionHistory.slice(overflow);
      this.actionsEvicted += overflow;
    }
  }

  /**
   * Overwrite the quota entry for a `<platform>` or `<platform>:<endpoint>` key.
   */
  updateRateLimit(key: string, status: RateLimitInput): boolean {
    this.rateLimits.set(key, {
      remaining: status.remaining,
      limit: status.limit,
      resetAt: status.resetAt,
      observedAt: status.observedAt ?? this.clock(),
    });
    return true;
  }

  updateSystemStatus(patch: Partial<SystemStatus>): void {
    this.systemStatus = { ...this.systemStatus, ...patch };
  }

  /**
   * Deep, frozen copy of the current state. Later mutations do not show through.
   */
  snapshot(): WorldStateSnapshot {
    const channels = [...this.channels.values()]
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .map((c) => structuredClone(c));

    const rateLimits: Record<string, RateLimitStatus> = {};
    for (const key of [...this.rateLimits.keys()].sort()) {
      const status = this.rateLimits.get(key);
      if (status) rateLimits[key] = { ...status };
    }

    return deepFreeze({
      capturedAt: this.clock(),
      channels,
      actionHistory: structuredClone(this.actionHistory),
      rateLimits,
      systemStatus: structuredClone(this.systemStatus),
    });
  }

  /**
   * Copy of one channel, or undefined if it has never been observed.
   */
  getChannel(channelId: string): Channel | undefined {
    const channel = this.channels.get(channelId);
    return channel ? structuredClone(channel) : undefined;
  }

  hasMessage(channelId: string, messageId: string): boolean {
    return this.messageIds.get(channelId)?.has(messageId) ?? false;
  }

  getRateLimit(key: string): RateLimitStatus | undefined {
    const status = this.rateLimits.get(key);
    return status ? { ...status } : undefined;
  }

  getActionHistory(): readonly ActionRecord[] {
    return [...this.actionHistory];
  }

  getSystemStatus(): SystemStatus {
    return structuredClone(this.systemStatus);
  }

  /**
   * Reload persisted action history and rate limits. Applied before observers start.
   */
  restore(data: { actionHistory: readonly ActionRecord[]; rateLimits: Record<string, RateLimitStatus> }): void {
    this.actionHistory = data.actionHistory.slice(-this.retention.actionHistory).map((r) => ({ ...r }));
    this.rateLimits.clear();
    for (const [key, status] of Object.entries(data.rateLimits)) {
      this.rateLimits.set(key, { ...status });
    }
    this.logger?.info(
      { actionHistory: this.actionHistory.length, rateLimits: this.rateLimits.size },
      'World state restored'
    );
  }

  getStats(): {
    channels: number;
    messages: number;
    actionHistory: number;
    rateLimits: number;
    messagesRecorded: number;
    duplicatesIgnored: number;
    messagesEvicted: number;
    actionsEvicted: number;
  } {
    let messages = 0;
    for (const channel of this.channels.values()) {
      messages += channel.messages.length;
    }
    return {
      channels: this.channels.size,
      messages,
      actionHistory: this.actionHistory.length,
      rateLimits: this.rateLimits.size,
      messagesRecorded: this.messagesRecorded,
      duplicatesIgnored: this.duplicatesIgnored,
      messagesEvicted: this.messagesEvicted,
      actionsEvicted: this.actionsEvicted,
    };
  }
}

export function createWorldState(
  retention: Partial<RetentionConfig> = {},
  deps: WorldStateDeps = {}
): WorldState {
  return new WorldState(retention, deps);
}
