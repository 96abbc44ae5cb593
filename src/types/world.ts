/**
 * World state data model.
 *
 * Everything here is plain, JSON-serializable data: snapshots are hashed and
 * handed to the decision service as-is.
 */

import type { ActionErrorKind, ExecutableKind } from './action.js';

export type Platform = 'matrix' | 'farcaster';

export const PLATFORMS: readonly Platform[] = ['matrix', 'farcaster'];

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/**
 * Who sent a message.
 */
export interface SenderIdentity {
  /** Addressable handle (Matrix user id, Farcaster username) */
  username: string;
  displayName?: string | undefined;
  /** Platform-specific profile data (follower counts, fid, power badge...) */
  platformInfo?: Record<string, JsonValue> | undefined;
}

/**
 * A message as an observer reports it. The channel is given separately.
 */
export interface ObservedMessage {
  /** Platform-unique message id (Matrix event id, Farcaster cast hash) */
  id: string;
  platform: Platform;
  sender: SenderIdentity;
  content: string;
  /** When the platform says it was sent (epoch ms) */
  timestamp: number;
  /** Id of the message this one replies to */
  replyTo?: string | undefined;
  metadata?: Record<string, JsonValue> | undefined;
}

/**
 * A message stored in a channel. Never mutated after insertion.
 */
export interface Message extends ObservedMessage {
  channelId: string;
}

export interface Channel {
  id: string;
  platform: Platform;
  /** Arrival order, oldest first, bounded by the retention cap */
  messages: Message[];
  /** Latest message timestamp seen (epoch ms) */
  lastActivityAt: number;
}

export type ActionOutcome =
  | { status: 'success'; referenceId: string }
  | { status: 'failed'; errorKind: ActionErrorKind; message: string };

/**
 * Outcome of one attempted action. Append-only.
 */
export interface ActionRecord {
  id: string;
  cycleId: string;
  kind: ExecutableKind;
  platform?: Platform | undefined;
  channelId?: string | undefined;
  messageId?: string | undefined;
  /** Preview of the text sent (messages, replies, posts), reaction, or uploaded URL */
  content?: string | undefined;
  /** SHA-256 of the full recorded text; compared by the duplicate guard */
  contentHash?: string | undefined;
  rationale?: string | undefined;
  /** When the attempt finished (epoch ms) */
  timestamp: number;
  /** Back-end calls made, including retries; 0 when rejected before the call */
  attempts: number;
  outcome: ActionOutcome;
}

/**
 * Remaining quota for a `<platform>` or `<platform>:<endpoint>` key.
 */
export interface RateLimitStatus {
  remaining: number;
  limit?: number | undefined;
  /** When the quota window resets (epoch ms) */
  resetAt: number;
  /** When this status was last observed (epoch ms); staleness only */
  observedAt: number;
}

export type HealthLevel = 'healthy' | 'degraded' | 'impaired';

export type GatewayFailureReason = 'timeout' | 'transport' | 'malformed';

export type CycleOutcomeKind =
  | 'skipped_busy'
  | 'skipped_min_interval'
  | 'deferred_rate_limit'
  | 'skipped_no_change'
  | 'aborted_gateway_error'
  | 'triggered_zero_actions'
  | 'triggered_actions';

export interface SystemStatus {
  health: HealthLevel;
  consecutiveGatewayFailures: number;
  lastGatewayFailure?: { at: number; reason: GatewayFailureReason; message: string } | undefined;
  lastActionFailure?:
    | { at: number; kind: ExecutableKind; errorKind: ActionErrorKind; message: string }
    | undefined;
  lastCycle?: { cycleId: string; outcome: CycleOutcomeKind; at: number } | undefined;
  cycleBudget: { used: number; limit: number; inCooldown: boolean };
}

/**
 * Immutable, deep copy of the world at one instant.
 */
export interface WorldStateSnapshot {
  readonly capturedAt: number;
  /** Ordered by channel id */
  readonly channels: readonly Channel[];
  readonly actionHistory: readonly ActionRecord[];
  /** Keys in sorted order */
  readonly rateLimits: Readonly<Record<string, RateLimitStatus>>;
  readonly systemStatus: SystemStatus;
}
