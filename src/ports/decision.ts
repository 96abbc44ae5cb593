/**
 * Decision service port.
 */

import type {
  ActionOutcome,
  ExecutableKind,
  JsonValue,
  Platform,
  SystemStatus,
} from '../types/index.js';

export interface SerializedMessage {
  id: string;
  sender: string;
  senderDisplayName?: string | undefined;
  content: string;
  timestamp: number;
  replyTo?: string | undefined;
  metadata?: Record<string, JsonValue> | undefined;
}

export interface SerializedChannel {
  id: string;
  platform: Platform;
  lastActivityAt: number;
  /** Total stored; `messages` holds only the most recent ones */
  messageCount: number;
  messages: SerializedMessage[];
}

export interface SerializedActionRecord {
  kind: ExecutableKind;
  platform?: Platform | undefined;
  channelId?: string | undefined;
  messageId?: string | undefined;
  contentPreview?: string | undefined;
  timestamp: number;
  outcome: ActionOutcome;
}

export interface SerializedRateLimit {
  key: string;
  remaining: number;
  limit?: number | undefined;
  resetAt: number;
  /** Older than the staleness threshold */
  stale: boolean;
}

/**
 * What the gateway sends to the decision service: a bounded view of the
 * snapshot plus the knobs the service must respect.
 */
export interface DecisionPayload {
  capturedAt: number;
  channels: SerializedChannel[];
  recentActions: SerializedActionRecord[];
  rateLimits: SerializedRateLimit[];
  systemStatus: SystemStatus;
  knobs: {
    maxActions: number;
    messageDepth: number;
    actionHistoryDepth: number;
  };
}

/**
 * The remote decision service. Returns raw output (text or already-parsed
 * JSON); the gateway validates it. Must stop work when `signal` aborts.
 */
export interface DecisionBackend {
  readonly name: string;
  decide(payload: DecisionPayload, signal: AbortSignal): Promise<unknown>;
}
