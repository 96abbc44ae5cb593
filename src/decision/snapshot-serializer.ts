import type { WorldStateSnapshot } from '../types/index.js';
import type {
  DecisionPayload,
  SerializedActionRecord,
  SerializedChannel,
  SerializedRateLimit,
} from '../ports/decision.js';

export interface SerializationKnobs {
  maxActions: number;
  /** Most recent messages sent per channel */
  messageDepth: number;
  /** Most recent action records sent */
  actionHistoryDepth: number;
  /** Rate-limit entries older than this are flagged stale */
  staleAfterMs: number;
}

const CONTENT_PREVIEW_LENGTH = 200;

/**
 * Bounded, decision-ready view of a snapshot.
 *
 * Channels are ordered by most recent activity so the busiest conversations
 * come first; everything else keeps snapshot order.
 */
export function serializeSnapshot(
  snapshot: WorldStateSnapshot,
  knobs: SerializationKnobs
): DecisionPayload {
  const channels: SerializedChannel[] = [...snapshot.channels]
    .sort((a, b) => b.lastActivityAt - a.lastActivityAt)
    .map((channel) => ({
      id: channel.id,
      platform: channel.platform,
      lastActivityAt: channel.lastActivityAt,
      messageCount: channel.messages.length,
      messages: channel.messages.slice(-knobs.messageDepth).map((m) => ({
        id: m.id,
        sender: m.sender.username,
        senderDisplayName: m.sender.displayName,
        content: m.content,
        timestamp: m.timestamp,
        replyTo: m.replyTo,
        metadata: m.metadata,
      })),
    }));

  const recentActions: SerializedActionRecord[] = snapshot.actionHistory
    .slice(-knobs.actionHistoryDepth)
    .map((r) => ({
      kind: r.kind,
      platform: r.platform,
      channelId: r.channelId,
      messageId: r.messageId,
      contentPreview: r.content?.slice(0, CONTENT_PREVIEW_LENGTH),
      timestamp: r.timestamp,
      outcome: r.outcome,
    }));

  const rateLimits: SerializedRateLimit[] = Object.entries(snapshot.rateLimits).map(
    ([key, status]) => ({
      key,
      remaining: status.remaining,
      limit: status.limit,
      resetAt: status.resetAt,
      stale: snapshot.capturedAt - status.observedAt > knobs.staleAfterMs,
    })
  );

  return {
    capturedAt: snapshot.capturedAt,
    channels,
    recentActions,
    rateLimits,
    systemStatus: snapshot.systemStatus,
    knobs: {
      maxActions: knobs.maxActions,
      messageDepth: knobs.messageDepth,
      actionHistoryDepth: knobs.actionHistoryDepth,
    },
  };
}
