/**
 * Prompt construction for the LLM decision backend.
 *
 * Renders the decision payload as a compact, human-readable world summary
 * plus a strict JSON response contract.
 */

import { DateTime } from 'luxon';
import type { DecisionPayload, SerializedActionRecord } from '../ports/decision.js';

export interface DecisionPrompt {
  system: string;
  user: string;
}

export interface PromptOptions {
  /** Persona / instructions prepended to the system prompt */
  persona?: string | undefined;
  /** IANA zone for absolute timestamps (default: UTC) */
  timezone?: string | undefined;
}

/**
 * "5 minutes ago", relative to the snapshot capture time.
 */
export function formatRelative(timestamp: number, now: number): string {
  return (
    DateTime.fromMillis(timestamp).toRelative({ base: DateTime.fromMillis(now) }) ??
    DateTime.fromMillis(timestamp).toISO() ??
    String(timestamp)
  );
}

function formatAbsolute(timestamp: number, zone: string): string {
  return DateTime.fromMillis(timestamp, { zone }).toFormat('yyyy-LL-dd HH:mm');
}

function describeOutcome(record: SerializedActionRecord): string {
  return record.outcome.status === 'success'
    ? `ok (${record.outcome.referenceId})`
    : `failed: ${record.outcome.errorKind}`;
}

const RESPONSE_CONTRACT = `Respond with a single JSON object and nothing else:
{
  "observations": "what stands out right now",
  "actions": [
    { "kind": "...", ...fields, "rationale": "why", "priority": 1-10 }
  ],
  "reasoning": "overall reasoning"
}

Action kinds and fields:
- wait: {}
- send_message: { channelId, content }
- reply: { channelId, messageId, content }
- post: { platform: "matrix" | "farcaster", content, channelId? }
- react: { channelId, messageId, reaction }
- upload_media: { service: "arweave" | "s3", url, contentType? }

Use only channel and message ids that appear in the world state. Do not reply
to a message you already replied to. An empty actions list means wait.`;

export function buildDecisionPrompt(payload: DecisionPayload, options: PromptOptions = {}): DecisionPrompt {
  const zone = options.timezone ?? 'utc';
  const now = payload.capturedAt;

  const system = [
    options.persona?.trim(),
    'You decide what a conversational agent present on Matrix and Farcaster should do next.',
    `Propose at most ${String(payload.knobs.maxActions)} actions per turn. Prefer fewer, better actions; waiting is often right.`,
    RESPONSE_CONTRACT,
  ]
    .filter((part): part is string => Boolean(part))
    .join('\n\n');

  const lines: string[] = [`Current time: ${formatAbsolute(now, zone)}`, ''];

  lines.push('## Channels');
  if (payload.channels.length === 0) {
    lines.push('(no activity observed yet)');
  }
  for (const channel of payload.channels) {
    const shown = channel.messages.length;
    lines.push(
      `### ${channel.platform} ${channel.id} (last activity ${formatRelative(channel.lastActivityAt, now)}, showing ${String(shown)} of ${String(channel.messageCount)})`
    );
    for (const m of channel.messages) {
      const who = m.senderDisplayName ? `${m.senderDisplayName} (@${m.sender})` : `@${m.sender}`;
      const reply = m.replyTo ? ` [reply to ${m.replyTo}]` : '';
      lines.push(`- [${m.id}] ${formatRelative(m.timestamp, now)} ${who}${reply}: ${m.content}`);
    }
  }

  lines.push('', '## Your recent actions');
  if (payload.recentActions.length === 0) {
    lines.push('(none)');
  }
  for (const action of payload.recentActions) {
    const target = [action.platform, action.channelId, action.messageId].filter(Boolean).join(' ');
    const preview = action.contentPreview ? ` "${action.contentPreview}"` : '';
    lines.push(
      `- ${formatRelative(action.timestamp, now)} ${action.kind} ${target}${preview} -> ${describeOutcome(action)}`
    );
  }

  if (payload.rateLimits.length > 0) {
    lines.push('', '## Rate limits');
    for (const limit of payload.rateLimits) {
      const cap = limit.limit !== undefined ? `/${String(limit.limit)}` : '';
      const stale = limit.stale ? ' (stale)' : '';
      lines.push(
        `- ${limit.key}: ${String(limit.remaining)}${cap} remaining, resets ${formatRelative(limit.resetAt, now)}${stale}`
      );
    }
  }

  const status = payload.systemStatus;
  lines.push('', '## System status', `health: ${status.health}`);
  if (status.lastActionFailure) {
    lines.push(
      `last action failure: ${status.lastActionFailure.kind} (${status.lastActionFailure.errorKind}) ${formatRelative(status.lastActionFailure.at, now)}`
    );
  }

  return { system, user: lines.join('\n') };
}
