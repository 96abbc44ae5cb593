/**
 * Validation of proposed actions at the gateway boundary.
 *
 * Decision services are loose about field names (`action_type`, nested
 * `parameters`, `channel`, `reasoning`...), so entries are normalized onto
 * the canonical shape first and then checked against a closed zod union.
 */

import { z } from 'zod';
import type { ProposedAction } from '../types/index.js';

const nonEmpty = z.string().trim().min(1);

const base = {
  rationale: z.string().optional(),
  priority: z.number().finite().optional(),
};

export const platformSchema = z.enum(['matrix', 'farcaster']);

export const proposedActionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('wait'), ...base }),
  z.object({ kind: z.literal('send_message'), channelId: nonEmpty, content: nonEmpty, ...base }),
  z.object({
    kind: z.literal('reply'),
    channelId: nonEmpty,
    messageId: nonEmpty,
    content: nonEmpty,
    ...base,
  }),
  z.object({
    kind: z.literal('post'),
    platform: platformSchema,
    content: nonEmpty,
    channelId: nonEmpty.optional(),
    ...base,
  }),
  z.object({
    kind: z.literal('react'),
    channelId: nonEmpty,
    messageId: nonEmpty,
    reaction: nonEmpty,
    ...base,
  }),
  z.object({
    kind: z.literal('upload_media'),
    service: z.enum(['arweave', 's3']),
    url: z.string().url(),
    contentType: z.string().optional(),
    ...base,
  }),
]);

/**
 * Alternative names accepted for canonical fields.
 */
const FIELD_ALIASES: Record<string, string> = {
  action_type: 'kind',
  type: 'kind',
  action: 'kind',
  channel: 'channelId',
  channel_id: 'channelId',
  room_id: 'channelId',
  message_id: 'messageId',
  reply_to: 'messageId',
  cast_hash: 'messageId',
  text: 'content',
  message: 'content',
  reasoning: 'rationale',
  reason: 'rationale',
  emoji: 'reaction',
  media_url: 'url',
  content_type: 'contentType',
};

/**
 * Alternative names accepted for action kinds.
 */
const KIND_ALIASES: Record<string, string> = {
  send: 'send_message',
  message: 'send_message',
  send_matrix_message: 'send_message',
  send_matrix_reply: 'reply',
  send_farcaster_reply: 'reply',
  send_farcaster_post: 'post',
  like: 'react',
  like_farcaster_post: 'react',
  react_to_matrix_message: 'react',
  upload: 'upload_media',
  do_nothing: 'wait',
  noop: 'wait',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Flatten `parameters`, rename aliased fields and kinds. Canonical names win
 * over aliases when both are present.
 */
export function normalizeActionEntry(raw: unknown): unknown {
  if (!isRecord(raw)) return raw;

  const flat: Record<string, unknown> = {};
  const sources = isRecord(raw['parameters']) ? [raw['parameters'], raw] : [raw];
  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) {
      if (key === 'parameters') continue;
      flat[key] = value;
    }
  }

  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(flat)) {
    const canonical = FIELD_ALIASES[key];
    if (canonical === undefined) {
      normalized[key] = value;
    } else if (!(canonical in flat)) {
      normalized[canonical] = value;
    }
  }

  const kind = normalized['kind'];
  if (typeof kind === 'string') {
    const lowered = kind.trim().toLowerCase();
    normalized['kind'] = KIND_ALIASES[lowered] ?? lowered;
  }
  if (typeof normalized['priority'] === 'string') {
    const parsed = Number(normalized['priority']);
    if (Number.isFinite(parsed)) normalized['priority'] = parsed;
  }
  return normalized;
}

export type ActionParseResult =
  | { ok: true; action: ProposedAction }
  | { ok: false; issues: string[] };

/**
 * Normalize and validate one raw entry.
 */
export function parseProposedAction(raw: unknown): ActionParseResult {
  const result = proposedActionSchema.safeParse(normalizeActionEntry(raw));
  if (!result.success) {
    return {
      ok: false,
      issues: result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
    };
  }
  const action: ProposedAction = result.data;
  return { ok: true, action };
}
