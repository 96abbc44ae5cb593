/**
 * Deterministic snapshot fingerprints.
 *
 * Only semantic content is hashed. Capture time, rate-limit observation
 * times, channel activity times, action-record timestamps and system status
 * are left out, so the passage of time alone never looks like a change.
 */

import { createHash } from 'node:crypto';
import type { WorldStateSnapshot } from '../types/index.js';

/**
 * JSON with object keys sorted at every level; `undefined` members dropped.
 */
export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }
  if (Array.isArray(value)) {
    return `[${value.map((item: unknown) => (item === undefined ? 'null' : stableStringify(item))).join(',')}]`;
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(',')}}`;
}

/**
 * Canonical text form of a snapshot: channels by id with messages in
 * insertion order, action history in recorded order, rate limits by key.
 */
export function canonicalize(snapshot: WorldStateSnapshot): string {
  const channels = [...snapshot.channels]
    .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
    .map((channel) => ({
      id: channel.id,
      platform: channel.platform,
      messages: channel.messages,
    }));

  const actionHistory = snapshot.actionHistory.map(({ timestamp: _timestamp, ...record }) => record);

  const rateLimits = Object.keys(snapshot.rateLimits)
    .sort()
    .map((key) => {
      const status = snapshot.rateLimits[key];
      return status
        ? { key, remaining: status.remaining, limit: status.limit, resetAt: status.resetAt }
        : { key };
    });

  return stableStringify({ channels, actionHistory, rateLimits });
}

/**
 * SHA-256 (hex) of the canonical form.
 */
export function fingerprint(snapshot: WorldStateSnapshot): string {
  return createHash('sha256').update(canonicalize(snapshot)).digest('hex');
}
