/**
 * Pre-flight checks for proposed actions, run against the live world state
 * immediately before execution. Failures are never sent to a back-end.
 */

import { createHash } from 'node:crypto';
import type {
  ActionRecord,
  ExecutableAction,
  Platform,
} from '../types/index.js';
import type { WorldState } from '../world/world-state.js';
import { ActionError, ValidationError } from '../core/errors.js';

/**
 * Maximum characters per message or post, by platform.
 */
export type ContentLimits = Record<Platform, number>;

export const DEFAULT_CONTENT_LIMITS: ContentLimits = {
  matrix: 4000,
  farcaster: 320,
};

function requireText(value: string, field: string): void {
  if (value.trim() === '') {
    throw new ValidationError(`${field} must not be empty`, field);
  }
}

function requireWithinLimit(content: string, platform: Platform, limits: ContentLimits): void {
  const limit = limits[platform];
  if (content.length > limit) {
    throw new ValidationError(
      `content is ${String(content.length)} chars, ${platform} allows ${String(limit)}`,
      'content'
    );
  }
}

function requireChannel(world: WorldState, channelId: string): Platform {
  const channel = world.getChannel(channelId);
  if (!channel) {
    throw new ValidationError(`unknown channel ${channelId}`, 'channelId');
  }
  return channel.platform;
}

function requireMessage(world: WorldState, channelId: string, messageId: string): void {
  if (!world.hasMessage(channelId, messageId)) {
    throw new ValidationError(`message ${messageId} not found in ${channelId}`, 'messageId');
  }
}

/**
 * Validate `action` and resolve the platform it will run on.
 *
 * @returns the target platform (undefined for media uploads)
 * @throws ValidationError
 */
export function validateAction(
  action: ExecutableAction,
  world: WorldState,
  limits: ContentLimits = DEFAULT_CONTENT_LIMITS
): Platform | undefined {
  switch (action.kind) {
    case 'send_message': {
      requireText(action.content, 'content');
      const platform = requireChannel(world, action.channelId);
      requireWithinLimit(action.content, platform, limits);
      return platform;
    }
    case 'reply': {
      requireText(action.content, 'content');
      const platform = requireChannel(world, action.channelId);
      requireMessage(world, action.channelId, action.messageId);
      requireWithinLimit(action.content, platform, limits);
      return platform;
    }
    case 'post': {
      requireText(action.content, 'content');
      requireWithinLimit(action.content, action.platform, limits);
      if (action.channelId !== undefined) {
        const channel = world.getChannel(action.channelId);
        if (channel && channel.platform !== action.platform) {
          throw new ValidationError(
            `channel ${action.channelId} is on ${channel.platform}, not ${action.platform}`,
            'channelId'
          );
        }
      }
      return action.platform;
    }
    case 'react': {
      requireText(action.reaction, 'reaction');
      const platform = requireChannel(world, action.channelId);
      requireMessage(world, action.channelId, action.messageId);
      return platform;
    }
    case 'upload_media': {
      let url: URL;
      try {
        url = new URL(action.url);
      } catch {
        throw new ValidationError(`invalid url ${action.url}`, 'url');
      }
      if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        throw new ValidationError(`unsupported url scheme ${url.protocol}`, 'url');
      }
      return undefined;
    }
  }
}

function succeeded(record: ActionRecord): boolean {
  return record.outcome.status === 'success';
}

/**
 * The text an action record stands for: message or post text (posts
 * trimmed), the reaction, or the uploaded URL.
 */
export function recordedText(action: ExecutableAction): string {
  switch (action.kind) {
    case 'react':
      return action.reaction;
    case 'upload_media':
      return action.url;
    case 'post':
      return action.content.trim();
    default:
      return action.content;
  }
}

export function contentDigest(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

/**
 * Records restored from older state carry no hash; their preview is compared.
 */
function sameContent(record: ActionRecord, text: string): boolean {
  return record.contentHash !== undefined ? record.contentHash === contentDigest(text) : record.content === text;
}

/**
 * Refuse actions that repeat an earlier successful one: a second reply to
 * the same message, the same reaction twice, or identical text sent to the
 * same place.
 *
 * @throws ActionError with kind `duplicate`
 */
export function assertNotDuplicate(
  action: ExecutableAction,
  platform: Platform | undefined,
  history: readonly ActionRecord[]
): void {
  const previous = history.find((record) => {
    if (!succeeded(record) || record.kind !== action.kind) return false;
    switch (action.kind) {
      case 'reply':
        return record.channelId === action.channelId && record.messageId === action.messageId;
      case 'react':
        return (
          record.channelId === action.channelId &&
          record.messageId === action.messageId &&
          sameContent(record, action.reaction)
        );
      case 'send_message':
        return record.channelId === action.channelId && sameContent(record, action.content);
      case 'post':
        return record.platform === platform && sameContent(record, action.content.trim());
      case 'upload_media':
        return sameContent(record, action.url);
    }
  });

  if (previous) {
    throw new ActionError(
      'duplicate',
      `already performed ${action.kind} (record ${previous.id})`
    );
  }
}
