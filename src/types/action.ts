/**
 * Proposed actions returned by the decision gateway.
 *
 * A closed tagged union: anything the gateway cannot map onto one of these
 * variants is dropped at the boundary and never reaches the executor.
 */

import type { Platform } from './world.js';

/**
 * Media services reachable through `upload_media`.
 */
export type UploadService = 'arweave' | 's3';

/**
 * Fields every variant may carry.
 */
interface ActionBase {
  /** Free-form explanation from the decision service, logged and recorded */
  rationale?: string | undefined;
  /** Higher runs first when the gateway has to truncate */
  priority?: number | undefined;
}

export interface WaitAction extends ActionBase {
  kind: 'wait';
}

export interface SendMessageAction extends ActionBase {
  kind: 'send_message';
  channelId: string;
  content: string;
}

export interface ReplyAction extends ActionBase {
  kind: 'reply';
  channelId: string;
  messageId: string;
  content: string;
}

export interface PostAction extends ActionBase {
  kind: 'post';
  platform: Platform;
  content: string;
  /** Farcaster channel to post into; omitted means the home feed */
  channelId?: string | undefined;
}

export interface ReactAction extends ActionBase {
  kind: 'react';
  channelId: string;
  messageId: string;
  reaction: string;
}

export interface UploadMediaAction extends ActionBase {
  kind: 'upload_media';
  service: UploadService;
  url: string;
  contentType?: string | undefined;
}

export type ProposedAction =
  | WaitAction
  | SendMessageAction
  | ReplyAction
  | PostAction
  | ReactAction
  | UploadMediaAction;

export type ActionKind = ProposedAction['kind'];

/**
 * Actions that reach a back-end and produce an ActionRecord.
 */
export type ExecutableAction = Exclude<ProposedAction, WaitAction>;

export type ExecutableKind = ExecutableAction['kind'];

/**
 * Why an action attempt failed.
 *
 * The first four come straight from back-ends; the rest are raised by the
 * executor before a back-end is called.
 */
export type ActionErrorKind =
  | 'rate_limited'
  | 'transient'
  | 'permanent'
  | 'invalid_input'
  | 'validation'
  | 'duplicate'
  | 'circuit_open';
