/**
 * Platform back-end port.
 *
 * One call per action kind. Back-ends report failures as values; anything
 * they throw is classified by the executor (timeouts and unknown errors are
 * treated as transient).
 */

import type { Platform, UploadService } from '../types/index.js';

export type BackendErrorKind = 'rate_limited' | 'transient' | 'permanent' | 'invalid_input';

/**
 * Quota information piggy-backed on a back-end response. Without `endpoint`
 * it applies to the whole platform.
 */
export interface RateLimitUpdate {
  endpoint?: string | undefined;
  remaining: number;
  limit?: number | undefined;
  resetAt: number;
}

export type BackendResult =
  | { ok: true; referenceId: string; rateLimit?: RateLimitUpdate | undefined }
  | {
      ok: false;
      error: BackendErrorKind;
      message: string;
      retryAfterMs?: number | undefined;
      rateLimit?: RateLimitUpdate | undefined;
    };

export interface SendMessageRequest {
  channelId: string;
  content: string;
}

export interface ReplyRequest {
  channelId: string;
  messageId: string;
  content: string;
}

export interface PostRequest {
  content: string;
  channelId?: string | undefined;
}

export interface ReactRequest {
  channelId: string;
  messageId: string;
  reaction: string;
}

export interface UploadRequest {
  url: string;
  contentType?: string | undefined;
}

/**
 * Messaging back-end for one platform. A missing method means the platform
 * does not support that action kind.
 */
export interface PlatformBackend {
  readonly name: string;
  sendMessage?(request: SendMessageRequest, signal: AbortSignal): Promise<BackendResult>;
  reply?(request: ReplyRequest, signal: AbortSignal): Promise<BackendResult>;
  post?(request: PostRequest, signal: AbortSignal): Promise<BackendResult>;
  react?(request: ReactRequest, signal: AbortSignal): Promise<BackendResult>;
}

export interface MediaBackend {
  readonly name: string;
  upload(request: UploadRequest, signal: AbortSignal): Promise<BackendResult>;
}

export interface BackendRegistry {
  platforms: Partial<Record<Platform, PlatformBackend>>;
  media: Partial<Record<UploadService, MediaBackend>>;
}
