import { randomUUID } from 'node:crypto';
import type { Logger } from '../types/index.js';
import type {
  BackendResult,
  MediaBackend,
  PlatformBackend,
  PostRequest,
  ReactRequest,
  ReplyRequest,
  SendMessageRequest,
  UploadRequest,
} from '../ports/backend.js';

/**
 * Back-end that performs nothing and reports success with a synthetic
 * reference id. Wired in for every platform and media service while
 * `dryRun` is on.
 */
export class DryRunBackend implements PlatformBackend, MediaBackend {
  private readonly logger: Logger;

  constructor(
    readonly name: string,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'dry-run', backend: name });
  }

  sendMessage(request: SendMessageRequest): Promise<BackendResult> {
    return this.perform('send_message', { channelId: request.channelId, chars: request.content.length });
  }

  reply(request: ReplyRequest): Promise<BackendResult> {
    return this.perform('reply', {
      channelId: request.channelId,
      messageId: request.messageId,
      chars: request.content.length,
    });
  }

  post(request: PostRequest): Promise<BackendResult> {
    return this.perform('post', { channelId: request.channelId, chars: request.content.length });
  }

  react(request: ReactRequest): Promise<BackendResult> {
    return this.perform('react', {
      channelId: request.channelId,
      messageId: request.messageId,
      reaction: request.reaction,
    });
  }

  upload(request: UploadRequest): Promise<BackendResult> {
    return this.perform('upload_media', { url: request.url });
  }

  private perform(kind: string, details: Record<string, unknown>): Promise<BackendResult> {
    const referenceId = `dry-run:${this.name}:${randomUUID()}`;
    this.logger.info({ kind, ...details, referenceId }, 'Dry run, action not performed');
    return Promise.resolve({ ok: true, referenceId });
  }
}

export function createDryRunBackend(name: string, logger: Logger): DryRunBackend {
  return new DryRunBackend(name, logger);
}
