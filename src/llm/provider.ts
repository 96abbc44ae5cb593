/**
 * LLM Provider interface.
 *
 * Abstracts the model backend (OpenRouter, a local OpenAI-compatible server)
 * behind one `complete()` call used by the LLM decision backend.
 */

import type { Logger } from '../types/index.js';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionRequest {
  messages: ChatMessage[];
  /** Explicit model id; providers fall back to their configured default */
  model?: string | undefined;
  maxTokens?: number | undefined;
  temperature?: number | undefined;
  /** Aborts the request (gateway timeout) */
  signal?: AbortSignal | undefined;
}

export interface CompletionResponse {
  content: string;
  model: string;
  usage?:
    | {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
      }
    | undefined;
  finishReason?: string | undefined;
}

export interface LLMProvider {
  readonly name: string;
  isAvailable(): boolean;
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

/**
 * Error from an LLM provider. `retryable` marks rate limits, 5xx and timeouts.
 */
export class LLMError extends Error {
  readonly provider: string;
  readonly statusCode?: number | undefined;
  readonly retryable: boolean;

  constructor(
    message: string,
    provider: string,
    options?: { statusCode?: number | undefined; retryable?: boolean; cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'LLMError';
    this.provider = provider;
    this.statusCode = options?.statusCode;
    this.retryable = options?.retryable ?? false;
  }
}

/**
 * Base provider: request numbering and request/response logging around
 * `doComplete()`.
 */
export abstract class BaseLLMProvider implements LLMProvider {
  abstract readonly name: string;
  protected readonly logger: Logger | undefined;
  private requestCounter = 0;

  constructor(logger?: Logger) {
    this.logger = logger?.child({ component: 'llm' });
  }

  abstract isAvailable(): boolean;

  protected abstract doComplete(request: CompletionRequest): Promise<CompletionResponse>;

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const requestId = `req_${String(++this.requestCounter)}`;
    const startTime = Date.now();

    this.logger?.debug(
      {
        requestId,
        provider: this.name,
        model: request.model,
        messageCount: request.messages.length,
        promptChars: request.messages.reduce((n, m) => n + m.content.length, 0),
      },
      'LLM request started'
    );

    try {
      const response = await this.doComplete(request);
      this.logger?.debug(
        {
          requestId,
          model: response.model,
          durationMs: Date.now() - startTime,
          usage: response.usage,
          finishReason: response.finishReason,
        },
        'LLM request completed'
      );
      return response;
    } catch (error) {
      this.logger?.error(
        {
          requestId,
          durationMs: Date.now() - startTime,
          error: error instanceof Error ? error.message : String(error),
          retryable: error instanceof LLMError ? error.retryable : undefined,
        },
        'LLM request failed'
      );
      throw error;
    }
  }
}
