/**
 * Vercel AI SDK Provider
 *
 * LLM provider on the `ai` package's generateText(), targeting OpenRouter or
 * a local OpenAI-compatible server. The SDK's own retry is disabled; retries
 * go through the shared backoff primitive and a circuit breaker.
 */

import { createOpenRouter } from '@openrouter/ai-sdk-provider';
import { createOpenAI } from '@ai-sdk/openai';
import { APICallError, generateText } from 'ai';
import type { LanguageModel, ModelMessage } from 'ai';
import type { Logger } from '../types/index.js';
import { CircuitBreaker } from '../core/circuit-breaker.js';
import { retryWithBackoff, type RetryPolicy } from '../core/retry.js';
import type { SleepFn } from '../core/timeout.js';
import type { ChatMessage, CompletionRequest, CompletionResponse } from './provider.js';
import { BaseLLMProvider, LLMError } from './provider.js';

export interface OpenRouterProviderConfig {
  apiKey: string;
  model: string;
  /** Shown in the OpenRouter dashboard */
  appName?: string | undefined;
  siteUrl?: string | undefined;
}

export interface LocalProviderConfig {
  /** e.g. http://localhost:1234/v1 */
  baseUrl: string;
  model: string;
}

export type VercelAIProviderConfig = OpenRouterProviderConfig | LocalProviderConfig;

function isOpenRouterConfig(config: VercelAIProviderConfig): config is OpenRouterProviderConfig {
  return 'apiKey' in config;
}

const RETRY_POLICY: RetryPolicy = { maxRetries: 2, baseDelayMs: 2000, maxDelayMs: 16_000 };

export interface VercelAIProviderOptions {
  logger?: Logger | undefined;
  retry?: Partial<RetryPolicy> | undefined;
  sleep?: SleepFn | undefined;
}

export class VercelAIProvider extends BaseLLMProvider {
  readonly name: string;
  private readonly config: VercelAIProviderConfig;
  private readonly circuitBreaker: CircuitBreaker;
  private readonly retry: RetryPolicy;
  private readonly sleep: SleepFn | undefined;
  private readonly model: LanguageModel;

  constructor(config: VercelAIProviderConfig, options: VercelAIProviderOptions = {}) {
    super(options.logger);
    this.config = config;
    this.name = isOpenRouterConfig(config) ? 'openrouter' : 'local';
    this.retry = { ...RETRY_POLICY, ...options.retry };
    this.sleep = options.sleep;
    this.circuitBreaker = new CircuitBreaker({
      name: `llm-${this.name}`,
      failureThreshold: 3,
      windowMs: 300_000,
      resetTimeoutMs: 60_000,
      logger: this.logger,
    });
    this.model = this.createModel();

    this.logger?.info({ provider: this.name, model: config.model }, 'LLM provider initialized');
  }

  isAvailable(): boolean {
    if (isOpenRouterConfig(this.config)) {
      return this.config.apiKey.length > 0;
    }
    return this.config.baseUrl.length > 0 && this.config.model.length > 0;
  }

  private createModel(): LanguageModel {
    if (isOpenRouterConfig(this.config)) {
      const headers: Record<string, string> = {};
      if (this.config.appName) headers['X-Title'] = this.config.appName;
      if (this.config.siteUrl) headers['HTTP-Referer'] = this.config.siteUrl;
      return createOpenRouter({ apiKey: this.config.apiKey, headers })(this.config.model);
    }
    return createOpenAI({ baseURL: this.config.baseUrl, apiKey: 'no-key-required' }).chat(
      this.config.model
    );
  }

  protected async doComplete(request: CompletionRequest): Promise<CompletionResponse> {
    if (!this.isAvailable()) {
      throw new LLMError('Provider not configured', this.name);
    }

    return this.circuitBreaker.execute(async () => {
      const result = await retryWithBackoff(() => this.executeRequest(request), {
        ...this.retry,
        signal: request.signal,
        sleep: this.sleep,
        shouldRetry: (error) => error instanceof LLMError && error.retryable,
        onRetry: ({ attempt, delayMs, error }) => {
          this.logger?.warn(
            { attempt, delayMs, error: error instanceof Error ? error.message : String(error) },
            'Retrying after transient LLM error'
          );
        },
      });
      if (!result.ok) throw result.error;
      return result.value;
    });
  }

  private toModelMessages(messages: ChatMessage[]): ModelMessage[] {
    return messages.map((m): ModelMessage => {
      switch (m.role) {
        case 'system':
          return { role: 'system', content: m.content };
        case 'user':
          return { role: 'user', content: m.content };
        case 'assistant':
          return { role: 'assistant', content: m.content };
      }
    });
  }

  private async executeRequest(request: CompletionRequest): Promise<CompletionResponse> {
    try {
      const result = await generateText({
        model: this.model,
        messages: this.toModelMessages(request.messages),
        maxRetries: 0,
        ...(request.temperature !== undefined && { temperature: request.temperature }),
        ...(request.maxTokens !== undefined && { maxOutputTokens: request.maxTokens }),
        ...(request.signal && { abortSignal: request.signal }),
      });

      const inputTokens = result.usage.inputTokens ?? 0;
      const outputTokens = result.usage.outputTokens ?? 0;
      return {
        content: result.text,
        model: request.model ?? this.config.model,
        usage: {
          promptTokens: inputTokens,
          completionTokens: outputTokens,
          totalTokens: result.usage.totalTokens ?? inputTokens + outputTokens,
        },
        finishReason: result.finishReason,
      };
    } catch (error) {
      throw this.toLLMError(error);
    }
  }

  /**
   * Classify SDK errors: 408, 429 and 5xx are retryable, aborts are not
   * (the caller's deadline has passed).
   */
  private toLLMError(error: unknown): LLMError {
    if (error instanceof LLMError) return error;
    const message = error instanceof Error ? error.message : String(error);

    if (APICallError.isInstance(error)) {
      const { statusCode } = error;
      const retryable =
        statusCode === undefined || statusCode === 408 || statusCode === 429 || statusCode >= 500;
      return new LLMError(message, this.name, { statusCode, retryable, cause: error });
    }
    if (error instanceof Error && error.name === 'AbortError') {
      return new LLMError('Request aborted', this.name, { retryable: false, cause: error });
    }
    return new LLMError(message, this.name, { retryable: false, cause: error });
  }
}

export function createVercelAIProvider(
  config: VercelAIProviderConfig,
  options: VercelAIProviderOptions = {}
): VercelAIProvider {
  return new VercelAIProvider(config, options);
}
