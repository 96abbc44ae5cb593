import type { Logger } from '../types/index.js';
import type { DecisionBackend, DecisionPayload } from '../ports/decision.js';
import type { LLMProvider } from '../llm/provider.js';
import { logDecision } from '../core/logger.js';
import { buildDecisionPrompt, type PromptOptions } from './prompt-builder.js';

export interface LlmDecisionBackendConfig extends PromptOptions {
  model?: string | undefined;
  temperature?: number | undefined;
  maxTokens?: number | undefined;
}

/**
 * Decision backend that asks an LLM. Returns the raw completion text; the
 * gateway owns parsing and validation.
 */
export class LlmDecisionBackend implements DecisionBackend {
  readonly name: string;
  private readonly logger: Logger;

  constructor(
    private readonly provider: LLMProvider,
    logger: Logger,
    private readonly config: LlmDecisionBackendConfig = {}
  ) {
    this.name = `llm:${provider.name}`;
    this.logger = logger.child({ component: 'llm-decision-backend' });
  }

  async decide(payload: DecisionPayload, signal: AbortSignal): Promise<unknown> {
    const prompt = buildDecisionPrompt(payload, this.config);
    logDecision({}, `→ SYSTEM\n${prompt.system}\n\n→ WORLD\n${prompt.user}`);

    const response = await this.provider.complete({
      messages: [
        { role: 'system', content: prompt.system },
        { role: 'user', content: prompt.user },
      ],
      model: this.config.model,
      temperature: this.config.temperature ?? 0.4,
      maxTokens: this.config.maxTokens ?? 1500,
      signal,
    });

    logDecision({}, `← RESPONSE (${response.model})\n${response.content}`);
    this.logger.debug(
      { model: response.model, chars: response.content.length, usage: response.usage },
      'Decision completion received'
    );
    return response.content;
  }
}

export function createLlmDecisionBackend(
  provider: LLMProvider,
  logger: Logger,
  config: LlmDecisionBackendConfig = {}
): LlmDecisionBackend {
  return new LlmDecisionBackend(provider, logger, config);
}
