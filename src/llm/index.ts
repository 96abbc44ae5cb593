export type { ChatMessage, CompletionRequest, CompletionResponse, LLMProvider } from './provider.js';
export { LLMError, BaseLLMProvider } from './provider.js';
export type {
  LocalProviderConfig,
  OpenRouterProviderConfig,
  VercelAIProviderConfig,
  VercelAIProviderOptions,
} from './vercel-ai-provider.js';
export { VercelAIProvider, createVercelAIProvider } from './vercel-ai-provider.js';
