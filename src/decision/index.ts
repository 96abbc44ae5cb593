export type { DecisionGatewayConfig, DecisionGatewayDeps, GatewayDecision } from './decision-gateway.js';
export { DecisionGateway, DEFAULT_GATEWAY_CONFIG, createDecisionGateway } from './decision-gateway.js';
export { parseProposedAction, proposedActionSchema } from './action-schema.js';
export { extractJson, parseDecisionEnvelope } from './response-parser.js';
export { serializeSnapshot } from './snapshot-serializer.js';
export { buildDecisionPrompt, formatRelative, type PromptOptions } from './prompt-builder.js';
export {
  LlmDecisionBackend,
  createLlmDecisionBackend,
  type LlmDecisionBackendConfig,
} from './llm-decision-backend.js';
