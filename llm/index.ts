export type { LLMAdapter, LLMResponse, PromptRequest, PromptMessage } from '../core/contracts/llm';
export { LLMRequestError } from '../core/contracts/llm';
export { MockLLMAdapter } from './mock-adapter';
export { OpenAIAdapter } from './adapters/openai-adapter';
export { AnthropicAdapter } from './adapters/anthropic-adapter';
export {
  ModelGateway,
  classifyError,
  isTransientStatus,
  type CompletionGateway,
  type CompleteOptions,
  type ModelGatewayOptions
} from './model-gateway';
