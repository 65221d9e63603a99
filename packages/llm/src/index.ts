/**
 * @profilescout/llm - chat completion client, rate-limited invoker and
 * response parsing for model output
 */

export { defaultModelConfig, type ChatModelDefaults } from './models.js';

export {
  ChatCompletionClient,
  ModelInvocationError,
  ModelRateLimitError,
  completionText,
  isRateLimitMessage,
  type ChatClient,
  type ChatMessage,
  type ChatCompletionRequest,
  type ChatCompletionResponse,
} from './client.js';

export {
  RateLimitedInvoker,
  type InvokeOptions,
  type ModelInvoker,
  type RateLimitedInvokerOptions,
} from './invoker.js';

export { buildPrompt, jsonExtractionPrompt, structuredExtractionSystem } from './prompts.js';

export {
  extractJson,
  parseJsonResponse,
  parseWithRetry,
  jsonFixers,
  defaultFixers,
  type ParseResult,
} from './parse.js';
