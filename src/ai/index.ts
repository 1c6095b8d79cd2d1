/**
 * AI module - text-completion backends for test generation
 */

export {
  AIService,
  createAIService,
  DEFAULT_MODELS,
  API_KEY_ENV_VARS,
  TEST_SYSTEM_PROMPT,
} from "./service.js";
export {
  resolveAIConfig,
  isAIProvider,
  DEFAULT_PROVIDER,
  DEFAULT_TEMPERATURE,
  PROVIDER_ENV_VAR,
} from "./config.js";
export type { AIOverrides } from "./config.js";
export { AI_PROVIDERS } from "./types.js";
export type {
  AIConfig,
  AIProvider,
  AIResponse,
  CompletionRequest,
  Message,
} from "./types.js";
