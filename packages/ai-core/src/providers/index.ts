/**
 * AI Providers Module
 *
 * Unified LLM provider abstraction layer supporting Anthropic, OpenAI and
 * Google Gemini, with retries, timeouts and metrics.
 */

export { type AnthropicConfig, AnthropicProvider } from "./anthropicProvider";
export { BaseLLMProvider } from "./baseProvider";
export { type GeminiConfig, GeminiProvider } from "./geminiProvider";
export { maxTokensParam, type OpenAIConfig, OpenAIProvider } from "./openaiProvider";
export { createProvider } from "./providerFactory";

export {
  type CompletionRequest,
  type CompletionResponse,
  type ContentPart,
  type DocumentPart,
  type LLMProvider,
  type Message,
  type MessageRole,
  PROVIDER_KINDS,
  type ProviderConfig,
  type ProviderFactory,
  type ProviderKind,
  type ProviderMetrics,
  type TextPart,
  type TokenUsage,
} from "./types";
