/**
 * Provider selection: a pure mapping from the configured vendor to an implementation.
 */

import { AnthropicProvider } from "./anthropicProvider";
import { GeminiProvider } from "./geminiProvider";
import { OpenAIProvider } from "./openaiProvider";
import type { LLMProvider, ProviderConfig, ProviderFactory, ProviderKind } from "./types";

const FACTORIES: Record<ProviderKind, ProviderFactory> = {
  anthropic: (config) => new AnthropicProvider(config),
  openai: (config) => new OpenAIProvider(config),
  gemini: (config) => new GeminiProvider(config),
};

export function createProvider(kind: ProviderKind, config: ProviderConfig): LLMProvider {
  return FACTORIES[kind](config);
}
