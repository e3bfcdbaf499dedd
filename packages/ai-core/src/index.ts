/**
 * @gloss/ai-core
 *
 * Provider-agnostic LLM access for lecture review:
 * - LLM Provider abstraction (Anthropic, OpenAI, Gemini)
 * - Document content parts with prompt-cache hints
 * - Gateway error taxonomy, including billing/quota classification
 */

// ============================================================================
// Providers - LLM Provider Abstraction Layer
// ============================================================================
export * from "./providers";

// ============================================================================
// Gateway - Errors
// ============================================================================
export * from "./gateway";
