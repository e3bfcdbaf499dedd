/**
 * LLM Provider Types
 *
 * Core type definitions for the provider abstraction layer.
 * Supports multiple LLM vendors (Anthropic, OpenAI, Gemini) behind one
 * completion interface, including document content for vendors that accept it.
 */

/** Message role in conversation */
export type MessageRole = "user" | "assistant";

/** Plain text content part */
export interface TextPart {
  type: "text";
  text: string;
}

/** Binary document content part (e.g. a PDF), base64 encoded */
export interface DocumentPart {
  type: "document";
  /** MIME type, e.g. application/pdf */
  mediaType: string;
  /** Base64 payload */
  data: string;
  /** Ask the vendor to cache this part as a prompt prefix, where supported */
  cache?: boolean;
}

export type ContentPart = TextPart | DocumentPart;

/** Chat message */
export interface Message {
  /** Message role */
  role: MessageRole;
  /** Message content */
  content: string | ContentPart[];
}

/** Token usage statistics */
export interface TokenUsage {
  /** Input/prompt tokens */
  inputTokens: number;
  /** Output/completion tokens */
  outputTokens: number;
  /** Total tokens */
  totalTokens: number;
}

/** Completion request to LLM */
export interface CompletionRequest {
  /** Model identifier (empty string selects the provider default) */
  model: string;
  /** System prompt */
  system?: string;
  /** Conversation messages */
  messages: Message[];
  /** Temperature */
  temperature?: number;
  /** Maximum tokens to generate */
  maxTokens?: number;
  /** Request timeout in ms */
  timeoutMs?: number;
  /** Optional abort signal for cancellation */
  signal?: AbortSignal;
}

/** Completion response from LLM */
export interface CompletionResponse {
  /** Generated content */
  content: string;
  /** Token usage */
  usage: TokenUsage;
  /** Finish reason */
  finishReason: "stop" | "length" | "content_filter" | "error";
  /** Model used */
  model: string;
  /** Response latency in ms */
  latencyMs: number;
}

/** Provider metrics */
export interface ProviderMetrics {
  /** Provider name */
  provider: string;
  /** Total requests */
  totalRequests: number;
  /** Successful requests */
  successfulRequests: number;
  /** Failed requests */
  failedRequests: number;
  /** Total input tokens */
  totalInputTokens: number;
  /** Total output tokens */
  totalOutputTokens: number;
  /** Average latency in ms */
  avgLatencyMs: number;
  /** Last request timestamp */
  lastRequestAt: number;
}

/**
 * LLM Provider Interface
 *
 * Unified interface for all LLM vendors.
 */
export interface LLMProvider {
  /** Provider name */
  readonly name: string;

  /** Known models */
  readonly models: string[];

  /** Default model */
  readonly defaultModel: string;

  /**
   * Generate a completion (non-streaming).
   */
  complete(request: CompletionRequest): Promise<CompletionResponse>;

  /**
   * Get provider metrics.
   */
  getMetrics(): ProviderMetrics;

  /**
   * Reset provider metrics.
   */
  resetMetrics(): void;
}

/** Provider configuration base */
export interface ProviderConfig {
  /** API key */
  apiKey: string;
  /** Base URL override */
  baseUrl?: string;
  /** Default timeout in ms */
  timeoutMs?: number;
  /** Maximum retries for transient failures */
  maxRetries?: number;
  /** Base delay for exponential backoff in ms */
  retryBaseDelayMs?: number;
}

/** Supported vendors */
export const PROVIDER_KINDS = ["anthropic", "openai", "gemini"] as const;

export type ProviderKind = (typeof PROVIDER_KINDS)[number];

/** Provider factory function */
export type ProviderFactory = (config: ProviderConfig) => LLMProvider;
