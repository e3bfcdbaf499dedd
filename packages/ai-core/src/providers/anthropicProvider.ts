/**
 * Anthropic Provider
 *
 * LLM provider implementation for the Anthropic Messages API (Claude models).
 * Accepts PDF documents natively and marks cacheable parts with
 * `cache_control` so repeated calls over one lecture reuse the prompt prefix.
 */

import { BaseLLMProvider } from "./baseProvider";
import type {
  CompletionRequest,
  CompletionResponse,
  ContentPart,
  Message,
  ProviderConfig,
  TokenUsage,
} from "./types";

export interface AnthropicConfig extends ProviderConfig {
  /** Anthropic API version header */
  apiVersion?: string;
}

interface AnthropicDocumentBlock {
  type: "document";
  source: { type: "base64"; media_type: string; data: string };
  cache_control?: { type: "ephemeral" };
}

type AnthropicContentBlock = { type: "text"; text: string } | AnthropicDocumentBlock;

interface AnthropicMessage {
  role: "user" | "assistant";
  content: string | AnthropicContentBlock[];
}

interface AnthropicCompletionResponse {
  id: string;
  type: "message";
  role: "assistant";
  model: string;
  content: Array<{ type: "text"; text: string } | { type: string }>;
  stop_reason: "end_turn" | "max_tokens" | "stop_sequence" | "tool_use" | "refusal" | null;
  usage: {
    input_tokens: number;
    output_tokens: number;
    cache_creation_input_tokens?: number;
    cache_read_input_tokens?: number;
  };
}

const ANTHROPIC_MODELS = [
  "claude-sonnet-4-20250514",
  "claude-opus-4-20250514",
  "claude-3-7-sonnet-20250219",
  "claude-3-5-haiku-20241022",
] as const;

const DEFAULT_API_VERSION = "2023-06-01";
const DEFAULT_MAX_TOKENS = 4096;

export class AnthropicProvider extends BaseLLMProvider {
  readonly name = "anthropic";
  readonly models: string[] = [...ANTHROPIC_MODELS];
  readonly defaultModel = "claude-sonnet-4-20250514";

  private readonly baseUrl: string;
  private readonly apiVersion: string;

  constructor(config: AnthropicConfig) {
    super(config);
    this.baseUrl = config.baseUrl || "https://api.anthropic.com/v1";
    this.apiVersion = config.apiVersion || DEFAULT_API_VERSION;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const start = performance.now();

    try {
      const model = this.resolveModel(request.model);
      const body: Record<string, unknown> = {
        model,
        messages: this.formatMessages(request.messages),
        max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
      };

      if (request.system) {
        body.system = request.system;
      }
      if (request.temperature !== undefined) {
        body.temperature = request.temperature;
      }

      const response = (await this.requestJson(
        `${this.baseUrl}/messages`,
        body,
        this.getHeaders(),
        request
      )) as AnthropicCompletionResponse;

      const latencyMs = performance.now() - start;
      const usage = this.parseUsage(response.usage);
      this.trackSuccess(usage.inputTokens, usage.outputTokens, latencyMs);

      const textContent = response.content
        .filter((c): c is { type: "text"; text: string } => c.type === "text")
        .map((c) => c.text)
        .join("");

      return {
        content: textContent,
        usage,
        finishReason: this.mapFinishReason(response.stop_reason),
        model: response.model,
        latencyMs,
      };
    } catch (error) {
      this.trackFailure();
      throw error;
    }
  }

  protected getHeaders(): Record<string, string> {
    return {
      "Content-Type": "application/json",
      "x-api-key": this.config.apiKey,
      "anthropic-version": this.apiVersion,
    };
  }

  protected formatMessages(messages: Message[]): AnthropicMessage[] {
    const formatted: AnthropicMessage[] = messages.map((msg) => ({
      role: msg.role,
      content: typeof msg.content === "string" ? msg.content : msg.content.map(toAnthropicBlock),
    }));

    // Messages must start with a user turn
    if (formatted.length > 0 && formatted[0].role !== "user") {
      formatted.unshift({ role: "user", content: "Hello" });
    }

    return formatted;
  }

  protected parseUsage(usage: AnthropicCompletionResponse["usage"]): TokenUsage {
    const inputTokens =
      usage.input_tokens +
      (usage.cache_creation_input_tokens ?? 0) +
      (usage.cache_read_input_tokens ?? 0);
    return {
      inputTokens,
      outputTokens: usage.output_tokens,
      totalTokens: inputTokens + usage.output_tokens,
    };
  }

  protected mapFinishReason(reason: string | null): CompletionResponse["finishReason"] {
    switch (reason) {
      case "max_tokens":
        return "length";
      case "refusal":
        return "content_filter";
      default:
        return "stop";
    }
  }
}

function toAnthropicBlock(part: ContentPart): AnthropicContentBlock {
  if (part.type === "text") {
    return { type: "text", text: part.text };
  }
  const block: AnthropicDocumentBlock = {
    type: "document",
    source: { type: "base64", media_type: part.mediaType, data: part.data },
  };
  if (part.cache) {
    block.cache_control = { type: "ephemeral" };
  }
  return block;
}
