/**
 * OpenAI Provider
 *
 * LLM provider implementation for the OpenAI Chat Completions API.
 * Text only: callers must turn documents into text before sending.
 */

import { GatewayError } from "../gateway/errors";
import { BaseLLMProvider } from "./baseProvider";
import type {
  CompletionRequest,
  CompletionResponse,
  Message,
  ProviderConfig,
  TokenUsage,
} from "./types";

export interface OpenAIConfig extends ProviderConfig {
  organizationId?: string;
}

interface OpenAICompletionResponse {
  id: string;
  model: string;
  choices: Array<{
    index: number;
    message: {
      role: string;
      content: string | null;
    };
    finish_reason: string;
  }>;
  usage?: { prompt_tokens: number; completion_tokens?: number; total_tokens: number };
}

const OPENAI_MODELS = ["gpt-4o", "gpt-4o-mini", "gpt-4.1", "gpt-4.1-mini", "o3", "o3-mini"];

/** Reasoning models take max_completion_tokens instead of max_tokens */
const COMPLETION_TOKENS_MODELS = ["o1", "o1-mini", "o1-preview", "o3", "o3-mini", "o3-pro"];

export function maxTokensParam(model: string, value: number): Record<string, number> {
  const usesCompletionTokens = COMPLETION_TOKENS_MODELS.some(
    (prefix) => model === prefix || model.startsWith(`${prefix}-`)
  );
  return usesCompletionTokens ? { max_completion_tokens: value } : { max_tokens: value };
}

export class OpenAIProvider extends BaseLLMProvider {
  readonly name = "openai";
  readonly models = [...OPENAI_MODELS];
  readonly defaultModel = "gpt-4o";

  private readonly baseUrl: string;
  private readonly organizationId?: string;

  constructor(config: OpenAIConfig) {
    super(config);
    this.baseUrl = config.baseUrl || "https://api.openai.com/v1";
    this.organizationId = config.organizationId;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const start = performance.now();
    try {
      const model = this.resolveModel(request.model);
      const body: Record<string, unknown> = {
        model,
        messages: this.formatMessages(request),
        ...maxTokensParam(model, request.maxTokens ?? 4096),
      };
      if (request.temperature !== undefined) {
        body.temperature = request.temperature;
      }

      const response = (await this.requestJson(
        `${this.baseUrl}/chat/completions`,
        body,
        this.getHeaders(),
        request
      )) as OpenAICompletionResponse;

      const latencyMs = performance.now() - start;
      const usage = response.usage
        ? this.parseUsage(response.usage)
        : { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
      this.trackSuccess(usage.inputTokens, usage.outputTokens, latencyMs);

      const choice = response.choices[0];
      return {
        content: choice?.message.content ?? "",
        usage,
        finishReason: this.mapFinishReason(choice?.finish_reason),
        model: response.model,
        latencyMs,
      };
    } catch (error) {
      this.trackFailure();
      throw error;
    }
  }

  protected getHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      Authorization: `Bearer ${this.config.apiKey}`,
    };
    if (this.organizationId) {
      headers["OpenAI-Organization"] = this.organizationId;
    }
    return headers;
  }

  protected formatMessages(request: CompletionRequest): Array<{ role: string; content: string }> {
    const formatted: Array<{ role: string; content: string }> = [];
    if (request.system) {
      formatted.push({ role: "system", content: request.system });
    }
    for (const message of request.messages) {
      formatted.push({ role: message.role, content: this.flattenContent(message) });
    }
    return formatted;
  }

  private flattenContent(message: Message): string {
    if (typeof message.content === "string") {
      return message.content;
    }
    return message.content
      .map((part) => {
        if (part.type === "document") {
          throw new GatewayError(
            "INVALID_REQUEST",
            "OpenAI chat completions do not accept document parts; send extracted text instead.",
            { provider: this.name }
          );
        }
        return part.text;
      })
      .join("\n\n");
  }

  protected parseUsage(usage: NonNullable<OpenAICompletionResponse["usage"]>): TokenUsage {
    return {
      inputTokens: usage.prompt_tokens,
      outputTokens: usage.completion_tokens ?? 0,
      totalTokens: usage.total_tokens,
    };
  }

  protected mapFinishReason(reason: string | undefined): CompletionResponse["finishReason"] {
    switch (reason) {
      case "length":
        return "length";
      case "content_filter":
        return "content_filter";
      default:
        return "stop";
    }
  }
}
