/**
 * Gemini Provider
 *
 * Provider implementation for the Google Gemini `generateContent` API.
 * PDF documents travel as inline data parts.
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

export interface GeminiConfig extends ProviderConfig {}

type GeminiPart = { text: string } | { inline_data: { mime_type: string; data: string } };

interface GeminiContent {
  role: "user" | "model";
  parts: GeminiPart[];
}

interface GeminiCompletionResponse {
  candidates?: Array<{
    content?: { role?: string; parts?: Array<{ text?: string }> };
    finishReason?: string;
  }>;
  usageMetadata?: {
    promptTokenCount?: number;
    candidatesTokenCount?: number;
    totalTokenCount?: number;
  };
  modelVersion?: string;
}

const GEMINI_MODELS = ["gemini-2.5-flash", "gemini-2.5-pro", "gemini-2.0-flash"];
const GEMINI_DEFAULT_MODEL = "gemini-2.5-flash";

export class GeminiProvider extends BaseLLMProvider {
  readonly name = "gemini";
  readonly models = [...GEMINI_MODELS];
  readonly defaultModel = GEMINI_DEFAULT_MODEL;

  private readonly baseUrl: string;

  constructor(config: GeminiConfig) {
    super(config);
    this.baseUrl = config.baseUrl || "https://generativelanguage.googleapis.com/v1beta";
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const start = performance.now();
    try {
      const model = this.resolveModel(request.model);
      const generationConfig: Record<string, unknown> = {
        maxOutputTokens: request.maxTokens ?? 4096,
      };
      if (request.temperature !== undefined) {
        generationConfig.temperature = request.temperature;
      }
      const body: Record<string, unknown> = {
        contents: this.formatMessages(request.messages),
        generationConfig,
      };
      if (request.system) {
        body.systemInstruction = { parts: [{ text: request.system }] };
      }

      const url = `${this.baseUrl}/models/${encodeURIComponent(model)}:generateContent`;
      const response = (await this.requestJson(
        url,
        body,
        this.getHeaders(),
        request
      )) as GeminiCompletionResponse;

      const latencyMs = performance.now() - start;
      const usage = this.parseUsage(response.usageMetadata);
      this.trackSuccess(usage.inputTokens, usage.outputTokens, latencyMs);

      const candidate = response.candidates?.[0];
      const content = (candidate?.content?.parts ?? []).map((part) => part.text ?? "").join("");

      return {
        content,
        usage,
        finishReason: this.mapFinishReason(candidate?.finishReason),
        model: response.modelVersion ?? model,
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
      "x-goog-api-key": this.config.apiKey,
    };
  }

  protected formatMessages(messages: Message[]): GeminiContent[] {
    return messages.map((message) => ({
      role: message.role === "assistant" ? "model" : "user",
      parts:
        typeof message.content === "string"
          ? [{ text: message.content }]
          : message.content.map(toGeminiPart),
    }));
  }

  protected parseUsage(usage: GeminiCompletionResponse["usageMetadata"]): TokenUsage {
    const inputTokens = usage?.promptTokenCount ?? 0;
    const outputTokens = usage?.candidatesTokenCount ?? 0;
    return {
      inputTokens,
      outputTokens,
      totalTokens: usage?.totalTokenCount ?? inputTokens + outputTokens,
    };
  }

  protected mapFinishReason(reason: string | undefined): CompletionResponse["finishReason"] {
    switch (reason) {
      case "MAX_TOKENS":
        return "length";
      case "SAFETY":
      case "RECITATION":
      case "BLOCKLIST":
      case "PROHIBITED_CONTENT":
        return "content_filter";
      default:
        return "stop";
    }
  }
}

function toGeminiPart(part: ContentPart): GeminiPart {
  if (part.type === "text") {
    return { text: part.text };
  }
  return { inline_data: { mime_type: part.mediaType, data: part.data } };
}
