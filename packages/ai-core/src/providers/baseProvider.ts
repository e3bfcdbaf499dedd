/**
 * Base LLM Provider
 *
 * Abstract base class with shared functionality for LLM providers.
 * Handles metrics tracking, retries, timeouts and JSON transport.
 */

import { fromHttpStatus, fromProviderError, isGatewayError } from "../gateway/errors";
import type {
  CompletionRequest,
  CompletionResponse,
  LLMProvider,
  ProviderConfig,
  ProviderMetrics,
} from "./types";

/** Default provider configuration */
const DEFAULT_CONFIG: Required<Omit<ProviderConfig, "apiKey">> = {
  baseUrl: "",
  timeoutMs: 120_000,
  maxRetries: 2,
  retryBaseDelayMs: 1000,
};

const MAX_RETRY_DELAY_MS = 10_000;

interface MergedSignal {
  signal: AbortSignal;
  dispose: () => void;
}

/**
 * Abstract base class for LLM providers.
 */
export abstract class BaseLLMProvider implements LLMProvider {
  abstract readonly name: string;
  abstract readonly models: string[];
  abstract readonly defaultModel: string;

  protected readonly config: Required<ProviderConfig>;

  protected metrics: ProviderMetrics;

  constructor(config: ProviderConfig) {
    this.config = {
      ...DEFAULT_CONFIG,
      ...config,
    };

    // Provider name is filled in lazily; subclass fields are not set yet
    this.metrics = {
      provider: "",
      totalRequests: 0,
      successfulRequests: 0,
      failedRequests: 0,
      totalInputTokens: 0,
      totalOutputTokens: 0,
      avgLatencyMs: 0,
      lastRequestAt: 0,
    };
  }

  abstract complete(request: CompletionRequest): Promise<CompletionResponse>;

  getMetrics(): ProviderMetrics {
    if (!this.metrics.provider) {
      this.metrics.provider = this.name;
    }
    return { ...this.metrics };
  }

  resetMetrics(): void {
    this.metrics = {
      provider: this.name,
      totalRequests: 0,
      successfulRequests: 0,
      failedRequests: 0,
      totalInputTokens: 0,
      totalOutputTokens: 0,
      avgLatencyMs: 0,
      lastRequestAt: 0,
    };
  }

  /**
   * Track a successful request.
   */
  protected trackSuccess(inputTokens: number, outputTokens: number, latencyMs: number): void {
    if (!this.metrics.provider) {
      this.metrics.provider = this.name;
    }
    this.metrics.totalRequests++;
    this.metrics.successfulRequests++;
    this.metrics.totalInputTokens += inputTokens;
    this.metrics.totalOutputTokens += outputTokens;
    this.metrics.lastRequestAt = Date.now();

    const totalLatency =
      this.metrics.avgLatencyMs * (this.metrics.successfulRequests - 1) + latencyMs;
    this.metrics.avgLatencyMs = totalLatency / this.metrics.successfulRequests;
  }

  /**
   * Track a failed request.
   */
  protected trackFailure(): void {
    if (!this.metrics.provider) {
      this.metrics.provider = this.name;
    }
    this.metrics.totalRequests++;
    this.metrics.failedRequests++;
    this.metrics.lastRequestAt = Date.now();
  }

  /**
   * Retry a request with exponential backoff.
   * Only retryable gateway errors are retried; billing, auth and request
   * errors surface on the first attempt.
   */
  protected async withRetry<T>(
    operation: () => Promise<T>,
    signal?: AbortSignal,
    retries: number = this.config.maxRetries
  ): Promise<T> {
    let lastError: unknown = null;

    for (let attempt = 0; attempt <= retries; attempt++) {
      try {
        return await operation();
      } catch (error) {
        lastError = fromProviderError(error, this.name);

        if (!isGatewayError(lastError) || !lastError.retryable || signal?.aborted) {
          throw lastError;
        }

        if (attempt < retries) {
          const backoff = this.config.retryBaseDelayMs * 2 ** attempt;
          try {
            const delayMs = Math.min(lastError.retryAfterMs ?? backoff, MAX_RETRY_DELAY_MS);
            await this.sleep(delayMs, signal);
          } catch (abortReason) {
            throw fromProviderError(abortReason, this.name);
          }
        }
      }
    }

    throw lastError ?? new Error("Request failed after retries");
  }

  /**
   * POST a JSON body with retries under the request's timeout and the
   * caller's signal. Listeners on the caller's signal are removed once the
   * request settles.
   */
  protected async requestJson(
    url: string,
    body: Record<string, unknown>,
    headers: Record<string, string>,
    request: Pick<CompletionRequest, "timeoutMs" | "signal">
  ): Promise<unknown> {
    const { signal, dispose } = this.resolveTimeoutSignal(request.timeoutMs, request.signal);
    try {
      return await this.withRetry(() => this.postJson(url, body, headers, signal), signal);
    } finally {
      dispose();
    }
  }

  /**
   * POST a JSON body and return the decoded JSON response.
   */
  protected async postJson(
    url: string,
    body: Record<string, unknown>,
    headers: Record<string, string>,
    signal: AbortSignal
  ): Promise<unknown> {
    const res = await fetch(url, {
      method: "POST",
      headers,
      body: JSON.stringify(body),
      signal,
    });

    if (!res.ok) {
      const errorText = await res.text();
      throw fromHttpStatus(res.status, `${this.name} API error (${res.status}): ${errorText}`, {
        provider: this.name,
        retryAfterMs: parseRetryAfter(res.headers.get("retry-after")),
      });
    }

    return res.json();
  }

  /**
   * Wait `ms`, rejecting with the signal's reason as soon as it aborts.
   */
  protected sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        reject(signal?.reason);
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, ms);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  protected createTimeoutSignal(timeoutMs: number): AbortSignal {
    return AbortSignal.timeout(timeoutMs);
  }

  /**
   * Combine an optional external signal with a timeout signal.
   */
  protected resolveTimeoutSignal(
    timeoutMs: number | undefined,
    signal?: AbortSignal
  ): MergedSignal {
    const timeoutSignal = this.createTimeoutSignal(timeoutMs ?? this.config.timeoutMs);
    if (!signal) {
      return { signal: timeoutSignal, dispose: () => undefined };
    }
    return this.mergeSignals(signal, timeoutSignal);
  }

  /**
   * Merge two abort signals. `dispose` detaches the merged signal from both
   * sources; call it once the request settles.
   */
  protected mergeSignals(primary: AbortSignal, secondary: AbortSignal): MergedSignal {
    const controller = new AbortController();
    if (primary.aborted || secondary.aborted) {
      controller.abort(primary.aborted ? primary.reason : secondary.reason);
      return { signal: controller.signal, dispose: () => undefined };
    }

    const onPrimaryAbort = () => controller.abort(primary.reason);
    const onSecondaryAbort = () => controller.abort(secondary.reason);
    primary.addEventListener("abort", onPrimaryAbort, { once: true });
    secondary.addEventListener("abort", onSecondaryAbort, { once: true });
    return {
      signal: controller.signal,
      dispose: () => {
        primary.removeEventListener("abort", onPrimaryAbort);
        secondary.removeEventListener("abort", onSecondaryAbort);
      },
    };
  }

  /**
   * Model to use; an empty request model selects the default.
   * Unknown model ids are passed through so newly released models work.
   */
  protected resolveModel(requestModel: string): string {
    return requestModel.trim() || this.defaultModel;
  }
}

function parseRetryAfter(value: string | null): number | undefined {
  if (!value) {
    return undefined;
  }
  const seconds = Number(value);
  return Number.isFinite(seconds) ? seconds * 1000 : undefined;
}
