import { getEventListeners } from "node:events";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { GatewayError } from "../gateway/errors";
import { AnthropicProvider } from "./anthropicProvider";

describe("AnthropicProvider", () => {
  let originalFetch: typeof globalThis.fetch;
  let fetchMock = vi.fn();

  beforeEach(() => {
    originalFetch = globalThis.fetch;
    fetchMock = vi.fn();
    globalThis.fetch = fetchMock;
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
    vi.clearAllMocks();
  });

  const mockFetch = () => fetchMock;

  const okResponse = (text: string) => ({
    ok: true,
    status: 200,
    json: () =>
      Promise.resolve({
        id: "msg_1",
        type: "message",
        role: "assistant",
        model: "claude-sonnet-4-20250514",
        content: [{ type: "text", text }],
        stop_reason: "end_turn",
        usage: { input_tokens: 10, output_tokens: 5, cache_read_input_tokens: 90 },
      }),
  });

  const errorResponse = (status: number, body: string) => ({
    ok: false,
    status,
    headers: new Headers(),
    text: () => Promise.resolve(body),
  });

  it("sends documents as cacheable blocks with the system prompt", async () => {
    mockFetch().mockResolvedValueOnce(okResponse("Looks right."));
    const provider = new AnthropicProvider({ apiKey: "test-key" });

    const response = await provider.complete({
      model: "",
      system: "You are a study assistant.",
      messages: [
        {
          role: "user",
          content: [
            { type: "document", mediaType: "application/pdf", data: "JVBERi0=", cache: true },
            { type: "text", text: "The student is on SLIDE 1 of this lecture." },
          ],
        },
      ],
    });

    expect(response.content).toBe("Looks right.");
    expect(response.usage).toEqual({ inputTokens: 100, outputTokens: 5, totalTokens: 105 });

    const [url, init] = mockFetch().mock.calls[0];
    expect(url).toBe("https://api.anthropic.com/v1/messages");
    expect(init.headers["x-api-key"]).toBe("test-key");
    const body = JSON.parse(init.body);
    expect(body.model).toBe("claude-sonnet-4-20250514");
    expect(body.system).toBe("You are a study assistant.");
    expect(body.max_tokens).toBe(4096);
    expect(body.messages[0].content[0]).toEqual({
      type: "document",
      source: { type: "base64", media_type: "application/pdf", data: "JVBERi0=" },
      cache_control: { type: "ephemeral" },
    });
    expect(body.messages[0].content[1]).toEqual({
      type: "text",
      text: "The student is on SLIDE 1 of this lecture.",
    });
  });

  it("retries overloaded responses", async () => {
    mockFetch()
      .mockResolvedValueOnce(errorResponse(529, "Overloaded"))
      .mockResolvedValueOnce(okResponse("Second time lucky."));
    const provider = new AnthropicProvider({ apiKey: "test-key", retryBaseDelayMs: 0 });

    const response = await provider.complete({
      model: "claude-3-5-haiku-20241022",
      messages: [{ role: "user", content: "hi" }],
    });

    expect(response.content).toBe("Second time lucky.");
    expect(mockFetch()).toHaveBeenCalledTimes(2);
    expect(provider.getMetrics().successfulRequests).toBe(1);
  });

  it("classifies low credit balance as a quota failure without retrying", async () => {
    mockFetch().mockResolvedValue(
      errorResponse(400, '{"error":{"message":"Your credit balance is too low"}}')
    );
    const provider = new AnthropicProvider({ apiKey: "test-key", retryBaseDelayMs: 0 });

    const failure = provider.complete({ model: "", messages: [{ role: "user", content: "hi" }] });

    await expect(failure).rejects.toBeInstanceOf(GatewayError);
    await expect(failure).rejects.toMatchObject({ code: "QUOTA_EXCEEDED", statusCode: 400 });
    expect(mockFetch()).toHaveBeenCalledTimes(1);
    expect(provider.getMetrics()).toMatchObject({
      provider: "anthropic",
      totalRequests: 1,
      failedRequests: 1,
    });
  });

  it("leaves no listeners on the caller's signal once requests settle", async () => {
    mockFetch().mockImplementation(() => Promise.resolve(okResponse("ok")));
    const provider = new AnthropicProvider({ apiKey: "test-key" });
    const controller = new AbortController();

    for (let slide = 1; slide <= 15; slide++) {
      await provider.complete({
        model: "",
        messages: [{ role: "user", content: `SLIDE ${slide}` }],
        signal: controller.signal,
      });
    }

    expect(mockFetch()).toHaveBeenCalledTimes(15);
    expect(getEventListeners(controller.signal, "abort")).toHaveLength(0);
  });

  it("stops waiting out the retry delay when the caller aborts", async () => {
    mockFetch().mockResolvedValueOnce(errorResponse(503, "Service Unavailable"));
    const provider = new AnthropicProvider({ apiKey: "test-key", retryBaseDelayMs: 60_000 });
    const controller = new AbortController();

    const failure = provider.complete({
      model: "",
      messages: [{ role: "user", content: "hi" }],
      signal: controller.signal,
    });
    await vi.waitFor(() => expect(mockFetch()).toHaveBeenCalledTimes(1));
    await new Promise((resolve) => setTimeout(resolve, 10));
    controller.abort();

    await expect(failure).rejects.toMatchObject({ code: "CANCELLED" });
    expect(mockFetch()).toHaveBeenCalledTimes(1);
    expect(getEventListeners(controller.signal, "abort")).toHaveLength(0);
  });

  it("prepends a user turn when the conversation starts with the assistant", async () => {
    mockFetch().mockResolvedValueOnce(okResponse("ok"));
    const provider = new AnthropicProvider({ apiKey: "test-key" });

    await provider.complete({
      model: "",
      messages: [
        { role: "assistant", content: "Earlier answer" },
        { role: "user", content: "Why?" },
      ],
    });

    const body = JSON.parse(mockFetch().mock.calls[0][1].body);
    expect(body.messages.map((m: { role: string }) => m.role)).toEqual([
      "user",
      "assistant",
      "user",
    ]);
  });
});
