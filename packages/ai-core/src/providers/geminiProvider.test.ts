import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { GeminiProvider } from "./geminiProvider";

describe("GeminiProvider", () => {
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

  it("maps roles, inline documents and the system instruction", async () => {
    mockFetch().mockResolvedValueOnce({
      ok: true,
      status: 200,
      json: () =>
        Promise.resolve({
          candidates: [
            { content: { role: "model", parts: [{ text: "Part one. " }, { text: "Part two." }] } },
          ],
          usageMetadata: { promptTokenCount: 40, candidatesTokenCount: 6, totalTokenCount: 46 },
          modelVersion: "gemini-2.5-flash",
        }),
    });
    const provider = new GeminiProvider({ apiKey: "test-key" });

    const response = await provider.complete({
      model: "",
      system: "Study assistant.",
      messages: [
        {
          role: "user",
          content: [
            { type: "document", mediaType: "application/pdf", data: "JVBERi0=" },
            { type: "text", text: "Note 1 (QUESTION):\nWhat is ATP?" },
          ],
        },
        { role: "assistant", content: "ATP stores energy." },
        { role: "user", content: "Where is it made?" },
      ],
    });

    expect(response.content).toBe("Part one. Part two.");
    expect(response.usage).toEqual({ inputTokens: 40, outputTokens: 6, totalTokens: 46 });
    expect(response.finishReason).toBe("stop");

    const [url, init] = mockFetch().mock.calls[0];
    expect(url).toBe(
      "https://generativelanguage.googleapis.com/v1beta/models/gemini-2.5-flash:generateContent"
    );
    expect(init.headers["x-goog-api-key"]).toBe("test-key");
    const body = JSON.parse(init.body);
    expect(body.systemInstruction).toEqual({ parts: [{ text: "Study assistant." }] });
    expect(body.contents.map((c: { role: string }) => c.role)).toEqual(["user", "model", "user"]);
    expect(body.contents[0].parts[0]).toEqual({
      inline_data: { mime_type: "application/pdf", data: "JVBERi0=" },
    });
  });

  it("surfaces RESOURCE_EXHAUSTED as a quota failure", async () => {
    mockFetch().mockResolvedValue({
      ok: false,
      status: 429,
      headers: new Headers(),
      text: () => Promise.resolve('{"error":{"status":"RESOURCE_EXHAUSTED"}}'),
    });
    const provider = new GeminiProvider({ apiKey: "test-key", retryBaseDelayMs: 0 });

    await expect(
      provider.complete({ model: "", messages: [{ role: "user", content: "hi" }] })
    ).rejects.toMatchObject({ code: "QUOTA_EXCEEDED", retryable: false });
    expect(mockFetch()).toHaveBeenCalledTimes(1);
  });
});
