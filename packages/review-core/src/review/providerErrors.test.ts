import { GatewayError } from "@gloss/ai-core";
import { describe, expect, it } from "vitest";
import { describeProviderError, providerLabel } from "./providerErrors";

describe("describeProviderError", () => {
  it("rewrites quota errors from the gateway", () => {
    const error = new GatewayError("QUOTA_EXCEEDED", "anthropic API error (400): credit balance is too low", {
      provider: "anthropic",
    });
    expect(describeProviderError(error, "anthropic")).toEqual({
      message:
        "Billing or quota problem with Anthropic. Check your plan and credit balance, then retry.",
      detail: "anthropic API error (400): credit balance is too low",
      billing: true,
    });
  });

  it("recognises billing wording in plain errors", () => {
    const result = describeProviderError(new Error("Payment Required"), "gemini");
    expect(result.billing).toBe(true);
    expect(result.message).toContain("with Gemini.");
  });

  it("passes other errors through", () => {
    expect(describeProviderError(new Error("socket hang up"), "openai")).toEqual({
      message: "socket hang up",
      detail: "socket hang up",
      billing: false,
    });
    expect(describeProviderError("odd", "openai").detail).toBe("odd");
  });
});

describe("providerLabel", () => {
  it("falls back to the raw name", () => {
    expect(providerLabel("openai")).toBe("OpenAI");
    expect(providerLabel("local")).toBe("local");
  });
});
