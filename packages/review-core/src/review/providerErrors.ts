/**
 * Turns provider failures into the message a student sees.
 */

import { isBillingError, isGatewayError } from "@gloss/ai-core";

export interface ProviderErrorDescription {
  /** Short, user-facing summary */
  message: string;
  /** Raw error text for diagnostics */
  detail: string;
  billing: boolean;
}

const PROVIDER_LABELS: Record<string, string> = {
  anthropic: "Anthropic",
  openai: "OpenAI",
  gemini: "Gemini",
};

export function providerLabel(provider: string): string {
  return PROVIDER_LABELS[provider] ?? provider;
}

export function describeProviderError(error: unknown, provider: string): ProviderErrorDescription {
  const detail = error instanceof Error ? error.message : String(error);

  if (isBillingError(error)) {
    const label = providerLabel(isGatewayError(error) && error.provider ? error.provider : provider);
    return {
      message: `Billing or quota problem with ${label}. Check your plan and credit balance, then retry.`,
      detail,
      billing: true,
    };
  }

  return { message: detail, detail, billing: false };
}
