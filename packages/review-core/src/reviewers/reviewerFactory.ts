import { createProvider, type LLMProvider, type ProviderKind } from "@gloss/ai-core";
import { AnthropicNoteReviewer } from "./anthropicNoteReviewer";
import type { BaseNoteReviewer, NoteReviewerOptions } from "./baseNoteReviewer";
import { GeminiNoteReviewer } from "./geminiNoteReviewer";
import { OpenAINoteReviewer } from "./openaiNoteReviewer";
import type { NoteReviewer } from "./types";

const REVIEWERS: Record<
  ProviderKind,
  (llm: LLMProvider, options: NoteReviewerOptions) => BaseNoteReviewer
> = {
  anthropic: (llm, options) => new AnthropicNoteReviewer(llm, options),
  gemini: (llm, options) => new GeminiNoteReviewer(llm, options),
  openai: (llm, options) => new OpenAINoteReviewer(llm, options),
};

export function createNoteReviewer(
  kind: ProviderKind,
  llm: LLMProvider,
  options: NoteReviewerOptions = {}
): NoteReviewer {
  return REVIEWERS[kind](llm, options);
}

export interface ReviewerSettings {
  provider: ProviderKind;
  apiKey: string;
  model: string;
}

export type NoteReviewerFactory = (settings: ReviewerSettings) => NoteReviewer;

/** Builds the vendor HTTP provider and wraps it in the matching reviewer */
export const defaultNoteReviewerFactory: NoteReviewerFactory = (settings) =>
  createNoteReviewer(settings.provider, createProvider(settings.provider, { apiKey: settings.apiKey }), {
    model: settings.model,
  });
