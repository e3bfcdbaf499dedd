/**
 * Base Note Reviewer
 *
 * Shared prompt assembly and response splitting. Subclasses only decide how
 * the lecture document is attached to the first user turn.
 */

import type { ContentPart, LLMProvider, Message } from "@gloss/ai-core";
import type { LectureDocument } from "../document/lectureDocument";
import { getLogger, type ReviewLogger } from "../logging/logger";
import {
  buildNotesPrompt,
  buildSingleNotePrompt,
  buildSystemPrompt,
  type DocumentDelivery,
} from "../review/prompts";
import { splitReviewResponse } from "../review/responseSplitter";
import type { AnnotationBlock, ReviewItem } from "../session/types";
import type { FollowUpRequest, NoteReviewer, ReviewCallOptions } from "./types";

export const REVIEW_MAX_TOKENS = 4096;
export const FOLLOW_UP_MAX_TOKENS = 2048;

export interface NoteReviewerOptions {
  /** Empty selects the provider default */
  model?: string;
  reviewMaxTokens?: number;
  followUpMaxTokens?: number;
  logger?: ReviewLogger;
}

export abstract class BaseNoteReviewer implements NoteReviewer {
  protected abstract readonly delivery: DocumentDelivery;

  protected readonly model: string;
  protected readonly reviewMaxTokens: number;
  protected readonly followUpMaxTokens: number;
  protected readonly logger: ReviewLogger;

  constructor(
    protected readonly llm: LLMProvider,
    options: NoteReviewerOptions = {}
  ) {
    this.model = options.model ?? "";
    this.reviewMaxTokens = options.reviewMaxTokens ?? REVIEW_MAX_TOKENS;
    this.followUpMaxTokens = options.followUpMaxTokens ?? FOLLOW_UP_MAX_TOKENS;
    this.logger = (options.logger ?? getLogger()).child({
      module: "note-reviewer",
      provider: llm.name,
    });
  }

  get provider(): string {
    return this.llm.name;
  }

  /** Content parts that put the lecture in front of the model */
  protected abstract documentContext(document: LectureDocument): Promise<ContentPart[]>;

  async reviewNotes(
    document: LectureDocument,
    slideNumber: number,
    blocks: readonly AnnotationBlock[],
    options: ReviewCallOptions = {}
  ): Promise<ReviewItem[]> {
    if (blocks.length === 0) {
      return [];
    }

    const context = await this.documentContext(document);
    const response = await this.llm.complete({
      model: this.model,
      system: buildSystemPrompt(this.delivery),
      messages: [
        {
          role: "user",
          content: [...context, { type: "text", text: buildNotesPrompt(slideNumber, blocks) }],
        },
      ],
      maxTokens: this.reviewMaxTokens,
      signal: options.signal,
    });

    this.logger.debug("Slide reviewed", {
      slideNumber,
      blocks: blocks.length,
      finishReason: response.finishReason,
      outputTokens: response.usage.outputTokens,
    });

    return splitReviewResponse(blocks, response.content);
  }

  async followUp(
    document: LectureDocument,
    request: FollowUpRequest,
    options: ReviewCallOptions = {}
  ): Promise<string> {
    const context = await this.documentContext(document);
    const notePrompt = buildSingleNotePrompt(
      request.slideNumber,
      request.kind,
      request.originalText
    );

    const messages: Message[] = [
      { role: "user", content: [...context, { type: "text", text: notePrompt }] },
      { role: "assistant", content: request.responseText },
      ...request.history.map((turn): Message => ({ role: turn.role, content: turn.text })),
      { role: "user", content: request.question },
    ];

    const response = await this.llm.complete({
      model: this.model,
      system: buildSystemPrompt(this.delivery),
      messages,
      maxTokens: this.followUpMaxTokens,
      signal: options.signal,
    });
    return response.content;
  }
}
