/**
 * Follow-up Exchange
 *
 * One question about one review item. The exchange works on a copy of the
 * item taken when it was created and reports the answer as an event; the
 * caller appends the question/answer pair to the session.
 */

import { EventEmitter } from "node:events";
import type { LectureDocument } from "../document/lectureDocument";
import { getLogger, type ReviewLogger } from "../logging/logger";
import type { FollowUpRequest, NoteReviewer } from "../reviewers/types";
import type { ReviewItem, SlideKey } from "../session/types";
import { describeProviderError } from "./providerErrors";

export type FollowUpEvent =
  | { type: "answered"; question: string; answer: string }
  | { type: "failed"; question: string; message: string; detail: string; billing: boolean };

export type FollowUpEventHandler = (event: FollowUpEvent) => void;

export interface FollowUpExchangeOptions {
  logger?: ReviewLogger;
}

const EXCHANGE_EVENT = "followUpEvent";

/**
 * Copy what a follow-up call needs out of a live review item.
 */
export function createFollowUpRequest(
  slideKey: SlideKey,
  item: Readonly<ReviewItem>,
  question: string
): FollowUpRequest {
  return {
    slideNumber: Number(slideKey),
    kind: item.kind,
    originalText: item.originalText,
    responseText: item.responseText,
    history: item.followups.map((turn) => ({ ...turn })),
    question,
  };
}

/**
 * Record a completed exchange: exactly one user turn and one assistant turn.
 */
export function appendFollowUp(item: ReviewItem, question: string, answer: string): void {
  item.followups.push({ role: "user", text: question }, { role: "assistant", text: answer });
}

export class FollowUpExchange extends EventEmitter {
  private readonly abortController = new AbortController();
  private readonly logger: ReviewLogger;
  private runPromise: Promise<void> | null = null;
  private cancelled = false;

  constructor(
    private readonly reviewer: NoteReviewer,
    private readonly document: LectureDocument,
    readonly request: FollowUpRequest,
    options: FollowUpExchangeOptions = {}
  ) {
    super();
    this.logger = (options.logger ?? getLogger()).child({ module: "follow-up" });
  }

  /** Resolves after the single answered/failed event; never rejects for provider errors */
  run(): Promise<void> {
    if (!this.runPromise) {
      this.runPromise = this.execute();
    }
    return this.runPromise;
  }

  async cancel(): Promise<void> {
    this.cancelled = true;
    this.abortController.abort();
    await this.runPromise;
  }

  onEvent(handler: FollowUpEventHandler): () => void {
    const wrappedHandler = (event: FollowUpEvent) => handler(event);
    this.on(EXCHANGE_EVENT, wrappedHandler);
    return () => this.off(EXCHANGE_EVENT, wrappedHandler);
  }

  private async execute(): Promise<void> {
    const { question } = this.request;
    let event: FollowUpEvent;
    try {
      const answer = await this.reviewer.followUp(this.document, this.request, {
        signal: this.abortController.signal,
      });
      event = { type: "answered", question, answer };
    } catch (error) {
      const description = describeProviderError(error, this.reviewer.provider);
      event = { type: "failed", question, ...description };
      if (!this.cancelled) {
        this.logger.warn("Follow-up failed", {
          slideNumber: this.request.slideNumber,
          billing: description.billing,
          detail: description.detail,
        });
      }
    }

    if (!this.cancelled) {
      this.emit(EXCHANGE_EVENT, event);
    }
  }
}
