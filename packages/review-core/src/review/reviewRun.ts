/**
 * Review Run
 *
 * Reviews a batch of slides one at a time in ascending slide order, so the
 * first call establishes the provider's prompt cache and every later call
 * reuses it. Results leave the run only as events; the run never touches the
 * session.
 */

import { EventEmitter } from "node:events";
import type { LectureDocument } from "../document/lectureDocument";
import { getLogger, type ReviewLogger } from "../logging/logger";
import type { NoteReviewer } from "../reviewers/types";
import {
  type AnnotationBlock,
  compareSlideKeys,
  type ReviewItem,
  type SlideKey,
} from "../session/types";
import { describeProviderError } from "./providerErrors";

export type ReviewRunState = "idle" | "running" | "cancelled" | "completed";

export interface ReviewProgress {
  completed: number;
  total: number;
}

export type ReviewRunEvent =
  | { type: "slide-reviewed"; slideKey: SlideKey; items: ReviewItem[]; progress: ReviewProgress }
  | {
      type: "slide-error";
      slideKey: SlideKey;
      message: string;
      detail: string;
      billing: boolean;
      progress: ReviewProgress;
    }
  | { type: "all-done"; progress: ReviewProgress };

export type ReviewRunEventHandler = (event: ReviewRunEvent) => void;

export type SlideBatch =
  | ReadonlyMap<SlideKey, readonly AnnotationBlock[]>
  | Readonly<Record<SlideKey, readonly AnnotationBlock[]>>;

export interface ReviewRunOptions {
  logger?: ReviewLogger;
}

const RUN_EVENT = "reviewEvent";

function isSlideMap(slides: SlideBatch): slides is ReadonlyMap<SlideKey, readonly AnnotationBlock[]> {
  return slides instanceof Map;
}

function batchEntries(slides: SlideBatch): Array<[SlideKey, readonly AnnotationBlock[]]> {
  return isSlideMap(slides) ? [...slides.entries()] : Object.entries(slides);
}

type SlideOutcome =
  | { ok: true; items: ReviewItem[] }
  | { ok: false; message: string; detail: string; billing: boolean };

export class ReviewRun extends EventEmitter {
  private readonly slides: Array<[SlideKey, readonly AnnotationBlock[]]>;
  private readonly abortController = new AbortController();
  private readonly logger: ReviewLogger;
  private currentState: ReviewRunState = "idle";
  private completedCount = 0;
  private runPromise: Promise<void> | null = null;

  constructor(
    private readonly reviewer: NoteReviewer,
    private readonly document: LectureDocument,
    slides: SlideBatch,
    options: ReviewRunOptions = {}
  ) {
    super();
    this.slides = batchEntries(slides).sort(([a], [b]) => compareSlideKeys(a, b));
    this.logger = (options.logger ?? getLogger()).child({ module: "review-run" });
  }

  get state(): ReviewRunState {
    return this.currentState;
  }

  get progress(): ReviewProgress {
    return { completed: this.completedCount, total: this.slides.length };
  }

  /** Slide keys in the order they are reviewed */
  get slideKeys(): SlideKey[] {
    return this.slides.map(([key]) => key);
  }

  /**
   * Begin reviewing. The returned promise settles when the run stops and
   * does not reject for provider failures. Calling again returns the same
   * promise.
   */
  start(): Promise<void> {
    if (!this.runPromise) {
      if (this.currentState === "cancelled") {
        this.runPromise = Promise.resolve();
      } else {
        this.currentState = "running";
        this.runPromise = this.execute();
      }
    }
    return this.runPromise;
  }

  /**
   * Stop the run. The in-flight request is aborted and no event fires after
   * this call. Resolves once the run has fully stopped.
   */
  async cancel(): Promise<void> {
    if (this.currentState === "idle" || this.currentState === "running") {
      this.currentState = "cancelled";
      this.abortController.abort();
      this.logger.info("Review run cancelled", { ...this.progress });
    }
    await this.runPromise;
  }

  onEvent(handler: ReviewRunEventHandler): () => void {
    const wrappedHandler = (event: ReviewRunEvent) => handler(event);
    this.on(RUN_EVENT, wrappedHandler);
    return () => this.off(RUN_EVENT, wrappedHandler);
  }

  private isCancelled(): boolean {
    return this.currentState === "cancelled";
  }

  private async execute(): Promise<void> {
    this.logger.info("Review run started", {
      slides: this.slideKeys,
      provider: this.reviewer.provider,
    });

    for (const [slideKey, blocks] of this.slides) {
      if (this.isCancelled()) {
        return;
      }

      const outcome = await this.reviewSlide(slideKey, blocks);
      if (this.isCancelled()) {
        return;
      }

      this.completedCount++;
      if (outcome.ok) {
        this.emitEvent({
          type: "slide-reviewed",
          slideKey,
          items: outcome.items,
          progress: this.progress,
        });
      } else {
        this.emitEvent({
          type: "slide-error",
          slideKey,
          message: outcome.message,
          detail: outcome.detail,
          billing: outcome.billing,
          progress: this.progress,
        });
      }
    }

    if (this.isCancelled()) {
      return;
    }
    this.currentState = "completed";
    this.logger.info("Review run completed", { ...this.progress });
    this.emitEvent({ type: "all-done", progress: this.progress });
  }

  private async reviewSlide(
    slideKey: SlideKey,
    blocks: readonly AnnotationBlock[]
  ): Promise<SlideOutcome> {
    try {
      const items = await this.reviewer.reviewNotes(this.document, Number(slideKey), blocks, {
        signal: this.abortController.signal,
      });
      return { ok: true, items };
    } catch (error) {
      const description = describeProviderError(error, this.reviewer.provider);
      if (!this.isCancelled()) {
        this.logger.warn("Slide review failed", {
          slideKey,
          billing: description.billing,
          detail: description.detail,
        });
      }
      return { ok: false, ...description };
    }
  }

  private emitEvent(event: ReviewRunEvent): void {
    this.emit(RUN_EVENT, event);
  }
}
