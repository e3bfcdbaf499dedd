/**
 * Lecture Review Controller
 *
 * Owns the open lecture's session. Review runs, regenerations and follow-ups
 * run in the background and report back through events; only this class
 * applies their results to the session and saves it.
 *
 * Every background operation is tagged with the generation of the lecture it
 * was started for. Opening or closing a lecture bumps the generation, so late
 * results for a previous lecture are dropped.
 */

import { EventEmitter } from "node:events";
import {
  resolveReviewerSettings,
  type Settings,
  type SettingsSource,
} from "../config/settingsStore";
import { LectureDocument } from "../document/lectureDocument";
import { ReviewTargetError } from "../errors";
import { getLogger, type ReviewLogger } from "../logging/logger";
import { parseAnnotations } from "../notes/annotationParser";
import {
  appendFollowUp,
  createFollowUpRequest,
  type FollowUpEvent,
  FollowUpExchange,
} from "../review/followUpExchange";
import { type ReviewRunEvent, ReviewRun } from "../review/reviewRun";
import {
  defaultNoteReviewerFactory,
  type NoteReviewerFactory,
} from "../reviewers/reviewerFactory";
import type { NoteReviewer } from "../reviewers/types";
import { collectSlidesNeedingReview, lockSession } from "../session/reviewCache";
import { setSlideNotes } from "../session/slides";
import { isSlideKey, type ReviewItem, type Session, type SlideKey } from "../session/types";
import type { SessionStore } from "../storage/sessionStore";

export type ControllerEvent =
  | { type: "review-status"; status: string }
  | { type: "slide-reviewed"; slideKey: SlideKey; items: ReviewItem[] }
  | {
      type: "slide-error";
      slideKey: SlideKey;
      message: string;
      detail: string;
      billing: boolean;
    }
  | { type: "review-done" }
  | { type: "item-regenerated"; slideKey: SlideKey; index: number; item: ReviewItem }
  | {
      type: "regenerate-error";
      slideKey: SlideKey;
      index: number;
      message: string;
      detail: string;
      billing: boolean;
    }
  | {
      type: "follow-up-answered";
      slideKey: SlideKey;
      index: number;
      question: string;
      answer: string;
    }
  | {
      type: "follow-up-error";
      slideKey: SlideKey;
      index: number;
      question: string;
      message: string;
      detail: string;
      billing: boolean;
    }
  | { type: "save-error"; message: string };

export type ControllerEventHandler = (event: ControllerEvent) => void;

export type DocumentLoader = (filePath: string) => Promise<LectureDocument>;

export interface LectureReviewControllerOptions {
  store: SessionStore;
  settings: SettingsSource;
  reviewerFactory?: NoteReviewerFactory;
  loadDocument?: DocumentLoader;
  env?: NodeJS.ProcessEnv;
  logger?: ReviewLogger;
}

export interface RegenerateOptions {
  /** Replace the whole item, discarding its follow-up thread */
  fresh?: boolean;
}

export const REVIEW_STATUS = {
  cached: "All reviews cached",
  empty: "No annotated notes to review.",
  complete: "Review complete",
  cancelled: "Review cancelled",
  progress: (completed: number, total: number) => `Reviewing ${completed}/${total} slides...`,
} as const;

interface ActiveLecture {
  courseId: string;
  lectureId: string;
  generation: number;
  session: Session;
  settings: Settings;
  reviewer: NoteReviewer | null;
  document: LectureDocument | null;
}

interface Cancellable {
  cancel(): Promise<void>;
}

const CONTROLLER_EVENT = "controllerEvent";

export class LectureReviewController extends EventEmitter {
  private readonly store: SessionStore;
  private readonly settingsSource: SettingsSource;
  private readonly reviewerFactory: NoteReviewerFactory;
  private readonly loadDocument: DocumentLoader;
  private readonly env: NodeJS.ProcessEnv;
  private readonly logger: ReviewLogger;

  private active: ActiveLecture | null = null;
  private generation = 0;
  private reviewRun: ReviewRun | null = null;
  private reviewStart: Promise<ReviewRun | null> | null = null;
  private readonly operations = new Set<Cancellable>();
  private readonly inFlight = new Set<Promise<void>>();
  private saveChain: Promise<void> = Promise.resolve();

  constructor(options: LectureReviewControllerOptions) {
    super();
    this.store = options.store;
    this.settingsSource = options.settings;
    this.reviewerFactory = options.reviewerFactory ?? defaultNoteReviewerFactory;
    this.loadDocument = options.loadDocument ?? ((filePath) => LectureDocument.fromFile(filePath));
    this.env = options.env ?? process.env;
    this.logger = (options.logger ?? getLogger()).child({ module: "lecture-controller" });
  }

  get session(): Session | null {
    return this.active?.session ?? null;
  }

  get isReviewing(): boolean {
    return this.reviewRun?.state === "running";
  }

  onEvent(handler: ControllerEventHandler): () => void {
    const wrappedHandler = (event: ControllerEvent) => handler(event);
    this.on(CONTROLLER_EVENT, wrappedHandler);
    return () => this.off(CONTROLLER_EVENT, wrappedHandler);
  }

  // ==========================================================================
  // Lecture lifecycle
  // ==========================================================================

  /**
   * Make a lecture the active one. Background work for the previous lecture
   * is stopped before the session is swapped.
   */
  async open(courseId: string, lectureId: string): Promise<Session> {
    await this.stopBackgroundWork();
    const generation = ++this.generation;
    this.active = null;

    const session = await this.store.loadSession(courseId, lectureId);
    const settings = await this.settingsSource.load();
    if (generation === this.generation) {
      this.active = {
        courseId,
        lectureId,
        generation,
        session,
        settings,
        reviewer: null,
        document: null,
      };
      this.logger.info("Lecture opened", {
        courseId,
        lectureId,
        slides: Object.keys(session.slides).length,
      });
    }
    return session;
  }

  async close(): Promise<void> {
    await this.stopBackgroundWork();
    this.generation++;
    this.active = null;
    await this.saveChain;
  }

  /** Wait for every background operation and queued save to finish */
  async flush(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
    await this.saveChain;
  }

  // ==========================================================================
  // Notes
  // ==========================================================================

  async updateNotes(slideKey: SlideKey, rawNotes: string): Promise<void> {
    const active = this.requireActive();
    assertSlideKey(slideKey);
    setSlideNotes(active.session, slideKey, rawNotes);
    await this.persist(active);
  }

  /**
   * Record the current notes as the new baseline, clearing reviews of slides
   * whose notes changed. Returns the cleared slide keys.
   */
  async lock(): Promise<SlideKey[]> {
    const active = this.requireActive();
    const cleared = lockSession(active.session);
    this.logger.info("Notes locked", { cleared });
    await this.persist(active);
    return cleared;
  }

  // ==========================================================================
  // Review
  // ==========================================================================

  /**
   * Review every slide that has notes but no cached review. Returns the
   * running run, or null when there is nothing to review. Missing
   * credentials and oversized documents are thrown before the run starts.
   * Overlapping calls share one run.
   */
  async startReview(): Promise<ReviewRun | null> {
    const active = this.requireActive();
    if (this.reviewRun?.state === "running") {
      return this.reviewRun;
    }
    if (this.reviewStart) {
      return this.reviewStart;
    }

    const starting = this.beginReview(active);
    this.reviewStart = starting;
    try {
      return await starting;
    } finally {
      if (this.reviewStart === starting) {
        this.reviewStart = null;
      }
    }
  }

  private async beginReview(active: ActiveLecture): Promise<ReviewRun | null> {
    const pending = collectSlidesNeedingReview(active.session);
    if (pending.size === 0) {
      const hasNotes = Object.values(active.session.slides).some(
        (slide) => parseAnnotations(slide.rawNotes).length > 0
      );
      this.emitEvent({
        type: "review-status",
        status: hasNotes ? REVIEW_STATUS.cached : REVIEW_STATUS.empty,
      });
      return null;
    }
    // Results only apply while the slide still holds the notes they were asked for
    const queuedNotes = new Map<SlideKey, string>();
    for (const slideKey of pending.keys()) {
      queuedNotes.set(slideKey, active.session.slides[slideKey]?.rawNotes ?? "");
    }

    const prepared = await this.prepare(active);
    if (!prepared) {
      return null;
    }

    const run = new ReviewRun(prepared.reviewer, prepared.document, pending, {
      logger: this.logger,
    });
    run.onEvent((event) => this.handleReviewEvent(active.generation, queuedNotes, event));
    this.reviewRun = run;
    this.emitEvent({ type: "review-status", status: REVIEW_STATUS.progress(0, pending.size) });
    this.track(run, run.start());
    return run;
  }

  async cancelReview(): Promise<void> {
    await this.settleReviewStart();
    const run = this.reviewRun;
    if (!run) {
      return;
    }
    const wasRunning = run.state === "running";
    await run.cancel();
    if (this.reviewRun === run) {
      this.reviewRun = null;
    }
    if (wasRunning) {
      this.emitEvent({ type: "review-status", status: REVIEW_STATUS.cancelled });
    }
  }

  /**
   * Re-review one item. Without `fresh`, only the response text of the item
   * at `index` is replaced and its follow-up thread stays. Resolves once the
   * result has been applied and saved.
   */
  async regenerate(
    slideKey: SlideKey,
    index: number,
    options: RegenerateOptions = {}
  ): Promise<void> {
    const active = this.requireActive();
    const item = requireItem(active.session, slideKey, index);
    const prepared = await this.prepare(active);
    if (!prepared) {
      return;
    }

    const block = { kind: item.kind, text: item.originalText };
    const run = new ReviewRun(
      prepared.reviewer,
      prepared.document,
      new Map([[slideKey, [block]]]),
      { logger: this.logger }
    );
    run.onEvent((event) =>
      this.handleRegenerateEvent(active.generation, slideKey, index, options.fresh ?? false, event)
    );
    await this.track(run, run.start());
    await this.saveChain;
  }

  /**
   * Ask a question about one item. The pair is appended to the thread only
   * when an answer arrives. Resolves once the result has been applied and
   * saved.
   */
  async askFollowUp(slideKey: SlideKey, index: number, question: string): Promise<void> {
    const active = this.requireActive();
    const trimmed = question.trim();
    if (!trimmed) {
      throw new ReviewTargetError("Follow-up question is empty.");
    }
    const item = requireItem(active.session, slideKey, index);
    const prepared = await this.prepare(active);
    if (!prepared) {
      return;
    }

    const exchange = new FollowUpExchange(
      prepared.reviewer,
      prepared.document,
      createFollowUpRequest(slideKey, item, trimmed),
      { logger: this.logger }
    );
    exchange.onEvent((event) =>
      this.handleFollowUpEvent(active.generation, slideKey, index, event)
    );
    await this.track(exchange, exchange.run());
    await this.saveChain;
  }

  // ==========================================================================
  // Background results
  // ==========================================================================

  private handleReviewEvent(
    generation: number,
    queuedNotes: ReadonlyMap<SlideKey, string>,
    event: ReviewRunEvent
  ): void {
    const active = this.current(generation);
    if (!active) {
      return;
    }

    switch (event.type) {
      case "slide-reviewed": {
        const slide = active.session.slides[event.slideKey];
        if (slide && slide.rawNotes === queuedNotes.get(event.slideKey)) {
          slide.review = event.items;
          this.persistInBackground(active);
          this.emitEvent({ type: "slide-reviewed", slideKey: event.slideKey, items: event.items });
        } else {
          this.logger.info("Dropped review of notes edited during the run", {
            slideKey: event.slideKey,
          });
        }
        this.emitProgress(event.progress.completed, event.progress.total);
        break;
      }
      case "slide-error":
        this.emitEvent({
          type: "slide-error",
          slideKey: event.slideKey,
          message: event.message,
          detail: event.detail,
          billing: event.billing,
        });
        this.emitProgress(event.progress.completed, event.progress.total);
        break;
      case "all-done":
        this.emitEvent({ type: "review-status", status: REVIEW_STATUS.complete });
        this.emitEvent({ type: "review-done" });
        break;
    }
  }

  private handleRegenerateEvent(
    generation: number,
    slideKey: SlideKey,
    index: number,
    fresh: boolean,
    event: ReviewRunEvent
  ): void {
    const active = this.current(generation);
    if (!active) {
      return;
    }

    if (event.type === "slide-error") {
      this.emitEvent({
        type: "regenerate-error",
        slideKey,
        index,
        message: event.message,
        detail: event.detail,
        billing: event.billing,
      });
      return;
    }
    if (event.type !== "slide-reviewed") {
      return;
    }

    const [regenerated] = event.items;
    const review = active.session.slides[slideKey]?.review;
    const current = review?.[index];
    if (!regenerated || !review || !current) {
      this.logger.warn("Regenerated item no longer exists", { slideKey, index });
      return;
    }

    let applied: ReviewItem;
    if (fresh) {
      applied = { ...regenerated, followups: [] };
      review[index] = applied;
    } else {
      current.responseText = regenerated.responseText;
      applied = current;
    }
    this.persistInBackground(active);
    this.emitEvent({ type: "item-regenerated", slideKey, index, item: applied });
  }

  private handleFollowUpEvent(
    generation: number,
    slideKey: SlideKey,
    index: number,
    event: FollowUpEvent
  ): void {
    const active = this.current(generation);
    if (!active) {
      return;
    }

    if (event.type === "failed") {
      this.emitEvent({
        type: "follow-up-error",
        slideKey,
        index,
        question: event.question,
        message: event.message,
        detail: event.detail,
        billing: event.billing,
      });
      return;
    }

    const target = active.session.slides[slideKey]?.review[index];
    if (!target) {
      this.logger.warn("Follow-up target no longer exists", { slideKey, index });
      return;
    }
    appendFollowUp(target, event.question, event.answer);
    this.persistInBackground(active);
    this.emitEvent({
      type: "follow-up-answered",
      slideKey,
      index,
      question: event.question,
      answer: event.answer,
    });
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private requireActive(): ActiveLecture {
    if (!this.active) {
      throw new ReviewTargetError("No lecture is open.");
    }
    return this.active;
  }

  private current(generation: number): ActiveLecture | null {
    return this.active && this.active.generation === generation ? this.active : null;
  }

  /**
   * Resolve the reviewer and load the document on first use. Returns null
   * when the lecture changed while loading.
   */
  private async prepare(
    active: ActiveLecture
  ): Promise<{ reviewer: NoteReviewer; document: LectureDocument } | null> {
    if (!active.reviewer) {
      active.reviewer = this.reviewerFactory(resolveReviewerSettings(active.settings, this.env));
    }
    if (!active.document) {
      const filePath = this.store.resolveDocumentPath(
        active.courseId,
        active.lectureId,
        active.session.pdfFilename
      );
      active.document = await this.loadDocument(filePath);
    }
    if (!this.current(active.generation)) {
      return null;
    }
    return { reviewer: active.reviewer, document: active.document };
  }

  private track(operation: Cancellable, completion: Promise<void>): Promise<void> {
    this.operations.add(operation);
    const settled = completion
      .catch((error: unknown) => {
        this.logger.error("Background operation failed", error);
      })
      .finally(() => {
        this.operations.delete(operation);
        this.inFlight.delete(settled);
      });
    this.inFlight.add(settled);
    return settled;
  }

  /** Wait for a review that is still resolving its reviewer or document */
  private async settleReviewStart(): Promise<void> {
    if (this.reviewStart) {
      await Promise.allSettled([this.reviewStart]);
    }
  }

  private async stopBackgroundWork(): Promise<void> {
    await this.settleReviewStart();
    await Promise.all([...this.operations].map((operation) => operation.cancel()));
    this.reviewRun = null;
  }

  private persist(active: ActiveLecture): Promise<void> {
    const { courseId, lectureId, session } = active;
    const save = this.saveChain.then(() => this.store.saveSession(courseId, lectureId, session));
    // Failures surface through `save`; later saves still run
    this.saveChain = save.catch(() => undefined);
    return save;
  }

  private persistInBackground(active: ActiveLecture): void {
    const saved = this.persist(active).catch((error: unknown) => {
      this.logger.error("Failed to save session", error);
      this.emitEvent({
        type: "save-error",
        message: error instanceof Error ? error.message : String(error),
      });
    });
    this.inFlight.add(saved);
    void saved.finally(() => this.inFlight.delete(saved));
  }

  private emitProgress(completed: number, total: number): void {
    this.emitEvent({ type: "review-status", status: REVIEW_STATUS.progress(completed, total) });
  }

  private emitEvent(event: ControllerEvent): void {
    this.emit(CONTROLLER_EVENT, event);
  }
}

function assertSlideKey(slideKey: string): void {
  if (!isSlideKey(slideKey)) {
    throw new ReviewTargetError(`Invalid slide number: ${slideKey}`);
  }
}

function requireItem(session: Session, slideKey: SlideKey, index: number): ReviewItem {
  const item = session.slides[slideKey]?.review[index];
  if (!item) {
    throw new ReviewTargetError(`Slide ${slideKey} has no review item ${index + 1}.`);
  }
  return item;
}
