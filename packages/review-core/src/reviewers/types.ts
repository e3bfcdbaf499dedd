import type { LectureDocument } from "../document/lectureDocument";
import type { AnnotationBlock, AnnotationKind, FollowupMessage, ReviewItem } from "../session/types";

export interface ReviewCallOptions {
  signal?: AbortSignal;
}

/** Everything a follow-up call needs, copied out of the session */
export interface FollowUpRequest {
  slideNumber: number;
  kind: AnnotationKind;
  originalText: string;
  responseText: string;
  /** Prior follow-up turns, oldest first */
  history: readonly FollowupMessage[];
  question: string;
}

/**
 * Vendor-neutral review capability. One instance serves one opened lecture.
 */
export interface NoteReviewer {
  readonly provider: string;

  /** One completion call; returns exactly one item per block, in block order */
  reviewNotes(
    document: LectureDocument,
    slideNumber: number,
    blocks: readonly AnnotationBlock[],
    options?: ReviewCallOptions
  ): Promise<ReviewItem[]>;

  followUp(
    document: LectureDocument,
    request: FollowUpRequest,
    options?: ReviewCallOptions
  ): Promise<string>;
}
