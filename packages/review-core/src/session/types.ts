/**
 * Lecture session model
 *
 * In-memory shape of one lecture's notes and reviews. The persisted JSON
 * shape lives in sessionCodec.ts.
 */

export const ANNOTATION_KINDS = ["general", "question", "uncertain", "important"] as const;

export type AnnotationKind = (typeof ANNOTATION_KINDS)[number];

/** One parsed unit of note text; produced fresh on every parse */
export interface AnnotationBlock {
  kind: AnnotationKind;
  text: string;
}

export type FollowupRole = "user" | "assistant";

/** One turn of a follow-up thread; threads alternate starting with the user */
export interface FollowupMessage {
  role: FollowupRole;
  text: string;
}

/** A note paired with the model's response and any follow-up thread */
export interface ReviewItem {
  kind: AnnotationKind;
  originalText: string;
  responseText: string;
  followups: FollowupMessage[];
}

export interface SlideData {
  rawNotes: string;
  /** Empty until every block of rawNotes has been reviewed at least once */
  review: ReviewItem[];
}

/** Slide keys are 1-indexed page numbers rendered as strings */
export type SlideKey = string;

export interface Session {
  id: string;
  title: string;
  pdfFilename: string;
  createdAt: string;
  updatedAt: string;
  order: number;
  slides: Record<SlideKey, SlideData>;
  finalized: boolean;
  /** rawNotes per slide as of the last lock */
  finalizedNotes: Record<SlideKey, string>;
}

export function compareSlideKeys(a: SlideKey, b: SlideKey): number {
  return Number(a) - Number(b);
}

export function isSlideKey(value: string): boolean {
  return /^[1-9]\d*$/.test(value);
}
