/**
 * Review cache policy
 *
 * Reviews are cached per slide. Locking compares each slide's current notes
 * with the notes captured at the previous lock; any difference discards that
 * slide's cached review. Slides that are now blank keep whatever they had.
 */

import { parseAnnotations } from "../notes/annotationParser";
import {
  type AnnotationBlock,
  compareSlideKeys,
  type Session,
  type SlideData,
  type SlideKey,
} from "./types";

export interface InvalidationResult {
  /** Slides whose cached review must be cleared */
  cleared: Set<SlideKey>;
  /** New lock baseline: exact notes of every non-blank slide */
  snapshot: Record<SlideKey, string>;
}

export function computeInvalidation(
  oldSnapshot: Readonly<Record<SlideKey, string>>,
  slides: Readonly<Record<SlideKey, SlideData>>
): InvalidationResult {
  const snapshot: Record<SlideKey, string> = {};
  for (const [key, slide] of Object.entries(slides)) {
    if (slide.rawNotes.trim()) {
      snapshot[key] = slide.rawNotes;
    }
  }

  const cleared = new Set<SlideKey>();
  for (const [key, notes] of Object.entries(snapshot)) {
    if (notes !== (oldSnapshot[key] ?? "")) {
      cleared.add(key);
    }
  }

  return { cleared, snapshot };
}

/**
 * Lock the session's notes: clear stale reviews and record the new baseline.
 * Returns the cleared slide keys in ascending order.
 */
export function lockSession(session: Session): SlideKey[] {
  const { cleared, snapshot } = computeInvalidation(session.finalizedNotes, session.slides);
  for (const key of cleared) {
    const slide = session.slides[key];
    if (slide) {
      slide.review = [];
    }
  }
  session.finalizedNotes = snapshot;
  session.finalized = true;
  return [...cleared].sort(compareSlideKeys);
}

/**
 * Slides with at least one annotation and no cached review, ascending.
 */
export function collectSlidesNeedingReview(session: Session): Map<SlideKey, AnnotationBlock[]> {
  const pending = new Map<SlideKey, AnnotationBlock[]>();
  for (const key of Object.keys(session.slides).sort(compareSlideKeys)) {
    const slide = session.slides[key];
    if (slide.review.length > 0) {
      continue;
    }
    const blocks = parseAnnotations(slide.rawNotes);
    if (blocks.length > 0) {
      pending.set(key, blocks);
    }
  }
  return pending;
}

/**
 * Slides with at least one annotation whose review is cached, ascending.
 */
export function collectCachedSlides(session: Session): SlideKey[] {
  return Object.keys(session.slides)
    .sort(compareSlideKeys)
    .filter((key) => {
      const slide = session.slides[key];
      return slide.review.length > 0 && parseAnnotations(slide.rawNotes).length > 0;
    });
}
