/**
 * Slide entry helpers that keep the session's materialization rule:
 * a slide key exists only while it has non-blank notes or a review.
 */

import type { Session, SlideData, SlideKey } from "./types";

export function setSlideNotes(session: Session, slideKey: SlideKey, rawNotes: string): void {
  const existing = session.slides[slideKey];
  if (existing) {
    existing.rawNotes = rawNotes;
    if (!rawNotes.trim() && existing.review.length === 0) {
      delete session.slides[slideKey];
    }
    return;
  }
  if (rawNotes.trim()) {
    session.slides[slideKey] = { rawNotes, review: [] };
  }
}

export function getSlide(session: Session, slideKey: SlideKey): SlideData | undefined {
  return session.slides[slideKey];
}

export function createEmptySession(
  id: string,
  title: string,
  now: string = new Date().toISOString()
): Session {
  return {
    id,
    title,
    pdfFilename: "slides.pdf",
    createdAt: now,
    updatedAt: now,
    order: 0,
    slides: {},
    finalized: false,
    finalizedNotes: {},
  };
}
