/**
 * Session JSON codec
 *
 * Decodes and encodes the on-disk `session.json` shape. Field names are
 * snake_case on disk and camelCase in memory.
 */

import { z } from "zod";
import { SessionFormatError } from "../errors";
import { ANNOTATION_KINDS, type ReviewItem, type Session, type SlideData } from "./types";

// ============================================================================
// Stored schema
// ============================================================================

const SlideKeySchema = z.string().regex(/^[1-9]\d*$/, "slide keys are 1-indexed page numbers");

export const StoredFollowupSchema = z.object({
  role: z.enum(["user", "assistant"]),
  text: z.string(),
});

export const StoredReviewItemSchema = z.object({
  note_type: z.enum(ANNOTATION_KINDS).catch("general"),
  original: z.string(),
  response: z.string(),
  followups: z.array(StoredFollowupSchema).default([]),
});

export const StoredSlideSchema = z.object({
  raw_notes: z.string().default(""),
  review: z.array(StoredReviewItemSchema).default([]),
});

export const StoredSessionSchema = z.object({
  id: z.string(),
  title: z.string(),
  pdf_filename: z.string().default("slides.pdf"),
  created_at: z.string(),
  updated_at: z.string(),
  slides: z.record(SlideKeySchema, StoredSlideSchema).default({}),
  order: z.number().int().default(0),
  finalized: z.boolean().default(false),
  finalized_notes: z.record(SlideKeySchema, z.string()).default({}),
});

export type StoredReviewItem = z.infer<typeof StoredReviewItemSchema>;
export type StoredSlide = z.infer<typeof StoredSlideSchema>;

/** Encoded form; finalized fields are only written for finalized sessions */
export interface StoredSession {
  id: string;
  title: string;
  pdf_filename: string;
  created_at: string;
  updated_at: string;
  slides: Record<string, StoredSlide>;
  order: number;
  finalized?: true;
  finalized_notes?: Record<string, string>;
}

// ============================================================================
// Decode
// ============================================================================

export function decodeSession(json: unknown): Session {
  const parsed = StoredSessionSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new SessionFormatError(`Invalid session file: ${issues}`, { cause: parsed.error });
  }

  const data = parsed.data;
  const slides: Record<string, SlideData> = {};
  for (const [key, slide] of Object.entries(data.slides)) {
    slides[key] = {
      rawNotes: slide.raw_notes,
      review: slide.review.map(decodeReviewItem),
    };
  }

  return {
    id: data.id,
    title: data.title,
    pdfFilename: data.pdf_filename,
    createdAt: data.created_at,
    updatedAt: data.updated_at,
    order: data.order,
    slides,
    finalized: data.finalized,
    finalizedNotes: { ...data.finalized_notes },
  };
}

function decodeReviewItem(item: StoredReviewItem): ReviewItem {
  return {
    kind: item.note_type,
    originalText: item.original,
    responseText: item.response,
    followups: item.followups.map((message) => ({ ...message })),
  };
}

// ============================================================================
// Encode
// ============================================================================

export function encodeSession(session: Session): StoredSession {
  const slides: Record<string, StoredSlide> = {};
  for (const [key, slide] of Object.entries(session.slides)) {
    slides[key] = {
      raw_notes: slide.rawNotes,
      review: slide.review.map(encodeReviewItem),
    };
  }

  const stored: StoredSession = {
    id: session.id,
    title: session.title,
    pdf_filename: session.pdfFilename,
    created_at: session.createdAt,
    updated_at: session.updatedAt,
    slides,
    order: session.order,
  };
  if (session.finalized) {
    stored.finalized = true;
    stored.finalized_notes = { ...session.finalizedNotes };
  }
  return stored;
}

function encodeReviewItem(item: ReviewItem): StoredReviewItem {
  return {
    note_type: item.kind,
    original: item.originalText,
    response: item.responseText,
    followups: item.followups.map((message) => ({ role: message.role, text: message.text })),
  };
}

// ============================================================================
// Text
// ============================================================================

export function parseSessionJson(text: string): Session {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new SessionFormatError("Session file is not valid JSON", { cause: error });
  }
  return decodeSession(raw);
}

export function serializeSession(session: Session): string {
  return `${JSON.stringify(encodeSession(session), null, 2)}\n`;
}
