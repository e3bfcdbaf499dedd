/**
 * Review prompts
 *
 * The system prompt describes how each note kind is answered and fixes the
 * output format: one answer per note, in order, separated by a line that
 * holds only the separator token.
 */

import type { AnnotationBlock, AnnotationKind } from "../session/types";

export const RESPONSE_SEPARATOR = "---";

export const NOTE_KIND_LABELS: Readonly<Record<AnnotationKind, string>> = {
  general: "GENERAL",
  question: "QUESTION",
  uncertain: "UNCERTAIN",
  important: "IMPORTANT",
};

/** How the lecture reaches the model */
export type DocumentDelivery = "pdf" | "text";

const DELIVERY_INTRO: Record<DocumentDelivery, string> = {
  pdf: "1. The full lecture PDF",
  text: "1. The full lecture content as extracted text, slide by slide",
};

const DELIVERY_CONTEXT: Record<DocumentDelivery, string> = {
  pdf: "You have the full lecture PDF for broader context",
  text: "Use the full lecture text for broader context",
};

export function buildSystemPrompt(delivery: DocumentDelivery): string {
  return [
    "You are a study assistant helping a student review their lecture notes.",
    "You will receive:",
    DELIVERY_INTRO[delivery],
    "2. A specific slide number the student was on",
    "3. One or more student notes about that slide, each with a type indicator",
    "",
    "Your role depends on the note type:",
    "- GENERAL: Check against the slide content for accuracy. If the note contains a misunderstanding, gently correct it with specifics from the slide. If correct, briefly confirm.",
    "- QUESTION: Answer using the slide content as primary context. Be thorough but concise. If the slide doesn't contain enough info, say so and provide what you can.",
    "- UNCERTAIN: The student is unsure. Compare their understanding against the slide. If wrong, gently correct with specifics. If right, confirm and reinforce.",
    "- IMPORTANT: The student flagged this as high-priority. Provide a focused summary of the key concepts from this slide that relate to their note.",
    "",
    `Keep responses focused and educational. Reference the slide content specifically when possible. ${DELIVERY_CONTEXT[delivery]} but focus on the specific slide referenced.`,
    "",
    `FORMAT: You will receive multiple notes separated by numbered headers. Respond to each note in the same order, separating your responses with a line containing only "${RESPONSE_SEPARATOR}". Do NOT include the note headers or numbers in your response, just the responses separated by ${RESPONSE_SEPARATOR}.`,
  ].join("\n");
}

export function slideLine(slideNumber: number): string {
  return `The student is on SLIDE ${slideNumber} of this lecture.`;
}

export function buildNotesPrompt(slideNumber: number, blocks: readonly AnnotationBlock[]): string {
  const notes = blocks.map(
    (block, index) => `Note ${index + 1} (${NOTE_KIND_LABELS[block.kind]}):\n${block.text}`
  );
  return `${slideLine(slideNumber)}\n\n${notes.join("\n\n")}`;
}

export function buildSingleNotePrompt(
  slideNumber: number,
  kind: AnnotationKind,
  originalText: string
): string {
  return `${slideLine(slideNumber)}\n\nNote (${NOTE_KIND_LABELS[kind]}):\n${originalText}`;
}

export const EMPTY_PAGE_TEXT = "(no extractable text)";

/**
 * Render extracted page texts as one labelled lecture transcript.
 */
export function buildLectureText(pageTexts: readonly string[]): string {
  const slides = pageTexts.map(
    (text, index) => `[Slide ${index + 1}]\n${text.trim() ? text : EMPTY_PAGE_TEXT}`
  );
  return `LECTURE CONTENT:\n${slides.join("\n\n")}`;
}
