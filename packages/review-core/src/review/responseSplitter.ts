/**
 * Splits one batched model answer into per-note responses.
 *
 * Matching is positional: segment i answers block i. The strict split uses a
 * line holding only the separator; when that yields too few segments the
 * bare token is tried. Notes still without a segment get a placeholder.
 *
 * Known limitation: a separator inside a legitimate answer (a markdown rule,
 * for instance) shifts every later segment by one.
 */

import type { AnnotationBlock, ReviewItem } from "../session/types";
import { RESPONSE_SEPARATOR } from "./prompts";

export const NO_RESPONSE_PLACEHOLDER = "(No response received)";

export function splitResponseSegments(responseText: string, expected: number): string[] {
  const normalized = responseText.replace(/\r\n/g, "\n");
  let parts = normalized
    .split(`\n${RESPONSE_SEPARATOR}\n`)
    .map((part) => part.trim());

  if (parts.length < expected) {
    parts = normalized.split(RESPONSE_SEPARATOR).map((part) => part.trim());
  }

  return parts;
}

export function splitReviewResponse(
  blocks: readonly AnnotationBlock[],
  responseText: string
): ReviewItem[] {
  const parts = splitResponseSegments(responseText, blocks.length);
  return blocks.map((block, index) => ({
    kind: block.kind,
    originalText: block.text,
    responseText: index < parts.length ? parts[index] : NO_RESPONSE_PLACEHOLDER,
    followups: [],
  }));
}
