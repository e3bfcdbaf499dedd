/**
 * Annotation parser
 *
 * Turns free-form slide notes into typed blocks. A line whose first
 * non-whitespace character is a marker starts a block; following non-blank
 * lines continue it; a blank line ends it once it holds any text.
 *
 *   - general      ? question      ~ uncertain      ! important
 */

import type { AnnotationBlock, AnnotationKind } from "../session/types";

export const ANNOTATION_MARKERS: Readonly<Partial<Record<string, AnnotationKind>>> = {
  "-": "general",
  "?": "question",
  "~": "uncertain",
  "!": "important",
};

const MARKER_BY_KIND: Readonly<Record<AnnotationKind, string>> = {
  general: "-",
  question: "?",
  uncertain: "~",
  important: "!",
};

export function markerForKind(kind: AnnotationKind): string {
  return MARKER_BY_KIND[kind];
}

export function parseAnnotations(rawNotes: string): AnnotationBlock[] {
  if (!rawNotes.trim()) {
    return [];
  }

  const blocks: AnnotationBlock[] = [];
  let currentKind: AnnotationKind | null = null;
  let currentLines: string[] = [];

  // A block opened by a bare marker stays open until it has collected a line
  const flush = () => {
    if (currentKind && currentLines.length > 0) {
      blocks.push({ kind: currentKind, text: currentLines.join("\n").trim() });
      currentKind = null;
      currentLines = [];
    }
  };

  for (const line of rawNotes.split("\n")) {
    const stripped = line.trim();

    if (!stripped) {
      flush();
      continue;
    }

    const kind = ANNOTATION_MARKERS[stripped[0]];
    if (kind) {
      flush();
      let rest = stripped.slice(1);
      if (rest.startsWith(" ")) {
        rest = rest.slice(1);
      }
      currentKind = kind;
      currentLines = rest ? [rest] : [];
    } else if (currentKind) {
      currentLines.push(stripped);
    }
  }

  flush();
  return blocks;
}

/**
 * Render blocks back to marker syntax, one blank line between blocks.
 */
export function serializeAnnotations(blocks: readonly AnnotationBlock[]): string {
  return blocks.map((block) => `${markerForKind(block.kind)} ${block.text}`).join("\n\n");
}
