import { describe, expect, it } from "vitest";
import {
  collectCachedSlides,
  collectSlidesNeedingReview,
  computeInvalidation,
  lockSession,
} from "./reviewCache";
import { createEmptySession } from "./slides";
import type { ReviewItem, Session } from "./types";

function item(originalText: string, responseText = "ok"): ReviewItem {
  return { kind: "general", originalText, responseText, followups: [] };
}

function sessionWith(slides: Session["slides"], finalizedNotes: Record<string, string> = {}): Session {
  const session = createEmptySession("lecture-1", "Cells", "2026-01-01T00:00:00.000Z");
  session.slides = slides;
  session.finalizedNotes = finalizedNotes;
  return session;
}

describe("computeInvalidation", () => {
  it("clears a slide whose notes changed", () => {
    const result = computeInvalidation(
      { "1": "- a" },
      { "1": { rawNotes: "- b", review: [item("a")] } }
    );
    expect([...result.cleared]).toEqual(["1"]);
    expect(result.snapshot).toEqual({ "1": "- b" });
  });

  it("leaves a slide with unchanged notes alone", () => {
    const result = computeInvalidation(
      { "1": "- a" },
      { "1": { rawNotes: "- a", review: [item("a")] } }
    );
    expect(result.cleared.size).toBe(0);
  });

  it("clears slides that were not in the previous snapshot", () => {
    const result = computeInvalidation({}, { "4": { rawNotes: "? new", review: [] } });
    expect([...result.cleared]).toEqual(["4"]);
  });

  it("skips blank slides and leaves them out of the snapshot", () => {
    const result = computeInvalidation(
      { "2": "- old" },
      { "2": { rawNotes: "   ", review: [item("old")] } }
    );
    expect(result.cleared.size).toBe(0);
    expect(result.snapshot).toEqual({});
  });

  it("compares exact text, whitespace included", () => {
    const result = computeInvalidation(
      { "1": "- a" },
      { "1": { rawNotes: "- a ", review: [item("a")] } }
    );
    expect([...result.cleared]).toEqual(["1"]);
  });
});

describe("lockSession", () => {
  it("clears stale reviews and records the new baseline", () => {
    const session = sessionWith(
      {
        "10": { rawNotes: "- changed", review: [item("x")] },
        "2": { rawNotes: "- same", review: [item("same")] },
        "3": { rawNotes: "", review: [item("gone")] },
      },
      { "10": "- original", "2": "- same", "3": "- was here" }
    );

    expect(lockSession(session)).toEqual(["10"]);
    expect(session.slides["10"].review).toEqual([]);
    expect(session.slides["2"].review).toHaveLength(1);
    expect(session.slides["3"].review).toHaveLength(1);
    expect(session.finalized).toBe(true);
    expect(session.finalizedNotes).toEqual({ "10": "- changed", "2": "- same" });
  });
});

describe("collectSlidesNeedingReview", () => {
  it("returns un-reviewed annotated slides in ascending order", () => {
    const session = sessionWith({
      "12": { rawNotes: "? q", review: [] },
      "3": { rawNotes: "- a\n\n! b", review: [] },
      "5": { rawNotes: "- cached", review: [item("cached")] },
      "7": { rawNotes: "plain text without markers", review: [] },
    });

    const pending = collectSlidesNeedingReview(session);
    expect([...pending.keys()]).toEqual(["3", "12"]);
    expect(pending.get("3")).toEqual([
      { kind: "general", text: "a" },
      { kind: "important", text: "b" },
    ]);
  });
});

describe("collectCachedSlides", () => {
  it("lists annotated slides with a cached review", () => {
    const session = sessionWith({
      "9": { rawNotes: "- x", review: [item("x")] },
      "1": { rawNotes: "- y", review: [item("y")] },
      "4": { rawNotes: "- z", review: [] },
      "6": { rawNotes: "", review: [item("stale")] },
    });
    expect(collectCachedSlides(session)).toEqual(["1", "9"]);
  });
});
