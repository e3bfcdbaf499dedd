import { describe, expect, it } from "vitest";
import { ANNOTATION_KINDS } from "../session/types";
import {
  ANNOTATION_MARKERS,
  markerForKind,
  parseAnnotations,
  serializeAnnotations,
} from "./annotationParser";

describe("parseAnnotations", () => {
  it.each([
    ["-", "general"],
    ["?", "question"],
    ["~", "uncertain"],
    ["!", "important"],
  ] as const)("parses a single %s line as %s", (marker, kind) => {
    expect(parseAnnotations(`${marker} hello`)).toEqual([{ kind, text: "hello" }]);
  });

  it("accumulates continuation lines until a blank line", () => {
    expect(parseAnnotations("- line1\nline2\n\n? q1")).toEqual([
      { kind: "general", text: "line1\nline2" },
      { kind: "question", text: "q1" },
    ]);
  });

  it("returns nothing for blank input", () => {
    expect(parseAnnotations("")).toEqual([]);
    expect(parseAnnotations("  \n\t\n   ")).toEqual([]);
  });

  it("drops lines that are not inside a block", () => {
    expect(parseAnnotations("just some text\nmore text")).toEqual([]);
    expect(parseAnnotations("orphan\n\n! key point\n\nanother orphan")).toEqual([
      { kind: "important", text: "key point" },
    ]);
  });

  it("starts a new block on a marker line without a blank line", () => {
    expect(parseAnnotations("- first\n? second\n~ third")).toEqual([
      { kind: "general", text: "first" },
      { kind: "question", text: "second" },
      { kind: "uncertain", text: "third" },
    ]);
  });

  it("strips at most one space after the marker and trims the block", () => {
    expect(parseAnnotations("-no space")).toEqual([{ kind: "general", text: "no space" }]);
    expect(parseAnnotations("?    padded   ")).toEqual([{ kind: "question", text: "padded" }]);
  });

  it("recognises markers after leading whitespace", () => {
    expect(parseAnnotations("   ! indented\n     continued")).toEqual([
      { kind: "important", text: "indented\ncontinued" },
    ]);
  });

  it("lets an empty marker line collect continuations", () => {
    expect(parseAnnotations("?\nwhat is entropy?")).toEqual([
      { kind: "question", text: "what is entropy?" },
    ]);
  });

  it("keeps an empty marker open across blank lines", () => {
    expect(parseAnnotations("?\n\nwhat is entropy?")).toEqual([
      { kind: "question", text: "what is entropy?" },
    ]);
    expect(parseAnnotations("!\n\n\nexam topic\n\nstray line")).toEqual([
      { kind: "important", text: "exam topic" },
    ]);
  });

  it("does not emit a marker with nothing after it", () => {
    expect(parseAnnotations("-\n\n? real")).toEqual([{ kind: "question", text: "real" }]);
  });

  it("treats a marker inside a line as plain text", () => {
    expect(parseAnnotations("- cost - benefit")).toEqual([
      { kind: "general", text: "cost - benefit" },
    ]);
  });

  it("parses the mitochondria notes into two blocks", () => {
    expect(parseAnnotations("- The mitochondria is the powerhouse\n\n? What is ATP?")).toEqual([
      { kind: "general", text: "The mitochondria is the powerhouse" },
      { kind: "question", text: "What is ATP?" },
    ]);
  });
});

describe("serializeAnnotations", () => {
  it("re-parses to the same blocks", () => {
    const text = "- alpha\nbeta\n\n? gamma\n\n~ delta\n\n! epsilon";
    const blocks = parseAnnotations(text);
    expect(parseAnnotations(serializeAnnotations(blocks))).toEqual(blocks);
  });

  it("writes marker, space and text separated by blank lines", () => {
    expect(
      serializeAnnotations([
        { kind: "uncertain", text: "maybe" },
        { kind: "important", text: "exam" },
      ])
    ).toBe("~ maybe\n\n! exam");
  });
});

describe("marker table", () => {
  it("maps every kind back to its marker", () => {
    for (const kind of ANNOTATION_KINDS) {
      expect(ANNOTATION_MARKERS[markerForKind(kind)]).toBe(kind);
    }
  });
});
