import { describe, expect, it } from "vitest";
import { SessionFormatError } from "../errors";
import { decodeSession, encodeSession, parseSessionJson, serializeSession } from "./sessionCodec";
import { createEmptySession } from "./slides";

const storedSession = {
  id: "lec-1",
  title: "Cell Biology",
  pdf_filename: "week1.pdf",
  created_at: "2026-02-01T10:00:00.000Z",
  updated_at: "2026-02-02T10:00:00.000Z",
  slides: {
    "2": {
      raw_notes: "- The mitochondria is the powerhouse\n\n? What is ATP?",
      review: [
        {
          note_type: "general",
          original: "The mitochondria is the powerhouse",
          response: "Correct!",
          followups: [
            { role: "user", text: "Why?" },
            { role: "assistant", text: "Because it makes ATP." },
          ],
        },
        { note_type: "question", original: "What is ATP?", response: "ATP is...", followups: [] },
      ],
    },
  },
  order: 3,
  finalized: true,
  finalized_notes: { "2": "- The mitochondria is the powerhouse\n\n? What is ATP?" },
};

describe("decodeSession", () => {
  it("maps the stored shape to the session model", () => {
    const session = decodeSession(storedSession);
    expect(session.pdfFilename).toBe("week1.pdf");
    expect(session.order).toBe(3);
    expect(session.finalized).toBe(true);
    expect(session.slides["2"].review[0]).toEqual({
      kind: "general",
      originalText: "The mitochondria is the powerhouse",
      responseText: "Correct!",
      followups: [
        { role: "user", text: "Why?" },
        { role: "assistant", text: "Because it makes ATP." },
      ],
    });
  });

  it("fills defaults for optional fields", () => {
    const session = decodeSession({
      id: "lec-2",
      title: "Intro",
      created_at: "2026-02-01T10:00:00.000Z",
      updated_at: "2026-02-01T10:00:00.000Z",
      slides: { "1": { raw_notes: "- hi", review: [{ note_type: "general", original: "hi", response: "ok" }] } },
    });
    expect(session.pdfFilename).toBe("slides.pdf");
    expect(session.order).toBe(0);
    expect(session.finalized).toBe(false);
    expect(session.finalizedNotes).toEqual({});
    expect(session.slides["1"].review[0].followups).toEqual([]);
  });

  it("reads an unknown note type as general", () => {
    const session = decodeSession({
      ...storedSession,
      slides: { "1": { raw_notes: "", review: [{ note_type: "aside", original: "o", response: "r" }] } },
    });
    expect(session.slides["1"].review[0].kind).toBe("general");
  });

  it("rejects malformed sessions", () => {
    expect(() => decodeSession({ title: "no id" })).toThrow(SessionFormatError);
    expect(() => decodeSession({ ...storedSession, slides: { zero: { raw_notes: "" } } })).toThrow(
      SessionFormatError
    );
  });
});

describe("encodeSession", () => {
  it("writes back the same shape it read", () => {
    expect(encodeSession(decodeSession(storedSession))).toEqual(storedSession);
  });

  it("omits finalized fields for sessions never locked", () => {
    const encoded = encodeSession(createEmptySession("lec-3", "Draft", "2026-03-01T00:00:00.000Z"));
    expect(encoded).toEqual({
      id: "lec-3",
      title: "Draft",
      pdf_filename: "slides.pdf",
      created_at: "2026-03-01T00:00:00.000Z",
      updated_at: "2026-03-01T00:00:00.000Z",
      slides: {},
      order: 0,
    });
  });
});

describe("JSON text", () => {
  it("round-trips through text with two-space indentation", () => {
    const text = serializeSession(decodeSession(storedSession));
    expect(text.startsWith('{\n  "id": "lec-1",')).toBe(true);
    expect(text.endsWith("}\n")).toBe(true);
    expect(encodeSession(parseSessionJson(text))).toEqual(storedSession);
  });

  it("rejects text that is not JSON", () => {
    expect(() => parseSessionJson("{ not json")).toThrow(SessionFormatError);
  });
});
