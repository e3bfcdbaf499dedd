import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SessionFormatError, SessionNotFoundError } from "../errors";
import { createEmptySession, setSlideNotes } from "../session/slides";
import { FileSessionStore } from "./sessionStore";

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(path.join(os.tmpdir(), "gloss-store-"));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

describe("FileSessionStore", () => {
  it("saves under the course and lecture directory and loads it back", async () => {
    const store = new FileSessionStore({
      dataDir: tempDir,
      now: () => new Date("2026-05-01T12:00:00.000Z"),
    });
    const session = createEmptySession("lec-1", "Cells", "2026-04-01T00:00:00.000Z");
    setSlideNotes(session, "2", "? What is ATP?");

    await store.saveSession("bio-101", "lec-1", session);

    const filePath = path.join(tempDir, "courses", "bio-101", "lectures", "lec-1", "session.json");
    const text = await readFile(filePath, "utf8");
    expect(JSON.parse(text)).toEqual({
      id: "lec-1",
      title: "Cells",
      pdf_filename: "slides.pdf",
      created_at: "2026-04-01T00:00:00.000Z",
      updated_at: "2026-05-01T12:00:00.000Z",
      slides: { "2": { raw_notes: "? What is ATP?", review: [] } },
      order: 0,
    });

    const loaded = await store.loadSession("bio-101", "lec-1");
    expect(loaded).toEqual(session);
  });

  it("throws SessionNotFoundError for a missing lecture", async () => {
    const store = new FileSessionStore({ dataDir: tempDir });
    await expect(store.loadSession("bio-101", "nope")).rejects.toBeInstanceOf(SessionNotFoundError);
  });

  it("throws SessionFormatError for a corrupt file", async () => {
    const store = new FileSessionStore({ dataDir: tempDir });
    const filePath = store.sessionPath("bio-101", "lec-1");
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, "{", "utf8");

    await expect(store.loadSession("bio-101", "lec-1")).rejects.toBeInstanceOf(SessionFormatError);
  });

  it("resolves the lecture PDF next to the session", () => {
    const store = new FileSessionStore({ dataDir: tempDir });
    expect(store.resolveDocumentPath("bio-101", "lec-1", "week1.pdf")).toBe(
      path.join(tempDir, "courses", "bio-101", "lectures", "lec-1", "week1.pdf")
    );
  });
});
