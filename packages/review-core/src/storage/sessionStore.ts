/**
 * Session Store
 *
 * One `session.json` per lecture under
 * `<dataDir>/courses/<course>/lectures/<lecture>/`, next to the lecture PDF.
 */

import { readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { ensureDir, resolveDataDir, resolveLectureDir } from "../config/statePaths";
import { SessionNotFoundError } from "../errors";
import { parseSessionJson, serializeSession } from "../session/sessionCodec";
import type { Session } from "../session/types";

export interface SessionStore {
  loadSession(courseId: string, lectureId: string): Promise<Session>;
  saveSession(courseId: string, lectureId: string, session: Session): Promise<void>;
  resolveDocumentPath(courseId: string, lectureId: string, pdfFilename: string): string;
}

export interface FileSessionStoreOptions {
  dataDir?: string;
  /** Clock used for `updatedAt`; defaults to the wall clock */
  now?: () => Date;
}

const SESSION_FILE = "session.json";

export class FileSessionStore implements SessionStore {
  readonly dataDir: string;
  private readonly now: () => Date;

  constructor(options: FileSessionStoreOptions = {}) {
    this.dataDir = options.dataDir ?? resolveDataDir();
    this.now = options.now ?? (() => new Date());
  }

  sessionPath(courseId: string, lectureId: string): string {
    return path.join(resolveLectureDir(this.dataDir, courseId, lectureId), SESSION_FILE);
  }

  async loadSession(courseId: string, lectureId: string): Promise<Session> {
    const filePath = this.sessionPath(courseId, lectureId);
    let data: string;
    try {
      data = await readFile(filePath, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        throw new SessionNotFoundError(filePath);
      }
      throw error;
    }
    return parseSessionJson(data);
  }

  /** Refreshes `updatedAt`; writes go through a temp file and a rename. */
  async saveSession(courseId: string, lectureId: string, session: Session): Promise<void> {
    session.updatedAt = this.now().toISOString();
    const filePath = this.sessionPath(courseId, lectureId);
    await ensureDir(path.dirname(filePath));
    const tempPath = `${filePath}.tmp`;
    await writeFile(tempPath, serializeSession(session), "utf8");
    await rename(tempPath, filePath);
  }

  resolveDocumentPath(courseId: string, lectureId: string, pdfFilename: string): string {
    return path.join(resolveLectureDir(this.dataDir, courseId, lectureId), pdfFilename);
  }
}
