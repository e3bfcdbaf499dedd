/**
 * Lecture document
 *
 * A lecture's PDF as the reviewers need it: raw bytes, a base64 payload for
 * vendors that accept documents natively, and per-page text for vendors that
 * do not. Both derived forms are computed at most once per instance.
 */

import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import { extractText } from "unpdf";
import { DocumentTooLargeError } from "../errors";

/** Hard ceiling enforced before any provider call */
export const MAX_DOCUMENT_BYTES = 32 * 1024 * 1024;

export const PDF_MEDIA_TYPE = "application/pdf";

export type PageTextExtractor = (bytes: Uint8Array) => Promise<string[]>;

export interface LectureDocumentOptions {
  maxBytes?: number;
  extractPageTexts?: PageTextExtractor;
}

export function assertDocumentSize(size: number, maxBytes: number = MAX_DOCUMENT_BYTES): void {
  if (size > maxBytes) {
    throw new DocumentTooLargeError(size, maxBytes);
  }
}

export const extractPdfPageTexts: PageTextExtractor = async (bytes) => {
  // unpdf may transfer the buffer to its worker; hand it a copy
  const { text } = await extractText(new Uint8Array(bytes), { mergePages: false });
  return Array.isArray(text) ? text : [text];
};

export class LectureDocument {
  readonly name: string;
  readonly mediaType = PDF_MEDIA_TYPE;

  private readonly bytes: Uint8Array;
  private readonly extractPageTexts: PageTextExtractor;
  private base64: string | null = null;
  private pageTextsPromise: Promise<string[]> | null = null;

  constructor(bytes: Uint8Array, name: string, options: LectureDocumentOptions = {}) {
    assertDocumentSize(bytes.byteLength, options.maxBytes);
    this.bytes = bytes;
    this.name = name;
    this.extractPageTexts = options.extractPageTexts ?? extractPdfPageTexts;
  }

  /**
   * Load a PDF from disk. The size check runs on the file's metadata before
   * any bytes are read.
   */
  static async fromFile(
    filePath: string,
    options: LectureDocumentOptions = {}
  ): Promise<LectureDocument> {
    const info = await stat(filePath);
    assertDocumentSize(info.size, options.maxBytes);
    const bytes = await readFile(filePath);
    return new LectureDocument(new Uint8Array(bytes), path.basename(filePath), options);
  }

  get size(): number {
    return this.bytes.byteLength;
  }

  toBase64(): string {
    if (this.base64 === null) {
      this.base64 = Buffer.from(this.bytes).toString("base64");
    }
    return this.base64;
  }

  /**
   * Text of each page, in page order. A failed extraction is not cached.
   */
  pageTexts(): Promise<string[]> {
    if (!this.pageTextsPromise) {
      this.pageTextsPromise = this.extractPageTexts(this.bytes).catch((error: unknown) => {
        this.pageTextsPromise = null;
        throw error;
      });
    }
    return this.pageTextsPromise;
  }
}
