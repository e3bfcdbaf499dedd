import type { ContentPart } from "@gloss/ai-core";
import type { LectureDocument } from "../document/lectureDocument";
import { BaseNoteReviewer } from "./baseNoteReviewer";

/** Sends the PDF as inline data. */
export class GeminiNoteReviewer extends BaseNoteReviewer {
  protected readonly delivery = "pdf";

  protected async documentContext(document: LectureDocument): Promise<ContentPart[]> {
    return [{ type: "document", mediaType: document.mediaType, data: document.toBase64() }];
  }
}
