import type { ContentPart } from "@gloss/ai-core";
import type { LectureDocument } from "../document/lectureDocument";
import { BaseNoteReviewer } from "./baseNoteReviewer";

/**
 * Sends the PDF natively and marks it cacheable, so every slide of a lecture
 * shares one cached prompt prefix.
 */
export class AnthropicNoteReviewer extends BaseNoteReviewer {
  protected readonly delivery = "pdf";

  protected async documentContext(document: LectureDocument): Promise<ContentPart[]> {
    return [
      { type: "document", mediaType: document.mediaType, data: document.toBase64(), cache: true },
    ];
  }
}
