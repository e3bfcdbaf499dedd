import type { ContentPart } from "@gloss/ai-core";
import type { LectureDocument } from "../document/lectureDocument";
import { buildLectureText } from "../review/prompts";
import { BaseNoteReviewer } from "./baseNoteReviewer";

/**
 * Chat completions take no documents: the lecture goes in as extracted page
 * text, rendered once per document and reused for every call.
 */
export class OpenAINoteReviewer extends BaseNoteReviewer {
  protected readonly delivery = "text";

  private readonly lectureTexts = new WeakMap<LectureDocument, Promise<string>>();

  protected async documentContext(document: LectureDocument): Promise<ContentPart[]> {
    return [{ type: "text", text: await this.lectureText(document) }];
  }

  private lectureText(document: LectureDocument): Promise<string> {
    let text = this.lectureTexts.get(document);
    if (!text) {
      text = document
        .pageTexts()
        .then(buildLectureText)
        .catch((error: unknown) => {
          this.lectureTexts.delete(document);
          throw error;
        });
      this.lectureTexts.set(document, text);
    }
    return text;
  }
}
