import {
  type ControllerEvent,
  compareSlideKeys,
  NOTE_KIND_LABELS,
  type ReviewItem,
  type Session,
  type SlideKey,
} from "@gloss/review-core";

export type OutputFormat = "text" | "json" | "markdown";

export function formatReviewItem(slideKey: SlideKey, index: number, item: ReviewItem): string {
  const lines = [
    `[Slide ${slideKey} #${index + 1}] ${NOTE_KIND_LABELS[item.kind]}`,
    `Note: ${item.originalText}`,
    `Response: ${item.responseText}`,
  ];
  for (const message of item.followups) {
    lines.push(`> ${message.role === "user" ? "You" : "Reviewer"}: ${message.text}`);
  }
  return lines.join("\n");
}

export function formatSessionReview(session: Session, output: OutputFormat): string {
  const slides = reviewedSlides(session);

  if (output === "json") {
    return JSON.stringify(
      {
        id: session.id,
        title: session.title,
        finalized: session.finalized,
        slides: slides.map(([slideKey, items]) => ({ slide: Number(slideKey), items })),
      },
      null,
      2
    );
  }

  if (output === "markdown") {
    return formatMarkdownReview(session.title, slides);
  }

  if (slides.length === 0) {
    return "<no reviews>";
  }
  return slides
    .flatMap(([slideKey, items]) =>
      items.map((item, index) => formatReviewItem(slideKey, index, item))
    )
    .join("\n\n");
}

/**
 * Render a controller event as terminal lines. Returns null for events the
 * terminal does not show.
 */
export function formatControllerEvent(event: ControllerEvent): string | null {
  switch (event.type) {
    case "review-status":
      return event.status;
    case "slide-reviewed":
      return event.items
        .map((item, index) => formatReviewItem(event.slideKey, index, item))
        .join("\n\n");
    case "slide-error":
      return `Slide ${event.slideKey} failed: ${event.message}`;
    case "item-regenerated":
      return formatReviewItem(event.slideKey, event.index, event.item);
    case "regenerate-error":
      return `Regenerating slide ${event.slideKey} item ${event.index + 1} failed: ${event.message}`;
    case "follow-up-answered":
      return event.answer;
    case "follow-up-error":
      return `Follow-up on slide ${event.slideKey} item ${event.index + 1} failed: ${event.message}`;
    case "save-error":
      return `Could not save session: ${event.message}`;
    case "review-done":
      return null;
  }
}

function reviewedSlides(session: Session): Array<[SlideKey, ReviewItem[]]> {
  return Object.entries(session.slides)
    .filter(([, slide]) => slide.review.length > 0)
    .sort(([a], [b]) => compareSlideKeys(a, b))
    .map(([slideKey, slide]) => [slideKey, slide.review]);
}

function formatMarkdownReview(title: string, slides: Array<[SlideKey, ReviewItem[]]>): string {
  const lines = [`# ${title}`];
  if (slides.length === 0) {
    lines.push("", "_No reviews yet._");
    return lines.join("\n");
  }

  for (const [slideKey, items] of slides) {
    lines.push("", `## Slide ${slideKey}`);
    items.forEach((item, index) => {
      lines.push("", `### ${index + 1}. ${NOTE_KIND_LABELS[item.kind]}`, "");
      lines.push(...quote(item.originalText), "", item.responseText);
      for (const message of item.followups) {
        const label = message.role === "user" ? "**Q:**" : "**A:**";
        lines.push("", `${label} ${message.text}`);
      }
    });
  }
  return lines.join("\n");
}

function quote(text: string): string[] {
  return text.split("\n").map((line) => (line ? `> ${line}` : ">"));
}
