import type { ControllerEvent, LectureReviewController } from "@gloss/review-core";
import { Command } from "commander";
import { formatControllerEvent, formatSessionReview } from "../utils/output";
import { withLecture } from "../utils/lectureRuntime";
import { parseItemIndex, parseSlideKey, resolveOutput } from "../utils/runtimeOptions";
import { readTextArgument, writeStderr, writeStdout } from "../utils/terminal";

const ERROR_EVENTS = new Set<ControllerEvent["type"]>([
  "slide-error",
  "regenerate-error",
  "follow-up-error",
  "save-error",
]);

export function reviewCommand(): Command {
  return new Command("review")
    .description("Review every annotated slide that has no cached review")
    .argument("<course>", "Course ID")
    .argument("<lecture>", "Lecture ID")
    .option("--lock", "Lock the notes first, clearing reviews of slides whose notes changed")
    .action(
      async (courseId: string, lectureId: string, options: { lock?: boolean }, command: Command) => {
        await withLecture(command, courseId, lectureId, async (controller) => {
          const stopPrinting = printEvents(controller);
          const handleInterrupt = () => {
            controller.cancelReview().catch((error: unknown) => {
              writeStderr(error instanceof Error ? error.message : String(error));
            });
          };
          process.once("SIGINT", handleInterrupt);
          try {
            if (options.lock) {
              const cleared = await controller.lock();
              if (cleared.length > 0) {
                writeStderr(`Notes changed on slides ${cleared.join(", ")}; reviewing again.`);
              }
            }
            await controller.startReview();
            await controller.flush();
          } finally {
            process.off("SIGINT", handleInterrupt);
            stopPrinting();
          }
        });
      }
    );
}

export function lockCommand(): Command {
  return new Command("lock")
    .description("Lock the current notes, clearing reviews of slides whose notes changed")
    .argument("<course>", "Course ID")
    .argument("<lecture>", "Lecture ID")
    .action(async (courseId: string, lectureId: string, _options: unknown, command: Command) => {
      const cleared = await withLecture(command, courseId, lectureId, (controller) =>
        controller.lock()
      );
      writeStdout(
        cleared.length > 0 ? `Cleared reviews for slides ${cleared.join(", ")}` : "Notes locked"
      );
    });
}

export function showCommand(): Command {
  return new Command("show")
    .description("Print the cached reviews of a lecture")
    .argument("<course>", "Course ID")
    .argument("<lecture>", "Lecture ID")
    .option("-o, --output <format>", "Output format (text, json, markdown)", "text")
    .action(
      async (courseId: string, lectureId: string, options: { output: string }, command: Command) => {
        const output = resolveOutput(options.output);
        await withLecture(command, courseId, lectureId, async (_controller, session) => {
          writeStdout(formatSessionReview(session, output));
        });
      }
    );
}

export function regenerateCommand(): Command {
  return new Command("regenerate")
    .description("Ask for a new response to one reviewed note")
    .argument("<course>", "Course ID")
    .argument("<lecture>", "Lecture ID")
    .argument("<slide>", "Slide number")
    .argument("<item>", "Item number on the slide, starting at 1")
    .option("--fresh", "Discard the item's follow-up thread")
    .action(
      async (
        courseId: string,
        lectureId: string,
        slide: string,
        item: string,
        options: { fresh?: boolean },
        command: Command
      ) => {
        const slideKey = parseSlideKey(slide);
        const index = parseItemIndex(item);
        await withLecture(command, courseId, lectureId, async (controller) => {
          const stopPrinting = printEvents(controller);
          try {
            await controller.regenerate(slideKey, index, { fresh: options.fresh ?? false });
          } finally {
            stopPrinting();
          }
        });
      }
    );
}

export function askCommand(): Command {
  return new Command("ask")
    .description("Ask a follow-up question about one reviewed note")
    .argument("<course>", "Course ID")
    .argument("<lecture>", "Lecture ID")
    .argument("<slide>", "Slide number")
    .argument("<item>", "Item number on the slide, starting at 1")
    .argument("[question...]", "Question text; read from stdin when omitted")
    .action(
      async (
        courseId: string,
        lectureId: string,
        slide: string,
        item: string,
        words: string[] | undefined,
        _options: unknown,
        command: Command
      ) => {
        const slideKey = parseSlideKey(slide);
        const index = parseItemIndex(item);
        const question = await readTextArgument(words?.length ? words.join(" ") : undefined);
        await withLecture(command, courseId, lectureId, async (controller) => {
          const stopPrinting = printEvents(controller);
          try {
            await controller.askFollowUp(slideKey, index, question);
          } finally {
            stopPrinting();
          }
        });
      }
    );
}

/** Results go to stdout; progress and failures to stderr. Failures set a non-zero exit code. */
function printEvents(controller: LectureReviewController): () => void {
  return controller.onEvent((event) => {
    const text = formatControllerEvent(event);
    if (ERROR_EVENTS.has(event.type)) {
      process.exitCode = 1;
    }
    if (text === null) {
      return;
    }
    if (event.type === "review-status" || ERROR_EVENTS.has(event.type)) {
      writeStderr(text);
    } else {
      writeStdout(`${text}\n`);
    }
  });
}
