import { compareSlideKeys, getSlide } from "@gloss/review-core";
import { Command } from "commander";
import { withLecture } from "../utils/lectureRuntime";
import { parseSlideKey } from "../utils/runtimeOptions";
import { readTextArgument, writeStdout } from "../utils/terminal";

export function notesCommand(): Command {
  return new Command("notes")
    .description("Read and write slide notes")
    .addCommand(showNotesCommand())
    .addCommand(setNotesCommand());
}

function showNotesCommand(): Command {
  return new Command("show")
    .description("Print the notes of one slide, or of every slide")
    .argument("<course>", "Course ID")
    .argument("<lecture>", "Lecture ID")
    .argument("[slide]", "Slide number")
    .action(
      async (
        courseId: string,
        lectureId: string,
        slide: string | undefined,
        _options: unknown,
        command: Command
      ) => {
        await withLecture(command, courseId, lectureId, async (_controller, session) => {
          if (slide !== undefined) {
            writeStdout(getSlide(session, parseSlideKey(slide))?.rawNotes ?? "");
            return;
          }
          const slides = Object.entries(session.slides)
            .filter(([, data]) => data.rawNotes.trim())
            .sort(([a], [b]) => compareSlideKeys(a, b));
          if (slides.length === 0) {
            writeStdout("<no notes>");
            return;
          }
          writeStdout(slides.map(([key, data]) => `## Slide ${key}\n${data.rawNotes}`).join("\n\n"));
        });
      }
    );
}

function setNotesCommand(): Command {
  return new Command("set")
    .description("Replace the notes of one slide")
    .argument("<course>", "Course ID")
    .argument("<lecture>", "Lecture ID")
    .argument("<slide>", "Slide number")
    .argument("[text]", "Note text; read from stdin when omitted or '-'")
    .action(
      async (
        courseId: string,
        lectureId: string,
        slide: string,
        text: string | undefined,
        _options: unknown,
        command: Command
      ) => {
        const slideKey = parseSlideKey(slide);
        const notes = await readTextArgument(text);
        await withLecture(command, courseId, lectureId, (controller) =>
          controller.updateNotes(slideKey, notes)
        );
        writeStdout(`Saved notes for slide ${slideKey}`);
      }
    );
}
