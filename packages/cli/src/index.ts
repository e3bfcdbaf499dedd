#!/usr/bin/env node
import { Command } from "commander";
import { configCommand } from "./commands/config";
import { notesCommand } from "./commands/notes";
import {
  askCommand,
  lockCommand,
  regenerateCommand,
  reviewCommand,
  showCommand,
} from "./commands/review";
import { writeStderr } from "./utils/terminal";

const program = new Command();

program
  .name("gloss")
  .description("Review annotated lecture notes with an LLM")
  .version("0.1.0")
  .option("--data-dir <path>", "Data directory (defaults to GLOSS_DATA_DIR or ~/.gloss)");

program.addCommand(reviewCommand());
program.addCommand(lockCommand());
program.addCommand(showCommand());
program.addCommand(regenerateCommand());
program.addCommand(askCommand());
program.addCommand(notesCommand());
program.addCommand(configCommand());

program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  writeStderr(message);
  process.exit(1);
});
