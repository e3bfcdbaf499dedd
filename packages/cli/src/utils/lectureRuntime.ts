import {
  createLogger,
  FileSessionStore,
  LectureReviewController,
  resolveDataDir,
  type ReviewLogger,
  type Session,
  SettingsStore,
  wrapLogger,
} from "@gloss/review-core";
import type { Command } from "commander";

export type GlobalOptions = {
  dataDir?: string;
};

/** `--data-dir` wins over GLOSS_DATA_DIR, which wins over ~/.gloss */
export function resolveCommandDataDir(command: Command): string {
  const { dataDir } = command.optsWithGlobals<GlobalOptions>();
  return dataDir ?? resolveDataDir();
}

/** Commands log warnings and errors only unless LOG_LEVEL says otherwise */
export function createCommandLogger(): ReviewLogger {
  return wrapLogger(createLogger(process.env.LOG_LEVEL ? {} : { level: "warn" }));
}

export function createLectureController(dataDir: string): LectureReviewController {
  return new LectureReviewController({
    store: new FileSessionStore({ dataDir }),
    settings: new SettingsStore({ dataDir }),
    logger: createCommandLogger(),
  });
}

/**
 * Open a lecture, run `action` against it, then wait for queued saves and
 * release it.
 */
export async function withLecture<T>(
  command: Command,
  courseId: string,
  lectureId: string,
  action: (controller: LectureReviewController, session: Session) => Promise<T>
): Promise<T> {
  const controller = createLectureController(resolveCommandDataDir(command));
  const session = await controller.open(courseId, lectureId);
  try {
    const result = await action(controller, session);
    await controller.flush();
    return result;
  } finally {
    await controller.close();
  }
}
