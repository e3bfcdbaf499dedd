import { mkdir } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

const DEFAULT_DIR = ".gloss";

export function resolveDataDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.GLOSS_DATA_DIR;
  return override ? path.resolve(override) : path.join(os.homedir(), DEFAULT_DIR);
}

export async function ensureDir(dir: string): Promise<string> {
  await mkdir(dir, { recursive: true });
  return dir;
}

export function resolveLectureDir(dataDir: string, courseId: string, lectureId: string): string {
  return path.join(dataDir, "courses", courseId, "lectures", lectureId);
}
