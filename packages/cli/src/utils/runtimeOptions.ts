import { isSlideKey, type SlideKey } from "@gloss/review-core";
import type { OutputFormat } from "./output";

export function resolveOutput(value: string | undefined): OutputFormat {
  if (value === "json") {
    return "json";
  }
  if (value === "markdown" || value === "md") {
    return "markdown";
  }
  return "text";
}

export function parseSlideKey(value: string): SlideKey {
  const trimmed = value.trim();
  if (!isSlideKey(trimmed)) {
    throw new Error(`Invalid slide number: ${value}`);
  }
  return trimmed;
}

/** Item numbers are 1-based on the command line and 0-based in the session */
export function parseItemIndex(value: string): number {
  const trimmed = value.trim();
  if (!/^[1-9]\d*$/.test(trimmed)) {
    throw new Error(`Invalid item number: ${value}`);
  }
  return Number(trimmed) - 1;
}
