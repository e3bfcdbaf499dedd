import { Readable } from "node:stream";
import { describe, expect, it } from "vitest";
import { parseItemIndex, parseSlideKey, resolveOutput } from "../utils/runtimeOptions";
import { readTextArgument } from "../utils/terminal";

describe("runtime options", () => {
  it("resolves output formats", () => {
    expect(resolveOutput("json")).toBe("json");
    expect(resolveOutput("md")).toBe("markdown");
    expect(resolveOutput("markdown")).toBe("markdown");
    expect(resolveOutput("yaml")).toBe("text");
    expect(resolveOutput(undefined)).toBe("text");
  });

  it("accepts 1-indexed slide numbers", () => {
    expect(parseSlideKey(" 12 ")).toBe("12");
    expect(() => parseSlideKey("0")).toThrow("Invalid slide number: 0");
    expect(() => parseSlideKey("03")).toThrow("Invalid slide number: 03");
    expect(() => parseSlideKey("two")).toThrow("Invalid slide number: two");
  });

  it("turns 1-based item numbers into indexes", () => {
    expect(parseItemIndex("1")).toBe(0);
    expect(parseItemIndex("3")).toBe(2);
    expect(() => parseItemIndex("0")).toThrow("Invalid item number: 0");
    expect(() => parseItemIndex("-1")).toThrow("Invalid item number: -1");
  });

  it("uses an explicit text argument as is", async () => {
    await expect(readTextArgument("What is ATP?")).resolves.toBe("What is ATP?");
  });

  it("reads piped text when the argument is absent or a dash", async () => {
    const piped = () => Readable.from([Buffer.from("what is "), Buffer.from("entropy?\n")]);

    await expect(readTextArgument(undefined, piped())).resolves.toBe("what is entropy?");
    await expect(readTextArgument("-", piped())).resolves.toBe("what is entropy?");
  });

  it("reads nothing from an interactive terminal", async () => {
    const terminal = Object.assign(Readable.from([Buffer.from("typed")]), { isTTY: true });

    await expect(readTextArgument(undefined, terminal)).resolves.toBe("");
  });
});
