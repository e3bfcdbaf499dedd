import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MissingCredentialsError, SettingsFormatError } from "../errors";
import { defaultSettings, resolveReviewerSettings, SettingsStore } from "./settingsStore";
import { resolveDataDir } from "./statePaths";

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(path.join(os.tmpdir(), "gloss-settings-"));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

describe("SettingsStore", () => {
  it("returns defaults when no file exists", async () => {
    const store = new SettingsStore({ dataDir: tempDir });
    expect(await store.load()).toEqual({
      provider: "anthropic",
      providers: { anthropic: {}, openai: {}, gemini: {} },
    });
  });

  it("persists updates", async () => {
    const store = new SettingsStore({ dataDir: tempDir });
    await store.update((settings) => {
      settings.provider = "gemini";
      settings.providers.gemini.apiKey = "test-key";
    });

    const saved: unknown = JSON.parse(await readFile(path.join(tempDir, "config.json"), "utf8"));
    expect(saved).toMatchObject({ provider: "gemini" });
    expect((await store.load()).providers.gemini.apiKey).toBe("test-key");
  });

  it("rejects an unknown provider", async () => {
    await writeFile(path.join(tempDir, "config.json"), JSON.stringify({ provider: "acme" }));
    const store = new SettingsStore({ dataDir: tempDir });
    await expect(store.load()).rejects.toBeInstanceOf(SettingsFormatError);
  });
});

describe("resolveReviewerSettings", () => {
  it("uses the stored key and model", () => {
    const settings = defaultSettings();
    settings.providers.anthropic = { apiKey: "test-key", model: "claude-test" };
    expect(resolveReviewerSettings(settings, {})).toEqual({
      provider: "anthropic",
      apiKey: "test-key",
      model: "claude-test",
    });
  });

  it("prefers the environment key", () => {
    const settings = defaultSettings();
    settings.provider = "openai";
    settings.providers.openai = { apiKey: "file-key" };
    expect(resolveReviewerSettings(settings, { OPENAI_API_KEY: "env-key" })).toEqual({
      provider: "openai",
      apiKey: "env-key",
      model: "",
    });
  });

  it("throws when no key is configured", () => {
    const settings = defaultSettings();
    settings.provider = "gemini";
    expect(() => resolveReviewerSettings(settings, { GEMINI_API_KEY: "  " })).toThrow(
      new MissingCredentialsError("Gemini")
    );
  });
});

describe("resolveDataDir", () => {
  it("honours GLOSS_DATA_DIR", () => {
    expect(resolveDataDir({ GLOSS_DATA_DIR: tempDir })).toBe(path.resolve(tempDir));
    expect(resolveDataDir({})).toBe(path.join(os.homedir(), ".gloss"));
  });
});
