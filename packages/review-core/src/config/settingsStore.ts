/**
 * Settings Store
 *
 * Provider selection, API keys and model ids, kept in `<dataDir>/config.json`.
 * Keys from the environment take precedence over the file.
 */

import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { PROVIDER_KINDS, type ProviderKind } from "@gloss/ai-core";
import { z } from "zod";
import { MissingCredentialsError, SettingsFormatError } from "../errors";
import { providerLabel } from "../review/providerErrors";
import type { ReviewerSettings } from "../reviewers/reviewerFactory";
import { ensureDir, resolveDataDir } from "./statePaths";

const ProviderSettingsSchema = z.object({
  apiKey: z.string().optional(),
  model: z.string().optional(),
});

export const SettingsSchema = z.object({
  provider: z.enum(PROVIDER_KINDS).default("anthropic"),
  providers: z
    .object({
      anthropic: ProviderSettingsSchema.default({}),
      openai: ProviderSettingsSchema.default({}),
      gemini: ProviderSettingsSchema.default({}),
    })
    .default({}),
});

export type Settings = z.infer<typeof SettingsSchema>;

export const API_KEY_ENV: Readonly<Record<ProviderKind, string>> = {
  anthropic: "ANTHROPIC_API_KEY",
  openai: "OPENAI_API_KEY",
  gemini: "GEMINI_API_KEY",
};

export function defaultSettings(): Settings {
  return SettingsSchema.parse({});
}

/** Anything that can produce the current settings */
export interface SettingsSource {
  load(): Promise<Settings>;
}

export interface SettingsStoreOptions {
  dataDir?: string;
  fileName?: string;
}

export class SettingsStore implements SettingsSource {
  private readonly dataDir: string;
  private readonly fileName: string;

  constructor(options: SettingsStoreOptions = {}) {
    this.dataDir = options.dataDir ?? resolveDataDir();
    this.fileName = options.fileName ?? "config.json";
  }

  get filePath(): string {
    return path.join(this.dataDir, this.fileName);
  }

  /** Missing file yields defaults; a malformed one throws SettingsFormatError */
  async load(): Promise<Settings> {
    let data: string;
    try {
      data = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isNotFound(error)) {
        return defaultSettings();
      }
      throw error;
    }
    return parseSettings(data, this.filePath);
  }

  async save(settings: Settings): Promise<void> {
    const validated = SettingsSchema.parse(settings);
    await ensureDir(this.dataDir);
    await writeFile(this.filePath, `${JSON.stringify(validated, null, 2)}\n`, "utf8");
  }

  async update(mutator: (settings: Settings) => void): Promise<Settings> {
    const settings = await this.load();
    mutator(settings);
    await this.save(settings);
    return settings;
  }
}

export function parseSettings(data: string, filePath: string): Settings {
  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch (error) {
    throw new SettingsFormatError(filePath, "not valid JSON", { cause: error });
  }
  return validateSettings(raw, filePath);
}

export function validateSettings(raw: unknown, source: string): Settings {
  const result = SettingsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new SettingsFormatError(source, issues, { cause: result.error });
  }
  return result.data;
}

/**
 * Credentials and model for the selected provider. Throws
 * MissingCredentialsError when neither the environment nor the file has a key.
 */
export function resolveReviewerSettings(
  settings: Settings,
  env: NodeJS.ProcessEnv = process.env
): ReviewerSettings {
  const provider = settings.provider;
  const stored = settings.providers[provider];
  const apiKey = env[API_KEY_ENV[provider]]?.trim() || stored.apiKey?.trim();
  if (!apiKey) {
    throw new MissingCredentialsError(providerLabel(provider));
  }
  return { provider, apiKey, model: stored.model?.trim() ?? "" };
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
