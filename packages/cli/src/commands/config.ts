import { SettingsStore, validateSettings } from "@gloss/review-core";
import { Command } from "commander";
import { maskSecrets, parseConfigValue, setConfigValue, unsetConfigValue } from "../utils/configValues";
import { resolveCommandDataDir } from "../utils/lectureRuntime";
import { writeStdout } from "../utils/terminal";

export function configCommand(): Command {
  return new Command("config")
    .description("Manage provider settings")
    .addCommand(showConfigCommand())
    .addCommand(setConfigCommand())
    .addCommand(unsetConfigCommand());
}

function showConfigCommand(): Command {
  return new Command("show")
    .description("Show current settings with API keys masked")
    .action(async (_options: unknown, command: Command) => {
      const store = new SettingsStore({ dataDir: resolveCommandDataDir(command) });
      const settings = await store.load();
      writeStdout(JSON.stringify(maskSecrets(settings), null, 2));
    });
}

function setConfigCommand(): Command {
  return new Command("set")
    .description("Set a settings value, e.g. providers.openai.apiKey")
    .argument("<key>", "Dotted settings key")
    .argument("<value>", "Value")
    .action(async (key: string, value: string, _options: unknown, command: Command) => {
      const store = new SettingsStore({ dataDir: resolveCommandDataDir(command) });
      const draft: Record<string, unknown> = { ...(await store.load()) };
      setConfigValue(draft, key, parseConfigValue(value));
      await store.save(validateSettings(draft, store.filePath));
      writeStdout(`Set ${key}`);
    });
}

function unsetConfigCommand(): Command {
  return new Command("unset")
    .description("Remove a settings value")
    .argument("<key>", "Dotted settings key")
    .action(async (key: string, _options: unknown, command: Command) => {
      const store = new SettingsStore({ dataDir: resolveCommandDataDir(command) });
      const draft: Record<string, unknown> = { ...(await store.load()) };
      if (!unsetConfigValue(draft, key)) {
        writeStdout(`No value found for ${key}`);
        return;
      }
      await store.save(validateSettings(draft, store.filePath));
      writeStdout(`Removed ${key}`);
    });
}
