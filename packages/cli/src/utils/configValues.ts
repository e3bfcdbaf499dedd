/**
 * Dotted-key edits on the settings document, e.g.
 * `providers.openai.model = gpt-4o-mini`. The result is validated by the
 * settings schema before it is saved.
 */

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseConfigValue(raw: string): unknown {
  if (raw === "true") {
    return true;
  }
  if (raw === "false") {
    return false;
  }
  const numberValue = Number(raw);
  if (!Number.isNaN(numberValue) && raw.trim() !== "") {
    return numberValue;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    return raw;
  }
}

export function setConfigValue(target: ConfigRecord, key: string, value: unknown): void {
  const parts = key.split(".").filter(Boolean);
  const finalKey = parts.pop();
  if (finalKey === undefined) {
    return;
  }
  let cursor = target;
  for (const part of parts) {
    const next = cursor[part];
    if (isRecord(next)) {
      cursor = next;
    } else {
      const created: ConfigRecord = {};
      cursor[part] = created;
      cursor = created;
    }
  }
  cursor[finalKey] = value;
}

export function unsetConfigValue(target: ConfigRecord, key: string): boolean {
  const parts = key.split(".").filter(Boolean);
  const finalKey = parts.pop();
  if (finalKey === undefined) {
    return false;
  }
  let cursor = target;
  for (const part of parts) {
    const next = cursor[part];
    if (!isRecord(next)) {
      return false;
    }
    cursor = next;
  }
  if (!(finalKey in cursor)) {
    return false;
  }
  delete cursor[finalKey];
  return true;
}

/** Copy of a settings document with every `apiKey` reduced to its last four characters */
export function maskSecrets(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(maskSecrets);
  }
  if (!isRecord(value)) {
    return value;
  }
  const masked: ConfigRecord = {};
  for (const [key, entry] of Object.entries(value)) {
    masked[key] = key === "apiKey" && typeof entry === "string" ? maskKey(entry) : maskSecrets(entry);
  }
  return masked;
}

function maskKey(key: string): string {
  return key.length > 8 ? `****${key.slice(-4)}` : "****";
}
