import { readFile } from "node:fs/promises";

const KEY_VALUE_PATTERN = /^([A-Za-z0-9_.-]+)\s*=\s*(.+)$/;

const stripInlineComment = (value: string) => {
  if (value.startsWith('"') || value.startsWith("'")) {
    const quote = value.charAt(0);
    const closing = value.indexOf(quote, 1);
    return closing === -1 ? value : value.slice(0, closing + 1);
  }
  const hashIndex = value.indexOf("#");
  return (hashIndex === -1 ? value : value.slice(0, hashIndex)).trim();
};

const unquote = (value: string) => {
  if (value.length >= 2) {
    const first = value.charAt(0);
    if ((first === '"' || first === "'") && value.endsWith(first)) {
      return value.slice(1, -1);
    }
  }
  return value;
};

/**
 * Reads top-level `key = "value"` lines. Tables, arrays and multi-line strings are
 * not interpreted; keys inside a `[table]` section are skipped.
 */
export const parseConfigOverrides = (source: string): Record<string, string> => {
  const overrides: Record<string, string> = {};
  let inTable = false;
  for (const rawLine of source.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) {
      continue;
    }
    if (line.startsWith("[")) {
      inTable = true;
      continue;
    }
    if (inTable) {
      continue;
    }
    const match = KEY_VALUE_PATTERN.exec(line);
    const key = match?.[1];
    const rawValue = match?.[2];
    if (!key || rawValue == null) {
      continue;
    }
    overrides[key] = unquote(stripInlineComment(rawValue.trim()));
  }
  return overrides;
};

export type CodexConfig = {
  baseUrlOverride: string | null;
  mentionsPro: boolean;
};

export const resolveCodexConfig = (source: string | null): CodexConfig => {
  if (source == null) {
    return { baseUrlOverride: null, mentionsPro: false };
  }
  const overrides = parseConfigOverrides(source);
  const baseUrlOverride = overrides.api_base_url ?? overrides.base_url ?? null;
  return {
    baseUrlOverride: baseUrlOverride && baseUrlOverride.length > 0 ? baseUrlOverride : null,
    mentionsPro: source.includes("pro") || source.includes("Pro"),
  };
};

export const readCodexConfig = async (configPath: string) =>
  resolveCodexConfig(await readFile(configPath, "utf8").catch(() => null));
