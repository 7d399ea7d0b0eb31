import fs from "node:fs";
import path from "node:path";

import {
  configDefaults,
  configOverrideSchema,
  configSchema,
  isPlainObject,
  type ProviderConfig,
  providerIdSchema,
  type QuotabarConfig,
  type QuotabarConfigOverride,
  resolveConfigDir,
  resolveConfigFilePath,
} from "@quotabar/shared";
import YAML from "yaml";
import type { z } from "zod";

export const DEFAULT_CONFIG_FILE_BASENAME = "config.yml";

type LoadConfigOptions = {
  configDir?: string;
  /** Command-line flags; applied on top of the file. */
  overrides?: QuotabarConfigOverride;
};

export type LoadedConfig = {
  config: QuotabarConfig;
  /** Null when no config file exists and defaults are in effect. */
  configPath: string | null;
};

const deepMerge = (baseValue: unknown, overrideValue: unknown): unknown => {
  if (typeof overrideValue === "undefined") {
    return baseValue;
  }
  if (Array.isArray(overrideValue)) {
    return [...overrideValue];
  }
  if (isPlainObject(baseValue) && isPlainObject(overrideValue)) {
    const merged: Record<string, unknown> = { ...baseValue };
    Object.keys(overrideValue).forEach((key) => {
      merged[key] = deepMerge(baseValue[key], overrideValue[key]);
    });
    return merged;
  }
  return overrideValue;
};

const describeFirstIssue = (error: z.ZodError) => {
  const issue = error.issues[0];
  const pathLabel = issue?.path.join(".") || "(root)";
  const detail = issue?.message ?? "validation failed";
  return `${pathLabel} ${detail}`;
};

const parseConfigFile = ({ raw, configPath }: { raw: string; configPath: string }): unknown => {
  const ext = path.extname(configPath).toLowerCase();
  if (ext === ".json") {
    try {
      return JSON.parse(raw);
    } catch {
      throw new Error(`invalid config JSON: ${configPath}`);
    }
  }
  try {
    return YAML.parse(raw);
  } catch {
    throw new Error(`invalid config: ${configPath} failed to parse YAML`);
  }
};

const readConfigFile = (configPath: string): QuotabarConfigOverride => {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, "utf8");
  } catch {
    throw new Error(`failed to read config: ${configPath}`);
  }
  // An empty YAML document parses to null.
  const document = parseConfigFile({ raw, configPath }) ?? {};
  const parsed = configOverrideSchema.safeParse(document);
  if (!parsed.success) {
    throw new Error(`invalid config: ${configPath} ${describeFirstIssue(parsed.error)}`);
  }
  return parsed.data;
};

export const mergeConfigLayers = ({
  base,
  fileConfig,
  overrides,
}: {
  base: QuotabarConfig;
  fileConfig: QuotabarConfigOverride | null;
  overrides: QuotabarConfigOverride | undefined;
}): QuotabarConfig => {
  const withFile = fileConfig == null ? base : deepMerge(base, fileConfig);
  const parsed = configSchema.safeParse(deepMerge(withFile, overrides));
  if (!parsed.success) {
    throw new Error(`invalid config: ${describeFirstIssue(parsed.error)}`);
  }
  return parsed.data;
};

export const resolveDefaultConfigPath = (configDir = resolveConfigDir()) =>
  path.join(configDir, DEFAULT_CONFIG_FILE_BASENAME);

export const loadConfig = ({
  configDir = resolveConfigDir(),
  overrides,
}: LoadConfigOptions = {}): LoadedConfig => {
  const configPath = resolveConfigFilePath({ configDir });
  const fileConfig = configPath == null ? null : readConfigFile(configPath);
  return {
    config: mergeConfigLayers({ base: configDefaults, fileConfig, overrides }),
    configPath,
  };
};

export const resolveProviderConfigs = (config: QuotabarConfig): ProviderConfig[] =>
  providerIdSchema.options.map((id) => {
    const provider = config.providers[id];
    return {
      id,
      enabled: provider.enabled,
      refreshIntervalMinutes: provider.refreshIntervalMinutes,
      secretRef: {
        keychainService: provider.keychainService,
        credentialsPath: provider.credentialsPath,
        homeDir: provider.homeDir,
      },
    };
  });
