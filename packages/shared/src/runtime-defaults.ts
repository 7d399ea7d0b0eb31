import type { QuotabarConfig } from "./types";

export const configDefaults: QuotabarConfig = {
  bind: "127.0.0.1",
  port: 11180,
  refreshIntervalMinutes: 5,
  initialDelayMs: 500,
  http: {
    timeoutMs: 10_000,
  },
  statusProbe: {
    enabled: true,
    cooldownMs: 5 * 60 * 1000,
  },
  history: {
    maxEntries: 168,
    retentionDays: 7,
  },
  providers: {
    claude: {
      enabled: true,
      refreshIntervalMinutes: null,
      keychainService: "Claude Code-credentials",
      credentialsPath: null,
      homeDir: null,
    },
    codex: {
      enabled: true,
      refreshIntervalMinutes: null,
      keychainService: null,
      credentialsPath: null,
      homeDir: null,
    },
    gemini: {
      enabled: true,
      refreshIntervalMinutes: null,
      keychainService: null,
      credentialsPath: null,
      homeDir: null,
    },
  },
};
