import os from "node:os";
import path from "node:path";

import { type ProviderId, type QuotabarConfig, resolveStateDir } from "@quotabar/shared";

import {
  type CredentialLocation,
  createCredentialStore,
} from "./domain/credentials/credential-store";
import { createUsageHistoryStore } from "./domain/refresh/history-store";
import { createProviderFetcher } from "./domain/refresh/provider-fetcher";
import { createRefreshOrchestrator } from "./domain/refresh/refresh-orchestrator";
import type { ClaudeRateLimitHeaders } from "./domain/usage-normalizer/claude-usage-normalizer";
import { createClaudeUsageProbe } from "./domain/usage-probe/claude-probe";
import { createCodexUsageProbe } from "./domain/usage-probe/codex-probe";
import { createGeminiUsageProbe } from "./domain/usage-probe/gemini-probe";
import { createStatusProbeCache } from "./domain/usage-probe/status-probe-cache";
import type { ProbeEnv } from "./domain/usage-probe/types";
import { createApp } from "./http/api-router";
import { resolveProviderConfigs } from "./infra/config/config-loader";
import { createJsonFileSecretStore } from "./infra/secret-store/json-file-secret-store";
import { createMacKeychainSecretStore } from "./infra/secret-store/mac-keychain-secret-store";
import type { SecretStore } from "./infra/secret-store/secret-store";

export const USAGE_HISTORY_FILE_NAME = "usage-history.json";
const DAY_MS = 24 * 60 * 60 * 1000;

// Where each CLI tool keeps its tokens when nothing is configured.
const PROVIDER_DEFAULTS: Record<ProviderId, { homeDirName: string; credentialsFileName: string }> = {
  claude: { homeDirName: ".claude", credentialsFileName: ".credentials.json" },
  codex: { homeDirName: ".codex", credentialsFileName: "auth.json" },
  gemini: { homeDirName: ".gemini", credentialsFileName: "oauth_creds.json" },
};

export type HostEnvironment = {
  env: ProbeEnv;
  platform: NodeJS.Platform;
  homeDir: string;
};

const expandHome = (value: string, homeDir: string) => {
  if (value === "~") {
    return homeDir;
  }
  return value.startsWith("~/") ? path.join(homeDir, value.slice(2)) : value;
};

export const resolveProviderHome = (
  providerId: ProviderId,
  config: QuotabarConfig,
  host: HostEnvironment,
) => {
  const configured = config.providers[providerId].homeDir;
  if (configured) {
    return expandHome(configured, host.homeDir);
  }
  const codexHome = host.env.CODEX_HOME?.trim();
  if (providerId === "codex" && codexHome) {
    return expandHome(codexHome, host.homeDir);
  }
  return path.join(host.homeDir, PROVIDER_DEFAULTS[providerId].homeDirName);
};

const fileLocation = (filePath: string): CredentialLocation => ({
  store: createJsonFileSecretStore(path.dirname(filePath)),
  entryName: path.basename(filePath),
  broadenedPrefix: null,
});

/**
 * An explicit credentials file wins; a keychain service is only consulted on macOS;
 * everything else reads the file the CLI tool writes under its home directory.
 */
export const resolveCredentialLocations = ({
  config,
  host,
  keychainStore,
}: {
  config: QuotabarConfig;
  host: HostEnvironment;
  keychainStore: SecretStore;
}): Record<ProviderId, CredentialLocation> => {
  const locate = (providerId: ProviderId): CredentialLocation => {
    const { keychainService, credentialsPath } = config.providers[providerId];
    if (credentialsPath) {
      return fileLocation(expandHome(credentialsPath, host.homeDir));
    }
    if (keychainService && host.platform === "darwin") {
      return { store: keychainStore, entryName: keychainService, broadenedPrefix: keychainService };
    }
    return fileLocation(
      path.join(
        resolveProviderHome(providerId, config, host),
        PROVIDER_DEFAULTS[providerId].credentialsFileName,
      ),
    );
  };
  return { claude: locate("claude"), codex: locate("codex"), gemini: locate("gemini") };
};

type CreateDaemonOptions = {
  config: QuotabarConfig;
  host?: HostEnvironment;
  stateDir?: string;
  keychainStore?: SecretStore;
  now?: () => number;
  logger?: Pick<Console, "log" | "warn">;
};

export const createDaemon = ({
  config,
  host = { env: process.env, platform: process.platform, homeDir: os.homedir() },
  stateDir = resolveStateDir(),
  keychainStore = createMacKeychainSecretStore(),
  now = Date.now,
  logger = console,
}: CreateDaemonOptions) => {
  const timeoutMs = config.http.timeoutMs;
  const credentialStore = createCredentialStore({
    locations: resolveCredentialLocations({ config, host, keychainStore }),
    timeoutMs,
    now,
    logger,
  });
  const fetchProvider = createProviderFetcher({
    credentialStore,
    probes: {
      claude: createClaudeUsageProbe({
        timeoutMs,
        env: host.env,
        statusProbeEnabled: config.statusProbe.enabled,
        statusProbeCache: createStatusProbeCache<ClaudeRateLimitHeaders>({
          cooldownMs: config.statusProbe.cooldownMs,
          now,
        }),
        now,
        logger,
      }),
      codex: createCodexUsageProbe({
        codexHome: resolveProviderHome("codex", config, host),
        timeoutMs,
        now,
        logger,
      }),
      gemini: createGeminiUsageProbe({ timeoutMs, env: host.env, now }),
    },
    logger,
  });
  const historyStore = createUsageHistoryStore({
    filePath: path.join(stateDir, USAGE_HISTORY_FILE_NAME),
    maxEntries: config.history.maxEntries,
    maxAgeMs: config.history.retentionDays * DAY_MS,
    now,
    logger,
  });
  const orchestrator = createRefreshOrchestrator({
    providers: resolveProviderConfigs(config),
    fetchProvider,
    refreshIntervalMinutes: config.refreshIntervalMinutes,
    historyStore,
    initialDelayMs: config.initialDelayMs,
    now,
    logger,
  });
  const app = createApp({ orchestrator, historyStore, logger });

  return { app, orchestrator, historyStore, credentialStore };
};

export type Daemon = ReturnType<typeof createDaemon>;
