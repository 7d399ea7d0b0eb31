import path from "node:path";

import type { UsageIssue } from "@quotabar/shared";

import type { Credentials } from "../credentials/types";
import { scanSessionLogs } from "../session-logs/session-log-scanner";
import {
  type CodexRemoteRateLimits,
  normalizeCodexUsage,
  parseCodexRemoteRateLimits,
} from "../usage-normalizer/codex-usage-normalizer";
import { issueFromError } from "../usage-normalizer/usage-normalizer";
import { isUnauthorizedProbeError } from "../usage/usage-error";
import {
  expandPathCandidates,
  resolveBaseUrls,
  searchCandidates,
  unrecognizedPayload,
} from "./candidate-search";
import { readCodexConfig } from "./codex-config-override";
import { originUrl, requestJson, USER_AGENT } from "./http-json";
import type { UsageProbe } from "./types";

const CODEX_DEFAULT_BASE_URLS = ["https://api.openai.com", "https://chatgpt.com"];
const BACKEND_USAGE_PATH = "/backend-api/wham/usage";
const API_USAGE_PATH = "/api/codex/usage";

type CodexUsageProbeOptions = {
  codexHome: string;
  timeoutMs: number;
  now?: () => number;
  logger?: Pick<Console, "log" | "warn">;
};

/** chatgpt.com and `backend-api` bases serve the backend route first. */
export const resolveCodexUsagePaths = (baseUrl: string) => {
  const prefersBackend = (() => {
    try {
      const url = new URL(baseUrl);
      return url.hostname.endsWith("chatgpt.com") || url.pathname.includes("backend-api");
    } catch {
      return false;
    }
  })();
  return prefersBackend
    ? [BACKEND_USAGE_PATH, API_USAGE_PATH]
    : [API_USAGE_PATH, BACKEND_USAGE_PATH];
};

export const fetchCodexRemoteRateLimits = async ({
  credentials,
  baseUrlOverride,
  timeoutMs,
}: {
  credentials: Credentials;
  baseUrlOverride: string | null;
  timeoutMs: number;
}): Promise<CodexRemoteRateLimits | null> => {
  const baseUrls = resolveBaseUrls([
    credentials.apiBaseUrl,
    baseUrlOverride,
    ...CODEX_DEFAULT_BASE_URLS,
  ]);
  const candidates = expandPathCandidates(baseUrls, resolveCodexUsagePaths);
  return searchCandidates(candidates, async ({ baseUrl, pathname }) => {
    const { data } = await requestJson({
      url: originUrl(baseUrl, pathname),
      headers: {
        Authorization: `Bearer ${credentials.accessToken}`,
        Accept: "application/json",
        "User-Agent": USER_AGENT,
      },
      timeoutMs,
      label: "Codex usage API",
    });
    const parsed = parseCodexRemoteRateLimits(data);
    if (!parsed) {
      throw unrecognizedPayload("Codex usage API");
    }
    return parsed;
  });
};

export const createCodexUsageProbe = ({
  codexHome,
  timeoutMs,
  now = Date.now,
  logger = console,
}: CodexUsageProbeOptions): UsageProbe => {
  const fetchUsage: UsageProbe["fetchUsage"] = async (credentials) => {
    const nowMs = now();
    const [scan, config] = await Promise.all([
      scanSessionLogs(path.join(codexHome, "sessions"), { nowMs }),
      readCodexConfig(path.join(codexHome, "config.toml")),
    ]);

    let remote: CodexRemoteRateLimits | null = null;
    let issues: UsageIssue[] = [];
    if (credentials) {
      try {
        remote = await fetchCodexRemoteRateLimits({
          credentials,
          baseUrlOverride: config.baseUrlOverride,
          timeoutMs,
        });
      } catch (error) {
        if (isUnauthorizedProbeError(error)) {
          throw error;
        }
        const issue = issueFromError(error);
        logger.warn(`[quotabar] Codex usage API unavailable, using session logs: ${issue.message}`);
        issues = [issue];
      }
    }

    return normalizeCodexUsage({
      scan,
      remote,
      credentialPlanHint: credentials?.planHint ?? null,
      configMentionsPro: config.mentionsPro,
      nowMs,
      issues,
    });
  };

  return { providerId: "codex", fetchUsage };
};
