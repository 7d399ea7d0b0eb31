import {
  type ClaudeRateLimitHeaders,
  normalizeClaudeRateLimitHeaders,
  normalizeClaudeUsage,
  parseClaudeUsagePayload,
} from "../usage-normalizer/claude-usage-normalizer";
import { issueFromError, PROVIDER_LABELS } from "../usage-normalizer/usage-normalizer";
import { isUnauthorizedProbeError } from "../usage/usage-error";
import {
  expandPathCandidates,
  resolveBaseUrls,
  searchCandidates,
  unrecognizedPayload,
} from "./candidate-search";
import { probeClaudeRateLimits } from "./claude-status-probe";
import { joinUrl, requestJson, USER_AGENT } from "./http-json";
import { requireCredentials } from "./require-credentials";
import { createStatusProbeCache, type StatusProbeCache } from "./status-probe-cache";
import type { ProbeEnv, UsageProbe } from "./types";

export const CLAUDE_DEFAULT_BASE_URL = "https://api.anthropic.com";
export const CLAUDE_USAGE_PATHS = ["/api/oauth/usage"] as const;
const CLAUDE_USAGE_BETA_HEADER = "oauth-2025-04-20";

type ClaudeUsageProbeOptions = {
  timeoutMs: number;
  env?: ProbeEnv;
  /** When false a usage API failure is final. */
  statusProbeEnabled?: boolean;
  statusProbeCache?: StatusProbeCache<ClaudeRateLimitHeaders>;
  now?: () => number;
  logger?: Pick<Console, "log" | "warn">;
};

export const createClaudeUsageProbe = ({
  timeoutMs,
  env = process.env,
  statusProbeEnabled = true,
  statusProbeCache = createStatusProbeCache<ClaudeRateLimitHeaders>(),
  now = Date.now,
  logger = console,
}: ClaudeUsageProbeOptions): UsageProbe => {
  const fetchUsage: UsageProbe["fetchUsage"] = async (input) => {
    const credentials = requireCredentials(PROVIDER_LABELS.claude, input);
    const baseUrls = resolveBaseUrls([
      credentials.apiBaseUrl,
      env.ANTHROPIC_BASE_URL,
      CLAUDE_DEFAULT_BASE_URL,
    ]);

    let usageError: unknown = null;
    try {
      const candidates = expandPathCandidates(baseUrls, CLAUDE_USAGE_PATHS);
      const payload = await searchCandidates(candidates, async ({ baseUrl, pathname }) => {
        const { data } = await requestJson({
          url: joinUrl(baseUrl, pathname),
          headers: {
            Authorization: `Bearer ${credentials.accessToken}`,
            Accept: "application/json",
            "Content-Type": "application/json",
            "anthropic-beta": CLAUDE_USAGE_BETA_HEADER,
            "User-Agent": USER_AGENT,
          },
          timeoutMs,
          label: "Claude usage API",
        });
        const parsed = parseClaudeUsagePayload(data);
        if (!parsed) {
          throw unrecognizedPayload("Claude usage API");
        }
        return parsed;
      });
      if (payload) {
        return normalizeClaudeUsage({ payload, planHint: credentials.planHint, nowMs: now() });
      }
    } catch (error) {
      if (isUnauthorizedProbeError(error)) {
        throw error;
      }
      usageError = error;
    }

    if (usageError != null && !statusProbeEnabled) {
      throw usageError;
    }
    if (usageError != null) {
      logger.warn(
        `[quotabar] Claude usage API unavailable, probing rate-limit headers: ${issueFromError(usageError).message}`,
      );
    }
    const headers = await probeClaudeRateLimits({
      baseUrl: baseUrls[0] ?? CLAUDE_DEFAULT_BASE_URL,
      accessToken: credentials.accessToken,
      timeoutMs,
      cache: statusProbeCache,
    });
    return normalizeClaudeRateLimitHeaders({
      headers,
      planHint: credentials.planHint,
      nowMs: now(),
      issues: usageError == null ? [] : [issueFromError(usageError)],
    });
  };

  return { providerId: "claude", fetchUsage };
};
