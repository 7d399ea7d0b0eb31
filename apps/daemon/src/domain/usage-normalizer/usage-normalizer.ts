import type {
  ProviderId,
  UsageIssue,
  UsageSnapshot,
  UsageWindow,
  UsageWindowId,
} from "@quotabar/shared";

import {
  CredentialRefreshError,
  UsageProbeError,
  UsageProviderError,
} from "../usage/usage-error";
import { toIsoString } from "../usage/value-parsers";
import type { RollingWindowReading } from "../usage/window-rollover";

export const PROVIDER_LABELS: Record<ProviderId, string> = {
  claude: "Claude",
  codex: "Codex",
  gemini: "Gemini",
};

const PLAN_TIER_KEYWORDS = [
  ["max", "Max"],
  ["pro", "Pro"],
  ["team", "Team"],
  ["enterprise", "Enterprise"],
  ["free", "Free"],
] as const;

const titleCase = (word: string) =>
  word.length === 0 ? word : `${word.charAt(0).toUpperCase()}${word.slice(1).toLowerCase()}`;

export const clampPercent = (value: number) => {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(100, Math.max(0, value));
};

/**
 * Maps a raw plan string onto a display tier by keyword, e.g. `default_claude_max_5x` -> `Max`.
 * Unknown strings fall back to their last `_` segment, titlecased.
 */
export const normalizePlanTier = (raw: string | null | undefined): string | null => {
  const normalized = raw?.trim() ?? "";
  if (!normalized) {
    return null;
  }
  const lower = normalized.toLowerCase();
  for (const [keyword, label] of PLAN_TIER_KEYWORDS) {
    if (lower.includes(keyword)) {
      return label;
    }
  }
  const segments = normalized.split("_").filter((segment) => segment.length > 0);
  return titleCase(segments[segments.length - 1] ?? normalized);
};

export const withProviderPrefix = (providerId: ProviderId, tier: string | null) =>
  tier == null ? null : `${PROVIDER_LABELS[providerId]} ${tier}`;

/** The single number used where one percentage is needed: primary, else secondary. */
export const primaryUtilization = (snapshot: Pick<UsageSnapshot, "windows">): number | null => {
  const primary = snapshot.windows.find((window) => window.id === "primary");
  if (primary) {
    return primary.utilizationPercent;
  }
  return snapshot.windows.find((window) => window.id === "secondary")?.utilizationPercent ?? null;
};

export const secondaryUtilization = (snapshot: Pick<UsageSnapshot, "windows">) =>
  snapshot.windows.find((window) => window.id === "secondary")?.utilizationPercent ?? null;

export const createUsageWindow = ({
  id,
  title,
  reading,
}: {
  id: UsageWindowId;
  title: string;
  reading: RollingWindowReading | null;
}): UsageWindow | null => {
  if (reading?.utilizationPercent == null) {
    return null;
  }
  return {
    id,
    title,
    utilizationPercent: reading.utilizationPercent,
    resetsAt: toIsoString(reading.resetsAtMs),
    windowDurationMins: reading.windowDurationMins,
  };
};

export const compactWindows = (windows: (UsageWindow | null)[]): UsageWindow[] =>
  windows.filter((window): window is UsageWindow => window != null);

export const createPlaceholderSnapshot = (providerId: ProviderId, nowMs: number): UsageSnapshot => ({
  providerId,
  providerLabel: PROVIDER_LABELS[providerId],
  planLabel: null,
  windows: [],
  tokens: null,
  tokensProvenance: null,
  messageCount: null,
  cost: null,
  sourceLabel: "Not refreshed yet",
  issues: [],
  fetchedAt: new Date(nowMs).toISOString(),
});

export const appendIssue = (issues: UsageIssue[], nextIssue: UsageIssue): UsageIssue[] => {
  if (
    issues.some((issue) => issue.code === nextIssue.code && issue.message === nextIssue.message)
  ) {
    return issues;
  }
  return [...issues, nextIssue];
};

export const issueFromError = (error: unknown, severity: UsageIssue["severity"] = "warning"): UsageIssue => {
  if (error instanceof UsageProviderError) {
    return { code: error.code, message: error.message, severity: error.severity };
  }
  if (error instanceof UsageProbeError || error instanceof CredentialRefreshError) {
    return { code: error.code, message: error.message, severity };
  }
  return {
    code: "INTERNAL",
    message: "Usage provider request failed",
    severity: "error",
  };
};
