import type { UsageIssue, UsageSnapshot } from "@quotabar/shared";

import {
  DEFAULT_PRIMARY_WINDOW_MINS,
  DEFAULT_SECONDARY_WINDOW_MINS,
  type SessionScan,
} from "../session-logs/session-log-scanner";
import { asEpochMs, asNonEmptyString, asNumber, isRecord } from "../usage/value-parsers";
import { applyWindowRollover, type RollingWindowReading } from "../usage/window-rollover";
import {
  appendIssue,
  compactWindows,
  createUsageWindow,
  normalizePlanTier,
  PROVIDER_LABELS,
  withProviderPrefix,
} from "./usage-normalizer";

export type CodexRemoteWindow = {
  usedPercent: number | null;
  resetsAtMs: number | null;
  windowMinutes: number | null;
};

export type CodexRemoteRateLimits = {
  planType: string | null;
  primary: CodexRemoteWindow | null;
  secondary: CodexRemoteWindow | null;
};

// ~5 credits per local task at $0.01 per credit.
export const CODEX_ESTIMATED_COST_PER_MESSAGE_CENTS = 5;
export const CODEX_PRO_MESSAGE_LIMIT = 1500;
export const CODEX_DEFAULT_MESSAGE_LIMIT = 225;
const CODEX_FALLBACK_PLAN_TIER = "Plus";

export const ESTIMATED_UTILIZATION_ISSUE: UsageIssue = {
  code: "ESTIMATED_UTILIZATION",
  message: "No rate-limit data found; utilization is estimated from the local message count",
  severity: "warning",
};

const parseRemoteWindow = (value: unknown): CodexRemoteWindow | null => {
  if (!isRecord(value)) {
    return null;
  }
  const limitWindowSeconds = asNumber(value.limit_window_seconds);
  return {
    usedPercent: asNumber(value.used_percent),
    resetsAtMs: asEpochMs(value.reset_at),
    windowMinutes: limitWindowSeconds == null ? null : Math.trunc(limitWindowSeconds / 60),
  };
};

export const parseCodexRemoteRateLimits = (value: unknown): CodexRemoteRateLimits | null => {
  if (!isRecord(value)) {
    return null;
  }
  const rateLimit = value.rate_limit;
  if (!isRecord(rateLimit)) {
    return null;
  }
  return {
    planType: asNonEmptyString(value.plan_type),
    primary: parseRemoteWindow(rateLimit.primary_window),
    secondary: parseRemoteWindow(rateLimit.secondary_window),
  };
};

/** A remote window replaces the local reading when it carries a reset, else only its percentage. */
const overlayRemoteWindow = (
  local: RollingWindowReading | null,
  remote: CodexRemoteWindow | null,
  defaultWindowMins: number,
  nowMs: number,
): RollingWindowReading | null => {
  if (!remote) {
    return local;
  }
  if (remote.resetsAtMs != null) {
    return applyWindowRollover(
      {
        utilizationPercent: remote.usedPercent ?? local?.utilizationPercent ?? null,
        resetsAtMs: remote.resetsAtMs,
        windowDurationMins: remote.windowMinutes ?? defaultWindowMins,
      },
      nowMs,
    );
  }
  if (remote.usedPercent != null) {
    return {
      utilizationPercent: remote.usedPercent,
      resetsAtMs: local?.resetsAtMs ?? null,
      windowDurationMins: remote.windowMinutes ?? local?.windowDurationMins ?? defaultWindowMins,
    };
  }
  return local;
};

export const resolveCodexMessageLimit = (planLabel: string | null) =>
  planLabel?.toLowerCase().includes("pro") ? CODEX_PRO_MESSAGE_LIMIT : CODEX_DEFAULT_MESSAGE_LIMIT;

export const normalizeCodexUsage = ({
  scan,
  remote,
  credentialPlanHint,
  configMentionsPro,
  nowMs,
  issues = [],
}: {
  scan: SessionScan;
  remote: CodexRemoteRateLimits | null;
  credentialPlanHint: string | null;
  /** Last-resort plan heuristic: the CLI config file mentions "pro". */
  configMentionsPro: boolean;
  nowMs: number;
  issues?: UsageIssue[];
}): UsageSnapshot => {
  const { stats } = scan;
  const rawPlan = remote?.planType ?? stats.planType ?? credentialPlanHint;
  let planLabel: string | null;
  if (rawPlan) {
    planLabel = withProviderPrefix("codex", normalizePlanTier(rawPlan));
  } else if (scan.tierLabel) {
    planLabel = scan.tierLabel;
  } else {
    planLabel = withProviderPrefix("codex", configMentionsPro ? "Pro" : CODEX_FALLBACK_PLAN_TIER);
  }

  let primary = overlayRemoteWindow(
    scan.primary,
    remote?.primary ?? null,
    DEFAULT_PRIMARY_WINDOW_MINS,
    nowMs,
  );
  const secondary = overlayRemoteWindow(
    scan.secondary,
    remote?.secondary ?? null,
    DEFAULT_SECONDARY_WINDOW_MINS,
    nowMs,
  );

  let nextIssues = issues;
  if (primary?.utilizationPercent == null) {
    // Fallback: share of the estimated per-window message allowance.
    const messageLimit = resolveCodexMessageLimit(planLabel);
    primary = {
      utilizationPercent: Math.min(100, (stats.messageCount * 100) / messageLimit),
      resetsAtMs: primary?.resetsAtMs ?? null,
      windowDurationMins: primary?.windowDurationMins ?? DEFAULT_PRIMARY_WINDOW_MINS,
    };
    nextIssues = appendIssue(nextIssues, ESTIMATED_UTILIZATION_ISSUE);
  }

  return {
    providerId: "codex",
    providerLabel: PROVIDER_LABELS.codex,
    planLabel,
    windows: compactWindows([
      createUsageWindow({ id: "primary", title: "5 hours", reading: primary }),
      createUsageWindow({ id: "secondary", title: "7 days", reading: secondary }),
    ]),
    tokens: { ...stats.tokens },
    tokensProvenance: stats.tokensEstimated ? "estimated" : "measured",
    messageCount: stats.messageCount,
    // messages x $0.05, kept in whole cents
    cost: {
      amount: (stats.messageCount * CODEX_ESTIMATED_COST_PER_MESSAGE_CENTS) / 100,
      currency: "USD",
      provenance: "estimated",
    },
    sourceLabel: remote ? "Codex usage API + session logs" : "Codex session logs",
    issues: nextIssues,
    fetchedAt: new Date(nowMs).toISOString(),
  };
};
