import type { UsageCost, UsageIssue, UsageSnapshot } from "@quotabar/shared";

import { asEpochMs, asNumber, isRecord } from "../usage/value-parsers";
import { applyWindowRollover, type RollingWindowReading } from "../usage/window-rollover";
import {
  compactWindows,
  createUsageWindow,
  normalizePlanTier,
  PROVIDER_LABELS,
  withProviderPrefix,
} from "./usage-normalizer";

export type ClaudeUsageWindowPayload = {
  utilization: number;
  resetsAtMs: number | null;
};

export type ClaudeUsagePayload = {
  fiveHour: ClaudeUsageWindowPayload | null;
  sevenDay: ClaudeUsageWindowPayload | null;
  sevenDayOpus: ClaudeUsageWindowPayload | null;
  sevenDaySonnet: ClaudeUsageWindowPayload | null;
  sevenDayOauthApps: ClaudeUsageWindowPayload | null;
  extraUsageCreditsUsedCents: number | null;
};

/** Utilization readings taken from `anthropic-ratelimit-unified-*` response headers. */
export type ClaudeRateLimitHeaders = {
  primaryUtilization: number | null;
  secondaryUtilization: number | null;
  primaryResetsAtMs: number | null;
  secondaryResetsAtMs: number | null;
};

const FIVE_HOUR_MINS = 300;
const SEVEN_DAY_MINS = 10_080;

const parseWindow = (value: unknown): ClaudeUsageWindowPayload | null => {
  if (!isRecord(value)) {
    return null;
  }
  const utilization = asNumber(value.utilization);
  if (utilization == null) {
    return null;
  }
  return {
    utilization,
    resetsAtMs: asEpochMs(value.resets_at ?? value.resetsAt),
  };
};

export const parseClaudeUsagePayload = (value: unknown): ClaudeUsagePayload | null => {
  if (!isRecord(value)) {
    return null;
  }
  const extraUsage = value.extra_usage;
  const payload: ClaudeUsagePayload = {
    fiveHour: parseWindow(value.five_hour),
    sevenDay: parseWindow(value.seven_day),
    sevenDayOpus: parseWindow(value.seven_day_opus),
    sevenDaySonnet: parseWindow(value.seven_day_sonnet),
    sevenDayOauthApps: parseWindow(value.seven_day_oauth_apps),
    extraUsageCreditsUsedCents: isRecord(extraUsage) ? asNumber(extraUsage.credits_used_cents) : null,
  };
  if (!payload.fiveHour && !payload.sevenDay) {
    return null;
  }
  return payload;
};

const toReading = (
  window: ClaudeUsageWindowPayload | null,
  windowDurationMins: number,
  nowMs: number,
): RollingWindowReading | null => {
  if (!window) {
    return null;
  }
  return applyWindowRollover(
    {
      utilizationPercent: window.utilization,
      resetsAtMs: window.resetsAtMs,
      windowDurationMins,
    },
    nowMs,
  );
};

export const normalizeClaudeUsage = ({
  payload,
  planHint,
  nowMs,
}: {
  payload: ClaudeUsagePayload;
  planHint: string | null;
  nowMs: number;
}): UsageSnapshot => {
  const windows = compactWindows([
    createUsageWindow({
      id: "primary",
      title: "5 hours",
      reading: toReading(payload.fiveHour, FIVE_HOUR_MINS, nowMs),
    }),
    createUsageWindow({
      id: "secondary",
      title: "7 days",
      reading: toReading(payload.sevenDay, SEVEN_DAY_MINS, nowMs),
    }),
    createUsageWindow({
      id: "model",
      title: "Opus (7 days)",
      reading: toReading(payload.sevenDayOpus, SEVEN_DAY_MINS, nowMs),
    }),
    createUsageWindow({
      id: "model",
      title: "Sonnet (7 days)",
      reading: toReading(payload.sevenDaySonnet, SEVEN_DAY_MINS, nowMs),
    }),
    createUsageWindow({
      id: "model",
      title: "OAuth apps (7 days)",
      reading: toReading(payload.sevenDayOauthApps, SEVEN_DAY_MINS, nowMs),
    }),
  ]);

  const cost: UsageCost | null =
    payload.extraUsageCreditsUsedCents == null
      ? null
      : {
          amount: payload.extraUsageCreditsUsedCents / 100,
          currency: "USD",
          provenance: "measured",
        };

  return {
    providerId: "claude",
    providerLabel: PROVIDER_LABELS.claude,
    planLabel: withProviderPrefix("claude", normalizePlanTier(planHint)),
    windows,
    tokens: null,
    tokensProvenance: null,
    messageCount: null,
    cost,
    sourceLabel: "Claude OAuth usage API",
    issues: [],
    fetchedAt: new Date(nowMs).toISOString(),
  };
};

export const STATUS_PROBE_FALLBACK_ISSUE: UsageIssue = {
  code: "STATUS_PROBE_FALLBACK",
  message: "Usage API unavailable; showing rate-limit headers from a probe request",
  severity: "warning",
};

export const normalizeClaudeRateLimitHeaders = ({
  headers,
  planHint,
  nowMs,
  issues = [],
}: {
  headers: ClaudeRateLimitHeaders;
  planHint: string | null;
  nowMs: number;
  issues?: UsageIssue[];
}): UsageSnapshot => {
  const reading = (
    utilization: number | null,
    resetsAtMs: number | null,
    windowDurationMins: number,
  ) =>
    utilization == null
      ? null
      : applyWindowRollover({ utilizationPercent: utilization, resetsAtMs, windowDurationMins }, nowMs);

  return {
    providerId: "claude",
    providerLabel: PROVIDER_LABELS.claude,
    planLabel: withProviderPrefix("claude", normalizePlanTier(planHint)),
    windows: compactWindows([
      createUsageWindow({
        id: "primary",
        title: "5 hours",
        reading: reading(headers.primaryUtilization, headers.primaryResetsAtMs, FIVE_HOUR_MINS),
      }),
      createUsageWindow({
        id: "secondary",
        title: "7 days",
        reading: reading(headers.secondaryUtilization, headers.secondaryResetsAtMs, SEVEN_DAY_MINS),
      }),
    ]),
    tokens: null,
    tokensProvenance: null,
    messageCount: null,
    cost: null,
    sourceLabel: "Claude rate-limit headers",
    issues: [STATUS_PROBE_FALLBACK_ISSUE, ...issues],
    fetchedAt: new Date(nowMs).toISOString(),
  };
};
