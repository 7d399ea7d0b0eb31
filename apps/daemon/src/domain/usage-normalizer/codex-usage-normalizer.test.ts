import { describe, expect, it } from "vitest";

import {
  createEmptySessionStats,
  NO_LOCAL_SESSIONS_LABEL,
  type SessionScan,
} from "../session-logs/session-log-scanner";
import {
  ESTIMATED_UTILIZATION_ISSUE,
  normalizeCodexUsage,
  parseCodexRemoteRateLimits,
} from "./codex-usage-normalizer";

const NOW_MS = Date.parse("2026-03-01T12:00:00.000Z");
const HOUR_MS = 3_600_000;

const createScan = (overrides: Partial<SessionScan> = {}): SessionScan => ({
  rootFound: true,
  stats: createEmptySessionStats(),
  primary: null,
  secondary: null,
  tierLabel: null,
  ...overrides,
});

describe("parseCodexRemoteRateLimits", () => {
  it("reads windows from the usage endpoint payload", () => {
    expect(
      parseCodexRemoteRateLimits({
        plan_type: "pro",
        rate_limit: {
          primary_window: { used_percent: 35, reset_at: 1_772_380_800, limit_window_seconds: 18_000 },
          secondary_window: null,
        },
      }),
    ).toEqual({
      planType: "pro",
      primary: { usedPercent: 35, resetsAtMs: 1_772_380_800_000, windowMinutes: 300 },
      secondary: null,
    });
  });

  it("rejects payloads without rate_limit", () => {
    expect(parseCodexRemoteRateLimits({ plan_type: "pro" })).toBeNull();
    expect(parseCodexRemoteRateLimits([])).toBeNull();
  });
});

describe("normalizeCodexUsage", () => {
  it("overlays remote windows on the local scan", () => {
    const snapshot = normalizeCodexUsage({
      scan: createScan({
        stats: {
          ...createEmptySessionStats(),
          fileCount: 1,
          messageCount: 4,
          tokens: { inputTokens: 100, outputTokens: 50, totalTokens: 150 },
        },
        primary: { utilizationPercent: 20, resetsAtMs: NOW_MS + 2 * HOUR_MS, windowDurationMins: 300 },
      }),
      remote: {
        planType: "pro",
        primary: { usedPercent: 35, resetsAtMs: NOW_MS + 3 * HOUR_MS, windowMinutes: 300 },
        secondary: { usedPercent: 12, resetsAtMs: NOW_MS - HOUR_MS, windowMinutes: 10_080 },
      },
      credentialPlanHint: null,
      configMentionsPro: false,
      nowMs: NOW_MS,
    });

    expect(snapshot.planLabel).toBe("Codex Pro");
    expect(snapshot.windows).toEqual([
      {
        id: "primary",
        title: "5 hours",
        utilizationPercent: 35,
        resetsAt: "2026-03-01T15:00:00.000Z",
        windowDurationMins: 300,
      },
      {
        id: "secondary",
        title: "7 days",
        utilizationPercent: 0,
        resetsAt: "2026-03-08T11:00:00.000Z",
        windowDurationMins: 10_080,
      },
    ]);
    expect(snapshot.tokens).toEqual({ inputTokens: 100, outputTokens: 50, totalTokens: 150 });
    expect(snapshot.tokensProvenance).toBe("measured");
    expect(snapshot.messageCount).toBe(4);
    expect(snapshot.cost).toEqual({ amount: 0.2, currency: "USD", provenance: "estimated" });
    expect(snapshot.sourceLabel).toBe("Codex usage API + session logs");
    expect(snapshot.issues).toEqual([]);
  });

  it("estimates utilization from the message count without rate limits", () => {
    const snapshot = normalizeCodexUsage({
      scan: createScan({
        stats: { ...createEmptySessionStats(), fileCount: 2, messageCount: 45, tokensEstimated: true },
      }),
      remote: null,
      credentialPlanHint: null,
      configMentionsPro: false,
      nowMs: NOW_MS,
    });

    expect(snapshot.planLabel).toBe("Codex Plus");
    expect(snapshot.windows).toEqual([
      {
        id: "primary",
        title: "5 hours",
        utilizationPercent: 20,
        resetsAt: null,
        windowDurationMins: 300,
      },
    ]);
    expect(snapshot.tokensProvenance).toBe("estimated");
    expect(snapshot.issues).toEqual([ESTIMATED_UTILIZATION_ISSUE]);
    expect(snapshot.sourceLabel).toBe("Codex session logs");
  });

  it("uses the larger allowance when the config mentions pro", () => {
    const snapshot = normalizeCodexUsage({
      scan: createScan({ stats: { ...createEmptySessionStats(), messageCount: 300 } }),
      remote: null,
      credentialPlanHint: null,
      configMentionsPro: true,
      nowMs: NOW_MS,
    });

    expect(snapshot.planLabel).toBe("Codex Pro");
    expect(snapshot.windows[0]?.utilizationPercent).toBe(20);
  });

  it("prefers the session plan over the credential hint", () => {
    const snapshot = normalizeCodexUsage({
      scan: createScan({ stats: { ...createEmptySessionStats(), planType: "team" } }),
      remote: null,
      credentialPlanHint: "plus",
      configMentionsPro: false,
      nowMs: NOW_MS,
    });

    expect(snapshot.planLabel).toBe("Codex Team");
  });

  it("labels a missing sessions directory", () => {
    const snapshot = normalizeCodexUsage({
      scan: createScan({ rootFound: false, tierLabel: NO_LOCAL_SESSIONS_LABEL }),
      remote: null,
      credentialPlanHint: null,
      configMentionsPro: false,
      nowMs: NOW_MS,
    });

    expect(snapshot.planLabel).toBe("No local sessions");
    expect(snapshot.windows[0]?.utilizationPercent).toBe(0);
    expect(snapshot.cost).toEqual({ amount: 0, currency: "USD", provenance: "estimated" });
  });
});
