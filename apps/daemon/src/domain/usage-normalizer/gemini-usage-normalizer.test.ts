import { describe, expect, it } from "vitest";

import {
  normalizeGeminiQuota,
  parseGeminiQuotaPayload,
  resolveGeminiPlanLabel,
} from "./gemini-usage-normalizer";

const NOW_MS = Date.parse("2026-03-01T12:00:00.000Z");

describe("parseGeminiQuotaPayload", () => {
  it("defaults a missing remaining fraction to full quota", () => {
    expect(
      parseGeminiQuotaPayload({
        buckets: [{ modelId: "gemini-2.5-flash" }, "junk"],
        userTierId: "free-tier",
      }),
    ).toEqual({
      buckets: [{ modelId: "gemini-2.5-flash", remainingFraction: 1, resetsAtMs: null }],
      tier: "free-tier",
    });
  });
});

describe("resolveGeminiPlanLabel", () => {
  it("maps paid tiers and falls back to pro model presence", () => {
    expect(resolveGeminiPlanLabel("standard-tier", false)).toBe("Gemini Pro");
    expect(resolveGeminiPlanLabel("free-tier", true)).toBe("Gemini Free");
    expect(resolveGeminiPlanLabel(null, true)).toBe("Gemini Pro");
    expect(resolveGeminiPlanLabel(null, false)).toBe("Gemini Free");
  });
});

describe("normalizeGeminiQuota", () => {
  it("reports the lowest bucket per model family", () => {
    const payload = parseGeminiQuotaPayload({
      tier: "standard-tier",
      buckets: [
        { modelId: "gemini-2.5-pro", remainingFraction: 0.75, resetTime: "2026-03-01T22:00:00Z" },
        { modelId: "gemini-3-pro-preview", remainingFraction: 0.5, resetTime: "2026-03-01T20:00:00Z" },
        { modelId: "gemini-2.5-pro_vertex", remainingFraction: 0.1, resetTime: "2026-03-01T20:00:00Z" },
        { modelId: "gemini-2.5-flash", remainingFraction: 0.25, resetTime: "2026-03-01T10:00:00Z" },
        { modelId: "gemini-2.5-flash-lite", remainingFraction: 0.9, resetTime: "2026-03-01T10:00:00Z" },
      ],
    });
    if (!payload) {
      throw new Error("expected payload");
    }

    const snapshot = normalizeGeminiQuota({ payload, nowMs: NOW_MS });

    expect(snapshot.planLabel).toBe("Gemini Pro");
    expect(snapshot.windows).toEqual([
      {
        id: "primary",
        title: "Pro models",
        utilizationPercent: 50,
        resetsAt: "2026-03-01T20:00:00.000Z",
        windowDurationMins: 1_440,
      },
      {
        id: "secondary",
        title: "Flash models",
        utilizationPercent: 0,
        resetsAt: "2026-03-02T10:00:00.000Z",
        windowDurationMins: 1_440,
      },
    ]);
    expect(snapshot.sourceLabel).toBe("Gemini Code Assist quota API");
  });

  it("omits families without buckets", () => {
    const snapshot = normalizeGeminiQuota({
      payload: { tier: null, buckets: [{ modelId: "gemini-2.5-flash", remainingFraction: 0.8, resetsAtMs: null }] },
      nowMs: NOW_MS,
    });

    expect(snapshot.planLabel).toBe("Gemini Free");
    expect(snapshot.windows).toEqual([
      {
        id: "secondary",
        title: "Flash models",
        utilizationPercent: 20,
        resetsAt: null,
        windowDurationMins: 1_440,
      },
    ]);
  });
});
