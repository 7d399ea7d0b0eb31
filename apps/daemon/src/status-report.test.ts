import type { UsageStateResponse } from "@quotabar/shared";
import { describe, expect, it } from "vitest";

import { createPlaceholderSnapshot } from "./domain/usage-normalizer/usage-normalizer";
import { OrchestrationError } from "./domain/usage/usage-error";
import { assertAnyProviderSucceeded, collectFailures, renderStatusText } from "./status-report";

const NOW_MS = Date.parse("2026-03-01T12:00:00.000Z");

const mixedState: UsageStateResponse = {
  providers: [
    {
      providerId: "claude",
      snapshot: {
        ...createPlaceholderSnapshot("claude", NOW_MS),
        planLabel: "Claude Max",
        windows: [
          {
            id: "primary",
            title: "5 hours",
            utilizationPercent: 42.4,
            resetsAt: "2026-03-01T14:00:00.000Z",
            windowDurationMins: 300,
          },
          {
            id: "secondary",
            title: "7 days",
            utilizationPercent: 101,
            resetsAt: null,
            windowDurationMins: 10_080,
          },
        ],
      },
      status: "ok",
      error: null,
      lastSuccessAt: "2026-03-01T12:00:00.000Z",
    },
    {
      providerId: "codex",
      snapshot: null,
      status: "stale",
      error: "request timed out",
      lastSuccessAt: null,
    },
    {
      providerId: "gemini",
      snapshot: null,
      status: "needs-reauth",
      error: "token rejected",
      lastSuccessAt: null,
    },
  ],
  lastRefreshedAt: "2026-03-01T12:00:00.000Z",
  busy: false,
  errors: [],
  refreshIntervalMinutes: 5,
};

const failedState: UsageStateResponse = {
  ...mixedState,
  providers: mixedState.providers.slice(1),
};

describe("renderStatusText", () => {
  it("prints one block per provider with clamped percentages", () => {
    expect(renderStatusText(mixedState)).toBe(
      [
        "Claude: ok [Claude Max]",
        "  5 hours 42% (resets 2026-03-01T14:00:00.000Z)",
        "  7 days 100%",
        "Codex: stale",
        "  error: request timed out",
        "Gemini: needs-reauth",
        "  error: token rejected",
      ].join("\n"),
    );
  });

  it("says so when nothing is enabled", () => {
    expect(renderStatusText({ ...mixedState, providers: [] })).toBe("no providers enabled");
  });
});

describe("assertAnyProviderSucceeded", () => {
  it("lets a partial failure through", () => {
    expect(collectFailures(mixedState)).toEqual([
      { providerId: "codex", message: "request timed out" },
      { providerId: "gemini", message: "token rejected" },
    ]);
    expect(() => assertAnyProviderSucceeded(mixedState)).not.toThrow();
  });

  it("aggregates failures when every provider failed", () => {
    let caught: unknown = null;
    try {
      assertAnyProviderSucceeded(failedState);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(OrchestrationError);
    expect(caught).toMatchObject({
      message: "codex: request timed out; gemini: token rejected",
      failures: [
        { providerId: "codex", message: "request timed out" },
        { providerId: "gemini", message: "token rejected" },
      ],
    });
  });
});
