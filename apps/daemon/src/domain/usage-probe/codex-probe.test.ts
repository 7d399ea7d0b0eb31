import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { Credentials } from "../credentials/types";
import { ESTIMATED_UTILIZATION_ISSUE } from "../usage-normalizer/codex-usage-normalizer";
import { createCodexUsageProbe, resolveCodexUsagePaths } from "./codex-probe";

const NOW_MS = Date.parse("2026-03-01T12:00:00.000Z");
const HOUR_MS = 3_600_000;

const createCredentials = (overrides: Partial<Credentials> = {}): Credentials => ({
  providerId: "codex",
  accessToken: "test-access",
  refreshToken: "test-refresh",
  expiresAtMs: null,
  scopes: [],
  planHint: null,
  clientId: null,
  clientSecret: null,
  apiBaseUrl: null,
  accountId: null,
  ...overrides,
});

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });

describe("resolveCodexUsagePaths", () => {
  it("puts the backend route first for chatgpt.com and backend-api bases", () => {
    expect(resolveCodexUsagePaths("https://chatgpt.com")).toEqual([
      "/backend-api/wham/usage",
      "/api/codex/usage",
    ]);
    expect(resolveCodexUsagePaths("https://gateway.test/backend-api")).toEqual([
      "/backend-api/wham/usage",
      "/api/codex/usage",
    ]);
    expect(resolveCodexUsagePaths("https://api.openai.com")).toEqual([
      "/api/codex/usage",
      "/backend-api/wham/usage",
    ]);
  });
});

describe("createCodexUsageProbe", () => {
  let codexHome = "";

  const writeSessionLog = (lines: unknown[]) => {
    const filePath = path.join(codexHome, "sessions", "2026", "03", "01", "rollout.jsonl");
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, lines.map((line) => JSON.stringify(line)).join("\n"));
    const modifiedAt = new Date(NOW_MS - HOUR_MS);
    fs.utimesSync(filePath, modifiedAt, modifiedAt);
  };

  const createProbe = () =>
    createCodexUsageProbe({
      codexHome,
      timeoutMs: 1_000,
      now: () => NOW_MS,
      logger: { log: vi.fn(), warn: vi.fn() },
    });

  const taskComplete = { type: "event_msg", payload: { type: "task_complete" } };

  beforeEach(() => {
    codexHome = fs.mkdtempSync(path.join(os.tmpdir(), "quotabar-codex-"));
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    fs.rmSync(codexHome, { recursive: true, force: true });
  });

  it("overlays the remote windows on local session stats", async () => {
    writeSessionLog([taskComplete, taskComplete]);
    fs.writeFileSync(
      path.join(codexHome, "config.toml"),
      'api_base_url = "https://gateway.test/backend-api" # team gateway\n',
    );
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse({
        plan_type: "pro",
        rate_limit: {
          primary_window: {
            used_percent: 35,
            reset_at: NOW_MS / 1000 + 3 * 3600,
            limit_window_seconds: 18_000,
          },
          secondary_window: {
            used_percent: 12,
            reset_at: NOW_MS / 1000 + 24 * 3600,
            limit_window_seconds: 604_800,
          },
        },
      }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const snapshot = await createProbe().fetchUsage(createCredentials());

    expect(String(fetchMock.mock.calls[0]?.[0])).toBe("https://gateway.test/backend-api/wham/usage");
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
        utilizationPercent: 12,
        resetsAt: "2026-03-02T12:00:00.000Z",
        windowDurationMins: 10_080,
      },
    ]);
    expect(snapshot.messageCount).toBe(2);
    expect(snapshot.tokens).toEqual({ inputTokens: 1200, outputTokens: 2800, totalTokens: 4000 });
    expect(snapshot.tokensProvenance).toBe("estimated");
    expect(snapshot.cost).toEqual({ amount: 0.1, currency: "USD", provenance: "estimated" });
    expect(snapshot.sourceLabel).toBe("Codex usage API + session logs");
    expect(snapshot.issues).toEqual([]);
  });

  it("degrades to session logs when every endpoint fails", async () => {
    writeSessionLog([taskComplete]);
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(async () => new Response("down", { status: 500 }));
    vi.stubGlobal("fetch", fetchMock);

    const snapshot = await createProbe().fetchUsage(
      createCredentials({ apiBaseUrl: "https://codex.test" }),
    );

    expect(fetchMock).toHaveBeenCalledTimes(6);
    expect(String(fetchMock.mock.calls[0]?.[0])).toBe("https://codex.test/api/codex/usage");
    expect(snapshot.sourceLabel).toBe("Codex session logs");
    expect(snapshot.issues).toEqual([
      {
        code: "HTTP_ERROR",
        message: "Codex usage API request failed (500): down",
        severity: "warning",
      },
      ESTIMATED_UTILIZATION_ISSUE,
    ]);
  });

  it("propagates an unauthorized response", async () => {
    writeSessionLog([taskComplete]);
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({}, 401));
    vi.stubGlobal("fetch", fetchMock);

    await expect(createProbe().fetchUsage(createCredentials())).rejects.toMatchObject({
      code: "UNAUTHORIZED",
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("reports from local data alone without credentials", async () => {
    const fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal("fetch", fetchMock);

    const snapshot = await createProbe().fetchUsage(null);

    expect(fetchMock).not.toHaveBeenCalled();
    expect(snapshot.planLabel).toBe("No local sessions");
    expect(snapshot.messageCount).toBe(0);
  });
});
