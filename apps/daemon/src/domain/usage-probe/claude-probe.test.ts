import { afterEach, describe, expect, it, type Mock, vi } from "vitest";

import type { Credentials } from "../credentials/types";
import { STATUS_PROBE_FALLBACK_ISSUE } from "../usage-normalizer/claude-usage-normalizer";
import { createClaudeUsageProbe } from "./claude-probe";

const NOW_MS = Date.parse("2026-03-01T12:00:00.000Z");

const createCredentials = (overrides: Partial<Credentials> = {}): Credentials => ({
  providerId: "claude",
  accessToken: "test-access",
  refreshToken: "test-refresh",
  expiresAtMs: null,
  scopes: ["user:inference"],
  planHint: "default_claude_max_5x",
  clientId: null,
  clientSecret: null,
  apiBaseUrl: null,
  accountId: null,
  ...overrides,
});

const usagePayload = {
  five_hour: { utilization: 42, resets_at: "2026-03-01T14:00:00Z" },
  seven_day: { utilization: 12, resets_at: "2026-03-05T12:00:00Z" },
};

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });

const rateLimitResponse = (status = 200) =>
  new Response("{}", {
    status,
    headers: {
      "anthropic-ratelimit-unified-5h-utilization": "37",
      "anthropic-ratelimit-unified-5h-reset": String(NOW_MS / 1000 + 3600),
    },
  });

const createProbe = (env: Record<string, string | undefined> = {}) =>
  createClaudeUsageProbe({
    timeoutMs: 1_000,
    env,
    now: () => NOW_MS,
    logger: { log: vi.fn(), warn: vi.fn() },
  });

const requestedUrl = (fetchMock: Mock<typeof fetch>, index: number) =>
  String(fetchMock.mock.calls[index]?.[0]);

describe("createClaudeUsageProbe", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("reads the OAuth usage API with the bearer token and beta header", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse(usagePayload));
    vi.stubGlobal("fetch", fetchMock);

    const snapshot = await createProbe().fetchUsage(createCredentials());

    expect(requestedUrl(fetchMock, 0)).toBe("https://api.anthropic.com/api/oauth/usage");
    const headers = new Headers(fetchMock.mock.calls[0]?.[1]?.headers);
    expect(headers.get("authorization")).toBe("Bearer test-access");
    expect(headers.get("anthropic-beta")).toBe("oauth-2025-04-20");
    expect(snapshot.sourceLabel).toBe("Claude OAuth usage API");
    expect(snapshot.planLabel).toBe("Claude Max");
    expect(snapshot.windows.map((window) => window.utilizationPercent)).toEqual([42, 12]);
  });

  it("tries the configured base URL before the default", async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(new Response("not found", { status: 404 }))
      .mockResolvedValueOnce(jsonResponse(usagePayload));
    vi.stubGlobal("fetch", fetchMock);

    const snapshot = await createProbe({ ANTHROPIC_BASE_URL: "https://proxy.test/" }).fetchUsage(
      createCredentials(),
    );

    expect(requestedUrl(fetchMock, 0)).toBe("https://proxy.test/api/oauth/usage");
    expect(requestedUrl(fetchMock, 1)).toBe("https://api.anthropic.com/api/oauth/usage");
    expect(snapshot.sourceLabel).toBe("Claude OAuth usage API");
  });

  it("propagates an unauthorized response without probing further", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({}, 401));
    vi.stubGlobal("fetch", fetchMock);

    await expect(createProbe().fetchUsage(createCredentials())).rejects.toMatchObject({
      code: "UNAUTHORIZED",
      status: 401,
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("falls back to rate-limit headers and caches the probe", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(async (input) => {
      if (String(input).endsWith("/v1/messages")) {
        return rateLimitResponse();
      }
      return new Response("upstream down", { status: 500 });
    });
    vi.stubGlobal("fetch", fetchMock);
    const probe = createProbe();

    const first = await probe.fetchUsage(createCredentials());
    const second = await probe.fetchUsage(createCredentials());

    expect(first.sourceLabel).toBe("Claude rate-limit headers");
    expect(first.windows).toEqual([
      {
        id: "primary",
        title: "5 hours",
        utilizationPercent: 37,
        resetsAt: "2026-03-01T13:00:00.000Z",
        windowDurationMins: 300,
      },
    ]);
    expect(first.issues).toEqual([
      STATUS_PROBE_FALLBACK_ISSUE,
      {
        code: "HTTP_ERROR",
        message: "Claude usage API request failed (500): upstream down",
        severity: "warning",
      },
    ]);
    expect(second.windows).toEqual(first.windows);
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(requestedUrl(fetchMock, 1)).toBe("https://api.anthropic.com/v1/messages");
    expect(fetchMock.mock.calls[1]?.[1]?.method).toBe("POST");
  });

  it("treats a header-less 401 from the probe as unauthorized", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(async (input) =>
      String(input).endsWith("/v1/messages")
        ? new Response("{}", { status: 401 })
        : new Response("gone", { status: 404 }),
    );
    vi.stubGlobal("fetch", fetchMock);

    await expect(createProbe().fetchUsage(createCredentials())).rejects.toMatchObject({
      code: "UNAUTHORIZED",
    });
  });

  it("reports NO_DATA when the probe carries no headers", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(async (input) =>
      String(input).endsWith("/v1/messages")
        ? new Response("{}", { status: 200 })
        : new Response("gone", { status: 404 }),
    );
    vi.stubGlobal("fetch", fetchMock);

    await expect(createProbe().fetchUsage(createCredentials())).rejects.toMatchObject({
      code: "NO_DATA",
    });
  });

  it("rethrows the usage API failure when the status probe is disabled", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response("upstream down", { status: 500 }));
    vi.stubGlobal("fetch", fetchMock);
    const probe = createClaudeUsageProbe({
      timeoutMs: 1_000,
      env: {},
      statusProbeEnabled: false,
      now: () => NOW_MS,
      logger: { log: vi.fn(), warn: vi.fn() },
    });

    await expect(probe.fetchUsage(createCredentials())).rejects.toMatchObject({
      code: "HTTP_ERROR",
      message: "Claude usage API request failed (500): upstream down",
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("requires credentials", async () => {
    await expect(createProbe().fetchUsage(null)).rejects.toMatchObject({ code: "TOKEN_NOT_FOUND" });
  });
});
