import { afterEach, describe, expect, it, vi } from "vitest";

import type { ClaudeRateLimitHeaders } from "../usage-normalizer/claude-usage-normalizer";
import { parseRateLimitHeaders, probeClaudeRateLimits } from "./claude-status-probe";
import { createStatusProbeCache } from "./status-probe-cache";

const rateLimitResponse = () =>
  new Response("{}", {
    status: 200,
    headers: {
      "anthropic-ratelimit-unified-5h-utilization": "64",
      "anthropic-ratelimit-unified-7d-utilization": "20",
    },
  });

describe("parseRateLimitHeaders", () => {
  it("accepts the alternate window names", () => {
    const headers = new Headers({
      "anthropic-ratelimit-unified-five-minute-utilization": "12.5",
      "anthropic-ratelimit-unified-daily-utilization": "40",
      "anthropic-ratelimit-unified-daily-reset": "1772452800",
    });

    expect(parseRateLimitHeaders(headers)).toEqual({
      primaryUtilization: 12.5,
      secondaryUtilization: 40,
      primaryResetsAtMs: null,
      secondaryResetsAtMs: 1_772_452_800_000,
    });
  });
});

describe("probeClaudeRateLimits", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts a one-token message and caches the headers per base URL", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(async () => rateLimitResponse());
    vi.stubGlobal("fetch", fetchMock);
    const cache = createStatusProbeCache<ClaudeRateLimitHeaders>();

    const first = await probeClaudeRateLimits({
      baseUrl: "https://api.anthropic.com",
      accessToken: "test-access",
      timeoutMs: 1_000,
      cache,
    });
    await probeClaudeRateLimits({
      baseUrl: "https://api.anthropic.com",
      accessToken: "test-access",
      timeoutMs: 1_000,
      cache,
    });
    await probeClaudeRateLimits({
      baseUrl: "https://proxy.test",
      accessToken: "test-access",
      timeoutMs: 1_000,
      cache,
    });

    expect(first).toEqual({
      primaryUtilization: 64,
      secondaryUtilization: 20,
      primaryResetsAtMs: null,
      secondaryResetsAtMs: null,
    });
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(String(fetchMock.mock.calls[1]?.[0])).toBe("https://proxy.test/v1/messages");
    const init = fetchMock.mock.calls[0]?.[1];
    const headers = new Headers(init?.headers);
    expect(headers.get("anthropic-version")).toBe("2023-06-01");
    expect(headers.get("authorization")).toBe("Bearer test-access");
    expect(JSON.parse(String(init?.body))).toMatchObject({ max_tokens: 1 });
  });

  it("does not cache a response without headers", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(async () => new Response("{}"));
    vi.stubGlobal("fetch", fetchMock);
    const cache = createStatusProbeCache<ClaudeRateLimitHeaders>();
    const options = {
      baseUrl: "https://api.anthropic.com",
      accessToken: "test-access",
      timeoutMs: 1_000,
      cache,
    };

    await expect(probeClaudeRateLimits(options)).rejects.toMatchObject({ code: "NO_DATA" });
    await expect(probeClaudeRateLimits(options)).rejects.toMatchObject({ code: "NO_DATA" });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});
