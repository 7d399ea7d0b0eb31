import type { ClaudeRateLimitHeaders } from "../usage-normalizer/claude-usage-normalizer";
import { UsageProbeError } from "../usage/usage-error";
import { asEpochMs, asNumber } from "../usage/value-parsers";
import { joinUrl, toTransportError, USER_AGENT, withTimeout } from "./http-json";
import type { StatusProbeCache } from "./status-probe-cache";

const ANTHROPIC_VERSION = "2023-06-01";
const STATUS_PROBE_BETA = "interleaved-thinking-2025-05-14";
const STATUS_PROBE_MODEL = "claude-sonnet-4-20250514";
const HEADER_PREFIX = "anthropic-ratelimit-unified";

type ClaudeStatusProbeOptions = {
  baseUrl: string;
  accessToken: string;
  timeoutMs: number;
  cache: StatusProbeCache<ClaudeRateLimitHeaders>;
};

const readHeader = (headers: Headers, names: string[]) => {
  for (const name of names) {
    const value = headers.get(`${HEADER_PREFIX}-${name}`);
    if (value != null && value.trim().length > 0) {
      return value;
    }
  }
  return null;
};

export const parseRateLimitHeaders = (headers: Headers): ClaudeRateLimitHeaders => ({
  primaryUtilization: asNumber(readHeader(headers, ["5h-utilization", "five-minute-utilization"])),
  secondaryUtilization: asNumber(readHeader(headers, ["7d-utilization", "daily-utilization"])),
  primaryResetsAtMs: asEpochMs(readHeader(headers, ["5h-reset", "five-minute-reset"])),
  secondaryResetsAtMs: asEpochMs(readHeader(headers, ["7d-reset", "daily-reset"])),
});

const hasUtilization = (headers: ClaudeRateLimitHeaders) =>
  headers.primaryUtilization != null || headers.secondaryUtilization != null;

/**
 * Sends a one-token message and reads the unified rate-limit headers off the response.
 * The headers are present on error statuses too, so the status code only matters when
 * they are missing.
 */
export const probeClaudeRateLimits = async ({
  baseUrl,
  accessToken,
  timeoutMs,
  cache,
}: ClaudeStatusProbeOptions): Promise<ClaudeRateLimitHeaders> => {
  const cached = cache.get(baseUrl);
  if (cached) {
    return cached;
  }

  const url = joinUrl(baseUrl, "/v1/messages");
  let response: Response;
  try {
    response = await withTimeout(timeoutMs, (signal) =>
      fetch(url, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${accessToken}`,
          "Content-Type": "application/json",
          Accept: "application/json",
          "anthropic-version": ANTHROPIC_VERSION,
          "anthropic-beta": STATUS_PROBE_BETA,
          "User-Agent": USER_AGENT,
        },
        body: JSON.stringify({
          model: STATUS_PROBE_MODEL,
          max_tokens: 1,
          messages: [{ role: "user", content: "." }],
        }),
        signal,
      }),
    );
  } catch (error) {
    throw toTransportError(error, "Claude status probe");
  }
  await response.body?.cancel().catch(() => undefined);

  const headers = parseRateLimitHeaders(response.headers);
  if (hasUtilization(headers)) {
    cache.set(baseUrl, headers);
    return headers;
  }
  if (response.status === 401 || response.status === 403) {
    throw new UsageProbeError(
      "UNAUTHORIZED",
      `Claude status probe rejected the access token (${response.status})`,
      response.status,
    );
  }
  throw new UsageProbeError("NO_DATA", "Claude status probe returned no rate-limit headers");
};
