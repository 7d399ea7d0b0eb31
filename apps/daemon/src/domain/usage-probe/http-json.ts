import { UsageProbeError } from "../usage/usage-error";

export const USER_AGENT = "quotabar";

const MAX_ERROR_BODY_LENGTH = 200;

type JsonRequest = {
  url: string;
  method?: "GET" | "POST";
  headers: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
  /** Used in error messages, e.g. `Codex usage API`. */
  label: string;
};

export type JsonResponse = {
  data: unknown;
  status: number;
  headers: Headers;
};

export const isHttpUrl = (value: string) => {
  try {
    const url = new URL(value);
    return url.protocol === "https:" || url.protocol === "http:";
  } catch {
    return false;
  }
};

/** Joins a base URL and an absolute path, keeping any path prefix of the base. */
export const joinUrl = (baseUrl: string, pathname: string) => {
  if (!isHttpUrl(baseUrl)) {
    throw new UsageProbeError("INVALID_URL", `Invalid base URL: ${baseUrl}`);
  }
  return `${baseUrl.replace(/\/+$/, "")}${pathname}`;
};

/** Replaces the whole path (and query) of the base URL. */
export const originUrl = (baseUrl: string, pathname: string) => {
  if (!isHttpUrl(baseUrl)) {
    throw new UsageProbeError("INVALID_URL", `Invalid base URL: ${baseUrl}`);
  }
  return `${new URL(baseUrl).origin}${pathname}`;
};

const readErrorBody = async (response: Response) => {
  const text = await response.text().catch(() => "");
  return text.trim().slice(0, MAX_ERROR_BODY_LENGTH);
};

export const withTimeout = async <T>(
  timeoutMs: number,
  run: (signal: AbortSignal) => Promise<T>,
): Promise<T> => {
  const controller = new AbortController();
  const timeoutHandle = setTimeout(() => {
    controller.abort();
  }, timeoutMs);
  try {
    return await run(controller.signal);
  } finally {
    clearTimeout(timeoutHandle);
  }
};

export const toTransportError = (error: unknown, label: string) => {
  if (error instanceof UsageProbeError) {
    return error;
  }
  if (error instanceof Error && error.name === "AbortError") {
    return new UsageProbeError("HTTP_ERROR", `${label} request timed out`);
  }
  return new UsageProbeError("HTTP_ERROR", `${label} request failed`);
};

export const requestJson = async ({
  url,
  method = "GET",
  headers,
  body,
  timeoutMs,
  label,
}: JsonRequest): Promise<JsonResponse> => {
  if (!isHttpUrl(url)) {
    throw new UsageProbeError("INVALID_URL", `Invalid ${label} URL: ${url}`);
  }
  try {
    return await withTimeout(timeoutMs, async (signal) => {
      const response = await fetch(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal,
      });

      if (response.status === 401 || response.status === 403) {
        throw new UsageProbeError(
          "UNAUTHORIZED",
          `${label} rejected the access token (${response.status})`,
          response.status,
        );
      }
      if (!response.ok) {
        const detail = await readErrorBody(response);
        throw new UsageProbeError(
          "HTTP_ERROR",
          `${label} request failed (${response.status})${detail ? `: ${detail}` : ""}`,
          response.status,
        );
      }

      let data: unknown;
      try {
        data = await response.json();
      } catch {
        throw new UsageProbeError("INVALID_RESPONSE", `${label} returned non-JSON response`);
      }
      return { data, status: response.status, headers: response.headers };
    });
  } catch (error) {
    throw toTransportError(error, label);
  }
};
