import { CredentialRefreshError, UsageProviderError } from "../usage/usage-error";
import { asEpochMs, asNonEmptyString, asNumber, asStringList, isRecord } from "../usage/value-parsers";
import type { RefreshedTokens } from "./types";

type TokenGrantRequest = {
  endpoint: string;
  providerLabel: string;
  timeoutMs: number;
  body: { kind: "form"; fields: Record<string, string> } | { kind: "json"; value: unknown };
};

const MAX_ERROR_BODY_LENGTH = 200;

export const parseRefreshResponse = (value: unknown, nowMs: number): RefreshedTokens | null => {
  if (!isRecord(value)) {
    return null;
  }
  const accessToken = asNonEmptyString(value.access_token) ?? asNonEmptyString(value.accessToken);
  if (!accessToken) {
    return null;
  }
  const expiresInSec = asNumber(value.expires_in ?? value.expiresIn);
  const expiresAtMs =
    asEpochMs(value.expires_at ?? value.expiresAt) ??
    (expiresInSec != null && expiresInSec > 0 ? nowMs + expiresInSec * 1000 : null);
  const scopes = asStringList(value.scope ?? value.scopes);
  return {
    accessToken,
    refreshToken: asNonEmptyString(value.refresh_token) ?? asNonEmptyString(value.refreshToken),
    expiresAtMs,
    scopes: scopes.length > 0 ? scopes : null,
    idToken: asNonEmptyString(value.id_token) ?? asNonEmptyString(value.idToken),
  };
};

const readErrorDetail = async (response: Response) => {
  const text = await response.text().catch(() => "");
  const trimmed = text.trim().slice(0, MAX_ERROR_BODY_LENGTH);
  return trimmed.length > 0 ? `: ${trimmed}` : "";
};

export const postTokenGrant = async ({
  endpoint,
  providerLabel,
  timeoutMs,
  body,
}: TokenGrantRequest): Promise<RefreshedTokens> => {
  const controller = new AbortController();
  const timeoutHandle = setTimeout(() => {
    controller.abort();
  }, timeoutMs);
  try {
    const response = await fetch(endpoint, {
      method: "POST",
      headers: {
        Accept: "application/json",
        "Content-Type":
          body.kind === "form" ? "application/x-www-form-urlencoded" : "application/json",
      },
      body:
        body.kind === "form"
          ? new URLSearchParams(body.fields).toString()
          : JSON.stringify(body.value),
      signal: controller.signal,
    });

    if (!response.ok) {
      const detail = await readErrorDetail(response);
      throw new CredentialRefreshError(
        "REFRESH_REJECTED",
        `${providerLabel} token refresh was rejected (${response.status})${detail}`,
        response.status,
      );
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch {
      throw new CredentialRefreshError(
        "INVALID_RESPONSE",
        `${providerLabel} token refresh returned non-JSON response`,
      );
    }
    const refreshed = parseRefreshResponse(data, Date.now());
    if (!refreshed) {
      throw new CredentialRefreshError(
        "INVALID_RESPONSE",
        `${providerLabel} token refresh response format is unsupported`,
      );
    }
    return refreshed;
  } catch (error) {
    if (error instanceof CredentialRefreshError) {
      throw error;
    }
    if (error instanceof Error && error.name === "AbortError") {
      throw new UsageProviderError("UPSTREAM_UNAVAILABLE", `${providerLabel} token refresh timed out`);
    }
    throw new UsageProviderError(
      "UPSTREAM_UNAVAILABLE",
      `Failed to refresh ${providerLabel} OAuth token`,
    );
  } finally {
    clearTimeout(timeoutHandle);
  }
};
