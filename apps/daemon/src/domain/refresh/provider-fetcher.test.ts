import type { ProviderId } from "@quotabar/shared";
import { afterEach, describe, expect, it, vi } from "vitest";

import { createMemorySecretStore } from "../../infra/secret-store/secret-store";
import { createCredentialStore } from "../credentials/credential-store";
import { createCredentialStrategies } from "../credentials/credential-strategies";
import type { Credentials } from "../credentials/types";
import type { UsageProbe } from "../usage-probe/types";
import { createPlaceholderSnapshot } from "../usage-normalizer/usage-normalizer";
import { CredentialRefreshError, UsageProbeError } from "../usage/usage-error";
import { createProviderFetcher } from "./provider-fetcher";

const NOW_MS = Date.parse("2026-03-01T12:00:00.000Z");

const createCredentials = (accessToken: string): Credentials => ({
  providerId: "claude",
  accessToken,
  refreshToken: "test-refresh",
  expiresAtMs: null,
  scopes: [],
  planHint: null,
  clientId: null,
  clientSecret: null,
  apiBaseUrl: null,
  accountId: null,
});

const snapshot = createPlaceholderSnapshot("claude", NOW_MS);
const unauthorized = (message = "rejected") => new UsageProbeError("UNAUTHORIZED", message, 401);

const setup = ({
  credentials = createCredentials("test-access"),
  expired = false,
}: { credentials?: Credentials | null; expired?: boolean } = {}) => {
  const credentialStore = {
    getCredentials: vi.fn(async (_providerId: ProviderId): Promise<Credentials | null> => credentials),
    isExpired: vi.fn((_credentials: Credentials) => expired),
    refresh: vi.fn(async (_providerId: ProviderId) => createCredentials("test-refreshed")),
    invalidateCache: vi.fn((_providerId: ProviderId) => undefined),
  };
  const fetchUsage = vi.fn<UsageProbe["fetchUsage"]>();
  const fetchProvider = createProviderFetcher({
    credentialStore,
    probes: { claude: { providerId: "claude", fetchUsage } },
    logger: { log: vi.fn(), warn: vi.fn() },
  });
  return { credentialStore, fetchUsage, fetchProvider };
};

describe("createProviderFetcher", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("probes with the stored credentials", async () => {
    const { credentialStore, fetchUsage, fetchProvider } = setup();
    fetchUsage.mockResolvedValue(snapshot);

    await expect(fetchProvider("claude")).resolves.toBe(snapshot);
    expect(fetchUsage).toHaveBeenCalledWith(createCredentials("test-access"));
    expect(credentialStore.refresh).not.toHaveBeenCalled();
  });

  it("refreshes expired credentials before probing", async () => {
    const { credentialStore, fetchUsage, fetchProvider } = setup({ expired: true });
    fetchUsage.mockResolvedValue(snapshot);

    await fetchProvider("claude");

    expect(credentialStore.refresh).toHaveBeenCalledTimes(1);
    expect(fetchUsage).toHaveBeenCalledWith(createCredentials("test-refreshed"));
  });

  it("refreshes once and retries after an unauthorized probe", async () => {
    const { credentialStore, fetchUsage, fetchProvider } = setup();
    fetchUsage.mockRejectedValueOnce(unauthorized()).mockResolvedValueOnce(snapshot);

    await expect(fetchProvider("claude")).resolves.toBe(snapshot);
    expect(credentialStore.refresh).toHaveBeenCalledTimes(1);
    expect(fetchUsage).toHaveBeenNthCalledWith(2, createCredentials("test-refreshed"));
  });

  it("asks for re-authentication when the retry is rejected too", async () => {
    const { credentialStore, fetchUsage, fetchProvider } = setup();
    fetchUsage.mockRejectedValueOnce(unauthorized()).mockRejectedValueOnce(unauthorized("still rejected"));

    await expect(fetchProvider("claude")).rejects.toMatchObject({
      code: "TOKEN_INVALID",
      message: "Claude token was rejected (still rejected). Re-authenticate via the Claude CLI.",
    });
    expect(credentialStore.refresh).toHaveBeenCalledTimes(1);
    expect(fetchUsage).toHaveBeenCalledTimes(2);
    expect(credentialStore.invalidateCache).toHaveBeenCalledWith("claude");
  });

  it("does not refresh twice when a just-refreshed token is rejected", async () => {
    const { credentialStore, fetchUsage, fetchProvider } = setup({ expired: true });
    fetchUsage.mockRejectedValue(unauthorized());

    await expect(fetchProvider("claude")).rejects.toMatchObject({ code: "TOKEN_INVALID" });
    expect(credentialStore.refresh).toHaveBeenCalledTimes(1);
    expect(fetchUsage).toHaveBeenCalledTimes(1);
  });

  it("maps refresh failures to TOKEN_INVALID", async () => {
    const { credentialStore, fetchUsage, fetchProvider } = setup({ expired: true });
    credentialStore.refresh.mockRejectedValue(
      new CredentialRefreshError("NO_REFRESH_TOKEN", "no refresh token"),
    );

    await expect(fetchProvider("claude")).rejects.toMatchObject({
      code: "TOKEN_INVALID",
      message: "Claude token was rejected (no refresh token). Re-authenticate via the Claude CLI.",
    });
    expect(fetchUsage).not.toHaveBeenCalled();
    expect(credentialStore.invalidateCache).toHaveBeenCalledWith("claude");
  });

  it("passes other probe failures through unchanged", async () => {
    const { credentialStore, fetchUsage, fetchProvider } = setup();
    const failure = new UsageProbeError("HTTP_ERROR", "upstream down", 503);
    fetchUsage.mockRejectedValue(failure);

    await expect(fetchProvider("claude")).rejects.toBe(failure);
    expect(credentialStore.invalidateCache).not.toHaveBeenCalled();
  });

  it("hands missing credentials to the probe and never refreshes them", async () => {
    const { credentialStore, fetchUsage, fetchProvider } = setup({ credentials: null });
    fetchUsage.mockRejectedValue(unauthorized());

    await expect(fetchProvider("claude")).rejects.toMatchObject({ code: "TOKEN_INVALID" });
    expect(fetchUsage).toHaveBeenCalledWith(null);
    expect(credentialStore.refresh).not.toHaveBeenCalled();
  });

  it("rejects providers without a probe", async () => {
    const { fetchProvider } = setup();

    await expect(fetchProvider("gemini")).rejects.toMatchObject({ code: "INTERNAL" });
  });

  it("picks up a new CLI login after a rejected token and refresh", async () => {
    const entryName = "Claude Code-credentials";
    const storedBlob = (accessToken: string) =>
      JSON.stringify({
        claudeAiOauth: {
          accessToken,
          refreshToken: "test-refresh",
          expiresAt: NOW_MS + 3_600_000,
          scopes: ["user:inference"],
        },
      });
    const secretStore = createMemorySecretStore({ [entryName]: storedBlob("test-token-a") });
    const logger = { log: vi.fn(), warn: vi.fn() };
    const credentialStore = createCredentialStore({
      locations: { claude: { store: secretStore, entryName, broadenedPrefix: null } },
      strategies: createCredentialStrategies({ discoverClientCredentials: async () => null }),
      now: () => NOW_MS,
      timeoutMs: 1_000,
      logger,
    });
    vi.stubGlobal(
      "fetch",
      vi.fn<typeof fetch>(async () =>
        new Response(JSON.stringify({ error: "invalid_grant" }), {
          status: 400,
          headers: { "content-type": "application/json" },
        }),
      ),
    );
    const probedTokens: string[] = [];
    const fetchUsage = vi.fn<UsageProbe["fetchUsage"]>(async (credentials) => {
      const accessToken = credentials?.accessToken ?? "";
      probedTokens.push(accessToken);
      if (accessToken !== "test-token-b") {
        throw unauthorized();
      }
      return snapshot;
    });
    const fetchProvider = createProviderFetcher({
      credentialStore,
      probes: { claude: { providerId: "claude", fetchUsage } },
      logger,
    });

    await expect(fetchProvider("claude")).rejects.toMatchObject({ code: "TOKEN_INVALID" });
    await secretStore.put(entryName, storedBlob("test-token-b"));

    await expect(fetchProvider("claude")).resolves.toBe(snapshot);
    expect(probedTokens).toEqual(["test-token-a", "test-token-b"]);
  });
});
