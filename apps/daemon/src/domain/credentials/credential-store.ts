import { type ProviderId, toErrorMessage } from "@quotabar/shared";

import type { SecretStore } from "../../infra/secret-store/secret-store";
import { CredentialRefreshError } from "../usage/usage-error";
import {
  type CredentialStrategies,
  type CredentialStrategy,
  createCredentialStrategies,
} from "./credential-strategies";
import { readJwtExpiryMs } from "./jwt";
import {
  decodeSecretDocument,
  type EnvelopeShape,
  type SecretDocument,
  unwrapEnvelope,
  wrapEnvelope,
} from "./secret-blob";
import type { Credentials, ExpiryPolicy, RefreshedTokens } from "./types";

export type CredentialLocation = {
  store: SecretStore;
  /** Entry the CLI tool is known to write. */
  entryName: string;
  /** Prefix scanned when the primary entry is empty; null disables the broadened lookup. */
  broadenedPrefix: string | null;
};

type CachedCredential = {
  credentials: Credentials;
  entryName: string;
  shape: EnvelopeShape;
  document: SecretDocument;
};

type CredentialStoreOptions = {
  locations: Partial<Record<ProviderId, CredentialLocation>>;
  strategies?: CredentialStrategies;
  now?: () => number;
  timeoutMs?: number;
  logger?: Pick<Console, "log" | "warn">;
};

const DEFAULT_TIMEOUT_MS = 10_000;

export const isExpired = (credentials: Credentials, nowMs: number, policy: ExpiryPolicy) => {
  if (credentials.expiresAtMs == null) {
    return policy.missingExpiry === "expired";
  }
  return nowMs >= credentials.expiresAtMs - policy.earlyExpiryMs;
};

export const willExpireSoon = (
  credentials: Credentials,
  horizonMs: number,
  nowMs: number,
  policy: ExpiryPolicy,
) => isExpired(credentials, nowMs + horizonMs, policy);

const compareCandidates = (left: CachedCredential, right: CachedCredential, nowMs: number) => {
  const leftExpiresAtMs = left.credentials.expiresAtMs;
  const rightExpiresAtMs = right.credentials.expiresAtMs;
  const leftIsFuture = leftExpiresAtMs != null && leftExpiresAtMs > nowMs;
  const rightIsFuture = rightExpiresAtMs != null && rightExpiresAtMs > nowMs;
  if (leftIsFuture !== rightIsFuture) {
    return Number(rightIsFuture) - Number(leftIsFuture);
  }
  return (rightExpiresAtMs ?? 0) - (leftExpiresAtMs ?? 0);
};

const isScopeFallbackCandidate = (error: unknown) =>
  error instanceof CredentialRefreshError &&
  error.code === "REFRESH_REJECTED" &&
  error.status != null &&
  error.status >= 400 &&
  error.status < 500;

export const createCredentialStore = ({
  locations,
  strategies = createCredentialStrategies(),
  now = Date.now,
  timeoutMs = DEFAULT_TIMEOUT_MS,
  logger = console,
}: CredentialStoreOptions) => {
  const cache = new Map<ProviderId, CachedCredential>();
  const refreshesInFlight = new Map<ProviderId, Promise<Credentials>>();

  const readEntry = async (
    location: CredentialLocation,
    strategy: CredentialStrategy,
    entryName: string,
  ): Promise<CachedCredential | null> => {
    const raw = await location.store.get(entryName);
    if (raw == null) {
      return null;
    }
    const document = decodeSecretDocument(raw);
    if (!document) {
      return null;
    }
    const { payload, shape } = unwrapEnvelope(document, strategy.envelopeKey);
    const credentials = strategy.parse(payload, document);
    if (!credentials) {
      return null;
    }
    return { credentials, entryName, shape, document };
  };

  const readBroadened = async (
    providerId: ProviderId,
    location: CredentialLocation,
    strategy: CredentialStrategy,
    prefix: string,
  ) => {
    let entryNames: string[];
    try {
      entryNames = await location.store.listKeysWithPrefix(prefix);
    } catch (error) {
      logger.warn(
        `[quotabar] ${providerId} credential scan failed in ${location.store.label}: ${toErrorMessage(error)}`,
      );
      return null;
    }
    const candidates: CachedCredential[] = [];
    for (const entryName of entryNames) {
      if (entryName === location.entryName) {
        continue;
      }
      const candidate = await readEntry(location, strategy, entryName).catch(() => null);
      if (candidate) {
        candidates.push(candidate);
      }
    }
    const nowMs = now();
    return [...candidates].sort((left, right) => compareCandidates(left, right, nowMs))[0] ?? null;
  };

  const lookup = async (providerId: ProviderId): Promise<CachedCredential | null> => {
    const location = locations[providerId];
    if (!location) {
      return null;
    }
    const strategy = strategies[providerId];
    try {
      const primary = await readEntry(location, strategy, location.entryName);
      if (primary) {
        return primary;
      }
    } catch (error) {
      logger.warn(
        `[quotabar] ${providerId} credential lookup failed in ${location.store.label}: ${toErrorMessage(error)}`,
      );
    }
    if (location.broadenedPrefix == null) {
      return null;
    }
    return readBroadened(providerId, location, strategy, location.broadenedPrefix);
  };

  const isExpiredNow = (credentials: Credentials) =>
    isExpired(credentials, now(), strategies[credentials.providerId].expiryPolicy);

  const getCredentials = async (providerId: ProviderId): Promise<Credentials | null> => {
    const cached = cache.get(providerId);
    if (cached && !isExpiredNow(cached.credentials)) {
      return cached.credentials;
    }
    const found = await lookup(providerId);
    if (found) {
      cache.set(providerId, found);
      return found.credentials;
    }
    return cached?.credentials ?? null;
  };

  const requestWithScopeFallback = async (
    strategy: CredentialStrategy,
    credentials: Credentials,
  ): Promise<{ refreshed: RefreshedTokens; scope: string | null }> => {
    const [firstScope = null, ...fallbackScopes] = strategy.scopeCandidates(credentials);
    try {
      const refreshed = await strategy.requestRefresh({ credentials, scope: firstScope, timeoutMs });
      return { refreshed, scope: firstScope };
    } catch (error) {
      const fallbackScope = fallbackScopes[0];
      if (fallbackScope === undefined || !isScopeFallbackCandidate(error)) {
        throw error;
      }
      logger.warn(
        `[quotabar] ${credentials.providerId} refresh rejected for the requested scope, retrying with the original scope`,
      );
      const refreshed = await strategy.requestRefresh({
        credentials,
        scope: fallbackScope,
        timeoutMs,
      });
      return { refreshed, scope: fallbackScope };
    }
  };

  const writeBack = async (
    location: CredentialLocation,
    strategy: CredentialStrategy,
    entry: CachedCredential,
    refreshed: RefreshedTokens,
  ): Promise<CachedCredential> => {
    const currentRaw = await location.store.get(entry.entryName);
    const currentDocument = currentRaw == null ? null : decodeSecretDocument(currentRaw);
    let base: SecretDocument = {};
    let shape: EnvelopeShape = strategy.envelopeKey == null ? "unwrapped" : "wrapped";
    let previousPayload: SecretDocument = {};
    if (currentDocument) {
      const unwrapped = unwrapEnvelope(currentDocument, strategy.envelopeKey);
      base = currentDocument;
      shape = unwrapped.shape;
      previousPayload = unwrapped.payload;
    }
    const payload = strategy.serialize(entry.credentials, previousPayload, refreshed);
    const document = wrapEnvelope({ base, payload, shape, envelopeKey: strategy.envelopeKey });
    await location.store.put(entry.entryName, JSON.stringify(document, null, 2));
    return { ...entry, shape, document };
  };

  const performRefresh = async (providerId: ProviderId): Promise<Credentials> => {
    const entry = cache.get(providerId) ?? (await lookup(providerId));
    if (!entry) {
      throw new CredentialRefreshError("NO_CREDENTIALS", `${providerId} credentials not found`);
    }
    const { credentials } = entry;
    if (!credentials.refreshToken) {
      throw new CredentialRefreshError(
        "NO_REFRESH_TOKEN",
        `${providerId} credentials have no refresh token. Sign in again with the ${providerId} CLI.`,
      );
    }

    const strategy = strategies[providerId];
    const { refreshed, scope } = await requestWithScopeFallback(strategy, credentials);
    const next: Credentials = {
      ...credentials,
      accessToken: refreshed.accessToken,
      refreshToken: refreshed.refreshToken ?? credentials.refreshToken,
      expiresAtMs: refreshed.expiresAtMs ?? readJwtExpiryMs(refreshed.accessToken),
      scopes: refreshed.scopes ?? (scope == null ? credentials.scopes : scope.split(" ")),
    };

    let nextEntry: CachedCredential = { ...entry, credentials: next };
    const location = locations[providerId];
    if (location) {
      try {
        nextEntry = await writeBack(location, strategy, nextEntry, refreshed);
      } catch (error) {
        logger.warn(
          `[quotabar] failed to persist refreshed ${providerId} credentials to ${location.store.label}: ${toErrorMessage(error)}`,
        );
      }
    }
    cache.set(providerId, nextEntry);
    return next;
  };

  const refresh = (providerId: ProviderId): Promise<Credentials> => {
    const inFlight = refreshesInFlight.get(providerId);
    if (inFlight) {
      return inFlight;
    }
    const task = performRefresh(providerId).finally(() => {
      refreshesInFlight.delete(providerId);
    });
    refreshesInFlight.set(providerId, task);
    return task;
  };

  const invalidateCache = (providerId: ProviderId) => {
    cache.delete(providerId);
  };

  return {
    getCredentials,
    peekCredentials: (providerId: ProviderId) => cache.get(providerId)?.credentials ?? null,
    isExpired: isExpiredNow,
    willExpireSoon: (credentials: Credentials, horizonMs: number) =>
      willExpireSoon(credentials, horizonMs, now(), strategies[credentials.providerId].expiryPolicy),
    refresh,
    invalidateCache,
  };
};

export type CredentialStore = ReturnType<typeof createCredentialStore>;
