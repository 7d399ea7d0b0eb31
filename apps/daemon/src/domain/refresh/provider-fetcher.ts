import { type ProviderId, toErrorMessage, type UsageSnapshot } from "@quotabar/shared";

import type { CredentialStore } from "../credentials/credential-store";
import type { Credentials } from "../credentials/types";
import type { UsageProbe } from "../usage-probe/types";
import { PROVIDER_LABELS } from "../usage-normalizer/usage-normalizer";
import {
  CredentialRefreshError,
  isUnauthorizedProbeError,
  UsageProviderError,
} from "../usage/usage-error";

type ProviderFetcherOptions = {
  credentialStore: Pick<
    CredentialStore,
    "getCredentials" | "isExpired" | "refresh" | "invalidateCache"
  >;
  probes: Partial<Record<ProviderId, UsageProbe>>;
  logger?: Pick<Console, "log" | "warn">;
};

export type ProviderFetcher = (providerId: ProviderId) => Promise<UsageSnapshot>;

const reauthenticate = (providerId: ProviderId, detail: string) =>
  new UsageProviderError(
    "TOKEN_INVALID",
    `${PROVIDER_LABELS[providerId]} token was rejected (${detail}). Re-authenticate via the ${PROVIDER_LABELS[providerId]} CLI.`,
  );

/**
 * Credentials -> probe, with one refresh when the token is expired and one
 * refresh-and-retry when the probe reports UNAUTHORIZED. A rejected token is
 * dropped from the credential cache so a fresh CLI login is read on the next cycle.
 */
export const createProviderFetcher = ({
  credentialStore,
  probes,
  logger = console,
}: ProviderFetcherOptions): ProviderFetcher => {
  const rejectCredentials = (providerId: ProviderId, detail: string) => {
    credentialStore.invalidateCache(providerId);
    return reauthenticate(providerId, detail);
  };

  const refreshOrFail = async (providerId: ProviderId, reason: string): Promise<Credentials> => {
    try {
      return await credentialStore.refresh(providerId);
    } catch (error) {
      if (error instanceof CredentialRefreshError) {
        logger.warn(`[quotabar] ${providerId} credential refresh failed (${reason}): ${error.message}`);
        throw rejectCredentials(providerId, error.message);
      }
      throw error;
    }
  };

  return async (providerId) => {
    const probe = probes[providerId];
    if (!probe) {
      throw new UsageProviderError("INTERNAL", `No usage probe registered for ${providerId}`);
    }

    let credentials = await credentialStore.getCredentials(providerId);
    let refreshed = false;
    if (credentials && credentialStore.isExpired(credentials)) {
      credentials = await refreshOrFail(providerId, "expired");
      refreshed = true;
    }

    try {
      return await probe.fetchUsage(credentials);
    } catch (error) {
      if (!isUnauthorizedProbeError(error)) {
        throw error;
      }
      if (!credentials || refreshed) {
        throw rejectCredentials(providerId, toErrorMessage(error));
      }
    }

    const retried = await refreshOrFail(providerId, "unauthorized");
    try {
      return await probe.fetchUsage(retried);
    } catch (error) {
      if (isUnauthorizedProbeError(error)) {
        throw rejectCredentials(providerId, error.message);
      }
      throw error;
    }
  };
};
