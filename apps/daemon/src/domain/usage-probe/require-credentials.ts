import type { Credentials } from "../credentials/types";
import { UsageProviderError } from "../usage/usage-error";

export const requireCredentials = (providerLabel: string, credentials: Credentials | null) => {
  if (!credentials) {
    throw new UsageProviderError(
      "TOKEN_NOT_FOUND",
      `${providerLabel} credentials not found. Sign in with the ${providerLabel} CLI.`,
    );
  }
  return credentials;
};
