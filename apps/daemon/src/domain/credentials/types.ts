import type { ProviderId } from "@quotabar/shared";

export type Credentials = {
  providerId: ProviderId;
  accessToken: string;
  refreshToken: string | null;
  /** Absolute expiry in epoch milliseconds. */
  expiresAtMs: number | null;
  scopes: string[];
  planHint: string | null;
  clientId: string | null;
  clientSecret: string | null;
  /** Base URL the CLI tool embedded next to its tokens. */
  apiBaseUrl: string | null;
  accountId: string | null;
};

export type ExpiryPolicy = {
  /** How a credential without an expiry field is treated. */
  missingExpiry: "valid" | "expired";
  /** Expiry is brought forward by this margin. */
  earlyExpiryMs: number;
};

export type RefreshedTokens = {
  accessToken: string;
  refreshToken: string | null;
  expiresAtMs: number | null;
  scopes: string[] | null;
  idToken: string | null;
};
