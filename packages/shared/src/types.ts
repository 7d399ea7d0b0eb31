import type { z } from "zod";

import type {
  configOverrideSchema,
  configSchema,
  providerIdSchema,
  refreshIntervalRequestSchema,
} from "./schemas";

export type ProviderId = z.infer<typeof providerIdSchema>;

export type UsageWindowId = "primary" | "secondary" | "model";

/** Whether a number came from the provider or was derived by a local heuristic. */
export type UsageProvenance = "measured" | "estimated";

export type UsageWindow = {
  id: UsageWindowId;
  title: string;
  /** Raw percentage. May drift slightly outside 0..100; clamp before display. */
  utilizationPercent: number;
  /** Null means the reset instant is unknown and no countdown should be rendered. */
  resetsAt: string | null;
  windowDurationMins: number;
};

export type UsageTokenCounters = {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
};

export type UsageCost = {
  amount: number;
  currency: string;
  provenance: UsageProvenance;
};

export type UsageIssue = {
  code: string;
  message: string;
  severity: "warning" | "error";
};

export type UsageSnapshot = {
  providerId: ProviderId;
  providerLabel: string;
  planLabel: string | null;
  windows: UsageWindow[];
  tokens: UsageTokenCounters | null;
  tokensProvenance: UsageProvenance | null;
  messageCount: number | null;
  cost: UsageCost | null;
  sourceLabel: string;
  issues: UsageIssue[];
  fetchedAt: string;
};

export type ProviderStatus = "ok" | "stale" | "needs-reauth" | "error";

export type ProviderState = {
  providerId: ProviderId;
  snapshot: UsageSnapshot | null;
  status: ProviderStatus;
  error: string | null;
  lastSuccessAt: string | null;
};

export type UsageStateResponse = {
  providers: ProviderState[];
  lastRefreshedAt: string | null;
  busy: boolean;
  errors: string[];
  refreshIntervalMinutes: number;
};

export type UsageHistoryEntry = {
  providerId: ProviderId;
  timestamp: string;
  primaryUtilizationPercent: number | null;
  secondaryUtilizationPercent: number | null;
};

export type ProviderSecretRef = {
  keychainService: string | null;
  credentialsPath: string | null;
  homeDir: string | null;
};

export type ProviderConfig = {
  id: ProviderId;
  enabled: boolean;
  refreshIntervalMinutes: number | null;
  secretRef: ProviderSecretRef;
};

export type QuotabarConfig = z.infer<typeof configSchema>;
export type QuotabarConfigOverride = z.infer<typeof configOverrideSchema>;
export type RefreshIntervalRequest = z.infer<typeof refreshIntervalRequestSchema>;

export type ApiError = {
  code: "INVALID_PAYLOAD" | "NOT_FOUND" | "BUSY";
  message: string;
};
