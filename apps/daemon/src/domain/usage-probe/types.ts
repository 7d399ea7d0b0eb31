import type { ProviderId, UsageSnapshot } from "@quotabar/shared";

import type { Credentials } from "../credentials/types";

export type UsageProbe = {
  providerId: ProviderId;
  /** Null credentials are accepted only by probes that can report from local data. */
  fetchUsage: (credentials: Credentials | null) => Promise<UsageSnapshot>;
};

export type ProbeEnv = Record<string, string | undefined>;
