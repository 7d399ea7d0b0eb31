import type { UsageHistoryStore } from "../../domain/refresh/history-store";
import type { RefreshOrchestrator } from "../../domain/refresh/refresh-orchestrator";

export type UsageStateSource = Pick<
  RefreshOrchestrator,
  "getState" | "getProviderState" | "runCycle" | "setIntervalMinutes"
>;

export type UsageHistorySource = Pick<UsageHistoryStore, "list">;
