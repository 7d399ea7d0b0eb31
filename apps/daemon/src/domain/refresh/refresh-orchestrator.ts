import {
  type ProviderConfig,
  type ProviderId,
  type ProviderState,
  type ProviderStatus,
  toErrorMessage,
  type UsageHistoryEntry,
  type UsageStateResponse,
} from "@quotabar/shared";

import {
  createPlaceholderSnapshot,
  PROVIDER_LABELS,
  primaryUtilization,
  secondaryUtilization,
} from "../usage-normalizer/usage-normalizer";
import { UsageProviderError } from "../usage/usage-error";
import type { UsageHistoryStore } from "./history-store";
import type { ProviderFetcher } from "./provider-fetcher";

export const DEFAULT_INITIAL_DELAY_MS = 500;
const MINUTE_MS = 60_000;

type RefreshOrchestratorOptions = {
  providers: ProviderConfig[];
  fetchProvider: ProviderFetcher;
  /** Used when no enabled provider sets its own interval. */
  refreshIntervalMinutes: number;
  historyStore?: Pick<UsageHistoryStore, "append">;
  initialDelayMs?: number;
  now?: () => number;
  logger?: Pick<Console, "log" | "warn">;
};

type StateListener = (state: UsageStateResponse) => void;

export const resolveRefreshIntervalMinutes = (
  providers: ProviderConfig[],
  fallbackMinutes: number,
) => providers.find((provider) => provider.enabled)?.refreshIntervalMinutes ?? fallbackMinutes;

const resolveFailureStatus = (error: unknown, previous: ProviderState | undefined): ProviderStatus => {
  if (error instanceof UsageProviderError && error.code === "TOKEN_INVALID") {
    return "needs-reauth";
  }
  return previous?.lastSuccessAt ? "stale" : "error";
};

export const createRefreshOrchestrator = ({
  providers,
  fetchProvider,
  refreshIntervalMinutes,
  historyStore,
  initialDelayMs = DEFAULT_INITIAL_DELAY_MS,
  now = Date.now,
  logger = console,
}: RefreshOrchestratorOptions) => {
  const enabledProviders = providers.filter((provider) => provider.enabled);
  const states = new Map<ProviderId, ProviderState>(
    enabledProviders.map((provider) => [
      provider.id,
      { providerId: provider.id, snapshot: null, status: "stale", error: null, lastSuccessAt: null },
    ]),
  );
  const listeners = new Set<StateListener>();
  let intervalMinutes = resolveRefreshIntervalMinutes(providers, refreshIntervalMinutes);
  let lastRefreshedAt: string | null = null;
  let errors: string[] = [];
  let busy = false;
  // Bumped by stop(); a cycle that started under an older generation is discarded.
  let generation = 0;
  let inFlight: { generation: number; settled: Promise<void> } | null = null;
  let started = false;
  let initialTimer: NodeJS.Timeout | null = null;
  let intervalTimer: NodeJS.Timeout | null = null;

  const getState = (): UsageStateResponse => ({
    providers: Array.from(states.values()),
    lastRefreshedAt,
    busy,
    errors: [...errors],
    refreshIntervalMinutes: intervalMinutes,
  });

  const notify = () => {
    const state = getState();
    listeners.forEach((listener) => {
      try {
        listener(state);
      } catch (error) {
        logger.warn(`[quotabar] state listener failed: ${toErrorMessage(error)}`);
      }
    });
  };

  const executeCycle = async (cycleGeneration: number): Promise<UsageStateResponse | null> => {
    busy = true;
    notify();

    try {
      const results = await Promise.allSettled(
        enabledProviders.map((provider) => fetchProvider(provider.id)),
      );
      if (cycleGeneration !== generation) {
        return null;
      }

      const nowMs = now();
      const timestamp = new Date(nowMs).toISOString();
      const nextErrors: string[] = [];
      const historyEntries: UsageHistoryEntry[] = [];
      enabledProviders.forEach((provider, index) => {
        const result = results[index];
        if (!result) {
          return;
        }
        const previous = states.get(provider.id);
        if (result.status === "fulfilled") {
          states.set(provider.id, {
            providerId: provider.id,
            snapshot: result.value,
            status: "ok",
            error: null,
            lastSuccessAt: timestamp,
          });
          historyEntries.push({
            providerId: provider.id,
            timestamp,
            primaryUtilizationPercent: primaryUtilization(result.value),
            secondaryUtilizationPercent: secondaryUtilization(result.value),
          });
          return;
        }
        const message = toErrorMessage(result.reason);
        logger.warn(`[quotabar] ${provider.id} refresh failed: ${message}`);
        nextErrors.push(`${PROVIDER_LABELS[provider.id]}: ${message}`);
        states.set(provider.id, {
          providerId: provider.id,
          snapshot: previous?.snapshot ?? createPlaceholderSnapshot(provider.id, nowMs),
          status: resolveFailureStatus(result.reason, previous),
          error: message,
          lastSuccessAt: previous?.lastSuccessAt ?? null,
        });
      });
      errors = nextErrors;
      lastRefreshedAt = timestamp;

      if (historyStore && historyEntries.length > 0) {
        await historyStore.append(historyEntries).catch((error: unknown) => {
          logger.warn(`[quotabar] failed to record usage history: ${toErrorMessage(error)}`);
        });
      }
    } finally {
      if (inFlight?.generation === cycleGeneration) {
        inFlight = null;
      }
      if (cycleGeneration === generation) {
        busy = false;
        notify();
      }
    }
    return getState();
  };

  const runCycle = async (): Promise<UsageStateResponse | null> => {
    while (inFlight) {
      if (inFlight.generation === generation) {
        return null;
      }
      // A cycle from before stop() still has requests out; let it finish first.
      await inFlight.settled;
    }
    const cycleGeneration = generation;
    const cycle = executeCycle(cycleGeneration);
    inFlight = {
      generation: cycleGeneration,
      settled: cycle.then(
        () => undefined,
        () => undefined,
      ),
    };
    return cycle;
  };

  const triggerCycle = () => {
    void runCycle().catch((error: unknown) => {
      logger.warn(`[quotabar] refresh cycle failed: ${toErrorMessage(error)}`);
    });
  };

  const clearTimers = () => {
    if (initialTimer) {
      clearTimeout(initialTimer);
      initialTimer = null;
    }
    if (intervalTimer) {
      clearInterval(intervalTimer);
      intervalTimer = null;
    }
  };

  const schedule = () => {
    if (intervalTimer) {
      clearInterval(intervalTimer);
    }
    intervalTimer = setInterval(triggerCycle, intervalMinutes * MINUTE_MS);
  };

  const start = () => {
    if (started) return;
    started = true;
    initialTimer = setTimeout(() => {
      initialTimer = null;
      triggerCycle();
      schedule();
    }, initialDelayMs);
  };

  const stop = () => {
    clearTimers();
    started = false;
    generation += 1;
    busy = false;
  };

  const setIntervalMinutes = (minutes: number) => {
    if (!Number.isFinite(minutes) || minutes <= 0) {
      throw new RangeError(`refresh interval must be a positive number of minutes: ${minutes}`);
    }
    intervalMinutes = minutes;
    if (intervalTimer) {
      schedule();
    }
    notify();
  };

  const subscribe = (listener: StateListener) => {
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  };

  return {
    runCycle,
    start,
    stop,
    setIntervalMinutes,
    getState,
    getProviderState: (providerId: ProviderId) => states.get(providerId) ?? null,
    subscribe,
  };
};

export type RefreshOrchestrator = ReturnType<typeof createRefreshOrchestrator>;
