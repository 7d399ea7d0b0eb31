import type { ProviderState, UsageStateResponse, UsageWindow } from "@quotabar/shared";

import { clampPercent, PROVIDER_LABELS } from "./domain/usage-normalizer/usage-normalizer";
import { OrchestrationError, type ProviderFailure } from "./domain/usage/usage-error";

const formatPercent = (value: number | null) =>
  value == null ? "n/a" : `${Math.round(clampPercent(value))}%`;

const formatWindow = (window: UsageWindow) => {
  const reset = window.resetsAt ? ` (resets ${window.resetsAt})` : "";
  return `${window.title} ${formatPercent(window.utilizationPercent)}${reset}`;
};

const renderProvider = (provider: ProviderState) => {
  const label = PROVIDER_LABELS[provider.providerId];
  const plan = provider.snapshot?.planLabel ? ` [${provider.snapshot.planLabel}]` : "";
  const lines = [`${label}: ${provider.status}${plan}`];
  provider.snapshot?.windows.forEach((window) => {
    lines.push(`  ${formatWindow(window)}`);
  });
  if (provider.error) {
    lines.push(`  error: ${provider.error}`);
  }
  return lines.join("\n");
};

export const renderStatusText = (state: UsageStateResponse) => {
  if (state.providers.length === 0) {
    return "no providers enabled";
  }
  return state.providers.map(renderProvider).join("\n");
};

export const collectFailures = (state: UsageStateResponse): ProviderFailure[] =>
  state.providers
    .filter((provider) => provider.status !== "ok")
    .map((provider) => ({
      providerId: provider.providerId,
      message: provider.error ?? "no usage data",
    }));

/** Throws when every enabled provider failed; a partial failure still reports. */
export const assertAnyProviderSucceeded = (state: UsageStateResponse) => {
  const failures = collectFailures(state);
  if (state.providers.length > 0 && failures.length === state.providers.length) {
    throw new OrchestrationError(failures);
  }
};
