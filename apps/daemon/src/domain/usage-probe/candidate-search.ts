import { dedupeStrings } from "@quotabar/shared";

import { isUnauthorizedProbeError, UsageProbeError } from "../usage/usage-error";

/** Ordered, de-duplicated base URLs; blank entries are dropped. */
export const resolveBaseUrls = (candidates: Array<string | null | undefined>) =>
  dedupeStrings(
    candidates.flatMap((candidate) => {
      const normalized = candidate?.trim().replace(/\/+$/, "");
      return normalized ? [normalized] : [];
    }),
  );

export type PathCandidate = {
  baseUrl: string;
  pathname: string;
};

/** Every base URL crossed with its paths, base URL order first. */
export const expandPathCandidates = (
  baseUrls: string[],
  pathsFor: readonly string[] | ((baseUrl: string) => readonly string[]),
): PathCandidate[] =>
  baseUrls.flatMap((baseUrl) =>
    (typeof pathsFor === "function" ? pathsFor(baseUrl) : pathsFor).map((pathname) => ({
      baseUrl,
      pathname,
    })),
  );

/**
 * Tries each candidate in order and returns the first recognized result.
 * `UNAUTHORIZED` ends the search at once; otherwise the last failure is rethrown
 * when no candidate succeeded. Returns null when every candidate answered without
 * a recognizable payload.
 */
export const searchCandidates = async <TCandidate, TResult>(
  candidates: TCandidate[],
  attempt: (candidate: TCandidate) => Promise<TResult | null>,
): Promise<TResult | null> => {
  let lastError: unknown = null;
  for (const candidate of candidates) {
    try {
      const result = await attempt(candidate);
      if (result != null) {
        return result;
      }
    } catch (error) {
      if (isUnauthorizedProbeError(error)) {
        throw error;
      }
      lastError = error;
    }
  }
  if (lastError != null) {
    throw lastError;
  }
  return null;
};

export const unrecognizedPayload = (label: string) =>
  new UsageProbeError("INVALID_RESPONSE", `${label} response format is unsupported`);
