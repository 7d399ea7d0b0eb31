import {
  normalizeGeminiQuota,
  parseGeminiQuotaPayload,
} from "../usage-normalizer/gemini-usage-normalizer";
import { PROVIDER_LABELS } from "../usage-normalizer/usage-normalizer";
import { UsageProbeError } from "../usage/usage-error";
import { asNonEmptyString, isRecord } from "../usage/value-parsers";
import {
  expandPathCandidates,
  resolveBaseUrls,
  searchCandidates,
  unrecognizedPayload,
} from "./candidate-search";
import { joinUrl, requestJson, USER_AGENT } from "./http-json";
import { requireCredentials } from "./require-credentials";
import type { ProbeEnv, UsageProbe } from "./types";

const GEMINI_PROJECTS_ENDPOINT = "https://cloudresourcemanager.googleapis.com/v1/projects?pageSize=50";
const GEMINI_PROJECT_PREFIX = "gen-lang-client";
export const GEMINI_DEFAULT_CODE_ASSIST_ENDPOINT = "https://cloudcode-pa.googleapis.com";
export const GEMINI_QUOTA_PATHS = ["/v1internal:retrieveUserQuota"] as const;

type GeminiUsageProbeOptions = {
  timeoutMs: number;
  env?: ProbeEnv;
  now?: () => number;
};

const authHeaders = (accessToken: string) => ({
  Authorization: `Bearer ${accessToken}`,
  Accept: "application/json",
  "Content-Type": "application/json",
  "User-Agent": USER_AGENT,
});

export const pickGeminiProjectId = (value: unknown): string | null => {
  if (!isRecord(value) || !Array.isArray(value.projects)) {
    return null;
  }
  for (const project of value.projects) {
    const projectId = isRecord(project) ? asNonEmptyString(project.projectId) : null;
    if (projectId?.startsWith(GEMINI_PROJECT_PREFIX)) {
      return projectId;
    }
  }
  return null;
};

export const discoverGeminiProjectId = async ({
  accessToken,
  timeoutMs,
}: {
  accessToken: string;
  timeoutMs: number;
}) => {
  const { data } = await requestJson({
    url: GEMINI_PROJECTS_ENDPOINT,
    headers: authHeaders(accessToken),
    timeoutMs,
    label: "Google Cloud projects API",
  });
  const projectId = pickGeminiProjectId(data);
  if (!projectId) {
    throw new UsageProbeError("NO_DATA", "No Gemini project found");
  }
  return projectId;
};

export const createGeminiUsageProbe = ({
  timeoutMs,
  env = process.env,
  now = Date.now,
}: GeminiUsageProbeOptions): UsageProbe => {
  const fetchUsage: UsageProbe["fetchUsage"] = async (input) => {
    const credentials = requireCredentials(PROVIDER_LABELS.gemini, input);
    const project =
      asNonEmptyString(env.GOOGLE_CLOUD_PROJECT) ??
      (await discoverGeminiProjectId({ accessToken: credentials.accessToken, timeoutMs }));

    const baseUrls = resolveBaseUrls([
      credentials.apiBaseUrl,
      env.CODE_ASSIST_ENDPOINT,
      GEMINI_DEFAULT_CODE_ASSIST_ENDPOINT,
    ]);
    const candidates = expandPathCandidates(baseUrls, GEMINI_QUOTA_PATHS);
    const payload = await searchCandidates(candidates, async ({ baseUrl, pathname }) => {
      const { data } = await requestJson({
        url: joinUrl(baseUrl, pathname),
        method: "POST",
        headers: authHeaders(credentials.accessToken),
        body: { project },
        timeoutMs,
        label: "Gemini quota API",
      });
      const parsed = parseGeminiQuotaPayload(data);
      if (!parsed) {
        throw unrecognizedPayload("Gemini quota API");
      }
      return parsed;
    });
    if (!payload) {
      throw new UsageProbeError("NO_DATA", "Gemini quota API returned no data");
    }
    return normalizeGeminiQuota({ payload, nowMs: now() });
  };

  return { providerId: "gemini", fetchUsage };
};
