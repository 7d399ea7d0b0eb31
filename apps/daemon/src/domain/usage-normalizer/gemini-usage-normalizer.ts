import type { UsageSnapshot } from "@quotabar/shared";

import { asEpochMs, asNonEmptyString, asNumber, isRecord } from "../usage/value-parsers";
import { applyWindowRollover } from "../usage/window-rollover";
import { compactWindows, createUsageWindow, PROVIDER_LABELS } from "./usage-normalizer";

export type GeminiQuotaBucket = {
  modelId: string;
  remainingFraction: number;
  resetsAtMs: number | null;
};

export type GeminiQuotaPayload = {
  buckets: GeminiQuotaBucket[];
  tier: string | null;
};

type FamilyLow = {
  remainingFraction: number;
  resetsAtMs: number | null;
  seen: boolean;
};

// Code Assist quotas reset daily.
const GEMINI_WINDOW_MINS = 1_440;
const PAID_TIER_KEYWORDS = ["premium", "pro", "standard"];

export const parseGeminiQuotaPayload = (value: unknown): GeminiQuotaPayload | null => {
  if (!isRecord(value)) {
    return null;
  }
  const rawBuckets = Array.isArray(value.buckets) ? value.buckets : [];
  const buckets = rawBuckets.flatMap((bucket): GeminiQuotaBucket[] => {
    if (!isRecord(bucket)) {
      return [];
    }
    return [
      {
        modelId: asNonEmptyString(bucket.modelId) ?? "",
        remainingFraction: asNumber(bucket.remainingFraction) ?? 1,
        resetsAtMs: asEpochMs(bucket.resetTime),
      },
    ];
  });
  return {
    buckets,
    tier: asNonEmptyString(value.tier) ?? asNonEmptyString(value.userTierId),
  };
};

const createFamilyLow = (): FamilyLow => ({ remainingFraction: 1, resetsAtMs: null, seen: false });

const trackLowest = (family: FamilyLow, bucket: GeminiQuotaBucket) => {
  family.seen = true;
  if (bucket.remainingFraction < family.remainingFraction) {
    family.remainingFraction = bucket.remainingFraction;
    family.resetsAtMs = bucket.resetsAtMs;
  }
};

/** Lowest remaining fraction per model family; `_vertex` buckets are ignored. */
export const summarizeGeminiBuckets = (buckets: GeminiQuotaBucket[]) => {
  const pro = createFamilyLow();
  const flash = createFamilyLow();
  for (const bucket of buckets) {
    const modelId = bucket.modelId.toLowerCase();
    if (modelId.endsWith("_vertex")) {
      continue;
    }
    if (modelId.includes("pro")) {
      trackLowest(pro, bucket);
    } else if (modelId.includes("flash") || modelId.includes("lite")) {
      trackLowest(flash, bucket);
    }
  }
  return { pro, flash };
};

export const resolveGeminiPlanLabel = (tier: string | null, hasProModel: boolean) => {
  if (tier == null) {
    return hasProModel ? "Gemini Pro" : "Gemini Free";
  }
  const lower = tier.toLowerCase();
  return PAID_TIER_KEYWORDS.some((keyword) => lower.includes(keyword)) ? "Gemini Pro" : "Gemini Free";
};

const toUsedPercent = (remainingFraction: number) =>
  Math.round((1 - remainingFraction) * 1000) / 10;

export const normalizeGeminiQuota = ({
  payload,
  nowMs,
}: {
  payload: GeminiQuotaPayload;
  nowMs: number;
}): UsageSnapshot => {
  const { pro, flash } = summarizeGeminiBuckets(payload.buckets);
  const reading = (family: FamilyLow) => {
    if (!family.seen) {
      return null;
    }
    return applyWindowRollover(
      {
        utilizationPercent: toUsedPercent(family.remainingFraction),
        resetsAtMs: family.resetsAtMs,
        windowDurationMins: GEMINI_WINDOW_MINS,
      },
      nowMs,
    );
  };

  return {
    providerId: "gemini",
    providerLabel: PROVIDER_LABELS.gemini,
    planLabel: resolveGeminiPlanLabel(payload.tier, pro.seen),
    windows: compactWindows([
      createUsageWindow({ id: "primary", title: "Pro models", reading: reading(pro) }),
      createUsageWindow({ id: "secondary", title: "Flash models", reading: reading(flash) }),
    ]),
    tokens: null,
    tokensProvenance: null,
    messageCount: null,
    cost: null,
    sourceLabel: "Gemini Code Assist quota API",
    issues: [],
    fetchedAt: new Date(nowMs).toISOString(),
  };
};
