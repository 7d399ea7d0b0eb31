/** Epoch values below this are seconds, everything else is milliseconds. */
export const EPOCH_SECONDS_THRESHOLD = 10_000_000_000;

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value != null && !Array.isArray(value);

export const asNumber = (value: unknown): number | null => {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return null;
};

export const asNonEmptyString = (value: unknown): string | null => {
  if (typeof value !== "string") {
    return null;
  }
  const normalized = value.trim();
  if (normalized.length === 0) {
    return null;
  }
  return normalized;
};

export const asIsoString = (value: unknown): string | null => {
  if (typeof value !== "string" || value.trim().length === 0) {
    return null;
  }
  const parsed = Date.parse(value);
  if (Number.isNaN(parsed)) {
    return null;
  }
  return new Date(parsed).toISOString();
};

export const asEpochMs = (value: unknown): number | null => {
  const numeric = asNumber(value);
  if (numeric != null) {
    const epochMs = numeric < EPOCH_SECONDS_THRESHOLD ? numeric * 1000 : numeric;
    return Math.round(epochMs);
  }
  const raw = asNonEmptyString(value);
  if (!raw) {
    return null;
  }
  const parsed = Date.parse(raw);
  if (Number.isNaN(parsed)) {
    return null;
  }
  return parsed;
};

export const asStringList = (value: unknown): string[] => {
  if (Array.isArray(value)) {
    return value.flatMap((item) => {
      const normalized = asNonEmptyString(item);
      return normalized ? [normalized] : [];
    });
  }
  const raw = asNonEmptyString(value);
  if (!raw) {
    return [];
  }
  return raw.split(/\s+/);
};

export const toIsoString = (epochMs: number | null): string | null =>
  epochMs == null ? null : new Date(epochMs).toISOString();
