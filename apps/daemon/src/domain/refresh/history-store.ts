import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";

import {
  type ProviderId,
  providerIdSchema,
  toErrorMessage,
  type UsageHistoryEntry,
} from "@quotabar/shared";

import { isRecord } from "../usage/value-parsers";

export const HISTORY_MAX_ENTRIES = 168;
export const HISTORY_MAX_AGE_MS = 7 * 24 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;

type UsageHistoryStoreOptions = {
  filePath: string;
  maxEntries?: number;
  maxAgeMs?: number;
  now?: () => number;
  logger?: Pick<Console, "log" | "warn">;
};

const isNullableNumber = (value: unknown): value is number | null =>
  value === null || (typeof value === "number" && Number.isFinite(value));

const toHistoryEntry = (value: unknown): UsageHistoryEntry | null => {
  if (!isRecord(value)) {
    return null;
  }
  const providerId = providerIdSchema.safeParse(value.providerId);
  const { timestamp, primaryUtilizationPercent, secondaryUtilizationPercent } = value;
  if (
    !providerId.success ||
    typeof timestamp !== "string" ||
    Number.isNaN(Date.parse(timestamp)) ||
    !isNullableNumber(primaryUtilizationPercent) ||
    !isNullableNumber(secondaryUtilizationPercent)
  ) {
    return null;
  }
  return {
    providerId: providerId.data,
    timestamp,
    primaryUtilizationPercent,
    secondaryUtilizationPercent,
  };
};

/** Drops entries older than the retention window, then keeps the newest `maxEntries`. */
export const pruneHistory = (
  entries: UsageHistoryEntry[],
  nowMs: number,
  { maxEntries = HISTORY_MAX_ENTRIES, maxAgeMs = HISTORY_MAX_AGE_MS } = {},
) => {
  const cutoffMs = nowMs - maxAgeMs;
  const recent = entries.filter((entry) => Date.parse(entry.timestamp) >= cutoffMs);
  return recent.slice(Math.max(0, recent.length - maxEntries));
};

export const createUsageHistoryStore = ({
  filePath,
  maxEntries = HISTORY_MAX_ENTRIES,
  maxAgeMs = HISTORY_MAX_AGE_MS,
  now = Date.now,
  logger = console,
}: UsageHistoryStoreOptions) => {
  const retention = { maxEntries, maxAgeMs };
  let entries: UsageHistoryEntry[] | null = null;
  let pendingWrite: Promise<void> = Promise.resolve();

  const load = async () => {
    if (entries) {
      return entries;
    }
    const raw = await readFile(filePath, "utf8").catch(() => null);
    let parsed: unknown = [];
    if (raw != null) {
      try {
        parsed = JSON.parse(raw);
      } catch {
        logger.warn(`[quotabar] ignoring unreadable usage history at ${filePath}`);
      }
    }
    const loaded = Array.isArray(parsed)
      ? parsed.flatMap((item) => {
          const entry = toHistoryEntry(item);
          return entry ? [entry] : [];
        })
      : [];
    entries = pruneHistory(loaded, now(), retention);
    return entries;
  };

  const persist = async (snapshot: UsageHistoryEntry[]) => {
    await mkdir(path.dirname(filePath), { recursive: true, mode: 0o700 });
    const tempPath = `${filePath}.tmp`;
    await writeFile(tempPath, `${JSON.stringify(snapshot, null, 2)}\n`, {
      encoding: "utf8",
      mode: 0o600,
    });
    await rename(tempPath, filePath);
  };

  const append = async (nextEntries: UsageHistoryEntry[]) => {
    if (nextEntries.length === 0) {
      return;
    }
    const current = await load();
    entries = pruneHistory([...current, ...nextEntries], now(), retention);
    const snapshot = entries;
    pendingWrite = pendingWrite
      .then(() => persist(snapshot))
      .catch((error: unknown) => {
        logger.warn(`[quotabar] failed to write usage history: ${toErrorMessage(error)}`);
      });
    await pendingWrite;
  };

  const list = async (providerId: ProviderId, hours = 24) => {
    const cutoffMs = now() - hours * HOUR_MS;
    const current = await load();
    return current.filter(
      (entry) => entry.providerId === providerId && Date.parse(entry.timestamp) >= cutoffMs,
    );
  };

  return { append, list };
};

export type UsageHistoryStore = ReturnType<typeof createUsageHistoryStore>;
