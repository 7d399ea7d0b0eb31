import { createReadStream } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import path from "node:path";
import { createInterface } from "node:readline";

import type { UsageTokenCounters } from "@quotabar/shared";

import { asEpochMs, asNonEmptyString, asNumber, isRecord } from "../usage/value-parsers";
import { applyWindowRollover, type RollingWindowReading } from "../usage/window-rollover";

export type SessionRateLimitWindow = {
  usedPercent: number | null;
  resetsAtMs: number | null;
  windowMinutes: number | null;
};

export type SessionData = {
  messageCount: number;
  tokens: UsageTokenCounters;
  /** True when the counters come from the per-message heuristic. */
  tokensEstimated: boolean;
  primary: SessionRateLimitWindow;
  secondary: SessionRateLimitWindow;
  planType: string | null;
};

export type SessionStats = SessionData & {
  fileCount: number;
};

export type SessionScan = {
  rootFound: boolean;
  stats: SessionStats;
  primary: RollingWindowReading | null;
  secondary: RollingWindowReading | null;
  /** Set only when there is nothing to read. */
  tierLabel: string | null;
};

type ScanSessionLogsOptions = {
  nowMs?: number;
  lookbackMs?: number;
};

const SESSION_LOG_EXTENSION = ".jsonl";
const MESSAGE_EVENT_TYPES = new Set(["turn.completed", "task_complete"]);
const TOKEN_COUNT_EVENT_TYPE = "token_count";
const DEFAULT_LOOKBACK_MS = 24 * 60 * 60 * 1000;

// Heuristic for sessions that never logged token counters.
export const ESTIMATED_TOKENS_PER_MESSAGE = 2000;

export const DEFAULT_PRIMARY_WINDOW_MINS = 300;
export const DEFAULT_SECONDARY_WINDOW_MINS = 10_080;
export const NO_LOCAL_SESSIONS_LABEL = "No local sessions";

const createEmptyWindow = (): SessionRateLimitWindow => ({
  usedPercent: null,
  resetsAtMs: null,
  windowMinutes: null,
});

export const createEmptySessionData = (): SessionData => ({
  messageCount: 0,
  tokens: { inputTokens: 0, outputTokens: 0, totalTokens: 0 },
  tokensEstimated: false,
  primary: createEmptyWindow(),
  secondary: createEmptyWindow(),
  planType: null,
});

export const estimateTokensFromMessages = (messageCount: number): UsageTokenCounters => {
  const totalTokens = messageCount * ESTIMATED_TOKENS_PER_MESSAGE;
  // 30% input / 70% output, integer arithmetic so the split is exact.
  return {
    inputTokens: Math.floor((totalTokens * 3) / 10),
    outputTokens: Math.floor((totalTokens * 7) / 10),
    totalTokens,
  };
};

export const listRecentLogFiles = async (rootDir: string, sinceMs: number): Promise<string[]> => {
  const found: { filePath: string; modifiedAtMs: number }[] = [];
  const stack = [rootDir];
  while (stack.length > 0) {
    const currentDir = stack.pop();
    if (!currentDir) {
      continue;
    }
    const entries = await readdir(currentDir, { withFileTypes: true }).catch(() => null);
    if (!entries) {
      continue;
    }
    for (const entry of entries) {
      const entryPath = path.join(currentDir, entry.name);
      if (entry.isSymbolicLink() || entry.name.startsWith(".")) {
        continue;
      }
      if (entry.isDirectory()) {
        stack.push(entryPath);
        continue;
      }
      if (!entry.isFile() || !entry.name.toLowerCase().endsWith(SESSION_LOG_EXTENSION)) {
        continue;
      }
      const modifiedAtMs = await stat(entryPath)
        .then((stats) => stats.mtimeMs)
        .catch(() => null);
      if (modifiedAtMs != null && modifiedAtMs >= sinceMs) {
        found.push({ filePath: entryPath, modifiedAtMs });
      }
    }
  }
  return found
    .sort((left, right) => left.modifiedAtMs - right.modifiedAtMs)
    .map(({ filePath }) => filePath);
};

const readRateLimitWindow = (
  value: unknown,
  recordTimestampMs: number | null,
  target: SessionRateLimitWindow,
) => {
  if (!isRecord(value)) {
    return;
  }
  const usedPercent = asNumber(value.used_percent);
  if (usedPercent != null) {
    target.usedPercent = usedPercent;
  }
  const windowMinutes = asNumber(value.window_minutes);
  if (windowMinutes != null) {
    target.windowMinutes = Math.trunc(windowMinutes);
  }
  const resetsAtMs = asEpochMs(value.resets_at);
  const resetsInSeconds = asNumber(value.resets_in_seconds);
  if (resetsAtMs != null) {
    target.resetsAtMs = resetsAtMs;
  } else if (resetsInSeconds != null && recordTimestampMs != null) {
    target.resetsAtMs = recordTimestampMs + Math.round(resetsInSeconds * 1000);
  }
};

const readTokenUsage = (value: unknown): UsageTokenCounters | null => {
  if (!isRecord(value)) {
    return null;
  }
  const inputTokens = asNumber(value.input_tokens);
  const outputTokens = asNumber(value.output_tokens);
  const totalTokens = asNumber(value.total_tokens);
  if (inputTokens == null && outputTokens == null && totalTokens == null) {
    return null;
  }
  return {
    inputTokens: inputTokens ?? 0,
    outputTokens: outputTokens ?? 0,
    totalTokens: totalTokens ?? (inputTokens ?? 0) + (outputTokens ?? 0),
  };
};

/** Applies one NDJSON record to the running per-file state. */
export const applySessionRecord = (data: SessionData, record: Record<string, unknown>) => {
  const payload = isRecord(record.payload) ? record.payload : record;
  const type = asNonEmptyString(payload.type);
  if (!type) {
    return false;
  }
  if (MESSAGE_EVENT_TYPES.has(type)) {
    data.messageCount += 1;
    return false;
  }
  if (type !== TOKEN_COUNT_EVENT_TYPE) {
    return false;
  }

  const timestampMs = asEpochMs(record.timestamp ?? payload.timestamp);
  const rateLimits = payload.rate_limits;
  if (isRecord(rateLimits)) {
    readRateLimitWindow(rateLimits.primary, timestampMs, data.primary);
    readRateLimitWindow(rateLimits.secondary, timestampMs, data.secondary);
    const planType = asNonEmptyString(rateLimits.plan_type);
    if (planType) {
      data.planType = planType;
    }
  }

  const info = payload.info;
  const tokens = isRecord(info) ? readTokenUsage(info.total_token_usage) : null;
  if (tokens) {
    data.tokens = tokens;
    return true;
  }
  return false;
};

export const parseLogFile = async (filePath: string): Promise<SessionData | null> => {
  const isFile = await stat(filePath)
    .then((stats) => stats.isFile())
    .catch(() => false);
  if (!isFile) {
    return null;
  }
  const data = createEmptySessionData();
  let tokensSeen = false;
  const stream = createReadStream(filePath, { encoding: "utf8" });
  const reader = createInterface({ input: stream, crlfDelay: Infinity });
  try {
    for await (const rawLine of reader) {
      const line = rawLine.trim();
      if (!line) {
        continue;
      }
      let record: unknown;
      try {
        record = JSON.parse(line);
      } catch {
        continue;
      }
      if (!isRecord(record)) {
        continue;
      }
      if (applySessionRecord(data, record)) {
        tokensSeen = true;
      }
    }
  } catch {
    return null;
  } finally {
    reader.close();
    stream.destroy();
  }

  if (!tokensSeen && data.messageCount > 0) {
    data.tokens = estimateTokensFromMessages(data.messageCount);
    data.tokensEstimated = true;
  }
  return data;
};

const mergeWindow = (
  previous: SessionRateLimitWindow,
  next: SessionRateLimitWindow,
): SessionRateLimitWindow => ({
  usedPercent: next.usedPercent ?? previous.usedPercent,
  resetsAtMs: next.resetsAtMs ?? previous.resetsAtMs,
  windowMinutes: next.windowMinutes ?? previous.windowMinutes,
});

/** Counters add up; rate-limit and plan fields are replaced only where the later file has them. */
export const mergeSessionData = (accumulated: SessionStats, next: SessionData): SessionStats => ({
  fileCount: accumulated.fileCount + 1,
  messageCount: accumulated.messageCount + next.messageCount,
  tokens: {
    inputTokens: accumulated.tokens.inputTokens + next.tokens.inputTokens,
    outputTokens: accumulated.tokens.outputTokens + next.tokens.outputTokens,
    totalTokens: accumulated.tokens.totalTokens + next.tokens.totalTokens,
  },
  tokensEstimated: accumulated.tokensEstimated || next.tokensEstimated,
  primary: mergeWindow(accumulated.primary, next.primary),
  secondary: mergeWindow(accumulated.secondary, next.secondary),
  planType: next.planType ?? accumulated.planType,
});

export const createEmptySessionStats = (): SessionStats => ({
  ...createEmptySessionData(),
  fileCount: 0,
});

/** Files must already be in ascending mtime order. */
export const foldAcrossFiles = async (filePaths: string[]): Promise<SessionStats> => {
  let stats = createEmptySessionStats();
  for (const filePath of filePaths) {
    const data = await parseLogFile(filePath);
    if (data) {
      stats = mergeSessionData(stats, data);
    }
  }
  return stats;
};

const toRollingReading = (
  window: SessionRateLimitWindow,
  defaultWindowMins: number,
  nowMs: number,
): RollingWindowReading | null => {
  if (window.usedPercent == null && window.resetsAtMs == null) {
    return null;
  }
  return applyWindowRollover(
    {
      utilizationPercent: window.usedPercent,
      resetsAtMs: window.resetsAtMs,
      windowDurationMins: window.windowMinutes ?? defaultWindowMins,
    },
    nowMs,
  );
};

const directoryExists = async (dirPath: string) =>
  stat(dirPath)
    .then((stats) => stats.isDirectory())
    .catch(() => false);

export const scanSessionLogs = async (
  rootDir: string,
  { nowMs = Date.now(), lookbackMs = DEFAULT_LOOKBACK_MS }: ScanSessionLogsOptions = {},
): Promise<SessionScan> => {
  if (!(await directoryExists(rootDir))) {
    return {
      rootFound: false,
      stats: createEmptySessionStats(),
      primary: null,
      secondary: null,
      tierLabel: NO_LOCAL_SESSIONS_LABEL,
    };
  }
  const files = await listRecentLogFiles(rootDir, nowMs - lookbackMs);
  const stats = await foldAcrossFiles(files);
  return {
    rootFound: true,
    stats,
    primary: toRollingReading(stats.primary, DEFAULT_PRIMARY_WINDOW_MINS, nowMs),
    secondary: toRollingReading(stats.secondary, DEFAULT_SECONDARY_WINDOW_MINS, nowMs),
    tierLabel: null,
  };
};
