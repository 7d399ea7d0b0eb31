export const DEFAULT_STATUS_PROBE_COOLDOWN_MS = 300_000;

type CacheEntry<T> = {
  value: T;
  storedAtMs: number;
};

type StatusProbeCacheOptions = {
  cooldownMs?: number;
  now?: () => number;
};

/** Remembers one probe result per key until the cooldown elapses. */
export const createStatusProbeCache = <T>({
  cooldownMs = DEFAULT_STATUS_PROBE_COOLDOWN_MS,
  now = Date.now,
}: StatusProbeCacheOptions = {}) => {
  const entries = new Map<string, CacheEntry<T>>();

  const get = (key: string): T | null => {
    const entry = entries.get(key);
    if (!entry) {
      return null;
    }
    if (now() - entry.storedAtMs >= cooldownMs) {
      entries.delete(key);
      return null;
    }
    return entry.value;
  };

  const set = (key: string, value: T) => {
    entries.set(key, { value, storedAtMs: now() });
  };

  return {
    get,
    set,
    clear: () => {
      entries.clear();
    },
  };
};

export type StatusProbeCache<T> = ReturnType<typeof createStatusProbeCache<T>>;
