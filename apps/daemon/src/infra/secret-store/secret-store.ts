export type SecretStore = {
  /** Human-readable name used in log lines. */
  readonly label: string;
  get: (key: string) => Promise<string | null>;
  put: (key: string, value: string) => Promise<void>;
  delete: (key: string) => Promise<void>;
  listKeysWithPrefix: (prefix: string) => Promise<string[]>;
};

export const createMemorySecretStore = (
  initial: Record<string, string> = {},
  label = "memory",
): SecretStore & { entries: Map<string, string> } => {
  const entries = new Map(Object.entries(initial));
  return {
    label,
    entries,
    get: async (key) => entries.get(key) ?? null,
    put: async (key, value) => {
      entries.set(key, value);
    },
    delete: async (key) => {
      entries.delete(key);
    },
    listKeysWithPrefix: async (prefix) =>
      [...entries.keys()].filter((key) => key.startsWith(prefix)).sort(),
  };
};
