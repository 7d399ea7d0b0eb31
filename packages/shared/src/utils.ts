export const dedupeStrings = <T extends string>(values: T[]) => {
  const seen = new Set<string>();
  const output: T[] = [];
  values.forEach((value) => {
    if (!seen.has(value)) {
      seen.add(value);
      output.push(value);
    }
  });
  return output;
};

export const isPlainObject = (value: unknown): value is Record<string, unknown> => {
  if (value == null || typeof value !== "object") {
    return false;
  }
  return Object.getPrototypeOf(value) === Object.prototype;
};

export const toErrorMessage = (error: unknown, fallback = "unknown error") => {
  if (error instanceof Error && error.message.length > 0) {
    return error.message;
  }
  if (typeof error === "string" && error.length > 0) {
    return error;
  }
  return fallback;
};
