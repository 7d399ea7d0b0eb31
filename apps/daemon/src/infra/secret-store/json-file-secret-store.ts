import fs from "node:fs/promises";
import path from "node:path";

import type { SecretStore } from "./secret-store";

const isMissingFileError = (error: unknown) =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

const resolveEntryPath = (rootDir: string, key: string) => {
  const resolved = path.resolve(rootDir, key);
  const root = path.resolve(rootDir);
  if (resolved !== root && !resolved.startsWith(`${root}${path.sep}`)) {
    throw new Error(`secret key escapes its directory: ${key}`);
  }
  return resolved;
};

const writeFileAtomic = async (filePath: string, data: string) => {
  const randomToken = Math.random().toString(36).slice(2, 10);
  const tempPath = `${filePath}.tmp-${process.pid}-${Date.now()}-${randomToken}`;
  await fs.writeFile(tempPath, data, { encoding: "utf8", mode: 0o600 });
  try {
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
};

/** Treats each file directly under `rootDir` as one secret entry keyed by its file name. */
export const createJsonFileSecretStore = (rootDir: string): SecretStore => ({
  label: rootDir,
  get: async (key) => {
    try {
      const raw = await fs.readFile(resolveEntryPath(rootDir, key), "utf8");
      return raw.trim().length > 0 ? raw : null;
    } catch (error) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw error;
    }
  },
  put: async (key, value) => {
    const entryPath = resolveEntryPath(rootDir, key);
    await fs.mkdir(path.dirname(entryPath), { recursive: true, mode: 0o700 });
    await writeFileAtomic(entryPath, value.endsWith("\n") ? value : `${value}\n`);
  },
  delete: async (key) => {
    await fs.rm(resolveEntryPath(rootDir, key), { force: true });
  },
  listKeysWithPrefix: async (prefix) => {
    try {
      const entries = await fs.readdir(rootDir, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isFile() && entry.name.startsWith(prefix))
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      if (isMissingFileError(error)) {
        return [];
      }
      throw error;
    }
  },
});
