import fs from "node:fs";
import path from "node:path";

export const CONFIG_FILE_BASENAMES = ["config.yml", "config.yaml", "config.json"] as const;

const isMissingFileError = (error: unknown) => {
  if (!(error instanceof Error)) {
    return false;
  }
  return "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");
};

const statRegularFile = (targetPath: string): "file" | "missing" | "other" => {
  try {
    return fs.statSync(targetPath).isFile() ? "file" : "other";
  } catch (error) {
    if (isMissingFileError(error)) {
      return "missing";
    }
    throw new Error(`failed to read config: ${targetPath}`);
  }
};

/**
 * Returns the first candidate that exists as a regular file, or null when none exist.
 * A candidate that exists but is not a regular file is reported only if nothing else matched.
 */
export const resolveFirstExistingPath = (candidatePaths: readonly string[]) => {
  let firstNonRegularPath: string | null = null;
  for (const candidatePath of candidatePaths) {
    const kind = statRegularFile(candidatePath);
    if (kind === "file") {
      return candidatePath;
    }
    if (kind === "other" && firstNonRegularPath == null) {
      firstNonRegularPath = candidatePath;
    }
  }
  if (firstNonRegularPath != null) {
    throw new Error(`config path is not a regular file: ${firstNonRegularPath}`);
  }
  return null;
};

export const resolveConfigFilePath = ({
  configDir,
  basenames = CONFIG_FILE_BASENAMES,
}: {
  configDir: string;
  basenames?: readonly string[];
}) => resolveFirstExistingPath(basenames.map((basename) => path.join(configDir, basename)));
