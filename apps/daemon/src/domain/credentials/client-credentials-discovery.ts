import { constants } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";

export type ClientCredentials = {
  clientId: string;
  clientSecret: string;
};

type DiscoveryDeps = {
  findExecutable?: (name: string) => Promise<string | null>;
  resolveRealPath?: (filePath: string) => Promise<string>;
  readTextFile?: (filePath: string) => Promise<string | null>;
  fallbackBundlePaths?: readonly string[];
};

const GEMINI_EXECUTABLE = "gemini";

const BUNDLE_RELATIVE_PATHS = [
  path.join("node_modules", "@google", "gemini-cli-core", "dist", "src", "code_assist", "oauth2.js"),
  path.join("src", "code_assist", "oauth2.js"),
  path.join("lib", "oauth2.js"),
];

const GLOBAL_BUNDLE_SUFFIX = path.join(
  "lib",
  "node_modules",
  "@google",
  "gemini-cli",
  "node_modules",
  "@google",
  "gemini-cli-core",
  "dist",
  "src",
  "code_assist",
  "oauth2.js",
);

const DEFAULT_FALLBACK_BUNDLE_PATHS = [
  path.join("/opt/homebrew", GLOBAL_BUNDLE_SUFFIX),
  path.join("/usr/local", GLOBAL_BUNDLE_SUFFIX),
];

const CLIENT_ID_PATTERNS = [
  /OAUTH_CLIENT_ID\s*=\s*["']([^"']+)["']/,
  /client_id["']?\s*[:=]\s*["']([^"']+)["']/,
];

const CLIENT_SECRET_PATTERNS = [
  /OAUTH_CLIENT_SECRET\s*=\s*["']([^"']+)["']/,
  /client_secret["']?\s*[:=]\s*["']([^"']+)["']/,
];

const firstMatch = (source: string, patterns: RegExp[]) => {
  for (const pattern of patterns) {
    const value = source.match(pattern)?.[1];
    if (value) {
      return value;
    }
  }
  return null;
};

export const extractClientCredentials = (source: string): ClientCredentials | null => {
  const clientId = firstMatch(source, CLIENT_ID_PATTERNS);
  const clientSecret = firstMatch(source, CLIENT_SECRET_PATTERNS);
  if (!clientId || !clientSecret) {
    return null;
  }
  return { clientId, clientSecret };
};

/** PATH lookup without spawning a shell. */
export const findExecutableOnPath = async (
  name: string,
  envPath = process.env.PATH ?? "",
): Promise<string | null> => {
  for (const dir of envPath.split(path.delimiter)) {
    if (!dir) {
      continue;
    }
    const candidate = path.join(dir, name);
    try {
      await fs.access(candidate, constants.X_OK);
      return candidate;
    } catch {
      continue;
    }
  }
  return null;
};

const readTextFileIfExists = async (filePath: string) => {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch {
    return null;
  }
};

const resolveBundleCandidates = async ({
  findExecutable,
  resolveRealPath,
  fallbackBundlePaths,
}: Required<Omit<DiscoveryDeps, "readTextFile">>) => {
  const candidates: string[] = [];
  const executablePath = await findExecutable(GEMINI_EXECUTABLE);
  if (executablePath) {
    const resolved = await resolveRealPath(executablePath).catch(() => executablePath);
    // <prefix>/lib/node_modules/@google/gemini-cli/dist/index.js -> package root
    const packageRoot = path.dirname(path.dirname(resolved));
    candidates.push(...BUNDLE_RELATIVE_PATHS.map((relative) => path.join(packageRoot, relative)));
  }
  candidates.push(...fallbackBundlePaths);
  return candidates;
};

/**
 * Scrapes the OAuth client id and secret out of the installed Gemini CLI bundle.
 * Any failure yields null: the credentials are simply unavailable.
 */
export const discoverClientCredentials = async ({
  findExecutable = (name) => findExecutableOnPath(name),
  resolveRealPath = (filePath) => fs.realpath(filePath),
  readTextFile = readTextFileIfExists,
  fallbackBundlePaths = DEFAULT_FALLBACK_BUNDLE_PATHS,
}: DiscoveryDeps = {}): Promise<ClientCredentials | null> => {
  let candidates: string[];
  try {
    candidates = await resolveBundleCandidates({
      findExecutable,
      resolveRealPath,
      fallbackBundlePaths,
    });
  } catch {
    return null;
  }
  for (const candidate of candidates) {
    const source = await readTextFile(candidate).catch(() => null);
    if (!source) {
      continue;
    }
    const credentials = extractClientCredentials(source);
    if (credentials) {
      return credentials;
    }
  }
  return null;
};
