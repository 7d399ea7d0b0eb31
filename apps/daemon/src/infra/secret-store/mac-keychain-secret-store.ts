import os from "node:os";

import { execa } from "execa";

import type { SecretStore } from "./secret-store";

type SecurityResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

type RunSecurity = (args: string[], options?: { input?: string }) => Promise<SecurityResult>;

type KeychainServiceCandidate = {
  serviceName: string;
  modifiedAtMs: number | null;
};

// `security` exits with this code when the item does not exist.
const ITEM_NOT_FOUND_EXIT_CODE = 44;
const SECURITY_TIMEOUT_MS = 5_000;

const runSecurityCommand: RunSecurity = async (args, options = {}) => {
  const result = await execa("security", args, {
    reject: false,
    timeout: SECURITY_TIMEOUT_MS,
    input: options.input,
  });
  return {
    exitCode: result.exitCode ?? 1,
    stdout: result.stdout ?? "",
    stderr: result.stderr ?? "",
  };
};

const parseKeychainTimedate = (value: string): number | null => {
  if (!/^\d{14}$/.test(value)) {
    return null;
  }
  const timestamp = Date.UTC(
    Number(value.slice(0, 4)),
    Number(value.slice(4, 6)) - 1,
    Number(value.slice(6, 8)),
    Number(value.slice(8, 10)),
    Number(value.slice(10, 12)),
    Number(value.slice(12, 14)),
  );
  return Number.isNaN(timestamp) ? null : timestamp;
};

/** Collects generic-password service names from `security dump-keychain`, newest first. */
export const parseKeychainServiceCandidates = (
  rawDump: string,
  prefix: string,
): KeychainServiceCandidate[] => {
  const byServiceName = new Map<string, KeychainServiceCandidate>();
  for (const block of rawDump.split(/class:\s+"genp"/g)) {
    const serviceName = block.match(/"svce"<blob>="([^"]+)"/)?.[1];
    if (!serviceName || !serviceName.startsWith(prefix)) {
      continue;
    }
    const modifiedAtMs = parseKeychainTimedate(
      block.match(/"mdat"<timedate>=[^\n]*"(\d{14})Z/)?.[1] ?? "",
    );
    const existing = byServiceName.get(serviceName);
    if (!existing || (modifiedAtMs ?? -1) > (existing.modifiedAtMs ?? -1)) {
      byServiceName.set(serviceName, { serviceName, modifiedAtMs });
    }
  }
  return [...byServiceName.values()].sort(
    (left, right) =>
      (right.modifiedAtMs ?? 0) - (left.modifiedAtMs ?? 0) ||
      left.serviceName.localeCompare(right.serviceName),
  );
};

const parseAccountName = (attributes: string): string | null =>
  attributes.match(/"acct"<blob>="([^"]*)"/)?.[1] ?? null;

const quoteInteractiveArg = (value: string) => `"${value.replace(/["\\]/g, "\\$&")}"`;

/**
 * `add-generic-password` line for `security -i`. The secret goes in as hex (`-X`) on stdin
 * so it never shows up in the process list.
 */
export const buildAddPasswordCommand = (account: string, serviceName: string, value: string) =>
  [
    "add-generic-password",
    "-U",
    "-a",
    quoteInteractiveArg(account),
    "-s",
    quoteInteractiveArg(serviceName),
    "-X",
    Buffer.from(value, "utf8").toString("hex"),
  ].join(" ") + "\n";

const stripTrailingNewline = (value: string) => value.replace(/\r?\n$/, "");

export const createMacKeychainSecretStore = ({
  run = runSecurityCommand,
  keychain = "login.keychain-db",
  fallbackAccount = os.userInfo().username,
}: {
  run?: RunSecurity;
  keychain?: string;
  fallbackAccount?: string;
} = {}): SecretStore => {
  const resolveAccount = async (serviceName: string) => {
    const result = await run(["find-generic-password", "-s", serviceName]);
    if (result.exitCode !== 0) {
      return fallbackAccount;
    }
    return parseAccountName(result.stdout) ?? fallbackAccount;
  };

  return {
    label: "macOS keychain",
    get: async (serviceName) => {
      const result = await run(["find-generic-password", "-w", "-s", serviceName]);
      if (result.exitCode === ITEM_NOT_FOUND_EXIT_CODE) {
        return null;
      }
      if (result.exitCode !== 0) {
        throw new Error(`keychain lookup failed for ${serviceName} (exit ${result.exitCode})`);
      }
      const value = stripTrailingNewline(result.stdout);
      return value.length > 0 ? value : null;
    },
    put: async (serviceName, value) => {
      const account = await resolveAccount(serviceName);
      const result = await run(["-i"], {
        input: buildAddPasswordCommand(account, serviceName, value),
      });
      // Interactive mode reports command failures on stderr.
      if (result.exitCode !== 0 || result.stderr.trim().length > 0) {
        throw new Error(`keychain write failed for ${serviceName} (exit ${result.exitCode})`);
      }
    },
    delete: async (serviceName) => {
      const result = await run(["delete-generic-password", "-s", serviceName]);
      if (result.exitCode !== 0 && result.exitCode !== ITEM_NOT_FOUND_EXIT_CODE) {
        throw new Error(`keychain delete failed for ${serviceName} (exit ${result.exitCode})`);
      }
    },
    listKeysWithPrefix: async (prefix) => {
      const result = await run(["dump-keychain", keychain]);
      if (result.exitCode !== 0) {
        return [];
      }
      return parseKeychainServiceCandidates(result.stdout, prefix).map(
        (candidate) => candidate.serviceName,
      );
    },
  };
};
