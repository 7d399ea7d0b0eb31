#!/usr/bin/env node
import { serve } from "@hono/node-server";
import { resolveConfigDir, resolveConfigFilePath } from "@quotabar/shared";

import { type ParsedArgs, parseArgs, resolveConfigOverrides } from "./cli";
import { createDaemon } from "./daemon";
import { loadConfig, resolveDefaultConfigPath } from "./infra/config/config-loader";
import { assertAnyProviderSucceeded, renderStatusText } from "./status-report";

const loadConfigFromArgs = (args: ParsedArgs) =>
  loadConfig({ overrides: resolveConfigOverrides(args) });

export const runServe = (args: ParsedArgs) => {
  const { config, configPath } = loadConfigFromArgs(args);
  const { app, orchestrator } = createDaemon({ config });

  const server = serve({
    fetch: app.fetch,
    port: config.port,
    hostname: config.bind,
  });
  orchestrator.start();
  console.log(`[quotabar] config: ${configPath ?? "defaults"}`);
  console.log(`[quotabar] listening on http://${config.bind}:${config.port}/api/usage`);

  const shutdown = () => {
    orchestrator.stop();
    server.close();
    process.exit(0);
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
};

export const runStatus = async (args: ParsedArgs) => {
  const { config } = loadConfigFromArgs(args);
  const { orchestrator } = createDaemon({ config });
  const state = (await orchestrator.runCycle()) ?? orchestrator.getState();
  console.log(args.json ? JSON.stringify(state, null, 2) : renderStatusText(state));
  assertAnyProviderSucceeded(state);
};

export const runConfigPath = () => {
  const configDir = resolveConfigDir();
  console.log(resolveConfigFilePath({ configDir }) ?? resolveDefaultConfigPath(configDir));
};

export const main = async () => {
  const args = parseArgs();
  if (args.command === "status") {
    await runStatus(args);
    return;
  }
  if (args.command === "config" && args.subcommand === "path") {
    runConfigPath();
    return;
  }
  if (args.command != null && args.command !== "serve") {
    throw new Error(`unknown command: ${args.command}`);
  }
  runServe(args);
};

if (process.env.NODE_ENV !== "test") {
  main().catch((error) => {
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
