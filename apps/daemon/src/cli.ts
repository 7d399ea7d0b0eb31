import { configSchema, type QuotabarConfigOverride } from "@quotabar/shared";
import type { ArgsDef, ParsedArgs as CittyParsedArgs } from "citty";
import { parseArgs as parseCittyArgs } from "citty";

const cliArgDefinitions = {
  command: { type: "positional", required: false },
  subcommand: { type: "positional", required: false },
  bind: { type: "string" },
  port: { type: "string" },
  interval: { type: "string" },
  json: { type: "boolean" },
} satisfies ArgsDef;

export type ParsedArgs = CittyParsedArgs<typeof cliArgDefinitions>;

const normalizeRawArgv = (argv: string[]) => argv.filter((token) => token !== "--");

export const parseArgs = (argv = process.argv.slice(2)): ParsedArgs =>
  parseCittyArgs<typeof cliArgDefinitions>(normalizeRawArgv(argv), cliArgDefinitions);

const parsePositiveInteger = (value: string) => {
  if (!/^\d+$/.test(value.trim())) {
    return null;
  }
  const parsed = Number.parseInt(value, 10);
  return parsed > 0 ? parsed : null;
};

export const parsePort = (value: unknown) => {
  if (typeof value !== "string") {
    return null;
  }
  return parsePositiveInteger(value);
};

const readOptionalString = (value: unknown, flag: string): string | null => {
  if (value == null) {
    return null;
  }
  if (value === true) {
    throw new Error(`${flag} requires a value.`);
  }
  if (typeof value !== "string") {
    return null;
  }
  return value;
};

/** Flags layered over the config file; range checks happen when the layers are merged. */
export const resolveConfigOverrides = (args: ParsedArgs): QuotabarConfigOverride => {
  const overrides: QuotabarConfigOverride = {};

  const bind = readOptionalString(args.bind, "--bind");
  if (bind != null) {
    const parsedBind = configSchema.shape.bind.safeParse(bind);
    if (!parsedBind.success) {
      throw new Error(`--bind must be 127.0.0.1 or 0.0.0.0. (received: ${bind})`);
    }
    overrides.bind = parsedBind.data;
  }

  const port = readOptionalString(args.port, "--port");
  if (port != null) {
    const parsedPort = parsePort(port);
    if (parsedPort == null) {
      throw new Error(`--port must be a positive integer. (received: ${port})`);
    }
    overrides.port = parsedPort;
  }

  const interval = readOptionalString(args.interval, "--interval");
  if (interval != null) {
    const minutes = parsePositiveInteger(interval);
    if (minutes == null) {
      throw new Error(`--interval must be a whole number of minutes. (received: ${interval})`);
    }
    overrides.refreshIntervalMinutes = minutes;
  }

  return overrides;
};
