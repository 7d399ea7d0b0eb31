import { z } from "zod";

export const providerIdSchema = z.enum(["claude", "codex", "gemini"]);

export const refreshIntervalMinutesSchema = z.number().int().min(1).max(1440);

const strictObject = <TShape extends z.ZodRawShape>(shape: TShape) => z.object(shape).strict();

const providerConfigSchema = strictObject({
  enabled: z.boolean(),
  refreshIntervalMinutes: refreshIntervalMinutesSchema.nullable(),
  keychainService: z.string().min(1).nullable(),
  credentialsPath: z.string().min(1).nullable(),
  homeDir: z.string().min(1).nullable(),
});

const providerConfigOverrideSchema = strictObject({
  enabled: z.boolean().optional(),
  refreshIntervalMinutes: refreshIntervalMinutesSchema.nullable().optional(),
  keychainService: z.string().min(1).nullable().optional(),
  credentialsPath: z.string().min(1).nullable().optional(),
  homeDir: z.string().min(1).nullable().optional(),
});

export const configSchema = strictObject({
  bind: z.enum(["127.0.0.1", "0.0.0.0"]),
  port: z.number().int().min(1).max(65535),
  refreshIntervalMinutes: refreshIntervalMinutesSchema,
  initialDelayMs: z.number().int().min(0),
  http: strictObject({
    timeoutMs: z.number().int().positive(),
  }),
  statusProbe: strictObject({
    enabled: z.boolean(),
    cooldownMs: z.number().int().min(0),
  }),
  history: strictObject({
    maxEntries: z.number().int().positive(),
    retentionDays: z.number().int().positive(),
  }),
  providers: strictObject({
    claude: providerConfigSchema,
    codex: providerConfigSchema,
    gemini: providerConfigSchema,
  }),
});

export const configOverrideSchema = strictObject({
  bind: z.enum(["127.0.0.1", "0.0.0.0"]).optional(),
  port: z.number().int().min(1).max(65535).optional(),
  refreshIntervalMinutes: refreshIntervalMinutesSchema.optional(),
  initialDelayMs: z.number().int().min(0).optional(),
  http: strictObject({
    timeoutMs: z.number().int().positive().optional(),
  }).optional(),
  statusProbe: strictObject({
    enabled: z.boolean().optional(),
    cooldownMs: z.number().int().min(0).optional(),
  }).optional(),
  history: strictObject({
    maxEntries: z.number().int().positive().optional(),
    retentionDays: z.number().int().positive().optional(),
  }).optional(),
  providers: strictObject({
    claude: providerConfigOverrideSchema.optional(),
    codex: providerConfigOverrideSchema.optional(),
    gemini: providerConfigOverrideSchema.optional(),
  }).optional(),
});

export const refreshIntervalRequestSchema = z.object({
  minutes: refreshIntervalMinutesSchema,
});
