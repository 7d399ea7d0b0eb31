import { zValidator } from "@hono/zod-validator";
import { providerIdSchema } from "@quotabar/shared";
import { Hono } from "hono";
import { z } from "zod";

import { buildError, describeValidationError } from "../helpers";
import type { UsageHistorySource, UsageStateSource } from "./types";

const MAX_HISTORY_HOURS = 168;

const usageHistoryQuerySchema = z.object({
  providerId: providerIdSchema,
  hours: z.coerce.number().int().min(1).max(MAX_HISTORY_HOURS).optional(),
});

export const createUsageRoutes = ({
  orchestrator,
  historyStore,
}: {
  orchestrator: UsageStateSource;
  historyStore: UsageHistorySource;
}) => {
  return new Hono()
    .get("/usage", (c) => c.json(orchestrator.getState()))
    .get(
      "/usage/history",
      zValidator("query", usageHistoryQuerySchema, (result, c) => {
        if (!result.success) {
          return c.json(
            { error: buildError("INVALID_PAYLOAD", describeValidationError(result.error)) },
            400,
          );
        }
      }),
      async (c) => {
        const { providerId, hours = 24 } = c.req.valid("query");
        const entries = await historyStore.list(providerId, hours);
        return c.json({ providerId, hours, entries });
      },
    )
    .post("/usage/refresh", async (c) => {
      const state = await orchestrator.runCycle();
      if (!state) {
        return c.json({ error: buildError("BUSY", "refresh already in progress") }, 409);
      }
      return c.json(state);
    })
    .get("/usage/:providerId", (c) => {
      const providerId = providerIdSchema.safeParse(c.req.param("providerId"));
      if (!providerId.success) {
        return c.json({ error: buildError("NOT_FOUND", "unknown provider") }, 404);
      }
      const provider = orchestrator.getProviderState(providerId.data);
      if (!provider) {
        return c.json({ error: buildError("NOT_FOUND", "provider is disabled") }, 404);
      }
      return c.json({ provider });
    });
};
