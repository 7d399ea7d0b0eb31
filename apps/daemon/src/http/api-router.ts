import { toErrorMessage } from "@quotabar/shared";
import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";

import { buildError } from "./helpers";
import { createSettingsRoutes } from "./routes/settings-routes";
import type { UsageHistorySource, UsageStateSource } from "./routes/types";
import { createUsageRoutes } from "./routes/usage-routes";

type ApiContext = {
  orchestrator: UsageStateSource;
  historyStore: UsageHistorySource;
  logger?: Pick<Console, "log" | "warn">;
};

export const createApiRouter = ({ orchestrator, historyStore, logger = console }: ApiContext) => {
  const api = new Hono();
  api.onError((error, c) => {
    if (error instanceof HTTPException && error.status === 400) {
      return c.json({ error: buildError("INVALID_PAYLOAD", error.message) }, 400);
    }
    logger.warn(`[quotabar] request failed: ${c.req.method} ${c.req.path} ${toErrorMessage(error)}`);
    return c.text("Internal Server Error", 500);
  });

  const withMiddleware = api.use("*", async (c, next) => {
    c.header("Cache-Control", "no-store");
    await next();
  });

  return withMiddleware
    .route("/", createUsageRoutes({ orchestrator, historyStore }))
    .route("/", createSettingsRoutes({ orchestrator }));
};

export const createApp = (context: ApiContext) =>
  new Hono().route("/api", createApiRouter(context));
