import { zValidator } from "@hono/zod-validator";
import { refreshIntervalRequestSchema } from "@quotabar/shared";
import { Hono } from "hono";

import { buildError, describeValidationError } from "../helpers";
import type { UsageStateSource } from "./types";

export const createSettingsRoutes = ({ orchestrator }: { orchestrator: UsageStateSource }) => {
  return new Hono().put(
    "/settings/refresh-interval",
    zValidator("json", refreshIntervalRequestSchema, (result, c) => {
      if (!result.success) {
        return c.json(
          { error: buildError("INVALID_PAYLOAD", describeValidationError(result.error)) },
          400,
        );
      }
    }),
    (c) => {
      const { minutes } = c.req.valid("json");
      orchestrator.setIntervalMinutes(minutes);
      return c.json(orchestrator.getState());
    },
  );
};
