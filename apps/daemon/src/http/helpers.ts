import type { ApiError } from "@quotabar/shared";
import type { z } from "zod";

export const buildError = (code: ApiError["code"], message: string): ApiError => ({
  code,
  message,
});

export const describeValidationError = (error: z.ZodError) => {
  const issue = error.issues[0];
  const pathLabel = issue?.path.join(".") || "(root)";
  return `${pathLabel} ${issue?.message ?? "validation failed"}`;
};
