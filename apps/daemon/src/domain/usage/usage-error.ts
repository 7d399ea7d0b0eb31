export const USAGE_PROVIDER_ERROR_CODES = [
  "TOKEN_NOT_FOUND",
  "TOKEN_INVALID",
  "UPSTREAM_UNAVAILABLE",
  "UNSUPPORTED_RESPONSE",
  "INTERNAL",
] as const;

export type UsageProviderErrorCode = (typeof USAGE_PROVIDER_ERROR_CODES)[number];

export class UsageProviderError extends Error {
  code: UsageProviderErrorCode;
  severity: "warning" | "error";

  constructor(
    code: UsageProviderErrorCode,
    message: string,
    severity: "warning" | "error" = "error",
  ) {
    super(message);
    this.name = "UsageProviderError";
    this.code = code;
    this.severity = severity;
  }
}

export type CredentialRefreshErrorCode =
  | "NO_CREDENTIALS"
  | "NO_REFRESH_TOKEN"
  | "INVALID_RESPONSE"
  | "REFRESH_REJECTED";

export class CredentialRefreshError extends Error {
  code: CredentialRefreshErrorCode;
  /** HTTP status of a rejected grant. Null for every other code. */
  status: number | null;

  constructor(code: CredentialRefreshErrorCode, message: string, status: number | null = null) {
    super(message);
    this.name = "CredentialRefreshError";
    this.code = code;
    this.status = status;
  }
}

export type UsageProbeErrorCode =
  | "INVALID_URL"
  | "INVALID_RESPONSE"
  | "UNAUTHORIZED"
  | "NO_DATA"
  | "HTTP_ERROR";

export class UsageProbeError extends Error {
  code: UsageProbeErrorCode;
  status: number | null;

  constructor(code: UsageProbeErrorCode, message: string, status: number | null = null) {
    super(message);
    this.name = "UsageProbeError";
    this.code = code;
    this.status = status;
  }
}

export type ProviderFailure = {
  providerId: string;
  message: string;
};

export class OrchestrationError extends Error {
  failures: ProviderFailure[];

  constructor(failures: ProviderFailure[]) {
    super(failures.map((failure) => `${failure.providerId}: ${failure.message}`).join("; "));
    this.name = "OrchestrationError";
    this.failures = failures;
  }
}

export const isUnauthorizedProbeError = (error: unknown): error is UsageProbeError =>
  error instanceof UsageProbeError && error.code === "UNAUTHORIZED";
