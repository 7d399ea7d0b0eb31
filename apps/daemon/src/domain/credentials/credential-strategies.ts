import type { ProviderId } from "@quotabar/shared";

import { CredentialRefreshError } from "../usage/usage-error";
import {
  asEpochMs,
  asNonEmptyString,
  asStringList,
  EPOCH_SECONDS_THRESHOLD,
  isRecord,
} from "../usage/value-parsers";
import {
  type ClientCredentials,
  discoverClientCredentials as discoverGeminiClientCredentials,
} from "./client-credentials-discovery";
import { decodeJwtPayload, readJwtExpiryMs } from "./jwt";
import type { SecretDocument } from "./secret-blob";
import { postTokenGrant } from "./token-grant";
import type { Credentials, ExpiryPolicy, RefreshedTokens } from "./types";

export type RefreshRequest = {
  credentials: Credentials;
  /** Space-delimited scope to request, or null to omit the parameter. */
  scope: string | null;
  timeoutMs: number;
};

export type CredentialStrategy = {
  providerId: ProviderId;
  /** Key under which the tool nests its tokens, when it nests them at all. */
  envelopeKey: string | null;
  expiryPolicy: ExpiryPolicy;
  parse: (payload: SecretDocument, document: SecretDocument) => Credentials | null;
  /** Produces the payload to write back, keeping every field of `previous` it does not own. */
  serialize: (
    credentials: Credentials,
    previous: SecretDocument,
    refreshed: RefreshedTokens,
  ) => SecretDocument;
  /** Scopes to try in order; at most one fallback follows the first attempt. */
  scopeCandidates: (credentials: Credentials) => Array<string | null>;
  requestRefresh: (request: RefreshRequest) => Promise<RefreshedTokens>;
};

export type CredentialStrategies = Record<ProviderId, CredentialStrategy>;

const CLAUDE_OAUTH_REFRESH_ENDPOINT = "https://platform.claude.com/v1/oauth/token";
const CLAUDE_DEFAULT_OAUTH_CLIENT_ID = "9d1c250a-e61b-44d9-88ed-5944d1962f5e";
const CLAUDE_BROAD_SCOPES = ["user:profile", "user:inference"];

const CODEX_OAUTH_REFRESH_ENDPOINT = "https://auth.openai.com/oauth/token";
const CODEX_DEFAULT_OAUTH_CLIENT_ID = "app_EMoamEEZ73f0CkXaXp7hrann";
const CODEX_REFRESH_SCOPE = "openid profile email";
const CODEX_AUTH_CLAIM = "https://api.openai.com/auth";

const GEMINI_OAUTH_REFRESH_ENDPOINT = "https://oauth2.googleapis.com/token";
const GEMINI_EARLY_EXPIRY_MS = 60_000;

const emptyCredentials = (providerId: ProviderId, accessToken: string): Credentials => ({
  providerId,
  accessToken,
  refreshToken: null,
  expiresAtMs: null,
  scopes: [],
  planHint: null,
  clientId: null,
  clientSecret: null,
  apiBaseUrl: null,
  accountId: null,
});

const firstString = (source: SecretDocument, keys: string[]) => {
  for (const key of keys) {
    const value = asNonEmptyString(source[key]);
    if (value) {
      return value;
    }
  }
  return null;
};

/** Writes under `preferred` unless the document already uses `alternate` for the field. */
const writeField = (target: SecretDocument, preferred: string, alternate: string, value: unknown) => {
  const key = alternate in target && !(preferred in target) ? alternate : preferred;
  target[key] = value;
};

const parseClaude = (payload: SecretDocument): Credentials | null => {
  const accessToken = firstString(payload, ["accessToken", "access_token", "token", "oauthToken"]);
  if (!accessToken) {
    return null;
  }
  return {
    ...emptyCredentials("claude", accessToken),
    refreshToken: firstString(payload, ["refreshToken", "refresh_token"]),
    expiresAtMs: asEpochMs(payload.expiresAt ?? payload.expires_at),
    scopes: asStringList(payload.scopes ?? payload.scope),
    planHint: firstString(payload, [
      "rateLimitTier",
      "rate_limit_tier",
      "subscriptionType",
      "subscription_type",
    ]),
    clientId: firstString(payload, ["clientId", "client_id"]),
  };
};

const serializeClaude = (credentials: Credentials, previous: SecretDocument): SecretDocument => {
  const next: SecretDocument = { ...previous };
  writeField(next, "accessToken", "access_token", credentials.accessToken);
  if (credentials.refreshToken != null) {
    writeField(next, "refreshToken", "refresh_token", credentials.refreshToken);
  }
  if (credentials.expiresAtMs != null) {
    writeField(next, "expiresAt", "expires_at", credentials.expiresAtMs);
  }
  if (credentials.scopes.length > 0) {
    if (typeof next.scope === "string" && !("scopes" in next)) {
      next.scope = credentials.scopes.join(" ");
    } else {
      next.scopes = [...credentials.scopes];
    }
  }
  return next;
};

const resolveClaudeScopeCandidates = (credentials: Credentials): Array<string | null> => {
  const original = credentials.scopes.length > 0 ? credentials.scopes.join(" ") : null;
  const alreadyBroad = CLAUDE_BROAD_SCOPES.every((scope) => credentials.scopes.includes(scope));
  if (alreadyBroad) {
    return [original];
  }
  return [CLAUDE_BROAD_SCOPES.join(" "), original];
};

const requestClaudeRefresh = ({ credentials, scope, timeoutMs }: RefreshRequest) => {
  const fields: Record<string, string> = {
    grant_type: "refresh_token",
    refresh_token: credentials.refreshToken ?? "",
    client_id:
      credentials.clientId ??
      asNonEmptyString(process.env.CLAUDE_CODE_OAUTH_CLIENT_ID) ??
      CLAUDE_DEFAULT_OAUTH_CLIENT_ID,
  };
  if (scope != null) {
    fields.scope = scope;
  }
  return postTokenGrant({
    endpoint: CLAUDE_OAUTH_REFRESH_ENDPOINT,
    providerLabel: "Claude",
    timeoutMs,
    body: { kind: "form", fields },
  });
};

const readCodexPlanClaims = (idToken: string | null) => {
  if (!idToken) {
    return null;
  }
  const claims = decodeJwtPayload(idToken)?.[CODEX_AUTH_CLAIM];
  return isRecord(claims) ? claims : null;
};

const parseCodex = (payload: SecretDocument, document: SecretDocument): Credentials | null => {
  const accessToken =
    firstString(payload, ["access_token", "accessToken", "token"]) ??
    firstString(document, ["OPENAI_API_KEY"]);
  if (!accessToken) {
    return null;
  }
  const planClaims = readCodexPlanClaims(firstString(payload, ["id_token", "idToken"]));
  return {
    ...emptyCredentials("codex", accessToken),
    refreshToken: firstString(payload, ["refresh_token", "refreshToken"]),
    expiresAtMs:
      asEpochMs(payload.expires_at ?? payload.expiresAt) ?? readJwtExpiryMs(accessToken),
    planHint: planClaims ? asNonEmptyString(planClaims.chatgpt_plan_type) : null,
    apiBaseUrl:
      firstString(payload, ["api_base_url", "base_url", "baseURL"]) ??
      firstString(document, ["api_base_url", "base_url", "baseURL"]),
    accountId:
      firstString(payload, ["account_id", "accountId"]) ??
      (planClaims ? asNonEmptyString(planClaims.chatgpt_account_id) : null),
  };
};

const serializeCodex = (
  credentials: Credentials,
  previous: SecretDocument,
  refreshed: RefreshedTokens,
): SecretDocument => {
  const next: SecretDocument = { ...previous };
  writeField(next, "access_token", "accessToken", credentials.accessToken);
  if (credentials.refreshToken != null) {
    writeField(next, "refresh_token", "refreshToken", credentials.refreshToken);
  }
  if (refreshed.idToken != null) {
    writeField(next, "id_token", "idToken", refreshed.idToken);
  }
  return next;
};

const requestCodexRefresh = ({ credentials, timeoutMs }: RefreshRequest) =>
  postTokenGrant({
    endpoint: CODEX_OAUTH_REFRESH_ENDPOINT,
    providerLabel: "Codex",
    timeoutMs,
    body: {
      kind: "json",
      value: {
        client_id:
          asNonEmptyString(process.env.CODEX_OAUTH_CLIENT_ID) ?? CODEX_DEFAULT_OAUTH_CLIENT_ID,
        grant_type: "refresh_token",
        refresh_token: credentials.refreshToken,
        scope: CODEX_REFRESH_SCOPE,
      },
    },
  });

const parseGemini = (payload: SecretDocument): Credentials | null => {
  const accessToken = firstString(payload, ["access_token", "accessToken"]);
  if (!accessToken) {
    return null;
  }
  return {
    ...emptyCredentials("gemini", accessToken),
    refreshToken: firstString(payload, ["refresh_token", "refreshToken"]),
    expiresAtMs: asEpochMs(
      payload.expiry_date ?? payload.expires_at ?? payload.expiresAt ?? payload.token_expiry,
    ),
    scopes: asStringList(payload.scope),
    clientId: firstString(payload, ["client_id", "clientId"]),
    clientSecret: firstString(payload, ["client_secret", "clientSecret"]),
  };
};

const serializeGemini = (credentials: Credentials, previous: SecretDocument): SecretDocument => {
  const next: SecretDocument = { ...previous, access_token: credentials.accessToken };
  if (credentials.refreshToken != null) {
    next.refresh_token = credentials.refreshToken;
  }
  const expiresAtMs = credentials.expiresAtMs;
  if (expiresAtMs == null) {
    return next;
  }
  if ("token_expiry" in previous && !("expiry_date" in previous)) {
    next.token_expiry = new Date(expiresAtMs).toISOString();
  } else if ("expires_at" in previous && !("expiry_date" in previous)) {
    const previousValue = previous.expires_at;
    const wroteSeconds =
      typeof previousValue === "number" && previousValue < EPOCH_SECONDS_THRESHOLD;
    next.expires_at = wroteSeconds ? Math.floor(expiresAtMs / 1000) : expiresAtMs;
  } else {
    next.expiry_date = expiresAtMs;
  }
  return next;
};

const createGeminiRefresh =
  (discover: () => Promise<ClientCredentials | null>) =>
  async ({ credentials, timeoutMs }: RefreshRequest) => {
    const client =
      credentials.clientId && credentials.clientSecret
        ? { clientId: credentials.clientId, clientSecret: credentials.clientSecret }
        : await discover();
    if (!client) {
      throw new CredentialRefreshError(
        "NO_CREDENTIALS",
        "Gemini OAuth client credentials not found. Reinstall or update the gemini CLI.",
      );
    }
    return postTokenGrant({
      endpoint: GEMINI_OAUTH_REFRESH_ENDPOINT,
      providerLabel: "Gemini",
      timeoutMs,
      body: {
        kind: "form",
        fields: {
          grant_type: "refresh_token",
          client_id: client.clientId,
          client_secret: client.clientSecret,
          refresh_token: credentials.refreshToken ?? "",
        },
      },
    });
  };

export const createCredentialStrategies = ({
  discoverClientCredentials = () => discoverGeminiClientCredentials(),
}: {
  discoverClientCredentials?: () => Promise<ClientCredentials | null>;
} = {}): CredentialStrategies => ({
  claude: {
    providerId: "claude",
    envelopeKey: "claudeAiOauth",
    expiryPolicy: { missingExpiry: "valid", earlyExpiryMs: 0 },
    parse: parseClaude,
    serialize: serializeClaude,
    scopeCandidates: resolveClaudeScopeCandidates,
    requestRefresh: requestClaudeRefresh,
  },
  codex: {
    providerId: "codex",
    envelopeKey: "tokens",
    expiryPolicy: { missingExpiry: "valid", earlyExpiryMs: 0 },
    parse: parseCodex,
    serialize: serializeCodex,
    scopeCandidates: () => [null],
    requestRefresh: requestCodexRefresh,
  },
  gemini: {
    providerId: "gemini",
    envelopeKey: null,
    // The Gemini CLI always writes an expiry; a missing one means the file is partial.
    expiryPolicy: { missingExpiry: "expired", earlyExpiryMs: GEMINI_EARLY_EXPIRY_MS },
    parse: parseGemini,
    serialize: serializeGemini,
    scopeCandidates: () => [null],
    requestRefresh: createGeminiRefresh(discoverClientCredentials),
  },
});
