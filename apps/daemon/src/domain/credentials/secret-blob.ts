import { isRecord } from "../usage/value-parsers";

export type SecretDocument = Record<string, unknown>;

const MAX_BARE_TOKEN_LENGTH = 2048;

const isHexPayload = (value: string) => value.length % 2 === 0 && /^[0-9a-fA-F]+$/.test(value);

const trimEdgeControlChars = (raw: string): string => {
  let startIndex = 0;
  let endIndex = raw.length;
  while (startIndex < endIndex && raw.charCodeAt(startIndex) <= 0x1f) {
    startIndex += 1;
  }
  while (endIndex > startIndex && raw.charCodeAt(endIndex - 1) <= 0x1f) {
    endIndex -= 1;
  }
  return raw.slice(startIndex, endIndex);
};

const parseJsonObject = (raw: string): SecretDocument | null => {
  try {
    const decoded: unknown = JSON.parse(raw);
    return isRecord(decoded) ? decoded : null;
  } catch {
    return null;
  }
};

const parseJsonLike = (raw: string): SecretDocument | null => {
  const normalized = trimEdgeControlChars(raw.trim());
  if (!normalized) {
    return null;
  }
  const direct = parseJsonObject(normalized);
  if (direct) {
    return direct;
  }
  // Some keychain writers prepend a length byte or append unrelated fields.
  const firstBrace = normalized.indexOf("{");
  const lastBrace = normalized.lastIndexOf("}");
  if (firstBrace !== -1 && lastBrace > firstBrace) {
    return parseJsonObject(normalized.slice(firstBrace, lastBrace + 1));
  }
  return null;
};

/**
 * Decodes a secret-store value into a JSON document.
 * Accepts plain JSON, hex-encoded JSON, and a bare access token.
 */
export const decodeSecretDocument = (raw: string): SecretDocument | null => {
  const normalized = raw.trim();
  if (!normalized) {
    return null;
  }
  const fromJson = parseJsonLike(normalized);
  if (fromJson) {
    return fromJson;
  }
  if (isHexPayload(normalized)) {
    const fromHex = parseJsonLike(Buffer.from(normalized, "hex").toString("utf8"));
    if (fromHex) {
      return fromHex;
    }
  }
  if (normalized.length > MAX_BARE_TOKEN_LENGTH || /\s/.test(normalized)) {
    return null;
  }
  return { accessToken: normalized };
};

export type EnvelopeShape = "wrapped" | "unwrapped";

export type UnwrappedDocument = {
  payload: SecretDocument;
  shape: EnvelopeShape;
};

export const unwrapEnvelope = (
  document: SecretDocument,
  envelopeKey: string | null,
): UnwrappedDocument => {
  if (envelopeKey != null) {
    const wrapped = document[envelopeKey];
    if (isRecord(wrapped)) {
      return { payload: wrapped, shape: "wrapped" };
    }
  }
  return { payload: document, shape: "unwrapped" };
};

export const wrapEnvelope = ({
  base,
  payload,
  shape,
  envelopeKey,
}: {
  base: SecretDocument;
  payload: SecretDocument;
  shape: EnvelopeShape;
  envelopeKey: string | null;
}): SecretDocument => {
  if (shape === "wrapped" && envelopeKey != null) {
    return { ...base, [envelopeKey]: payload };
  }
  return payload;
};
