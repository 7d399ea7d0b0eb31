import { asNumber, isRecord } from "../usage/value-parsers";

export const decodeJwtPayload = (token: string): Record<string, unknown> | null => {
  const segments = token.split(".");
  const payloadSegment = segments[1];
  if (segments.length !== 3 || !payloadSegment) {
    return null;
  }
  try {
    const decoded: unknown = JSON.parse(Buffer.from(payloadSegment, "base64url").toString("utf8"));
    return isRecord(decoded) ? decoded : null;
  } catch {
    return null;
  }
};

export const readJwtExpiryMs = (token: string): number | null => {
  const exp = asNumber(decodeJwtPayload(token)?.exp);
  return exp == null ? null : exp * 1000;
};
