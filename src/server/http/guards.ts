import { timingSafeEqual } from "node:crypto";
import { HTTP_STATUS_FOR, type ApiErrorCode } from "@lib/common/errors";

export type GuardErrorCode = ApiErrorCode;
export type GuardError = {
  status: number;
  error: { code: GuardErrorCode; message: string };
};

type HeaderBag = Record<string, string | string[] | undefined>;

export const API_KEY_HEADER = "x-api-key";

function headerValue(headers: HeaderBag, name: string): string {
  const value = headers[name];
  return (Array.isArray(value) ? value[0] : value) ?? "";
}

function sameSecret(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/** X-API-KEY must match when a key is configured. */
export function requireApiKey(
  headers: HeaderBag,
  expected: string,
): GuardError | undefined {
  if (!expected) return undefined;
  const given = headerValue(headers, API_KEY_HEADER);
  if (!given || !sameSecret(given, expected)) {
    return {
      status: HTTP_STATUS_FOR.UNAUTHORIZED,
      error: { code: "UNAUTHORIZED", message: "Invalid API key" },
    };
  }
}

// ids are opaque: only the empty string is rejected
function nonEmpty(value: string | undefined): string | undefined {
  return value ? value : undefined;
}

/** Session id from body.session_id, body.session or ?session_id, in that order. */
export function resolveSessionId(
  body: { session_id?: string; session?: string },
  query: { session_id?: string } = {},
): { sessionId: string } | GuardError {
  const sessionId =
    nonEmpty(body.session_id) ??
    nonEmpty(body.session) ??
    nonEmpty(query.session_id);
  if (!sessionId) {
    return {
      status: HTTP_STATUS_FOR.VALIDATION,
      error: { code: "VALIDATION", message: "Missing session_id" },
    };
  }
  return { sessionId };
}
