import { z } from "zod";

export const ApiErrorCode = z.enum([
  "VALIDATION",
  "UNAUTHORIZED",
  "NO_DECK_LOADED",
  "INSUFFICIENT_CARDS",
  "BACKEND_UNAVAILABLE",
  "BAD_STATE",
]);
export type ApiErrorCode = z.infer<typeof ApiErrorCode>;

export const ApiErrorSchema = z.object({
  error: z.object({
    code: ApiErrorCode,
    message: z.string(),
  }),
});
export type ApiError = z.infer<typeof ApiErrorSchema>;

export const HTTP_STATUS_FOR: Record<ApiErrorCode, number> = {
  VALIDATION: 400,
  UNAUTHORIZED: 401,
  INSUFFICIENT_CARDS: 409,
  NO_DECK_LOADED: 503,
  BACKEND_UNAVAILABLE: 503,
  BAD_STATE: 500,
};
