import { z } from "zod";
import { ApiErrorSchema } from "@lib/common/errors";

export const ResetSessionRequest = z.object({
  session_id: z.string().optional(),
});
export type ResetSessionRequest = z.infer<typeof ResetSessionRequest>;

export const ResetSessionResponse = z
  .object({
    code: z.literal(0),
    session_id: z.string(),
    message: z.literal("cleared"),
  })
  .or(ApiErrorSchema);
export type ResetSessionResponse = z.infer<typeof ResetSessionResponse>;
