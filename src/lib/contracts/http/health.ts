import { z } from "zod";

export const HealthResponse = z.object({
  code: z.literal(0),
  status: z.literal("ok"),
  time: z.number().int(),
  cards: z.number().int(),
});
export type HealthResponse = z.infer<typeof HealthResponse>;
