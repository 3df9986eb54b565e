import { z } from "zod";
import { Orientation } from "@lib/common/enums";
import { ApiErrorSchema } from "@lib/common/errors";

export const DrawRequest = z.object({
  session_id: z.string().optional(),
  session: z.string().optional(),
  reset_if_exhausted: z.boolean().optional(),
});
export type DrawRequest = z.infer<typeof DrawRequest>;

export const DrawQuery = z.object({
  session_id: z.string().optional(),
});
export type DrawQuery = z.infer<typeof DrawQuery>;

export const WireCard = z.object({
  index: z.number().int(),
  card: z.string(),
  chinese_name: z.string(),
  japanese_name: z.string(),
  orientation: Orientation,
  meaning: z.string(),
  // only present on multi-card spreads
  role: z.string().optional(),
});
export type WireCard = z.infer<typeof WireCard>;

export const DrawResponse = z
  .object({
    code: z.literal(0),
    session_id: z.string(),
    cards: z.array(WireCard),
  })
  .or(ApiErrorSchema);
export type DrawResponse = z.infer<typeof DrawResponse>;
