import { z } from "zod";

export const Orientation = z.enum(["upright", "reversed"]);
export type Orientation = z.infer<typeof Orientation>;

export const SpreadId = z.enum(["one", "three"]);
export type SpreadId = z.infer<typeof SpreadId>;
