import { z } from "zod";
import type { SpreadId } from "@lib/common/enums";
import { handleDraw, handleReset } from "@server/http/handlers";

import { type ToolDefinition, validationError } from "./context";

const SessionId = z.string().min(1, "session_id is required");

const DrawArgs = z.object({
  session_id: SessionId,
  reset_if_exhausted: z.boolean().optional(),
});

const ResetArgs = z.object({ session_id: SessionId });

const SESSION_ID_PROPERTY = {
  type: "string",
  description: "Caller-chosen id; cards are not repeated within one session",
};

const RESET_PROPERTY = {
  type: "boolean",
  description:
    "Start the session over when too few unseen cards remain (default true)",
};

function drawTool(
  name: string,
  description: string,
  spread: SpreadId,
): ToolDefinition {
  return {
    name,
    description,
    inputSchema: {
      type: "object",
      properties: {
        session_id: SESSION_ID_PROPERTY,
        reset_if_exhausted: RESET_PROPERTY,
      },
      required: ["session_id"],
    },
    handler(ctx, args) {
      const parsed = DrawArgs.safeParse(args ?? {});
      if (!parsed.success) return validationError(parsed.error.message);
      return handleDraw(ctx.engine, {
        sessionId: parsed.data.session_id,
        spread,
        resetIfExhausted: parsed.data.reset_if_exhausted ?? true,
      });
    },
  };
}

export function createTarotTools(): ToolDefinition[] {
  return [
    drawTool("draw_one", "Draw one tarot card for a session", "one"),
    drawTool(
      "draw_three",
      "Draw a past/present/future three-card spread for a session",
      "three",
    ),
    {
      name: "reset_session",
      description: "Forget which cards a session has already drawn",
      inputSchema: {
        type: "object",
        properties: { session_id: SESSION_ID_PROPERTY },
        required: ["session_id"],
      },
      handler(ctx, args) {
        const parsed = ResetArgs.safeParse(args ?? {});
        if (!parsed.success) return validationError(parsed.error.message);
        return handleReset(ctx.engine, parsed.data.session_id);
      },
    },
  ];
}
