import type { SpreadId } from "@lib/common/enums";
import type { DrawResponse } from "@lib/contracts/http/draw";
import type { ResetSessionResponse } from "@lib/contracts/http/sessions.reset";
import type { DrawEngine } from "@server/draw/engine";
import { drawReading } from "@server/draw/reading";

export type HandlerResponse<Body> = { status: number; body: Body };

export async function handleDraw(
  engine: DrawEngine,
  args: { sessionId: string; spread: SpreadId; resetIfExhausted: boolean },
): Promise<HandlerResponse<DrawResponse>> {
  const result = await drawReading(engine, args);
  if (!result.ok) {
    return { status: result.status, body: { error: result.error } };
  }
  return {
    status: 200,
    body: { code: 0, session_id: result.sessionId, cards: result.cards },
  };
}

export async function handleReset(
  engine: DrawEngine,
  sessionId: string,
): Promise<HandlerResponse<ResetSessionResponse>> {
  const result = await engine.reset(sessionId);
  if (!result.ok) {
    return { status: result.status, body: { error: result.error } };
  }
  return {
    status: 200,
    body: { code: 0, session_id: result.sessionId, message: "cleared" },
  };
}
