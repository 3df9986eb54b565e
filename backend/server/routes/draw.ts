import type { FastifyInstance } from "fastify";
import type { SpreadId } from "@lib/common/enums";
import { DrawQuery, DrawRequest, type DrawResponse } from "@lib/contracts/http/draw";
import {
  ResetSessionRequest,
  type ResetSessionResponse,
} from "@lib/contracts/http/sessions.reset";
import type { DrawEngine } from "@server/draw/engine";
import { resolveSessionId } from "@server/http/guards";
import { handleDraw, handleReset } from "@server/http/handlers";

const DRAW_ROUTES: { url: string; spread: SpreadId }[] = [
  { url: "/draw_one", spread: "one" },
  { url: "/draw_three", spread: "three" },
];

export function registerDrawRoutes(app: FastifyInstance, engine: DrawEngine) {
  for (const route of DRAW_ROUTES) {
    app.post(route.url, async (request, reply) => {
      const body = DrawRequest.safeParse(request.body ?? {});
      if (!body.success) {
        return reply.status(400).send({
          error: { code: "VALIDATION", message: body.error.message },
        } satisfies DrawResponse);
      }
      const query = DrawQuery.safeParse(request.query ?? {});
      if (!query.success) {
        return reply.status(400).send({
          error: { code: "VALIDATION", message: query.error.message },
        } satisfies DrawResponse);
      }

      const session = resolveSessionId(body.data, query.data);
      if ("error" in session) {
        return reply
          .status(session.status)
          .send({ error: session.error } satisfies DrawResponse);
      }

      const res = await handleDraw(engine, {
        sessionId: session.sessionId,
        spread: route.spread,
        resetIfExhausted: body.data.reset_if_exhausted ?? true,
      });
      return reply.status(res.status).send(res.body);
    });
  }

  app.post("/reset_session", async (request, reply) => {
    const body = ResetSessionRequest.safeParse(request.body ?? {});
    if (!body.success) {
      return reply.status(400).send({
        error: { code: "VALIDATION", message: body.error.message },
      } satisfies ResetSessionResponse);
    }

    const session = resolveSessionId(body.data);
    if ("error" in session) {
      return reply
        .status(session.status)
        .send({ error: session.error } satisfies ResetSessionResponse);
    }

    const res = await handleReset(engine, session.sessionId);
    return reply.status(res.status).send(res.body);
  });
}
