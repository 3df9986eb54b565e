import type { FastifyInstance } from "fastify";
import type { HealthResponse } from "@lib/contracts/http/health";
import type { DrawEngine } from "@server/draw/engine";

export function registerHealthRoute(app: FastifyInstance, engine: DrawEngine) {
  app.get("/health", async (_request, reply) => {
    const body: HealthResponse = {
      code: 0,
      status: "ok",
      time: Math.floor(Date.now() / 1000),
      cards: engine.deckSize,
    };
    return reply.send(body);
  });
}
