import type { FastifyError, FastifyInstance } from "fastify";
import fastifyCors from "@fastify/cors";

import type { ApiError } from "@lib/common/errors";
import type { DrawEngine } from "@server/draw/engine";
import { requireApiKey } from "@server/http/guards";
import type { UsedSetBackend } from "@server/sessions/usedSet";

import { registerDrawRoutes } from "./routes/draw";
import { registerHealthRoute } from "./routes/health";
import { registerMcpRoute } from "./routes/mcp";

export type AppDeps = {
  engine: DrawEngine;
  backend: UsedSetBackend;
  apiKey: string;
  // empty allows any origin
  corsOrigins: string[];
};

export async function registerTarotApp(app: FastifyInstance, deps: AppDeps) {
  await app.register(fastifyCors, {
    origin: (origin, cb) => {
      if (deps.corsOrigins.length === 0 || !origin) return cb(null, true);
      cb(null, deps.corsOrigins.includes(origin));
    },
  });

  app.setErrorHandler((err: FastifyError, request, reply) => {
    const status = err.statusCode ?? 500;
    if (status >= 500) {
      request.log.error({ err }, "Unhandled error");
      return reply.status(500).send({
        error: { code: "BAD_STATE", message: "Internal server error" },
      } satisfies ApiError);
    }
    return reply.status(status).send({
      error: { code: "VALIDATION", message: err.message },
    } satisfies ApiError);
  });

  registerHealthRoute(app, deps.engine);

  await app.register(async (guarded) => {
    guarded.addHook("onRequest", async (request, reply) => {
      const denied = requireApiKey(request.headers, deps.apiKey);
      if (denied) {
        return reply
          .status(denied.status)
          .send({ error: denied.error } satisfies ApiError);
      }
    });

    registerDrawRoutes(guarded, deps.engine);
    registerMcpRoute(guarded, deps.engine);
  });

  app.addHook("onClose", async () => {
    await deps.backend.close();
  });

  return app;
}
