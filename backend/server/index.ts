import Fastify from "fastify";

import { loadConfig } from "@server/config";
import { loadDeckFromCandidates } from "@server/deck/load";
import { DrawEngine } from "@server/draw/engine";
import { createUsedSetBackend } from "@server/sessions/factory";

import { registerTarotApp } from "./app";

export async function createServer() {
  const config = loadConfig();

  const fastify = Fastify({
    logger: { level: config.logLevel },
  });

  const { deck } = await loadDeckFromCandidates(config.csvPaths, fastify.log);
  const backend = await createUsedSetBackend(config, fastify.log);
  const engine = new DrawEngine(deck, backend);

  await registerTarotApp(fastify, {
    engine,
    backend,
    apiKey: config.apiKey,
    corsOrigins: config.corsOrigins,
  });

  await fastify.listen({ port: config.port, host: config.host });
  fastify.log.info(
    {
      port: config.port,
      host: config.host,
      cards: deck.size,
      store: backend.kind,
      apiKeyRequired: Boolean(config.apiKey),
    },
    "Tarot draw server listening",
  );

  return { fastify, engine };
}

if (require.main === module) {
  createServer().catch((err) => {
    console.error("Failed to start server", err);
    process.exitCode = 1;
  });
}
