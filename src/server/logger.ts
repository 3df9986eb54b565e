import type { FastifyBaseLogger } from "fastify";

/** The slice of the Fastify (pino) logger that server modules write to. */
export type Logger = Pick<FastifyBaseLogger, "info" | "warn" | "error">;
