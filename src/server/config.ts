import { z } from "zod";

const DEFAULT_PORT = 8080;
const DEFAULT_HOST = "0.0.0.0";
const DEFAULT_CSV_PATHS = ["data/tarot.csv", "data/tarot_sample.csv"];

function commaList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
  HOST: z.string().min(1).default(DEFAULT_HOST),
  API_KEY: z.string().default(""),
  REDIS_URL: z.string().default(""),
  REDIS_KEY_PREFIX: z.string().min(1).default("tarot:used:"),
  TAROT_CSV_PATHS: z.string().optional(),
  CORS_ORIGIN: z.string().optional(),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

export type ServerConfig = {
  port: number;
  host: string;
  apiKey: string;
  redisUrl: string;
  redisKeyPrefix: string;
  csvPaths: string[];
  corsOrigins: string[];
  logLevel: z.infer<typeof EnvSchema>["LOG_LEVEL"];
};

/** Parses the process environment; throws a ZodError on invalid values. */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): ServerConfig {
  const parsed = EnvSchema.parse(env);
  const csvPaths = commaList(parsed.TAROT_CSV_PATHS);

  return {
    port: parsed.PORT,
    host: parsed.HOST,
    apiKey: parsed.API_KEY.trim(),
    redisUrl: parsed.REDIS_URL.trim(),
    redisKeyPrefix: parsed.REDIS_KEY_PREFIX,
    csvPaths: csvPaths.length ? csvPaths : [...DEFAULT_CSV_PATHS],
    corsOrigins: commaList(parsed.CORS_ORIGIN),
    logLevel: parsed.LOG_LEVEL,
  };
}
