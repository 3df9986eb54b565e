import { Redis } from "ioredis";
import type { ServerConfig } from "@server/config";
import type { Logger } from "@server/logger";
import { MemoryUsedSetBackend } from "@server/sessions/memory";
import { RedisUsedSetBackend } from "@server/sessions/redis";
import type { UsedSetBackend } from "@server/sessions/usedSet";

type BackendConfig = Pick<ServerConfig, "redisUrl" | "redisKeyPrefix">;

/**
 * Redis when REDIS_URL is set and reachable at startup, otherwise memory.
 * An unreachable Redis downgrades to memory with a warning.
 */
export async function createUsedSetBackend(
  config: BackendConfig,
  logger: Logger,
): Promise<UsedSetBackend> {
  if (!config.redisUrl) {
    logger.info("Using in-memory session store (lost on restart)");
    return new MemoryUsedSetBackend();
  }

  const client = new Redis(config.redisUrl, {
    lazyConnect: true,
    maxRetriesPerRequest: 2,
  });
  client.on("error", (err: Error) => {
    logger.warn({ err }, "Redis connection error");
  });
  try {
    await client.connect();
  } catch (err: unknown) {
    client.disconnect();
    logger.warn(
      { err },
      "Could not connect to Redis; falling back to in-memory session store",
    );
    return new MemoryUsedSetBackend();
  }

  logger.info({ keyPrefix: config.redisKeyPrefix }, "Using Redis session store");
  return new RedisUsedSetBackend(client, config.redisKeyPrefix);
}
