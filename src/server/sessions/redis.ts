import { parseIndex } from "@server/deck/deck";
import type { UsedSetBackend } from "@server/sessions/usedSet";

/** The Redis set commands the backend needs; an ioredis client satisfies it. */
export interface RedisSetClient {
  smembers(key: string): Promise<string[]>;
  sadd(key: string, ...members: number[]): Promise<number>;
  del(...keys: string[]): Promise<number>;
  quit(): Promise<string>;
}

/**
 * Used-sets stored as Redis sets under `<prefix><sessionId>`. Shared by every
 * process pointed at the same Redis and kept across restarts.
 */
export class RedisUsedSetBackend implements UsedSetBackend {
  readonly kind = "redis";

  constructor(
    private readonly client: RedisSetClient,
    private readonly keyPrefix = "tarot:used:",
  ) {}

  key(sessionId: string): string {
    return `${this.keyPrefix}${sessionId}`;
  }

  async getUsed(sessionId: string): Promise<Set<number>> {
    const members = await this.client.smembers(this.key(sessionId));
    const used = new Set<number>();
    for (const member of members) {
      const index = parseIndex(member);
      // foreign members written by other tools are ignored
      if (index !== undefined) used.add(index);
    }
    return used;
  }

  async addUsed(sessionId: string, index: number): Promise<void> {
    await this.client.sadd(this.key(sessionId), index);
  }

  async clearUsed(sessionId: string): Promise<void> {
    await this.client.del(this.key(sessionId));
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
