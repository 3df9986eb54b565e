import type { RedisSetClient } from "./redis";

/** In-process stand-in for the Redis set commands, for tests. */
export class FakeRedis implements RedisSetClient {
  readonly sets = new Map<string, Set<string>>();
  quitCalls = 0;
  failWith?: Error;

  private check() {
    if (this.failWith) throw this.failWith;
  }

  async smembers(key: string): Promise<string[]> {
    this.check();
    return Array.from(this.sets.get(key) ?? []);
  }

  async sadd(key: string, ...members: number[]): Promise<number> {
    this.check();
    let set = this.sets.get(key);
    if (!set) {
      set = new Set();
      this.sets.set(key, set);
    }
    let added = 0;
    for (const member of members) {
      const value = String(member);
      if (!set.has(value)) {
        set.add(value);
        added++;
      }
    }
    return added;
  }

  async del(...keys: string[]): Promise<number> {
    this.check();
    let removed = 0;
    for (const key of keys) {
      if (this.sets.delete(key)) removed++;
    }
    return removed;
  }

  async quit(): Promise<string> {
    this.quitCalls++;
    return "OK";
  }
}
