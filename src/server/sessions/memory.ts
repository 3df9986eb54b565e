import type { UsedSetBackend } from "@server/sessions/usedSet";

/**
 * Process-local used-sets. Each method runs to completion within one
 * event-loop turn, so individual operations never interleave. State is lost
 * on restart.
 */
export class MemoryUsedSetBackend implements UsedSetBackend {
  readonly kind = "memory";
  private readonly sessions = new Map<string, Set<number>>();

  async getUsed(sessionId: string): Promise<Set<number>> {
    return new Set(this.sessions.get(sessionId));
  }

  async addUsed(sessionId: string, index: number): Promise<void> {
    let used = this.sessions.get(sessionId);
    if (!used) {
      used = new Set();
      this.sessions.set(sessionId, used);
    }
    used.add(index);
  }

  async clearUsed(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
  }

  async close(): Promise<void> {
    this.sessions.clear();
  }
}
