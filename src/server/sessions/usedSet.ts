/**
 * Per-session record of card indices already handed out.
 *
 * - getUsed never fails for an unknown session; it returns an empty set.
 * - addUsed and clearUsed are idempotent.
 */
export interface UsedSetBackend {
  readonly kind: "memory" | "redis";
  getUsed(sessionId: string): Promise<Set<number>>;
  addUsed(sessionId: string, index: number): Promise<void>;
  clearUsed(sessionId: string): Promise<void>;
  /** Releases connections; called when the server shuts down. */
  close(): Promise<void>;
}
