import { describe, it, expect } from "vitest";
import type { UsedSetBackend } from "./usedSet";

/** Behaviour every UsedSetBackend must share. */
export function describeUsedSetContract(
  name: string,
  makeBackend: () => UsedSetBackend,
) {
  describe(`${name} used-set contract`, () => {
    it("returns an empty set for an unknown session", async () => {
      const backend = makeBackend();
      expect(await backend.getUsed("nobody")).toEqual(new Set());
    });

    it("records added indices", async () => {
      const backend = makeBackend();
      await backend.addUsed("s1", 3);
      await backend.addUsed("s1", 0);
      expect(await backend.getUsed("s1")).toEqual(new Set([0, 3]));
    });

    it("treats a repeated add as a no-op", async () => {
      const backend = makeBackend();
      await backend.addUsed("s1", 5);
      await backend.addUsed("s1", 5);
      expect(await backend.getUsed("s1")).toEqual(new Set([5]));
    });

    it("keeps sessions apart", async () => {
      const backend = makeBackend();
      await backend.addUsed("s1", 1);
      await backend.addUsed("s2", 2);
      expect(await backend.getUsed("s1")).toEqual(new Set([1]));
      expect(await backend.getUsed("s2")).toEqual(new Set([2]));
    });

    it("clears a session and lets it grow again", async () => {
      const backend = makeBackend();
      await backend.addUsed("s1", 1);
      await backend.clearUsed("s1");
      expect(await backend.getUsed("s1")).toEqual(new Set());

      await backend.addUsed("s1", 2);
      expect(await backend.getUsed("s1")).toEqual(new Set([2]));
    });

    it("clears unknown sessions without error", async () => {
      const backend = makeBackend();
      await expect(backend.clearUsed("ghost")).resolves.toBeUndefined();
      await backend.clearUsed("ghost");
      expect(await backend.getUsed("ghost")).toEqual(new Set());
    });

    it("hands out snapshots, not live views", async () => {
      const backend = makeBackend();
      await backend.addUsed("s1", 1);
      const snapshot = await backend.getUsed("s1");
      snapshot.add(99);
      expect(await backend.getUsed("s1")).toEqual(new Set([1]));
    });
  });
}
