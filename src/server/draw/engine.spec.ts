import { describe, it, expect, vi } from "vitest";
import { Deck } from "@server/deck/deck";
import type { Card } from "@server/deck/types";
import { MemoryUsedSetBackend } from "@server/sessions/memory";
import { DrawEngine } from "./engine";
import type { RandomSource } from "./random";

function card(index: number, name: string): Card {
  return {
    index,
    name,
    chineseName: `${name}-zh`,
    japaneseName: `${name}-ja`,
    upright: `${name} upright`,
    reversed: `${name} reversed`,
  };
}

function deckOf(size: number): Deck {
  return Deck.fromCards(
    Array.from({ length: size }, (_, i) => card(i, `Card ${i}`)),
  );
}

const ABC = Deck.fromCards([card(0, "A"), card(1, "B"), card(2, "C")]);

/** Replays `values` (mod the requested bound) in a loop. */
function scripted(values: number[]): RandomSource {
  let i = 0;
  return {
    int: (maxExclusive) => values[i++ % values.length] % maxExclusive,
  };
}

class FlakyBackend extends MemoryUsedSetBackend {
  adds = 0;

  constructor(private readonly failOnAdd: number) {
    super();
  }

  override async addUsed(sessionId: string, index: number): Promise<void> {
    this.adds++;
    if (this.adds === this.failOnAdd) throw new Error("store offline");
    await super.addUsed(sessionId, index);
  }
}

describe("DrawEngine.draw", () => {
  it("draws the whole deck, then refuses, then works again after reset", async () => {
    const backend = new MemoryUsedSetBackend();
    const engine = new DrawEngine(ABC, backend);

    const all = await engine.draw("s1", 3, true);
    expect(all.ok).toBe(true);
    if (!all.ok) throw new Error("expected success");
    expect(all.cards.map((c) => c.index).sort((a, b) => a - b)).toEqual([
      0, 1, 2,
    ]);

    const none = await engine.draw("s1", 1, false);
    expect(none.ok).toBe(false);
    if (!none.ok) {
      expect(none.error.code).toBe("INSUFFICIENT_CARDS");
      expect(none.status).toBe(409);
    }

    const cleared = await engine.reset("s1");
    expect(cleared).toEqual({ ok: true, sessionId: "s1" });

    const again = await engine.draw("s1", 1, false);
    expect(again.ok).toBe(true);
    if (again.ok) {
      expect([0, 1, 2]).toContain(again.cards[0].index);
    }
  });

  it("never repeats an index within a session until exhausted", async () => {
    const engine = new DrawEngine(deckOf(22), new MemoryUsedSetBackend());
    const seen: number[] = [];

    for (let i = 0; i < 7; i++) {
      const result = await engine.draw("s1", 3, false);
      if (!result.ok) throw new Error(result.error.message);
      seen.push(...result.cards.map((c) => c.index));
    }
    const last = await engine.draw("s1", 1, false);
    if (!last.ok) throw new Error(last.error.message);
    seen.push(last.cards[0].index);

    expect(new Set(seen).size).toBe(22);
  });

  it("keeps sessions independent", async () => {
    const engine = new DrawEngine(ABC, new MemoryUsedSetBackend());
    await engine.draw("s1", 3, false);
    const other = await engine.draw("s2", 3, false);
    expect(other.ok).toBe(true);
  });

  it("follows random picks in order and records them in pick order", async () => {
    const backend = new MemoryUsedSetBackend();
    const addUsed = vi.spyOn(backend, "addUsed");
    // picks: 2 of [0,1,2], 0 of [0,1], 0 of [1]; then orientations 1,0,1
    const engine = new DrawEngine(ABC, backend, {
      random: scripted([2, 0, 1, 1, 0, 1]),
    });

    const result = await engine.draw("s1", 3, false);

    expect(result).toEqual({
      ok: true,
      sessionId: "s1",
      reset: false,
      cards: [
        {
          index: 2,
          name: "C",
          chineseName: "C-zh",
          japaneseName: "C-ja",
          orientation: "reversed",
          meaning: "C reversed",
        },
        {
          index: 0,
          name: "A",
          chineseName: "A-zh",
          japaneseName: "A-ja",
          orientation: "upright",
          meaning: "A upright",
        },
        {
          index: 1,
          name: "B",
          chineseName: "B-zh",
          japaneseName: "B-ja",
          orientation: "reversed",
          meaning: "B reversed",
        },
      ],
    });
    expect(addUsed.mock.calls).toEqual([
      ["s1", 2],
      ["s1", 0],
      ["s1", 1],
    ]);
  });

  it("leaves role labelling to the caller", async () => {
    const engine = new DrawEngine(ABC, new MemoryUsedSetBackend());
    const result = await engine.draw("s1", 3, true);
    if (!result.ok) throw new Error(result.error.message);
    for (const drawn of result.cards) {
      expect(drawn).not.toHaveProperty("role");
    }
  });

  it("resets an exhausted session when allowed", async () => {
    const deck = deckOf(5);
    const backend = new MemoryUsedSetBackend();
    const engine = new DrawEngine(deck, backend);

    for (let i = 0; i < 5; i++) {
      const result = await engine.draw("s1", 1, false);
      expect(result.ok).toBe(true);
    }

    const sixth = await engine.draw("s1", 1, true);
    expect(sixth.ok).toBe(true);
    if (sixth.ok) {
      expect(sixth.reset).toBe(true);
      expect(sixth.cards[0].index).toBeGreaterThanOrEqual(0);
      expect(sixth.cards[0].index).toBeLessThan(5);
      expect(await backend.getUsed("s1")).toEqual(
        new Set([sixth.cards[0].index]),
      );
    }
  });

  it("fails without side effects when exhausted and reset is not allowed", async () => {
    const backend = new MemoryUsedSetBackend();
    const engine = new DrawEngine(deckOf(5), backend);
    for (let i = 0; i < 5; i++) await engine.draw("s1", 1, false);

    const clearUsed = vi.spyOn(backend, "clearUsed");
    const addUsed = vi.spyOn(backend, "addUsed");
    const sixth = await engine.draw("s1", 1, false);

    expect(sixth).toEqual({
      ok: false,
      status: 409,
      error: {
        code: "INSUFFICIENT_CARDS",
        message: "Not enough distinct cards remaining for session",
      },
    });
    expect((await backend.getUsed("s1")).size).toBe(5);
    expect(clearUsed).not.toHaveBeenCalled();
    expect(addUsed).not.toHaveBeenCalled();
  });

  it("does a full reset when some but not enough cards remain", async () => {
    const backend = new MemoryUsedSetBackend();
    const engine = new DrawEngine(ABC, backend, { random: scripted([0]) });

    const first = await engine.draw("s1", 2, false);
    if (!first.ok) throw new Error(first.error.message);
    expect(first.cards.map((c) => c.index)).toEqual([0, 1]);

    // only index 2 is left, so the session starts over from the full deck
    const second = await engine.draw("s1", 2, true);
    if (!second.ok) throw new Error(second.error.message);
    expect(second.reset).toBe(true);
    expect(second.cards.map((c) => c.index)).toEqual([0, 1]);
    expect(await backend.getUsed("s1")).toEqual(new Set([0, 1]));
  });

  it("fails with NO_DECK_LOADED on an empty deck, even with reset allowed", async () => {
    const backend = new MemoryUsedSetBackend();
    const getUsed = vi.spyOn(backend, "getUsed");
    const engine = new DrawEngine(Deck.empty(), backend);

    for (const resetIfExhausted of [true, false]) {
      const result = await engine.draw("s1", 1, resetIfExhausted);
      expect(result).toEqual({
        ok: false,
        status: 503,
        error: { code: "NO_DECK_LOADED", message: "No tarot card data loaded" },
      });
    }
    expect(getUsed).not.toHaveBeenCalled();
  });

  it("refuses counts larger than the deck without touching the session", async () => {
    const backend = new MemoryUsedSetBackend();
    await backend.addUsed("s1", 0);
    const engine = new DrawEngine(ABC, backend);

    const result = await engine.draw("s1", 4, true);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("INSUFFICIENT_CARDS");
    expect(await backend.getUsed("s1")).toEqual(new Set([0]));
  });

  it("rejects a non-positive count", async () => {
    const engine = new DrawEngine(ABC, new MemoryUsedSetBackend());
    await expect(engine.draw("s1", 0, true)).rejects.toThrow(RangeError);
    await expect(engine.draw("s1", 1.5, true)).rejects.toThrow(RangeError);
  });

  it("reports store failures and keeps picks already recorded", async () => {
    const backend = new FlakyBackend(2);
    const engine = new DrawEngine(ABC, backend, { random: scripted([0]) });

    const result = await engine.draw("s1", 3, false);

    expect(result).toEqual({
      ok: false,
      status: 503,
      error: { code: "BACKEND_UNAVAILABLE", message: "store offline" },
    });
    expect(await backend.getUsed("s1")).toEqual(new Set([0]));
  });

  it("serializes concurrent draws for the same session", async () => {
    const backend = new MemoryUsedSetBackend();
    const engine = new DrawEngine(ABC, backend);

    const [a, b] = await Promise.all([
      engine.draw("s1", 2, false),
      engine.draw("s1", 1, false),
    ]);
    if (!a.ok || !b.ok) throw new Error("expected both draws to succeed");

    const indices = [...a.cards, ...b.cards]
      .map((c) => c.index)
      .sort((x, y) => x - y);
    expect(indices).toEqual([0, 1, 2]);
  });

  it("picks indices and orientations uniformly", async () => {
    const deckSize = 4;
    const draws = 8000;
    const engine = new DrawEngine(deckOf(deckSize), new MemoryUsedSetBackend());
    const counts = new Array<number>(deckSize).fill(0);
    let upright = 0;

    // a fresh session each time, so every pick is from the full deck
    for (let i = 0; i < draws; i++) {
      const result = await engine.draw(`stats-${i}`, 1, false);
      if (!result.ok) throw new Error(result.error.message);
      counts[result.cards[0].index]++;
      if (result.cards[0].orientation === "upright") upright++;
    }

    const expected = draws / deckSize;
    for (const count of counts) {
      expect(Math.abs(count - expected)).toBeLessThan(200);
    }
    expect(Math.abs(upright - draws / 2)).toBeLessThan(250);
  });
});

describe("DrawEngine.reset", () => {
  it("leaves an empty used-set whether or not the session had history", async () => {
    const backend = new MemoryUsedSetBackend();
    const engine = new DrawEngine(ABC, backend);
    await engine.draw("busy", 2, false);

    expect(await engine.reset("fresh")).toEqual({ ok: true, sessionId: "fresh" });
    expect(await engine.reset("busy")).toEqual({ ok: true, sessionId: "busy" });
    expect(await backend.getUsed("fresh")).toEqual(new Set());
    expect(await backend.getUsed("busy")).toEqual(new Set());
  });

  it("reports store failures", async () => {
    const backend = new MemoryUsedSetBackend();
    vi.spyOn(backend, "clearUsed").mockRejectedValue(new Error("timeout"));
    const engine = new DrawEngine(ABC, backend);

    expect(await engine.reset("s1")).toEqual({
      ok: false,
      status: 503,
      error: { code: "BACKEND_UNAVAILABLE", message: "timeout" },
    });
  });
});
