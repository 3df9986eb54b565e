import type { Orientation } from "@lib/common/enums";
import { HTTP_STATUS_FOR } from "@lib/common/errors";
import type { Deck } from "@server/deck/deck";
import type { UsedSetBackend } from "@server/sessions/usedSet";
import { KeyedMutex } from "@server/sessions/lock";
import { cryptoRandom, type RandomSource } from "@server/draw/random";

export type DrawnCard = {
  index: number;
  name: string;
  chineseName: string;
  japaneseName: string;
  orientation: Orientation;
  meaning: string;
};

export type DrawSuccess = {
  ok: true;
  sessionId: string;
  cards: DrawnCard[];
  // true when the session's history was cleared to satisfy this draw
  reset: boolean;
};

export type DrawFailure = {
  ok: false;
  status: number;
  error: {
    code: "NO_DECK_LOADED" | "INSUFFICIENT_CARDS" | "BACKEND_UNAVAILABLE";
    message: string;
  };
};

export type DrawResult = DrawSuccess | DrawFailure;

export type BackendFailure = {
  ok: false;
  status: number;
  error: { code: "BACKEND_UNAVAILABLE"; message: string };
};

export type ResetResult = { ok: true; sessionId: string } | BackendFailure;

export type DrawEngineOptions = {
  random?: RandomSource;
};

function backendFailure(err: unknown): BackendFailure {
  return {
    ok: false,
    status: HTTP_STATUS_FOR.BACKEND_UNAVAILABLE,
    error: {
      code: "BACKEND_UNAVAILABLE",
      message: err instanceof Error ? err.message : "Session store failed",
    },
  };
}

/**
 * Hands out cards a session has not seen yet. Draws and resets for one
 * session id are serialized inside this process; a Redis-backed store shared
 * by several processes can still interleave two draws for the same session.
 */
export class DrawEngine {
  private readonly random: RandomSource;
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly deck: Deck,
    private readonly backend: UsedSetBackend,
    options: DrawEngineOptions = {},
  ) {
    this.random = options.random ?? cryptoRandom;
  }

  get deckSize(): number {
    return this.deck.size;
  }

  async draw(
    sessionId: string,
    count: number,
    resetIfExhausted: boolean,
  ): Promise<DrawResult> {
    if (!Number.isInteger(count) || count < 1) {
      throw new RangeError(`count must be a positive integer, got ${count}`);
    }
    if (this.deck.isEmpty()) {
      return {
        ok: false,
        status: HTTP_STATUS_FOR.NO_DECK_LOADED,
        error: { code: "NO_DECK_LOADED", message: "No tarot card data loaded" },
      };
    }
    if (count > this.deck.size) {
      return {
        ok: false,
        status: HTTP_STATUS_FOR.INSUFFICIENT_CARDS,
        error: {
          code: "INSUFFICIENT_CARDS",
          message: `Deck holds ${this.deck.size} cards, cannot draw ${count}`,
        },
      };
    }

    return this.locks.runExclusive(sessionId, async (): Promise<DrawResult> => {
      let picks: number[] = [];
      let reset = false;
      try {
        const all = this.deck.allIndices();
        const used = await this.backend.getUsed(sessionId);
        let remaining = all.filter((index) => !used.has(index));

        if (remaining.length < count) {
          if (!resetIfExhausted) {
            return {
              ok: false,
              status: HTTP_STATUS_FOR.INSUFFICIENT_CARDS,
              error: {
                code: "INSUFFICIENT_CARDS",
                message: "Not enough distinct cards remaining for session",
              },
            };
          }
          // no carry-over: the whole deck is back in play
          await this.backend.clearUsed(sessionId);
          remaining = all;
          reset = true;
        }

        picks = this.pick(remaining, count);
        for (const index of picks) {
          await this.backend.addUsed(sessionId, index);
        }
      } catch (err: unknown) {
        return backendFailure(err);
      }

      return {
        ok: true,
        sessionId,
        cards: picks.map((index) => this.reveal(index)),
        reset,
      };
    });
  }

  async reset(sessionId: string): Promise<ResetResult> {
    return this.locks.runExclusive(sessionId, async (): Promise<ResetResult> => {
      try {
        await this.backend.clearUsed(sessionId);
      } catch (err: unknown) {
        return backendFailure(err);
      }
      return { ok: true, sessionId };
    });
  }

  // Sequential sampling without replacement; consumes the pool.
  private pick(pool: number[], count: number): number[] {
    const picks: number[] = [];
    for (let i = 0; i < count; i++) {
      const [index] = pool.splice(this.random.int(pool.length), 1);
      picks.push(index);
    }
    return picks;
  }

  private reveal(index: number): DrawnCard {
    const card = this.deck.get(index);
    const orientation: Orientation =
      this.random.int(2) === 0 ? "upright" : "reversed";
    return {
      index,
      name: card?.name ?? "",
      chineseName: card?.chineseName ?? "",
      japaneseName: card?.japaneseName ?? "",
      orientation,
      meaning: (orientation === "upright" ? card?.upright : card?.reversed) ?? "",
    };
  }
}
