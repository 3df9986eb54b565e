import type { SpreadId } from "@lib/common/enums";
import type { WireCard } from "@lib/contracts/http/draw";
import type { DrawEngine, DrawFailure, DrawnCard } from "@server/draw/engine";
import { SPREADS, assignRoles } from "@server/draw/spreads";

export type ReadingResult =
  | { ok: true; sessionId: string; cards: WireCard[] }
  | DrawFailure;

export function toWireCard(card: DrawnCard): WireCard {
  return {
    index: card.index,
    card: card.name,
    chinese_name: card.chineseName,
    japanese_name: card.japaneseName,
    orientation: card.orientation,
    meaning: card.meaning,
  };
}

/**
 * Draws a spread for a session and shapes it for the wire. Role labels are
 * attached here, after the engine has finished.
 */
export async function drawReading(
  engine: DrawEngine,
  args: { sessionId: string; spread: SpreadId; resetIfExhausted: boolean },
): Promise<ReadingResult> {
  const spread = SPREADS[args.spread];
  const result = await engine.draw(
    args.sessionId,
    spread.count,
    args.resetIfExhausted,
  );
  if (!result.ok) return result;

  const cards = result.cards.map(toWireCard);
  return {
    ok: true,
    sessionId: result.sessionId,
    cards: spread.roles.length ? assignRoles(cards, spread.roles) : cards,
  };
}
