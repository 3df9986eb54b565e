import type { Card, RawCardRow } from "@server/deck/types";

const INTEGER = /^[+-]?\d+$/;

function field(row: RawCardRow, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = row[name];
    if (value !== undefined) return value;
  }
  return undefined;
}

function text(row: RawCardRow, ...names: string[]): string {
  return (field(row, ...names) ?? "").trim();
}

export function parseIndex(raw: string | undefined): number | undefined {
  const trimmed = raw?.trim() ?? "";
  if (!INTEGER.test(trimmed)) return undefined;
  const index = Number(trimmed);
  return Number.isSafeInteger(index) ? index : undefined;
}

/**
 * Maps a header-keyed row to a Card. Returns undefined when the row has no
 * usable integer index.
 */
export function rowToCard(row: RawCardRow): Card | undefined {
  const index = parseIndex(field(row, "Index", "Index "));
  if (index === undefined) return undefined;
  return {
    index,
    name: text(row, "Card"),
    chineseName: text(row, "Chinese Name", "ChineseName"),
    japaneseName: text(row, "Japanese Name", "JapaneseName"),
    upright: text(row, "Upright Meaning"),
    reversed: text(row, "Reversed Meaning"),
  };
}

/** Read-only card registry keyed by index. */
export class Deck {
  private readonly cards: ReadonlyMap<number, Card>;
  private readonly indices: readonly number[];

  private constructor(cards: Map<number, Card>) {
    this.cards = cards;
    this.indices = Array.from(cards.keys()).sort((a, b) => a - b);
  }

  static empty(): Deck {
    return new Deck(new Map());
  }

  // Later rows replace earlier rows that share an index.
  static fromCards(cards: Iterable<Card>): Deck {
    const byIndex = new Map<number, Card>();
    for (const card of cards) {
      byIndex.set(card.index, Object.freeze({ ...card }));
    }
    return new Deck(byIndex);
  }

  static fromRows(rows: Iterable<RawCardRow>): Deck {
    const cards: Card[] = [];
    for (const row of rows) {
      const card = rowToCard(row);
      if (card) cards.push(card);
    }
    return Deck.fromCards(cards);
  }

  get size(): number {
    return this.indices.length;
  }

  isEmpty(): boolean {
    return this.indices.length === 0;
  }

  get(index: number): Card | undefined {
    return this.cards.get(index);
  }

  /** All indices, ascending. Returns a fresh array. */
  allIndices(): number[] {
    return [...this.indices];
  }
}
