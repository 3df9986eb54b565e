import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { Deck } from "@server/deck/deck";
import type { Logger } from "@server/logger";

const CsvRows = z.array(z.record(z.string()));

export class DeckLoadError extends Error {
  constructor(
    readonly source: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to load deck from ${source}: ${message}`, options);
    this.name = "DeckLoadError";
  }
}

/**
 * Parses header-first CSV into a Deck. Rows without a usable integer index
 * are skipped; malformed CSV throws DeckLoadError.
 */
export function parseDeckCsv(input: string, source = "<inline>"): Deck {
  let records: unknown;
  try {
    records = parse(input, {
      columns: true,
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (err: unknown) {
    throw new DeckLoadError(
      source,
      err instanceof Error ? err.message : String(err),
      { cause: err },
    );
  }

  const rows = CsvRows.safeParse(records);
  if (!rows.success) {
    throw new DeckLoadError(source, rows.error.message);
  }
  return Deck.fromRows(rows.data);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export type LoadedDeck = { deck: Deck; source?: string };

/**
 * Loads the first candidate file that exists and parses. With no usable
 * candidate the deck is empty and the caller keeps running.
 */
export async function loadDeckFromCandidates(
  candidates: readonly string[],
  logger: Logger,
  cwd: string = process.cwd(),
): Promise<LoadedDeck> {
  for (const candidate of candidates) {
    const file = path.resolve(cwd, candidate);
    let contents: string;
    try {
      contents = await readFile(file, "utf8");
    } catch (err: unknown) {
      if (!isMissingFile(err)) {
        logger.warn({ err, file }, "Deck file unreadable, trying next");
      }
      continue;
    }

    try {
      const deck = parseDeckCsv(contents, file);
      logger.info({ file, cards: deck.size }, "Loaded tarot deck");
      return { deck, source: file };
    } catch (err: unknown) {
      logger.warn({ err, file }, "Deck file invalid, trying next");
    }
  }

  logger.warn(
    { candidates },
    "No tarot deck found; serving without cards until a deck file is added",
  );
  return { deck: Deck.empty() };
}
