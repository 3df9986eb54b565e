export interface Card {
  index: number;
  name: string;
  chineseName: string;
  japaneseName: string;
  upright: string;
  reversed: string;
}

/** One row of tabular card data, keyed by column header. */
export type RawCardRow = Readonly<Record<string, string | undefined>>;
