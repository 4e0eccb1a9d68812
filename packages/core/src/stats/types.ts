import type { MonthName } from "../records/dates";

export type TitleCount = {
  title?: string;
  count: number;
};

export type PublisherCount = {
  publisher: string;
  count: number;
};

export type MonthCount = {
  month?: MonthName;
  count: number;
};

export type LongestWords = {
  length: number;
  words: string[];
  titles: string[];
};

export type LatestPublication = {
  title?: string;
  date?: Date;
};

export type PublisherAuthorPair = {
  publisher: string;
  author: string;
};

export type PairCount = {
  pair?: PublisherAuthorPair;
  count: number;
};

/** Answers keyed by question number. */
export type AnswerSet = {
  1: number;
  2: TitleCount;
  3: number;
  4: number;
  /** Sorted by count descending, then publisher name. */
  5: PublisherCount[];
  6: number | undefined;
  7: MonthCount;
  8: LongestWords;
  9: LatestPublication;
  10: number | undefined;
  11: string | undefined;
  12: PairCount;
};
