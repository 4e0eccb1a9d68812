/**
 * Source-shaped data for one identifier, as returned by the Open Library
 * `jscmd=data` endpoint merged with the edition details. Every field is
 * `unknown`-tolerant: the normalizer validates shapes rather than trusting them.
 */
export type RawBookPayload = {
  key?: unknown;
  title?: unknown;
  authors?: unknown;
  publishers?: unknown;
  publish_date?: unknown;
  number_of_pages?: unknown;
  identifiers?: unknown;
  last_modified?: unknown;
  description?: unknown;
  first_sentence?: unknown;
  excerpts?: unknown;
  [field: string]: unknown;
};

export type PayloadEntry = {
  isbn: string;
  payload: RawBookPayload | null;
};

export type BookRecord = {
  readonly isbn: string;
  readonly title?: string;
  readonly authors: readonly string[];
  readonly publishers: readonly string[];
  /** UTC midnight of the publication date. */
  readonly publishDate?: Date;
  readonly numberOfPages?: number;
  readonly goodreadsIds: readonly string[];
  readonly lastModified?: Date;
  readonly description: string;
  readonly firstSentence: string;
};

/** Deduplicated record set, one row per ISBN in first-seen order. */
export type RecordTable = {
  readonly rows: readonly BookRecord[];
};
