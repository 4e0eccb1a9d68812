import { MONTH_NAMES } from "../records/dates";
import type { BookRecord, RecordTable } from "../records/types";
import type {
  LatestPublication,
  LongestWords,
  MonthCount,
  PairCount,
  PublisherAuthorPair,
  PublisherCount,
  TitleCount,
} from "./types";

// Ties on a top count resolve to the smallest key so results never depend
// on row order.

export function countDistinctTitles(table: RecordTable): number {
  const titles = new Set<string>();
  for (const row of table.rows) {
    if (row.title !== undefined) titles.add(row.title);
  }
  return titles.size;
}

export function titleWithMostIsbns(table: RecordTable): TitleCount {
  const counts = new Map<string, number>();
  for (const row of table.rows) {
    if (row.title === undefined) continue;
    increment(counts, row.title);
  }
  const top = pickTop(counts, compareStrings);
  return top ? { title: top.key, count: top.count } : { count: 0 };
}

export function countWithoutGoodreads(table: RecordTable): number {
  return table.rows.filter((row) => row.goodreadsIds.length === 0).length;
}

export function countMultiAuthor(table: RecordTable): number {
  return table.rows.filter((row) => row.authors.length > 1).length;
}

export function booksPerPublisher(table: RecordTable): PublisherCount[] {
  const counts = new Map<string, number>();
  for (const row of table.rows) {
    for (const publisher of row.publishers) increment(counts, publisher);
  }
  return [...counts]
    .map(([publisher, count]) => ({ publisher, count }))
    .sort((a, b) => b.count - a.count || compareStrings(a.publisher, b.publisher));
}

export function medianPageCount(table: RecordTable): number | undefined {
  const pages = table.rows
    .map((row) => row.numberOfPages)
    .filter((value): value is number => value !== undefined)
    .sort((a, b) => a - b);
  if (!pages.length) return undefined;

  const middle = Math.floor(pages.length / 2);
  if (pages.length % 2 === 1) return pages[middle];
  return (pages[middle - 1] + pages[middle]) / 2;
}

export function busiestPublicationMonth(table: RecordTable): MonthCount {
  const counts = new Map<number, number>();
  for (const row of table.rows) {
    if (row.publishDate) increment(counts, row.publishDate.getUTCMonth());
  }
  const top = pickTop(counts, (a, b) => a - b);
  if (!top) return { count: 0 };
  return { month: MONTH_NAMES[top.key], count: top.count };
}

/**
 * Lower-cases, turns hyphens into spaces and drops every character that is
 * neither a word character nor whitespace.
 */
export function stripText(text: string): string {
  return text
    .toLowerCase()
    .replace(/-/g, " ")
    .replace(/[^\p{L}\p{M}\p{N}_\s]/gu, "");
}

export function longestWords(table: RecordTable): LongestWords {
  const texts = table.rows.map((row) =>
    stripText(`${row.description} ${row.firstSentence}`)
  );

  const tokens = new Set<string>();
  for (const text of texts) {
    for (const token of text.split(/\s+/)) {
      if (token) tokens.add(token);
    }
  }

  let length = 0;
  for (const token of tokens) length = Math.max(length, characterLength(token));
  const words = [...tokens].filter((token) => characterLength(token) === length);
  if (!words.length) return { length, words, titles: [] };

  const titles = new Set<string>();
  table.rows.forEach((row, index) => {
    if (row.title === undefined) return;
    if (words.some((word) => texts[index].includes(word))) titles.add(row.title);
  });

  return { length, words, titles: [...titles] };
}

export function mostRecentPublication(table: RecordTable): LatestPublication {
  let latest: BookRecord | undefined;
  for (const row of table.rows) {
    if (!row.publishDate) continue;
    if (!latest?.publishDate || row.publishDate > latest.publishDate) latest = row;
  }
  if (!latest) return {};
  return { title: latest.title, date: latest.publishDate };
}

export function mostUpdatedYear(table: RecordTable): number | undefined {
  const counts = new Map<number, number>();
  for (const row of table.rows) {
    if (row.lastModified) increment(counts, row.lastModified.getUTCFullYear());
  }
  return pickTop(counts, (a, b) => a - b)?.key;
}

/**
 * The top author is the one credited on the most distinct titles; their
 * rows are ordered by publication date (undated last) and the second one's
 * title is returned.
 */
export function secondBookOfTopAuthor(table: RecordTable): string | undefined {
  const titlesByAuthor = new Map<string, Set<string>>();
  for (const row of table.rows) {
    for (const author of row.authors) {
      const titles = titlesByAuthor.get(author) ?? new Set<string>();
      if (row.title !== undefined) titles.add(row.title);
      titlesByAuthor.set(author, titles);
    }
  }

  const counts = new Map<string, number>();
  for (const [author, titles] of titlesByAuthor) counts.set(author, titles.size);
  const top = pickTop(counts, compareStrings);
  if (!top) return undefined;

  const books = table.rows
    .filter((row) => row.authors.includes(top.key))
    .sort(comparePublishDate);
  return books.length > 1 ? books[1].title : undefined;
}

export function topPublisherAuthorPair(table: RecordTable): PairCount {
  const counts = new Map<string, { pair: PublisherAuthorPair; count: number }>();
  for (const row of table.rows) {
    for (const publisher of row.publishers) {
      for (const author of row.authors) {
        const key = JSON.stringify([publisher, author]);
        const entry = counts.get(key);
        if (entry) entry.count += 1;
        else counts.set(key, { pair: { publisher, author }, count: 1 });
      }
    }
  }

  let top: PairCount = { count: 0 };
  for (const { pair, count } of counts.values()) {
    if (
      !top.pair ||
      count > top.count ||
      (count === top.count && comparePairs(pair, top.pair) < 0)
    ) {
      top = { pair, count };
    }
  }
  return top;
}

function increment<K>(counts: Map<K, number>, key: K): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

function pickTop<K>(
  counts: Map<K, number>,
  compare: (a: K, b: K) => number
): { key: K; count: number } | undefined {
  let top: { key: K; count: number } | undefined;
  for (const [key, count] of counts) {
    if (!top || count > top.count || (count === top.count && compare(key, top.key) < 0)) {
      top = { key, count };
    }
  }
  return top;
}

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function comparePairs(a: PublisherAuthorPair, b: PublisherAuthorPair): number {
  return compareStrings(a.publisher, b.publisher) || compareStrings(a.author, b.author);
}

function comparePublishDate(a: BookRecord, b: BookRecord): number {
  if (!a.publishDate) return b.publishDate ? 1 : 0;
  if (!b.publishDate) return -1;
  return a.publishDate.getTime() - b.publishDate.getTime();
}

function characterLength(value: string): number {
  return [...value].length;
}
