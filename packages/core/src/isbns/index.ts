import { readFile } from "fs/promises";

/** One identifier per line; blank lines are skipped, order and repeats kept. */
export function parseIsbnList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
}

export async function readIsbnList(filePath: string): Promise<string[]> {
  return parseIsbnList(await readFile(filePath, "utf8"));
}

export function findInvalidIsbns(isbns: readonly string[]): string[] {
  return Array.from(new Set(isbns.filter((isbn) => !normalizeIsbn(isbn))));
}

/** Strips separators and returns the ISBN when its check digit holds. */
export function normalizeIsbn(value: string): string | undefined {
  const compact = value.replace(/[\s-]/g, "").toUpperCase();
  if (/^\d{9}[\dX]$/.test(compact) && isbn10Checksum(compact) % 11 === 0) return compact;
  if (/^\d{13}$/.test(compact) && isbn13Checksum(compact) % 10 === 0) return compact;
  return undefined;
}

// Weights run 10 down to 1; a trailing X stands for 10.
function isbn10Checksum(isbn: string): number {
  return [...isbn].reduce(
    (sum, char, index) => sum + (char === "X" ? 10 : Number(char)) * (10 - index),
    0
  );
}

// Weights alternate 1 and 3, check digit included.
function isbn13Checksum(isbn: string): number {
  return [...isbn].reduce(
    (sum, char, index) => sum + Number(char) * (index % 2 === 0 ? 1 : 3),
    0
  );
}
