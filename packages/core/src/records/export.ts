import { writeFile } from "fs/promises";
import { stringify } from "csv-stringify/sync";
import { formatCalendarDate } from "./dates";
import type { BookRecord } from "./types";

export const AUDIT_COLUMNS = [
  "isbn",
  "title",
  "authors",
  "publishers",
  "publish_date",
  "number_of_pages",
  "goodreads_ids",
  "last_modified",
  "description",
  "first_sentence",
] as const;

export type AuditColumn = (typeof AUDIT_COLUMNS)[number];

export type AuditRow = Record<AuditColumn, string>;

export function toAuditRow(record: BookRecord): AuditRow {
  return {
    isbn: record.isbn,
    title: record.title ?? "",
    authors: JSON.stringify(record.authors),
    publishers: JSON.stringify(record.publishers),
    publish_date: record.publishDate ? formatCalendarDate(record.publishDate) : "",
    number_of_pages:
      record.numberOfPages === undefined ? "" : String(record.numberOfPages),
    goodreads_ids: JSON.stringify(record.goodreadsIds),
    last_modified: record.lastModified ? record.lastModified.toISOString() : "",
    description: record.description,
    first_sentence: record.firstSentence,
  };
}

export function toAuditRows(records: readonly BookRecord[]): AuditRow[] {
  return records.map(toAuditRow);
}

export function formatAuditCsv(records: readonly BookRecord[]): string {
  return stringify(toAuditRows(records), {
    header: true,
    columns: [...AUDIT_COLUMNS],
  });
}

export async function writeAuditCsv(
  filePath: string,
  records: readonly BookRecord[]
): Promise<void> {
  await writeFile(filePath, formatAuditCsv(records), "utf8");
}
