import type { BookRecord, RecordTable } from "./types";

export type RecordSet = {
  table: RecordTable;
  /** Every normalized record in input order, duplicates included. */
  audit: readonly BookRecord[];
};

export function buildRecordSet(records: readonly BookRecord[]): RecordSet {
  return {
    table: buildRecordTable(records),
    audit: [...records],
  };
}

/** Keeps the first record per ISBN; later duplicates are dropped. */
export function buildRecordTable(records: readonly BookRecord[]): RecordTable {
  const seen = new Set<string>();
  const rows: BookRecord[] = [];
  for (const record of records) {
    if (seen.has(record.isbn)) continue;
    seen.add(record.isbn);
    rows.push(record);
  }
  return { rows };
}
