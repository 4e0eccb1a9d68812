import assert from "node:assert/strict";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import test from "node:test";
import { parse } from "csv-parse/sync";
import { AUDIT_COLUMNS, formatAuditCsv, toAuditRow, writeAuditCsv } from "./export";
import { normalizeRecord } from "./normalize";

const full = normalizeRecord("0306406152", {
  title: "Night Trains, Vol. 1",
  authors: [{ name: "Ada Vance" }, { name: "Bo Lind" }],
  publishers: [{ name: "Harbor Press" }],
  publish_date: "March 3, 2011",
  number_of_pages: 312,
  identifiers: { goodreads: ["1234"] },
  last_modified: { value: "2019-07-01T10:00:00" },
  description: 'He said "go".',
});

test("flattens a record into audit cells", () => {
  assert.deepEqual(toAuditRow(full), {
    isbn: "0306406152",
    title: "Night Trains, Vol. 1",
    authors: '["Ada Vance","Bo Lind"]',
    publishers: '["Harbor Press"]',
    publish_date: "2011-03-03",
    number_of_pages: "312",
    goodreads_ids: '["1234"]',
    last_modified: "2019-07-01T10:00:00.000Z",
    description: 'He said "go".',
    first_sentence: "",
  });
});

test("absent values become empty cells", () => {
  const row = toAuditRow(normalizeRecord("111", null));
  assert.equal(row.title, "");
  assert.equal(row.publish_date, "");
  assert.equal(row.number_of_pages, "");
  assert.equal(row.last_modified, "");
  assert.equal(row.authors, "[]");
});

test("writes one CSV row per input record, duplicates included", async () => {
  const dir = await mkdtemp(path.join(tmpdir(), "bookstats-export-"));
  try {
    const filePath = path.join(dir, "books.csv");
    await writeAuditCsv(filePath, [full, normalizeRecord("111", null), full]);
    const rows: Array<Record<string, string>> = parse(await readFile(filePath, "utf8"), {
      columns: true,
    });
    assert.equal(rows.length, 3);
    assert.deepEqual(Object.keys(rows[0]), [...AUDIT_COLUMNS]);
    assert.equal(rows[0].title, "Night Trains, Vol. 1");
    assert.equal(rows[0].description, 'He said "go".');
    assert.equal(rows[1].isbn, "111");
    assert.equal(rows[2].isbn, "0306406152");
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("the CSV header lists the audit columns", () => {
  const [header] = formatAuditCsv([normalizeRecord("111", null)]).split("\n");
  assert.equal(header, AUDIT_COLUMNS.join(","));
});
