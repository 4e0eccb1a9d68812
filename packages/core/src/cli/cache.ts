import path from "path";
import { SqlitePayloadCache } from "../cache";
import { getArgValue } from "../config";
import { createDb } from "../db";
import { normalizeRecord } from "../records/normalize";

const args = process.argv.slice(2);
const dbPathArg = getArgValue(args, "--db");
const dbPath = dbPathArg ? path.resolve(dbPathArg) : path.resolve("bookstats.db");

const handle = await createDb(dbPath);
const entries = new SqlitePayloadCache(handle.db).entries();
handle.close();

if (!entries.length) {
  process.stdout.write("No cached payloads.\n");
  process.exit(0);
}

let empty = 0;
for (const entry of entries) {
  const record = normalizeRecord(entry.isbn, entry.payload);
  if (!entry.payload) empty += 1;
  const title = entry.payload ? record.title ?? "Untitled" : "(no data)";
  const authors = record.authors.length ? record.authors.join(", ") : "Unknown";
  process.stdout.write(`${entry.isbn}  ${title} — ${authors}\n`);
}

process.stdout.write(`${entries.length} cached, ${empty} without data.\n`);
