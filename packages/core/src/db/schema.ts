import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const payloadCache = sqliteTable("payload_cache", {
  isbn: text("isbn").primaryKey(),
  // NULL records a lookup that produced no data.
  payloadJson: text("payload_json"),
  fetchedAt: integer("fetched_at", { mode: "timestamp_ms" }).notNull(),
});
