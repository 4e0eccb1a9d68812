import { mkdir, readFile, writeFile } from "fs/promises";
import path from "path";
import initSqlJs, { type SqlJsStatic } from "sql.js";
import { drizzle, type SQLJsDatabase } from "drizzle-orm/sql-js";
import * as schema from "./schema";

export type BookstatsDb = SQLJsDatabase<typeof schema>;

/**
 * An open cache database. sql.js keeps the whole database in memory, so
 * changes reach the file only through `save`.
 */
export type DbHandle = {
  db: BookstatsDb;
  save: () => Promise<void>;
  close: () => void;
};

export const MEMORY_DB = ":memory:";

const bootstrapSql = `
  CREATE TABLE IF NOT EXISTS payload_cache (
    isbn TEXT PRIMARY KEY NOT NULL,
    payload_json TEXT,
    fetched_at INTEGER NOT NULL
  );
`;

let sqlJs: Promise<SqlJsStatic> | undefined;

function loadSqlJs(): Promise<SqlJsStatic> {
  sqlJs ??= initSqlJs();
  return sqlJs;
}

/** Opens (or creates) the cache database; pass ":memory:" for a throwaway one. */
export async function createDb(filePath: string): Promise<DbHandle> {
  const SQL = await loadSqlJs();
  const bytes = filePath === MEMORY_DB ? undefined : await readDbFile(filePath);
  const sqlite = new SQL.Database(bytes);
  sqlite.exec(bootstrapSql);

  return {
    db: drizzle(sqlite, { schema }),
    async save() {
      if (filePath === MEMORY_DB) return;
      await mkdir(path.dirname(filePath), { recursive: true });
      await writeFile(filePath, sqlite.export());
    },
    close() {
      sqlite.close();
    },
  };
}

async function readDbFile(filePath: string): Promise<Uint8Array | undefined> {
  try {
    return await readFile(filePath);
  } catch (error) {
    if (isMissingFile(error)) return undefined;
    throw error;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
