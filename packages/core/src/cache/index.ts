import { eq } from "drizzle-orm";
import type { BookstatsDb } from "../db";
import { payloadCache } from "../db/schema";
import { isRawBookPayload } from "../records/normalize";
import type { RawBookPayload } from "../records/types";

export type CachedPayload = {
  isbn: string;
  payload: RawBookPayload | null;
  fetchedAt: Date;
};

/**
 * ISBN-keyed store of raw payloads. `get` returns undefined only when the
 * ISBN has never been looked up; a stored `null` payload is still a hit.
 */
export type PayloadCache = {
  get: (isbn: string) => CachedPayload | undefined;
  put: (isbn: string, payload: RawBookPayload | null) => void;
  size: () => number;
  entries: () => CachedPayload[];
};

export class MemoryPayloadCache implements PayloadCache {
  private readonly store = new Map<string, CachedPayload>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  get(isbn: string): CachedPayload | undefined {
    return this.store.get(isbn);
  }

  put(isbn: string, payload: RawBookPayload | null): void {
    this.store.set(isbn, { isbn, payload, fetchedAt: this.now() });
  }

  size(): number {
    return this.store.size;
  }

  entries(): CachedPayload[] {
    return Array.from(this.store.values());
  }
}

type SqlitePayloadCacheOptions = {
  /** Entries older than this are treated as never fetched. */
  maxAgeMs?: number;
  now?: () => Date;
};

export class SqlitePayloadCache implements PayloadCache {
  private readonly maxAgeMs: number | undefined;
  private readonly now: () => Date;

  constructor(
    private readonly db: BookstatsDb,
    options: SqlitePayloadCacheOptions = {}
  ) {
    this.maxAgeMs = options.maxAgeMs;
    this.now = options.now ?? (() => new Date());
  }

  get(isbn: string): CachedPayload | undefined {
    const row = this.db
      .select()
      .from(payloadCache)
      .where(eq(payloadCache.isbn, isbn))
      .get();
    if (!row || this.isExpired(row.fetchedAt)) return undefined;
    return toCachedPayload(row);
  }

  put(isbn: string, payload: RawBookPayload | null): void {
    const payloadJson = payload === null ? null : JSON.stringify(payload);
    const fetchedAt = this.now();
    this.db
      .insert(payloadCache)
      .values({ isbn, payloadJson, fetchedAt })
      .onConflictDoUpdate({
        target: payloadCache.isbn,
        set: { payloadJson, fetchedAt },
      })
      .run();
  }

  size(): number {
    return this.entries().length;
  }

  entries(): CachedPayload[] {
    return this.db
      .select()
      .from(payloadCache)
      .all()
      .filter((row) => !this.isExpired(row.fetchedAt))
      .map(toCachedPayload)
      .filter((entry): entry is CachedPayload => Boolean(entry));
  }

  private isExpired(fetchedAt: Date): boolean {
    if (this.maxAgeMs === undefined) return false;
    return this.now().getTime() - fetchedAt.getTime() > this.maxAgeMs;
  }
}

function toCachedPayload(
  row: typeof payloadCache.$inferSelect
): CachedPayload | undefined {
  if (row.payloadJson === null) {
    return { isbn: row.isbn, payload: null, fetchedAt: row.fetchedAt };
  }
  const payload = parsePayloadJson(row.payloadJson);
  // Unreadable rows count as misses so the next run fetches them again.
  if (payload === undefined) return undefined;
  return { isbn: row.isbn, payload, fetchedAt: row.fetchedAt };
}

export function parsePayloadJson(text: string): RawBookPayload | null | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return undefined;
  }
  if (parsed === null) return null;
  return isRawBookPayload(parsed) ? parsed : undefined;
}
