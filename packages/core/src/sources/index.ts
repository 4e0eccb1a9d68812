import type { PayloadCache } from "../cache";
import type { Logger } from "../logging";
import type { PayloadEntry, RawBookPayload } from "../records/types";
import type { PayloadSource } from "./types";

export type CollectOptions = {
  cache: PayloadCache;
  source: PayloadSource;
  logger?: Logger;
  /** Serve from the cache only; misses become `null` and are not stored. */
  offline?: boolean;
};

export type CollectStats = {
  cacheHits: number;
  fetched: number;
  empty: number;
};

export type CollectResult = {
  entries: PayloadEntry[];
  stats: CollectStats;
};

/** Cache-aside lookup for every ISBN, sequentially and in input order. */
export async function collectPayloads(
  isbns: readonly string[],
  options: CollectOptions
): Promise<CollectResult> {
  const stats: CollectStats = { cacheHits: 0, fetched: 0, empty: 0 };
  const entries: PayloadEntry[] = [];

  for (const isbn of isbns) {
    const cached = options.cache.get(isbn);
    let payload: RawBookPayload | null;
    if (cached) {
      stats.cacheHits += 1;
      options.logger?.debug(`cache hit for ${isbn}`);
      payload = cached.payload;
    } else if (options.offline) {
      options.logger?.debug(`offline, skipping ${isbn}`);
      payload = null;
    } else {
      payload = await options.source.fetchPayload(isbn);
      options.cache.put(isbn, payload);
      stats.fetched += 1;
    }
    if (payload === null) stats.empty += 1;
    entries.push({ isbn, payload });
  }

  return { entries, stats };
}

export * from "./openlibrary";
export * from "./types";
