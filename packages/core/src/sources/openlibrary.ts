import { setTimeout as delay } from "timers/promises";
import { createLogger, type Logger } from "../logging";
import { isRawBookPayload } from "../records/normalize";
import type { RawBookPayload } from "../records/types";
import { SourceRequestError, type FetchLike, type PayloadSource } from "./types";

export const DEFAULT_OPEN_LIBRARY_URL = "https://openlibrary.org";
const DEFAULT_TIMEOUT_MS = 1500;
const DEFAULT_MIN_INTERVAL_MS = 100;

type OpenLibraryClientOptions = {
  baseUrl?: string;
  timeoutMs?: number;
  minIntervalMs?: number;
  fetcher?: FetchLike;
  logger?: Logger;
};

/**
 * Reads the `jscmd=data` view of an ISBN and, when it links to an edition
 * key, merges `last_modified`, `description` and `first_sentence` from the
 * edition record. Any failure yields `null`.
 */
export class OpenLibraryClient implements PayloadSource {
  readonly name = "openlibrary" as const;

  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly minIntervalMs: number;
  private readonly fetcher: FetchLike;
  private readonly logger: Logger;
  private lastRequestAt = 0;

  constructor(options: OpenLibraryClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_OPEN_LIBRARY_URL).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetcher = options.fetcher ?? fetch;
    this.minIntervalMs = options.minIntervalMs ?? DEFAULT_MIN_INTERVAL_MS;
    this.logger = options.logger ?? createLogger(this.name, "silent");
  }

  async fetchPayload(isbn: string): Promise<RawBookPayload | null> {
    try {
      return await this.fetchMerged(isbn);
    } catch (error) {
      this.logger.warn(`lookup failed for ${isbn}:`, describeError(error));
      return null;
    }
  }

  private async fetchMerged(isbn: string): Promise<RawBookPayload | null> {
    const bibkey = `ISBN:${isbn}`;
    const params = new URLSearchParams({ bibkeys: bibkey, format: "json", jscmd: "data" });
    const listing = await this.fetchJson(`${this.baseUrl}/api/books?${params.toString()}`);
    const data = isRawBookPayload(listing) ? listing[bibkey] : undefined;
    if (!isRawBookPayload(data)) {
      this.logger.debug(`no record for ${isbn}`);
      return null;
    }
    if (typeof data.key !== "string" || !data.key) return data;

    const details = await this.fetchJson(`${this.baseUrl}${toPath(data.key)}.json`);
    const edition: RawBookPayload = isRawBookPayload(details) ? details : {};
    return {
      ...data,
      last_modified: edition.last_modified ?? data.last_modified,
      description: edition.description ?? data.description,
      first_sentence: edition.first_sentence ?? data.first_sentence,
    };
  }

  private async fetchJson(url: string): Promise<unknown> {
    await this.throttle();
    const response = await this.fetcher(url, {
      headers: { Accept: "application/json" },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      throw new SourceRequestError(`HTTP ${response.status}`, url, response.status);
    }
    return response.json();
  }

  // Listing and edition requests share one budget.
  private async throttle(): Promise<void> {
    const waitMs = this.lastRequestAt + this.minIntervalMs - Date.now();
    if (waitMs > 0) await delay(waitMs);
    this.lastRequestAt = Date.now();
  }
}

function toPath(key: string): string {
  return key.startsWith("/") ? key : `/${key}`;
}

function describeError(error: unknown): string {
  if (error instanceof SourceRequestError) return `${error.message} (${error.url})`;
  if (error instanceof Error) return error.message;
  return String(error);
}
