import { SqlitePayloadCache, type PayloadCache } from "./cache";
import { STDOUT_PATH, type BookstatsConfig } from "./config";
import { createDb, type DbHandle } from "./db";
import { findInvalidIsbns, readIsbnList } from "./isbns";
import { createLogger, type Logger } from "./logging";
import { writeAuditCsv } from "./records/export";
import { normalizeRecord } from "./records/normalize";
import { buildRecordSet } from "./records/table";
import type { BookRecord, PayloadEntry, RecordTable } from "./records/types";
import { renderAnswers, writeReport } from "./report/format";
import {
  collectPayloads,
  OpenLibraryClient,
  type CollectResult,
  type CollectStats,
  type PayloadSource,
} from "./sources";
import { computeAnswers } from "./stats";
import type { AnswerSet } from "./stats/types";

export type Analysis = {
  /** Pre-dedup records, one per input entry. */
  records: readonly BookRecord[];
  table: RecordTable;
  answers: AnswerSet;
};

export function analyzePayloads(entries: readonly PayloadEntry[]): Analysis {
  const { table, audit } = buildRecordSet(
    entries.map((entry) => normalizeRecord(entry.isbn, entry.payload))
  );
  return { records: audit, table, answers: computeAnswers(table) };
}

export type RunDependencies = {
  cache?: PayloadCache;
  source?: PayloadSource;
  logger?: Logger;
  /** Receives the rendered report when the output path is "-". */
  stdout?: (text: string) => void;
};

export type RunSummary = {
  answers: AnswerSet;
  isbnCount: number;
  uniqueCount: number;
  collect: CollectStats;
};

export async function runBookstats(
  config: BookstatsConfig,
  deps: RunDependencies = {}
): Promise<RunSummary> {
  const logger = deps.logger ?? createLogger("bookstats", config.logLevel);

  const isbns = await readIsbnList(config.isbnFile);
  logger.info(`loaded ${isbns.length} ISBNs from ${config.isbnFile}`);
  for (const isbn of findInvalidIsbns(isbns)) {
    logger.warn(`ISBN checksum mismatch: ${isbn}`);
  }

  let handle: DbHandle | undefined;
  let cache = deps.cache;
  if (!cache) {
    handle = await createDb(config.dbPath);
    cache = new SqlitePayloadCache(handle.db, { maxAgeMs: config.cacheMaxAgeMs });
  }
  const source =
    deps.source ??
    new OpenLibraryClient({
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
      minIntervalMs: config.requestIntervalMs,
      logger: logger.child("openlibrary"),
    });

  let collected: CollectResult;
  try {
    collected = await collectPayloads(isbns, {
      cache,
      source,
      logger: logger.child("cache"),
      offline: config.offline,
    });
    await handle?.save();
  } finally {
    handle?.close();
  }
  const { entries, stats } = collected;
  logger.info(
    `payloads ready: hits=${stats.cacheHits} fetched=${stats.fetched} empty=${stats.empty}`
  );

  const { records, table, answers } = analyzePayloads(entries);
  await writeAuditCsv(config.exportPath, records);
  logger.info(`wrote ${records.length} rows to ${config.exportPath}`);

  if (config.outputPath === STDOUT_PATH) {
    const stdout = deps.stdout ?? writeStdout;
    stdout(renderAnswers(answers, config.format));
  } else {
    await writeReport(config.outputPath, answers, config.format);
    logger.info(`wrote answers to ${config.outputPath}`);
  }

  return {
    answers,
    isbnCount: isbns.length,
    uniqueCount: table.rows.length,
    collect: stats,
  };
}

function writeStdout(text: string): void {
  process.stdout.write(text);
}

/** One-line description of a failed run, for the CLI's stderr. */
export function describeFailure(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return `bookstats failed: ${message.split("\n")[0]}`;
}
