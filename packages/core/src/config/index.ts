import path from "path";
import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "../logging";
import type { ReportFormat } from "../report/format";
import { DEFAULT_OPEN_LIBRARY_URL } from "../sources/openlibrary";

/** Output path that means "write to stdout". */
export const STDOUT_PATH = "-";

export type BookstatsConfig = {
  isbnFile: string;
  dbPath: string;
  outputPath: string;
  exportPath: string;
  format: ReportFormat;
  baseUrl: string;
  timeoutMs: number;
  requestIntervalMs: number;
  cacheMaxAgeMs?: number;
  logLevel: LogLevel;
  offline: boolean;
};

export const DEFAULTS = {
  isbnFile: "books-isbns.txt",
  dbPath: "bookstats.db",
  outputPath: "answers.txt",
  exportPath: "books.csv",
  format: "text",
  baseUrl: DEFAULT_OPEN_LIBRARY_URL,
  timeoutMs: 1500,
  requestIntervalMs: 100,
  logLevel: "info",
} as const;

// Bad values fall back to defaults instead of failing the run.
const RawConfigSchema = z.object({
  isbnFile: z.string().min(1).catch(DEFAULTS.isbnFile),
  dbPath: z.string().min(1).catch(DEFAULTS.dbPath),
  outputPath: z.string().min(1).catch(DEFAULTS.outputPath),
  exportPath: z.string().min(1).catch(DEFAULTS.exportPath),
  format: z.enum(["text", "json"]).catch(DEFAULTS.format),
  baseUrl: z.string().url().catch(DEFAULTS.baseUrl),
  timeoutMs: z.coerce.number().int().positive().catch(DEFAULTS.timeoutMs),
  requestIntervalMs: z.coerce.number().int().nonnegative().catch(DEFAULTS.requestIntervalMs),
  cacheTtlDays: z.coerce.number().positive().optional().catch(undefined),
  logLevel: z.enum(LOG_LEVELS).catch(DEFAULTS.logLevel),
  offline: z.boolean().catch(false),
});

export type Env = Record<string, string | undefined>;

/** Flags win over `BOOKSTATS_*` environment variables, which win over defaults. */
export function resolveConfig(
  args: readonly string[],
  env: Env = {},
  cwd: string = process.cwd()
): BookstatsConfig {
  const raw = RawConfigSchema.parse({
    isbnFile: getArgValue(args, "--isbns") ?? env.BOOKSTATS_ISBNS,
    dbPath: getArgValue(args, "--db") ?? env.BOOKSTATS_DB,
    outputPath: getArgValue(args, "--out") ?? env.BOOKSTATS_OUT,
    exportPath: getArgValue(args, "--export") ?? env.BOOKSTATS_EXPORT,
    format: getArgValue(args, "--format") ?? env.BOOKSTATS_FORMAT,
    baseUrl: getArgValue(args, "--base-url") ?? env.BOOKSTATS_BASE_URL,
    timeoutMs: getArgValue(args, "--timeout") ?? env.BOOKSTATS_TIMEOUT_MS,
    requestIntervalMs: getArgValue(args, "--interval") ?? env.BOOKSTATS_INTERVAL_MS,
    cacheTtlDays: getArgValue(args, "--cache-ttl-days") ?? env.BOOKSTATS_CACHE_TTL_DAYS,
    logLevel: getArgValue(args, "--log-level") ?? env.BOOKSTATS_LOG_LEVEL,
    offline: args.includes("--offline") || isTruthy(env.BOOKSTATS_OFFLINE),
  });

  return {
    isbnFile: path.resolve(cwd, raw.isbnFile),
    dbPath: raw.dbPath === ":memory:" ? raw.dbPath : path.resolve(cwd, raw.dbPath),
    outputPath: resolveOutput(cwd, raw.outputPath),
    exportPath: path.resolve(cwd, raw.exportPath),
    format: raw.format,
    baseUrl: raw.baseUrl,
    timeoutMs: raw.timeoutMs,
    requestIntervalMs: raw.requestIntervalMs,
    cacheMaxAgeMs:
      raw.cacheTtlDays === undefined ? undefined : raw.cacheTtlDays * 24 * 60 * 60 * 1000,
    logLevel: raw.logLevel,
    offline: raw.offline,
  };
}

export function getArgValue(argsList: readonly string[], name: string): string | undefined {
  const index = argsList.indexOf(name);
  if (index === -1) return undefined;
  const value = argsList[index + 1];
  // A flag directly after another flag has no value.
  if (value === undefined || value.startsWith("--")) return undefined;
  return value;
}

function resolveOutput(cwd: string, value: string): string {
  return value === STDOUT_PATH ? value : path.resolve(cwd, value);
}

function isTruthy(value: string | undefined): boolean {
  if (!value) return false;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}
