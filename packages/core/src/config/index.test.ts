import assert from "node:assert/strict";
import path from "node:path";
import test from "node:test";
import { getArgValue, resolveConfig } from "./index";

const cwd = path.resolve("/work");

test("falls back to defaults", () => {
  assert.deepEqual(resolveConfig([], {}, cwd), {
    isbnFile: path.join(cwd, "books-isbns.txt"),
    dbPath: path.join(cwd, "bookstats.db"),
    outputPath: path.join(cwd, "answers.txt"),
    exportPath: path.join(cwd, "books.csv"),
    format: "text",
    baseUrl: "https://openlibrary.org",
    timeoutMs: 1500,
    requestIntervalMs: 100,
    cacheMaxAgeMs: undefined,
    logLevel: "info",
    offline: false,
  });
});

test("flags win over environment variables", () => {
  const config = resolveConfig(
    ["--isbns", "list.txt", "--format", "json", "--timeout", "2500", "--out", "-"],
    {
      BOOKSTATS_ISBNS: "env-list.txt",
      BOOKSTATS_DB: "env.db",
      BOOKSTATS_TIMEOUT_MS: "900",
      BOOKSTATS_CACHE_TTL_DAYS: "2",
      BOOKSTATS_OFFLINE: "yes",
    },
    cwd
  );
  assert.equal(config.isbnFile, path.join(cwd, "list.txt"));
  assert.equal(config.dbPath, path.join(cwd, "env.db"));
  assert.equal(config.format, "json");
  assert.equal(config.timeoutMs, 2500);
  assert.equal(config.outputPath, "-");
  assert.equal(config.cacheMaxAgeMs, 2 * 24 * 60 * 60 * 1000);
  assert.equal(config.offline, true);
});

test("invalid values fall back instead of failing", () => {
  const config = resolveConfig(
    [
      "--format", "xml",
      "--timeout", "soon",
      "--interval", "-5",
      "--cache-ttl-days", "never",
      "--log-level", "loud",
      "--base-url", "not a url",
    ],
    {},
    cwd
  );
  assert.equal(config.format, "text");
  assert.equal(config.timeoutMs, 1500);
  assert.equal(config.requestIntervalMs, 100);
  assert.equal(config.cacheMaxAgeMs, undefined);
  assert.equal(config.logLevel, "info");
  assert.equal(config.baseUrl, "https://openlibrary.org");
});

test("keeps an in-memory database path as is", () => {
  assert.equal(resolveConfig(["--db", ":memory:", "--offline"], {}, cwd).dbPath, ":memory:");
});

test("reads the value after a flag", () => {
  assert.equal(getArgValue(["--db", "a.db"], "--db"), "a.db");
  assert.equal(getArgValue(["--db"], "--db"), undefined);
  assert.equal(getArgValue([], "--db"), undefined);
});

test("a flag followed by another flag has no value", () => {
  assert.equal(getArgValue(["--out", "--offline"], "--out"), undefined);
  const config = resolveConfig(["--out", "--offline"], {}, cwd);
  assert.equal(config.outputPath, path.resolve(cwd, "answers.txt"));
  assert.equal(config.offline, true);
});

test("a lone dash is still a value", () => {
  assert.equal(resolveConfig(["--out", "-"], {}, cwd).outputPath, "-");
});
