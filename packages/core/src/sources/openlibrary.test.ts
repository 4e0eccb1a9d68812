import assert from "node:assert/strict";
import test from "node:test";
import { createLogger } from "../logging";
import { OpenLibraryClient } from "./openlibrary";
import type { FetchLike } from "./types";

const ISBN = "9780306406157";
const LISTING_URL =
  "https://openlibrary.org/api/books?bibkeys=ISBN%3A9780306406157&format=json&jscmd=data";
const EDITION_URL = "https://openlibrary.org/books/OL1M.json";

type Route = () => Response;

function json(body: unknown, status = 200): Route {
  return () =>
    new Response(JSON.stringify(body), {
      status,
      headers: { "content-type": "application/json" },
    });
}

function fakeFetch(routes: Record<string, Route>) {
  const calls: string[] = [];
  const signals: Array<AbortSignal | null | undefined> = [];
  const fetcher: FetchLike = async (input, init) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    calls.push(url);
    signals.push(init?.signal);
    const route = routes[url];
    return route ? route() : new Response("not found", { status: 404 });
  };
  return { fetcher, calls, signals };
}

test("merges edition details into the listing payload", async () => {
  const { fetcher, calls, signals } = fakeFetch({
    [LISTING_URL]: json({
      [`ISBN:${ISBN}`]: {
        key: "/books/OL1M",
        title: "Night Trains",
        excerpts: [{ first_sentence: true, text: "From the excerpt." }],
      },
    }),
    [EDITION_URL]: json({
      last_modified: { type: "/type/datetime", value: "2019-07-01T10:00:00.000000" },
      description: { type: "/type/text", value: "A slow journey." },
      first_sentence: { type: "/type/text", value: "The train was late." },
    }),
  });
  const client = new OpenLibraryClient({ fetcher, minIntervalMs: 0 });

  const payload = await client.fetchPayload(ISBN);

  assert.deepEqual(calls, [LISTING_URL, EDITION_URL]);
  assert.ok(signals.every((signal) => signal instanceof AbortSignal));
  assert.deepEqual(payload, {
    key: "/books/OL1M",
    title: "Night Trains",
    excerpts: [{ first_sentence: true, text: "From the excerpt." }],
    last_modified: { type: "/type/datetime", value: "2019-07-01T10:00:00.000000" },
    description: { type: "/type/text", value: "A slow journey." },
    first_sentence: { type: "/type/text", value: "The train was late." },
  });
});

test("skips the edition request when the listing has no key", async () => {
  const { fetcher, calls } = fakeFetch({
    [LISTING_URL]: json({ [`ISBN:${ISBN}`]: { title: "Keyless" } }),
  });
  const client = new OpenLibraryClient({ fetcher, minIntervalMs: 0 });

  assert.deepEqual(await client.fetchPayload(ISBN), { title: "Keyless" });
  assert.equal(calls.length, 1);
});

test("returns null when the ISBN is unknown", async () => {
  const { fetcher } = fakeFetch({ [LISTING_URL]: json({}) });
  const client = new OpenLibraryClient({ fetcher, minIntervalMs: 0 });
  assert.equal(await client.fetchPayload(ISBN), null);
});

test("logs and returns null on HTTP errors", async () => {
  const lines: string[] = [];
  const { fetcher } = fakeFetch({ [LISTING_URL]: json({ error: "boom" }, 500) });
  const client = new OpenLibraryClient({
    fetcher,
    minIntervalMs: 0,
    logger: createLogger("openlibrary", "warn", (line) => lines.push(line)),
  });

  assert.equal(await client.fetchPayload(ISBN), null);
  assert.equal(lines.length, 1);
  assert.ok(
    lines[0].endsWith(
      `WARN  [openlibrary] lookup failed for ${ISBN}: HTTP 500 (${LISTING_URL})`
    )
  );
});

test("a failed edition request drops the whole payload", async () => {
  const { fetcher, calls } = fakeFetch({
    [LISTING_URL]: json({ [`ISBN:${ISBN}`]: { key: "/books/OL1M", title: "Night Trains" } }),
  });
  const client = new OpenLibraryClient({ fetcher, minIntervalMs: 0 });

  assert.equal(await client.fetchPayload(ISBN), null);
  assert.deepEqual(calls, [LISTING_URL, EDITION_URL]);
});

test("network failures become null", async () => {
  const client = new OpenLibraryClient({
    fetcher: async () => {
      throw new TypeError("fetch failed");
    },
    minIntervalMs: 0,
  });
  assert.equal(await client.fetchPayload(ISBN), null);
});

test("trims a trailing slash from the base URL", async () => {
  const { fetcher, calls } = fakeFetch({});
  const client = new OpenLibraryClient({
    fetcher,
    baseUrl: "http://localhost:8080/",
    minIntervalMs: 0,
  });
  await client.fetchPayload(ISBN);
  assert.equal(
    calls[0],
    "http://localhost:8080/api/books?bibkeys=ISBN%3A9780306406157&format=json&jscmd=data"
  );
});

test("spaces consecutive requests by the minimum interval", async () => {
  const times: number[] = [];
  const client = new OpenLibraryClient({
    fetcher: async () => {
      times.push(Date.now());
      return new Response("{}", { status: 200 });
    },
    minIntervalMs: 60,
  });

  await client.fetchPayload(ISBN);
  await client.fetchPayload(ISBN);

  assert.equal(times.length, 2);
  assert.ok(times[1] - times[0] >= 50, `gap was ${times[1] - times[0]}ms`);
});
