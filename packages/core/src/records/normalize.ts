import { z } from "zod";
import { parsePublishDate, parseTimestamp } from "./dates";
import type { BookRecord, RawBookPayload } from "./types";

// `description` and `first_sentence` arrive either as plain strings or as
// typed values ({ type: "/type/text", value: "..." }).
const sourceTextSchema = z.union([
  z.string(),
  z.object({ value: z.string() }).passthrough(),
]);

const namedEntrySchema = z.object({ name: z.string().min(1) }).passthrough();

const excerptSchema = z
  .object({
    first_sentence: z.unknown().optional(),
    text: z.unknown().optional(),
  })
  .passthrough();

const identifiersSchema = z
  .object({ goodreads: z.array(z.unknown()).optional() })
  .passthrough();

const lastModifiedSchema = z.object({ value: z.unknown() }).passthrough();

export function emptyRecord(isbn: string): BookRecord {
  return {
    isbn,
    authors: [],
    publishers: [],
    goodreadsIds: [],
    description: "",
    firstSentence: "",
  };
}

/**
 * Flattens one raw payload into a {@link BookRecord}. Never throws: a missing
 * payload or a field of the wrong shape degrades to the field's default.
 */
export function normalizeRecord(
  isbn: string,
  payload: RawBookPayload | null | undefined
): BookRecord {
  if (!isRawBookPayload(payload)) return emptyRecord(isbn);

  return {
    isbn,
    title: normalizeTitle(payload.title),
    authors: collectNames(payload.authors),
    publishers: collectNames(payload.publishers),
    publishDate: parsePublishDate(payload.publish_date),
    numberOfPages: normalizePageCount(payload.number_of_pages),
    goodreadsIds: collectGoodreadsIds(payload.identifiers),
    lastModified: parseLastModified(payload.last_modified),
    description: resolveSourceText(payload.description),
    firstSentence: resolveFirstSentence(payload),
  };
}

export function resolveSourceText(value: unknown): string {
  const parsed = sourceTextSchema.safeParse(value);
  if (!parsed.success) return "";
  return typeof parsed.data === "string" ? parsed.data : parsed.data.value;
}

/**
 * A top-level `first_sentence` wins over the excerpts; the first excerpt
 * flagged `first_sentence: true` with non-empty text is the fallback.
 */
export function resolveFirstSentence(payload: RawBookPayload): string {
  const direct = resolveSourceText(payload.first_sentence);
  if (direct) return direct;

  if (!Array.isArray(payload.excerpts)) return "";
  for (const entry of payload.excerpts) {
    const excerpt = excerptSchema.safeParse(entry);
    if (!excerpt.success) continue;
    const { first_sentence: flag, text } = excerpt.data;
    if (flag === true && typeof text === "string" && text) return text;
  }
  return "";
}

function normalizeTitle(value: unknown): string | undefined {
  return typeof value === "string" && value ? value : undefined;
}

function collectNames(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  const names: string[] = [];
  for (const entry of value) {
    const parsed = namedEntrySchema.safeParse(entry);
    if (parsed.success) names.push(parsed.data.name);
  }
  return names;
}

function normalizePageCount(value: unknown): number | undefined {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    return undefined;
  }
  return value;
}

function collectGoodreadsIds(value: unknown): string[] {
  const parsed = identifiersSchema.safeParse(value);
  if (!parsed.success) return [];
  return (parsed.data.goodreads ?? [])
    .map((id) => (typeof id === "number" ? String(id) : id))
    .filter((id): id is string => typeof id === "string");
}

function parseLastModified(value: unknown): Date | undefined {
  const parsed = lastModifiedSchema.safeParse(value);
  if (!parsed.success) return undefined;
  return parseTimestamp(parsed.data.value);
}

export function isRawBookPayload(value: unknown): value is RawBookPayload {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
