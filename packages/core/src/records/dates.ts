export const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
] as const;

export type MonthName = (typeof MONTH_NAMES)[number];

const yearOnly = /^(\d{4})$/;
const isoLike = /^(\d{4})[-/](\d{1,2})(?:[-/](\d{1,2}))?(?:[T ]\S*)?$/;
const usNumeric = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const monthYear = /^([a-z]+)\.?,?\s+(\d{4})$/;
const monthDayYear = /^([a-z]+)\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})$/;
const dayMonthYear = /^(\d{1,2})(?:st|nd|rd|th)?\s+([a-z]+)\.?,?\s+(\d{4})$/;

const timestampPattern =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

/**
 * Parses the free-form `publish_date` strings Open Library carries
 * ("2004", "May 2004", "May 4, 2004", "4 May 2004", "2004-05-04", "5/4/2004").
 * Anything else is treated as absent.
 */
export function parsePublishDate(value: unknown): Date | undefined {
  if (typeof value !== "string") return undefined;
  const text = value.trim().toLowerCase();
  if (!text) return undefined;

  let match = text.match(yearOnly);
  if (match) return utcDate(Number(match[1]), 1, 1);

  match = text.match(isoLike);
  if (match) {
    return utcDate(Number(match[1]), Number(match[2]), match[3] ? Number(match[3]) : 1);
  }

  match = text.match(usNumeric);
  if (match) return utcDate(Number(match[3]), Number(match[1]), Number(match[2]));

  match = text.match(monthYear);
  if (match) return utcDate(Number(match[2]), monthFromName(match[1]), 1);

  match = text.match(monthDayYear);
  if (match) {
    return utcDate(Number(match[3]), monthFromName(match[1]), Number(match[2]));
  }

  match = text.match(dayMonthYear);
  if (match) {
    return utcDate(Number(match[3]), monthFromName(match[2]), Number(match[1]));
  }

  return undefined;
}

/**
 * Parses ISO-8601 timestamps such as `2021-03-04T12:34:56.789012`.
 * Values without an offset are read as UTC.
 */
export function parseTimestamp(value: unknown): Date | undefined {
  if (typeof value !== "string") return undefined;
  const match = value.trim().match(timestampPattern);
  if (!match) return undefined;

  const [, year, month, day, hour, minute, second, fraction, zone] = match;
  const base = utcDate(Number(year), Number(month), Number(day));
  if (!base) return undefined;

  const hours = Number(hour ?? 0);
  const minutes = Number(minute ?? 0);
  const seconds = Number(second ?? 0);
  if (hours > 23 || minutes > 59 || seconds > 59) return undefined;
  const millis = fraction ? Number(fraction.slice(0, 3).padEnd(3, "0")) : 0;

  const time =
    base.getTime() + ((hours * 60 + minutes) * 60 + seconds) * 1000 + millis;
  return new Date(time - zoneOffsetMs(zone));
}

export function formatCalendarDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function monthFromName(token: string): number {
  if (token.length < 3) return 0;
  const index = MONTH_NAMES.findIndex((name) =>
    name.toLowerCase().startsWith(token)
  );
  return index + 1;
}

function utcDate(year: number, month: number, day: number): Date | undefined {
  if (year < 1000 || month < 1 || month > 12 || day < 1) return undefined;
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCMonth() !== month - 1) return undefined;
  return date;
}

function zoneOffsetMs(zone: string | undefined): number {
  if (!zone || zone.toUpperCase() === "Z") return 0;
  const sign = zone.startsWith("-") ? -1 : 1;
  const digits = zone.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  return sign * (hours * 60 + minutes) * 60 * 1000;
}
