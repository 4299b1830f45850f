// src/utils/dates.ts
// Instants (epoch seconds, Dates, "now") are read on the wall clock of an IANA
// zone; undefined means the host zone. Zone-less upstream strings keep their
// wall-clock fields as written.
import { ParseError } from "../errors.js";
import { systemClock, type Clock } from "../types.js";

const DAY_MS = 86_400_000;
const HOUR_MS = 3_600_000;

const MONTHS = [
  "Jan", "Feb", "Mar", "Apr", "May", "Jun",
  "Jul", "Aug", "Sep", "Oct", "Nov", "Dec",
];
const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];

const CALENDAR_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const COMPACT_RE = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})$/;

/** Upstream formats we accept for display conversion, tried in order. */
const KNOWN_FORMATS: { name: string; pattern: RegExp }[] = [
  {
    name: "YYYY-MM-DD HH:MM:SS",
    pattern: /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/,
  },
  { name: "YYYY-MM-DD", pattern: CALENDAR_RE },
  { name: "YYYYMMDDTHHMM", pattern: COMPACT_RE },
  {
    name: "YYYYMMDDTHHMMSS",
    pattern: /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})$/,
  },
];

export type DateInput =
  | { kind: "now" }
  | { kind: "instant"; at: Date }
  | { kind: "calendar"; value: string };

/** [std_date, display_date, display_time] */
export type DisplayTriple = [stdDate: string, displayDate: string, displayTime: string];

/** Inclusive [from, to] calendar dates. */
export type DateSpan = readonly [from: string, to: string];

/** Wall-clock fields, month 1-based. */
type WallClock = { y: number; mo: number; d: number; h: number; mi: number; s: number };

const pad = (n: number) => String(n).padStart(2, "0");

/** Fields that name a real calendar moment, or null. */
function validWallClock(
  y: number,
  mo: number,
  d: number,
  h = 0,
  mi = 0,
  s = 0
): WallClock | null {
  const t = new Date(Date.UTC(y, mo - 1, d, h, mi, s));
  const ok =
    t.getUTCFullYear() === y &&
    t.getUTCMonth() === mo - 1 &&
    t.getUTCDate() === d &&
    t.getUTCHours() === h &&
    t.getUTCMinutes() === mi &&
    t.getUTCSeconds() === s;
  return ok ? { y, mo, d, h, mi, s } : null;
}

function matchParts(pattern: RegExp, value: string): WallClock | null {
  const m = pattern.exec(value);
  if (!m) return null;
  const [y, mo, d, h, mi, s] = m.slice(1).map(Number);
  return validWallClock(y, mo, d, h ?? 0, mi ?? 0, s ?? 0);
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone?: string): Intl.DateTimeFormat {
  const key = timeZone ?? "";
  let fmt = formatters.get(key);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    });
    formatters.set(key, fmt);
  }
  return fmt;
}

/** Read an instant on the wall clock of `timeZone` (host zone when omitted). */
function wallClockAt(at: Date, timeZone?: string): WallClock {
  if (Number.isNaN(at.getTime())) {
    throw new ParseError(`Invalid date: ${String(at)}`, String(at));
  }
  const f: Record<string, number> = {};
  for (const part of formatterFor(timeZone).formatToParts(at)) {
    if (part.type !== "literal") f[part.type] = Number(part.value);
  }
  return { y: f.year, mo: f.month, d: f.day, h: f.hour, mi: f.minute, s: f.second };
}

/** True when Intl knows the zone name. */
export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

function formatCalendar(w: WallClock): string {
  return `${w.y}-${pad(w.mo)}-${pad(w.d)}`;
}

/** e.g. "Mar 01, 2024 - Fri" */
function formatDisplayDate(w: WallClock): string {
  const weekday = new Date(Date.UTC(w.y, w.mo - 1, w.d)).getUTCDay();
  return `${MONTHS[w.mo - 1]} ${pad(w.d)}, ${w.y} - ${WEEKDAYS[weekday]}`;
}

function formatDisplayTime(w: WallClock): string {
  return `${pad(w.h)}:${pad(w.mi)}`;
}

export function backdate(days: number, clock: Clock = systemClock): Date {
  return new Date(clock().getTime() - days * DAY_MS);
}

/**
 * Canonical YYYY-MM-DD for the current moment, a Date, or an already
 * formatted calendar string (which is validated, not trusted).
 */
export function toCalendarDate(
  input: DateInput = { kind: "now" },
  clock: Clock = systemClock,
  timeZone?: string
): string {
  switch (input.kind) {
    case "now":
      return formatCalendar(wallClockAt(clock(), timeZone));
    case "instant":
      return formatCalendar(wallClockAt(input.at, timeZone));
    case "calendar": {
      const w = matchParts(CALENDAR_RE, input.value);
      if (!w) {
        throw new ParseError(
          `Invalid date string format: ${input.value}`,
          input.value
        );
      }
      return formatCalendar(w);
    }
  }
}

/**
 * Unix epoch seconds or one of the known upstream string formats →
 * [std_date, display_date, display_time].
 */
export function toDisplayTriple(
  input: number | string,
  timeZone?: string
): DisplayTriple {
  let w: WallClock | null = null;

  if (typeof input === "number") {
    if (Number.isFinite(input)) w = wallClockAt(new Date(input * 1000), timeZone);
  } else {
    const value = input.trim();
    for (const fmt of KNOWN_FORMATS) {
      w = matchParts(fmt.pattern, value);
      if (w) break;
    }
  }

  if (!w) {
    throw new ParseError(`Unsupported date format: ${input}`, String(input));
  }
  return [formatCalendar(w), formatDisplayDate(w), formatDisplayTime(w)];
}

/** YYYYMMDDTHHMM on the zone's wall clock, for cache stamps only. */
export function toCompactIsoDatetime(moment: Date, timeZone?: string): string {
  const w = wallClockAt(moment, timeZone);
  return `${w.y}${pad(w.mo)}${pad(w.d)}T${pad(w.h)}${pad(w.mi)}`;
}

/** Compact stamp for a calendar day at HH:MM, e.g. upstream query bounds. */
export function calendarToCompact(calendar: string, hhmm = "0000"): string {
  const w = matchParts(CALENDAR_RE, calendar);
  if (!w || !/^\d{4}$/.test(hhmm)) {
    throw new ParseError(`Invalid date string format: ${calendar}`, calendar);
  }
  return `${formatCalendar(w).replace(/-/g, "")}T${hhmm}`;
}

/**
 * A compact stamp as a Date holding its wall-clock fields in UTC. Only
 * meaningful for differences between stamps taken in the same zone.
 */
export function parseCompactIsoDatetime(value: string): Date {
  const w = matchParts(COMPACT_RE, value);
  if (!w) {
    throw new ParseError(`Invalid compact datetime: ${value}`, value);
  }
  return new Date(Date.UTC(w.y, w.mo - 1, w.d, w.h, w.mi));
}

/** True iff reference is strictly more than thresholdHours after cached. */
export function isStale(
  cachedMoment: string,
  referenceMoment: string,
  thresholdHours: number
): boolean {
  const diff =
    parseCompactIsoDatetime(referenceMoment).getTime() -
    parseCompactIsoDatetime(cachedMoment).getTime();
  return diff > thresholdHours * HOUR_MS;
}

function toDayStart(input: Date | string, timeZone?: string): number {
  const calendar =
    typeof input === "string"
      ? toCalendarDate({ kind: "calendar", value: input })
      : toCalendarDate({ kind: "instant", at: input }, systemClock, timeZone);
  return Date.parse(`${calendar}T00:00:00Z`);
}

/**
 * Inclusive [start, end] cut into spans of at most batchSizeDays days,
 * newest span first. Re-iterating starts over.
 */
export function splitRange(
  start: Date | string,
  end: Date | string,
  batchSizeDays: number,
  timeZone?: string
): Iterable<DateSpan> {
  if (!Number.isInteger(batchSizeDays) || batchSizeDays < 1) {
    throw new RangeError(`batchSizeDays must be a positive integer, got ${batchSizeDays}`);
  }
  const startMs = toDayStart(start, timeZone);
  const endMs = toDayStart(end, timeZone);
  // day arithmetic runs on UTC midnights, so DST never shortens a day
  const fmt = (ms: number) => new Date(ms).toISOString().slice(0, 10);

  return {
    *[Symbol.iterator](): Generator<DateSpan> {
      let currentEnd = endMs;
      while (currentEnd >= startMs) {
        const currentStart = Math.max(
          startMs,
          currentEnd - (batchSizeDays - 1) * DAY_MS
        );
        yield [fmt(currentStart), fmt(currentEnd)];
        currentEnd = currentStart - DAY_MS;
      }
    },
  };
}
