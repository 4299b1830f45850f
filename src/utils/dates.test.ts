import { describe, expect, it } from "vitest";
import { ParseError } from "../errors.js";
import {
  backdate,
  calendarToCompact,
  isStale,
  isValidTimeZone,
  parseCompactIsoDatetime,
  splitRange,
  toCalendarDate,
  toCompactIsoDatetime,
  toDisplayTriple,
} from "./dates.js";

const DAY_MS = 86_400_000;
const fixed = (iso: string) => () => new Date(iso);

describe("toCalendarDate", () => {
  it("formats the clock's current day when no input is given", () => {
    expect(toCalendarDate({ kind: "now" }, fixed("2024-03-01T23:30:00Z"))).toBe(
      "2024-03-01"
    );
  });

  it("formats a Date instant in the host zone", () => {
    expect(
      toCalendarDate({ kind: "instant", at: new Date("2024-12-31T00:00:01Z") })
    ).toBe("2024-12-31");
  });

  it("is idempotent on calendar strings", () => {
    for (const d of ["2024-03-01", "2024-02-29", "1999-12-31", "2030-01-01"]) {
      const once = toCalendarDate({ kind: "calendar", value: d });
      expect(once).toBe(d);
      expect(toCalendarDate({ kind: "calendar", value: once })).toBe(once);
    }
  });

  it("rejects strings that are not canonical calendar dates", () => {
    for (const bad of ["2024-3-1", "2024-02-30", "2023-02-29", "03/01/2024", ""]) {
      expect(() => toCalendarDate({ kind: "calendar", value: bad })).toThrow(
        ParseError
      );
    }
  });

  it("reads the clock on the wall clock of the given zone", () => {
    const late = fixed("2024-03-05T02:00:00Z");
    expect(toCalendarDate({ kind: "now" }, late, "America/New_York")).toBe(
      "2024-03-04"
    );
    expect(toCalendarDate({ kind: "now" }, late, "Asia/Tokyo")).toBe("2024-03-05");
    expect(toCalendarDate({ kind: "calendar", value: "2024-03-05" }, late, "America/New_York")).toBe(
      "2024-03-05"
    );
  });

  it("rejects an invalid Date", () => {
    expect(() =>
      toCalendarDate({ kind: "instant", at: new Date("nope") })
    ).toThrow(ParseError);
  });
});

describe("toDisplayTriple", () => {
  it("reads unix epoch seconds", () => {
    expect(toDisplayTriple(1709294400)).toEqual([
      "2024-03-01",
      "Mar 01, 2024 - Fri",
      "12:00",
    ]);
  });

  it("tries each known string format in turn", () => {
    expect(toDisplayTriple("2024-03-01 16:45:10")).toEqual([
      "2024-03-01",
      "Mar 01, 2024 - Fri",
      "16:45",
    ]);
    expect(toDisplayTriple("2024-03-01")).toEqual([
      "2024-03-01",
      "Mar 01, 2024 - Fri",
      "00:00",
    ]);
    expect(toDisplayTriple("20240302T0930")).toEqual([
      "2024-03-02",
      "Mar 02, 2024 - Sat",
      "09:30",
    ]);
    expect(toDisplayTriple("20240303T093015")).toEqual([
      "2024-03-03",
      "Mar 03, 2024 - Sun",
      "09:30",
    ]);
  });

  it("reads epoch seconds in the given zone", () => {
    // 2024-03-05T01:30:00Z
    expect(toDisplayTriple(1709602200, "America/New_York")).toEqual([
      "2024-03-04",
      "Mar 04, 2024 - Mon",
      "20:30",
    ]);
    // first hour of daylight time
    expect(toDisplayTriple(1710055800, "America/New_York")).toEqual([
      "2024-03-10",
      "Mar 10, 2024 - Sun",
      "03:30",
    ]);
  });

  it("keeps zone-less strings as written", () => {
    expect(toDisplayTriple("2024-03-01 16:45:10", "Asia/Tokyo")).toEqual([
      "2024-03-01",
      "Mar 01, 2024 - Fri",
      "16:45",
    ]);
  });

  it("throws ParseError for unknown formats", () => {
    expect(() => toDisplayTriple("03/01/2024")).toThrow(ParseError);
    expect(() => toDisplayTriple("2024-13-01")).toThrow(ParseError);
    expect(() => toDisplayTriple(Number.NaN)).toThrow(ParseError);
  });
});

describe("compact datetimes", () => {
  it("formats to minute precision", () => {
    expect(toCompactIsoDatetime(new Date("2024-03-01T09:05:59Z"))).toBe(
      "20240301T0905"
    );
  });

  it("formats on the wall clock of the given zone", () => {
    expect(toCompactIsoDatetime(new Date("2024-03-01T20:00:00Z"), "Asia/Tokyo")).toBe(
      "20240302T0500"
    );
  });

  it("builds stamps from calendar days", () => {
    expect(calendarToCompact("2024-03-01")).toBe("20240301T0000");
    expect(calendarToCompact("2024-03-01", "2359")).toBe("20240301T2359");
    expect(() => calendarToCompact("2024-02-30")).toThrow(ParseError);
  });

  it("parses back what it formats", () => {
    expect(parseCompactIsoDatetime("20240301T0905").toISOString()).toBe(
      "2024-03-01T09:05:00.000Z"
    );
    expect(() => parseCompactIsoDatetime("2024-03-01T09:05")).toThrow(
      ParseError
    );
  });

  it("isStale is a strict comparison", () => {
    expect(isStale("20240301T0000", "20240301T0559", 6)).toBe(false);
    expect(isStale("20240301T0000", "20240301T0600", 6)).toBe(false);
    expect(isStale("20240301T0000", "20240301T0601", 6)).toBe(true);
    expect(isStale("20240229T2300", "20240301T0501", 6)).toBe(true);
  });
});

describe("backdate", () => {
  it("counts whole days back from the clock", () => {
    expect(backdate(19, fixed("2024-03-20T12:00:00Z")).toISOString()).toBe(
      "2024-03-01T12:00:00.000Z"
    );
  });
});

describe("splitRange", () => {
  it("yields newest span first", () => {
    expect([...splitRange("2024-03-01", "2024-03-20", 7)]).toEqual([
      ["2024-03-14", "2024-03-20"],
      ["2024-03-07", "2024-03-13"],
      ["2024-03-01", "2024-03-06"],
    ]);
  });

  it("handles month ends and leap days", () => {
    expect([...splitRange("2024-02-25", "2024-03-02", 3)]).toEqual([
      ["2024-02-29", "2024-03-02"],
      ["2024-02-26", "2024-02-28"],
      ["2024-02-25", "2024-02-25"],
    ]);
  });

  it("accepts Date bounds", () => {
    expect([
      ...splitRange(
        new Date("2024-03-01T18:00:00Z"),
        new Date("2024-03-02T01:00:00Z"),
        7
      ),
    ]).toEqual([["2024-03-01", "2024-03-02"]]);
  });

  it("reads Date bounds in the given zone", () => {
    expect([
      ...splitRange(
        new Date("2024-03-01T03:00:00Z"),
        new Date("2024-03-02T01:00:00Z"),
        7,
        "America/New_York"
      ),
    ]).toEqual([["2024-02-29", "2024-03-01"]]);
  });

  it("is restartable", () => {
    const spans = splitRange("2024-01-01", "2024-01-31", 10);
    expect([...spans]).toEqual([...spans]);
    expect([...spans]).toHaveLength(4);
  });

  it("is empty when start is after end", () => {
    expect([...splitRange("2024-03-02", "2024-03-01", 7)]).toEqual([]);
  });

  it("covers the range exactly with contiguous spans", () => {
    const cases: [string, string, number][] = [
      ["2024-01-01", "2024-01-01", 1],
      ["2024-01-01", "2024-03-31", 7],
      ["2023-12-15", "2024-01-20", 30],
      ["2024-05-01", "2024-05-10", 1],
    ];
    for (const [start, end, size] of cases) {
      const spans = [...splitRange(start, end, size)];
      expect(spans[0][1]).toBe(end);
      expect(spans[spans.length - 1][0]).toBe(start);
      for (const [from, to] of spans) {
        const days = (Date.parse(to) - Date.parse(from)) / DAY_MS + 1;
        expect(days).toBeGreaterThanOrEqual(1);
        expect(days).toBeLessThanOrEqual(size);
      }
      for (let i = 1; i < spans.length; i++) {
        expect(Date.parse(spans[i - 1][0]) - Date.parse(spans[i][1])).toBe(
          DAY_MS
        );
      }
    }
  });

  it("rejects a non-positive batch size", () => {
    expect(() => splitRange("2024-01-01", "2024-01-02", 0)).toThrow(RangeError);
  });
});

describe("isValidTimeZone", () => {
  it("knows IANA names", () => {
    expect(isValidTimeZone("America/New_York")).toBe(true);
    expect(isValidTimeZone("UTC")).toBe(true);
    expect(isValidTimeZone("Mars/Olympus")).toBe(false);
  });
});
