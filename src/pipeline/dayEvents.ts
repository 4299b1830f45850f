import type { CanonicalEvent } from "../types.js";
import { toCalendarDate } from "../utils/dates.js";

export const DEFAULT_DAY_EVENT_CAP = 20;

/**
 * Events on `date` (today in the host zone when omitted). Past `cap`, only the top-ranked
 * `cap` come back, highest first; equal ranks keep their original order.
 */
export function eventsOnDay(
  events: readonly CanonicalEvent[],
  date: string = toCalendarDate(),
  cap: number = DEFAULT_DAY_EVENT_CAP
): CanonicalEvent[] {
  const day = events.filter((e) => e.std_date === date);
  if (day.length <= cap) return day;
  // Array#sort is stable
  return day
    .sort((a, b) => b.importance_rank - a.importance_rank)
    .slice(0, cap);
}
