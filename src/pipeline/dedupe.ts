import type { CanonicalEvent, EventType } from "../types.js";

/** News types are deduped against each other; everything else passes through. */
const DEDUP_TYPES: ReadonlySet<EventType> = new Set<EventType>([
  "MacroNews",
  "CompanyNews",
]);

export function dedupeKey(e: Pick<CanonicalEvent, "std_date" | "title">): string {
  return `${e.std_date}|${e.title.trim().toLowerCase()}`;
}

/**
 * Same day + same normalized title → keep the higher-ranked copy (first wins
 * ties). Output is pass-through events, then the surviving news.
 */
export function dedupeEvents(events: Iterable<CanonicalEvent>): CanonicalEvent[] {
  const passThrough: CanonicalEvent[] = [];
  const news = new Map<string, CanonicalEvent>();

  for (const e of events) {
    if (!DEDUP_TYPES.has(e.type)) {
      passThrough.push(e);
      continue;
    }
    const key = dedupeKey(e);
    const kept = news.get(key);
    if (!kept || e.importance_rank > kept.importance_rank) news.set(key, e);
  }

  return [...passThrough, ...news.values()];
}
