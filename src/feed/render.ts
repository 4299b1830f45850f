// src/feed/render.ts
import { EVENT_TYPE_LABEL, type CanonicalEvent } from "../types.js";

/** `[Label · HH:MM] Title`, indented content lines, then source and link. */
export function formatEvent(e: CanonicalEvent): string {
  const head = [EVENT_TYPE_LABEL[e.type], e.time].filter(Boolean).join(" · ");
  return [
    `[${head}] ${e.title}`,
    ...e.content.split("\n").map((line) => `  ${line}`),
    `  ${e.source} — ${e.url}`,
  ].join("\n");
}

/** The day view printed by the CLI. */
export function renderDay(
  ticker: string,
  displayDate: string,
  events: readonly CanonicalEvent[]
): string {
  const header = `${ticker} · ${displayDate}`;
  if (!events.length) return `${header}\nAll caught up!`;
  return [header, ...events.map((e) => `\n${formatEvent(e)}`)].join("\n");
}
