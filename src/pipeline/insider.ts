// src/pipeline/insider.ts
import { z } from "zod";
import { EVENT_BASE_WEIGHT, type CanonicalEvent } from "../types.js";
import { safeTriple } from "./normalize.js";

/** One normalized insider trade, before per-person/day aggregation. */
export type InsiderTrade = {
  std_date: string;
  date: string;
  name: string;
  /** Signed share change: + acquired, − disposed. */
  change: number;
  price: number;
  code: string;
};

const InsiderRowSchema = z.object({
  transactionDate: z.string().trim().min(1),
  share: z.number(),
  change: z.number(),
  name: z.string().trim().min(1),
  transactionPrice: z.number(),
  transactionCode: z.string().trim().min(1),
});

/** Phase 1: validate each raw row into a trade; incomplete rows are skipped. */
export function* toInsiderTrades(
  records: Iterable<unknown>,
  timeZone?: string
): Generator<InsiderTrade> {
  for (const raw of records) {
    const parsed = InsiderRowSchema.safeParse(raw);
    if (!parsed.success) continue;
    const r = parsed.data;

    const t = safeTriple(r.transactionDate, "InsiderTransaction", timeZone);
    if (!t) continue;

    yield {
      std_date: t[0],
      date: t[1],
      name: r.name,
      change: r.change,
      price: r.transactionPrice,
      code: r.transactionCode,
    };
  }
}

export function edgarInsiderUrl(ticker: string): string {
  return `https://www.sec.gov/cgi-bin/browse-edgar?action=getcompany&CIK=${encodeURIComponent(
    ticker
  )}&type=4&owner=include`;
}

function summarize(group: InsiderTrade[], ticker: string): CanonicalEvent | null {
  let net = 0;
  let notional = 0;
  const codes: string[] = [];
  for (const t of group) {
    net += t.change;
    notional += t.change * t.price;
    if (!codes.includes(t.code)) codes.push(t.code);
  }
  if (net === 0) return null;

  const { std_date, date, name } = group[0];
  const verb = net > 0 ? "acquired" : "disposed of";
  const avgPrice = notional / net;

  return {
    std_date,
    date,
    time: "",
    type: "InsiderTransaction",
    title: `${name} net ${verb} ${Math.abs(net).toLocaleString("en-US")} shares`,
    content: [
      `Average price: $${avgPrice.toFixed(2)}`,
      `Transactions: ${group.length} (codes: ${codes.join(", ")})`,
    ].join("\n"),
    source: "Finnhub",
    url: edgarInsiderUrl(ticker),
    importance_rank: EVENT_BASE_WEIGHT.InsiderTransaction,
  };
}

/**
 * Phase 2: one event per (std_date, name) with the net share change and a
 * volume-weighted average price. Groups that net to zero are dropped.
 */
export function* aggregateInsiderTrades(
  trades: Iterable<InsiderTrade>,
  ticker: string
): Generator<CanonicalEvent> {
  const sorted = [...trades].sort((a, b) =>
    a.std_date === b.std_date
      ? a.name < b.name ? -1 : a.name > b.name ? 1 : 0
      : a.std_date < b.std_date ? -1 : 1
  );

  let group: InsiderTrade[] = [];
  for (const trade of sorted) {
    const head = group[0];
    if (head && (head.std_date !== trade.std_date || head.name !== trade.name)) {
      const event = summarize(group, ticker);
      if (event) yield event;
      group = [];
    }
    group.push(trade);
  }
  if (group.length) {
    const event = summarize(group, ticker);
    if (event) yield event;
  }
}

export function normalizeInsiderTransactions(
  records: Iterable<unknown>,
  ticker: string,
  timeZone?: string
): Generator<CanonicalEvent> {
  return aggregateInsiderTrades(toInsiderTrades(records, timeZone), ticker);
}
