// src/pipeline/normalize.ts
import { z } from "zod";
import { ParseError } from "../errors.js";
import { log } from "../logger.js";
import {
  EVENT_BASE_WEIGHT,
  type CanonicalEvent,
  type EventType,
} from "../types.js";
import { toDisplayTriple, type DisplayTriple } from "../utils/dates.js";

/* ---------------- helpers ---------------- */

const requiredText = z.string().trim().min(1);
const optionalText = z.string().trim().optional().catch(undefined);

/** Absolute http(s) link or "#". */
export function linkOrHash(url?: string): string {
  if (!url) return "#";
  try {
    const u = new URL(url);
    return u.protocol === "http:" || u.protocol === "https:" ? url : "#";
  } catch {
    return "#";
  }
}

/** Display triple, or null (logged) when the upstream date is unreadable. */
export function safeTriple(
  value: number | string,
  type: EventType,
  timeZone?: string
): DisplayTriple | null {
  try {
    return toDisplayTriple(value, timeZone);
  } catch (e) {
    if (!(e instanceof ParseError)) throw e;
    log.warn("[NORM] dropping record with unreadable date", {
      type,
      value: e.input,
    });
    return null;
  }
}

/* ---------------- macro news (Alpha Vantage NEWS_SENTIMENT) ---------------- */

const MacroArticleSchema = z.object({
  title: requiredText,
  summary: requiredText,
  time_published: requiredText,
  url: optionalText,
  source: optionalText,
  ticker_sentiment: z.array(z.unknown()).optional().catch(undefined),
});

const TickerSentimentSchema = z.object({
  ticker: z.string(),
  relevance_score: z.coerce.number(),
});

/** Relevance of the article to `ticker` in [0, ∞); 0 when not tagged. */
export function tickerRelevance(
  sentiments: unknown[] | undefined,
  ticker: string
): number {
  const want = ticker.trim().toUpperCase();
  for (const s of sentiments ?? []) {
    const parsed = TickerSentimentSchema.safeParse(s);
    if (!parsed.success) continue;
    if (parsed.data.ticker.trim().toUpperCase() !== want) continue;
    const score = parsed.data.relevance_score;
    return Number.isFinite(score) ? Math.max(0, score) : 0;
  }
  return 0;
}

export function* normalizeMacroNews(
  records: Iterable<unknown>,
  ticker: string,
  timeZone?: string
): Generator<CanonicalEvent> {
  for (const raw of records) {
    const parsed = MacroArticleSchema.safeParse(raw);
    if (!parsed.success) continue;
    const a = parsed.data;

    const t = safeTriple(a.time_published, "MacroNews", timeZone);
    if (!t) continue;
    const [std_date, date, time] = t;

    yield {
      std_date,
      date,
      time,
      type: "MacroNews",
      title: a.title,
      content: a.summary,
      source: a.source || "Alpha Vantage",
      url: linkOrHash(a.url),
      importance_rank:
        EVENT_BASE_WEIGHT.MacroNews *
        (1 + tickerRelevance(a.ticker_sentiment, ticker)),
    };
  }
}

/* ---------------- company news (Finnhub company-news) ---------------- */

const CompanyNewsSchema = z.object({
  headline: requiredText,
  summary: requiredText,
  datetime: z.number(),
  url: optionalText,
  source: optionalText,
});

export function* normalizeCompanyNews(
  records: Iterable<unknown>,
  timeZone?: string
): Generator<CanonicalEvent> {
  for (const raw of records) {
    const parsed = CompanyNewsSchema.safeParse(raw);
    if (!parsed.success) continue;
    const n = parsed.data;

    const t = safeTriple(n.datetime, "CompanyNews", timeZone);
    if (!t) continue;
    const [std_date, date, time] = t;

    yield {
      std_date,
      date,
      time,
      type: "CompanyNews",
      title: n.headline,
      content: n.summary,
      source: n.source || "Finnhub",
      url: linkOrHash(n.url),
      importance_rank: EVENT_BASE_WEIGHT.CompanyNews,
    };
  }
}

/* ---------------- SEC filings (Finnhub stock/filings) ---------------- */

const FilingSchema = z.object({
  form: requiredText,
  filedDate: requiredText,
  reportUrl: requiredText,
  acceptedDate: optionalText,
});

export function* normalizeSecFilings(
  records: Iterable<unknown>,
  timeZone?: string
): Generator<CanonicalEvent> {
  for (const raw of records) {
    const parsed = FilingSchema.safeParse(raw);
    if (!parsed.success) continue;
    const f = parsed.data;

    const t = safeTriple(f.filedDate, "SecFiling", timeZone);
    if (!t) continue;
    const [std_date, date] = t;

    const lines = [`Form ${f.form} filed on ${date}`];
    if (f.acceptedDate) lines.push(`Accepted ${f.acceptedDate}`);

    yield {
      std_date,
      date,
      time: "",
      type: "SecFiling",
      title: `Form ${f.form}`,
      content: lines.join("\n"),
      source: "SEC EDGAR",
      url: linkOrHash(f.reportUrl),
      importance_rank: EVENT_BASE_WEIGHT.SecFiling,
    };
  }
}
