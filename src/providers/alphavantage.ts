// src/providers/alphavantage.ts
import { z } from "zod";
import { FetchFailure } from "../errors.js";
import { errMessage, log } from "../logger.js";
import type { PriceBar } from "../types.js";
import { calendarToCompact } from "../utils/dates.js";
import type { ProviderContext } from "./http.js";

const ALPHAV_BASE = "https://www.alphavantage.co/query";

/** Topics that make up the "macro" slice of the news-sentiment feed. */
const MACRO_TOPICS = "economy_macro,economy_monetary,economy_fiscal";

/** Keys Alpha Vantage uses to say "no" while still answering 200. */
const SOFT_ERROR_KEYS = ["Error Message", "Information", "Note"] as const;

async function alphaGet(
  ctx: ProviderContext,
  params: Record<string, string>
): Promise<Record<string, unknown>> {
  let data: unknown;
  try {
    const res = await ctx.http.get<unknown>(ALPHAV_BASE, {
      params: { ...params, apikey: ctx.apiKey },
    });
    data = res.data;
  } catch (e) {
    throw new FetchFailure(
      `${params.function}: ${errMessage(e)}`,
      "alphavantage",
      { cause: e }
    );
  }
  if (!data || typeof data !== "object" || Array.isArray(data)) {
    throw new FetchFailure(
      `${params.function}: unexpected response body`,
      "alphavantage"
    );
  }
  const body = Object.fromEntries(Object.entries(data));
  for (const key of SOFT_ERROR_KEYS) {
    const msg = body[key];
    if (typeof msg === "string") {
      throw new FetchFailure(`${params.function}: ${msg}`, "alphavantage");
    }
  }
  return body;
}

/**
 * Macro news articles published within [from, to].
 * Article shape: { title, url, time_published, summary, source, ticker_sentiment: [{ ticker, relevance_score, ... }] }
 */
export async function fetchMacroNews(
  ctx: ProviderContext,
  _symbol: string,
  from: string,
  to: string
): Promise<unknown> {
  if (!ctx.apiKey) {
    log.warn("[ALPHAV] ALPHA_VANTAGE_API_KEY missing — skipping macro news");
    return [];
  }
  const body = await alphaGet(ctx, {
    function: "NEWS_SENTIMENT",
    topics: MACRO_TOPICS,
    time_from: calendarToCompact(from, "0000"),
    time_to: calendarToCompact(to, "2359"),
    sort: "LATEST",
    limit: "1000",
  });
  if (!Array.isArray(body.feed)) {
    throw new FetchFailure("NEWS_SENTIMENT: body has no feed", "alphavantage");
  }
  return body.feed;
}

const DailyBarSchema = z.object({
  "1. open": z.coerce.number(),
  "2. high": z.coerce.number(),
  "3. low": z.coerce.number(),
  "4. close": z.coerce.number(),
  "5. volume": z.coerce.number(),
});

const DailySeriesSchema = z.object({
  "Time Series (Daily)": z.record(z.string(), z.unknown()),
});

/** Turn a TIME_SERIES_DAILY body into ascending bars on or after fromDate. */
export function parseDailySeries(body: unknown, fromDate: string): PriceBar[] {
  const parsed = DailySeriesSchema.safeParse(body);
  if (!parsed.success) {
    throw new FetchFailure(
      "TIME_SERIES_DAILY: body has no daily series",
      "alphavantage"
    );
  }
  const bars: PriceBar[] = [];
  for (const [date, raw] of Object.entries(parsed.data["Time Series (Daily)"])) {
    if (date < fromDate) continue;
    const row = DailyBarSchema.safeParse(raw);
    if (!row.success) continue;
    const r = row.data;
    const values = [r["1. open"], r["2. high"], r["3. low"], r["4. close"], r["5. volume"]];
    if (!values.every(Number.isFinite)) continue;
    bars.push({
      date,
      open: r["1. open"],
      high: r["2. high"],
      low: r["3. low"],
      close: r["4. close"],
      volume: r["5. volume"],
    });
  }
  return bars.sort((a, b) => a.date.localeCompare(b.date));
}

/** Daily OHLCV bars for the lookback window, oldest first. */
export async function fetchDailyPrices(
  ctx: ProviderContext,
  symbol: string,
  fromDate: string,
  lookbackDays: number
): Promise<PriceBar[]> {
  if (!ctx.apiKey) {
    log.warn("[ALPHAV] ALPHA_VANTAGE_API_KEY missing — no price data");
    return [];
  }
  const body = await alphaGet(ctx, {
    function: "TIME_SERIES_DAILY",
    symbol,
    // compact = latest 100 trading days
    outputsize: lookbackDays > 100 ? "full" : "compact",
  });
  return parseDailySeries(body, fromDate);
}
