// src/providers/finnhub.ts
import { FetchFailure } from "../errors.js";
import { errMessage, log } from "../logger.js";
import type { ProviderContext } from "./http.js";

const FINNHUB_BASE = "https://finnhub.io/api/v1";

async function finnhubGet(
  ctx: ProviderContext,
  path: string,
  params: Record<string, string>
): Promise<unknown> {
  let data: unknown;
  try {
    const res = await ctx.http.get<unknown>(`${FINNHUB_BASE}/${path}`, {
      params: { ...params, token: ctx.apiKey },
    });
    data = res.data;
  } catch (e) {
    throw new FetchFailure(`${path}: ${errMessage(e)}`, "finnhub", {
      cause: e,
    });
  }
  // Finnhub sometimes answers 200 with { error: "..." }
  if (
    data &&
    typeof data === "object" &&
    "error" in data &&
    typeof data.error === "string"
  ) {
    throw new FetchFailure(`${path}: ${data.error}`, "finnhub");
  }
  return data;
}

function missingKey(ctx: ProviderContext, what: string): boolean {
  if (ctx.apiKey) return false;
  log.warn(`[FINNHUB] FINNHUB_API_KEY missing — skipping ${what}`);
  return true;
}

/**
 * Company news for one date span. Finnhub caps results per call, so the
 * orchestrator asks for short spans.
 * Row shape: { category, datetime, headline, id, image, related, source, summary, url }
 */
export async function fetchCompanyNews(
  ctx: ProviderContext,
  symbol: string,
  from: string,
  to: string
): Promise<unknown> {
  if (missingKey(ctx, "company news")) return [];
  return finnhubGet(ctx, "company-news", { symbol, from, to });
}

/** Row shape: { accessNumber, symbol, cik, form, filedDate, acceptedDate, reportUrl, filingUrl } */
export async function fetchSecFilings(
  ctx: ProviderContext,
  symbol: string,
  from: string,
  to: string
): Promise<unknown> {
  if (missingKey(ctx, "filings")) return [];
  return finnhubGet(ctx, "stock/filings", { symbol, from, to });
}

/**
 * Returns { data: [...], symbol } rather than a bare list.
 * Row shape: { name, share, change, filingDate, transactionDate, transactionCode, transactionPrice }
 */
export async function fetchInsiderTransactions(
  ctx: ProviderContext,
  symbol: string,
  from: string,
  to: string
): Promise<unknown> {
  if (missingKey(ctx, "insider transactions")) return [];
  return finnhubGet(ctx, "stock/insider-transactions", { symbol, from, to });
}

/** Logo URL from the company profile, or null when unknown. */
export async function fetchCompanyLogo(
  ctx: ProviderContext,
  symbol: string
): Promise<string | null> {
  if (missingKey(ctx, "profile")) return null;
  const data = await finnhubGet(ctx, "stock/profile2", { symbol });
  if (
    data &&
    typeof data === "object" &&
    "logo" in data &&
    typeof data.logo === "string" &&
    data.logo.trim()
  ) {
    return data.logo.trim();
  }
  return null;
}
