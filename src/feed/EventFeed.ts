// src/feed/EventFeed.ts
import type { AxiosInstance } from "axios";
import { EventCache } from "../cache/EventCache.js";
import type { AppConfig } from "../config.js";
import { errMessage, log } from "../logger.js";
import { eventsOnDay } from "../pipeline/dayEvents.js";
import { EventOrchestrator } from "../pipeline/orchestrator.js";
import { processEvents } from "../pipeline/process.js";
import { fetchDailyPrices } from "../providers/alphavantage.js";
import { fetchCompanyLogo } from "../providers/finnhub.js";
import { createHttpClient } from "../providers/http.js";
import { createProviders, type ProviderFetcher } from "../providers/index.js";
import {
  systemClock,
  type CanonicalEvent,
  type Clock,
  type PriceBar,
} from "../types.js";
import { backdate, toCalendarDate } from "../utils/dates.js";

export type EventFeedDeps = {
  http?: AxiosInstance;
  providers?: ProviderFetcher[];
  cache?: EventCache;
  clock?: Clock;
};

/**
 * What the dashboard talks to: cached events, price bars, logo and the
 * per-day view. None of these reject; upstream trouble shows up as
 * missing data.
 */
export class EventFeed {
  readonly ticker: string;
  private readonly http: AxiosInstance;
  private readonly orchestrator: EventOrchestrator;
  private readonly cache: EventCache;
  private readonly clock: Clock;

  constructor(
    ticker: string,
    private readonly config: AppConfig,
    deps: EventFeedDeps = {}
  ) {
    this.ticker = ticker.trim().toUpperCase();
    this.clock = deps.clock ?? systemClock;
    this.http = deps.http ?? createHttpClient(config);
    this.orchestrator = new EventOrchestrator(
      deps.providers ?? createProviders(config, this.http),
      {
        BATCH_SIZE_DAYS: config.BATCH_SIZE_DAYS,
        MAX_CONCURRENCY: config.MAX_CONCURRENCY,
        EVENT_TIME_ZONE: config.EVENT_TIME_ZONE,
        clock: this.clock,
      }
    );
    this.cache =
      deps.cache ??
      new EventCache(
        config.CACHE_DIR,
        config.CACHE_TTL_HOURS,
        this.clock,
        config.EVENT_TIME_ZONE
      );
  }

  /** Fresh cache unless forced; otherwise fetch → normalize → dedupe → write. */
  async loadEventData(forceRefresh = false): Promise<CanonicalEvent[]> {
    if (!forceRefresh) {
      const entry = await this.cache.read(this.ticker);
      if (entry && this.cache.isFresh(entry)) {
        log.info("[FEED] cache hit", {
          ticker: this.ticker,
          timestamp: entry.timestamp,
          events: entry.data.length,
        });
        return entry.data;
      }
    }

    try {
      await this.cache.invalidate(this.ticker);
    } catch (e) {
      log.warn("[FEED] could not remove old cache file", {
        ticker: this.ticker,
        error: errMessage(e),
      });
    }

    const bundle = await this.orchestrator.fetchEvents(
      this.ticker,
      this.config.LOOKBACK_DAYS
    );
    const events = processEvents(
      bundle,
      this.ticker,
      this.config.EVENT_TIME_ZONE
    );

    try {
      await this.cache.write(this.ticker, events);
    } catch (e) {
      log.error("[FEED] cache write failed", {
        ticker: this.ticker,
        error: errMessage(e),
      });
    }
    return events;
  }

  /** Daily OHLCV for the lookback window; [] when prices can't be had. */
  async loadPriceData(): Promise<PriceBar[]> {
    const from = toCalendarDate(
      { kind: "instant", at: backdate(this.config.LOOKBACK_DAYS, this.clock) },
      this.clock,
      this.config.EVENT_TIME_ZONE
    );
    try {
      return await fetchDailyPrices(
        { http: this.http, apiKey: this.config.ALPHA_VANTAGE_API_KEY },
        this.ticker,
        from,
        this.config.LOOKBACK_DAYS
      );
    } catch (e) {
      log.warn("[FEED] price fetch failed", {
        ticker: this.ticker,
        error: errMessage(e),
      });
      return [];
    }
  }

  async loadLogo(): Promise<string | null> {
    try {
      return await fetchCompanyLogo(
        { http: this.http, apiKey: this.config.FINNHUB_API_KEY },
        this.ticker
      );
    } catch (e) {
      log.warn("[FEED] logo fetch failed", {
        ticker: this.ticker,
        error: errMessage(e),
      });
      return null;
    }
  }

  /** Today in EVENT_TIME_ZONE. */
  today(): string {
    return toCalendarDate(
      { kind: "now" },
      this.clock,
      this.config.EVENT_TIME_ZONE
    );
  }

  /** Events for `date` (today by default), capped at DAY_EVENT_CAP. */
  eventsOnDay(events: readonly CanonicalEvent[], date?: string): CanonicalEvent[] {
    return eventsOnDay(
      events,
      date ?? this.today(),
      this.config.DAY_EVENT_CAP
    );
  }
}
