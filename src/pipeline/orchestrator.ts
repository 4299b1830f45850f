// src/pipeline/orchestrator.ts
import type { AppConfig } from "../config.js";
import { FetchFailure } from "../errors.js";
import { errMessage, log } from "../logger.js";
import type { ProviderFetcher } from "../providers/index.js";
import { systemClock, type Clock, type RawEventBundle } from "../types.js";
import {
  backdate,
  splitRange,
  toCalendarDate,
  type DateSpan,
} from "../utils/dates.js";
import { runPool } from "../utils/pool.js";

export type FetchUnit = { provider: ProviderFetcher; span: DateSpan };

export type OrchestratorOptions = Pick<
  AppConfig,
  "BATCH_SIZE_DAYS" | "MAX_CONCURRENCY" | "EVENT_TIME_ZONE"
> & { clock?: Clock };

/**
 * Accepts a bare list or a `{ data: [...] }` wrapper; anything else is
 * treated as a malformed response.
 */
export function toRecordList(
  payload: unknown,
  provider: string,
  span?: DateSpan
): unknown[] {
  if (Array.isArray(payload)) return payload;
  if (payload && typeof payload === "object" && "data" in payload) {
    if (Array.isArray(payload.data)) return payload.data;
  }
  throw new FetchFailure("malformed response: expected a list", provider, {
    span,
  });
}

/** Any failure of one fetch unit as a FetchFailure carrying its span. */
export function asFetchFailure(
  e: unknown,
  provider: string,
  span: DateSpan
): FetchFailure {
  if (e instanceof FetchFailure && e.span) return e;
  if (e instanceof FetchFailure) {
    return new FetchFailure(e.message, e.provider, { cause: e.cause, span });
  }
  return new FetchFailure(errMessage(e), provider, { cause: e, span });
}

const emptyBundle = (): RawEventBundle => ({
  macroNews: [],
  companyNews: [],
  secFilings: [],
  insiderTransactions: [],
});

/** Fan-out across providers (and date spans for windowed ones), best effort. */
export class EventOrchestrator {
  private readonly clock: Clock;

  constructor(
    private readonly providers: ProviderFetcher[],
    private readonly opts: OrchestratorOptions
  ) {
    this.clock = opts.clock ?? systemClock;
  }

  /** Units for one call; windowed providers get one per span, newest first. */
  plan(lookbackDays: number): FetchUnit[] {
    const zone = this.opts.EVENT_TIME_ZONE;
    const end = toCalendarDate({ kind: "now" }, this.clock, zone);
    const start = toCalendarDate(
      { kind: "instant", at: backdate(lookbackDays, this.clock) },
      this.clock,
      zone
    );

    const units: FetchUnit[] = [];
    for (const provider of this.providers) {
      if (provider.windowed) {
        for (const span of splitRange(start, end, this.opts.BATCH_SIZE_DAYS)) {
          units.push({ provider, span });
        }
      } else {
        units.push({ provider, span: [start, end] });
      }
    }
    return units;
  }

  /** Never rejects: failed units contribute an empty slice. */
  async fetchEvents(
    ticker: string,
    lookbackDays: number
  ): Promise<RawEventBundle> {
    const units = this.plan(lookbackDays);
    const results = await runPool(
      units.map((unit) => () => this.runUnit(ticker, unit)),
      this.opts.MAX_CONCURRENCY
    );

    const bundle = emptyBundle();
    units.forEach((unit, i) => {
      const result = results[i];
      if (result instanceof FetchFailure) {
        log.warn("[ORCH] fetch failed — continuing with empty slice", {
          provider: result.provider,
          span: result.span,
          error: result.message,
        });
        return;
      }
      bundle[unit.provider.name].push(...result);
    });

    log.info("[ORCH] fetched raw records", {
      ticker,
      units: units.length,
      macroNews: bundle.macroNews.length,
      companyNews: bundle.companyNews.length,
      secFilings: bundle.secFilings.length,
      insiderTransactions: bundle.insiderTransactions.length,
    });
    return bundle;
  }

  /** Records of one unit, or its failure. Never rejects. */
  async runUnit(
    ticker: string,
    unit: FetchUnit
  ): Promise<unknown[] | FetchFailure> {
    const [from, to] = unit.span;
    try {
      const payload = await unit.provider.fetch(ticker, from, to);
      return toRecordList(payload, unit.provider.name, unit.span);
    } catch (e) {
      return asFetchFailure(e, unit.provider.name, unit.span);
    }
  }
}
