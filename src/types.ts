/**
 * Shared types across the pipeline
 */
export type EventType =
  | "MacroNews"
  | "CompanyNews"
  | "SecFiling"
  | "InsiderTransaction";

/** Baseline importance per event class (higher = shown first when a day overflows). */
export const EVENT_BASE_WEIGHT: Readonly<Record<EventType, number>> = {
  SecFiling: 3.0,
  InsiderTransaction: 2.5,
  CompanyNews: 2.0,
  MacroNews: 1.0,
};

export const EVENT_TYPE_LABEL: Readonly<Record<EventType, string>> = {
  SecFiling: "SEC Filing",
  InsiderTransaction: "Insider Transaction",
  CompanyNews: "News",
  MacroNews: "Macro News",
};

export type CanonicalEvent = {
  std_date: string; // YYYY-MM-DD
  date: string; // display only
  time: string; // HH:MM or ""
  type: EventType;
  title: string;
  content: string;
  source: string;
  url: string; // absolute or "#"
  importance_rank: number;
};

export type ProviderName =
  | "macroNews"
  | "companyNews"
  | "secFilings"
  | "insiderTransactions";

/** Provider name → concatenated raw records, not yet validated. */
export type RawEventBundle = Record<ProviderName, unknown[]>;

export type CacheEntry = {
  data: CanonicalEvent[];
  timestamp: string; // YYYYMMDDTHHMM
};

export type PriceBar = {
  date: string; // YYYY-MM-DD
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
};

/** Source of "now"; injected so tests can pin time. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
