import type { CanonicalEvent, RawEventBundle } from "../types.js";
import { dedupeEvents } from "./dedupe.js";
import { normalizeInsiderTransactions } from "./insider.js";
import {
  normalizeCompanyNews,
  normalizeMacroNews,
  normalizeSecFilings,
} from "./normalize.js";

/** Every provider's records as canonical events, lazily. */
export function* normalizeBundle(
  bundle: RawEventBundle,
  ticker: string,
  timeZone?: string
): Generator<CanonicalEvent> {
  yield* normalizeMacroNews(bundle.macroNews, ticker, timeZone);
  yield* normalizeCompanyNews(bundle.companyNews, timeZone);
  yield* normalizeSecFilings(bundle.secFilings, timeZone);
  yield* normalizeInsiderTransactions(bundle.insiderTransactions, ticker, timeZone);
}

/** Raw bundle → normalized, deduplicated event list. */
export function processEvents(
  bundle: RawEventBundle,
  ticker: string,
  timeZone?: string
): CanonicalEvent[] {
  return dedupeEvents(normalizeBundle(bundle, ticker, timeZone));
}
