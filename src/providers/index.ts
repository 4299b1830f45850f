import type { AxiosInstance } from "axios";
import type { AppConfig } from "../config.js";
import type { ProviderName } from "../types.js";
import { fetchMacroNews } from "./alphavantage.js";
import {
  fetchCompanyNews,
  fetchInsiderTransactions,
  fetchSecFilings,
} from "./finnhub.js";
import { createHttpClient, type ProviderContext } from "./http.js";

/** One upstream event source as the orchestrator sees it. */
export interface ProviderFetcher {
  name: ProviderName;
  /** Call once per BATCH_SIZE_DAYS span instead of once for the whole window. */
  windowed: boolean;
  /** Raw body for [from, to]; throws on transport failure. */
  fetch(symbol: string, from: string, to: string): Promise<unknown>;
}

export function createProviders(
  config: Pick<
    AppConfig,
    "FINNHUB_API_KEY" | "ALPHA_VANTAGE_API_KEY" | "HTTP_TIMEOUT_MS"
  >,
  http: AxiosInstance = createHttpClient(config)
): ProviderFetcher[] {
  const finnhub: ProviderContext = { http, apiKey: config.FINNHUB_API_KEY };
  const alphav: ProviderContext = {
    http,
    apiKey: config.ALPHA_VANTAGE_API_KEY,
  };

  return [
    {
      name: "macroNews",
      windowed: false,
      fetch: (symbol, from, to) => fetchMacroNews(alphav, symbol, from, to),
    },
    {
      name: "companyNews",
      windowed: true,
      fetch: (symbol, from, to) => fetchCompanyNews(finnhub, symbol, from, to),
    },
    {
      name: "secFilings",
      windowed: false,
      fetch: (symbol, from, to) => fetchSecFilings(finnhub, symbol, from, to),
    },
    {
      name: "insiderTransactions",
      windowed: false,
      fetch: (symbol, from, to) =>
        fetchInsiderTransactions(finnhub, symbol, from, to),
    },
  ];
}
