import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import type { AppConfig } from "../config.js";

/** Shared client for every upstream; adapter is swappable for in-process stubs. */
export function createHttpClient(
  config: Pick<AppConfig, "HTTP_TIMEOUT_MS">,
  adapter?: AxiosAdapter
): AxiosInstance {
  return axios.create({
    timeout: config.HTTP_TIMEOUT_MS,
    headers: { "User-Agent": "ticker-event-feed/0.1" },
    ...(adapter ? { adapter } : {}),
  });
}

/** What every fetcher needs: a client and (maybe) a key. */
export type ProviderContext = {
  http: AxiosInstance;
  apiKey?: string;
};
