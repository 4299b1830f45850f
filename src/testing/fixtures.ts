import type {
  AxiosAdapter,
  AxiosResponse,
  InternalAxiosRequestConfig,
} from "axios";
import { mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import type { CanonicalEvent, Clock } from "../types.js";

/** A canonical event with overridable fields. */
export function makeEvent(over: Partial<CanonicalEvent> = {}): CanonicalEvent {
  return {
    std_date: "2024-03-01",
    date: "Mar 01, 2024 - Fri",
    time: "09:30",
    type: "CompanyNews",
    title: "Something happened",
    content: "Details.",
    source: "Example Times",
    url: "https://times.example.com/a",
    importance_rank: 2,
    ...over,
  };
}

export const fixedClock =
  (iso: string): Clock =>
  () =>
    new Date(iso);

/** Unix seconds for an ISO instant. */
export const epoch = (iso: string) => Date.parse(iso) / 1000;

/**
 * In-process axios adapter: every request is answered with whatever the
 * handler returns (status 200), or rejected with whatever it throws.
 */
export function stubAdapter(
  handler: (config: InternalAxiosRequestConfig) => unknown
): AxiosAdapter & { calls: InternalAxiosRequestConfig[] } {
  const calls: InternalAxiosRequestConfig[] = [];
  const adapter = async (
    config: InternalAxiosRequestConfig
  ): Promise<AxiosResponse> => {
    calls.push(config);
    return {
      data: handler(config),
      status: 200,
      statusText: "OK",
      headers: {},
      config,
    };
  };
  return Object.assign(adapter, { calls });
}

export function tempDir(): Promise<string> {
  return mkdtemp(path.join(tmpdir(), "ticker-event-feed-"));
}
