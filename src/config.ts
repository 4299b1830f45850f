import "dotenv/config";
import { z } from "zod";
import { isValidTimeZone } from "./utils/dates.js";

/** Validate & normalize environment variables */
const EnvSchema = z.object({
  TICKER: z
    .string()
    .trim()
    .min(1)
    .default("NVDA")
    .transform((s) => s.toUpperCase()),
  LOOKBACK_DAYS: z.coerce.number().int().positive().default(90),
  BATCH_SIZE_DAYS: z.coerce.number().int().positive().default(7),
  MAX_CONCURRENCY: z.coerce.number().int().positive().default(8),
  CACHE_DIR: z.string().default("./data/cache"),
  CACHE_TTL_HOURS: z.coerce.number().positive().default(6),
  DAY_EVENT_CAP: z.coerce.number().int().positive().default(20),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  // IANA zone for event dates and "today"; host zone when unset
  EVENT_TIME_ZONE: z
    .string()
    .trim()
    .refine(isValidTimeZone, { message: "Unknown IANA time zone" })
    .optional(),
  FINNHUB_API_KEY: z.string().optional(),
  ALPHA_VANTAGE_API_KEY: z.string().optional(),
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  // Blank values in .env count as unset.
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== "")
  );
  return Object.freeze(EnvSchema.parse(cleaned));
}

export const cfg = loadConfig();
