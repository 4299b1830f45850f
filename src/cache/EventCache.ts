import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { CacheCorruption } from "../errors.js";
import { errMessage, log } from "../logger.js";
import {
  systemClock,
  type CacheEntry,
  type CanonicalEvent,
  type Clock,
} from "../types.js";
import {
  isStale,
  parseCompactIsoDatetime,
  toCompactIsoDatetime,
} from "../utils/dates.js";

const CanonicalEventSchema = z.object({
  std_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  date: z.string(),
  time: z.string(),
  type: z.enum(["MacroNews", "CompanyNews", "SecFiling", "InsiderTransaction"]),
  title: z.string(),
  content: z.string(),
  source: z.string(),
  url: z.string(),
  importance_rank: z.number().nonnegative(),
});

const CacheEntrySchema = z.object({
  data: z.array(CanonicalEventSchema),
  timestamp: z.string(),
});

function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

/**
 * One JSON file per ticker holding the processed event list and when it was
 * built. Stamps are wall-clock time in `timeZone` (host zone when unset).
 */
export class EventCache {
  constructor(
    private readonly dir: string,
    private readonly ttlHours: number = 6,
    private readonly clock: Clock = systemClock,
    private readonly timeZone?: string
  ) {}

  pathFor(ticker: string): string {
    const safe = ticker.trim().toUpperCase().replace(/[^A-Z0-9.-]/g, "_");
    return path.join(this.dir, `${safe}.events.json`);
  }

  /** Parsed entry, or null on a miss. Corrupt files count as a miss. */
  async read(ticker: string): Promise<CacheEntry | null> {
    const file = this.pathFor(ticker);
    try {
      const text = await readFile(file, "utf8");
      return this.parse(text, file);
    } catch (e) {
      if (isNotFound(e)) return null;
      log.warn("[CACHE] ignoring unusable cache file", {
        file,
        error: errMessage(e),
      });
      return null;
    }
  }

  isFresh(entry: CacheEntry): boolean {
    const now = toCompactIsoDatetime(this.clock(), this.timeZone);
    return !isStale(entry.timestamp, now, this.ttlHours);
  }

  /** Replace the ticker's file with a new entry stamped now. */
  async write(ticker: string, events: CanonicalEvent[]): Promise<CacheEntry> {
    const file = this.pathFor(ticker);
    const entry: CacheEntry = {
      data: events,
      timestamp: toCompactIsoDatetime(this.clock(), this.timeZone),
    };
    await mkdir(this.dir, { recursive: true });
    // unique per write so concurrent writers never share a temp file
    const tmp = `${file}.${process.pid}.${randomUUID()}.tmp`;
    try {
      await writeFile(tmp, JSON.stringify(entry, null, 2), "utf8");
      await rename(tmp, file);
    } catch (e) {
      await rm(tmp, { force: true });
      throw e;
    }
    log.info("[CACHE] wrote", { file, events: events.length });
    return entry;
  }

  async invalidate(ticker: string): Promise<void> {
    await rm(this.pathFor(ticker), { force: true });
  }

  private parse(text: string, file: string): CacheEntry {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (e) {
      throw new CacheCorruption("invalid JSON", file, { cause: e });
    }

    const parsed = CacheEntrySchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new CacheCorruption(
        `unexpected shape at ${issue?.path.join(".") || "<root>"}: ${issue?.message}`,
        file
      );
    }

    try {
      parseCompactIsoDatetime(parsed.data.timestamp);
    } catch (e) {
      throw new CacheCorruption(
        `bad timestamp ${parsed.data.timestamp}`,
        file,
        { cause: e }
      );
    }
    return parsed.data;
  }
}
