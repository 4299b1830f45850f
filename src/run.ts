#!/usr/bin/env node
// src/run.ts
import { parseArgs } from "node:util";
import { cfg } from "./config.js";
import { ParseError } from "./errors.js";
import { EventFeed } from "./feed/EventFeed.js";
import { renderDay } from "./feed/render.js";
import { errMessage, log } from "./logger.js";
import { toCalendarDate, toDisplayTriple } from "./utils/dates.js";

const USAGE = `Usage: ticker-event-feed [--ticker NVDA] [--date YYYY-MM-DD] [--refresh]`;

async function main() {
  const { values } = parseArgs({
    options: {
      ticker: { type: "string", short: "t" },
      date: { type: "string", short: "d" },
      refresh: { type: "boolean", short: "r", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return;
  }

  const feed = new EventFeed(values.ticker ?? cfg.TICKER, cfg);
  const day = values.date
    ? toCalendarDate({ kind: "calendar", value: values.date })
    : feed.today();

  const events = await feed.loadEventData(values.refresh ?? false);
  const todays = feed.eventsOnDay(events, day);

  const [, displayDate] = toDisplayTriple(day);
  console.log(renderDay(feed.ticker, displayDate, todays));
}

main().catch((e: unknown) => {
  if (e instanceof ParseError) {
    console.error(`${e.message}\n${USAGE}`);
  } else {
    log.error("[RUN] fatal", errMessage(e));
  }
  process.exitCode = 1;
});
