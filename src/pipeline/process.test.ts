import { describe, expect, it } from "vitest";
import { epoch } from "../testing/fixtures.js";
import { normalizeBundle, processEvents } from "./process.js";

const bundle = {
  macroNews: [
    {
      title: "Rates unchanged",
      summary: "Macro summary",
      time_published: "20240301T080000",
    },
  ],
  companyNews: [
    {
      headline: "rates unchanged ",
      summary: "Company take",
      datetime: epoch("2024-03-01T09:00:00Z"),
    },
    { headline: "missing the rest" },
  ],
  secFilings: [],
  insiderTransactions: [],
};

describe("processEvents", () => {
  it("normalizes every provider lazily in a fixed order", () => {
    const gen = normalizeBundle(bundle, "ACME");
    expect(gen.next().value?.type).toBe("MacroNews");
    expect(gen.next().value?.type).toBe("CompanyNews");
    expect(gen.next().done).toBe(true);
  });

  it("drops incomplete rows and collapses the shared story", () => {
    const events = processEvents(bundle, "ACME");
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      type: "CompanyNews",
      content: "Company take",
      time: "09:00",
      importance_rank: 2,
    });
  });
});
