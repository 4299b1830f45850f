import { describe, expect, it } from "vitest";
import { dedupeEvents, dedupeKey } from "./dedupe.js";
import { makeEvent } from "../testing/fixtures.js";

describe("dedupeKey", () => {
  it("trims and case-folds the title", () => {
    expect(dedupeKey({ std_date: "2024-03-01", title: "  Fed Holds RATES " })).toBe(
      "2024-03-01|fed holds rates"
    );
  });
});

describe("dedupeEvents", () => {
  it("keeps the higher-ranked of two same-day macro stories", () => {
    const low = makeEvent({ type: "MacroNews", title: "Fed Holds Rates ", importance_rank: 1.2 });
    const high = makeEvent({ type: "MacroNews", title: "fed holds rates", importance_rank: 1.8 });
    expect(dedupeEvents([low, high])).toEqual([high]);
    expect(dedupeEvents([high, low])).toEqual([high]);
  });

  it("dedupes macro against company news", () => {
    const macro = makeEvent({ type: "MacroNews", title: "Chip tariffs", importance_rank: 1.5 });
    const company = makeEvent({ type: "CompanyNews", title: "CHIP TARIFFS", importance_rank: 2 });
    expect(dedupeEvents([macro, company])).toEqual([company]);
  });

  it("keeps the first copy on equal rank", () => {
    const a = makeEvent({ source: "first" });
    const b = makeEvent({ source: "second" });
    expect(dedupeEvents([a, b])).toEqual([a]);
  });

  it("keeps same title on different days", () => {
    const a = makeEvent({ std_date: "2024-03-01" });
    const b = makeEvent({ std_date: "2024-03-02" });
    expect(dedupeEvents([a, b])).toEqual([a, b]);
  });

  it("passes filings and insider events through, ahead of news", () => {
    const news = makeEvent();
    const f1 = makeEvent({ type: "SecFiling", title: "Form 4", importance_rank: 3 });
    const f2 = makeEvent({ type: "SecFiling", title: "Form 4", importance_rank: 3 });
    const ins = makeEvent({ type: "InsiderTransaction", title: "X net acquired 5 shares" });
    expect(dedupeEvents([news, f1, f2, ins])).toEqual([f1, f2, ins, news]);
  });

  it("accepts a lazy sequence", () => {
    function* gen() {
      yield makeEvent({ title: "a" });
      yield makeEvent({ title: "A" });
    }
    expect(dedupeEvents(gen())).toHaveLength(1);
  });
});
