import { describe, expect, it } from "vitest";

import { marketPriceJoin, mergeSeries, nodeInflowJoin } from "@/lib/model/enrich";
import type { NewNode, SeriesMap } from "@/lib/model/types";

function node(name: string, inflow: NewNode["inflow"] = []): NewNode {
  return { name, isCommodity: false, isMarket: false, isRes: false, cost: [], inflow };
}

describe("mergeSeries", () => {
  it("replaces the field of matching entities and leaves the rest as they are", () => {
    const stale = node("tank", [{ scenario: "old", constant: 9 }]);
    const untouched = node("elc");
    const seriesMap: SeriesMap = new Map([
      ["tank", [{ scenario: null, constant: 1 }]],
      ["ghost", [{ scenario: "s1", series: [1, 2] }]],
    ]);

    const result = mergeSeries([stale, untouched], seriesMap, nodeInflowJoin);

    expect(result.entities).toEqual([node("tank", [{ scenario: null, constant: 1 }]), untouched]);
    expect(result.entities[1]).toBe(untouched);
    expect(result.matched).toBe(1);
    expect(result.unmatched).toEqual(["ghost"]);
    expect(stale.inflow).toEqual([{ scenario: "old", constant: 9 }]);
  });

  it("gives every entity its own copy of the descriptors", () => {
    const series = [1, 2, 3];
    const seriesMap: SeriesMap = new Map([["tank", [{ scenario: null, series }]]]);

    const [merged] = mergeSeries([node("tank")], seriesMap, nodeInflowJoin).entities;
    series.push(4);

    expect(merged.inflow).toEqual([{ scenario: null, series: [1, 2, 3] }]);
  });

  it("applying the same join twice does not accumulate", () => {
    const seriesMap: SeriesMap = new Map([["tank", [{ scenario: null, constant: 1 }]]]);

    const once = mergeSeries([node("tank")], seriesMap, nodeInflowJoin).entities;
    const twice = mergeSeries(once, seriesMap, nodeInflowJoin).entities;

    expect(twice[0].inflow).toEqual([{ scenario: null, constant: 1 }]);
  });

  it("names the field each join writes", () => {
    expect(nodeInflowJoin.field).toBe("inflow");
    expect(marketPriceJoin.field).toBe("price");
  });
});
