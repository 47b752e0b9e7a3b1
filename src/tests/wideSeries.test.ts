import { describe, expect, it } from "vitest";

import {
  decodeWideSeries,
  parseSeriesHeader,
  readWideSeries,
  toValueDescriptor,
} from "@/lib/series/wideSeries";
import { readTable } from "@/lib/tabular/readTable";

import { collectLogs, makeTempDir, table, warnings, writeFile } from "./helpers";

describe("parseSeriesHeader", () => {
  it("treats ALL and a bare name the same way", () => {
    expect(parseSeriesHeader("nodeA,ALL")).toEqual({ entity: "nodeA", scenario: null });
    expect(parseSeriesHeader("nodeA")).toEqual({ entity: "nodeA", scenario: null });
    expect(parseSeriesHeader(" nodeA , all ")).toEqual({ entity: "nodeA", scenario: null });
  });

  it("splits on the first comma only", () => {
    expect(parseSeriesHeader("nodeA, s1,b")).toEqual({ entity: "nodeA", scenario: "s1,b" });
  });
});

describe("toValueDescriptor", () => {
  it("collapses equal values to a constant", () => {
    expect(toValueDescriptor("s1", [2, 2, 2])).toEqual({ scenario: "s1", constant: 2 });
  });

  it("keeps differing values as a series in order", () => {
    expect(toValueDescriptor(null, [3, 1, 2])).toEqual({ scenario: null, series: [3, 1, 2] });
  });

  it("does not round away floating noise", () => {
    expect(toValueDescriptor(null, [0.3, 0.1 + 0.2])).toEqual({
      scenario: null,
      series: [0.3, 0.1 + 0.2],
    });
  });
});

describe("decodeWideSeries", () => {
  it("decodes each column into a descriptor per entity", () => {
    const decoded = decodeWideSeries(
      table(
        ["t", "npe,s1", "npe,s2", "dh,ALL"],
        [
          ["1", "53,02752", "40", "1"],
          ["2", "53.02752", "41", "1"],
        ]
      )
    );

    expect([...decoded.entries()]).toEqual([
      [
        "npe",
        [
          { scenario: "s1", constant: 53.02752 },
          { scenario: "s2", series: [40, 41] },
        ],
      ],
      ["dh", [{ scenario: null, constant: 1 }]],
    ]);
  });

  it("drops unreadable cells and skips columns without numbers", () => {
    const decoded = decodeWideSeries(
      table(
        ["t", "a", "b", ""],
        [
          ["1", "5", "x", "1"],
          ["2", "", "", "2"],
          ["3", "7", "-", "3"],
        ]
      )
    );

    expect(decoded.get("a")).toEqual([{ scenario: null, series: [5, 7] }]);
    expect(decoded.has("b")).toBe(false);
    expect(decoded.size).toBe(1);
  });

  it("ignores the time column", () => {
    const decoded = decodeWideSeries(table(["t"], [["1"], ["2"]]));
    expect(decoded.size).toBe(0);
  });
});

describe("readWideSeries", () => {
  it("returns an empty map with a warning when the sheet is missing", async () => {
    const { log, entries } = collectLogs();

    const decoded = await readWideSeries(null, "inflow", log);

    expect(decoded.size).toBe(0);
    expect(warnings(entries)).toEqual(["No inflow sheet found, skipping inflow"]);
  });

  it("returns an empty map for a sheet without data columns", async () => {
    const { log, entries } = collectLogs();

    expect((await readWideSeries(table(["t"], [["1"]]), "cf", log)).size).toBe(0);
    expect(warnings(entries)).toEqual(["cf sheet has no data columns, skipping cf"]);
  });

  it("decodes a sheet read from disk", async () => {
    const { log } = collectLogs();
    const dir = makeTempDir();
    const filePath = writeFile(dir, "inflow.csv", 't,"tank1,ALL"\n1,1.0\n2,1.0\n3,1.0\n');

    const decoded = await readWideSeries(readTable(filePath), "inflow", log);

    expect(decoded.get("tank1")).toEqual([{ scenario: null, constant: 1 }]);
  });
});
