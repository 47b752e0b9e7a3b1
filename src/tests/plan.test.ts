import { describe, expect, it } from "vitest";

import { emptyGroupSheet } from "@/lib/parsers/groups";
import { defaultNodeState } from "@/lib/parsers/nodes";
import { MUTATIONS } from "@/lib/graphql/mutations";
import { buildEnvelope, itemFileName, sanitizeFileName } from "@/lib/graphql/payloads";
import { BATCH_ORDER, buildPayloadBatches } from "@/lib/graphql/plan";
import type { EnergyModel } from "@/lib/model/types";

function emptyModel(): EnergyModel {
  return {
    setup: null,
    scenarios: [],
    nodes: [],
    nodeStates: [],
    processes: [],
    groups: emptyGroupSheet(),
    topologies: [],
    markets: [],
    risks: [],
  };
}

const topology = {
  capacity: 1,
  vomCost: 0,
  rampUp: 0,
  rampDown: 0,
  initialLoad: 0,
  initialFlow: 0,
  capTs: [],
};

describe("sanitizeFileName", () => {
  it("keeps letters, digits, space, underscore and hyphen", () => {
    expect(sanitizeFileName("a/b c")).toBe("ab_c");
    expect(sanitizeFileName("Höyry-1 (x)")).toBe("Höyry-1_x");
    expect(sanitizeFileName(" tank ")).toBe("tank");
  });

  it("falls back when nothing survives", () => {
    expect(sanitizeFileName("//")).toBe("unnamed");
    expect(itemFileName("node", "??")).toBe("node_unnamed.json");
  });
});

describe("buildEnvelope", () => {
  it("pairs the mutation document with its variables", () => {
    expect(buildEnvelope("risk", { risk: { parameter: "alfa", value: 0.1 } })).toEqual({
      query: MUTATIONS.risk,
      variables: { risk: { parameter: "alfa", value: 0.1 } },
    });
  });
});

describe("buildPayloadBatches", () => {
  it("returns every batch in dependency order", () => {
    const batches = buildPayloadBatches(emptyModel());

    expect(batches.map((b) => b.id)).toEqual([...BATCH_ORDER]);
    expect(batches.every((b) => b.items.length === 0)).toBe(true);
  });

  it("writes setup as a single file without a combined file", () => {
    const [setupBatch] = buildPayloadBatches({ ...emptyModel(), setup: { useReserves: true } });

    expect(setupBatch.combinedFileName).toBeNull();
    expect(setupBatch.items).toEqual([
      {
        label: "setup",
        fileName: "inputdatasetup.json",
        envelope: { query: MUTATIONS.setup, variables: { setup: { useReserves: true } } },
      },
    ]);
  });

  it("names files per record and keeps parse order", () => {
    const batches = buildPayloadBatches({
      ...emptyModel(),
      nodeStates: [{ nodeName: "tank 1", state: defaultNodeState() }],
      groups: {
        ...emptyGroupSheet(),
        nodeMemberships: [
          { nodeName: "tank", groupName: "storage" },
          { nodeName: "elc", groupName: "all" },
        ],
      },
      topologies: [
        { processName: "heater", sourceNodeName: "elc", sinkNodeName: null, topology },
        { processName: "heater", sourceNodeName: null, sinkNodeName: "dh", topology },
      ],
      scenarios: [
        { name: "s2", weight: 0.5 },
        { name: "s1", weight: 0.5 },
      ],
    });
    const byId = new Map(batches.map((b) => [b.id, b]));

    expect(byId.get("scenarios")?.items.map((i) => i.fileName)).toEqual([
      "scenario_s2.json",
      "scenario_s1.json",
    ]);
    expect(byId.get("scenarios")?.combinedFileName).toBe("scenarios_all.json");
    expect(byId.get("nodeStates")?.items[0].fileName).toBe("node_state_tank_1.json");
    expect(byId.get("nodeGroupMemberships")?.items.map((i) => i.fileName)).toEqual([
      "node_group_membership_tank_storage.json",
      "node_group_membership_elc_all.json",
    ]);
    expect(byId.get("topologies")?.items.map((i) => i.fileName)).toEqual([
      "topology_elc_heater.json",
      "topology_heater_dh.json",
    ]);
    expect(byId.get("topologies")?.items[0].envelope.variables).toEqual({
      processName: "heater",
      sourceNodeName: "elc",
      sinkNodeName: null,
      topology,
    });
  });
});
