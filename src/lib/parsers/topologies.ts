import type { PipelineLogger } from "@/pipeline/types";

import type { TopologyInput } from "../model/types";
import { toFloat, toText } from "../tabular/coerce";
import type { Table } from "../tabular/readTable";
import { cell, optionalSheet } from "./sheet";

export const TOPOLOGY_COLUMNS = [
  "process",
  "source_sink",
  "node",
  "capacity",
  "vom_cost",
  "ramp_up",
  "ramp_down",
  "initial_load",
  "initial_flow",
] as const;

const SOURCE_ROLES = new Set(["source", "src", "s", "in", "input"]);
const SINK_ROLES = new Set(["sink", "snk", "d", "out", "output"]);

export type TopologyEnds = {
  sourceNodeName: string | null;
  sinkNodeName: string | null;
};

/**
 * Places the node at the source or the sink end of the link. Returns null for
 * a role that is neither.
 */
export function splitSourceSink(role: string, nodeName: string): TopologyEnds | null {
  const r = role.trim().toLowerCase();
  if (SOURCE_ROLES.has(r)) {
    return { sourceNodeName: nodeName, sinkNodeName: null };
  }
  if (SINK_ROLES.has(r)) {
    return { sourceNodeName: null, sinkNodeName: nodeName };
  }
  return null;
}

export async function parseTopologies(
  table: Table | null,
  log: PipelineLogger
): Promise<TopologyInput[]> {
  const rows = await optionalSheet(table, "process_topology", TOPOLOGY_COLUMNS, log);
  if (!rows || !table) {
    return [];
  }

  const topologies: TopologyInput[] = [];

  for (const [index, row] of rows.entries()) {
    const processName = toText(cell(row, "process"));
    const nodeName = toText(cell(row, "node"));
    if (!processName || !nodeName) {
      continue;
    }

    const role = cell(row, "source_sink");
    const ends = splitSourceSink(role, nodeName);
    if (!ends) {
      await log({
        level: "warn",
        message: `Unknown source_sink value '${role.trim()}', topology row skipped`,
        meta: { row: table.rowNumbers[index], process: processName, node: nodeName },
      });
      continue;
    }

    topologies.push({
      processName,
      ...ends,
      topology: {
        capacity: toFloat(cell(row, "capacity"), 0),
        vomCost: toFloat(cell(row, "vom_cost"), 0),
        rampUp: toFloat(cell(row, "ramp_up"), 0),
        rampDown: toFloat(cell(row, "ramp_down"), 0),
        initialLoad: toFloat(cell(row, "initial_load"), 0),
        initialFlow: toFloat(cell(row, "initial_flow"), 0),
        capTs: [],
      },
    });
  }

  return topologies;
}
