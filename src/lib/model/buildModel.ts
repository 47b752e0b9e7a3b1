import type { PipelineLogger } from "@/pipeline/types";

import { parseGroups } from "../parsers/groups";
import { parseMarkets } from "../parsers/markets";
import { parseNodeStates, parseNodes } from "../parsers/nodes";
import { parseProcesses } from "../parsers/processes";
import { parseRisks } from "../parsers/risk";
import { parseScenarios } from "../parsers/scenarios";
import { parseSetup } from "../parsers/setup";
import { parseTopologies } from "../parsers/topologies";
import { readWideSeries } from "../series/wideSeries";
import type { SheetSource } from "../tabular/readTable";
import {
  marketPriceJoin,
  mergeSeries,
  nodeCostJoin,
  nodeInflowJoin,
  processCfJoin,
  type SeriesJoin,
} from "./enrich";
import type { EnergyModel, SeriesMap } from "./types";

/**
 * Sheet (CSV file) names, without the extension.
 */
export type SheetLayout = {
  setup: string;
  nodes: string;
  processes: string;
  topology: string;
  markets: string;
  groups: string;
  risk: string;
  scenarios: string;
  inflow: string;
  nodePrice: string;
  cf: string;
  marketPrices: string;
};

export const DEFAULT_SHEETS: SheetLayout = {
  setup: "setup",
  nodes: "nodes",
  processes: "processes",
  topology: "process_topology",
  markets: "markets",
  groups: "groups",
  risk: "risk",
  scenarios: "scenarios",
  inflow: "inflow",
  nodePrice: "price",
  cf: "cf",
  marketPrices: "market_prices",
};

async function enrich<T>(
  entities: T[],
  seriesMap: SeriesMap,
  join: SeriesJoin<T>,
  log: PipelineLogger
): Promise<T[]> {
  const result = mergeSeries(entities, seriesMap, join);
  await log({
    level: "debug",
    message: `Attached ${join.field} series to ${result.matched} entit${result.matched === 1 ? "y" : "ies"}`,
    meta: { field: join.field, matched: result.matched, unmatched: result.unmatched },
  });
  return result.entities;
}

/**
 * Parses every sheet of a source into the model and attaches the time series.
 * Throws a PipelineError when a mandatory sheet cannot be used.
 */
export async function buildModel(
  source: SheetSource,
  log: PipelineLogger,
  sheets: SheetLayout = DEFAULT_SHEETS
): Promise<EnergyModel> {
  const nodesTable = source.table(sheets.nodes);
  const baseNodes = parseNodes(nodesTable);
  const nodeStates = parseNodeStates(nodesTable);
  const baseProcesses = parseProcesses(source.table(sheets.processes));
  const baseMarkets = await parseMarkets(source.table(sheets.markets), log);

  await log({
    level: "info",
    message: "Parsed base entities",
    meta: {
      source: source.location,
      nodes: baseNodes.length,
      nodeStates: nodeStates.length,
      processes: baseProcesses.length,
      markets: baseMarkets.length,
    },
  });

  const setup = await parseSetup(source.table(sheets.setup), log);
  const scenarios = await parseScenarios(source.table(sheets.scenarios), log);
  const groups = await parseGroups(source.table(sheets.groups), log);
  const topologies = await parseTopologies(source.table(sheets.topology), log);
  const risks = await parseRisks(source.table(sheets.risk), log);

  const nodeCost = await readWideSeries(source.table(sheets.nodePrice), "node price", log);
  const inflow = await readWideSeries(source.table(sheets.inflow), "inflow", log);
  const cf = await readWideSeries(source.table(sheets.cf), "cf", log);
  const marketPrices = await readWideSeries(source.table(sheets.marketPrices), "market price", log);

  const withCost = await enrich(baseNodes, nodeCost, nodeCostJoin, log);
  const nodes = await enrich(withCost, inflow, nodeInflowJoin, log);
  const processes = await enrich(baseProcesses, cf, processCfJoin, log);
  const markets = await enrich(baseMarkets, marketPrices, marketPriceJoin, log);

  return { setup, scenarios, nodes, nodeStates, processes, groups, topologies, markets, risks };
}
