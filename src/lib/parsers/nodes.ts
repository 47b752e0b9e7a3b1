import type { NewNode, NewState, NodeStateInput } from "../model/types";
import { toBool, toFloat, toText } from "../tabular/coerce";
import type { Table } from "../tabular/readTable";
import { cell, requireSheet } from "./sheet";

export const NODE_COLUMNS = ["node", "is_commodity", "is_res", "is_market"] as const;

/**
 * One NewNode per named row. `cost` and `inflow` start empty and are filled
 * from the price and inflow sheets.
 */
export function parseNodes(table: Table | null): NewNode[] {
  const rows = requireSheet(table, "nodes", NODE_COLUMNS);
  const nodes: NewNode[] = [];

  for (const row of rows) {
    const name = toText(cell(row, "node"));
    if (!name) {
      continue;
    }

    nodes.push({
      name,
      isCommodity: toBool(cell(row, "is_commodity")),
      isMarket: toBool(cell(row, "is_market")),
      isRes: toBool(cell(row, "is_res")),
      cost: [],
      inflow: [],
    });
  }

  return nodes;
}

type NumericStateField = Exclude<keyof NewState, "isScenarioIndependent" | "isTemp">;

const NUMERIC_STATE_COLUMNS: Array<[string, NumericStateField]> = [
  ["in_max", "inMax"],
  ["out_max", "outMax"],
  ["state_loss_proportional", "stateLossProportional"],
  ["state_min", "stateMin"],
  ["state_max", "stateMax"],
  ["initial_state", "initialState"],
  ["t_e_conversion", "tEConversion"],
  ["residual_value", "residualValue"],
];

export function defaultNodeState(): NewState {
  return {
    inMax: 0,
    outMax: 0,
    stateLossProportional: 0,
    stateMin: 0,
    stateMax: 0,
    initialState: 0,
    isScenarioIndependent: true,
    isTemp: false,
    tEConversion: 1,
    residualValue: 0,
  };
}

/**
 * State parameters for every node whose `is_state` flag is set. Columns the
 * sheet does not have keep their defaults; unreadable numbers fall back to them.
 */
export function parseNodeStates(table: Table | null): NodeStateInput[] {
  const rows = requireSheet(table, "nodes", ["node"]);
  const columns = new Set(table?.columns ?? []);
  const nodeStates: NodeStateInput[] = [];

  if (!columns.has("is_state")) {
    return nodeStates;
  }

  for (const row of rows) {
    const nodeName = toText(cell(row, "node"));
    if (!nodeName || !toBool(cell(row, "is_state"))) {
      continue;
    }

    const state = defaultNodeState();
    for (const [column, field] of NUMERIC_STATE_COLUMNS) {
      if (columns.has(column)) {
        state[field] = toFloat(cell(row, column), state[field]);
      }
    }
    if (columns.has("scenario_independent_state")) {
      state.isScenarioIndependent = toBool(cell(row, "scenario_independent_state"));
    }
    if (columns.has("is_temp")) {
      state.isTemp = toBool(cell(row, "is_temp"));
    }

    nodeStates.push({ nodeName, state });
  }

  return nodeStates;
}
