import type { PipelineLogger } from "@/pipeline/types";

import type { InputDataSetup } from "../model/types";
import { parseDecimal, toText } from "../tabular/coerce";
import type { Table } from "../tabular/readTable";
import { cell, optionalSheet } from "./sheet";

const SETUP_TRUE_WORDS = new Set(["1", "true", "yes"]);

/**
 * Setup flags are stricter than the entity sheets: only `1`, `true` and `yes`
 * (or a non-zero number) are true. An empty cell is sent as null.
 */
export function setupFlag(text: string): boolean | null {
  const v = text.trim().toLowerCase();
  if (!v) {
    return null;
  }
  if (SETUP_TRUE_WORDS.has(v)) {
    return true;
  }
  const numeric = parseDecimal(v);
  return numeric !== null && Math.trunc(numeric) !== 0;
}

function intOrNull(text: string): number | null {
  const parsed = parseDecimal(text);
  return parsed === null ? null : Math.trunc(parsed);
}

/**
 * Sets the field a setup parameter maps to. Returns false for parameters the
 * service does not know.
 */
function applyParameter(setup: InputDataSetup, parameter: string, text: string): boolean {
  switch (parameter) {
    case "use_market_bids":
      setup.useMarketBids = setupFlag(text);
      return true;
    case "use_reserves":
      setup.useReserves = setupFlag(text);
      return true;
    case "use_reserve_realisation":
      setup.useReserveRealisation = setupFlag(text);
      return true;
    case "use_node_dummy_variables":
      setup.useNodeDummyVariables = setupFlag(text);
      return true;
    case "use_ramp_dummy_variables":
      setup.useRampDummyVariables = setupFlag(text);
      return true;
    case "common_start_timesteps":
      setup.commonTimesteps = intOrNull(text);
      return true;
    case "common_scenario_name":
      setup.commonScenarioName = text || null;
      return true;
    case "node_dummy_variable_cost":
      setup.nodeDummyVariableCost = parseDecimal(text);
      return true;
    case "ramp_dummy_variable_cost":
      setup.rampDummyVariableCost = parseDecimal(text);
      return true;
    default:
      return false;
  }
}

/**
 * Global parameters from the `parameter,value` setup sheet. Parameters the sheet
 * does not mention are left out. Returns null when the sheet is absent.
 */
export async function parseSetup(
  table: Table | null,
  log: PipelineLogger
): Promise<InputDataSetup | null> {
  if (!table) {
    await log({ level: "warn", message: "No setup sheet found, skipping setup" });
    return null;
  }

  const rows = await optionalSheet(table, "setup", ["parameter", "value"], log);
  const setup: InputDataSetup = {};
  const ignored: string[] = [];

  for (const row of rows ?? []) {
    const parameter = toText(cell(row, "parameter"));
    if (!parameter) {
      continue;
    }
    if (!applyParameter(setup, parameter, toText(cell(row, "value")))) {
      ignored.push(parameter);
    }
  }

  if (ignored.length > 0) {
    await log({
      level: "debug",
      message: `Ignored ${ignored.length} unknown setup parameter(s)`,
      meta: { ignored },
    });
  }

  return setup;
}
