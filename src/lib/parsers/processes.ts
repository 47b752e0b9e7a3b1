import { PipelineError } from "@/pipeline/types";

import type { Conversion, NewProcess } from "../model/types";
import { toBool, toFloat, toText } from "../tabular/coerce";
import type { Table } from "../tabular/readTable";
import { cell, requireSheet } from "./sheet";

export const PROCESS_COLUMNS = [
  "process",
  "is_cf_fix",
  "is_online",
  "is_res",
  "conversion",
  "eff",
  "load_min",
  "load_max",
  "start_cost",
  "min_online",
  "min_offline",
  "max_online",
  "max_offline",
  "initial_state",
  "scenario_independent_online",
] as const;

const CONVERSION_LOOKUP = new Map<string, Conversion>([
  ["1", "UNIT"],
  ["unit", "UNIT"],
  ["u", "UNIT"],
  ["2", "TRANSFER"],
  ["transfer", "TRANSFER"],
  ["t", "TRANSFER"],
  ["3", "MARKET"],
  ["market", "MARKET"],
  ["m", "MARKET"],
]);

/**
 * Sheet code (1/2/3) or name to the Conversion enum. There is no safe default:
 * the kind changes how the model treats the process, so anything else throws.
 */
export function mapConversion(raw: string, processName?: string): Conversion {
  const key = raw.trim().toLowerCase();
  // "1.0" as written by some spreadsheet exports
  const normalized = /^\d+\.0+$/.test(key) ? key.replace(/\.0+$/, "") : key;
  const conversion = CONVERSION_LOOKUP.get(normalized);
  if (!conversion) {
    throw new PipelineError(
      "unknown_conversion",
      `Unsupported conversion value '${raw}'${processName ? ` for process '${processName}'` : ""}; expected 1/2/3 or Unit/Transfer/Market`,
      { value: raw, process: processName }
    );
  }
  return conversion;
}

export function parseProcesses(table: Table | null): NewProcess[] {
  const rows = requireSheet(table, "processes", PROCESS_COLUMNS);
  const processes: NewProcess[] = [];

  for (const row of rows) {
    const name = toText(cell(row, "process"));
    if (!name) {
      continue;
    }

    processes.push({
      name,
      conversion: mapConversion(cell(row, "conversion"), name),
      isCfFix: toBool(cell(row, "is_cf_fix")),
      isOnline: toBool(cell(row, "is_online")),
      isRes: toBool(cell(row, "is_res")),
      eff: toFloat(cell(row, "eff"), 1),
      loadMin: toFloat(cell(row, "load_min"), 0),
      loadMax: toFloat(cell(row, "load_max"), 1),
      startCost: toFloat(cell(row, "start_cost"), 0),
      minOnline: toFloat(cell(row, "min_online"), 0),
      maxOnline: toFloat(cell(row, "max_online"), 0),
      minOffline: toFloat(cell(row, "min_offline"), 0),
      maxOffline: toFloat(cell(row, "max_offline"), 0),
      initialState: toBool(cell(row, "initial_state")),
      isScenarioIndependent: toBool(cell(row, "scenario_independent_online")),
      cf: [],
      effTs: [],
      effOpsFun: [],
    });
  }

  return processes;
}
