import type { PipelineLogger } from "@/pipeline/types";

import type { ScenarioInput } from "../model/types";
import { toFloat, toText } from "../tabular/coerce";
import type { Table } from "../tabular/readTable";
import { cell, optionalSheet } from "./sheet";

// Both spellings occur in circulating model workbooks.
const WEIGHT_COLUMNS = ["probability", "propability"] as const;

export async function parseScenarios(
  table: Table | null,
  log: PipelineLogger
): Promise<ScenarioInput[]> {
  const weightColumn = WEIGHT_COLUMNS.find((column) => table?.columns.includes(column));
  const rows = await optionalSheet(
    table,
    "scenarios",
    ["name", weightColumn ?? "probability"],
    log
  );
  if (!rows || !weightColumn) {
    return [];
  }

  const scenarios: ScenarioInput[] = [];
  for (const row of rows) {
    const name = toText(cell(row, "name"));
    if (!name) {
      continue;
    }
    scenarios.push({ name, weight: toFloat(cell(row, weightColumn), 0) });
  }
  return scenarios;
}
