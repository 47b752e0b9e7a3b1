import type { PipelineLogger } from "@/pipeline/types";

import type { NewRisk } from "../model/types";
import { toFloat, toText } from "../tabular/coerce";
import type { Table } from "../tabular/readTable";
import { cell, optionalSheet } from "./sheet";

export async function parseRisks(table: Table | null, log: PipelineLogger): Promise<NewRisk[]> {
  const rows = await optionalSheet(table, "risk", ["parameter", "value"], log);
  if (!rows) {
    return [];
  }

  const risks: NewRisk[] = [];
  for (const row of rows) {
    const parameter = toText(cell(row, "parameter"));
    if (!parameter) {
      continue;
    }
    risks.push({ parameter, value: toFloat(cell(row, "value"), 0) });
  }
  return risks;
}
