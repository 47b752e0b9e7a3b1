import { PipelineError, type PipelineLogger } from "@/pipeline/types";

import { missingColumns, tableRecords, type Table, type TableRow } from "../tabular/readTable";

/**
 * Rows of a sheet the model cannot be built without. A missing file or a
 * missing required column aborts parsing of that entity type.
 */
export function requireSheet(
  table: Table | null,
  sheet: string,
  required: readonly string[]
): TableRow[] {
  if (!table) {
    throw new PipelineError("missing_source", `${sheet} sheet not found`, { sheet });
  }

  const missing = missingColumns(table, required);
  if (missing.length > 0) {
    throw new PipelineError(
      "missing_column",
      `${sheet} sheet is missing required column '${missing[0]}'. Available columns: ${table.columns.join(", ")}`,
      { sheet, path: table.path, missing, columns: table.columns }
    );
  }

  return tableRecords(table);
}

/**
 * Rows of an optional sheet, or null when the sheet is absent, empty or lacks
 * a required column. Each of those is logged as a warning.
 */
export async function optionalSheet(
  table: Table | null,
  sheet: string,
  required: readonly string[],
  log: PipelineLogger
): Promise<TableRow[] | null> {
  if (!table) {
    await log({ level: "warn", message: `No ${sheet} sheet found, skipping ${sheet}` });
    return null;
  }
  if (table.rows.length === 0) {
    await log({
      level: "warn",
      message: `${sheet} sheet has no data rows, skipping ${sheet}`,
      meta: { path: table.path },
    });
    return null;
  }

  const missing = missingColumns(table, required);
  if (missing.length > 0) {
    await log({
      level: "warn",
      message: `${sheet} sheet is missing column '${missing[0]}', skipping ${sheet}`,
      meta: { path: table.path, missing, columns: table.columns },
    });
    return null;
  }

  return tableRecords(table);
}

export function cell(row: TableRow, column: string): string {
  return row[column] ?? "";
}
