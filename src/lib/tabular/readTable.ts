import fs from "node:fs";
import path from "node:path";

import { read, utils, type WorkSheet } from "xlsx";

export type TableRow = Record<string, string>;

/**
 * A delimited sheet. `columns` holds the trimmed header cells; every row in
 * `rows` is padded to the header width. Cells are kept as text.
 * `rowNumbers[i]` is the 1-based line of `rows[i]` in the source, so messages
 * can point at it after blank rows are dropped.
 */
export type Table = {
  path: string;
  columns: string[];
  rows: string[][];
  rowNumbers: number[];
};

/**
 * Where the parsers get their sheets: a directory of CSV files, or a workbook
 * held in memory.
 */
export type SheetSource = {
  /** Shown in logs. */
  location: string;
  table(sheetName: string): Table | null;
};

function cellText(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }
  return typeof value === "string" ? value : String(value);
}

function emptyTable(source: string): Table {
  return { path: source, columns: [], rows: [], rowNumbers: [] };
}

function sheetTable(sheet: WorkSheet, source: string): Table {
  const ref = sheet["!ref"];
  if (!ref) {
    return emptyTable(source);
  }
  const firstRow = utils.decode_range(ref).s.r;

  // blankrows stay in so a row's index maps back to its line
  const matrix = utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: true,
    defval: "",
    blankrows: true,
  });

  const [headerRow, ...bodyRows] = matrix;
  if (!headerRow) {
    return emptyTable(source);
  }

  const columns = headerRow.map((cell) => cellText(cell).trim());
  const table: Table = { path: source, columns, rows: [], rowNumbers: [] };

  bodyRows.forEach((row, index) => {
    const cells = columns.map((_, col) => cellText(row[col]));
    if (cells.some((cell) => cell.trim() !== "")) {
      table.rows.push(cells);
      // header is line firstRow + 1
      table.rowNumbers.push(firstRow + index + 2);
    }
  });

  return table;
}

/**
 * Parses CSV text. `source` names the file or sheet it came from.
 */
export function parseTable(text: string, source: string): Table {
  const content = text.replace(/^\uFEFF/u, "");
  if (!content.trim()) {
    return emptyTable(source);
  }

  // raw: keep cell text as written; numbers and dates are interpreted later
  const workbook = read(content, { type: "string", raw: true });
  const sheetName = workbook.SheetNames[0];
  if (sheetName === undefined) {
    return emptyTable(source);
  }
  return sheetTable(workbook.Sheets[sheetName], source);
}

/**
 * Reads a CSV file. Returns null when the file does not exist and an empty
 * table when it has no content.
 */
export function readTable(filePath: string): Table | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }
  return parseTable(fs.readFileSync(filePath, "utf8"), filePath);
}

/**
 * Rows keyed by header name. A repeated header keeps its last cell.
 */
export function tableRecords(table: Table): TableRow[] {
  return table.rows.map((row) => {
    const record: TableRow = {};
    table.columns.forEach((column, index) => {
      record[column] = row[index];
    });
    return record;
  });
}

export function missingColumns(table: Table, required: readonly string[]): string[] {
  const present = new Set(table.columns);
  return required.filter((column) => !present.has(column));
}

/**
 * Picks `name` from a list, exact match first, then ignoring case.
 */
export function matchName(names: readonly string[], name: string): string | undefined {
  const sorted = [...names].sort();
  return (
    sorted.find((entry) => entry === name) ??
    sorted.find((entry) => entry.toLowerCase() === name.toLowerCase())
  );
}

/**
 * Finds `<sheetName>.csv` in a directory, ignoring case.
 */
export function resolveSheetPath(csvDir: string, sheetName: string): string | null {
  if (!fs.existsSync(csvDir)) {
    return null;
  }
  const match = matchName(fs.readdirSync(csvDir), `${sheetName}.csv`);
  return match ? path.join(csvDir, match) : null;
}

export function directorySheets(csvDir: string): SheetSource {
  return {
    location: csvDir,
    table(sheetName) {
      const filePath = resolveSheetPath(csvDir, sheetName);
      return filePath ? readTable(filePath) : null;
    },
  };
}
