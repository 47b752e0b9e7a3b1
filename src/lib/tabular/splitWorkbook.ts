import fs from "node:fs";
import path from "node:path";

import { readFile, utils, type WorkBook } from "xlsx";

import { matchName, parseTable, type SheetSource } from "./readTable";

export type OutputLayout = {
  output: string;
  csv: string;
  graphql: string;
};

export type SplitSheet = {
  sheet: string;
  path: string;
  rows: number;
};

/**
 * `<baseDir>/output/{csv,graphql}`. Nothing is created.
 */
export function outputLayout(baseDir: string): OutputLayout {
  const output = path.join(baseDir, "output");
  return {
    output,
    csv: path.join(output, "csv"),
    graphql: path.join(output, "graphql"),
  };
}

/**
 * Same as `outputLayout`, with both directories created if missing.
 */
export function createOutputLayout(baseDir: string): OutputLayout {
  const layout = outputLayout(baseDir);
  fs.mkdirSync(layout.csv, { recursive: true });
  fs.mkdirSync(layout.graphql, { recursive: true });
  return layout;
}

export function sanitizeSheetName(sheetName: string): string {
  const kept = sheetName.replace(/[^\p{L}\p{N} _-]/gu, "").trimEnd();
  return kept || "sheet";
}

type SheetCsv = {
  sheet: string;
  fileStem: string;
  csv: string;
};

// Numbers are written unformatted so no precision is lost to the cell's
// display format.
function sheetsAsCsv(workbook: WorkBook): SheetCsv[] {
  return workbook.SheetNames.map((sheetName) => ({
    sheet: sheetName,
    fileStem: sanitizeSheetName(sheetName),
    csv: utils.sheet_to_csv(workbook.Sheets[sheetName], { blankrows: false, rawNumbers: true }),
  }));
}

/**
 * Writes every sheet of a workbook as `<sheet>.csv`.
 */
export function splitWorkbook(workbookPath: string, csvDir: string): SplitSheet[] {
  const sheets = sheetsAsCsv(readFile(workbookPath));
  fs.mkdirSync(csvDir, { recursive: true });

  return sheets.map(({ sheet, fileStem, csv }) => {
    const csvPath = path.join(csvDir, `${fileStem}.csv`);
    fs.writeFileSync(csvPath, csv, "utf8");
    return {
      sheet,
      path: csvPath,
      rows: csv ? csv.split("\n").length : 0,
    };
  });
}

/**
 * The sheets of a workbook as they would read back after `splitWorkbook`,
 * without writing anything.
 */
export function workbookSheets(workbookPath: string): SheetSource {
  const byStem = new Map<string, string>();
  // a later sheet with the same file name overwrites an earlier one on disk
  for (const { fileStem, csv } of sheetsAsCsv(readFile(workbookPath))) {
    byStem.set(fileStem, csv);
  }

  return {
    location: workbookPath,
    table(sheetName) {
      const stem = matchName([...byStem.keys()], sheetName);
      const csv = stem === undefined ? undefined : byStem.get(stem);
      if (stem === undefined || csv === undefined) {
        return null;
      }
      return parseTable(csv, `${workbookPath}#${stem}`);
    },
  };
}
