import fs from "node:fs";

import { splitWorkbook, workbookSheets } from "@/lib/tabular/splitWorkbook";

import type { PipelineStage } from "../types";
import type { ModelImportInput } from "./types";

export const splitWorkbookStage: PipelineStage<ModelImportInput> = {
  id: "splitWorkbook",
  title: "Split workbook into sheet CSVs",
  canStartRun: true,
  validate(input) {
    if (input.workbookPath && !/\.(xlsx|xlsm|xls)$/i.test(input.workbookPath)) {
      throw new Error(`Workbook must be an Excel file (.xlsx or .xls): ${input.workbookPath}`);
    }
  },
  async run(ctx, input) {
    if (!input.workbookPath) {
      await ctx.log({
        level: "info",
        message: "No workbook given, using existing sheet CSVs",
        meta: { csvDir: input.csvDir },
      });
      return { status: "skipped" };
    }
    if (!fs.existsSync(input.workbookPath)) {
      await ctx.log({
        level: "error",
        message: `Workbook not found: ${input.workbookPath}`,
      });
      return { status: "failed" };
    }

    // A dry run parses the workbook itself rather than CSVs left by an earlier run.
    if (ctx.dryRun) {
      input.state.sheets = workbookSheets(input.workbookPath);
      await ctx.log({
        level: "info",
        message: "Dry run: reading sheets from the workbook without writing CSVs",
        meta: { workbookPath: input.workbookPath, csvDir: input.csvDir },
      });
      return { status: "succeeded", metrics: { dryRun: true } };
    }

    const sheets = splitWorkbook(input.workbookPath, input.csvDir);
    for (const sheet of sheets) {
      await ctx.log({
        level: "debug",
        message: `Converted sheet ${sheet.sheet}`,
        meta: { path: sheet.path, rows: sheet.rows },
      });
    }

    return {
      status: "succeeded",
      metrics: { sheets: sheets.length, sheetNames: sheets.map((s) => s.sheet) },
    };
  },
};
