import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";

import type { Table } from "@/lib/tabular/readTable";
import type { PipelineLogEntry, PipelineLogger } from "@/pipeline/types";

export const MODEL_FIXTURES = path.join(
  path.dirname(fileURLToPath(import.meta.url)),
  "fixtures",
  "model"
);

export function collectLogs(): { log: PipelineLogger; entries: PipelineLogEntry[] } {
  const entries: PipelineLogEntry[] = [];
  return {
    log: (entry) => {
      entries.push(entry);
    },
    entries,
  };
}

export function warnings(entries: PipelineLogEntry[]): string[] {
  return entries.filter((e) => e.level === "warn").map((e) => e.message);
}

export function table(columns: string[], rows: string[][]): Table {
  return {
    path: "memory.csv",
    columns,
    rows: rows.map((row) => columns.map((_, index) => row[index] ?? "")),
    rowNumbers: rows.map((_, index) => index + 2),
  };
}

export function makeTempDir(prefix = "sheet-importer-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeFile(dir: string, name: string, content: string): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, content, "utf8");
  return filePath;
}
