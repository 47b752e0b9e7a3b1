import "dotenv/config";

import { randomUUID } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import process from "node:process";

import { loadImporterConfig, type ImporterConfigOverrides } from "@/config";
import { createOutputLayout, outputLayout } from "@/lib/tabular/splitWorkbook";
import { runModelImport } from "@/pipeline/importRun";
import { createPipelineLogger } from "@/pipeline/logger";
import { PipelineError } from "@/pipeline/types";

type CliOptions = {
  inputPath: string;
  outDir?: string;
  dryRun: boolean;
  fromStageId?: string;
  toStageId?: string;
  overrides: ImporterConfigOverrides;
};

function printUsage() {
  console.error(
    "Usage: npm run model:import -- <model.xlsx | csv-dir> [--out <dir>] [--dispatch] [--no-dispatch] [--endpoint <url>] [--dry-run] [--from-stage splitWorkbook|buildModel] [--to-stage <id>]"
  );
  console.error("");
  console.error("Examples:");
  console.error("  npm run model:import -- data/model.xlsx");
  console.error("  npm run model:import -- data/model.xlsx --dispatch --endpoint http://localhost:3030/graphql");
  console.error("  npm run model:import -- data/output/csv --out data/run2");
}

function parseArgs(): CliOptions {
  const args = process.argv.slice(2);
  let inputPath: string | undefined;
  let outDir: string | undefined;
  let dryRun = false;
  let fromStageId: string | undefined;
  let toStageId: string | undefined;
  const overrides: ImporterConfigOverrides = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--dispatch") {
      overrides.dispatch = true;
      continue;
    }
    if (arg === "--no-dispatch") {
      overrides.dispatch = false;
      continue;
    }
    if (arg === "--dry-run") {
      dryRun = true;
      continue;
    }
    if (arg === "--endpoint") {
      overrides.endpoint = args[++i];
      continue;
    }
    if (arg === "--out") {
      outDir = args[++i];
      continue;
    }
    if (arg === "--from-stage") {
      fromStageId = args[++i];
      continue;
    }
    if (arg === "--to-stage") {
      toStageId = args[++i];
      continue;
    }
    if (arg === "--help" || arg === "-h") {
      printUsage();
      process.exit(0);
    }
    if (!inputPath) {
      inputPath = arg;
    }
  }

  if (!inputPath) {
    printUsage();
    process.exit(1);
  }

  return { inputPath, outDir, dryRun, fromStageId, toStageId, overrides };
}

async function main() {
  const options = parseArgs();
  const resolvedPath = path.resolve(options.inputPath);

  if (!fs.existsSync(resolvedPath)) {
    console.error(`✖ Path not found: ${resolvedPath}`);
    process.exit(1);
  }

  const config = loadImporterConfig(process.env, options.overrides);
  const isDirectory = fs.statSync(resolvedPath).isDirectory();

  // A workbook gets output/{csv,graphql} beside it; a CSV directory is read in
  // place and its payloads go to a sibling graphql/ directory.
  let csvDir: string;
  let graphqlDir: string;
  if (isDirectory) {
    csvDir = resolvedPath;
    graphqlDir = path.join(
      options.outDir ? path.resolve(options.outDir) : path.dirname(resolvedPath),
      "graphql"
    );
  } else {
    const baseDir = options.outDir ? path.resolve(options.outDir) : path.dirname(resolvedPath);
    // a dry run creates no directories
    const layout = options.dryRun ? outputLayout(baseDir) : createOutputLayout(baseDir);
    csvDir = layout.csv;
    graphqlDir = layout.graphql;
  }

  const runId = randomUUID();
  const { log } = createPipelineLogger(runId, { level: config.logLevel });

  const result = await runModelImport({
    runId,
    dryRun: options.dryRun,
    workbookPath: isDirectory ? undefined : resolvedPath,
    csvDir,
    graphqlDir,
    config,
    log,
    fromStageId: options.fromStageId,
    toStageId: options.toStageId,
  });

  const dispatch = result.state.dispatch;
  console.info("\n✅ Import complete");
  console.info(`  • Payloads: ${graphqlDir}`);
  if (dispatch) {
    console.info(
      `  • Sent: ${dispatch.succeeded}/${dispatch.attempted} succeeded, ${dispatch.failed} failed`
    );
  }
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  const code = error instanceof PipelineError ? ` [${error.code}]` : "";
  console.error(`✖ Import failed${code}: ${message}`);
  process.exit(1);
});
