import type { ImporterConfig } from "@/config";
import type { GraphqlTransport } from "@/lib/graphql/transport";

import { runStages, type StageRange, type StageRunRecord } from "./runner";
import {
  assemblePayloadsStage,
  buildModelStage,
  dispatchPayloadsStage,
  splitWorkbookStage,
  writePayloadsStage,
  type ModelImportInput,
  type ModelImportState,
} from "./stages";
import type { PipelineLogger, PipelineStage } from "./types";

export const MODEL_IMPORT_STAGES: Array<PipelineStage<ModelImportInput>> = [
  splitWorkbookStage,
  buildModelStage,
  assemblePayloadsStage,
  writePayloadsStage,
  dispatchPayloadsStage,
];

export type ModelImportOptions = StageRange & {
  runId: string;
  dryRun?: boolean;
  workbookPath?: string;
  csvDir: string;
  graphqlDir: string;
  config: ImporterConfig;
  transport?: GraphqlTransport;
  log: PipelineLogger;
};

export type ModelImportResult = {
  state: ModelImportState;
  stages: StageRunRecord[];
  durationMs: number;
};

/**
 * Runs a full import: split, parse, assemble, write and (when enabled) send.
 * Fatal errors are logged and rethrown.
 */
export async function runModelImport(options: ModelImportOptions): Promise<ModelImportResult> {
  const startTime = Date.now();
  const input: ModelImportInput = {
    workbookPath: options.workbookPath,
    csvDir: options.csvDir,
    graphqlDir: options.graphqlDir,
    config: options.config,
    transport: options.transport,
    state: {},
  };

  await options.log({
    level: "info",
    message: "Model import started",
    meta: {
      workbookPath: options.workbookPath,
      csvDir: options.csvDir,
      graphqlDir: options.graphqlDir,
      dispatch: options.config.dispatch,
      dryRun: options.dryRun ?? false,
    },
  });

  try {
    const { results } = await runStages(
      { runId: options.runId, dryRun: options.dryRun ?? false, log: options.log },
      MODEL_IMPORT_STAGES,
      input,
      { fromStageId: options.fromStageId, toStageId: options.toStageId }
    );

    const durationMs = Date.now() - startTime;
    await options.log({
      level: "info",
      message: "Model import succeeded",
      meta: { durationMs, failedDispatches: input.state.dispatch?.failed ?? 0 },
    });
    return { state: input.state, stages: results, durationMs };
  } catch (error) {
    await options.log({
      level: "error",
      message: "Model import failed",
      meta: {
        durationMs: Date.now() - startTime,
        error: error instanceof Error ? error.message : String(error),
      },
    });
    throw error;
  }
}
