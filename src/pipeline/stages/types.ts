import type { ImporterConfig } from "@/config";
import type { PayloadBatch } from "@/lib/graphql/plan";
import type { GraphqlTransport } from "@/lib/graphql/transport";
import type { EnergyModel } from "@/lib/model/types";
import type { SheetSource } from "@/lib/tabular/readTable";

import type { DispatchSummary } from "../dispatcher";
import { PipelineError } from "../types";

/**
 * Results handed from one stage to the next within a run.
 */
export type ModelImportState = {
  /** Sheets read straight from the workbook; unset when they come from `csvDir`. */
  sheets?: SheetSource;
  model?: EnergyModel;
  batches?: PayloadBatch[];
  dispatch?: DispatchSummary;
};

export type ModelImportInput = {
  /**
   * Workbook to split into sheet CSVs. Without it `csvDir` must already hold them.
   */
  workbookPath?: string;
  csvDir: string;
  graphqlDir: string;
  config: ImporterConfig;
  /**
   * Overrides the fetch transport built from `config`.
   */
  transport?: GraphqlTransport;
  state: ModelImportState;
};

export function requireModel(input: ModelImportInput): EnergyModel {
  if (!input.state.model) {
    throw new PipelineError("missing_model", "No parsed model; run the buildModel stage first");
  }
  return input.state.model;
}

export function requireBatches(input: ModelImportInput): PayloadBatch[] {
  if (!input.state.batches) {
    throw new PipelineError(
      "missing_batches",
      "No assembled payloads; run the assemblePayloads stage first"
    );
  }
  return input.state.batches;
}
