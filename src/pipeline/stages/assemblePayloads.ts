import { buildPayloadBatches } from "@/lib/graphql/plan";

import type { PipelineStage } from "../types";
import { requireModel, type ModelImportInput } from "./types";

export const assemblePayloadsStage: PipelineStage<ModelImportInput> = {
  id: "assemblePayloads",
  title: "Assemble mutation payloads",
  validate(input) {
    requireModel(input);
  },
  async run(ctx, input) {
    const batches = buildPayloadBatches(requireModel(input));
    input.state.batches = batches;

    const perBatch = Object.fromEntries(batches.map((b) => [b.id, b.items.length]));
    await ctx.log({
      level: "debug",
      message: "Payload batches assembled",
      meta: perBatch,
    });

    return {
      status: "succeeded",
      metrics: {
        envelopes: batches.reduce((sum, b) => sum + b.items.length, 0),
        ...perBatch,
      },
    };
  },
};
