import { writePayloadBatches } from "../payloadStore";
import type { PipelineStage } from "../types";
import { requireBatches, type ModelImportInput } from "./types";

export const writePayloadsStage: PipelineStage<ModelImportInput> = {
  id: "writePayloads",
  title: "Write payload files",
  validate(input) {
    requireBatches(input);
  },
  async run(ctx, input) {
    const batches = requireBatches(input);

    if (ctx.dryRun) {
      await ctx.log({
        level: "info",
        message: "Dry run: would write payload files",
        meta: { graphqlDir: input.graphqlDir },
      });
      return { status: "skipped", metrics: { dryRun: true } };
    }

    const result = writePayloadBatches(input.graphqlDir, batches);
    await ctx.log({
      level: "info",
      message: `Saved ${result.envelopesWritten} payload(s) to ${input.graphqlDir}`,
      meta: { ...result },
    });

    return { status: "succeeded", metrics: { ...result } };
  },
};
