import { createFetchTransport } from "@/lib/graphql/transport";

import { dispatchBatches } from "../dispatcher";
import type { PipelineStage } from "../types";
import { requireBatches, type ModelImportInput } from "./types";

const MAX_WARNINGS = 25;

export const dispatchPayloadsStage: PipelineStage<ModelImportInput> = {
  id: "dispatchPayloads",
  title: "Send payloads to the model service",
  validate(input) {
    requireBatches(input);
  },
  async run(ctx, input) {
    const batches = requireBatches(input);
    const { config } = input;

    if (!config.dispatch) {
      await ctx.log({
        level: "info",
        message: "Dispatch disabled, payloads were only written to disk",
      });
      return { status: "skipped" };
    }
    if (ctx.dryRun) {
      await ctx.log({
        level: "info",
        message: "Dry run: would send payloads",
        meta: { endpoint: config.endpoint },
      });
      return { status: "skipped", metrics: { dryRun: true } };
    }

    const transport =
      input.transport ??
      createFetchTransport({
        endpoint: config.endpoint,
        headers: config.headers,
        timeoutMs: config.timeoutMs,
      });

    const summary = await dispatchBatches(batches, transport, ctx.log);
    input.state.dispatch = summary;

    const failures = summary.outcomes.filter((o) => !o.ok);
    const warnings = failures
      .slice(0, MAX_WARNINGS)
      .map((o) => `${o.batchId} '${o.label}': ${o.errors.join("; ")}`);
    if (failures.length > MAX_WARNINGS) {
      warnings.push(`... and ${failures.length - MAX_WARNINGS} more failed item(s)`);
    }

    return {
      status: "succeeded",
      metrics: {
        attempted: summary.attempted,
        succeeded: summary.succeeded,
        failed: summary.failed,
      },
      warnings,
    };
  },
};
