import fs from "node:fs";

import { buildModel } from "@/lib/model/buildModel";
import { directorySheets } from "@/lib/tabular/readTable";

import type { PipelineStage } from "../types";
import type { ModelImportInput } from "./types";

export const buildModelStage: PipelineStage<ModelImportInput> = {
  id: "buildModel",
  title: "Parse sheets into model records",
  canStartRun: true,
  async run(ctx, input) {
    let source = input.state.sheets;
    if (!source) {
      if (!fs.existsSync(input.csvDir)) {
        await ctx.log({
          level: "error",
          message: `Sheet directory not found: ${input.csvDir}`,
        });
        return { status: "failed" };
      }
      source = directorySheets(input.csvDir);
    }

    const model = await buildModel(source, ctx.log, input.config.sheets);
    input.state.model = model;

    return {
      status: "succeeded",
      metrics: {
        source: source.location,
        setup: model.setup !== null,
        scenarios: model.scenarios.length,
        nodes: model.nodes.length,
        nodeStates: model.nodeStates.length,
        processes: model.processes.length,
        nodeGroups: model.groups.nodeGroups.length,
        processGroups: model.groups.processGroups.length,
        topologies: model.topologies.length,
        markets: model.markets.length,
        risks: model.risks.length,
      },
    };
  },
};
