import {
  PipelineError,
  type PipelineContext,
  type PipelineLogger,
  type PipelineStage,
  type PipelineStageResult,
} from "./types";

export type RunnerOptions = {
  runId: string;
  dryRun: boolean;
  log: PipelineLogger;
};

/** Inclusive bounds by stage id; either end may be left open. */
export type StageRange = {
  fromStageId?: string;
  toStageId?: string;
};

export type StageRunRecord = {
  stageId: string;
  result: PipelineStageResult;
  durationMs: number;
};

/**
 * The stages a range covers. A range may only begin at a stage marked
 * `canStartRun`, because stages share their results in memory.
 */
export function selectStages<Input>(
  stages: Array<PipelineStage<Input>>,
  range: StageRange = {}
): Array<PipelineStage<Input>> {
  if (stages.length === 0) {
    throw new PipelineError("no_stages", "No pipeline stages provided");
  }

  const ids = stages.map((stage) => stage.id);
  const positionOf = (stageId: string) => {
    const position = ids.indexOf(stageId);
    if (position === -1) {
      throw new PipelineError(
        "unknown_stage",
        `Unknown stage '${stageId}'. Stages: ${ids.join(", ")}`,
        { stageId }
      );
    }
    return position;
  };

  const first = range.fromStageId === undefined ? 0 : positionOf(range.fromStageId);
  const last = range.toStageId === undefined ? stages.length - 1 : positionOf(range.toStageId);

  if (first > last) {
    throw new PipelineError(
      "invalid_stage_range",
      `Stage '${ids[first]}' comes after '${ids[last]}'`,
      { fromStageId: ids[first], toStageId: ids[last] }
    );
  }

  const start = stages[first];
  if (range.fromStageId !== undefined && !start.canStartRun) {
    const starts = stages.filter((stage) => stage.canStartRun).map((stage) => stage.id);
    throw new PipelineError(
      "invalid_start_stage",
      `Stage '${start.id}' needs the results of the stages before it and cannot start a run. Start from one of: ${starts.join(", ")}`,
      { stageId: start.id, startStages: starts }
    );
  }

  return stages.slice(first, last + 1);
}

async function logStageError(ctx: PipelineContext, title: string, error: unknown, durationMs: number) {
  await ctx.log({
    level: "error",
    message: `${title} failed`,
    meta: {
      stageId: ctx.stageId,
      error: error instanceof Error ? error.message : String(error),
      code: error instanceof PipelineError ? error.code : undefined,
      durationMs,
    },
  });
}

/**
 * Runs the selected stages in order against one shared input. A stage that
 * throws, or reports `failed`, ends the run: the error is logged and thrown.
 */
export async function runStages<Input>(
  options: RunnerOptions,
  stages: Array<PipelineStage<Input>>,
  input: Input,
  range: StageRange = {}
): Promise<{ results: StageRunRecord[] }> {
  const selected = selectStages(stages, range);
  const results: StageRunRecord[] = [];

  await options.log({
    level: "debug",
    message: `Running ${selected.length} of ${stages.length} stage(s)`,
    meta: { stageIds: selected.map((stage) => stage.id) },
  });

  for (const [position, stage] of selected.entries()) {
    const ctx: PipelineContext = {
      runId: options.runId,
      stageId: stage.id,
      dryRun: options.dryRun,
      log: options.log,
    };
    const startedAt = Date.now();

    await ctx.log({
      level: "info",
      message: `${stage.title}...`,
      meta: { stageId: stage.id, step: `${position + 1}/${selected.length}` },
    });

    let result: PipelineStageResult;
    try {
      stage.validate?.(input);
      result = await stage.run(ctx, input);
    } catch (err) {
      await logStageError(ctx, stage.title, err, Date.now() - startedAt);
      throw err;
    }

    const durationMs = Date.now() - startedAt;
    results.push({ stageId: stage.id, result, durationMs });

    await ctx.log({
      level: "info",
      message: `${stage.title}: ${result.status}`,
      meta: { stageId: stage.id, metrics: result.metrics, durationMs },
    });

    const warnings = result.warnings ?? [];
    if (warnings.length > 0) {
      await ctx.log({
        level: "warn",
        message: `${stage.title}: ${warnings.length} warning(s)`,
        meta: { stageId: stage.id, warnings },
      });
    }

    if (result.status === "failed") {
      const error = new PipelineError("stage_failed", `Stage '${stage.id}' reported failure`, {
        stageId: stage.id,
      });
      await logStageError(ctx, stage.title, error, durationMs);
      throw error;
    }
  }

  return { results };
}
