import { describe, expect, it } from "vitest";

import { runStages, selectStages } from "@/pipeline/runner";
import { PipelineError, type PipelineStage } from "@/pipeline/types";

import { collectLogs } from "./helpers";

type Trace = { ran: string[] };

function stage(
  id: string,
  status: "succeeded" | "failed" | "skipped" = "succeeded",
  canStartRun = true
): PipelineStage<Trace> {
  return {
    id,
    title: `Stage ${id}`,
    canStartRun,
    async run(_ctx, input) {
      input.ran.push(id);
      return { status };
    },
  };
}

const options = () => ({ runId: "run-1", dryRun: false, log: collectLogs().log });

describe("selectStages", () => {
  const stages = [stage("read"), stage("parse"), stage("write", "succeeded", false)];

  it("covers every stage without a range", () => {
    expect(selectStages(stages).map((s) => s.id)).toEqual(["read", "parse", "write"]);
  });

  it("may end anywhere but only start at a stage that can start a run", () => {
    expect(selectStages(stages, { fromStageId: "parse", toStageId: "parse" }).map((s) => s.id)).toEqual([
      "parse",
    ]);
    expect(() => selectStages(stages, { fromStageId: "write" })).toThrow(
      "Stage 'write' needs the results of the stages before it and cannot start a run. Start from one of: read, parse"
    );
  });

  it("rejects unknown, reversed and empty selections", () => {
    expect(() => selectStages(stages, { toStageId: "send" })).toThrow(
      "Unknown stage 'send'. Stages: read, parse, write"
    );
    expect(() => selectStages(stages, { fromStageId: "parse", toStageId: "read" })).toThrow(
      "Stage 'parse' comes after 'read'"
    );
    expect(() => selectStages([])).toThrow(PipelineError);
  });
});

describe("runStages", () => {
  it("runs an inclusive range of stages in order", async () => {
    const input: Trace = { ran: [] };
    const { results } = await runStages(options(), [stage("a"), stage("b"), stage("c"), stage("d")], input, {
      fromStageId: "b",
      toStageId: "c",
    });

    expect(input.ran).toEqual(["b", "c"]);
    expect(results.map((r) => [r.stageId, r.result.status])).toEqual([
      ["b", "succeeded"],
      ["c", "succeeded"],
    ]);
  });

  it("rejects a bad range before running anything", async () => {
    const input: Trace = { ran: [] };

    await expect(
      runStages(options(), [stage("a"), stage("b", "succeeded", false)], input, { fromStageId: "b" })
    ).rejects.toMatchObject({ code: "invalid_start_stage" });
    await expect(runStages(options(), [stage("a")], input, { fromStageId: "x" })).rejects.toMatchObject({
      code: "unknown_stage",
    });
    expect(input.ran).toEqual([]);
  });

  it("stops after a stage that reports failure", async () => {
    const { log, entries } = collectLogs();
    const input: Trace = { ran: [] };

    await expect(
      runStages({ runId: "run-1", dryRun: false, log }, [stage("a"), stage("b", "failed"), stage("c")], input)
    ).rejects.toMatchObject({ code: "stage_failed", message: "Stage 'b' reported failure" });

    expect(input.ran).toEqual(["a", "b"]);
    expect(entries.filter((e) => e.level === "error").map((e) => e.message)).toEqual(["Stage b failed"]);
  });

  it("logs and rethrows what a stage throws", async () => {
    const { log, entries } = collectLogs();
    const boom = new PipelineError("missing_source", "nodes sheet not found");
    const failing: PipelineStage<Trace> = {
      id: "parse",
      title: "Parse",
      async run() {
        throw boom;
      },
    };

    await expect(runStages({ runId: "run-1", dryRun: false, log }, [failing], { ran: [] })).rejects.toBe(boom);

    const errorEntry = entries.find((e) => e.level === "error");
    expect(errorEntry?.message).toBe("Parse failed");
    expect(errorEntry?.meta).toMatchObject({ stageId: "parse", code: "missing_source", error: "nodes sheet not found" });
  });

  it("runs validate before run", async () => {
    const input: Trace = { ran: [] };
    const guarded: PipelineStage<Trace> = {
      ...stage("guarded"),
      validate() {
        throw new Error("invalid input");
      },
    };

    await expect(runStages(options(), [guarded], input)).rejects.toThrow("invalid input");
    expect(input.ran).toEqual([]);
  });

  it("logs stage warnings", async () => {
    const { log, entries } = collectLogs();
    const warning: PipelineStage<Trace> = {
      id: "w",
      title: "Warn",
      async run() {
        return { status: "succeeded", warnings: ["one", "two"] };
      },
    };

    await runStages({ runId: "run-1", dryRun: false, log }, [warning], { ran: [] });

    const warn = entries.find((e) => e.level === "warn");
    expect(warn?.message).toBe("Warn: 2 warning(s)");
    expect(warn?.meta).toEqual({ stageId: "w", warnings: ["one", "two"] });
  });
});
