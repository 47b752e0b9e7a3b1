export type PipelineLogLevel = "debug" | "info" | "warn" | "error";

export type PipelineLogEntry = {
  level: PipelineLogLevel;
  message: string;
  meta?: Record<string, unknown>;
};

/**
 * Sink for everything the import reports. The CLI binds it to pino; tests
 * collect the entries.
 */
export type PipelineLogger = (entry: PipelineLogEntry) => Promise<void> | void;

export type StageStatus = "succeeded" | "skipped" | "failed";

export type PipelineStageResult = {
  status: StageStatus;
  metrics?: Record<string, unknown>;
  /** Item-level problems that did not stop the stage. */
  warnings?: string[];
};

export type PipelineStage<Input> = {
  id: string;
  title: string;
  /**
   * Set on stages that need nothing from earlier stages of the same run.
   * Only these may be named as the first stage of a partial run.
   */
  canStartRun?: boolean;
  validate?: (input: Input) => void;
  run: (ctx: PipelineContext, input: Input) => Promise<PipelineStageResult>;
};

export type PipelineContext = {
  /** Attached to every log line of the import. */
  runId: string;
  /** Id of the stage being run. */
  stageId: string;
  /** Parse and assemble only: no files written, nothing sent. */
  dryRun: boolean;
  log: PipelineLogger;
};

export type PipelineErrorCode =
  | "missing_source"
  | "missing_column"
  | "unknown_conversion"
  | "missing_model"
  | "missing_batches"
  | "no_stages"
  | "unknown_stage"
  | "invalid_start_stage"
  | "invalid_stage_range"
  | "stage_failed";

/**
 * A condition that stops the import. `meta` carries the sheet, column or
 * stage involved.
 */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly meta: Record<string, unknown>;

  constructor(
    code: PipelineErrorCode,
    message: string,
    meta: Record<string, unknown> = {},
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "PipelineError";
    this.code = code;
    this.meta = meta;
  }
}
