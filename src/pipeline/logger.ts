import pino, {
  type DestinationStream,
  type Level,
  type Logger,
  type LoggerOptions,
} from "pino";

import type { PipelineLogEntry, PipelineLogger } from "./types";

export type PipelineLoggerOptions = {
  level?: Level;
  /**
   * Where JSON lines go. Defaults to stdout.
   */
  destination?: DestinationStream;
};

/**
 * Creates a pipeline logger backed by pino. Every line carries the run id so
 * the output of several imports can be told apart.
 */
export function createPipelineLogger(
  runId: string,
  options: PipelineLoggerOptions = {}
): { log: PipelineLogger; logger: Logger } {
  const pinoOptions: LoggerOptions = {
    level: options.level ?? "info",
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    base: {
      runId,
    },
  };
  const pinoLogger = options.destination
    ? pino(pinoOptions, options.destination)
    : pino(pinoOptions);

  const log = (entry: PipelineLogEntry) => {
    const { level, message, meta } = entry;
    const logData = {
      msg: message,
      ...meta,
    };

    switch (level) {
      case "debug":
        pinoLogger.debug(logData);
        break;
      case "info":
        pinoLogger.info(logData);
        break;
      case "warn":
        pinoLogger.warn(logData);
        break;
      case "error":
        pinoLogger.error(logData);
        break;
    }
  };

  return { log, logger: pinoLogger };
}
