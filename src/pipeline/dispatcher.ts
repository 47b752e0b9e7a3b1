import type { BatchId, PayloadBatch } from "@/lib/graphql/plan";
import { responseErrors, type GraphqlTransport } from "@/lib/graphql/transport";

import type { PipelineLogger } from "./types";

export type DispatchOutcome = {
  batchId: BatchId;
  label: string;
  ok: boolean;
  status: number | null;
  errors: string[];
  /** Response body as received; text when the body was not JSON. */
  body?: unknown;
};

export type DispatchSummary = {
  attempted: number;
  succeeded: number;
  failed: number;
  outcomes: DispatchOutcome[];
};

/**
 * Sends batches in the order given, one request at a time. A failed item is
 * recorded and logged; nothing stops the remaining items or batches, and
 * nothing is retried.
 */
export async function dispatchBatches(
  batches: PayloadBatch[],
  transport: GraphqlTransport,
  log: PipelineLogger
): Promise<DispatchSummary> {
  const outcomes: DispatchOutcome[] = [];

  for (const batch of batches) {
    if (batch.items.length === 0) {
      continue;
    }

    await log({
      level: "info",
      message: `Sending ${batch.title.toLowerCase()} (${batch.items.length})`,
      meta: { batchId: batch.id, items: batch.items.length },
    });

    for (const item of batch.items) {
      let outcome: DispatchOutcome;
      try {
        const response = await transport(item.envelope);
        const errors = responseErrors(response);
        outcome = {
          batchId: batch.id,
          label: item.label,
          ok: errors.length === 0,
          status: response.status,
          errors,
          body: response.body,
        };
      } catch (err) {
        outcome = {
          batchId: batch.id,
          label: item.label,
          ok: false,
          status: null,
          errors: [err instanceof Error ? err.message : String(err)],
        };
      }
      outcomes.push(outcome);

      await log({
        level: outcome.ok ? "debug" : "warn",
        message: outcome.ok
          ? `Sent ${batch.id} '${item.label}'`
          : `Failed to send ${batch.id} '${item.label}'`,
        meta: { batchId: batch.id, label: item.label, status: outcome.status, errors: outcome.errors },
      });
    }
  }

  const succeeded = outcomes.filter((o) => o.ok).length;
  return {
    attempted: outcomes.length,
    succeeded,
    failed: outcomes.length - succeeded,
    outcomes,
  };
}
