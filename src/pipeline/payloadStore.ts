import fs from "node:fs";
import path from "node:path";

import type { PayloadBatch } from "@/lib/graphql/plan";

export type WriteBatchesResult = {
  filesWritten: number;
  envelopesWritten: number;
};

function writeJson(filePath: string, value: unknown) {
  fs.writeFileSync(filePath, `${JSON.stringify(value, null, 2)}\n`, "utf8");
}

/**
 * Persists every envelope as `<prefix>_<name>.json` and each batch as one
 * combined file. Empty batches write nothing. Output is deterministic, so an
 * unchanged model rewrites identical files.
 */
export function writePayloadBatches(graphqlDir: string, batches: PayloadBatch[]): WriteBatchesResult {
  fs.mkdirSync(graphqlDir, { recursive: true });

  let filesWritten = 0;
  let envelopesWritten = 0;

  for (const batch of batches) {
    if (batch.items.length === 0) {
      continue;
    }

    for (const item of batch.items) {
      writeJson(path.join(graphqlDir, item.fileName), item.envelope);
      filesWritten++;
      envelopesWritten++;
    }

    if (batch.combinedFileName) {
      writeJson(
        path.join(graphqlDir, batch.combinedFileName),
        batch.items.map((item) => item.envelope)
      );
      filesWritten++;
    }
  }

  return { filesWritten, envelopesWritten };
}
