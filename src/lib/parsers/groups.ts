import type { PipelineLogger } from "@/pipeline/types";

import type { GroupSheet } from "../model/types";
import { toText } from "../tabular/coerce";
import type { Table } from "../tabular/readTable";
import { cell, optionalSheet } from "./sheet";

export function emptyGroupSheet(): GroupSheet {
  return { nodeGroups: [], processGroups: [], nodeMemberships: [], processMemberships: [] };
}

// Code-unit order, independent of locale.
function sortedNames(names: Set<string>): string[] {
  return [...names].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Group names per kind, deduplicated and sorted, plus the memberships in sheet
 * order. Rows of an unknown `group_type` are skipped with a warning.
 */
export async function parseGroups(table: Table | null, log: PipelineLogger): Promise<GroupSheet> {
  const rows = await optionalSheet(table, "groups", ["group_type", "entity", "group"], log);
  if (!rows || !table) {
    return emptyGroupSheet();
  }

  const nodeGroups = new Set<string>();
  const processGroups = new Set<string>();
  const result = emptyGroupSheet();

  for (const [index, row] of rows.entries()) {
    const groupType = toText(cell(row, "group_type")).toLowerCase();
    const entity = toText(cell(row, "entity"));
    const group = toText(cell(row, "group"));
    if (!entity || !group) {
      continue;
    }

    if (groupType === "node") {
      nodeGroups.add(group);
      result.nodeMemberships.push({ nodeName: entity, groupName: group });
    } else if (groupType === "process") {
      processGroups.add(group);
      result.processMemberships.push({ processName: entity, groupName: group });
    } else {
      await log({
        level: "warn",
        message: `Unknown group_type '${groupType}' in groups sheet, row skipped`,
        meta: { row: table.rowNumbers[index], entity, group },
      });
    }
  }

  result.nodeGroups = sortedNames(nodeGroups);
  result.processGroups = sortedNames(processGroups);
  return result;
}
