import type { PipelineLogger } from "@/pipeline/types";

import type { SeriesMap, ValueDescriptor } from "../model/types";
import { parseDecimal } from "../tabular/coerce";
import type { Table } from "../tabular/readTable";

export type SeriesHeader = {
  entity: string;
  scenario: string | null;
};

/**
 * `"<entity>,<scenario>"` or `"<entity>"`. The scenario `ALL` (any case) and a
 * missing scenario both mean every scenario.
 */
export function parseSeriesHeader(header: string): SeriesHeader {
  const commaAt = header.indexOf(",");
  if (commaAt === -1) {
    return { entity: header.trim(), scenario: null };
  }
  const entity = header.slice(0, commaAt).trim();
  const scenarioRaw = header.slice(commaAt + 1).trim();
  return {
    entity,
    scenario: scenarioRaw.toUpperCase() === "ALL" ? null : scenarioRaw,
  };
}

/**
 * Collapses to a constant when every value is exactly equal. Floating noise
 * keeps a column a series; that is accepted.
 */
export function toValueDescriptor(scenario: string | null, values: number[]): ValueDescriptor {
  const first = values[0];
  if (values.every((value) => value === first)) {
    return { scenario, constant: first };
  }
  return { scenario, series: values };
}

/**
 * Decodes a wide sheet whose first column is the time axis. Cells that are not
 * numbers are dropped from their column; a column with no numbers is skipped.
 */
export function decodeWideSeries(table: Table): SeriesMap {
  const seriesMap: SeriesMap = new Map();

  for (let col = 1; col < table.columns.length; col++) {
    const header = table.columns[col];
    if (!header) {
      continue;
    }

    const { entity, scenario } = parseSeriesHeader(header);
    if (!entity) {
      continue;
    }

    const values: number[] = [];
    for (const row of table.rows) {
      const value = parseDecimal(row[col]);
      if (value !== null) {
        values.push(value);
      }
    }
    if (values.length === 0) {
      continue;
    }

    const descriptors = seriesMap.get(entity) ?? [];
    descriptors.push(toValueDescriptor(scenario, values));
    seriesMap.set(entity, descriptors);
  }

  return seriesMap;
}

/**
 * Decodes a wide time-series sheet. A missing or empty sheet gives an empty
 * map; the enrichment that uses it then changes nothing.
 */
export async function readWideSeries(
  table: Table | null,
  label: string,
  log: PipelineLogger
): Promise<SeriesMap> {
  if (!table) {
    await log({ level: "warn", message: `No ${label} sheet found, skipping ${label}` });
    return new Map();
  }
  if (table.rows.length === 0 || table.columns.length <= 1) {
    await log({
      level: "warn",
      message: `${label} sheet has no data columns, skipping ${label}`,
      meta: { path: table.path, columns: table.columns },
    });
    return new Map();
  }

  const seriesMap = decodeWideSeries(table);
  await log({
    level: "debug",
    message: `Decoded ${label} series`,
    meta: { path: table.path, entities: seriesMap.size },
  });
  return seriesMap;
}
