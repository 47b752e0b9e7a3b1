import type {
  NewMarket,
  NewNode,
  NewProcess,
  SeriesMap,
  ValueDescriptor,
} from "./types";

/**
 * How one series sheet attaches to one field of a base entity. Every series
 * field has exactly one join; applying it replaces the field, it never appends.
 */
export type SeriesJoin<T> = {
  field: string;
  key: (entity: T) => string;
  apply: (entity: T, descriptors: ValueDescriptor[]) => T;
};

export type MergeResult<T> = {
  entities: T[];
  matched: number;
  /** Series names with no entity of that name. */
  unmatched: string[];
};

export function cloneDescriptor(descriptor: ValueDescriptor): ValueDescriptor {
  if ("series" in descriptor) {
    return { scenario: descriptor.scenario, series: [...descriptor.series] };
  }
  return { scenario: descriptor.scenario, constant: descriptor.constant };
}

/**
 * Keyed join of a decoded series sheet onto base entities by exact name.
 * Entities without an entry are returned unchanged.
 */
export function mergeSeries<T>(entities: T[], seriesMap: SeriesMap, join: SeriesJoin<T>): MergeResult<T> {
  const seen = new Set<string>();
  let matched = 0;

  const merged = entities.map((entity) => {
    const name = join.key(entity);
    const descriptors = seriesMap.get(name);
    if (!descriptors) {
      return entity;
    }
    seen.add(name);
    matched++;
    return join.apply(entity, descriptors.map(cloneDescriptor));
  });

  const unmatched = [...seriesMap.keys()].filter((name) => !seen.has(name));
  return { entities: merged, matched, unmatched };
}

export const nodeCostJoin: SeriesJoin<NewNode> = {
  field: "cost",
  key: (node) => node.name,
  apply: (node, cost) => ({ ...node, cost }),
};

export const nodeInflowJoin: SeriesJoin<NewNode> = {
  field: "inflow",
  key: (node) => node.name,
  apply: (node, inflow) => ({ ...node, inflow }),
};

export const processCfJoin: SeriesJoin<NewProcess> = {
  field: "cf",
  key: (process) => process.name,
  apply: (process, cf) => ({ ...process, cf }),
};

export const marketPriceJoin: SeriesJoin<NewMarket> = {
  field: "price",
  key: (market) => market.name,
  apply: (market, price) => ({ ...market, price }),
};
