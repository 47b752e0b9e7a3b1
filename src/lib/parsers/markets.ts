import type { PipelineLogger } from "@/pipeline/types";

import type { MarketDirection, MarketType, NewMarket, ValueDescriptor } from "../model/types";
import { toBool, toFloat, toOptionalText, toText } from "../tabular/coerce";
import type { Table } from "../tabular/readTable";
import { cell, requireSheet } from "./sheet";

export const MARKET_COLUMNS = [
  "market",
  "market_type",
  "node",
  "processgroup",
  "direction",
  "realisation",
  "reserve_type",
  "is_bid",
  "is_limited",
  "min_bid",
  "max_bid",
  "fee",
] as const;

const MARKET_TYPES = new Map<string, MarketType>([
  ["energy", "ENERGY"],
  ["e", "ENERGY"],
  ["reserve", "RESERVE"],
  ["res", "RESERVE"],
  ["r", "RESERVE"],
]);

const DIRECTIONS = new Map<string, MarketDirection>([
  ["up", "UP"],
  ["u", "UP"],
  ["down", "DOWN"],
  ["d", "DOWN"],
  ["up_down", "UP_DOWN"],
  ["updown", "UP_DOWN"],
  ["both", "UP_DOWN"],
  ["res_up", "RES_UP"],
  ["rup", "RES_UP"],
  ["reserve_up", "RES_UP"],
  ["res_down", "RES_DOWN"],
  ["rdown", "RES_DOWN"],
  ["reserve_down", "RES_DOWN"],
]);

/**
 * Unknown market types, an empty cell included, become ENERGY with a warning.
 */
export async function mapMarketType(raw: string, log: PipelineLogger): Promise<MarketType> {
  const key = raw.trim().toLowerCase();
  const mType = MARKET_TYPES.get(key);
  if (mType) {
    return mType;
  }
  await log({
    level: "warn",
    message: `Unknown market_type '${raw.trim()}', defaulting to ENERGY`,
    meta: { value: raw },
  });
  return "ENERGY";
}

/**
 * Empty stays null quietly; an unknown direction is null with a warning.
 */
export async function mapDirection(
  raw: string,
  log: PipelineLogger
): Promise<MarketDirection | null> {
  const key = raw.trim().toLowerCase();
  if (!key) {
    return null;
  }
  const direction = DIRECTIONS.get(key);
  if (direction) {
    return direction;
  }
  await log({
    level: "warn",
    message: `Unknown direction '${raw.trim()}', leaving it unset`,
    meta: { value: raw },
  });
  return null;
}

function realisationOf(raw: string): ValueDescriptor[] {
  if (!raw.trim()) {
    return [];
  }
  return [{ scenario: null, constant: toFloat(raw, 0) }];
}

/**
 * One NewMarket per named row. Only `price` is enriched later; the other price
 * slots stay empty.
 */
export async function parseMarkets(table: Table | null, log: PipelineLogger): Promise<NewMarket[]> {
  const rows = requireSheet(table, "markets", MARKET_COLUMNS);
  const nodeColumn = table?.columns.includes("market_node") ? "market_node" : "node";
  const markets: NewMarket[] = [];

  for (const row of rows) {
    const name = toText(cell(row, "market"));
    if (!name) {
      continue;
    }

    markets.push({
      name,
      mType: await mapMarketType(cell(row, "market_type"), log),
      node: toText(cell(row, nodeColumn)),
      processGroup: toText(cell(row, "processgroup")),
      direction: await mapDirection(cell(row, "direction"), log),
      realisation: realisationOf(cell(row, "realisation")),
      reserveType: toOptionalText(cell(row, "reserve_type")),
      isBid: toBool(cell(row, "is_bid")),
      isLimited: toBool(cell(row, "is_limited")),
      minBid: toFloat(cell(row, "min_bid"), 0),
      maxBid: toFloat(cell(row, "max_bid"), 0),
      fee: toFloat(cell(row, "fee"), 0),
      price: [],
      upPrice: [],
      downPrice: [],
      reserveActivationPrice: [],
    });
  }

  return markets;
}
