/**
 * Input records of the energy model service, as they are sent in mutation
 * variables. Field names follow the service's GraphQL input types.
 */

export type ConstantValue = {
  scenario: string | null;
  constant: number;
};

export type SeriesValue = {
  scenario: string | null;
  series: number[];
};

/**
 * One decoded time-series column. `scenario: null` applies to every scenario.
 */
export type ValueDescriptor = ConstantValue | SeriesValue;

/**
 * Decoded wide sheet: entity name to its descriptors, in column order.
 */
export type SeriesMap = Map<string, ValueDescriptor[]>;

export type InputDataSetup = {
  useMarketBids?: boolean | null;
  useReserves?: boolean | null;
  useReserveRealisation?: boolean | null;
  useNodeDummyVariables?: boolean | null;
  useRampDummyVariables?: boolean | null;
  commonTimesteps?: number | null;
  commonScenarioName?: string | null;
  nodeDummyVariableCost?: number | null;
  rampDummyVariableCost?: number | null;
};

export type NewNode = {
  name: string;
  isCommodity: boolean;
  isMarket: boolean;
  isRes: boolean;
  cost: ValueDescriptor[];
  inflow: ValueDescriptor[];
};

export type NewState = {
  inMax: number;
  outMax: number;
  stateLossProportional: number;
  stateMin: number;
  stateMax: number;
  initialState: number;
  isScenarioIndependent: boolean;
  isTemp: boolean;
  tEConversion: number;
  residualValue: number;
};

export type NodeStateInput = {
  nodeName: string;
  state: NewState;
};

export const CONVERSIONS = ["UNIT", "TRANSFER", "MARKET"] as const;
export type Conversion = (typeof CONVERSIONS)[number];

export type NewProcess = {
  name: string;
  conversion: Conversion;
  isCfFix: boolean;
  isOnline: boolean;
  isRes: boolean;
  eff: number;
  loadMin: number;
  loadMax: number;
  startCost: number;
  minOnline: number;
  maxOnline: number;
  minOffline: number;
  maxOffline: number;
  initialState: boolean;
  isScenarioIndependent: boolean;
  cf: ValueDescriptor[];
  effTs: ValueDescriptor[];
  effOpsFun: ValueDescriptor[];
};

export type NewTopology = {
  capacity: number;
  vomCost: number;
  rampUp: number;
  rampDown: number;
  initialLoad: number;
  initialFlow: number;
  capTs: ValueDescriptor[];
};

export type TopologyInput = {
  processName: string;
  sourceNodeName: string | null;
  sinkNodeName: string | null;
  topology: NewTopology;
};

export type NodeGroupMembership = { nodeName: string; groupName: string };
export type ProcessGroupMembership = { processName: string; groupName: string };

export type GroupSheet = {
  nodeGroups: string[];
  processGroups: string[];
  nodeMemberships: NodeGroupMembership[];
  processMemberships: ProcessGroupMembership[];
};

export type MarketType = "ENERGY" | "RESERVE";
export type MarketDirection = "UP" | "DOWN" | "UP_DOWN" | "RES_UP" | "RES_DOWN";

export type NewMarket = {
  name: string;
  mType: MarketType;
  node: string;
  processGroup: string;
  direction: MarketDirection | null;
  realisation: ValueDescriptor[];
  reserveType: string | null;
  isBid: boolean;
  isLimited: boolean;
  minBid: number;
  maxBid: number;
  fee: number;
  price: ValueDescriptor[];
  upPrice: ValueDescriptor[];
  downPrice: ValueDescriptor[];
  reserveActivationPrice: ValueDescriptor[];
};

export type NewRisk = {
  parameter: string;
  value: number;
};

export type ScenarioInput = {
  name: string;
  weight: number;
};

/**
 * Everything parsed from one set of sheets, after enrichment.
 * `setup` is null when the setup sheet is absent.
 */
export type EnergyModel = {
  setup: InputDataSetup | null;
  scenarios: ScenarioInput[];
  nodes: NewNode[];
  nodeStates: NodeStateInput[];
  processes: NewProcess[];
  groups: GroupSheet;
  topologies: TopologyInput[];
  markets: NewMarket[];
  risks: NewRisk[];
};
