import type { EnergyModel } from "../model/types";
import type { MutationName } from "./mutations";
import { buildEnvelope, itemFileName, type GraphqlEnvelope } from "./payloads";

/**
 * Batches in submission order. Later batches refer to entities of earlier ones
 * by name: memberships need their group, topologies their nodes and process.
 */
export const BATCH_ORDER = [
  "setup",
  "scenarios",
  "nodes",
  "nodeStates",
  "processes",
  "nodeGroups",
  "processGroups",
  "nodeGroupMemberships",
  "processGroupMemberships",
  "topologies",
  "markets",
  "risks",
] as const;

export type BatchId = (typeof BATCH_ORDER)[number];

export type PayloadItem = {
  /** Human-readable name used in logs and reports. */
  label: string;
  fileName: string;
  envelope: GraphqlEnvelope;
};

export type PayloadBatch = {
  id: BatchId;
  title: string;
  /** File holding every envelope of the batch; null for single-record batches. */
  combinedFileName: string | null;
  items: PayloadItem[];
};

type BatchShape<T> = {
  id: BatchId;
  title: string;
  mutation: MutationName;
  filePrefix: string;
  combinedName: string;
  key: (record: T) => string;
  variables: (record: T) => Record<string, unknown>;
};

function collectionBatch<T>(shape: BatchShape<T>, records: T[]): PayloadBatch {
  return {
    id: shape.id,
    title: shape.title,
    combinedFileName: `${shape.combinedName}_all.json`,
    items: records.map((record) => {
      const key = shape.key(record);
      return {
        label: key,
        fileName: itemFileName(shape.filePrefix, key),
        envelope: buildEnvelope(shape.mutation, shape.variables(record)),
      };
    }),
  };
}

/**
 * Assembles every record of the model into mutation envelopes, batch by batch,
 * keeping parse order within a batch.
 */
export function buildPayloadBatches(model: EnergyModel): PayloadBatch[] {
  const setupBatch: PayloadBatch = {
    id: "setup",
    title: "Input data setup",
    combinedFileName: null,
    items: model.setup
      ? [
          {
            label: "setup",
            fileName: "inputdatasetup.json",
            envelope: buildEnvelope("setup", { setup: model.setup }),
          },
        ]
      : [],
  };

  return [
    setupBatch,
    collectionBatch(
      {
        id: "scenarios",
        title: "Scenarios",
        mutation: "scenario",
        filePrefix: "scenario",
        combinedName: "scenarios",
        key: (s) => s.name,
        variables: (s) => ({ name: s.name, weight: s.weight }),
      },
      model.scenarios
    ),
    collectionBatch(
      {
        id: "nodes",
        title: "Nodes",
        mutation: "node",
        filePrefix: "node",
        combinedName: "nodes",
        key: (n) => n.name,
        variables: (n) => ({ node: n }),
      },
      model.nodes
    ),
    collectionBatch(
      {
        id: "nodeStates",
        title: "Node states",
        mutation: "nodeState",
        filePrefix: "node_state",
        combinedName: "node_states",
        key: (s) => s.nodeName,
        variables: (s) => ({ nodeName: s.nodeName, state: s.state }),
      },
      model.nodeStates
    ),
    collectionBatch(
      {
        id: "processes",
        title: "Processes",
        mutation: "process",
        filePrefix: "process",
        combinedName: "processes",
        key: (p) => p.name,
        variables: (p) => ({ process: p }),
      },
      model.processes
    ),
    collectionBatch(
      {
        id: "nodeGroups",
        title: "Node groups",
        mutation: "nodeGroup",
        filePrefix: "node_group",
        combinedName: "node_groups",
        key: (g) => g,
        variables: (g) => ({ groupName: g }),
      },
      model.groups.nodeGroups
    ),
    collectionBatch(
      {
        id: "processGroups",
        title: "Process groups",
        mutation: "processGroup",
        filePrefix: "process_group",
        combinedName: "process_groups",
        key: (g) => g,
        variables: (g) => ({ groupName: g }),
      },
      model.groups.processGroups
    ),
    collectionBatch(
      {
        id: "nodeGroupMemberships",
        title: "Node group memberships",
        mutation: "nodeGroupMembership",
        filePrefix: "node_group_membership",
        combinedName: "node_group_memberships",
        key: (m) => `${m.nodeName} ${m.groupName}`,
        variables: (m) => ({ nodeName: m.nodeName, groupName: m.groupName }),
      },
      model.groups.nodeMemberships
    ),
    collectionBatch(
      {
        id: "processGroupMemberships",
        title: "Process group memberships",
        mutation: "processGroupMembership",
        filePrefix: "process_group_membership",
        combinedName: "process_group_memberships",
        key: (m) => `${m.processName} ${m.groupName}`,
        variables: (m) => ({ processName: m.processName, groupName: m.groupName }),
      },
      model.groups.processMemberships
    ),
    collectionBatch(
      {
        id: "topologies",
        title: "Topologies",
        mutation: "topology",
        filePrefix: "topology",
        combinedName: "topologies",
        key: (t) =>
          t.sourceNodeName !== null
            ? `${t.sourceNodeName} ${t.processName}`
            : `${t.processName} ${t.sinkNodeName ?? ""}`,
        variables: (t) => ({
          processName: t.processName,
          sourceNodeName: t.sourceNodeName,
          sinkNodeName: t.sinkNodeName,
          topology: t.topology,
        }),
      },
      model.topologies
    ),
    collectionBatch(
      {
        id: "markets",
        title: "Markets",
        mutation: "market",
        filePrefix: "market",
        combinedName: "markets",
        key: (m) => m.name,
        variables: (m) => ({ market: m }),
      },
      model.markets
    ),
    collectionBatch(
      {
        id: "risks",
        title: "Risks",
        mutation: "risk",
        filePrefix: "risk",
        combinedName: "risks",
        key: (r) => r.parameter,
        variables: (r) => ({ risk: r }),
      },
      model.risks
    ),
  ];
}
