/**
 * Mutation documents of the model service, keyed by the batch that uses them.
 * Results that return `ValidationErrors` select `errors`; those returning
 * `MaybeError` select `message`.
 */
export const MUTATIONS = {
  setup: `mutation CreateInputDataSetup($setup: InputDataSetupInput!) {
  createInputDataSetup(setupUpdate: $setup) {
    errors {
      field
      message
    }
  }
}`,
  scenario: `mutation CreateScenario($name: String!, $weight: Float!) {
  createScenario(name: $name, weight: $weight) {
    message
  }
}`,
  node: `mutation CreateNode($node: NewNode!) {
  createNode(node: $node) {
    errors {
      field
      message
    }
  }
}`,
  nodeState: `mutation SetNodeState($nodeName: String!, $state: NewState) {
  setNodeState(nodeName: $nodeName, state: $state) {
    errors {
      field
      message
    }
  }
}`,
  process: `mutation CreateProcess($process: NewProcess!) {
  createProcess(process: $process) {
    errors {
      field
      message
    }
  }
}`,
  nodeGroup: `mutation CreateNodeGroup($groupName: String!) {
  createNodeGroup(groupName: $groupName) {
    message
  }
}`,
  processGroup: `mutation CreateProcessGroup($groupName: String!) {
  createProcessGroup(groupName: $groupName) {
    message
  }
}`,
  nodeGroupMembership: `mutation AddNodeToGroup($nodeName: String!, $groupName: String!) {
  addNodeToGroup(nodeName: $nodeName, groupName: $groupName) {
    message
  }
}`,
  processGroupMembership: `mutation AddProcessToGroup($processName: String!, $groupName: String!) {
  addProcessToGroup(processName: $processName, groupName: $groupName) {
    message
  }
}`,
  topology: `mutation CreateTopology($topology: NewTopology!, $processName: String!, $sourceNodeName: String, $sinkNodeName: String) {
  createTopology(topology: $topology, processName: $processName, sourceNodeName: $sourceNodeName, sinkNodeName: $sinkNodeName) {
    errors {
      field
      message
    }
  }
}`,
  market: `mutation CreateMarket($market: NewMarket!) {
  createMarket(market: $market) {
    errors {
      field
      message
    }
  }
}`,
  risk: `mutation CreateRisk($risk: NewRisk!) {
  createRisk(risk: $risk) {
    errors {
      field
      message
    }
  }
}`,
} as const;

export type MutationName = keyof typeof MUTATIONS;
