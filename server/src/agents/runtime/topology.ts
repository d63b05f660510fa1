/**
 * Read-only views of agents and of the whole mesh, for the gateway, the
 * checkpoint files and tests.
 */

import type { AgentCapabilities, AgentId, AgentLifecycleState } from './agent-protocol.js';
import type { ActivationStatsSnapshot } from './activation-stats.js';
import type { InputConnection, OutputConnection } from './connection-registry.js';

export interface AgentDescription {
  id: AgentId;
  kind: string;
  state: AgentLifecycleState;
  capabilities: AgentCapabilities;
  activationKeywords: string[];
  selfState: string;
  outputConnections: OutputConnection[];
  inputConnections: InputConnection[];
  exploring: string[];
  cache: { size: number; unused: number };
  retryCount: number;
  stats: ActivationStatsSnapshot;
}

export interface KeywordSubgraph {
  keyword: string;
  /** Agents that send, receive, expect or explore this keyword, sorted */
  agents: AgentId[];
  connections: number;
}

export interface SystemTopology {
  agents: AgentDescription[];
  keywords: string[];
  subgraphs: KeywordSubgraph[];
}

export function describeTopology(agents: AgentDescription[]): SystemTopology {
  const members = new Map<string, Set<AgentId>>();
  const edges = new Map<string, number>();

  const touch = (keyword: string, ...ids: AgentId[]) => {
    let set = members.get(keyword);
    if (!set) {
      set = new Set<AgentId>();
      members.set(keyword, set);
    }
    for (const id of ids) set.add(id);
  };

  for (const agent of agents) {
    for (const { keyword, destinations } of agent.outputConnections) {
      touch(keyword, agent.id, ...destinations);
      edges.set(keyword, (edges.get(keyword) ?? 0) + destinations.length);
    }
    for (const { keyword } of agent.inputConnections) touch(keyword, agent.id);
    for (const keyword of agent.exploring) touch(keyword, agent.id);
  }

  const keywords = [...members.keys()].sort();
  return {
    agents,
    keywords,
    subgraphs: keywords.map((keyword) => ({
      keyword,
      agents: [...(members.get(keyword) ?? [])].sort(),
      connections: edges.get(keyword) ?? 0,
    })),
  };
}
