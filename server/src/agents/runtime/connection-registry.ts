/**
 * Connection Registry — directed, keyword-tagged links between agents.
 *
 * Read-heavy, write-occasional. Each source agent's output table is an
 * immutable map of frozen arrays that is replaced wholesale on mutation, so
 * `resolve()` hands out a snapshot that later adds or removes never touch.
 * A delivery that resolved before a removeConnection() still completes
 * against the destinations it saw.
 *
 * Also holds the explore/seek directory: agents that declare themselves
 * discoverable for an input keyword, and the lookup a seeking agent uses to
 * find them. The registry returns every candidate; it never picks one.
 */

import type { AgentId } from './agent-protocol.js';
import { AgentMeshError } from './failures.js';

type OutputTable = ReadonlyMap<string, readonly AgentId[]>;
type InputTable = ReadonlyMap<AgentId, string>;

export interface OutputConnection {
  keyword: string;
  destinations: AgentId[];
}

export interface InputConnection {
  source: AgentId;
  keyword: string;
}

export interface AgentDiscovery {
  agentId: AgentId;
  /** Keywords this agent can publish on (has at least one connection for) */
  outputKeywords: string[];
  /** Keywords this agent expects from its known sources */
  inputKeywords: string[];
  /** Keywords this agent is discoverable for */
  exploring: string[];
}

const EMPTY: readonly AgentId[] = Object.freeze([]);

function edgeKey(source: AgentId, destination: AgentId, keyword: string): string {
  return `${source}\u0000${destination}\u0000${keyword}`;
}

export class ConnectionRegistry {
  private readonly agents = new Set<AgentId>();
  private readonly outputs = new Map<AgentId, OutputTable>();
  private readonly inputs = new Map<AgentId, InputTable>();
  private explorers = new Map<string, readonly AgentId[]>();
  private readonly reportedDangling = new Set<string>();

  // ─── Membership ───────────────────────────────────────────────────

  registerAgent(agentId: AgentId): void {
    if (this.agents.has(agentId)) {
      throw new AgentMeshError('duplicate-agent', `Agent already registered: ${agentId}`);
    }
    this.agents.add(agentId);
  }

  /**
   * Drop an agent with its own output table, input mappings and explore
   * entries. Connections other agents hold towards it are left in place and
   * pruned on the first delivery that misses.
   */
  unregisterAgent(agentId: AgentId): boolean {
    if (!this.agents.delete(agentId)) return false;
    this.outputs.delete(agentId);
    this.inputs.delete(agentId);

    const next = new Map<string, readonly AgentId[]>();
    for (const [keyword, ids] of this.explorers) {
      const filtered = ids.filter((id) => id !== agentId);
      if (filtered.length > 0) next.set(keyword, Object.freeze(filtered));
    }
    this.explorers = next;
    return true;
  }

  has(agentId: AgentId): boolean {
    return this.agents.has(agentId);
  }

  listAgents(): AgentId[] {
    return [...this.agents];
  }

  // ─── Connections ──────────────────────────────────────────────────

  /** Idempotent. Returns false when the triple already existed. */
  addConnection(source: AgentId, destination: AgentId, keyword: string): boolean {
    const table = this.outputs.get(source);
    const current = table?.get(keyword) ?? EMPTY;
    if (current.includes(destination)) return false;

    const next = new Map<string, readonly AgentId[]>(table ?? []);
    next.set(keyword, Object.freeze([...current, destination]));
    this.outputs.set(source, next);
    this.reportedDangling.delete(edgeKey(source, destination, keyword));
    return true;
  }

  /** Returns false ("not found") when the triple does not exist. */
  removeConnection(source: AgentId, destination: AgentId, keyword: string): boolean {
    const table = this.outputs.get(source);
    const current = table?.get(keyword);
    if (!table || !current || !current.includes(destination)) return false;

    const next = new Map<string, readonly AgentId[]>(table);
    const remaining = current.filter((id) => id !== destination);
    if (remaining.length > 0) {
      next.set(keyword, Object.freeze(remaining));
    } else {
      next.delete(keyword);
    }
    if (next.size > 0) {
      this.outputs.set(source, next);
    } else {
      this.outputs.delete(source);
    }
    return true;
  }

  /** Destinations for (source, keyword). The returned array is frozen and never mutated later. */
  resolve(source: AgentId, keyword: string): readonly AgentId[] {
    return this.outputs.get(source)?.get(keyword) ?? EMPTY;
  }

  outputConnections(source: AgentId): OutputConnection[] {
    const table = this.outputs.get(source);
    if (!table) return [];
    return [...table].map(([keyword, destinations]) => ({ keyword, destinations: [...destinations] }));
  }

  /** Every (source, keyword) pair that currently routes to `destination`. */
  connectionsInto(destination: AgentId): InputConnection[] {
    const found: InputConnection[] = [];
    for (const [source, table] of this.outputs) {
      for (const [keyword, destinations] of table) {
        if (destinations.includes(destination)) found.push({ source, keyword });
      }
    }
    return found;
  }

  /**
   * Called when a delivery found no live destination. Removes the connection
   * and returns true the first time this edge is reported, false afterwards.
   */
  pruneDangling(source: AgentId, destination: AgentId, keyword: string): boolean {
    this.removeConnection(source, destination, keyword);
    const key = edgeKey(source, destination, keyword);
    if (this.reportedDangling.has(key)) return false;
    this.reportedDangling.add(key);
    return true;
  }

  // ─── Input mappings ───────────────────────────────────────────────

  /** Messages from `source` land in `destination`'s cache under `keyword`. */
  setInputKeyword(destination: AgentId, source: AgentId, keyword: string): void {
    const next = new Map<AgentId, string>(this.inputs.get(destination) ?? []);
    next.set(source, keyword);
    this.inputs.set(destination, next);
  }

  inputKeywordFor(destination: AgentId, source: AgentId): string | undefined {
    return this.inputs.get(destination)?.get(source);
  }

  inputConnections(destination: AgentId): InputConnection[] {
    const table = this.inputs.get(destination);
    if (!table) return [];
    return [...table].map(([source, keyword]) => ({ source, keyword }));
  }

  /** Forget every source mapped to `keyword`. Returns the sources that were dropped. */
  removeInputKeyword(destination: AgentId, keyword: string): AgentId[] {
    const table = this.inputs.get(destination);
    if (!table) return [];
    const dropped: AgentId[] = [];
    const next = new Map<AgentId, string>();
    for (const [source, kw] of table) {
      if (kw === keyword) {
        dropped.push(source);
      } else {
        next.set(source, kw);
      }
    }
    if (next.size > 0) {
      this.inputs.set(destination, next);
    } else {
      this.inputs.delete(destination);
    }
    return dropped;
  }

  // ─── Explore / seek ───────────────────────────────────────────────

  explore(agentId: AgentId, keyword: string): boolean {
    const current = this.explorers.get(keyword) ?? EMPTY;
    if (current.includes(agentId)) return false;
    const next = new Map<string, readonly AgentId[]>(this.explorers);
    next.set(keyword, Object.freeze([...current, agentId]));
    this.explorers = next;
    return true;
  }

  stopExplore(agentId: AgentId, keyword: string): boolean {
    const current = this.explorers.get(keyword);
    if (!current || !current.includes(agentId)) return false;
    const next = new Map<string, readonly AgentId[]>(this.explorers);
    const remaining = current.filter((id) => id !== agentId);
    if (remaining.length > 0) {
      next.set(keyword, Object.freeze(remaining));
    } else {
      next.delete(keyword);
    }
    this.explorers = next;
    return true;
  }

  /** Agents exploring `keyword`, in the order they started, excluding the seeker. */
  seek(source: AgentId, keyword: string): AgentId[] {
    const current = this.explorers.get(keyword) ?? EMPTY;
    return current.filter((id) => id !== source && this.agents.has(id));
  }

  exploredBy(agentId: AgentId): string[] {
    const keywords: string[] = [];
    for (const [keyword, ids] of this.explorers) {
      if (ids.includes(agentId)) keywords.push(keyword);
    }
    return keywords;
  }

  discover(agentId: AgentId): AgentDiscovery | undefined {
    if (!this.agents.has(agentId)) return undefined;
    const inputKeywords = new Set(this.inputConnections(agentId).map((c) => c.keyword));
    return {
      agentId,
      outputKeywords: [...(this.outputs.get(agentId)?.keys() ?? [])],
      inputKeywords: [...inputKeywords],
      exploring: this.exploredBy(agentId),
    };
  }

  /** Every keyword that appears in a connection, input mapping or explore entry. */
  keywords(): string[] {
    const all = new Set<string>();
    for (const table of this.outputs.values()) {
      for (const keyword of table.keys()) all.add(keyword);
    }
    for (const table of this.inputs.values()) {
      for (const keyword of table.values()) all.add(keyword);
    }
    for (const keyword of this.explorers.keys()) all.add(keyword);
    return [...all];
  }
}
