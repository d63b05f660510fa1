/**
 * Agent System — owns the agents and wires the registry, bus, scheduler,
 * failure log and persistence together.
 *
 * Every mutation here is synchronous on the event loop; only reasoning calls
 * and persistence reads/writes suspend. An agent being created is registered
 * immediately (so its id is taken) but its activations are held back until
 * any stored snapshot has been applied.
 */

import type {
  AgentDefinition,
  AgentId,
  CacheSettings,
  Reasoner,
  RoutingSignal,
} from './agent-protocol.js';
import { Agent, type ActivationHost } from './agent.js';
import { AgentBus, type PublishOptions } from './agent-bus.js';
import { AgentKindRegistry } from './agent-registry.js';
import { ConnectionRegistry } from './connection-registry.js';
import { AgentMeshError, FailureLog, type FailureEvent } from './failures.js';
import { DEFAULT_CACHE_CAPACITY } from './message-cache.js';
import type { AgentSnapshot, PersistenceAdapter, SnapshotSource } from './persistence.js';
import { ActivationScheduler } from './scheduler.js';
import { describeTopology, type AgentDescription, type SystemTopology } from './topology.js';
import logger from '../../lib/logger.js';

/** Keyword and sender used when a SEEK result is handed back to the seeker. */
export const SEEK_RESULT_KEYWORD = 'seek_result';
export const REGISTRY_SENDER = 'registry';

export interface AgentSystemOptions {
  workerConcurrency?: number;
  activationTimeoutMs?: number;
  maxActivationAttempts?: number;
  /** Applied to every agent whose definition does not set its own */
  defaultCache?: CacheSettings;
  /** Used by agents whose definition carries no reasoner */
  reasoner?: Reasoner;
  kinds?: AgentKindRegistry;
  persistence?: PersistenceAdapter;
}

export interface CreateAgentOptions {
  /** Apply this snapshot instead of asking the persistence adapter for one */
  snapshot?: AgentSnapshot;
}

export interface AgentDiscoveryInfo {
  agentId: AgentId;
  outputKeywords: string[];
  inputKeywords: string[];
  activationKeywords: string[];
  exploring: string[];
}

interface AgentEntry {
  agent: Agent;
  config: unknown;
}

export class AgentSystem implements ActivationHost, SnapshotSource {
  readonly registry = new ConnectionRegistry();
  readonly failures = new FailureLog();
  readonly kinds: AgentKindRegistry;
  readonly bus: AgentBus;
  readonly activationTimeoutMs: number;
  readonly maxActivationAttempts: number;

  private readonly agents = new Map<AgentId, AgentEntry>();
  /** Agents registered but still waiting for their stored snapshot */
  private readonly creating = new Set<AgentId>();
  private readonly deferred = new Set<AgentId>();
  private readonly scheduler: ActivationScheduler;
  private readonly defaultCache: CacheSettings;
  private readonly defaultReasoner: Reasoner | undefined;
  private readonly persistence: PersistenceAdapter | undefined;

  constructor(options: AgentSystemOptions = {}) {
    this.kinds = options.kinds ?? new AgentKindRegistry();
    this.activationTimeoutMs = options.activationTimeoutMs ?? 120_000;
    this.maxActivationAttempts = options.maxActivationAttempts ?? 3;
    this.defaultCache = { capacity: DEFAULT_CACHE_CAPACITY, dedup: false, ...options.defaultCache };
    this.defaultReasoner = options.reasoner;
    this.persistence = options.persistence;
    this.persistence?.attach(this);

    if (!Number.isInteger(this.maxActivationAttempts) || this.maxActivationAttempts < 1) {
      throw new AgentMeshError('invalid-config', `maxActivationAttempts must be a positive integer, got ${this.maxActivationAttempts}`);
    }

    this.scheduler = new ActivationScheduler(options.workerConcurrency ?? 4, async (agentId) => {
      const entry = this.agents.get(agentId);
      if (entry) await entry.agent.runActivation();
    });
    this.bus = new AgentBus(
      this.registry,
      (agentId) => this.agents.get(agentId)?.agent,
      (event) => this.reportFailure(event),
    );
  }

  // ─── Agent lifecycle ──────────────────────────────────────────────

  /**
   * Build an agent from a registered kind and register it. The id is taken
   * synchronously; a duplicate id or an unknown kind throws before anything
   * is registered. A stored snapshot, when there is one, is applied before the
   * agent's first activation.
   */
  async createAgent(id: AgentId, kind: string, config: unknown = {}, options: CreateAgentOptions = {}): Promise<Agent> {
    if (!id) {
      throw new AgentMeshError('invalid-config', 'Agent id must be a non-empty string');
    }
    if (this.agents.has(id) || this.registry.has(id)) {
      throw new AgentMeshError('duplicate-agent', `Agent already exists: ${id}`);
    }

    const definition = this.kinds.create(kind, config);
    const agent = this.buildAgent(id, kind, definition);

    this.registry.registerAgent(id);
    this.agents.set(id, { agent, config });
    this.creating.add(id);
    logger.info({ agentId: id, kind }, 'AgentSystem: agent created');

    try {
      const snapshot = options.snapshot ?? (await this.loadStored(id));
      if (snapshot && this.agents.get(id)?.agent === agent) {
        if (this.persistence) {
          this.persistence.restore(id, snapshot);
        } else {
          this.applySnapshot(id, snapshot);
        }
      }
    } finally {
      this.creating.delete(id);
      if (this.deferred.delete(id)) this.scheduler.enqueue(id);
    }
    return agent;
  }

  /**
   * Mark the agent removed and drop it from the registry. An activation in
   * flight runs to completion with its output discarded. Connections other
   * agents hold towards it are pruned on their next delivery.
   */
  async removeAgent(id: AgentId, options: { forgetState?: boolean } = {}): Promise<boolean> {
    const entry = this.agents.get(id);
    if (!entry) return false;
    entry.agent.remove();
    this.scheduler.cancel(id);
    this.deferred.delete(id);
    this.registry.unregisterAgent(id);
    this.agents.delete(id);
    logger.info({ agentId: id }, 'AgentSystem: agent removed');
    if (options.forgetState && this.persistence) {
      await this.persistence.forget(id);
    }
    return true;
  }

  getAgent(id: AgentId): Agent | undefined {
    return this.agents.get(id)?.agent;
  }

  /** Kind configuration the agent was created from. */
  getAgentConfig(id: AgentId): unknown {
    return this.agents.get(id)?.config;
  }

  listAgents(): AgentId[] {
    return [...this.agents.keys()];
  }

  setActivationKeywords(id: AgentId, keywords: readonly string[]): void {
    this.requireAgent(id).setActivationKeywords(keywords);
  }

  // ─── Messaging ────────────────────────────────────────────────────

  /** Route through `sourceId`'s output connections. Returns the delivery count. */
  publish(sourceId: AgentId, keyword: string, payload: string, destinationHint?: AgentId): number {
    const options: PublishOptions = destinationHint !== undefined ? { destinationHint } : {};
    return this.bus.publish(sourceId, keyword, payload, options);
  }

  /** Write straight into one agent's cache, as an outside producer would. */
  inject(agentId: AgentId, keyword: string, payload: string, sender = 'external'): boolean {
    return this.bus.deliver(agentId, { sender, keyword, payload });
  }

  /** Explicit trigger. Runs the reasoner even when no unused input is waiting. */
  trigger(agentId: AgentId): boolean {
    return this.agents.get(agentId)?.agent.trigger(true) ?? false;
  }

  // ─── Connections ──────────────────────────────────────────────────

  addConnection(source: AgentId, destination: AgentId, keyword: string): boolean {
    return this.registry.addConnection(source, destination, keyword);
  }

  removeConnection(source: AgentId, destination: AgentId, keyword: string): boolean {
    return this.registry.removeConnection(source, destination, keyword);
  }

  resolve(source: AgentId, keyword: string): readonly AgentId[] {
    return this.registry.resolve(source, keyword);
  }

  discover(agentId: AgentId): AgentDiscoveryInfo | undefined {
    const found = this.registry.discover(agentId);
    const agent = this.agents.get(agentId)?.agent;
    if (!found || !agent) return undefined;
    return { ...found, activationKeywords: agent.getActivationKeywords() };
  }

  explore(agentId: AgentId, keyword: string): boolean {
    return this.registry.explore(agentId, keyword);
  }

  stopExplore(agentId: AgentId, keyword: string): boolean {
    return this.registry.stopExplore(agentId, keyword);
  }

  seek(sourceId: AgentId, keyword: string): AgentId[] {
    return this.registry.seek(sourceId, keyword);
  }

  // ─── ActivationHost ───────────────────────────────────────────────

  enqueue(agentId: AgentId): boolean {
    if (this.creating.has(agentId)) {
      this.deferred.add(agentId);
      return true;
    }
    return this.scheduler.enqueue(agentId);
  }

  outputKeywords(agentId: AgentId): string[] {
    return this.registry.outputConnections(agentId).map((c) => c.keyword);
  }

  reportFailure(event: Omit<FailureEvent, 'at'>): void {
    this.failures.record(event);
  }

  applySignal(agentId: AgentId, signal: RoutingSignal): void {
    switch (signal.type) {
      case 'EXPLORE':
        this.registry.explore(agentId, signal.keyword);
        return;
      case 'STOP_EXPLORE':
        this.registry.stopExplore(agentId, signal.keyword);
        return;
      case 'SEEK': {
        const candidates = this.registry.seek(agentId, signal.keyword);
        if (signal.target !== undefined && candidates.includes(signal.target)) {
          this.registry.addConnection(agentId, signal.target, signal.keyword);
          return;
        }
        this.bus.deliver(agentId, {
          sender: REGISTRY_SENDER,
          keyword: SEEK_RESULT_KEYWORD,
          payload: JSON.stringify({ keyword: signal.keyword, candidates }),
        });
        return;
      }
      case 'ACCEPT_INPUT':
        this.registry.setInputKeyword(agentId, signal.id, signal.keyword);
        this.registry.addConnection(signal.id, agentId, signal.keyword);
        return;
      case 'REJECT_INPUT': {
        this.registry.removeInputKeyword(agentId, signal.keyword);
        for (const { source, keyword } of this.registry.connectionsInto(agentId)) {
          if (keyword === signal.keyword) this.registry.removeConnection(source, agentId, keyword);
        }
        return;
      }
    }
  }

  async afterActivation(agent: Agent): Promise<void> {
    if (!this.persistence || this.agents.get(agent.id)?.agent !== agent) return;
    await this.persistence.sync(agent.id);
  }

  // ─── Snapshots ────────────────────────────────────────────────────

  captureSnapshot(agentId: AgentId): AgentSnapshot | undefined {
    const entry = this.agents.get(agentId);
    if (!entry) return undefined;
    const { agent, config } = entry;
    const stats = agent.stats.snapshot();
    return {
      version: 1,
      agentId,
      kind: agent.kind,
      config,
      selfState: agent.selfState,
      activationKeywords: agent.getActivationKeywords(),
      outputConnections: this.registry.outputConnections(agentId),
      inputConnections: this.registry.inputConnections(agentId),
      exploring: this.registry.exploredBy(agentId),
      cache: agent.cache.snapshot(),
      stats: { totalActivations: stats.totalActivations, keywordCounts: stats.keywordCounts },
      savedAt: new Date().toISOString(),
    };
  }

  applySnapshot(agentId: AgentId, snapshot: AgentSnapshot): void {
    const agent = this.requireAgent(agentId);
    agent.selfState = snapshot.selfState;
    agent.setActivationKeywords(snapshot.activationKeywords);
    for (const { keyword, destinations } of snapshot.outputConnections) {
      for (const destination of destinations) this.registry.addConnection(agentId, destination, keyword);
    }
    for (const { source, keyword } of snapshot.inputConnections) {
      this.registry.setInputKeyword(agentId, source, keyword);
    }
    for (const keyword of snapshot.exploring) this.registry.explore(agentId, keyword);
    const dropped = agent.cache.restore(snapshot.cache);
    if (dropped > 0) {
      this.reportFailure({
        kind: 'cache-overflow',
        agentId,
        retryCount: 0,
        message: `Cache full: dropped ${dropped} unused message(s) on restore`,
      });
    }
    agent.stats.seed(snapshot.stats.totalActivations, snapshot.stats.keywordCounts);
    logger.info(
      { agentId, entries: snapshot.cache.entries.length, savedAt: snapshot.savedAt },
      'AgentSystem: snapshot restored',
    );
  }

  // ─── Inspection ───────────────────────────────────────────────────

  describeAgent(agentId: AgentId): AgentDescription | undefined {
    const agent = this.agents.get(agentId)?.agent;
    if (!agent) return undefined;
    return {
      id: agent.id,
      kind: agent.kind,
      state: agent.lifecycleState,
      capabilities: { ...agent.capabilities },
      activationKeywords: agent.getActivationKeywords(),
      selfState: agent.selfState,
      outputConnections: this.registry.outputConnections(agentId),
      inputConnections: this.registry.inputConnections(agentId),
      exploring: this.registry.exploredBy(agentId),
      cache: { size: agent.cache.size, unused: agent.cache.unusedCount },
      retryCount: agent.retryCount,
      stats: agent.stats.snapshot(),
    };
  }

  describeSystem(): SystemTopology {
    const descriptions: AgentDescription[] = [];
    for (const id of this.agents.keys()) {
      const description = this.describeAgent(id);
      if (description) descriptions.push(description);
    }
    return describeTopology(descriptions);
  }

  onFailure(listener: (event: FailureEvent) => void): () => void {
    return this.failures.subscribe(listener);
  }

  /** Resolves once no activation is queued or running. */
  whenIdle(): Promise<void> {
    return this.scheduler.whenIdle();
  }

  /** Stop starting activations. Runs already in flight finish on their own. */
  stop(): void {
    this.scheduler.stop();
  }

  // ─── Private Helpers ──────────────────────────────────────────────

  private buildAgent(id: AgentId, kind: string, definition: AgentDefinition): Agent {
    const reasoner = definition.reasoner ?? this.defaultReasoner;
    if (!reasoner) {
      throw new AgentMeshError('invalid-config', `No reasoner available for agent ${id} (kind '${kind}')`);
    }
    return new Agent(
      id,
      kind,
      { ...definition, cache: { ...this.defaultCache, ...definition.cache } },
      reasoner,
      this,
    );
  }

  private async loadStored(id: AgentId): Promise<AgentSnapshot | null> {
    if (!this.persistence) return null;
    try {
      return await this.persistence.load(id);
    } catch (err) {
      logger.warn(
        { agentId: id, err: err instanceof Error ? err.message : String(err) },
        'AgentSystem: could not load stored snapshot; starting empty',
      );
      return null;
    }
  }

  private requireAgent(id: AgentId): Agent {
    const agent = this.agents.get(id)?.agent;
    if (!agent) {
      throw new AgentMeshError('unknown-agent', `Unknown agent: ${id}`);
    }
    return agent;
  }
}
