/**
 * Persistence Adapter — captures and restores one agent's connections and
 * cache through a pluggable store.
 *
 * The core calls sync() after each successful activation when auto-sync is
 * on, and load() + restore() once when an agent is created. What the store
 * does with a snapshot is its own business; everything it hands back is
 * validated against AgentSnapshotSchema before it touches a live agent.
 */

import { z } from 'zod';
import type { AgentId } from './agent-protocol.js';
import logger from '../../lib/logger.js';
import { formatIssues } from '../../lib/validate.js';

export const CachedMessageSchema = z.object({
  sequence: z.number().int().positive(),
  sender: z.string(),
  keyword: z.string(),
  payload: z.string(),
  used: z.boolean(),
  receivedAt: z.string(),
});

export const AgentSnapshotSchema = z.object({
  version: z.literal(1),
  agentId: z.string().min(1),
  kind: z.string().min(1),
  config: z.unknown().optional(),
  selfState: z.string(),
  activationKeywords: z.array(z.string()),
  outputConnections: z.array(z.object({
    keyword: z.string(),
    destinations: z.array(z.string()),
  })),
  inputConnections: z.array(z.object({
    source: z.string(),
    keyword: z.string(),
  })),
  exploring: z.array(z.string()),
  cache: z.object({
    nextSequence: z.number().int().positive(),
    entries: z.array(CachedMessageSchema),
  }),
  stats: z.object({
    totalActivations: z.number().int().nonnegative(),
    keywordCounts: z.record(z.number().int().nonnegative()),
  }),
  savedAt: z.string(),
});

export type AgentSnapshot = z.infer<typeof AgentSnapshotSchema>;

/** Where snapshots live. Implementations: memory, JSON files, Redis. */
export interface PersistenceStore {
  /** The stored record, or null when there is none. Not trusted: validated by the adapter. */
  load(agentId: AgentId): Promise<unknown>;
  save(agentId: AgentId, snapshot: AgentSnapshot): Promise<void>;
  remove(agentId: AgentId): Promise<void>;
}

/** The live side: the system that can produce and apply snapshots. */
export interface SnapshotSource {
  captureSnapshot(agentId: AgentId): AgentSnapshot | undefined;
  applySnapshot(agentId: AgentId, snapshot: AgentSnapshot): void;
}

export interface PersistenceOptions {
  /** Save a snapshot after every successful activation. Default: true */
  autoSync?: boolean;
}

export function parseSnapshot(raw: unknown): { ok: true; snapshot: AgentSnapshot } | { ok: false; message: string } {
  const parsed = AgentSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, message: formatIssues(parsed.error.issues) };
  }
  return { ok: true, snapshot: parsed.data };
}

export class PersistenceAdapter {
  readonly autoSync: boolean;
  private source: SnapshotSource | null = null;
  private readonly inFlight = new Map<AgentId, Set<Promise<void>>>();

  constructor(
    private readonly store: PersistenceStore,
    options: PersistenceOptions = {},
  ) {
    this.autoSync = options.autoSync ?? true;
  }

  attach(source: SnapshotSource): void {
    this.source = source;
  }

  /**
   * Capture the agent's current state and write it to the store. Returns the
   * snapshot that was written, or null when the agent is unknown.
   */
  async snapshot(agentId: AgentId): Promise<AgentSnapshot | null> {
    const snapshot = this.requireSource().captureSnapshot(agentId);
    if (!snapshot) return null;
    const write = this.store.save(agentId, snapshot);
    let writes = this.inFlight.get(agentId);
    if (!writes) {
      writes = new Set();
      this.inFlight.set(agentId, writes);
    }
    writes.add(write);
    try {
      await write;
    } finally {
      writes.delete(write);
      if (writes.size === 0 && this.inFlight.get(agentId) === writes) this.inFlight.delete(agentId);
    }
    return snapshot;
  }

  /** Apply a snapshot to the live agent. */
  restore(agentId: AgentId, snapshot: AgentSnapshot): void {
    this.requireSource().applySnapshot(agentId, snapshot);
  }

  /** Read and validate the stored snapshot. Invalid records are logged and treated as absent. */
  async load(agentId: AgentId): Promise<AgentSnapshot | null> {
    const raw = await this.store.load(agentId);
    if (raw === null || raw === undefined) return null;
    const parsed = parseSnapshot(raw);
    if (!parsed.ok) {
      logger.warn({ agentId, reason: parsed.message }, 'Persistence: ignoring invalid stored snapshot');
      return null;
    }
    if (parsed.snapshot.agentId !== agentId) {
      logger.warn({ agentId, storedId: parsed.snapshot.agentId }, 'Persistence: stored snapshot belongs to another agent');
      return null;
    }
    return parsed.snapshot;
  }

  /**
   * Best-effort save after a state change. A store failure is logged and
   * swallowed; the activation that triggered the sync has already succeeded.
   */
  async sync(agentId: AgentId): Promise<boolean> {
    if (!this.autoSync) return false;
    try {
      return (await this.snapshot(agentId)) !== null;
    } catch (err) {
      logger.warn(
        { agentId, err: err instanceof Error ? err.message : String(err) },
        'Persistence: snapshot save failed',
      );
      return false;
    }
  }

  /**
   * Delete the stored snapshot. Saves already in flight for the agent land
   * first, so none of them can bring the state back afterwards. Their own
   * callers see and log any failure.
   */
  async forget(agentId: AgentId): Promise<void> {
    const writes = this.inFlight.get(agentId);
    if (writes) await Promise.allSettled([...writes]);
    await this.store.remove(agentId);
  }

  private requireSource(): SnapshotSource {
    if (!this.source) {
      throw new Error('PersistenceAdapter: not attached to an agent system');
    }
    return this.source;
  }
}
