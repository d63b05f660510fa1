import type { AgentId } from '../agents/runtime/agent-protocol.js';
import type { AgentSnapshot, PersistenceStore } from '../agents/runtime/persistence.js';

/**
 * Keeps snapshots in process memory. Records are stored as JSON text so a
 * saved snapshot cannot be mutated through a live reference.
 */
export class MemoryPersistenceStore implements PersistenceStore {
  private readonly records = new Map<AgentId, string>();

  async load(agentId: AgentId): Promise<unknown> {
    const raw = this.records.get(agentId);
    return raw === undefined ? null : JSON.parse(raw);
  }

  async save(agentId: AgentId, snapshot: AgentSnapshot): Promise<void> {
    this.records.set(agentId, JSON.stringify(snapshot));
  }

  async remove(agentId: AgentId): Promise<void> {
    this.records.delete(agentId);
  }

  has(agentId: AgentId): boolean {
    return this.records.has(agentId);
  }

  get size(): number {
    return this.records.size;
  }
}
