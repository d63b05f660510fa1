/**
 * Snapshots in Redis, one string key per agent: `agent-mesh:state:<id>`.
 *
 * Enabled with FF_REDIS_STATE=true and REDIS_URL. The store only needs
 * get/set/del, so it takes that minimal surface; an ioredis client fits it.
 */

import type { AgentId } from '../agents/runtime/agent-protocol.js';
import type { AgentSnapshot, PersistenceStore } from '../agents/runtime/persistence.js';

export const REDIS_KEY_PREFIX = 'agent-mesh:state:';

/** The part of the ioredis client this store uses. */
export interface RedisStateClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
}

export function redisKeyFor(agentId: AgentId): string {
  return `${REDIS_KEY_PREFIX}${agentId}`;
}

export class RedisPersistenceStore implements PersistenceStore {
  constructor(private readonly client: RedisStateClient) {}

  async load(agentId: AgentId): Promise<unknown> {
    const raw = await this.client.get(redisKeyFor(agentId));
    return raw === null ? null : JSON.parse(raw);
  }

  async save(agentId: AgentId, snapshot: AgentSnapshot): Promise<void> {
    await this.client.set(redisKeyFor(agentId), JSON.stringify(snapshot));
  }

  async remove(agentId: AgentId): Promise<void> {
    await this.client.del(redisKeyFor(agentId));
  }
}
