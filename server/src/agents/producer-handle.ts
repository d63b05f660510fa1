import type { AgentId } from './runtime/agent-protocol.js';
import type { AgentSystem } from './runtime/agent-system.js';
import { PRODUCER_KIND } from './kinds.js';
import type { ProducerKindConfig } from './schemas/kind-schemas.js';

export interface ProducerHandle {
  readonly id: AgentId;
  /** Publish through the producer's output connections. Returns the delivery count. */
  push(payload: string, keyword?: string): number;
}

export interface CreateProducerOptions {
  id: AgentId;
  /** Keyword used by push() when none is given */
  keyword?: string;
  config?: ProducerKindConfig;
}

/**
 * Create a producer agent and return a handle that publishes exactly as an
 * internal agent would: through the registry, per output connection.
 */
export async function createProducer(system: AgentSystem, options: CreateProducerOptions): Promise<ProducerHandle> {
  const defaultKeyword = options.keyword ?? 'input';
  await system.createAgent(options.id, PRODUCER_KIND, options.config ?? {});
  return {
    id: options.id,
    push: (payload, keyword = defaultKeyword) => system.publish(options.id, keyword, payload),
  };
}
