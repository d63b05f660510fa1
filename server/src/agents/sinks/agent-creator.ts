/**
 * Agent-creator sink — lets agents grow the mesh.
 *
 * Each payload is a JSON operation (or an array of them):
 *
 *   { "op": "create_agent", "id": "...", "kind": "...", "config": { ... } }
 *   { "op": "connect_agents", "source": "...", "destination": "...", "keyword": "..." }
 *   { "op": "set_activation", "id": "...", "keywords": ["..."] }
 *
 * A payload that is not valid JSON or does not match the schema makes the
 * whole batch malformed. Operations inside a valid batch are applied in
 * order; one that the system rejects (duplicate id, unknown kind) is logged
 * and the rest still run.
 */

import type { InboundMessage } from '../runtime/agent-protocol.js';
import type { AgentSystem } from '../runtime/agent-system.js';
import {
  AgentCreatorPayloadSchema,
  type AgentCreatorOperation,
} from '../schemas/kind-schemas.js';
import { SinkInputError, type ConsumerSink, type SinkContext } from './consumer-sink.js';
import { createAgentLogger } from '../../lib/logger.js';
import { formatIssues } from '../../lib/validate.js';

export interface CreatorResult {
  applied: number;
  rejected: number;
}

export function parseCreatorPayload(payload: string): AgentCreatorOperation[] {
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch (err) {
    throw new SinkInputError(`Payload is not JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = AgentCreatorPayloadSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SinkInputError(`Invalid agent-creator operation: ${formatIssues(parsed.error.issues)}`);
  }
  return parsed.data;
}

export class AgentCreatorSink implements ConsumerSink {
  /** Totals over the sink's lifetime */
  readonly totals: CreatorResult = { applied: 0, rejected: 0 };

  constructor(private readonly system: AgentSystem) {}

  async consume(messages: readonly InboundMessage[], context: SinkContext): Promise<void> {
    // Validate the whole batch before touching the system.
    const operations = messages.flatMap((m) => parseCreatorPayload(m.payload));
    const log = createAgentLogger(context.agentId, { sink: 'agent-creator' });

    for (const operation of operations) {
      try {
        await this.apply(operation);
        this.totals.applied++;
      } catch (err) {
        this.totals.rejected++;
        log.warn(
          { op: operation.op, err: err instanceof Error ? err.message : String(err) },
          'Agent-creator operation rejected',
        );
      }
    }
  }

  private async apply(operation: AgentCreatorOperation): Promise<void> {
    switch (operation.op) {
      case 'create_agent':
        await this.system.createAgent(operation.id, operation.kind, operation.config ?? {});
        return;
      case 'connect_agents':
        this.system.addConnection(operation.source, operation.destination, operation.keyword);
        return;
      case 'set_activation':
        this.system.setActivationKeywords(operation.id, operation.keywords);
        return;
    }
  }
}
