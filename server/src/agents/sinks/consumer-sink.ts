/**
 * Consumer sinks — where payloads leave the mesh.
 *
 * A consumer is an ordinary agent whose reasoner hands its unused messages to
 * a sink instead of a completion service. Sinks are registered by name so a
 * JSON kind config can refer to them.
 */

import type {
  AgentId,
  InboundMessage,
  Reasoner,
  ReasoningRequest,
  ReasoningResult,
} from '../runtime/agent-protocol.js';
import { createAgentLogger } from '../../lib/logger.js';

export interface SinkContext {
  agentId: AgentId;
  signal: AbortSignal;
}

export interface ConsumerSink {
  consume(messages: readonly InboundMessage[], context: SinkContext): Promise<void>;
}

/** Thrown by a sink whose input could not be understood. Retried, then poison-skipped. */
export class SinkInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SinkInputError';
  }
}

export type SinkRegistry = Map<string, ConsumerSink>;

/** Adapts a sink to the Reasoner interface. Emits no directives. */
export class SinkReasoner implements Reasoner {
  constructor(private readonly sink: ConsumerSink) {}

  async invoke(request: ReasoningRequest, signal: AbortSignal): Promise<ReasoningResult> {
    try {
      await this.sink.consume(request.messages, { agentId: request.agentId, signal });
      return { ok: true, directives: [] };
    } catch (err) {
      if (err instanceof SinkInputError) {
        return { ok: false, failure: 'malformed-output', message: err.message };
      }
      return {
        ok: false,
        failure: 'transport-error',
        message: err instanceof Error ? err.message : String(err),
      };
    }
  }
}

/** Writes every payload to the structured log. */
export class LogSink implements ConsumerSink {
  async consume(messages: readonly InboundMessage[], context: SinkContext): Promise<void> {
    const log = createAgentLogger(context.agentId, { sink: 'log' });
    for (const { sender, keyword, payload } of messages) {
      log.info({ sender, keyword, payload }, 'Consumer output');
    }
  }
}

/** Keeps everything it receives. Handy for embedding and tests. */
export class CollectingSink implements ConsumerSink {
  readonly received: InboundMessage[] = [];

  async consume(messages: readonly InboundMessage[]): Promise<void> {
    for (const { sender, keyword, payload } of messages) {
      this.received.push({ sender, keyword, payload });
    }
  }

  payloads(): string[] {
    return this.received.map((m) => m.payload);
  }
}
