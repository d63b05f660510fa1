/**
 * Built-in agent kinds.
 *
 *   reasoning — instruction text handed to the system reasoner
 *   consumer  — hands its input to a named sink (canConsume)
 *   producer  — never activated by messages; injects through push() (canProduce)
 *
 * Kinds are factories registered by name. Nothing here evaluates a string.
 */

import type { Reasoner, ReasoningResult } from './runtime/agent-protocol.js';
import type { AgentKindRegistry } from './runtime/agent-registry.js';
import { AgentMeshError } from './runtime/failures.js';
import {
  ConsumerKindConfigSchema,
  ProducerKindConfigSchema,
  ReasoningKindConfigSchema,
} from './schemas/kind-schemas.js';
import { SinkReasoner, type SinkRegistry } from './sinks/consumer-sink.js';

export const REASONING_KIND = 'reasoning';
export const CONSUMER_KIND = 'consumer';
export const PRODUCER_KIND = 'producer';

/** A producer has nothing to reason about; an explicit trigger is a no-op. */
const idleReasoner: Reasoner = {
  invoke: async (): Promise<ReasoningResult> => ({ ok: true, directives: [] }),
};

export function registerBuiltinKinds(kinds: AgentKindRegistry, sinks: SinkRegistry): void {
  kinds.register(
    REASONING_KIND,
    ReasoningKindConfigSchema,
    (config) => ({
      instructions: config.instructions,
      activationKeywords: config.activationKeywords,
      capabilities: { canProduce: false, canConsume: false },
      ...(config.selfState !== undefined ? { selfState: config.selfState } : {}),
      ...(config.cache ? { cache: config.cache } : {}),
    }),
    'Instruction text run through the completion service',
  );

  kinds.register(
    CONSUMER_KIND,
    ConsumerKindConfigSchema,
    (config) => {
      const sink = sinks.get(config.sink);
      if (!sink) {
        throw new AgentMeshError('invalid-config', `Unknown sink: ${config.sink}`);
      }
      return {
        instructions: config.instructions,
        activationKeywords: config.activationKeywords,
        capabilities: { canProduce: false, canConsume: true },
        reasoner: new SinkReasoner(sink),
        ...(config.cache ? { cache: config.cache } : {}),
      };
    },
    'Hands received payloads to a named sink',
  );

  kinds.register(
    PRODUCER_KIND,
    ProducerKindConfigSchema,
    (config) => ({
      instructions: '',
      activationKeywords: [],
      capabilities: { canProduce: true, canConsume: false },
      reasoner: idleReasoner,
      ...(config.cache ? { cache: config.cache } : {}),
    }),
    'Entry point for payloads from outside the mesh',
  );
}
