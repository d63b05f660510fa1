/**
 * Shared helpers for mesh tests: a scripted reasoner, directive builders and
 * a system wired with the built-in kinds.
 */

import type {
  Directive,
  Reasoner,
  ReasoningRequest,
  ReasoningResult,
  RoutingSignal,
} from '../agents/runtime/agent-protocol.js';
import { AgentKindRegistry } from '../agents/runtime/agent-registry.js';
import { AgentSystem, type AgentSystemOptions } from '../agents/runtime/agent-system.js';
import { registerBuiltinKinds } from '../agents/kinds.js';
import { CollectingSink, type SinkRegistry } from '../agents/sinks/consumer-sink.js';

export type Script = (request: ReasoningRequest, call: number) => ReasoningResult | Promise<ReasoningResult>;

export const ok = (...directives: Directive[]): ReasoningResult => ({ ok: true, directives });

export const msg = (keyword: string, payload: string, destinationHint?: string): Directive => ({
  kind: 'message',
  keyword,
  payload,
  ...(destinationHint !== undefined ? { destinationHint } : {}),
});

export const signal = (s: RoutingSignal): Directive => ({ kind: 'signal', signal: s });

/** Records every request; answers with `script` (default: no directives). */
export class ScriptedReasoner implements Reasoner {
  readonly calls: ReasoningRequest[] = [];

  constructor(private readonly script: Script = () => ok()) {}

  async invoke(request: ReasoningRequest): Promise<ReasoningResult> {
    this.calls.push(request);
    return this.script(request, this.calls.length);
  }

  callsFor(agentId: string): ReasoningRequest[] {
    return this.calls.filter((c) => c.agentId === agentId);
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export interface TestMesh {
  system: AgentSystem;
  kinds: AgentKindRegistry;
  sinks: SinkRegistry;
  output: CollectingSink;
}

/** A system with the built-in kinds and a collecting sink registered as "collect". */
export function createTestMesh(options: AgentSystemOptions = {}): TestMesh {
  const kinds = options.kinds ?? new AgentKindRegistry();
  const sinks: SinkRegistry = new Map();
  const output = new CollectingSink();
  sinks.set('collect', output);
  registerBuiltinKinds(kinds, sinks);
  const system = new AgentSystem({ workerConcurrency: 4, ...options, kinds });
  return { system, kinds, sinks, output };
}
