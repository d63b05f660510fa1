/**
 * Agent — one addressable processing unit and its activation state machine.
 *
 *   idle ──append on an activation keyword / trigger()──▶ triggered
 *   triggered ──scheduler picks it──▶ processing
 *   processing ──success──▶ idle, or triggered when a trigger arrived meanwhile
 *   processing ──failure──▶ triggered (same input retried), until the attempt
 *                            bound is reached; then the input is marked used
 *   any ──remove()──▶ removed (an in-flight activation finishes, output dropped)
 *
 * A reasoning call that misses its deadline is reported as a timeout at once,
 * but the retry does not call the reasoner again until the late call settles.
 *
 * There is one concrete Agent type. What it does comes from its definition:
 * instruction text, activation keywords, capability flags and the reasoner.
 */

import type {
  ActivationRecord,
  AgentCapabilities,
  AgentDefinition,
  AgentId,
  AgentLifecycleState,
  Directive,
  InboundMessage,
  Reasoner,
  ReasoningResult,
  RoutingSignal,
} from './agent-protocol.js';
import { MessageCache, type AppendResult } from './message-cache.js';
import { ActivationStats } from './activation-stats.js';
import type { FailureEvent, FailureKind } from './failures.js';
import { createDeadlineSignal, raceAbort, TimeoutError } from '../../lib/abort.js';
import { createAgentLogger, type Logger } from '../../lib/logger.js';

/** What an agent needs from the system around it. */
export interface ActivationHost {
  readonly activationTimeoutMs: number;
  readonly maxActivationAttempts: number;
  enqueue(agentId: AgentId): boolean;
  publish(sourceId: AgentId, keyword: string, payload: string, destinationHint?: AgentId): number;
  applySignal(agentId: AgentId, signal: RoutingSignal): void;
  outputKeywords(agentId: AgentId): string[];
  reportFailure(event: Omit<FailureEvent, 'at'>): void;
  /** Runs after a successful activation, before the agent settles. */
  afterActivation(agent: Agent): Promise<void>;
}

const FAILURE_KIND: Record<'timeout' | 'malformed-output' | 'transport-error', FailureKind> = {
  'timeout': 'activation-timeout',
  'malformed-output': 'malformed-output',
  'transport-error': 'transport-error',
};

export class Agent {
  readonly cache: MessageCache;
  readonly stats = new ActivationStats();
  readonly capabilities: AgentCapabilities;
  readonly instructions: string;
  private readonly activationKeywords: Set<string>;
  private lifecycle: AgentLifecycleState = 'idle';
  private pendingTrigger = false;
  private forced = false;
  private failedAttempts = 0;
  private current: ActivationRecord | null = null;
  /** Settles when a reasoning call abandoned at its deadline finally returns */
  private abandoned: Promise<void> | null = null;
  private state: string;
  private readonly log: Logger;

  constructor(
    readonly id: AgentId,
    readonly kind: string,
    definition: AgentDefinition,
    private readonly reasoner: Reasoner,
    private readonly host: ActivationHost,
  ) {
    this.instructions = definition.instructions;
    this.capabilities = { ...definition.capabilities };
    this.activationKeywords = new Set(definition.activationKeywords);
    this.state = definition.selfState ?? '';
    this.cache = new MessageCache(definition.cache);
    this.log = createAgentLogger(id, { kind });
  }

  get lifecycleState(): AgentLifecycleState {
    return this.lifecycle;
  }

  get selfState(): string {
    return this.state;
  }

  set selfState(value: string) {
    this.state = value;
  }

  get retryCount(): number {
    return this.failedAttempts;
  }

  /** The activation record currently being processed, if any. */
  get activeRecord(): ActivationRecord | null {
    return this.current;
  }

  getActivationKeywords(): string[] {
    return [...this.activationKeywords];
  }

  setActivationKeywords(keywords: readonly string[]): void {
    this.activationKeywords.clear();
    for (const k of keywords) this.activationKeywords.add(k);
  }

  isActivatedBy(keyword: string): boolean {
    return this.activationKeywords.has(keyword);
  }

  /**
   * Copy one message into the cache and wake the state machine when its
   * keyword is an activation keyword. Returns null once the agent is removed.
   */
  receive(message: InboundMessage): AppendResult | null {
    if (this.lifecycle === 'removed') return null;
    const result = this.cache.append(message);
    this.stats.recordMessage(message.keyword);
    if (this.activationKeywords.has(message.keyword)) {
      this.trigger();
    }
    return result;
  }

  /**
   * Request an activation. `force` runs the reasoner even when no unused
   * input is waiting (timer-style producers). Returns false once removed.
   */
  trigger(force = false): boolean {
    if (this.lifecycle === 'removed') return false;
    if (force) this.forced = true;

    if (this.lifecycle === 'idle') {
      this.lifecycle = 'triggered';
      this.host.enqueue(this.id);
    } else if (this.lifecycle === 'processing') {
      this.pendingTrigger = true;
    }
    return true;
  }

  remove(): void {
    if (this.lifecycle === 'removed') return;
    const wasProcessing = this.lifecycle === 'processing';
    this.lifecycle = 'removed';
    this.pendingTrigger = false;
    this.log.info({ wasProcessing }, 'Agent removed');
  }

  /**
   * One Triggered → Processing → (Idle | Triggered) cycle. Called by the
   * scheduler only. Whatever happens after the reasoner returns, the agent
   * leaves Processing.
   */
  async runActivation(): Promise<void> {
    if (this.lifecycle !== 'triggered') return;
    this.lifecycle = 'processing';
    this.pendingTrigger = false;
    const forced = this.forced;
    this.forced = false;

    try {
      // A call that outlived its deadline still owns this agent until it settles.
      if (this.abandoned) await this.abandoned;
      if (this.isRemoved()) return;
      await this.activate(forced);
    } finally {
      this.settle();
    }
  }

  private async activate(forced: boolean): Promise<void> {
    const entries = this.cache.drainUnused();
    if (entries.length === 0 && !forced) return;

    const record: ActivationRecord = {
      agentId: this.id,
      entries,
      attempt: this.failedAttempts + 1,
      startedAt: new Date().toISOString(),
    };
    this.current = record;
    this.log.debug({ attempt: record.attempt, messages: entries.length }, 'Activation start');

    let result: ReasoningResult;
    try {
      result = await this.invokeReasoner(record);
    } finally {
      this.current = null;
    }

    if (this.isRemoved()) {
      this.log.info({ attempt: record.attempt }, 'Activation finished after removal; output discarded');
      return;
    }

    const sequences = entries.map((e) => e.sequence);

    if (result.ok) {
      this.cache.markUsed(sequences);
      this.failedAttempts = 0;
      this.stats.recordActivation();
      this.apply(result.directives);
      await this.host.afterActivation(this);
      return;
    }

    this.failedAttempts++;
    const kind = FAILURE_KIND[result.failure];
    if (this.failedAttempts >= this.host.maxActivationAttempts) {
      const attempts = this.failedAttempts;
      this.cache.markUsed(sequences);
      this.failedAttempts = 0;
      this.host.reportFailure({
        kind: 'poison-skip',
        agentId: this.id,
        retryCount: attempts,
        message: `Giving up after ${attempts} failed attempts (${kind}: ${result.message}); ${sequences.length} messages marked used`,
      });
      return;
    }

    // Same input goes back through the queue.
    this.pendingTrigger = true;
    this.forced = this.forced || forced;
    this.host.reportFailure({
      kind,
      agentId: this.id,
      retryCount: this.failedAttempts,
      message: result.message,
    });
  }

  private isRemoved(): boolean {
    return this.lifecycle === 'removed';
  }

  private async invokeReasoner(record: ActivationRecord): Promise<ReasoningResult> {
    const request = {
      agentId: this.id,
      instructions: this.instructions,
      selfState: this.state,
      outputKeywords: this.host.outputKeywords(this.id),
      messages: record.entries.map(({ sender, keyword, payload }) => ({ sender, keyword, payload })),
    };

    const { signal, cleanup } = createDeadlineSignal(this.host.activationTimeoutMs);
    let work: Promise<ReasoningResult> | undefined;
    try {
      work = this.reasoner.invoke(request, signal);
      return await raceAbort(work, signal);
    } catch (err) {
      if (err instanceof TimeoutError) {
        if (work) this.holdUntilSettled(work);
        return { ok: false, failure: 'timeout', message: err.message };
      }
      return {
        ok: false,
        failure: 'transport-error',
        message: err instanceof Error ? err.message : String(err),
      };
    } finally {
      cleanup();
    }
  }

  private holdUntilSettled(work: Promise<ReasoningResult>): void {
    const settled = work.then(
      () => undefined,
      (err: unknown) => {
        this.log.debug({ err: err instanceof Error ? err.message : String(err) }, 'Timed-out reasoning call failed late');
      },
    );
    this.abandoned = settled;
    void settled.then(() => {
      if (this.abandoned === settled) this.abandoned = null;
    });
  }

  private apply(directives: Directive[]): void {
    for (const directive of directives) {
      switch (directive.kind) {
        case 'state':
          this.state = directive.state;
          break;
        case 'signal':
          this.host.applySignal(this.id, directive.signal);
          break;
        case 'message':
          this.host.publish(this.id, directive.keyword, directive.payload, directive.destinationHint);
          break;
      }
    }
  }

  private settle(): void {
    if (this.isRemoved()) return;
    if (this.pendingTrigger) {
      this.pendingTrigger = false;
      this.lifecycle = 'triggered';
      this.host.enqueue(this.id);
      return;
    }
    this.lifecycle = 'idle';
  }
}
