/**
 * Activation Scheduler — bounded worker pool over a ready queue of agent ids.
 *
 * Enqueueing an id that is already waiting is a no-op, so repeated triggers
 * collapse. Different agents run in parallel up to `concurrency`; the same
 * agent is never started while a previous run for it is still in flight.
 * Runs are started from a microtask, never from inside the enqueue call, so
 * publish() returns before any downstream processing begins.
 */

import type { AgentId } from './agent-protocol.js';
import logger from '../../lib/logger.js';

export type ActivationTask = (agentId: AgentId) => Promise<void>;

export class ActivationScheduler {
  private readonly ready: AgentId[] = [];
  private readonly queued = new Set<AgentId>();
  private readonly running = new Set<AgentId>();
  private idleWaiters: Array<() => void> = [];
  private pumpScheduled = false;
  private stopped = false;

  constructor(
    readonly concurrency: number,
    private readonly task: ActivationTask,
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`ActivationScheduler: concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  get pending(): number {
    return this.ready.length;
  }

  get active(): number {
    return this.running.size;
  }

  isRunning(agentId: AgentId): boolean {
    return this.running.has(agentId);
  }

  /** Returns false when the agent was already waiting in the queue. */
  enqueue(agentId: AgentId): boolean {
    if (this.stopped || this.queued.has(agentId)) return false;
    this.queued.add(agentId);
    this.ready.push(agentId);
    this.schedulePump();
    return true;
  }

  cancel(agentId: AgentId): boolean {
    if (!this.queued.delete(agentId)) return false;
    const index = this.ready.indexOf(agentId);
    if (index >= 0) this.ready.splice(index, 1);
    this.notifyIfIdle();
    return true;
  }

  /** Resolves once the queue is empty and no run is in flight. */
  whenIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /** Stop starting new runs. In-flight runs finish on their own. */
  stop(): void {
    this.stopped = true;
    this.ready.length = 0;
    this.queued.clear();
    this.notifyIfIdle();
  }

  private isIdle(): boolean {
    return this.ready.length === 0 && this.running.size === 0;
  }

  private schedulePump(): void {
    if (this.pumpScheduled) return;
    this.pumpScheduled = true;
    queueMicrotask(() => {
      this.pumpScheduled = false;
      this.pump();
    });
  }

  private pump(): void {
    let scanned = 0;
    while (this.running.size < this.concurrency && scanned < this.ready.length) {
      const agentId = this.ready[scanned];
      if (agentId === undefined) break;
      if (this.running.has(agentId)) {
        // Still finishing its previous run; leave it queued.
        scanned++;
        continue;
      }
      this.ready.splice(scanned, 1);
      this.queued.delete(agentId);
      this.start(agentId);
    }
    this.notifyIfIdle();
  }

  private start(agentId: AgentId): void {
    this.running.add(agentId);
    void this.task(agentId)
      .catch((err: unknown) => {
        logger.error(
          { agentId, err: err instanceof Error ? err.message : String(err) },
          'ActivationScheduler: activation task threw',
        );
      })
      .finally(() => {
        this.running.delete(agentId);
        if (this.ready.length > 0) {
          this.schedulePump();
        } else {
          this.notifyIfIdle();
        }
      });
  }

  private notifyIfIdle(): void {
    if (!this.isIdle() || this.idleWaiters.length === 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
