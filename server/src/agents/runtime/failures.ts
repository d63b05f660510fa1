/**
 * Failure taxonomy and the bounded failure log.
 *
 * Activation and delivery failures never propagate to publishers or other
 * agents. They become FailureEvents: a structured log line, an event for
 * subscribers, and an entry in a capped in-memory log.
 */

import { EventEmitter } from 'node:events';
import type { AgentId } from './agent-protocol.js';
import logger from '../../lib/logger.js';

export type FailureKind =
  | 'delivery-miss'
  | 'activation-timeout'
  | 'malformed-output'
  | 'transport-error'
  | 'poison-skip'
  | 'cache-overflow'
  | 'registry-inconsistency';

export const FAILURE_KINDS: readonly FailureKind[] = [
  'delivery-miss',
  'activation-timeout',
  'malformed-output',
  'transport-error',
  'poison-skip',
  'cache-overflow',
  'registry-inconsistency',
];

export interface FailureEvent {
  kind: FailureKind;
  agentId: AgentId;
  retryCount: number;
  message: string;
  keyword?: string;
  at: string;
}

export type MeshErrorCode = 'duplicate-agent' | 'unknown-kind' | 'unknown-agent' | 'invalid-config';

/** Thrown synchronously to callers when a registry invariant would break. */
export class AgentMeshError extends Error {
  constructor(
    readonly code: MeshErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'AgentMeshError';
  }
}

const LOG_CAP = 500;
const LOG_KEEP = 250;

const WARN_KINDS = new Set<FailureKind>(['cache-overflow', 'activation-timeout', 'malformed-output', 'transport-error']);

export class FailureLog {
  private readonly emitter = new EventEmitter();
  private entries: FailureEvent[] = [];
  private readonly counts = new Map<FailureKind, number>();

  record(partial: Omit<FailureEvent, 'at'>): FailureEvent {
    const event: FailureEvent = { ...partial, at: new Date().toISOString() };

    this.entries.push(event);
    if (this.entries.length > LOG_CAP) {
      this.entries = this.entries.slice(-LOG_KEEP);
    }
    this.counts.set(event.kind, (this.counts.get(event.kind) ?? 0) + 1);

    const fields = {
      agentId: event.agentId,
      kind: event.kind,
      retryCount: event.retryCount,
      ...(event.keyword !== undefined ? { keyword: event.keyword } : {}),
    };
    if (event.kind === 'poison-skip') {
      logger.error(fields, event.message);
    } else if (WARN_KINDS.has(event.kind)) {
      logger.warn(fields, event.message);
    } else {
      logger.info(fields, event.message);
    }

    this.emitter.emit('failure', event);
    return event;
  }

  /** A listener that throws is logged; later listeners and the recorder carry on. */
  subscribe(listener: (event: FailureEvent) => void): () => void {
    const guarded = (event: FailureEvent) => {
      try {
        listener(event);
      } catch (err) {
        logger.error(
          { agentId: event.agentId, kind: event.kind, err: err instanceof Error ? err.message : String(err) },
          'FailureLog: subscriber threw',
        );
      }
    };
    this.emitter.on('failure', guarded);
    return () => this.emitter.off('failure', guarded);
  }

  count(kind: FailureKind): number {
    return this.counts.get(kind) ?? 0;
  }

  totals(): Record<FailureKind, number> {
    return {
      'delivery-miss': this.count('delivery-miss'),
      'activation-timeout': this.count('activation-timeout'),
      'malformed-output': this.count('malformed-output'),
      'transport-error': this.count('transport-error'),
      'poison-skip': this.count('poison-skip'),
      'cache-overflow': this.count('cache-overflow'),
      'registry-inconsistency': this.count('registry-inconsistency'),
    };
  }

  /** Recorded events, oldest first. Capped at 500 (trimmed to the latest 250). */
  list(kind?: FailureKind): readonly FailureEvent[] {
    return kind ? this.entries.filter((e) => e.kind === kind) : this.entries;
  }

  clear(): void {
    this.entries = [];
    this.counts.clear();
  }
}
