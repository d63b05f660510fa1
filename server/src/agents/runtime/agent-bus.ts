/**
 * Agent Bus — keyword routing between agents.
 *
 * publish() resolves the destinations for (source, keyword) at call time,
 * copies the payload into each destination's cache and wakes it. It returns
 * the number of caches written, once they are written; it never waits for
 * any destination to process. Fan-out is per destination: one missing agent
 * does not stop delivery to the others.
 */

import { randomUUID } from 'node:crypto';
import type { AgentId, InboundMessage } from './agent-protocol.js';
import type { AppendResult } from './message-cache.js';
import type { ConnectionRegistry } from './connection-registry.js';
import type { FailureEvent } from './failures.js';
import logger from '../../lib/logger.js';

/** The receiving side of an agent, as the bus sees it. */
export interface DeliveryTarget {
  receive(message: InboundMessage): AppendResult | null;
}

export interface DeliveryRecord {
  id: string;
  from: AgentId;
  keyword: string;
  /** Destinations the payload was written to */
  delivered: AgentId[];
  /** Destinations that were resolved but missing */
  missed: AgentId[];
  timestamp: string;
}

export interface PublishOptions {
  /** Deliver only to this destination, if it is among the resolved ones */
  destinationHint?: AgentId;
}

export interface BusStats {
  published: number;
  delivered: number;
  missed: number;
}

const LOG_CAP = 500;
const LOG_KEEP = 250;

export class AgentBus {
  private deliveryLog: DeliveryRecord[] = [];
  private readonly counters: BusStats = { published: 0, delivered: 0, missed: 0 };

  constructor(
    private readonly registry: ConnectionRegistry,
    private readonly lookup: (agentId: AgentId) => DeliveryTarget | undefined,
    private readonly reportFailure: (event: Omit<FailureEvent, 'at'>) => void,
  ) {}

  /**
   * Route `payload` from `sourceId` on `keyword`. Returns the delivery count;
   * misses are reported as failures, never thrown.
   */
  publish(sourceId: AgentId, keyword: string, payload: string, options: PublishOptions = {}): number {
    this.counters.published++;
    const resolved = this.registry.resolve(sourceId, keyword);
    const hint = options.destinationHint;
    const destinations = hint !== undefined ? resolved.filter((id) => id === hint) : resolved;

    if (destinations.length === 0) {
      this.counters.missed++;
      this.reportFailure({
        kind: 'delivery-miss',
        agentId: sourceId,
        keyword,
        retryCount: 0,
        message: hint !== undefined && resolved.length > 0
          ? `No connection from ${sourceId} on '${keyword}' reaches ${hint}`
          : `No connection from ${sourceId} on '${keyword}'`,
      });
      this.appendToLog({ from: sourceId, keyword, delivered: [], missed: hint !== undefined ? [hint] : [] });
      return 0;
    }

    const delivered: AgentId[] = [];
    const missed: AgentId[] = [];

    for (const destination of destinations) {
      const target = this.lookup(destination);
      const inputKeyword = this.registry.inputKeywordFor(destination, sourceId) ?? keyword;
      const result = target?.receive({ sender: sourceId, keyword: inputKeyword, payload }) ?? null;

      if (!result) {
        missed.push(destination);
        this.handleDangling(sourceId, destination, keyword);
        continue;
      }

      delivered.push(destination);
      if (result.droppedUnused > 0) {
        this.reportFailure({
          kind: 'cache-overflow',
          agentId: destination,
          keyword: inputKeyword,
          retryCount: 0,
          message: `Cache full: dropped ${result.droppedUnused} unused message(s)`,
        });
      }
    }

    this.counters.delivered += delivered.length;
    this.counters.missed += missed.length;
    this.appendToLog({ from: sourceId, keyword, delivered, missed });

    logger.debug(
      { from: sourceId, keyword, delivered: delivered.length, missed: missed.length },
      'AgentBus: published',
    );
    return delivered.length;
  }

  /**
   * Write one message straight into an agent's cache, bypassing connections.
   * This is the producer entry point for sources outside the mesh.
   */
  deliver(destination: AgentId, message: InboundMessage): boolean {
    this.counters.published++;
    const result = this.lookup(destination)?.receive(message) ?? null;
    if (!result) {
      this.counters.missed++;
      this.reportFailure({
        kind: 'delivery-miss',
        agentId: destination,
        keyword: message.keyword,
        retryCount: 0,
        message: `No agent ${destination} to deliver to`,
      });
      this.appendToLog({ from: message.sender, keyword: message.keyword, delivered: [], missed: [destination] });
      return false;
    }
    this.counters.delivered++;
    if (result.droppedUnused > 0) {
      this.reportFailure({
        kind: 'cache-overflow',
        agentId: destination,
        keyword: message.keyword,
        retryCount: 0,
        message: `Cache full: dropped ${result.droppedUnused} unused message(s)`,
      });
    }
    this.appendToLog({ from: message.sender, keyword: message.keyword, delivered: [destination], missed: [] });
    return true;
  }

  get stats(): Readonly<BusStats> {
    return { ...this.counters };
  }

  /** Recent deliveries, oldest first (for debugging/audit). */
  getLog(): readonly DeliveryRecord[] {
    return this.deliveryLog;
  }

  reset(): void {
    this.deliveryLog = [];
    this.counters.published = 0;
    this.counters.delivered = 0;
    this.counters.missed = 0;
  }

  // ─── Private Helpers ────────────────────────────────────────────────

  private handleDangling(source: AgentId, destination: AgentId, keyword: string): void {
    this.reportFailure({
      kind: 'delivery-miss',
      agentId: source,
      keyword,
      retryCount: 0,
      message: `Destination ${destination} is gone`,
    });
    if (this.registry.pruneDangling(source, destination, keyword)) {
      this.reportFailure({
        kind: 'registry-inconsistency',
        agentId: source,
        keyword,
        retryCount: 0,
        message: `Pruned connection ${source} -[${keyword}]-> ${destination}: destination no longer exists`,
      });
    }
  }

  /** Append a delivery to the log, capping at 500 entries */
  private appendToLog(entry: Omit<DeliveryRecord, 'id' | 'timestamp'>): void {
    this.deliveryLog.push({ ...entry, id: randomUUID(), timestamp: new Date().toISOString() });
    if (this.deliveryLog.length > LOG_CAP) {
      this.deliveryLog = this.deliveryLog.slice(-LOG_KEEP);
    }
  }
}
