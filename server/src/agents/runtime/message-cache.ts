/**
 * Message Cache — per-agent ordered store of inbound messages.
 *
 * Entries carry a used/unused flag. An activation drains the unused entries,
 * and only marks them used after its reasoning step succeeded, so a failed
 * activation leaves its input in place for the retry.
 *
 * All operations are synchronous; the cache is only ever touched from the
 * event loop, so each call is atomic with respect to every other.
 */

import type { CachedMessage, InboundMessage } from './agent-protocol.js';

export const DEFAULT_CACHE_CAPACITY = 200;

export interface MessageCacheOptions {
  /** Maximum number of entries kept; older entries are evicted past it */
  capacity?: number;
  /** Collapse superseded unused entries (same sender + keyword) on every append */
  dedup?: boolean;
}

export interface AppendResult {
  entry: CachedMessage;
  /** Entries removed to get back under capacity, oldest first */
  evicted: CachedMessage[];
  /** How many of `evicted` were still unused */
  droppedUnused: number;
}

export interface CacheSnapshot {
  nextSequence: number;
  entries: CachedMessage[];
}

interface Entry {
  sequence: number;
  sender: string;
  keyword: string;
  payload: string;
  used: boolean;
  receivedAt: string;
}

function freeze(entry: Entry): CachedMessage {
  return { ...entry };
}

export class MessageCache {
  readonly capacity: number;
  readonly dedup: boolean;
  private entries: Entry[] = [];
  private nextSequence = 1;

  constructor(options: MessageCacheOptions = {}) {
    this.capacity = Math.max(1, options.capacity ?? DEFAULT_CACHE_CAPACITY);
    this.dedup = options.dedup ?? false;
  }

  get size(): number {
    return this.entries.length;
  }

  get unusedCount(): number {
    let n = 0;
    for (const e of this.entries) if (!e.used) n++;
    return n;
  }

  /**
   * Append a copy of `message` with the next sequence number. When the dedup
   * policy is on, reduce() runs before the capacity check.
   */
  append(message: InboundMessage): AppendResult {
    const entry: Entry = {
      sequence: this.nextSequence++,
      sender: message.sender,
      keyword: message.keyword,
      payload: message.payload,
      used: false,
      receivedAt: new Date().toISOString(),
    };
    this.entries.push(entry);

    if (this.dedup) this.reduce();

    const evicted: CachedMessage[] = [];
    let droppedUnused = 0;
    while (this.entries.length > this.capacity) {
      const usedIndex = this.entries.findIndex((e) => e.used);
      const index = usedIndex >= 0 ? usedIndex : 0;
      const [removed] = this.entries.splice(index, 1);
      if (!removed) break;
      if (!removed.used) droppedUnused++;
      evicted.push(freeze(removed));
    }

    return { entry: freeze(entry), evicted, droppedUnused };
  }

  /**
   * Unused entries in arrival order, optionally limited to some keywords.
   * Does not mark anything used.
   */
  drainUnused(keywordFilter?: string | readonly string[]): CachedMessage[] {
    const filter = keywordFilter === undefined
      ? null
      : new Set(typeof keywordFilter === 'string' ? [keywordFilter] : keywordFilter);
    const out: CachedMessage[] = [];
    for (const e of this.entries) {
      if (e.used) continue;
      if (filter && !filter.has(e.keyword)) continue;
      out.push(freeze(e));
    }
    return out;
  }

  /** Returns how many entries flipped from unused to used. */
  markUsed(sequences: Iterable<number>): number {
    const wanted = new Set(sequences);
    if (wanted.size === 0) return 0;
    let marked = 0;
    for (const e of this.entries) {
      if (!e.used && wanted.has(e.sequence)) {
        e.used = true;
        marked++;
      }
    }
    return marked;
  }

  /**
   * Collapse each run of adjacent unused entries from the same (sender, keyword)
   * into its most recent entry. Used entries are left untouched and break runs.
   * Returns the number of entries removed; a second call removes nothing.
   */
  reduce(): number {
    const kept: Entry[] = [];
    for (const e of this.entries) {
      const last = kept[kept.length - 1];
      if (
        last
        && !e.used
        && !last.used
        && last.sender === e.sender
        && last.keyword === e.keyword
      ) {
        kept[kept.length - 1] = e;
        continue;
      }
      kept.push(e);
    }
    const removed = this.entries.length - kept.length;
    this.entries = kept;
    return removed;
  }

  /** All entries, used and unused, in arrival order. */
  list(): CachedMessage[] {
    return this.entries.map(freeze);
  }

  clear(): void {
    this.entries = [];
  }

  snapshot(): CacheSnapshot {
    return { nextSequence: this.nextSequence, entries: this.list() };
  }

  /**
   * Replace the contents with a stored snapshot. Entries that arrived before the
   * restore are kept after the restored ones, renumbered past the stored sequence.
   * Eviction applies as on append. Returns how many unused entries it dropped.
   */
  restore(snapshot: CacheSnapshot): number {
    const restored: Entry[] = [...snapshot.entries]
      .sort((a, b) => a.sequence - b.sequence)
      .map((e) => ({ ...e }));
    let next = Math.max(snapshot.nextSequence, (restored[restored.length - 1]?.sequence ?? 0) + 1);
    const arrived = this.entries.map((e) => ({ ...e, sequence: next++ }));
    this.entries = [...restored, ...arrived];
    this.nextSequence = next;
    let droppedUnused = 0;
    while (this.entries.length > this.capacity) {
      const usedIndex = this.entries.findIndex((e) => e.used);
      const [removed] = this.entries.splice(usedIndex >= 0 ? usedIndex : 0, 1);
      if (removed && !removed.used) droppedUnused++;
    }
    return droppedUnused;
  }
}
