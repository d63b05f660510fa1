import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AgentBus, type DeliveryTarget } from '../agents/runtime/agent-bus.js';
import { ConnectionRegistry } from '../agents/runtime/connection-registry.js';
import { MessageCache } from '../agents/runtime/message-cache.js';
import type { FailureEvent } from '../agents/runtime/failures.js';

vi.mock('../lib/logger.js', () => ({
  default: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), child: vi.fn().mockReturnThis() },
}));

describe('AgentBus', () => {
  let registry: ConnectionRegistry;
  let caches: Map<string, MessageCache>;
  let failures: Array<Omit<FailureEvent, 'at'>>;
  let bus: AgentBus;

  const addAgent = (id: string, capacity?: number) => {
    registry.registerAgent(id);
    caches.set(id, new MessageCache(capacity !== undefined ? { capacity } : {}));
  };

  const lookup = (id: string): DeliveryTarget | undefined => {
    const cache = caches.get(id);
    return cache ? { receive: (m) => cache.append(m) } : undefined;
  };

  const payloads = (id: string) => caches.get(id)?.list().map((e) => e.payload) ?? [];

  beforeEach(() => {
    registry = new ConnectionRegistry();
    caches = new Map();
    failures = [];
    bus = new AgentBus(registry, lookup, (event) => failures.push(event));
    for (const id of ['a', 'b', 'c']) addAgent(id);
  });

  it('publishing without a connection is a delivery-miss and touches no cache', () => {
    expect(bus.publish('a', 'ping', 'hello')).toBe(0);

    expect(failures).toEqual([
      { kind: 'delivery-miss', agentId: 'a', keyword: 'ping', retryCount: 0, message: "No connection from a on 'ping'" },
    ]);
    for (const id of ['a', 'b', 'c']) expect(payloads(id)).toEqual([]);
    expect(bus.stats).toEqual({ published: 1, delivered: 0, missed: 1 });
  });

  it('copies the payload into every connected destination', () => {
    registry.addConnection('a', 'b', 'news');
    registry.addConnection('a', 'c', 'news');

    expect(bus.publish('a', 'news', 'extra')).toBe(2);
    expect(payloads('b')).toEqual(['extra']);
    expect(payloads('c')).toEqual(['extra']);
    expect(caches.get('b')?.list()[0]).toMatchObject({ sender: 'a', keyword: 'news', used: false });
    expect(failures).toEqual([]);
  });

  it('delivers to live destinations and prunes a missing one once', () => {
    registry.addConnection('a', 'ghost', 'k');
    registry.addConnection('a', 'b', 'k');

    expect(bus.publish('a', 'k', 'one')).toBe(1);
    expect(failures.map((f) => f.kind)).toEqual(['delivery-miss', 'registry-inconsistency']);
    expect(failures[0]?.message).toBe('Destination ghost is gone');
    expect(registry.resolve('a', 'k')).toEqual(['b']);

    failures.length = 0;
    expect(bus.publish('a', 'k', 'two')).toBe(1);
    expect(failures).toEqual([]);
    expect(payloads('b')).toEqual(['one', 'two']);
  });

  it('fan-out uses the destinations resolved at publish time', () => {
    registry.addConnection('a', 'b', 'k');
    registry.addConnection('a', 'c', 'k');
    const racing = new AgentBus(
      registry,
      (id) => {
        const target = lookup(id);
        if (!target) return undefined;
        return {
          receive: (m) => {
            // A connection removed mid fan-out does not change this delivery.
            if (id === 'b') registry.removeConnection('a', 'c', 'k');
            return target.receive(m);
          },
        };
      },
      (event) => failures.push(event),
    );

    expect(racing.publish('a', 'k', 'x')).toBe(2);
    expect(payloads('c')).toEqual(['x']);
    expect(registry.resolve('a', 'k')).toEqual(['b']);
  });

  it('files the message under the input keyword the destination expects from that source', () => {
    registry.addConnection('a', 'b', 'result');
    registry.setInputKeyword('b', 'a', 'question');

    bus.publish('a', 'result', 'why?');

    expect(caches.get('b')?.list()[0]?.keyword).toBe('question');
  });

  it('limits delivery to the hinted destination', () => {
    registry.addConnection('a', 'b', 'k');
    registry.addConnection('a', 'c', 'k');

    expect(bus.publish('a', 'k', 'just you', { destinationHint: 'c' })).toBe(1);
    expect(payloads('b')).toEqual([]);
    expect(payloads('c')).toEqual(['just you']);
  });

  it('a hint outside the resolved destinations is a delivery-miss', () => {
    registry.addConnection('a', 'b', 'k');

    expect(bus.publish('a', 'k', 'lost', { destinationHint: 'c' })).toBe(0);
    expect(failures[0]).toMatchObject({ kind: 'delivery-miss', message: "No connection from a on 'k' reaches c" });
    expect(payloads('b')).toEqual([]);
  });

  it('reports cache-overflow against the destination when unused input is evicted', () => {
    caches.set('b', new MessageCache({ capacity: 1 }));
    registry.addConnection('a', 'b', 'k');

    bus.publish('a', 'k', 'first');
    bus.publish('a', 'k', 'second');

    expect(failures).toEqual([
      { kind: 'cache-overflow', agentId: 'b', keyword: 'k', retryCount: 0, message: 'Cache full: dropped 1 unused message(s)' },
    ]);
    expect(payloads('b')).toEqual(['second']);
  });

  it('deliver writes straight into one cache and misses unknown agents', () => {
    expect(bus.deliver('b', { sender: 'outside', keyword: 'k', payload: 'p' })).toBe(true);
    expect(bus.deliver('nobody', { sender: 'outside', keyword: 'k', payload: 'p' })).toBe(false);

    expect(payloads('b')).toEqual(['p']);
    expect(failures).toEqual([
      { kind: 'delivery-miss', agentId: 'nobody', keyword: 'k', retryCount: 0, message: 'No agent nobody to deliver to' },
    ]);
  });

  it('keeps a delivery log and resets it', () => {
    registry.addConnection('a', 'b', 'k');
    bus.publish('a', 'k', 'x');
    bus.publish('b', 'k', 'y');

    const log = bus.getLog();
    expect(log.map((r) => [r.from, r.delivered, r.missed])).toEqual([
      ['a', ['b'], []],
      ['b', [], []],
    ]);

    bus.reset();
    expect(bus.getLog()).toEqual([]);
    expect(bus.stats).toEqual({ published: 0, delivered: 0, missed: 0 });
  });
});
