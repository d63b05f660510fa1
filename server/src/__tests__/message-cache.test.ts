import { describe, it, expect } from 'vitest';
import { MessageCache } from '../agents/runtime/message-cache.js';

const from = (sender: string, keyword: string, payload: string) => ({ sender, keyword, payload });

describe('MessageCache', () => {
  it('assigns increasing sequence numbers and starts unused', () => {
    const cache = new MessageCache();
    const a = cache.append(from('A', 'k', 'one'));
    const b = cache.append(from('A', 'k', 'two'));

    expect(a.entry.sequence).toBe(1);
    expect(b.entry.sequence).toBe(2);
    expect(b.entry.used).toBe(false);
    expect(cache.size).toBe(2);
    expect(cache.unusedCount).toBe(2);
  });

  it('evicts the oldest unused entry past capacity and reports it dropped', () => {
    const cache = new MessageCache({ capacity: 3 });
    for (const p of ['a', 'b', 'c']) cache.append(from('A', 'k', p));

    const result = cache.append(from('A', 'k', 'd'));

    expect(result.droppedUnused).toBe(1);
    expect(result.evicted.map((e) => e.payload)).toEqual(['a']);
    expect(cache.list().map((e) => e.sequence)).toEqual([2, 3, 4]);
  });

  it('evicts used entries before unused ones', () => {
    const cache = new MessageCache({ capacity: 3 });
    for (const p of ['a', 'b', 'c']) cache.append(from('A', 'k', p));
    cache.markUsed([2]);

    const result = cache.append(from('A', 'k', 'd'));

    expect(result.droppedUnused).toBe(0);
    expect(result.evicted.map((e) => e.sequence)).toEqual([2]);
    expect(cache.list().map((e) => e.payload)).toEqual(['a', 'c', 'd']);
  });

  it('drainUnused returns unused entries in arrival order without marking them', () => {
    const cache = new MessageCache();
    cache.append(from('A', 'x', '1'));
    cache.append(from('B', 'y', '2'));
    cache.append(from('A', 'x', '3'));
    cache.markUsed([1]);

    expect(cache.drainUnused().map((e) => e.payload)).toEqual(['2', '3']);
    expect(cache.drainUnused('x').map((e) => e.payload)).toEqual(['3']);
    expect(cache.drainUnused(['x', 'y']).map((e) => e.sequence)).toEqual([2, 3]);
    expect(cache.unusedCount).toBe(2);
  });

  it('markUsed is idempotent and ignores unknown sequences', () => {
    const cache = new MessageCache();
    cache.append(from('A', 'k', 'a'));

    expect(cache.markUsed([1])).toBe(1);
    expect(cache.markUsed([1])).toBe(0);
    expect(cache.markUsed([99])).toBe(0);
    expect(cache.list()[0]?.used).toBe(true);
  });

  it('reduce collapses adjacent unused runs per sender and keyword', () => {
    const cache = new MessageCache();
    cache.append(from('A', 'k', '1'));
    cache.append(from('A', 'k', '2'));
    cache.append(from('B', 'k', '3'));
    cache.append(from('A', 'k', '4'));
    cache.append(from('A', 'j', '5'));

    expect(cache.reduce()).toBe(1);
    expect(cache.list().map((e) => e.payload)).toEqual(['2', '3', '4', '5']);
    expect(cache.reduce()).toBe(0);
    expect(cache.list().map((e) => e.payload)).toEqual(['2', '3', '4', '5']);
  });

  it('reduce never merges or removes used entries', () => {
    const cache = new MessageCache();
    cache.append(from('A', 'k', '1'));
    cache.append(from('A', 'k', '2'));
    cache.append(from('A', 'k', '3'));
    cache.markUsed([1]);

    expect(cache.reduce()).toBe(1);
    expect(cache.list().map((e) => [e.payload, e.used])).toEqual([['1', true], ['3', false]]);
  });

  it('with dedup on, an append supersedes the previous unused entry of the same stream', () => {
    const cache = new MessageCache({ dedup: true });
    cache.append(from('A', 'k', 'old'));
    cache.append(from('A', 'k', 'new'));

    expect(cache.size).toBe(1);
    expect(cache.list()[0]).toMatchObject({ payload: 'new', sequence: 2 });
  });

  it('restore puts stored entries first and renumbers entries that arrived earlier', () => {
    const source = new MessageCache();
    source.append(from('A', 'k', 'a'));
    source.append(from('A', 'k', 'b'));
    source.markUsed([1]);
    const snapshot = source.snapshot();

    const target = new MessageCache();
    target.append(from('B', 'k', 'early'));
    target.restore(snapshot);

    expect(target.list().map((e) => [e.sequence, e.payload, e.used])).toEqual([
      [1, 'a', true],
      [2, 'b', false],
      [3, 'early', false],
    ]);
    expect(target.append(from('B', 'k', 'late')).entry.sequence).toBe(4);
  });

  it('restore into a smaller cache evicts used entries first and counts dropped unused ones', () => {
    const source = new MessageCache();
    source.append(from('A', 'k', 'a'));
    source.append(from('A', 'k', 'b'));
    source.append(from('A', 'k', 'c'));
    source.markUsed([1]);

    const target = new MessageCache({ capacity: 1 });
    expect(target.restore(source.snapshot())).toBe(1);
    expect(target.list().map((e) => [e.sequence, e.payload, e.used])).toEqual([[3, 'c', false]]);
  });

  it('list returns copies that later changes do not touch', () => {
    const cache = new MessageCache();
    cache.append(from('A', 'k', 'a'));
    const [before] = cache.list();
    cache.markUsed([1]);

    expect(before?.used).toBe(false);
  });
});
