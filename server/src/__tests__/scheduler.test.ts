import { describe, it, expect, vi } from 'vitest';
import { ActivationScheduler } from '../agents/runtime/scheduler.js';
import { deferred } from './mesh-fixtures.js';

vi.mock('../lib/logger.js', () => ({
  default: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), child: vi.fn().mockReturnThis() },
}));

describe('ActivationScheduler', () => {
  it('rejects a non-positive concurrency', () => {
    const task = async () => undefined;
    expect(() => new ActivationScheduler(0, task)).toThrow('concurrency must be a positive integer');
    expect(() => new ActivationScheduler(1.5, task)).toThrow('concurrency must be a positive integer');
  });

  it('starts runs from a microtask, never inside enqueue', async () => {
    const task = vi.fn(async () => undefined);
    const scheduler = new ActivationScheduler(1, task);

    expect(scheduler.enqueue('a')).toBe(true);
    expect(task).not.toHaveBeenCalled();

    await scheduler.whenIdle();
    expect(task).toHaveBeenCalledOnce();
    expect(task).toHaveBeenCalledWith('a');
  });

  it('collapses repeated enqueues of a waiting id', async () => {
    const task = vi.fn(async () => undefined);
    const scheduler = new ActivationScheduler(1, task);

    expect(scheduler.enqueue('a')).toBe(true);
    expect(scheduler.enqueue('a')).toBe(false);
    expect(scheduler.pending).toBe(1);

    await scheduler.whenIdle();
    expect(task).toHaveBeenCalledTimes(1);
  });

  it('runs at most `concurrency` tasks at once', async () => {
    const gate = deferred<void>();
    const scheduler = new ActivationScheduler(2, () => gate.promise);
    for (const id of ['a', 'b', 'c']) scheduler.enqueue(id);

    await vi.waitFor(() => expect(scheduler.active).toBe(2));
    expect(scheduler.pending).toBe(1);
    expect(scheduler.isRunning('a')).toBe(true);
    expect(scheduler.isRunning('c')).toBe(false);

    gate.resolve();
    await scheduler.whenIdle();
    expect(scheduler.active).toBe(0);
  });

  it('does not start an id again while its previous run is in flight', async () => {
    const gate = deferred<void>();
    const order: string[] = [];
    let call = 0;
    const scheduler = new ActivationScheduler(4, async (id) => {
      call++;
      const mine = call;
      order.push(`start ${id}${mine}`);
      if (mine === 1) await gate.promise;
      order.push(`end ${id}${mine}`);
    });

    scheduler.enqueue('a');
    await vi.waitFor(() => expect(scheduler.isRunning('a')).toBe(true));
    expect(scheduler.enqueue('a')).toBe(true);
    await Promise.resolve();
    expect(scheduler.active).toBe(1);

    gate.resolve();
    await scheduler.whenIdle();
    expect(order).toEqual(['start a1', 'end a1', 'start a2', 'end a2']);
  });

  it('cancel drops a waiting id', async () => {
    const task = vi.fn(async () => undefined);
    const scheduler = new ActivationScheduler(1, task);
    scheduler.enqueue('a');

    expect(scheduler.cancel('a')).toBe(true);
    expect(scheduler.cancel('a')).toBe(false);
    await scheduler.whenIdle();
    expect(task).not.toHaveBeenCalled();
  });

  it('a task that throws does not stop the pool', async () => {
    const ran: string[] = [];
    const scheduler = new ActivationScheduler(1, async (id) => {
      ran.push(id);
      if (id === 'bad') throw new Error('boom');
    });
    scheduler.enqueue('bad');
    scheduler.enqueue('good');

    await scheduler.whenIdle();
    expect(ran).toEqual(['bad', 'good']);
  });

  it('stop refuses new work', async () => {
    const task = vi.fn(async () => undefined);
    const scheduler = new ActivationScheduler(1, task);
    scheduler.enqueue('a');
    scheduler.stop();

    expect(scheduler.enqueue('b')).toBe(false);
    await scheduler.whenIdle();
    expect(task).not.toHaveBeenCalled();
  });
});
