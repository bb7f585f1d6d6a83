import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { EventBroadcaster, type BroadcasterOptions } from '../core/EventBroadcaster.js';
import { createMockLogger } from './helpers.js';

describe('EventBroadcaster', () => {
  let clock: number;
  let log: ReturnType<typeof createMockLogger>;

  const create = (options: Partial<BroadcasterOptions> = {}) =>
    new EventBroadcaster(log, {
      bufferCapacity: 10,
      maxConsecutiveDrops: 100,
      heartbeatIntervalMs: 1_000,
      inactivityTimeoutMs: 5_000,
      now: () => clock,
      ...options,
    });

  beforeEach(() => {
    clock = 0;
    log = createMockLogger();
  });

  it('delivers frozen events with increasing sequence numbers', async () => {
    const broadcaster = create();
    const sub = broadcaster.subscribe();
    const payload = { bytes: 3 };
    broadcaster.publish({ kind: 'job_queued', jobId: 'j1', payload });
    broadcaster.publish({ kind: 'job_running', jobId: 'j1' });
    payload.bytes = 99;

    const first = await sub.next();
    const second = await sub.next();
    expect(first.value).toEqual({ seq: 1, kind: 'job_queued', jobId: 'j1', timestamp: 0, payload: { bytes: 3 } });
    expect(second.value).toMatchObject({ seq: 2, kind: 'job_running' });
    expect(Object.isFrozen(first.value)).toBe(true);
  });

  it('hands an event straight to a waiting reader', async () => {
    const broadcaster = create();
    const sub = broadcaster.subscribe();
    const pending = sub.next();
    broadcaster.publish({ kind: 'heartbeat' });
    await expect(pending).resolves.toMatchObject({ done: false, value: { kind: 'heartbeat' } });
    expect(sub.pending).toBe(0);
  });

  it('drops the oldest events when a buffer is full', () => {
    const broadcaster = create({ bufferCapacity: 3 });
    const sub = broadcaster.subscribe();
    for (let i = 0; i < 5; i++) broadcaster.publish({ kind: 'heartbeat' });

    expect(sub.droppedCount).toBe(2);
    expect(sub.missedEvents).toBe(true);
    expect(sub.drain().map((e) => e.seq)).toEqual([3, 4, 5]);
    expect(sub.takeGap()).toBe(true);
    expect(sub.takeGap()).toBe(false);
  });

  it('does not let a slow subscriber hold back others', () => {
    const broadcaster = create({ bufferCapacity: 1 });
    const slow = broadcaster.subscribe();
    const fast = broadcaster.subscribe();
    const seen: number[] = [];
    for (let i = 0; i < 3; i++) {
      broadcaster.publish({ kind: 'heartbeat' });
      seen.push(...fast.drain().map((e) => e.seq));
    }
    expect(seen).toEqual([1, 2, 3]);
    expect(slow.droppedCount).toBe(2);
    expect(fast.droppedCount).toBe(0);
  });

  it('force-unsubscribes after too many consecutive drops', () => {
    const broadcaster = create({ bufferCapacity: 1, maxConsecutiveDrops: 2 });
    const sub = broadcaster.subscribe();
    for (let i = 0; i < 4; i++) broadcaster.publish({ kind: 'heartbeat' });

    expect(sub.closed).toBe(true);
    expect(sub.closeReason).toBe('overflow');
    expect(broadcaster.size).toBe(0);
    expect(log.warn).toHaveBeenCalledWith('subscriber_removed', expect.objectContaining({ reason: 'overflow' }));
    expect(broadcaster.getStats().overflowed).toBe(1);
  });

  it('resets the consecutive drop counter on read', () => {
    const broadcaster = create({ bufferCapacity: 1, maxConsecutiveDrops: 2 });
    const sub = broadcaster.subscribe();
    broadcaster.publish({ kind: 'heartbeat' });
    broadcaster.publish({ kind: 'heartbeat' });
    expect(sub.consecutiveDrops).toBe(1);
    sub.drain();
    expect(sub.consecutiveDrops).toBe(0);
    for (let i = 0; i < 3; i++) broadcaster.publish({ kind: 'heartbeat' });
    expect(sub.closed).toBe(false);
  });

  it('ends a pending read when the subscriber is removed', async () => {
    const broadcaster = create();
    const sub = broadcaster.subscribe();
    const pending = sub.next();
    expect(broadcaster.unsubscribe(sub)).toBe(true);
    await expect(pending).resolves.toEqual({ done: true, value: undefined });
    expect(broadcaster.unsubscribe(sub)).toBe(false);
  });

  it('prunes idle subscribers before publishing a heartbeat', () => {
    const broadcaster = create({ inactivityTimeoutMs: 1_000 });
    const idle = broadcaster.subscribe();
    const active = broadcaster.subscribe();
    clock = 500;
    active.touch();
    clock = 1_200;

    expect(broadcaster.heartbeat(1_200)).toBe(1);
    expect(idle.closeReason).toBe('timeout');
    expect(broadcaster.size).toBe(1);
    expect(active.drain().map((e) => e.kind)).toEqual(['heartbeat']);
  });

  it('iterates until the subscription closes and detaches on break', async () => {
    const broadcaster = create();
    const sub = broadcaster.subscribe();
    broadcaster.publish({ kind: 'job_queued', jobId: 'a' });
    broadcaster.publish({ kind: 'job_running', jobId: 'a' });

    const kinds: string[] = [];
    for await (const event of sub) {
      kinds.push(event.kind);
      if (kinds.length === 2) break;
    }
    expect(kinds).toEqual(['job_queued', 'job_running']);
    expect(broadcaster.size).toBe(0);
  });

  it('copies nested payload values so publishers and readers cannot share them', () => {
    const broadcaster = create();
    const a = broadcaster.subscribe();
    const b = broadcaster.subscribe();
    const path = ['markdown', 'html'];
    broadcaster.publish({ kind: 'job_queued', jobId: 'j1', payload: { path } });
    path.push('text');

    const [fromA] = a.drain();
    const [fromB] = b.drain();
    const seen = fromA.payload?.path;
    expect(seen).toEqual(['markdown', 'html']);
    expect(Object.isFrozen(seen)).toBe(true);
    expect(fromB.payload?.path).toEqual(['markdown', 'html']);
    expect(() => {
      if (Array.isArray(seen)) seen.push('pdf');
    }).toThrow(TypeError);
  });

  it('notifies close listeners once with the reason', () => {
    const broadcaster = create();
    const sub = broadcaster.subscribe();
    const listener = vi.fn();
    const removed = vi.fn();
    sub.onClose(listener);
    const stop = sub.onClose(removed);
    stop();

    clock = 10_000;
    broadcaster.heartbeat();
    broadcaster.unsubscribe(sub, 'shutdown');
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith('timeout');
    expect(removed).not.toHaveBeenCalled();

    const late = vi.fn();
    sub.onClose(late);
    expect(late).toHaveBeenCalledWith('timeout');
  });

  it('closes everyone on shutdown', () => {
    const broadcaster = create();
    const a = broadcaster.subscribe();
    const b = broadcaster.subscribe();
    broadcaster.shutdown();
    expect([a.closeReason, b.closeReason]).toEqual(['shutdown', 'shutdown']);
    expect(broadcaster.size).toBe(0);
  });

  describe('heartbeat timer', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it('publishes a heartbeat every interval once started', () => {
      vi.useFakeTimers();
      const broadcaster = create();
      const sub = broadcaster.subscribe();
      broadcaster.start();
      vi.advanceTimersByTime(2_000);
      broadcaster.stop();
      vi.advanceTimersByTime(2_000);
      expect(sub.drain().map((e) => e.kind)).toEqual(['heartbeat', 'heartbeat']);
    });
  });
});
