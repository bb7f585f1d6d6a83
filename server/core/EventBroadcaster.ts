import { randomUUID } from 'node:crypto';
import type { Logger } from './logger.js';

export type LifecycleEventKind = 'job_queued' | 'job_running' | 'job_completed' | 'job_failed' | 'heartbeat';

export type LifecycleEvent = Readonly<{
  seq: number;
  kind: LifecycleEventKind;
  jobId?: string;
  timestamp: number;
  payload?: Readonly<Record<string, unknown>>;
}>;

export type EventInit = {
  kind: LifecycleEventKind;
  jobId?: string;
  payload?: Record<string, unknown>;
};

export type CloseReason = 'unsubscribed' | 'overflow' | 'timeout' | 'shutdown';

type OfferOutcome = 'delivered' | 'buffered' | 'dropped' | 'closed';

function frozenCopy(value: unknown): unknown {
  if (Array.isArray(value)) return Object.freeze(value.map(frozenCopy));
  if (value !== null && typeof value === 'object') return freezeRecord(value);
  return value;
}

function freezeRecord(value: object): Readonly<Record<string, unknown>> {
  return Object.freeze(Object.fromEntries(Object.entries(value).map(([k, v]) => [k, frozenCopy(v)])));
}

/**
 * One observer of the event stream: a bounded drop-oldest buffer plus the
 * bookkeeping the broadcaster needs to prune it.
 *
 * Iterate it with `for await`; iteration ends when the subscription is closed.
 */
export class Subscription implements AsyncIterable<LifecycleEvent> {
  readonly id: string;
  readonly capacity: number;
  readonly createdAt: number;
  lastActivity: number;
  droppedCount = 0;
  consecutiveDrops = 0;
  closeReason?: CloseReason;

  private buffer: LifecycleEvent[] = [];
  private waiter?: (result: IteratorResult<LifecycleEvent>) => void;
  private gap = false;
  private readonly closeListeners = new Set<(reason: CloseReason) => void>();
  private readonly now: () => number;
  private readonly detach: (sub: Subscription) => void;

  constructor(capacity: number, now: () => number, detach: (sub: Subscription) => void) {
    this.id = randomUUID();
    this.capacity = Math.max(1, Math.floor(capacity));
    this.now = now;
    this.detach = detach;
    this.createdAt = now();
    this.lastActivity = this.createdAt;
  }

  get closed(): boolean {
    return this.closeReason !== undefined;
  }

  /** True while events have been dropped since the last `takeGap()`. */
  get missedEvents(): boolean {
    return this.gap;
  }

  get pending(): number {
    return this.buffer.length;
  }

  /** @internal called by the broadcaster during fan-out */
  offer(event: LifecycleEvent): OfferOutcome {
    if (this.closed) return 'closed';
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = undefined;
      this.markRead();
      resolve({ done: false, value: event });
      return 'delivered';
    }
    let outcome: OfferOutcome = 'buffered';
    if (this.buffer.length >= this.capacity) {
      this.buffer.shift();
      this.droppedCount += 1;
      this.consecutiveDrops += 1;
      this.gap = true;
      outcome = 'dropped';
    }
    this.buffer.push(event);
    return outcome;
  }

  next(): Promise<IteratorResult<LifecycleEvent>> {
    const event = this.buffer.shift();
    if (event) {
      this.markRead();
      return Promise.resolve({ done: false, value: event });
    }
    if (this.closed) return Promise.resolve({ done: true, value: undefined });
    this.touch();
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /** Takes every buffered event without waiting. */
  drain(): LifecycleEvent[] {
    const events = this.buffer;
    this.buffer = [];
    this.markRead();
    return events;
  }

  /** Marks the consumer as alive without reading. */
  touch() {
    this.lastActivity = this.now();
  }

  /** Returns whether events were missed and clears the flag. */
  takeGap(): boolean {
    const had = this.gap;
    this.gap = false;
    return had;
  }

  /**
   * Runs `listener` once the subscription closes, immediately if it already has.
   * Returns a function that removes the listener.
   */
  onClose(listener: (reason: CloseReason) => void): () => void {
    if (this.closeReason !== undefined) {
      listener(this.closeReason);
      return () => undefined;
    }
    this.closeListeners.add(listener);
    return () => {
      this.closeListeners.delete(listener);
    };
  }

  /** @internal use EventBroadcaster.unsubscribe */
  close(reason: CloseReason) {
    if (this.closed) return;
    this.closeReason = reason;
    this.buffer = [];
    const resolve = this.waiter;
    this.waiter = undefined;
    resolve?.({ done: true, value: undefined });
    const listeners = Array.from(this.closeListeners);
    this.closeListeners.clear();
    for (const listener of listeners) listener(reason);
  }

  [Symbol.asyncIterator](): AsyncIterator<LifecycleEvent> {
    return {
      next: () => this.next(),
      return: async () => {
        this.detach(this);
        return { done: true, value: undefined };
      },
    };
  }

  private markRead() {
    this.consecutiveDrops = 0;
    this.touch();
  }
}

export type BroadcasterOptions = {
  bufferCapacity: number;
  maxConsecutiveDrops: number;
  heartbeatIntervalMs: number;
  inactivityTimeoutMs: number;
  now?: () => number;
};

/**
 * Event Broadcaster - fans lifecycle events out to every connected subscriber.
 *
 * Features:
 * - Non-blocking publish over a snapshot of the subscriber set
 * - Per-subscriber bounded buffer with drop-oldest backpressure
 * - Forced unsubscribe after too many consecutive drops
 * - Heartbeat tick that also prunes idle subscribers
 */
export class EventBroadcaster {
  private readonly subscribers = new Map<string, Subscription>();
  private readonly log: Logger;
  private readonly options: Required<Omit<BroadcasterOptions, 'now'>>;
  private readonly now: () => number;
  private seq = 0;
  private timer?: NodeJS.Timeout;
  private counters = { published: 0, dropped: 0, overflowed: 0, timedOut: 0 };

  constructor(log: Logger, options: BroadcasterOptions) {
    this.log = log;
    this.now = options.now ?? Date.now;
    this.options = {
      bufferCapacity: options.bufferCapacity,
      maxConsecutiveDrops: options.maxConsecutiveDrops,
      heartbeatIntervalMs: options.heartbeatIntervalMs,
      inactivityTimeoutMs: options.inactivityTimeoutMs,
    };
  }

  subscribe(): Subscription {
    const sub = new Subscription(this.options.bufferCapacity, this.now, (s) => this.unsubscribe(s));
    this.subscribers.set(sub.id, sub);
    this.log.debug('subscriber_added', { id: sub.id, total: this.subscribers.size });
    return sub;
  }

  unsubscribe(sub: Subscription | string, reason: CloseReason = 'unsubscribed'): boolean {
    const id = typeof sub === 'string' ? sub : sub.id;
    const existing = this.subscribers.get(id);
    if (!existing) return false;
    this.subscribers.delete(id);
    existing.close(reason);
    if (reason === 'overflow') this.counters.overflowed += 1;
    if (reason === 'timeout') this.counters.timedOut += 1;
    const level = reason === 'unsubscribed' || reason === 'shutdown' ? 'debug' : 'warn';
    this.log[level]('subscriber_removed', {
      id,
      reason,
      dropped: existing.droppedCount,
      total: this.subscribers.size,
    });
    return true;
  }

  publish(init: EventInit): LifecycleEvent {
    this.seq += 1;
    const event: LifecycleEvent = Object.freeze({
      seq: this.seq,
      kind: init.kind,
      timestamp: this.now(),
      ...(init.jobId !== undefined ? { jobId: init.jobId } : {}),
      ...(init.payload ? { payload: freezeRecord(init.payload) } : {}),
    });
    this.counters.published += 1;

    for (const sub of Array.from(this.subscribers.values())) {
      const outcome = sub.offer(event);
      if (outcome !== 'dropped') continue;
      this.counters.dropped += 1;
      if (sub.consecutiveDrops > this.options.maxConsecutiveDrops) {
        this.unsubscribe(sub, 'overflow');
      }
    }
    return event;
  }

  /**
   * Prunes subscribers idle past the inactivity timeout, then publishes a
   * heartbeat to the rest. Returns the number of pruned subscribers.
   */
  heartbeat(now = this.now()): number {
    let pruned = 0;
    for (const sub of Array.from(this.subscribers.values())) {
      if (now - sub.lastActivity > this.options.inactivityTimeoutMs) {
        this.unsubscribe(sub, 'timeout');
        pruned += 1;
      }
    }
    this.publish({ kind: 'heartbeat' });
    return pruned;
  }

  start() {
    if (this.timer) return;
    this.timer = setInterval(() => {
      try {
        this.heartbeat();
      } catch (err) {
        this.log.error('heartbeat_failed', { error: String(err) });
      }
    }, this.options.heartbeatIntervalMs);
    this.timer.unref();
  }

  stop() {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
  }

  shutdown() {
    this.stop();
    for (const sub of Array.from(this.subscribers.values())) this.unsubscribe(sub, 'shutdown');
  }

  get size(): number {
    return this.subscribers.size;
  }

  getStats() {
    return {
      subscribers: this.subscribers.size,
      ...this.counters,
      lastSeq: this.seq,
      heartbeatIntervalMs: this.options.heartbeatIntervalMs,
      connections: Array.from(this.subscribers.values()).map((s) => ({
        id: s.id,
        pending: s.pending,
        dropped: s.droppedCount,
        createdAt: s.createdAt,
        lastActivity: s.lastActivity,
      })),
    };
  }
}
