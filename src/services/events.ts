// src/services/events.ts
import type { FastifyBaseLogger } from 'fastify';
import type { EventPayload, Snapshot } from '../types.js';

/**
 * Fixed-capacity FIFO with a non-blocking producer side. `offer` never waits:
 * a full channel rejects the item. Readers await `next()`, which resolves
 * null once the channel is closed and drained.
 */
export class BoundedChannel<T> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private waiter: ((item: T | null) => void) | null = null;
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  offer(item: T): boolean {
    if (this.closed) return false;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(item);
      return true;
    }
    if (this.items.length >= this.capacity) return false;
    this.items.push(item);
    return true;
  }

  next(): Promise<T | null> {
    const head = this.items.shift();
    if (head !== undefined) return Promise.resolve(head);
    if (this.closed) return Promise.resolve(null);
    if (this.waiter) return Promise.reject(new Error('Channel already has a pending reader'));
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(null);
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const item = await this.next();
      if (item === null) return;
      yield item;
    }
  }
}

export function buildEventPayload(snapshot: Snapshot, stale: boolean, now: Date): EventPayload {
  return {
    updated_at: snapshot.updated_at,
    ttl_seconds: snapshot.ttl_seconds,
    stats: snapshot.stats,
    orders: snapshot.orders,
    stale,
    server_time: now.toISOString(),
    server_time_ms: now.getTime(),
  };
}

export interface BroadcastResult {
  delivered: number;
  dropped: number;
}

/** Anything that wants to hear about new snapshots. */
export interface SnapshotPublisher {
  broadcast(snapshot: Snapshot): BroadcastResult;
}

export interface SubscriberRegistryOptions {
  logger: FastifyBaseLogger;
  isStale: (snapshot: Snapshot, now: Date) => boolean;
  capacity?: number;               // default 10
  now?: () => Date;
}

/**
 * Live dashboard connections. Registration and fan-out are synchronous, so
 * the set is never observed half-updated; no broadcaster waits on a reader.
 */
export class SubscriberRegistry implements SnapshotPublisher {
  private readonly subscribers = new Set<BoundedChannel<string>>();
  private readonly capacity: number;
  private readonly now: () => Date;

  constructor(private readonly opts: SubscriberRegistryOptions) {
    this.capacity = opts.capacity ?? 10;
    this.now = opts.now ?? (() => new Date());
  }

  get size(): number {
    return this.subscribers.size;
  }

  /** JSON payload for one snapshot, as written on the stream. */
  serialize(snapshot: Snapshot): string {
    const now = this.now();
    return JSON.stringify(buildEventPayload(snapshot, this.opts.isStale(snapshot, now), now));
  }

  subscribe(): BoundedChannel<string> {
    const channel = new BoundedChannel<string>(this.capacity);
    this.subscribers.add(channel);
    this.opts.logger.debug({ subscribers: this.subscribers.size }, 'SSE subscriber added');
    return channel;
  }

  /** Safe to call more than once and from disconnect handlers. */
  unsubscribe(channel: BoundedChannel<string>): void {
    channel.close();
    if (this.subscribers.delete(channel)) {
      this.opts.logger.debug({ subscribers: this.subscribers.size }, 'SSE subscriber removed');
    }
  }

  /** Ends every open stream; used on shutdown. */
  closeAll(): void {
    for (const channel of [...this.subscribers]) this.unsubscribe(channel);
  }

  broadcast(snapshot: Snapshot): BroadcastResult {
    if (this.subscribers.size === 0) return { delivered: 0, dropped: 0 };

    const payload = this.serialize(snapshot);
    let delivered = 0;
    let dropped = 0;
    for (const channel of [...this.subscribers]) {
      if (channel.offer(payload)) {
        delivered++;
      } else {
        dropped++;
      }
    }
    if (dropped > 0) {
      this.opts.logger.warn({ dropped, delivered }, 'Dropping SSE event for slow client');
    }
    return { delivered, dropped };
  }
}
