// src/services/refresh.ts
import type { FastifyBaseLogger } from 'fastify';
import type { CacheStore } from '../cache/store.js';
import { errorMessage } from '../errors.js';
import type { Snapshot } from '../types.js';
import type { SnapshotPublisher } from './events.js';
import type { ErpGateway } from './moysklad.js';
import { Mutex } from './mutex.js';
import type { OrderNormalizer } from './normalize.js';

export type RefreshReason = 'startup' | 'ttl' | 'manual';

export type RefreshOutcome = {
  status: 'refreshed' | 'kept-previous' | 'failed';
  /** The new snapshot, or the previous one when the resync did not go through. */
  snapshot: Snapshot | null;
  error?: string;
};

export interface RefreshOrchestratorOptions {
  erp: Pick<ErpGateway, 'fetchRecentOrders'>;
  normalizer: Pick<OrderNormalizer, 'normalizeMany'>;
  store: CacheStore;
  publisher: SnapshotPublisher;
  logger: FastifyBaseLogger;
  lookbackDays: number;
  pageLimit: number;
}

export function logStats(logger: FastifyBaseLogger, snapshot: Snapshot): void {
  const { stats, updated_at } = snapshot;
  logger.info(
    {
      total: stats.total_orders,
      new: stats.new_orders,
      courier: stats.courier_orders,
      sales7d: stats.sales.sum,
      updated_at,
    },
    '[STATS] cache updated'
  );
}

/**
 * Full resyncs, one at a time. A second caller waits for the running
 * resync and then runs its own; the store mutex still orders each write
 * against webhook merges.
 */
export class RefreshOrchestrator {
  private readonly lock = new Mutex();

  constructor(private readonly opts: RefreshOrchestratorOptions) {}

  get refreshing(): boolean {
    return this.lock.locked;
  }

  refresh(reason: RefreshReason): Promise<RefreshOutcome> {
    return this.lock.runExclusive(() => this.run(reason));
  }

  private async run(reason: RefreshReason): Promise<RefreshOutcome> {
    const { erp, normalizer, store, publisher, logger } = this.opts;
    try {
      const raw = await erp.fetchRecentOrders({ lookbackDays: this.opts.lookbackDays, limit: this.opts.pageLimit });
      const summaries = await normalizer.normalizeMany(raw);

      if (raw.length > 0 && summaries.length === 0) {
        logger.error({ reason, fetched: raw.length }, 'No order could be normalized; keeping previous cache');
        return { status: 'kept-previous', snapshot: await store.load() };
      }

      const snapshot = await store.replaceAll(summaries);
      logStats(logger, snapshot);
      publisher.broadcast(snapshot);
      logger.info({ reason, orders: snapshot.orders.length }, 'Cache refreshed');
      return { status: 'refreshed', snapshot };
    } catch (err) {
      logger.error({ err: errorMessage(err), reason }, 'Failed to refresh cache');
      return { status: 'failed', snapshot: await this.previous(), error: errorMessage(err) };
    }
  }

  private async previous(): Promise<Snapshot | null> {
    try {
      return await this.opts.store.load();
    } catch (err) {
      this.opts.logger.error({ err: errorMessage(err) }, 'Failed to load previous cache');
      return null;
    }
  }
}

export interface RefreshSchedulerOptions {
  orchestrator: Pick<RefreshOrchestrator, 'refresh'>;
  store: Pick<CacheStore, 'load' | 'isStale'>;
  intervalMs: number;
  logger: FastifyBaseLogger;
}

/** Background loop: every interval, resync when the cache is missing or stale. */
export class RefreshScheduler {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<void> | null = null;

  constructor(private readonly opts: RefreshSchedulerOptions) {}

  get started(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.schedule();
  }

  /** Stops the loop and waits for a tick already in progress. */
  async stop(): Promise<void> {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    await this.running;
  }

  /** One pass of the loop; returns whether a resync was started. */
  async tick(): Promise<boolean> {
    try {
      const snapshot = await this.opts.store.load();
      if (snapshot && !this.opts.store.isStale(snapshot)) return false;
      await this.opts.orchestrator.refresh('ttl');
      return true;
    } catch (err) {
      this.opts.logger.error({ err: errorMessage(err) }, 'Auto refresh failed');
      return false;
    }
  }

  private schedule(): void {
    const timer = setTimeout(() => {
      const run = this.tick().then(() => {
        if (this.running === run) this.running = null;
        // a stop() or a stop()/start() pair during the tick replaced or cleared the timer
        if (this.timer === timer) this.schedule();
      });
      this.running = run;
    }, this.opts.intervalMs);
    timer.unref();
    this.timer = timer;
  }
}
