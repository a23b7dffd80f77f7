// src/cache/store.ts
import { randomUUID } from 'node:crypto';
import { mkdir, open, readFile, rename, rm } from 'node:fs/promises';
import path from 'node:path';
import type { FastifyBaseLogger } from 'fastify';
import { errorMessage } from '../errors.js';
import { Mutex } from '../services/mutex.js';
import { snapshotSchema, type OrderSummary, type Snapshot } from '../types.js';
import { computeStats } from './stats.js';

export interface CacheStoreOptions {
  path: string;
  ttlSeconds: number;
  logger: FastifyBaseLogger;
  salesWindowDays?: number;        // default 7
  now?: () => Date;
}

/** Merge key: the ERP id, or `display_name|moment` for records that have none. */
export function orderKey(o: Pick<OrderSummary, 'id' | 'display_name' | 'moment'>): string {
  return o.id ? o.id : `~${o.display_name}|${o.moment ?? ''}`;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Owns the snapshot file. Every read and write of the file happens inside
 * the store mutex, so a load-merge-write never interleaves with another writer.
 */
export class CacheStore {
  private readonly mutex = new Mutex();
  private readonly now: () => Date;

  constructor(private readonly opts: CacheStoreOptions) {
    this.now = opts.now ?? (() => new Date());
  }

  /** Fresh snapshot over `orders`, deduplicated by merge key (later records win, first position kept). */
  build(orders: readonly OrderSummary[]): Snapshot {
    const byKey = new Map<string, OrderSummary>();
    for (const o of orders) byKey.set(orderKey(o), o);
    const deduped = [...byKey.values()];
    const now = this.now();
    return {
      updated_at: now.toISOString(),
      ttl_seconds: this.opts.ttlSeconds,
      stats: computeStats(deduped, now, this.opts.salesWindowDays),
      orders: deduped,
    };
  }

  load(): Promise<Snapshot | null> {
    return this.mutex.runExclusive(() => this.loadUnlocked());
  }

  write(snapshot: Snapshot): Promise<void> {
    return this.mutex.runExclusive(() => this.writeUnlocked(snapshot));
  }

  /** Replace-or-append one order, recompute stats, persist. */
  mergeOne(summary: OrderSummary): Promise<Snapshot> {
    if (!summary.id) {
      this.opts.logger.warn(
        { name: summary.display_name, moment: summary.moment },
        'Order has no id; merging by name and moment'
      );
    }
    return this.mutex.runExclusive(async () => {
      const current = await this.loadUnlocked();
      const snapshot = this.build([...(current?.orders ?? []), summary]);
      await this.writeUnlocked(snapshot);
      return snapshot;
    });
  }

  /** Full-resync path: the new order list replaces the old one wholesale. */
  replaceAll(summaries: readonly OrderSummary[]): Promise<Snapshot> {
    const missingIds = summaries.filter((s) => !s.id).length;
    if (missingIds > 0) {
      this.opts.logger.warn({ missingIds }, 'Orders without id are deduplicated by name and moment');
    }
    return this.mutex.runExclusive(async () => {
      const snapshot = this.build(summaries);
      await this.writeUnlocked(snapshot);
      return snapshot;
    });
  }

  /** Stale when there is no snapshot, `updated_at` does not parse, or ttl seconds have elapsed. */
  isStale(snapshot: Snapshot | null, now: Date = this.now()): boolean {
    if (!snapshot) return true;
    const updated = Date.parse(snapshot.updated_at);
    if (Number.isNaN(updated)) return true;
    const ttl = Number.isFinite(snapshot.ttl_seconds) ? snapshot.ttl_seconds : this.opts.ttlSeconds;
    return (now.getTime() - updated) / 1000 >= ttl;
  }

  private async loadUnlocked(): Promise<Snapshot | null> {
    let text: string;
    try {
      text = await readFile(this.opts.path, 'utf8');
    } catch (err) {
      if (!isMissingFile(err)) {
        this.opts.logger.warn({ err: errorMessage(err), path: this.opts.path }, 'Failed to read cache');
      }
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      this.opts.logger.warn({ err: errorMessage(err), path: this.opts.path }, 'Failed to decode cache');
      return null;
    }

    const parsed = snapshotSchema.safeParse(json);
    if (!parsed.success) {
      this.opts.logger.warn({ issues: parsed.error.issues.length, path: this.opts.path }, 'Cache has unexpected shape');
      return null;
    }
    return parsed.data;
  }

  private async writeUnlocked(snapshot: Snapshot): Promise<void> {
    const dir = path.dirname(this.opts.path);
    const tmp = path.join(dir, `.${path.basename(this.opts.path)}.${process.pid}.${randomUUID()}.tmp`);
    try {
      await mkdir(dir, { recursive: true });
      const handle = await open(tmp, 'w');
      try {
        await handle.writeFile(JSON.stringify(snapshot, null, 2), 'utf8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tmp, this.opts.path);
    } catch (err) {
      await rm(tmp, { force: true }).catch((rmErr: unknown) => {
        this.opts.logger.warn({ err: errorMessage(rmErr), tmp }, 'Failed to remove temp cache file');
      });
      throw err;
    }
  }
}
