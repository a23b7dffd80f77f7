// src/services/webhook.ts
import type { FastifyBaseLogger } from 'fastify';
import type { CacheStore } from '../cache/store.js';
import { errorMessage } from '../errors.js';
import { parseErpOrder, webhookBodySchema, type ErpOrder, type OrderSummary } from '../types.js';
import type { SnapshotPublisher } from './events.js';
import type { MessageBuilder } from './messages.js';
import type { ErpGateway } from './moysklad.js';
import type { OrderNormalizer } from './normalize.js';
import { logStats } from './refresh.js';
import type { Notifier } from './telegram.js';

export const ORDER_ENTITY_TYPE = 'customerorder';

/** hrefs of customer-order events; anything else in the batch is ignored. */
export function extractOrderHrefs(body: unknown): string[] {
  const parsed = webhookBodySchema.safeParse(body);
  if (!parsed.success) return [];
  const hrefs: string[] = [];
  for (const event of parsed.data.events) {
    if (event.meta?.type !== ORDER_ENTITY_TYPE) continue;
    if (event.meta.href) hrefs.push(event.meta.href);
  }
  return hrefs;
}

export type EventResult = {
  href: string;
  cached: boolean;
  notified: boolean;
};

export interface WebhookProcessorOptions {
  erp: Pick<ErpGateway, 'fetchOrder'>;
  normalizer: Pick<OrderNormalizer, 'normalize' | 'inline'>;
  store: Pick<CacheStore, 'mergeOne'>;
  publisher: SnapshotPublisher;
  messages: Pick<MessageBuilder, 'build'>;
  notifier: Notifier;
  logger: FastifyBaseLogger;
}

/**
 * Runs the per-event pipeline: fetch the order, then update the cache and
 * send the notification. The two halves fail independently of each other
 * and of the other events in the batch.
 */
export class WebhookProcessor {
  private readonly inFlight = new Set<Promise<EventResult | null>>();

  constructor(private readonly opts: WebhookProcessorOptions) {}

  get pending(): number {
    return this.inFlight.size;
  }

  /** Starts one background task per href and returns immediately. */
  enqueue(hrefs: readonly string[]): number {
    for (const href of hrefs) {
      const task = this.process(href).finally(() => {
        this.inFlight.delete(task);
      });
      this.inFlight.add(task);
    }
    return hrefs.length;
  }

  /** Resolves once every task started so far has finished. */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  /** Full pipeline for one href; errors are logged, never thrown. Null when the order could not be fetched. */
  async process(href: string): Promise<EventResult | null> {
    let order: ErpOrder;
    try {
      order = await this.fetchOrder(href);
    } catch (err) {
      this.opts.logger.error({ err: errorMessage(err), href }, 'Failed to fetch order details');
      return null;
    }
    return this.handleOrder(order, href);
  }

  /** Throws on ERP failure; the synchronous route maps the error to a status code. */
  async fetchOrder(href: string): Promise<ErpOrder> {
    const order = parseErpOrder(await this.opts.erp.fetchOrder(href));
    if (!order) throw new Error(`ERP returned a non-order payload for ${href}`);
    return order;
  }

  async handleOrder(order: ErpOrder, href: string): Promise<EventResult> {
    let summary: OrderSummary | null = null;
    try {
      summary = await this.opts.normalizer.normalize(order, { resolveAgent: true });
    } catch (err) {
      this.opts.logger.error({ err: errorMessage(err), href }, 'Failed to normalize webhook order');
    }

    const [cached, notified] = await Promise.all([
      this.updateCache(summary, href),
      this.notify(order, summary, href),
    ]);
    return { href, cached, notified };
  }

  private async updateCache(summary: OrderSummary | null, href: string): Promise<boolean> {
    if (!summary) return false;
    try {
      const snapshot = await this.opts.store.mergeOne(summary);
      logStats(this.opts.logger, snapshot);
      this.opts.publisher.broadcast(snapshot);
      return true;
    } catch (err) {
      this.opts.logger.error({ err: errorMessage(err), href, orderId: summary.id }, 'Failed to update cache for webhook');
      return false;
    }
  }

  private async notify(order: ErpOrder, summary: OrderSummary | null, href: string): Promise<boolean> {
    try {
      // without a full summary the message is built from the fields the order carries
      const text = await this.opts.messages.build(order, summary ?? this.opts.normalizer.inline(order));
      return await this.opts.notifier.sendMessage(text);
    } catch (err) {
      this.opts.logger.error({ err: errorMessage(err), href, orderId: order.id }, 'Failed to send Telegram notification');
      return false;
    }
  }
}
