// src/services/normalize.ts
import type { FastifyBaseLogger } from 'fastify';
import { errorMessage } from '../errors.js';
import { erpRefSchema, parseErpOrder, type ErpOrder, type ErpRef, type OrderSummary } from '../types.js';
import { ATTRIBUTE_NAMES, extractAttributes, findFirstKey, firstPresent, refName } from './attributes.js';
import { formatErpDatetime } from './moysklad.js';

export const NOT_SPECIFIED = 'не указан';
export const NO_NUMBER = 'без номера';
/** Feminine form, for дата / сумма / ссылка. */
export const NOT_SPECIFIED_F = 'не указана';

/**
 * href -> entity lookups for the life of the process. Concurrent callers of
 * one href share the same request; failed lookups are dropped so a later
 * call retries. Oldest entries go first once `maxEntries` is exceeded.
 */
export class EntityCache {
  private readonly entries = new Map<string, Promise<unknown>>();

  constructor(
    private readonly load: (href: string) => Promise<unknown>,
    private readonly maxEntries = Number.POSITIVE_INFINITY
  ) {}

  get size(): number {
    return this.entries.size;
  }

  get(href: string): Promise<unknown> {
    const cached = this.entries.get(href);
    if (cached) return cached;

    const pending = this.load(href);
    this.entries.set(href, pending);
    pending.catch(() => {
      if (this.entries.get(href) === pending) this.entries.delete(href);
    });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    return pending;
  }
}

const NAIVE_MOMENT = /^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2})(:\d{2})?(\.\d+)?$/;

function formatOffset(minutes: number): string {
  const sign = minutes < 0 ? '-' : '+';
  const abs = Math.abs(minutes);
  return `${sign}${String(Math.floor(abs / 60)).padStart(2, '0')}:${String(abs % 60).padStart(2, '0')}`;
}

/**
 * ERP timestamps carry no zone ('2024-05-01 10:00:00.000'); they are read at
 * `utcOffsetMinutes`. Zoned ISO strings are taken as-is and displayed in UTC.
 */
export function parseMoment(
  raw: string | null | undefined,
  utcOffsetMinutes: number
): { ms: number | null; display: string } {
  if (!raw) return { ms: null, display: NOT_SPECIFIED_F };

  const naive = raw.trim().match(NAIVE_MOMENT);
  if (naive) {
    const [, date, hm, sec = ':00', frac = ''] = naive;
    const ms = Date.parse(`${date}T${hm}${sec}${frac}${formatOffset(utcOffsetMinutes)}`);
    return { ms: Number.isNaN(ms) ? null : ms, display: `${date} ${hm}${sec}` };
  }

  const ms = Date.parse(raw);
  if (Number.isNaN(ms)) return { ms: null, display: raw };
  return { ms, display: formatErpDatetime(new Date(ms)) };
}

export interface AgentDetails {
  name?: string;
  phone?: string;
  email?: string;
}

export interface NormalizerOptions {
  entities: EntityCache;
  logger: FastifyBaseLogger;
  appUrl: string;                  // order deep link prefix, id is appended
  utcOffsetMinutes: number;
}

export interface NormalizeOptions {
  /** Look the counterparty up when the order only carries a reference (webhook path). */
  resolveAgent?: boolean;
}

export class OrderNormalizer {
  constructor(private readonly opts: NormalizerOptions) {}

  /** Referenced entity parsed as a ref; undefined when the lookup fails. */
  async lookup(href: string | undefined, what: string): Promise<ErpRef | undefined> {
    if (!href) return undefined;
    try {
      const res = erpRefSchema.safeParse(await this.opts.entities.get(href));
      return res.success ? res.data : undefined;
    } catch (err) {
      this.opts.logger.warn({ err: errorMessage(err), href, what }, 'Failed to resolve ERP reference');
      return undefined;
    }
  }

  async stateName(order: ErpOrder): Promise<string> {
    const inline = order.state?.name;
    if (inline) return inline;
    const resolved = await this.lookup(order.state?.meta?.href, 'state');
    return resolved?.name || NOT_SPECIFIED;
  }

  async agentDetails(order: ErpOrder): Promise<AgentDetails> {
    const agent = order.agent;
    let name = agent?.name;
    let phone = agent?.phone;
    let email = agent?.email;
    if (agent?.meta?.href && (!name || !phone || !email)) {
      const details = await this.lookup(agent.meta.href, 'agent');
      name = name || details?.name;
      phone = phone || details?.phone;
      email = email || details?.email;
    }
    return { name, phone, email };
  }

  link(order: ErpOrder): string | null {
    if (order.id) return `${this.opts.appUrl}${order.id}`;
    return order.meta?.href || null;
  }

  /** Minor units; absent means unknown, a wrongly typed amount counts as zero. */
  total(order: ErpOrder): number | null {
    const { sum } = order;
    if (sum === undefined || sum === null) return null;
    if (typeof sum === 'number' && Number.isFinite(sum)) return Math.round(sum);
    if (typeof sum === 'string' && sum.trim() && Number.isFinite(Number(sum))) return Math.round(Number(sum));
    this.opts.logger.warn({ orderId: order.id, sum }, 'Order sum has unexpected type; using 0');
    return 0;
  }

  async normalize(order: ErpOrder, options: NormalizeOptions = {}): Promise<OrderSummary> {
    const agent = options.resolveAgent ? await this.agentDetails(order) : undefined;
    return this.inline(order, agent, await this.stateName(order));
  }

  /** Summary from the fields the order carries itself; no ERP lookups. */
  inline(
    order: ErpOrder,
    agent: AgentDetails = { name: order.agent?.name, phone: order.agent?.phone, email: order.agent?.email },
    status: string = order.state?.name || NOT_SPECIFIED
  ): OrderSummary {
    const attrs = extractAttributes(order.attributes);
    const ship = order.shipmentAddressFull;
    const moment = parseMoment(order.moment, this.opts.utcOffsetMinutes);

    return {
      id: order.id || '',
      display_name: order.name || NO_NUMBER,
      status,
      moment: order.moment || null,
      moment_display: moment.display,
      moment_ms: moment.ms,
      total: this.total(order),
      recipient:
        firstPresent(ship?.recipient, findFirstKey(attrs, ATTRIBUTE_NAMES.recipient), agent.name) ?? null,
      phone: firstPresent(order.phone, agent.phone, findFirstKey(attrs, ATTRIBUTE_NAMES.phone)) ?? null,
      email: firstPresent(order.email, agent.email, findFirstKey(attrs, ATTRIBUTE_NAMES.email)) ?? null,
      delivery_method: deliveryMethod(order, attrs) ?? null,
      city: firstPresent(ship?.city, refName(ship?.region)) ?? null,
      address: firstPresent(order.shipmentAddress, ship?.address, ship?.addInfo) ?? null,
      comment:
        firstPresent(order.description, ship?.comment, findFirstKey(attrs, ATTRIBUTE_NAMES.comment)) ?? null,
      link: this.link(order),
    };
  }

  /** Null when the payload is not an order or normalization blew up; never throws. */
  async normalizeRaw(raw: unknown, options?: NormalizeOptions): Promise<OrderSummary | null> {
    const order = parseErpOrder(raw);
    if (!order) {
      this.opts.logger.warn({ kind: typeof raw }, 'Skipping ERP record that is not an order object');
      return null;
    }
    try {
      return await this.normalize(order, options);
    } catch (err) {
      this.opts.logger.error({ err: errorMessage(err), orderId: order.id }, 'Failed to normalize order');
      return null;
    }
  }

  /** One record at a time; repeated references hit the entity cache. */
  async normalizeMany(raws: unknown[], options?: NormalizeOptions): Promise<OrderSummary[]> {
    const out: OrderSummary[] = [];
    for (const raw of raws) {
      const summary = await this.normalizeRaw(raw, options);
      if (summary) out.push(summary);
    }
    return out;
  }
}

export function deliveryMethod(order: ErpOrder, attrs = extractAttributes(order.attributes)): string | undefined {
  const ship = order.shipmentAddressFull;
  return firstPresent(
    findFirstKey(attrs, ATTRIBUTE_NAMES.deliveryMethod),
    refName(ship?.deliveryService),
    refName(ship?.shipmentMethod)
  );
}
