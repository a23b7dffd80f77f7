// src/services/messages.ts
import type { FastifyBaseLogger } from 'fastify';
import { classifyStatus } from '../cache/stats.js';
import { errorMessage } from '../errors.js';
import { erpPositionSchema, type ErpOrder, type ErpPosition, type OrderSummary } from '../types.js';
import { ATTRIBUTE_NAMES, extractAttributes, findFirstKey } from './attributes.js';
import type { ErpGateway } from './moysklad.js';
import { NOT_SPECIFIED, NOT_SPECIFIED_F, type OrderNormalizer } from './normalize.js';

const NONE = 'нет';

/** Minor units -> '1500.00'. */
export function formatMoney(value: number | null | undefined): string {
  if (value === null || value === undefined) return NOT_SPECIFIED_F;
  return (value / 100).toFixed(2);
}

export interface MessageBuilderOptions {
  erp: Pick<ErpGateway, 'fetchPositions'>;
  normalizer: Pick<OrderNormalizer, 'lookup'>;
  logger: FastifyBaseLogger;
}

/** Human-readable Telegram text for one order. */
export class MessageBuilder {
  constructor(private readonly opts: MessageBuilderOptions) {}

  private async positions(order: ErpOrder): Promise<ErpPosition[]> {
    const inline = order.positions?.rows ?? [];
    const href = order.positions?.meta?.href;
    if (inline.length > 0 || !href) return inline;
    const rows = await this.opts.erp.fetchPositions(href);
    const out: ErpPosition[] = [];
    for (const row of rows) {
      const parsed = erpPositionSchema.safeParse(row);
      if (parsed.success) out.push(parsed.data);
    }
    return out;
  }

  async formatPositions(order: ErpOrder): Promise<string> {
    let rows: ErpPosition[];
    try {
      rows = await this.positions(order);
    } catch (err) {
      this.opts.logger.warn({ err: errorMessage(err), orderId: order.id }, 'Failed to fetch order positions');
      return 'позиции недоступны';
    }

    const lines: string[] = [];
    for (const p of rows) {
      const name =
        p.assortment?.name ||
        (await this.opts.normalizer.lookup(p.assortment?.meta?.href, 'assortment'))?.name ||
        'Товар';
      lines.push(`${name} - ${p.quantity ?? 0} шт. - ${formatMoney(p.price)} руб.`);
    }
    return lines.length ? lines.join('\n') : 'нет позиций';
  }

  async build(order: ErpOrder, summary: OrderSummary): Promise<string> {
    const attrs = extractAttributes(order.attributes);
    const deliveryLink = findFirstKey(attrs, ATTRIBUTE_NAMES.deliveryLink) || NOT_SPECIFIED_F;
    const trackNumber = findFirstKey(attrs, ATTRIBUTE_NAMES.trackNumber) || NOT_SPECIFIED;
    const or = (v: string | null) => v || NOT_SPECIFIED;

    if (classifyStatus(summary.status) === 'courier') {
      return [
        `🚚 ${summary.status}`,
        `ID заказа: ${summary.display_name}`,
        '',
        `👤 Получатель: ${or(summary.recipient)}`,
        `📞 Номер телефона: ${or(summary.phone)}`,
        `🏠 Адрес доставки: ${or(summary.address)}`,
        `Ссылка на доставку: ${deliveryLink}`,
        `Трек-номер: ${trackNumber}`,
        `Ссылка: ${summary.link || NONE}`,
      ].join('\n');
    }

    const positions = await this.formatPositions(order);
    return [
      `📦 ${summary.status}`,
      `ID заказа: ${summary.display_name}`,
      '',
      `👤 Получатель: ${or(summary.recipient)}`,
      `📞 Номер телефона: ${or(summary.phone)}`,
      `📧 Email: ${or(summary.email)}`,
      `Способ доставки: ${or(summary.delivery_method)}`,
      '',
      `🏠 Адрес доставки: ${or(summary.address)}`,
      `Ссылка на доставку: ${deliveryLink}`,
      `Трек-номер: ${trackNumber}`,
      '',
      'Состав заказа:',
      positions,
      '',
      `Сумма заказа: ${formatMoney(summary.total)} руб.`,
      '',
      `Комментарий: ${summary.comment || NONE}`,
      `Создан: ${summary.moment_display}`,
      `Ссылка: ${summary.link || NONE}`,
    ].join('\n');
  }
}
