// src/cache/stats.ts
import type { OrderSummary, SnapshotStats } from '../types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export const COURIER_KEYWORDS = ['сдек', 'сдэк', 'cdek', 'courier'] as const;
export const NEW_KEYWORDS = ['нов', 'принят', 'оплачен', 'обработ', 'new', 'accepted', 'paid', 'processing'] as const;

export type StatusClass = 'courier' | 'new' | 'other';

function containsAny(value: string, words: readonly string[]): boolean {
  const v = value.toLocaleLowerCase();
  return words.some((w) => v.includes(w));
}

/** Courier wins over "new": a paid order handed to the courier is no longer new. */
export function classifyStatus(status: string | null | undefined): StatusClass {
  const s = status ?? '';
  if (containsAny(s, COURIER_KEYWORDS)) return 'courier';
  if (containsAny(s, NEW_KEYWORDS)) return 'new';
  return 'other';
}

function utcDay(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

export function computeStats(orders: readonly OrderSummary[], now: Date, windowDays = 7): SnapshotStats {
  let newOrders = 0;
  let courierOrders = 0;
  for (const o of orders) {
    const cls = classifyStatus(o.status);
    if (cls === 'courier') courierOrders++;
    else if (cls === 'new') newOrders++;
  }

  // oldest bucket first, today last
  const todayStart = Date.parse(`${utcDay(now.getTime())}T00:00:00.000Z`);
  const days = Array.from({ length: windowDays }, (_, i) => ({
    day: utcDay(todayStart - (windowDays - 1 - i) * DAY_MS),
    count: 0,
    sum: 0,
  }));
  const byDay = new Map(days.map((d) => [d.day, d]));

  let count = 0;
  let sum = 0;
  for (const o of orders) {
    if (o.moment_ms === null) continue;
    const bucket = byDay.get(utcDay(o.moment_ms));
    if (!bucket) continue;
    bucket.count++;
    bucket.sum += o.total ?? 0;
    count++;
    sum += o.total ?? 0;
  }

  return {
    total_orders: orders.length,
    new_orders: newOrders,
    courier_orders: courierOrders,
    sales: { window_days: windowDays, count, sum, days },
  };
}
