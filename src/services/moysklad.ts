// src/services/moysklad.ts
import type { FastifyBaseLogger } from 'fastify';
import { ConfigError, UpstreamError } from '../errors.js';
import { erpListSchema } from '../types.js';
import { withRetry, type RetryOptions } from './retry.js';

export type FetchFn = typeof fetch;

export interface MoySkladOptions {
  baseUrl: string;                 // e.g. https://api.moysklad.ru/api/remap/1.2
  token?: string;                  // bearer token
  basicToken?: string;             // base64 login:password, wins over token
  timeoutMs: number;
  utcOffsetMinutes: number;        // ERP wall-clock offset, used in list filters
  logger: FastifyBaseLogger;
  fetchImpl?: FetchFn;
  retry?: RetryOptions;
}

export interface RecentOrdersQuery {
  lookbackDays: number;
  limit: number;
  now?: Date;
}

/** The slice of the ERP client the rest of the service depends on. */
export interface ErpGateway {
  fetchOrder(href: string): Promise<unknown>;
  fetchEntity(href: string): Promise<unknown>;
  fetchPositions(href: string): Promise<unknown[]>;
  fetchRecentOrders(query: RecentOrdersQuery): Promise<unknown[]>;
}

function pad(n: number) { return n < 10 ? `0${n}` : String(n); }

/** 'YYYY-MM-DD HH:MM:SS' at the given UTC offset, the ERP filter format. */
export function formatErpDatetime(d: Date, utcOffsetMinutes = 0): string {
  const s = new Date(d.getTime() + utcOffsetMinutes * 60_000);
  return `${s.getUTCFullYear()}-${pad(s.getUTCMonth() + 1)}-${pad(s.getUTCDate())} ${pad(s.getUTCHours())}:${pad(s.getUTCMinutes())}:${pad(s.getUTCSeconds())}`;
}

/** Parses '+03:00' / '-0530' / 'Z' into minutes east of UTC. */
export function parseUtcOffset(value: string): number {
  const v = value.trim();
  if (!v || v.toUpperCase() === 'Z') return 0;
  const m = v.match(/^([+-])(\d{2}):?(\d{2})$/);
  if (!m) throw new ConfigError(`Invalid UTC offset: ${value}`);
  const minutes = Number(m[2]) * 60 + Number(m[3]);
  return m[1] === '-' ? -minutes : minutes;
}

export class MoySkladClient implements ErpGateway {
  private readonly fetchImpl: FetchFn;

  constructor(private readonly opts: MoySkladOptions) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  private headers(): Record<string, string> {
    const { basicToken, token } = this.opts;
    const auth = basicToken ? `Basic ${basicToken}` : token ? `Bearer ${token}` : null;
    if (!auth) {
      throw new ConfigError('Missing MS_TOKEN or MS_BASIC_TOKEN for MoySklad API access');
    }
    return {
      Authorization: auth,
      Accept: 'application/json;charset=utf-8',
      'Accept-Encoding': 'gzip',
    };
  }

  /** GET with auth, bounded wait and retries on transient failures. */
  async getJson(href: string): Promise<unknown> {
    const headers = this.headers();
    return withRetry(
      async () => {
        const res = await this.fetchImpl(href, {
          method: 'GET',
          headers,
          signal: AbortSignal.timeout(this.opts.timeoutMs),
        });
        if (!res.ok) {
          const text = await res.text().catch(() => '');
          throw new UpstreamError('erp', res.status, `MoySklad ${res.status} ${res.statusText} - ${text.slice(0, 300)}`);
        }
        const body: unknown = await res.json();
        return body;
      },
      {
        ...this.opts.retry,
        onRetry: (err, attempt) => {
          this.opts.logger.warn({ err: String(err), attempt, href }, 'MoySklad request failed; will retry');
        },
      }
    );
  }

  fetchOrder(href: string): Promise<unknown> {
    return this.getJson(href);
  }

  fetchEntity(href: string): Promise<unknown> {
    return this.getJson(href);
  }

  async fetchPositions(href: string): Promise<unknown[]> {
    return erpListSchema.parse(await this.getJson(href)).rows;
  }

  /** All customer orders with `moment` inside the lookback window, paged until a short page. */
  async fetchRecentOrders({ lookbackDays, limit, now = new Date() }: RecentOrdersQuery): Promise<unknown[]> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Page limit must be a positive integer, got ${limit}`);
    }
    const since = new Date(now.getTime() - lookbackDays * 24 * 60 * 60 * 1000);
    const filter = `moment>=${formatErpDatetime(since, this.opts.utcOffsetMinutes)}`;

    const orders: unknown[] = [];
    for (let offset = 0; ; offset += limit) {
      const url = new URL(`${this.opts.baseUrl.replace(/\/+$/, '')}/entity/customerorder`);
      url.searchParams.set('limit', String(limit));
      url.searchParams.set('offset', String(offset));
      url.searchParams.set('expand', 'state');
      url.searchParams.set('filter', filter);

      const { rows } = erpListSchema.parse(await this.getJson(url.toString()));
      orders.push(...rows);
      if (rows.length < limit) break;
    }
    this.opts.logger.debug({ count: orders.length, lookbackDays }, 'Fetched recent customer orders');
    return orders;
  }
}
