import { ConfigError, UpstreamError } from '../errors.js';
import { MoySkladClient, formatErpDatetime, parseUtcOffset } from '../services/moysklad.js';
import { fakeFetch, jsonResponse, noSleep, silentLogger, type FetchCall } from './helpers.js';

const BASE_URL = 'https://erp.example/api/remap/1.2';

function client(handler: (call: FetchCall) => Response | Promise<Response>, auth: { token?: string; basicToken?: string } = { token: 'test-token' }) {
  const fetch = fakeFetch(handler);
  const erp = new MoySkladClient({
    baseUrl: BASE_URL,
    ...auth,
    timeoutMs: 1000,
    utcOffsetMinutes: 180,
    logger: silentLogger(),
    fetchImpl: fetch.fn,
    retry: noSleep,
  });
  return { erp, calls: fetch.calls };
}

describe('formatErpDatetime / parseUtcOffset', () => {
  test('formats at the given offset', () => {
    const d = new Date('2024-04-26T22:05:09.000Z');
    expect(formatErpDatetime(d)).toBe('2024-04-26 22:05:09');
    expect(formatErpDatetime(d, 180)).toBe('2024-04-27 01:05:09');
  });

  test('parses offsets', () => {
    expect(parseUtcOffset('+03:00')).toBe(180);
    expect(parseUtcOffset('-0530')).toBe(-330);
    expect(parseUtcOffset('Z')).toBe(0);
    expect(() => parseUtcOffset('Moscow')).toThrow(ConfigError);
  });
});

describe('MoySkladClient', () => {
  test('bearer token auth', async () => {
    const { erp, calls } = client(() => jsonResponse({ id: 'abc' }));
    await expect(erp.fetchOrder('https://erp/entity/customerorder/abc')).resolves.toEqual({ id: 'abc' });
    expect(calls[0]?.headers.get('authorization')).toBe('Bearer test-token');
    expect(calls[0]?.method).toBe('GET');
  });

  test('basic credentials win over the token', async () => {
    const { erp, calls } = client(() => jsonResponse({}), { token: 'test-token', basicToken: 'dGVzdDp0ZXN0' });
    await erp.fetchEntity('https://erp/entity/state/1');
    expect(calls[0]?.headers.get('authorization')).toBe('Basic dGVzdDp0ZXN0');
  });

  test('no credentials is a configuration error and nothing is sent', async () => {
    const { erp, calls } = client(() => jsonResponse({}), {});
    await expect(erp.fetchOrder('https://erp/entity/customerorder/abc')).rejects.toBeInstanceOf(ConfigError);
    expect(calls).toHaveLength(0);
  });

  test('client errors are not retried', async () => {
    const { erp, calls } = client(() => new Response('nope', { status: 404, statusText: 'Not Found' }));
    const err: unknown = await erp.fetchOrder('https://erp/x').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UpstreamError);
    expect(err).toMatchObject({ service: 'erp', status: 404, message: 'MoySklad 404 Not Found - nope' });
    expect(calls).toHaveLength(1);
  });

  test('server errors are retried', async () => {
    let n = 0;
    const { erp, calls } = client(() => (++n === 1 ? new Response('busy', { status: 503 }) : jsonResponse({ id: 'abc' })));
    await expect(erp.fetchOrder('https://erp/x')).resolves.toEqual({ id: 'abc' });
    expect(calls).toHaveLength(2);
  });

  test('recent orders are paged until a short page', async () => {
    const pages = [[{ id: 'a' }, { id: 'b' }], [{ id: 'c' }, { id: 'd' }], []];
    const { erp, calls } = client((call) => {
      const offset = Number(new URL(call.url).searchParams.get('offset'));
      return jsonResponse({ rows: pages[offset / 2] ?? [] });
    });

    const orders = await erp.fetchRecentOrders({ lookbackDays: 7, limit: 2, now: new Date('2024-05-03T12:00:00.000Z') });

    expect(orders).toEqual([{ id: 'a' }, { id: 'b' }, { id: 'c' }, { id: 'd' }]);
    expect(calls).toHaveLength(3);
    const first = new URL(calls[0]?.url ?? '');
    expect(first.origin + first.pathname).toBe(`${BASE_URL}/entity/customerorder`);
    expect(Object.fromEntries(first.searchParams)).toEqual({
      limit: '2',
      offset: '0',
      expand: 'state',
      filter: 'moment>=2024-04-26 15:00:00',
    });
    expect(new URL(calls[2]?.url ?? '').searchParams.get('offset')).toBe('4');
  });

  test('a page limit below 1 is refused before any request', async () => {
    const { erp, calls } = client(() => jsonResponse({ rows: [] }));
    await expect(erp.fetchRecentOrders({ lookbackDays: 7, limit: 0 })).rejects.toBeInstanceOf(RangeError);
    expect(calls).toHaveLength(0);
  });

  test('positions come back as the list rows', async () => {
    const { erp } = client(() => jsonResponse({ meta: {}, rows: [{ quantity: 1 }] }));
    await expect(erp.fetchPositions('https://erp/positions')).resolves.toEqual([{ quantity: 1 }]);
  });
});
