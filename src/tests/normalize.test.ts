import { EntityCache, NOT_SPECIFIED, NOT_SPECIFIED_F, OrderNormalizer, deliveryMethod, parseMoment } from '../services/normalize.js';
import { parseErpOrder, type ErpOrder } from '../types.js';
import { silentLogger } from './helpers.js';

const APP_URL = 'https://erp.example/app#customerorder/edit?id=';

function order(raw: unknown): ErpOrder {
  const parsed = parseErpOrder(raw);
  if (!parsed) throw new Error('fixture is not an order');
  return parsed;
}

function setup(entities: Record<string, unknown> = {}) {
  const load = jest.fn(async (href: string) => {
    if (href in entities) return entities[href];
    throw new Error(`404 ${href}`);
  });
  const logger = silentLogger();
  const normalizer = new OrderNormalizer({
    entities: new EntityCache(load),
    logger,
    appUrl: APP_URL,
    utcOffsetMinutes: 180,
  });
  return { load, logger, normalizer };
}

describe('parseMoment', () => {
  test('reads zone-less ERP timestamps at the configured offset', () => {
    expect(parseMoment('2024-05-01 10:00:00.000', 180)).toEqual({
      ms: Date.parse('2024-05-01T07:00:00Z'),
      display: '2024-05-01 10:00:00',
    });
  });

  test('fills in missing seconds', () => {
    expect(parseMoment('2024-05-01 10:00', 0)).toEqual({
      ms: Date.parse('2024-05-01T10:00:00Z'),
      display: '2024-05-01 10:00:00',
    });
  });

  test('zoned timestamps are displayed in UTC', () => {
    expect(parseMoment('2024-05-01T10:00:00+03:00', 180)).toEqual({
      ms: Date.parse('2024-05-01T07:00:00Z'),
      display: '2024-05-01 07:00:00',
    });
  });

  test('missing and unparseable values', () => {
    expect(parseMoment(undefined, 180)).toEqual({ ms: null, display: NOT_SPECIFIED_F });
    expect(parseMoment('soon', 180)).toEqual({ ms: null, display: 'soon' });
  });
});

describe('EntityCache', () => {
  test('concurrent lookups of one href share a request', async () => {
    const load = jest.fn(async (href: string) => ({ href }));
    const cache = new EntityCache(load);
    const [a, b] = await Promise.all([cache.get('x'), cache.get('x')]);
    expect(a).toEqual({ href: 'x' });
    expect(b).toBe(a);
    expect(load).toHaveBeenCalledTimes(1);
  });

  test('failed lookups are forgotten', async () => {
    const load = jest.fn().mockRejectedValueOnce(new Error('boom')).mockResolvedValueOnce({ name: 'ok' });
    const cache = new EntityCache(load);
    await expect(cache.get('x')).rejects.toThrow('boom');
    await expect(cache.get('x')).resolves.toEqual({ name: 'ok' });
    expect(load).toHaveBeenCalledTimes(2);
  });

  test('oldest entries are evicted past the limit', async () => {
    const load = jest.fn(async (href: string) => href);
    const cache = new EntityCache(load, 2);
    await cache.get('a');
    await cache.get('b');
    await cache.get('c');
    expect(cache.size).toBe(2);
    await cache.get('b');
    expect(load).toHaveBeenCalledTimes(3);
    await cache.get('a');
    expect(load).toHaveBeenCalledTimes(4);
  });
});

describe('OrderNormalizer', () => {
  test('normalizes a minimal order', async () => {
    const { normalizer } = setup();
    const summary = await normalizer.normalize(order({ id: 'abc', name: '0001', state: { name: 'New' }, sum: 150000 }));
    expect(summary).toEqual({
      id: 'abc',
      display_name: '0001',
      status: 'New',
      moment: null,
      moment_display: NOT_SPECIFIED_F,
      moment_ms: null,
      total: 150000,
      recipient: null,
      phone: null,
      email: null,
      delivery_method: null,
      city: null,
      address: null,
      comment: null,
      link: `${APP_URL}abc`,
    });
  });

  test('state references are looked up once across orders', async () => {
    const stateHref = 'https://erp/entity/customerorder/metadata/states/s1';
    const { normalizer, load } = setup({ [stateHref]: { name: 'Оплачен' } });
    const raws = ['a', 'b'].map((id) => ({ id, name: id, state: { meta: { href: stateHref } } }));

    const summaries = await normalizer.normalizeMany(raws);
    expect(summaries.map((s) => s.status)).toEqual(['Оплачен', 'Оплачен']);
    expect(load).toHaveBeenCalledTimes(1);
  });

  test('a failed state lookup falls back to the placeholder', async () => {
    const { normalizer, logger } = setup();
    const warn = jest.spyOn(logger, 'warn');
    const summary = await normalizer.normalize(order({ id: 'a', state: { meta: { href: 'https://erp/state/missing' } } }));
    expect(summary.status).toBe(NOT_SPECIFIED);
    expect(summary.display_name).toBe('без номера');
    expect(warn).toHaveBeenCalledWith(
      { err: '404 https://erp/state/missing', href: 'https://erp/state/missing', what: 'state' },
      'Failed to resolve ERP reference'
    );
  });

  test('sum handling', async () => {
    const { normalizer, logger } = setup();
    const warn = jest.spyOn(logger, 'warn');
    expect(normalizer.total(order({ id: 'a', sum: 1234.6 }))).toBe(1235);
    expect(normalizer.total(order({ id: 'a', sum: '1500' }))).toBe(1500);
    expect(normalizer.total(order({ id: 'a' }))).toBeNull();
    expect(warn).not.toHaveBeenCalled();

    expect(normalizer.total(order({ id: 'a', sum: 'lots' }))).toBe(0);
    expect(normalizer.total(order({ id: 'a', sum: { value: 1 } }))).toBe(0);
    expect(warn).toHaveBeenCalledTimes(2);
  });

  test('customer details come from the order, then attributes, then the counterparty', async () => {
    const agentHref = 'https://erp/entity/counterparty/c1';
    const { normalizer, load } = setup({ [agentHref]: { name: 'Ivan', phone: '+70000000000', email: 'ivan@example.com' } });
    const raw = {
      id: 'a',
      name: '0042',
      state: { name: 'Новый' },
      moment: '2024-05-01 10:00:00.000',
      description: 'leave at the door',
      agent: { meta: { href: agentHref } },
      attributes: [
        { name: 'Способ доставки', value: 'Courier' },
        { name: 'Получатель', value: 'Anna' },
      ],
      shipmentAddressFull: { city: 'Moscow', address: 'Tverskaya 1' },
    };

    const plain = await normalizer.normalize(order(raw));
    expect(plain.recipient).toBe('Anna');
    expect(plain.phone).toBeNull();
    expect(load).not.toHaveBeenCalled();

    const resolved = await normalizer.normalize(order(raw), { resolveAgent: true });
    expect(resolved).toMatchObject({
      recipient: 'Anna',
      phone: '+70000000000',
      email: 'ivan@example.com',
      delivery_method: 'Courier',
      city: 'Moscow',
      address: 'Tverskaya 1',
      comment: 'leave at the door',
      moment_display: '2024-05-01 10:00:00',
      moment_ms: Date.parse('2024-05-01T07:00:00Z'),
    });
    expect(load).toHaveBeenCalledTimes(1);
  });

  test('link falls back to the API href when there is no id', async () => {
    const { normalizer } = setup();
    expect(normalizer.link(order({ meta: { href: 'https://erp/entity/customerorder/x' } }))).toBe(
      'https://erp/entity/customerorder/x'
    );
    expect(normalizer.link(order({}))).toBeNull();
  });

  test('normalizeMany skips records that are not orders', async () => {
    const { normalizer } = setup();
    const summaries = await normalizer.normalizeMany(['junk', null, { id: 'a', name: '1', state: { name: 'New' } }]);
    expect(summaries.map((s) => s.id)).toEqual(['a']);
  });
});

describe('deliveryMethod', () => {
  test('falls back to the shipment service name', () => {
    expect(deliveryMethod(order({ shipmentAddressFull: { deliveryService: { name: 'CDEK' } } }))).toBe('CDEK');
    expect(deliveryMethod(order({ shipmentAddressFull: { shipmentMethod: 'Pickup' } }))).toBe('Pickup');
    expect(deliveryMethod(order({}))).toBeUndefined();
  });
});
