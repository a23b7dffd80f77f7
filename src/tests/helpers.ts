// src/tests/helpers.ts
import Fastify, { type FastifyBaseLogger } from 'fastify';
import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { FetchFn } from '../services/moysklad.js';
import type { OrderSummary } from '../types.js';

/** A real pino logger at level silent; spy on its methods to assert on log lines. */
export function silentLogger(): FastifyBaseLogger {
  return Fastify({ logger: { level: 'silent' } }).log;
}

export async function tempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'order-relay-'));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export type FetchCall = { url: string; method: string; headers: Headers; body: string | null };

/** In-process stand-in for `fetch`; every call is recorded and answered by `handler`. */
export function fakeFetch(handler: (call: FetchCall) => Response | Promise<Response>) {
  const calls: FetchCall[] = [];
  const fn: FetchFn = async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url;
    const call: FetchCall = {
      url,
      method: init?.method ?? 'GET',
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? init.body : null,
    };
    calls.push(call);
    return handler(call);
  };
  return { fn, calls };
}

export const noSleep = { sleep: async () => {}, jitter: false };

export function makeSummary(overrides: Partial<OrderSummary> = {}): OrderSummary {
  return {
    id: 'o-1',
    display_name: '0001',
    status: 'New',
    moment: '2024-05-01 10:00:00.000',
    moment_display: '2024-05-01 10:00:00',
    moment_ms: Date.parse('2024-05-01T07:00:00Z'),
    total: 150000,
    recipient: null,
    phone: null,
    email: null,
    delivery_method: null,
    city: null,
    address: null,
    comment: null,
    link: null,
    ...overrides,
  };
}
