// src/routes/events.ts
import type { Writable } from 'node:stream';
import type { FastifyPluginAsync } from 'fastify';
import type { Services } from '../app.js';
import { errorMessage } from '../errors.js';

export const HEARTBEAT_MS = 30_000;

function closed(out: Writable): boolean {
  return out.writableEnded || out.destroyed;
}

/** Resolves on 'drain', or on 'close' when the client goes away first. */
function drained(out: Writable): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      out.off('drain', done);
      out.off('close', done);
      resolve();
    };
    out.on('drain', done);
    out.on('close', done);
  });
}

/**
 * Writes one SSE frame per item. A full socket buffer pauses reading, so a
 * stalled client backs up its channel and broadcasts to it start dropping.
 */
export async function writeEvents(items: AsyncIterable<string>, out: Writable, first?: string): Promise<void> {
  if (first !== undefined && !closed(out) && !out.write(`data: ${first}\n\n`)) await drained(out);
  for await (const data of items) {
    if (closed(out)) break;
    if (!out.write(`data: ${data}\n\n`)) await drained(out);
  }
}

/** Server-sent events: the current snapshot on connect, then every broadcast. */
export const registerEventRoutes: FastifyPluginAsync<{ services: Services }> = async (app, { services }) => {
  const { registry, store } = services;

  app.get('/events', async (req, reply) => {
    const channel = registry.subscribe();
    const res = reply.raw;

    const heartbeat = setInterval(() => {
      if (!closed(res)) res.write(': heartbeat\n\n');
    }, HEARTBEAT_MS);
    heartbeat.unref();

    const cleanup = () => {
      clearInterval(heartbeat);
      registry.unsubscribe(channel);
    };
    // request 'close' fires as soon as the body is consumed; the response's marks the disconnect
    res.on('close', cleanup);

    reply.hijack();
    res.writeHead(200, {
      'Content-Type': 'text/event-stream; charset=utf-8',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
      'X-Accel-Buffering': 'no',
    });

    try {
      const current = await store.load();
      await writeEvents(channel, res, current ? registry.serialize(current) : undefined);
    } catch (err) {
      req.log.error({ err: errorMessage(err) }, 'SSE stream failed');
    } finally {
      cleanup();
      if (!closed(res)) res.end();
    }
  });
};
