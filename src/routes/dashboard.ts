// src/routes/dashboard.ts
import type { FastifyPluginAsync } from 'fastify';
import type { Services } from '../app.js';
import { buildEventPayload } from '../services/events.js';
import type { EventPayload } from '../types.js';
import { renderDashboard } from '../views/dashboard.js';

export const registerDashboardRoutes: FastifyPluginAsync<{ services: Services }> = async (app, { services }) => {
  const { store, orchestrator } = services;

  async function currentPayload(): Promise<EventPayload | null> {
    const snapshot = await store.load();
    if (!snapshot) return null;
    const now = new Date();
    return buildEventPayload(snapshot, store.isStale(snapshot, now), now);
  }

  app.get('/', async (_req, reply) => {
    const payload = await currentPayload();
    return reply.type('text/html; charset=utf-8').send(renderDashboard({ payload }));
  });

  app.get('/api/snapshot', async (_req, reply) => {
    const payload = await currentPayload();
    if (!payload) return reply.code(503).send({ status: 'loading' });
    return payload;
  });

  app.post('/refresh', async (req, reply) => {
    const outcome = await orchestrator.refresh('manual');
    const now = new Date();
    const payload = outcome.snapshot ? buildEventPayload(outcome.snapshot, store.isStale(outcome.snapshot, now), now) : null;

    if (outcome.status === 'failed') {
      req.log.warn({ error: outcome.error }, 'Manual refresh failed');
      return reply.code(502).send({
        status: 'error',
        outcome: outcome.status,
        updated_at: outcome.snapshot?.updated_at ?? null,
        error: outcome.error,
        payload,
      });
    }
    return {
      status: 'ok',
      outcome: outcome.status,
      updated_at: outcome.snapshot?.updated_at ?? null,
      payload,
    };
  });
};
