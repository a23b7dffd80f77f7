// src/routes/webhook.ts
import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import type { Services } from '../app.js';
import { ConfigError, errorMessage } from '../errors.js';
import { extractOrderHrefs } from '../services/webhook.js';

/** Path the ERP webhook subscriptions point at; the plural form is kept as an alias. */
export const WEBHOOK_PATHS = ['/webhook/moysklad', '/webhooks/moysklad'] as const;

export const registerWebhookRoutes: FastifyPluginAsync<{ services: Services }> = async (app, { services }) => {
  const { webhooks, config } = services;

  // Malformed bodies are still acknowledged, so the route parses JSON itself.
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'string' }, (_req, body, done) => {
    done(null, body);
  });

  async function handle(req: FastifyRequest, reply: FastifyReply) {
    let body: unknown = null;
    if (typeof req.body === 'string' && req.body.trim()) {
      try {
        body = JSON.parse(req.body);
      } catch (err) {
        req.log.warn({ err: errorMessage(err) }, 'Webhook body is not valid JSON');
      }
    }

    const hrefs = extractOrderHrefs(body);
    if (hrefs.length === 0) {
      req.log.info('Webhook without customer order events');
      return { status: 'ok', accepted: 0 };
    }

    if (config.webhookMode === 'async') {
      const accepted = webhooks.enqueue(hrefs);
      req.log.info({ accepted }, 'Webhook accepted');
      return { status: 'ok', accepted };
    }

    // sync: every event runs; the status reflects the worst failure in the batch
    let configError = false;
    const failed: string[] = [];
    for (const href of hrefs) {
      try {
        const order = await webhooks.fetchOrder(href);
        await webhooks.handleOrder(order, href);
      } catch (err) {
        failed.push(href);
        if (err instanceof ConfigError) {
          configError = true;
          req.log.error({ err: err.message, href }, 'ERP credentials are not configured');
        } else {
          req.log.error({ err: errorMessage(err), href }, 'Failed to fetch order details');
        }
      }
    }

    if (configError) {
      return reply.code(500).send({ error: 'ERP credentials are not configured', failed });
    }
    if (failed.length > 0) {
      return reply.code(502).send({ error: 'ERP request failed', failed, processed: hrefs.length - failed.length });
    }
    return { status: 'ok', accepted: hrefs.length };
  }

  for (const url of WEBHOOK_PATHS) app.post(url, handle);
};
