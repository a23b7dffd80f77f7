// src/app.ts
import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import { CacheStore } from './cache/store.js';
import type { AppConfig } from './config.js';
import { registerDashboardRoutes } from './routes/dashboard.js';
import { registerEventRoutes } from './routes/events.js';
import { registerWebhookRoutes } from './routes/webhook.js';
import { SubscriberRegistry } from './services/events.js';
import { MessageBuilder } from './services/messages.js';
import { MoySkladClient, type FetchFn } from './services/moysklad.js';
import { EntityCache, OrderNormalizer } from './services/normalize.js';
import { RefreshOrchestrator, RefreshScheduler } from './services/refresh.js';
import type { RetryOptions } from './services/retry.js';
import { TelegramClient } from './services/telegram.js';
import { WebhookProcessor } from './services/webhook.js';

export interface Services {
  config: AppConfig;
  erp: MoySkladClient;
  store: CacheStore;
  registry: SubscriberRegistry;
  orchestrator: RefreshOrchestrator;
  scheduler: RefreshScheduler;
  webhooks: WebhookProcessor;
}

export interface ServiceOverrides {
  fetchImpl?: FetchFn;
  retry?: RetryOptions;
  now?: () => Date;
}

/** Wires every service once; each collaborator is handed in, nothing is module-global. */
export function createServices(config: AppConfig, logger: FastifyBaseLogger, overrides: ServiceOverrides = {}): Services {
  const { fetchImpl, retry, now } = overrides;

  const erp = new MoySkladClient({
    baseUrl: config.erp.baseUrl,
    token: config.erp.token,
    basicToken: config.erp.basicToken,
    timeoutMs: config.httpTimeoutMs,
    utcOffsetMinutes: config.erp.utcOffsetMinutes,
    logger: logger.child({ component: 'moysklad' }),
    fetchImpl,
    retry,
  });
  const telegram = new TelegramClient({
    botToken: config.telegram.botToken,
    chatId: config.telegram.chatId,
    apiUrl: config.telegram.apiUrl,
    timeoutMs: config.httpTimeoutMs,
    logger: logger.child({ component: 'telegram' }),
    fetchImpl,
    retry,
  });

  const store = new CacheStore({
    path: config.cache.path,
    ttlSeconds: config.cache.ttlSeconds,
    logger: logger.child({ component: 'cache' }),
    now,
  });
  const registry = new SubscriberRegistry({
    logger: logger.child({ component: 'events' }),
    isStale: (snapshot, at) => store.isStale(snapshot, at),
    capacity: config.subscriberCapacity,
    now,
  });

  const normalizer = new OrderNormalizer({
    entities: new EntityCache((href) => erp.fetchEntity(href), config.erp.entityCacheMax),
    logger: logger.child({ component: 'normalizer' }),
    appUrl: config.erp.appUrl,
    utcOffsetMinutes: config.erp.utcOffsetMinutes,
  });

  const orchestrator = new RefreshOrchestrator({
    erp,
    normalizer,
    store,
    publisher: registry,
    logger: logger.child({ component: 'refresh' }),
    lookbackDays: config.erp.lookbackDays,
    pageLimit: config.erp.pageLimit,
  });
  const scheduler = new RefreshScheduler({
    orchestrator,
    store,
    intervalMs: config.cache.refreshIntervalMs,
    logger: logger.child({ component: 'scheduler' }),
  });

  const webhooks = new WebhookProcessor({
    erp,
    normalizer,
    store,
    publisher: registry,
    messages: new MessageBuilder({ erp, normalizer, logger: logger.child({ component: 'messages' }) }),
    notifier: telegram,
    logger: logger.child({ component: 'webhook' }),
  });

  return { config, erp, store, registry, orchestrator, scheduler, webhooks };
}

export async function registerRoutes(app: FastifyInstance, services: Services): Promise<void> {
  app.get('/health', async () => ({ status: 'ok' }));

  await app.register(registerDashboardRoutes, { services });
  await app.register(registerEventRoutes, { services });
  await app.register(registerWebhookRoutes, { services });

  app.addHook('preClose', async () => {
    await services.scheduler.stop();
    services.registry.closeAll();
  });
  app.addHook('onClose', async () => {
    await services.webhooks.idle();
  });
}
