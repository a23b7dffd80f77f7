// src/config.ts
import { parseUtcOffset } from './services/moysklad.js';

export const envSchema = {
  type: 'object',
  required: ['PORT'],
  properties: {
    PORT: { type: 'number', default: 3000 },
    HOST: { type: 'string', default: '0.0.0.0' },
    LOG_LEVEL: { type: 'string', default: 'info' },
    MS_BASE_URL: { type: 'string', default: 'https://api.moysklad.ru/api/remap/1.2' },
    MS_APP_URL: { type: 'string', default: 'https://online.moysklad.ru/app/#customerorder/edit?id=' },
    MS_TOKEN: { type: 'string' },
    MS_BASIC_TOKEN: { type: 'string' },
    MS_TIMEZONE_OFFSET: { type: 'string', default: '+03:00' },
    TG_BOT_TOKEN: { type: 'string' },
    TG_CHAT_ID: { type: 'string' },
    TG_API_URL: { type: 'string', default: 'https://api.telegram.org' },
    CACHE_PATH: { type: 'string', default: '/tmp/orders_cache.json' },
    CACHE_TTL_SECONDS: { type: 'number', default: 300 },
    REFRESH_INTERVAL_SECONDS: { type: 'number', default: 60 },
    LOOKBACK_DAYS: { type: 'number', default: 7 },
    PAGE_LIMIT: { type: 'integer', minimum: 1, maximum: 1000, default: 100 },
    HTTP_TIMEOUT_MS: { type: 'number', default: 10000 },
    ENTITY_CACHE_MAX: { type: 'number', default: 1000 },
    SUBSCRIBER_CAPACITY: { type: 'number', default: 10 },
    WEBHOOK_MODE: { type: 'string', enum: ['async', 'sync'], default: 'async' },
  },
} as const;

/** Shape of `app.config` once @fastify/env has validated the environment. */
export type EnvConfig = {
  PORT: number;
  HOST: string;
  LOG_LEVEL: string;
  MS_BASE_URL: string;
  MS_APP_URL: string;
  MS_TOKEN?: string;
  MS_BASIC_TOKEN?: string;
  MS_TIMEZONE_OFFSET: string;
  TG_BOT_TOKEN?: string;
  TG_CHAT_ID?: string;
  TG_API_URL: string;
  CACHE_PATH: string;
  CACHE_TTL_SECONDS: number;
  REFRESH_INTERVAL_SECONDS: number;
  LOOKBACK_DAYS: number;
  PAGE_LIMIT: number;
  HTTP_TIMEOUT_MS: number;
  ENTITY_CACHE_MAX: number;
  SUBSCRIBER_CAPACITY: number;
  WEBHOOK_MODE: 'async' | 'sync';
};

declare module 'fastify' {
  interface FastifyInstance {
    config: EnvConfig;
  }
}

export type AppConfig = {
  erp: {
    baseUrl: string;
    appUrl: string;
    token?: string;
    basicToken?: string;
    utcOffsetMinutes: number;
    lookbackDays: number;
    pageLimit: number;
    entityCacheMax: number;
  };
  telegram: {
    botToken?: string;
    chatId?: string;
    apiUrl: string;
  };
  cache: {
    path: string;
    ttlSeconds: number;
    refreshIntervalMs: number;
  };
  httpTimeoutMs: number;
  subscriberCapacity: number;
  webhookMode: 'async' | 'sync';
};

const blankToUndefined = (v: string | undefined) => (v && v.trim() ? v.trim() : undefined);

export function toAppConfig(env: EnvConfig): AppConfig {
  return {
    erp: {
      baseUrl: env.MS_BASE_URL,
      appUrl: env.MS_APP_URL,
      token: blankToUndefined(env.MS_TOKEN),
      basicToken: blankToUndefined(env.MS_BASIC_TOKEN),
      utcOffsetMinutes: parseUtcOffset(env.MS_TIMEZONE_OFFSET),
      lookbackDays: env.LOOKBACK_DAYS,
      pageLimit: env.PAGE_LIMIT,
      entityCacheMax: env.ENTITY_CACHE_MAX,
    },
    telegram: {
      botToken: blankToUndefined(env.TG_BOT_TOKEN),
      chatId: blankToUndefined(env.TG_CHAT_ID),
      apiUrl: env.TG_API_URL,
    },
    cache: {
      path: env.CACHE_PATH,
      ttlSeconds: env.CACHE_TTL_SECONDS,
      refreshIntervalMs: env.REFRESH_INTERVAL_SECONDS * 1000,
    },
    httpTimeoutMs: env.HTTP_TIMEOUT_MS,
    subscriberCapacity: env.SUBSCRIBER_CAPACITY,
    webhookMode: env.WEBHOOK_MODE,
  };
}
