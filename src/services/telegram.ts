// src/services/telegram.ts
import type { FastifyBaseLogger } from 'fastify';
import { UpstreamError } from '../errors.js';
import type { FetchFn } from './moysklad.js';
import { withRetry, type RetryOptions } from './retry.js';

export const TELEGRAM_MAX_MESSAGE = 4096;

export interface TelegramOptions {
  botToken?: string;
  chatId?: string;
  apiUrl?: string;                 // defaults to https://api.telegram.org
  timeoutMs: number;
  logger: FastifyBaseLogger;
  fetchImpl?: FetchFn;
  retry?: RetryOptions;
}

/** Anything that can deliver a chat notification. */
export interface Notifier {
  sendMessage(text: string): Promise<boolean>;
}

export function truncateMessage(text: string, max = TELEGRAM_MAX_MESSAGE): string {
  if (text.length <= max) return text;
  return `${text.slice(0, max - 1)}…`;
}

export class TelegramClient implements Notifier {
  private readonly fetchImpl: FetchFn;

  constructor(private readonly opts: TelegramOptions) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  /** Resolves false (with a warning) when bot credentials are not configured. */
  async sendMessage(text: string): Promise<boolean> {
    const { botToken, chatId } = this.opts;
    if (!botToken || !chatId) {
      this.opts.logger.warn('Telegram env vars missing, skipping send');
      return false;
    }

    const url = `${this.opts.apiUrl || 'https://api.telegram.org'}/bot${botToken}/sendMessage`;
    await withRetry(
      async () => {
        const res = await this.fetchImpl(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ chat_id: chatId, text: truncateMessage(text) }),
          signal: AbortSignal.timeout(this.opts.timeoutMs),
        });
        if (!res.ok) {
          const body = await res.text().catch(() => '');
          throw new UpstreamError('telegram', res.status, `Telegram ${res.status} ${res.statusText} - ${body.slice(0, 300)}`);
        }
      },
      {
        ...this.opts.retry,
        onRetry: (err, attempt) => {
          this.opts.logger.warn({ err: String(err), attempt }, 'Telegram send failed; will retry');
        },
      }
    );
    return true;
  }
}
