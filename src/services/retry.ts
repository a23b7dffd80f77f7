// src/services/retry.ts
import { UpstreamError } from '../errors.js';

export type RetryOptions = {
  attempts?: number;          // default 3
  baseMs?: number;            // default 500
  maxMs?: number;             // default 4000
  jitter?: boolean;           // default true
  shouldRetry?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number) => void;
  sleep?: (ms: number) => Promise<void>;
};

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/** Network failures, timeouts and 5xx/429 answers are worth another try; 4xx and config errors are not. */
export function isTransient(err: unknown): boolean {
  if (err instanceof UpstreamError) return err.retryable;
  if (err instanceof Error) {
    return err.name === 'TimeoutError' || err.name === 'AbortError' || err instanceof TypeError;
  }
  return false;
}

export async function withRetry<T>(fn: () => Promise<T>, opts?: RetryOptions): Promise<T> {
  const attempts = opts?.attempts ?? 3;
  const baseMs = opts?.baseMs ?? 500;
  const maxMs = opts?.maxMs ?? 4000;
  const jitter = opts?.jitter ?? true;
  const shouldRetry = opts?.shouldRetry ?? isTransient;
  const sleep = opts?.sleep ?? defaultSleep;

  let lastErr: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastErr = err;
      if (attempt === attempts || !shouldRetry(err)) break;
      opts?.onRetry?.(err, attempt);

      const backoff = Math.min(maxMs, baseMs * 2 ** (attempt - 1));
      await sleep(jitter ? Math.floor(backoff * (0.5 + Math.random() * 0.5)) : backoff);
    }
  }
  throw lastErr;
}
