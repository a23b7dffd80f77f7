// src/errors.ts

/** A credential or setting the operation needs is missing. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** An upstream service (ERP or bot API) answered with a non-2xx status. */
export class UpstreamError extends Error {
  constructor(
    readonly service: 'erp' | 'telegram',
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = 'UpstreamError';
  }

  get retryable(): boolean {
    return this.status >= 500 || this.status === 429;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
