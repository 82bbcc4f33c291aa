import type { FailureCategory } from './types';

export class ApiRequestError extends Error {
  constructor(
    message: string,
    public readonly category: FailureCategory,
    public readonly status: number,
    public readonly responseBody?: string,
    public readonly retryAfterMs?: number,
  ) {
    super(message);
    this.name = 'ApiRequestError';
  }

  /**
   * A 4xx other than 408 and 429, which a retry will not change. Only acted on
   * when the executor runs with `failFastOnClientErrors`.
   */
  get permanent(): boolean {
    return this.category === 'upstream' && isClientErrorStatus(this.status);
  }
}

function isClientErrorStatus(status: number): boolean {
  if (status === 408 || status === 429) {
    return false;
  }
  return status >= 400 && status < 500;
}

export function parseRetryAfter(res: Response): number | undefined {
  const header = res.headers.get('retry-after');
  if (!header) {
    return undefined;
  }

  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return seconds * 1000;
  }

  const date = Date.parse(header);
  if (!Number.isNaN(date)) {
    const diff = date - Date.now();
    return diff > 0 ? diff : 0;
  }

  return undefined;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
