import type { ZodType, ZodTypeDef } from 'zod';

export interface HttpRateLimiter {
  throttle(key?: string): Promise<void>;
  onSuccess?(key?: string): void | Promise<void>;
  onError?(key: string | undefined, error: unknown): void | Promise<void>;
}

export interface Logger {
  debug?(message: string, meta?: Record<string, unknown>): void;
  info?(message: string, meta?: Record<string, unknown>): void;
  warn?(message: string, meta?: Record<string, unknown>): void;
  error?(message: string, meta?: Record<string, unknown>): void;
}

export interface MetricsSink {
  recordRequest?(info: {
    client: string;
    operation: string;
    durationMs: number;
    status: number;
    attempt: number;
  }): void | Promise<void>;
}

export interface HttpTransport {
  (url: string, init: RequestInit): Promise<Response>;
}

/**
 * Where in the request pipeline an attempt failed.
 *
 * - `transport`: the request never produced a response (connection error, timeout)
 * - `upstream`: the server answered with a non-success status
 * - `read`: the response body could not be consumed
 * - `decode`: the body did not match the expected shape
 */
export type FailureCategory = 'transport' | 'upstream' | 'read' | 'decode';

export type PayloadSanitizer = (body: string) => string;

/**
 * One logical request handed to the {@link RequestExecutor}.
 * The schema's output type is the decoded value; its input is the wire shape.
 */
export interface ExecuteRequest<T> {
  url: string;
  /** Human-readable label used in log lines and metrics. */
  task: string;
  schema: ZodType<T, ZodTypeDef, unknown>;
  sanitize?: PayloadSanitizer;
  headers?: Record<string, string>;
}

export interface RequestExecutorConfig {
  clientName: string;
  transport?: HttpTransport;
  rateLimiter?: HttpRateLimiter;
  logger?: Logger;
  metrics?: MetricsSink;
  /** Retries after the first attempt. Defaults to unbounded. */
  maxRetries?: number;
  baseRetryDelayMs?: number;
  maxRetryDelayMs?: number;
  /** Per-attempt timeout; 0 disables it. */
  timeoutMs?: number;
  /** Reject 4xx responses other than 408 and 429 instead of retrying them. Off by default. */
  failFastOnClientErrors?: boolean;
}
