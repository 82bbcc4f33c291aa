import { setTimeout as sleep } from 'timers/promises';
import type { ZodError, ZodType, ZodTypeDef } from 'zod';
import { ApiRequestError, describeError, parseRetryAfter } from './errors';
import { ConsoleLogger } from './logger';
import { NoopRateLimiter } from './rateLimiter';
import type {
  ExecuteRequest,
  HttpRateLimiter,
  HttpTransport,
  Logger,
  MetricsSink,
  RequestExecutorConfig,
} from './types';

const DEFAULT_MAX_RETRIES = Number.POSITIVE_INFINITY;
const DEFAULT_BASE_RETRY_DELAY_MS = 500;
const DEFAULT_MAX_RETRY_DELAY_MS = 30_000;
const DEFAULT_TIMEOUT_MS = 30_000;
const MAX_REPORTED_ISSUES = 3;

/**
 * Fetches a URL and decodes the body against a zod schema, retrying failures
 * with exponential backoff.
 *
 * Every failure category and status is retried, so with the default
 * `maxRetries` a call only settles once the upstream returns a valid payload.
 * `failFastOnClientErrors` rejects 4xx responses other than 408 and 429 on the
 * first attempt instead.
 */
export class RequestExecutor {
  private readonly clientName: string;
  private readonly transport: HttpTransport;
  private readonly rateLimiter: HttpRateLimiter;
  private readonly logger: Logger;
  private readonly metrics?: MetricsSink;
  private readonly maxRetries: number;
  private readonly baseRetryDelayMs: number;
  private readonly maxRetryDelayMs: number;
  private readonly timeoutMs: number;
  private readonly failFastOnClientErrors: boolean;

  constructor(config: RequestExecutorConfig) {
    this.clientName = config.clientName;
    this.transport = config.transport ?? ((url, init) => fetch(url, init));
    this.rateLimiter = config.rateLimiter ?? new NoopRateLimiter();
    this.logger = config.logger ?? new ConsoleLogger(config.clientName);
    this.metrics = config.metrics;
    this.maxRetries = config.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.baseRetryDelayMs = config.baseRetryDelayMs ?? DEFAULT_BASE_RETRY_DELAY_MS;
    this.maxRetryDelayMs = config.maxRetryDelayMs ?? DEFAULT_MAX_RETRY_DELAY_MS;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.failFastOnClientErrors = config.failFastOnClientErrors ?? false;
  }

  async execute<T>(request: ExecuteRequest<T>): Promise<T> {
    for (let attempt = 0; ; attempt += 1) {
      await this.rateLimiter.throttle(this.clientName);

      const start = Date.now();
      try {
        const { value, status } = await this.attempt(request);
        await this.rateLimiter.onSuccess?.(this.clientName);
        await this.recordAttempt(request.task, start, status, attempt);
        this.logger.debug?.(`Fetched ${request.task}`, {
          task: request.task,
          attempts: attempt + 1,
          durationMs: Date.now() - start,
        });
        return value;
      } catch (err) {
        if (!(err instanceof ApiRequestError)) {
          throw err;
        }
        await this.handleFailure(request.task, err, start, attempt);

        if ((this.failFastOnClientErrors && err.permanent) || attempt >= this.maxRetries) {
          this.logger.error?.(`Giving up on ${request.task}: ${err.message}`, {
            task: request.task,
            attempts: attempt + 1,
            category: err.category,
            status: err.status,
          });
          throw err;
        }

        await this.waitForRetry(request.task, err, attempt);
      }
    }
  }

  private async attempt<T>(request: ExecuteRequest<T>): Promise<{ value: T; status: number }> {
    const response = await this.send(request);

    if (!response.ok) {
      throw new ApiRequestError(
        `${this.clientName} request failed with status ${response.status}`,
        'upstream',
        response.status,
        await safeReadBody(response),
        parseRetryAfter(response),
      );
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new ApiRequestError(
        `${this.clientName} could not read response body: ${describeError(error)}`,
        'read',
        response.status,
      );
    }

    const body = request.sanitize ? request.sanitize(text) : text;
    return { value: this.decode(request.schema, body, response.status), status: response.status };
  }

  private async send<T>(request: ExecuteRequest<T>): Promise<Response> {
    const init: RequestInit = {
      method: 'GET',
      headers: {
        Accept: 'application/json',
        ...request.headers,
      },
    };

    if (!this.timeoutMs) {
      try {
        return await this.transport(request.url, init);
      } catch (error) {
        throw new ApiRequestError(
          `${this.clientName} request failed: ${describeError(error)}`,
          'transport',
          0,
        );
      }
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      return await this.transport(request.url, { ...init, signal: controller.signal });
    } catch (error) {
      const reason = controller.signal.aborted
        ? `timed out after ${this.timeoutMs}ms`
        : describeError(error);
      throw new ApiRequestError(`${this.clientName} request failed: ${reason}`, 'transport', 0);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private decode<T>(schema: ZodType<T, ZodTypeDef, unknown>, body: string, status: number): T {
    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch (error) {
      throw new ApiRequestError(
        `${this.clientName} received invalid JSON: ${describeError(error)}`,
        'decode',
        status,
      );
    }

    const result = schema.safeParse(payload);
    if (!result.success) {
      throw new ApiRequestError(
        `${this.clientName} received an unexpected payload: ${formatIssues(result.error)}`,
        'decode',
        status,
      );
    }
    return result.data;
  }

  private async handleFailure(
    task: string,
    error: ApiRequestError,
    start: number,
    attempt: number,
  ): Promise<void> {
    await this.rateLimiter.onError?.(this.clientName, error);
    await this.recordAttempt(task, start, error.status, attempt);
  }

  private async recordAttempt(
    operation: string,
    start: number,
    status: number,
    attempt: number,
  ): Promise<void> {
    await this.metrics?.recordRequest?.({
      client: this.clientName,
      operation,
      durationMs: Date.now() - start,
      status,
      attempt,
    });
  }

  private async waitForRetry(task: string, error: ApiRequestError, attempt: number): Promise<void> {
    const delayMs = error.retryAfterMs && error.retryAfterMs > 0
      ? error.retryAfterMs
      : computeBackoffWithJitter(this.baseRetryDelayMs, attempt, this.maxRetryDelayMs);

    this.logger.warn?.(`Retrying ${task} after ${delayMs}ms (retry ${attempt + 1}): ${error.message}`, {
      task,
      retry: attempt + 1,
      category: error.category,
      status: error.status,
    });

    await sleep(delayMs);
  }
}

export function computeBackoffWithJitter(baseMs: number, attempt: number, maxMs: number): number {
  if (baseMs <= 0) {
    return 0;
  }
  const exp = baseMs * 2 ** attempt;
  const jitter = Math.random() * baseMs;
  return Math.min(maxMs, exp + jitter);
}

function formatIssues(error: ZodError): string {
  return error.issues
    .slice(0, MAX_REPORTED_ISSUES)
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

async function safeReadBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    return `Failed to read response body: ${error}`;
  }
}
