import { afterEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { ApiRequestError } from '../errors';
import { RequestExecutor, computeBackoffWithJitter } from '../requestExecutor';
import type { HttpRateLimiter, HttpTransport, RequestExecutorConfig } from '../types';

const widgetSchema = z.object({ id: z.number() });

const widgetRequest = {
  url: 'https://api.test/widgets/1',
  task: 'widget lookup',
  schema: widgetSchema,
};

const jsonResponse = (data: unknown, init?: ResponseInit) =>
  new Response(JSON.stringify(data), { status: 200, ...init });

class BrokenBodyResponse extends Response {
  override text(): Promise<string> {
    return Promise.reject(new Error('socket hang up'));
  }
}

async function captureError(promise: Promise<unknown>): Promise<ApiRequestError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof ApiRequestError) {
      return err;
    }
    throw err;
  }
  throw new Error('expected the request to fail');
}

function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function createExecutor(
  transport: HttpTransport,
  overrides: Partial<RequestExecutorConfig> = {},
) {
  const logger = createLogger();
  const executor = new RequestExecutor({
    clientName: 'TestClient',
    transport,
    logger,
    baseRetryDelayMs: 0,
    timeoutMs: 0,
    ...overrides,
  });
  return { executor, logger };
}

describe('RequestExecutor', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('sends a GET with a JSON accept header and returns the decoded body', async () => {
    const transport = vi.fn<HttpTransport>().mockResolvedValue(jsonResponse({ id: 1, extra: true }));
    const { executor } = createExecutor(transport);

    await expect(executor.execute(widgetRequest)).resolves.toEqual({ id: 1 });
    expect(transport).toHaveBeenCalledWith('https://api.test/widgets/1', {
      method: 'GET',
      headers: { Accept: 'application/json' },
    });
  });

  it('keeps retrying through every transient failure kind until a valid payload arrives', async () => {
    const transport = vi
      .fn<HttpTransport>()
      .mockRejectedValueOnce(new Error('ECONNRESET'))
      .mockResolvedValueOnce(new Response('busy', { status: 503 }))
      .mockResolvedValueOnce(new BrokenBodyResponse('ignored'))
      .mockResolvedValueOnce(new Response('{"id": "seven"}'))
      .mockResolvedValueOnce(new Response('{"id": 7'))
      .mockResolvedValueOnce(jsonResponse({ id: 7 }));
    const { executor, logger } = createExecutor(transport);

    await expect(executor.execute(widgetRequest)).resolves.toEqual({ id: 7 });

    expect(transport).toHaveBeenCalledTimes(6);
    expect(logger.warn.mock.calls.map(([, meta]) => meta.category)).toEqual([
      'transport',
      'upstream',
      'read',
      'decode',
      'decode',
    ]);
    expect(logger.warn.mock.calls.map(([, meta]) => meta.retry)).toEqual([1, 2, 3, 4, 5]);
  });

  it('logs each retry with the task label and retry count', async () => {
    const transport = vi
      .fn<HttpTransport>()
      .mockResolvedValueOnce(new Response('busy', { status: 503 }))
      .mockResolvedValueOnce(jsonResponse({ id: 2 }));
    const { executor, logger } = createExecutor(transport);

    await executor.execute(widgetRequest);

    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      'Retrying widget lookup after 0ms (retry 1): TestClient request failed with status 503',
      { task: 'widget lookup', retry: 1, category: 'upstream', status: 503 },
    );
  });

  it('retries client errors such as 404 until the upstream recovers', async () => {
    const transport = vi
      .fn<HttpTransport>()
      .mockResolvedValueOnce(new Response('not found', { status: 404 }))
      .mockResolvedValueOnce(new Response('bad request', { status: 400 }))
      .mockResolvedValueOnce(jsonResponse({ id: 9 }));
    const { executor, logger } = createExecutor(transport);

    await expect(executor.execute(widgetRequest)).resolves.toEqual({ id: 9 });
    expect(transport).toHaveBeenCalledTimes(3);
    expect(logger.warn).toHaveBeenCalledWith(
      'Retrying widget lookup after 0ms (retry 1): TestClient request failed with status 404',
      { task: 'widget lookup', retry: 1, category: 'upstream', status: 404 },
    );
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('rejects client errors on the first attempt with failFastOnClientErrors', async () => {
    const transport = vi
      .fn<HttpTransport>()
      .mockResolvedValue(new Response('not found', { status: 404 }));
    const { executor, logger } = createExecutor(transport, { failFastOnClientErrors: true });

    const error = await captureError(executor.execute(widgetRequest));

    expect(error.category).toBe('upstream');
    expect(error.status).toBe(404);
    expect(error.responseBody).toBe('not found');
    expect(error.permanent).toBe(true);
    expect(transport).toHaveBeenCalledTimes(1);
    expect(logger.warn).not.toHaveBeenCalled();
    expect(logger.error).toHaveBeenCalledWith(
      'Giving up on widget lookup: TestClient request failed with status 404',
      { task: 'widget lookup', attempts: 1, category: 'upstream', status: 404 },
    );
  });

  it('still retries 429 and 5xx with failFastOnClientErrors', async () => {
    const transport = vi
      .fn<HttpTransport>()
      .mockResolvedValueOnce(new Response('slow down', { status: 429 }))
      .mockResolvedValueOnce(new Response('busy', { status: 503 }))
      .mockResolvedValueOnce(jsonResponse({ id: 10 }));
    const { executor } = createExecutor(transport, { failFastOnClientErrors: true });

    await expect(executor.execute(widgetRequest)).resolves.toEqual({ id: 10 });
    expect(transport).toHaveBeenCalledTimes(3);
  });

  it('treats 429 as transient and reads Retry-After', async () => {
    const transport = vi
      .fn<HttpTransport>()
      .mockResolvedValueOnce(
        new Response('slow down', { status: 429, headers: { 'Retry-After': '0' } }),
      )
      .mockResolvedValueOnce(jsonResponse({ id: 3 }));
    const { executor } = createExecutor(transport);

    await expect(executor.execute(widgetRequest)).resolves.toEqual({ id: 3 });
    expect(transport).toHaveBeenCalledTimes(2);
  });

  it('gives up after maxRetries when configured', async () => {
    const transport = vi
      .fn<HttpTransport>()
      .mockImplementation(async () => new Response('down', { status: 503 }));
    const { executor } = createExecutor(transport, { maxRetries: 2 });

    const error = await captureError(executor.execute(widgetRequest));

    expect(error.status).toBe(503);
    expect(error.permanent).toBe(false);
    expect(transport).toHaveBeenCalledTimes(3);
  });

  it('applies the request sanitizer to the raw body before decoding', async () => {
    const transport = vi
      .fn<HttpTransport>()
      .mockResolvedValue(new Response('{"id": 4, "owner": "\\uZZZZ"}'));
    const sanitize = vi.fn((_body: string) => '{"id": 4}');
    const { executor } = createExecutor(transport);

    await expect(executor.execute({ ...widgetRequest, sanitize })).resolves.toEqual({ id: 4 });
    expect(sanitize).toHaveBeenCalledWith('{"id": 4, "owner": "\\uZZZZ"}');
  });

  it('aborts attempts that exceed the per-attempt timeout', async () => {
    const transport = vi
      .fn<HttpTransport>()
      .mockImplementationOnce(
        (_url, init) =>
          new Promise<Response>((_resolve, reject) => {
            init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          }),
      )
      .mockResolvedValueOnce(jsonResponse({ id: 5 }));
    const { executor, logger } = createExecutor(transport, { timeoutMs: 20 });

    await expect(executor.execute(widgetRequest)).resolves.toEqual({ id: 5 });
    expect(logger.warn).toHaveBeenCalledWith(
      'Retrying widget lookup after 0ms (retry 1): TestClient request failed: timed out after 20ms',
      { task: 'widget lookup', retry: 1, category: 'transport', status: 0 },
    );
  });

  it('throttles every attempt and reports outcomes to the rate limiter and metrics', async () => {
    const transport = vi
      .fn<HttpTransport>()
      .mockResolvedValueOnce(new Response('busy', { status: 502 }))
      .mockResolvedValueOnce(jsonResponse({ id: 6 }));
    const rateLimiter = {
      throttle: vi.fn<HttpRateLimiter['throttle']>().mockResolvedValue(undefined),
      onSuccess: vi.fn(),
      onError: vi.fn(),
    };
    const metrics = { recordRequest: vi.fn() };
    const { executor } = createExecutor(transport, { rateLimiter, metrics });

    await executor.execute(widgetRequest);

    expect(rateLimiter.throttle).toHaveBeenCalledTimes(2);
    expect(rateLimiter.throttle).toHaveBeenCalledWith('TestClient');
    expect(rateLimiter.onError).toHaveBeenCalledWith('TestClient', expect.any(ApiRequestError));
    expect(rateLimiter.onSuccess).toHaveBeenCalledWith('TestClient');
    expect(metrics.recordRequest.mock.calls.map(([info]) => [info.status, info.attempt])).toEqual([
      [502, 0],
      [200, 1],
    ]);
    expect(metrics.recordRequest).toHaveBeenCalledWith(
      expect.objectContaining({ client: 'TestClient', operation: 'widget lookup' }),
    );
  });

  it('propagates errors that do not come from the request itself', async () => {
    const transport = vi.fn<HttpTransport>();
    const rateLimiter: HttpRateLimiter = {
      throttle: vi.fn<HttpRateLimiter['throttle']>().mockRejectedValue(new Error('limiter offline')),
    };
    const { executor } = createExecutor(transport, { rateLimiter });

    await expect(executor.execute(widgetRequest)).rejects.toThrow('limiter offline');
    expect(transport).not.toHaveBeenCalled();
  });
});

describe('computeBackoffWithJitter', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('doubles the base delay per attempt and adds jitter', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.5);
    expect(computeBackoffWithJitter(100, 2, 30_000)).toBe(450);
  });

  it('caps the delay', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.5);
    expect(computeBackoffWithJitter(100, 10, 300)).toBe(300);
  });

  it('is zero without a base delay', () => {
    expect(computeBackoffWithJitter(0, 5000, 30_000)).toBe(0);
  });
});
