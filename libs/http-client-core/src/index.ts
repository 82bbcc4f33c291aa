export * from './types';
export { ApiRequestError } from './errors';
export { ConsoleLogger } from './logger';
export { NoopRateLimiter, SlidingWindowRateLimiter } from './rateLimiter';
export type { SlidingWindowRateLimiterOptions } from './rateLimiter';
export { RequestExecutor, computeBackoffWithJitter } from './requestExecutor';
