import {
  ConsoleLogger,
  RequestExecutor,
  SlidingWindowRateLimiter,
} from '@libs/http-client-core';
import type { Logger } from '@libs/http-client-core';
import { clusterConnectedRealms } from './connectedRealms';
import { evaluateFreshness } from './freshness';
import { sanitizeAuctionOwners } from './sanitize';
import {
  auctionDataReplySchema,
  auctionListingsReplySchema,
  itemInfoSchema,
  realmStatusReplySchema,
} from './types';
import type {
  AuctionSnapshot,
  BattleNetClientConfig,
  ConnectedRealmGroup,
  ItemInfo,
  RealmInfo,
} from './types';

const CLIENT_NAME = 'BattleNetClient';
const DEFAULT_BASE_URL = 'https://us.api.battle.net';
const DEFAULT_LOCALE = 'en_US';
const DEFAULT_RATE_LIMIT = 100;
const DEFAULT_RATE_WINDOW_MS = 1000;

/**
 * Battle.net World of Warcraft API Client
 *
 * Provides access to:
 * - Realm status (with connected-realm topology)
 * - Item metadata
 * - Auction house snapshots, skipped when unchanged since a cutoff
 *
 * Every request goes through one {@link RequestExecutor}, which throttles,
 * retries transient failures and decodes the body.
 */
export class BattleNetClient {
  private readonly baseUrl: string;
  private readonly locale: string;
  private readonly logger: Logger;
  private readonly executor: RequestExecutor;

  constructor(private readonly config: BattleNetClientConfig) {
    if (!config.apiKey) {
      throw new Error('BattleNetClient requires an apiKey');
    }
    this.baseUrl = config.baseUrl ?? DEFAULT_BASE_URL;
    this.locale = config.locale ?? DEFAULT_LOCALE;
    this.logger = config.logger ?? new ConsoleLogger(CLIENT_NAME);
    this.executor = new RequestExecutor({
      clientName: CLIENT_NAME,
      transport: config.transport,
      rateLimiter: config.rateLimiter,
      logger: this.logger,
      metrics: config.metrics,
      maxRetries: config.maxRetries,
      baseRetryDelayMs: config.baseRetryDelayMs,
      maxRetryDelayMs: config.maxRetryDelayMs,
      timeoutMs: config.timeoutMs,
      failFastOnClientErrors: config.failFastOnClientErrors,
    });
  }

  static clusterConnectedRealms(realms: readonly RealmInfo[]): ConnectedRealmGroup[] {
    return clusterConnectedRealms(realms);
  }

  // ==========================================================================
  // Realms & items
  // ==========================================================================

  async listRealms(): Promise<RealmInfo[]> {
    const reply = await this.executor.execute({
      url: this.buildUrl('/wow/realm/status'),
      task: 'realm status',
      schema: realmStatusReplySchema,
    });
    return reply.realms;
  }

  /**
   * A missing item is retried like any other failure unless the client runs with
   * `failFastOnClientErrors`, which rejects the 404 with an `ApiRequestError`.
   */
  async getItemInfo(id: number): Promise<ItemInfo> {
    if (!Number.isInteger(id) || id < 0) {
      throw new Error(`Invalid item id: ${id}`);
    }
    return this.executor.execute({
      url: this.buildUrl(`/wow/item/${id}`),
      task: `item info ${id}`,
      schema: itemInfoSchema,
    });
  }

  // ==========================================================================
  // Auctions
  // ==========================================================================

  /**
   * Downloads the auction listings for a realm, or resolves `undefined` when the
   * snapshot has not been modified since `cutoff`.
   *
   * The status call is cheap; the listings payload is only requested once the
   * status reports a newer modification time.
   */
  async getAuctionListings(realmSlug: string, cutoff: number): Promise<AuctionSnapshot | undefined> {
    const { files } = await this.executor.execute({
      url: this.buildUrl(`/wow/auction/data/${encodeURIComponent(realmSlug)}`),
      task: `auction data for ${realmSlug}`,
      schema: auctionDataReplySchema,
    });
    const [pointer] = files;

    if (evaluateFreshness(pointer.lastModified, cutoff) === 'skip') {
      this.logger.debug?.(`Auction data for ${realmSlug} unchanged since ${cutoff}`, {
        realm: realmSlug,
        lastModified: pointer.lastModified,
        cutoff,
      });
      return undefined;
    }

    const reply = await this.executor.execute({
      url: pointer.url,
      task: `auction listings for ${realmSlug}`,
      schema: auctionListingsReplySchema,
      sanitize: sanitizeAuctionOwners,
    });

    return { lastModified: pointer.lastModified, listings: reply.auctions };
  }

  private buildUrl(path: string): string {
    const url = new URL(path, this.baseUrl);
    url.searchParams.append('locale', this.locale);
    url.searchParams.append('apikey', this.config.apiKey);
    return url.toString();
  }
}

function parseOptionalNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function parseOptionalBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}

export interface BattleNetClientEnvOverrides extends Partial<Omit<BattleNetClientConfig, 'apiKey'>> {
  rateLimit?: number;
  rateWindowMs?: number;
}

/**
 * Creates a client from `BATTLENET_*` environment variables. Overrides win over
 * the environment. Without an explicit `rateLimiter` one sliding-window limiter
 * is created for the client.
 */
export function createBattleNetClientFromEnv(
  overrides: BattleNetClientEnvOverrides = {},
): BattleNetClient {
  const apiKey = process.env.BATTLENET_API_KEY;
  if (!apiKey) {
    throw new Error('BATTLENET_API_KEY environment variable is required');
  }

  const rateLimiter =
    overrides.rateLimiter ??
    new SlidingWindowRateLimiter({
      maxRequests:
        overrides.rateLimit ??
        parseOptionalNumber(process.env.BATTLENET_RATE_LIMIT) ??
        DEFAULT_RATE_LIMIT,
      windowMs:
        overrides.rateWindowMs ??
        parseOptionalNumber(process.env.BATTLENET_RATE_WINDOW_MS) ??
        DEFAULT_RATE_WINDOW_MS,
    });

  const config: BattleNetClientConfig = {
    apiKey,
    baseUrl: overrides.baseUrl ?? process.env.BATTLENET_BASE_URL ?? DEFAULT_BASE_URL,
    locale: overrides.locale ?? process.env.BATTLENET_LOCALE ?? DEFAULT_LOCALE,
    maxRetries: overrides.maxRetries ?? parseOptionalNumber(process.env.BATTLENET_MAX_RETRIES),
    baseRetryDelayMs:
      overrides.baseRetryDelayMs ?? parseOptionalNumber(process.env.BATTLENET_RETRY_DELAY_MS),
    maxRetryDelayMs:
      overrides.maxRetryDelayMs ?? parseOptionalNumber(process.env.BATTLENET_MAX_RETRY_DELAY_MS),
    timeoutMs: overrides.timeoutMs ?? parseOptionalNumber(process.env.BATTLENET_TIMEOUT_MS),
    failFastOnClientErrors:
      overrides.failFastOnClientErrors ??
      parseOptionalBoolean(process.env.BATTLENET_FAIL_FAST_ON_CLIENT_ERRORS),
    rateLimiter,
    logger: overrides.logger,
    metrics: overrides.metrics,
    transport: overrides.transport,
  };

  return new BattleNetClient(config);
}
