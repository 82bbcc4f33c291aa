import { z } from 'zod';
import type {
  HttpRateLimiter,
  HttpTransport,
  Logger,
  MetricsSink,
} from '@libs/http-client-core';

/**
 * Battle.net Client Types
 *
 * Wire schemas for the realm, item and auction endpoints, and the domain types
 * they decode into. Only the fields this client consumes are kept; everything
 * else in a payload is stripped on decode.
 */

// ============================================================================
// Core Client Configuration
// ============================================================================

export interface BattleNetClientConfig {
  apiKey: string;
  baseUrl?: string;
  locale?: string;
  /** Retries after the first attempt of each request. Defaults to unbounded. */
  maxRetries?: number;
  baseRetryDelayMs?: number;
  maxRetryDelayMs?: number;
  timeoutMs?: number;
  /** Reject a missing item (404) and other client errors instead of retrying. */
  failFastOnClientErrors?: boolean;
  rateLimiter?: HttpRateLimiter;
  logger?: Logger;
  metrics?: MetricsSink;
  transport?: HttpTransport;
}

// ============================================================================
// Realms
// ============================================================================

export const realmInfoSchema = z
  .object({
    name: z.string(),
    slug: z.string(),
    connected_realms: z.array(z.string()),
  })
  .transform(
    (realm): RealmInfo => ({
      name: realm.name,
      slug: realm.slug,
      connectedRealms: realm.connected_realms,
    }),
  );

export const realmStatusReplySchema = z.object({
  realms: z.array(realmInfoSchema),
});

export interface RealmInfo {
  readonly name: string;
  readonly slug: string;
  /** Slugs of every realm sharing this realm's auction house, itself included. */
  readonly connectedRealms: readonly string[];
}

/** Slugs sharing one auction house, deduplicated and sorted. */
export type ConnectedRealmGroup = readonly string[];

// ============================================================================
// Items
// ============================================================================

export const itemInfoSchema = z.object({
  id: z.number().int().nonnegative(),
  name: z.string(),
  icon: z.string(),
});

export type ItemInfo = Readonly<z.infer<typeof itemInfoSchema>>;

// ============================================================================
// Auctions
// ============================================================================

export const auctionDataPointerSchema = z.object({
  url: z.string().url(),
  lastModified: z.number().int(),
});

export type AuctionDataPointer = Readonly<z.infer<typeof auctionDataPointerSchema>>;

/** The auction status reply always carries exactly one file pointer. */
export const auctionDataReplySchema = z.object({
  files: z.array(auctionDataPointerSchema).nonempty(),
});

export const auctionListingSchema = z.object({
  item: z.number().int().nonnegative(),
  /** 0 when the listing has no buyout. */
  buyout: z.number().int().nonnegative(),
  quantity: z.number().int().positive(),
});

export type AuctionListing = Readonly<z.infer<typeof auctionListingSchema>>;

export const auctionListingsReplySchema = z.object({
  // Per-realm metadata only; carries no connected_realms.
  realms: z.array(z.record(z.string(), z.string())),
  auctions: z.array(auctionListingSchema),
});

export interface AuctionSnapshot {
  readonly lastModified: number;
  readonly listings: readonly AuctionListing[];
}
