/**
 * @libs/battlenet-client
 *
 * Battle.net World of Warcraft API Client Library
 *
 * Provides typed access to:
 * - Realm status and connected-realm groups
 * - Item metadata
 * - Auction house snapshots
 *
 * ## Usage
 *
 * ```typescript
 * import { clusterConnectedRealms, createBattleNetClientFromEnv } from '@libs/battlenet-client';
 *
 * // Create client (reads from env vars)
 * const client = createBattleNetClientFromEnv();
 *
 * // One auction house per connected-realm group
 * const groups = clusterConnectedRealms(await client.listRealms());
 *
 * // Listings, or undefined when nothing changed since the cutoff
 * const snapshot = await client.getAuctionListings(groups[0][0], lastSeen);
 * ```
 *
 * ## Environment Variables
 *
 * Required:
 * - `BATTLENET_API_KEY` - API key sent as the `apikey` query parameter
 *
 * Optional:
 * - `BATTLENET_BASE_URL` - Base URL (default: https://us.api.battle.net)
 * - `BATTLENET_LOCALE` - Locale query parameter (default: en_US)
 * - `BATTLENET_MAX_RETRIES` - Retry budget per request (default: unbounded)
 * - `BATTLENET_RETRY_DELAY_MS` - Base backoff delay (default: 500)
 * - `BATTLENET_MAX_RETRY_DELAY_MS` - Backoff ceiling (default: 30000)
 * - `BATTLENET_TIMEOUT_MS` - Per-attempt timeout (default: 30000)
 * - `BATTLENET_FAIL_FAST_ON_CLIENT_ERRORS` - Reject 404 and other client errors instead of retrying (default: false)
 * - `BATTLENET_RATE_LIMIT` - Requests allowed per window (default: 100)
 * - `BATTLENET_RATE_WINDOW_MS` - Rate limit window (default: 1000)
 */

// ============================================================================
// Primary API - Client and Factory
// ============================================================================

export { BattleNetClient, createBattleNetClientFromEnv } from './battleNetClient';
export type { BattleNetClientEnvOverrides } from './battleNetClient';
export { clusterConnectedRealms } from './connectedRealms';
export { evaluateFreshness, isSnapshotUnchanged } from './freshness';
export type { FreshnessDecision } from './freshness';
export { sanitizeAuctionOwners, sanitizeStringField } from './sanitize';

// ============================================================================
// Type Exports
// ============================================================================

export type {
  AuctionDataPointer,
  AuctionListing,
  AuctionSnapshot,
  BattleNetClientConfig,
  ConnectedRealmGroup,
  ItemInfo,
  RealmInfo,
} from './types';

export {
  auctionDataReplySchema,
  auctionListingSchema,
  auctionListingsReplySchema,
  itemInfoSchema,
  realmInfoSchema,
  realmStatusReplySchema,
} from './types';

// ============================================================================
// Error Exports
// ============================================================================

export { ApiRequestError } from '@libs/http-client-core';
