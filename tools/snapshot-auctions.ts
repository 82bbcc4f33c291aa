import { pathToFileURL } from 'node:url';
import {
  clusterConnectedRealms,
  createBattleNetClientFromEnv,
} from '@libs/battlenet-client';
import type { AuctionSnapshot, BattleNetClient, ConnectedRealmGroup } from '@libs/battlenet-client';

export type GroupSnapshotResult =
  | { group: ConnectedRealmGroup; ok: true; snapshot: AuctionSnapshot | undefined }
  | { group: ConnectedRealmGroup; ok: false; error: string };

/**
 * Fetches one snapshot per connected group through its first realm. A failing
 * group is reported alongside the others instead of aborting the run.
 */
export async function collectGroupSnapshots(
  client: Pick<BattleNetClient, 'getAuctionListings'>,
  groups: readonly ConnectedRealmGroup[],
  cutoff: number,
): Promise<GroupSnapshotResult[]> {
  const settled = await Promise.allSettled(
    groups.map((group) => client.getAuctionListings(group[0], cutoff)),
  );

  return settled.map((result, index): GroupSnapshotResult => {
    const group = groups[index];
    if (result.status === 'fulfilled') {
      return { group, ok: true, snapshot: result.value };
    }
    return { group, ok: false, error: describeError(result.reason) };
  });
}

export function describeSnapshot(snapshot: AuctionSnapshot | undefined): string {
  if (!snapshot) {
    return 'unchanged';
  }
  const quantity = snapshot.listings.reduce((sum, listing) => sum + listing.quantity, 0);
  return `${snapshot.listings.length} listings (${quantity} items) at ${snapshot.lastModified}`;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Usage: tsx tools/snapshot-auctions.ts [cutoff]
async function main() {
  const cutoff = Number(process.argv[2] ?? 0);
  if (!Number.isInteger(cutoff)) {
    throw new Error(`cutoff must be an integer, got ${process.argv[2]}`);
  }

  const client = createBattleNetClientFromEnv();
  const realms = await client.listRealms();
  const groups = clusterConnectedRealms(realms);
  console.log(`Found ${realms.length} realms in ${groups.length} connected groups`);

  const results = await collectGroupSnapshots(client, groups, cutoff);
  for (const result of results) {
    const label = result.group.join(',');
    if (result.ok) {
      console.log(`${label}: ${describeSnapshot(result.snapshot)}`);
    } else {
      console.error(`${label}: failed: ${result.error}`);
    }
  }

  if (results.some((result) => !result.ok)) {
    process.exitCode = 1;
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
