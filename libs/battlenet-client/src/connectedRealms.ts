import type { ConnectedRealmGroup, RealmInfo } from './types';

function compareSlugs(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

function canonicalGroup(realm: RealmInfo): string[] {
  const members = realm.connectedRealms.length > 0 ? realm.connectedRealms : [realm.slug];
  return [...new Set(members)].sort();
}

/**
 * Groups realms that share an auction house.
 *
 * Members of one group may list their connected realms in different orders, so
 * each list is compared as a set: it is deduplicated and sorted before grouping.
 * The result is ordered by each group's first slug.
 */
export function clusterConnectedRealms(realms: readonly RealmInfo[]): ConnectedRealmGroup[] {
  const groups = new Map<string, string[]>();

  for (const realm of realms) {
    const group = canonicalGroup(realm);
    const key = group.join('\u0000');
    if (!groups.has(key)) {
      groups.set(key, group);
    }
  }

  return [...groups.values()].sort((a, b) => compareSlugs(a[0], b[0]) || compareSlugs(a.join(','), b.join(',')));
}
