export type FreshnessDecision = 'skip' | 'proceed';

/**
 * Decides whether an auction snapshot is worth downloading: only when the
 * upstream modification time has moved past the caller's cutoff.
 */
export function evaluateFreshness(lastModified: number, cutoff: number): FreshnessDecision {
  return lastModified <= cutoff ? 'skip' : 'proceed';
}

export function isSnapshotUnchanged(lastModified: number, cutoff: number): boolean {
  return evaluateFreshness(lastModified, cutoff) === 'skip';
}
