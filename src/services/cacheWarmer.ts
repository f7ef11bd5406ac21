import type { Language } from "../data/enums.js";
import type { SnapshotStore } from "./snapshotStore.js";
import type { StatsClient } from "./statsClient.js";

export interface WarmCacheResult {
  warmed: Language[];
  failed: Language[];
  /** Expired snapshots removed from the store afterwards. */
  pruned: number;
}

/**
 * Downloads the reference data of every language in turn, then drops the snapshots that
 * have expired from the store.
 */
export async function warmLanguages(
  client: Pick<StatsClient, "initialize">,
  languages: readonly Language[],
  snapshotStore?: SnapshotStore
): Promise<WarmCacheResult> {
  const warmed: Language[] = [];
  const failed: Language[] = [];
  for (const language of languages) {
    if (await client.initialize(language)) warmed.push(language);
    else failed.push(language);
  }

  const pruned = snapshotStore ? await snapshotStore.pruneExpired() : 0;
  if (pruned > 0) {
    console.log(`[warm-cache] pruned ${pruned} expired snapshot(s)`);
  }
  return { warmed, failed, pruned };
}
