import {
  createCachedFetch,
  fetchTrials,
  loadRegistryConfig,
  TtlCache,
  type RegistryConfig,
  type TrialTable,
  type TrialsFetcher,
} from "@trialscope/registry";

export const DEFAULT_CONDITION = "ALS";

let trials: { config: RegistryConfig; cachedFetch: TrialsFetcher } | null = null;

/**
 * Server-side only. One cache per server process, built from the environment
 * on first use.
 */
function getTrials() {
  if (!trials) {
    const config = loadRegistryConfig();
    const fetcher: TrialsFetcher = (condition, maxRecords) =>
      fetchTrials(condition, {
        maxRecords,
        pageSize: config.pageSize,
        delayMs: config.delayMs,
        baseUrl: config.baseUrl,
        timeoutMs: config.timeoutMs,
      });
    trials = {
      config,
      cachedFetch: createCachedFetch(fetcher, new TtlCache<TrialTable>({ ttlMs: config.cacheTtlMs })),
    };
  }
  return trials;
}

/** Trials for `condition`, served from the cache for an hour by default. */
export async function loadTrials(condition: string, maxRecords?: number): Promise<TrialTable> {
  const { config, cachedFetch } = getTrials();
  return cachedFetch(condition.trim(), maxRecords ?? config.maxStudies);
}

/** Drops the process-wide cache so the next call re-reads the environment. */
export function resetTrials(): void {
  trials = null;
}
