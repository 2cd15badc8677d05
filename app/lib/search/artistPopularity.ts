/**
 * artistPopularity.ts
 *
 * Artist reach, measured as the catalog's follower count.
 *
 * Lookups are unbatched: one artist request per candidate that survives the
 * cheap filters. That is the dominant latency of a run, hence the optional
 * per-run cache and the pipeline's bounded fan-out.
 */

import type { CatalogClient } from "../spotify";
import type { PopularityLookup } from "./types";

export interface PopularityOracle {
  /** Follower count; transport errors propagate. */
  popularityOf(artistId: string): Promise<number>;
  /** Same lookup with failures returned as values. */
  lookupPopularity(artistId: string): Promise<PopularityLookup>;
}

export interface PopularityOracleOptions {
  /**
   * Memoize lookups by artist id for the lifetime of this oracle. Create one
   * oracle per run so counts stay fresh between runs.
   */
  cache?: boolean;
}

export function createPopularityOracle(
  catalog: Pick<CatalogClient, "getArtist">,
  options: PopularityOracleOptions = {},
): PopularityOracle {
  const cache = new Map<string, Promise<number>>();

  async function fetchPopularity(artistId: string): Promise<number> {
    const artist = await catalog.getArtist(artistId);
    return artist.followers.total;
  }

  function popularityOf(artistId: string): Promise<number> {
    if (!options.cache) return fetchPopularity(artistId);

    const cached = cache.get(artistId);
    if (cached) return cached;

    const pending = fetchPopularity(artistId);
    cache.set(artistId, pending);
    // Failed lookups are not remembered; a later candidate may retry.
    void pending.catch(() => cache.delete(artistId));
    return pending;
  }

  return {
    popularityOf,

    async lookupPopularity(artistId) {
      try {
        return { ok: true, popularity: await popularityOf(artistId) };
      } catch (error) {
        console.warn("[POPULARITY] Artist lookup failed", {
          artistId,
          error: error instanceof Error ? error.message : String(error),
        });
        return { ok: false, error };
      }
    },
  };
}
