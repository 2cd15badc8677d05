/**
 * pipeline.ts
 *
 * Song-candidate resolution: search phrase in, ordered list of accepted songs
 * out.
 *
 * Flow:
 * 1. Page through catalog track search, 50 results at a time
 * 2. Per candidate: reject duplicate titles (case-insensitive), duplicate ids
 *    and alternate versions (remix, live, ...)
 * 3. Look up the primary artist's follower count; reject above the ceiling
 * 4. Stop as soon as targetCount songs are accepted, or search runs dry
 *
 * FAILURE POLICY:
 * A failed page fetch resolves the whole run to []. Partial output is never
 * returned for an aborted run. Popularity lookup failures do the same unless
 * onLookupFailure is "skip".
 *
 * FAN-OUT:
 * Lookups run in windows of consecutive eligible candidates, at most as many
 * as songs still needed, so a window never looks up a candidate the
 * sequential walk would not have reached. A window also ends before a
 * candidate whose title or id repeats one already in it, since that
 * candidate's fate depends on the earlier one. Results are applied in page
 * order. Once a lookup fails under the abort policy, no further lookup
 * starts.
 */

import pLimit from "p-limit";
import type { CatalogClient } from "../spotify";
import type { SpotifySearchResponse } from "../types";
import type { PopularityOracle } from "./artistPopularity";
import {
  isAlternateVersion,
  isWithinPopularityCeiling,
  normalizeTitle,
} from "./filters";
import { isUsablePhrase, type ExtractionFailure } from "./keywords";
import { normalizeTrack } from "./normalize";
import type {
  AcceptedSong,
  DebugInfo,
  PopularityLookup,
  RejectionCounts,
  ResolutionOutcome,
  ResolveOptions,
  SearchPhrase,
  TrackCandidate,
} from "./types";

export const SEARCH_PAGE_SIZE = 50;
export const MAX_PHRASE_LENGTH = 200;
// Spotify rejects offset + limit beyond 1000.
export const MAX_SEARCH_RESULTS = 1000;

export interface ResolverDeps {
  catalog: Pick<CatalogClient, "searchTracks">;
  popularity: Pick<PopularityOracle, "lookupPopularity">;
}

interface ResolutionRun {
  songs: AcceptedSong[];
  debugInfo: DebugInfo;
}

interface RunState {
  targetCount: number;
  popularityCeiling: number;
  accepted: Map<string, AcceptedSong>; // normalized title -> song, insertion-ordered
  seenIds: Set<string>;
  debugInfo: DebugInfo;
}

type StaticRejection = keyof Pick<
  RejectionCounts,
  "duplicateTitle" | "duplicateId" | "excludedKeyword"
>;

function emptyRejectionCounts(): RejectionCounts {
  return {
    duplicateTitle: 0,
    duplicateId: 0,
    excludedKeyword: 0,
    overCeiling: 0,
    lookupFailed: 0,
    malformed: 0,
  };
}

/**
 * Checks that need no network call, in the order they are applied.
 */
function staticRejection(
  candidate: TrackCandidate,
  titleKey: string,
  state: RunState,
): StaticRejection | null {
  if (state.accepted.has(titleKey)) return "duplicateTitle";
  if (state.seenIds.has(candidate.catalogId)) return "duplicateId";
  if (isAlternateVersion(candidate.title)) return "excludedKeyword";
  return null;
}

/**
 * Evaluates one page of candidates. Returns an error when a lookup failure
 * must abort the run.
 *
 * Under the abort policy, lookups still queued when one fails never start;
 * those already in flight finish but are not applied.
 */
async function evaluatePage(
  candidates: TrackCandidate[],
  state: RunState,
  deps: ResolverDeps,
  limit: ReturnType<typeof pLimit>,
  abortOnLookupFailure: boolean,
): Promise<{ aborted: false } | { aborted: true; error: unknown }> {
  const { debugInfo } = state;
  let index = 0;
  let failed = false;

  while (index < candidates.length && state.accepted.size < state.targetCount) {
    const remaining = state.targetCount - state.accepted.size;
    const window: Array<{ candidate: TrackCandidate; titleKey: string }> = [];
    const windowTitles = new Set<string>();
    const windowIds = new Set<string>();

    while (index < candidates.length && window.length < remaining) {
      const candidate = candidates[index];
      const titleKey = normalizeTitle(candidate.title);
      if (windowTitles.has(titleKey) || windowIds.has(candidate.catalogId)) {
        break;
      }
      index += 1;

      const rejection = staticRejection(candidate, titleKey, state);
      if (rejection) {
        debugInfo.rejected[rejection] += 1;
        continue;
      }

      window.push({ candidate, titleKey });
      windowTitles.add(titleKey);
      windowIds.add(candidate.catalogId);
    }

    if (window.length === 0) continue;

    const lookups = await Promise.all(
      window.map(({ candidate }) =>
        limit(async (): Promise<PopularityLookup | null> => {
          if (failed) return null;
          debugInfo.popularityLookups += 1;
          const lookup = await deps.popularity.lookupPopularity(
            candidate.primaryArtistId,
          );
          if (!lookup.ok && abortOnLookupFailure) failed = true;
          return lookup;
        }),
      ),
    );

    for (let i = 0; i < window.length; i += 1) {
      const { candidate, titleKey } = window[i];
      const lookup = lookups[i];

      // Skipped after an earlier failure, which aborts below.
      if (lookup === null) continue;

      if (!lookup.ok) {
        if (abortOnLookupFailure) return { aborted: true, error: lookup.error };
        debugInfo.rejected.lookupFailed += 1;
        continue;
      }

      if (!isWithinPopularityCeiling(lookup.popularity, state.popularityCeiling)) {
        debugInfo.rejected.overCeiling += 1;
        continue;
      }

      state.accepted.set(titleKey, candidate);
      state.seenIds.add(candidate.catalogId);
    }
  }

  return { aborted: false };
}

async function runResolution(
  phrase: SearchPhrase | ExtractionFailure,
  targetCount: number,
  popularityCeiling: number,
  deps: ResolverDeps,
  options: ResolveOptions,
): Promise<ResolutionRun> {
  const debugInfo: DebugInfo = {
    phrase: null,
    outcome: "skipped",
    pagesFetched: 0,
    popularityLookups: 0,
    rejected: emptyRejectionCounts(),
    error: null,
  };

  const fail = (outcome: ResolutionOutcome, error?: unknown): ResolutionRun => {
    debugInfo.outcome = outcome;
    if (error !== undefined) {
      debugInfo.error = error instanceof Error ? error.message : String(error);
    }
    return { songs: [], debugInfo };
  };

  if (targetCount <= 0 || !isUsablePhrase(phrase)) {
    return { songs: [], debugInfo };
  }

  const query = phrase.slice(0, MAX_PHRASE_LENGTH);
  debugInfo.phrase = query;

  const state: RunState = {
    targetCount,
    popularityCeiling,
    accepted: new Map(),
    seenIds: new Set(),
    debugInfo,
  };
  const limit = pLimit(Math.max(1, Math.floor(options.concurrency ?? 1)));
  const abortOnLookupFailure = (options.onLookupFailure ?? "abort") === "abort";
  const maxResults = options.maxResults ?? MAX_SEARCH_RESULTS;
  let offset = 0;

  debugInfo.outcome = "exhausted";
  while (state.accepted.size < targetCount) {
    if (options.signal?.aborted) {
      console.log("[SEARCH] Run cancelled", { query, offset });
      return fail("cancelled");
    }

    if (offset + SEARCH_PAGE_SIZE > maxResults) break;

    let items: SpotifySearchResponse["tracks"]["items"];
    try {
      const page = await deps.catalog.searchTracks({
        query,
        limit: SEARCH_PAGE_SIZE,
        offset,
        market: options.market,
        signal: options.signal,
      });
      items = page.tracks.items;
    } catch (error) {
      // An abort during the fetch surfaces as a request error.
      if (options.signal?.aborted) {
        console.log("[SEARCH] Run cancelled", { query, offset });
        return fail("cancelled");
      }
      console.error("[SEARCH] Track search failed, aborting run", {
        query,
        offset,
        error: error instanceof Error ? error.message : String(error),
      });
      return fail("search_failed", error);
    }
    debugInfo.pagesFetched += 1;

    if (items.length === 0) break;

    const candidates: TrackCandidate[] = [];
    for (const item of items) {
      const candidate = normalizeTrack(item);
      if (candidate) {
        candidates.push(candidate);
      } else {
        debugInfo.rejected.malformed += 1;
      }
    }

    const result = await evaluatePage(
      candidates,
      state,
      deps,
      limit,
      abortOnLookupFailure,
    );
    if (result.aborted) {
      console.error("[SEARCH] Popularity lookup failed, aborting run", {
        query,
        offset,
      });
      return fail("lookup_failed", result.error);
    }

    offset += SEARCH_PAGE_SIZE;
  }

  if (state.accepted.size >= targetCount) debugInfo.outcome = "filled";

  return {
    songs: [...state.accepted.values()].slice(0, targetCount),
    debugInfo,
  };
}

/**
 * Resolve a search phrase into at most `targetCount` songs whose primary
 * artist has no more than `popularityCeiling` followers.
 *
 * An empty phrase, the extraction-failure sentinel or a non-positive
 * targetCount resolve to [] without searching.
 */
export async function resolveSongs(
  phrase: SearchPhrase | ExtractionFailure,
  targetCount: number,
  popularityCeiling: number,
  deps: ResolverDeps,
  options?: ResolveOptions & { debug?: false },
): Promise<AcceptedSong[]>;
export async function resolveSongs(
  phrase: SearchPhrase | ExtractionFailure,
  targetCount: number,
  popularityCeiling: number,
  deps: ResolverDeps,
  options: ResolveOptions & { debug: true },
): Promise<{ songs: AcceptedSong[]; debugInfo: DebugInfo }>;
export async function resolveSongs(
  phrase: SearchPhrase | ExtractionFailure,
  targetCount: number,
  popularityCeiling: number,
  deps: ResolverDeps,
  options: ResolveOptions & { debug?: boolean } = {},
): Promise<AcceptedSong[] | { songs: AcceptedSong[]; debugInfo: DebugInfo }> {
  const run = await runResolution(
    phrase,
    targetCount,
    popularityCeiling,
    deps,
    options,
  );

  if (options.debug) return run;

  return run.songs;
}
