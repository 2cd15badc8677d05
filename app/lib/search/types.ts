/**
 * Core data types for the song-candidate resolution pipeline
 */

/**
 * Search query derived from the listener's description. Sent to the catalog
 * after truncation to MAX_PHRASE_LENGTH.
 */
export type SearchPhrase = string;

/**
 * A track as returned by catalog search, reduced to what the pipeline needs.
 */
export interface TrackCandidate {
  readonly catalogId: string;
  readonly title: string;
  readonly primaryArtistId: string;
  readonly primaryArtistName: string;
  readonly externalUrl: string;
}

/**
 * A candidate that passed every filter. Order in the resolved list is the
 * display and publish order.
 */
export type AcceptedSong = TrackCandidate;

/**
 * Result of one artist popularity lookup. Failures are values here so the
 * pipeline can decide between aborting and skipping.
 */
export type PopularityLookup =
  | { ok: true; popularity: number }
  | { ok: false; error: unknown };

/**
 * What a failed popularity lookup does to a run:
 * - "abort": the whole run resolves to no songs
 * - "skip": only that candidate is rejected
 */
export type LookupFailurePolicy = "abort" | "skip";

export type ResolutionOutcome =
  | "filled" // reached targetCount
  | "exhausted" // search ran out of results first
  | "skipped" // nothing to search for
  | "search_failed"
  | "lookup_failed"
  | "cancelled";

export interface RejectionCounts {
  duplicateTitle: number;
  duplicateId: number;
  excludedKeyword: number;
  overCeiling: number;
  lookupFailed: number;
  malformed: number;
}

export interface ResolveOptions {
  market?: string;
  /** Max popularity lookups in flight at once. Defaults to 1 (sequential). */
  concurrency?: number;
  onLookupFailure?: LookupFailurePolicy;
  /** Checked before every page fetch. */
  signal?: AbortSignal;
  /** Stop paging once this many results have been requested. */
  maxResults?: number;
}

export interface DebugInfo {
  phrase: string | null;
  outcome: ResolutionOutcome;
  pagesFetched: number;
  popularityLookups: number;
  rejected: RejectionCounts;
  error: string | null;
}
