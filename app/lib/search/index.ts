/**
 * Song-candidate resolution module
 *
 * Main entry point for the search pipeline
 */

export { resolveSongs } from "./pipeline";
export type {
  AcceptedSong,
  DebugInfo,
  ResolveOptions,
  SearchPhrase,
  TrackCandidate,
} from "./types";

// Export individual modules for testing/debugging
export * from "./filters";
export * from "./normalize";
export * from "./keywords";
export * from "./artistPopularity";
export * from "./explain";
export {
  SEARCH_PAGE_SIZE,
  MAX_PHRASE_LENGTH,
  MAX_SEARCH_RESULTS,
  type ResolverDeps,
} from "./pipeline";
