import type { AcceptedSong, DebugInfo, SearchPhrase } from "../search/types";

/**
 * The not-yet-published result of one generation cycle. Replaced wholesale
 * on regeneration, never edited in place.
 */
export interface PlaylistDraft {
  readonly sourceText: string;
  readonly searchPhrase: SearchPhrase;
  readonly requestedCount: number;
  readonly popularityCeiling: number;
  /** Undefined when no name was given with the request. */
  readonly playlistName: string | undefined;
  readonly acceptedSongs: readonly AcceptedSong[];
  /** Increments with every draft the session creates. */
  readonly version: number;
  readonly createdAt: string;
}

export interface PublishedPlaylist {
  id: string;
  url: string;
}

export type GenerationResult =
  | { status: "ok"; draft: PlaylistDraft; debugInfo: DebugInfo }
  | {
      status: "empty";
      /** null when keyword extraction failed */
      searchPhrase: SearchPhrase | null;
      debugInfo: DebugInfo;
    };
