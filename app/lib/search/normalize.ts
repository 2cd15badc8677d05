/**
 * normalize.ts
 *
 * Converts raw Spotify track records into the pipeline's candidate shape.
 * This is a pure transformation - no filtering or scoring.
 */

import type { SpotifyTrack } from "../types";
import type { TrackCandidate } from "./types";

/**
 * Returns null for records the pipeline cannot use: no id, no title or no
 * identifiable primary artist.
 */
export function normalizeTrack(
  track: SpotifyTrack | null,
): TrackCandidate | null {
  if (!track) return null;

  const catalogId = track.id ?? "";
  const title = track.name ?? "";
  const primaryArtist = track.artists?.[0];
  const primaryArtistId = primaryArtist?.id ?? "";

  if (!catalogId || !title || !primaryArtistId) return null;

  return {
    catalogId,
    title,
    primaryArtistId,
    primaryArtistName: primaryArtist?.name ?? "",
    externalUrl:
      track.external_urls?.spotify ||
      `https://open.spotify.com/track/${catalogId}`,
  };
}
