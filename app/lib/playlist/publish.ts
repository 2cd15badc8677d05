/**
 * publish.ts
 *
 * Creates a playlist on the user's account and fills it in one batch.
 *
 * If appending fails after the playlist was created, the empty playlist stays
 * on the account; there is no cleanup.
 */

import { PlaylistValidationError } from "../errors";
import { playlistUrl, type CatalogClient } from "../spotify";
import type { PublishedPlaylist } from "./types";

export const MAX_PLAYLIST_NAME_LENGTH = 100;
// Spotify accepts at most 100 URIs per add-items request.
export const MAX_TRACKS_PER_PUBLISH = 100;

export interface PublishOptions {
  public?: boolean;
  description?: string;
}

/**
 * Checks that need no account: the name and the track list.
 */
export function validatePlaylistContent(
  name: string,
  trackIds: readonly string[],
): string[] {
  const issues: string[] = [];
  const trimmed = name.trim();

  if (!trimmed) issues.push("playlist name is required");
  if (trimmed.length > MAX_PLAYLIST_NAME_LENGTH) {
    issues.push(
      `playlist name must be at most ${MAX_PLAYLIST_NAME_LENGTH} characters`,
    );
  }
  if (trackIds.length === 0) issues.push("no tracks to add");
  if (trackIds.length > MAX_TRACKS_PER_PUBLISH) {
    issues.push(`at most ${MAX_TRACKS_PER_PUBLISH} tracks can be published`);
  }
  if (trackIds.some((id) => !id.trim())) issues.push("track ids must not be empty");

  return issues;
}

export function validatePublishRequest(
  userId: string,
  name: string,
  trackIds: readonly string[],
): string[] {
  const issues = userId.trim() ? [] : ["user id is required"];
  return [...issues, ...validatePlaylistContent(name, trackIds)];
}

export async function publishPlaylist(
  catalog: Pick<CatalogClient, "createPlaylist" | "addPlaylistItems">,
  userId: string,
  name: string,
  trackIds: readonly string[],
  options: PublishOptions = {},
): Promise<PublishedPlaylist> {
  const issues = validatePublishRequest(userId, name, trackIds);
  if (issues.length > 0) {
    throw new PlaylistValidationError(issues);
  }

  const playlist = await catalog.createPlaylist(userId, {
    name: name.trim(),
    public: options.public ?? true,
    description: options.description,
  });

  console.log("[PUBLISH] Playlist created", {
    playlistId: playlist.id,
    tracks: trackIds.length,
  });

  await catalog.addPlaylistItems(playlist.id, trackIds);

  return { id: playlist.id, url: playlistUrl(playlist) };
}
