/**
 * Spotify Web API response shapes, as far as this project reads them.
 *
 * Responses are parsed with these schemas at the client boundary so the rest
 * of the code works with checked data. Unknown keys are dropped.
 */

import { z } from "zod";

export const spotifyArtistRefSchema = z.object({
  id: z.string().nullable().optional(),
  name: z.string().nullable().optional(),
});

export const spotifyTrackSchema = z.object({
  id: z.string().nullable().optional(),
  name: z.string().nullable().optional(),
  artists: z.array(spotifyArtistRefSchema).nullable().optional(),
  external_urls: z
    .object({ spotify: z.string().optional() })
    .nullable()
    .optional(),
});

// Search pages can contain null entries for tracks unavailable in the market.
export const spotifySearchResponseSchema = z.object({
  tracks: z.object({
    items: z.array(spotifyTrackSchema.nullable()),
    total: z.number().optional(),
    next: z.string().nullable().optional(),
  }),
});

export const spotifyArtistSchema = z.object({
  id: z.string(),
  name: z.string().optional(),
  followers: z.object({
    total: z.number().int().nonnegative(),
  }),
});

export const spotifyUserSchema = z.object({
  id: z.string().min(1),
  display_name: z.string().nullable().optional(),
});

export const spotifyPlaylistSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  external_urls: z
    .object({ spotify: z.string().optional() })
    .nullable()
    .optional(),
});

export const spotifySnapshotSchema = z.object({
  snapshot_id: z.string(),
});

export const spotifyTokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string(),
  expires_in: z.number().positive(),
  refresh_token: z.string().optional(),
  scope: z.string().optional(),
});

export type SpotifyArtistRef = z.infer<typeof spotifyArtistRefSchema>;
export type SpotifyTrack = z.infer<typeof spotifyTrackSchema>;
export type SpotifySearchResponse = z.infer<typeof spotifySearchResponseSchema>;
export type SpotifyArtist = z.infer<typeof spotifyArtistSchema>;
export type SpotifyUser = z.infer<typeof spotifyUserSchema>;
export type SpotifyPlaylist = z.infer<typeof spotifyPlaylistSchema>;
export type SpotifyTokenResponse = z.infer<typeof spotifyTokenResponseSchema>;
