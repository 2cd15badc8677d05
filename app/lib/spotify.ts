/**
 * spotify.ts
 *
 * Thin client for the parts of the Spotify Web API this project uses:
 * track search, artist lookup, current user and playlist creation.
 *
 * Every call throws `CatalogRequestError` on failure. There is no retry here;
 * callers decide what a failure means for them.
 */

import type { z } from "zod";
import { CatalogRequestError } from "./errors";
import { logCatalogSearch } from "./logging/catalog";
import type { AccessTokenProvider } from "./spotifyAuth";
import {
  spotifyArtistSchema,
  spotifyPlaylistSchema,
  spotifySearchResponseSchema,
  spotifySnapshotSchema,
  spotifyUserSchema,
  type SpotifyArtist,
  type SpotifyPlaylist,
  type SpotifySearchResponse,
  type SpotifyUser,
} from "./types";

export const SPOTIFY_API_URL = "https://api.spotify.com/v1";

export interface SearchTracksParams {
  query: string;
  limit: number;
  offset: number;
  market?: string;
  signal?: AbortSignal;
}

export interface CreatePlaylistParams {
  name: string;
  public: boolean;
  description?: string;
}

export interface CatalogClient {
  searchTracks(params: SearchTracksParams): Promise<SpotifySearchResponse>;
  getArtist(artistId: string): Promise<SpotifyArtist>;
  currentUser(): Promise<SpotifyUser>;
  createPlaylist(
    userId: string,
    params: CreatePlaylistParams,
  ): Promise<SpotifyPlaylist>;
  /** Appends tracks in order; returns the playlist's new snapshot id. */
  addPlaylistItems(
    playlistId: string,
    trackIds: readonly string[],
  ): Promise<string>;
}

export interface SpotifyClientOptions {
  tokens: AccessTokenProvider;
  baseUrl?: string;
  /** When set, the first page of each search is kept in catalog.jsonl. */
  responseLogDir?: string | null;
}

type RequestParams = Record<string, string | number | boolean | undefined>;

export function trackUri(trackId: string): string {
  return `spotify:track:${trackId}`;
}

export function playlistUrl(playlist: SpotifyPlaylist): string {
  return (
    playlist.external_urls?.spotify ||
    `https://open.spotify.com/playlist/${playlist.id}`
  );
}

function parseRetryAfter(res: Response): number | undefined {
  const header = res.headers.get("retry-after");
  if (!header) return undefined;
  const seconds = Number.parseInt(header, 10);
  return Number.isNaN(seconds) ? undefined : seconds;
}

export function createSpotifyClient(options: SpotifyClientOptions): CatalogClient {
  const baseUrl = options.baseUrl ?? SPOTIFY_API_URL;
  const { tokens } = options;

  async function request<S extends z.ZodTypeAny>(
    endpoint: string,
    schema: S,
    init: {
      method?: "GET" | "POST";
      params?: RequestParams;
      body?: unknown;
      signal?: AbortSignal;
    } = {},
  ): Promise<z.output<S>> {
    const url = new URL(`${baseUrl}${endpoint}`);
    for (const [key, value] of Object.entries(init.params ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }

    const token = await tokens.getAccessToken();
    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      Accept: "application/json",
    };
    if (init.body !== undefined) headers["Content-Type"] = "application/json";

    let res: Response;
    try {
      res = await fetch(url.toString(), {
        method: init.method ?? "GET",
        headers,
        body: init.body === undefined ? undefined : JSON.stringify(init.body),
        signal: init.signal,
      });
    } catch (error) {
      throw new CatalogRequestError(
        `Spotify request failed: ${endpoint}: ${error instanceof Error ? error.message : String(error)}`,
        { status: 0, endpoint },
      );
    }

    if (!res.ok) {
      if (res.status === 401) tokens.invalidate();
      const txt = await res.text().catch(() => "");
      throw new CatalogRequestError(
        `Spotify request failed: ${endpoint}: ${res.status}`,
        {
          status: res.status,
          endpoint,
          retryAfter: parseRetryAfter(res),
          body: txt,
        },
      );
    }

    let json: unknown;
    try {
      json = await res.json();
    } catch {
      throw new CatalogRequestError(
        `Spotify returned invalid JSON: ${endpoint}`,
        { status: 502, endpoint },
      );
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new CatalogRequestError(
        `Spotify response did not match the expected shape: ${endpoint}`,
        { status: 502, endpoint, body: parsed.error.message },
      );
    }
    return parsed.data;
  }

  return {
    async searchTracks({ query, limit, offset, market, signal }) {
      const page = await request("/search", spotifySearchResponseSchema, {
        params: { q: query, type: "track", limit, offset, market },
        signal,
      });

      // Log only the first page to keep logs smaller
      if (options.responseLogDir && offset === 0) {
        await logCatalogSearch({
          dir: options.responseLogDir,
          query,
          offset,
          rawResponse: page,
        });
      }

      return page;
    },

    getArtist(artistId) {
      return request(
        `/artists/${encodeURIComponent(artistId)}`,
        spotifyArtistSchema,
      );
    },

    currentUser() {
      return request("/me", spotifyUserSchema);
    },

    createPlaylist(userId, params) {
      return request(
        `/users/${encodeURIComponent(userId)}/playlists`,
        spotifyPlaylistSchema,
        {
          method: "POST",
          body: {
            name: params.name,
            public: params.public,
            ...(params.description ? { description: params.description } : {}),
          },
        },
      );
    },

    async addPlaylistItems(playlistId, trackIds) {
      const snapshot = await request(
        `/playlists/${encodeURIComponent(playlistId)}/tracks`,
        spotifySnapshotSchema,
        { method: "POST", body: { uris: trackIds.map(trackUri) } },
      );
      return snapshot.snapshot_id;
    },
  };
}
