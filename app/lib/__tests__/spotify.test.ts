import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CatalogRequestError } from "../errors";
import { createSpotifyClient, playlistUrl, trackUri } from "../spotify";
import type { AccessTokenProvider } from "../spotifyAuth";

const fetchMock = vi.fn<typeof fetch>();

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "Content-Type": "application/json" },
    ...init,
  });
}

function fakeTokens(): AccessTokenProvider & {
  invalidate: ReturnType<typeof vi.fn>;
} {
  return {
    getAccessToken: async () => "test-token",
    invalidate: vi.fn(),
  };
}

function requestedUrl(callIndex = 0): URL {
  return new URL(String(fetchMock.mock.calls[callIndex][0]));
}

const searchBody = {
  tracks: {
    items: [
      {
        id: "t1",
        name: "Song",
        artists: [{ id: "a1", name: "Artist" }],
        external_urls: { spotify: "https://open.spotify.com/track/t1" },
        popularity: 12,
      },
      null,
    ],
    total: 2,
    next: null,
  },
};

async function catchError(promise: Promise<unknown>): Promise<CatalogRequestError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof CatalogRequestError) return error;
    throw error;
  }
  throw new Error("expected the request to fail");
}

describe("createSpotifyClient", () => {
  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("searches tracks with paging and market parameters", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(searchBody));
    const client = createSpotifyClient({ tokens: fakeTokens() });

    const page = await client.searchTracks({
      query: "chill lofi",
      limit: 50,
      offset: 100,
      market: "US",
    });

    const url = requestedUrl();
    expect(url.origin + url.pathname).toBe("https://api.spotify.com/v1/search");
    expect(Object.fromEntries(url.searchParams)).toEqual({
      q: "chill lofi",
      type: "track",
      limit: "50",
      offset: "100",
      market: "US",
    });
    expect(fetchMock.mock.calls[0][1]).toMatchObject({
      method: "GET",
      headers: {
        Authorization: "Bearer test-token",
        Accept: "application/json",
      },
    });
    expect(page.tracks.items).toHaveLength(2);
    expect(page.tracks.items[1]).toBeNull();
    // unknown keys are dropped by the response schema
    expect(page.tracks.items[0]).not.toHaveProperty("popularity");
  });

  it("leaves out an unset market", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(searchBody));
    const client = createSpotifyClient({ tokens: fakeTokens() });

    await client.searchTracks({ query: "x", limit: 50, offset: 0 });

    expect(requestedUrl().searchParams.has("market")).toBe(false);
  });

  it("reads an artist's follower count", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ id: "a1", name: "Artist", followers: { href: null, total: 812 } }),
    );
    const client = createSpotifyClient({ tokens: fakeTokens() });

    const artist = await client.getArtist("a1");

    expect(artist.followers.total).toBe(812);
    expect(requestedUrl().pathname).toBe("/v1/artists/a1");
  });

  it("creates a playlist and adds tracks as uris", async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ id: "pl1", name: "Mix" }, { status: 201 }))
      .mockResolvedValueOnce(jsonResponse({ snapshot_id: "snap-1" }, { status: 201 }));
    const client = createSpotifyClient({ tokens: fakeTokens() });

    const playlist = await client.createPlaylist("user 1", {
      name: "Mix",
      public: true,
    });
    const snapshot = await client.addPlaylistItems(playlist.id, ["t1", "t2"]);

    expect(requestedUrl(0).pathname).toBe("/v1/users/user%201/playlists");
    expect(fetchMock.mock.calls[0][1]).toMatchObject({
      method: "POST",
      body: JSON.stringify({ name: "Mix", public: true }),
    });
    expect(requestedUrl(1).pathname).toBe("/v1/playlists/pl1/tracks");
    expect(fetchMock.mock.calls[1][1]).toMatchObject({
      method: "POST",
      body: JSON.stringify({ uris: ["spotify:track:t1", "spotify:track:t2"] }),
    });
    expect(snapshot).toBe("snap-1");
  });

  describe("errors", () => {
    it("wraps network failures with status 0", async () => {
      fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));
      const client = createSpotifyClient({ tokens: fakeTokens() });

      const error = await catchError(client.currentUser());

      expect(error.status).toBe(0);
      expect(error.retryable).toBe(true);
      expect(error.message).toBe("Spotify request failed: /me: fetch failed");
    });

    it("keeps status, body and retry-after of a failed response", async () => {
      fetchMock.mockResolvedValueOnce(
        new Response("slow down", {
          status: 429,
          headers: { "Retry-After": "3" },
        }),
      );
      const client = createSpotifyClient({ tokens: fakeTokens() });

      const error = await catchError(client.getArtist("a1"));

      expect(error).toMatchObject({
        status: 429,
        endpoint: "/artists/a1",
        retryAfter: 3,
        body: "slow down",
      });
      expect(error.retryable).toBe(true);
    });

    it("drops the cached token on 401", async () => {
      fetchMock.mockResolvedValueOnce(new Response("", { status: 401 }));
      const tokens = fakeTokens();
      const client = createSpotifyClient({ tokens });

      const error = await catchError(client.currentUser());

      expect(error.status).toBe(401);
      expect(error.retryable).toBe(false);
      expect(tokens.invalidate).toHaveBeenCalledTimes(1);
    });

    it("rejects a response of the wrong shape", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ tracks: "nope" }));
      const client = createSpotifyClient({ tokens: fakeTokens() });

      const error = await catchError(
        client.searchTracks({ query: "x", limit: 50, offset: 0 }),
      );

      expect(error.status).toBe(502);
      expect(error.endpoint).toBe("/search");
    });
  });

  describe("response log", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "catalog-log-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("keeps only first pages", async () => {
      fetchMock.mockImplementation(async () => jsonResponse(searchBody));
      const client = createSpotifyClient({
        tokens: fakeTokens(),
        responseLogDir: dir,
      });

      await client.searchTracks({ query: "first", limit: 50, offset: 0 });
      await client.searchTracks({ query: "first", limit: 50, offset: 50 });

      const lines = (await readFile(join(dir, "catalog.jsonl"), "utf8"))
        .trim()
        .split("\n");
      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0])).toMatchObject({
        endpoint: "search",
        query: "first",
        offset: 0,
      });
    });
  });
});

describe("trackUri / playlistUrl", () => {
  it("formats uris and falls back to a built url", () => {
    expect(trackUri("abc")).toBe("spotify:track:abc");
    expect(playlistUrl({ id: "pl1" })).toBe("https://open.spotify.com/playlist/pl1");
    expect(
      playlistUrl({ id: "pl1", external_urls: { spotify: "https://example.test/pl1" } }),
    ).toBe("https://example.test/pl1");
  });
});
